import { addedLines, type Rule, type RuleHit } from "../types.js";

const SECRET_PATTERNS = [
  { pattern: /(?:api[_-]?key|apikey)\s*[:=]\s*["'][^"']{8,}["']/i, label: "API key" },
  { pattern: /(?:secret|password|passwd|pwd)\s*[:=]\s*["'][^"']{6,}["']/i, label: "Secret/password" },
  { pattern: /(?:token)\s*[:=]\s*["'][^"']{10,}["']/i, label: "Token" },
  { pattern: /-----BEGIN (?:RSA |EC |DSA )?PRIVATE KEY-----/, label: "Private key" },
  { pattern: /(?:AKIA|ABIA|ACCA|ASIA)[0-9A-Z]{16}/, label: "AWS access key" },
  { pattern: /ghp_[A-Za-z0-9_]{36}/, label: "GitHub personal access token" },
];

export const noSecrets: Rule = {
  id: "no-secrets",
  name: "No Secrets",
  description: "Detects potential secrets/credentials in added lines",
  category: "security",
  defaultSeverity: "critical",
  run({ file }) {
    const hits: RuleHit[] = [];

    for (const line of addedLines(file)) {
      const match = SECRET_PATTERNS.find(({ pattern }) => pattern.test(line.content));
      if (match) {
        hits.push({
          lineNumber: line.lineNumber,
          message: `Potential ${match.label} committed in source on line ${line.lineNumber}`,
          suggestion: "Load it from an environment variable or a secrets manager.",
        });
      }
    }
    return hits;
  },
};
