export type InputKind = "greeting" | "irrelevant" | "invalid_url" | "valid_pr_url";

export type InputClassification =
  | { kind: "valid_pr_url"; url: string }
  | { kind: Exclude<InputKind, "valid_pr_url">; message: string };

const GREETING_PATTERNS = [
  /^hi+$/,
  /^hello+$/,
  /^hey+$/,
  /^(hi|hello|hey)\s+there$/,
  /^greetings?$/,
  /^good\s+(morning|afternoon|evening|day)$/,
  /^howdy$/,
  /^sup$/,
  /^what'?s\s+up$/,
];

// Anchored at the start only; anything after the PR number is dropped.
const PR_URL_PATTERN = /^https?:\/\/github\.com\/[\w.-]+\/[\w.-]+\/pull\/\d+/i;

const IRRELEVANT_KEYWORDS = [
  "what is",
  "how to",
  "tell me",
  "explain",
  "tutorial",
  "teach me",
  "help me learn",
  "joke",
  "story",
  "weather",
  "time",
  "date",
  "calculate",
  "translate",
  "define",
  "meaning of",
  "who is",
  "where is",
  "when is",
  "why is",
];

export const MESSAGES = {
  empty: "Please provide a GitHub PR URL to review.",
  greeting:
    "Hi! How can I help you? Please provide your GitHub PR link, let's check and solve any issues together! 🚀",
  irrelevant:
    "Sorry, I am a GitHub PR review agent. I don't handle general questions or unrelated topics. Please provide a GitHub Pull Request URL for me to review. Example: https://github.com/owner/repo/pull/123",
  invalidUrl:
    "Invalid GitHub PR URL format. Please provide a valid URL like: https://github.com/owner/repo/pull/123",
} as const;

/**
 * Sorts free-form text from a chat-style client into a PR URL to review or
 * a canned reply. Checked in order: empty, greeting, PR URL, off-topic.
 */
export function classifyInput(raw: string | null | undefined): InputClassification {
  const text = raw?.trim() ?? "";
  if (!text) return { kind: "invalid_url", message: MESSAGES.empty };

  const lower = text.toLowerCase();
  if (GREETING_PATTERNS.some((p) => p.test(lower))) {
    return { kind: "greeting", message: MESSAGES.greeting };
  }

  const url = PR_URL_PATTERN.exec(text);
  if (url) {
    return { kind: "valid_pr_url", url: url[0] };
  }

  if (isIrrelevant(text, lower)) {
    return { kind: "irrelevant", message: MESSAGES.irrelevant };
  }

  return { kind: "invalid_url", message: MESSAGES.invalidUrl };
}

function isIrrelevant(text: string, lower: string): boolean {
  if (IRRELEVANT_KEYWORDS.some((k) => lower.includes(k))) return true;
  // A question that never mentions GitHub or a PR
  return (
    text.includes("?") &&
    !lower.includes("github") &&
    !lower.includes("pull request") &&
    !lower.includes("pr")
  );
}
