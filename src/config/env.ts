import { z } from "zod";

const envSchema = z.object({
  // GitHub (optional: public PRs can be read anonymously, within rate limits)
  GITHUB_TOKEN: z.string().min(1).optional(),

  // Anthropic (LLM stages are skipped without it)
  ANTHROPIC_API_KEY: z.string().min(1).optional(),

  // Review configuration file
  REVIEW_CONFIG_PATH: z.string().default("diffsieve.yml"),

  // Server
  PORT: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

/** Validates an environment map. Empty strings count as unset. */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const raw = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== "")
  );

  const result = envSchema.safeParse(raw);
  if (!result.success) {
    const invalid = result.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid environment variables:\n${invalid}`);
  }
  return result.data;
}

export function loadEnv(): Env {
  if (_env) return _env;
  _env = parseEnv(process.env);
  return _env;
}
