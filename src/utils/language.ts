import table from "./languages.json" with { type: "json" };

export const UNKNOWN_LANGUAGE = "unknown";

const FILENAMES: Readonly<Record<string, string>> = table.filenames;
const EXTENSIONS: Readonly<Record<string, string>> = table.extensions;

/**
 * Maps a file path to a language tag. Special filenames (Dockerfile,
 * Makefile, ...) win over extensions; both lookups ignore case.
 */
export function classify(path: string): string {
  if (!path) return UNKNOWN_LANGUAGE;

  const name = path.split(/[\\/]/).pop()?.toLowerCase() ?? "";
  const byName = FILENAMES[name];
  if (byName) return byName;

  const dot = name.lastIndexOf(".");
  // ".env"-style dotfiles have no extension
  if (dot <= 0) return UNKNOWN_LANGUAGE;

  return EXTENSIONS[name.slice(dot)] ?? UNKNOWN_LANGUAGE;
}

/**
 * Most common known language across the paths. On a tie the language seen
 * first in `paths` wins.
 */
export function classifyPrimary(paths: readonly string[]): string {
  const counts = new Map<string, number>();
  for (const path of paths) {
    const language = classify(path);
    if (language === UNKNOWN_LANGUAGE) continue;
    counts.set(language, (counts.get(language) ?? 0) + 1);
  }

  let best = UNKNOWN_LANGUAGE;
  let bestCount = 0;
  // Map iteration follows insertion order
  for (const [language, count] of counts) {
    if (count > bestCount) {
      best = language;
      bestCount = count;
    }
  }
  return best;
}
