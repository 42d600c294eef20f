import vocabulary from "../data/context-keywords.json" with { type: "json" };
import { TOKEN_PATTERN } from "./detector.js";

const DEFAULT_VOCABULARY: ReadonlySet<string> = new Set(vocabulary);

/**
 * Topic keywords found in text, lowercased, deduplicated, in order of first
 * appearance. Only words from the vocabulary are kept, so entity values never
 * leak into a session's preserved context.
 */
export function extractContext(
  text: string,
  words: ReadonlySet<string> = DEFAULT_VOCABULARY
): string[] {
  const stripped = text.replace(new RegExp(TOKEN_PATTERN.source, "g"), " ");
  const found = new Set<string>();
  for (const m of stripped.toLowerCase().matchAll(/[a-z]+/g)) {
    if (words.has(m[0])) found.add(m[0]);
  }
  return [...found];
}
