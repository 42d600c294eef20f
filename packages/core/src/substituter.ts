import type { TokenOccurrence } from "./types.js";

/**
 * Produce the tokenized text by replacing each occurrence with `[TOKEN]`.
 * Replaces from end to start to preserve character offsets.
 */
export function substitute(text: string, occurrences: readonly TokenOccurrence[]): string {
  // Sort by start offset descending so replacements don't shift later offsets
  const sorted = [...occurrences].sort((a, b) => b.start - a.start);

  let result = text;
  for (const occ of sorted) {
    result = result.slice(0, occ.start) + `[${occ.token}]` + result.slice(occ.end);
  }

  return result;
}
