import type { ReconstructResult } from "./types.js";
import { TOKEN_PATTERN } from "./detector.js";
import type { SessionStore } from "./session-store.js";
import { PrivacyError, TokenVeilError, ValidationError } from "./errors.js";

/**
 * Replace every `[TOKEN]` the lookup knows in a single pass. Unknown tokens
 * are left in place and reported once each, in order of first appearance.
 */
export function reconstructText(
  text: string,
  lookup: (token: string) => string | undefined
): ReconstructResult {
  const unresolved = new Set<string>();
  const restored = text.replace(new RegExp(TOKEN_PATTERN.source, "g"), (match: string, token: string) => {
    const value = lookup(token);
    if (value === undefined) {
      unresolved.add(token);
      return match;
    }
    return value;
  });
  return { text: restored, unresolvedTokens: [...unresolved] };
}

export class Reconstructor {
  constructor(private readonly store: SessionStore) {}

  async reconstruct(text: string, sessionId: string): Promise<ReconstructResult> {
    if (typeof text !== "string") {
      throw new ValidationError("Text must be a string", { received: typeof text });
    }
    const session = await this.store.get(sessionId);
    try {
      return reconstructText(text, (token) => session.valueOf(token));
    } catch (err) {
      if (err instanceof TokenVeilError) throw err;
      throw new PrivacyError("Reconstruction failed", { sessionId }, { cause: err });
    }
  }
}
