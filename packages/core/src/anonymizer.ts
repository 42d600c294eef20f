import type {
  BatchItemResult,
  DeidentifyOptions,
  DeidentifyResult,
  EntitySpan,
  PrivacyLevel,
  TokenOccurrence,
} from "./types.js";
import { PatternDetector } from "./detector.js";
import { DEFAULT_PRIVACY_LEVEL, isPrivacyLevel } from "./privacy-levels.js";
import type { PrivacySession } from "./session.js";
import { SessionStore, assertSessionId, generateId } from "./session-store.js";
import { RelationshipDetector } from "./relationships.js";
import { substitute } from "./substituter.js";
import { extractContext } from "./context.js";
import { mapWithConcurrency } from "./pool.js";
import {
  PrivacyError,
  TokenVeilError,
  ValidationError,
  errorKind,
  errorMessage,
} from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

export interface AnonymizerOptions {
  store: SessionStore;
  detector?: PatternDetector;
  relationships?: RelationshipDetector;
  defaultPrivacyLevel?: PrivacyLevel;
  /** Detection workers for batches. */
  batchConcurrency?: number;
  logger?: Logger;
}

function assertText(text: unknown): asserts text is string {
  if (typeof text !== "string") {
    throw new ValidationError("Text must be a string", { received: typeof text });
  }
}

function wrapUnexpected(err: unknown, sessionId: string): TokenVeilError {
  if (err instanceof TokenVeilError) return err;
  return new PrivacyError("Tokenization failed", { sessionId }, { cause: err });
}

/**
 * Replaces detected entities with session-stable `[TYPE_NNN]` tokens.
 *
 * text in → detect (outside the session lock) → assign tokens from the last
 * span back to the first → substitute end to start → infer relationships →
 * keep context → persist
 */
export class Anonymizer {
  private readonly store: SessionStore;
  private readonly detector: PatternDetector;
  private readonly relationships: RelationshipDetector;
  private readonly defaultLevel: PrivacyLevel;
  private readonly concurrency: number;
  private readonly log: Logger;

  constructor(options: AnonymizerOptions) {
    this.store = options.store;
    this.detector = options.detector ?? new PatternDetector();
    this.relationships = options.relationships ?? new RelationshipDetector();
    this.defaultLevel = options.defaultPrivacyLevel ?? DEFAULT_PRIVACY_LEVEL;
    this.concurrency = options.batchConcurrency ?? 4;
    this.log = options.logger ?? createLogger("anonymizer");
  }

  private async resolveLevel(sessionId: string, requested: unknown): Promise<PrivacyLevel> {
    if (requested !== undefined) {
      if (!isPrivacyLevel(requested)) {
        throw new ValidationError(`Unknown privacy level "${String(requested)}"`, { privacyLevel: requested });
      }
      return requested;
    }
    const existing = await this.store.find(sessionId);
    return existing?.privacyLevel ?? this.defaultLevel;
  }

  async deidentify(text: string, options: DeidentifyOptions = {}): Promise<DeidentifyResult> {
    assertText(text);
    const sessionId = options.sessionId ?? generateId("sess_");
    assertSessionId(sessionId);

    try {
      const level = await this.resolveLevel(sessionId, options.privacyLevel);
      const spans = this.detector.detect(text, level);
      return await this.store.withSession(sessionId, { createLevel: level }, (session) =>
        this.merge(session, text, spans, level)
      );
    } catch (err) {
      throw wrapUnexpected(err, sessionId);
    }
  }

  /**
   * Deidentify many texts in one session. Detection runs on a bounded pool;
   * token assignment runs item by item in input order, so the final mapping
   * equals processing the texts one after another. Failures stay per item.
   */
  async deidentifyBatch(
    texts: readonly string[],
    options: DeidentifyOptions = {}
  ): Promise<BatchItemResult<DeidentifyResult>[]> {
    if (!Array.isArray(texts)) {
      throw new ValidationError("Batch input must be an array of strings");
    }
    const sessionId = options.sessionId ?? generateId("sess_");
    assertSessionId(sessionId);
    const level = await this.resolveLevel(sessionId, options.privacyLevel);
    await this.store.withSession(sessionId, { createLevel: level }, () => undefined);

    const detected = await mapWithConcurrency(texts, this.concurrency, async (text) => {
      try {
        assertText(text);
        return { ok: true as const, spans: this.detector.detect(text, level) };
      } catch (err) {
        return { ok: false as const, error: wrapUnexpected(err, sessionId) };
      }
    });

    const results: BatchItemResult<DeidentifyResult>[] = [];
    for (let index = 0; index < texts.length; index++) {
      const item = detected[index];
      if (!item.ok) {
        results.push({ ok: false, index, error: { kind: errorKind(item.error), message: item.error.message } });
        continue;
      }
      try {
        const value = await this.store.withSession(sessionId, { createLevel: level }, (session) =>
          this.merge(session, texts[index], item.spans, level)
        );
        results.push({ ok: true, index, value });
      } catch (err) {
        const wrapped = wrapUnexpected(err, sessionId);
        this.log.warn("Batch item failed", { sessionId, index, error: errorMessage(wrapped) });
        results.push({ ok: false, index, error: { kind: errorKind(wrapped), message: wrapped.message } });
      }
    }
    return results;
  }

  private merge(
    session: PrivacySession,
    text: string,
    spans: readonly EntitySpan[],
    level: PrivacyLevel
  ): DeidentifyResult {
    // Highest offset mints first, so the last new entity gets the lowest suffix.
    const occurrences: TokenOccurrence[] = [...spans]
      .reverse()
      .map((span) => ({ ...span, ...session.assign(span.type, span.text) }))
      .reverse();

    const output = substitute(text, occurrences);
    const added = this.relationships.apply(this.relationships.infer(occurrences, session), session);
    session.addContext(extractContext(output));

    const tokenMap: Record<string, string> = {};
    for (const occ of occurrences) {
      tokenMap[occ.token] = session.valueOf(occ.token) ?? occ.text;
    }

    this.log.debug("Deidentified text", {
      sessionId: session.id,
      entities: occurrences.length,
      minted: occurrences.filter((o) => o.minted).length,
      relationships: added.length,
    });

    return { text: output, tokenMap, sessionId: session.id, privacyLevel: level };
  }
}
