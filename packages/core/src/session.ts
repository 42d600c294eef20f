import type {
  EntityLinks,
  EntityType,
  PrivacyLevel,
  SessionRecord,
  SessionView,
} from "./types.js";
import { assertEntityType } from "./detector.js";

const TOKEN_NAME = /^([A-Z][A-Z0-9]*)_(\d{3,})$/;

export function formatToken(type: EntityType, n: number): string {
  return `${type}_${String(n).padStart(3, "0")}`;
}

/** Split "PERSON_012" into its type and suffix; null for malformed names. */
export function parseToken(token: string): { type: EntityType; n: number } | null {
  const m = TOKEN_NAME.exec(token);
  if (!m) return null;
  return { type: m[1], n: parseInt(m[2], 10) };
}

/** Canonical key used when value normalization is enabled. */
export function normalizeValue(value: string): string {
  return value.trim().replace(/\s+/g, " ").toLowerCase();
}

export interface PrivacySessionOptions {
  /**
   * Key token reuse on a normalized form instead of the exact string, so
   * "John Smith" and "john  smith" share a token. Off by default.
   */
  normalizeValues?: boolean;
}

/**
 * One tokenization context. Holds the token map, its O(1) inverse, per-type
 * counters and the relationship graph. Not safe for unserialized concurrent
 * mutation; callers go through SessionStore.withSession.
 */
export class PrivacySession {
  private readonly tokens = new Map<string, string>();
  private readonly inverse = new Map<string, string>();
  private readonly counters = new Map<EntityType, number>();
  private readonly links = new Map<string, { type: EntityType; relationships: Map<string, string> }>();
  private readonly context = new Set<string>();
  private readonly normalize: boolean;

  private constructor(
    readonly id: string,
    readonly createdAt: string,
    public lastUsed: string,
    readonly privacyLevel: PrivacyLevel,
    public metadata: Record<string, unknown>,
    options: PrivacySessionOptions
  ) {
    this.normalize = options.normalizeValues ?? false;
  }

  static create(
    id: string,
    privacyLevel: PrivacyLevel,
    metadata: Record<string, unknown> = {},
    now: Date = new Date(),
    options: PrivacySessionOptions = {}
  ): PrivacySession {
    const iso = now.toISOString();
    return new PrivacySession(id, iso, iso, privacyLevel, { ...metadata }, options);
  }

  static fromRecord(record: SessionRecord, options: PrivacySessionOptions = {}): PrivacySession {
    const session = new PrivacySession(
      record.session_id,
      record.created_at,
      record.last_used,
      record.privacy_level,
      { ...record.metadata },
      options
    );

    for (const [token, value] of Object.entries(record.token_mappings)) {
      const parsed = parseToken(token);
      if (!parsed) continue;
      session.tokens.set(token, value);
      const key = session.key(value);
      if (!session.inverse.has(key)) session.inverse.set(key, token);
      session.counters.set(parsed.type, Math.max(session.counters.get(parsed.type) ?? 0, parsed.n));
    }

    for (const [token, entry] of Object.entries(record.entity_relationships)) {
      if (!session.tokens.has(token)) continue;
      const relationships = new Map<string, string>();
      for (const [other, label] of Object.entries(entry.relationships)) {
        if (session.tokens.has(other)) relationships.set(other, label);
      }
      session.links.set(token, { type: entry.type, relationships });
    }

    for (const word of record.preserved_context) session.context.add(word);
    return session;
  }

  private key(value: string): string {
    return this.normalize ? normalizeValue(value) : value;
  }

  tokenFor(value: string): string | undefined {
    return this.inverse.get(this.key(value));
  }

  valueOf(token: string): string | undefined {
    return this.tokens.get(token);
  }

  /** Highest suffix minted so far for a type (0 when none). */
  counter(type: EntityType): number {
    return this.counters.get(type) ?? 0;
  }

  /**
   * Return the existing token for a value or mint the next one for the type.
   * Suffixes only ever grow.
   */
  assign(type: EntityType, value: string): { token: string; minted: boolean } {
    const existing = this.tokenFor(value);
    if (existing) return { token: existing, minted: false };

    assertEntityType(type);
    const next = this.counter(type) + 1;
    const token = formatToken(type, next);
    this.counters.set(type, next);
    this.tokens.set(token, value);
    this.inverse.set(this.key(value), token);
    this.links.set(token, { type, relationships: new Map() });
    return { token, minted: true };
  }

  /** Tokens of a given type, in minting order. */
  tokensOfType(type: EntityType): string[] {
    return [...this.tokens.keys()].filter((t) => parseToken(t)?.type === type);
  }

  /**
   * Add a directed edge. Existing edges are never overwritten; returns false
   * when the edge already existed or either token is unknown.
   */
  link(source: string, target: string, label: string): boolean {
    if (source === target || !this.tokens.has(source) || !this.tokens.has(target)) {
      return false;
    }
    let entry = this.links.get(source);
    if (!entry) {
      const parsed = parseToken(source);
      entry = { type: parsed ? parsed.type : source, relationships: new Map() };
      this.links.set(source, entry);
    }
    if (entry.relationships.has(target)) return false;
    entry.relationships.set(target, label);
    return true;
  }

  relationOf(source: string, target: string): string | undefined {
    return this.links.get(source)?.relationships.get(target);
  }

  addContext(words: Iterable<string>): number {
    let added = 0;
    for (const word of words) {
      const w = word.trim();
      if (!w || this.context.has(w)) continue;
      this.context.add(w);
      added++;
    }
    return added;
  }

  get preservedContext(): string[] {
    return [...this.context];
  }

  touch(now: Date = new Date()): void {
    this.lastUsed = now.toISOString();
  }

  relationships(): Record<string, EntityLinks> {
    const out: Record<string, EntityLinks> = {};
    for (const [token, entry] of this.links) {
      out[token] = { type: entry.type, relationships: Object.fromEntries(entry.relationships) };
    }
    return out;
  }

  toRecord(): SessionRecord {
    return {
      session_id: this.id,
      created_at: this.createdAt,
      last_used: this.lastUsed,
      privacy_level: this.privacyLevel,
      token_mappings: Object.fromEntries(this.tokens),
      entity_relationships: this.relationships(),
      preserved_context: this.preservedContext,
      metadata: structuredClone(this.metadata),
    };
  }

  toView(): SessionView {
    const record = this.toRecord();
    return {
      id: record.session_id,
      createdAt: record.created_at,
      lastUsed: record.last_used,
      privacyLevel: record.privacy_level,
      tokenMappings: record.token_mappings,
      entityRelationships: record.entity_relationships,
      preservedContext: record.preserved_context,
      metadata: record.metadata,
    };
  }
}
