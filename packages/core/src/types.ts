/** Privacy level selecting which matchers run. */
export type PrivacyLevel = "minimal" | "balanced" | "strict";

/** Built-in entity categories. Custom matchers may add their own prefixes. */
export type BuiltinEntityType =
  | "PERSON"
  | "PHONE"
  | "EMAIL"
  | "LOCATION"
  | "PROJECT";

/** Uppercase token prefix, e.g. "PERSON" or a custom "CASE". */
export type EntityType = BuiltinEntityType | (string & {});

/** Half-open character range [start, end). */
export interface TextRange {
  start: number;
  end: number;
}

/** A detected entity in raw text. Never persisted. */
export interface EntitySpan extends TextRange {
  text: string;
  type: EntityType;
}

/** A token assigned to a span during one deidentify call. */
export interface TokenOccurrence extends EntitySpan {
  token: string;
  /** True when the token was minted by this call. */
  minted: boolean;
}

/** Outgoing links of one token: other token → relation label. */
export interface EntityLinks {
  type: EntityType;
  relationships: Record<string, string>;
}

export type EntityRelationships = Record<string, EntityLinks>;

/** Session record as stored by a backend. */
export interface SessionRecord {
  session_id: string;
  created_at: string;
  last_used: string;
  privacy_level: PrivacyLevel;
  token_mappings: Record<string, string>;
  entity_relationships: EntityRelationships;
  preserved_context: string[];
  metadata: Record<string, unknown>;
}

/** Read-only snapshot of a session handed to collaborators. */
export interface SessionView {
  id: string;
  createdAt: string;
  lastUsed: string;
  privacyLevel: PrivacyLevel;
  tokenMappings: Record<string, string>;
  entityRelationships: EntityRelationships;
  preservedContext: string[];
  metadata: Record<string, unknown>;
}

export interface DeidentifyOptions {
  sessionId?: string;
  privacyLevel?: PrivacyLevel;
}

export interface DeidentifyResult {
  text: string;
  /** Mappings added or reused by this call. */
  tokenMap: Record<string, string>;
  sessionId: string;
  privacyLevel: PrivacyLevel;
}

export type ErrorKind =
  | "ValidationError"
  | "NotFoundError"
  | "PrivacyError"
  | "CircuitBreakerOpenError"
  | "RecoveryError"
  | "TimeoutError";

/** Outcome of one batch item. */
export type BatchItemResult<T> =
  | { ok: true; index: number; value: T }
  | { ok: false; index: number; error: { kind: ErrorKind; message: string } };

export interface ReconstructResult {
  text: string;
  unresolvedTokens: string[];
}

/** Insight facets for one token, e.g. { context: "professional" }. */
export type TokenInsight = Record<string, string>;

export interface IntelligenceRequest {
  tokenizedText: string;
  sessionId: string;
  preservedContext: string[];
  entityRelationships: EntityRelationships;
}

/** What a generator returns on success. */
export interface GeneratedIntelligence {
  intelligence: Record<string, TokenInsight>;
  confidence: number;
  intelligenceType: string;
}

/** What the bridge always returns. */
export interface IntelligenceResponse extends GeneratedIntelligence {
  /** Milliseconds spent, including a fallback. */
  processingTime: number;
  source: "generator" | "cache" | "fallback";
}
