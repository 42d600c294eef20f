import type { GeneratedIntelligence, IntelligenceRequest, SessionRecord } from "./types.js";

/** Platform-agnostic durable session storage. */
export interface SessionStorePort {
  load(sessionId: string): Promise<SessionRecord | null>;
  save(record: SessionRecord): Promise<void>;
  /** Returns false when nothing was stored under the id. */
  delete(sessionId: string): Promise<boolean>;
  list(): Promise<string[]>;
  /** Release handles the backend opened itself. */
  close?(): void | Promise<void>;
}

/** Platform-agnostic HTTP client interface. */
export interface FetchPort {
  post(
    url: string,
    body: string,
    headers: Record<string, string>,
    signal?: AbortSignal
  ): Promise<{ status: number; body: string }>;
}

/**
 * Produces insight facets for the tokens in tokenized text. Implementations
 * only ever see tokens, context keywords and relationships, never raw values.
 * The signal aborts when the caller gives up.
 */
export interface IntelligenceGeneratorPort {
  generate(request: IntelligenceRequest, signal: AbortSignal): Promise<GeneratedIntelligence>;
}

/** In-memory session storage for testing and offline use. */
export class MemorySessionStore implements SessionStorePort {
  private records = new Map<string, SessionRecord>();

  async load(sessionId: string): Promise<SessionRecord | null> {
    const record = this.records.get(sessionId);
    return record ? structuredClone(record) : null;
  }

  async save(record: SessionRecord): Promise<void> {
    this.records.set(record.session_id, structuredClone(record));
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.records.delete(sessionId);
  }

  async list(): Promise<string[]> {
    return [...this.records.keys()];
  }
}
