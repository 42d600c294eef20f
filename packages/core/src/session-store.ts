import type { PrivacyLevel, SessionRecord, SessionView } from "./types.js";
import type { SessionStorePort } from "./ports.js";
import { MemorySessionStore } from "./ports.js";
import { PrivacySession, type PrivacySessionOptions } from "./session.js";
import { KeyedMutex } from "./keyed-mutex.js";
import { NotFoundError, PrivacyError, ValidationError, errorMessage } from "./errors.js";
import { SessionIdSchema } from "./schemas.js";
import { createLogger, type Logger } from "./logger.js";

export type PersistenceMode = "write-through" | "deferred";

export interface SessionStoreOptions {
  backend?: SessionStorePort;
  persistence?: PersistenceMode;
  session?: PrivacySessionOptions;
  logger?: Logger;
  now?: () => Date;
}

/** Random, sortable-ish id: prefix + base36 timestamp + 16 hex chars. */
export function generateId(prefix: string): string {
  const ts = Date.now().toString(36);
  const buf = new Uint8Array(8);
  crypto.getRandomValues(buf);
  const rand = Array.from(buf)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
  return `${prefix}${ts}_${rand}`;
}

export function assertSessionId(sessionId: unknown): asserts sessionId is string {
  const result = SessionIdSchema.safeParse(sessionId);
  if (!result.success) {
    throw new ValidationError("Invalid session id", {
      sessionId: typeof sessionId === "string" ? sessionId.slice(0, 64) : typeof sessionId,
    });
  }
}

/**
 * In-memory session cache over a pluggable backend.
 *
 * One PrivacySession instance exists per id: concurrent loads of the same id
 * share a promise. All mutation goes through withSession, which holds a
 * per-id lock for the whole read-modify-persist cycle. Save failures are
 * logged and the store keeps serving from memory; `degraded` stays true until
 * the next successful save. A failed load is not "absent": the id is refused
 * with PrivacyError, never recreated over a record that could not be read,
 * and the next lookup tries the backend again.
 */
export class SessionStore {
  private readonly cache = new Map<string, PrivacySession>();
  private readonly loading = new Map<string, Promise<PrivacySession | null>>();
  private readonly dirty = new Set<string>();
  private readonly mutex = new KeyedMutex();
  private readonly backend: SessionStorePort;
  private readonly persistence: PersistenceMode;
  private readonly sessionOptions: PrivacySessionOptions;
  private readonly log: Logger;
  private readonly now: () => Date;

  degraded = false;

  constructor(options: SessionStoreOptions = {}) {
    this.backend = options.backend ?? new MemorySessionStore();
    this.persistence = options.persistence ?? "write-through";
    this.sessionOptions = options.session ?? {};
    this.log = options.logger ?? createLogger("session-store");
    this.now = options.now ?? (() => new Date());
  }

  /** Ids with changes not yet written to the backend. */
  get pending(): string[] {
    return [...this.dirty];
  }

  async create(
    privacyLevel: PrivacyLevel,
    metadata: Record<string, unknown> = {},
    sessionId: string = generateId("sess_")
  ): Promise<PrivacySession> {
    assertSessionId(sessionId);
    return this.mutex.run(sessionId, async () => {
      const existing = await this.find(sessionId);
      if (existing) {
        throw new ValidationError(`Session ${sessionId} already exists`, { sessionId });
      }
      const session = this.instantiate(sessionId, privacyLevel, metadata);
      await this.persist(session);
      return session;
    });
  }

  private instantiate(
    sessionId: string,
    privacyLevel: PrivacyLevel,
    metadata: Record<string, unknown>
  ): PrivacySession {
    const session = PrivacySession.create(sessionId, privacyLevel, metadata, this.now(), this.sessionOptions);
    this.cache.set(sessionId, session);
    this.log.debug("Session created", { sessionId, privacyLevel });
    return session;
  }

  /** Cached or loaded session, or null when the backend has none. */
  async find(sessionId: string): Promise<PrivacySession | null> {
    assertSessionId(sessionId);
    const cached = this.cache.get(sessionId);
    if (cached) return cached;

    let pending = this.loading.get(sessionId);
    if (!pending) {
      pending = this.load(sessionId).finally(() => this.loading.delete(sessionId));
      this.loading.set(sessionId, pending);
    }
    return pending;
  }

  async get(sessionId: string): Promise<PrivacySession> {
    const session = await this.find(sessionId);
    if (!session) throw new NotFoundError(`Session ${sessionId} not found`, { sessionId });
    return session;
  }

  private async load(sessionId: string): Promise<PrivacySession | null> {
    let record: SessionRecord | null;
    try {
      record = await this.backend.load(sessionId);
    } catch (err) {
      this.degraded = true;
      this.log.warn("Session load failed", { sessionId, error: errorMessage(err) });
      throw new PrivacyError(`Session ${sessionId} could not be loaded`, { sessionId }, { cause: err });
    }
    if (!record) return null;

    const raced = this.cache.get(sessionId);
    if (raced) return raced;
    const session = PrivacySession.fromRecord(record, this.sessionOptions);
    this.cache.set(sessionId, session);
    return session;
  }

  /**
   * Run `fn` with exclusive access to a session, then persist it.
   * With `createLevel`, an unknown id is created at that level; without it an
   * unknown id raises NotFoundError.
   */
  async withSession<T>(
    sessionId: string,
    options: { createLevel?: PrivacyLevel },
    fn: (session: PrivacySession) => Promise<T> | T
  ): Promise<T> {
    assertSessionId(sessionId);
    return this.mutex.run(sessionId, async () => {
      let session = await this.find(sessionId);
      if (!session) {
        if (!options.createLevel) {
          throw new NotFoundError(`Session ${sessionId} not found`, { sessionId });
        }
        session = this.instantiate(sessionId, options.createLevel, {});
      }
      const result = await fn(session);
      session.touch(this.now());
      await this.persist(session);
      return result;
    });
  }

  private async persist(session: PrivacySession): Promise<void> {
    if (this.persistence === "deferred") {
      this.dirty.add(session.id);
      return;
    }
    await this.save(session);
  }

  private async save(session: PrivacySession): Promise<void> {
    try {
      await this.backend.save(session.toRecord());
      this.dirty.delete(session.id);
      this.degraded = false;
    } catch (err) {
      this.dirty.add(session.id);
      this.degraded = true;
      this.log.warn("Session save failed, continuing in memory", {
        sessionId: session.id,
        error: errorMessage(err),
      });
    }
  }

  /** Write every pending session. Failed writes stay pending. */
  async flush(): Promise<number> {
    let written = 0;
    for (const sessionId of [...this.dirty]) {
      await this.mutex.run(sessionId, async () => {
        const session = this.cache.get(sessionId);
        if (!session) {
          this.dirty.delete(sessionId);
          return;
        }
        await this.save(session);
        if (!this.dirty.has(sessionId)) written++;
      });
    }
    return written;
  }

  async addContext(sessionId: string, keywords: Iterable<string>): Promise<number> {
    return this.withSession(sessionId, {}, (session) => session.addContext(keywords));
  }

  /** Remove a session from memory and the backend. */
  async delete(sessionId: string): Promise<boolean> {
    assertSessionId(sessionId);
    return this.mutex.run(sessionId, async () => {
      const cached = this.cache.delete(sessionId);
      this.dirty.delete(sessionId);
      let stored = false;
      try {
        stored = await this.backend.delete(sessionId);
      } catch (err) {
        this.degraded = true;
        this.log.warn("Session delete failed in backend", {
          sessionId,
          error: errorMessage(err),
        });
      }
      return cached || stored;
    });
  }

  /** Sessions used within the last `maxAgeMs`, most recent first. */
  async listActive(maxAgeMs: number): Promise<SessionView[]> {
    const ids = new Set(this.cache.keys());
    try {
      for (const id of await this.backend.list()) ids.add(id);
    } catch (err) {
      this.degraded = true;
      this.log.warn("Session listing failed, using cached sessions only", {
        error: errorMessage(err),
      });
    }

    const cutoff = this.now().getTime() - maxAgeMs;
    const views: SessionView[] = [];
    for (const id of ids) {
      if (!SessionIdSchema.safeParse(id).success) continue;
      let session: PrivacySession | null;
      try {
        session = await this.find(id);
      } catch (err) {
        if (!(err instanceof PrivacyError)) throw err;
        continue;
      }
      if (session && Date.parse(session.lastUsed) >= cutoff) views.push(session.toView());
    }
    return views.sort((a, b) => Date.parse(b.lastUsed) - Date.parse(a.lastUsed));
  }
}
