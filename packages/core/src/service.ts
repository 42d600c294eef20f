import type {
  BatchItemResult,
  DeidentifyOptions,
  DeidentifyResult,
  IntelligenceRequest,
  IntelligenceResponse,
  PrivacyLevel,
  ReconstructResult,
  SessionView,
} from "./types.js";
import type { FetchPort, IntelligenceGeneratorPort, SessionStorePort } from "./ports.js";
import { MemorySessionStore } from "./ports.js";
import type { TokenVeilConfig, StorageConfig } from "./config.js";
import { PatternDetector, createCustomMatcher, defaultMatchers } from "./detector.js";
import { isPrivacyLevel } from "./privacy-levels.js";
import { SessionStore } from "./session-store.js";
import { JsonFileSessionStore } from "./file-store.js";
import { SqliteSessionStore } from "./sqlite-store.js";
import { Anonymizer } from "./anonymizer.js";
import { RelationshipDetector } from "./relationships.js";
import { Reconstructor } from "./reconstructor.js";
import {
  CircuitBreakerRegistry,
  type CircuitBreakerOptions,
  type CircuitBreakerStatus,
} from "./circuit-breaker.js";
import { TokenIntelligenceBridge } from "./intelligence/bridge.js";
import { LocalIntelligenceGenerator } from "./intelligence/local-generator.js";
import { HttpIntelligenceGenerator } from "./intelligence/http-generator.js";
import { NodeFetch } from "./node-fetch.js";
import { ValidationError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

export interface PrivacyServiceParts {
  store: SessionStore;
  anonymizer: Anonymizer;
  reconstructor: Reconstructor;
  bridge: TokenIntelligenceBridge;
  registry: CircuitBreakerRegistry;
  defaultPrivacyLevel: PrivacyLevel;
  backend?: SessionStorePort;
  logger?: Logger;
}

/**
 * Operations offered to collaborators (API layer, CLI). Wires the anonymizer,
 * reconstructor and intelligence bridge around one session store and one
 * breaker registry.
 */
export class PrivacyService {
  private readonly store: SessionStore;
  private readonly anonymizer: Anonymizer;
  private readonly reconstructor: Reconstructor;
  private readonly bridge: TokenIntelligenceBridge;
  private readonly registry: CircuitBreakerRegistry;
  private readonly defaultPrivacyLevel: PrivacyLevel;
  private readonly backend?: SessionStorePort;
  private readonly log: Logger;

  constructor(parts: PrivacyServiceParts) {
    this.store = parts.store;
    this.anonymizer = parts.anonymizer;
    this.reconstructor = parts.reconstructor;
    this.bridge = parts.bridge;
    this.registry = parts.registry;
    this.defaultPrivacyLevel = parts.defaultPrivacyLevel;
    this.backend = parts.backend;
    this.log = parts.logger ?? createLogger("service");
  }

  /** True while the durable backend is failing and sessions live in memory only. */
  get degraded(): boolean {
    return this.store.degraded;
  }

  async createSession(
    privacyLevel: PrivacyLevel = this.defaultPrivacyLevel,
    metadata: Record<string, unknown> = {}
  ): Promise<string> {
    if (!isPrivacyLevel(privacyLevel)) {
      throw new ValidationError(`Unknown privacy level "${String(privacyLevel)}"`, { privacyLevel });
    }
    const session = await this.store.create(privacyLevel, metadata);
    this.log.info("Session created", { sessionId: session.id, privacyLevel });
    return session.id;
  }

  async getSession(sessionId: string): Promise<SessionView> {
    return (await this.store.get(sessionId)).toView();
  }

  deidentify(text: string, options: DeidentifyOptions = {}): Promise<DeidentifyResult> {
    return this.anonymizer.deidentify(text, options);
  }

  deidentifyBatch(
    texts: readonly string[],
    options: DeidentifyOptions = {}
  ): Promise<BatchItemResult<DeidentifyResult>[]> {
    return this.anonymizer.deidentifyBatch(texts, options);
  }

  reconstruct(text: string, sessionId: string): Promise<ReconstructResult> {
    return this.reconstructor.reconstruct(text, sessionId);
  }

  /** Never rejects; failures come back as a fallback response. */
  generateIntelligence(request: IntelligenceRequest): Promise<IntelligenceResponse> {
    return this.bridge.generateIntelligence(request);
  }

  /**
   * Tokenized text plus a privacy-preserved context block built from the
   * session's keywords and relationships. Reads a snapshot of the session and
   * holds no lock while the generator runs.
   */
  async enhanceForAi(tokenizedText: string, sessionId: string): Promise<string> {
    if (typeof tokenizedText !== "string") {
      throw new ValidationError("Text must be a string", { received: typeof tokenizedText });
    }
    const view = await this.getSession(sessionId);
    return this.bridge.enhancePrivacyText({
      tokenizedText,
      sessionId,
      preservedContext: view.preservedContext,
      entityRelationships: view.entityRelationships,
    });
  }

  async addContext(sessionId: string, keywords: readonly string[]): Promise<number> {
    if (!Array.isArray(keywords) || keywords.some((k) => typeof k !== "string")) {
      throw new ValidationError("Keywords must be an array of strings");
    }
    return this.store.addContext(sessionId, keywords.map((k) => k.toLowerCase()));
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    const deleted = await this.store.delete(sessionId);
    this.bridge.forget(sessionId);
    if (deleted) this.log.info("Session deleted", { sessionId });
    return deleted;
  }

  async listActiveSessions(maxAgeMs: number): Promise<SessionView[]> {
    if (!Number.isFinite(maxAgeMs) || maxAgeMs < 0) {
      throw new ValidationError("maxAgeMs must be a non-negative number", { maxAgeMs });
    }
    return this.store.listActive(maxAgeMs);
  }

  breakerStatus(): Record<string, CircuitBreakerStatus> {
    return this.registry.status();
  }

  /** Reset one breaker or all; raises RecoveryError for an unknown name. */
  resetBreaker(name?: string): string[] {
    const reset = this.registry.reset(name);
    this.log.info("Circuit breakers reset", { breakers: reset });
    return reset;
  }

  /** Write pending sessions (deferred persistence). Returns how many were written. */
  flush(): Promise<number> {
    return this.store.flush();
  }

  async close(): Promise<void> {
    await this.store.flush();
    await this.backend?.close?.();
  }
}

export interface PrivacyServiceDeps {
  backend?: SessionStorePort;
  generator?: IntelligenceGeneratorPort;
  fetchPort?: FetchPort;
  registry?: CircuitBreakerRegistry;
  logger?: Logger;
  /** Wall clock for session timestamps. */
  now?: () => Date;
  /** Millisecond clock for breakers. */
  clock?: () => number;
}

export function createBackend(storage: StorageConfig): SessionStorePort {
  switch (storage.kind) {
    case "memory":
      return new MemorySessionStore();
    case "file":
      return new JsonFileSessionStore(storage.directory);
    case "sqlite":
      return new SqliteSessionStore(storage.path);
  }
}

/** Build a service from resolved configuration; deps replace the defaults. */
export function createPrivacyService(config: TokenVeilConfig, deps: PrivacyServiceDeps = {}): PrivacyService {
  const backend = deps.backend ?? createBackend(config.storage);
  const breakerOptions: CircuitBreakerOptions = {
    failureThreshold: config.breaker.failureThreshold,
    resetTimeout: config.breaker.resetTimeoutMs,
    ...(deps.clock ? { now: deps.clock } : {}),
    ...(deps.logger ? { logger: deps.logger } : {}),
  };
  const registry = deps.registry ?? new CircuitBreakerRegistry(breakerOptions);

  const store = new SessionStore({
    backend,
    persistence: config.persistence,
    session: { normalizeValues: config.normalizeValues },
    logger: deps.logger,
    now: deps.now,
  });

  const detector = new PatternDetector([
    ...defaultMatchers(),
    ...config.customPatterns.map(createCustomMatcher),
  ]);

  const anonymizer = new Anonymizer({
    store,
    detector,
    relationships: new RelationshipDetector({ proximityDistance: config.proximityDistance }),
    defaultPrivacyLevel: config.defaultPrivacyLevel,
    batchConcurrency: config.batchConcurrency,
    logger: deps.logger,
  });

  const generator =
    deps.generator ??
    (config.intelligence.endpoint
      ? new HttpIntelligenceGenerator(deps.fetchPort ?? new NodeFetch(config.intelligence.timeoutMs), {
          baseUrl: config.intelligence.endpoint,
        })
      : new LocalIntelligenceGenerator());

  const bridge = new TokenIntelligenceBridge({
    generator,
    registry,
    timeoutMs: config.intelligence.timeoutMs,
    breaker: breakerOptions,
    logger: deps.logger,
  });

  return new PrivacyService({
    store,
    anonymizer,
    reconstructor: new Reconstructor(store),
    bridge,
    registry,
    defaultPrivacyLevel: config.defaultPrivacyLevel,
    backend,
    logger: deps.logger,
  });
}
