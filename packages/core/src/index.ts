export type {
  PrivacyLevel,
  BuiltinEntityType,
  EntityType,
  TextRange,
  EntitySpan,
  TokenOccurrence,
  EntityLinks,
  EntityRelationships,
  SessionRecord,
  SessionView,
  DeidentifyOptions,
  DeidentifyResult,
  ErrorKind,
  BatchItemResult,
  ReconstructResult,
  TokenInsight,
  IntelligenceRequest,
  GeneratedIntelligence,
  IntelligenceResponse,
} from "./types.js";

export type { SessionStorePort, FetchPort, IntelligenceGeneratorPort } from "./ports.js";
export { MemorySessionStore } from "./ports.js";
export { JsonFileSessionStore } from "./file-store.js";
export { SqliteSessionStore } from "./sqlite-store.js";
export { NodeFetch } from "./node-fetch.js";

export {
  TokenVeilError,
  ValidationError,
  NotFoundError,
  PrivacyError,
  CircuitBreakerOpenError,
  RecoveryError,
  TimeoutError,
  GeneratorError,
  errorKind,
} from "./errors.js";

export { createLogger, silentLogger } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";

export { PRIVACY_LEVELS, DEFAULT_PRIVACY_LEVEL, isPrivacyLevel, levelsFrom } from "./privacy-levels.js";
export {
  PatternDetector,
  RegexMatcher,
  PersonNameMatcher,
  HonorificNameMatcher,
  createCustomMatcher,
  defaultMatchers,
  TOKEN_PATTERN,
  tokensIn,
} from "./detector.js";
export type { Matcher, CustomPattern } from "./detector.js";

export { PrivacySession, formatToken, parseToken, normalizeValue } from "./session.js";
export type { PrivacySessionOptions } from "./session.js";
export { SessionStore, generateId } from "./session-store.js";
export type { SessionStoreOptions, PersistenceMode } from "./session-store.js";
export { KeyedMutex } from "./keyed-mutex.js";
export { mapWithConcurrency } from "./pool.js";

export { Anonymizer } from "./anonymizer.js";
export type { AnonymizerOptions } from "./anonymizer.js";
export { substitute } from "./substituter.js";
export { extractContext } from "./context.js";
export { RelationshipDetector, DEFAULT_RELATIONSHIP_RULES } from "./relationships.js";
export type { RelationshipRule, RelationshipUpdate } from "./relationships.js";
export { Reconstructor, reconstructText } from "./reconstructor.js";

export { CircuitBreaker, CircuitBreakerRegistry, CircuitState } from "./circuit-breaker.js";
export type { CircuitBreakerOptions, CircuitBreakerStatus } from "./circuit-breaker.js";
export { TokenIntelligenceBridge, TOKEN_INTELLIGENCE_BREAKER } from "./intelligence/bridge.js";
export { LocalIntelligenceGenerator } from "./intelligence/local-generator.js";
export { HttpIntelligenceGenerator } from "./intelligence/http-generator.js";

export { loadConfig, ConfigSchema } from "./config.js";
export type { TokenVeilConfig, TokenVeilConfigInput } from "./config.js";
export { PrivacyService, createPrivacyService, createBackend } from "./service.js";
export type { PrivacyServiceDeps } from "./service.js";
