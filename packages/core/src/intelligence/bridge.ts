import type {
  GeneratedIntelligence,
  IntelligenceRequest,
  IntelligenceResponse,
  TokenInsight,
} from "../types.js";
import type { IntelligenceGeneratorPort } from "../ports.js";
import type { CircuitBreakerOptions, CircuitBreakerRegistry } from "../circuit-breaker.js";
import { CircuitBreakerOpenError, GeneratorError, TimeoutError, errorMessage } from "../errors.js";
import { parseGeneratedIntelligence } from "../schemas.js";
import { createLogger, type Logger } from "../logger.js";
import { tokensIn } from "../detector.js";
import { parseToken } from "../session.js";

export const TOKEN_INTELLIGENCE_BREAKER = "token_intelligence";

export interface BridgeOptions {
  generator: IntelligenceGeneratorPort;
  registry: CircuitBreakerRegistry;
  timeoutMs?: number;
  breaker?: CircuitBreakerOptions;
  logger?: Logger;
}

interface RememberedInsight {
  insight: TokenInsight;
  confidence: number;
}

/** Generic facets by token type, served when nothing better is known. */
const TYPE_INSIGHTS: Readonly<Record<string, TokenInsight>> = {
  PERSON: { type: "individual", context: "mentioned_in_content" },
  PHONE: { type: "contact_method" },
  EMAIL: { type: "contact_method", context: "electronic_communication" },
  LOCATION: { type: "physical_place" },
  PROJECT: { type: "work_activity", context: "professional" },
};

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function typeInsights(tokenizedText: unknown): Record<string, TokenInsight> {
  const intelligence: Record<string, TokenInsight> = {};
  if (typeof tokenizedText !== "string") return intelligence;
  for (const token of tokensIn(tokenizedText)) {
    const type = parseToken(token)?.type;
    const insight = type === undefined ? undefined : TYPE_INSIGHTS[type];
    if (insight) intelligence[token] = { ...insight };
  }
  return intelligence;
}

/**
 * Calls the intelligence generator through the `token_intelligence` breaker
 * and always resolves to a well-formed response. Failures, timeouts, malformed
 * payloads and an open breaker all land on the fallback path: last known
 * insights for the text's tokens at half confidence, else generic facets for
 * each token's type at confidence 0.
 */
export class TokenIntelligenceBridge {
  private readonly generator: IntelligenceGeneratorPort;
  private readonly registry: CircuitBreakerRegistry;
  private readonly timeoutMs: number;
  private readonly breakerOptions: CircuitBreakerOptions;
  private readonly log: Logger;
  private readonly history = new Map<string, Map<string, RememberedInsight>>();

  constructor(options: BridgeOptions) {
    this.generator = options.generator;
    this.registry = options.registry;
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.breakerOptions = options.breaker ?? {};
    this.log = options.logger ?? createLogger("intelligence");
  }

  async generateIntelligence(request: IntelligenceRequest): Promise<IntelligenceResponse> {
    const started = performance.now();
    const breaker = this.registry.get(TOKEN_INTELLIGENCE_BREAKER, this.breakerOptions);

    try {
      const value = await breaker.execute(() => this.callGenerator(request));
      this.remember(request.sessionId, value);
      return { ...value, processingTime: performance.now() - started, source: "generator" };
    } catch (err) {
      if (err instanceof CircuitBreakerOpenError) {
        this.log.debug("Breaker open, using fallback", { sessionId: request.sessionId });
      } else {
        this.log.warn("Intelligence generation failed, using fallback", {
          sessionId: request.sessionId,
          error: errorMessage(err),
        });
      }
      return this.fallback(request, started);
    }
  }

  private async callGenerator(request: IntelligenceRequest): Promise<GeneratedIntelligence> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new TimeoutError(this.timeoutMs));
      }, this.timeoutMs);
    });

    try {
      const raw: unknown = await Promise.race([this.generator.generate(request, controller.signal), timeout]);
      const parsed = parseGeneratedIntelligence(raw);
      if (!parsed.ok) {
        throw new GeneratorError(`Malformed generator output: ${parsed.reason}`);
      }
      return parsed.value;
    } finally {
      clearTimeout(timer);
    }
  }

  private remember(sessionId: string, value: GeneratedIntelligence): void {
    let known = this.history.get(sessionId);
    if (!known) {
      known = new Map();
      this.history.set(sessionId, known);
    }
    for (const [token, insight] of Object.entries(value.intelligence)) {
      known.set(token, { insight, confidence: value.confidence });
    }
  }

  private fallback(request: IntelligenceRequest, started: number): IntelligenceResponse {
    const known = this.history.get(request.sessionId);
    const intelligence: Record<string, TokenInsight> = {};
    const confidences: number[] = [];

    if (known && typeof request.tokenizedText === "string") {
      for (const token of tokensIn(request.tokenizedText)) {
        const hit = known.get(token);
        if (!hit) continue;
        intelligence[token] = hit.insight;
        confidences.push(hit.confidence);
      }
    }

    if (confidences.length === 0) {
      return {
        intelligence: typeInsights(request.tokenizedText),
        confidence: 0,
        intelligenceType: "fallback",
        processingTime: performance.now() - started,
        source: "fallback",
      };
    }
    const mean = confidences.reduce((a, b) => a + b, 0) / confidences.length;
    return {
      intelligence,
      confidence: round2(mean / 2),
      intelligenceType: "cached",
      processingTime: performance.now() - started,
      source: "cache",
    };
  }

  /** Drop remembered insights for a session. */
  forget(sessionId: string): void {
    this.history.delete(sessionId);
  }

  /**
   * Tokenized text followed by a "Context (Privacy-Preserved)" block listing
   * each token's facets. Text with no insights comes back unchanged.
   */
  async enhancePrivacyText(request: IntelligenceRequest): Promise<string> {
    const response = await this.generateIntelligence(request);
    const lines: string[] = [];
    for (const token of tokensIn(request.tokenizedText)) {
      const insight = response.intelligence[token];
      if (!insight || Object.keys(insight).length === 0) continue;
      const facets = Object.entries(insight).map(([k, v]) => `${k}: ${v}`);
      lines.push(`[${token}]: ${facets.join("; ")}`);
    }
    if (lines.length === 0) return request.tokenizedText;
    return `${request.tokenizedText}\n\nContext (Privacy-Preserved):\n${lines.join("\n")}`;
  }
}
