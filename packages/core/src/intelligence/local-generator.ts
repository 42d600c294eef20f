import { z } from "zod";
import type {
  EntityRelationships,
  GeneratedIntelligence,
  IntelligenceRequest,
  TokenInsight,
} from "../types.js";
import type { IntelligenceGeneratorPort } from "../ports.js";
import { tokensIn } from "../detector.js";
import { parseToken } from "../session.js";
import { extractContext } from "../context.js";
import rawRules from "../../data/insight-rules.json" with { type: "json" };

const InsightRuleSchema = z.object({
  type: z.string(),
  facet: z.string(),
  value: z.string(),
  keywords: z.array(z.string()).optional(),
  relation: z.string().optional(),
  minInteractions: z.number().int().nonnegative().optional(),
});

const InsightRuleSetSchema = z.object({
  rules: z.array(InsightRuleSchema),
  classifications: z.array(
    z.object({
      intelligenceType: z.string(),
      facet: z.string().optional(),
      valueContains: z.string().optional(),
      textContains: z.array(z.string()).optional(),
    })
  ),
  defaultType: z.string(),
});

export type InsightRule = z.infer<typeof InsightRuleSchema>;
export type InsightRuleSet = z.infer<typeof InsightRuleSetSchema>;

export const DEFAULT_INSIGHT_RULES: InsightRuleSet = InsightRuleSetSchema.parse(rawRules);

export interface LocalGeneratorOptions {
  rules?: InsightRuleSet;
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function relationLabels(token: string, relationships: EntityRelationships): Set<string> {
  const labels = new Set<string>();
  for (const [source, entry] of Object.entries(relationships)) {
    for (const [target, label] of Object.entries(entry.relationships)) {
      if (source === token || target === token) labels.add(label);
    }
  }
  return labels;
}

/**
 * Rule-based generator that runs in process. Works from token types,
 * context keywords and relationships. Rules apply in file order and a later
 * match overwrites an earlier facet of the same name.
 *
 * Confidence per token: 0.7, +0.2 if the token was seen before in this
 * session, +0.1 for more than two facets, capped at 1. The response carries
 * the mean over tokens that produced facets.
 */
export class LocalIntelligenceGenerator implements IntelligenceGeneratorPort {
  private readonly rules: InsightRuleSet;
  // "<session>:<token>" → interactions so far
  private readonly profiles = new Map<string, number>();

  constructor(options: LocalGeneratorOptions = {}) {
    this.rules = options.rules ?? DEFAULT_INSIGHT_RULES;
  }

  /** Interaction count for a token of a session (0 when never seen). */
  interactions(sessionId: string, token: string): number {
    return this.profiles.get(`${sessionId}:${token}`) ?? 0;
  }

  async generate(request: IntelligenceRequest, signal: AbortSignal): Promise<GeneratedIntelligence> {
    signal.throwIfAborted();

    const context = new Set([
      ...request.preservedContext.map((w) => w.toLowerCase()),
      ...extractContext(request.tokenizedText),
    ]);
    const intelligence: Record<string, TokenInsight> = {};
    const confidences: number[] = [];

    for (const token of tokensIn(request.tokenizedText)) {
      const parsed = parseToken(token);
      if (!parsed) continue;

      const key = `${request.sessionId}:${token}`;
      const prior = this.profiles.get(key) ?? 0;
      const insight = this.insightFor(parsed.type, token, context, request.entityRelationships, prior);
      this.profiles.set(key, prior + 1);

      const facets = Object.keys(insight).length;
      if (facets === 0) continue;
      intelligence[token] = insight;
      let confidence = 0.7;
      if (prior > 0) confidence += 0.2;
      if (facets > 2) confidence += 0.1;
      confidences.push(Math.min(1, round2(confidence)));
    }

    const confidence =
      confidences.length === 0 ? 0 : round2(confidences.reduce((a, b) => a + b, 0) / confidences.length);

    return {
      intelligence,
      confidence,
      intelligenceType: this.classify(request.tokenizedText, intelligence),
    };
  }

  private insightFor(
    type: string,
    token: string,
    context: ReadonlySet<string>,
    relationships: EntityRelationships,
    priorInteractions: number
  ): TokenInsight {
    const labels = relationLabels(token, relationships);
    const insight: TokenInsight = {};
    for (const rule of this.rules.rules) {
      if (rule.type !== type) continue;
      if (rule.keywords && !rule.keywords.some((k) => context.has(k))) continue;
      if (rule.relation && !labels.has(rule.relation)) continue;
      if (rule.minInteractions !== undefined && priorInteractions < rule.minInteractions) continue;
      insight[rule.facet] = rule.value;
    }
    return insight;
  }

  private classify(text: string, intelligence: Record<string, TokenInsight>): string {
    const lower = text.toLowerCase();
    const insights = Object.values(intelligence);
    for (const c of this.rules.classifications) {
      if (c.facet && c.valueContains !== undefined) {
        const facet = c.facet;
        const needle = c.valueContains;
        if (insights.some((i) => i[facet]?.includes(needle))) return c.intelligenceType;
      }
      if (c.textContains && c.textContains.some((w) => lower.includes(w))) return c.intelligenceType;
    }
    return this.rules.defaultType;
  }
}
