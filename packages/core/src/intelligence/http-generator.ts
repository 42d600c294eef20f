import { z } from "zod";
import type { GeneratedIntelligence, IntelligenceRequest } from "../types.js";
import type { FetchPort, IntelligenceGeneratorPort } from "../ports.js";
import { GeneratorError } from "../errors.js";

export interface HttpGeneratorConfig {
  baseUrl: string;
  headers?: Record<string, string>;
}

const WireResponseSchema = z.object({
  intelligence: z.record(z.string(), z.record(z.string(), z.string())),
  confidence: z.number().min(0).max(1),
  intelligence_type: z.string().min(1),
});

/**
 * Remote generator reached over HTTP.
 *
 * POST <baseUrl>/v1/intelligence/generate with a snake_case JSON body,
 * receiving `{ intelligence, confidence, intelligence_type }`.
 */
export class HttpIntelligenceGenerator implements IntelligenceGeneratorPort {
  private readonly url: string;
  private readonly headers: Record<string, string>;

  constructor(
    private readonly fetchPort: FetchPort,
    config: HttpGeneratorConfig
  ) {
    this.url = `${config.baseUrl.replace(/\/+$/, "")}/v1/intelligence/generate`;
    this.headers = { "Content-Type": "application/json", ...config.headers };
  }

  async generate(request: IntelligenceRequest, signal: AbortSignal): Promise<GeneratedIntelligence> {
    const body = JSON.stringify({
      tokenized_text: request.tokenizedText,
      session_id: request.sessionId,
      preserved_context: request.preservedContext,
      entity_relationships: request.entityRelationships,
    });

    const response = await this.fetchPort.post(this.url, body, this.headers, signal);
    if (response.status !== 200) {
      throw new GeneratorError(`Intelligence service returned ${response.status}`, {
        status: response.status,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(response.body);
    } catch (err) {
      throw new GeneratorError("Intelligence service returned invalid JSON", {}, { cause: err });
    }

    const parsed = WireResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new GeneratorError("Intelligence service response has the wrong shape", {
        issues: parsed.error.issues.map((i) => i.message),
      });
    }
    return {
      intelligence: parsed.data.intelligence,
      confidence: parsed.data.confidence,
      intelligenceType: parsed.data.intelligence_type,
    };
  }
}
