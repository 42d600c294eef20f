import { describe, it, expect, vi } from "vitest";
import { TokenIntelligenceBridge, TOKEN_INTELLIGENCE_BREAKER } from "../src/intelligence/bridge.js";
import { CircuitBreakerRegistry, CircuitState } from "../src/circuit-breaker.js";
import type { IntelligenceGeneratorPort } from "../src/ports.js";
import type { GeneratedIntelligence, IntelligenceRequest } from "../src/types.js";
import { silentLogger } from "../src/logger.js";

function request(tokenizedText: string, sessionId = "s"): IntelligenceRequest {
  return { tokenizedText, sessionId, preservedContext: [], entityRelationships: {} };
}

const GOOD: GeneratedIntelligence = {
  intelligence: { PERSON_001: { context: "professional colleague" } },
  confidence: 0.9,
  intelligenceType: "professional_collaboration",
};

function makeBridge(generate: IntelligenceGeneratorPort["generate"], timeoutMs = 1000) {
  const registry = new CircuitBreakerRegistry({ logger: silentLogger });
  const generator = { generate: vi.fn(generate) };
  const bridge = new TokenIntelligenceBridge({
    generator,
    registry,
    timeoutMs,
    breaker: { failureThreshold: 5, resetTimeout: 60_000 },
    logger: silentLogger,
  });
  return { bridge, registry, generator };
}

describe("TokenIntelligenceBridge.generateIntelligence", () => {
  it("passes a valid generator result through", async () => {
    const { bridge } = makeBridge(async () => GOOD);
    const response = await bridge.generateIntelligence(request("Meet [PERSON_001]"));
    expect(response).toMatchObject({ ...GOOD, source: "generator" });
    expect(response.processingTime).toBeGreaterThanOrEqual(0);
  });

  it("falls back to an empty response after the breaker opens", async () => {
    const { bridge, registry, generator } = makeBridge(async () => {
      throw new Error("unavailable");
    });

    for (let i = 0; i < 5; i++) {
      expect((await bridge.generateIntelligence(request("Meet [PERSON_001]"))).source).toBe("fallback");
    }
    const sixth = await bridge.generateIntelligence(request("Meet [PERSON_001]"));

    expect(sixth).toMatchObject({
      intelligence: { PERSON_001: { type: "individual", context: "mentioned_in_content" } },
      confidence: 0,
      intelligenceType: "fallback",
      source: "fallback",
    });
    expect(generator.generate).toHaveBeenCalledTimes(5);
    expect(registry.status()[TOKEN_INTELLIGENCE_BREAKER].state).toBe(CircuitState.OPEN);
  });

  it("falls back to generic facets for each known token type", async () => {
    const { bridge } = makeBridge(async () => {
      throw new Error("unavailable");
    });
    const response = await bridge.generateIntelligence(
      request("Mail [EMAIL_001], call [PHONE_002] near [LOCATION_001] on [PROJECT_003] re [CASE_001]")
    );
    expect(response.intelligence).toEqual({
      EMAIL_001: { type: "contact_method", context: "electronic_communication" },
      PHONE_002: { type: "contact_method" },
      LOCATION_001: { type: "physical_place" },
      PROJECT_003: { type: "work_activity", context: "professional" },
    });
    expect(response.confidence).toBe(0);
  });

  it("times out a slow generator and aborts its signal", async () => {
    const seen: { signal?: AbortSignal } = {};
    const { bridge, registry } = makeBridge((_req, signal) => {
      seen.signal = signal;
      return new Promise<GeneratedIntelligence>(() => {});
    }, 20);

    const response = await bridge.generateIntelligence(request("Meet [PERSON_001]"));
    expect(response.source).toBe("fallback");
    expect(seen.signal?.aborted).toBe(true);
    expect(registry.get(TOKEN_INTELLIGENCE_BREAKER).getStatus().failureCount).toBe(1);
  });

  it("treats a malformed result as a failure", async () => {
    const { bridge, registry } = makeBridge(async () => JSON.parse('{"confidence": 2}'));
    const response = await bridge.generateIntelligence(request("Meet [PERSON_001]"));
    expect(response.source).toBe("fallback");
    expect(registry.get(TOKEN_INTELLIGENCE_BREAKER).getStatus().failureCount).toBe(1);
  });

  it("never rejects when the generator throws synchronously", async () => {
    const { bridge } = makeBridge(() => {
      throw new Error("sync");
    });
    expect((await bridge.generateIntelligence(request("x"))).source).toBe("fallback");
  });

  it("serves remembered insights at half confidence when the generator fails", async () => {
    let healthy = true;
    const { bridge } = makeBridge(async () => {
      if (!healthy) throw new Error("down");
      return GOOD;
    });
    await bridge.generateIntelligence(request("Meet [PERSON_001]"));
    healthy = false;

    const cached = await bridge.generateIntelligence(request("Call [PERSON_001] and [PERSON_002]"));
    expect(cached).toMatchObject({
      intelligence: { PERSON_001: { context: "professional colleague" } },
      confidence: 0.45,
      intelligenceType: "cached",
      source: "cache",
    });

    const otherSession = await bridge.generateIntelligence(request("Call [PERSON_001]", "other"));
    expect(otherSession.source).toBe("fallback");

    bridge.forget("s");
    expect((await bridge.generateIntelligence(request("Call [PERSON_001]"))).source).toBe("fallback");
  });
});

describe("TokenIntelligenceBridge.enhancePrivacyText", () => {
  it("appends a context block for tokens with insights", async () => {
    const { bridge } = makeBridge(async () => ({
      intelligence: {
        PERSON_001: { context: "professional colleague", project_role: "project team member" },
        PROJECT_001: { status: "time-sensitive project" },
      },
      confidence: 0.8,
      intelligenceType: "professional_collaboration",
    }));
    const text = await bridge.enhancePrivacyText(request("Ask [PERSON_001] about [PROJECT_001]"));
    expect(text).toBe(
      "Ask [PERSON_001] about [PROJECT_001]\n\nContext (Privacy-Preserved):\n" +
        "[PERSON_001]: context: professional colleague; project_role: project team member\n" +
        "[PROJECT_001]: status: time-sensitive project"
    );
  });

  it("lists generic facets when the generator is down", async () => {
    const { bridge } = makeBridge(async () => {
      throw new Error("unavailable");
    });
    expect(await bridge.enhancePrivacyText(request("Ask [PERSON_001]"))).toBe(
      "Ask [PERSON_001]\n\nContext (Privacy-Preserved):\n[PERSON_001]: type: individual; context: mentioned_in_content"
    );
  });

  it("returns the text unchanged without insights", async () => {
    const { bridge } = makeBridge(async () => ({ intelligence: {}, confidence: 0, intelligenceType: "none" }));
    expect(await bridge.enhancePrivacyText(request("Ask [PERSON_001]"))).toBe("Ask [PERSON_001]");
  });
});
