import { describe, it, expect, vi, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createPrivacyService, type PrivacyServiceDeps } from "../src/service.js";
import { loadConfig, type TokenVeilConfigInput } from "../src/config.js";
import { MemorySessionStore } from "../src/ports.js";
import type { SessionRecord } from "../src/types.js";
import { TOKEN_INTELLIGENCE_BREAKER } from "../src/intelligence/bridge.js";
import { NotFoundError, PrivacyError, RecoveryError, ValidationError } from "../src/errors.js";
import { silentLogger } from "../src/logger.js";

function service(overrides: TokenVeilConfigInput = {}, deps: PrivacyServiceDeps = {}) {
  return createPrivacyService(loadConfig({ env: {}, overrides }), { logger: silentLogger, ...deps });
}

describe("PrivacyService", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("tokenizes a person and a project and links them", async () => {
    const svc = service();
    const result = await svc.deidentify("Call John Smith about Project Alpha");

    expect(result.text).toBe("Call [PERSON_001] about [PROJECT_001]");
    expect(result.tokenMap).toEqual({ PERSON_001: "John Smith", PROJECT_001: "Project Alpha" });
    const view = await svc.getSession(result.sessionId);
    expect(view.entityRelationships.PROJECT_001.relationships).toEqual({ PERSON_001: "has_member" });
    expect(view.preservedContext).toEqual(["call"]);
  });

  it("reuses a person's token and links a new email to it", async () => {
    const svc = service();
    const first = await svc.deidentify("Call John Smith about Project Alpha");
    const second = await svc.deidentify("Email John Smith at john.smith@example.com", {
      sessionId: first.sessionId,
    });

    expect(second.text).toBe("Email [PERSON_001] at [EMAIL_001]");
    expect(second.tokenMap).toEqual({ PERSON_001: "John Smith", EMAIL_001: "john.smith@example.com" });
    const view = await svc.getSession(first.sessionId);
    expect(view.entityRelationships.PERSON_001.relationships).toEqual({ EMAIL_001: "has_email" });
  });

  it("reports tokens the session does not know", async () => {
    const svc = service();
    const { sessionId } = await svc.deidentify("Call John Smith");
    expect(await svc.reconstruct("Meet [PERSON_001] and [PERSON_999]", sessionId)).toEqual({
      text: "Meet John Smith and [PERSON_999]",
      unresolvedTokens: ["PERSON_999"],
    });
  });

  it("falls back once the intelligence breaker opens", async () => {
    const generate = vi.fn(async () => {
      throw new Error("unavailable");
    });
    const svc = service({}, { generator: { generate } });
    const sessionId = await svc.createSession();
    const req = {
      tokenizedText: "Call [PERSON_001]",
      sessionId,
      preservedContext: [],
      entityRelationships: {},
    };

    for (let i = 0; i < 5; i++) await svc.generateIntelligence(req);
    const sixth = await svc.generateIntelligence(req);

    expect(sixth).toMatchObject({
      intelligence: { PERSON_001: { type: "individual", context: "mentioned_in_content" } },
      confidence: 0,
      intelligenceType: "fallback",
    });
    expect(generate).toHaveBeenCalledTimes(5);
    expect(svc.breakerStatus()[TOKEN_INTELLIGENCE_BREAKER].state).toBe("OPEN");

    expect(svc.resetBreaker(TOKEN_INTELLIGENCE_BREAKER)).toEqual([TOKEN_INTELLIGENCE_BREAKER]);
    expect(svc.breakerStatus()[TOKEN_INTELLIGENCE_BREAKER].state).toBe("CLOSED");
    expect(() => svc.resetBreaker("missing")).toThrow(RecoveryError);
  });

  it("batches to the same mapping as sequential calls", async () => {
    const texts = Array.from({ length: 100 }, (_, i) => `Ask Ann Lee${i % 3 ? "" : " and Bob Ray"} about task ${i}`);
    const sequential = service();
    const seqId = await sequential.createSession();
    for (const text of texts) await sequential.deidentify(text, { sessionId: seqId });

    const batched = service({ batchConcurrency: 8 });
    const results = await batched.deidentifyBatch(texts);
    expect(results.every((r) => r.ok)).toBe(true);
    const batchId = results[0].ok ? results[0].value.sessionId : "";

    const seqView = await sequential.getSession(seqId);
    const batchView = await batched.getSession(batchId);
    expect(batchView.tokenMappings).toEqual({ PERSON_001: "Bob Ray", PERSON_002: "Ann Lee" });
    expect(batchView.tokenMappings).toEqual(seqView.tokenMappings);
    expect(batchView.entityRelationships).toEqual(seqView.entityRelationships);
  });

  it("enhances text with locally generated context", async () => {
    const svc = service();
    const { sessionId, text } = await svc.deidentify("Call John Smith about Project Alpha");
    expect(await svc.enhanceForAi(text, sessionId)).toBe(
      "Call [PERSON_001] about [PROJECT_001]\n\nContext (Privacy-Preserved):\n" +
        "[PERSON_001]: project_role: project team member\n" +
        "[PROJECT_001]: team: has identified members"
    );
  });

  it("manages sessions", async () => {
    const svc = service();
    const id = await svc.createSession("strict", { owner: "tests" });
    expect((await svc.getSession(id)).privacyLevel).toBe("strict");

    expect(await svc.addContext(id, ["Deadline", "Review"])).toBe(2);
    expect((await svc.getSession(id)).preservedContext).toEqual(["deadline", "review"]);
    expect((await svc.listActiveSessions(60_000)).map((v) => v.id)).toEqual([id]);

    expect(await svc.deleteSession(id)).toBe(true);
    await expect(svc.getSession(id)).rejects.toThrow(NotFoundError);
    expect(await svc.deleteSession(id)).toBe(false);
  });

  it("validates arguments", async () => {
    const svc = service();
    await expect(svc.createSession(JSON.parse('"extreme"'))).rejects.toThrow(ValidationError);
    await expect(svc.listActiveSessions(-1)).rejects.toThrow(ValidationError);
    await expect(svc.addContext("s", JSON.parse("[1]"))).rejects.toThrow(ValidationError);
    await expect(svc.getSession("no/slash")).rejects.toThrow(ValidationError);
  });

  it("reports degraded mode when the backend cannot save", async () => {
    class BrokenBackend extends MemorySessionStore {
      async save(_record: SessionRecord): Promise<void> {
        throw new Error("read-only");
      }
    }
    const svc = service({}, { backend: new BrokenBackend() });
    const result = await svc.deidentify("Call John Smith");
    expect(result.text).toBe("Call [PERSON_001]");
    expect(svc.degraded).toBe(true);
    expect((await svc.reconstruct(result.text, result.sessionId)).text).toBe("Call John Smith");
  });

  it("keeps sessions across instances with file storage", async () => {
    dir = await mkdtemp(join(tmpdir(), "tokenveil-service-"));
    const storage = { kind: "file" as const, directory: dir };

    const first = service({ storage });
    const { sessionId, text } = await first.deidentify("Call John Smith");
    await first.close();

    const second = service({ storage });
    expect((await second.reconstruct(text, sessionId)).text).toBe("Call John Smith");
  });

  it("never overwrites a session file it cannot read", async () => {
    dir = await mkdtemp(join(tmpdir(), "tokenveil-service-"));
    const file = join(dir, "session_s.json");
    await writeFile(file, "{ truncated", "utf-8");
    const svc = service({ storage: { kind: "file", directory: dir } });

    await expect(svc.deidentify("Call Jane Doe", { sessionId: "s" })).rejects.toThrow(PrivacyError);
    expect(svc.degraded).toBe(true);
    expect(await readFile(file, "utf-8")).toBe("{ truncated");
  });

  it("writes deferred sessions on flush", async () => {
    const backend = new MemorySessionStore();
    const svc = service({ persistence: "deferred" }, { backend });
    const { sessionId } = await svc.deidentify("Call John Smith");
    expect(await backend.load(sessionId)).toBeNull();
    expect(await svc.flush()).toBe(1);
    expect((await backend.load(sessionId))?.token_mappings).toEqual({ PERSON_001: "John Smith" });
  });

  it("runs on sqlite storage", async () => {
    const svc = service({ storage: { kind: "sqlite", path: ":memory:" } });
    const { sessionId, text } = await svc.deidentify("Reach ann@example.com");
    expect((await svc.reconstruct(text, sessionId)).text).toBe("Reach ann@example.com");
    await svc.close();
  });

  it("applies custom patterns from configuration", async () => {
    const svc = service({ customPatterns: [{ type: "CASE", pattern: "CASE-\\d{4}" }] });
    expect((await svc.deidentify("Ticket CASE-2024 filed")).text).toBe("Ticket [CASE_001] filed");
  });
});
