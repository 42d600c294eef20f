import { describe, it, expect } from "vitest";
import { PrivacySession, formatToken, parseToken, normalizeValue } from "../src/session.js";
import type { SessionRecord } from "../src/types.js";
import { ValidationError } from "../src/errors.js";

const NOW = new Date("2026-03-01T10:00:00.000Z");

describe("token names", () => {
  it("pads suffixes to three digits and grows past them", () => {
    expect(formatToken("PERSON", 1)).toBe("PERSON_001");
    expect(formatToken("PERSON", 1234)).toBe("PERSON_1234");
  });

  it("parses well-formed names only", () => {
    expect(parseToken("EMAIL_012")).toEqual({ type: "EMAIL", n: 12 });
    expect(parseToken("email_012")).toBeNull();
    expect(parseToken("EMAIL_12")).toBeNull();
  });

  it("normalizes case and whitespace", () => {
    expect(normalizeValue("  John \t SMITH ")).toBe("john smith");
  });
});

describe("PrivacySession", () => {
  it("mints per-type tokens and reuses them for the same value", () => {
    const session = PrivacySession.create("s1", "balanced", {}, NOW);
    expect(session.assign("PERSON", "John Smith")).toEqual({ token: "PERSON_001", minted: true });
    expect(session.assign("EMAIL", "john@example.com")).toEqual({ token: "EMAIL_001", minted: true });
    expect(session.assign("PERSON", "Mary Jones")).toEqual({ token: "PERSON_002", minted: true });
    expect(session.assign("PERSON", "John Smith")).toEqual({ token: "PERSON_001", minted: false });
    expect(session.counter("PERSON")).toBe(2);
    expect(session.valueOf("PERSON_002")).toBe("Mary Jones");
    expect(session.tokenFor("john@example.com")).toBe("EMAIL_001");
  });

  it("matches values exactly unless normalization is on", () => {
    const exact = PrivacySession.create("s1", "balanced", {}, NOW);
    exact.assign("PERSON", "John Smith");
    expect(exact.assign("PERSON", "john  smith").token).toBe("PERSON_002");

    const folded = PrivacySession.create("s2", "balanced", {}, NOW, { normalizeValues: true });
    folded.assign("PERSON", "John Smith");
    expect(folded.assign("PERSON", "john  smith")).toEqual({ token: "PERSON_001", minted: false });
    expect(folded.valueOf("PERSON_001")).toBe("John Smith");
  });

  it("rejects a type that cannot form a token", () => {
    const session = PrivacySession.create("s1", "balanced", {}, NOW);
    expect(() => session.assign("Person", "x")).toThrow(ValidationError);
  });

  it("adds links without overwriting existing ones", () => {
    const session = PrivacySession.create("s1", "balanced", {}, NOW);
    session.assign("PERSON", "John Smith");
    session.assign("EMAIL", "john@example.com");

    expect(session.link("PERSON_001", "EMAIL_001", "has_email")).toBe(true);
    expect(session.link("PERSON_001", "EMAIL_001", "related")).toBe(false);
    expect(session.relationOf("PERSON_001", "EMAIL_001")).toBe("has_email");
    expect(session.link("PERSON_001", "PHONE_001", "has_phone")).toBe(false);
    expect(session.link("PERSON_001", "PERSON_001", "self")).toBe(false);
  });

  it("keeps context words once each, in insertion order", () => {
    const session = PrivacySession.create("s1", "balanced", {}, NOW);
    expect(session.addContext(["meeting", " deadline ", "meeting", ""])).toBe(2);
    expect(session.preservedContext).toEqual(["meeting", "deadline"]);
  });

  it("round-trips through a record", () => {
    const session = PrivacySession.create("s1", "strict", { owner: "tests" }, NOW);
    session.assign("PERSON", "John Smith");
    session.assign("PROJECT", "Project Alpha");
    session.link("PROJECT_001", "PERSON_001", "has_member");
    session.addContext(["call"]);

    const record = session.toRecord();
    expect(record).toEqual({
      session_id: "s1",
      created_at: "2026-03-01T10:00:00.000Z",
      last_used: "2026-03-01T10:00:00.000Z",
      privacy_level: "strict",
      token_mappings: { PERSON_001: "John Smith", PROJECT_001: "Project Alpha" },
      entity_relationships: {
        PERSON_001: { type: "PERSON", relationships: {} },
        PROJECT_001: { type: "PROJECT", relationships: { PERSON_001: "has_member" } },
      },
      preserved_context: ["call"],
      metadata: { owner: "tests" },
    });
    expect(PrivacySession.fromRecord(record).toRecord()).toEqual(record);
  });

  it("continues counters from the highest stored suffix", () => {
    const record: SessionRecord = {
      session_id: "s1",
      created_at: NOW.toISOString(),
      last_used: NOW.toISOString(),
      privacy_level: "balanced",
      token_mappings: { PERSON_002: "Mary Jones", PERSON_007: "John Smith" },
      entity_relationships: {},
      preserved_context: [],
      metadata: {},
    };
    const session = PrivacySession.fromRecord(record);
    expect(session.assign("PERSON", "Ann Lee").token).toBe("PERSON_008");
  });

  it("drops links that point at unknown tokens when loading", () => {
    const record: SessionRecord = {
      session_id: "s1",
      created_at: NOW.toISOString(),
      last_used: NOW.toISOString(),
      privacy_level: "balanced",
      token_mappings: { PERSON_001: "John Smith" },
      entity_relationships: {
        PERSON_001: { type: "PERSON", relationships: { EMAIL_004: "has_email" } },
        EMAIL_004: { type: "EMAIL", relationships: {} },
      },
      preserved_context: [],
      metadata: {},
    };
    expect(PrivacySession.fromRecord(record).relationships()).toEqual({
      PERSON_001: { type: "PERSON", relationships: {} },
    });
  });

  it("updates lastUsed on touch", () => {
    const session = PrivacySession.create("s1", "balanced", {}, NOW);
    session.touch(new Date("2026-03-02T00:00:00.000Z"));
    expect(session.lastUsed).toBe("2026-03-02T00:00:00.000Z");
    expect(session.toView().createdAt).toBe("2026-03-01T10:00:00.000Z");
  });
});
