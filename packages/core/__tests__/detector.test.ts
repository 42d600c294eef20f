import { describe, it, expect } from "vitest";
import {
  PatternDetector,
  createCustomMatcher,
  defaultMatchers,
  existingTokenRanges,
  tokensIn,
} from "../src/detector.js";
import { ValidationError } from "../src/errors.js";

describe("PatternDetector", () => {
  const detector = new PatternDetector();

  it("finds a person and a project", () => {
    expect(detector.detect("Call John Smith about Project Alpha")).toEqual([
      { start: 5, end: 15, text: "John Smith", type: "PERSON" },
      { start: 22, end: 35, text: "Project Alpha", type: "PROJECT" },
    ]);
  });

  it("finds emails and phone numbers", () => {
    expect(detector.detect("Reach jane.doe@example.org or 555-123-4567")).toEqual([
      { start: 6, end: 26, text: "jane.doe@example.org", type: "EMAIL" },
      { start: 30, end: 42, text: "555-123-4567", type: "PHONE" },
    ]);
  });

  it("skips locations at the minimal level", () => {
    expect(detector.detect("Meet at 12 Baker Street in Smithville", "minimal")).toEqual([]);
  });

  it("finds locations from the balanced level up", () => {
    expect(detector.detect("Meet at 12 Baker Street in Smithville", "balanced")).toEqual([
      { start: 8, end: 23, text: "12 Baker Street", type: "LOCATION" },
      { start: 27, end: 37, text: "Smithville", type: "LOCATION" },
    ]);
  });

  it("only picks up names after an honorific at the strict level", () => {
    expect(detector.detect("Dr. Jones will call", "balanced")).toEqual([]);
    expect(detector.detect("Dr. Jones will call", "strict")).toEqual([
      { start: 4, end: 9, text: "Jones", type: "PERSON" },
    ]);
  });

  it("accepts a single hyphenated name", () => {
    expect(detector.detect("Ask Mary-Jane tomorrow")).toEqual([
      { start: 4, end: 13, text: "Mary-Jane", type: "PERSON" },
    ]);
  });

  it("leaves existing tokens alone", () => {
    expect(detector.detect("[PERSON_001] met Mary Jones")).toEqual([
      { start: 17, end: 27, text: "Mary Jones", type: "PERSON" },
    ]);
  });

  it("does not report an email local part as a name", () => {
    const spans = detector.detect("Write to John.Smith@example.com");
    expect(spans.map((s) => s.type)).toEqual(["EMAIL"]);
  });

  it("returns an empty list for empty text", () => {
    expect(detector.detect("")).toEqual([]);
  });

  it("lists types in priority order", () => {
    expect(detector.types()).toEqual(["EMAIL", "PHONE", "PROJECT", "LOCATION", "PERSON"]);
  });
});

describe("custom matchers", () => {
  it("runs a registered matcher from its minimum level", () => {
    const detector = new PatternDetector(defaultMatchers()).register(
      createCustomMatcher({ type: "CASE", pattern: "CASE-\\d{4}" })
    );
    expect(detector.detect("Ticket CASE-2024 filed")).toEqual([
      { start: 7, end: 16, text: "CASE-2024", type: "CASE" },
    ]);
    expect(detector.detect("Ticket CASE-2024 filed", "minimal")).toEqual([]);
  });

  it("rejects a type that cannot prefix a token", () => {
    expect(() => createCustomMatcher({ type: "case_id", pattern: "x" })).toThrow(ValidationError);
  });

  it("rejects an invalid regular expression", () => {
    expect(() => createCustomMatcher({ type: "CASE", pattern: "(" })).toThrow(ValidationError);
  });
});

describe("token helpers", () => {
  it("finds ranges of bracketed tokens", () => {
    expect(existingTokenRanges("a [PERSON_001] b [EMAIL_002]")).toEqual([
      { start: 2, end: 14 },
      { start: 17, end: 28 },
    ]);
  });

  it("lists unique tokens in order of first appearance", () => {
    expect(tokensIn("[EMAIL_001] [PERSON_001] [EMAIL_001] [person_1]")).toEqual(["EMAIL_001", "PERSON_001"]);
  });
});
