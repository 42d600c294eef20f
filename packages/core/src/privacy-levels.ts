import type { PrivacyLevel } from "./types.js";

export const PRIVACY_LEVELS: readonly PrivacyLevel[] = ["minimal", "balanced", "strict"];

export const DEFAULT_PRIVACY_LEVEL: PrivacyLevel = "balanced";

export function isPrivacyLevel(value: unknown): value is PrivacyLevel {
  return typeof value === "string" && (PRIVACY_LEVELS as readonly string[]).includes(value);
}

/** Levels at or above the given one: "balanced" → balanced, strict. */
export function levelsFrom(minimum: PrivacyLevel): ReadonlySet<PrivacyLevel> {
  return new Set(PRIVACY_LEVELS.slice(PRIVACY_LEVELS.indexOf(minimum)));
}

export const ALL_LEVELS = levelsFrom("minimal");
