import { z } from "zod";
import type { GeneratedIntelligence, SessionRecord } from "./types.js";

export const PrivacyLevelSchema = z.enum(["minimal", "balanced", "strict"]);

export const SessionIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]{1,128}$/, "session id must be 1-128 characters of [A-Za-z0-9_-]");

const EntityLinksSchema = z.object({
  type: z.string().min(1),
  relationships: z.record(z.string(), z.string()),
});

export const SessionRecordSchema = z.object({
  session_id: SessionIdSchema,
  created_at: z.string().datetime(),
  last_used: z.string().datetime(),
  privacy_level: PrivacyLevelSchema,
  token_mappings: z.record(z.string(), z.string()),
  entity_relationships: z.record(z.string(), EntityLinksSchema),
  preserved_context: z.array(z.string()),
  metadata: z.record(z.string(), z.unknown()),
});

export const GeneratedIntelligenceSchema = z.object({
  intelligence: z.record(z.string(), z.record(z.string(), z.string())),
  confidence: z.number().min(0).max(1),
  intelligenceType: z.string().min(1),
});

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

/** Validate a stored record, flattening zod issues into one reason string. */
export function parseSessionRecord(
  raw: unknown
): { ok: true; record: SessionRecord } | { ok: false; reason: string } {
  const result = SessionRecordSchema.safeParse(raw);
  if (!result.success) {
    return { ok: false, reason: describeIssues(result.error) };
  }
  return { ok: true, record: result.data };
}

export function parseGeneratedIntelligence(
  raw: unknown
): { ok: true; value: GeneratedIntelligence } | { ok: false; reason: string } {
  const result = GeneratedIntelligenceSchema.safeParse(raw);
  if (!result.success) {
    return { ok: false, reason: describeIssues(result.error) };
  }
  return { ok: true, value: result.data };
}
