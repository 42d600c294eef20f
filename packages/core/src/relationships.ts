import type { EntityType, TokenOccurrence } from "./types.js";
import type { PrivacySession } from "./session.js";

/** Directed labelled edge between two tokens of one session. */
export interface RelationshipUpdate {
  source: string;
  target: string;
  label: string;
}

export interface RelationshipRule {
  source: EntityType;
  target: EntityType;
  label: string;
}

export const DEFAULT_RELATIONSHIP_RULES: readonly RelationshipRule[] = [
  { source: "PERSON", target: "EMAIL", label: "has_email" },
  { source: "PERSON", target: "PHONE", label: "has_phone" },
  { source: "PERSON", target: "LOCATION", label: "located_at" },
  { source: "PROJECT", target: "PERSON", label: "has_member" },
  { source: "PROJECT", target: "LOCATION", label: "based_at" },
  { source: "EMAIL", target: "PHONE", label: "same_contact_as" },
];

export const DEFAULT_PROXIMITY_DISTANCE = 50;

export interface RelationshipDetectorOptions {
  rules?: readonly RelationshipRule[];
  /** Max characters between two spans for a `related` link. */
  proximityDistance?: number;
}

/** Lowercase, strip diacritics, keep letters only. */
function foldName(part: string): string {
  return part
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z]/g, "");
}

export function namePartsOf(name: string): string[] {
  return name
    .split(/[\s'-]+/)
    .map(foldName)
    .filter((p) => p.length >= 3);
}

export function emailLocalPart(email: string): string {
  const at = email.indexOf("@");
  return (at === -1 ? email : email.slice(0, at)).toLowerCase().replace(/[^a-z0-9]/g, "");
}

/**
 * Infers edges between tokens: a type-pair rule table, a proximity fallback
 * for pairs the table says nothing about, and name/email matching across the
 * whole session.
 */
export class RelationshipDetector {
  private readonly rules = new Map<string, string>();
  readonly proximityDistance: number;

  constructor(options: RelationshipDetectorOptions = {}) {
    for (const rule of options.rules ?? DEFAULT_RELATIONSHIP_RULES) {
      this.rules.set(`${rule.source}|${rule.target}`, rule.label);
    }
    this.proximityDistance = options.proximityDistance ?? DEFAULT_PROXIMITY_DISTANCE;
  }

  private rule(source: EntityType, target: EntityType): string | undefined {
    return this.rules.get(`${source}|${target}`);
  }

  infer(occurrences: readonly TokenOccurrence[], session: PrivacySession): RelationshipUpdate[] {
    const updates: RelationshipUpdate[] = [];
    const seen = new Set<string>();
    const push = (source: string, target: string, label: string) => {
      const key = `${source}>${target}`;
      if (source === target || seen.has(key)) return;
      seen.add(key);
      updates.push({ source, target, label });
    };

    // (a) type-pair rules over distinct co-occurring tokens
    const distinct = new Map<string, EntityType>();
    for (const occ of occurrences) {
      if (!distinct.has(occ.token)) distinct.set(occ.token, occ.type);
    }
    const tokens = [...distinct];
    for (let i = 0; i < tokens.length; i++) {
      for (let j = i + 1; j < tokens.length; j++) {
        const [a, typeA] = tokens[i];
        const [b, typeB] = tokens[j];
        const forward = this.rule(typeA, typeB);
        if (forward) push(a, b, forward);
        const backward = this.rule(typeB, typeA);
        if (backward) push(b, a, backward);
      }
    }

    // (b) proximity, only where no rule exists in either direction
    const ordered = [...occurrences].sort((x, y) => x.start - y.start);
    for (let i = 0; i < ordered.length; i++) {
      for (let j = i + 1; j < ordered.length; j++) {
        const x = ordered[i];
        const y = ordered[j];
        if (y.start - x.end > this.proximityDistance) break;
        if (x.token === y.token) continue;
        if (this.rule(x.type, y.type) || this.rule(y.type, x.type)) continue;
        push(x.token, y.token, "related");
      }
    }

    // (c) person name fragments inside email local parts, session-wide
    const label = this.rule("PERSON", "EMAIL") ?? "has_email";
    const emails = session
      .tokensOfType("EMAIL")
      .map((token) => ({ token, local: emailLocalPart(session.valueOf(token) ?? "") }))
      .filter((e) => e.local.length > 0);
    if (emails.length > 0) {
      for (const person of session.tokensOfType("PERSON")) {
        const parts = namePartsOf(session.valueOf(person) ?? "");
        if (parts.length === 0) continue;
        for (const email of emails) {
          if (parts.some((p) => email.local.includes(p))) push(person, email.token, label);
        }
      }
    }

    return updates;
  }

  /** Merge updates additively; returns the edges that were new. */
  apply(updates: readonly RelationshipUpdate[], session: PrivacySession): RelationshipUpdate[] {
    return updates.filter((u) => session.link(u.source, u.target, u.label));
  }
}
