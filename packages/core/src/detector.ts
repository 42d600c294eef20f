import type { EntitySpan, EntityType, PrivacyLevel, TextRange } from "./types.js";
import { ValidationError } from "./errors.js";
import { ALL_LEVELS, DEFAULT_PRIVACY_LEVEL, levelsFrom } from "./privacy-levels.js";
import nonNameWords from "../data/non-name-words.json" with { type: "json" };

/** A bracketed token already present in text, e.g. "[PERSON_001]". */
export const TOKEN_PATTERN = /\[([A-Z][A-Z0-9]*_\d{3,})\]/g;

const ENTITY_TYPE_PATTERN = /^[A-Z][A-Z0-9]*$/;

const NON_NAME_WORDS = new Set(nonNameWords);

/**
 * One recognizer for one entity type. Implementations are compiled once and
 * must be pure: same text in, same ranges out.
 */
export interface Matcher {
  readonly type: EntityType;
  /** Privacy levels under which this matcher runs. */
  readonly levels: ReadonlySet<PrivacyLevel>;
  match(text: string): TextRange[];
}

export function assertEntityType(type: string): void {
  if (!ENTITY_TYPE_PATTERN.test(type)) {
    throw new ValidationError(
      `Invalid entity type "${type}": expected an uppercase identifier without underscores`,
      { type }
    );
  }
}

function compileGlobal(pattern: RegExp): RegExp {
  return pattern.flags.includes("g")
    ? new RegExp(pattern.source, pattern.flags)
    : new RegExp(pattern.source, `${pattern.flags}g`);
}

function execAll(re: RegExp, text: string, onMatch: (m: RegExpExecArray) => void): void {
  re.lastIndex = 0;
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    if (m[0].length === 0) {
      re.lastIndex++;
      continue;
    }
    onMatch(m);
  }
}

/** Matches any of a list of regular expressions, in list order. */
export class RegexMatcher implements Matcher {
  private readonly patterns: RegExp[];

  constructor(
    readonly type: EntityType,
    patterns: RegExp[],
    readonly levels: ReadonlySet<PrivacyLevel> = ALL_LEVELS,
    private readonly accept?: (matched: string) => boolean
  ) {
    assertEntityType(type);
    this.patterns = patterns.map(compileGlobal);
  }

  match(text: string): TextRange[] {
    const ranges: TextRange[] = [];
    for (const re of this.patterns) {
      execAll(re, text, (m) => {
        if (this.accept && !this.accept(m[0])) return;
        ranges.push({ start: m.index, end: m.index + m[0].length });
      });
    }
    return ranges;
  }
}

// "John", "Mary-Jane", "O'Brien", "McDonald"
const NAME_WORD = String.raw`[A-Z](?:[a-z]+(?:[A-Z][a-z]+)?(?:-[A-Z][a-z]+)?|'[A-Z][a-z]+)`;

/**
 * Runs of capitalized words, split on words that are capitalized but are not
 * names ("Call", "Monday", "Project"). A run counts as a name when it keeps
 * two or more words, or one hyphenated/apostrophe word.
 */
export class PersonNameMatcher implements Matcher {
  readonly type: EntityType = "PERSON";
  private readonly run = new RegExp(
    String.raw`\b${NAME_WORD}(?:[ \t]+${NAME_WORD})*\b`,
    "g"
  );

  constructor(
    readonly levels: ReadonlySet<PrivacyLevel> = ALL_LEVELS,
    private readonly stopWords: ReadonlySet<string> = NON_NAME_WORDS
  ) {}

  match(text: string): TextRange[] {
    const ranges: TextRange[] = [];
    execAll(this.run, text, (m) => {
      let group: TextRange[] = [];
      const flush = () => {
        if (group.length >= 2 || (group.length === 1 && /['-]/.test(text.slice(group[0].start, group[0].end)))) {
          ranges.push({ start: group[0].start, end: group[group.length - 1].end });
        }
        group = [];
      };

      const word = /\S+/g;
      let w: RegExpExecArray | null;
      while ((w = word.exec(m[0])) !== null) {
        if (this.stopWords.has(w[0])) {
          flush();
          continue;
        }
        const start = m.index + w.index;
        group.push({ start, end: start + w[0].length });
      }
      flush();
    });
    return ranges;
  }
}

/** Names introduced by an honorific: "Dr. Jones" → "Jones". */
export class HonorificNameMatcher implements Matcher {
  readonly type: EntityType = "PERSON";
  private readonly re = new RegExp(
    String.raw`(?<=\b(?:Mr|Mrs|Ms|Miss|Dr|Prof)\.?[ \t]+)${NAME_WORD}(?:[ \t]+${NAME_WORD})?\b`,
    "g"
  );

  constructor(
    readonly levels: ReadonlySet<PrivacyLevel> = levelsFrom("strict"),
    private readonly stopWords: ReadonlySet<string> = NON_NAME_WORDS
  ) {}

  match(text: string): TextRange[] {
    const ranges: TextRange[] = [];
    execAll(this.re, text, (m) => {
      const first = m[0].split(/[ \t]+/)[0];
      if (this.stopWords.has(first)) return;
      ranges.push({ start: m.index, end: m.index + m[0].length });
    });
    return ranges;
  }
}

/** User-supplied regex matcher definition, e.g. from configuration. */
export interface CustomPattern {
  type: string;
  pattern: string;
  flags?: string;
  /** Lowest privacy level that runs it. Default "balanced". */
  minLevel?: PrivacyLevel;
}

export function createCustomMatcher(def: CustomPattern): Matcher {
  let re: RegExp;
  try {
    re = new RegExp(def.pattern, def.flags ?? "");
  } catch (err) {
    throw new ValidationError(`Invalid pattern for custom type ${def.type}`, {
      pattern: def.pattern,
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  return new RegexMatcher(def.type, [re], levelsFrom(def.minLevel ?? "balanced"));
}

/**
 * Built-in matchers in priority order: structured identifiers first, then
 * free-form names.
 */
export function defaultMatchers(): Matcher[] {
  return [
    new RegexMatcher("EMAIL", [
      /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
    ]),
    new RegexMatcher("PHONE", [
      /\+\d{1,3}[ \t]*\d{3}[-. \t]?\d{3}[-. \t]?\d{4}\b/g,
      /\(\d{3}\)[ \t]*\d{3}[-. \t]?\d{4}\b/g,
      /\b\d{3}[-. \t]?\d{3}[-. \t]?\d{4}\b/g,
    ]),
    new RegexMatcher("PROJECT", [
      /\b(?:Project|Initiative)[ \t]+[A-Z][a-zA-Z0-9]+\b/g,
      /\b[A-Z][a-zA-Z0-9]+[ \t]+(?:Project|Initiative)\b/g,
    ]),
    new RegexMatcher(
      "LOCATION",
      [
        /\b\d{1,5}[ \t]+(?:[A-Z][a-z]+[ \t]+){1,3}(?:Street|St|Avenue|Ave|Road|Rd|Boulevard|Blvd|Drive|Dr|Lane|Ln|Place|Pl|Court|Ct|Way)\b/g,
        /\b[A-Z][a-z]+(?:town|ville|burg|city)\b/g,
      ],
      levelsFrom("balanced")
    ),
    new PersonNameMatcher(),
    new HonorificNameMatcher(),
  ];
}

function overlaps(a: TextRange, b: TextRange): boolean {
  return a.start < b.end && b.start < a.end;
}

/** Ranges of bracketed tokens already in the text. */
export function existingTokenRanges(text: string): TextRange[] {
  const ranges: TextRange[] = [];
  execAll(new RegExp(TOKEN_PATTERN.source, "g"), text, (m) => {
    ranges.push({ start: m.index, end: m.index + m[0].length });
  });
  return ranges;
}

/** Unique token names in text, in order of first appearance. */
export function tokensIn(text: string): string[] {
  const seen = new Set<string>();
  for (const m of text.matchAll(new RegExp(TOKEN_PATTERN.source, "g"))) seen.add(m[1]);
  return [...seen];
}

/**
 * Stateless entity recognizer. Matchers run in priority order; a range
 * claimed by an earlier matcher blocks overlapping matches from later ones.
 */
export class PatternDetector {
  private readonly matchers: Matcher[];

  constructor(matchers: Matcher[] = defaultMatchers()) {
    this.matchers = [...matchers];
  }

  /** Append matchers at the lowest priority. */
  register(...matchers: Matcher[]): this {
    this.matchers.push(...matchers);
    return this;
  }

  /** Entity types this detector can produce, in priority order. */
  types(): EntityType[] {
    return [...new Set(this.matchers.map((m) => m.type))];
  }

  detect(text: string, level: PrivacyLevel = DEFAULT_PRIVACY_LEVEL): EntitySpan[] {
    const claimed = existingTokenRanges(text);
    const spans: EntitySpan[] = [];

    for (const matcher of this.matchers) {
      if (!matcher.levels.has(level)) continue;
      for (const range of matcher.match(text)) {
        if (range.end <= range.start) continue;
        if (claimed.some((c) => overlaps(c, range))) continue;
        claimed.push(range);
        spans.push({
          start: range.start,
          end: range.end,
          text: text.slice(range.start, range.end),
          type: matcher.type,
        });
      }
    }

    return spans.sort((a, b) => a.start - b.start);
  }
}
