export const THREAT_CATEGORIES = [
  "instruction-override",
  "role-manipulation",
  "command-injection",
  "prompt-leak",
  "encoding-bypass",
] as const;

export type ThreatCategory = (typeof THREAT_CATEGORIES)[number];

/**
 * Ordinal severity. Numeric values carry the ordering, so comparisons use
 * plain `<` / `>=`.
 */
export const ThreatLevel = {
  SAFE: 0,
  LOW: 1,
  MEDIUM: 2,
  HIGH: 3,
  CRITICAL: 4,
} as const;

export type ThreatLevelName = keyof typeof ThreatLevel;
export type ThreatLevel = (typeof ThreatLevel)[ThreatLevelName];

export const THREAT_LEVEL_NAMES = ["SAFE", "LOW", "MEDIUM", "HIGH", "CRITICAL"] as const satisfies readonly ThreatLevelName[];

export function levelName(level: ThreatLevel): ThreatLevelName {
  return THREAT_LEVEL_NAMES[level];
}

export function maxLevel(...levels: ThreatLevel[]): ThreatLevel {
  let out: ThreatLevel = ThreatLevel.SAFE;
  for (const l of levels) if (l > out) out = l;
  return out;
}

/** [start, end) offsets into the text a rule ran against */
export type Span = readonly [number, number];

export interface PatternMatch {
  readonly ruleId: string;
  readonly category: ThreatCategory;
  readonly level: ThreatLevel;
  readonly span: Span;
}

export type PayloadEncoding = "base64" | "hex" | "escape";

/** An encoded candidate that escalated the outer result. */
export interface DecodedLayer {
  readonly encoding: PayloadEncoding;
  readonly span: Span; // offsets into the un-folded outer text
  readonly depth: number; // 1 = decoded from the input itself
  readonly decoded: string;
  readonly detection: DetectionResult;
}

export type HeuristicSignal = "keywords" | "role" | "punctuation" | "command" | "repetition";

/** Suspiciousness of the text as a whole, apart from any single rule. */
export interface HeuristicAssessment {
  readonly score: number; // 0..1, two decimals
  readonly level: ThreatLevel; // SAFE, MEDIUM or HIGH
  readonly signals: readonly HeuristicSignal[];
}

export interface DetectionResult {
  readonly level: ThreatLevel;
  readonly matches: readonly PatternMatch[];
  readonly decodedFrom?: DecodedLayer;
  /** Present only when the heuristic score raised the level. */
  readonly heuristic?: HeuristicAssessment;
}

export const SAFE_RESULT: DetectionResult = Object.freeze({
  level: ThreatLevel.SAFE,
  matches: Object.freeze([]),
});
