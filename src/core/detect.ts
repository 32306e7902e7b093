import {
  SAFE_RESULT,
  ThreatLevel,
  maxLevel,
  type DecodedLayer,
  type DetectionResult,
  type PatternMatch,
  type Span,
} from "../types/threat";
import { MAX_DECODE_DEPTH, findEncodedCandidates, type EncodedCandidate } from "./decode";
import { HeuristicScorer } from "./heuristics";
import { RuleSet } from "./rules";

function overlaps(a: Span, b: Span): boolean {
  return a[0] < b[1] && b[0] < a[1];
}

/**
 * Pattern + decode-and-recheck scorer, with a whole-text heuristic on the
 * input layer. Holds nothing but immutable rules, so one instance can serve
 * any number of concurrent callers.
 */
export class PromptInjectionDetector {
  readonly rules: RuleSet;
  readonly heuristics: HeuristicScorer | null;
  private readonly maxDepth: number;

  constructor(
    rules: RuleSet = RuleSet.defaults(),
    heuristics: HeuristicScorer | null = HeuristicScorer.defaults(),
    maxDepth = MAX_DECODE_DEPTH,
  ) {
    this.rules = rules;
    this.heuristics = heuristics;
    this.maxDepth = Math.min(maxDepth, MAX_DECODE_DEPTH);
  }

  detect(text: string): DetectionResult {
    return this.scan(text, 0);
  }

  /** Rule matches against the case-folded text, in rule order. */
  matchPatterns(text: string): PatternMatch[] {
    const folded = text.toLowerCase();
    const matches: PatternMatch[] = [];
    for (const rule of this.rules.rules) {
      const m = rule.regex.exec(folded);
      if (!m) continue;
      matches.push(
        Object.freeze({
          ruleId: rule.id,
          category: rule.category,
          level: rule.level,
          span: Object.freeze([m.index, m.index + m[0].length] as const),
        }),
      );
    }
    return matches;
  }

  private scan(text: string, depth: number): DetectionResult {
    const matches = this.matchPatterns(text);
    let decodedFrom: DecodedLayer | undefined;

    if (depth < this.maxDepth) {
      for (const candidate of findEncodedCandidates(text)) {
        const inner = this.scan(candidate.decoded, depth + 1);
        const revealed = revealedBy(candidate, inner.matches);
        if (!revealed) continue;

        matches.push(
          Object.freeze({
            ruleId: `decoded-${candidate.encoding}`,
            category: "encoding-bypass",
            level: maxLevel(ThreatLevel.HIGH, ...revealed.found.map((m) => m.level)),
            span: revealed.span,
          }),
        );
        decodedFrom ??= Object.freeze({
          encoding: candidate.encoding,
          span: revealed.span,
          depth: depth + 1,
          decoded: candidate.decoded,
          detection: inner,
        });
      }
    }

    const heuristic = depth === 0 ? this.heuristics?.score(text) : undefined;
    const flagged = heuristic !== undefined && heuristic.level > ThreatLevel.SAFE ? heuristic : undefined;
    if (matches.length === 0 && !flagged) return SAFE_RESULT;

    return Object.freeze({
      level: maxLevel(...matches.map((m) => m.level), flagged?.level ?? ThreatLevel.SAFE),
      matches: Object.freeze(matches),
      ...(decodedFrom ? { decodedFrom } : {}),
      ...(flagged ? { heuristic: flagged } : {}),
    });
  }
}

/**
 * Inner matches the decoding itself brought to light. A whole payload
 * (base64, hex) reveals everything found in it; an escape candidate keeps
 * its surrounding text, so only matches touching a resolved run count.
 */
function revealedBy(
  candidate: EncodedCandidate,
  inner: readonly PatternMatch[],
): { found: readonly PatternMatch[]; span: Span } | undefined {
  if (!candidate.regions) {
    return inner.length > 0 ? { found: inner, span: Object.freeze(candidate.span) } : undefined;
  }
  const hit = candidate.regions.filter((r) => inner.some((m) => overlaps(m.span, r.target)));
  if (hit.length === 0) return undefined;
  const found = inner.filter((m) => hit.some((r) => overlaps(m.span, r.target)));
  return {
    found,
    span: Object.freeze([hit[0].source[0], hit[hit.length - 1].source[1]] as const),
  };
}
