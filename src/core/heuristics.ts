import defaultProfile from "../data/heuristics.json";
import { HeuristicProfileSchema, type HeuristicProfile } from "../types/schemas";
import { ThreatLevel, type HeuristicAssessment, type HeuristicSignal } from "../types/threat";
import { ConfigurationError } from "./errors";

function escapeRegExp(term: string): string {
  return term.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Matches a term at a word start, so "system" does not fire inside "ecosystem". */
function termRegex(term: string): RegExp {
  return new RegExp(`\\b${escapeRegExp(term)}`, "iu");
}

/**
 * Scores how suspicious a text reads as a whole: injection vocabulary,
 * role-play phrasing, shouting, imperative openings and long character
 * runs. No single signal is enough on its own to flag a message.
 */
export class HeuristicScorer {
  private readonly keywords: readonly RegExp[];
  private readonly roles: readonly RegExp[];
  private readonly burst: RegExp;
  private readonly commandLead: RegExp;
  private readonly repetition: RegExp;

  private constructor(private readonly profile: HeuristicProfile) {
    this.keywords = profile.keywords.terms.map(termRegex);
    this.roles = profile.roleIndicators.terms.map(termRegex);
    this.burst = new RegExp(`[!?]{${profile.punctuationBursts.minRun},}`, "g");
    this.commandLead = new RegExp(`^\\s*(?:${profile.commandLead.verbs.map(escapeRegExp).join("|")})\\s+`, "iu");
    this.repetition = new RegExp(`(.)\\1{${profile.repetition.minRun - 1},}`, "su");
    Object.freeze(this);
  }

  static fromDefinition(input: unknown): HeuristicScorer {
    const parsed = HeuristicProfileSchema.safeParse(input);
    if (!parsed.success) {
      throw new ConfigurationError("invalid heuristic profile", parsed.error.flatten());
    }
    return new HeuristicScorer(parsed.data);
  }

  static defaults(): HeuristicScorer {
    return DEFAULT_SCORER;
  }

  score(text: string): HeuristicAssessment {
    const p = this.profile;
    const signals: HeuristicSignal[] = [];
    let points = 0;
    const add = (signal: HeuristicSignal, value: number) => {
      if (value <= 0) return;
      signals.push(signal);
      points += value;
    };

    add("keywords", Math.min(p.keywords.cap, countHits(this.keywords, text) * p.keywords.weight));
    add("role", Math.min(p.roleIndicators.cap, countHits(this.roles, text) * p.roleIndicators.weight));
    const bursts = text.match(this.burst)?.length ?? 0;
    add("punctuation", Math.min(p.punctuationBursts.cap, bursts * p.punctuationBursts.weight));
    add("command", this.commandLead.test(text) ? p.commandLead.weight : 0);
    add("repetition", this.repetition.test(text) ? p.repetition.weight : 0);

    const score = Math.min(1, Math.round(points * 100) / 100);
    const level =
      score > p.levels.high ? ThreatLevel.HIGH : score > p.levels.medium ? ThreatLevel.MEDIUM : ThreatLevel.SAFE;
    return Object.freeze({ score, level, signals: Object.freeze(signals) });
  }
}

function countHits(patterns: readonly RegExp[], text: string): number {
  return patterns.filter((re) => re.test(text)).length;
}

const DEFAULT_SCORER = HeuristicScorer.fromDefinition(defaultProfile);
