import type { PipelineResult, SanitizationResult, SecurityConfig } from "../types/common";
import {
  ThreatLevel,
  levelName,
  type DetectionResult,
  type ThreatCategory,
} from "../types/threat";
import { exceedsThreshold } from "./thresholds";

/** Distinct categories in the order their first match was recorded. */
export function deriveCategories(detection: DetectionResult): ThreatCategory[] {
  const out: ThreatCategory[] = [];
  for (const m of detection.matches) {
    if (!out.includes(m.category)) out.push(m.category);
  }
  return out;
}

/** Short reasons naming rules and levels, never the matched text. */
export function explain(detection: DetectionResult): string[] {
  const lines = detection.matches.map((m) => `${m.category}:${m.ruleId} (${levelName(m.level)})`);
  const layer = detection.decodedFrom;
  if (layer) {
    lines.push(`hidden in ${layer.encoding} payload at depth ${layer.depth}`);
  }
  const h = detection.heuristic;
  if (h) {
    lines.push(`heuristic score ${h.score.toFixed(2)} (${levelName(h.level)}): ${h.signals.join(", ")}`);
  }
  return lines;
}

function sanitizationInfo(s: SanitizationResult): PipelineResult["sanitization"] {
  return { truncated: s.truncated, originalLength: s.originalLength };
}

export function rateLimitedResult(retryAfterMs: number): PipelineResult {
  return {
    action: "block",
    allowed: false,
    reason: "rate_limit_exceeded",
    level: "SAFE",
    categories: [],
    explanations: [`retry in ${Math.ceil(retryAfterMs / 1000)}s`],
    retryAfterMs,
  };
}

export function blacklistResult(entry: string, sanitization: SanitizationResult): PipelineResult {
  return {
    action: "block",
    allowed: false,
    reason: "blacklist_match",
    level: "SAFE",
    categories: [],
    explanations: [`blacklist:${entry}`],
    sanitization: sanitizationInfo(sanitization),
  };
}

/**
 * Final policy step. A whitelist hit forces the effective level to SAFE but
 * keeps the detection attached for auditing.
 */
export function applyPolicy(params: {
  config: Pick<SecurityConfig, "level">;
  sanitization: SanitizationResult;
  detection?: DetectionResult;
  whitelisted?: boolean;
}): PipelineResult {
  const { config, sanitization, detection } = params;
  const whitelisted = params.whitelisted ?? false;
  const detected = detection?.level ?? ThreatLevel.SAFE;
  const effective = whitelisted ? ThreatLevel.SAFE : detected;

  const base = {
    level: levelName(effective),
    categories: detection && !whitelisted ? deriveCategories(detection) : [],
    explanations: detection ? explain(detection) : [],
    detection,
    sanitization: sanitizationInfo(sanitization),
  };

  if (exceedsThreshold(effective, config.level)) {
    return { ...base, action: "block", allowed: false, reason: "threat_detected" };
  }

  return {
    ...base,
    action: "allow",
    allowed: true,
    reason: whitelisted && detected > ThreatLevel.SAFE ? "whitelist_match" : "passed",
    sanitizedText: sanitization.cleanedText,
  };
}
