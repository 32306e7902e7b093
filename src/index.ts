export { SecurityPipeline, type PipelineOptions } from "./core/pipeline";
export { PromptInjectionDetector } from "./core/detect";
export { RuleSet, type Rule } from "./core/rules";
export { HeuristicScorer } from "./core/heuristics";
export { ContentModerator, RATE_WINDOW_MS, type ModeratorOptions } from "./core/moderator";
export {
  sanitize,
  sanitizeStrict,
  hasSuspiciousEncoding,
  collapseRepeats,
  codePointLength,
  isWellFormedText,
} from "./core/sanitize";
export {
  MAX_CANDIDATE_LENGTH,
  MAX_CANDIDATES_PER_LAYER,
  MAX_DECODE_DEPTH,
  findEncodedCandidates,
} from "./core/decode";
export { POLICY_THRESHOLDS, policyThreshold, exceedsThreshold } from "./core/thresholds";
export { applyPolicy, deriveCategories, explain } from "./core/decision";
export { createSecurityConfig, describeConfig } from "./core/config";
export {
  ShieldError,
  ConfigurationError,
  ValidationError,
  EncodingError,
  SecurityBlockedError,
  type ShieldErrorCode,
} from "./core/errors";
export { loadConfigFromEnv, type ConfigOverrides } from "./config";

export {
  ThreatLevel,
  THREAT_CATEGORIES,
  levelName,
  maxLevel,
  type ThreatLevelName,
  type ThreatCategory,
  type PatternMatch,
  type DetectionResult,
  type DecodedLayer,
  type HeuristicAssessment,
  type HeuristicSignal,
  type PayloadEncoding,
  type Span,
} from "./types/threat";
export type {
  Action,
  AllowReason,
  BlockReason,
  PipelineResult,
  RateLimitDecision,
  SanitizationResult,
  SecurityConfig,
  SessionState,
  SessionStats,
} from "./types/common";
export type { HeuristicProfile, RuleDefinition, SecurityConfigInput, SecurityLevel } from "./types/schemas";
