import type { DetectionResult, ThreatCategory, ThreatLevelName } from "./threat";
import type { ParsedSecurityConfig } from "./schemas";

export type Action = "allow" | "block";

export type BlockReason = "rate_limit_exceeded" | "blacklist_match" | "threat_detected";
export type AllowReason = "passed" | "whitelist_match";

export interface SanitizationResult {
  cleanedText: string;
  truncated: boolean;
  originalLength: number; // code points of the raw input
}

export interface RateLimitDecision {
  allowed: boolean;
  retryAfterMs: number; // 0 when allowed
}

export interface SessionState {
  sessionId: string;
  timestamps: number[]; // epoch ms, ascending
  totalBlocked: number;
  totalAllowed: number;
  lastSeen: number;
}

export interface SessionStats {
  sessionId: string;
  messagesInWindow: number;
  limit: number;
  windowMs: number;
  remaining: number;
  totalBlocked: number;
  totalAllowed: number;
}

/**
 * Immutable per pipeline instance. Lists are sets so lookups stay cheap and
 * nobody is tempted to push into them.
 */
export type SecurityConfig = Readonly<
  Omit<ParsedSecurityConfig, "blacklist" | "whitelist"> & {
    blacklist: ReadonlySet<string>;
    whitelist: ReadonlySet<string>;
  }
>;

/**
 * Final, caller-facing result of one `process` call.
 */
export interface PipelineResult {
  action: Action;
  allowed: boolean;
  reason: BlockReason | AllowReason;
  sanitizedText?: string; // present on allow only
  level: ThreatLevelName; // effective level the policy saw
  categories: ThreatCategory[];
  explanations: string[]; // short, text-free reasons for audit/UI
  detection?: DetectionResult;
  retryAfterMs?: number;
  sanitization?: Omit<SanitizationResult, "cleanedText">;
}
