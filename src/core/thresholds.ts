import type { SecurityLevel } from "../types/schemas";
import { ThreatLevel } from "../types/threat";

/**
 * Block when the detected level is at or above the threshold (inclusive).
 *
 * LOW blocks critical only, MEDIUM blocks medium through critical, HIGH
 * blocks anything that matched at all.
 */
export const POLICY_THRESHOLDS: Readonly<Record<SecurityLevel, ThreatLevel>> = Object.freeze({
  LOW: ThreatLevel.CRITICAL,
  MEDIUM: ThreatLevel.MEDIUM,
  HIGH: ThreatLevel.LOW,
});

export function policyThreshold(level: SecurityLevel): ThreatLevel {
  return POLICY_THRESHOLDS[level];
}

export function exceedsThreshold(detected: ThreatLevel, level: SecurityLevel): boolean {
  return detected >= policyThreshold(level);
}
