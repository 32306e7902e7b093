import type { PipelineResult, SanitizationResult, SecurityConfig, SessionStats } from "../types/common";
import { fingerprint } from "../util/hash";
import { createLogger } from "../util/logger";
import { createSecurityConfig } from "./config";
import { applyPolicy, blacklistResult, rateLimitedResult } from "./decision";
import { PromptInjectionDetector } from "./detect";
import { SecurityBlockedError, ValidationError } from "./errors";
import { HeuristicScorer } from "./heuristics";
import { ContentModerator, RATE_WINDOW_MS } from "./moderator";
import { RuleSet } from "./rules";
import { codePointLength, sanitize } from "./sanitize";

const logger = createLogger("pipeline");

export interface PipelineOptions {
  rules?: RuleSet; // defaults to the bundled rule corpus
  /** Whole-text heuristic; null turns it off. */
  heuristics?: HeuristicScorer | null;
  clock?: () => number; // epoch ms; injectable for tests
  /** Idle-session sweep period; 0 disables the timer. */
  sweepIntervalMs?: number;
}

function moderatorOptions(config: SecurityConfig) {
  return {
    rateLimitPerMinute: config.rateLimitPerMinute,
    blacklist: config.blacklist,
    whitelist: config.whitelist,
    idleTtlMs: config.sessionIdleTtlMs,
  };
}

/** Sanitization disabled: the raw text goes through as-is (insecure). */
function passthrough(raw: string): SanitizationResult {
  return { cleanedText: raw, truncated: false, originalLength: codePointLength(raw) };
}

/**
 * Orchestrates: rate limit → sanitize → blacklist → detect (+whitelist) →
 * policy → PipelineResult.
 *
 * Every stage is synchronous and short-circuits on a block. The only state
 * carried between calls is the moderator's session table.
 */
export class SecurityPipeline {
  private current: SecurityConfig;
  private detector: PromptInjectionDetector;
  private readonly moderator: ContentModerator;
  private readonly clock: () => number;

  constructor(config: SecurityConfig, opts: PipelineOptions = {}) {
    this.current = config;
    this.clock = opts.clock ?? Date.now;
    this.detector = new PromptInjectionDetector(
      opts.rules ?? RuleSet.defaults(),
      opts.heuristics === undefined ? HeuristicScorer.defaults() : opts.heuristics,
    );
    this.moderator = new ContentModerator(moderatorOptions(config));

    const sweepEvery = opts.sweepIntervalMs ?? RATE_WINDOW_MS;
    if (sweepEvery > 0) this.moderator.startSweeper(sweepEvery);

    logger.info(
      {
        level: config.level,
        rules: this.detector.rules.size,
        heuristics: this.detector.heuristics !== null,
        detection: config.enableInjectionDetection,
        moderation: config.enableContentModeration,
        sanitization: config.enableSanitization,
      },
      "Security pipeline ready",
    );
    if (!config.enableSanitization) {
      logger.warn("Sanitization disabled: raw input reaches detection and the model unchanged");
    }
  }

  /** Validates `input` first; throws ConfigurationError before anything is built. */
  static create(input: unknown, opts?: PipelineOptions): SecurityPipeline {
    return new SecurityPipeline(createSecurityConfig(input), opts);
  }

  get config(): SecurityConfig {
    return this.current;
  }

  get rules(): RuleSet {
    return this.detector.rules;
  }

  process(raw: string, sessionId: string): PipelineResult {
    // one reference for the whole call, whatever reload() does meanwhile
    const config = this.current;
    const detector = this.detector;

    if (sessionId.length === 0) throw new ValidationError("sessionId is required");
    if (raw.length > config.hardInputCap) {
      throw new ValidationError(`input exceeds the hard cap of ${config.hardInputCap} characters`, {
        length: raw.length,
      });
    }
    if (raw.trim().length === 0) throw new ValidationError("input is empty");

    const now = this.clock();

    if (config.enableContentModeration) {
      const limit = this.moderator.checkRateLimit(sessionId, now);
      if (!limit.allowed) {
        return this.finish(config, sessionId, raw, now, rateLimitedResult(limit.retryAfterMs));
      }
    }

    const sanitization = config.enableSanitization
      ? sanitize(raw, config.maxInputLength)
      : passthrough(raw);
    const text = sanitization.cleanedText;
    if (text.length === 0) throw new ValidationError("input is empty after sanitization");

    const blacklisted = this.moderator.findBlacklistMatch(text);
    if (blacklisted !== undefined) {
      return this.finish(config, sessionId, raw, now, blacklistResult(blacklisted, sanitization));
    }

    if (!config.enableInjectionDetection) {
      return this.finish(config, sessionId, raw, now, applyPolicy({ config, sanitization }));
    }

    const detection = detector.detect(text);
    const whitelisted = this.moderator.matchesWhitelist(text);
    return this.finish(
      config,
      sessionId,
      raw,
      now,
      applyPolicy({ config, sanitization, detection, whitelisted }),
    );
  }

  /** Sanitized text on allow; SecurityBlockedError on block. */
  enforce(raw: string, sessionId: string): string {
    const result = this.process(raw, sessionId);
    if (!result.allowed || result.sanitizedText === undefined) {
      throw new SecurityBlockedError(result);
    }
    return result.sanitizedText;
  }

  /**
   * Swaps configuration and/or rules. New objects are built first and
   * assigned last, so a failure leaves the running pipeline untouched and
   * in-flight calls keep the references they started with.
   */
  reload(next: { config?: SecurityConfig; rules?: RuleSet }): void {
    const config = next.config ?? this.current;
    const detector = next.rules ? new PromptInjectionDetector(next.rules, this.detector.heuristics) : this.detector;
    if (next.config) this.moderator.reconfigure(moderatorOptions(config));
    this.current = config;
    this.detector = detector;
    logger.info({ level: config.level, rules: detector.rules.size }, "Security pipeline reloaded");
  }

  stats(sessionId: string): SessionStats {
    return this.moderator.getSessionStats(sessionId, this.clock());
  }

  resetSession(sessionId: string): boolean {
    return this.moderator.resetSession(sessionId);
  }

  /** Evicts idle sessions now rather than waiting for the timer. */
  sweep(): number {
    return this.moderator.sweep(this.clock());
  }

  dispose(): void {
    this.moderator.destroy();
  }

  private finish(
    config: SecurityConfig,
    sessionId: string,
    raw: string,
    now: number,
    result: PipelineResult,
  ): PipelineResult {
    if (config.enableContentModeration) {
      this.moderator.recordOutcome(sessionId, result.action, now);
    }
    if (result.allowed) {
      logger.debug({ sessionId, reason: result.reason, level: result.level }, "Input allowed");
    } else {
      logger.warn(
        {
          sessionId,
          reason: result.reason,
          level: result.level,
          categories: result.categories,
          fingerprint: fingerprint(raw),
        },
        "Input blocked",
      );
    }
    return result;
  }
}
