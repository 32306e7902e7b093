import type { Action, RateLimitDecision, SessionState, SessionStats } from "../types/common";
import { createLogger } from "../util/logger";
import { ConfigurationError } from "./errors";

const logger = createLogger("moderator");

export const RATE_WINDOW_MS = 60_000;
const DEFAULT_IDLE_TTL_MS = 10 * 60 * 1000;

export interface ModeratorOptions {
  rateLimitPerMinute: number;
  blacklist?: Iterable<string>;
  whitelist?: Iterable<string>;
  windowMs?: number;
  idleTtlMs?: number;
}

interface CompiledEntry {
  source: string;
  test(lowered: string, raw: string): boolean;
}

const REGEX_ENTRY = /^\/(.+)\/([a-z]*)$/s;

/**
 * Entries are case-insensitive substrings, or regular expressions when
 * written as `/body/flags`.
 */
function compileEntries(entries: Iterable<string>, list: string): CompiledEntry[] {
  const out: CompiledEntry[] = [];
  for (const entry of entries) {
    if (entry.trim().length === 0) {
      throw new ConfigurationError(`${list} entries must not be empty`);
    }
    const re = REGEX_ENTRY.exec(entry);
    if (re) {
      const flags = Array.from(new Set(`${re[2]}i`.replace(/[gy]/g, ""))).join("");
      let regex: RegExp;
      try {
        regex = new RegExp(re[1], flags);
      } catch (err) {
        throw new ConfigurationError(`${list} entry ${entry} is not a valid pattern`, { entry }, err);
      }
      out.push({ source: entry, test: (_lowered, raw) => regex.test(raw) });
    } else {
      const needle = entry.toLowerCase();
      out.push({ source: entry, test: (lowered) => lowered.includes(needle) });
    }
  }
  return out;
}

function findEntry(entries: CompiledEntry[], text: string): string | undefined {
  if (entries.length === 0) return undefined;
  const lowered = text.toLowerCase();
  return entries.find((e) => e.test(lowered, text))?.source;
}

/**
 * Sliding-window rate limiter and blacklist/whitelist matcher.
 *
 * Each session id owns its own record. The read-prune-append sequence in
 * `checkRateLimit` runs synchronously with no suspension point, so calls
 * for the same session are serialized by the event loop and calls for
 * different sessions never touch each other's record.
 */
export class ContentModerator {
  private readonly sessions = new Map<string, SessionState>();
  private sweeper: NodeJS.Timeout | null = null;
  private limit: number;
  private readonly windowMs: number;
  private idleTtlMs: number;
  private blacklist: CompiledEntry[];
  private whitelist: CompiledEntry[];

  constructor(options: ModeratorOptions) {
    this.windowMs = options.windowMs ?? RATE_WINDOW_MS;
    this.limit = ContentModerator.validLimit(options.rateLimitPerMinute);
    this.idleTtlMs = options.idleTtlMs ?? DEFAULT_IDLE_TTL_MS;
    this.blacklist = compileEntries(options.blacklist ?? [], "blacklist");
    this.whitelist = compileEntries(options.whitelist ?? [], "whitelist");
  }

  private static validLimit(n: number): number {
    if (!Number.isInteger(n) || n <= 0) {
      throw new ConfigurationError(`rateLimitPerMinute must be a positive integer, got ${n}`);
    }
    return n;
  }

  /**
   * Swaps limits and lists in one step; session windows are kept. Lists are
   * compiled before anything is assigned, so a bad entry leaves the old
   * policy in place.
   */
  reconfigure(options: ModeratorOptions): void {
    const limit = ContentModerator.validLimit(options.rateLimitPerMinute);
    const blacklist = compileEntries(options.blacklist ?? [], "blacklist");
    const whitelist = compileEntries(options.whitelist ?? [], "whitelist");
    this.limit = limit;
    this.blacklist = blacklist;
    this.whitelist = whitelist;
    if (options.idleTtlMs !== undefined) this.idleTtlMs = options.idleTtlMs;
  }

  private record(sessionId: string, now: number): SessionState {
    let state = this.sessions.get(sessionId);
    if (!state) {
      state = { sessionId, timestamps: [], totalBlocked: 0, totalAllowed: 0, lastSeen: now };
      this.sessions.set(sessionId, state);
    }
    return state;
  }

  private prune(state: SessionState, now: number): void {
    const cutoff = now - this.windowMs;
    let drop = 0;
    while (drop < state.timestamps.length && state.timestamps[drop] <= cutoff) drop++;
    if (drop > 0) state.timestamps.splice(0, drop);
  }

  checkRateLimit(sessionId: string, now: number = Date.now()): RateLimitDecision {
    const state = this.record(sessionId, now);
    state.lastSeen = Math.max(state.lastSeen, now);
    this.prune(state, now);

    if (state.timestamps.length >= this.limit) {
      const retryAfterMs = state.timestamps[0] + this.windowMs - now;
      logger.warn(
        { sessionId, inWindow: state.timestamps.length, limit: this.limit, retryAfterMs },
        "Rate limit exceeded",
      );
      return { allowed: false, retryAfterMs };
    }

    // Keep ascending order even if the caller's clock stepped backwards
    const ts = state.timestamps;
    let at = ts.length;
    while (at > 0 && ts[at - 1] > now) at--;
    ts.splice(at, 0, now);
    return { allowed: true, retryAfterMs: 0 };
  }

  recordOutcome(sessionId: string, action: Action, now: number = Date.now()): void {
    const state = this.record(sessionId, now);
    if (action === "block") state.totalBlocked += 1;
    else state.totalAllowed += 1;
    state.lastSeen = Math.max(state.lastSeen, now);
  }

  findBlacklistMatch(text: string): string | undefined {
    return findEntry(this.blacklist, text);
  }

  matchesBlacklist(text: string): boolean {
    return this.findBlacklistMatch(text) !== undefined;
  }

  matchesWhitelist(text: string): boolean {
    return findEntry(this.whitelist, text) !== undefined;
  }

  getSessionStats(sessionId: string, now: number = Date.now()): SessionStats {
    const state = this.sessions.get(sessionId);
    const cutoff = now - this.windowMs;
    const inWindow = state ? state.timestamps.filter((t) => t > cutoff).length : 0;
    return {
      sessionId,
      messagesInWindow: inWindow,
      limit: this.limit,
      windowMs: this.windowMs,
      remaining: Math.max(0, this.limit - inWindow),
      totalBlocked: state?.totalBlocked ?? 0,
      totalAllowed: state?.totalAllowed ?? 0,
    };
  }

  /** Snapshot of a session record (copy; the live one stays private). */
  getSession(sessionId: string): SessionState | undefined {
    const state = this.sessions.get(sessionId);
    return state ? { ...state, timestamps: [...state.timestamps] } : undefined;
  }

  resetSession(sessionId: string): boolean {
    const existed = this.sessions.delete(sessionId);
    if (existed) logger.info({ sessionId }, "Session rate window reset");
    return existed;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Evicts sessions idle for longer than the TTL whose rate window has also
   * emptied, so eviction never hands back quota. Returns how many went.
   */
  sweep(now: number = Date.now()): number {
    let evicted = 0;
    for (const [id, state] of this.sessions) {
      const newest = state.timestamps[state.timestamps.length - 1];
      const windowEmpty = newest === undefined || newest <= now - this.windowMs;
      if (windowEmpty && now - state.lastSeen > this.idleTtlMs) {
        this.sessions.delete(id);
        evicted++;
      }
    }
    if (evicted > 0) logger.debug({ evicted, remaining: this.sessions.size }, "Idle sessions evicted");
    return evicted;
  }

  startSweeper(intervalMs: number = RATE_WINDOW_MS): void {
    if (this.sweeper) return;
    this.sweeper = setInterval(() => this.sweep(), intervalMs);
    this.sweeper.unref();
  }

  stop(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }

  destroy(): void {
    this.stop();
    this.sessions.clear();
  }
}
