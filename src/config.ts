import { createSecurityConfig, describeConfig } from "./core/config";
import type { SecurityConfig } from "./types/common";
import { createLogger } from "./util/logger";

const logger = createLogger("config");

type Env = Record<string, string | undefined>;

/** Values passed on the command line win over the environment. */
export interface ConfigOverrides {
  level?: string;
  maxInputLength?: number;
  rateLimitPerMinute?: number;
  enableInjectionDetection?: boolean;
  enableContentModeration?: boolean;
}

function int(v: string | undefined): number | string | undefined {
  if (v === undefined || v.trim() === "") return undefined;
  const n = Number(v);
  // non-numeric strings go through untouched so validation names the field
  return Number.isFinite(n) ? n : v;
}

function bool(v: string | undefined): boolean | string | undefined {
  if (v === undefined || v.trim() === "") return undefined;
  const s = v.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(s)) return true;
  if (["0", "false", "no", "off"].includes(s)) return false;
  return v;
}

function list(v: string | undefined): string[] | undefined {
  if (v === undefined) return undefined;
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Builds a SecurityConfig from environment variables. Only the CLI and the
 * HTTP server call this; the pipeline itself never reads the environment.
 */
export function loadConfigFromEnv(env: Env = process.env, overrides: ConfigOverrides = {}): SecurityConfig {
  const raw = {
    level: overrides.level ?? env.SECURITY_LEVEL,
    maxInputLength: overrides.maxInputLength ?? int(env.MAX_INPUT_LENGTH) ?? 2000,
    rateLimitPerMinute:
      overrides.rateLimitPerMinute ?? int(env.RATE_LIMIT_PER_MINUTE ?? env.RATE_LIMIT_MESSAGES_PER_MINUTE) ?? 10,
    enableInjectionDetection:
      overrides.enableInjectionDetection ?? bool(env.ENABLE_PROMPT_INJECTION_DETECTION),
    enableContentModeration: overrides.enableContentModeration ?? bool(env.ENABLE_CONTENT_MODERATION),
    enableSanitization: bool(env.ENABLE_SANITIZATION),
    hardInputCap: int(env.HARD_INPUT_CAP),
    sessionIdleTtlMs: int(env.SESSION_IDLE_TTL_MS),
    blacklist: list(env.BLACKLIST),
    whitelist: list(env.WHITELIST),
  };

  try {
    const config = createSecurityConfig(raw);
    logger.info({ config: describeConfig(config) }, "Configuration loaded");
    return config;
  } catch (error) {
    logger.error({ error }, "Failed to load configuration");
    throw error;
  }
}
