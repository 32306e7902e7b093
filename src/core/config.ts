import type { SecurityConfig } from "../types/common";
import { SecurityConfigSchema } from "../types/schemas";
import { ConfigurationError } from "./errors";

/**
 * Validates and freezes a pipeline configuration. A missing or unknown
 * level is an error, never a silently chosen default.
 */
export function createSecurityConfig(input: unknown): SecurityConfig {
  const parsed = SecurityConfigSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.flatten();
    const fields = Object.keys(details.fieldErrors);
    throw new ConfigurationError(
      `invalid security configuration${fields.length ? `: ${fields.join(", ")}` : ""}`,
      details,
    );
  }
  const c = parsed.data;
  return Object.freeze({
    ...c,
    blacklist: Object.freeze(new Set(c.blacklist)),
    whitelist: Object.freeze(new Set(c.whitelist)),
  });
}

/** Loggable view: list sizes instead of entries. */
export function describeConfig(config: SecurityConfig) {
  return {
    ...config,
    blacklist: config.blacklist.size,
    whitelist: config.whitelist.size,
  };
}
