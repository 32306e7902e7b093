import type { SanitizationResult } from "../types/common";
import { ConfigurationError, EncodingError } from "./errors";

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const ANSI_ESCAPE = /\u001b\[[0-9;?]*[A-Za-z]/g;

// C0/C1 controls except \t \n \v \f \r, which collapse into spaces below
const CONTROL_CHARS = /[\u0000-\u0008\u000E-\u001F\u007F-\u009F]/g;

/**
 * Invisible code points that can hide content between visible letters:
 * soft hyphen, combining grapheme joiner, Hangul fillers, Khmer inherent
 * vowels, Mongolian vowel separator, zero-width space/joiners, LRM/RLM,
 * bidi embeddings/overrides/isolates, word joiner and invisible operators,
 * variation selectors, BOM.
 */
const INVISIBLE_CHARS =
  /[\u00AD\u034F\u115F\u1160\u17B4\u17B5\u180E\u200B-\u200F\u202A-\u202E\u2060-\u2064\u2066-\u206F\u3164\uFE00-\uFE0F\uFEFF\uFFA0]/g;

// Whatever format characters the explicit list above misses
const FORMAT_CHARS = /\p{Cf}/gu;

const WHITESPACE_RUN = /\s+/g;

function assertMaxLength(maxLength: number): void {
  if (!Number.isInteger(maxLength) || maxLength <= 0) {
    throw new ConfigurationError(`maxLength must be a positive integer, got ${maxLength}`);
  }
}

/** Code point count (a surrogate pair counts once). */
export function codePointLength(text: string): number {
  let n = 0;
  for (const _ of text) n++;
  return n;
}

export function isWellFormedText(text: string): boolean {
  return !LONE_SURROGATE.test(text);
}

/**
 * Normalizes untrusted text: drops escape sequences, control and invisible
 * characters, folds look-alikes with NFKC, collapses whitespace and caps the
 * length. Pure; `sanitize(sanitize(x).cleanedText, n)` equals `sanitize(x, n)`.
 *
 * Invisible characters go before normalization so that removing them can
 * never enable a composition a second pass would perform.
 */
export function sanitize(raw: string, maxLength: number): SanitizationResult {
  assertMaxLength(maxLength);
  if (!isWellFormedText(raw)) {
    throw new EncodingError("input contains an unpaired UTF-16 surrogate");
  }

  const stripped = raw
    .replace(ANSI_ESCAPE, "")
    .replace(CONTROL_CHARS, "")
    .replace(INVISIBLE_CHARS, "")
    .replace(FORMAT_CHARS, "");

  let cleaned = stripped.normalize("NFKC").replace(WHITESPACE_RUN, " ").trim();

  const points = Array.from(cleaned);
  const truncated = points.length > maxLength;
  if (truncated) {
    // A cut landing on a space would leave a trailing one behind
    cleaned = points.slice(0, maxLength).join("").trimEnd();
  }

  return {
    cleanedText: cleaned,
    truncated,
    originalLength: codePointLength(raw),
  };
}

const SUSPICIOUS_ENCODINGS: RegExp[] = [
  /\\x[0-9a-fA-F]{2}/, // hex escapes
  /\\u[0-9a-fA-F]{4}/, // unicode escapes
  /%[0-9a-fA-F]{2}/, // URL encoding
  /&#x?[0-9a-fA-F]+;/, // numeric entities
  /&[a-zA-Z]+;/, // named entities
];

/** True when the text carries escape or entity sequences worth auditing. */
export function hasSuspiciousEncoding(text: string): boolean {
  return SUSPICIOUS_ENCODINGS.some((re) => re.test(text));
}

/** Caps runs of the same character: "aaaaaa" → "aaa" for max 3. */
export function collapseRepeats(text: string, max: number): string {
  if (!Number.isInteger(max) || max < 1) {
    throw new ConfigurationError(`max repetition must be a positive integer, got ${max}`);
  }
  const re = new RegExp(`(.)\\1{${max},}`, "gsu");
  return text.replace(re, (_m, ch: string) => ch.repeat(max));
}

/**
 * High-security variant: regular sanitization, then at most two repeats of
 * any character and nothing but letters, digits, spaces and basic
 * punctuation.
 */
export function sanitizeStrict(raw: string, maxLength: number): SanitizationResult {
  const base = sanitize(raw, maxLength);
  const cleanedText = collapseRepeats(base.cleanedText, 2)
    .replace(/[^\p{L}\p{N}\s.,!?'-]/gu, "")
    .replace(/([.,!?-]){3,}/g, "$1$1")
    .replace(WHITESPACE_RUN, " ")
    .trim();
  return { ...base, cleanedText };
}
