import type { PayloadEncoding, Span } from "../types/threat";

/** Decode → detect → decode once more, then stop. */
export const MAX_DECODE_DEPTH = 2;
/** Longer runs are not decoded at all. */
export const MAX_CANDIDATE_LENGTH = 4096;
export const MAX_CANDIDATES_PER_LAYER = 16;

const MIN_BASE64_LENGTH = 16;
const MIN_HEX_DIGITS = 16;
/** Escapes closer than this join one run. */
const ESCAPE_GAP = 32;

const BASE64_RUN = new RegExp(`[A-Za-z0-9+/]{${MIN_BASE64_LENGTH},}={0,2}`, "g");
const HEX_RUN = /(?<![0-9A-Za-z])(?:0x)?([0-9a-fA-F]+)(?![0-9A-Za-z])/g;
const ESCAPE_SEQ = /\\u[0-9a-fA-F]{4}|\\x[0-9a-fA-F]{2}|%[0-9a-fA-F]{2}/g;

// Decoded text must be free of control/format/unassigned chars, bar \t \n \r
const PRINTABLE = /^(?:[^\p{C}]|[\t\n\r])+$/u;

const utf8 = new TextDecoder("utf-8", { fatal: true });

export interface DecodedRegion {
  source: Span; // escaped run in the scanned text
  target: Span; // its resolved form inside `decoded`
}

export interface EncodedCandidate {
  encoding: PayloadEncoding;
  span: Span;
  decoded: string;
  /** Set when `decoded` keeps the surrounding text; absent when it is the payload alone. */
  regions?: readonly DecodedRegion[];
}

function decodePrintable(bytes: Uint8Array): string | undefined {
  if (bytes.length === 0) return undefined;
  let text: string;
  try {
    text = utf8.decode(bytes);
  } catch {
    return undefined; // not UTF-8, so not a text payload
  }
  return PRINTABLE.test(text) ? text : undefined;
}

/** Strict Base64: canonical padding bits and printable UTF-8 output. */
export function decodeBase64(run: string): string | undefined {
  const body = run.replace(/=+$/, "");
  if (body.length % 4 === 1) return undefined;
  const bytes = Buffer.from(body, "base64");
  if (bytes.toString("base64").replace(/=+$/, "") !== body) return undefined;
  return decodePrintable(bytes);
}

export function decodeHex(digits: string): string | undefined {
  if (digits.length % 2 !== 0) return undefined;
  return decodePrintable(Buffer.from(digits, "hex"));
}

/** Resolves `%XX`, `\xXX` and `\uXXXX` sequences in place. */
export function decodeEscapes(region: string): string {
  return region
    .replace(/(?:%[0-9a-fA-F]{2})+/g, (run) => {
      try {
        return decodeURIComponent(run);
      } catch {
        return run; // malformed UTF-8 percent run stays as written
      }
    })
    .replace(/\\u([0-9a-fA-F]{4})/g, (_m, hex: string) => String.fromCharCode(parseInt(hex, 16)))
    .replace(/\\x([0-9a-fA-F]{2})/g, (_m, hex: string) => String.fromCharCode(parseInt(hex, 16)));
}

function base64Candidates(text: string): EncodedCandidate[] {
  const out: EncodedCandidate[] = [];
  for (const m of text.matchAll(BASE64_RUN)) {
    const run = m[0];
    if (run.length > MAX_CANDIDATE_LENGTH) continue;
    const decoded = decodeBase64(run);
    const start = m.index ?? 0;
    if (decoded !== undefined) out.push({ encoding: "base64", span: [start, start + run.length], decoded });
  }
  return out;
}

function hexCandidates(text: string): EncodedCandidate[] {
  const out: EncodedCandidate[] = [];
  for (const m of text.matchAll(HEX_RUN)) {
    const digits = m[1] ?? "";
    if (digits.length < MIN_HEX_DIGITS || m[0].length > MAX_CANDIDATE_LENGTH) continue;
    const decoded = decodeHex(digits);
    const start = m.index ?? 0;
    if (decoded !== undefined) out.push({ encoding: "hex", span: [start, start + m[0].length], decoded });
  }
  return out;
}

/** Groups escape sequences into runs of nearby escapes, each within the length bound. */
function escapeRuns(text: string): Span[] {
  const runs: Span[] = [];
  let start = -1;
  let end = -1;
  for (const m of text.matchAll(ESCAPE_SEQ)) {
    const at = m.index ?? 0;
    const stop = at + m[0].length;
    if (start >= 0 && at - end <= ESCAPE_GAP && stop - start <= MAX_CANDIDATE_LENGTH) {
      end = stop;
      continue;
    }
    if (start >= 0) runs.push([start, end]);
    start = at;
    end = stop;
  }
  if (start >= 0) runs.push([start, end]);
  return runs;
}

/**
 * One candidate with every escape run resolved in place, so a word split
 * by a single escape reads whole again. `regions` maps each resolved run
 * back to where it was written.
 */
function escapeCandidates(text: string): EncodedCandidate[] {
  let decoded = "";
  let last = 0;
  const regions: DecodedRegion[] = [];
  for (const [start, end] of escapeRuns(text)) {
    const run = text.slice(start, end);
    const resolved = decodeEscapes(run);
    if (resolved === run) continue;
    decoded += text.slice(last, start);
    regions.push({ source: [start, end], target: [decoded.length, decoded.length + resolved.length] });
    decoded += resolved;
    last = end;
  }
  if (regions.length === 0) return [];
  decoded += text.slice(last);
  const span: Span = [regions[0].source[0], regions[regions.length - 1].source[1]];
  return [{ encoding: "escape", span, decoded, regions }];
}

/**
 * Every decodable obfuscated run in `text`, in offset order, capped at
 * MAX_CANDIDATES_PER_LAYER. A run that fails to decode is simply absent.
 */
export function findEncodedCandidates(text: string): EncodedCandidate[] {
  return [...base64Candidates(text), ...hexCandidates(text), ...escapeCandidates(text)]
    .sort((a, b) => a.span[0] - b.span[0])
    .slice(0, MAX_CANDIDATES_PER_LAYER);
}
