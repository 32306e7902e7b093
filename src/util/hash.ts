import crypto from "node:crypto";

/** Short SHA-256 digest so log lines can be correlated without the text itself. */
export function fingerprint(input: string, length = 16): string {
  return crypto.createHash("sha256").update(input, "utf8").digest("base64url").slice(0, length);
}
