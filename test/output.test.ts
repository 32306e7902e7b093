import { describe, it, expect } from "vitest";
import { exitCodeFor, formatResult } from "../src/cli/output";
import { rateLimitedResult } from "../src/core/decision";
import type { PipelineResult } from "../src/types/common";

const allowed: PipelineResult = {
  action: "allow",
  allowed: true,
  reason: "passed",
  level: "LOW",
  categories: ["command-injection"],
  explanations: ["command-injection:inline-code (LOW)"],
  sanitizedText: "run `ls`",
  sanitization: { truncated: true, originalLength: 4000 },
};

describe("cli output", () => {
  it("maps actions to exit codes", () => {
    expect(exitCodeFor("allow")).toBe(0);
    expect(exitCodeFor("block")).toBe(3);
  });

  it("formats a human-readable report", () => {
    expect(formatResult(allowed, false)).toBe(
      [
        "action: ALLOW",
        "reason: passed",
        "level: LOW",
        "categories: command-injection",
        "truncated from 4000 characters",
        "explanations: command-injection:inline-code (LOW)",
        "text: run `ls`",
      ].join("\n"),
    );
  });

  it("reports the wait on rate limits", () => {
    expect(formatResult(rateLimitedResult(1500), false)).toBe(
      [
        "action: BLOCK",
        "reason: rate_limit_exceeded",
        "level: SAFE",
        "categories: -",
        "retry after: 2s",
        "explanations: retry in 2s",
      ].join("\n"),
    );
  });

  it("emits one JSON line in json mode", () => {
    const line = formatResult(allowed, true);
    expect(line).not.toContain("\n");
    expect(JSON.parse(line)).toEqual(allowed);
  });
});
