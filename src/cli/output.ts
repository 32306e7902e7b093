import type { Action, PipelineResult } from "../types/common";

export const EXIT_ERROR = 1;

export function exitCodeFor(action: Action): number {
  switch (action) {
    case "allow": return 0;
    case "block": return 3;
  }
}

export function formatResult(res: PipelineResult, jsonMode: boolean): string {
  if (jsonMode) return JSON.stringify(res);

  const lines = [
    `action: ${res.action.toUpperCase()}`,
    `reason: ${res.reason}`,
    `level: ${res.level}`,
    `categories: ${res.categories.join(", ") || "-"}`,
  ];
  if (res.retryAfterMs !== undefined) {
    lines.push(`retry after: ${Math.ceil(res.retryAfterMs / 1000)}s`);
  }
  if (res.sanitization?.truncated) {
    lines.push(`truncated from ${res.sanitization.originalLength} characters`);
  }
  if (res.explanations.length) {
    lines.push(`explanations: ${res.explanations.join(" | ")}`);
  }
  if (res.sanitizedText !== undefined) {
    lines.push(`text: ${res.sanitizedText}`);
  }
  return lines.join("\n");
}
