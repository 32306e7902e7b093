import "dotenv/config";
import { Command, InvalidArgumentError } from "commander";
import fs from "node:fs";
import readline from "node:readline";
import { z } from "zod";

import { loadConfigFromEnv } from "../config";
import { ShieldError, ValidationError } from "../core/errors";
import { SecurityPipeline } from "../core/pipeline";
import { RuleSet } from "../core/rules";
import { EXIT_ERROR, exitCodeFor, formatResult } from "./output";

const LineSchema = z.object({
  text: z.string(),
  sessionId: z.string().min(1).optional(),
});

function positiveInt(v: string): number {
  const n = Number(v);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError("expected a positive integer");
  return n;
}

const program = new Command();

program
  .name("shield")
  .description("Screen untrusted text for prompt injection, obfuscated payloads and flooding")
  .argument("[text...]", "text to check (omit when using --file)")
  .option("-f, --file <jsonl>", "JSONL file with {\"text\":\"...\",\"sessionId?\":\"...\"} per line")
  .option("-l, --level <level>", "security level: LOW, MEDIUM or HIGH (default: $SECURITY_LEVEL)")
  .option("--max-length <n>", "characters kept after sanitizing", positiveInt)
  .option("--rate-limit <n>", "messages per session per minute", positiveInt)
  .option("--rules <json>", "extra rules file ({\"rules\": [...]}) added to the built-in set")
  .option("-s, --session <id>", "session id for rate limiting", "cli")
  .option("--json", "print raw JSON result(s)", false)
  .parse(process.argv);

type CliOpts = {
  file?: string;
  level?: string;
  maxLength?: number;
  rateLimit?: number;
  rules?: string;
  session: string;
  json: boolean;
};

function buildPipeline(opts: CliOpts): SecurityPipeline {
  const config = loadConfigFromEnv(process.env, {
    level: opts.level,
    maxInputLength: opts.maxLength,
    rateLimitPerMinute: opts.rateLimit,
  });
  const rules = opts.rules
    ? RuleSet.defaults().merge(RuleSet.fromJson(fs.readFileSync(opts.rules, "utf8")))
    : RuleSet.defaults();
  return new SecurityPipeline(config, { rules, sweepIntervalMs: 0 });
}

function describeError(err: unknown): string {
  if (err instanceof ShieldError) return `${err.code}: ${err.message}`;
  return String(err instanceof Error ? err.message : err);
}

function handleSingle(pipeline: SecurityPipeline, text: string, opts: CliOpts): number {
  const res = pipeline.process(text, opts.session);
  process.stdout.write(formatResult(res, opts.json) + "\n");
  return exitCodeFor(res.action);
}

async function handleBatch(pipeline: SecurityPipeline, file: string, opts: CliOpts): Promise<number> {
  if (!fs.existsSync(file)) {
    console.error(`[error] file not found: ${file}`);
    return EXIT_ERROR;
  }

  const rl = readline.createInterface({
    input: fs.createReadStream(file, { encoding: "utf8" }),
    crlfDelay: Infinity,
  });

  let worstExit = 0; // 0 allow, 3 block
  for await (const line of rl) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    let doc: unknown;
    try {
      doc = JSON.parse(trimmed);
    } catch {
      console.error(`[warn] skipping invalid JSONL line: ${trimmed.slice(0, 120)}`);
      continue;
    }
    const parsed = LineSchema.safeParse(doc);
    if (!parsed.success) {
      console.error(`[warn] skipping line without text: ${trimmed.slice(0, 120)}`);
      continue;
    }
    const { text, sessionId = opts.session } = parsed.data;
    try {
      const res = pipeline.process(text, sessionId);
      process.stdout.write(formatResult(res, opts.json) + "\n");
      worstExit = Math.max(worstExit, exitCodeFor(res.action));
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      console.error(`[warn] ${describeError(err)}`);
    }
  }
  return worstExit;
}

async function main(): Promise<number> {
  const opts = program.opts<CliOpts>();
  const inline = program.args.join(" ");

  if (opts.file && inline) {
    console.error("[error] Provide either TEXT args or --file, not both.");
    return EXIT_ERROR;
  }
  if (!opts.file && !inline) {
    program.help({ error: true });
  }

  const pipeline = buildPipeline(opts);
  try {
    return opts.file ? await handleBatch(pipeline, opts.file, opts) : handleSingle(pipeline, inline, opts);
  } finally {
    pipeline.dispose();
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(`[error] ${describeError(err)}`);
    process.exit(EXIT_ERROR);
  },
);
