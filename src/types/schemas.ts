import { z } from "zod";
import { THREAT_CATEGORIES, THREAT_LEVEL_NAMES } from "./threat";

/** Zod enum from a const tuple */
export const CategoryEnum = z.enum(THREAT_CATEGORIES);

export const ThreatLevelEnum = z.enum(THREAT_LEVEL_NAMES);

export const SecurityLevelEnum = z.enum(["LOW", "MEDIUM", "HIGH"]);

const upper = (v: unknown) => (typeof v === "string" ? v.trim().toUpperCase() : v);

/** One pattern rule as written in a rules file */
export const RuleDefinitionSchema = z.object({
  id: z.string().min(1).max(80).regex(/^[a-z0-9][a-z0-9-]*$/, "ids are lowercase kebab-case"),
  category: CategoryEnum,
  level: z.preprocess(upper, ThreatLevelEnum.exclude(["SAFE"])),
  pattern: z.string().min(1).max(500),
  description: z.string().max(200).optional(),
});

export const RuleFileSchema = z.object({
  rules: z.array(RuleDefinitionSchema).min(1),
});

const weight = z.number().min(0).max(1);
const termList = z.array(z.string().trim().min(1).max(100)).min(1);
const runLength = z.number().int().min(2).max(100);

/** Weights and vocabularies for the whole-text heuristic score */
export const HeuristicProfileSchema = z.object({
  keywords: z.object({ weight, cap: weight, terms: termList }),
  roleIndicators: z.object({ weight, cap: weight, terms: termList }),
  punctuationBursts: z.object({ weight, cap: weight, minRun: runLength }),
  commandLead: z.object({ weight, verbs: termList }),
  repetition: z.object({ weight, minRun: runLength }),
  levels: z
    .object({ medium: weight, high: weight })
    .refine((l) => l.high >= l.medium, { message: "high must be at least medium", path: ["high"] }),
});

const listEntry = z.string().trim().min(1, "list entries must not be empty").max(500);

export const SecurityConfigSchema = z
  .object({
    level: z.preprocess(upper, SecurityLevelEnum),
    maxInputLength: z.number().int().positive(),
    rateLimitPerMinute: z.number().int().positive(),
    enableInjectionDetection: z.boolean().default(true),
    enableContentModeration: z.boolean().default(true),
    enableSanitization: z.boolean().default(true),
    blacklist: z.array(listEntry).default([]),
    whitelist: z.array(listEntry).default([]),
    hardInputCap: z.number().int().positive().default(100_000),
    sessionIdleTtlMs: z.number().int().positive().default(10 * 60 * 1000),
  })
  .refine((c) => c.hardInputCap >= c.maxInputLength, {
    message: "hardInputCap must be at least maxInputLength",
    path: ["hardInputCap"],
  });

export type RuleDefinition = z.infer<typeof RuleDefinitionSchema>;
export type HeuristicProfile = z.infer<typeof HeuristicProfileSchema>;
export type SecurityLevel = z.infer<typeof SecurityLevelEnum>;
/** Accepted input shape (defaults still optional) */
export type SecurityConfigInput = z.input<typeof SecurityConfigSchema>;
export type ParsedSecurityConfig = z.infer<typeof SecurityConfigSchema>;
