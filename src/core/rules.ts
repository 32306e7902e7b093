import { z } from "zod";

import defaultRuleFile from "../data/default-rules.json";
import { RuleDefinitionSchema, RuleFileSchema, type RuleDefinition } from "../types/schemas";
import { ThreatLevel, type ThreatCategory } from "../types/threat";
import { ConfigurationError } from "./errors";

export interface Rule {
  readonly id: string;
  readonly category: ThreatCategory;
  readonly level: ThreatLevel;
  /** Compiled without the `g` flag, so `exec` keeps no state between calls. */
  readonly regex: RegExp;
  readonly description?: string;
}

function compile(def: RuleDefinition): Rule {
  let regex: RegExp;
  try {
    regex = new RegExp(def.pattern, "iu");
  } catch (err) {
    throw new ConfigurationError(`rule "${def.id}" has an invalid pattern`, { pattern: def.pattern }, err);
  }
  return Object.freeze({
    id: def.id,
    category: def.category,
    level: ThreatLevel[def.level],
    regex,
    description: def.description,
  });
}

function parseDefinitions(input: unknown): RuleDefinition[] {
  const parsed = z.array(RuleDefinitionSchema).safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError("invalid rule definitions", parsed.error.flatten());
  }
  return parsed.data;
}

/**
 * Immutable, shareable set of pattern rules. Adding rules builds a new set;
 * detectors holding the old one keep working against it.
 */
export class RuleSet {
  readonly rules: readonly Rule[];

  private constructor(rules: Rule[]) {
    this.rules = Object.freeze(rules);
    Object.freeze(this);
  }

  static fromDefinitions(input: unknown): RuleSet {
    const defs = parseDefinitions(input);
    const seen = new Set<string>();
    for (const d of defs) {
      if (seen.has(d.id)) throw new ConfigurationError(`duplicate rule id "${d.id}"`);
      seen.add(d.id);
    }
    return new RuleSet(defs.map(compile));
  }

  /** Parses a rules document (`{"rules": [...]}`) such as a user-supplied file. */
  static fromJson(source: string): RuleSet {
    let doc: unknown;
    try {
      doc = JSON.parse(source);
    } catch (err) {
      throw new ConfigurationError("rules file is not valid JSON", undefined, err);
    }
    const parsed = RuleFileSchema.safeParse(doc);
    if (!parsed.success) {
      throw new ConfigurationError("invalid rules file", parsed.error.flatten());
    }
    return RuleSet.fromDefinitions(parsed.data.rules);
  }

  static defaults(): RuleSet {
    return DEFAULT_RULES;
  }

  /** New set with `input` appended; ids must stay unique. */
  extend(input: unknown): RuleSet {
    return this.merge(RuleSet.fromDefinitions(input));
  }

  merge(other: RuleSet): RuleSet {
    const taken = new Set(this.rules.map((r) => r.id));
    for (const r of other.rules) {
      if (taken.has(r.id)) throw new ConfigurationError(`duplicate rule id "${r.id}"`);
    }
    return new RuleSet([...this.rules, ...other.rules]);
  }

  get size(): number {
    return this.rules.length;
  }
}

const DEFAULT_RULES = RuleSet.fromDefinitions(defaultRuleFile.rules);
