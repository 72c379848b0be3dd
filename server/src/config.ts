/**
 * Engine Configuration
 *
 * Scoring sentinels, exception heuristics, learning thresholds, knowledge
 * lookup and storage settings. Defaults live here; environment variables
 * (loaded through dotenv by the server entry point) override them.
 */

import { z } from "zod";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface EngineConfig {
  scoring: {
    /** Targeted intervention for an identified pattern */
    interventionScore: number;
    /** Critical vital or violated hold parameter */
    criticalScore: number;
    /** Abnormal, non-critical vital or an expected finding of an identified pattern */
    abnormalScore: number;
    /** Floor for assessment wording */
    assessmentScore: number;
    /** Taken off a merely abnormal option that also uses assessment wording */
    assessmentDecrement: number;
    contraindicationScore: number;
  };

  exceptions: {
    /** Added per harmful-action pattern when scoring EXCEPT/AVOID options */
    harmPatternWeight: number;
    /** Added for overly aggressive wording (immediately, stat, emergency) */
    aggressiveWordingWeight: number;
    /** Added for new/acute wording on chronic-vs-new questions */
    newOnsetBonus: number;
    /** Added for assessment verbs on chronic-vs-new questions */
    assessmentBonus: number;
    /** A chronic-vs-new override needs a bonus above this */
    chronicOverrideThreshold: number;
  };

  learning: {
    /** Uses before a rule's weight departs from 1.0 */
    minSamples: number;
    /** Report thresholds */
    reportMinPatternUses: number;
    reportMinKeywordOccurrences: number;
  };

  knowledge: {
    enabled: boolean;
    provider: "openai" | "anthropic" | "auto";
    timeoutMs: number;
    /** Terms looked up per question */
    maxTermsPerQuestion: number;
  };

  storage: {
    kind: "memory" | "file" | "database";
    filePath: string;
  };

  debug: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  scoring: {
    interventionScore: 1200,
    criticalScore: 1000,
    abnormalScore: 600,
    assessmentScore: 500,
    assessmentDecrement: 200,
    contraindicationScore: -1000,
  },

  exceptions: {
    harmPatternWeight: 10,
    aggressiveWordingWeight: 5,
    newOnsetBonus: 10,
    assessmentBonus: 5,
    chronicOverrideThreshold: 5,
  },

  learning: {
    minSamples: 10,
    reportMinPatternUses: 5,
    reportMinKeywordOccurrences: 3,
  },

  knowledge: {
    enabled: false,
    provider: "auto",
    timeoutMs: 4000,
    maxTermsPerQuestion: 3,
  },

  storage: {
    kind: "memory",
    filePath: "data/learning-statistics.json",
  },

  debug: false,
};

// ═══════════════════════════════════════════════════════════════════════════════
// PRESETS
// ═══════════════════════════════════════════════════════════════════════════════

export interface ConfigOverrides {
  scoring?: Partial<EngineConfig["scoring"]>;
  exceptions?: Partial<EngineConfig["exceptions"]>;
  learning?: Partial<EngineConfig["learning"]>;
  knowledge?: Partial<EngineConfig["knowledge"]>;
  storage?: Partial<EngineConfig["storage"]>;
  debug?: boolean;
}

export const CONFIG_PRESETS = {
  // Rule-based only, nothing persisted
  offline: {
    knowledge: { enabled: false },
    storage: { kind: "memory" },
  },
  // Decision log on, learning written to a local file
  verbose: {
    debug: true,
    storage: { kind: "file" },
  },
} satisfies Record<string, ConfigOverrides>;

export type ConfigPreset = keyof typeof CONFIG_PRESETS;

// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT
// ═══════════════════════════════════════════════════════════════════════════════

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  ENGINE_PRESET: z.enum(["offline", "verbose"]).optional(),
  ENGINE_DEBUG: booleanFlag.optional(),
  LEARNING_STORE: z.enum(["memory", "file", "database"]).optional(),
  LEARNING_FILE: z.string().min(1).optional(),
  MIN_WEIGHT_SAMPLES: z.coerce.number().int().positive().optional(),
  KNOWLEDGE_LOOKUP_ENABLED: booleanFlag.optional(),
  KNOWLEDGE_PROVIDER: z.enum(["openai", "anthropic", "auto"]).optional(),
  KNOWLEDGE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

export function mergeConfig(base: EngineConfig, overrides: ConfigOverrides): EngineConfig {
  return {
    scoring: { ...base.scoring, ...overrides.scoring },
    exceptions: { ...base.exceptions, ...overrides.exceptions },
    learning: { ...base.learning, ...overrides.learning },
    knowledge: { ...base.knowledge, ...overrides.knowledge },
    storage: { ...base.storage, ...overrides.storage },
    debug: overrides.debug ?? base.debug,
  };
}

/**
 * Build the runtime configuration: defaults, then the named preset, then
 * individual environment overrides. Invalid values are reported and ignored.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    console.warn(
      "[Config] Ignoring invalid environment overrides:",
      parsed.error.errors.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "),
    );
    return DEFAULT_ENGINE_CONFIG;
  }
  const values = parsed.data;

  let config = DEFAULT_ENGINE_CONFIG;
  if (values.ENGINE_PRESET) {
    config = mergeConfig(config, CONFIG_PRESETS[values.ENGINE_PRESET]);
  }

  const knowledge: Partial<EngineConfig["knowledge"]> = {};
  if (values.KNOWLEDGE_LOOKUP_ENABLED !== undefined) knowledge.enabled = values.KNOWLEDGE_LOOKUP_ENABLED;
  if (values.KNOWLEDGE_PROVIDER) knowledge.provider = values.KNOWLEDGE_PROVIDER;
  if (values.KNOWLEDGE_TIMEOUT_MS) knowledge.timeoutMs = values.KNOWLEDGE_TIMEOUT_MS;

  const storage: Partial<EngineConfig["storage"]> = {};
  if (values.LEARNING_STORE) storage.kind = values.LEARNING_STORE;
  if (values.LEARNING_FILE) storage.filePath = values.LEARNING_FILE;

  const learning: Partial<EngineConfig["learning"]> = {};
  if (values.MIN_WEIGHT_SAMPLES) learning.minSamples = values.MIN_WEIGHT_SAMPLES;

  return mergeConfig(config, { debug: values.ENGINE_DEBUG, knowledge, storage, learning });
}
