import { describe, it, expect } from "vitest";
import { DEFAULT_ENGINE_CONFIG, loadEngineConfig, mergeConfig } from "./config";

describe("loadEngineConfig", () => {
  it("returns the defaults for an empty environment", () => {
    expect(loadEngineConfig({})).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it("applies a preset", () => {
    const config = loadEngineConfig({ ENGINE_PRESET: "verbose" });
    expect(config.debug).toBe(true);
    expect(config.storage).toEqual({ kind: "file", filePath: "data/learning-statistics.json" });
  });

  it("lets individual variables override the preset", () => {
    const config = loadEngineConfig({
      ENGINE_PRESET: "verbose",
      ENGINE_DEBUG: "0",
      LEARNING_STORE: "database",
      MIN_WEIGHT_SAMPLES: "5",
      KNOWLEDGE_LOOKUP_ENABLED: "true",
      KNOWLEDGE_PROVIDER: "openai",
      KNOWLEDGE_TIMEOUT_MS: "1500",
    });

    expect(config.debug).toBe(false);
    expect(config.storage.kind).toBe("database");
    expect(config.learning.minSamples).toBe(5);
    expect(config.knowledge).toEqual({ enabled: true, provider: "openai", timeoutMs: 1500, maxTermsPerQuestion: 3 });
  });

  it("ignores an environment with invalid values", () => {
    expect(loadEngineConfig({ ENGINE_DEBUG: "yes", LEARNING_STORE: "database" })).toEqual(DEFAULT_ENGINE_CONFIG);
  });
});

describe("mergeConfig", () => {
  it("merges each section shallowly and leaves the base untouched", () => {
    const merged = mergeConfig(DEFAULT_ENGINE_CONFIG, { scoring: { criticalScore: 900 } });
    expect(merged.scoring.criticalScore).toBe(900);
    expect(merged.scoring.interventionScore).toBe(1200);
    expect(DEFAULT_ENGINE_CONFIG.scoring.criticalScore).toBe(1000);
  });
});
