/**
 * LLM Service Tests
 *
 * Provider selection only; reads the keys from the environment passed in and
 * makes no network calls.
 */

import { describe, it, expect } from "vitest";
import { getLLMAvailability, getProviderOrder } from "./llmService";

const BOTH_KEYS = { OPENAI_API_KEY: "test-key", ANTHROPIC_API_KEY: "test-key" };

describe("getLLMAvailability", () => {
  it("reports which provider keys are set", () => {
    expect(getLLMAvailability({ ANTHROPIC_API_KEY: "test-key" })).toEqual({ openai: false, anthropic: true });
    expect(getLLMAvailability({ OPENAI_API_KEY: "" })).toEqual({ openai: false, anthropic: false });
  });
});

describe("getProviderOrder", () => {
  it("puts the preferred provider first and keeps the other as fallback", () => {
    expect(getProviderOrder("anthropic", BOTH_KEYS)).toEqual(["anthropic", "openai"]);
    expect(getProviderOrder("openai", BOTH_KEYS)).toEqual(["openai", "anthropic"]);
  });

  it("tries OpenAI first on auto", () => {
    expect(getProviderOrder("auto", BOTH_KEYS)).toEqual(["openai", "anthropic"]);
  });

  it("skips a preferred provider without a key", () => {
    expect(getProviderOrder("anthropic", { OPENAI_API_KEY: "test-key" })).toEqual(["openai"]);
    expect(getProviderOrder("openai", { ANTHROPIC_API_KEY: "test-key" })).toEqual(["anthropic"]);
  });

  it("throws when no provider key is configured", () => {
    expect(() => getProviderOrder("auto", {})).toThrow("No LLM provider configured");
  });
});
