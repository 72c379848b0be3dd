/**
 * Intervention Knowledge Tests
 *
 * LLM calls are replaced by in-process completion functions.
 */

import { describe, it, expect } from "vitest";
import { DEFAULT_ENGINE_CONFIG } from "../config";
import {
  LlmInterventionKnowledge,
  ResilientInterventionKnowledge,
  RuleInterventionKnowledge,
  categorizePurpose,
  createInterventionKnowledge,
  extractClinicalTerms,
  normalizeTerm,
  type InterventionKnowledge,
} from "./interventionKnowledge";
import type { LLMRequest, LLMResponse } from "./llmService";

function response(content: string): LLMResponse {
  return {
    content,
    provider: "openai",
    model: "test-model",
    usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
    latencyMs: 0,
  };
}

class CountingKnowledge implements InterventionKnowledge {
  readonly source = "stub";
  calls: string[] = [];

  constructor(private readonly answer: (term: string) => Promise<string | null>) {}

  getInterventionPurpose(term: string): Promise<string | null> {
    this.calls.push(term);
    return this.answer(term);
  }
}

describe("normalizeTerm", () => {
  it("trims, lowercases and collapses whitespace", () => {
    expect(normalizeTerm("  High   Fowler's Position ")).toBe("high fowler's position");
  });
});

describe("extractClinicalTerms", () => {
  it("returns normalized terms once, in order of mention", () => {
    expect(extractClinicalTerms("Give Insulin per the COPD protocol, then recheck the insulin dose")).toEqual([
      "insulin",
      "copd",
    ]);
  });

  it("keeps multi-word interventions whole", () => {
    expect(extractClinicalTerms("Place the client in high Fowler's position")).toEqual(["high fowler's position"]);
  });

  it("returns nothing for text without clinical terms", () => {
    expect(extractClinicalTerms("Offer a back rub")).toEqual([]);
  });
});

describe("RuleInterventionKnowledge", () => {
  const rules = new RuleInterventionKnowledge();

  it("recognises known nursing facts", () => {
    expect(rules.lookup("Place the client in high Fowler's position")).toBe("breathing_intervention");
    expect(rules.lookup("Apply sequential compression devices")).toBe("circulation_intervention");
    expect(rules.lookup("Place the client in the left lateral position")).toBe("circulation_intervention");
  });

  it("falls back to keywords", () => {
    expect(rules.lookup("Set the bed alarm")).toBe("safety_intervention");
    expect(rules.lookup("Apply firm pressure to the site")).toBe("circulation_intervention");
  });

  it("returns null for unknown interventions", async () => {
    await expect(rules.getInterventionPurpose("Offer a back rub")).resolves.toBeNull();
  });
});

describe("categorizePurpose", () => {
  it("maps physiological purposes to categories", () => {
    expect(categorizePurpose("Improves oxygen delivery to tissues.")).toBe("breathing_intervention");
    expect(categorizePurpose("Protects the client from injury")).toBe("safety_intervention");
  });

  it("keeps other purposes as snake_case text", () => {
    expect(categorizePurpose("Reduces anxiety.")).toBe("reduces_anxiety");
  });

  it("returns null for an empty answer", () => {
    expect(categorizePurpose("   ")).toBeNull();
  });
});

describe("LlmInterventionKnowledge", () => {
  it("asks about the term and categorizes the answer", async () => {
    const requests: LLMRequest[] = [];
    const knowledge = new LlmInterventionKnowledge("anthropic", async (request) => {
      requests.push(request);
      return response("Improves blood flow to the heart");
    });

    await expect(knowledge.getInterventionPurpose("Trendelenburg position")).resolves.toBe("circulation_intervention");
    expect(requests).toHaveLength(1);
    expect(requests[0].config).toEqual({ provider: "anthropic", maxTokens: 50 });
    expect(requests[0].messages[1].content).toContain("Trendelenburg position");
  });
});

describe("ResilientInterventionKnowledge", () => {
  it("uses the primary answer and caches it per normalized term", async () => {
    const primary = new CountingKnowledge(async () => "reduces_anxiety");
    const knowledge = new ResilientInterventionKnowledge(primary);

    await expect(knowledge.getInterventionPurpose("Guided Imagery")).resolves.toBe("reduces_anxiety");
    await expect(knowledge.getInterventionPurpose("  guided   imagery ")).resolves.toBe("reduces_anxiety");
    expect(primary.calls).toEqual(["guided imagery"]);
    expect(knowledge.cacheSize).toBe(1);
    expect(knowledge.source).toBe("stub+rules");
  });

  it("falls back to the rules when the primary fails", async () => {
    const knowledge = new ResilientInterventionKnowledge(
      new CountingKnowledge(async () => {
        throw new Error("rate limited");
      }),
    );
    await expect(knowledge.getInterventionPurpose("Raise the head of the bed")).resolves.toBe("breathing_intervention");
  });

  it("falls back to the rules when the primary times out", async () => {
    const knowledge = new ResilientInterventionKnowledge(
      new CountingKnowledge(() => new Promise<string | null>(() => undefined)),
      new RuleInterventionKnowledge(),
      10,
    );
    await expect(knowledge.getInterventionPurpose("Apply an ice pack")).resolves.toBe("circulation_intervention");
  });

  it("falls back to the rules when the primary knows nothing", async () => {
    const knowledge = new ResilientInterventionKnowledge(new CountingKnowledge(async () => null));
    await expect(knowledge.getInterventionPurpose("Turn on the bed alarm")).resolves.toBe("safety_intervention");
  });
});

describe("createInterventionKnowledge", () => {
  const settings = DEFAULT_ENGINE_CONFIG.knowledge;

  it("uses the rules when lookups are disabled", () => {
    expect(createInterventionKnowledge({ ...settings, enabled: false }, { OPENAI_API_KEY: "test-key" }).source).toBe(
      "rules",
    );
  });

  it("uses the rules when no provider key is set", () => {
    expect(createInterventionKnowledge({ ...settings, enabled: true }, {}).source).toBe("rules");
  });

  it("wraps the LLM lookup when enabled with a key", () => {
    expect(createInterventionKnowledge({ ...settings, enabled: true }, { OPENAI_API_KEY: "test-key" }).source).toBe(
      "llm+rules",
    );
  });
});
