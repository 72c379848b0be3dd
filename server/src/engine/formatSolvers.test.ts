import { describe, it, expect } from "vitest";
import { loadClinicalKnowledgeBase } from "../knowledge/clinicalKnowledgeBase";
import { extractClinicalContext } from "./clinicalContextExtractor";
import {
  compareScoredOptions,
  detectEmergency,
  isCorrectTeachingPoint,
  rankOptions,
  solveOrdered,
  solveSata,
  solveSingle,
} from "./formatSolvers";
import type { OptionEvaluation, ScoredOption } from "./priorityContract";

const kb = loadClinicalKnowledgeBase();

function scored(key: string, text: string, index: number, overrides: Partial<OptionEvaluation> = {}): ScoredOption {
  return {
    key,
    text,
    index,
    evaluation: {
      score: 0,
      isCritical: false,
      isNormal: false,
      isAbnormal: false,
      requiresAction: false,
      isContraindicated: false,
      addressesPattern: false,
      addressesEmergency: false,
      isAssessment: false,
      reasoning: [],
      firedRules: [],
      ...overrides,
    },
  };
}

describe("compareScoredOptions", () => {
  it("breaks score ties by critical, then action, then option order", () => {
    const options = [
      scored("A", "first", 0, { score: 500 }),
      scored("B", "second", 1, { score: 500, requiresAction: true }),
      scored("C", "third", 2, { score: 500, isCritical: true }),
      scored("D", "fourth", 3, { score: 500 }),
      scored("E", "fifth", 4, { score: 700 }),
    ];
    expect(rankOptions(options).map((option) => option.key)).toEqual(["E", "C", "B", "A", "D"]);
  });

  it("orders a higher score first regardless of flags", () => {
    const low = scored("A", "low", 0, { score: 100, isCritical: true });
    const high = scored("B", "high", 1, { score: 200 });
    expect(compareScoredOptions(low, high)).toBeGreaterThan(0);
  });
});

describe("solveSingle", () => {
  const hypoglycemiaStem = "A client with diabetes reports feeling shaky and sweaty. What should the nurse do first?";
  const context = extractClinicalContext(kb, hypoglycemiaStem);

  it("prefers the emergency intervention over the top score", () => {
    const outcome = solveSingle({
      stem: hypoglycemiaStem,
      context,
      options: [
        scored("A", "Check blood glucose level", 0, { score: 650 }),
        scored("B", "Give 15 grams of simple carbohydrates", 1, { requiresAction: true }),
      ],
    });
    expect(outcome.answers).toEqual(["B"]);
    expect(outcome.log).toEqual(["Emergency (hypoglycemia): intervention B preferred over raw top score"]);
  });

  it("skips a contraindicated intervention", () => {
    const outcome = solveSingle({
      stem: hypoglycemiaStem,
      context,
      options: [
        scored("A", "Check blood glucose level", 0, { score: 650 }),
        scored("B", "Give 15 grams of simple carbohydrates", 1, { score: -1000, isContraindicated: true }),
      ],
    });
    expect(outcome.answers).toEqual(["A"]);
  });

  it("falls back to the top score when no option matches the emergency", () => {
    const outcome = solveSingle({
      stem: hypoglycemiaStem,
      context,
      options: [scored("A", "Check blood glucose level", 0, { score: 650 }), scored("B", "Call the physician", 1)],
    });
    expect(outcome.answers).toEqual(["A"]);
    expect(outcome.log).toEqual([
      "Emergency (hypoglycemia) detected but no matching intervention option",
      "Selected A with score 650",
    ]);
  });

  it("returns no answer without options", () => {
    expect(solveSingle({ stem: hypoglycemiaStem, context, options: [] }).answers).toEqual([]);
  });
});

describe("detectEmergency", () => {
  it("recognises hypoglycemia from a stem glucose below 70", () => {
    const stem = "Blood glucose is 55 mg/dL.";
    expect(detectEmergency(stem, extractClinicalContext(kb, stem))?.type).toBe("hypoglycemia");
  });

  it("recognises cardiac arrest wording", () => {
    const stem = "The nurse finds a client unresponsive in bed.";
    expect(detectEmergency(stem, extractClinicalContext(kb, stem))?.type).toBe("cardiac_arrest");
  });

  it("returns null for a routine stem", () => {
    const stem = "Which client should the nurse see after lunch?";
    expect(detectEmergency(stem, extractClinicalContext(kb, stem))).toBeNull();
  });
});

describe("solveSata", () => {
  const stem = "Which findings should the nurse report? Select all that apply.";
  const context = extractClinicalContext(kb, stem);

  it("selects every positively scored option", () => {
    const outcome = solveSata({
      stem,
      context,
      options: [
        scored("A", "Shakiness", 0, { score: 600 }),
        scored("B", "Confusion", 1, { score: 600 }),
        scored("C", "Polyuria", 2),
        scored("D", "Diaphoresis", 3, { score: 600 }),
      ],
    });
    expect(outcome.answers).toEqual(["A", "B", "D"]);
  });

  it("selects nursing actions that are not contraindicated", () => {
    const outcome = solveSata({
      stem,
      context,
      options: [
        scored("A", "Monitor intake and output", 0),
        scored("B", "Document the findings", 1, { isContraindicated: true, score: -1000 }),
        scored("C", "Warm skin", 2),
        scored("D", "Report new confusion", 3, { score: 900 }),
      ],
    });
    expect(outcome.answers).toEqual(["A", "D"]);
  });

  it("tops up to two selections", () => {
    const outcome = solveSata({
      stem,
      context,
      options: [scored("A", "Fever", 0, { score: 500 }), scored("B", "Warm skin", 1), scored("C", "Pink nail beds", 2)],
    });
    expect(outcome.answers).toEqual(["A", "B"]);
    expect(outcome.log).toContain("SATA added B: minimum of 2 selections");
  });

  it("keeps correct teaching points on teaching stems", () => {
    const teachingStem = "Which statements indicate the teaching was effective? Select all that apply.";
    const outcome = solveSata({
      stem: teachingStem,
      context: extractClinicalContext(kb, teachingStem),
      options: [
        scored("A", "I will weigh myself daily", 0),
        scored("B", "I can skip my diuretic if I feel fine", 1),
        scored("C", "I will take my medication as prescribed", 2),
      ],
    });
    expect(outcome.answers).toEqual(["A", "C"]);
  });
});

describe("isCorrectTeachingPoint", () => {
  it("rejects a statement with a negative pattern even if it sounds positive", () => {
    expect(isCorrectTeachingPoint("I will inject in the same spot each time")).toBe(false);
  });

  it("accepts a statement with a positive pattern", () => {
    expect(isCorrectTeachingPoint("I should report a weight gain of 3 pounds")).toBe(true);
  });

  it("rejects a statement with neither", () => {
    expect(isCorrectTeachingPoint("I love my garden")).toBe(false);
  });
});

describe("solveOrdered", () => {
  it("orders every key by descending score, keeping option order on ties", () => {
    const context = extractClinicalContext(kb, "In what order should the nurse act?");
    const outcome = solveOrdered({
      stem: "In what order should the nurse act?",
      context,
      options: [
        scored("A", "Document", 0),
        scored("B", "Open the airway", 1, { score: 900 }),
        scored("C", "Check for breathing", 2, { score: 900 }),
        scored("D", "Call for help", 3, { score: 100 }),
      ],
    });
    expect(outcome.answers).toEqual(["B,C,D,A"]);
    expect(outcome.log).toEqual(["Ordered by score: B > C > D > A"]);
  });
});
