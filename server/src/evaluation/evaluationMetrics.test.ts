import { describe, it, expect } from "vitest";
import { evaluatePredictions, isExactMatch, kendallTau, wilsonInterval, type GradedPrediction } from "./evaluationMetrics";

describe("wilsonInterval", () => {
  it("brackets an even split symmetrically", () => {
    const [lower, upper] = wilsonInterval(5, 10);
    expect(lower).toBeCloseTo(0.2366, 4);
    expect(upper).toBeCloseTo(0.7634, 4);
  });

  it("stays inside [0, 1] at the extremes", () => {
    const [lower, upper] = wilsonInterval(0, 4);
    expect(lower).toBeCloseTo(0, 10);
    expect(upper).toBeCloseTo(0.4899, 4);
    expect(wilsonInterval(10, 10)[1]).toBeLessThanOrEqual(1);
  });

  it("returns [0, 0] for no trials", () => {
    expect(wilsonInterval(0, 0)).toEqual([0, 0]);
  });

  it("supports 90% intervals and rejects unknown levels", () => {
    const [narrowLower] = wilsonInterval(5, 10, 0.9);
    expect(narrowLower).toBeGreaterThan(0.2366);
    expect(() => wilsonInterval(5, 10, 0.8)).toThrow("Unsupported confidence level 0.8");
  });
});

describe("kendallTau", () => {
  it("is 1 for identical and -1 for reversed orderings", () => {
    expect(kendallTau(["A", "B", "C", "D"], ["A", "B", "C", "D"])).toBe(1);
    expect(kendallTau(["D", "C", "B", "A"], ["A", "B", "C", "D"])).toBe(-1);
  });

  it("counts one swapped pair", () => {
    expect(kendallTau(["B", "A", "C", "D"], ["A", "B", "C", "D"])).toBeCloseTo(4 / 6);
  });

  it("is 0 for sequences of different length", () => {
    expect(kendallTau(["A", "B"], ["A", "B", "C"])).toBe(0);
  });
});

describe("isExactMatch", () => {
  it("ignores order for sata answers", () => {
    expect(isExactMatch({ questionId: "q", format: "sata", predicted: ["B", "A"], correct: ["A", "B"] })).toBe(true);
  });

  it("requires the exact sequence for ordered answers", () => {
    expect(isExactMatch({ questionId: "q", format: "ordered", predicted: ["A,B"], correct: ["B,A"] })).toBe(false);
  });
});

describe("evaluatePredictions", () => {
  const items: GradedPrediction[] = [
    { questionId: "q1", format: "single", questionType: "priority", predicted: ["A"], correct: ["A"] },
    { questionId: "q2", format: "single", questionType: "priority", predicted: ["B"], correct: ["C"] },
    { questionId: "q3", format: "sata", questionType: "assessment", predicted: ["A", "B", "D"], correct: ["A", "B", "D"] },
    { questionId: "q4", format: "sata", questionType: "assessment", predicted: ["A", "C"], correct: ["A", "B"] },
    { questionId: "q5", format: "ordered", predicted: ["B,A,C,D"], correct: ["A,B,C,D"] },
  ];
  const metrics = evaluatePredictions(items);

  it("computes overall accuracy across formats", () => {
    expect(metrics.overall.correct).toBe(2);
    expect(metrics.overall.total).toBe(5);
    expect(metrics.overall.accuracy).toBe(0.4);
  });

  it("scores single answers with a confidence interval", () => {
    expect(metrics.byFormat.single).toMatchObject({ correct: 1, total: 2, accuracy: 0.5 });
  });

  it("micro-averages sata precision and recall", () => {
    const sata = metrics.byFormat.sata;
    expect(sata).toMatchObject({ correct: 1, total: 2, exactMatchAccuracy: 0.5 });
    expect(sata?.precision).toBeCloseTo(0.8);
    expect(sata?.recall).toBeCloseTo(0.8);
    expect(sata?.f1).toBeCloseTo(0.8);
  });

  it("averages Kendall tau for ordered answers", () => {
    expect(metrics.byFormat.ordered).toMatchObject({ correct: 0, total: 1, perfectSequenceAccuracy: 0 });
    expect(metrics.byFormat.ordered?.averageKendallTau).toBeCloseTo(4 / 6);
  });

  it("groups by question type, with missing types as unknown", () => {
    expect(Object.keys(metrics.byType)).toEqual(["priority", "assessment", "unknown"]);
    expect(metrics.byType.priority).toMatchObject({ correct: 1, total: 2 });
    expect(metrics.byType.unknown).toMatchObject({ correct: 0, total: 1 });
  });

  it("leaves out formats with no predictions", () => {
    const onlySingle = evaluatePredictions([items[0]]);
    expect(onlySingle.byFormat.sata).toBeUndefined();
    expect(onlySingle.byFormat.ordered).toBeUndefined();
  });

  it("handles an empty batch", () => {
    expect(evaluatePredictions([]).overall).toEqual({ correct: 0, total: 0, accuracy: 0, ciLower: 0, ciUpper: 0 });
  });
});
