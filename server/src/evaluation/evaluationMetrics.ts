/**
 * EVALUATION METRICS
 *
 * Scores a batch of predictions against known answers:
 *   - single:  accuracy with a Wilson score interval
 *   - sata:    exact-match accuracy plus micro-averaged precision, recall, F1
 *   - ordered: perfect-sequence accuracy plus mean Kendall tau
 * and an overall accuracy across formats.
 */

import type { QuestionFormat } from "@shared/schema";

export interface GradedPrediction {
  questionId: string;
  format: QuestionFormat;
  questionType?: string;
  predicted: string[];
  correct: string[];
}

export interface ProportionSummary {
  correct: number;
  total: number;
  accuracy: number;
  ciLower: number;
  ciUpper: number;
}

export interface SataSummary {
  correct: number;
  total: number;
  exactMatchAccuracy: number;
  precision: number;
  recall: number;
  f1: number;
}

export interface OrderedSummary {
  correct: number;
  total: number;
  perfectSequenceAccuracy: number;
  averageKendallTau: number;
}

export interface EvaluationMetrics {
  overall: ProportionSummary;
  byFormat: {
    single?: ProportionSummary;
    sata?: SataSummary;
    ordered?: OrderedSummary;
  };
  byType: Record<string, ProportionSummary>;
}

// Two-sided standard normal quantiles
const Z_SCORES: Record<string, number> = {
  "0.9": 1.6448536269514722,
  "0.95": 1.959963984540054,
  "0.99": 2.5758293035489004,
};

// ============================================================================
// STATISTICS
// ============================================================================

export function wilsonInterval(successes: number, trials: number, confidence = 0.95): [number, number] {
  if (trials === 0) return [0, 0];
  const z = Z_SCORES[String(confidence)];
  if (z === undefined) {
    throw new Error(`Unsupported confidence level ${confidence}; use 0.9, 0.95 or 0.99`);
  }

  const pHat = successes / trials;
  const denominator = 1 + (z * z) / trials;
  const center = (pHat + (z * z) / (2 * trials)) / denominator;
  const margin = (z * Math.sqrt((pHat * (1 - pHat)) / trials + (z * z) / (4 * trials * trials))) / denominator;
  return [Math.max(0, center - margin), Math.min(1, center + margin)];
}

/** Kendall's tau between two orderings of the same keys; 0 for mismatched or short sequences. */
export function kendallTau(first: readonly string[], second: readonly string[]): number {
  const n = first.length;
  if (n !== second.length || n < 2) return 0;

  const positionInSecond = new Map(second.map((key, index) => [key, index]));
  let concordant = 0;
  let discordant = 0;

  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      const a = positionInSecond.get(first[i]);
      const b = positionInSecond.get(first[j]);
      if (a === undefined || b === undefined) continue;
      if (a < b) concordant++;
      else discordant++;
    }
  }

  return (concordant - discordant) / ((n * (n - 1)) / 2);
}

function proportion(correct: number, total: number): ProportionSummary {
  const [ciLower, ciUpper] = wilsonInterval(correct, total);
  return { correct, total, accuracy: total > 0 ? correct / total : 0, ciLower, ciUpper };
}

function sameSet(a: readonly string[], b: readonly string[]): boolean {
  const left = new Set(a);
  const right = new Set(b);
  return left.size === right.size && [...left].every((key) => right.has(key));
}

function sequenceOf(answers: readonly string[]): string[] {
  return answers.length > 0 ? answers[0].split(",") : [];
}

export function isExactMatch(item: GradedPrediction): boolean {
  if (item.format === "ordered") return sequenceOf(item.predicted).join(",") === sequenceOf(item.correct).join(",");
  return sameSet(item.predicted, item.correct);
}

// ============================================================================
// PER FORMAT
// ============================================================================

function evaluateSingle(items: readonly GradedPrediction[]): ProportionSummary {
  return proportion(items.filter(isExactMatch).length, items.length);
}

function evaluateSata(items: readonly GradedPrediction[]): SataSummary {
  let truePositives = 0;
  let falsePositives = 0;
  let falseNegatives = 0;
  let exact = 0;

  for (const item of items) {
    const predicted = new Set(item.predicted);
    const correct = new Set(item.correct);
    if (sameSet(item.predicted, item.correct)) exact++;
    for (const key of predicted) {
      if (correct.has(key)) truePositives++;
      else falsePositives++;
    }
    for (const key of correct) {
      if (!predicted.has(key)) falseNegatives++;
    }
  }

  const precision = truePositives + falsePositives > 0 ? truePositives / (truePositives + falsePositives) : 0;
  const recall = truePositives + falseNegatives > 0 ? truePositives / (truePositives + falseNegatives) : 0;
  const f1 = precision + recall > 0 ? (2 * precision * recall) / (precision + recall) : 0;

  return {
    correct: exact,
    total: items.length,
    exactMatchAccuracy: items.length > 0 ? exact / items.length : 0,
    precision,
    recall,
    f1,
  };
}

function evaluateOrdered(items: readonly GradedPrediction[]): OrderedSummary {
  let perfect = 0;
  const taus: number[] = [];

  for (const item of items) {
    const predicted = sequenceOf(item.predicted);
    const correct = sequenceOf(item.correct);
    if (predicted.join(",") === correct.join(",")) perfect++;
    if (predicted.length === correct.length) taus.push(kendallTau(predicted, correct));
  }

  return {
    correct: perfect,
    total: items.length,
    perfectSequenceAccuracy: items.length > 0 ? perfect / items.length : 0,
    averageKendallTau: taus.length > 0 ? taus.reduce((sum, tau) => sum + tau, 0) / taus.length : 0,
  };
}

// ============================================================================
// BATCH
// ============================================================================

export function evaluatePredictions(items: readonly GradedPrediction[]): EvaluationMetrics {
  const single = items.filter((item) => item.format === "single");
  const sata = items.filter((item) => item.format === "sata");
  const ordered = items.filter((item) => item.format === "ordered");

  const byFormat: EvaluationMetrics["byFormat"] = {};
  if (single.length > 0) byFormat.single = evaluateSingle(single);
  if (sata.length > 0) byFormat.sata = evaluateSata(sata);
  if (ordered.length > 0) byFormat.ordered = evaluateOrdered(ordered);

  const typeGroups = new Map<string, GradedPrediction[]>();
  for (const item of items) {
    const type = item.questionType ?? "unknown";
    typeGroups.set(type, [...(typeGroups.get(type) ?? []), item]);
  }
  const byType: Record<string, ProportionSummary> = {};
  for (const [type, group] of typeGroups) {
    byType[type] = proportion(group.filter(isExactMatch).length, group.length);
  }

  return {
    overall: proportion(items.filter(isExactMatch).length, items.length),
    byFormat,
    byType,
  };
}
