/**
 * Feedback Recorder
 *
 * Tracks graded predictions per fired rule and turns the success rate into a
 * multiplicative weight the option evaluator applies to its sentinels:
 *
 *   weight = 0.5 + 0.5 × (correct / total)   once total ≥ minSamples
 *   weight = 1.0                              otherwise
 *
 * Counter updates happen synchronously inside record(); store writes are
 * queued behind each other so concurrent requests never interleave them.
 */

import type { QuestionFormat } from "@shared/schema";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../config";
import type { WeightSource } from "../engine/priorityContract";
import {
  MemoryLearningStore,
  type KeywordCounts,
  type LearningStatistics,
  type LearningStore,
  type PatternCounts,
  type PredictionOutcome,
} from "./learningStore";

export interface FeedbackInput {
  questionId: string;
  questionType?: string;
  format: QuestionFormat;
  predicted: string[];
  correct: string[];
  patterns: string[];
  confidence: number;
  /** Option texts, used to learn keyword associations from mistakes */
  options?: Record<string, string>;
}

export interface LearningReport {
  generatedAt: string;
  totalPredictions: number;
  correctPredictions: number;
  patterns: Array<{ pattern: string; successRate: number; uses: number; weight: number }>;
  keywords: Array<{ keyword: string; reliability: number; occurrences: number }>;
}

const KEYWORD_PATTERN = /\b(\w+(?:ing|ed|ion|ment|ure|sis|tic))\b/g;
const REPORT_LIMIT = 10;

function extractKeywords(text: string): string[] {
  return Array.from(text.toLowerCase().matchAll(KEYWORD_PATTERN), (match) => match[1]);
}

/** Set equality for single/sata answers; exact sequence for ordered answers. */
export function answersMatch(format: QuestionFormat, predicted: readonly string[], correct: readonly string[]): boolean {
  if (format === "ordered") return predicted.join(",") === correct.join(",");
  const expected = new Set(correct);
  const given = new Set(predicted);
  return given.size === expected.size && [...given].every((key) => expected.has(key));
}

export class FeedbackRecorder implements WeightSource {
  private patterns = new Map<string, PatternCounts>();
  private keywords = new Map<string, KeywordCounts>();
  private totalPredictions = 0;
  private correctPredictions = 0;
  private pending: Promise<void> = Promise.resolve();
  private writeError: unknown = null;

  constructor(
    private readonly store: LearningStore = new MemoryLearningStore(),
    private readonly settings: EngineConfig["learning"] = DEFAULT_ENGINE_CONFIG.learning,
  ) {}

  get storeKind(): LearningStore["kind"] {
    return this.store.kind;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // LOAD / SAVE
  // ═══════════════════════════════════════════════════════════════════════════

  /** Missing or unreadable statistics mean no prior learning. */
  async load(): Promise<void> {
    let statistics: LearningStatistics | null = null;
    try {
      statistics = await this.store.loadStatistics();
    } catch (error) {
      console.warn(
        `[Learning] Could not load statistics from ${this.store.kind} store, starting fresh:`,
        error instanceof Error ? error.message : error,
      );
    }
    if (!statistics) return;

    this.patterns = new Map(Object.entries(statistics.patterns).map(([pattern, counts]) => [pattern, { ...counts }]));
    this.keywords = new Map(Object.entries(statistics.keywords).map(([keyword, counts]) => [keyword, { ...counts }]));
    console.log(`[Learning] Loaded ${this.patterns.size} pattern and ${this.keywords.size} keyword statistics`);
  }

  snapshot(): LearningStatistics {
    return {
      patterns: Object.fromEntries([...this.patterns].map(([pattern, counts]) => [pattern, { ...counts }])),
      keywords: Object.fromEntries([...this.keywords].map(([keyword, counts]) => [keyword, { ...counts }])),
      updatedAt: new Date().toISOString(),
    };
  }

  async save(): Promise<void> {
    const statistics = this.snapshot();
    this.enqueue(() => this.store.saveStatistics(statistics));
    await this.flush();
  }

  /** Wait for queued store writes; rethrows the first write failure since the last flush. */
  async flush(): Promise<void> {
    await this.pending;
    if (this.writeError !== null) {
      const error = this.writeError;
      this.writeError = null;
      throw error;
    }
  }

  private enqueue(write: () => Promise<void>): void {
    this.pending = this.pending.then(write).catch((error: unknown) => {
      console.error("[Learning] Store write failed:", error instanceof Error ? error.message : error);
      if (this.writeError === null) this.writeError = error;
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // RECORDING
  // ═══════════════════════════════════════════════════════════════════════════

  record(input: FeedbackInput): PredictionOutcome {
    const outcome: PredictionOutcome = {
      questionId: input.questionId,
      questionType: input.questionType ?? "unknown",
      format: input.format,
      predicted: [...input.predicted],
      correct: [...input.correct],
      wasCorrect: answersMatch(input.format, input.predicted, input.correct),
      patterns: [...new Set(input.patterns)],
      confidence: input.confidence,
      recordedAt: new Date(),
    };

    this.totalPredictions++;
    if (outcome.wasCorrect) this.correctPredictions++;

    for (const pattern of outcome.patterns) {
      const counts = this.patterns.get(pattern) ?? { correct: 0, total: 0 };
      counts.total++;
      if (outcome.wasCorrect) counts.correct++;
      this.patterns.set(pattern, counts);
    }

    if (!outcome.wasCorrect && input.options) {
      this.learnFromMistake(input.options, input.predicted, input.correct, input.format);
    }

    this.enqueue(() => this.store.appendOutcome(outcome));
    return outcome;
  }

  /**
   * Keywords of the correct options count toward "correct"; keywords of options
   * chosen wrongly count toward "incorrect". Ordered answers are credited per
   * position: where the sequences differ, the key that belonged there is correct
   * and the key placed there is incorrect.
   */
  learnFromMistake(
    options: Record<string, string>,
    predicted: readonly string[],
    correct: readonly string[],
    format: QuestionFormat = "single",
  ): void {
    const correctKeys = correct.flatMap((answer) => answer.split(","));
    const predictedKeys = predicted.flatMap((answer) => answer.split(","));

    if (format === "ordered") {
      correctKeys.forEach((key, position) => {
        const placed = predictedKeys[position];
        if (placed === key) return;
        this.bumpOption(options, key, "correct");
        if (placed !== undefined) this.bumpOption(options, placed, "incorrect");
      });
      return;
    }

    for (const key of correctKeys) this.bumpOption(options, key, "correct");
    for (const key of predictedKeys) {
      if (!correctKeys.includes(key)) this.bumpOption(options, key, "incorrect");
    }
  }

  private bumpOption(options: Record<string, string>, key: string, field: keyof KeywordCounts): void {
    const text = options[key];
    if (text === undefined) return;
    for (const keyword of extractKeywords(text)) this.bumpKeyword(keyword, field);
  }

  private bumpKeyword(keyword: string, field: keyof KeywordCounts): void {
    const counts = this.keywords.get(keyword) ?? { correct: 0, incorrect: 0 };
    counts[field]++;
    this.keywords.set(keyword, counts);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // WEIGHTS
  // ═══════════════════════════════════════════════════════════════════════════

  getWeight(ruleId: string): number {
    const counts = this.patterns.get(ruleId);
    if (!counts || counts.total < this.settings.minSamples) return 1;
    return 0.5 + 0.5 * (counts.correct / counts.total);
  }

  getWeights(): Record<string, number> {
    const weights: Record<string, number> = {};
    for (const pattern of this.patterns.keys()) weights[pattern] = this.getWeight(pattern);
    return weights;
  }

  getPatternCounts(ruleId: string): PatternCounts | undefined {
    const counts = this.patterns.get(ruleId);
    return counts ? { ...counts } : undefined;
  }

  getKeywordCounts(keyword: string): KeywordCounts | undefined {
    const counts = this.keywords.get(keyword);
    return counts ? { ...counts } : undefined;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // REPORT
  // ═══════════════════════════════════════════════════════════════════════════

  /** Top patterns by success rate and top keywords by reliability, ten of each. */
  buildReport(): LearningReport {
    const patterns = [...this.patterns]
      .filter(([, counts]) => counts.total > this.settings.reportMinPatternUses)
      .map(([pattern, counts]) => ({
        pattern,
        successRate: counts.correct / counts.total,
        uses: counts.total,
        weight: this.getWeight(pattern),
      }))
      .sort((a, b) => b.successRate - a.successRate)
      .slice(0, REPORT_LIMIT);

    const keywords = [...this.keywords]
      .map(([keyword, counts]) => ({ keyword, counts, occurrences: counts.correct + counts.incorrect }))
      .filter((entry) => entry.occurrences > this.settings.reportMinKeywordOccurrences)
      .map((entry) => ({
        keyword: entry.keyword,
        reliability: entry.counts.correct / entry.occurrences,
        occurrences: entry.occurrences,
      }))
      .sort((a, b) => b.reliability - a.reliability)
      .slice(0, REPORT_LIMIT);

    return {
      generatedAt: new Date().toISOString(),
      totalPredictions: this.totalPredictions,
      correctPredictions: this.correctPredictions,
      patterns,
      keywords,
    };
  }
}
