/**
 * Learning Store
 *
 * Persistence for prediction outcomes and the accumulated pattern/keyword
 * statistics. Three backends:
 *   - memory:   process lifetime only (tests, offline preset)
 *   - file:     statistics JSON plus an append-only outcomes JSONL beside it
 *   - database: PostgreSQL through drizzle-orm
 */

import { promises as fs } from "node:fs";
import path from "node:path";
import { sql } from "drizzle-orm";
import type { NodePgDatabase } from "drizzle-orm/node-postgres";
import { z } from "zod";
import {
  insertPredictionOutcomeSchema,
  keywordStatistics,
  patternStatistics,
  predictionOutcomes,
  type QuestionFormat,
} from "@shared/schema";
import type * as schema from "@shared/schema";
import { withDbRetry } from "../../db";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface PredictionOutcome {
  questionId: string;
  questionType: string;
  format: QuestionFormat;
  predicted: string[];
  correct: string[];
  wasCorrect: boolean;
  patterns: string[];
  confidence: number;
  recordedAt: Date;
}

export const patternCountsSchema = z.object({
  correct: z.number().int().nonnegative(),
  total: z.number().int().nonnegative(),
});

export const keywordCountsSchema = z.object({
  correct: z.number().int().nonnegative(),
  incorrect: z.number().int().nonnegative(),
});

export const learningStatisticsSchema = z.object({
  patterns: z.record(patternCountsSchema),
  keywords: z.record(keywordCountsSchema),
  updatedAt: z.string(),
});

export type PatternCounts = z.infer<typeof patternCountsSchema>;
export type KeywordCounts = z.infer<typeof keywordCountsSchema>;
export type LearningStatistics = z.infer<typeof learningStatisticsSchema>;

export interface LearningStore {
  readonly kind: "memory" | "file" | "database";
  appendOutcome(outcome: PredictionOutcome): Promise<void>;
  /** null when nothing has been saved yet */
  loadStatistics(): Promise<LearningStatistics | null>;
  saveStatistics(statistics: LearningStatistics): Promise<void>;
}

function cloneStatistics(statistics: LearningStatistics): LearningStatistics {
  return learningStatisticsSchema.parse(JSON.parse(JSON.stringify(statistics)));
}

// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY
// ═══════════════════════════════════════════════════════════════════════════════

export class MemoryLearningStore implements LearningStore {
  readonly kind = "memory" as const;
  private readonly outcomes: PredictionOutcome[] = [];
  private statistics: LearningStatistics | null = null;

  async appendOutcome(outcome: PredictionOutcome): Promise<void> {
    this.outcomes.push({ ...outcome, predicted: [...outcome.predicted], correct: [...outcome.correct], patterns: [...outcome.patterns] });
  }

  async loadStatistics(): Promise<LearningStatistics | null> {
    return this.statistics ? cloneStatistics(this.statistics) : null;
  }

  async saveStatistics(statistics: LearningStatistics): Promise<void> {
    this.statistics = cloneStatistics(statistics);
  }

  getOutcomes(): readonly PredictionOutcome[] {
    return this.outcomes;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// FILE
// ═══════════════════════════════════════════════════════════════════════════════

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class FileLearningStore implements LearningStore {
  readonly kind = "file" as const;
  readonly outcomesPath: string;

  constructor(readonly statisticsPath: string, outcomesPath?: string) {
    const parsed = path.parse(statisticsPath);
    this.outcomesPath = outcomesPath ?? path.join(parsed.dir, `${parsed.name}.outcomes.jsonl`);
  }

  async appendOutcome(outcome: PredictionOutcome): Promise<void> {
    await fs.mkdir(path.dirname(this.outcomesPath), { recursive: true });
    const line = JSON.stringify({ ...outcome, recordedAt: outcome.recordedAt.toISOString() });
    await fs.appendFile(this.outcomesPath, `${line}\n`, "utf-8");
  }

  async loadStatistics(): Promise<LearningStatistics | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.statisticsPath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    const parsed = learningStatisticsSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Invalid learning statistics in ${this.statisticsPath}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async saveStatistics(statistics: LearningStatistics): Promise<void> {
    await fs.mkdir(path.dirname(this.statisticsPath), { recursive: true });
    // Write then rename so a crash never leaves a truncated file behind
    const temporary = `${this.statisticsPath}.tmp`;
    await fs.writeFile(temporary, JSON.stringify(statistics, null, 2), "utf-8");
    await fs.rename(temporary, this.statisticsPath);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE
// ═══════════════════════════════════════════════════════════════════════════════

export type LearningDatabase = NodePgDatabase<typeof schema>;

export class DatabaseLearningStore implements LearningStore {
  readonly kind = "database" as const;

  constructor(private readonly db: LearningDatabase) {}

  async appendOutcome(outcome: PredictionOutcome): Promise<void> {
    const row: typeof predictionOutcomes.$inferInsert = { ...outcome };
    const validated = insertPredictionOutcomeSchema.safeParse(row);
    if (!validated.success) {
      throw new Error(`Invalid prediction outcome for ${outcome.questionId}: ${validated.error.message}`);
    }

    await withDbRetry(
      async () => {
        await this.db.insert(predictionOutcomes).values(row);
      },
      { operationName: "append prediction outcome" },
    );
  }

  async loadStatistics(): Promise<LearningStatistics | null> {
    const [patternRows, keywordRows] = await withDbRetry(
      () => Promise.all([this.db.select().from(patternStatistics), this.db.select().from(keywordStatistics)]),
      { operationName: "load learning statistics" },
    );
    if (patternRows.length === 0 && keywordRows.length === 0) return null;

    const statistics: LearningStatistics = { patterns: {}, keywords: {}, updatedAt: new Date(0).toISOString() };
    let latest = 0;
    for (const row of patternRows) {
      statistics.patterns[row.pattern] = { correct: row.correct, total: row.total };
      latest = Math.max(latest, row.updatedAt.getTime());
    }
    for (const row of keywordRows) {
      statistics.keywords[row.keyword] = { correct: row.correct, incorrect: row.incorrect };
      latest = Math.max(latest, row.updatedAt.getTime());
    }
    statistics.updatedAt = new Date(latest).toISOString();
    return statistics;
  }

  async saveStatistics(statistics: LearningStatistics): Promise<void> {
    const updatedAt = new Date(statistics.updatedAt);
    const patternRows = Object.entries(statistics.patterns).map(([pattern, counts]) => ({ pattern, ...counts, updatedAt }));
    const keywordRows = Object.entries(statistics.keywords).map(([keyword, counts]) => ({ keyword, ...counts, updatedAt }));

    await withDbRetry(
      () =>
        this.db.transaction(async (tx) => {
          if (patternRows.length > 0) {
            await tx
              .insert(patternStatistics)
              .values(patternRows)
              .onConflictDoUpdate({
                target: patternStatistics.pattern,
                set: {
                  correct: sql`excluded.correct`,
                  total: sql`excluded.total`,
                  updatedAt: sql`excluded.updated_at`,
                },
              });
          }
          if (keywordRows.length > 0) {
            await tx
              .insert(keywordStatistics)
              .values(keywordRows)
              .onConflictDoUpdate({
                target: keywordStatistics.keyword,
                set: {
                  correct: sql`excluded.correct`,
                  incorrect: sql`excluded.incorrect`,
                  updatedAt: sql`excluded.updated_at`,
                },
              });
          }
        }),
      { operationName: "save learning statistics" },
    );
  }
}
