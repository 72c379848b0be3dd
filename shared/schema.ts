import { sql } from "drizzle-orm";
import { pgTable, text, integer, timestamp, boolean, jsonb, serial, real } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// ============== QUESTIONS ==============
export const questionFormatEnum = ["single", "sata", "ordered"] as const;
export type QuestionFormat = typeof questionFormatEnum[number];

export const optionKeySchema = z.string().regex(/^[A-Z]$/, "Option keys are single capital letters");

export const questionSchema = z
  .object({
    id: z.string().min(1),
    stem: z.string().min(1),
    options: z.record(optionKeySchema, z.string().min(1)),
    format: z.enum(questionFormatEnum),
    correctAnswers: z.array(z.string()).optional(),
    questionType: z.string().optional(),
    topic: z.string().optional(),
  })
  .superRefine((question, ctx) => {
    const keys = Object.keys(question.options);
    if (keys.length < 2 || keys.length > 5) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["options"],
        message: "A question carries between 2 and 5 options",
      });
    }
    if (!question.correctAnswers) return;

    if (question.format === "ordered") {
      const sequence = question.correctAnswers.length === 1 ? question.correctAnswers[0].split(",") : [];
      const isPermutation =
        sequence.length === keys.length && keys.every((key) => sequence.includes(key));
      if (!isPermutation) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["correctAnswers"],
          message: "An ordered answer is one comma-joined permutation of every option key",
        });
      }
      return;
    }

    const foreign = question.correctAnswers.filter((key) => !keys.includes(key));
    if (foreign.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["correctAnswers"],
        message: `Correct answers reference unknown option keys: ${foreign.join(", ")}`,
      });
    }
  });

export type Question = z.infer<typeof questionSchema>;

export const questionSetSchema = z.object({
  name: z.string().optional(),
  questions: z.array(questionSchema),
});

export type QuestionSet = z.infer<typeof questionSetSchema>;

// ============== PREDICTION OUTCOMES ==============
export const predictionOutcomes = pgTable("prediction_outcomes", {
  id: serial("id").primaryKey(),
  questionId: text("question_id").notNull(),
  questionType: text("question_type").notNull(),
  format: text("format").notNull(), // single, sata, ordered
  predicted: jsonb("predicted").$type<string[]>().notNull(),
  correct: jsonb("correct").$type<string[]>().notNull(),
  wasCorrect: boolean("was_correct").notNull(),
  patterns: jsonb("patterns").$type<string[]>().notNull(),
  confidence: real("confidence").notNull(),
  recordedAt: timestamp("recorded_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
});

export const insertPredictionOutcomeSchema = createInsertSchema(predictionOutcomes).omit({
  id: true,
});

export type PredictionOutcomeRow = typeof predictionOutcomes.$inferSelect;
export type InsertPredictionOutcome = z.infer<typeof insertPredictionOutcomeSchema>;

// ============== LEARNING STATISTICS ==============
export const patternStatistics = pgTable("pattern_statistics", {
  pattern: text("pattern").primaryKey(),
  correct: integer("correct").notNull().default(0),
  total: integer("total").notNull().default(0),
  updatedAt: timestamp("updated_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
});

export type PatternStatisticsRow = typeof patternStatistics.$inferSelect;

export const keywordStatistics = pgTable("keyword_statistics", {
  keyword: text("keyword").primaryKey(),
  correct: integer("correct").notNull().default(0),
  incorrect: integer("incorrect").notNull().default(0),
  updatedAt: timestamp("updated_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
});

export type KeywordStatisticsRow = typeof keywordStatistics.$inferSelect;

// ============== API REQUESTS ==============
export const predictRequestSchema = z.object({
  question: questionSchema,
  record: z.boolean().default(false),
  enrich: z.boolean().default(false),
});

export type PredictRequest = z.infer<typeof predictRequestSchema>;

export const feedbackRequestSchema = z.object({
  questionId: z.string().min(1),
  questionType: z.string().default("unknown"),
  format: z.enum(questionFormatEnum),
  predicted: z.array(z.string()),
  correct: z.array(z.string()).min(1),
  patterns: z.array(z.string()).default([]),
  confidence: z.number().min(0).max(1).default(0.5),
});

export type FeedbackRequest = z.infer<typeof feedbackRequestSchema>;

export const evaluateRequestSchema = z.object({
  questions: z.array(questionSchema).min(1),
  record: z.boolean().default(false),
});

export type EvaluateRequest = z.infer<typeof evaluateRequestSchema>;
