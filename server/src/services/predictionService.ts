/**
 * Prediction Service
 *
 * Wires the engine to its collaborators for the HTTP layer and the CLI:
 * learned weights from the feedback recorder, optional intervention
 * knowledge notes, outcome recording and batch evaluation.
 */

import type { FeedbackRequest, Question } from "@shared/schema";
import { getDb } from "../../db";
import type { EngineConfig } from "../config";
import { PriorityEngine } from "../engine/priorityEngine";
import type { ExceptionContext, PredictionResult, ScoredOption } from "../engine/priorityContract";
import { evaluatePredictions, type EvaluationMetrics, type GradedPrediction } from "../evaluation/evaluationMetrics";
import { loadClinicalKnowledgeBase, type ClinicalKnowledgeBase } from "../knowledge/clinicalKnowledgeBase";
import {
  createInterventionKnowledge,
  extractClinicalTerms,
  type InterventionKnowledge,
} from "../knowledge/interventionKnowledge";
import { FeedbackRecorder, answersMatch, type LearningReport } from "../learning/feedbackRecorder";
import {
  DatabaseLearningStore,
  FileLearningStore,
  MemoryLearningStore,
  type LearningStore,
  type PredictionOutcome,
} from "../learning/learningStore";
import { toPriorityQuestion } from "../questions/questionLoader";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface KnowledgeNote {
  term: string;
  /** First option, chosen ones first, that names the term */
  key: string;
  purpose: string | null;
}

export interface PredictionView {
  questionId: string;
  format: PredictionResult["format"];
  answers: string[];
  baseAnswers: string[];
  confidence: number;
  firedRules: string[];
  appliedException: ExceptionContext | null;
  detectedExceptions: ExceptionContext[];
  /** Per-option evaluations and the decision log, present in debug mode */
  options?: ScoredOption[];
  decisionLog?: string[];
  knowledgeNotes?: KnowledgeNote[];
  outcome?: { wasCorrect: boolean; correct: string[] };
}

export interface PredictOptions {
  record?: boolean;
  enrich?: boolean;
}

export interface EvaluationRun {
  predictions: PredictionView[];
  graded: number;
  ungraded: number;
  metrics: EvaluationMetrics;
}

export interface PredictionServiceDeps {
  config: EngineConfig;
  knowledgeBase: ClinicalKnowledgeBase;
  recorder: FeedbackRecorder;
  knowledge: InterventionKnowledge;
}

export function createLearningStore(settings: EngineConfig["storage"]): LearningStore {
  switch (settings.kind) {
    case "memory":
      return new MemoryLearningStore();
    case "file":
      return new FileLearningStore(settings.filePath);
    case "database":
      return new DatabaseLearningStore(getDb());
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════════════════════

export class PredictionService {
  readonly config: EngineConfig;
  readonly recorder: FeedbackRecorder;
  private readonly engine: PriorityEngine;
  private readonly knowledge: InterventionKnowledge;

  constructor(deps: PredictionServiceDeps) {
    this.config = deps.config;
    this.recorder = deps.recorder;
    this.knowledge = deps.knowledge;
    this.engine = new PriorityEngine({ knowledgeBase: deps.knowledgeBase, weights: deps.recorder, config: deps.config });
  }

  static async create(config: EngineConfig, knowledgeBase = loadClinicalKnowledgeBase()): Promise<PredictionService> {
    const recorder = new FeedbackRecorder(createLearningStore(config.storage), config.learning);
    await recorder.load();
    const knowledge = createInterventionKnowledge(config.knowledge);
    console.log(`[Engine] Ready (learning store: ${recorder.storeKind}, knowledge: ${knowledge.source})`);
    return new PredictionService({ config, knowledgeBase, recorder, knowledge });
  }

  async predict(question: Question, options: PredictOptions = {}): Promise<PredictionView> {
    const result = this.engine.predict(toPriorityQuestion(question));
    const view = this.toView(result);

    if (options.enrich) {
      view.knowledgeNotes = await this.describeInterventions(result);
    }

    if (question.correctAnswers) {
      const outcome = options.record ? this.recordResult(question, result) : null;
      view.outcome = {
        wasCorrect: outcome ? outcome.wasCorrect : this.isCorrect(question, result),
        correct: question.correctAnswers,
      };
      if (outcome) await this.recorder.flush();
    }

    return view;
  }

  async recordFeedback(feedback: FeedbackRequest): Promise<PredictionOutcome> {
    const outcome = this.recorder.record(feedback);
    await this.recorder.flush();
    return outcome;
  }

  async evaluate(questions: readonly Question[], record = false): Promise<EvaluationRun> {
    const predictions: PredictionView[] = [];
    const graded: GradedPrediction[] = [];

    for (const question of questions) {
      const result = this.engine.predict(toPriorityQuestion(question));
      const view = this.toView(result);
      if (question.correctAnswers) {
        graded.push({
          questionId: question.id,
          format: question.format,
          questionType: question.questionType,
          predicted: result.answers,
          correct: question.correctAnswers,
        });
        const outcome = record ? this.recordResult(question, result) : null;
        view.outcome = {
          wasCorrect: outcome ? outcome.wasCorrect : this.isCorrect(question, result),
          correct: question.correctAnswers,
        };
      }
      predictions.push(view);
    }

    if (record) await this.recorder.save();

    return {
      predictions,
      graded: graded.length,
      ungraded: questions.length - graded.length,
      metrics: evaluatePredictions(graded),
    };
  }

  getWeights(): Record<string, number> {
    return this.recorder.getWeights();
  }

  getReport(): LearningReport {
    return this.recorder.buildReport();
  }

  async shutdown(): Promise<void> {
    await this.recorder.save();
  }

  // ─────────────────────────────────────────────────────────────────────────────

  private recordResult(question: Question, result: PredictionResult): PredictionOutcome | null {
    if (!question.correctAnswers) return null;
    return this.recorder.record({
      questionId: question.id,
      questionType: question.questionType,
      format: question.format,
      predicted: result.answers,
      correct: question.correctAnswers,
      patterns: result.firedRules,
      confidence: result.confidence,
      options: question.options,
    });
  }

  private isCorrect(question: Question, result: PredictionResult): boolean {
    if (!question.correctAnswers) return false;
    return answersMatch(question.format, result.answers, question.correctAnswers);
  }

  /** Purpose labels for clinical terms in the options, chosen options first, up to the configured count. */
  private async describeInterventions(result: PredictionResult): Promise<KnowledgeNote[]> {
    const chosen = new Set(result.answers.flatMap((answer) => answer.split(",")));
    const ordered = [
      ...result.options.filter((option) => chosen.has(option.key)),
      ...result.options.filter((option) => !chosen.has(option.key)),
    ];

    const limit = this.config.knowledge.maxTermsPerQuestion;
    const mentions: Array<{ term: string; key: string }> = [];
    for (const option of ordered) {
      for (const term of extractClinicalTerms(option.text)) {
        if (mentions.length < limit && !mentions.some((mention) => mention.term === term)) {
          mentions.push({ term, key: option.key });
        }
      }
    }

    return Promise.all(
      mentions.map(async ({ term, key }): Promise<KnowledgeNote> => {
        try {
          return { term, key, purpose: await this.knowledge.getInterventionPurpose(term) };
        } catch (error) {
          console.warn(`[Knowledge] Lookup failed for "${term}":`, error instanceof Error ? error.message : error);
          return { term, key, purpose: null };
        }
      }),
    );
  }

  private toView(result: PredictionResult): PredictionView {
    const view: PredictionView = {
      questionId: result.questionId,
      format: result.format,
      answers: result.answers,
      baseAnswers: result.baseAnswers,
      confidence: result.confidence,
      firedRules: result.firedRules,
      appliedException: result.appliedException,
      detectedExceptions: result.detectedExceptions,
    };
    if (this.config.debug) {
      view.options = result.options;
      view.decisionLog = result.decisionLog;
    }
    return view;
  }
}
