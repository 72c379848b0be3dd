/**
 * PRIORITY ENGINE
 *
 * Orchestrates one prediction:
 *
 *   stem + options
 *     → clinical context (stem vitals, vocabulary, identified patterns)
 *     → per-option evaluation (scored with the current learned weights)
 *     → format solver (single / sata / ordered)
 *     → exception detection and, for single questions, override
 *     → fired rules of the selected options (learning keys)
 *
 * Synchronous and deterministic for a given knowledge base and weight snapshot.
 */

import type { ClinicalKnowledgeBase } from "../knowledge/clinicalKnowledgeBase";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../config";
import { extractClinicalContext } from "./clinicalContextExtractor";
import { ExceptionHandler } from "./exceptionHandler";
import { solveForFormat } from "./formatSolvers";
import { OptionEvaluator } from "./optionEvaluator";
import {
  UNIT_WEIGHTS,
  type ClinicalContext,
  type ExceptionContext,
  type PredictionResult,
  type PriorityQuestion,
  type ScoredOption,
  type WeightSource,
} from "./priorityContract";

export interface PriorityEngineOptions {
  knowledgeBase: ClinicalKnowledgeBase;
  weights?: WeightSource;
  config?: EngineConfig;
}

// Score margin at which a single-answer prediction reaches full confidence
const CONFIDENCE_SPAN = 1000;

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export class PriorityEngine {
  private readonly knowledgeBase: ClinicalKnowledgeBase;
  private readonly config: EngineConfig;
  private readonly evaluator: OptionEvaluator;
  private readonly exceptions: ExceptionHandler;

  constructor(options: PriorityEngineOptions) {
    this.knowledgeBase = options.knowledgeBase;
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG;
    this.evaluator = new OptionEvaluator(this.knowledgeBase, options.weights ?? UNIT_WEIGHTS, this.config.scoring);
    this.exceptions = new ExceptionHandler(this.config.exceptions);
  }

  // ============================================================================
  // PREDICTION
  // ============================================================================

  predict(question: PriorityQuestion): PredictionResult {
    const decisionLog: string[] = [];
    const trace = (line: string): void => {
      if (this.config.debug) decisionLog.push(line);
    };

    const context = extractClinicalContext(this.knowledgeBase, question.stem);
    trace(describeContext(context));

    const options: ScoredOption[] = Object.entries(question.options).map(([key, text], index) => ({
      key,
      text,
      index,
      evaluation: this.evaluator.evaluate(text, context),
    }));
    for (const option of options) {
      trace(`${option.key} = ${option.evaluation.score} [${option.evaluation.firedRules.join(", ")}]`);
    }

    if (options.length === 0) {
      trace("No options: nothing to answer");
      return {
        questionId: question.id,
        format: question.format,
        answers: [],
        baseAnswers: [],
        options,
        context,
        detectedExceptions: [],
        appliedException: null,
        firedRules: [],
        confidence: 0,
        decisionLog,
      };
    }

    const solved = solveForFormat(question.format, { stem: question.stem, options, context });
    solved.log.forEach(trace);
    const baseAnswers = solved.answers;

    const detectedExceptions = this.exceptions.detect(question);
    let answers = baseAnswers;
    let appliedException: ExceptionContext | null = null;
    let overridden = false;

    if (question.format === "single") {
      const resolution = this.exceptions.apply(question, baseAnswers, detectedExceptions);
      answers = resolution.answers;
      appliedException = resolution.applied;
      overridden = resolution.overridden;
    } else {
      // Multi-answer formats keep the base answer; the exception is still reported
      appliedException = this.exceptions.selectPrimary(detectedExceptions);
    }

    if (appliedException) {
      trace(
        `Exception ${appliedException.type} (${appliedException.confidence}): ${appliedException.reasoning}` +
          (overridden ? ` → ${answers.join(",")}` : ""),
      );
    }

    const firedRules = collectFiredRules(options, selectedKeys(question, answers));
    if (overridden && appliedException) firedRules.push(`exception:${appliedException.type}`);

    const confidence = overridden && appliedException
      ? appliedException.confidence
      : estimateConfidence(question, options, baseAnswers);

    if (this.config.debug) {
      console.log(`[Engine] ${question.id}: ${answers.join(",")} (confidence ${confidence})`);
    }

    return {
      questionId: question.id,
      format: question.format,
      answers,
      baseAnswers,
      options,
      context,
      detectedExceptions,
      appliedException,
      firedRules,
      confidence,
      decisionLog,
    };
  }
}

// ============================================================================
// HELPERS
// ============================================================================

function describeContext(context: ClinicalContext): string {
  const present = (record: Record<string, boolean>): string =>
    Object.keys(record).filter((key) => record[key]).join(", ") || "none";
  const vitals = Object.entries(context.vitals).map(([sign, value]) => `${sign}=${value}`).join(", ") || "none";
  const patterns = context.identifiedPatterns.map((pattern) => pattern.id).join(", ") || "none";
  return (
    `Context: medications [${present(context.medications)}], conditions [${present(context.conditions)}], ` +
    `vitals [${vitals}], patterns [${patterns}], emergency ${context.isEmergency}, ` +
    `timeframe ${context.timeframe}, age ${context.ageGroup}`
  );
}

/** Ordered answers name one key per position; their learning keys come from the first position. */
function selectedKeys(question: PriorityQuestion, answers: string[]): string[] {
  if (question.format !== "ordered") return answers;
  const first = answers[0]?.split(",")[0];
  return first ? [first] : [];
}

function collectFiredRules(options: readonly ScoredOption[], keys: readonly string[]): string[] {
  const rules: string[] = [];
  for (const option of options) {
    if (!keys.includes(option.key)) continue;
    for (const rule of option.evaluation.firedRules) {
      if (!rules.includes(rule)) rules.push(rule);
    }
  }
  return rules;
}

/**
 * single:  score margin between the chosen option and the best alternative
 * sata:    share of selections backed by a positive score
 * ordered: share of adjacent positions separated by a strict score difference
 */
function estimateConfidence(question: PriorityQuestion, options: readonly ScoredOption[], answers: string[]): number {
  switch (question.format) {
    case "single": {
      const chosen = options.find((option) => option.key === answers[0]);
      if (!chosen) return 0;
      const rivals = options.filter((option) => option.key !== chosen.key).map((option) => option.evaluation.score);
      if (rivals.length === 0) return 1;
      const margin = chosen.evaluation.score - Math.max(...rivals);
      return round2(clamp01(0.5 + margin / (2 * CONFIDENCE_SPAN)));
    }
    case "sata": {
      const selected = options.filter((option) => answers.includes(option.key));
      if (selected.length === 0) return 0;
      return round2(selected.filter((option) => option.evaluation.score > 0).length / selected.length);
    }
    case "ordered": {
      const sequence = (answers[0] ?? "").split(",");
      const scores = sequence.flatMap((key) => options.filter((option) => option.key === key).map((option) => option.evaluation.score));
      if (scores.length < 2) return 1;
      let separated = 0;
      for (let i = 1; i < scores.length; i++) {
        if (scores[i - 1] > scores[i]) separated++;
      }
      return round2(separated / (scores.length - 1));
    }
  }
}
