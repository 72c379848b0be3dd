/**
 * PRIORITY CONTRACT
 *
 * Shared types passed between the extractors, the option evaluator, the format
 * solvers and the exception handler. Everything here is plain data: the engine
 * builds these per question and never persists them.
 */

import type { QuestionFormat } from "@shared/schema";

// ============================================================================
// VITAL SIGNS
// ============================================================================

export const VITAL_SIGNS = [
  "heartRate",
  "respiratoryRate",
  "systolicBp",
  "diastolicBp",
  "temperatureC",
  "temperatureF",
  "oxygenSaturation",
  "bloodGlucose",
] as const;

export type VitalSign = typeof VITAL_SIGNS[number];

/** At most one value per sign. */
export type VitalReadings = Partial<Record<VitalSign, number>>;

export type AgeGroup = "adult" | "pediatric" | "infant";

export type Timeframe = "acute" | "chronic" | "unspecified";

export type PriorityTier = "life_threat" | "urgent" | "routine";

// ============================================================================
// QUESTION INPUT
// ============================================================================

/**
 * What the engine needs from a question. Option order is the insertion order
 * of `options`.
 */
export interface PriorityQuestion {
  id: string;
  stem: string;
  options: Record<string, string>;
  format: QuestionFormat;
  questionType?: string;
}

// ============================================================================
// EXTRACTED CONTEXT
// ============================================================================

export interface IdentifiedPattern {
  id: string;
  name: string;
  tier: PriorityTier;
  /** "trigger" when the knowledge-base rule fired, "named" when the stem names the condition */
  identifiedBy: "trigger" | "named";
}

export interface ClinicalContext {
  medications: Record<string, boolean>;
  conditions: Record<string, boolean>;
  symptoms: string[];
  vitals: VitalReadings;
  isEmergency: boolean;
  timeframe: Timeframe;
  ageGroup: AgeGroup;
  identifiedPatterns: IdentifiedPattern[];
}

// ============================================================================
// OPTION EVALUATION
// ============================================================================

export interface OptionEvaluation {
  score: number;
  isCritical: boolean;
  isNormal: boolean;
  isAbnormal: boolean;
  requiresAction: boolean;
  isContraindicated: boolean;
  addressesPattern: boolean;
  addressesEmergency: boolean;
  isAssessment: boolean;
  reasoning: readonly string[];
  /** Ids of the scoring rules that contributed, used as learning keys */
  firedRules: readonly string[];
}

export interface ScoredOption {
  key: string;
  text: string;
  index: number;
  evaluation: OptionEvaluation;
}

// ============================================================================
// EXCEPTIONS
// ============================================================================

export const EXCEPTION_TYPES = [
  "time_sequence",
  "exclusion",
  "chronic_vs_new",
  "context_specific",
  "red_flag",
] as const;

export type ExceptionType = typeof EXCEPTION_TYPES[number];

export interface ExceptionContext {
  type: ExceptionType;
  confidence: number;
  reasoning: string;
  triggers: string[];
  overrideAnswers?: string[];
}

// ============================================================================
// PREDICTION RESULT
// ============================================================================

export interface PredictionResult {
  questionId: string;
  format: QuestionFormat;
  /** Option keys for single and sata; one comma-joined sequence for ordered */
  answers: string[];
  /** Answer before any exception override */
  baseAnswers: string[];
  options: ScoredOption[];
  context: ClinicalContext;
  detectedExceptions: ExceptionContext[];
  appliedException: ExceptionContext | null;
  /** Rules behind the selected options; the learning keys for this prediction */
  firedRules: string[];
  confidence: number;
  decisionLog: string[];
}

/** Read side of the learning statistics. */
export interface WeightSource {
  getWeight(ruleId: string): number;
}

export const UNIT_WEIGHTS: WeightSource = {
  getWeight: () => 1,
};
