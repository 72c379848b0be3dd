/**
 * OPTION EVALUATOR
 *
 * Scores one answer option against the question's clinical context. Rules run
 * in a fixed precedence order and may only raise the score, with two
 * exceptions: assessment wording on a merely abnormal finding takes a fixed
 * decrement, and a contraindication forces the score to its negative sentinel.
 *
 *   1. Vitals in the option (critical / abnormal / normal), then Stack of Four
 *      tier keywords for options without vitals, then finding rules and the
 *      expected findings of identified patterns
 *   2. Hold parameters of the medications named in the stem
 *   3. The immediate intervention of an identified pattern
 *   4. Carbohydrates when the stem glucose is below 70
 *   5. Assessment wording
 *   6. Contraindications
 *
 * Each sentinel is scaled by the learned weight of the rule that produced it.
 */

import type { ClinicalKnowledgeBase, VitalClassification } from "../knowledge/clinicalKnowledgeBase";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../config";
import {
  UNIT_WEIGHTS,
  VITAL_SIGNS,
  type ClinicalContext,
  type OptionEvaluation,
  type WeightSource,
} from "./priorityContract";
import {
  ASSESSMENT_PATTERN,
  INTERVENTION_VERB_PATTERN,
  NORMAL_FINDING_PATTERN,
  matchFindings,
  matchTier,
} from "./priorityRules";
import { extractVitalSigns, hasVitalReadings } from "./vitalSignExtractor";

export const HYPOGLYCEMIA_GLUCOSE_BELOW = 70;

const CARBOHYDRATE_PATTERN = /\b(?:carbohydrates?|carbs|15\s*(?:g|grams?)|juice|glucose tablets?|glucose gel|dextrose)\b/i;

class EvaluationDraft {
  score = 0;
  isCritical = false;
  isNormal = false;
  isAbnormal = false;
  requiresAction = false;
  isContraindicated = false;
  addressesPattern = false;
  addressesEmergency = false;
  isAssessment = false;
  readonly reasoning: string[] = [];
  readonly firedRules: string[] = [];

  raise(value: number, ruleId: string, reason: string): void {
    this.score = Math.max(this.score, value);
    this.fire(ruleId, reason);
  }

  fire(ruleId: string, reason: string): void {
    if (!this.firedRules.includes(ruleId)) this.firedRules.push(ruleId);
    this.reasoning.push(reason);
  }

  freeze(): OptionEvaluation {
    return Object.freeze({
      score: this.score,
      isCritical: this.isCritical,
      isNormal: this.isNormal,
      isAbnormal: this.isAbnormal,
      requiresAction: this.requiresAction,
      isContraindicated: this.isContraindicated,
      addressesPattern: this.addressesPattern,
      addressesEmergency: this.addressesEmergency,
      isAssessment: this.isAssessment,
      reasoning: Object.freeze([...this.reasoning]),
      firedRules: Object.freeze([...this.firedRules]),
    });
  }
}

function describe(classification: VitalClassification): string {
  const qualifier = classification.status === "critical" ? "critically" : "abnormally";
  const direction = classification.direction ?? "out of range";
  const variant = classification.variant === "adult" ? "" : ` for ${classification.variant.replace(/_/g, " ")}`;
  return `${classification.label} of ${classification.value} ${classification.unit} is ${qualifier} ${direction}${variant}`;
}

export class OptionEvaluator {
  constructor(
    private readonly knowledgeBase: ClinicalKnowledgeBase,
    private readonly weights: WeightSource = UNIT_WEIGHTS,
    private readonly scoring: EngineConfig["scoring"] = DEFAULT_ENGINE_CONFIG.scoring,
  ) {}

  private weighted(ruleId: string, sentinel: number): number {
    return Math.round(sentinel * this.weights.getWeight(ruleId));
  }

  evaluate(text: string, context: ClinicalContext): OptionEvaluation {
    const draft = new EvaluationDraft();
    const optionVitals = extractVitalSigns(text);

    // ── 1. Vitals, tiers and findings ──────────────────────────────────────
    const classifications = VITAL_SIGNS.flatMap((sign) => {
      const value = optionVitals[sign];
      if (value === undefined) return [];
      return [this.knowledgeBase.classifyVital(sign, value, { ageGroup: context.ageGroup, conditions: context.conditions })];
    });

    const critical = classifications.find((entry) => entry.status === "critical");
    const abnormal = classifications.find((entry) => entry.status === "abnormal");
    if (critical) {
      draft.isCritical = true;
      draft.isAbnormal = true;
      draft.raise(this.weighted("vital:critical", this.scoring.criticalScore), "vital:critical", describe(critical));
    } else if (abnormal) {
      draft.isAbnormal = true;
      draft.raise(this.weighted("vital:abnormal", this.scoring.abnormalScore), "vital:abnormal", describe(abnormal));
    } else if (classifications.length > 0) {
      draft.isNormal = true;
      draft.reasoning.push("all stated vital signs are within normal range");
    }

    if (!hasVitalReadings(optionVitals)) {
      const tier = matchTier(text);
      if (tier) {
        draft.raise(this.weighted(tier.id, tier.score), tier.id, `Stack of Four: ${tier.label} priority`);
      }
    }

    for (const finding of matchFindings(text)) {
      draft.raise(this.weighted(finding.rule.id, finding.score), finding.rule.id, `finding: ${finding.rule.reasoning}`);
    }

    if (NORMAL_FINDING_PATTERN.test(text)) {
      draft.isNormal = true;
      draft.reasoning.push("describes an expected, normal finding");
    }

    const optionSymptoms = this.knowledgeBase.matchSymptoms(text);
    for (const identified of context.identifiedPatterns) {
      const pattern = this.knowledgeBase.getPattern(identified.id);
      if (!pattern) continue;
      const shared = optionSymptoms.filter((symptom) => pattern.symptoms.includes(symptom));
      if (shared.length > 0) {
        draft.addressesPattern = true;
        const ruleId = `pattern-finding:${pattern.id}`;
        draft.raise(
          this.weighted(ruleId, this.scoring.abnormalScore),
          ruleId,
          `${shared.join(", ").replace(/_/g, " ")} is an expected finding of ${pattern.name.toLowerCase()}`,
        );
      }
    }

    // ── 2. Medication hold parameters ──────────────────────────────────────
    for (const [medicationId, present] of Object.entries(context.medications)) {
      if (!present) continue;
      const medication = this.knowledgeBase.getMedicationConsiderations(medicationId);
      for (const hold of medication.holdParameters) {
        const value = optionVitals[hold.vital];
        if (value === undefined) continue;
        const violated = hold.direction === "below" ? value < hold.threshold : value > hold.threshold;
        if (!violated) continue;

        const ruleId = `hold:${medication.id}:${hold.vital}`;
        draft.isCritical = true;
        draft.requiresAction = true;
        draft.raise(
          this.weighted(ruleId, this.scoring.criticalScore),
          ruleId,
          `${this.knowledgeBase.getVitalLabel(hold.vital)} ${hold.direction} ${medication.name} hold threshold (${hold.threshold})`,
        );
      }
    }

    // ── 3. Immediate intervention for an identified pattern ────────────────
    for (const identified of context.identifiedPatterns) {
      const pattern = this.knowledgeBase.getPattern(identified.id);
      if (!pattern || !pattern.interventionPatterns.some((candidate) => candidate.test(text))) continue;

      const ruleId = `intervention:${pattern.id}`;
      draft.addressesPattern = true;
      draft.addressesEmergency = true;
      draft.requiresAction = true;
      draft.raise(
        this.weighted(ruleId, this.scoring.interventionScore),
        ruleId,
        `names the immediate intervention for ${pattern.name.toLowerCase()}: ${pattern.interventionLabel}`,
      );
    }

    // ── 4. Hypoglycemia: treat before reassessing ──────────────────────────
    const stemGlucose = context.vitals.bloodGlucose;
    if (stemGlucose !== undefined && stemGlucose < HYPOGLYCEMIA_GLUCOSE_BELOW && CARBOHYDRATE_PATTERN.test(text)) {
      draft.addressesEmergency = true;
      draft.requiresAction = true;
      draft.raise(
        this.weighted("hypoglycemia:carbohydrates", this.scoring.interventionScore),
        "hypoglycemia:carbohydrates",
        `glucose ${stemGlucose} mg/dL: carbohydrates before reassessment`,
      );
    }

    // ── 5. Assessment wording ──────────────────────────────────────────────
    if (ASSESSMENT_PATTERN.test(text)) {
      draft.isAssessment = true;
      if (draft.isAbnormal && !draft.isCritical) {
        draft.score = Math.max(0, draft.score - this.scoring.assessmentDecrement);
        draft.fire("assessment:abnormal", `assessment wording on an abnormal finding (-${this.scoring.assessmentDecrement})`);
      } else {
        draft.raise(this.weighted("assessment", this.scoring.assessmentScore), "assessment", "nursing process: assessment");
        if (context.isEmergency) {
          draft.reasoning.push("assessment stays below critical interventions in an emergency");
        }
      }
    }

    if (draft.isCritical || INTERVENTION_VERB_PATTERN.test(text)) {
      draft.requiresAction = true;
    }

    // ── 6. Contraindications override everything ───────────────────────────
    const contraindication = this.knowledgeBase.findContraindication(text, context.conditions);
    if (contraindication) {
      draft.isContraindicated = true;
      draft.score = this.scoring.contraindicationScore;
      draft.fire(`contraindication:${contraindication.id}`, `contraindicated: ${contraindication.reason}`);
    }

    return draft.freeze();
  }
}
