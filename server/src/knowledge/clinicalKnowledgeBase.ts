/**
 * CLINICAL KNOWLEDGE BASE
 *
 * Read-only reference data for the priority engine: normal ranges per vital
 * sign (with age-group and condition variants), medication classes with hold
 * parameters, named deterioration patterns with their trigger rules, the
 * symptom/condition vocabularies and the contraindication pairs.
 *
 * The data lives in data/clinical-knowledge.json. It is validated with zod,
 * compiled once, and deep-frozen; callers construct one instance and pass it
 * to the engine.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import {
  VITAL_SIGNS,
  type AgeGroup,
  type PriorityTier,
  type VitalReadings,
  type VitalSign,
} from "../engine/priorityContract";

export const DEFAULT_KNOWLEDGE_PATH = fileURLToPath(
  new URL("./data/clinical-knowledge.json", import.meta.url),
);

// ============================================================================
// DATA SCHEMA
// ============================================================================

const vitalSignSchema = z.enum(VITAL_SIGNS);

const rangeVariantSchema = z
  .object({
    low: z.number(),
    high: z.number(),
    criticalLow: z.number().optional(),
    criticalHigh: z.number().optional(),
  })
  .refine((range) => range.low <= range.high, "low must not exceed high");

const normalRangeSchema = z.object({
  label: z.string(),
  unit: z.string(),
  adult: rangeVariantSchema,
  ageGroups: z.record(z.enum(["pediatric", "infant"]), rangeVariantSchema).default({}),
  conditions: z.record(z.string(), rangeVariantSchema).default({}),
});

const holdParameterSchema = z.object({
  vital: vitalSignSchema,
  direction: z.enum(["below", "above"]),
  threshold: z.number(),
});

const medicationSchema = z.object({
  id: z.string(),
  name: z.string(),
  patterns: z.array(z.string()).min(1),
  examples: z.array(z.string()),
  desiredEffects: z.array(z.string()),
  adverseEffects: z.array(z.string()),
  monitor: z.array(vitalSignSchema),
  holdParameters: z.array(holdParameterSchema),
  contraindications: z.array(z.string()),
  teachingPoints: z.array(z.string()),
});

const vocabularyEntrySchema = z.object({
  id: z.string(),
  patterns: z.array(z.string()).min(1),
});

const patternTriggerSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("vitalBelow"), vital: vitalSignSchema, threshold: z.number() }),
  z.object({ kind: z.literal("sirs"), minCriteria: z.number().int().positive() }),
  z.object({ kind: z.literal("symptomRatio"), ratio: z.number().gt(0).max(1) }),
]);

const clinicalPatternSchema = z.object({
  id: z.string(),
  name: z.string(),
  tier: z.enum(["life_threat", "urgent", "routine"]),
  symptoms: z.array(z.string()),
  trigger: patternTriggerSchema,
  immediateIntervention: z.object({
    label: z.string(),
    patterns: z.array(z.string()).min(1),
  }),
});

const contraindicationSchema = z.object({
  id: z.string(),
  reason: z.string(),
  condition: z.string().optional(),
  optionPattern: z.string(),
});

export const clinicalKnowledgeSchema = z.object({
  version: z.string(),
  normalRanges: z.object({
    heartRate: normalRangeSchema,
    respiratoryRate: normalRangeSchema,
    systolicBp: normalRangeSchema,
    diastolicBp: normalRangeSchema,
    temperatureC: normalRangeSchema,
    temperatureF: normalRangeSchema,
    oxygenSaturation: normalRangeSchema,
    bloodGlucose: normalRangeSchema,
  }),
  medications: z.array(medicationSchema),
  conditions: z.array(vocabularyEntrySchema),
  symptoms: z.array(vocabularyEntrySchema),
  patterns: z.array(clinicalPatternSchema),
  contraindications: z.array(contraindicationSchema),
});

export type ClinicalKnowledgeData = z.infer<typeof clinicalKnowledgeSchema>;
export type RangeVariant = z.infer<typeof rangeVariantSchema>;
export type HoldParameter = z.infer<typeof holdParameterSchema>;
export type PatternTrigger = z.infer<typeof patternTriggerSchema>;
export type ClinicalPatternData = z.infer<typeof clinicalPatternSchema>;

// ============================================================================
// COMPILED RECORDS
// ============================================================================

export interface MedicationConsiderations {
  id: string;
  name: string;
  known: boolean;
  examples: readonly string[];
  desiredEffects: readonly string[];
  adverseEffects: readonly string[];
  monitor: readonly VitalSign[];
  holdParameters: readonly HoldParameter[];
  contraindications: readonly string[];
  teachingPoints: readonly string[];
}

export interface ClinicalPatternRecord {
  id: string;
  name: string;
  tier: PriorityTier;
  symptoms: readonly string[];
  trigger: PatternTrigger;
  interventionLabel: string;
  interventionPatterns: readonly RegExp[];
}

export interface ContraindicationRule {
  id: string;
  reason: string;
  condition?: string;
  optionPattern: RegExp;
}

export type VitalStatus = "normal" | "abnormal" | "critical";

export interface VitalClassification {
  sign: VitalSign;
  value: number;
  status: VitalStatus;
  direction: "low" | "high" | null;
  /** Which reference range was used: "adult", an age group, or a condition id */
  variant: string;
  range: RangeVariant;
  label: string;
  unit: string;
}

export interface ClassificationContext {
  ageGroup?: AgeGroup;
  conditions?: Record<string, boolean>;
}

interface CompiledVocabularyEntry {
  id: string;
  patterns: RegExp[];
}

interface CompiledMedication {
  considerations: MedicationConsiderations;
  patterns: RegExp[];
}

const TIER_RANK: Record<PriorityTier, number> = {
  life_threat: 0,
  urgent: 1,
  routine: 2,
};

// SIRS thresholds used by the sepsis trigger
const SIRS = {
  temperatureC: { low: 36, high: 38 },
  temperatureF: { low: 96.8, high: 100.4 },
  heartRateAbove: 90,
  respiratoryRateAbove: 20,
} as const;

function compile(source: string): RegExp {
  return new RegExp(source, "i");
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !(value instanceof RegExp) && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

function matchVocabulary(entries: readonly CompiledVocabularyEntry[], text: string): string[] {
  return entries
    .filter((entry) => entry.patterns.some((pattern) => pattern.test(text)))
    .map((entry) => entry.id);
}

// ============================================================================
// KNOWLEDGE BASE
// ============================================================================

export class ClinicalKnowledgeBase {
  readonly version: string;
  private readonly normalRanges: ClinicalKnowledgeData["normalRanges"];
  private readonly medications: readonly CompiledMedication[];
  private readonly conditionVocabulary: readonly CompiledVocabularyEntry[];
  private readonly symptomVocabulary: readonly CompiledVocabularyEntry[];
  private readonly clinicalPatterns: readonly ClinicalPatternRecord[];
  private readonly contraindications: readonly ContraindicationRule[];

  private constructor(data: ClinicalKnowledgeData) {
    this.version = data.version;
    this.normalRanges = deepFreeze(data.normalRanges);
    this.medications = deepFreeze(
      data.medications.map((medication) => ({
        patterns: medication.patterns.map(compile),
        considerations: {
          id: medication.id,
          name: medication.name,
          known: true,
          examples: medication.examples,
          desiredEffects: medication.desiredEffects,
          adverseEffects: medication.adverseEffects,
          monitor: medication.monitor,
          holdParameters: medication.holdParameters,
          contraindications: medication.contraindications,
          teachingPoints: medication.teachingPoints,
        },
      })),
    );
    this.conditionVocabulary = deepFreeze(
      data.conditions.map((entry) => ({ id: entry.id, patterns: entry.patterns.map(compile) })),
    );
    this.symptomVocabulary = deepFreeze(
      data.symptoms.map((entry) => ({ id: entry.id, patterns: entry.patterns.map(compile) })),
    );
    this.clinicalPatterns = deepFreeze(
      data.patterns.map((pattern) => ({
        id: pattern.id,
        name: pattern.name,
        tier: pattern.tier,
        symptoms: pattern.symptoms,
        trigger: pattern.trigger,
        interventionLabel: pattern.immediateIntervention.label,
        interventionPatterns: pattern.immediateIntervention.patterns.map(compile),
      })),
    );
    this.contraindications = deepFreeze(
      data.contraindications.map((rule) => ({
        id: rule.id,
        reason: rule.reason,
        condition: rule.condition,
        optionPattern: compile(rule.optionPattern),
      })),
    );
    Object.freeze(this);
  }

  /** Validate raw data and build an instance. Throws a ZodError on malformed data. */
  static fromData(raw: unknown): ClinicalKnowledgeBase {
    return new ClinicalKnowledgeBase(clinicalKnowledgeSchema.parse(raw));
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Normal ranges
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * Pick the reference range for a sign. A condition variant beats an
   * age-group variant, which beats the adult range.
   */
  getReferenceRange(sign: VitalSign, context: ClassificationContext = {}): { variant: string; range: RangeVariant } {
    const record = this.normalRanges[sign];
    for (const [condition, present] of Object.entries(context.conditions ?? {})) {
      const range = record.conditions[condition];
      if (present && range) return { variant: condition, range };
    }
    if (context.ageGroup && context.ageGroup !== "adult") {
      const range = record.ageGroups[context.ageGroup];
      if (range) return { variant: context.ageGroup, range };
    }
    return { variant: "adult", range: record.adult };
  }

  getVitalLabel(sign: VitalSign): string {
    return this.normalRanges[sign].label;
  }

  classifyVital(sign: VitalSign, value: number, context: ClassificationContext = {}): VitalClassification {
    const record = this.normalRanges[sign];
    const { variant, range } = this.getReferenceRange(sign, context);

    let status: VitalStatus = "normal";
    let direction: "low" | "high" | null = null;

    if (range.criticalLow !== undefined && value <= range.criticalLow) {
      status = "critical";
      direction = "low";
    } else if (range.criticalHigh !== undefined && value >= range.criticalHigh) {
      status = "critical";
      direction = "high";
    } else if (value < range.low) {
      status = "abnormal";
      direction = "low";
    } else if (value > range.high) {
      status = "abnormal";
      direction = "high";
    }

    return { sign, value, status, direction, variant, range, label: record.label, unit: record.unit };
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Medications
  // ──────────────────────────────────────────────────────────────────────────

  /** Considerations for a medication class; unknown classes get an empty record. */
  getMedicationConsiderations(classId: string): MedicationConsiderations {
    const found = this.medications.find((medication) => medication.considerations.id === classId);
    if (found) return found.considerations;
    return Object.freeze({
      id: classId,
      name: classId,
      known: false,
      examples: [],
      desiredEffects: [],
      adverseEffects: [],
      monitor: [],
      holdParameters: [],
      contraindications: [],
      teachingPoints: [],
    });
  }

  matchMedications(text: string): string[] {
    return this.medications
      .filter((medication) => medication.patterns.some((pattern) => pattern.test(text)))
      .map((medication) => medication.considerations.id);
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Vocabularies
  // ──────────────────────────────────────────────────────────────────────────

  matchConditions(text: string): string[] {
    return matchVocabulary(this.conditionVocabulary, text);
  }

  matchSymptoms(text: string): string[] {
    return matchVocabulary(this.symptomVocabulary, text);
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Clinical patterns
  // ──────────────────────────────────────────────────────────────────────────

  get patterns(): readonly ClinicalPatternRecord[] {
    return this.clinicalPatterns;
  }

  getPattern(id: string): ClinicalPatternRecord | undefined {
    return this.clinicalPatterns.find((pattern) => pattern.id === id);
  }

  /** Patterns whose trigger is satisfied, life-threat tier first, otherwise in data order. */
  identifyPatterns(symptoms: readonly string[], vitals: VitalReadings): ClinicalPatternRecord[] {
    const present = new Set(symptoms);
    return this.clinicalPatterns
      .filter((pattern) => this.isTriggered(pattern, present, vitals))
      .sort((a, b) => TIER_RANK[a.tier] - TIER_RANK[b.tier]);
  }

  private isTriggered(pattern: ClinicalPatternRecord, symptoms: Set<string>, vitals: VitalReadings): boolean {
    const trigger = pattern.trigger;
    switch (trigger.kind) {
      case "vitalBelow": {
        const value = vitals[trigger.vital];
        return value !== undefined && value < trigger.threshold;
      }
      case "sirs":
        return countSirsCriteria(vitals) >= trigger.minCriteria;
      case "symptomRatio": {
        if (pattern.symptoms.length === 0) return false;
        const matched = pattern.symptoms.filter((symptom) => symptoms.has(symptom)).length;
        return matched / pattern.symptoms.length >= trigger.ratio;
      }
    }
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Contraindications
  // ──────────────────────────────────────────────────────────────────────────

  findContraindication(optionText: string, conditions: Record<string, boolean>): ContraindicationRule | null {
    for (const rule of this.contraindications) {
      if (rule.condition && !conditions[rule.condition]) continue;
      if (rule.optionPattern.test(optionText)) return rule;
    }
    return null;
  }
}

export function countSirsCriteria(vitals: VitalReadings): number {
  let met = 0;
  const { temperatureC, temperatureF, heartRate, respiratoryRate } = vitals;
  if (temperatureC !== undefined && (temperatureC < SIRS.temperatureC.low || temperatureC > SIRS.temperatureC.high)) {
    met++;
  } else if (
    temperatureF !== undefined &&
    (temperatureF < SIRS.temperatureF.low || temperatureF > SIRS.temperatureF.high)
  ) {
    met++;
  }
  if (heartRate !== undefined && heartRate > SIRS.heartRateAbove) met++;
  if (respiratoryRate !== undefined && respiratoryRate > SIRS.respiratoryRateAbove) met++;
  return met;
}

/** Read, validate and compile a knowledge file. */
export function loadClinicalKnowledgeBase(filePath: string = DEFAULT_KNOWLEDGE_PATH): ClinicalKnowledgeBase {
  const raw: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
  const knowledgeBase = ClinicalKnowledgeBase.fromData(raw);
  console.log(`[Knowledge] Loaded clinical knowledge v${knowledgeBase.version} from ${filePath}`);
  return knowledgeBase;
}
