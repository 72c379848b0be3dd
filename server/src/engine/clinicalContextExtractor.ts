/**
 * CLINICAL CONTEXT EXTRACTOR
 *
 * Bag-of-matches scan of a question stem (and optionally its options) against
 * the knowledge-base vocabularies. There is no negation handling: "not taking
 * insulin" still registers insulin.
 */

import type { ClinicalKnowledgeBase } from "../knowledge/clinicalKnowledgeBase";
import type { AgeGroup, ClinicalContext, IdentifiedPattern, Timeframe } from "./priorityContract";
import { extractVitalSigns } from "./vitalSignExtractor";

const URGENCY_PATTERN = /\b(?:immediately|emergen\w*|stat|urgent(?:ly)?|first|priority|life[- ]threatening)\b/i;

const ACUTE_PATTERN = /\b(?:sudden(?:ly)?|acute(?:ly)?|new[- ]onset|abrupt(?:ly)?|just (?:started|began|developed))\b/i;
const CHRONIC_PATTERN = /\b(?:chronic|long[- ]standing|history of|for \d+ (?:years?|months?))\b/i;

const INFANT_PATTERN = /\b(?:infant|newborn|neonate|\d+[- ](?:week|month)s?[- ]old)\b/i;
const PEDIATRIC_PATTERN = /\b(?:child|pediatric|toddler|preschooler|school[- ]age|adolescent)\b/i;
const AGE_IN_YEARS_PATTERN = /\b(\d{1,3})[- ]years?[- ]old\b/i;

// Stem heart rate below this adds a bradycardia condition
const BRADYCARDIA_BELOW = 60;

function detectTimeframe(text: string): Timeframe {
  if (ACUTE_PATTERN.test(text)) return "acute";
  if (CHRONIC_PATTERN.test(text)) return "chronic";
  return "unspecified";
}

function detectAgeGroup(text: string): AgeGroup {
  if (INFANT_PATTERN.test(text)) return "infant";
  if (PEDIATRIC_PATTERN.test(text)) return "pediatric";
  const age = AGE_IN_YEARS_PATTERN.exec(text);
  if (age) {
    const years = Number(age[1]);
    if (years < 1) return "infant";
    if (years < 18) return "pediatric";
  }
  return "adult";
}

function toPresenceMap(ids: readonly string[]): Record<string, boolean> {
  const map: Record<string, boolean> = {};
  for (const id of ids) map[id] = true;
  return map;
}

/**
 * Build the clinical context for one question. Vitals and derived conditions
 * come from the stem only; options, when given, widen the vocabulary scan.
 */
export function extractClinicalContext(
  knowledgeBase: ClinicalKnowledgeBase,
  stem: string,
  options?: Record<string, string>,
): ClinicalContext {
  const scanned = options ? [stem, ...Object.values(options)].join("\n") : stem;

  const vitals = extractVitalSigns(stem);
  const medications = toPresenceMap(knowledgeBase.matchMedications(scanned));
  const conditions = toPresenceMap(knowledgeBase.matchConditions(scanned));
  const symptoms = knowledgeBase.matchSymptoms(scanned);

  if (vitals.heartRate !== undefined && vitals.heartRate < BRADYCARDIA_BELOW) {
    conditions.bradycardia = true;
  }

  const identifiedPatterns: IdentifiedPattern[] = knowledgeBase
    .identifyPatterns(symptoms, vitals)
    .map((pattern): IdentifiedPattern => ({ id: pattern.id, name: pattern.name, tier: pattern.tier, identifiedBy: "trigger" }));

  // A stem that names a condition outright identifies its pattern too
  for (const pattern of knowledgeBase.patterns) {
    if (conditions[pattern.id] && !identifiedPatterns.some((found) => found.id === pattern.id)) {
      identifiedPatterns.push({ id: pattern.id, name: pattern.name, tier: pattern.tier, identifiedBy: "named" });
    }
  }

  return {
    medications,
    conditions,
    symptoms,
    vitals,
    isEmergency: URGENCY_PATTERN.test(stem),
    timeframe: detectTimeframe(scanned),
    ageGroup: detectAgeGroup(stem),
    identifiedPatterns,
  };
}
