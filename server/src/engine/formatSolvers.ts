/**
 * FORMAT SOLVERS
 *
 * Turn per-option evaluations into an answer for each question format:
 *   - single:  one key; emergency stems prefer the matching intervention
 *   - sata:    every appropriate option, never fewer than two
 *   - ordered: all keys by descending score, as one comma-joined sequence
 */

import type { QuestionFormat } from "@shared/schema";
import type { ClinicalContext, ScoredOption } from "./priorityContract";
import { HYPOGLYCEMIA_GLUCOSE_BELOW } from "./optionEvaluator";
import { NURSING_ACTION_PATTERN } from "./priorityRules";

export interface SolverInput {
  stem: string;
  options: readonly ScoredOption[];
  context: ClinicalContext;
}

export interface SolverOutcome {
  answers: string[];
  log: string[];
}

// ============================================================================
// TIE-BREAK
// ============================================================================

/** Score, then critical, then requires-action, then original option order. */
export function compareScoredOptions(a: ScoredOption, b: ScoredOption): number {
  if (a.evaluation.score !== b.evaluation.score) return b.evaluation.score - a.evaluation.score;
  if (a.evaluation.isCritical !== b.evaluation.isCritical) return a.evaluation.isCritical ? -1 : 1;
  if (a.evaluation.requiresAction !== b.evaluation.requiresAction) return a.evaluation.requiresAction ? -1 : 1;
  return a.index - b.index;
}

export function rankOptions(options: readonly ScoredOption[]): ScoredOption[] {
  return [...options].sort(compareScoredOptions);
}

function inOptionOrder(options: readonly ScoredOption[], selected: Set<string>): string[] {
  return options.filter((option) => selected.has(option.key)).map((option) => option.key);
}

// ============================================================================
// EMERGENCY SIGNATURES
// ============================================================================

export type EmergencyType = "cardiac_arrest" | "respiratory" | "hemorrhage" | "hypoglycemia" | "anaphylaxis";

interface EmergencySignature {
  type: EmergencyType;
  stemPattern: RegExp;
  interventionPattern: RegExp;
}

const EMERGENCY_SIGNATURES: readonly EmergencySignature[] = [
  {
    type: "cardiac_arrest",
    stemPattern: /\b(?:unresponsive|no pulse|pulseless|not breathing|cardiac arrest)\b/i,
    interventionPattern: /\b(?:compressions?|CPR|defibrillat\w*|AED)\b/i,
  },
  {
    type: "respiratory",
    stemPattern: /\b(?:choking|respiratory distress|airway obstruction|stridor)\b/i,
    interventionPattern: /\b(?:oxygen|airway|suction\w*|abdominal thrusts)\b/i,
  },
  {
    type: "hemorrhage",
    stemPattern: /\b(?:severe bleeding|hemorrhaging|shock)\b/i,
    interventionPattern: /\b(?:direct pressure|pressure (?:to|on|over) the|tourniquet)\b/i,
  },
  {
    type: "hypoglycemia",
    stemPattern: /\bhypoglycemi\w*|\bshaky\b.*\bsweaty\b|\bsweaty\b.*\bshaky\b|\blow blood sugar\b/i,
    interventionPattern: /\b(?:carbohydrates?|15\s*(?:g|grams?)|juice|glucose tablets?|glucose gel|dextrose)\b/i,
  },
  {
    type: "anaphylaxis",
    stemPattern: /\b(?:anaphyla\w*|severe allergic)\b/i,
    interventionPattern: /\b(?:epinephrine|EpiPen|oxygen|airway)\b/i,
  },
];

const EMERGENCY_VERB_PATTERN = /\b(?:give|administer|perform|begin|start|apply|initiate|provide|open|insert)\b/i;

export function detectEmergency(stem: string, context: ClinicalContext): EmergencySignature | null {
  for (const signature of EMERGENCY_SIGNATURES) {
    if (signature.stemPattern.test(stem)) return signature;
    if (
      signature.type === "hypoglycemia" &&
      context.vitals.bloodGlucose !== undefined &&
      context.vitals.bloodGlucose < HYPOGLYCEMIA_GLUCOSE_BELOW
    ) {
      return signature;
    }
  }
  return null;
}

// ============================================================================
// SINGLE
// ============================================================================

export function solveSingle(input: SolverInput): SolverOutcome {
  const log: string[] = [];
  if (input.options.length === 0) return { answers: [], log };

  const ranked = rankOptions(input.options);
  const emergency = detectEmergency(input.stem, input.context);

  if (emergency) {
    const intervention = ranked.find(
      (option) =>
        !option.evaluation.isContraindicated &&
        EMERGENCY_VERB_PATTERN.test(option.text) &&
        emergency.interventionPattern.test(option.text),
    );
    if (intervention) {
      log.push(`Emergency (${emergency.type}): intervention ${intervention.key} preferred over raw top score`);
      return { answers: [intervention.key], log };
    }
    log.push(`Emergency (${emergency.type}) detected but no matching intervention option`);
  }

  const best = ranked[0];
  log.push(`Selected ${best.key} with score ${best.evaluation.score}`);
  return { answers: [best.key], log };
}

// ============================================================================
// SELECT ALL THAT APPLY
// ============================================================================

const TEACHING_STEM_PATTERN = /\b(?:teaching|understanding|indicates|effective|needs further|reinforce|demonstrates?)\b/i;

const NEGATIVE_TEACHING_PATTERNS: readonly RegExp[] = [
  /\bskip\s+(?:my\s+)?(?:medication|insulin|doses?|diuretic)\b/i,
  /\breuse\s+(?:the\s+)?needles?\b/i,
  /\bincrease\s+(?:my\s+)?(?:salt|sodium)\b/i,
  /\bonly\s+(?:if|when)\s+(?:i\s+)?feel\s+(?:good|better|fine|sick)\b/i,
  /\bsame\s+(?:spot|site)\b/i,
  /\ball\s+confused\s+(?:patients|clients)\b/i,
  /\bat\s+all\s+times\b/i,
];

const POSITIVE_TEACHING_PATTERNS: readonly RegExp[] = [
  /\b(?:i\s+)?will\s+(?:weigh|check|monitor|assess|take|follow|limit|store|rotate)\b/i,
  /\b(?:i\s+)?should\s+(?:report|notify|call|include)\b/i,
  /\b(?:daily|regularly|always|each time)\b/i,
  /\broom\s+temperature\b/i,
  /\bas\s+prescribed\b/i,
  /\bweight\s+gain\s+of\s+\d+\s+(?:pounds|lb|kg)\b/i,
];

export function isTeachingStem(stem: string): boolean {
  return TEACHING_STEM_PATTERN.test(stem);
}

export function isCorrectTeachingPoint(text: string): boolean {
  if (NEGATIVE_TEACHING_PATTERNS.some((pattern) => pattern.test(text))) return false;
  return POSITIVE_TEACHING_PATTERNS.some((pattern) => pattern.test(text));
}

const SATA_MINIMUM = 2;

export function solveSata(input: SolverInput): SolverOutcome {
  const log: string[] = [];
  const selected = new Set<string>();
  const teaching = isTeachingStem(input.stem);

  for (const option of input.options) {
    const { evaluation } = option;
    if (evaluation.score > 0) {
      selected.add(option.key);
      log.push(`SATA selected ${option.key}: priority score ${evaluation.score}`);
    } else if (NURSING_ACTION_PATTERN.test(option.text) && !evaluation.isContraindicated) {
      selected.add(option.key);
      log.push(`SATA selected ${option.key}: nursing action`);
    } else if (teaching && isCorrectTeachingPoint(option.text)) {
      selected.add(option.key);
      log.push(`SATA selected ${option.key}: correct teaching point`);
    } else {
      log.push(`SATA excluded ${option.key}: no clear indication`);
    }
  }

  if (selected.size < SATA_MINIMUM && input.options.length >= SATA_MINIMUM) {
    const remaining = input.options
      .filter((option) => !selected.has(option.key))
      .sort((a, b) => {
        if (a.evaluation.isContraindicated !== b.evaluation.isContraindicated) {
          return a.evaluation.isContraindicated ? 1 : -1;
        }
        const aAction = NURSING_ACTION_PATTERN.test(a.text);
        const bAction = NURSING_ACTION_PATTERN.test(b.text);
        if (aAction !== bAction) return aAction ? -1 : 1;
        return compareScoredOptions(a, b);
      });

    for (const option of remaining) {
      if (selected.size >= SATA_MINIMUM) break;
      selected.add(option.key);
      log.push(`SATA added ${option.key}: minimum of ${SATA_MINIMUM} selections`);
    }
  }

  return { answers: inOptionOrder(input.options, selected), log };
}

// ============================================================================
// ORDERED RESPONSE
// ============================================================================

export function solveOrdered(input: SolverInput): SolverOutcome {
  if (input.options.length === 0) return { answers: [], log: [] };
  const sequence = [...input.options]
    .sort((a, b) => b.evaluation.score - a.evaluation.score || a.index - b.index)
    .map((option) => option.key);
  return { answers: [sequence.join(",")], log: [`Ordered by score: ${sequence.join(" > ")}`] };
}

export function solveForFormat(format: QuestionFormat, input: SolverInput): SolverOutcome {
  switch (format) {
    case "single":
      return solveSingle(input);
    case "sata":
      return solveSata(input);
    case "ordered":
      return solveOrdered(input);
  }
}
