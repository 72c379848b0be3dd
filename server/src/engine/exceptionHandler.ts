/**
 * EXCEPTION HANDLER
 *
 * Detects atypical question framings and, for the ones that have an override,
 * redirects the base answer:
 *
 *   time_sequence     0.90  detection only
 *   exclusion         0.95  pick the most harmful option (EXCEPT / AVOID)
 *   chronic_vs_new    0.85  new or acute wording beats chronic
 *   context_specific  0.80  psychiatric or legal context picks its own option
 *   red_flag          0.70  detection only; recorded when nothing else fired
 *
 * The highest-confidence exception is applied. Ties fall back to the order
 * above.
 */

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../config";
import { EXCEPTION_TYPES, type ExceptionContext, type ExceptionType } from "./priorityContract";

export interface ExceptionQuestion {
  stem: string;
  options: Record<string, string>;
}

export interface ExceptionResolution {
  answers: string[];
  applied: ExceptionContext | null;
  overridden: boolean;
}

// ============================================================================
// DETECTION PATTERNS
// ============================================================================

const COMPLETED_ACTION_PATTERNS: readonly RegExp[] = [
  /after (?:establishing|securing|checking) (?:the )?(airway|breathing|circulation)/i,
  /has already (?:assessed|checked|completed|given)/i,
  /following (?:initial|immediate) (assessment|intervention)/i,
];

const EXCLUSION_PATTERNS: readonly RegExp[] = [
  /\b(?:except|avoid|not appropriate|contraindicated)\b/i,
  /\ball\b.*\bexcept\b|\bwhich\b.*\bnot\b|\binappropriate\b/i,
  /\b(?:should not|must not|never)\b/i,
];

const CHRONIC_PATTERNS: readonly RegExp[] = [
  /\b(?:usual|chronic|long-standing|baseline|controlled|stable)\b/i,
  /\b(?:history of|diagnosed with|known)\b/i,
  /\bfor \d+ (?:years?|months?|weeks?)\b/i,
];

const NEW_ONSET_PATTERNS: readonly RegExp[] = [
  /\b(?:new[- ]onset|sudden(?:ly)?|acute|just|unexpected)\b/i,
  /\b(?:change in|different from|never had)\b/i,
  /\b(?:started|began|developed)\b/i,
];

type CareContext = "psych" | "pediatric" | "cultural" | "legal";

const CONTEXT_PATTERNS: ReadonlyArray<{ context: CareContext; pattern: RegExp; rule: string }> = [
  {
    context: "psych",
    pattern: /\b(?:psych\w*|mental health|behavioral)\b/i,
    rule: "psychological safety may override physiological needs",
  },
  {
    context: "pediatric",
    pattern: /\b(?:infant|child|pediatric|newborn|adolescent)\b/i,
    rule: "developmental and family considerations affect priorities",
  },
  {
    context: "cultural",
    pattern: /\b(?:cultural|religious|spiritual|beliefs?)\b/i,
    rule: "cultural competence may override routine protocols",
  },
  {
    context: "legal",
    pattern: /\b(?:legal|ethical|consent|refuses?|autonomy|rights)\b/i,
    rule: "legal and ethical requirements may supersede clinical routine",
  },
];

const RED_FLAG_PATTERNS: ReadonlyArray<{ id: string; pattern: RegExp }> = [
  { id: "completed_sequence", pattern: /\bafter\b.*\bcompleted\b|\bfollowing\b.*\bestablished\b/i },
  { id: "reverse_selection", pattern: /\ball\b.*\bexcept\b|\bwhich\b.*\bavoid\b/i },
  { id: "special_setting", pattern: /\b(?:psych unit|cultural consideration|legal requirement)\b/i },
  { id: "stable_baseline", pattern: /\bchronic\b.*\bstable\b|\bbaseline\b.*\bnormal\b/i },
];

// ============================================================================
// OVERRIDE PATTERNS
// ============================================================================

const HARM_PATTERNS: readonly RegExp[] = [
  /\b(?:force|restrain|ignore|delay|withhold)/i,
  /\bincrease\b.*\bdose|\bdouble\b.*\bmedication/i,
  /\bleave\b.*\balone\b|\bdo nothing\b|\bwait\b/i,
  /\btell\b.*\bnot to worry\b|\bdismiss/i,
];

const AGGRESSIVE_WORDING = /\b(?:immediately|stat|emergency)\b/i;

const ASSESSMENT_VERBS = /\b(?:assess|evaluat|check|investigat)\w*/i;

const PSYCH_SAFETY_PATTERNS: readonly RegExp[] = [
  /\b(?:suicid\w*|self-harm|harm\w*\s+(?:to\s+)?(?:him|her|them)?self|safety|one-to-one|constant observation)\b/i,
  /\b(?:therapeutic|de-escalat\w*|calm\w*|rapport)\b/i,
];

const LEGAL_PATTERNS: readonly RegExp[] = [
  /\b(?:respect\w*|autonomy|consent|rights?|ethic\w*)\b/i,
  /\b(?:document\w*|inform\w*|explain\w*)\b/i,
];

function precedence(type: ExceptionType): number {
  return EXCEPTION_TYPES.indexOf(type);
}

function countMatches(patterns: readonly RegExp[], text: string): number {
  return patterns.filter((pattern) => pattern.test(text)).length;
}

export class ExceptionHandler {
  constructor(private readonly settings: EngineConfig["exceptions"] = DEFAULT_ENGINE_CONFIG.exceptions) {}

  // ──────────────────────────────────────────────────────────────────────────
  // Detection
  // ──────────────────────────────────────────────────────────────────────────

  detect(question: ExceptionQuestion): ExceptionContext[] {
    const { stem, options } = question;
    const detected: ExceptionContext[] = [];

    const completed = COMPLETED_ACTION_PATTERNS.flatMap((pattern) => {
      const match = pattern.exec(stem);
      return match ? [(match[1] ?? match[0]).toLowerCase()] : [];
    });
    if (completed.length > 0) {
      detected.push({
        type: "time_sequence",
        confidence: 0.9,
        reasoning: `Actions already completed: ${completed.join(", ")}. Move to the next priority.`,
        triggers: ["time_sequence", ...completed.map((action) => `completed:${action}`)],
      });
    }

    if (EXCLUSION_PATTERNS.some((pattern) => pattern.test(stem))) {
      detected.push({
        type: "exclusion",
        confidence: 0.95,
        reasoning: "EXCEPT/AVOID framing: the answer is the least appropriate option",
        triggers: ["exclusion", "reverse_thinking"],
      });
    }

    let chronicCount = countMatches(CHRONIC_PATTERNS, stem);
    let newCount = countMatches(NEW_ONSET_PATTERNS, stem);
    for (const text of Object.values(options)) {
      chronicCount += countMatches(CHRONIC_PATTERNS, text);
      newCount += countMatches(NEW_ONSET_PATTERNS, text);
    }
    if (chronicCount > 0 && newCount > 0) {
      detected.push({
        type: "chronic_vs_new",
        confidence: 0.85,
        reasoning: "Both chronic and new findings present: new or acute changes come first",
        triggers: ["chronic_vs_new", "new_beats_chronic"],
      });
    }

    const contexts = CONTEXT_PATTERNS.filter((entry) => entry.pattern.test(stem));
    if (contexts.length > 0) {
      detected.push({
        type: "context_specific",
        confidence: 0.8,
        reasoning: contexts.map((entry) => entry.rule).join("; "),
        triggers: contexts.map((entry) => entry.context),
      });
    }

    if (detected.length === 0) {
      const flags = RED_FLAG_PATTERNS.filter((entry) => entry.pattern.test(stem)).map((entry) => entry.id);
      if (flags.length > 0) {
        detected.push({
          type: "red_flag",
          confidence: 0.7,
          reasoning: "Cautionary phrasing detected: careful analysis needed",
          triggers: flags,
        });
      }
    }

    return detected;
  }

  /** Highest confidence wins; equal confidence falls back to detection precedence. */
  selectPrimary(exceptions: readonly ExceptionContext[]): ExceptionContext | null {
    if (exceptions.length === 0) return null;
    return [...exceptions].sort(
      (a, b) => b.confidence - a.confidence || precedence(a.type) - precedence(b.type),
    )[0];
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Overrides
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * Apply the primary exception to a base answer. Categories without an
   * override policy return the base answer unchanged.
   */
  apply(question: ExceptionQuestion, baseAnswers: string[], exceptions: readonly ExceptionContext[]): ExceptionResolution {
    const primary = this.selectPrimary(exceptions);
    if (!primary) return { answers: baseAnswers, applied: null, overridden: false };

    const override = this.override(primary, question, baseAnswers);
    if (!override) return { answers: baseAnswers, applied: primary, overridden: false };

    const applied: ExceptionContext = { ...primary, overrideAnswers: override };
    const overridden = override.join(",") !== baseAnswers.join(",");
    return { answers: override, applied, overridden };
  }

  private override(primary: ExceptionContext, question: ExceptionQuestion, baseAnswers: string[]): string[] | null {
    switch (primary.type) {
      case "exclusion":
        return this.mostHarmful(question, baseAnswers);
      case "chronic_vs_new":
        return this.newOverChronic(question);
      case "context_specific":
        return this.contextOption(question, primary.triggers);
      case "time_sequence":
      case "red_flag":
        return null;
    }
  }

  /** Harm score per option; the maximum wins, first option on ties. */
  scoreHarm(text: string): number {
    let score = countMatches(HARM_PATTERNS, text) * this.settings.harmPatternWeight;
    if (AGGRESSIVE_WORDING.test(text)) score += this.settings.aggressiveWordingWeight;
    return score;
  }

  private mostHarmful(question: ExceptionQuestion, baseAnswers: string[]): string[] | null {
    let worstKey: string | null = null;
    let worstScore = 0;
    for (const [key, text] of Object.entries(question.options)) {
      const score = this.scoreHarm(text);
      if (score > worstScore) {
        worstKey = key;
        worstScore = score;
      }
    }
    if (worstKey) return [worstKey];

    // Nothing reads as harmful: take the first option the base logic rejected
    const rejected = Object.keys(question.options).find((key) => !baseAnswers.includes(key));
    return rejected ? [rejected] : null;
  }

  private newOverChronic(question: ExceptionQuestion): string[] | null {
    let bestKey: string | null = null;
    let bestScore = Number.NEGATIVE_INFINITY;
    for (const [key, text] of Object.entries(question.options)) {
      let score = 0;
      if (NEW_ONSET_PATTERNS.some((pattern) => pattern.test(text))) score += this.settings.newOnsetBonus;
      if (ASSESSMENT_VERBS.test(text)) score += this.settings.assessmentBonus;
      if (score > bestScore) {
        bestKey = key;
        bestScore = score;
      }
    }
    return bestKey && bestScore > this.settings.chronicOverrideThreshold ? [bestKey] : null;
  }

  private contextOption(question: ExceptionQuestion, triggers: readonly string[]): string[] | null {
    const patterns = triggers.includes("psych")
      ? PSYCH_SAFETY_PATTERNS
      : triggers.includes("legal")
        ? LEGAL_PATTERNS
        : null;
    if (!patterns) return null;

    const match = Object.entries(question.options).find(([, text]) => patterns.some((pattern) => pattern.test(text)));
    return match ? [match[0]] : null;
  }
}
