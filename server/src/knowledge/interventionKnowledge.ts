/**
 * Intervention Knowledge
 *
 * Optional enrichment: maps a nursing intervention to the physiological need
 * it serves (breathing, circulation, safety, disability). The scorer never
 * depends on it; the prediction service attaches the labels as notes.
 *
 * The LLM-backed lookup is wrapped so that a disabled flag, a missing key, a
 * slow provider or a failed call all land on the same rule table.
 */

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../config";
import { complete, getLLMAvailability, type LLMRequest, type LLMResponse } from "./llmService";

export type InterventionCategory =
  | "breathing_intervention"
  | "circulation_intervention"
  | "safety_intervention"
  | "disability_intervention";

export interface InterventionKnowledge {
  readonly source: string;
  /** A category label, a snake_case purpose, or null when nothing is known. */
  getInterventionPurpose(term: string): Promise<string | null>;
}

export function normalizeTerm(term: string): string {
  return term.trim().toLowerCase().replace(/\s+/g, " ");
}

// Interventions, conditions and medications worth a lookup
const CLINICAL_TERM_PATTERN =
  /\b(?:(?:high|semi)[- ]fowler'?s?(?: position)?|trendelenburg(?: position)?|left[- ]side[- ]lying|left lateral(?: position)?|incentive spirometry|sequential compression devices?|(?:ice|cold|warm) (?:pack|compress)|direct pressure|bed alarm|oxygen|insulin|morphine|furosemide|digoxin|epinephrine|hypoglycemia|COPD|CHF|pneumonia|stroke)\b/gi;

/** Clinical terms named in `text`, normalized and in order of first mention. */
export function extractClinicalTerms(text: string): string[] {
  const terms: string[] = [];
  for (const match of text.matchAll(CLINICAL_TERM_PATTERN)) {
    const term = normalizeTerm(match[0]);
    if (!terms.includes(term)) terms.push(term);
  }
  return terms;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RULE TABLE
// ═══════════════════════════════════════════════════════════════════════════════

const NURSING_FACTS: ReadonlyArray<{ pattern: RegExp; category: InterventionCategory }> = [
  { pattern: /high[- ]fowler/, category: "breathing_intervention" },
  { pattern: /trendelenburg/, category: "circulation_intervention" },
  { pattern: /left[- ]side[- ]lying|left lateral/, category: "circulation_intervention" },
  { pattern: /incentive spirometr/, category: "breathing_intervention" },
  { pattern: /sequential compression/, category: "circulation_intervention" },
  { pattern: /raise.*bed/, category: "breathing_intervention" },
  { pattern: /cold (?:application|compress|pack)|ice pack/, category: "circulation_intervention" },
  { pattern: /(?:heat|warm) (?:application|compress|pack)/, category: "circulation_intervention" },
];

const KEYWORD_FALLBACKS: ReadonlyArray<{ words: readonly string[]; category: InterventionCategory }> = [
  { words: ["fowler", "position", "breathing", "oxygen"], category: "breathing_intervention" },
  { words: ["pressure", "bleeding", "circulation"], category: "circulation_intervention" },
  { words: ["safety", "alarm", "fall"], category: "safety_intervention" },
];

export class RuleInterventionKnowledge implements InterventionKnowledge {
  readonly source = "rules";

  async getInterventionPurpose(term: string): Promise<string | null> {
    return this.lookup(term);
  }

  lookup(term: string): InterventionCategory | null {
    const text = normalizeTerm(term);
    const fact = NURSING_FACTS.find((entry) => entry.pattern.test(text));
    if (fact) return fact.category;

    const fallback = KEYWORD_FALLBACKS.find((entry) => entry.words.some((word) => text.includes(word)));
    return fallback?.category ?? null;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// LLM LOOKUP
// ═══════════════════════════════════════════════════════════════════════════════

const SYSTEM_PROMPT = `You are a nursing education assistant.
Provide factual nursing knowledge about interventions and their clinical purposes.
Be concise and focus on the primary clinical purpose of each intervention.`;

const PURPOSE_CATEGORIES: ReadonlyArray<{ words: readonly string[]; category: InterventionCategory }> = [
  { words: ["breathing", "oxygen", "respiratory", "airway"], category: "breathing_intervention" },
  { words: ["circulation", "blood", "cardiac", "heart"], category: "circulation_intervention" },
  { words: ["safety", "fall", "harm", "protect"], category: "safety_intervention" },
  { words: ["neuro", "brain", "consciousness"], category: "disability_intervention" },
];

/** Map a free-text purpose onto a category, or a snake_case form of the text. */
export function categorizePurpose(purpose: string): string | null {
  const text = purpose.trim().toLowerCase().replace(/[.!]+$/, "");
  if (!text) return null;
  const match = PURPOSE_CATEGORIES.find((entry) => entry.words.some((word) => text.includes(word)));
  return match ? match.category : text.replace(/\s+/g, "_");
}

export type CompletionFn = (request: LLMRequest) => Promise<LLMResponse>;

export class LlmInterventionKnowledge implements InterventionKnowledge {
  readonly source = "llm";

  constructor(
    private readonly provider: EngineConfig["knowledge"]["provider"] = "auto",
    private readonly completion: CompletionFn = complete,
  ) {}

  async getInterventionPurpose(term: string): Promise<string | null> {
    const response = await this.completion({
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        {
          role: "user",
          content: `What is the primary clinical purpose of: ${term}? Answer in 10 words or less, focusing on physiological effect.`,
        },
      ],
      config: { provider: this.provider, maxTokens: 50 },
    });
    return categorizePurpose(response.content);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CACHE + TIMEOUT + FALLBACK
// ═══════════════════════════════════════════════════════════════════════════════

class LookupTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`lookup exceeded ${timeoutMs}ms`);
    this.name = "LookupTimeoutError";
  }
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new LookupTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class ResilientInterventionKnowledge implements InterventionKnowledge {
  private readonly cache = new Map<string, Promise<string | null>>();

  constructor(
    private readonly primary: InterventionKnowledge,
    private readonly fallback: InterventionKnowledge = new RuleInterventionKnowledge(),
    private readonly timeoutMs: number = DEFAULT_ENGINE_CONFIG.knowledge.timeoutMs,
  ) {}

  get source(): string {
    return `${this.primary.source}+${this.fallback.source}`;
  }

  getInterventionPurpose(term: string): Promise<string | null> {
    const key = normalizeTerm(term);
    const cached = this.cache.get(key);
    if (cached) return cached;

    const lookup = this.resolve(key);
    this.cache.set(key, lookup);
    return lookup;
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private async resolve(term: string): Promise<string | null> {
    try {
      const purpose = await withTimeout(this.primary.getInterventionPurpose(term), this.timeoutMs);
      if (purpose !== null) return purpose;
    } catch (error) {
      console.warn(
        `[Knowledge] ${this.primary.source} lookup failed for "${term}", using ${this.fallback.source}:`,
        error instanceof Error ? error.message : error,
      );
    }
    return this.fallback.getInterventionPurpose(term);
  }
}

/**
 * Rules only unless lookups are enabled and a provider key is configured.
 */
export function createInterventionKnowledge(
  settings: EngineConfig["knowledge"],
  env: NodeJS.ProcessEnv = process.env,
): InterventionKnowledge {
  const rules = new RuleInterventionKnowledge();
  if (!settings.enabled) return rules;

  const available = getLLMAvailability(env);
  if (!available.openai && !available.anthropic) {
    console.warn("[Knowledge] Lookup enabled but no LLM key configured; using rule table");
    return rules;
  }

  return new ResilientInterventionKnowledge(new LlmInterventionKnowledge(settings.provider), rules, settings.timeoutMs);
}
