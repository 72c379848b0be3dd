/**
 * PRIORITY RULES
 *
 * Rule tables consumed by the option evaluator:
 *   - Stack of Four tier keywords (life threats, safety, Maslow needs)
 *   - Finding rules: a pattern plus an outcome that is either a fixed score
 *     or a threshold test over the numbers the pattern captured
 *   - Wording classes: assessment, intervention, normal-finding
 *
 * Every rule carries an id; the id is the learning key its weight is read under.
 */

// ============================================================================
// STACK OF FOUR TIERS
// ============================================================================

export interface TierRule {
  id: string;
  label: string;
  pattern: RegExp;
  score: number;
}

/**
 * Checked in order; the first matching tier gives the option its score.
 * Scores stay below the critical sentinel so a real finding always wins.
 */
export const STACK_OF_FOUR_TIERS: readonly TierRule[] = [
  {
    id: "tier:airway",
    label: "airway",
    pattern: /\b(?:airway|choking|stridor|obstruct\w*|suction\w*)\b/i,
    score: 900,
  },
  {
    id: "tier:breathing",
    label: "breathing",
    pattern: /\b(?:breathing|oxygen|O2|respiratory|dyspnea|wheez\w*|high[- ]Fowler'?s?)\b/i,
    score: 880,
  },
  {
    id: "tier:circulation",
    label: "circulation",
    pattern: /\b(?:circulation|pulse|bleeding|hemorrhag\w*|cardiac|compressions?)\b/i,
    score: 860,
  },
  {
    id: "tier:disability",
    label: "disability",
    pattern: /\b(?:neuro\w*|level of consciousness|LOC|pupils?|seizures?|paralysis|ICP)\b/i,
    score: 840,
  },
  {
    id: "tier:safety",
    label: "safety",
    pattern: /\b(?:safety|falls?|restraints?|bed rails?|side rails?|call (?:bell|light)|infection|isolation|PPE)\b/i,
    score: 700,
  },
  {
    id: "tier:glucose",
    label: "glucose",
    pattern: /\b(?:glucose|hypoglycemia|insulin|sugar|sweaty|shaky)\b/i,
    score: 650,
  },
  {
    id: "tier:elimination",
    label: "elimination",
    pattern: /\b(?:urinary|urine output|retention|catheter|void\w*|bowel)\b/i,
    score: 620,
  },
  {
    id: "tier:pain",
    label: "pain",
    pattern: /\b(?:pain|hurts?|discomfort|analgesics?|morphine)\b/i,
    score: 600,
  },
];

export function matchTier(text: string): TierRule | null {
  return STACK_OF_FOUR_TIERS.find((tier) => tier.pattern.test(text)) ?? null;
}

// ============================================================================
// FINDING RULES
// ============================================================================

export type FindingOutcome =
  | { kind: "fixed"; score: number }
  | { kind: "threshold"; score: number; test: (values: number[]) => boolean };

export interface FindingRule {
  id: string;
  category: "side_effect" | "risk_behavior" | "deterioration" | "post_op" | "assessment_finding" | "laboratory";
  pattern: RegExp;
  outcome: FindingOutcome;
  reasoning: string;
}

export const FINDING_RULES: readonly FindingRule[] = [
  // Medication side effects requiring action
  {
    id: "finding:tachycardia-palpitations",
    category: "side_effect",
    pattern: /heart rate\D{0,20}(\d{2,3}).*palpitations/i,
    outcome: { kind: "threshold", score: 1100, test: ([rate]) => rate >= 135 },
    reasoning: "rapid heart rate with palpitations",
  },
  {
    id: "finding:respiratory-depression",
    category: "side_effect",
    pattern: /\brespiratory depression\b/i,
    outcome: { kind: "fixed", score: 1000 },
    reasoning: "respiratory depression",
  },
  {
    id: "finding:airway-swelling",
    category: "side_effect",
    pattern: /\b(?:anaphylaxis|swelling of the (?:tongue|throat|lips)|(?:tongue|throat) swelling)\b/i,
    outcome: { kind: "fixed", score: 1200 },
    reasoning: "airway swelling",
  },
  {
    id: "finding:chest-pain",
    category: "side_effect",
    pattern: /\b(?:chest pain|crushing)\b/i,
    outcome: { kind: "fixed", score: 1000 },
    reasoning: "chest pain",
  },
  {
    id: "finding:mild-irritation",
    category: "side_effect",
    pattern: /\bmild\b.*\birritation\b/i,
    outcome: { kind: "fixed", score: 100 },
    reasoning: "mild irritation",
  },

  // Self-harm and violence risk
  {
    id: "finding:specific-plan",
    category: "risk_behavior",
    pattern: /\b(?:specific|detailed) plan\b/i,
    outcome: { kind: "fixed", score: 1000 },
    reasoning: "specific plan for self-harm",
  },
  {
    id: "finding:command-hallucinations",
    category: "risk_behavior",
    pattern: /\bcommand hallucinations?\b/i,
    outcome: { kind: "fixed", score: 900 },
    reasoning: "command hallucinations",
  },
  {
    id: "finding:prior-attempt",
    category: "risk_behavior",
    pattern: /\b(?:previous|prior) (?:suicide )?attempt\b/i,
    outcome: { kind: "fixed", score: 800 },
    reasoning: "previous attempt",
  },
  {
    id: "finding:harm-to-others",
    category: "risk_behavior",
    pattern: /\b(?:homicidal|harm\w* (?:to )?others)\b/i,
    outcome: { kind: "fixed", score: 1000 },
    reasoning: "risk of harm to others",
  },

  // Clinical deterioration
  {
    id: "finding:new-confusion",
    category: "deterioration",
    pattern: /\b(?:new[- ]onset|sudden|acute)\b.*\bconfusion\b/i,
    outcome: { kind: "fixed", score: 900 },
    reasoning: "new-onset confusion",
  },
  {
    id: "finding:absent-pulse",
    category: "deterioration",
    pattern: /\b(?:decreased|absent|weak|thready)\b.*\bpulses?\b/i,
    outcome: { kind: "fixed", score: 1200 },
    reasoning: "diminished or absent pulse",
  },
  {
    id: "finding:cyanosis",
    category: "deterioration",
    pattern: /\b(?:cyanosis|cyanotic|dusky)\b/i,
    outcome: { kind: "fixed", score: 1000 },
    reasoning: "cyanosis",
  },
  {
    id: "finding:unresponsive",
    category: "deterioration",
    pattern: /\bunresponsive\b/i,
    outcome: { kind: "fixed", score: 1200 },
    reasoning: "unresponsive",
  },
  {
    id: "finding:worsening-pain",
    category: "deterioration",
    pattern: /\b(?:severe|increasing|worsening)\b.*\bpain\b/i,
    outcome: { kind: "fixed", score: 700 },
    reasoning: "worsening pain",
  },

  // Post-operative complications
  {
    id: "finding:dehiscence",
    category: "post_op",
    pattern: /\b(?:dehiscence|evisceration)\b/i,
    outcome: { kind: "fixed", score: 1100 },
    reasoning: "wound dehiscence",
  },
  {
    id: "finding:post-op-bleeding",
    category: "post_op",
    pattern: /\bpost[- ]?op\w*\b.*\bbleeding\b/i,
    outcome: { kind: "fixed", score: 1000 },
    reasoning: "post-operative bleeding",
  },

  // Assessment findings
  {
    id: "finding:abnormal-pupils",
    category: "assessment_finding",
    pattern: /\bpupils?\b.*\b(?:fixed|dilated|unequal|nonreactive)\b/i,
    outcome: { kind: "fixed", score: 900 },
    reasoning: "abnormal pupils",
  },
  {
    id: "finding:rigid-abdomen",
    category: "assessment_finding",
    pattern: /\b(?:board-like|rigid)\b.*\babdomen\b/i,
    outcome: { kind: "fixed", score: 900 },
    reasoning: "rigid abdomen",
  },
  {
    id: "finding:thunderclap-headache",
    category: "assessment_finding",
    pattern: /\bsudden\b.*\bsevere\b.*\bheadache\b/i,
    outcome: { kind: "fixed", score: 900 },
    reasoning: "sudden severe headache",
  },

  // Laboratory values
  {
    id: "finding:potassium",
    category: "laboratory",
    pattern: /\bpotassium\D{0,20}(\d+(?:\.\d+)?)\s*mEq/i,
    outcome: { kind: "threshold", score: 1000, test: ([level]) => level < 3 || level > 5.5 },
    reasoning: "dangerous potassium level",
  },
  {
    id: "finding:sodium",
    category: "laboratory",
    pattern: /\bsodium\D{0,20}(\d{3})\s*mEq/i,
    outcome: { kind: "threshold", score: 900, test: ([level]) => level < 125 || level > 155 },
    reasoning: "dangerous sodium level",
  },
  {
    id: "finding:inr",
    category: "laboratory",
    pattern: /\bINR\D{0,20}(\d+(?:\.\d+)?)/i,
    outcome: { kind: "threshold", score: 900, test: ([ratio]) => ratio > 4 },
    reasoning: "INR above the therapeutic range",
  },
  {
    id: "finding:urine-output",
    category: "laboratory",
    pattern: /\burine output\D{0,20}(\d{1,3})\s*mL(?:\/h(?:ou)?r|\s+per hour)/i,
    outcome: { kind: "threshold", score: 900, test: ([output]) => output < 30 },
    reasoning: "urine output below 30 mL per hour",
  },
];

export interface FindingMatch {
  rule: FindingRule;
  score: number;
}

/** Evaluate every finding rule against `text`; both outcome kinds are handled explicitly. */
export function matchFindings(text: string): FindingMatch[] {
  const matches: FindingMatch[] = [];
  for (const rule of FINDING_RULES) {
    const match = rule.pattern.exec(text);
    if (!match) continue;

    const outcome = rule.outcome;
    switch (outcome.kind) {
      case "fixed":
        matches.push({ rule, score: outcome.score });
        break;
      case "threshold": {
        const values = match.slice(1).map(Number);
        if (values.length > 0 && values.every(Number.isFinite) && outcome.test(values)) {
          matches.push({ rule, score: outcome.score });
        }
        break;
      }
    }
  }
  return matches;
}

// ============================================================================
// WORDING CLASSES
// ============================================================================

export const ASSESSMENT_PATTERN = /\b(?:assess\w*|check\w*|monitor\w*|measure\w*|observe|inspect|auscultate|obtain (?:a |the )?(?:vital signs|reading))\b/i;

export const INTERVENTION_VERB_PATTERN = /\b(?:give|administer|perform|begin|start|apply|initiate|provide|insert|elevate|position|place|notify|call|report)\b/i;

export const NURSING_ACTION_PATTERN = /\b(?:provide|ensure|maintain|position|keep|modify|adjust|rotate|assess|monitor|check|document|notify|report)\b/i;

export const NORMAL_FINDING_PATTERN = /\b(?:normal (?:range|limits|findings?)|within normal|stable vital signs|no (?:acute )?distress|alert and oriented|clear lung sounds|regular rhythm|pink and warm)\b/i;
