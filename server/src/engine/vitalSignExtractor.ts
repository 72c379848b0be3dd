/**
 * VITAL SIGN EXTRACTOR
 *
 * Pulls numeric clinical values out of free text. Each sign owns an ordered
 * list of templates; the first template that matches wins and later ones are
 * not consulted.
 */

import type { VitalReadings, VitalSign } from "./priorityContract";

interface VitalTemplate {
  pattern: RegExp;
  /** Maps the capture groups to readings; returning null skips the match */
  read: (groups: string[]) => VitalReadings | null;
}

function single(sign: VitalSign) {
  return (groups: string[]): VitalReadings | null => {
    const value = Number.parseFloat(groups[0]);
    if (!Number.isFinite(value)) return null;
    const readings: VitalReadings = {};
    readings[sign] = value;
    return readings;
  };
}

/**
 * A label may be joined to its value by a short linking word or punctuation
 * only ("heart rate of 52", "BP: 90/60", "glucose is 58"). Anything longer
 * reads as an instruction ("check the pulse every 15 minutes").
 */
const LINK = String.raw`(?:\s+(?:rate|level|reading))?\s*(?:(?:of|is|was|at|reads|measured at|:|=)\s*)?`;

// A number followed by a time unit is an interval, not a reading
const NOT_DURATION = String.raw`(?!\s*(?:min(?:ute)?s?|hours?|hrs?|seconds?|secs?|days?)\b)`;

function labelled(label: string, value: string): RegExp {
  return new RegExp(`(?:${label})${LINK}${value}${NOT_DURATION}`, "i");
}

function temperatureByMagnitude(groups: string[]): VitalReadings | null {
  const value = Number.parseFloat(groups[0]);
  if (!Number.isFinite(value)) return null;
  // No unit marker: body temperatures below 50 can only be Celsius
  return value < 50 ? { temperatureC: value } : { temperatureF: value };
}

// ============================================================================
// TEMPLATES (first match wins within each group)
// ============================================================================

const TEMPLATE_GROUPS: VitalTemplate[][] = [
  // Heart rate
  [
    {
      pattern: labelled(String.raw`\bHR\b|heart rate|apical pulse|\bpulse\b(?!\s*ox)`, String.raw`(\d{2,3})\b`),
      read: single("heartRate"),
    },
    { pattern: /\b(\d{2,3})\s*(?:beats\s*(?:per|\/)\s*min(?:ute)?|bpm)\b/i, read: single("heartRate") },
  ],
  // Respiratory rate
  [
    {
      pattern: labelled(String.raw`\bRR\b|respiratory rate|respirations?`, String.raw`(\d{1,2})\b`),
      read: single("respiratoryRate"),
    },
    { pattern: /\b(\d{1,2})\s*breaths\s*(?:per|\/)\s*min(?:ute)?\b/i, read: single("respiratoryRate") },
  ],
  // Blood pressure, always as a pair
  [
    {
      pattern: /\b(\d{2,3})\s*\/\s*(\d{2,3})\s*mm\s*Hg\b/i,
      read: (groups) => ({ systolicBp: Number(groups[0]), diastolicBp: Number(groups[1]) }),
    },
    {
      pattern: labelled(String.raw`\bBP\b|blood pressure`, String.raw`(\d{2,3})\s*\/\s*(\d{2,3})\b`),
      read: (groups) => ({ systolicBp: Number(groups[0]), diastolicBp: Number(groups[1]) }),
    },
  ],
  // Temperature; the unit marker decides the scale
  [
    {
      pattern: /(?<![\d.])(\d{2,3}(?:\.\d+)?)\s*(?:°\s*|degrees?\s*)?(?:F\b|[Ff]ahrenheit)/,
      read: single("temperatureF"),
    },
    {
      pattern: /(?<![\d.])(\d{2}(?:\.\d+)?)\s*(?:°\s*|degrees?\s*)?(?:C\b|[Cc]elsius)/,
      read: single("temperatureC"),
    },
    {
      pattern: labelled(String.raw`\btemp(?:erature)?\b`, String.raw`(\d{2,3}(?:\.\d+)?)\b`),
      read: temperatureByMagnitude,
    },
  ],
  // Oxygen saturation
  [
    {
      pattern: labelled(
        String.raw`SpO2|SaO2|O2\s*sat(?:uration)?|oxygen saturation|pulse oximetry`,
        String.raw`(\d{2,3})\b`,
      ),
      read: single("oxygenSaturation"),
    },
    { pattern: /\b(\d{2,3})\s*%\s*(?:on room air|saturation|SpO2)/i, read: single("oxygenSaturation") },
  ],
  // Blood glucose
  [
    {
      pattern: labelled(String.raw`glucose|blood sugar|\bBG\b`, String.raw`(\d{2,3})\b`),
      read: single("bloodGlucose"),
    },
    { pattern: /(?<![\d.])(\d{2,3})\s*mg\/dL/i, read: single("bloodGlucose") },
  ],
];

/**
 * Extract at most one value per vital sign from `text`. Returns an empty
 * record when nothing matches.
 */
export function extractVitalSigns(text: string): VitalReadings {
  const readings: VitalReadings = {};
  if (!text) return readings;

  for (const templates of TEMPLATE_GROUPS) {
    for (const template of templates) {
      const match = template.pattern.exec(text);
      if (!match) continue;
      const values = template.read(match.slice(1));
      if (values) {
        Object.assign(readings, values);
        break;
      }
    }
  }

  return readings;
}

export function hasVitalReadings(readings: VitalReadings): boolean {
  return Object.keys(readings).length > 0;
}
