/**
 * Vital Sign Extractor Tests
 */

import { describe, it, expect } from "vitest";
import { extractVitalSigns, hasVitalReadings } from "./vitalSignExtractor";

describe("extractVitalSigns", () => {
  describe("single readings", () => {
    it("reads a labelled heart rate", () => {
      expect(extractVitalSigns("Heart rate of 52 beats per minute")).toEqual({ heartRate: 52 });
    });

    it("reads a respiratory rate", () => {
      expect(extractVitalSigns("Respiratory rate of 18 breaths per minute")).toEqual({ respiratoryRate: 18 });
    });

    it("reads blood pressure as a systolic/diastolic pair", () => {
      expect(extractVitalSigns("Blood pressure of 130/80 mm Hg")).toEqual({ systolicBp: 130, diastolicBp: 80 });
    });

    it("uses the unit marker for Fahrenheit", () => {
      expect(extractVitalSigns("Temperature 101.2°F")).toEqual({ temperatureF: 101.2 });
    });

    it("treats an unmarked temperature below 50 as Celsius", () => {
      expect(extractVitalSigns("temperature of 38.5")).toEqual({ temperatureC: 38.5 });
    });

    it("reads oxygen saturation", () => {
      expect(extractVitalSigns("SpO2: 91%")).toEqual({ oxygenSaturation: 91 });
    });

    it("reads blood glucose with its unit", () => {
      expect(extractVitalSigns("glucose 58 mg/dL")).toEqual({ bloodGlucose: 58 });
    });
  });

  describe("combined text", () => {
    it("reads every abbreviated sign in one sentence", () => {
      expect(extractVitalSigns("HR 110, RR 24, BP 90/60, SpO2 93% on room air")).toEqual({
        heartRate: 110,
        respiratoryRate: 24,
        systolicBp: 90,
        diastolicBp: 60,
        oxygenSaturation: 93,
      });
    });

    it("keeps the first matching template for a sign", () => {
      expect(extractVitalSigns("Pulse of 88, later 92 beats per minute")).toEqual({ heartRate: 88 });
    });
  });

  describe("no readings", () => {
    it("returns an empty record for text without numbers", () => {
      const readings = extractVitalSigns("Reports of mild fatigue");
      expect(readings).toEqual({});
      expect(hasVitalReadings(readings)).toBe(false);
    });

    it("returns an empty record for empty text", () => {
      expect(extractVitalSigns("")).toEqual({});
    });

    it.each([
      "Check the pulse every 15 minutes",
      "Reassess the temperature in 30 minutes",
      "Count respirations for 1 full minute",
      "Recheck the blood glucose in 15 minutes",
      "Take the heart rate 10 minutes after the dose",
    ])("ignores timing numbers in %s", (text) => {
      expect(extractVitalSigns(text)).toEqual({});
    });
  });
});
