import { describe, it, expect } from "vitest";
import { loadClinicalKnowledgeBase } from "../knowledge/clinicalKnowledgeBase";
import { extractClinicalContext } from "./clinicalContextExtractor";

const kb = loadClinicalKnowledgeBase();

describe("extractClinicalContext", () => {
  it("collects medications, symptoms and urgency from the stem", () => {
    const context = extractClinicalContext(
      kb,
      "A client with rapid, irregular heartbeats is prescribed a beta-blocker. Which finding should the nurse report immediately?",
    );

    expect(context).toEqual({
      medications: { beta_blocker: true },
      conditions: {},
      symptoms: ["palpitations"],
      vitals: {},
      isEmergency: true,
      timeframe: "unspecified",
      ageGroup: "adult",
      identifiedPatterns: [],
    });
  });

  it("reads stem vitals and conditions together", () => {
    const context = extractClinicalContext(kb, "A client with COPD has an oxygen saturation of 89%.");
    expect(context.conditions).toEqual({ copd: true });
    expect(context.vitals).toEqual({ oxygenSaturation: 89 });
    expect(context.isEmergency).toBe(false);
  });

  it("adds bradycardia for a stem heart rate below 60", () => {
    const context = extractClinicalContext(kb, "The client's heart rate is 54 this morning.");
    expect(context.conditions.bradycardia).toBe(true);
  });

  describe("identified patterns", () => {
    it("marks a pattern the stem names outright", () => {
      const context = extractClinicalContext(kb, "The nurse is caring for a client at risk for hypoglycemia.");
      expect(context.identifiedPatterns).toHaveLength(1);
      expect(context.identifiedPatterns[0]).toMatchObject({ id: "hypoglycemia", tier: "life_threat", identifiedBy: "named" });
    });

    it("prefers the trigger when both the trigger and the name are present", () => {
      const context = extractClinicalContext(kb, "A client with hypoglycemia has a glucose of 62 mg/dL.");
      expect(context.identifiedPatterns.map((pattern) => [pattern.id, pattern.identifiedBy])).toEqual([
        ["hypoglycemia", "trigger"],
      ]);
    });
  });

  describe("timeframe", () => {
    it("detects acute wording", () => {
      expect(extractClinicalContext(kb, "The client has sudden onset of confusion.").timeframe).toBe("acute");
    });

    it("detects chronic wording", () => {
      expect(extractClinicalContext(kb, "The client has a history of hypertension.").timeframe).toBe("chronic");
    });
  });

  describe("age group", () => {
    it("reads infants from month ages", () => {
      expect(extractClinicalContext(kb, "A 6-month-old is brought to the clinic.").ageGroup).toBe("infant");
    });

    it("reads children from year ages", () => {
      expect(extractClinicalContext(kb, "A 15-year-old reports dizziness.").ageGroup).toBe("pediatric");
      expect(extractClinicalContext(kb, "A 72-year-old reports dizziness.").ageGroup).toBe("adult");
    });
  });

  it("widens the vocabulary scan to the options when given", () => {
    const stem = "Which finding should the nurse expect?";
    expect(extractClinicalContext(kb, stem).symptoms).toEqual([]);
    expect(extractClinicalContext(kb, stem, { A: "Fruity breath", B: "Warm skin" }).symptoms).toEqual(["fruity_breath"]);
  });
});
