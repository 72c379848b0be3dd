/**
 * Priority Engine Tests
 *
 * End-to-end predictions over the bundled knowledge base.
 */

import { describe, it, expect } from "vitest";
import { DEFAULT_ENGINE_CONFIG, mergeConfig } from "../config";
import { loadClinicalKnowledgeBase } from "../knowledge/clinicalKnowledgeBase";
import type { PriorityQuestion } from "./priorityContract";
import { PriorityEngine } from "./priorityEngine";

const knowledgeBase = loadClinicalKnowledgeBase();
const engine = new PriorityEngine({ knowledgeBase });

const BETA_BLOCKER_QUESTION: PriorityQuestion = {
  id: "q-beta-blocker",
  stem: "A client with rapid, irregular heartbeats is prescribed a beta-blocker. Which finding should the nurse report immediately?",
  options: {
    A: "Heart rate of 52 beats per minute",
    B: "Respiratory rate of 18 breaths per minute",
    C: "Blood pressure of 130/80 mm Hg",
    D: "Reports of mild fatigue",
  },
  format: "single",
};

describe("PriorityEngine", () => {
  describe("single answer", () => {
    it("flags a heart rate below the beta-blocker hold threshold", () => {
      const result = engine.predict(BETA_BLOCKER_QUESTION);

      expect(result.answers).toEqual(["A"]);
      expect(result.baseAnswers).toEqual(["A"]);
      expect(result.options.map((option) => option.evaluation.score)).toEqual([1000, 0, 0, 0]);
      expect(result.firedRules).toEqual(["vital:abnormal", "hold:beta_blocker:heartRate"]);
      expect(result.confidence).toBe(1);
      expect(result.appliedException).toBeNull();
      expect(result.decisionLog).toEqual([]);
    });

    it("does not read a reassessment interval as a vital sign", () => {
      const result = engine.predict({
        id: "q-post-op",
        stem: "A client returned from abdominal surgery two hours ago. Which action should the nurse take first?",
        options: {
          A: "Check the pulse every 15 minutes",
          B: "Position the client to maintain a patent airway",
        },
        format: "single",
      });

      expect(result.answers).toEqual(["B"]);
      expect(result.options.map((option) => option.evaluation.score)).toEqual([860, 900]);
      expect(result.options[0].evaluation.isCritical).toBe(false);
    });

    it("treats a shaky, sweaty diabetic client before checking glucose", () => {
      const result = engine.predict({
        id: "q-hypoglycemia",
        stem: "A client with diabetes reports feeling shaky and sweaty. What should the nurse do first?",
        options: {
          A: "Check blood glucose level",
          B: "Give 15 grams of simple carbohydrates",
          C: "Call the physician",
          D: "Document the symptoms",
        },
        format: "single",
      });

      expect(result.answers).toEqual(["B"]);
      expect(result.options[0].evaluation.score).toBe(650);
      expect(result.firedRules).toEqual([]);
      expect(result.confidence).toBeLessThan(0.5);
    });

    it("never picks a contraindicated option", () => {
      const result = engine.predict({
        id: "q-copd",
        stem: "A client with COPD has an oxygen saturation of 89%. Which action is most appropriate?",
        options: {
          A: "Apply high-flow oxygen via non-rebreather mask",
          B: "Place the client in high Fowler's position",
          C: "Encourage oral fluids",
          D: "Offer a back rub",
        },
        format: "single",
      });

      expect(result.answers).toEqual(["B"]);
      expect(result.options[0].evaluation.score).toBe(-1000);
      expect(result.firedRules).toEqual(["tier:breathing"]);
      expect(result.confidence).toBe(0.94);
    });

    it("overrides the base answer on an AVOID question", () => {
      const result = engine.predict({
        id: "q-avoid",
        stem: "A client is agitated and pulling at an IV line. Which action should the nurse avoid?",
        options: {
          A: "Speak to the client in a calm voice",
          B: "Stay with the client and reorient to the surroundings",
          C: "Restrain the client's arms to the bed",
          D: "Place the call light within reach",
        },
        format: "single",
      });

      expect(result.baseAnswers).toEqual(["D"]);
      expect(result.answers).toEqual(["C"]);
      expect(result.appliedException).toMatchObject({ type: "exclusion", overrideAnswers: ["C"] });
      expect(result.firedRules).toEqual(["exception:exclusion"]);
      expect(result.confidence).toBe(0.95);
    });

    it("answers nothing for a question without options", () => {
      const result = engine.predict({ id: "q-empty", stem: "What should the nurse do first?", options: {}, format: "single" });

      expect(result.answers).toEqual([]);
      expect(result.confidence).toBe(0);
      expect(result.detectedExceptions).toEqual([]);
    });
  });

  describe("select all that apply", () => {
    it("selects the expected findings of the named pattern", () => {
      const result = engine.predict({
        id: "q-sata",
        stem: "The nurse is caring for a client at risk for hypoglycemia. Which signs should the nurse monitor for? Select all that apply.",
        options: {
          A: "Shakiness",
          B: "Confusion",
          C: "Polyuria",
          D: "Diaphoresis",
          E: "Fruity breath",
        },
        format: "sata",
      });

      expect(result.answers).toEqual(["A", "B", "D"]);
      expect(result.firedRules).toEqual(["pattern-finding:hypoglycemia"]);
      expect(result.confidence).toBe(1);
    });

    it("reports an exception without changing the selection", () => {
      const result = engine.predict({
        id: "q-sata-avoid",
        stem: "Which actions should the nurse avoid? Select all that apply.",
        options: { A: "Restrain the client", B: "Speak calmly", C: "Document the event" },
        format: "sata",
      });

      expect(result.answers).toEqual(["A", "C"]);
      expect(result.answers).toEqual(result.baseAnswers);
      expect(result.appliedException?.type).toBe("exclusion");
      expect(result.firedRules).not.toContain("exception:exclusion");
    });
  });

  describe("ordered response", () => {
    it("returns one comma-joined sequence", () => {
      const result = engine.predict({
        id: "q-ordered",
        stem: "The nurse finds a client unresponsive in bed. In what order should the nurse act?",
        options: {
          A: "Check for a pulse",
          B: "Call for help",
          C: "Begin chest compressions",
          D: "Document the event",
        },
        format: "ordered",
      });

      expect(result.answers).toEqual(["A,C,B,D"]);
      expect(result.firedRules).toEqual(["tier:circulation", "assessment"]);
      expect(result.confidence).toBe(0.33);
    });
  });

  describe("debug mode", () => {
    it("fills the decision log", () => {
      const debugEngine = new PriorityEngine({
        knowledgeBase,
        config: mergeConfig(DEFAULT_ENGINE_CONFIG, { debug: true }),
      });

      expect(debugEngine.predict(BETA_BLOCKER_QUESTION).decisionLog).toEqual([
        "Context: medications [beta_blocker], conditions [none], vitals [none], patterns [none], emergency true, timeframe unspecified, age adult",
        "A = 1000 [vital:abnormal, hold:beta_blocker:heartRate]",
        "B = 0 []",
        "C = 0 []",
        "D = 0 []",
        "Selected A with score 1000",
      ]);
    });
  });

  it("reads rule weights from the weight source", () => {
    const weighted = new PriorityEngine({
      knowledgeBase,
      weights: { getWeight: (ruleId) => (ruleId === "hold:beta_blocker:heartRate" ? 0.5 : 1) },
    });

    // The hold rule now scores 500, below the abnormal-vital sentinel
    expect(weighted.predict(BETA_BLOCKER_QUESTION).options[0].evaluation.score).toBe(600);
  });
});
