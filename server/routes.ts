import type { Express, NextFunction, Request, Response } from "express";
import type { Server } from "http";
import { evaluateRequestSchema, feedbackRequestSchema, predictRequestSchema } from "@shared/schema";
import { getLLMAvailability } from "./src/knowledge/llmService";
import type { PredictionService } from "./src/services/predictionService";

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

// Express 4 does not forward rejected promises; hand them to the error middleware
function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  service: PredictionService,
): Promise<Server> {
  // ═══════════════════════════════════════════════════════════════════════════════
  // HEALTH
  // ═══════════════════════════════════════════════════════════════════════════════

  app.get("/api/health", (_req, res) => {
    res.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      learningStore: service.recorder.storeKind,
      knowledgeLookup: {
        enabled: service.config.knowledge.enabled,
        providers: getLLMAvailability(),
      },
      uptime: process.uptime(),
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // PREDICTION
  // ═══════════════════════════════════════════════════════════════════════════════

  app.post(
    "/api/predict",
    route(async (req, res) => {
      const parsed = predictRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.errors });
      }
      const { question, record, enrich } = parsed.data;
      const prediction = await service.predict(question, { record, enrich });
      res.json(prediction);
    }),
  );

  app.post(
    "/api/evaluate",
    route(async (req, res) => {
      const parsed = evaluateRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.errors });
      }
      const run = await service.evaluate(parsed.data.questions, parsed.data.record);
      res.json(run);
    }),
  );

  // ═══════════════════════════════════════════════════════════════════════════════
  // LEARNING
  // ═══════════════════════════════════════════════════════════════════════════════

  app.post(
    "/api/feedback",
    route(async (req, res) => {
      const parsed = feedbackRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.errors });
      }
      const outcome = await service.recordFeedback(parsed.data);
      res.status(201).json(outcome);
    }),
  );

  app.get("/api/learning/weights", (_req, res) => {
    res.json({ weights: service.getWeights(), minSamples: service.config.learning.minSamples });
  });

  app.get("/api/learning/report", (_req, res) => {
    res.json(service.getReport());
  });

  return httpServer;
}
