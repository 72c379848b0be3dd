import "dotenv/config";
import express, { type NextFunction, type Request, type Response } from "express";
import { createServer } from "http";
import { closePool } from "./db";
import { registerRoutes } from "./routes";
import { loadEngineConfig } from "./src/config";
import { PredictionService } from "./src/services/predictionService";

process.on("unhandledRejection", (reason) => {
  console.error("[Process] Unhandled Rejection:", reason);
});

const app = express();
const httpServer = createServer(app);

app.use(express.json({ limit: "1mb" }));

export function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      log(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
    }
  });

  next();
});

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    const status: unknown = Reflect.get(err, "status") ?? Reflect.get(err, "statusCode");
    if (typeof status === "number" && status >= 400 && status < 600) return status;
  }
  return 500;
}

async function main(): Promise<void> {
  const config = loadEngineConfig();
  const service = await PredictionService.create(config);

  await registerRoutes(httpServer, app, service);

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    const message = err instanceof Error && err.message ? err.message : "Internal Server Error";
    if (status >= 500) console.error("[Server] Request failed:", err);
    res.status(status).json({ message });
  });

  // Graceful shutdown: persist learning statistics, then release the pool
  async function gracefulShutdown(signal: string): Promise<void> {
    console.log(`[Process] Received ${signal}, shutting down gracefully...`);
    try {
      await service.shutdown();
      await closePool();
      process.exit(0);
    } catch (err) {
      console.error("[Process] Error during shutdown:", err);
      process.exit(1);
    }
  }

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

  const port = parseInt(process.env.PORT || "5000", 10);
  httpServer.listen(port, "0.0.0.0", () => {
    log(`serving on port ${port}`);
  });
}

main().catch((error: unknown) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
