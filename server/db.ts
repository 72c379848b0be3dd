import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "@shared/schema";

const { Pool } = pg;

type PgPool = InstanceType<typeof Pool>;

let pool: PgPool | null = null;
let db: NodePgDatabase<typeof schema> | null = null;

// The pool is only created when the database store is selected
export function getPool(): PgPool {
  if (pool) return pool;

  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error("DATABASE_URL must be set when LEARNING_STORE=database");
  }

  // Managed Postgres commonly requires SSL; local dev typically does not.
  const shouldUseSsl =
    !connectionString.includes("localhost") &&
    !connectionString.includes("127.0.0.1") &&
    !connectionString.includes("0.0.0.0");

  const created = new Pool({
    connectionString,
    ...(shouldUseSsl ? { ssl: { rejectUnauthorized: false } } : {}),
    max: 10,
    connectionTimeoutMillis: 8000,
    idleTimeoutMillis: 30000,
    keepAlive: true,
  });

  // Handle pool errors to prevent uncaught exceptions crashing the process
  created.on("error", (err) => {
    console.error("[DB Pool] Unexpected error on idle client:", err.message);
  });

  pool = created;
  return created;
}

export function getDb(): NodePgDatabase<typeof schema> {
  if (!db) db = drizzle(getPool(), { schema });
  return db;
}

// Graceful shutdown helper
export async function closePool(): Promise<void> {
  if (!pool) return;
  console.log("[DB Pool] Closing connections...");
  await pool.end();
  pool = null;
  db = null;
  console.log("[DB Pool] All connections closed");
}

function isMessageMatch(message: string, patterns: string[]): boolean {
  const lower = message.toLowerCase();
  return patterns.some((pattern) => lower.includes(pattern));
}

function readStringField(error: object, field: "message" | "code"): string {
  const value: unknown = Reflect.get(error, field);
  return typeof value === "string" ? value : "";
}

export function isDatabaseConnectionError(error: unknown): boolean {
  if (!error || typeof error !== "object") return false;
  const message = readStringField(error, "message");
  const code = readStringField(error, "code");
  if (["ETIMEDOUT", "ECONNRESET", "ECONNREFUSED", "ENOTFOUND", "EHOSTUNREACH", "EPIPE"].includes(code)) {
    return true;
  }
  if (isMessageMatch(message, ["connection terminated", "connection reset", "connection ended", "getaddrinfo", "timeout"])) {
    return true;
  }
  const inner: unknown = Reflect.get(error, "errors");
  if (Array.isArray(inner)) {
    return inner.some((entry: unknown) => isDatabaseConnectionError(entry));
  }
  return false;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Retry wrapper for database operations with exponential backoff
export async function withDbRetry<T>(
  operation: () => Promise<T>,
  options: {
    maxRetries?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
    operationName?: string;
  } = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 500,
    maxDelayMs = 5000,
    operationName = "database operation",
  } = options;

  let lastError: unknown = null;
  let delay = initialDelayMs;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      return await operation();
    } catch (error: unknown) {
      lastError = error;

      if (!isDatabaseConnectionError(error)) {
        // Non-connection error - don't retry
        throw error;
      }

      if (attempt === maxRetries) {
        console.error(`[DB Retry] ${operationName} failed after ${maxRetries} attempts:`, errorMessage(error));
        throw error;
      }

      console.warn(`[DB Retry] ${operationName} attempt ${attempt} failed: ${errorMessage(error)}. Retrying in ${delay}ms...`);

      await new Promise((resolve) => setTimeout(resolve, delay));
      delay = Math.min(delay * 2, maxDelayMs);
    }
  }

  throw lastError ?? new Error(`${operationName} failed after ${maxRetries} retries`);
}
