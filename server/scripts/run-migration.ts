import "dotenv/config";
import fs from "fs";
import path from "path";
import { closePool, getPool } from "../db";

const MIGRATION_FILE = "0001_learning_statistics.sql";

async function runMigration() {
  try {
    const migrationPath = path.join(process.cwd(), "migrations", MIGRATION_FILE);
    const sql = fs.readFileSync(migrationPath, "utf8");

    console.log(`Running migration: ${MIGRATION_FILE}`);
    await getPool().query(sql);
    console.log("Migration completed successfully!");
  } catch (error: unknown) {
    console.error("Migration failed:", error instanceof Error ? error.message : error);
    process.exitCode = 1;
  } finally {
    await closePool();
  }
}

void runMigration();
