import { Pool } from "pg";
import { config } from "../config";
import { logger } from "../logger";

let pool: Pool | null = null;

export function getDb(): Pool | null {
  if (config.useInMemoryStore) {
    return null;
  }
  if (!pool) {
    pool = new Pool({
      host: config.db.host,
      port: config.db.port,
      user: config.db.user,
      password: config.db.password,
      database: config.db.database
    });
  }
  return pool;
}

export async function migrate(): Promise<void> {
  const db = getDb();
  if (!db) {
    logger.warn({ traceId: "system" }, "In-memory store selected; saga persistence is not durable");
    return;
  }
  await db.query(
    `CREATE TABLE IF NOT EXISTS sagas (
      transaction_id TEXT PRIMARY KEY,
      trace_id TEXT NOT NULL,
      customer_id INTEGER NOT NULL,
      vehicle_id INTEGER NOT NULL,
      payment_type TEXT NOT NULL,
      amount DOUBLE PRECISION NOT NULL,
      status TEXT NOT NULL,
      payment_code TEXT,
      payment_id TEXT,
      completed_steps JSONB NOT NULL DEFAULT '[]'::jsonb,
      compensation JSONB,
      interrupted_step TEXT,
      last_event_type TEXT,
      failure_reason TEXT,
      version INTEGER NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )`
  );
  await db.query("CREATE INDEX IF NOT EXISTS sagas_status_updated_at_idx ON sagas (status, updated_at)");
  await db.query(
    `CREATE TABLE IF NOT EXISTS saga_events (
      id TEXT PRIMARY KEY,
      transaction_id TEXT NOT NULL REFERENCES sagas (transaction_id),
      trace_id TEXT NOT NULL,
      status TEXT NOT NULL,
      event_type TEXT NOT NULL,
      payload JSONB NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )`
  );
  await db.query("CREATE INDEX IF NOT EXISTS saga_events_transaction_idx ON saga_events (transaction_id, created_at)");
  logger.info({ traceId: "system" }, "Database migrations applied");
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
