import dotenv from "dotenv";

dotenv.config();

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  if (value.toLowerCase() === "true") {
    return true;
  }
  if (value.toLowerCase() === "false") {
    return false;
  }
  return fallback;
}

export const config = {
  port: parseNumber(process.env.PORT, 3005),
  serviceName: process.env.SERVICE_NAME ?? "saga-orchestrator",
  brokerBrokers: (process.env.BROKER_BROKERS ?? "localhost:9092").split(","),
  consumerGroupId: process.env.CONSUMER_GROUP_ID ?? "saga-orchestrator-group",
  db: {
    host: process.env.DB_HOST ?? "localhost",
    port: parseNumber(process.env.DB_PORT, 5432),
    user: process.env.DB_USER ?? "saga",
    password: process.env.DB_PASSWORD ?? "saga",
    database: process.env.DB_NAME ?? "orchestration"
  },
  vehicleService: {
    url: process.env.VEHICLE_SERVICE_URL ?? "http://localhost:8080",
    timeoutMs: parseNumber(process.env.VEHICLE_SERVICE_TIMEOUT_MS, 10_000),
    lookupEnabled: parseBoolean(process.env.VEHICLE_LOOKUP_ENABLED, true)
  },
  customerService: {
    url: process.env.CUSTOMER_SERVICE_URL ?? "http://localhost:8081",
    timeoutMs: parseNumber(process.env.CUSTOMER_SERVICE_TIMEOUT_MS, 10_000),
    lookupEnabled: parseBoolean(process.env.CUSTOMER_LOOKUP_ENABLED, true)
  },
  saga: {
    paymentMethod: process.env.PAYMENT_METHOD ?? "pix",
    // 0 disables the stale-saga watchdog
    timeoutMs: parseNumber(process.env.SAGA_TIMEOUT_MS, 0),
    sweepIntervalMs: parseNumber(process.env.SAGA_SWEEP_INTERVAL_MS, 30_000)
  },
  telemetryEnabled: parseBoolean(process.env.TELEMETRY_ENABLED, false),
  logLevel: process.env.LOG_LEVEL ?? "info",
  useInMemoryStore: process.env.USE_INMEMORY_STORE === "true"
};
