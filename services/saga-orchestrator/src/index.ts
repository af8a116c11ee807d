import Fastify from "fastify";
import { config } from "./config";
import { logger } from "./logger";
import { registerHealthRoutes, type ReadinessCheck } from "./health";
import { registerRoutes, requestTraceId } from "./api/routes";
import { closeDb, getDb, migrate } from "./db";
import { KafkaMessageChannel } from "./events/kafka-channel";
import { createCustomerClient } from "./clients/customer";
import { createVehicleClient } from "./clients/vehicle";
import { startTelemetry, type Telemetry } from "./telemetry";
import { SagaOrchestrator } from "./saga/orchestrator";
import { createSagaStore } from "./saga/saga-store";
import { startWatchdog, type Watchdog } from "./saga/watchdog";

const app = Fastify({ logger: false });
const db = getDb();
const channel = new KafkaMessageChannel({
  clientId: config.serviceName,
  brokers: config.brokerBrokers,
  groupId: config.consumerGroupId,
  logger
});
const vehicleClient = createVehicleClient({
  baseUrl: config.vehicleService.url,
  timeoutMs: config.vehicleService.timeoutMs
});
const customerClient = createCustomerClient({
  baseUrl: config.customerService.url,
  timeoutMs: config.customerService.timeoutMs
});
const orchestrator = new SagaOrchestrator({
  store: createSagaStore(db),
  channel,
  finalizer: vehicleClient,
  catalog: config.vehicleService.lookupEnabled ? vehicleClient : null,
  customers: config.customerService.lookupEnabled ? customerClient : null,
  serviceName: config.serviceName,
  paymentMethod: config.saga.paymentMethod,
  sagaTimeoutMs: config.saga.timeoutMs,
  logger
});
let watchdog: Watchdog | null = null;
let telemetry: Telemetry | null = null;

async function start(): Promise<void> {
  telemetry = startTelemetry({ enabled: config.telemetryEnabled, serviceName: config.serviceName, logger });
  app.addHook("onRequest", (request, reply, done) => {
    const traceId = requestTraceId(request);
    reply.header("x-trace-id", traceId);
    request.headers["x-trace-id"] = traceId;
    done();
  });
  await migrate();

  orchestrator.start();
  await channel.start();

  if (config.saga.timeoutMs > 0) {
    watchdog = startWatchdog(orchestrator, { intervalMs: config.saga.sweepIntervalMs, logger });
  }

  const checks: ReadinessCheck[] = [{ name: "broker", check: async () => void (await channel.listTopics()) }];
  if (db) {
    checks.push({ name: "database", check: async () => void (await db.query("SELECT 1")) });
  }
  await registerHealthRoutes(app, checks);
  await registerRoutes(app, orchestrator);

  await app.listen({ port: config.port, host: "0.0.0.0" });
  logger.info({ port: config.port }, "Saga orchestrator listening");
}

async function shutdown(): Promise<void> {
  logger.info("Shutting down saga orchestrator");
  watchdog?.stop();
  await app.close();
  await channel.close();
  await closeDb();
  await telemetry?.shutdown();
}

function handleSignal(): void {
  shutdown().catch((error) => {
    logger.error({ error }, "Failed to shut down cleanly");
    process.exit(1);
  });
}

process.on("SIGINT", handleSignal);
process.on("SIGTERM", handleSignal);

start().catch((error) => {
  logger.error({ error }, "Failed to start saga orchestrator");
  process.exit(1);
});
