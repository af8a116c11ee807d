import pino from "pino";
import { vi } from "vitest";
import type { CustomerSummary } from "../src/clients/customer";
import type { VehicleSummary } from "../src/clients/vehicle";
import { buildEnvelope } from "../src/events/envelope";
import { InMemoryMessageChannel } from "../src/events/memory-channel";
import { SagaOrchestrator, type OrchestratorOptions } from "../src/saga/orchestrator";
import type { NewSaga } from "../src/saga/saga-store";
import { InMemorySagaStore } from "../src/saga/saga-store.memory";

export const silentLogger = pino({ level: "silent" });

export type Harness = ReturnType<typeof createHarness>;

export function createHarness(
  overrides: Partial<OrchestratorOptions> = {},
  store: InMemorySagaStore = new InMemorySagaStore()
) {
  const channel = new InMemoryMessageChannel();
  const finalizer = {
    markVehicleSold: vi.fn(async (_vehicleId: number, _traceId?: string): Promise<void> => {})
  };
  const catalog = {
    getVehicle: vi.fn(
      async (vehicleId: number, _traceId?: string): Promise<VehicleSummary | null> => ({
        id: vehicleId,
        price: 50000,
        available: true
      })
    )
  };
  const customers = {
    getCustomer: vi.fn(
      async (customerId: number, _traceId?: string): Promise<CustomerSummary | null> => ({
        id: customerId,
        accountBalance: 100000,
        availableCredit: 100000
      })
    )
  };
  const orchestrator = new SagaOrchestrator({
    store,
    channel,
    finalizer,
    catalog,
    customers,
    logger: silentLogger,
    ...overrides
  });
  orchestrator.start();

  /** Publishes a participant event and delivers everything queued. */
  const emit = async (topic: string, data: Record<string, unknown>) => {
    const envelope = buildEnvelope({ type: topic, source: "test-participant", traceId: "trace-participant", data });
    await channel.publish(topic, envelope, String(data.transaction_id));
    await channel.drain();
  };

  const commandsSent = () => channel.sentTopics().filter((topic) => topic.startsWith("commands."));

  return { store, channel, finalizer, catalog, customers, orchestrator, emit, commandsSent };
}

export function sagaFixture(overrides: Partial<NewSaga> = {}): NewSaga {
  return {
    transactionId: "tx-fixture",
    traceId: "trace-fixture",
    customerId: 7,
    vehicleId: 3,
    paymentType: "cash",
    amount: 42000,
    status: "STARTED",
    paymentCode: null,
    paymentId: null,
    completedSteps: [],
    compensation: null,
    interruptedStep: null,
    lastEventType: null,
    failureReason: null,
    ...overrides
  };
}
