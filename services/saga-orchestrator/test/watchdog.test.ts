import { afterEach, describe, expect, test, vi } from "vitest";
import { commandTopics, eventTopics } from "../src/events/topics";
import { InMemorySagaStore } from "../src/saga/saga-store.memory";
import { startWatchdog, type Watchdog } from "../src/saga/watchdog";
import { createHarness, sagaFixture, silentLogger } from "./support";

const start = new Date("2024-05-01T10:00:00.000Z");
const minutesLater = (minutes: number) => new Date(start.getTime() + minutes * 60_000);

function harnessAt(timeoutMs: number) {
  let now = start;
  const store = new InMemorySagaStore(() => now);
  const harness = createHarness({ sagaTimeoutMs: timeoutMs }, store);
  return {
    ...harness,
    advanceTo: (minutes: number) => {
      now = minutesLater(minutes);
      return now;
    }
  };
}

describe("expireStaleSagas", () => {
  test("does nothing when the timeout is disabled", async () => {
    const { orchestrator } = harnessAt(0);
    await orchestrator.startPurchase({ customer_id: 1, vehicle_id: 1, payment_type: "cash" });

    expect(await orchestrator.expireStaleSagas(minutesLater(60))).toBe(0);
  });

  test("leaves sagas that moved recently alone", async () => {
    const { orchestrator } = harnessAt(60_000);
    const saga = await orchestrator.startPurchase({ customer_id: 1, vehicle_id: 1, payment_type: "cash" });

    expect(await orchestrator.expireStaleSagas(new Date(start.getTime() + 30_000))).toBe(0);
    expect((await orchestrator.getState(saga.transactionId)).status).toBe("STARTED");
  });

  test("compensates a saga stuck waiting for a participant", async () => {
    const { orchestrator, channel, emit, advanceTo } = harnessAt(60_000);
    const saga = await orchestrator.startPurchase({ customer_id: 1, vehicle_id: 1, payment_type: "cash" });
    const transaction_id = saga.transactionId;
    await emit(eventTopics.creditReserved, { transaction_id });

    const expired = await orchestrator.expireStaleSagas(advanceTo(2));

    expect(expired).toBe(1);
    const compensating = await orchestrator.getState(transaction_id);
    expect(compensating.status).toBe("COMPENSATING");
    expect(compensating.compensation).toEqual({ target: "FAILED", pendingStep: "credit" });
    expect(compensating.interruptedStep).toBe("vehicle");
    expect(compensating.failureReason).toBe("timed out waiting for events.vehicle.reserved");
    expect(channel.sentTo(commandTopics.creditRelease)).toHaveLength(1);

    // The vehicle reservation arrives after all: it is released straight away.
    await emit(eventTopics.vehicleReserved, { transaction_id });
    expect(channel.sentTo(commandTopics.vehicleRelease)).toHaveLength(1);

    await emit(eventTopics.creditReleased, { transaction_id });
    expect((await orchestrator.getState(transaction_id)).status).toBe("FAILED");
  });

  test("fails a compensation that is never acknowledged", async () => {
    const { orchestrator, emit, advanceTo } = harnessAt(60_000);
    const saga = await orchestrator.startPurchase({ customer_id: 1, vehicle_id: 1, payment_type: "cash" });
    await emit(eventTopics.creditReserved, { transaction_id: saga.transactionId });
    await orchestrator.expireStaleSagas(advanceTo(2));

    const expired = await orchestrator.expireStaleSagas(advanceTo(4));

    expect(expired).toBe(1);
    const failed = await orchestrator.getState(saga.transactionId);
    expect(failed.status).toBe("FAILED");
    expect(failed.compensation).toBeNull();
    expect(failed.failureReason).toBe("compensation commands.credit.release not acknowledged within 60000ms");
  });

  test("retries finalization for a paid saga", async () => {
    const { orchestrator, store, finalizer, advanceTo } = harnessAt(60_000);
    await store.createSaga(
      sagaFixture({
        status: "PAYMENT_PROCESSED",
        completedSteps: ["credit", "vehicle", "paymentCode", "payment"],
        paymentId: "pay-1"
      })
    );

    await orchestrator.expireStaleSagas(advanceTo(2));

    expect(finalizer.markVehicleSold).toHaveBeenCalledWith(3, "trace-fixture");
    expect((await orchestrator.getState("tx-fixture")).status).toBe("COMPLETED");
  });
});

describe("startWatchdog", () => {
  const running: Watchdog[] = [];

  afterEach(() => {
    running.splice(0).forEach((watchdog) => watchdog.stop());
  });

  test("sweeps with the injected clock", async () => {
    const expireStaleSagas = vi.fn(async (_now?: Date) => 2);
    const now = minutesLater(5);
    const watchdog = startWatchdog({ expireStaleSagas }, { intervalMs: 60_000, logger: silentLogger, now: () => now });
    running.push(watchdog);

    expect(await watchdog.sweep()).toBe(2);
    expect(expireStaleSagas).toHaveBeenCalledWith(now);
  });

  test("skips a sweep while the previous one is still running", async () => {
    let release: () => void = () => {};
    const expireStaleSagas = vi.fn(
      (_now?: Date) =>
        new Promise<number>((resolve) => {
          release = () => resolve(1);
        })
    );
    const watchdog = startWatchdog({ expireStaleSagas }, { intervalMs: 60_000, logger: silentLogger });
    running.push(watchdog);

    const first = watchdog.sweep();
    expect(await watchdog.sweep()).toBe(0);
    release();

    expect(await first).toBe(1);
    expect(expireStaleSagas).toHaveBeenCalledTimes(1);
  });
});
