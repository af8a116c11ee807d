import { describe, expect, test } from "vitest";
import { eventTopics } from "../src/events/topics";
import {
  compileDefinition,
  planCompensation,
  purchaseSaga,
  purchaseSteps,
  resolveTransition,
  stepAwaiting
} from "../src/saga/saga-definition";
import type { SagaRecord } from "../src/saga/saga-types";
import { sagaFixture } from "./support";

function record(overrides: Partial<SagaRecord> = {}): SagaRecord {
  return { ...sagaFixture(), version: 1, createdAt: new Date(0), updatedAt: new Date(0), ...overrides };
}

const [credit, vehicle] = purchaseSteps;

describe("compileDefinition", () => {
  test("listens to every participant event exactly once", () => {
    expect([...purchaseSaga.eventTopics].sort()).toEqual(Object.values(eventTopics).sort());
    expect(purchaseSaga.transitions.size).toBe(13);
    expect(purchaseSaga.finalStatus).toBe("PAYMENT_PROCESSED");
  });

  test("rejects an empty saga", () => {
    expect(() => compileDefinition([])).toThrow("a saga needs at least one step");
  });

  test("rejects steps that do not chain from STARTED", () => {
    expect(() => compileDefinition([vehicle, credit])).toThrow(
      "step vehicle awaits CREDIT_RESERVED but the previous step completes in STARTED"
    );
  });

  test("rejects a step declared twice", () => {
    expect(() => compileDefinition([credit, credit])).toThrow("step credit is declared twice");
  });

  test("rejects a step that does not advance", () => {
    expect(() => compileDefinition([{ ...credit, completedStatus: "STARTED" }])).toThrow(
      "step credit does not advance the saga"
    );
  });

  test("rejects an event topic shared by two transitions", () => {
    expect(() => compileDefinition([credit, { ...vehicle, successEvent: eventTopics.creditReserved }])).toThrow(
      "event topic events.credit.reserved is used by more than one transition"
    );
  });
});

describe("resolveTransition", () => {
  test("maps a success event to the step awaiting it", () => {
    const transition = resolveTransition(purchaseSaga, record({ status: "CREDIT_RESERVED" }), eventTopics.vehicleReserved);

    expect(transition?.kind).toBe("advance");
    expect(transition?.step.name).toBe("vehicle");
  });

  test("maps a failure event to stepFailed", () => {
    const transition = resolveTransition(purchaseSaga, record(), eventTopics.creditReservationFailed);

    expect(transition?.kind).toBe("stepFailed");
    expect(transition?.step.name).toBe("credit");
  });

  test("has no transition for an event from another status", () => {
    expect(resolveTransition(purchaseSaga, record(), eventTopics.vehicleReserved)).toBeNull();
  });

  test("accepts only the acknowledgement of the pending compensation", () => {
    const saga = record({
      status: "COMPENSATING",
      completedSteps: ["credit", "vehicle"],
      compensation: { target: "FAILED", pendingStep: "vehicle" }
    });

    expect(resolveTransition(purchaseSaga, saga, eventTopics.creditReleased)).toBeNull();
    expect(resolveTransition(purchaseSaga, saga, eventTopics.vehicleReleased)?.kind).toBe("compensated");
  });

  test("retries finalization on a repeated payment confirmation", () => {
    const saga = record({ status: "PAYMENT_PROCESSED" });

    expect(resolveTransition(purchaseSaga, saga, eventTopics.paymentProcessed)?.kind).toBe("finalize");
  });
});

describe("planCompensation", () => {
  test("skips steps without a compensation and awaits the latest one that has one", () => {
    const planned = planCompensation(
      purchaseSaga,
      record({ status: "PAYMENT_CODE_GENERATED", completedSteps: ["credit", "vehicle", "paymentCode"] }),
      "FAILED"
    );

    expect(planned.status).toBe("COMPENSATING");
    expect(planned.completedSteps).toEqual(["credit", "vehicle"]);
    expect(planned.compensation).toEqual({ target: "FAILED", pendingStep: "vehicle" });
  });

  test("lands in the target when nothing is left to undo", () => {
    const planned = planCompensation(purchaseSaga, record({ completedSteps: [] }), "CANCELLED");

    expect(planned.status).toBe("CANCELLED");
    expect(planned.compensation).toBeNull();
  });
});

describe("stepAwaiting", () => {
  test("finds the step whose command is in flight", () => {
    expect(stepAwaiting(purchaseSaga, "VEHICLE_RESERVED")?.name).toBe("paymentCode");
    expect(stepAwaiting(purchaseSaga, "PAYMENT_PROCESSED")).toBeNull();
  });
});
