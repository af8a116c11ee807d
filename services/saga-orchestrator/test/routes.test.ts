import Fastify, { type FastifyInstance } from "fastify";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { registerRoutes, requestTraceId } from "../src/api/routes";
import { createHarness, sagaFixture, type Harness } from "./support";

const headers = { "x-trace-id": "trace-abc" };
const purchase = { customer_id: 1, vehicle_id: 1, payment_type: "cash" };

describe("saga routes", () => {
  let harness: Harness;
  let app: FastifyInstance;

  beforeEach(async () => {
    harness = createHarness();
    app = Fastify();
    await registerRoutes(app, harness.orchestrator);
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  async function startPurchase(): Promise<string> {
    const response = await app.inject({ method: "POST", url: "/purchase", headers, payload: purchase });
    return String(response.json().transaction_id);
  }

  test("POST /purchase accepts the purchase and reports the saga", async () => {
    const response = await app.inject({ method: "POST", url: "/purchase", headers, payload: purchase });

    expect(response.statusCode).toBe(202);
    expect(response.json()).toEqual({
      message: "Purchase saga initiated",
      transaction_id: expect.any(String),
      status: "STARTED",
      amount: 50000,
      payment_type: "cash"
    });
  });

  test("POST /purchase rejects an invalid body", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/purchase",
      headers,
      payload: { ...purchase, payment_type: "bitcoin" }
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      message: "Invalid purchase request",
      code: "INVALID_REQUEST",
      traceId: "trace-abc",
      issues: ["payment_type: Invalid enum value. Expected 'cash' | 'credit', received 'bitcoin'"]
    });
  });

  test("POST /purchase returns 404 for an unknown vehicle", async () => {
    harness.catalog.getVehicle.mockResolvedValueOnce(null);

    const response = await app.inject({
      method: "POST",
      url: "/purchase",
      headers,
      payload: { ...purchase, vehicle_id: 99 }
    });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ message: "vehicle 99 not found", code: "NOT_FOUND", traceId: "trace-abc" });
  });

  test("POST /purchase returns 404 for an unknown customer", async () => {
    harness.customers.getCustomer.mockResolvedValueOnce(null);

    const response = await app.inject({
      method: "POST",
      url: "/purchase",
      headers,
      payload: { ...purchase, customer_id: 9 }
    });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ message: "customer 9 not found", code: "NOT_FOUND", traceId: "trace-abc" });
  });

  test("POST /purchase returns 400 when the account balance is short", async () => {
    harness.customers.getCustomer.mockResolvedValueOnce({ id: 1, accountBalance: 1000, availableCredit: 100000 });

    const response = await app.inject({ method: "POST", url: "/purchase", headers, payload: purchase });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      message: "Insufficient account balance",
      code: "INVALID_REQUEST",
      traceId: "trace-abc"
    });
    expect(harness.channel.sent).toHaveLength(0);
  });

  test("GET /saga-states/:transactionId returns the current snapshot", async () => {
    const transactionId = await startPurchase();

    const response = await app.inject({ method: "GET", url: `/saga-states/${transactionId}` });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      transaction_id: transactionId,
      trace_id: "trace-abc",
      customer_id: 1,
      vehicle_id: 1,
      payment_type: "cash",
      amount: 50000,
      status: "STARTED",
      payment_code: null,
      payment_id: null,
      completed_steps: [],
      compensation: null,
      failure_reason: null,
      version: 1
    });
  });

  test("GET /saga-states/:transactionId returns 404 for an unknown saga", async () => {
    const response = await app.inject({ method: "GET", url: "/saga-states/tx-missing", headers });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ message: "saga tx-missing not found", code: "NOT_FOUND", traceId: "trace-abc" });
  });

  test("GET /saga-states/:transactionId/events lists the audit trail", async () => {
    const transactionId = await startPurchase();

    const response = await app.inject({ method: "GET", url: `/saga-states/${transactionId}/events` });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.transaction_id).toBe(transactionId);
    expect(body.events).toHaveLength(1);
    expect(body.events[0]).toMatchObject({
      event_type: "PURCHASE_REQUESTED",
      status: "STARTED",
      payload: { customer_id: 1, vehicle_id: 1, payment_type: "cash", amount: 50000 }
    });
  });

  test("POST /purchase/:transactionId/cancel cancels once and then conflicts", async () => {
    const transactionId = await startPurchase();

    const first = await app.inject({ method: "POST", url: `/purchase/${transactionId}/cancel`, headers });
    const second = await app.inject({ method: "POST", url: `/purchase/${transactionId}/cancel`, headers });

    expect(first.statusCode).toBe(202);
    expect(first.json()).toEqual({
      message: "Cancellation accepted",
      transaction_id: transactionId,
      status: "CANCELLED"
    });
    expect(second.statusCode).toBe(409);
    expect(second.json()).toEqual({
      message: `saga ${transactionId} is already CANCELLED`,
      code: "ALREADY_TERMINAL",
      traceId: "trace-abc"
    });
  });

  test("POST /purchase/:transactionId/cancel refuses a paid saga", async () => {
    await harness.store.createSaga(
      sagaFixture({
        status: "PAYMENT_PROCESSED",
        completedSteps: ["credit", "vehicle", "paymentCode", "payment"],
        paymentId: "pay-1"
      })
    );

    const response = await app.inject({ method: "POST", url: "/purchase/tx-fixture/cancel", headers });

    expect(response.statusCode).toBe(409);
    expect(response.json()).toEqual({
      message: "saga tx-fixture is too advanced to cancel: the vehicle sale is in progress",
      code: "TOO_ADVANCED_TO_CANCEL",
      traceId: "trace-abc"
    });
  });
});

describe("requestTraceId", () => {
  test("uses the inbound header when present", () => {
    expect(requestTraceId({ headers: { "x-trace-id": "trace-in" } })).toBe("trace-in");
    expect(requestTraceId({ headers: { "x-trace-id": ["trace-first", "trace-second"] } })).toBe("trace-first");
  });

  test("generates an id when the header is missing or blank", () => {
    const generated = requestTraceId({ headers: { "x-trace-id": "  " } });

    expect(generated).toMatch(/^[0-9a-f-]{36}$/);
    expect(requestTraceId({ headers: {} })).not.toBe(generated);
  });
});
