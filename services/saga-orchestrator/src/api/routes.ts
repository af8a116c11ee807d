import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { v4 as uuidv4 } from "uuid";
import { TRACE_HEADER } from "../clients/http";
import { InvalidRequestError, SagaError } from "../errors";
import type { SagaOrchestrator } from "../saga/orchestrator";
import type { SagaEventRecord, SagaRecord } from "../saga/saga-types";

type TransactionParams = { transactionId: string };

/** The caller's `x-trace-id`, or a fresh one that then identifies the saga. */
export function requestTraceId(request: Pick<FastifyRequest, "headers">): string {
  const header = request.headers[TRACE_HEADER];
  const candidate = Array.isArray(header) ? header[0] : header;
  return candidate && candidate.trim().length > 0 ? candidate : uuidv4();
}

export function toSagaStateResponse(saga: SagaRecord) {
  return {
    transaction_id: saga.transactionId,
    trace_id: saga.traceId,
    customer_id: saga.customerId,
    vehicle_id: saga.vehicleId,
    payment_type: saga.paymentType,
    amount: saga.amount,
    status: saga.status,
    payment_code: saga.paymentCode,
    payment_id: saga.paymentId,
    completed_steps: saga.completedSteps,
    compensation: saga.compensation
      ? { target: saga.compensation.target, pending_step: saga.compensation.pendingStep }
      : null,
    failure_reason: saga.failureReason,
    version: saga.version,
    created_at: saga.createdAt.toISOString(),
    updated_at: saga.updatedAt.toISOString()
  };
}

function toSagaEventResponse(event: SagaEventRecord) {
  return {
    id: event.id,
    event_type: event.eventType,
    status: event.status,
    payload: event.payload,
    created_at: event.createdAt.toISOString()
  };
}

function sendSagaError(reply: FastifyReply, error: unknown, traceId: string) {
  if (!(error instanceof SagaError)) {
    throw error;
  }
  reply.code(error.statusCode);
  return {
    message: error.message,
    code: error.code,
    traceId,
    ...(error instanceof InvalidRequestError && error.issues.length > 0 ? { issues: error.issues } : {})
  };
}

export async function registerRoutes(app: FastifyInstance, orchestrator: SagaOrchestrator): Promise<void> {
  app.post("/purchase", async (request, reply) => {
    const traceId = requestTraceId(request);
    try {
      const saga = await orchestrator.startPurchase(request.body, { traceId });
      reply.code(202);
      return {
        message: "Purchase saga initiated",
        transaction_id: saga.transactionId,
        status: saga.status,
        amount: saga.amount,
        payment_type: saga.paymentType
      };
    } catch (error) {
      return sendSagaError(reply, error, traceId);
    }
  });

  app.get<{ Params: TransactionParams }>("/saga-states/:transactionId", async (request, reply) => {
    const traceId = requestTraceId(request);
    try {
      const saga = await orchestrator.getState(request.params.transactionId);
      return toSagaStateResponse(saga);
    } catch (error) {
      return sendSagaError(reply, error, traceId);
    }
  });

  app.get<{ Params: TransactionParams }>("/saga-states/:transactionId/events", async (request, reply) => {
    const traceId = requestTraceId(request);
    try {
      const events = await orchestrator.getHistory(request.params.transactionId);
      return { transaction_id: request.params.transactionId, events: events.map(toSagaEventResponse) };
    } catch (error) {
      return sendSagaError(reply, error, traceId);
    }
  });

  app.post<{ Params: TransactionParams }>("/purchase/:transactionId/cancel", async (request, reply) => {
    const traceId = requestTraceId(request);
    try {
      const saga = await orchestrator.cancel(request.params.transactionId);
      reply.code(202);
      return {
        message: "Cancellation accepted",
        transaction_id: saga.transactionId,
        status: saga.status
      };
    } catch (error) {
      return sendSagaError(reply, error, traceId);
    }
  });
}
