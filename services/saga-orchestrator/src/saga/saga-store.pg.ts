import type { Pool } from "pg";
import { z } from "zod";
import { AlreadyExistsError, NotFoundError, VersionConflictError } from "../errors";
import type { NewSaga, NewSagaEvent, SagaStore } from "./saga-store";
import {
  compensationStateSchema,
  paymentTypeSchema,
  sagaStatusSchema,
  stepNameSchema,
  type SagaEventRecord,
  type SagaRecord
} from "./saga-types";

type SagaRow = {
  transaction_id: string;
  trace_id: string;
  customer_id: number;
  vehicle_id: number;
  payment_type: string;
  amount: number;
  status: string;
  payment_code: string | null;
  payment_id: string | null;
  completed_steps: unknown;
  compensation: unknown;
  interrupted_step: string | null;
  last_event_type: string | null;
  failure_reason: string | null;
  version: number;
  created_at: Date;
  updated_at: Date;
};

type SagaEventRow = {
  id: string;
  transaction_id: string;
  trace_id: string;
  status: string;
  event_type: string;
  payload: unknown;
  created_at: Date;
};

const sagaColumns =
  "transaction_id, trace_id, customer_id, vehicle_id, payment_type, amount, status, payment_code, payment_id, completed_steps, compensation, interrupted_step, last_event_type, failure_reason, version, created_at, updated_at";
const eventColumns = "id, transaction_id, trace_id, status, event_type, payload, created_at";

const payloadSchema = z.record(z.unknown());

function mapSaga(row: SagaRow): SagaRecord {
  return {
    transactionId: row.transaction_id,
    traceId: row.trace_id,
    customerId: row.customer_id,
    vehicleId: row.vehicle_id,
    paymentType: paymentTypeSchema.parse(row.payment_type),
    amount: row.amount,
    status: sagaStatusSchema.parse(row.status),
    paymentCode: row.payment_code,
    paymentId: row.payment_id,
    completedSteps: z.array(stepNameSchema).parse(row.completed_steps),
    compensation: compensationStateSchema.nullable().parse(row.compensation),
    interruptedStep: stepNameSchema.nullable().parse(row.interrupted_step),
    lastEventType: row.last_event_type,
    failureReason: row.failure_reason,
    version: row.version,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

function mapEvent(row: SagaEventRow): SagaEventRecord {
  return {
    id: row.id,
    transactionId: row.transaction_id,
    traceId: row.trace_id,
    status: sagaStatusSchema.parse(row.status),
    eventType: row.event_type,
    payload: payloadSchema.parse(row.payload ?? {}),
    createdAt: row.created_at
  };
}

export class PostgresSagaStore implements SagaStore {
  constructor(private readonly db: Pool) {}

  async createSaga(saga: NewSaga): Promise<SagaRecord> {
    const result = await this.db.query<SagaRow>(
      `INSERT INTO sagas (${sagaColumns})
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, 1, NOW(), NOW())
       ON CONFLICT (transaction_id) DO NOTHING
       RETURNING ${sagaColumns}`,
      [
        saga.transactionId,
        saga.traceId,
        saga.customerId,
        saga.vehicleId,
        saga.paymentType,
        saga.amount,
        saga.status,
        saga.paymentCode,
        saga.paymentId,
        JSON.stringify(saga.completedSteps),
        saga.compensation ? JSON.stringify(saga.compensation) : null,
        saga.interruptedStep,
        saga.lastEventType,
        saga.failureReason
      ]
    );
    const row = result.rows[0];
    if (!row) {
      throw new AlreadyExistsError(saga.transactionId);
    }
    return mapSaga(row);
  }

  async getSagaById(transactionId: string): Promise<SagaRecord> {
    const result = await this.db.query<SagaRow>(`SELECT ${sagaColumns} FROM sagas WHERE transaction_id = $1`, [
      transactionId
    ]);
    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError("saga", transactionId);
    }
    return mapSaga(row);
  }

  async compareAndSwap(transactionId: string, expectedVersion: number, next: SagaRecord): Promise<SagaRecord> {
    const result = await this.db.query<SagaRow>(
      `UPDATE sagas
       SET status = $3, payment_code = $4, payment_id = $5, completed_steps = $6, compensation = $7,
           interrupted_step = $8, last_event_type = $9, failure_reason = $10,
           version = version + 1, updated_at = NOW()
       WHERE transaction_id = $1 AND version = $2
       RETURNING ${sagaColumns}`,
      [
        transactionId,
        expectedVersion,
        next.status,
        next.paymentCode,
        next.paymentId,
        JSON.stringify(next.completedSteps),
        next.compensation ? JSON.stringify(next.compensation) : null,
        next.interruptedStep,
        next.lastEventType,
        next.failureReason
      ]
    );
    const row = result.rows[0];
    if (row) {
      return mapSaga(row);
    }
    // Distinguish a missing saga from a lost race.
    await this.getSagaById(transactionId);
    throw new VersionConflictError(transactionId, expectedVersion);
  }

  async listStaleSagas(updatedBefore: Date, limit: number): Promise<SagaRecord[]> {
    const result = await this.db.query<SagaRow>(
      `SELECT ${sagaColumns} FROM sagas
       WHERE status NOT IN ('COMPLETED', 'FAILED', 'CANCELLED') AND updated_at < $1
       ORDER BY updated_at ASC
       LIMIT $2`,
      [updatedBefore, limit]
    );
    return result.rows.map(mapSaga);
  }

  async recordEvent(event: NewSagaEvent): Promise<SagaEventRecord> {
    const inserted = await this.db.query<SagaEventRow>(
      `INSERT INTO saga_events (id, transaction_id, trace_id, status, event_type, payload, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, NOW())
       ON CONFLICT (id) DO NOTHING
       RETURNING ${eventColumns}`,
      [event.id, event.transactionId, event.traceId, event.status, event.eventType, JSON.stringify(event.payload)]
    );
    const row = inserted.rows[0];
    if (row) {
      return mapEvent(row);
    }
    const existing = await this.db.query<SagaEventRow>(`SELECT ${eventColumns} FROM saga_events WHERE id = $1`, [
      event.id
    ]);
    const existingRow = existing.rows[0];
    if (!existingRow) {
      throw new Error(`saga event ${event.id} was neither inserted nor found`);
    }
    return mapEvent(existingRow);
  }

  async getEventsByTransactionId(transactionId: string): Promise<SagaEventRecord[]> {
    const result = await this.db.query<SagaEventRow>(
      `SELECT ${eventColumns} FROM saga_events WHERE transaction_id = $1 ORDER BY created_at ASC`,
      [transactionId]
    );
    return result.rows.map(mapEvent);
  }
}
