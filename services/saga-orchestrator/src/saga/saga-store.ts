import type { Pool } from "pg";
import { config } from "../config";
import { InMemorySagaStore } from "./saga-store.memory";
import { PostgresSagaStore } from "./saga-store.pg";
import type { SagaEventRecord, SagaRecord, SagaStatus } from "./saga-types";

export type NewSaga = Omit<SagaRecord, "version" | "createdAt" | "updatedAt">;

export type NewSagaEvent = {
  id: string;
  transactionId: string;
  traceId: string;
  status: SagaStatus;
  eventType: string;
  payload: Record<string, unknown>;
};

/**
 * Durable saga persistence. `compareAndSwap` is the only mutation: it succeeds when the
 * stored version still equals `expectedVersion`, bumps the version and stamps `updatedAt`.
 */
export interface SagaStore {
  /** @throws AlreadyExistsError when the transaction id is taken. */
  createSaga(saga: NewSaga): Promise<SagaRecord>;
  /** @throws NotFoundError */
  getSagaById(transactionId: string): Promise<SagaRecord>;
  /** @throws NotFoundError, VersionConflictError */
  compareAndSwap(transactionId: string, expectedVersion: number, next: SagaRecord): Promise<SagaRecord>;
  /** Non-terminal sagas last written before `updatedBefore`, oldest first. */
  listStaleSagas(updatedBefore: Date, limit: number): Promise<SagaRecord[]>;
  /** Idempotent on `event.id`. */
  recordEvent(event: NewSagaEvent): Promise<SagaEventRecord>;
  getEventsByTransactionId(transactionId: string): Promise<SagaEventRecord[]>;
}

export function createSagaStore(db: Pool | null): SagaStore {
  if (config.useInMemoryStore || !db) {
    return new InMemorySagaStore();
  }
  return new PostgresSagaStore(db);
}
