import { AlreadyExistsError, NotFoundError, VersionConflictError } from "../errors";
import type { NewSaga, NewSagaEvent, SagaStore } from "./saga-store";
import { isTerminal, type SagaEventRecord, type SagaRecord } from "./saga-types";

function cloneSaga(saga: SagaRecord): SagaRecord {
  return {
    ...saga,
    completedSteps: [...saga.completedSteps],
    compensation: saga.compensation ? { ...saga.compensation } : null
  };
}

export class InMemorySagaStore implements SagaStore {
  private readonly sagas = new Map<string, SagaRecord>();
  private readonly events: SagaEventRecord[] = [];

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async createSaga(saga: NewSaga): Promise<SagaRecord> {
    if (this.sagas.has(saga.transactionId)) {
      throw new AlreadyExistsError(saga.transactionId);
    }
    const now = this.clock();
    const created: SagaRecord = { ...saga, version: 1, createdAt: now, updatedAt: now };
    this.sagas.set(saga.transactionId, cloneSaga(created));
    return cloneSaga(created);
  }

  async getSagaById(transactionId: string): Promise<SagaRecord> {
    const existing = this.sagas.get(transactionId);
    if (!existing) {
      throw new NotFoundError("saga", transactionId);
    }
    return cloneSaga(existing);
  }

  async compareAndSwap(transactionId: string, expectedVersion: number, next: SagaRecord): Promise<SagaRecord> {
    const existing = this.sagas.get(transactionId);
    if (!existing) {
      throw new NotFoundError("saga", transactionId);
    }
    if (existing.version !== expectedVersion) {
      throw new VersionConflictError(transactionId, expectedVersion);
    }
    const updated: SagaRecord = {
      ...next,
      transactionId,
      createdAt: existing.createdAt,
      version: existing.version + 1,
      updatedAt: this.clock()
    };
    this.sagas.set(transactionId, cloneSaga(updated));
    return cloneSaga(updated);
  }

  async listStaleSagas(updatedBefore: Date, limit: number): Promise<SagaRecord[]> {
    return [...this.sagas.values()]
      .filter((saga) => !isTerminal(saga.status) && saga.updatedAt.getTime() < updatedBefore.getTime())
      .sort((a, b) => a.updatedAt.getTime() - b.updatedAt.getTime())
      .slice(0, limit)
      .map(cloneSaga);
  }

  async recordEvent(event: NewSagaEvent): Promise<SagaEventRecord> {
    const alreadyRecorded = this.events.find((existing) => existing.id === event.id);
    if (alreadyRecorded) {
      return alreadyRecorded;
    }
    const record: SagaEventRecord = {
      ...event,
      createdAt: this.clock()
    };
    this.events.push(record);
    return record;
  }

  async getEventsByTransactionId(transactionId: string): Promise<SagaEventRecord[]> {
    return this.events.filter((event) => event.transactionId === transactionId);
  }
}
