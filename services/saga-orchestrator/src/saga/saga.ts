import { createHash, randomUUID } from "node:crypto";
import type { SagaStatus } from "./saga-types";

export function newTransactionId(): string {
  return randomUUID();
}

export function buildSagaEventId(transactionId: string, eventType: string, status: SagaStatus): string {
  return createHash("sha256").update(`${transactionId}:${eventType}:${status}`).digest("hex");
}
