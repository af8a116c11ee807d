import { z } from "zod";

export const paymentTypeSchema = z.enum(["cash", "credit"]);
export type PaymentType = z.infer<typeof paymentTypeSchema>;

export const sagaStatusSchema = z.enum([
  "STARTED",
  "CREDIT_RESERVED",
  "VEHICLE_RESERVED",
  "PAYMENT_CODE_GENERATED",
  "PAYMENT_PROCESSED",
  "COMPLETED",
  "COMPENSATING",
  "FAILED",
  "CANCELLED"
]);
export type SagaStatus = z.infer<typeof sagaStatusSchema>;

export type ForwardStatus = Exclude<SagaStatus, "COMPENSATING" | TerminalStatus>;
export type TerminalStatus = "COMPLETED" | "FAILED" | "CANCELLED";
export type CompensationTarget = "FAILED" | "CANCELLED";

export function isTerminal(status: SagaStatus): status is TerminalStatus {
  return status === "COMPLETED" || status === "FAILED" || status === "CANCELLED";
}

export const stepNameSchema = z.enum(["credit", "vehicle", "paymentCode", "payment"]);
export type StepName = z.infer<typeof stepNameSchema>;

export const compensationStateSchema = z.object({
  target: z.enum(["FAILED", "CANCELLED"]),
  pendingStep: stepNameSchema.nullable()
});
export type CompensationState = z.infer<typeof compensationStateSchema>;

export type SagaRecord = {
  transactionId: string;
  traceId: string;
  customerId: number;
  vehicleId: number;
  paymentType: PaymentType;
  amount: number;
  status: SagaStatus;
  paymentCode: string | null;
  paymentId: string | null;
  // Steps confirmed by a success event, in completion order. Compensation consumes it from the end.
  completedSteps: StepName[];
  compensation: CompensationState | null;
  // Step whose command was in flight when a cancellation or timeout started compensating.
  interruptedStep: StepName | null;
  lastEventType: string | null;
  failureReason: string | null;
  version: number;
  createdAt: Date;
  updatedAt: Date;
};

export type SagaEventRecord = {
  id: string;
  transactionId: string;
  traceId: string;
  status: SagaStatus;
  eventType: string;
  payload: Record<string, unknown>;
  createdAt: Date;
};
