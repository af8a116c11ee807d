import { z } from "zod";
import { eventTopics, type EventTopic } from "./topics";

// Command payloads keep the participants' snake_case contract.

export type CreditCommand = {
  transaction_id: string;
  customer_id: number;
  amount: number;
  payment_type: string;
};

export type VehicleCommand = {
  transaction_id: string;
  vehicle_id: number;
};

export type GeneratePaymentCodeCommand = {
  transaction_id: string;
  customer_id: number;
  vehicle_id: number;
  amount: number;
  payment_type: string;
};

export type ProcessPaymentCommand = {
  transaction_id: string;
  payment_code: string;
  payment_method: string;
};

export type RefundPaymentCommand = {
  transaction_id: string;
  payment_id: string;
};

export type CommandPayload =
  | CreditCommand
  | VehicleCommand
  | GeneratePaymentCodeCommand
  | ProcessPaymentCommand
  | RefundPaymentCommand;

export type InboundEvent = {
  transactionId: string;
  reason: string | null;
  paymentCode: string | null;
  paymentId: string | null;
};

const identifier = z.union([z.string().min(1), z.number().transform((value) => String(value))]);

const inboundEventSchema = z
  .object({
    transaction_id: z.string().min(1),
    reason: z.string().optional(),
    payment_code: identifier.optional(),
    payment_id: identifier.optional()
  })
  .passthrough();

const requiredFields: Partial<Record<EventTopic, "payment_code" | "payment_id">> = {
  [eventTopics.paymentCodeGenerated]: "payment_code",
  [eventTopics.paymentProcessed]: "payment_id"
};

export type ParsedEvent = { ok: true; event: InboundEvent } | { ok: false; issues: string[] };

export function parseInboundEvent(topic: EventTopic, data: unknown): ParsedEvent {
  const parsed = inboundEventSchema.safeParse(data);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".") || "data"}: ${issue.message}`)
    };
  }
  const required = requiredFields[topic];
  if (required && parsed.data[required] === undefined) {
    return { ok: false, issues: [`${required}: Required`] };
  }
  return {
    ok: true,
    event: {
      transactionId: parsed.data.transaction_id,
      reason: parsed.data.reason ?? null,
      paymentCode: parsed.data.payment_code ?? null,
      paymentId: parsed.data.payment_id ?? null
    }
  };
}
