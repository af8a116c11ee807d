import { randomUUID } from "node:crypto";
import { z } from "zod";

export type EventEnvelope<T> = {
  id: string;
  type: string;
  source: string;
  time: string;
  subject?: string;
  traceId: string;
  parentSpanId?: string;
  data: T;
};

export const eventEnvelopeSchema = z.object({
  id: z.string().min(1),
  type: z.string().min(1),
  source: z.string(),
  time: z.string(),
  subject: z.string().optional(),
  traceId: z.string().min(1),
  parentSpanId: z.string().optional(),
  data: z.unknown()
});

export function buildEnvelope<T>(input: {
  type: string;
  source: string;
  traceId: string;
  subject?: string;
  parentSpanId?: string;
  data: T;
}): EventEnvelope<T> {
  return {
    id: randomUUID(),
    type: input.type,
    source: input.source,
    time: new Date().toISOString(),
    subject: input.subject,
    traceId: input.traceId,
    parentSpanId: input.parentSpanId,
    data: input.data
  };
}

export function parseEnvelope(raw: string): EventEnvelope<unknown> | null {
  let candidate: unknown;
  try {
    candidate = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = eventEnvelopeSchema.safeParse(candidate);
  if (!parsed.success) {
    return null;
  }
  return { ...parsed.data, data: parsed.data.data };
}
