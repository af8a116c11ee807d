import type { z } from "zod";

export const TRACE_HEADER = "x-trace-id";

export type ServiceClientOptions = {
  baseUrl: string;
  timeoutMs: number;
};

/** Outbound headers carrying the saga's trace id to a participant service. */
export function traceHeaders(traceId?: string): Record<string, string> {
  return traceId ? { [TRACE_HEADER]: traceId } : {};
}

/** GETs `path` and validates the body; 404 resolves to null, any other failure throws. */
export async function getResource<S extends z.ZodTypeAny>(
  options: ServiceClientOptions,
  path: string,
  schema: S,
  traceId?: string
): Promise<z.infer<S> | null> {
  const response = await fetch(`${options.baseUrl}${path}`, {
    method: "GET",
    headers: { accept: "application/json", ...traceHeaders(traceId) },
    signal: AbortSignal.timeout(options.timeoutMs)
  });
  if (response.status === 404) {
    return null;
  }
  if (!response.ok) {
    throw new Error(`GET ${path} returned ${response.status}`);
  }
  return schema.parse(await response.json());
}
