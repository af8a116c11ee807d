import type { FastifyInstance } from "fastify";
import { describeError } from "./errors";

export type ReadinessCheck = {
  name: string;
  check: () => Promise<void>;
};

export async function registerHealthRoutes(app: FastifyInstance, checks: ReadinessCheck[] = []): Promise<void> {
  app.get("/health", async () => ({ status: "ok" }));

  app.get("/ready", async (_request, reply) => {
    const failures: { name: string; error: string }[] = [];
    for (const { name, check } of checks) {
      try {
        await check();
      } catch (error) {
        failures.push({ name, error: describeError(error) });
      }
    }
    if (failures.length > 0) {
      reply.code(503);
      return { status: "unavailable", failures };
    }
    return { status: "ready" };
  });
}
