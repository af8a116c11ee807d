import type { Logger } from "pino";
import type { SagaOrchestrator } from "./orchestrator";

export type Watchdog = {
  sweep: () => Promise<number>;
  stop: () => void;
};

/**
 * Periodically expires stale sagas. Sweeps never overlap; a sweep that is still
 * running when the next tick fires makes that tick a no-op.
 */
export function startWatchdog(
  orchestrator: Pick<SagaOrchestrator, "expireStaleSagas">,
  options: { intervalMs: number; logger: Logger; now?: () => Date }
): Watchdog {
  const now = options.now ?? (() => new Date());
  let running = false;

  const sweep = async (): Promise<number> => {
    if (running) {
      return 0;
    }
    running = true;
    try {
      const expired = await orchestrator.expireStaleSagas(now());
      if (expired > 0) {
        options.logger.warn({ expired, traceId: "system" }, "Expired stale sagas");
      }
      return expired;
    } finally {
      running = false;
    }
  };

  const timer = setInterval(() => {
    sweep().catch((error) => {
      options.logger.error({ error, traceId: "system" }, "Stale saga sweep failed");
    });
  }, options.intervalMs);
  timer.unref();

  return {
    sweep,
    stop: () => clearInterval(timer)
  };
}
