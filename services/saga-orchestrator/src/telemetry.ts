import { NodeSDK } from "@opentelemetry/sdk-node";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { ConsoleSpanExporter, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-base";
import { Resource } from "@opentelemetry/resources";
import { SEMRESATTRS_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import type { Logger } from "pino";

export type Telemetry = {
  shutdown: () => Promise<void>;
};

export type TelemetryOptions = {
  enabled: boolean;
  serviceName: string;
  logger: Logger;
};

const noTelemetry: Telemetry = { shutdown: async () => {} };

/**
 * Spans cover HTTP intake, the participant lookups, Postgres and Kafka.
 * File-system and DNS instrumentation stay off.
 */
export function startTelemetry(options: TelemetryOptions): Telemetry {
  if (!options.enabled) {
    return noTelemetry;
  }
  const sdk = new NodeSDK({
    resource: new Resource({ [SEMRESATTRS_SERVICE_NAME]: options.serviceName }),
    spanProcessor: new SimpleSpanProcessor(new ConsoleSpanExporter()),
    instrumentations: [
      getNodeAutoInstrumentations({
        "@opentelemetry/instrumentation-fs": { enabled: false },
        "@opentelemetry/instrumentation-dns": { enabled: false }
      })
    ]
  });
  sdk.start();
  options.logger.info({ traceId: "system" }, "Telemetry started");
  return {
    shutdown: async () => {
      await sdk.shutdown();
      options.logger.info({ traceId: "system" }, "Telemetry flushed");
    }
  };
}
