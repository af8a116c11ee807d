import { Kafka, type Consumer, type Producer } from "kafkajs";
import type { Logger } from "pino";
import type { ChannelMessage, MessageChannel, MessageHandler } from "./channel";
import { parseEnvelope, type EventEnvelope } from "./envelope";

const initialDelayMs = 500;
const maxDelayMs = 5000;

export type KafkaChannelOptions = {
  clientId: string;
  brokers: string[];
  groupId: string;
  logger: Logger;
};

export class KafkaMessageChannel implements MessageChannel {
  private readonly kafka: Kafka;
  private readonly producer: Producer;
  private readonly consumer: Consumer;
  private readonly handlers = new Map<string, MessageHandler>();

  constructor(private readonly options: KafkaChannelOptions) {
    this.kafka = new Kafka({ clientId: options.clientId, brokers: options.brokers });
    this.producer = this.kafka.producer();
    this.consumer = this.kafka.consumer({ groupId: options.groupId });
  }

  async publish<T>(topic: string, envelope: EventEnvelope<T>, key?: string): Promise<void> {
    await this.producer.send({
      topic,
      messages: [
        {
          key: key ?? null,
          value: JSON.stringify(envelope),
          headers: key ? { transaction_id: key } : undefined
        }
      ]
    });
  }

  subscribe(topics: readonly string[], handler: MessageHandler): void {
    for (const topic of topics) {
      this.handlers.set(topic, handler);
    }
  }

  async start(): Promise<void> {
    await this.connectWithRetry(() => this.producer.connect(), "Kafka producer");
    await this.connectWithRetry(() => this.consumer.connect(), "Kafka consumer");
    if (this.handlers.size === 0) {
      return;
    }
    await this.consumer.subscribe({ topics: [...this.handlers.keys()], fromBeginning: true });
    await this.consumer.run({
      eachMessage: async ({ topic, message }) => {
        if (!message.value) {
          this.options.logger.warn({ topic }, "Received empty message");
          return;
        }
        const envelope = parseEnvelope(message.value.toString());
        if (!envelope) {
          this.options.logger.warn({ topic }, "Dropping message that is not a valid event envelope");
          return;
        }
        const handler = this.handlers.get(topic);
        if (!handler) {
          this.options.logger.warn({ topic }, "No handler registered for topic");
          return;
        }
        const delivered: ChannelMessage = {
          topic,
          key: message.key ? message.key.toString() : null,
          envelope
        };
        try {
          await handler(delivered);
        } catch (error) {
          // Rethrowing keeps the offset uncommitted; kafkajs retries the message.
          this.options.logger.warn({ error, topic, traceId: envelope.traceId }, "Message handling failed; awaiting redelivery");
          throw error;
        }
      }
    });
  }

  async close(): Promise<void> {
    await this.consumer.disconnect();
    await this.producer.disconnect();
  }

  async listTopics(): Promise<string[]> {
    const admin = this.kafka.admin();
    await admin.connect();
    try {
      return await admin.listTopics();
    } finally {
      await admin.disconnect();
    }
  }

  private async connectWithRetry(action: () => Promise<void>, label: string): Promise<void> {
    let delay = initialDelayMs;
    // eslint-disable-next-line no-constant-condition
    while (true) {
      try {
        await action();
        this.options.logger.info({ label, traceId: "system" }, "Connected to Kafka");
        return;
      } catch (error) {
        this.options.logger.warn({ error, label, delay, traceId: "system" }, "Kafka connection failed; retrying");
        await new Promise((resolve) => setTimeout(resolve, delay));
        delay = Math.min(delay * 2, maxDelayMs);
      }
    }
  }
}
