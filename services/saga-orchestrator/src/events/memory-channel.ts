import type { ChannelMessage, MessageChannel, MessageHandler } from "./channel";
import type { EventEnvelope } from "./envelope";

type QueuedDelivery = {
  message: ChannelMessage;
  attempts: number;
};

export type DeadLetter = {
  message: ChannelMessage;
  attempts: number;
  error: unknown;
};

/**
 * In-process channel with the delivery guarantees of the broker: every published
 * message is kept in `sent`, delivery happens on `drain()`, and a handler that
 * rejects gets the message again until `maxDeliveryAttempts` is reached.
 */
export class InMemoryMessageChannel implements MessageChannel {
  readonly sent: ChannelMessage[] = [];
  readonly deadLetters: DeadLetter[] = [];
  private readonly handlers = new Map<string, MessageHandler>();
  private readonly queue: QueuedDelivery[] = [];
  private readonly publishFailures = new Map<string, number>();

  constructor(private readonly maxDeliveryAttempts = 5) {}

  async publish<T>(topic: string, envelope: EventEnvelope<T>, key?: string): Promise<void> {
    const failures = this.publishFailures.get(topic) ?? 0;
    if (failures > 0) {
      this.publishFailures.set(topic, failures - 1);
      throw new Error(`broker unavailable for ${topic}`);
    }
    const message: ChannelMessage = { topic, key: key ?? null, envelope };
    this.sent.push(message);
    if (this.handlers.has(topic)) {
      this.queue.push({ message, attempts: 0 });
    }
  }

  subscribe(topics: readonly string[], handler: MessageHandler): void {
    for (const topic of topics) {
      this.handlers.set(topic, handler);
    }
  }

  async start(): Promise<void> {}

  async close(): Promise<void> {
    this.queue.length = 0;
  }

  /** Makes the next `count` publishes to `topic` reject, as a broker outage would. */
  failNextPublishes(topic: string, count = 1): void {
    this.publishFailures.set(topic, count);
  }

  /** Delivers a message again, as the broker does after a lost acknowledgement. */
  redeliver(message: ChannelMessage): void {
    this.queue.push({ message, attempts: 0 });
  }

  async drain(): Promise<number> {
    let delivered = 0;
    let next = this.queue.shift();
    while (next) {
      const handler = this.handlers.get(next.message.topic);
      if (handler) {
        try {
          await handler(next.message);
          delivered += 1;
        } catch (error) {
          const attempts = next.attempts + 1;
          if (attempts >= this.maxDeliveryAttempts) {
            this.deadLetters.push({ message: next.message, attempts, error });
          } else {
            this.queue.push({ message: next.message, attempts });
          }
        }
      }
      next = this.queue.shift();
    }
    return delivered;
  }

  sentTo(topic: string): ChannelMessage[] {
    return this.sent.filter((message) => message.topic === topic);
  }

  sentTopics(): string[] {
    return this.sent.map((message) => message.topic);
  }
}
