import type { EventEnvelope } from "./envelope";

export type ChannelMessage = {
  topic: string;
  key: string | null;
  envelope: EventEnvelope<unknown>;
};

/**
 * Resolving acknowledges the message. Rejecting leaves it unacknowledged so the
 * transport delivers it again.
 */
export type MessageHandler = (message: ChannelMessage) => Promise<void>;

export interface MessageChannel {
  publish<T>(topic: string, envelope: EventEnvelope<T>, key?: string): Promise<void>;
  subscribe(topics: readonly string[], handler: MessageHandler): void;
  start(): Promise<void>;
  close(): Promise<void>;
}
