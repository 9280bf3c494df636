import type { MessageProperties } from "../queue/BrokerChannel.js";

export type AckMode = "ack" | "reject" | "requeue";

export const ACK_MODES: readonly AckMode[] = ["ack", "reject", "requeue"];

export type RetrievalMode = "consume" | "peek";

/**
 * A message as it travels through the pipeline. Never mutated after creation.
 */
export interface DeliveredMessage {
  readonly exchange: string;
  readonly routingKey: string;
  readonly queue: string;
  readonly body: string;
  readonly bodySizeBytes: number;
  readonly deliveryTag: number;
  readonly redelivered: boolean;
  readonly properties: Readonly<MessageProperties>;
}

export interface AckDecision {
  readonly deliveryTag: number;
  readonly outcome: AckMode;
}

export interface RetrievalOptions {
  queue: string;
  /** Only meaningful for consume */
  ackMode?: AckMode;
  /** 0 or less: unbounded */
  messageCount?: number;
  /** Explicit QoS credit; 0 = unlimited. Unset picks the strategy default. */
  prefetchCount?: number;
}

/**
 * Point-in-time passive declare result
 */
export interface QueueSnapshot {
  readonly exists: boolean;
  readonly queue: string;
  readonly messageCount: number;
  readonly consumerCount: number;
}

export type CancellationReason = "user" | "limit" | "broker" | "failure";

export interface OutputStageResult {
  processedCount: number;
  totalBytes: number;
}

export interface AckDispatchResult {
  dispatched: number;
  failed: number;
}

export interface RetrievalResult {
  queue: string;
  retrievalMode: RetrievalMode;
  ackMode: AckMode;
  messagesReceived: number;
  messagesProcessed: number;
  /** Accepted into the pipeline but never written; the broker redelivers them */
  messagesSkipped: number;
  acksFailed: number;
  totalSizeBytes: number;
  durationMs: number;
  cancelledByUser: boolean;
  cancellationReason?: CancellationReason;
  /** Set when the queue was empty and peek returned without subscribing */
  emptyQueue?: boolean;
}
