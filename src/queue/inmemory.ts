import type {
  BrokerChannel,
  DeliveryCallback,
  MessageProperties,
  QueueCheckResult,
} from "./BrokerChannel.js";
import { logger } from "../core/logger.js";

const log = logger.child("InMemoryBroker");

interface StoredMessage {
  /** Publish order, used to put returned messages back in place */
  seq: number;
  exchange: string;
  routingKey: string;
  body: Buffer;
  properties: MessageProperties;
  redelivered: boolean;
}

interface Consumer {
  tag: string;
  queue: string;
  onDelivery: DeliveryCallback;
}

interface Unacked {
  queue: string;
  message: StoredMessage;
}

export type BrokerOperation =
  | { type: "prefetch"; count: number }
  | { type: "subscribe"; queue: string; consumerTag: string }
  | { type: "unsubscribe"; consumerTag: string }
  | { type: "ack" | "reject" | "requeue"; deliveryTag: number }
  | { type: "close" };

type FailableOperation = "ack" | "reject" | "requeue" | "unsubscribe";

/**
 * Single-channel broker held in memory.
 *
 * Mirrors the RabbitMQ behaviour the retrieval pipeline depends on:
 * - ready messages are pushed in bursts, bounded by prefetch (0 = unlimited)
 * - nack with requeue puts the message back in its original position, marked redelivered
 * - closing the channel returns every unacknowledged message to its queue
 */
export class InMemoryBroker implements BrokerChannel {
  private queues: Map<string, StoredMessage[]> = new Map();
  private unacked: Map<number, Unacked> = new Map();
  private consumers: Map<string, Consumer> = new Map();
  private failures: Map<FailableOperation, Set<number | string>> = new Map();
  private prefetch: number = 0;
  private nextDeliveryTag: number = 1;
  private nextConsumerId: number = 1;
  private nextSeq: number = 1;
  private pumpScheduled: boolean = false;
  private closed: boolean = false;

  readonly operations: BrokerOperation[] = [];

  /**
   * Called synchronously after each delivery callback returns
   */
  afterDelivery?: (deliveryTag: number) => void;

  declareQueue(queue: string): this {
    if (!this.queues.has(queue)) {
      this.queues.set(queue, []);
    }
    return this;
  }

  publish(queue: string, body: string | Buffer, properties: MessageProperties = {}): void {
    const messages = this.queues.get(queue);
    if (!messages) {
      throw new Error(`Queue '${queue}' does not exist`);
    }

    messages.push({
      seq: this.nextSeq++,
      exchange: "",
      routingKey: queue,
      body: typeof body === "string" ? Buffer.from(body) : body,
      properties,
      redelivered: false,
    });
    this.schedulePump();
  }

  /**
   * Ready messages, as a passive declare reports them
   */
  depth(queue: string): number {
    return this.queues.get(queue)?.length ?? 0;
  }

  /**
   * Removes the head of a queue, as another client's auto-ack basic.get would
   */
  take(queue: string): string | undefined {
    return this.queues.get(queue)?.shift()?.body.toString("utf8");
  }

  get unackedCount(): number {
    return this.unacked.size;
  }

  bodies(queue: string): string[] {
    return (this.queues.get(queue) ?? []).map((m) => m.body.toString("utf8"));
  }

  /**
   * Makes the given operation reject, for a delivery tag or a consumer tag
   */
  failOn(operation: FailableOperation, target: number | string): void {
    const targets = this.failures.get(operation) ?? new Set<number | string>();
    targets.add(target);
    this.failures.set(operation, targets);
  }

  async checkQueue(queue: string): Promise<QueueCheckResult> {
    this.ensureOpen();
    const messages = this.queues.get(queue);
    if (!messages) {
      throw new Error(`Operation failed: QueueDeclare; 404 (NOT-FOUND) with message "NOT_FOUND - no queue '${queue}' in vhost '/'"`);
    }

    const consumerCount = [...this.consumers.values()].filter((c) => c.queue === queue).length;
    return { queue, messageCount: messages.length, consumerCount };
  }

  async setPrefetch(count: number): Promise<void> {
    this.ensureOpen();
    this.prefetch = count;
    this.operations.push({ type: "prefetch", count });
  }

  async subscribe(queue: string, onDelivery: DeliveryCallback): Promise<string> {
    this.ensureOpen();
    if (!this.queues.has(queue)) {
      throw new Error(`Operation failed: BasicConsume; 404 (NOT-FOUND)`);
    }

    const tag = `amq.ctag-${this.nextConsumerId++}`;
    this.consumers.set(tag, { tag, queue, onDelivery });
    this.operations.push({ type: "subscribe", queue, consumerTag: tag });
    this.schedulePump();
    return tag;
  }

  async unsubscribe(consumerTag: string): Promise<void> {
    this.ensureOpen();
    this.operations.push({ type: "unsubscribe", consumerTag });
    if (this.shouldFail("unsubscribe", consumerTag)) {
      throw new Error(`Failed to cancel consumer ${consumerTag}`);
    }
    if (!this.consumers.delete(consumerTag)) {
      throw new Error(`Unknown consumer tag ${consumerTag}`);
    }
  }

  async ack(deliveryTag: number): Promise<void> {
    this.settle("ack", deliveryTag);
  }

  async reject(deliveryTag: number): Promise<void> {
    this.settle("reject", deliveryTag);
  }

  async requeue(deliveryTag: number): Promise<void> {
    const entry = this.settle("requeue", deliveryTag);
    this.restore(entry);
    this.schedulePump();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.operations.push({ type: "close" });
    this.consumers.clear();

    const returned = this.unacked.size;
    for (const entry of this.unacked.values()) {
      this.restore(entry);
    }
    this.unacked.clear();
    log.debug("Channel closed, unacknowledged messages returned", { returned });
  }

  /**
   * Broker-side cancel (queue deleted, node failover): consumers get a null delivery
   */
  cancelConsumers(queue: string): void {
    for (const consumer of [...this.consumers.values()]) {
      if (consumer.queue !== queue) continue;
      this.consumers.delete(consumer.tag);
      consumer.onDelivery(null);
    }
  }

  private restore({ queue, message }: Unacked): void {
    const messages = this.queues.get(queue);
    if (!messages) return;
    const index = messages.findIndex((m) => m.seq > message.seq);
    const restored = { ...message, redelivered: true };
    if (index === -1) {
      messages.push(restored);
    } else {
      messages.splice(index, 0, restored);
    }
  }

  private settle(type: "ack" | "reject" | "requeue", deliveryTag: number): Unacked {
    this.ensureOpen();
    this.operations.push({ type, deliveryTag });
    if (this.shouldFail(type, deliveryTag)) {
      throw new Error(`PRECONDITION_FAILED - ${type} of delivery tag ${deliveryTag} failed`);
    }

    const entry = this.unacked.get(deliveryTag);
    if (!entry) {
      throw new Error(`PRECONDITION_FAILED - unknown delivery tag ${deliveryTag}`);
    }
    this.unacked.delete(deliveryTag);
    this.schedulePump();
    return entry;
  }

  private shouldFail(operation: FailableOperation, target: number | string): boolean {
    return this.failures.get(operation)?.has(target) ?? false;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new Error("Channel closed");
    }
  }

  private schedulePump(): void {
    if (this.pumpScheduled || this.closed) return;
    this.pumpScheduled = true;
    setImmediate(() => {
      this.pumpScheduled = false;
      this.pump();
    });
  }

  /**
   * Pushes every deliverable message in one burst, round-robin over consumers
   */
  private pump(): void {
    let delivered = true;
    while (delivered) {
      delivered = false;
      for (const consumer of [...this.consumers.values()]) {
        if (this.closed || !this.consumers.has(consumer.tag)) continue;
        if (this.prefetch > 0 && this.unacked.size >= this.prefetch) return;

        const messages = this.queues.get(consumer.queue);
        const message = messages?.shift();
        if (!message) continue;

        const deliveryTag = this.nextDeliveryTag++;
        this.unacked.set(deliveryTag, { queue: consumer.queue, message });
        consumer.onDelivery({
          exchange: message.exchange,
          routingKey: message.routingKey,
          deliveryTag,
          redelivered: message.redelivered,
          properties: message.properties,
          body: message.body,
        });
        this.afterDelivery?.(deliveryTag);
        delivered = true;
      }
    }
  }
}
