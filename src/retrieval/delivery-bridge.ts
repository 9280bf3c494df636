import { createHash } from "crypto";
import type { AsyncQueue } from "../core/async-queue.js";
import { logger, type Logger } from "../core/logger.js";
import type { BrokerDelivery, DeliveryCallback } from "../queue/BrokerChannel.js";
import type { CancellationCoordinator } from "./cancellation.js";
import type { ReceivedMessageCounter } from "./counter.js";
import type { DeliveredMessage } from "./types.js";

export interface DeliveryBridgeOptions {
  queue: string;
  /** 0 or less: unbounded */
  messageCount: number;
  messages: AsyncQueue<DeliveredMessage>;
  counter: ReceivedMessageCounter;
  coordinator: CancellationCoordinator;
  /**
   * Ends the run when a message requeued earlier in this run is delivered
   * again (peek wrapped around a queue that shrank after validation)
   */
  stopOnRequeued?: boolean;
  log?: Logger;
}

function fingerprint(delivery: BrokerDelivery): string {
  return createHash("sha256")
    .update(delivery.exchange)
    .update("\0")
    .update(delivery.routingKey)
    .update("\0")
    .update(JSON.stringify(delivery.properties))
    .update("\0")
    .update(delivery.body)
    .digest("hex");
}

/**
 * Producer side of the pipeline, registered as the broker delivery callback.
 * Runs on the protocol client's dispatch path, so it never waits.
 */
export class DeliveryBridge {
  private readonly queue: string;
  private readonly messageCount: number;
  private readonly messages: AsyncQueue<DeliveredMessage>;
  private readonly counter: ReceivedMessageCounter;
  private readonly coordinator: CancellationCoordinator;
  private readonly log: Logger;
  private readonly seen?: Set<string>;
  private droppedCount = 0;

  constructor(options: DeliveryBridgeOptions) {
    this.queue = options.queue;
    this.messageCount = options.messageCount;
    this.messages = options.messages;
    this.counter = options.counter;
    this.coordinator = options.coordinator;
    this.log = options.log ?? logger.child("DeliveryBridge");
    if (options.stopOnRequeued) {
      this.seen = new Set<string>();
    }
  }

  readonly onDelivery: DeliveryCallback = (delivery) => {
    if (delivery === null) {
      this.log.warn(`Consumer on queue '${this.queue}' was cancelled by the broker`);
      this.coordinator.trigger("broker");
      return;
    }

    // Left unacknowledged on purpose: the broker redelivers it once the channel closes
    if (this.coordinator.signaled) {
      this.droppedCount++;
      this.log.debug(`Skipping message #${delivery.deliveryTag} after cancellation`);
      return;
    }

    if (this.seen) {
      const key = fingerprint(delivery);
      if (delivery.redelivered && this.seen.has(key)) {
        this.droppedCount++;
        this.log.debug(`Message #${delivery.deliveryTag} was already seen in this run - queue exhausted`);
        this.coordinator.trigger("limit");
        return;
      }
      this.seen.add(key);
    }

    const message = this.toMessage(delivery);
    if (!this.messages.push(message)) {
      this.droppedCount++;
      return;
    }

    const received = this.counter.increment();
    this.log.debug(`Received message #${delivery.deliveryTag}`, { received });

    if (received === this.messageCount) {
      this.log.debug(`Message limit ${this.messageCount} reached - initiating cancellation`);
      this.coordinator.trigger("limit");
    }
  };

  /** Deliveries left unacknowledged because shutdown had started */
  get dropped(): number {
    return this.droppedCount;
  }

  private toMessage(delivery: BrokerDelivery): DeliveredMessage {
    return Object.freeze({
      exchange: delivery.exchange,
      routingKey: delivery.routingKey,
      queue: this.queue,
      body: delivery.body.toString("utf8"),
      bodySizeBytes: delivery.body.byteLength,
      deliveryTag: delivery.deliveryTag,
      redelivered: delivery.redelivered,
      properties: Object.freeze({ ...delivery.properties }),
    });
  }
}
