import type { AsyncQueue } from "../core/async-queue.js";
import { logger, type Logger } from "../core/logger.js";
import type { BrokerChannel } from "../queue/BrokerChannel.js";
import type { AckDecision, AckDispatchResult } from "./types.js";

/**
 * Sole writer of acknowledgments on the channel. Decisions are issued in the
 * order they were queued, each awaited before the next.
 */
export class AckDispatcher {
  constructor(private readonly log: Logger = logger.child("AckDispatcher")) {}

  async run(acks: AsyncQueue<AckDecision>, channel: BrokerChannel): Promise<AckDispatchResult> {
    this.log.debug("Starting acknowledgment dispatcher");

    let dispatched = 0;
    let failed = 0;

    for await (const decision of acks) {
      try {
        await this.issue(channel, decision);
        dispatched++;
      } catch (error) {
        // One failed ack must not hold back the ones queued behind it
        failed++;
        this.log.error(`Failed to ${decision.outcome} message #${decision.deliveryTag}`, error, {
          deliveryTag: decision.deliveryTag,
        });
      }
    }

    this.log.debug("Acknowledgement dispatcher finished", { dispatched, failed });
    return { dispatched, failed };
  }

  private async issue(channel: BrokerChannel, { deliveryTag, outcome }: AckDecision): Promise<void> {
    switch (outcome) {
      case "ack":
        this.log.debug(`Acknowledging message #${deliveryTag}`);
        await channel.ack(deliveryTag);
        break;
      case "reject":
        this.log.debug(`Rejecting message #${deliveryTag} without requeue`);
        await channel.reject(deliveryTag);
        break;
      case "requeue":
        this.log.debug(`Requeuing message #${deliveryTag}`);
        await channel.requeue(deliveryTag);
        break;
    }
  }
}
