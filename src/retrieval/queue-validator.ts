import type { BrokerChannel } from "../queue/BrokerChannel.js";
import { QueueNotFoundError } from "../core/errors.js";
import { logger, type Logger } from "../core/logger.js";
import type { QueueSnapshot } from "./types.js";

export class QueueValidator {
  constructor(private readonly log: Logger = logger.child("QueueValidator")) {}

  /**
   * Passive check; never creates the queue. A missing queue ends the run.
   */
  async validate(channel: BrokerChannel, queue: string): Promise<QueueSnapshot> {
    try {
      const reply = await channel.checkQueue(queue);
      this.log.debug(
        `Queue '${reply.queue}' exists with ${reply.messageCount} messages and ${reply.consumerCount} consumers`,
        { queue }
      );
      return Object.freeze({
        exists: true,
        queue: reply.queue,
        messageCount: reply.messageCount,
        consumerCount: reply.consumerCount,
      });
    } catch (error) {
      this.log.error(`Queue '${queue}' not found`, error, { queue });
      throw new QueueNotFoundError(queue, error);
    }
  }
}
