import type { AsyncQueue } from "../core/async-queue.js";
import { OutputSinkError } from "../core/errors.js";
import { logger, type Logger } from "../core/logger.js";
import type { MessageSink } from "../output/sinks.js";
import type { ResolvedStrategy } from "./strategy.js";
import type { AckDecision, DeliveredMessage, OutputStageResult } from "./types.js";

/**
 * Consumer of the message queue: writes each message, then queues its
 * acknowledgment decision. Runs until the message queue is closed and drained.
 */
export class OutputStage {
  constructor(
    private readonly sink: MessageSink,
    private readonly strategy: Pick<ResolvedStrategy, "decide">,
    private readonly log: Logger = logger.child("OutputStage")
  ) {}

  async run(
    messages: AsyncQueue<DeliveredMessage>,
    acks: AsyncQueue<AckDecision>
  ): Promise<OutputStageResult> {
    this.log.debug("Starting message output");

    let processedCount = 0;
    let totalBytes = 0;

    try {
      for await (const message of messages) {
        try {
          await this.sink.write(message);
        } catch (error) {
          this.log.error(`Failed to write message #${message.deliveryTag}`, error);
          throw new OutputSinkError(message.deliveryTag, error);
        }

        acks.push({ deliveryTag: message.deliveryTag, outcome: this.strategy.decide(message) });
        processedCount++;
        totalBytes += message.bodySizeBytes;
      }
    } finally {
      acks.close();
    }

    this.log.debug(`Message output completed (processed: ${processedCount})`);
    return { processedCount, totalBytes };
  }
}
