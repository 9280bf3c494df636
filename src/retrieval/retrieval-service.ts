import { AsyncQueue } from "../core/async-queue.js";
import { logger, type Logger } from "../core/logger.js";
import type { MessageSink } from "../output/sinks.js";
import type { StatusOutput } from "../output/status.js";
import type { BrokerChannel } from "../queue/BrokerChannel.js";
import { AckDispatcher } from "./ack-dispatcher.js";
import { CancellationCoordinator } from "./cancellation.js";
import { ReceivedMessageCounter } from "./counter.js";
import { DeliveryBridge } from "./delivery-bridge.js";
import { OutputStage } from "./output-stage.js";
import { QueueValidator } from "./queue-validator.js";
import { resolveStrategy, type ResolvedStrategy } from "./strategy.js";
import type {
  AckDecision,
  DeliveredMessage,
  QueueSnapshot,
  RetrievalMode,
  RetrievalOptions,
  RetrievalResult,
} from "./types.js";

export interface RetrievalServiceConfig {
  mode: RetrievalMode;
  /** Opens the single channel used for the whole run; closed by the service */
  openChannel: () => Promise<BrokerChannel>;
  /** Closed by the service once output has finished */
  sink: MessageSink;
  status?: StatusOutput;
  log?: Logger;
  now?: () => number;
}

/**
 * Runs one retrieval: validate, subscribe, pump messages through the output
 * stage and acknowledgment dispatcher, then shut down on the first of
 * count reached, operator interrupt, broker cancel or output failure.
 */
export class MessageRetrievalService {
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(private readonly config: RetrievalServiceConfig) {
    this.log = config.log ?? logger.child("MessageRetrievalService");
    this.now = config.now ?? Date.now;
  }

  async run(options: RetrievalOptions, signal?: AbortSignal): Promise<RetrievalResult> {
    const startTime = this.now();
    // Option conflicts surface before any broker traffic
    const strategy = resolveStrategy(this.config.mode, options);
    const channel = await this.config.openChannel();

    try {
      const snapshot = await new QueueValidator(this.log.child("QueueValidator")).validate(channel, options.queue);

      if (strategy.mode === "peek" && snapshot.messageCount === 0) {
        this.warn(`Queue '${options.queue}' is empty, nothing to peek`);
        return this.buildResult(options.queue, strategy, startTime, {
          received: 0,
          processed: 0,
          totalBytes: 0,
          acksFailed: 0,
          emptyQueue: true,
        });
      }

      for (const warning of strategy.warnings) {
        this.warn(warning);
      }

      const result = await this.pipeline(channel, options, strategy, snapshot, startTime, signal);
      this.config.status?.completion(result, options.messageCount ?? 0);
      return result;
    } finally {
      await this.shutdown(channel);
    }
  }

  private async pipeline(
    channel: BrokerChannel,
    options: RetrievalOptions,
    strategy: ResolvedStrategy,
    snapshot: QueueSnapshot,
    startTime: number,
    signal?: AbortSignal
  ): Promise<RetrievalResult> {
    const { queue } = options;
    const messageCount = this.effectiveCount(strategy, options.messageCount ?? 0, snapshot);

    await channel.setPrefetch(strategy.prefetch);
    this.log.debug(`Prefetch set to ${strategy.prefetch}`, { queue });

    const messages = new AsyncQueue<DeliveredMessage>();
    const acks = new AsyncQueue<AckDecision>();
    const counter = new ReceivedMessageCounter();
    const coordinator = new CancellationCoordinator(
      channel,
      messages,
      this.log.child("CancellationCoordinator")
    );
    const bridge = new DeliveryBridge({
      queue,
      messageCount,
      messages,
      counter,
      coordinator,
      stopOnRequeued: strategy.mode === "peek",
      log: this.log.child("DeliveryBridge"),
    });
    coordinator.watch(signal);

    const outputTask = new OutputStage(this.config.sink, strategy, this.log.child("OutputStage"))
      .run(messages, acks)
      .catch((error: unknown) => {
        coordinator.trigger("failure");
        throw error;
      });
    const ackTask = new AckDispatcher(this.log.child("AckDispatcher")).run(acks, channel);
    const settled = Promise.allSettled([outputTask, ackTask]);

    if (coordinator.signaled) {
      this.log.debug("Cancelled before subscribing", { queue });
    } else {
      try {
        const consumerTag = await channel.subscribe(queue, bridge.onDelivery);
        coordinator.attach(consumerTag);
        this.log.debug(`Subscribed to queue '${queue}'`, { consumerTag });
        this.config.status?.status(
          messageCount > 0
            ? `Retrieving up to ${messageCount} messages from '${queue}' (Ctrl+C to stop)`
            : `Retrieving messages from '${queue}' (Ctrl+C to stop)`
        );
      } catch (error) {
        coordinator.trigger("failure");
        await settled;
        await coordinator.close();
        throw error;
      }
    }

    const [outputResult, ackResult] = await settled;
    await coordinator.close();
    const received = counter.freeze();

    if (outputResult.status === "rejected") {
      throw outputResult.reason;
    }
    if (ackResult.status === "rejected") {
      throw ackResult.reason;
    }

    if (bridge.dropped > 0) {
      this.log.debug(`${bridge.dropped} deliveries left for redelivery after shutdown`, { queue });
    }

    return this.buildResult(queue, strategy, startTime, {
      received,
      processed: outputResult.value.processedCount,
      totalBytes: outputResult.value.totalBytes,
      acksFailed: ackResult.value.failed,
      reason: coordinator.reason,
    });
  }

  /**
   * Peek never reads past the depth seen at validation. A queue that shrinks
   * in the meantime is caught by the bridge when a requeued message returns.
   */
  private effectiveCount(strategy: ResolvedStrategy, requested: number, snapshot: QueueSnapshot): number {
    if (strategy.mode !== "peek") return requested;
    return requested > 0 ? Math.min(requested, snapshot.messageCount) : snapshot.messageCount;
  }

  private buildResult(
    queue: string,
    strategy: ResolvedStrategy,
    startTime: number,
    counts: {
      received: number;
      processed: number;
      totalBytes: number;
      acksFailed: number;
      reason?: RetrievalResult["cancellationReason"];
      emptyQueue?: boolean;
    }
  ): RetrievalResult {
    const durationMs = this.now() - startTime;
    this.log.timed("Retrieval finished", startTime, {
      queue,
      received: counts.received,
      processed: counts.processed,
      reason: counts.reason,
    });

    const result: RetrievalResult = {
      queue,
      retrievalMode: strategy.mode,
      ackMode: strategy.ackMode,
      messagesReceived: counts.received,
      messagesProcessed: counts.processed,
      messagesSkipped: Math.max(0, counts.received - counts.processed),
      acksFailed: counts.acksFailed,
      totalSizeBytes: counts.totalBytes,
      durationMs,
      cancelledByUser: counts.reason === "user",
    };
    if (counts.reason) result.cancellationReason = counts.reason;
    if (counts.emptyQueue) result.emptyQueue = true;
    return result;
  }

  private async shutdown(channel: BrokerChannel): Promise<void> {
    try {
      await this.config.sink.close();
    } catch (error) {
      this.log.error("Failed to close output", error);
    }

    try {
      await channel.close();
      this.log.debug("Channel closed");
    } catch (error) {
      this.log.warn(`Failed to close channel: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private warn(message: string): void {
    this.log.warn(message);
    this.config.status?.warning(message);
  }
}
