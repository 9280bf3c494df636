import type { AsyncQueue } from "../core/async-queue.js";
import { logger, type Logger } from "../core/logger.js";
import type { BrokerChannel } from "../queue/BrokerChannel.js";
import type { CancellationReason, DeliveredMessage } from "./types.js";

export type CoordinatorState = "running" | "shutting-down" | "closed";

const REASON_TEXT: Record<CancellationReason, string> = {
  user: "User cancellation (Ctrl+C)",
  limit: "Message count limit reached",
  broker: "Consumer cancelled by broker",
  failure: "Output failure",
};

export function describeReason(reason: CancellationReason): string {
  return REASON_TEXT[reason];
}

/**
 * One-shot latch behind the combined cancellation signal.
 *
 * Whichever trigger fires first (operator interrupt, count reached, broker
 * cancel, output failure) moves `running -> shutting-down`, issues the
 * unsubscribe and closes the message queue for writing. Every later trigger
 * is a no-op.
 */
export class CancellationCoordinator {
  #state: CoordinatorState = "running";
  #reason?: CancellationReason;
  #consumerTag?: string;
  #unsubscribing?: Promise<void>;
  #detach?: () => void;
  readonly #controller = new AbortController();

  constructor(
    private readonly channel: BrokerChannel,
    private readonly messages: AsyncQueue<DeliveredMessage>,
    private readonly log: Logger = logger.child("CancellationCoordinator")
  ) {}

  /**
   * Links the external signal. An already aborted signal triggers at once.
   */
  watch(signal?: AbortSignal): void {
    if (!signal) return;

    if (signal.aborted) {
      this.trigger("user");
      return;
    }

    const onAbort = () => {
      this.trigger("user");
    };
    signal.addEventListener("abort", onAbort, { once: true });
    this.#detach = () => signal.removeEventListener("abort", onAbort);
  }

  /**
   * Records the consumer once basic.consume has answered. If shutdown already
   * started (count reached before the reply), the unsubscribe is issued now.
   */
  attach(consumerTag: string): void {
    this.#consumerTag = consumerTag;
    if (this.#state !== "running") {
      this.#unsubscribe();
    }
  }

  /**
   * Returns true only for the trigger that performed the transition
   */
  trigger(reason: CancellationReason): boolean {
    if (this.#state !== "running") {
      this.log.debug(`Ignoring ${reason} trigger, already ${this.#state}`, { firstReason: this.#reason });
      return false;
    }

    this.#state = "shutting-down";
    this.#reason = reason;
    this.#controller.abort(reason);

    this.log.debug("Cancellation requested - stopping RabbitMQ consumer", {
      consumerTag: this.#consumerTag,
      reason: describeReason(reason),
    });

    this.#unsubscribe();
    this.messages.close();
    this.log.debug("Receive queue completed");
    return true;
  }

  #unsubscribe(): void {
    const consumerTag = this.#consumerTag;
    if (!consumerTag || this.#unsubscribing) return;

    this.#unsubscribing = this.channel.unsubscribe(consumerTag).then(
      () => {
        this.log.debug("RabbitMQ consumer cancelled", { consumerTag });
      },
      (error: unknown) => {
        // Closing the channel at the end of the run also ends the subscription
        this.log.warn(
          `Failed to cancel RabbitMQ consumer: ${error instanceof Error ? error.message : String(error)}`,
          { consumerTag }
        );
      }
    );
  }

  /**
   * Detaches from the external signal and waits for a pending unsubscribe
   */
  async close(): Promise<void> {
    this.#detach?.();
    this.#detach = undefined;
    if (this.#unsubscribing) {
      await this.#unsubscribing;
    }
    this.#state = "closed";
  }

  /** Combined cancellation context */
  get signal(): AbortSignal {
    return this.#controller.signal;
  }

  get signaled(): boolean {
    return this.#controller.signal.aborted;
  }

  get state(): CoordinatorState {
    return this.#state;
  }

  get reason(): CancellationReason | undefined {
    return this.#reason;
  }
}
