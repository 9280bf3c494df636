import { ConfigurationConflictError, ConfigValidationError } from "../core/errors.js";
import type { AckMode, DeliveredMessage, RetrievalMode, RetrievalOptions } from "./types.js";

export const DEFAULT_PREFETCH = 100;
const MAX_PREFETCH = 65535;

/**
 * Effective retrieval policy, resolved once before subscribing
 */
export interface ResolvedStrategy {
  readonly mode: RetrievalMode;
  /** QoS credit passed to basic.qos; 0 = unlimited */
  readonly prefetch: number;
  readonly ackMode: AckMode;
  /** Non-fatal notes for the operator */
  readonly warnings: readonly string[];
  decide(message: DeliveredMessage): AckMode;
}

function validatePrefetch(prefetch: number | undefined): void {
  if (prefetch === undefined) return;
  if (!Number.isInteger(prefetch) || prefetch < 0 || prefetch > MAX_PREFETCH) {
    throw new ConfigValidationError("Invalid prefetch count", [
      `prefetchCount: must be an integer between 0 and ${MAX_PREFETCH}, got ${prefetch}`,
    ]);
  }
}

/**
 * Destructive retrieval. Requeue with a bounded prefetch would keep handing
 * back the same messages, so requeue always runs with unlimited credit.
 */
function resolveConsume(options: RetrievalOptions): ResolvedStrategy {
  const ackMode = options.ackMode ?? "ack";
  const messageCount = options.messageCount ?? 0;
  const warnings: string[] = [];
  validatePrefetch(options.prefetchCount);

  let prefetch: number;
  if (ackMode === "requeue") {
    if (options.prefetchCount !== undefined && options.prefetchCount !== 0) {
      throw new ConfigurationConflictError(
        `Prefetch count ${options.prefetchCount} cannot be combined with requeue ack mode`,
        "Omit the prefetch count (requeue mode uses unlimited prefetch) or pick another ack mode",
        { prefetchCount: options.prefetchCount, ackMode }
      );
    }
    prefetch = 0;

    if (messageCount <= 0) {
      warnings.push(
        "Using requeue mode without a message count may lead to memory issues due to unacknowledged messages accumulating (unbound buffer growth)."
      );
    }
  } else {
    prefetch = options.prefetchCount ?? DEFAULT_PREFETCH;
  }

  return {
    mode: "consume",
    prefetch,
    ackMode,
    warnings,
    decide: () => ackMode,
  };
}

/**
 * Non-destructive retrieval: every message goes back to the queue
 */
function resolvePeek(options: RetrievalOptions): ResolvedStrategy {
  const warnings: string[] = [];
  validatePrefetch(options.prefetchCount);

  if (options.ackMode !== undefined && options.ackMode !== "requeue") {
    warnings.push(`Ack mode '${options.ackMode}' is ignored when peeking; messages are always requeued.`);
  }
  if (options.prefetchCount) {
    warnings.push("Prefetch count is ignored when peeking; unlimited prefetch is used.");
  }

  return {
    mode: "peek",
    prefetch: 0,
    ackMode: "requeue",
    warnings,
    decide: () => "requeue",
  };
}

export function resolveStrategy(mode: RetrievalMode, options: RetrievalOptions): ResolvedStrategy {
  switch (mode) {
    case "consume":
      return resolveConsume(options);
    case "peek":
      return resolvePeek(options);
  }
}
