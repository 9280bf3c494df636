import * as colors from "kleur/colors";
import type { Writable } from "stream";
import type { OutputFormat } from "../config/config.js";
import { describeReason } from "../retrieval/cancellation.js";
import type { RetrievalResult } from "../retrieval/types.js";
import { elapsedTimeString, messageCountString, toSizeString } from "./utils.js";

export interface RetrievalResultJson {
  messages_received: number;
  messages_processed: number;
  messages_skipped: number;
  duration_ms: number;
  duration: string;
  ack_mode: string;
  retrieval_mode: string;
  cancellation_reason?: string;
  messages_per_second: number;
  total_size_bytes: number;
  total_size: string;
}

export interface RetrievalResponse {
  status: "success";
  timestamp: string;
  queue: string;
  result: RetrievalResultJson;
}

export function buildResponse(result: RetrievalResult, now: Date = new Date()): RetrievalResponse {
  const seconds = result.durationMs / 1000;
  const perSecond = seconds > 0 ? Math.round((result.messagesProcessed / seconds) * 100) / 100 : 0;

  const json: RetrievalResultJson = {
    messages_received: result.messagesReceived,
    messages_processed: result.messagesProcessed,
    messages_skipped: result.messagesSkipped,
    duration_ms: result.durationMs,
    duration: elapsedTimeString(result.durationMs),
    ack_mode: result.ackMode,
    retrieval_mode: result.retrievalMode,
    messages_per_second: perSecond,
    total_size_bytes: result.totalSizeBytes,
    total_size: toSizeString(result.totalSizeBytes),
  };
  if (result.cancellationReason) {
    json.cancellation_reason = describeReason(result.cancellationReason);
  }

  return { status: "success", timestamp: now.toISOString(), queue: result.queue, result: json };
}

export interface ResultOutputOptions {
  format: OutputFormat;
  quiet?: boolean;
  noColor?: boolean;
}

/**
 * Final run summary on stderr: JSON for the json format, aligned text otherwise
 */
export class RetrievalResultOutput {
  constructor(
    private readonly options: ResultOutputOptions,
    private readonly stream: Writable = process.stderr
  ) {}

  write(result: RetrievalResult): void {
    if (this.options.quiet) return;

    if (this.options.format === "json") {
      this.stream.write(`${JSON.stringify(buildResponse(result))}\n`);
      return;
    }

    const processed =
      result.messagesSkipped > 0
        ? `${messageCountString(result.messagesProcessed)} (${result.messagesSkipped} skipped & requeued by RabbitMQ)`
        : messageCountString(result.messagesProcessed);

    const rows = [
      `  Queue:      ${result.queue}`,
      `  Mode:       ${result.retrievalMode}`,
      `  Ack Mode:   ${result.ackMode}`,
      `  Received:   ${messageCountString(result.messagesReceived)}`,
      `  Processed:  ${processed}`,
      `  Total size: ${toSizeString(result.totalSizeBytes)}`,
      `  Duration:   ${elapsedTimeString(result.durationMs)}`,
    ];
    if (result.cancellationReason) {
      rows.push(`  Stopped:    ${describeReason(result.cancellationReason)}`);
    }
    if (result.acksFailed > 0) {
      rows.push(`  Failed acks: ${result.acksFailed}`);
    }

    const text = rows.join("\n");
    this.stream.write(`${this.options.noColor ? text : colors.dim(text)}\n`);
  }
}
