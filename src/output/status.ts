import * as colors from "kleur/colors";
import type { Writable } from "stream";
import type { ErrorInfo } from "../core/errors.js";
import type { RetrievalResult } from "../retrieval/types.js";
import { elapsedTimeString, messageCountString } from "./utils.js";

export interface StatusOutputOptions {
  quiet?: boolean;
  noColor?: boolean;
}

/**
 * Human-facing progress lines on stderr. Errors are shown even when quiet.
 */
export class StatusOutput {
  constructor(
    private readonly options: StatusOutputOptions = {},
    private readonly stream: Writable = process.stderr
  ) {}

  status(message: string): void {
    if (this.options.quiet) return;
    this.line(this.paint(colors.dim, `… ${message}`));
  }

  success(message: string): void {
    if (this.options.quiet) return;
    this.line(this.paint(colors.green, `✓ ${message}`));
  }

  warning(message: string): void {
    if (this.options.quiet) return;
    this.line(this.paint(colors.yellow, `⚠ ${message}`));
  }

  /**
   * End of a run: an interrupt or shortfall warning, then the success line
   */
  completion(result: RetrievalResult, requestedCount: number): void {
    const peek = result.retrievalMode === "peek";
    const processed = result.messagesProcessed;

    if (result.cancelledByUser) {
      this.warning(peek ? "Peek operation cancelled by user" : "Message retrieval cancelled by user");
    } else if (requestedCount > 0 && processed < requestedCount) {
      this.warning(`Only ${messageCountString(processed)} ${processed === 1 ? "was" : "were"} available in queue`);
    }

    this.success(
      `${peek ? "Peeked" : "Retrieved"} ${messageCountString(processed)} in ${elapsedTimeString(result.durationMs)}`
    );
  }

  error(info: ErrorInfo): void {
    this.line(this.paint(colors.red, `✗ ${info.error}`));
    if (info.suggestion) {
      this.line(this.paint(colors.dim, `  Suggestion: ${info.suggestion}`));
    }
    const issues = info.details?.issues;
    if (Array.isArray(issues)) {
      for (const issue of issues) {
        this.line(`  - ${String(issue)}`);
      }
    }
  }

  private paint(color: (text: string) => string, text: string): string {
    return this.options.noColor ? text : color(text);
  }

  private line(text: string): void {
    this.stream.write(`${text}\n`);
  }
}
