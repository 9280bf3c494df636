import { open, type FileHandle } from "fs/promises";
import path from "path";
import type { Writable } from "stream";
import type { FileConfig, OutputFormat } from "../config/config.js";
import { logger, type Logger } from "../core/logger.js";
import type { DeliveredMessage } from "../retrieval/types.js";
import { createFormatter, type MessageFormatter } from "./formatters.js";

/**
 * Destination of retrieved messages. A rejected write is fatal for the run.
 */
export interface MessageSink {
  write(message: DeliveredMessage): Promise<void>;
  close(): Promise<void>;
}

export interface SinkOptions {
  format: OutputFormat;
  compact?: boolean;
  noColor?: boolean;
  /** Write to this file instead of stdout */
  outputFile?: string;
  /** Requested message count (0 = unbounded); decides whether files rotate */
  messageCount?: number;
}

function writeTo(stream: Writable, text: string): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(text, (error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Writes to stdout. Multi-line formats get a blank line between messages.
 */
export class ConsoleSink implements MessageSink {
  private written = 0;

  constructor(
    private readonly formatter: MessageFormatter,
    private readonly format: OutputFormat,
    private readonly stream: Writable = process.stdout
  ) {}

  async write(message: DeliveredMessage): Promise<void> {
    const separator = this.written > 0 && this.format !== "json" ? "\n" : "";
    await writeTo(this.stream, `${separator}${this.formatter(message)}\n`);
    this.written++;
  }

  async close(): Promise<void> {
    // stdout stays open for the status summary
  }
}

export interface FileSinkOptions {
  file: string;
  format: OutputFormat;
  formatter: MessageFormatter;
  /** 0: one file for everything */
  messagesPerFile: number;
  /** Placed between plain-format messages */
  messageDelimiter: string;
  messageCount?: number;
  log?: Logger;
}

/**
 * Writes to a single file, or to `name.0.ext`, `name.1.ext`, ... with at most
 * `messagesPerFile` messages each when the run may exceed that many.
 */
export class FileSink implements MessageSink {
  private handle?: FileHandle;
  private fileIndex = 0;
  private inCurrentFile = 0;
  private readonly rotating: boolean;
  private readonly log: Logger;
  readonly files: string[] = [];

  constructor(private readonly options: FileSinkOptions) {
    const count = options.messageCount ?? 0;
    this.rotating = options.messagesPerFile > 0 && (count <= 0 || count > options.messagesPerFile);
    this.log = options.log ?? logger.child("FileSink");
    this.log.debug("File output configured", { file: options.file, rotating: this.rotating });
  }

  async write(message: DeliveredMessage): Promise<void> {
    const handle = await this.currentHandle();

    if (this.inCurrentFile > 0 && this.options.format === "plain") {
      const delimiter = this.options.messageDelimiter;
      await handle.write(delimiter.endsWith("\n") ? delimiter : `${delimiter}\n`);
    }

    await handle.write(`${this.options.formatter(message)}\n`);
    this.inCurrentFile++;
  }

  async close(): Promise<void> {
    if (this.handle) {
      await this.handle.close();
      this.handle = undefined;
    }
  }

  private async currentHandle(): Promise<FileHandle> {
    if (this.handle && (!this.rotating || this.inCurrentFile < this.options.messagesPerFile)) {
      return this.handle;
    }

    await this.close();
    const file = this.rotating ? this.rotatedName(this.fileIndex++) : this.options.file;
    this.handle = await open(file, "w");
    this.inCurrentFile = 0;
    this.files.push(file);
    this.log.debug(`Writing messages to ${file}`);
    return this.handle;
  }

  private rotatedName(index: number): string {
    const { dir, name, ext } = path.parse(this.options.file);
    return path.join(dir, `${name}.${index}${ext}`);
  }
}

export function createMessageSink(options: SinkOptions, fileConfig: FileConfig): MessageSink {
  const formatter = createFormatter(options.format, {
    compact: options.compact,
    // Files never get ANSI sequences
    noColor: options.noColor || !!options.outputFile,
  });

  if (options.outputFile) {
    return new FileSink({
      file: options.outputFile,
      format: options.format,
      formatter,
      messagesPerFile: fileConfig.messagesPerFile,
      messageDelimiter: fileConfig.messageDelimiter,
      messageCount: options.messageCount,
    });
  }

  return new ConsoleSink(formatter, options.format);
}
