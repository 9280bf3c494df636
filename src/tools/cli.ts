#!/usr/bin/env node
import dotenv from "dotenv";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { loadConfig, type OutputFormat } from "../config/config.js";
import { ConfigValidationError, toErrorInfo } from "../core/errors.js";
import { logger } from "../core/logger.js";
import { RetrievalResultOutput } from "../output/result-output.js";
import { createMessageSink } from "../output/sinks.js";
import { StatusOutput } from "../output/status.js";
import { connectRabbit } from "../queue/rabbit.js";
import { MessageRetrievalService } from "../retrieval/retrieval-service.js";
import { ACK_MODES, type AckMode, type RetrievalMode } from "../retrieval/types.js";

const FORMATS: readonly OutputFormat[] = ["plain", "table", "json"];

export interface CliOptions {
  mode: RetrievalMode;
  queue: string;
  ackMode?: AckMode;
  count?: number;
  prefetch?: number;
  output?: string;
  format?: OutputFormat;
  messagesPerFile?: number;
  compact?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  noColor?: boolean;
  configPath?: string;
}

function invalid(message: string): ConfigValidationError {
  return new ConfigValidationError("Invalid command line", [message]);
}

function optionalCount(name: string, value: number | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!Number.isInteger(value) || value < 0) {
    throw invalid(`--${name}: expected a non-negative integer`);
  }
  return value;
}

/**
 * Parses `consume <queue>` / `peek <queue>` and the shared flags.
 * Throws ConfigValidationError on unknown or malformed input; returns
 * undefined when only help or the version was requested.
 */
export function parseArgs(argv: string[]): CliOptions | undefined {
  const args = yargs(argv)
    .scriptName("queuetap")
    .usage("Usage: queuetap <consume|peek> <queue> [options]")
    .command("consume <queue>", "Retrieve messages and settle them with the chosen ack mode")
    .command("peek <queue>", "Inspect messages without removing them from the queue")
    .demandCommand(1, 1)
    .options({
      "ack-mode": {
        type: "string",
        choices: ACK_MODES,
        description: "How consumed messages are settled (consume only)",
        alias: "a",
      },
      count: {
        type: "number",
        description: "Stop after this many messages (0 = until interrupted)",
        alias: "n",
      },
      prefetch: {
        type: "number",
        description: "Unacknowledged deliveries allowed in flight (0 = unlimited)",
      },
      output: {
        type: "string",
        description: "Write messages to this file instead of stdout",
        alias: "o",
      },
      format: {
        type: "string",
        choices: FORMATS,
        description: "Message output format",
        alias: "f",
      },
      "messages-per-file": {
        type: "number",
        description: "Rotate output files after this many messages",
      },
      compact: {
        type: "boolean",
        description: "Table format: hide properties that are not set",
      },
      quiet: {
        type: "boolean",
        description: "Only print messages and errors",
        alias: "q",
      },
      verbose: {
        type: "boolean",
        description: "Log debug messages",
        alias: "v",
      },
      color: {
        type: "boolean",
        description: "Colour status output (--no-color to disable)",
      },
      config: {
        type: "string",
        description: "Path to a YAML configuration file",
        alias: "c",
      },
    })
    .strict()
    .exitProcess(false)
    .fail((message: string | undefined, error: Error | undefined) => {
      throw error ?? invalid(message ?? "invalid arguments");
    })
    .alias({ help: "h" })
    .parseSync();

  if (args.help || args.version) {
    return undefined;
  }

  const [command] = args._;
  if (command !== "consume" && command !== "peek") {
    throw invalid(`unknown command '${String(command)}', expected consume or peek`);
  }
  if (typeof args.queue !== "string" || args.queue.length === 0) {
    throw invalid("queue name is required");
  }

  const ackMode = ACK_MODES.find((mode) => mode === args["ack-mode"]);
  const format = FORMATS.find((value) => value === args.format);

  return {
    mode: command,
    queue: args.queue,
    ackMode,
    count: optionalCount("count", args.count),
    prefetch: optionalCount("prefetch", args.prefetch),
    output: args.output,
    format,
    messagesPerFile: optionalCount("messages-per-file", args["messages-per-file"]),
    compact: args.compact,
    quiet: args.quiet,
    verbose: args.verbose,
    noColor: args.color === false ? true : undefined,
    configPath: args.config,
  };
}

export async function main(argv: string[] = hideBin(process.argv)): Promise<number> {
  dotenv.config();
  let status = new StatusOutput();

  let parsed: CliOptions | undefined;
  try {
    parsed = parseArgs(argv);
  } catch (error) {
    status.error(toErrorInfo(error));
    return 1;
  }
  if (!parsed) {
    return 0;
  }
  const cli = parsed;

  const controller = new AbortController();
  let interrupts = 0;
  const onInterrupt = () => {
    interrupts++;
    if (interrupts > 1) {
      status.warning("Forced exit; unacknowledged messages return to the queue");
      process.exit(130);
    }
    status.warning("Stopping after in-flight messages... press Ctrl+C again to force exit");
    controller.abort();
  };
  process.on("SIGINT", onInterrupt);

  try {
    const { config, warnings } = loadConfig({
      configPath: cli.configPath,
      overrides: {
        output: { format: cli.format, compact: cli.compact, noColor: cli.noColor, quiet: cli.quiet },
        file: { messagesPerFile: cli.messagesPerFile },
      },
    });

    logger.configure({ level: cli.verbose ? "debug" : config.logging.level, dir: config.logging.dir });
    status = new StatusOutput({ quiet: config.output.quiet, noColor: config.output.noColor });
    for (const warning of warnings) {
      status.warning(warning);
    }

    const sink = createMessageSink(
      {
        format: config.output.format,
        compact: config.output.compact,
        noColor: config.output.noColor,
        outputFile: cli.output,
        messageCount: cli.count,
      },
      config.file
    );

    const service = new MessageRetrievalService({
      mode: cli.mode,
      openChannel: () => connectRabbit(config.rabbitmq),
      sink,
      status,
    });

    const result = await service.run(
      {
        queue: cli.queue,
        ackMode: cli.ackMode,
        messageCount: cli.count,
        prefetchCount: cli.prefetch,
      },
      controller.signal
    );

    new RetrievalResultOutput(config.output).write(result);
    return 0;
  } catch (error) {
    logger.error("Retrieval failed", error, { queue: cli.queue });
    status.error(toErrorInfo(error));
    return 1;
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.error("Unexpected failure", error);
      process.exitCode = 1;
    }
  );
}
