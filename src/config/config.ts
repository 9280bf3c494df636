import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import path from "path";
import * as yaml from "yaml";
import { z } from "zod";
import { ConfigValidationError } from "../core/errors.js";
import { logger } from "../core/logger.js";

const log = logger.child("config");

/**
 * Configuration file (YAML), all sections optional:
 *
 * ```yaml
 * rabbitmq:
 *   host: localhost
 *   port: 5672
 *   vhost: /
 *   user: guest
 *   password: guest
 * output:
 *   format: plain      # plain | table | json
 *   compact: false
 * file:
 *   messagesPerFile: 1000
 *   messageDelimiter: "\n"
 * logging:
 *   level: warn
 *   dir: ./logs
 * ```
 */

export const rabbitConfigSchema = z.object({
  url: z.string().url().optional(),
  host: z.string().min(1, "Host is required").default("localhost"),
  port: z.coerce.number().int().min(1).max(65535).default(5672),
  vhost: z.string().min(1).default("/"),
  user: z.string().default("guest"),
  password: z.string().default("guest"),
  heartbeat: z.coerce.number().int().min(0).default(60),
});

export const outputConfigSchema = z.object({
  format: z.enum(["plain", "table", "json"]).default("plain"),
  compact: z.boolean().default(false),
  noColor: z.boolean().default(false),
  quiet: z.boolean().default(false),
});

export const fileConfigSchema = z.object({
  // 0 keeps every message in one file
  messagesPerFile: z.coerce.number().int().min(0).default(0),
  messageDelimiter: z.string().default("\n"),
});

export const loggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("warn"),
  dir: z.string().min(1).optional(),
});

export const appConfigSchema = z.object({
  rabbitmq: rabbitConfigSchema.default({}),
  output: outputConfigSchema.default({}),
  file: fileConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type RabbitConfig = AppConfig["rabbitmq"];
export type OutputConfig = AppConfig["output"];
export type FileConfig = AppConfig["file"];
export type OutputFormat = OutputConfig["format"];

type RawConfig = Record<string, unknown>;

export interface LoadConfigOptions {
  /** Explicit file; must exist */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest priority layer, usually built from CLI flags */
  overrides?: RawConfig;
  cwd?: string;
}

export interface LoadedConfig {
  config: AppConfig;
  source?: string;
  warnings: string[];
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge of plain objects; undefined values in `override` are ignored
 */
export function mergeConfig(base: RawConfig, override: RawConfig): RawConfig {
  const merged: RawConfig = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isRecord(current) && isRecord(value) ? mergeConfig(current, value) : value;
  }
  return merged;
}

/**
 * Maps RABBIT_* and logging variables onto config sections
 */
export function configFromEnv(env: NodeJS.ProcessEnv): RawConfig {
  return {
    rabbitmq: {
      url: env.RABBIT_URL || undefined,
      host: env.RABBIT_HOST || undefined,
      port: env.RABBIT_PORT || undefined,
      vhost: env.RABBIT_VHOST || undefined,
      user: env.RABBIT_USER || undefined,
      password: env.RABBIT_PASSWORD || undefined,
    },
    logging: {
      level: env.LOG_LEVEL || undefined,
      dir: env.QUEUETAP_LOG_DIR || undefined,
    },
  };
}

function findConfigFile(options: LoadConfigOptions, env: NodeJS.ProcessEnv): string | undefined {
  if (options.configPath) {
    if (!existsSync(options.configPath)) {
      throw new ConfigValidationError(
        `Configuration file '${options.configPath}' not found`,
        [`file: ${options.configPath} does not exist`],
        options.configPath
      );
    }
    return options.configPath;
  }

  const candidates = [
    env.QUEUETAP_CONFIG,
    path.join(homedir(), ".config", "queuetap", "config.yaml"),
    path.join(options.cwd ?? process.cwd(), "queuetap.yaml"),
  ];
  return candidates.find((candidate): candidate is string => !!candidate && existsSync(candidate));
}

function readConfigFile(file: string): RawConfig {
  let parsed: unknown;
  try {
    parsed = yaml.parse(readFileSync(file, "utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError(`Failed to parse configuration file '${file}'`, [reason], file);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigValidationError(
      `Configuration file '${file}' must contain a mapping`,
      ["(root): expected a mapping of sections"],
      file
    );
  }
  return parsed;
}

function collectWarnings(config: AppConfig): string[] {
  const warnings: string[] = [];
  const { rabbitmq } = config;

  if (!rabbitmq.url && rabbitmq.user === "guest" && !["localhost", "127.0.0.1", "::1"].includes(rabbitmq.host)) {
    warnings.push(`Default 'guest' credentials only work on localhost; connecting to ${rabbitmq.host}`);
  }
  if (config.file.messagesPerFile > 0 && config.output.format === "table") {
    warnings.push("Table format is written to files as-is; consider json for machine-readable files");
  }

  return warnings;
}

/**
 * Layers: defaults <- YAML file <- environment <- overrides
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env;
  const source = findConfigFile(options, env);

  let raw: RawConfig = source ? readConfigFile(source) : {};
  raw = mergeConfig(raw, configFromEnv(env));
  if (options.overrides) {
    raw = mergeConfig(raw, options.overrides);
  }

  const result = appConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    log.error("Configuration validation failed", undefined, { issues, source });
    throw new ConfigValidationError("Invalid configuration", issues, source);
  }

  const warnings = collectWarnings(result.data);
  log.debug("Configuration loaded", { source: source ?? "defaults", warnings: warnings.length });

  return { config: result.data, source, warnings };
}
