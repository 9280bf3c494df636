import * as colors from "kleur/colors";
import type { OutputFormat } from "../config/config.js";
import type { MessageProperties } from "../queue/BrokerChannel.js";
import type { DeliveredMessage } from "../retrieval/types.js";

export interface FormatOptions {
  /** Table only: hide properties the publisher did not set */
  compact?: boolean;
  noColor?: boolean;
}

export type MessageFormatter = (message: DeliveredMessage) => string;

type Paint = (text: string) => string;

const LABEL_WIDTH = 17;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !Buffer.isBuffer(value);
}

function escapeString(value: string): string {
  return value.replace(/\n/g, "\\n").replace(/\r/g, "\\r").replace(/\t/g, "\\t");
}

/**
 * Header values can nest (tables, arrays) and carry raw bytes.
 * Small structures stay on one line, larger ones spread over indented lines.
 */
export function formatHeaderValue(value: unknown, indent = 0): string {
  if (value === null || value === undefined) return "-";
  if (Buffer.isBuffer(value)) return `<binary data: ${value.byteLength} bytes>`;
  if (typeof value === "string") return escapeString(value);

  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    const complex = value.some(isRecord);
    if (!complex && value.length <= 5) {
      return `[${value.map((item) => formatHeaderValue(item, indent)).join(", ")}]`;
    }
    const pad = "  ".repeat(indent + 1);
    const items = value.map((item) => `${pad}${formatHeaderValue(item, indent + 1)}`);
    return ["[", ...items, `${"  ".repeat(indent)}]`].join("\n");
  }

  if (isRecord(value)) {
    const entries = Object.entries(value);
    if (entries.length === 0) return "{}";
    const nested = entries.some(
      ([, v]) => isRecord(v) || (Array.isArray(v) && v.length > 0 && isRecord(v[0]))
    );
    if (!nested && entries.length <= 3) {
      return `{${entries.map(([k, v]) => `${k}: ${formatHeaderValue(v, indent)}`).join(", ")}}`;
    }
    const pad = "  ".repeat(indent + 1);
    const lines = entries.map(([k, v]) => `${pad}${k}: ${formatHeaderValue(v, indent + 1)}`);
    return ["{", ...lines, `${"  ".repeat(indent)}}`].join("\n");
  }

  return String(value);
}

/**
 * AMQP timestamps are seconds since the epoch
 */
export function formatTimestamp(seconds: number): string {
  return new Date(seconds * 1000).toISOString().replace("T", " ").slice(0, 19);
}

export function formatDeliveryMode(mode: number): string {
  switch (mode) {
    case 1:
      return "Non-persistent (1)";
    case 2:
      return "Persistent (2)";
    default:
      return String(mode);
  }
}

function hasHeaders(properties: Readonly<MessageProperties>): boolean {
  return !!properties.headers && Object.keys(properties.headers).length > 0;
}

// ---------------------------------------------------------------------------
// plain

const PLAIN_PROPERTIES: [keyof MessageProperties, string][] = [
  ["type", "Type"],
  ["messageId", "MessageId"],
  ["appId", "AppId"],
  ["clusterId", "ClusterId"],
  ["userId", "UserId"],
  ["contentType", "ContentType"],
  ["contentEncoding", "ContentEncoding"],
  ["correlationId", "CorrelationId"],
  ["deliveryMode", "DeliveryMode"],
  ["expiration", "Expiration"],
  ["priority", "Priority"],
  ["replyTo", "ReplyTo"],
];

export function formatPlain(message: DeliveredMessage): string {
  const { properties } = message;
  const lines = [
    `DeliveryTag: ${message.deliveryTag}`,
    `Exchange: ${message.exchange}`,
    `RoutingKey: ${message.routingKey}`,
    `Redelivered: ${message.redelivered}`,
  ];

  for (const [key, label] of PLAIN_PROPERTIES) {
    const value = properties[key];
    if (value !== undefined) lines.push(`${label}: ${String(value)}`);
  }
  if (properties.timestamp !== undefined) {
    lines.push(`Timestamp: ${formatTimestamp(properties.timestamp)}`);
  }
  if (properties.headers && hasHeaders(properties)) {
    lines.push("Headers:");
    for (const [key, value] of Object.entries(properties.headers)) {
      lines.push(`  ${key}: ${formatHeaderValue(value)}`);
    }
  }

  lines.push("Body:", message.body);
  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// json

/**
 * Bodies that parse as a JSON object or array are embedded as-is
 */
function embedBody(body: string): unknown {
  const trimmed = body.trim();
  const looksLikeJson =
    (trimmed.startsWith("{") && trimmed.endsWith("}")) || (trimmed.startsWith("[") && trimmed.endsWith("]"));
  if (!looksLikeJson) return body;

  try {
    const parsed: unknown = JSON.parse(trimmed);
    return parsed;
  } catch {
    return body;
  }
}

function jsonHeaderValue(value: unknown): unknown {
  if (Buffer.isBuffer(value)) return `<binary data: ${value.byteLength} bytes>`;
  if (Array.isArray(value)) return value.map(jsonHeaderValue);
  if (isRecord(value)) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, jsonHeaderValue(v)]));
  }
  return value;
}

function jsonProperties(properties: Readonly<MessageProperties>): Record<string, unknown> | undefined {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(properties)) {
    if (value === undefined) continue;
    if (key === "headers") {
      if (hasHeaders(properties)) result.headers = jsonHeaderValue(value);
      continue;
    }
    result[key] = key === "timestamp" && typeof value === "number" ? formatTimestamp(value) : value;
  }
  return Object.keys(result).length > 0 ? result : undefined;
}

/**
 * One JSON object per line
 */
export function formatJson(message: DeliveredMessage): string {
  return JSON.stringify({
    exchange: message.exchange,
    routingKey: message.routingKey,
    queue: message.queue,
    deliveryTag: message.deliveryTag,
    redelivered: message.redelivered,
    body: embedBody(message.body),
    properties: jsonProperties(message.properties),
  });
}

// ---------------------------------------------------------------------------
// table

type PanelLine = { kind: "text"; text: string; paint?: Paint } | { kind: "rule"; title: string };

function row(lines: PanelLine[], label: string, value: string, paint?: Paint): void {
  const [first = "", ...rest] = value.split("\n");
  lines.push({ kind: "text", text: label.padEnd(LABEL_WIDTH) + first, paint });
  for (const continuation of rest) {
    lines.push({ kind: "text", text: " ".repeat(LABEL_WIDTH) + continuation, paint });
  }
}

const TABLE_PROPERTIES: [keyof MessageProperties, string][] = [
  ["messageId", "Message ID"],
  ["correlationId", "Correlation ID"],
  ["timestamp", "Timestamp"],
  ["contentType", "Content Type"],
  ["contentEncoding", "Content Encoding"],
  ["deliveryMode", "Delivery Mode"],
  ["priority", "Priority"],
  ["expiration", "Expiration"],
  ["replyTo", "Reply To"],
  ["type", "Type"],
  ["appId", "App ID"],
  ["clusterId", "Cluster ID"],
  ["userId", "User ID"],
];

function tablePropertyValue(key: keyof MessageProperties, value: unknown): string {
  if (key === "timestamp" && typeof value === "number") return `${formatTimestamp(value)} UTC`;
  if (key === "deliveryMode" && typeof value === "number") return formatDeliveryMode(value);
  return String(value);
}

/**
 * Boxed panel per message. Full mode lists every property with `-` for the
 * missing ones; compact mode lists only what is set.
 */
export function formatTable(message: DeliveredMessage, options: FormatOptions = {}): string {
  const paint = (fn: Paint): Paint => (options.noColor ? (text) => text : fn);
  const dim = paint(colors.dim);
  const { properties } = message;
  const lines: PanelLine[] = [];

  row(lines, "Queue", message.queue);
  row(lines, "Routing Key", message.routingKey);
  row(lines, "Exchange", message.exchange || "-");
  row(lines, "Redelivered", message.redelivered ? "Yes" : "No", message.redelivered ? paint(colors.yellow) : undefined);

  const setProperties = TABLE_PROPERTIES.filter(([key]) => properties[key] !== undefined);
  if (!options.compact || setProperties.length > 0) {
    lines.push({ kind: "rule", title: "Properties" });
    for (const [key, label] of options.compact ? setProperties : TABLE_PROPERTIES) {
      const value = properties[key];
      if (value === undefined) {
        row(lines, label, "-", dim);
      } else {
        row(lines, label, tablePropertyValue(key, value));
      }
    }
  }

  if (properties.headers && hasHeaders(properties)) {
    lines.push({ kind: "rule", title: "Custom Headers" });
    for (const [key, value] of Object.entries(properties.headers)) {
      row(lines, key, formatHeaderValue(value));
    }
  }

  lines.push({ kind: "rule", title: `Body (${message.bodySizeBytes} bytes)` });
  for (const bodyLine of message.body.split("\n")) {
    lines.push({ kind: "text", text: bodyLine });
  }

  const head = `─ Message #${message.deliveryTag} `;
  const innerWidth = Math.max(
    head.length,
    ...lines.map((line) => (line.kind === "text" ? line.text.length : line.title.length + 4))
  );

  const out = [`╭${head}${"─".repeat(innerWidth + 2 - head.length)}╮`];
  for (const line of lines) {
    if (line.kind === "rule") {
      const rule = `── ${line.title} `;
      out.push(`│ ${dim(rule + "─".repeat(innerWidth - rule.length))} │`);
    } else {
      const padded = line.text.padEnd(innerWidth);
      out.push(`│ ${line.paint ? line.paint(padded) : padded} │`);
    }
  }
  out.push(`╰${"─".repeat(innerWidth + 2)}╯`);
  return out.join("\n");
}

export function createFormatter(format: OutputFormat, options: FormatOptions = {}): MessageFormatter {
  switch (format) {
    case "plain":
      return formatPlain;
    case "json":
      return formatJson;
    case "table":
      return (message) => formatTable(message, options);
  }
}
