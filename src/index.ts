export { MessageRetrievalService, type RetrievalServiceConfig } from "./retrieval/retrieval-service.js";
export { resolveStrategy, DEFAULT_PREFETCH, type ResolvedStrategy } from "./retrieval/strategy.js";
export { CancellationCoordinator, describeReason } from "./retrieval/cancellation.js";
export type {
  AckMode,
  CancellationReason,
  DeliveredMessage,
  RetrievalMode,
  RetrievalOptions,
  RetrievalResult,
} from "./retrieval/types.js";
export type { BrokerChannel, BrokerDelivery, MessageProperties } from "./queue/BrokerChannel.js";
export { connectRabbit, RabbitChannel } from "./queue/rabbit.js";
export { createMessageSink, ConsoleSink, FileSink, type MessageSink } from "./output/sinks.js";
export { createFormatter } from "./output/formatters.js";
export { loadConfig, type AppConfig } from "./config/config.js";
export * from "./core/errors.js";
