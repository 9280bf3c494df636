import * as amqp from "amqplib";
import type {
  BrokerChannel,
  DeliveryCallback,
  MessageProperties,
  QueueCheckResult,
} from "./BrokerChannel.js";
import type { RabbitConfig } from "../config/config.js";
import { BrokerConnectionError } from "../core/errors.js";
import { logger, type Logger } from "../core/logger.js";

type AmqpConnection = Awaited<ReturnType<typeof amqp.connect>>;

/**
 * Copies the properties the publisher set, dropping empty ones
 */
export function extractProperties(props: amqp.MessageProperties): MessageProperties {
  const extracted: MessageProperties = {};

  const str = (value: unknown): string | undefined =>
    typeof value === "string" && value.length > 0 ? value : undefined;
  const num = (value: unknown): number | undefined =>
    typeof value === "number" ? value : undefined;

  const type = str(props.type);
  if (type) extracted.type = type;
  const messageId = str(props.messageId);
  if (messageId) extracted.messageId = messageId;
  const appId = str(props.appId);
  if (appId) extracted.appId = appId;
  const clusterId = str(props.clusterId);
  if (clusterId) extracted.clusterId = clusterId;
  const userId = str(props.userId);
  if (userId) extracted.userId = userId;
  const contentType = str(props.contentType);
  if (contentType) extracted.contentType = contentType;
  const contentEncoding = str(props.contentEncoding);
  if (contentEncoding) extracted.contentEncoding = contentEncoding;
  const correlationId = str(props.correlationId);
  if (correlationId) extracted.correlationId = correlationId;
  const deliveryMode = num(props.deliveryMode);
  if (deliveryMode !== undefined) extracted.deliveryMode = deliveryMode;
  const expiration = str(props.expiration);
  if (expiration) extracted.expiration = expiration;
  const priority = num(props.priority);
  if (priority !== undefined) extracted.priority = priority;
  const replyTo = str(props.replyTo);
  if (replyTo) extracted.replyTo = replyTo;
  const timestamp = num(props.timestamp);
  if (timestamp !== undefined) extracted.timestamp = timestamp;

  const headers: unknown = props.headers;
  if (headers && typeof headers === "object" && Object.keys(headers).length > 0) {
    extracted.headers = Object.fromEntries(Object.entries(headers));
  }

  return extracted;
}

/**
 * The part of an amqplib channel the adapter uses
 */
export interface AmqpChannel {
  on(event: string, listener: (...args: unknown[]) => void): unknown;
  checkQueue(queue: string): Promise<QueueCheckResult>;
  prefetch(count: number, global?: boolean): Promise<unknown>;
  consume(
    queue: string,
    onMessage: (msg: amqp.ConsumeMessage | null) => void,
    options?: amqp.Options.Consume
  ): Promise<{ consumerTag: string }>;
  cancel(consumerTag: string): Promise<unknown>;
  ack(message: amqp.Message): void;
  nack(message: amqp.Message, allUpTo?: boolean, requeue?: boolean): void;
  close(): Promise<unknown>;
}

/**
 * BrokerChannel over one amqplib channel.
 *
 * amqplib acknowledges by message object, so deliveries are kept by tag until
 * their decision is issued. amqplib sends no null delivery when the channel
 * closes under a consumer, so the close event is passed on as one.
 */
export class RabbitChannel implements BrokerChannel {
  private readonly pending = new Map<number, amqp.ConsumeMessage>();
  private readonly consumers = new Set<DeliveryCallback>();
  private readonly consumerTags = new Map<string, DeliveryCallback>();
  private channelOpen = true;

  constructor(
    private readonly channel: AmqpChannel,
    private readonly connection?: AmqpConnection,
    private readonly log: Logger = logger.child("RabbitChannel")
  ) {
    this.channel.on("error", (error: unknown) => {
      this.log.error("RabbitMQ channel error", error);
    });
    this.channel.on("close", () => {
      this.channelOpen = false;
      this.pending.clear();

      const active = [...this.consumers];
      this.consumers.clear();
      this.consumerTags.clear();
      if (active.length > 0) {
        this.log.warn("RabbitMQ channel closed under an active consumer");
      }
      for (const onDelivery of active) {
        onDelivery(null);
      }
      this.log.debug("RabbitMQ channel closed");
    });
  }

  async checkQueue(queue: string): Promise<QueueCheckResult> {
    const reply = await this.channel.checkQueue(queue);
    return {
      queue: reply.queue,
      messageCount: reply.messageCount,
      consumerCount: reply.consumerCount,
    };
  }

  async setPrefetch(count: number): Promise<void> {
    await this.channel.prefetch(count, false);
  }

  async subscribe(queue: string, onDelivery: DeliveryCallback): Promise<string> {
    // Registered before basic.consume answers: the channel may close in between
    this.consumers.add(onDelivery);
    let reply: { consumerTag: string };
    try {
      reply = await this.channel.consume(
        queue,
        (msg) => {
          if (!msg) {
            this.forget(onDelivery);
            onDelivery(null);
            return;
          }

          this.pending.set(msg.fields.deliveryTag, msg);
          onDelivery({
            exchange: msg.fields.exchange,
            routingKey: msg.fields.routingKey,
            deliveryTag: msg.fields.deliveryTag,
            redelivered: msg.fields.redelivered,
            properties: extractProperties(msg.properties),
            body: msg.content,
          });
        },
        { noAck: false }
      );
    } catch (error) {
      this.consumers.delete(onDelivery);
      throw error;
    }

    if (this.consumers.has(onDelivery)) {
      this.consumerTags.set(reply.consumerTag, onDelivery);
    }
    this.log.debug(`Consumer registered on queue ${queue}`, { consumerTag: reply.consumerTag });
    return reply.consumerTag;
  }

  async unsubscribe(consumerTag: string): Promise<void> {
    const onDelivery = this.consumerTags.get(consumerTag);
    if (onDelivery) {
      this.forget(onDelivery);
    }
    await this.channel.cancel(consumerTag);
  }

  async ack(deliveryTag: number): Promise<void> {
    this.channel.ack(this.take(deliveryTag));
  }

  async reject(deliveryTag: number): Promise<void> {
    this.channel.nack(this.take(deliveryTag), false, false);
  }

  async requeue(deliveryTag: number): Promise<void> {
    this.channel.nack(this.take(deliveryTag), false, true);
  }

  async close(): Promise<void> {
    this.consumers.clear();
    this.consumerTags.clear();
    try {
      if (this.channelOpen) {
        await this.channel.close();
      }
    } finally {
      this.pending.clear();
      if (this.connection) {
        await this.connection.close();
      }
    }
  }

  private forget(onDelivery: DeliveryCallback): void {
    this.consumers.delete(onDelivery);
    for (const [tag, callback] of this.consumerTags) {
      if (callback === onDelivery) this.consumerTags.delete(tag);
    }
  }

  private take(deliveryTag: number): amqp.ConsumeMessage {
    const msg = this.pending.get(deliveryTag);
    if (!msg) {
      throw new Error(`Unknown delivery tag ${deliveryTag}`);
    }
    this.pending.delete(deliveryTag);
    return msg;
  }
}

/**
 * Display form of the broker address, without credentials
 */
export function describeTarget(config: RabbitConfig): string {
  if (config.url) {
    try {
      const url = new URL(config.url);
      url.username = "";
      url.password = "";
      return url.toString();
    } catch {
      return "the configured URL";
    }
  }
  return `amqp://${config.host}:${config.port}${config.vhost === "/" ? "/" : `/${config.vhost}`}`;
}

export async function connectRabbit(config: RabbitConfig): Promise<RabbitChannel> {
  const log = logger.child("RabbitQueue");
  const target = describeTarget(config);

  let connection: AmqpConnection;
  try {
    connection = config.url
      ? await amqp.connect(config.url)
      : await amqp.connect({
          protocol: "amqp",
          hostname: config.host,
          port: config.port,
          vhost: config.vhost,
          username: config.user,
          password: config.password,
          heartbeat: config.heartbeat,
        });
  } catch (error) {
    log.error("Failed to connect to RabbitMQ", error, { target });
    throw new BrokerConnectionError(target, error);
  }

  connection.on("error", (error: unknown) => {
    log.error("RabbitMQ connection error", error);
  });

  try {
    const channel = await connection.createChannel();
    log.debug("Connected to RabbitMQ", { target });
    return new RabbitChannel(channel, connection, log.child("Channel"));
  } catch (error) {
    await connection.close();
    throw new BrokerConnectionError(target, error);
  }
}
