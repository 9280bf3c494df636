/**
 * Message properties as carried by an AMQP 0-9-1 basic.deliver.
 * Only the keys the publisher actually set are present.
 */
export interface MessageProperties {
  type?: string;
  messageId?: string;
  appId?: string;
  clusterId?: string;
  userId?: string;
  contentType?: string;
  contentEncoding?: string;
  correlationId?: string;
  deliveryMode?: number;
  expiration?: string;
  priority?: number;
  replyTo?: string;
  /** Seconds since the Unix epoch, as AMQP transports it */
  timestamp?: number;
  headers?: Record<string, unknown>;
}

/**
 * One push delivery as handed over by the protocol client
 */
export interface BrokerDelivery {
  exchange: string;
  routingKey: string;
  deliveryTag: number;
  redelivered: boolean;
  properties: MessageProperties;
  body: Buffer;
}

/**
 * Called once per delivery, sequentially.
 * `null` means the subscription ended on the broker side: cancelled (queue
 * deleted, node failover) or its channel closed.
 */
export type DeliveryCallback = (delivery: BrokerDelivery | null) => void;

export interface QueueCheckResult {
  queue: string;
  messageCount: number;
  consumerCount: number;
}

/**
 * The single protocol channel a retrieval run works on.
 * Not safe for concurrent acknowledgment calls: callers serialize them.
 */
export interface BrokerChannel {
  /**
   * Passive declare. Rejects when the queue does not exist.
   */
  checkQueue(queue: string): Promise<QueueCheckResult>;
  /**
   * basic.qos per consumer; 0 means unlimited
   */
  setPrefetch(count: number): Promise<void>;
  /**
   * basic.consume with manual acknowledgment. Resolves with the consumer tag.
   */
  subscribe(queue: string, onDelivery: DeliveryCallback): Promise<string>;
  unsubscribe(consumerTag: string): Promise<void>;
  ack(deliveryTag: number): Promise<void>;
  /** basic.nack without requeue */
  reject(deliveryTag: number): Promise<void>;
  /** basic.nack with requeue */
  requeue(deliveryTag: number): Promise<void>;
  /**
   * Closes the channel. Unacknowledged deliveries return to the queue.
   */
  close(): Promise<void>;
}
