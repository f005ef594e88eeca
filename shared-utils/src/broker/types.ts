/**
 * Broker connection settings. Built once from the environment by the entry
 * point and passed to the connector.
 */
export interface BrokerConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  vhost: string;
  exchange: string;
  queue: string;
  routingKey: string;
  heartbeatSec: number;
  /** Connection attempts before startup gives up */
  maxConnectAttempts: number;
  /** Backoff unit; attempt n waits baseDelayMs * 2^n */
  baseDelayMs: number;
  /** Unacknowledged messages a consumer may hold */
  prefetch: number;
}

/**
 * A message handed to a consumer. Exactly one of ack/reject must be called
 * for every delivery.
 */
export interface Delivery {
  body: Buffer;
  deliveryTag: number;
  redelivered: boolean;
  routingKey: string;
}

export type DeliveryHandler = (delivery: Delivery) => Promise<void>;

/**
 * Channel contract shared by the AMQP broker and the in-process broker
 */
export interface BrokerChannel {
  /**
   * Register the consumer. Deliveries arrive one at a time when prefetch is 1.
   */
  consume(handler: DeliveryHandler): Promise<void>;

  ack(delivery: Delivery): void;

  /**
   * Negative acknowledgement. With requeue=false the broker drops the message
   * or dead-letters it when the queue has a dead-letter exchange.
   */
  reject(delivery: Delivery, requeue: boolean): void;

  /**
   * Publish a persistent JSON message to the configured exchange
   */
  publish(payload: unknown, routingKey?: string): Promise<void>;

  close(): Promise<void>;
}

export class BrokerConnectionError extends Error {
  constructor(
    message: string,
    readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "BrokerConnectionError";
  }
}
