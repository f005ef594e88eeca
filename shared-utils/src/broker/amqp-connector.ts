import { connect, type ConsumeMessage, type Options } from "amqplib";
import { Logger } from "../logger";
import { describeError, retryWithBackoff, RetryExhaustedError } from "./retry";
import {
  BrokerChannel,
  BrokerConfig,
  BrokerConnectionError,
  Delivery,
  DeliveryHandler,
} from "./types";

/**
 * The slice of an amqplib channel the broker uses
 */
export interface AmqpChannel {
  assertExchange(
    exchange: string,
    type: string,
    options?: Options.AssertExchange
  ): Promise<unknown>;
  assertQueue(queue: string, options?: Options.AssertQueue): Promise<unknown>;
  bindQueue(queue: string, source: string, pattern: string): Promise<unknown>;
  prefetch(count: number): Promise<unknown>;
  consume(
    queue: string,
    onMessage: (message: ConsumeMessage | null) => void,
    options?: Options.Consume
  ): Promise<unknown>;
  ack(message: ConsumeMessage): void;
  nack(message: ConsumeMessage, allUpTo?: boolean, requeue?: boolean): void;
  publish(
    exchange: string,
    routingKey: string,
    content: Buffer,
    options?: Options.Publish
  ): boolean;
  close(): Promise<void>;
  on(event: "error" | "close", listener: (error?: unknown) => void): unknown;
}

/**
 * The slice of an amqplib connection the broker uses
 */
export interface AmqpConnection {
  createChannel(): Promise<AmqpChannel>;
  close(): Promise<void>;
  on(event: "error" | "close", listener: (error?: unknown) => void): unknown;
}

export type AmqpDial = (options: Options.Connect) => Promise<AmqpConnection>;

export interface AmqpConnectorDeps {
  logger: Logger;
  dial?: AmqpDial;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Opens the broker connection and declares the topology: a durable topic
 * exchange, a durable queue and the binding between them.
 *
 * Dial failures are retried with exponential backoff; topology errors are not.
 */
export class AmqpConnector {
  private dial: AmqpDial;

  constructor(
    private config: BrokerConfig,
    private deps: AmqpConnectorDeps
  ) {
    this.dial = deps.dial ?? ((options) => connect(options));
  }

  async connect(): Promise<AmqpBroker> {
    const { logger } = this.deps;
    logger.info(
      `Connecting to broker at ${this.config.host}:${this.config.port}`
    );
    logger.debug(
      `Broker settings: exchange=${this.config.exchange}, queue=${this.config.queue}, routing_key=${this.config.routingKey}, user=${this.config.user}`
    );

    let connection: AmqpConnection;
    try {
      connection = await retryWithBackoff(() => this.dial(this.connectOptions()), {
        maxAttempts: this.config.maxConnectAttempts,
        baseDelayMs: this.config.baseDelayMs,
        label: "Broker connection",
        logger,
        sleep: this.deps.sleep,
      });
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        logger.error("Failed to connect to broker after maximum retries");
        throw new BrokerConnectionError(
          "Could not connect to broker",
          error.attempts,
          { cause: error.cause }
        );
      }
      throw error;
    }

    try {
      const channel = await connection.createChannel();
      await this.declareTopology(channel);
      logger.info("Successfully connected to broker");
      return new AmqpBroker(connection, channel, this.config, logger);
    } catch (error) {
      logger.error("Failed to declare broker topology:", describeError(error));
      await connection.close().catch((closeError: unknown) => {
        logger.warn("Error closing broker connection:", describeError(closeError));
      });
      throw error;
    }
  }

  private connectOptions(): Options.Connect {
    return {
      protocol: "amqp",
      hostname: this.config.host,
      port: this.config.port,
      username: this.config.user,
      password: this.config.password,
      vhost: this.config.vhost,
      heartbeat: this.config.heartbeatSec,
    };
  }

  private async declareTopology(channel: AmqpChannel): Promise<void> {
    const { exchange, queue, routingKey } = this.config;
    const { logger } = this.deps;

    await channel.assertExchange(exchange, "topic", { durable: true });
    logger.debug(`Declared exchange ${exchange} (type=topic, durable=true)`);

    await channel.assertQueue(queue, { durable: true });
    logger.debug(`Declared queue ${queue} (durable=true)`);

    await channel.bindQueue(queue, exchange, routingKey);
    logger.debug(
      `Bound queue ${queue} to exchange ${exchange} with key ${routingKey}`
    );
  }
}

/**
 * A connected broker. Owns the connection and its single channel until close().
 */
export class AmqpBroker implements BrokerChannel {
  private pending = new Map<number, ConsumeMessage>();
  private disconnectListeners: Array<(error?: unknown) => void> = [];
  private closing = false;
  private disconnected = false;

  constructor(
    private connection: AmqpConnection,
    private channel: AmqpChannel,
    private config: BrokerConfig,
    private logger: Logger
  ) {
    connection.on("error", (error) => {
      this.logger.error("Broker connection error:", describeError(error));
    });

    connection.on("close", (error) => {
      if (this.closing) return;
      this.logger.error("Broker connection closed unexpectedly");
      this.notifyDisconnect(error);
    });

    // A channel error closes the channel; the connection may stay up
    channel.on("error", (error) => {
      this.logger.error("Broker channel error:", describeError(error));
    });

    channel.on("close", () => {
      if (this.closing) return;
      this.logger.error("Broker channel closed unexpectedly");
      this.notifyDisconnect(new Error("Broker channel closed"));
    });
  }

  /**
   * Register a callback for an unexpected connection or channel loss.
   * Listeners are called once.
   */
  onDisconnect(listener: (error?: unknown) => void): void {
    this.disconnectListeners.push(listener);
  }

  async consume(handler: DeliveryHandler): Promise<void> {
    this.logger.debug(
      `Configuring prefetch=${this.config.prefetch} and registering consumer on ${this.config.queue}`
    );
    await this.channel.prefetch(this.config.prefetch);

    await this.channel.consume(
      this.config.queue,
      (message) => {
        if (message === null) {
          this.logger.warn("Consumer was cancelled by the broker");
          this.notifyDisconnect(new Error("Consumer cancelled"));
          return;
        }
        void this.dispatch(message, handler);
      },
      { noAck: false }
    );

    this.logger.info(`Consuming messages from queue: ${this.config.queue}`);
  }

  ack(delivery: Delivery): void {
    this.channel.ack(this.take(delivery));
  }

  reject(delivery: Delivery, requeue: boolean): void {
    this.channel.nack(this.take(delivery), false, requeue);
  }

  async publish(payload: unknown, routingKey?: string): Promise<void> {
    const key = routingKey ?? this.config.routingKey;
    this.channel.publish(
      this.config.exchange,
      key,
      Buffer.from(JSON.stringify(payload)),
      { persistent: true, contentType: "application/json" }
    );
    this.logger.debug(`Published message to ${this.config.exchange} (${key})`);
  }

  async close(): Promise<void> {
    if (this.closing) return;
    this.closing = true;
    this.logger.info("Closing broker connection...");

    try {
      await this.channel.close();
      await this.connection.close();
      this.logger.info("Broker connection closed");
    } catch (error) {
      this.logger.error("Error closing broker connection:", describeError(error));
    }
  }

  private async dispatch(
    message: ConsumeMessage,
    handler: DeliveryHandler
  ): Promise<void> {
    const delivery: Delivery = {
      body: message.content,
      deliveryTag: message.fields.deliveryTag,
      redelivered: message.fields.redelivered,
      routingKey: message.fields.routingKey,
    };
    this.pending.set(delivery.deliveryTag, message);

    try {
      await handler(delivery);
    } catch (error) {
      this.logger.error(
        `Unhandled error for delivery ${delivery.deliveryTag}:`,
        describeError(error)
      );
      if (this.pending.has(delivery.deliveryTag)) {
        this.reject(delivery, false);
      }
    }
  }

  private take(delivery: Delivery): ConsumeMessage {
    const message = this.pending.get(delivery.deliveryTag);
    if (!message) {
      throw new Error(
        `Delivery ${delivery.deliveryTag} was already settled or is unknown`
      );
    }
    this.pending.delete(delivery.deliveryTag);
    return message;
  }

  private notifyDisconnect(error?: unknown): void {
    if (this.disconnected) return;
    this.disconnected = true;
    for (const listener of this.disconnectListeners) {
      listener(error);
    }
  }
}
