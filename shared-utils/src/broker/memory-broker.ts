import { Logger } from "../logger";
import { BrokerChannel, Delivery, DeliveryHandler } from "./types";

export type Settlement =
  | { deliveryTag: number; outcome: "ack" }
  | { deliveryTag: number; outcome: "reject"; requeue: boolean };

/**
 * In-memory broker for tests and local runs.
 *
 * Behaves like a queue with prefetch 1: messages are handed to the consumer
 * one at a time and the next is only delivered once the previous handler
 * has finished. Published messages are delivered to the registered consumer.
 */
export class MemoryBroker implements BrokerChannel {
  private handler?: DeliveryHandler;
  private queue: Delivery[] = [];
  private unsettled = new Set<number>();
  private settlements: Settlement[] = [];
  private nextTag = 1;
  private draining?: Promise<void>;
  private closed = false;

  constructor(private logger?: Logger) {}

  async consume(handler: DeliveryHandler): Promise<void> {
    this.handler = handler;
    await this.drain();
  }

  ack(delivery: Delivery): void {
    this.settle(delivery);
    this.settlements.push({ deliveryTag: delivery.deliveryTag, outcome: "ack" });
  }

  reject(delivery: Delivery, requeue: boolean): void {
    this.settle(delivery);
    this.settlements.push({
      deliveryTag: delivery.deliveryTag,
      outcome: "reject",
      requeue,
    });

    if (requeue) {
      this.queue.push({ ...delivery, redelivered: true });
    }
  }

  async publish(payload: unknown, routingKey = "memory"): Promise<void> {
    await this.enqueue(Buffer.from(JSON.stringify(payload)), routingKey);
  }

  /**
   * Deliver a raw body, bypassing JSON encoding (lets tests send malformed input)
   */
  async enqueue(body: Buffer | string, routingKey = "memory"): Promise<void> {
    if (this.closed) {
      throw new Error("MemoryBroker is closed");
    }

    this.queue.push({
      body: typeof body === "string" ? Buffer.from(body) : body,
      deliveryTag: this.nextTag++,
      redelivered: false,
      routingKey,
    });
    await this.drain();
  }

  async close(): Promise<void> {
    this.logger?.debug("Closing memory broker (clearing queue)");
    this.closed = true;
    this.handler = undefined;
    this.queue = [];
  }

  /**
   * Acks and rejects in the order they happened
   */
  getSettlements(): Settlement[] {
    return [...this.settlements];
  }

  getUnsettled(): number[] {
    return Array.from(this.unsettled);
  }

  private settle(delivery: Delivery): void {
    if (!this.unsettled.has(delivery.deliveryTag)) {
      throw new Error(
        `Delivery ${delivery.deliveryTag} was already settled or is unknown`
      );
    }
    this.unsettled.delete(delivery.deliveryTag);
  }

  private async drain(): Promise<void> {
    if (this.draining) {
      return this.draining;
    }

    this.draining = (async () => {
      while (this.handler && this.queue.length > 0) {
        const delivery = this.queue.shift();
        if (!delivery) break;

        this.unsettled.add(delivery.deliveryTag);
        try {
          await this.handler(delivery);
        } catch (error) {
          this.logger?.error(
            `Unhandled error for delivery ${delivery.deliveryTag}:`,
            error
          );
          if (this.unsettled.has(delivery.deliveryTag)) {
            this.reject(delivery, false);
          }
        }
      }
    })();

    try {
      await this.draining;
    } finally {
      this.draining = undefined;
    }
  }
}
