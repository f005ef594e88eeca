import { describe, expect, it } from "vitest";
import { Delivery } from "../src/broker/types";
import { MemoryBroker } from "../src/broker/memory-broker";

describe("MemoryBroker", () => {
  it("holds published messages until a consumer registers", async () => {
    const broker = new MemoryBroker();
    await broker.publish({ location: "Springfield" });

    const received: unknown[] = [];
    await broker.consume(async (delivery) => {
      received.push(JSON.parse(delivery.body.toString()));
      broker.ack(delivery);
    });

    expect(received).toEqual([{ location: "Springfield" }]);
    expect(broker.getSettlements()).toEqual([{ deliveryTag: 1, outcome: "ack" }]);
    expect(broker.getUnsettled()).toEqual([]);
  });

  it("delivers one message at a time", async () => {
    const broker = new MemoryBroker();
    const events: string[] = [];

    await broker.consume(async (delivery) => {
      events.push(`start ${delivery.deliveryTag}`);
      await new Promise((resolve) => setTimeout(resolve, 5));
      events.push(`end ${delivery.deliveryTag}`);
      broker.ack(delivery);
    });

    await Promise.all([broker.publish({ n: 1 }), broker.publish({ n: 2 })]);

    expect(events).toEqual(["start 1", "end 1", "start 2", "end 2"]);
  });

  it("redelivers a message rejected with requeue", async () => {
    const broker = new MemoryBroker();
    const seen: Array<Pick<Delivery, "deliveryTag" | "redelivered">> = [];

    await broker.consume(async (delivery) => {
      seen.push({ deliveryTag: delivery.deliveryTag, redelivered: delivery.redelivered });
      if (delivery.redelivered) {
        broker.ack(delivery);
      } else {
        broker.reject(delivery, true);
      }
    });
    await broker.publish({ n: 1 });

    expect(seen).toEqual([
      { deliveryTag: 1, redelivered: false },
      { deliveryTag: 1, redelivered: true },
    ]);
    expect(broker.getSettlements()).toEqual([
      { deliveryTag: 1, outcome: "reject", requeue: true },
      { deliveryTag: 1, outcome: "ack" },
    ]);
  });

  it("rejects without requeue when the handler throws", async () => {
    const broker = new MemoryBroker();
    await broker.consume(async () => {
      throw new Error("handler failed");
    });

    await broker.enqueue("not json");

    expect(broker.getSettlements()).toEqual([
      { deliveryTag: 1, outcome: "reject", requeue: false },
    ]);
  });

  it("refuses to settle a delivery twice", async () => {
    const broker = new MemoryBroker();
    let error: unknown;

    await broker.consume(async (delivery) => {
      broker.ack(delivery);
      try {
        broker.ack(delivery);
      } catch (e) {
        error = e;
      }
    });
    await broker.publish({ n: 1 });

    expect(error).toBeInstanceOf(Error);
    expect(broker.getSettlements()).toHaveLength(1);
  });
});
