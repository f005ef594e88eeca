import { describe, expect, it, vi } from "vitest";
import { Logger } from "../src/logger";
import { ServiceLifecycle, ServiceState } from "../src/service";

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("ServiceLifecycle", () => {
  it("runs shutdown handlers newest first", async () => {
    const lifecycle = new ServiceLifecycle(silentLogger());
    const order: string[] = [];
    lifecycle.addShutdownHandler(async () => {
      order.push("broker");
    });
    lifecycle.addShutdownHandler(async () => {
      order.push("timers");
    });

    await lifecycle.shutdown("test");

    expect(order).toEqual(["timers", "broker"]);
    expect(lifecycle.getState()).toBe(ServiceState.STOPPED);
  });

  it("shuts down once", async () => {
    const lifecycle = new ServiceLifecycle(silentLogger());
    const handler = vi.fn().mockResolvedValue(undefined);
    lifecycle.addShutdownHandler(handler);

    await Promise.all([lifecycle.shutdown("SIGTERM"), lifecycle.shutdown("SIGINT")]);

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("keeps going after a failing handler and ends in error", async () => {
    const logger = silentLogger();
    const lifecycle = new ServiceLifecycle(logger);
    const after = vi.fn().mockResolvedValue(undefined);
    lifecycle.addShutdownHandler(after);
    lifecycle.addShutdownHandler(async () => {
      throw new Error("close failed");
    });

    await lifecycle.shutdown("test");

    expect(after).toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledWith("Shutdown handler failed:", "close failed");
    expect(lifecycle.getState()).toBe(ServiceState.ERROR);
  });

  it("emits state changes", () => {
    const lifecycle = new ServiceLifecycle(silentLogger());
    const changes: unknown[] = [];
    lifecycle.on("state:changed", (change) => changes.push(change));

    lifecycle.setState(ServiceState.STARTING);

    expect(changes).toEqual([{ from: ServiceState.INITIALIZING, to: ServiceState.STARTING }]);
  });
});
