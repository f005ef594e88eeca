import { EventEmitter } from "events";
import { describeError } from "../broker/retry";
import { Logger } from "../logger";
import { ServiceState } from "./types";

/**
 * Service lifecycle manager
 * Handles state transitions and graceful shutdown
 */
export class ServiceLifecycle extends EventEmitter {
  private state: ServiceState = ServiceState.INITIALIZING;
  private startTime: Date = new Date();
  private shutdownHandlers: Array<() => Promise<void>> = [];
  private isShuttingDown = false;

  constructor(
    private logger: Logger,
    private shutdownTimeoutMs: number = 30000
  ) {
    super();
  }

  getState(): ServiceState {
    return this.state;
  }

  getUptimeSeconds(): number {
    return Math.floor((Date.now() - this.startTime.getTime()) / 1000);
  }

  setState(newState: ServiceState): void {
    const oldState = this.state;
    this.state = newState;

    this.emit("state:changed", { from: oldState, to: newState });
    this.logger.debug(`State changed: ${oldState} → ${newState}`);
  }

  /**
   * Handlers run in reverse registration order, so resources opened last
   * are released first.
   */
  addShutdownHandler(handler: () => Promise<void>): void {
    this.shutdownHandlers.push(handler);
  }

  /**
   * Exit the process on SIGINT/SIGTERM after a graceful shutdown.
   * Entry points call this; tests don't.
   */
  installSignalHandlers(): void {
    const signals: NodeJS.Signals[] = ["SIGTERM", "SIGINT"];

    signals.forEach((signal) => {
      process.once(signal, () => {
        void this.shutdown(signal).then(() => process.exit(0));
      });
    });

    process.on("unhandledRejection", (reason) => {
      this.logger.error("Unhandled rejection:", describeError(reason));
      void this.shutdown("unhandledRejection").then(() => process.exit(1));
    });
  }

  async shutdown(reason: string): Promise<void> {
    if (this.isShuttingDown) {
      this.logger.debug("Already shutting down, ignoring", reason);
      return;
    }

    this.isShuttingDown = true;
    const shutdownStart = Date.now();

    this.logger.info(`Received ${reason}, starting graceful shutdown...`);
    this.setState(ServiceState.STOPPING);

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`Shutdown timeout after ${this.shutdownTimeoutMs}ms`));
      }, this.shutdownTimeoutMs);
    });

    try {
      await Promise.race([this.runShutdownHandlers(), timeout]);

      const durationMs = Date.now() - shutdownStart;
      this.logger.info(`Graceful shutdown completed in ${durationMs}ms`);
      this.setState(ServiceState.STOPPED);
    } catch (error) {
      this.logger.error("Error during shutdown:", describeError(error));
      this.setState(ServiceState.ERROR);
    } finally {
      clearTimeout(timer);
    }
  }

  private async runShutdownHandlers(): Promise<void> {
    const handlers = [...this.shutdownHandlers].reverse();
    this.shutdownHandlers = [];
    let failures = 0;

    for (const handler of handlers) {
      try {
        await handler();
      } catch (error) {
        failures++;
        this.logger.error("Shutdown handler failed:", describeError(error));
      }
    }

    if (failures > 0) {
      throw new Error(`${failures} shutdown handlers failed`);
    }
  }
}
