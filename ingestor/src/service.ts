/**
 * Ingestor worker: wires the store, the provider and the broker together
 * and owns them until shutdown.
 */

import {
  AmqpConnector,
  AmqpConnectorDeps,
  ConsoleLogger,
  Logger,
  ServiceLifecycle,
  ServiceState,
} from "@listing-sync/shared-utils";
import { HttpScrapeSource } from "./adapters/source.http";
import { MockSource } from "./adapters/source.mock";
import { JsonRpcTransport } from "./adapters/store.jsonrpc";
import { AppConfig, SourceConfig } from "./config/env";
import { createScrapeConsumer, ScrapeConsumer } from "./core/consumer";
import { ProviderError, SourcePort } from "./core/ports";
import { StoreClient } from "./core/store";

export function createSource(config: SourceConfig, logger: Logger): SourcePort {
  switch (config.adapter) {
    case "MOCK":
      logger.info("Using fixtures source");
      return new MockSource(config.fixturesPath);
    case "HTTP":
      if (!config.url) {
        throw new ProviderError("SCRAPER_URL is required when using the HTTP source");
      }
      logger.info(`Using scraping service at ${config.url}`);
      return new HttpScrapeSource({ ...config, url: config.url }, logger);
  }
}

export interface IngestorWorkerOptions {
  /** Called when the broker connection drops while running */
  onBrokerLost?: (error?: unknown) => void;
  dial?: AmqpConnectorDeps["dial"];
}

export class IngestorWorker {
  readonly lifecycle: ServiceLifecycle;
  private consumer?: ScrapeConsumer;
  private statusInterval?: NodeJS.Timeout;

  constructor(
    private config: AppConfig,
    private logger: ConsoleLogger,
    private options: IngestorWorkerOptions = {}
  ) {
    this.lifecycle = new ServiceLifecycle(logger);
  }

  async start(): Promise<void> {
    this.lifecycle.setState(ServiceState.STARTING);
    this.logger.info(`Starting ingestor (${this.config.mode})...`);

    const transport = new JsonRpcTransport(this.config.store, this.logger.child("store"));
    await transport.checkConnection();
    const store = new StoreClient(transport, this.logger.child("store"));

    const source = createSource(this.config.source, this.logger.child("source"));

    const connector = new AmqpConnector(this.config.broker, {
      logger: this.logger.child("broker"),
      dial: this.options.dial,
    });
    const broker = await connector.connect();
    this.lifecycle.addShutdownHandler(() => broker.close());
    broker.onDisconnect((error) => this.options.onBrokerLost?.(error));

    this.consumer = createScrapeConsumer({
      broker,
      source,
      store,
      logger: this.logger.child("consumer"),
    });
    await this.consumer.start();

    this.startStatusLog();
    this.lifecycle.setState(ServiceState.RUNNING);
    this.logger.info("Ingestor started, waiting for scrape requests");
  }

  async stop(reason = "stop"): Promise<void> {
    await this.lifecycle.shutdown(reason);
  }

  private startStatusLog(): void {
    this.statusInterval = setInterval(() => {
      if (this.lifecycle.getState() === ServiceState.RUNNING && this.consumer) {
        this.logger.info("Consumer status:", {
          state: this.consumer.getState(),
          ...this.consumer.getStats(),
          uptimeSeconds: this.lifecycle.getUptimeSeconds(),
        });
      }
    }, this.config.statusIntervalMs);
    this.statusInterval.unref();

    this.lifecycle.addShutdownHandler(async () => {
      if (this.statusInterval) {
        clearInterval(this.statusInterval);
      }
    });
  }
}
