import {
  BrokerChannel,
  Delivery,
  describeError,
  Logger,
} from "@listing-sync/shared-utils";
import { ListingUpsertResult, ScrapeRequest } from "./dto";
import { upsertListing } from "./pipeline";
import { SourcePort } from "./ports";
import { InvalidMessageError, parseScrapeMessage, RawRecordError } from "./schema";
import { StoreClient } from "./store";

export type ConsumerState =
  | "idle"
  | "receiving"
  | "processing"
  | "acknowledged"
  | "rejected";

export type DeliveryOutcome =
  | { outcome: "ack"; results: ListingUpsertResult[] }
  | { outcome: "drop"; reason: string }
  | { outcome: "reject"; error: string };

export interface ConsumerStats {
  received: number;
  acknowledged: number;
  dropped: number;
  rejected: number;
  listingsCreated: number;
  listingsUpdated: number;
  recordsSkipped: number;
}

export interface ScrapeConsumerDeps {
  broker: BrokerChannel;
  source: SourcePort;
  store: StoreClient;
  logger: Logger;
}

class MalformedBodyError extends Error {
  constructor(options: { cause?: unknown }) {
    super("Invalid JSON in message", options);
    this.name = "MalformedBodyError";
  }
}

function decodeBody(delivery: Delivery): unknown {
  try {
    return JSON.parse(delivery.body.toString("utf8"));
  } catch (error) {
    throw new MalformedBodyError({ cause: error });
  }
}

/**
 * Takes scrape requests off the queue one at a time, runs them through the
 * provider and the listing pipeline, then settles the delivery: ack on
 * success or on a message that can never succeed, reject (no requeue) when
 * processing fails.
 */
export class ScrapeConsumer {
  private state: ConsumerState = "idle";
  private stats: ConsumerStats = {
    received: 0,
    acknowledged: 0,
    dropped: 0,
    rejected: 0,
    listingsCreated: 0,
    listingsUpdated: 0,
    recordsSkipped: 0,
  };

  constructor(private deps: ScrapeConsumerDeps) {}

  async start(): Promise<void> {
    await this.deps.broker.consume(async (delivery) => {
      await this.handleDelivery(delivery);
    });
  }

  getState(): ConsumerState {
    return this.state;
  }

  getStats(): ConsumerStats {
    return { ...this.stats };
  }

  async handleDelivery(delivery: Delivery): Promise<DeliveryOutcome> {
    const { broker, logger } = this.deps;
    this.state = "receiving";
    this.stats.received++;
    logger.info(`Received message ${delivery.deliveryTag}`);
    logger.debug(`Message body: ${delivery.body.toString("utf8")}`);

    let request: ScrapeRequest;
    try {
      request = parseScrapeMessage(decodeBody(delivery));
    } catch (error) {
      if (error instanceof MalformedBodyError || error instanceof InvalidMessageError) {
        logger.error(`Dropping message ${delivery.deliveryTag}: ${error.message}`);
        broker.ack(delivery);
        this.stats.dropped++;
        this.state = "acknowledged";
        return { outcome: "drop", reason: error.message };
      }
      throw error;
    }

    this.state = "processing";
    try {
      const results = await this.process(request);
      broker.ack(delivery);
      this.stats.acknowledged++;
      this.state = "acknowledged";
      logger.info(`Successfully processed ${results.length} listings`);
      return { outcome: "ack", results };
    } catch (error) {
      const message = describeError(error);
      logger.error(`Error processing message ${delivery.deliveryTag}:`, message);
      broker.reject(delivery, false);
      this.stats.rejected++;
      this.state = "rejected";
      return { outcome: "reject", error: message };
    }
  }

  private async process(request: ScrapeRequest): Promise<ListingUpsertResult[]> {
    const { source, store, logger } = this.deps;

    if (request.recordId !== undefined) {
      logger.info(`Record ID provided: ${request.recordId}. Will update this specific record.`);
    }
    logger.info(
      `Fetching listings for location: ${request.location}, type: ${request.listingType}`
    );

    let records = await source.fetch(request.location, request.listingType, request.params);
    logger.info(`Provider returned ${records.length} listings`);

    if (request.recordId !== undefined && records.length > 1) {
      logger.error(
        `Provider returned ${records.length} listings for record ${request.recordId}; only the first will be used`
      );
      records = records.slice(0, 1);
    }

    const results: ListingUpsertResult[] = [];
    for (const record of records) {
      try {
        const result = await upsertListing(record, { store, logger }, request.recordId);
        if (result.action === "create") {
          this.stats.listingsCreated++;
        } else {
          this.stats.listingsUpdated++;
        }
        results.push(result);
      } catch (error) {
        if (!(error instanceof RawRecordError)) throw error;
        this.stats.recordsSkipped++;
        logger.warn(`Skipping listing record: ${error.message}`);
      }
    }
    return results;
  }
}

export function createScrapeConsumer(deps: ScrapeConsumerDeps): ScrapeConsumer {
  return new ScrapeConsumer(deps);
}
