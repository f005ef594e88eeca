#!/usr/bin/env node

/**
 * Publish one scrape request to the broker, the way the host's scheduled
 * job does.
 *
 * Usage: npm run enqueue -- "<location>" [listing_type] [record_id]
 */

import * as dotenv from "dotenv";
import {
  AmqpConnector,
  ConsoleLogger,
  createBrokerConfig,
  describeError,
  resolveLogLevel,
} from "@listing-sync/shared-utils";
import { scrapeMessageSchema } from "../src/core/schema";

async function main(argv: string[]) {
  dotenv.config();

  const [location, listingType, recordId] = argv;
  const message = scrapeMessageSchema.parse({
    location,
    listing_type: listingType,
    record_id: recordId,
  });

  const logger = new ConsoleLogger("enqueue", resolveLogLevel(process.env.LOG_LEVEL));
  const connector = new AmqpConnector(createBrokerConfig(process.env), { logger });
  const broker = await connector.connect();

  try {
    await broker.publish(message);
    logger.info(`Queued scrape request for ${message.location} (${message.listing_type})`);
  } finally {
    await broker.close();
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).catch((error) => {
    console.error("Failed to enqueue scrape request:", describeError(error));
    process.exit(1);
  });
}
