#!/usr/bin/env node

/**
 * Ingestor worker entry point
 */

import * as dotenv from "dotenv";
import { ConsoleLogger, describeError } from "@listing-sync/shared-utils";
import { loadConfig, validateConfig } from "../config/env";
import { IngestorWorker } from "../service";

const MISSING_API_KEY = `
Ingestor is not running
============================================================
Missing store API key (ODOO_API_KEY).

On a first run this is expected: an API key can only be created once the
host application is up.

To generate one:
  1) Open the host application in a browser (default: http://localhost:8069).
  2) Open your user preferences and go to the Security tab.
  3) Click "Add API Key", confirm your password and give the key a name.
  4) Copy the generated key.

Then set it in your .env file:
  ODOO_API_KEY=your_generated_key_here

and restart the ingestor.
============================================================
`;

async function main() {
  // Load environment variables from .env file
  dotenv.config();

  const config = loadConfig(process.env);
  const logger = new ConsoleLogger("ingestor", config.logLevel);

  if (!config.store.apiKey) {
    logger.warn(MISSING_API_KEY);
    process.exit(0);
  }

  validateConfig(config);

  const worker = new IngestorWorker(config, logger, {
    onBrokerLost: () => {
      void worker.stop("broker connection lost").then(() => process.exit(1));
    },
  });
  worker.lifecycle.installSignalHandlers();

  await worker.start();
}

// Start the worker
if (require.main === module) {
  main().catch((error) => {
    console.error("Failed to start ingestor:", describeError(error));
    process.exit(1);
  });
}
