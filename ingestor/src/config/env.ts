import {
  BrokerConfig,
  ConfigError,
  createBrokerConfig,
  createServiceConfig,
  Env,
  envNumber,
  envOptional,
  envString,
  LogLevel,
} from "@listing-sync/shared-utils";

export interface StoreConfig {
  url: string;
  /** Sent as X-Odoo-Database when set */
  database?: string;
  apiKey?: string;
  timeoutMs: number;
}

export type SourceAdapter = "HTTP" | "MOCK";

export interface SourceConfig {
  adapter: SourceAdapter;
  /** Scraping service endpoint (HTTP) */
  url?: string;
  timeoutMs: number;
  /** Fixtures file (MOCK); defaults to the bundled fixtures */
  fixturesPath?: string;
}

export interface AppConfig {
  mode: string;
  logLevel: LogLevel;
  statusIntervalMs: number;
  broker: BrokerConfig;
  store: StoreConfig;
  source: SourceConfig;
}

function sourceAdapter(env: Env): SourceAdapter {
  const value = envString(env, "SOURCE", "HTTP").toUpperCase();
  if (value !== "HTTP" && value !== "MOCK") {
    throw new ConfigError(`Unknown SOURCE: ${value} (expected HTTP or MOCK)`);
  }
  return value;
}

export function loadConfig(env: Env): AppConfig {
  const service = createServiceConfig(env);

  return {
    mode: service.mode,
    logLevel: service.logLevel,
    statusIntervalMs: envNumber(env, "STATUS_INTERVAL_MS", 300000), // 5 minutes default
    broker: createBrokerConfig(env),
    store: {
      url: envString(env, "ODOO_URL", "http://localhost:8069").replace(/\/+$/, ""),
      database: envString(env, "ODOO_DB_NAME", "odoo"),
      apiKey: envOptional(env, "ODOO_API_KEY"),
      timeoutMs: envNumber(env, "STORE_TIMEOUT_MS", 30000),
    },
    source: {
      adapter: sourceAdapter(env),
      url: envOptional(env, "SCRAPER_URL"),
      timeoutMs: envNumber(env, "SOURCE_TIMEOUT_MS", 30000),
      fixturesPath: envOptional(env, "SOURCE_FIXTURES"),
    },
  };
}

// Validation
export function validateConfig(config: AppConfig): void {
  if (config.source.adapter === "HTTP" && !config.source.url) {
    throw new ConfigError("SCRAPER_URL is required when using the HTTP source");
  }

  if (config.broker.maxConnectAttempts < 1) {
    throw new ConfigError("RABBITMQ_MAX_RETRIES must be at least 1");
  }

  if (config.store.timeoutMs <= 0 || config.source.timeoutMs <= 0) {
    throw new ConfigError("Request timeouts must be positive");
  }
}
