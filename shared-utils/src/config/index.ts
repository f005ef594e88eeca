/**
 * Shared configuration helpers.
 *
 * Every helper reads from an explicit env record so callers decide where
 * values come from (process.env in the entry point, literals in tests).
 */

import { BrokerConfig } from "../broker/types";
import { LogLevel, resolveLogLevel } from "../logger";

export type Env = Record<string, string | undefined>;

export interface ServiceConfig {
  mode: string;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function envString(env: Env, name: string, fallback: string): string {
  const value = env[name];
  return value === undefined || value.trim() === "" ? fallback : value.trim();
}

export function envOptional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

export function envNumber(env: Env, name: string, fallback: number): number {
  const raw = envOptional(env, name);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`Invalid number in ${name}: ${raw}`);
  }
  return value;
}

export function createServiceConfig(env: Env): ServiceConfig {
  return {
    mode: env.MODE ?? env.NODE_ENV ?? "development",
    logLevel: resolveLogLevel(env.LOG_LEVEL),
  };
}

/**
 * Broker settings from RABBITMQ_* variables
 */
export function createBrokerConfig(env: Env): BrokerConfig {
  return {
    host: envString(env, "RABBITMQ_HOST", "rabbitmq"),
    port: envNumber(env, "RABBITMQ_PORT", 5672),
    user: envString(env, "RABBITMQ_USER", "guest"),
    password: envString(env, "RABBITMQ_PASS", "guest"),
    vhost: envString(env, "RABBITMQ_VHOST", "/"),
    exchange: envString(env, "RABBITMQ_EXCHANGE", "property_exchange"),
    queue: envString(env, "RABBITMQ_QUEUE", "property_scrape_queue"),
    routingKey: envString(env, "RABBITMQ_ROUTING_KEY", "property.scrape"),
    heartbeatSec: envNumber(env, "RABBITMQ_HEARTBEAT_SEC", 600),
    maxConnectAttempts: envNumber(env, "RABBITMQ_MAX_RETRIES", 10),
    baseDelayMs: envNumber(env, "RABBITMQ_BACKOFF_MS", 1000),
    prefetch: 1,
  };
}
