import { Logger } from "@listing-sync/shared-utils";
import { formatStoreDateTime } from "./dates";
import { StoreValue, StoreValues } from "./dto";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class CircularValueError extends Error {
  constructor() {
    super("Value contains a circular reference");
    this.name = "CircularValueError";
  }
}

/**
 * Convert an arbitrary value into something the store can take as JSON.
 *
 * Returns undefined for values with no JSON form (undefined, functions,
 * symbols, non-finite numbers, invalid dates). Inside arrays those become
 * null; inside objects the key is dropped. Date objects become store
 * datetimes and bigints become strings. Throws CircularValueError on cycles.
 */
export function toStoreValue(
  value: unknown,
  seen: WeakSet<object> = new WeakSet()
): StoreValue | undefined {
  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      return Number.isFinite(value) ? value : undefined;
    case "bigint":
      return value.toString();
    case "undefined":
    case "function":
    case "symbol":
      return undefined;
  }

  if (value === null) return null;

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : formatStoreDateTime(value);
  }

  if (typeof value !== "object") return undefined;

  if (seen.has(value)) {
    throw new CircularValueError();
  }
  seen.add(value);

  try {
    if (Array.isArray(value)) {
      return value.map((item) => toStoreValue(item, seen) ?? null);
    }

    const out: Record<string, StoreValue> = {};
    for (const [key, entry] of Object.entries(value)) {
      const converted = toStoreValue(entry, seen);
      if (converted !== undefined) {
        out[key] = converted;
      }
    }
    return out;
  } finally {
    seen.delete(value);
  }
}

/**
 * Truthiness for nested provider blocks: empty strings, lists
 * and objects count as absent.
 */
export function isBlank(value: unknown): boolean {
  if (value === null || value === undefined || value === false) return true;
  if (typeof value === "string") return value.length === 0;
  if (Array.isArray(value)) return value.length === 0;
  if (isRecord(value)) return Object.keys(value).length === 0;
  return false;
}

/**
 * Final pass over a record before it is sent to the store: drops absent
 * values and anything without a JSON form, stringifying what it can.
 */
export function scrubValues(
  values: Record<string, unknown>,
  logger: Pick<Logger, "warn">
): StoreValues {
  const out: StoreValues = {};

  for (const [key, value] of Object.entries(values)) {
    if (value === null || value === undefined) continue;

    if (typeof value === "function" || typeof value === "symbol") {
      logger.warn(`Skipping non-serializable value for key ${key}: ${typeof value}`);
      continue;
    }

    if (typeof value === "number" && !Number.isFinite(value)) {
      logger.warn(`Skipping value for key ${key} that cannot be represented: ${value}`);
      continue;
    }

    if (typeof value === "bigint") {
      out[key] = value.toString();
      logger.warn(`Converted non-serializable value for key ${key} to string: ${out[key]}`);
      continue;
    }

    try {
      const converted = toStoreValue(value);
      if (converted === undefined) {
        logger.warn(`Skipping value for key ${key} that cannot be represented`);
        continue;
      }
      out[key] = converted;
    } catch (error) {
      if (!(error instanceof CircularValueError)) throw error;
      out[key] = String(value);
      logger.warn(`Converted non-serializable value for key ${key} to string: ${out[key]}`);
    }
  }

  return out;
}
