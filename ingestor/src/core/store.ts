import { Logger } from "@listing-sync/shared-utils";
import {
  Domain,
  EntityName,
  StoreRequest,
  StoreRow,
  StoreValue,
  StoreValues,
} from "./dto";
import { StoreRequestError, StoreTransport } from "./ports";
import { isRecord, toStoreValue } from "./values";

/**
 * Turn any store response into a list. The store answers either with the
 * bare value (id, list of ids, list of rows, boolean) or with an object
 * wrapping it under `result`.
 */
export function normalizeResponse(payload: unknown): unknown[] {
  const value = isRecord(payload) && "result" in payload ? payload.result : payload;

  if (Array.isArray(value)) return value;
  if (value === null || value === undefined || value === false) return [];
  return [value];
}

function toId(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isInteger(value) && value > 0) {
    return value;
  }
  if (typeof value === "string" && /^\d+$/.test(value)) {
    const id = Number(value);
    return id > 0 ? id : undefined;
  }
  return undefined;
}

function toRow(value: unknown): StoreRow | undefined {
  if (!isRecord(value)) return undefined;

  const row: StoreRow = {};
  for (const [field, raw] of Object.entries(value)) {
    const converted = toStoreValue(raw);
    if (converted !== undefined) {
      row[field] = converted;
    }
  }
  return row;
}

/**
 * Typed create/write/search/search_read over a StoreTransport.
 * Transport failures surface as StoreRequestError.
 */
export class StoreClient {
  constructor(
    private transport: StoreTransport,
    private logger: Logger
  ) {}

  async search(
    entity: EntityName,
    domain: Domain,
    options: { limit?: number } = {}
  ): Promise<number[]> {
    const args: Record<string, StoreValue> = { domain };
    if (options.limit !== undefined) {
      args.limit = options.limit;
    }

    const ids = normalizeResponse(await this.call({ entity, method: "search", args }));
    return ids.map(toId).filter((id): id is number => id !== undefined);
  }

  async searchRead(
    entity: EntityName,
    domain: Domain,
    fields: string[]
  ): Promise<StoreRow[]> {
    const rows = normalizeResponse(
      await this.call({ entity, method: "search_read", args: { domain, fields } })
    );
    return rows.map(toRow).filter((row): row is StoreRow => row !== undefined);
  }

  async create(entity: EntityName, values: StoreValues): Promise<number> {
    const request: StoreRequest = {
      entity,
      method: "create",
      args: { vals_list: [values] },
    };
    const [first] = normalizeResponse(await this.call(request));
    const id = toId(first);

    if (id === undefined) {
      throw new StoreRequestError(`Create on ${entity} returned no id`, request);
    }

    this.logger.debug(`Created ${entity} ${id}`);
    return id;
  }

  async write(entity: EntityName, ids: number[], values: StoreValues): Promise<void> {
    const request: StoreRequest = {
      entity,
      method: "write",
      args: { ids, vals: values },
    };
    const result = normalizeResponse(await this.call(request));

    if (result.length === 0) {
      throw new StoreRequestError(
        `Write on ${entity} ${ids.join(",")} was refused`,
        request
      );
    }

    this.logger.debug(`Updated ${entity} ${ids.join(",")}`);
  }

  /**
   * Look up a row by one field, creating it with `values` when absent
   */
  async findOrCreate(
    entity: EntityName,
    field: string,
    value: string,
    values: StoreValues
  ): Promise<number> {
    const [existing] = await this.search(entity, [[field, "=", value]], { limit: 1 });
    if (existing !== undefined) return existing;
    return this.create(entity, values);
  }

  private async call(request: StoreRequest): Promise<unknown> {
    this.logger.debug(`Store ${request.entity}.${request.method}`);
    return this.transport.call(request);
  }
}
