import { describeError, Logger } from "@listing-sync/shared-utils";
import {
  DomainTerm,
  ENTITIES,
  EntityName,
  ListingChangedEvent,
  StoreRequest,
  StoreRow,
  StoreScalar,
  StoreValue,
} from "../core/dto";
import { StoreRequestError, StoreTransport } from "../core/ports";

export interface MemoryStoreOptions {
  /** Answer as {result: ...} instead of the bare value */
  wrapResults?: boolean;
  logger?: Logger;
}

export type ListingChangedListener = (event: ListingChangedEvent) => void | Promise<void>;

function isScalar(value: StoreValue | undefined): value is StoreScalar {
  return value === null || ["string", "number", "boolean"].includes(typeof value);
}

function isDomainTerm(value: StoreValue): value is DomainTerm {
  return (
    Array.isArray(value) &&
    value.length === 3 &&
    typeof value[0] === "string" &&
    (value[1] === "=" || value[1] === "!=") &&
    isScalar(value[2])
  );
}

function isRow(value: StoreValue | undefined): value is StoreRow {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toIds(value: StoreValue | undefined): number[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const ids = value.filter((id): id is number => typeof id === "number");
  return ids.length === value.length ? ids : undefined;
}

/**
 * Resolve replace-all link commands ([[6, 0, ids]]) to the id list they leave
 */
function applyLinkCommands(value: StoreValue): StoreValue {
  if (!Array.isArray(value) || value.length === 0) return value;

  let linked: number[] | undefined;
  for (const command of value) {
    if (!Array.isArray(command) || command[0] !== 6) return value;
    linked = toIds(command[2]);
    if (linked === undefined) return value;
  }
  return linked ?? value;
}

/**
 * In-process store: evaluates equality domains, field projection and link
 * commands over per-entity tables, and publishes listing change events the
 * way the host does after a write.
 */
export class MemoryStore implements StoreTransport {
  private tables = new Map<string, Map<number, StoreRow>>();
  private nextIds = new Map<string, number>();
  private listeners: ListingChangedListener[] = [];
  private readonly failures: Array<{ entity: string; method?: string; message: string }> = [];
  readonly calls: StoreRequest[] = [];

  constructor(private options: MemoryStoreOptions = {}) {}

  async call(request: StoreRequest): Promise<unknown> {
    this.calls.push(request);

    const failure = this.failures.find(
      (f) => f.entity === request.entity && (!f.method || f.method === request.method)
    );
    if (failure) {
      throw new StoreRequestError(failure.message, request, 500);
    }

    const result = await this.dispatch(request);
    return this.options.wrapResults ? { result } : result;
  }

  /**
   * Make every matching call fail
   */
  failOn(entity: EntityName, method?: StoreRequest["method"], message = "Simulated store failure"): void {
    this.failures.push({ entity, method, message });
  }

  onListingChanged(listener: ListingChangedListener): void {
    this.listeners.push(listener);
  }

  /**
   * Insert a row directly, bypassing the request log
   */
  seed(entity: EntityName, values: StoreRow): number {
    return this.insert(entity, values);
  }

  rows(entity: EntityName): StoreRow[] {
    return Array.from(this.table(entity).values(), (row) => ({ ...row }));
  }

  count(entity: EntityName): number {
    return this.table(entity).size;
  }

  callsTo(entity: EntityName, method?: StoreRequest["method"]): StoreRequest[] {
    return this.calls.filter(
      (call) => call.entity === entity && (!method || call.method === method)
    );
  }

  private async dispatch(request: StoreRequest): Promise<StoreValue> {
    const { entity, method, args } = request;

    switch (method) {
      case "context_get":
        return { lang: "en_US", tz: "UTC", uid: 2 };

      case "search": {
        const limit = typeof args.limit === "number" ? args.limit : undefined;
        return this.find(entity, this.domain(request))
          .slice(0, limit)
          .map((row) => row.id);
      }

      case "search_read": {
        const fields = Array.isArray(args.fields)
          ? args.fields.filter((f): f is string => typeof f === "string")
          : [];
        return this.find(entity, this.domain(request)).map((row) => {
          const projected: StoreRow = { id: row.id };
          for (const field of fields) {
            projected[field] = row[field] ?? false;
          }
          return projected;
        });
      }

      case "create": {
        const records = args.vals_list;
        if (!Array.isArray(records) || !records.every(isRow)) {
          throw new StoreRequestError("create expects vals_list", request, 400);
        }
        return records.map((values) => this.insert(entity, values));
      }

      case "write": {
        const ids = toIds(args.ids);
        const values = args.vals;
        if (!ids || !isRow(values)) {
          throw new StoreRequestError("write expects ids and vals", request, 400);
        }
        for (const id of ids) {
          await this.update(entity, id, values, request);
        }
        return true;
      }
    }
  }

  private domain(request: StoreRequest): DomainTerm[] {
    const domain: StoreValue = request.args.domain ?? [];
    if (!Array.isArray(domain) || !domain.every(isDomainTerm)) {
      throw new StoreRequestError("Invalid domain", request, 400);
    }
    return domain;
  }

  private find(entity: string, domain: DomainTerm[]): StoreRow[] {
    return Array.from(this.table(entity).values()).filter((row) =>
      domain.every(([field, operator, value]) =>
        operator === "=" ? row[field] === value : row[field] !== value
      )
    );
  }

  private table(entity: string): Map<number, StoreRow> {
    let table = this.tables.get(entity);
    if (!table) {
      table = new Map();
      this.tables.set(entity, table);
    }
    return table;
  }

  private insert(entity: string, values: Record<string, StoreValue>): number {
    const id = this.nextIds.get(entity) ?? 1;
    this.nextIds.set(entity, id + 1);

    const row: StoreRow = { id };
    for (const [field, value] of Object.entries(values)) {
      if (field !== "id") row[field] = applyLinkCommands(structuredClone(value));
    }
    this.table(entity).set(id, row);
    return id;
  }

  private async update(
    entity: string,
    id: number,
    values: Record<string, StoreValue>,
    request: StoreRequest
  ): Promise<void> {
    const row = this.table(entity).get(id);
    if (!row) {
      throw new StoreRequestError(`Record ${entity} ${id} does not exist`, request, 404);
    }

    const changed: string[] = [];
    for (const [field, value] of Object.entries(values)) {
      if (field === "id") continue;
      const next = applyLinkCommands(structuredClone(value));
      if (JSON.stringify(row[field]) !== JSON.stringify(next)) {
        changed.push(field);
      }
      row[field] = next;
    }

    if (entity === ENTITIES.listing) {
      await this.notify({
        channel: `estate_property_${id}`,
        type: "estate_property_update",
        payload: { id, entity_name: ENTITIES.listing, changed_field_names: changed },
      });
    }
  }

  // Best effort, like the host's bus
  private async notify(event: ListingChangedEvent): Promise<void> {
    for (const listener of this.listeners) {
      try {
        await listener(event);
      } catch (error) {
        this.options.logger?.warn(
          `Listing change notification failed on ${event.channel}:`,
          describeError(error)
        );
      }
    }
  }
}
