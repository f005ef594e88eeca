import { Logger } from "@listing-sync/shared-utils";
import { vi } from "vitest";
import { MemoryStore } from "../src/adapters/store.memory";
import { StoreClient } from "../src/core/store";
import { SyncContext } from "../src/core/subcollections";

export function silentLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

export function memoryContext(store = new MemoryStore()) {
  const logger = silentLogger();
  const ctx: SyncContext = { store: new StoreClient(store, logger), logger };
  return { store, logger, ctx };
}
