import { ListingType, StoreRequest } from "./dto";

// External scraping provider (HTTP scraping service / fixtures)
export interface SourcePort {
  fetch(
    location: string,
    listingType: ListingType,
    params: Record<string, unknown>
  ): Promise<unknown[]>;
}

// Persistence store RPC; returns the raw response payload
export interface StoreTransport {
  call(request: StoreRequest): Promise<unknown>;
}

export class ProviderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProviderError";
  }
}

export class StoreRequestError extends Error {
  constructor(
    message: string,
    readonly request: Pick<StoreRequest, "entity" | "method">,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "StoreRequestError";
  }
}
