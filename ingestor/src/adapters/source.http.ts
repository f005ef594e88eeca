import { Logger } from "@listing-sync/shared-utils";
import { SourceConfig } from "../config/env";
import { ListingType } from "../core/dto";
import { ProviderError, SourcePort } from "../core/ports";
import { isRecord } from "../core/values";
import { HttpResult, HttpTimeoutError, postJson } from "./http";

/**
 * The scraping service answers with a bare list or wraps it under
 * `properties` or `result`
 */
export function extractListings(body: unknown): unknown[] {
  if (Array.isArray(body)) return body;
  if (isRecord(body)) {
    if (Array.isArray(body.properties)) return body.properties;
    if (Array.isArray(body.result)) return body.result;
  }
  throw new ProviderError("Unexpected response shape from scraping service");
}

export class HttpScrapeSource implements SourcePort {
  constructor(
    private config: SourceConfig & { url: string },
    private logger: Logger
  ) {}

  async fetch(
    location: string,
    listingType: ListingType,
    params: Record<string, unknown>
  ): Promise<unknown[]> {
    this.logger.debug(`Scrape params: ${JSON.stringify(params)}`);

    let response: HttpResult;
    try {
      response = await postJson(
        this.config.url,
        { ...params, location, listing_type: listingType },
        {
          headers: { "Content-Type": "application/json" },
          timeoutMs: this.config.timeoutMs,
        }
      );
    } catch (error) {
      const reason = error instanceof HttpTimeoutError ? error.message : "failed";
      throw new ProviderError(`Scraping request ${reason}`, { cause: error });
    }

    if (!response.ok) {
      throw new ProviderError(`HTTP ${response.status}: ${response.statusText}`);
    }

    let body: unknown;
    try {
      body = JSON.parse(response.body);
    } catch (error) {
      throw new ProviderError("Scraping service returned invalid JSON", { cause: error });
    }

    const listings = extractListings(body);
    this.logger.info(`Successfully scraped ${listings.length} listings`);
    return listings;
  }
}
