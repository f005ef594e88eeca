import * as fs from "fs";
import * as path from "path";
import { ListingType } from "../core/dto";
import { ProviderError, SourcePort } from "../core/ports";
import { isRecord } from "../core/values";

export const DEFAULT_FIXTURES = path.join(__dirname, "../../fixtures/listings.json");

function matchesLocation(record: unknown, location: string): boolean {
  if (!isRecord(record) || !isRecord(record.address)) return false;

  const { formatted_address, street, city, state, zip } = record.address;
  const candidates = [formatted_address, street, city, zip, `${city}, ${state}`];
  const needle = location.trim().toLowerCase();

  return candidates.some(
    (part) => typeof part === "string" && part.toLowerCase().includes(needle)
  );
}

/**
 * Serves listings from a JSON fixtures file, matching the location against
 * each record's address parts
 */
export class MockSource implements SourcePort {
  private fixtures: unknown[];

  constructor(fixturesPath: string = DEFAULT_FIXTURES) {
    const parsed: unknown = JSON.parse(fs.readFileSync(fixturesPath, "utf-8"));
    if (!Array.isArray(parsed)) {
      throw new ProviderError(`Fixtures file must contain a list: ${fixturesPath}`);
    }
    this.fixtures = parsed;
  }

  async fetch(
    location: string,
    _listingType: ListingType,
    params: Record<string, unknown>
  ): Promise<unknown[]> {
    const matches = this.fixtures.filter((record) => matchesLocation(record, location));
    const limit = typeof params.limit === "number" ? params.limit : undefined;
    return limit !== undefined ? matches.slice(0, limit) : matches;
  }
}
