import { describe, expect, it } from "vitest";
import {
  InvalidMessageError,
  parseRawListing,
  parseScrapeMessage,
  RawRecordError,
} from "../src/core/schema";

describe("parseScrapeMessage", () => {
  it("reads location and listing type, forwarding the rest to the provider", () => {
    const request = parseScrapeMessage({
      location: "  Springfield, IL ",
      listing_type: "for_rent",
      limit: "5",
      radius: 2,
      source_url: "https://listings.example.com/search",
    });

    expect(request).toEqual({
      location: "Springfield, IL",
      listingType: "for_rent",
      recordId: undefined,
      sourceUrl: "https://listings.example.com/search",
      params: { limit: 5, radius: 2 },
    });
  });

  it("defaults the listing type to for_sale", () => {
    expect(parseScrapeMessage({ location: "Portland" }).listingType).toBe("for_sale");
  });

  it("limits a direct update to one record", () => {
    const request = parseScrapeMessage({ location: "Springfield", record_id: "42", limit: 20 });

    expect(request.recordId).toBe(42);
    expect(request.params).toEqual({ limit: 1 });
  });

  it("treats record_id 0 as no target", () => {
    const request = parseScrapeMessage({ location: "Springfield", record_id: 0 });

    expect(request.recordId).toBeUndefined();
    expect(request.params).toEqual({});
  });

  it("rejects record ids that are not whole numbers", () => {
    expect(() => parseScrapeMessage({ location: "Springfield", record_id: true })).toThrow(
      InvalidMessageError
    );
    expect(() => parseScrapeMessage({ location: "Springfield", record_id: [5] })).toThrow(
      InvalidMessageError
    );
    expect(() => parseScrapeMessage({ location: "Springfield", record_id: "4x" })).toThrow(
      InvalidMessageError
    );
    expect(() => parseScrapeMessage({ location: "Springfield", record_id: 1.5 })).toThrow(
      InvalidMessageError
    );
  });

  it("forwards a limit the provider may refuse", () => {
    expect(parseScrapeMessage({ location: "Springfield", limit: 0 }).params).toEqual({ limit: 0 });
    expect(parseScrapeMessage({ location: "Springfield", limit: "ten" }).params).toEqual({
      limit: "ten",
    });
  });

  it("drops null parameters", () => {
    const request = parseScrapeMessage({ location: "Springfield", limit: null, past_days: null });
    expect(request.params).toEqual({});
  });

  it("rejects messages without a location", () => {
    expect(() => parseScrapeMessage({ listing_type: "for_sale" })).toThrow(InvalidMessageError);
    expect(() => parseScrapeMessage({ location: "   " })).toThrow(InvalidMessageError);
  });

  it("rejects unknown listing types", () => {
    expect(() => parseScrapeMessage({ location: "Springfield", listing_type: "auction" })).toThrow(
      InvalidMessageError
    );
  });

  it("rejects bodies that are not objects", () => {
    expect(() => parseScrapeMessage(["Springfield"])).toThrow(InvalidMessageError);
    expect(() => parseScrapeMessage(null)).toThrow(InvalidMessageError);
  });
});

describe("parseRawListing", () => {
  it("accepts sparse records and keeps unknown fields", () => {
    const raw = parseRawListing({ mls: 1234, virtual_tour: "https://tour/1" });

    expect(raw.mls).toBe("1234");
    expect(raw.virtual_tour).toBe("https://tour/1");
  });

  it("accepts flags written as strings or numbers", () => {
    const raw = parseRawListing({
      flags: { is_pending: "true", is_contingent: "False", is_new_listing: 1, is_foreclosure: 0 },
    });

    expect(raw.flags).toMatchObject({
      is_pending: true,
      is_contingent: false,
      is_new_listing: true,
      is_foreclosure: false,
    });
  });

  it("leaves sub-collections for the mapper to check", () => {
    const raw = parseRawListing({ tax_history: [null], tags: [7], estimates: [] });

    expect(raw.tax_history).toEqual([null]);
    expect(raw.tags).toEqual([7]);
    expect(raw.estimates).toEqual([]);
  });

  it("rejects records with unusable values", () => {
    expect(() => parseRawListing({ list_price: "call for price" })).toThrow(RawRecordError);
    expect(() => parseRawListing("9001001")).toThrow(RawRecordError);
  });

  it("names the offending fields", () => {
    try {
      parseRawListing({ address: { city: ["Springfield"] } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(RawRecordError);
      expect(error instanceof RawRecordError && error.issues[0]).toMatch(/^address\.city: /);
    }
  });
});
