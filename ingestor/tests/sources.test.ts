import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { extractListings, HttpScrapeSource } from "../src/adapters/source.http";
import { MockSource } from "../src/adapters/source.mock";
import { ProviderError } from "../src/core/ports";
import { silentLogger } from "./helpers";

describe("MockSource", () => {
  const source = new MockSource();

  function ids(records: unknown[]) {
    return records.map((record) =>
      typeof record === "object" && record !== null && "property_id" in record
        ? record.property_id
        : undefined
    );
  }

  it("matches the location against address parts", async () => {
    expect(ids(await source.fetch("springfield", "for_sale", {}))).toEqual(["9001001", "9001002"]);
    expect(ids(await source.fetch("Portland, ME", "for_rent", {}))).toEqual(["9002001"]);
    expect(ids(await source.fetch("62702", "for_sale", {}))).toEqual(["9001002"]);
    expect(await source.fetch("Nowhere", "for_sale", {})).toEqual([]);
  });

  it("honors the limit parameter", async () => {
    expect(ids(await source.fetch("Springfield", "for_sale", { limit: 1 }))).toEqual(["9001001"]);
  });

  it("refuses a fixtures file that is not a list", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "listing-fixtures-"));
    const file = path.join(dir, "listings.json");
    fs.writeFileSync(file, '{"properties":[]}');

    try {
      expect(() => new MockSource(file)).toThrow(ProviderError);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("extractListings", () => {
  it("accepts a bare list or a wrapped one", () => {
    expect(extractListings([{ mls: "M1" }])).toEqual([{ mls: "M1" }]);
    expect(extractListings({ properties: [{ mls: "M2" }] })).toEqual([{ mls: "M2" }]);
    expect(extractListings({ result: [] })).toEqual([]);
  });

  it("rejects anything else", () => {
    expect(() => extractListings({ error: "rate limited" })).toThrow(ProviderError);
    expect(() => extractListings("[]")).toThrow(ProviderError);
  });
});

describe("HttpScrapeSource", () => {
  const fetchMock = vi.fn();
  const config = {
    adapter: "HTTP" as const,
    url: "http://scraper.test/scrape",
    timeoutMs: 1000,
  };

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the request and returns the listings", async () => {
    fetchMock.mockResolvedValue(
      new Response('{"properties":[{"mls":"M1"},{"mls":"M2"}]}', { status: 200 })
    );
    const source = new HttpScrapeSource(config, silentLogger());

    const listings = await source.fetch("Springfield, IL", "for_sale", { limit: 2 });

    expect(listings).toEqual([{ mls: "M1" }, { mls: "M2" }]);
    expect(fetchMock).toHaveBeenCalledWith(
      "http://scraper.test/scrape",
      expect.objectContaining({
        method: "POST",
        body: '{"limit":2,"location":"Springfield, IL","listing_type":"for_sale"}',
      })
    );
  });

  it("fails on an error status", async () => {
    fetchMock.mockResolvedValue(
      new Response("upstream down", { status: 502, statusText: "Bad Gateway" })
    );
    const source = new HttpScrapeSource(config, silentLogger());

    await expect(source.fetch("Springfield", "for_sale", {})).rejects.toThrow(
      "HTTP 502: Bad Gateway"
    );
  });

  it("times out when the response body stalls", async () => {
    fetchMock.mockResolvedValue(new Response(new ReadableStream({ start() {} }), { status: 200 }));
    const source = new HttpScrapeSource({ ...config, timeoutMs: 50 }, silentLogger());

    await expect(source.fetch("Springfield", "for_sale", {})).rejects.toThrow(
      "Scraping request timed out after 50ms"
    );
  });

  it("fails on a body that is not JSON", async () => {
    fetchMock.mockResolvedValue(new Response("<html>", { status: 200 }));
    const source = new HttpScrapeSource(config, silentLogger());

    await expect(source.fetch("Springfield", "for_sale", {})).rejects.toThrow(
      "Scraping service returned invalid JSON"
    );
  });

  it("wraps network failures in ProviderError", async () => {
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));
    const source = new HttpScrapeSource(config, silentLogger());

    await expect(source.fetch("Springfield", "for_sale", {})).rejects.toBeInstanceOf(ProviderError);
  });
});
