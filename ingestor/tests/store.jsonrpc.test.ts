import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { JsonRpcTransport, maskSensitive } from "../src/adapters/store.jsonrpc";
import { StoreConfig } from "../src/config/env";
import { StoreRequestError } from "../src/core/ports";
import { silentLogger } from "./helpers";

const config: StoreConfig = {
  url: "http://store.test",
  database: "listings",
  apiKey: "test-secret",
  timeoutMs: 1000,
};

describe("maskSensitive", () => {
  it("masks credential-like keys at any depth", () => {
    expect(
      maskSensitive({
        name: "M1",
        api_key: "test-secret",
        nested: { Authorization: "bearer test-secret", city: "Springfield" },
        list: [{ password: "test-secret" }],
      })
    ).toEqual({
      name: "M1",
      api_key: "****",
      nested: { Authorization: "****", city: "Springfield" },
      list: [{ password: "****" }],
    });
  });
});

describe("JsonRpcTransport", () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the method arguments to the entity endpoint", async () => {
    fetchMock.mockResolvedValue(new Response("[7]", { status: 200 }));
    const transport = new JsonRpcTransport(config, silentLogger());

    const result = await transport.call({
      entity: "real_estate.listing",
      method: "search",
      args: { domain: [["mls", "=", "M1"]] },
    });

    expect(result).toEqual([7]);
    expect(fetchMock).toHaveBeenCalledWith(
      "http://store.test/json/2/real_estate.listing/search",
      expect.objectContaining({
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: "bearer test-secret",
          "X-Odoo-Database": "listings",
        },
        body: '{"domain":[["mls","=","M1"]]}',
      })
    );
  });

  it("leaves out auth headers that are not configured", async () => {
    fetchMock.mockResolvedValue(new Response("true", { status: 200 }));
    const transport = new JsonRpcTransport(
      { url: "http://store.test", timeoutMs: 1000 },
      silentLogger()
    );

    await transport.call({ entity: "real_estate.listing", method: "write", args: {} });

    expect(fetchMock.mock.calls[0][1].headers).toEqual({ "Content-Type": "application/json" });
  });

  it("returns null for an empty body", async () => {
    fetchMock.mockResolvedValue(new Response("", { status: 200 }));
    const transport = new JsonRpcTransport(config, silentLogger());

    expect(
      await transport.call({ entity: "real_estate.listing", method: "write", args: {} })
    ).toBeNull();
  });

  it("fails on HTTP errors with the status", async () => {
    fetchMock.mockResolvedValue(new Response("Access Denied", { status: 403 }));
    const transport = new JsonRpcTransport(config, silentLogger());

    await expect(
      transport.call({ entity: "real_estate.listing", method: "create", args: {} })
    ).rejects.toMatchObject({
      name: "StoreRequestError",
      status: 403,
      message: "Store real_estate.listing.create failed with HTTP 403",
    });
  });

  it("fails on invalid JSON", async () => {
    fetchMock.mockResolvedValue(new Response("<html>", { status: 200 }));
    const transport = new JsonRpcTransport(config, silentLogger());

    await expect(
      transport.call({ entity: "real_estate.listing", method: "search", args: {} })
    ).rejects.toThrow("Store real_estate.listing.search returned invalid JSON");
  });

  it("wraps network failures", async () => {
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));
    const transport = new JsonRpcTransport(config, silentLogger());

    await expect(
      transport.call({ entity: "real_estate.listing", method: "search", args: {} })
    ).rejects.toThrow("Store real_estate.listing.search request fetch failed");
  });

  it("times out when the response body stalls", async () => {
    fetchMock.mockResolvedValue(new Response(new ReadableStream({ start() {} }), { status: 200 }));
    const transport = new JsonRpcTransport({ ...config, timeoutMs: 50 }, silentLogger());

    await expect(
      transport.call({ entity: "real_estate.listing", method: "search", args: {} })
    ).rejects.toThrow("Store real_estate.listing.search request timed out after 50ms");
    expect(fetchMock.mock.calls[0][1].signal.aborted).toBe(true);
  });

  it("checks the connection with the user context", async () => {
    fetchMock.mockResolvedValue(new Response('{"uid":2}', { status: 200 }));
    const transport = new JsonRpcTransport(config, silentLogger());

    await transport.checkConnection();

    expect(fetchMock.mock.calls[0][0]).toBe("http://store.test/json/2/res.users/context_get");
  });

  it("fails the connection check on a rejected key", async () => {
    fetchMock.mockResolvedValue(new Response("", { status: 401 }));
    const transport = new JsonRpcTransport(config, silentLogger());

    await expect(transport.checkConnection()).rejects.toBeInstanceOf(StoreRequestError);
  });
});
