import { describe, expect, it } from "vitest";
import { ENTITIES } from "../src/core/dto";
import { mapListing } from "../src/core/normalize";
import { resolveListingId } from "../src/core/reconcile";
import { parseRawListing } from "../src/core/schema";
import { memoryContext, silentLogger } from "./helpers";

function listingFrom(raw: Record<string, unknown>) {
  return mapListing(parseRawListing(raw), silentLogger()).listing;
}

describe("resolveListingId", () => {
  it("prefers property_id over weaker identifiers", async () => {
    const { store, ctx } = memoryContext();
    store.seed(ENTITIES.listing, { mls: "M1" });
    const byPropertyId = store.seed(ENTITIES.listing, { property_id: "P2" });

    const resolved = await resolveListingId(
      ctx.store,
      listingFrom({ property_id: "P2", mls: "M1" })
    );

    expect(resolved).toEqual({ id: byPropertyId, matchedBy: "property_id" });
  });

  it("falls through the cascade in order", async () => {
    const { store, ctx } = memoryContext();
    const byMls = store.seed(ENTITIES.listing, { mls: "M1" });
    const byUrl = store.seed(ENTITIES.listing, { url: "https://listings.example.com/homes/1" });

    expect(
      await resolveListingId(ctx.store, listingFrom({ property_id: "P9", mls: "M1" }))
    ).toEqual({ id: byMls, matchedBy: "mls" });
    expect(
      await resolveListingId(
        ctx.store,
        listingFrom({ mls: "M9", property_url: "https://listings.example.com/homes/1" })
      )
    ).toEqual({ id: byUrl, matchedBy: "url" });
  });

  it("skips identifiers the record doesn't have", async () => {
    const { store, ctx } = memoryContext();
    const id = store.seed(ENTITIES.listing, { address: "1 Elm St\nSpringfield, IL 62701" });

    const resolved = await resolveListingId(
      ctx.store,
      listingFrom({ address: { street: "1 Elm St", city: "Springfield", state: "IL", zip: "62701" } })
    );

    expect(resolved).toEqual({ id, matchedBy: "address" });
    expect(store.callsTo(ENTITIES.listing, "search")).toHaveLength(1);
  });

  it("uses an explicit id without searching", async () => {
    const { store, ctx } = memoryContext();

    expect(await resolveListingId(ctx.store, listingFrom({ mls: "M1" }), 42)).toEqual({
      id: 42,
      matchedBy: "record_id",
    });
    expect(store.calls).toEqual([]);
  });

  it("returns undefined when nothing matches", async () => {
    const { store, ctx } = memoryContext();
    store.seed(ENTITIES.listing, { mls: "M1" });

    expect(
      await resolveListingId(ctx.store, listingFrom({ property_id: "P3", mls: "M3" }))
    ).toBeUndefined();
    expect(store.callsTo(ENTITIES.listing, "search")).toHaveLength(2);
  });
});
