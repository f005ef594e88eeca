import { CanonicalListing, ENTITIES, MatchKey } from "./dto";
import { StoreClient } from "./store";

export interface ListingMatcher {
  key: MatchKey;
  /** Returns the first listing id matching `listing`, if any */
  find(store: StoreClient, listing: CanonicalListing): Promise<number | undefined>;
}

export function matchBy(field: MatchKey): ListingMatcher {
  return {
    key: field,
    async find(store, listing) {
      const value = listing[field];
      if (!value) return undefined;

      const [id] = await store.search(ENTITIES.listing, [[field, "=", value]]);
      return id;
    },
  };
}

/**
 * Match cascade, strongest identifier first
 */
export const listingMatchers: readonly ListingMatcher[] = [
  matchBy("property_id"),
  matchBy("mls"),
  matchBy("url"),
  matchBy("address"),
];

export interface ResolvedListing {
  id: number;
  matchedBy: MatchKey | "record_id";
}

/**
 * Find the stored listing a provider record refers to. An explicit id wins;
 * otherwise the first matcher with a hit decides. Undefined means "create".
 */
export async function resolveListingId(
  store: StoreClient,
  listing: CanonicalListing,
  explicitId?: number,
  matchers: readonly ListingMatcher[] = listingMatchers
): Promise<ResolvedListing | undefined> {
  if (explicitId) {
    return { id: explicitId, matchedBy: "record_id" };
  }

  for (const matcher of matchers) {
    const id = await matcher.find(store, listing);
    if (id !== undefined) {
      return { id, matchedBy: matcher.key };
    }
  }

  return undefined;
}
