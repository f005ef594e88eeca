import { describeError } from "@listing-sync/shared-utils";
import { ENTITIES, ListingUpsertResult, replaceLinks, StoreValues } from "./dto";
import { mapListing } from "./normalize";
import { resolveListingId } from "./reconcile";
import { parseRawListing } from "./schema";
import {
  resolveListingTags,
  resolveSchools,
  syncSubcollections,
  SyncContext,
} from "./subcollections";

async function linkField(
  ctx: SyncContext,
  label: string,
  resolve: () => Promise<number[]>
): Promise<number[]> {
  try {
    return await resolve();
  } catch (error) {
    ctx.logger.error(`Error processing ${label}:`, describeError(error));
    return [];
  }
}

/**
 * Merge one provider record into the store: map it, find the listing it
 * refers to (or create one), then bring its child collections up to date.
 *
 * Throws RawRecordError when the record doesn't validate and lets store
 * errors on the listing itself propagate.
 */
export async function upsertListing(
  record: unknown,
  ctx: SyncContext,
  recordId?: number
): Promise<ListingUpsertResult> {
  const { store, logger } = ctx;
  const { listing, values, payloads } = mapListing(parseRawListing(record), logger);
  const listingValues: StoreValues = { ...values };

  if (payloads.tags.length > 0) {
    const tagIds = await linkField(ctx, "listing tags", () =>
      resolveListingTags(ctx, payloads.tags)
    );
    if (tagIds.length > 0) {
      listingValues.listing_tag_ids = replaceLinks(tagIds);
    }
  }

  if (payloads.nearbySchools.length > 0) {
    const schoolIds = await linkField(ctx, "nearby schools", () =>
      resolveSchools(ctx, payloads.nearbySchools)
    );
    if (schoolIds.length > 0) {
      listingValues.nearby_school_ids = replaceLinks(schoolIds);
    }
  }

  const resolved = await resolveListingId(store, listing, recordId);

  let id: number;
  if (resolved) {
    logger.info(`Updating existing listing ${resolved.id} (matched by ${resolved.matchedBy})`);
    await store.write(ENTITIES.listing, [resolved.id], listingValues);
    id = resolved.id;
  } else {
    logger.info("Creating new listing");
    id = await store.create(ENTITIES.listing, listingValues);
  }

  const subcollections = await syncSubcollections(ctx, id, payloads);

  return {
    id,
    action: resolved ? "update" : "create",
    matchedBy: resolved?.matchedBy,
    subcollections,
  };
}
