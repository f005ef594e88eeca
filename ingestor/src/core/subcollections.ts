import { describeError, Logger } from "@listing-sync/shared-utils";
import { toCalendarDate } from "./dates";
import {
  ENTITIES,
  EntityName,
  EstimateItem,
  FeatureGroupItem,
  ListingPayloads,
  PhotoItem,
  PopularityItem,
  replaceLinks,
  StoreRow,
  StoreValue,
  StoreValues,
  SubcollectionName,
  SubcollectionReport,
  TaxYearItem,
  UpsertCounts,
} from "./dto";
import { toDisplayName } from "./normalize";
import { StoreClient } from "./store";

export interface SyncContext {
  store: StoreClient;
  logger: Logger;
}

/**
 * How one child collection of a listing is keyed and written
 */
export interface ChildCollection<T> {
  name: SubcollectionName;
  entity: EntityName;
  /** Fields read back from existing rows to rebuild their keys */
  keyFields: string[];
  rowKey(row: StoreRow): string | undefined;
  itemKey(item: T, index: number): string | undefined;
  /** Warning for an item without a key; items are skipped silently when absent */
  missingKeyMessage?(item: T, index: number): string;
  toValues(item: T, index: number): StoreValues;
  /** Defaults to true; when false rows already stored are left alone */
  updateExisting?: boolean;
  afterCreate?(ctx: SyncContext, id: number, item: T): Promise<void>;
}

// Empty text fields come back from the store as false
function text(value: StoreValue | undefined): string {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return "";
}

function numericKey(value: StoreValue | undefined): string | undefined {
  return typeof value === "number" && value !== 0 ? String(value) : undefined;
}

/**
 * Diff incoming items against the listing's stored children by natural key,
 * updating matches and creating the rest. Keys created during the pass join
 * the lookup, so duplicates within one batch collapse into one row.
 */
export async function upsertChildren<T>(
  ctx: SyncContext,
  listingId: number,
  items: readonly T[],
  collection: ChildCollection<T>
): Promise<UpsertCounts> {
  const { store, logger } = ctx;
  const counts: UpsertCounts = { created: 0, updated: 0, skipped: 0 };

  const rows = await store.searchRead(
    collection.entity,
    [["property_id", "=", listingId]],
    ["id", ...collection.keyFields]
  );

  const existing = new Map<string, number>();
  for (const row of rows) {
    const key = collection.rowKey(row);
    if (key !== undefined && typeof row.id === "number") {
      existing.set(key, row.id);
    }
  }

  for (const [index, item] of items.entries()) {
    const key = collection.itemKey(item, index);
    if (key === undefined) {
      counts.skipped++;
      if (collection.missingKeyMessage) {
        logger.warn(collection.missingKeyMessage(item, index));
      }
      continue;
    }

    const values = collection.toValues(item, index);
    const id = existing.get(key);

    if (id !== undefined) {
      if (collection.updateExisting === false) {
        counts.skipped++;
        continue;
      }
      await store.write(collection.entity, [id], values);
      counts.updated++;
      continue;
    }

    const newId = await store.create(collection.entity, {
      property_id: listingId,
      ...values,
    });
    existing.set(key, newId);
    counts.created++;

    if (collection.afterCreate) {
      await collection.afterCreate(ctx, newId, item);
    }
  }

  logger.debug(
    `${collection.name} for listing ${listingId}: ${counts.created} created, ${counts.updated} updated, ${counts.skipped} skipped`
  );
  return counts;
}

// ===== Photos =====

async function linkPhotoTags(ctx: SyncContext, photoId: number, labels: string[]) {
  try {
    const tagIds: number[] = [];
    for (const label of new Set(labels)) {
      tagIds.push(
        await ctx.store.findOrCreate(ENTITIES.photoTag, "name", label, { name: label })
      );
    }
    await ctx.store.write(ENTITIES.photo, [photoId], { tag_ids: replaceLinks(tagIds) });
  } catch (error) {
    ctx.logger.error(`Error processing tags for photo ${photoId}:`, describeError(error));
  }
}

export function photoCollection(
  altPhotos: ReadonlyArray<string | null>
): ChildCollection<PhotoItem | null> {
  return {
    name: "photos",
    entity: ENTITIES.photo,
    keyFields: ["preview_href"],
    rowKey: (row) => text(row.preview_href) || undefined,
    itemKey: (photo) => photo?.href || undefined,
    missingKeyMessage: (_photo, index) => `Skipping photo at index ${index}: missing href`,
    toValues: (photo, index) => ({
      preview_href: photo?.href ?? "",
      href: altPhotos[index] ?? "",
      title: photo?.title ?? "",
      sequence: index + 1,
      is_primary: index === 0,
    }),
    updateExisting: false,
    afterCreate: async (ctx, id, photo) => {
      if (photo && photo.tags.length > 0) {
        await linkPhotoTags(ctx, id, photo.tags);
      }
    },
  };
}

// ===== Tax history =====

export const taxHistoryCollection: ChildCollection<TaxYearItem> = {
  name: "taxHistory",
  entity: ENTITIES.taxHistory,
  keyFields: ["year"],
  rowKey: (row) => numericKey(row.year),
  itemKey: (item) => (item.year ? String(item.year) : undefined),
  missingKeyMessage: (item) =>
    `Tax history record missing year, skipping: ${JSON.stringify(item)}`,
  toValues: (item) => {
    const values: StoreValues = {
      year: item.year ?? 0,
      tax: item.tax ?? 0,
      assessed_year: item.assessed_year ?? null,
      value: item.value ?? 0,
    };

    if (item.assessment) {
      values.assessment_total = item.assessment.total ?? 0;
      values.assessment_building = item.assessment.building ?? 0;
      values.assessment_land = item.assessment.land ?? 0;
    }
    if (item.appraisal !== undefined && item.appraisal !== null) {
      values.appraisal = item.appraisal;
    }
    if (item.market !== undefined && item.market !== null) {
      values.market = item.market;
    }
    return values;
  },
};

// ===== Estimates =====

function estimateDate(item: EstimateItem): string | undefined {
  if (!item.date) return undefined;
  return toCalendarDate(item.date) || undefined;
}

export const estimateCollection: ChildCollection<EstimateItem> = {
  name: "estimates",
  entity: ENTITIES.estimate,
  keyFields: ["date", "source_name", "source_type"],
  rowKey: (row) =>
    `${text(row.date)}_${text(row.source_name)}_${text(row.source_type)}`,
  itemKey: (item) => {
    const date = estimateDate(item);
    if (date === undefined) return undefined;
    return `${date}_${item.source?.name ?? ""}_${item.source?.type ?? ""}`;
  },
  missingKeyMessage: (item) =>
    `Estimate record missing date, skipping: ${JSON.stringify(item)}`,
  toValues: (item) => ({
    date: estimateDate(item) ?? "",
    estimate: item.estimate ?? 0,
    estimate_high: item.estimate_high ?? 0,
    estimate_low: item.estimate_low ?? 0,
    is_best_home_value: item.is_best_home_value ?? false,
    source_name: item.source?.name ?? "",
    source_type: item.source?.type ?? "",
  }),
};

// ===== Popularity =====

export const popularityCollection: ChildCollection<PopularityItem> = {
  name: "popularity",
  entity: ENTITIES.popularity,
  keyFields: ["last_n_days"],
  rowKey: (row) => numericKey(row.last_n_days),
  itemKey: (item) => (item.last_n_days ? String(item.last_n_days) : undefined),
  missingKeyMessage: (item) =>
    `Popularity record missing last_n_days, skipping: ${JSON.stringify(item)}`,
  toValues: (item) => ({
    last_n_days: item.last_n_days ?? 0,
    views_total: item.views_total ?? 0,
    clicks_total: item.clicks_total ?? 0,
    saves_total: item.saves_total ?? 0,
    shares_total: item.shares_total ?? 0,
    leads_total: item.leads_total ?? 0,
    dwell_time_mean: item.dwell_time_mean ?? 0,
    dwell_time_median: item.dwell_time_median ?? 0,
  }),
};

// ===== Feature groups =====

export const featureCollection: ChildCollection<FeatureGroupItem> = {
  name: "features",
  entity: ENTITIES.feature,
  keyFields: ["category", "parent_category"],
  rowKey: (row) => `${text(row.parent_category)}:${text(row.category)}`,
  itemKey: (item) =>
    item.category ? `${item.parent_category ?? ""}:${item.category}` : undefined,
  missingKeyMessage: (item) =>
    `Feature record missing category, skipping: ${JSON.stringify(item)}`,
  toValues: (item) => ({
    category: item.category ?? "",
    parent_category: item.parent_category ?? "",
    text_items: JSON.stringify(item.text ?? []),
  }),
};

// ===== Listing-level links =====

/**
 * Look up listing tags by api name, creating the missing ones
 */
export async function resolveListingTags(
  ctx: SyncContext,
  apiNames: readonly string[]
): Promise<number[]> {
  const ids: number[] = [];
  for (const apiName of new Set(apiNames)) {
    ids.push(
      await ctx.store.findOrCreate(ENTITIES.tag, "api_name", apiName, {
        name: toDisplayName(apiName),
        api_name: apiName,
        tag_type: "listing",
      })
    );
  }
  ctx.logger.debug(`Resolved ${ids.length} listing tags`);
  return ids;
}

export async function resolveSchools(
  ctx: SyncContext,
  names: readonly string[]
): Promise<number[]> {
  const ids: number[] = [];
  for (const name of new Set(names)) {
    ids.push(await ctx.store.findOrCreate(ENTITIES.school, "name", name, { name }));
  }
  return ids;
}

/**
 * Run every child upsert for a listing. A failure in one collection is
 * logged and reported without stopping the others.
 */
export async function syncSubcollections(
  ctx: SyncContext,
  listingId: number,
  payloads: ListingPayloads
): Promise<SubcollectionReport> {
  const report: SubcollectionReport = {};

  const run = async <T>(items: readonly T[], collection: ChildCollection<T>) => {
    if (items.length === 0) return;
    try {
      report[collection.name] = await upsertChildren(ctx, listingId, items, collection);
    } catch (error) {
      const message = describeError(error);
      ctx.logger.error(
        `Error processing ${collection.name} for listing ${listingId}:`,
        message
      );
      report[collection.name] = { error: message };
    }
  };

  await run(payloads.photos, photoCollection(payloads.altPhotos));
  await run(payloads.popularity, popularityCollection);
  await run(payloads.taxHistory, taxHistoryCollection);
  await run(payloads.features, featureCollection);
  await run(payloads.estimates, estimateCollection);

  return report;
}
