import { Logger } from "@listing-sync/shared-utils";
import { z } from "zod";
import { InvalidDateError, toStoreDateTime } from "./dates";
import {
  CanonicalListing,
  ListingPayloads,
  MappedListing,
  MarketStatus,
  PhotoItem,
  PropertyType,
} from "./dto";
import {
  describeIssues,
  estimateSchema,
  featureGroupSchema,
  popularitySchema,
  RawAddress,
  RawAdvertiser,
  RawDescription,
  RawFlags,
  RawListing,
  RawTaxRecord,
  taxYearSchema,
} from "./schema";
import { CircularValueError, isBlank, isRecord, scrubValues, toStoreValue } from "./values";

const statusMap: Array<[string, MarketStatus]> = [
  ["for_sale", "active"],
  ["for_rent", "active"],
  ["pending", "contingent"],
  ["contingent", "contingent"],
  ["sold", "off_market"],
];

/**
 * Ordered: substring matching walks this list top to bottom
 */
const propertyTypeMap: Array<[string, PropertyType]> = [
  ["single_family", "single_family"],
  ["single family", "single_family"],
  ["singlefamily", "single_family"],
  ["single-family", "single_family"],
  ["multi_family", "multi_family"],
  ["multi family", "multi_family"],
  ["multifamily", "multi_family"],
  ["multi-family", "multi_family"],
  ["condo", "condos"],
  ["condos", "condos"],
  ["condominium", "condos"],
  ["condo/townhome", "condo_townhome"],
  ["condo_townhome", "condo_townhome"],
  ["condo/townhouse", "condo_townhome"],
  ["townhome", "townhomes"],
  ["townhouse", "townhomes"],
  ["townhomes", "townhomes"],
  ["townhouses", "townhomes"],
  ["duplex", "duplex_triplex"],
  ["triplex", "duplex_triplex"],
  ["duplex/triplex", "duplex_triplex"],
  ["duplex_triplex", "duplex_triplex"],
  ["farm", "farm"],
  ["ranch", "farm"],
  ["land", "land"],
  ["lot", "land"],
  ["mobile", "mobile"],
  ["mobile home", "mobile"],
  ["manufactured", "mobile"],
];

function lookup<T>(table: Array<[string, T]>, value: string): T | undefined {
  const exact = table.find(([key]) => key === value);
  if (exact) return exact[1];
  return table.find(([key]) => value.includes(key))?.[1];
}

export function mapStatus(status: string | null | undefined): MarketStatus {
  if (!status) return "off_market";
  return lookup(statusMap, status.trim().toLowerCase()) ?? "off_market";
}

export function mapPropertyType(style: string | null | undefined): PropertyType {
  if (!style) return "single_family";
  return lookup(propertyTypeMap, style.trim().toLowerCase()) ?? "single_family";
}

export interface AddressParts {
  formatted_address?: string | null;
  street?: string | null;
  unit?: string | null;
  city?: string | null;
  state?: string | null;
  zip?: string | null;
}

/**
 * The provider's formatted address, or street / unit / "city, state zip"
 * on separate lines
 */
export function formatAddress(address: AddressParts): string {
  if (address.formatted_address) return address.formatted_address;

  const lines: string[] = [];
  if (address.street) lines.push(address.street);
  if (address.unit) lines.push(address.unit);

  let cityLine = address.city ?? "";
  if (address.state) {
    cityLine += cityLine ? `, ${address.state}` : address.state;
  }
  if (address.zip) {
    cityLine += ` ${address.zip}`;
  }
  if (cityLine) lines.push(cityLine);

  return lines.join("\n");
}

/**
 * JSON text for a free-form provider block; empty blocks become ""
 */
export function serializeBlob(value: unknown, logger: Pick<Logger, "warn">): string {
  if (isBlank(value)) return "";

  try {
    return JSON.stringify(toStoreValue(value) ?? null);
  } catch (error) {
    if (!(error instanceof CircularValueError)) throw error;
    logger.warn("Serialized circular block as plain text");
    return String(value);
  }
}

function photoTagLabels(tags: unknown): string[] {
  if (!Array.isArray(tags)) return [];

  const labels: string[] = [];
  for (const tag of tags) {
    if (typeof tag === "string" && tag) {
      labels.push(tag);
    } else if (isRecord(tag) && typeof tag.label === "string" && tag.label) {
      labels.push(tag.label);
    }
  }
  return labels;
}

/**
 * Photo entries come as objects ({href|url, title, tags}), bare URLs, or
 * [href, tags] pairs. Returns null for entries without a URL.
 */
export function normalizePhotoItem(item: unknown): PhotoItem | null {
  if (typeof item === "string") {
    return item ? { href: item, title: "", tags: [] } : null;
  }

  if (Array.isArray(item)) {
    const [href, tags] = item;
    return typeof href === "string" && href
      ? { href, title: "", tags: photoTagLabels(tags) }
      : null;
  }

  if (isRecord(item)) {
    const href = item.href ?? item.url;
    if (typeof href !== "string" || !href) return null;
    return {
      href,
      title: typeof item.title === "string" ? item.title : "",
      tags: photoTagLabels(item.tags),
    };
  }

  return null;
}

/**
 * "community_gym" -> "Community Gym"
 */
export function toDisplayName(apiName: string): string {
  return apiName
    .split("_")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}

function float(value: number | null | undefined): number {
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

function int(value: number | null | undefined): number {
  return Math.trunc(float(value));
}

function str(value: string | null | undefined): string {
  return value ?? "";
}

function nonEmptyStrings(values: unknown[]): string[] {
  return values.filter((value): value is string => typeof value === "string" && value !== "");
}

/**
 * A provider collection as an array; anything else counts as empty
 */
function asList(value: unknown, label: string, logger: Pick<Logger, "warn">): unknown[] {
  if (value === null || value === undefined) return [];
  if (Array.isArray(value)) return value;
  logger.warn(`Ignoring ${label}: expected a list, got ${typeof value}`);
  return [];
}

/**
 * `block[key]` of a nested provider block such as `{current_values: [...]}`
 */
function nestedList(
  block: unknown,
  key: string,
  label: string,
  logger: Pick<Logger, "warn">
): unknown[] {
  if (block === null || block === undefined) return [];
  if (!isRecord(block)) {
    const kind = Array.isArray(block) ? "list" : typeof block;
    logger.warn(`Ignoring ${label}: expected an object, got ${kind}`);
    return [];
  }
  return asList(block[key], label, logger);
}

function parseItems<S extends z.ZodTypeAny>(
  items: unknown[],
  schema: S,
  label: string,
  logger: Pick<Logger, "warn">
): Array<z.output<S>> {
  const parsed: Array<z.output<S>> = [];
  items.forEach((item, index) => {
    const result = schema.safeParse(item);
    if (result.success) {
      parsed.push(result.data);
    } else {
      logger.warn(
        `Skipping invalid ${label} item at index ${index}: ${describeIssues(result.error).join("; ")}`
      );
    }
  });
  return parsed;
}

/**
 * Map a validated provider record to the listing's store fields and the
 * payloads of its sub-collections.
 */
export function mapListing(raw: RawListing, logger: Logger): MappedListing {
  const address: Partial<RawAddress> = raw.address ?? {};
  const description: Partial<RawDescription> = raw.description ?? {};
  const agent: Partial<RawAdvertiser> = raw.advertisers?.agent ?? {};
  const broker: Partial<RawAdvertiser> = raw.advertisers?.broker ?? {};
  const office: Partial<RawAdvertiser> = raw.advertisers?.office ?? {};
  const taxRecord: Partial<RawTaxRecord> = raw.tax_record ?? {};
  const flags: Partial<RawFlags> = raw.flags ?? {};

  const date = (value: string | Date | null | undefined): string => {
    try {
      return toStoreDateTime(value);
    } catch (error) {
      if (!(error instanceof InvalidDateError)) throw error;
      logger.warn(error.message);
      return "";
    }
  };

  const blob = (value: unknown) => serializeBlob(value, logger);

  const listing: CanonicalListing = {
    property_id: str(raw.property_id),
    mls: str(raw.mls),
    mls_id: str(raw.mls_id),
    mls_status_raw: str(raw.mls_status),
    url: str(raw.property_url),

    address: formatAddress(address),
    street: str(address.street),
    unit: str(address.unit),
    city: str(address.city),
    state: str(address.state),
    zip_code: str(address.zip),
    county: str(raw.county),
    neighborhoods: blob(raw.neighborhoods),
    latitude: float(raw.latitude),
    longitude: float(raw.longitude),
    fips_code: str(raw.fips_code),
    parcel_number: str(raw.parcel_number),

    price: float(raw.list_price),
    list_price_min: float(raw.list_price_min),
    list_price_max: float(raw.list_price_max),
    sold_price: float(raw.sold_price),
    last_sold_price: float(raw.last_sold_price),
    estimated_monthly_rental: float(raw.estimated_monthly_rental),
    hoa_fee: float(raw.hoa_fee),

    property_type: mapPropertyType(description.style),
    listing_description: str(description.text),
    description_title: str(description.name),
    bedrooms: int(description.beds),
    baths_full: int(description.baths_full),
    baths_half: int(description.baths_half),
    sqft: int(description.sqft),
    lot_sqft: int(description.lot_sqft),
    stories: float(description.stories),
    garage: int(description.garage),
    year_built: int(description.year_built),
    parking: blob(raw.parking),

    market_status: mapStatus(raw.status),
    listing_date: date(raw.list_date),
    pending_date: date(raw.pending_date),
    sold_date: date(raw.last_sold_date),
    days_on_mls: int(raw.days_on_mls),

    agent_name: str(agent.name),
    agent_phone: str(agent.phones?.[0]?.number),
    agent_email: str(agent.email),
    agent_uuid: str(agent.uuid),
    agent_state_license: str(agent.state_license),
    broker_name: str(broker.name),
    broker_uuid: str(broker.uuid),
    office_name: str(office.name),
    office_uuid: str(office.uuid),
    office_email: str(office.email),

    tax_record_apn: str(taxRecord.apn),
    tax_record_cl_id: str(taxRecord.cl_id),
    tax_record_last_update_date: date(taxRecord.last_update_date),
    tax_record_public_record_id: str(taxRecord.public_record_id),
    tax_record_tax_parcel_id: str(taxRecord.tax_parcel_id),

    is_coming_soon: flags.is_coming_soon === true,
    is_contingent: flags.is_contingent === true,
    is_foreclosure: flags.is_foreclosure === true,
    is_new_construction: flags.is_new_construction === true,
    is_new_listing: flags.is_new_listing === true,
    is_pending: flags.is_pending === true,
    is_price_reduced: flags.is_price_reduced === true,

    terms: str(raw.terms),
    pet_policy: blob(raw.pet_policy),
    open_houses: blob(raw.open_houses),
    units: blob(raw.units),
    current_estimates: blob(raw.current_estimates),
    estimates: blob(raw.estimates),
  };

  const tags = nonEmptyStrings(asList(raw.tags, "tags", logger));
  if (tags.length > 0) {
    listing.property_tags = JSON.stringify(tags);
  }

  const altPhotos = asList(description.alt_photos ?? raw.alt_photos, "alt photos", logger);

  const payloads: ListingPayloads = {
    photos: asList(raw.photos, "photos", logger).map(normalizePhotoItem),
    altPhotos: altPhotos.map((url) => (typeof url === "string" && url ? url : null)),
    taxHistory: parseItems(
      asList(raw.tax_history, "tax history", logger),
      taxYearSchema,
      "tax history",
      logger
    ),
    estimates: parseItems(
      nestedList(raw.estimates, "current_values", "estimates", logger),
      estimateSchema,
      "estimate",
      logger
    ),
    popularity: parseItems(
      nestedList(raw.popularity, "periods", "popularity", logger),
      popularitySchema,
      "popularity",
      logger
    ),
    features: parseItems(
      asList(raw.details, "details", logger),
      featureGroupSchema,
      "feature",
      logger
    ),
    tags,
    nearbySchools: nonEmptyStrings(asList(raw.nearby_schools, "nearby schools", logger)),
  };

  return { listing, values: scrubValues(listing, logger), payloads };
}
