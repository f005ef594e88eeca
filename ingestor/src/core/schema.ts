import { z } from "zod";
import { LISTING_TYPES, ScrapeRequest } from "./dto";

// Provider ids arrive as strings or numbers
const text = z
  .union([z.string(), z.number()])
  .transform((value) => String(value))
  .nullish();

const num = z.coerce.number().nullish();

const FALSE_WORDS = new Set(["", "false", "0", "no", "off"]);

// Providers send flags as booleans, 0/1 or "true"/"false"
const flag = z.preprocess((value) => {
  if (value === null || value === undefined || typeof value === "boolean") return value;
  if (typeof value === "string") return !FALSE_WORDS.has(value.trim().toLowerCase());
  return Boolean(value);
}, z.boolean().nullish());
const when = z.union([z.string(), z.date()]).nullish();

const addressSchema = z
  .object({
    street: text,
    unit: text,
    city: text,
    state: text,
    zip: text,
    formatted_address: text,
  })
  .passthrough();

const descriptionSchema = z
  .object({
    style: text,
    text: text,
    name: text,
    beds: num,
    baths_full: num,
    baths_half: num,
    sqft: num,
    lot_sqft: num,
    year_built: num,
    stories: num,
    garage: num,
    alt_photos: z.unknown(),
  })
  .passthrough();

const phoneSchema = z.object({ number: text }).passthrough().nullable();

const advertiserSchema = z
  .object({
    name: text,
    email: text,
    uuid: text,
    state_license: text,
    phones: z.array(phoneSchema).nullish(),
  })
  .passthrough();

const taxRecordSchema = z
  .object({
    apn: text,
    cl_id: text,
    last_update_date: when,
    public_record_id: text,
    tax_parcel_id: text,
  })
  .passthrough();

const flagsSchema = z
  .object({
    is_coming_soon: flag,
    is_contingent: flag,
    is_foreclosure: flag,
    is_new_construction: flag,
    is_new_listing: flag,
    is_pending: flag,
    is_price_reduced: flag,
  })
  .passthrough();

// Sub-collection items are validated one by one when the listing is mapped,
// so a bad item costs that item only

export const taxYearSchema = z
  .object({
    year: num,
    tax: num,
    assessed_year: num,
    value: num,
    assessment: z
      .object({ total: num, building: num, land: num })
      .passthrough()
      .nullish(),
    appraisal: num,
    market: num,
  })
  .passthrough();

export const estimateSchema = z
  .object({
    date: when,
    estimate: num,
    estimate_high: num,
    estimate_low: num,
    is_best_home_value: flag,
    source: z.object({ name: text, type: text }).passthrough().nullish(),
  })
  .passthrough();

export const popularitySchema = z
  .object({
    last_n_days: num,
    views_total: num,
    clicks_total: num,
    saves_total: num,
    shares_total: num,
    leads_total: num,
    dwell_time_mean: num,
    dwell_time_median: num,
  })
  .passthrough();

export const featureGroupSchema = z
  .object({
    category: text,
    parent_category: text,
    text: z
      .unknown()
      .transform((value) =>
        Array.isArray(value)
          ? value.filter((entry): entry is string => typeof entry === "string")
          : undefined
      ),
  })
  .passthrough();

/**
 * One listing as returned by the scraping provider. Every field is optional
 * and nullable; unknown fields are kept.
 */
export const rawListingSchema = z
  .object({
    property_id: text,
    mls: text,
    mls_id: text,
    mls_status: text,
    status: text,
    property_url: text,

    address: addressSchema.nullish(),
    county: text,
    neighborhoods: z.unknown(),
    latitude: num,
    longitude: num,
    fips_code: text,
    parcel_number: text,

    list_price: num,
    list_price_min: num,
    list_price_max: num,
    sold_price: num,
    last_sold_price: num,
    estimated_monthly_rental: num,
    hoa_fee: num,

    description: descriptionSchema.nullish(),
    parking: z.unknown(),

    list_date: when,
    pending_date: when,
    last_sold_date: when,
    days_on_mls: num,

    advertisers: z
      .object({
        agent: advertiserSchema.nullish(),
        broker: advertiserSchema.nullish(),
        office: advertiserSchema.nullish(),
      })
      .passthrough()
      .nullish(),

    tax_record: taxRecordSchema.nullish(),
    flags: flagsSchema.nullish(),

    terms: text,
    pet_policy: z.unknown(),
    open_houses: z.unknown(),
    units: z.unknown(),
    current_estimates: z.unknown(),

    // Sub-collections: shape checked per item by the mapper
    photos: z.unknown(),
    alt_photos: z.unknown(),
    tax_history: z.unknown(),
    estimates: z.unknown(),
    popularity: z.unknown(),
    details: z.unknown(),
    tags: z.unknown(),
    nearby_schools: z.unknown(),
  })
  .passthrough();

export type RawListing = z.infer<typeof rawListingSchema>;
export type RawAddress = z.infer<typeof addressSchema>;
export type RawDescription = z.infer<typeof descriptionSchema>;
export type RawAdvertiser = z.infer<typeof advertiserSchema>;
export type RawTaxRecord = z.infer<typeof taxRecordSchema>;
export type RawFlags = z.infer<typeof flagsSchema>;

export class RawRecordError extends Error {
  constructor(
    message: string,
    readonly issues: string[]
  ) {
    super(message);
    this.name = "RawRecordError";
  }
}

export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(
    (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
  );
}

export function parseRawListing(value: unknown): RawListing {
  const result = rawListingSchema.safeParse(value);
  if (!result.success) {
    const issues = describeIssues(result.error);
    throw new RawRecordError(`Invalid listing record: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

// ===== Inbound queue message =====

export const scrapeMessageSchema = z
  .object({
    location: z.string().trim().min(1),
    listing_type: z.enum(LISTING_TYPES).default("for_sale"),
    record_id: z
      .union([
        z.number().int().nonnegative(),
        z.string().trim().regex(/^\d+$/, "Expected a record id").transform(Number),
      ])
      .nullish(),
    // Anything else is the provider's to judge
    limit: z.preprocess(
      (value) => (typeof value === "string" && /^\d+$/.test(value.trim()) ? Number(value) : value),
      z.unknown()
    ),
    source_url: z.string().nullish(),
  })
  .passthrough();

export class InvalidMessageError extends Error {
  constructor(
    message: string,
    readonly issues: string[]
  ) {
    super(message);
    this.name = "InvalidMessageError";
  }
}

const NON_PROVIDER_KEYS = new Set(["location", "listing_type", "record_id", "source_url"]);

/**
 * Validate a decoded message body and split it into the request fields and
 * the parameters forwarded to the provider.
 */
export function parseScrapeMessage(body: unknown): ScrapeRequest {
  const result = scrapeMessageSchema.safeParse(body);
  if (!result.success) {
    const issues = describeIssues(result.error);
    throw new InvalidMessageError(`Invalid scrape request: ${issues.join("; ")}`, issues);
  }

  const message = result.data;
  const params: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(message)) {
    if (!NON_PROVIDER_KEYS.has(key) && value !== undefined && value !== null) {
      params[key] = value;
    }
  }

  // record_id 0 means "no target"
  const recordId = message.record_id ? message.record_id : undefined;
  if (recordId !== undefined) {
    params.limit = 1;
  }

  return {
    location: message.location,
    listingType: message.listing_type,
    recordId,
    sourceUrl: message.source_url ?? undefined,
    params,
  };
}
