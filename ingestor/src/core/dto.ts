export const LISTING_TYPES = ["for_sale", "for_rent", "sold", "pending"] as const;
export type ListingType = (typeof LISTING_TYPES)[number];

/**
 * A validated scrape request taken off the queue
 */
export interface ScrapeRequest {
  location: string;
  listingType: ListingType;
  /** Direct-update target; bypasses the match cascade */
  recordId?: number;
  /** Informational only, never sent to the provider */
  sourceUrl?: string;
  /** Forwarded to the provider as-is (limit included) */
  params: Record<string, unknown>;
}

export type MarketStatus = "active" | "contingent" | "off_market";

export type PropertyType =
  | "single_family"
  | "multi_family"
  | "condos"
  | "condo_townhome"
  | "townhomes"
  | "duplex_triplex"
  | "farm"
  | "land"
  | "mobile";

// ===== Store wire types =====

export type StoreScalar = string | number | boolean | null;
export type StoreValue = StoreScalar | StoreValue[] | { [key: string]: StoreValue };
export type StoreValues = Record<string, StoreValue>;
export type StoreRow = Record<string, StoreValue>;

export type DomainTerm = [field: string, operator: "=" | "!=", value: StoreScalar];
export type Domain = DomainTerm[];

export const ENTITIES = {
  listing: "real_estate.listing",
  photo: "real_estate.photo",
  photoTag: "real_estate.photo.tag",
  taxHistory: "real_estate.tax_history",
  estimate: "real_estate.estimate",
  popularity: "real_estate.popularity",
  feature: "real_estate.feature",
  tag: "real_estate.tag",
  school: "real_estate.school",
} as const;

export type EntityName = (typeof ENTITIES)[keyof typeof ENTITIES];

export type StoreMethod = "create" | "write" | "search" | "search_read";

export interface StoreRequest {
  entity: EntityName | "res.users";
  method: StoreMethod | "context_get";
  args: Record<string, StoreValue>;
}

/**
 * Many-to-many command that replaces every link with `ids`
 */
export function replaceLinks(ids: number[]): StoreValue {
  return [[6, 0, ids]];
}

// ===== Canonical listing =====

export type CanonicalListing = {
  // Identity
  property_id: string;
  mls: string;
  mls_id: string;
  mls_status_raw: string;
  url: string;

  // Address
  address: string;
  street: string;
  unit: string;
  city: string;
  state: string;
  zip_code: string;
  county: string;
  neighborhoods: string;
  latitude: number;
  longitude: number;
  fips_code: string;
  parcel_number: string;

  // Price
  price: number;
  list_price_min: number;
  list_price_max: number;
  sold_price: number;
  last_sold_price: number;
  estimated_monthly_rental: number;
  hoa_fee: number;

  // Description
  property_type: PropertyType;
  listing_description: string;
  description_title: string;
  bedrooms: number;
  baths_full: number;
  baths_half: number;
  sqft: number;
  lot_sqft: number;
  stories: number;
  garage: number;
  year_built: number;
  parking: string;

  // Status and dates
  market_status: MarketStatus;
  listing_date: string;
  pending_date: string;
  sold_date: string;
  days_on_mls: number;

  // Advertisers
  agent_name: string;
  agent_phone: string;
  agent_email: string;
  agent_uuid: string;
  agent_state_license: string;
  broker_name: string;
  broker_uuid: string;
  office_name: string;
  office_uuid: string;
  office_email: string;

  // Tax record
  tax_record_apn: string;
  tax_record_cl_id: string;
  tax_record_last_update_date: string;
  tax_record_public_record_id: string;
  tax_record_tax_parcel_id: string;

  // Flags
  is_coming_soon: boolean;
  is_contingent: boolean;
  is_foreclosure: boolean;
  is_new_construction: boolean;
  is_new_listing: boolean;
  is_pending: boolean;
  is_price_reduced: boolean;

  // Serialized blobs
  terms: string;
  pet_policy: string;
  open_houses: string;
  units: string;
  current_estimates: string;
  estimates: string;
  property_tags?: string;
};

// ===== Sub-collection payloads =====

export interface PhotoItem {
  href: string;
  title: string;
  tags: string[];
}

export interface TaxYearItem {
  year?: number | null;
  tax?: number | null;
  assessed_year?: number | null;
  value?: number | null;
  assessment?: {
    total?: number | null;
    building?: number | null;
    land?: number | null;
  } | null;
  appraisal?: number | null;
  market?: number | null;
}

export interface EstimateItem {
  date?: string | Date | null;
  estimate?: number | null;
  estimate_high?: number | null;
  estimate_low?: number | null;
  is_best_home_value?: boolean | null;
  source?: { name?: string | null; type?: string | null } | null;
}

export interface PopularityItem {
  last_n_days?: number | null;
  views_total?: number | null;
  clicks_total?: number | null;
  saves_total?: number | null;
  shares_total?: number | null;
  leads_total?: number | null;
  dwell_time_mean?: number | null;
  dwell_time_median?: number | null;
}

export interface FeatureGroupItem {
  category?: string | null;
  parent_category?: string | null;
  text?: string[] | null;
}

export interface ListingPayloads {
  /** Arrival order preserved; null marks an item with no usable URL */
  photos: Array<PhotoItem | null>;
  altPhotos: Array<string | null>;
  taxHistory: TaxYearItem[];
  estimates: EstimateItem[];
  popularity: PopularityItem[];
  features: FeatureGroupItem[];
  tags: string[];
  nearbySchools: string[];
}

export interface MappedListing {
  listing: CanonicalListing;
  /** Scrubbed store values derived from `listing` */
  values: StoreValues;
  payloads: ListingPayloads;
}

// ===== Results and events =====

export interface UpsertCounts {
  created: number;
  updated: number;
  skipped: number;
}

export type SubcollectionName =
  | "photos"
  | "taxHistory"
  | "estimates"
  | "popularity"
  | "features";

export type SubcollectionReport = Partial<
  Record<SubcollectionName, UpsertCounts | { error: string }>
>;

export interface ListingUpsertResult {
  id: number;
  action: "create" | "update";
  matchedBy?: MatchKey | "record_id";
  subcollections: SubcollectionReport;
}

export type MatchKey = "property_id" | "mls" | "url" | "address";

/**
 * Published by the host after a listing write on channel estate_property_<id>
 */
export interface ListingChangedEvent {
  channel: string;
  type: "estate_property_update";
  payload: {
    id: number;
    entity_name: EntityName;
    changed_field_names: string[];
  };
}
