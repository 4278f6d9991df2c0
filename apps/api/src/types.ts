export type PropertyCategory = 'Apartment' | 'Detached house';

export type PropertyKind = 'For Rent' | 'For Buy';

export interface ImageAttachment {
  url: string;
}

export interface StationAccess {
  station: string; // canonical English name, e.g. "Minami-Shinjuku"
  walkMinutes: number | null;
}

export interface Listing {
  name: string;
  rent: string; // formatted, e.g. "164,000"
  managementFee: string;
  layout: string; // "N/A" when the page has no layout row
  size: string;
  ward: string | null;
  street: string | null;
  deposit: string;
  keyMoney: string;
  stations: StationAccess[];
  coverImage: ImageAttachment | null;
  planImage: ImageAttachment | null;
  gallery: ImageAttachment[];
  category: PropertyCategory | null;
  kind: PropertyKind | null;
  priceRange: string;
}

export interface ListingLinks {
  layoutId: string | null;
  areaId: string | null;
  stationIds: [string | null, string | null];
  categoryId: string | null;
  kindId: string | null;
  priceRangeId: string | null;
}

// Field names match the main Airtable collection.
export interface ListingRecordFields {
  Name: string;
  'Property Price': string;
  'Property Management Fee': string;
  'Property Layout': string[];
  'Property Size': string;
  'Property Locations': string[];
  Location: string;
  'Property Deposit': string;
  'Property Key Money': string;
  'Property Cover Image': ImageAttachment[];
  'Property Plan Image': ImageAttachment[];
  'Property Images': ImageAttachment[];
  'Access One: Train Station': string[];
  'Access One: Minutes to Walk': number | null;
  'Access Two: Train Station': string[];
  'Access Two: Minutes to Walk': number | null;
  'Property Categories': string[];
  'Property Type': string[];
  'Property Price Range': string[];
}

export interface ReferenceTables {
  stations: string;
  layouts: string;
  propertyCategories: string;
  areas: string;
  priceRanges: string;
  propertyKinds: string;
}

export type UploadOutcome = { ok: true; recordId: string } | { ok: false; message: string };
