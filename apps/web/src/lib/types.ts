export interface ImageAttachment {
  url: string;
}

// Mirrors the main Airtable collection's field names.
export interface ListingRecord {
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

export type UploadOutcome = { ok: true; recordId: string } | { ok: false; message: string };

export interface ScrapeRequest {
  url: string;
  upload: boolean;
}

export interface ScrapeResponse {
  record: ListingRecord;
  upload: UploadOutcome | null;
}
