import * as cheerio from 'cheerio';
import type { Env } from '../env.js';
import { airtableConfigFromEnv, createAirtableStore, type AirtableRecord, type RecordStore } from '../providers/airtable.js';
import { fetchListingHtml } from '../providers/listingPage.js';
import { createGoogleTranslator, type Translator } from '../providers/translate.js';
import { assembleListingRecord } from '../scraper/assemble.js';
import {
  extractAddress,
  extractDepositAndKeyMoney,
  extractImages,
  extractLayoutAndSize,
  extractName,
  extractPropertyCategory,
  extractRentAndFee,
  extractStations,
  splitAddress
} from '../scraper/extract.js';
import { parseAmount, priceRangeLabel, propertyKindFromUrl } from '../scraper/normalize.js';
import {
  resolveAreaId,
  resolveLayoutId,
  resolvePriceRangeId,
  resolvePropertyCategoryId,
  resolvePropertyKindId,
  resolveStationId,
  type ResolverContext
} from '../scraper/resolve.js';
import type { Listing, ListingRecordFields, ReferenceTables } from '../types.js';

export interface ListingDeps extends ResolverContext {
  listingsTableId: string;
  fetchHtml: (url: string) => Promise<string>;
}

export interface ScrapeResult {
  listing: Listing;
  record: ListingRecordFields;
}

export function referenceTablesFromEnv(env: Env): ReferenceTables {
  return {
    stations: env.STATIONS_TABLE_ID,
    layouts: env.LAYOUTS_TABLE_ID,
    propertyCategories: env.PROP_TYPES_TABLE_ID,
    areas: env.AREAS_TABLE_ID,
    priceRanges: env.PRICE_RANGE_TABLE_ID,
    propertyKinds: env.PROPERTY_KIND_TABLE_ID
  };
}

export function createListingDeps(env: Env): ListingDeps {
  const store: RecordStore = createAirtableStore(airtableConfigFromEnv(env));
  const translate: Translator = createGoogleTranslator({ apiBaseUrl: env.TRANSLATE_API_BASE_URL });

  return {
    store,
    translate,
    tables: referenceTablesFromEnv(env),
    listingsTableId: env.TABLE_ID,
    fetchHtml: fetchListingHtml
  };
}

/**
 * Fetches one listing page and turns it into the main-table row. Station and
 * area records may be created in Airtable along the way; nothing else is written.
 */
export async function scrapeListing(url: string, deps: ListingDeps): Promise<ScrapeResult> {
  const html = await deps.fetchHtml(url);
  const $ = cheerio.load(html);

  const name = await extractName($, deps.translate);
  const { rent, managementFee } = extractRentAndFee($);

  const { layout, size } = extractLayoutAndSize($);
  const layoutId = await resolveLayoutId(deps, layout);

  const { ward, street } = await splitAddress(extractAddress($) ?? '', deps.translate);
  const areaId = await resolveAreaId(deps, ward);

  const { deposit, keyMoney } = extractDepositAndKeyMoney($);
  const images = extractImages($);

  const stations = await extractStations($, deps.translate);
  const stationIds: [string | null, string | null] = [null, null];
  for (const [index, access] of stations.entries()) {
    stationIds[index] = await resolveStationId(deps, access.station);
  }

  const category = extractPropertyCategory($);
  const categoryId = await resolvePropertyCategoryId(deps, category);

  const kind = propertyKindFromUrl(url);
  const kindId = await resolvePropertyKindId(deps, kind);

  const priceRange = priceRangeLabel(parseAmount(rent));
  const priceRangeId = await resolvePriceRangeId(deps, priceRange);

  const listing: Listing = {
    name,
    rent,
    managementFee,
    layout,
    size,
    ward,
    street,
    deposit,
    keyMoney,
    stations,
    coverImage: images.cover,
    planImage: images.plan,
    gallery: images.gallery,
    category,
    kind,
    priceRange
  };

  console.log('[scrape] parsed listing', { url, name, stations: stations.length, kind });

  return {
    listing,
    record: assembleListingRecord(listing, { layoutId, areaId, stationIds, categoryId, kindId, priceRangeId })
  };
}

export async function uploadListing(
  record: ListingRecordFields,
  deps: Pick<ListingDeps, 'store' | 'listingsTableId'>
): Promise<AirtableRecord> {
  return deps.store.create(deps.listingsTableId, { ...record });
}
