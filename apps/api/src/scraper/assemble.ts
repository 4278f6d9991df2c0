import type { Listing, ListingLinks, ListingRecordFields } from '../types.js';

function linkList(id: string | null): string[] {
  return id ? [id] : [];
}

function optionalList<T>(value: T | null): T[] {
  return value === null ? [] : [value];
}

export function assembleListingRecord(listing: Listing, links: ListingLinks): ListingRecordFields {
  const [stationOne, stationTwo] = listing.stations;

  return {
    Name: listing.name,
    'Property Price': listing.rent,
    'Property Management Fee': listing.managementFee,
    'Property Layout': linkList(links.layoutId),
    'Property Size': listing.size,
    'Property Locations': linkList(links.areaId),
    Location: listing.street ?? '',
    'Property Deposit': listing.deposit,
    'Property Key Money': listing.keyMoney,
    'Property Cover Image': optionalList(listing.coverImage),
    'Property Plan Image': optionalList(listing.planImage),
    'Property Images': listing.gallery,
    'Access One: Train Station': linkList(links.stationIds[0]),
    'Access One: Minutes to Walk': stationOne?.walkMinutes ?? null,
    'Access Two: Train Station': linkList(links.stationIds[1]),
    'Access Two: Minutes to Walk': stationTwo?.walkMinutes ?? null,
    'Property Categories': linkList(links.categoryId),
    'Property Type': linkList(links.kindId),
    'Property Price Range': linkList(links.priceRangeId)
  };
}
