import type { PropertyCategory, PropertyKind } from '../types.js';

const amountFormat = new Intl.NumberFormat('en-US');

export function normalizeSpaces(value: string | null | undefined): string {
  return (value ?? '').replace(/\s+/g, ' ').trim();
}

// "１２" -> "12"; other characters, ㎡ included, are left alone.
export function asciiDigits(value: string): string {
  return value.replace(/[０-９]/g, (d) => String.fromCharCode(d.charCodeAt(0) - 0xfee0));
}

/** Upper-cases the first letter of every letter run, lower-cases the rest. */
export function titleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1));
}

/**
 * Converts a price fragment to a formatted yen amount.
 *
 * - "16.4万円" -> "164,000"
 * - "10000円" -> "10,000"
 * - "" or "-" -> "0"
 */
export function parsePrice(text: string | null | undefined): string {
  if (!text) return '0';
  const t = asciiDigits(text).replace(/,/g, '');

  if (t.includes('万')) {
    const m = /[\d.]+/.exec(t);
    if (!m) return '0';
    const value = Math.trunc(parseFloat(m[0]) * 10000);
    return Number.isFinite(value) ? amountFormat.format(value) : '0';
  }

  const m = /\d+/.exec(t);
  return m ? amountFormat.format(parseInt(m[0], 10)) : '0';
}

/** Inverse of the formatting in parsePrice; anything unparseable is 0. */
export function parseAmount(formatted: string): number {
  const n = parseInt(formatted.replace(/,/g, ''), 10);
  return Number.isFinite(n) ? n : 0;
}

// 22.5 -> 22, 23.5 -> 24
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

// 歩3分 / 徒歩12分
export function parseMinutes(fragment: string): number | null {
  const m = /(?:歩|徒歩)\s*(\d+)\s*分/.exec(asciiDigits(fragment));
  return m ? parseInt(m[1], 10) : null;
}

/**
 * Monthly rent bucket, in 100K bands.
 * 360000 -> "¥300~399K"; non-positive amounts fall into the lowest band.
 */
export function priceRangeLabel(amount: number): string {
  if (amount <= 0) return '¥100~199K';

  const k = Math.floor(amount / 1000);
  if (k < 200) return '¥100~199K';
  if (k >= 1000) return '¥1M~';

  const band = Math.floor(k / 100) * 100;
  return `¥${band}~${band + 99}K`;
}

/** "minami shinjuku station" -> "Minami-Shinjuku" */
export function normalizeStationEn(nameEn: string): string {
  const base = titleCase(normalizeSpaces(nameEn)).replaceAll(' Station', '');
  return base.replaceAll(' ', '-');
}

const CATEGORY_BY_LABEL: Record<string, PropertyCategory> = {
  マンション: 'Apartment',
  一戸建て: 'Detached house'
};

export function propertyCategoryFromLabel(label: string | null | undefined): PropertyCategory | null {
  const key = (label ?? '').trim();
  return Object.hasOwn(CATEGORY_BY_LABEL, key) ? CATEGORY_BY_LABEL[key] : null;
}

// chintai -> rent; ms/chuko and ms/shinchiku -> sale
export function propertyKindFromUrl(url: string): PropertyKind | null {
  if (url.includes('chintai')) return 'For Rent';
  if (url.includes('/ms/chuko/') || url.includes('/ms/shinchiku/')) return 'For Buy';
  return null;
}
