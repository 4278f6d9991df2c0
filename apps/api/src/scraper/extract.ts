import type { CheerioAPI } from 'cheerio';
import { translateText, type Translator } from '../providers/translate.js';
import type { ImageAttachment, PropertyCategory, StationAccess } from '../types.js';
import { STATION_ALIASES, lookupAlias } from './aliases.js';
import {
  asciiDigits,
  normalizeSpaces,
  normalizeStationEn,
  parseMinutes,
  parsePrice,
  propertyCategoryFromLabel,
  roundHalfEven
} from './normalize.js';

const MAX_STATIONS = 2;

/**
 * Finds the value cell of a table row by its header label. The header only has
 * to contain the label, so "間取り" also matches "間取り詳細" if it comes first.
 */
function findLabelledCell($: CheerioAPI, label: string) {
  const th = $('th')
    .filter((_, el) => $(el).text().includes(label))
    .first();
  if (th.length === 0) return null;

  const td = th.nextAll('td').first();
  return td.length > 0 ? td : null;
}

function labelledText($: CheerioAPI, label: string): string | null {
  const td = findLabelledCell($, label);
  return td ? td.text().trim() : null;
}

export async function extractName($: CheerioAPI, translate: Translator): Promise<string> {
  const ja = $('h1.section_h1-header-title').first().text().trim();
  return ja ? translateText(translate, ja) : 'N/A';
}

export function extractRentAndFee($: CheerioAPI): { rent: string; managementFee: string } {
  const rentTag = $('span.property_view_note-emphasis').first();
  const rent = rentTag.length > 0 ? parsePrice(rentTag.text().trim()) : '0';

  let managementFee = '0';
  const spans = $('div.property_view_note-info > div.property_view_note-list > span').toArray();
  for (const span of spans) {
    const text = $(span).text();
    if (text.includes('管理費') || text.includes('共益費')) {
      managementFee = parsePrice(text.trim());
      break;
    }
  }

  return { rent, managementFee };
}

export function extractDepositAndKeyMoney($: CheerioAPI): { deposit: string; keyMoney: string } {
  let deposit = '0';
  let keyMoney = '0';

  $('div.property_view_note-list span').each((_, span) => {
    const text = $(span).text().trim();
    if (text.includes('敷金')) {
      deposit = parsePrice(text);
    } else if (text.includes('礼金')) {
      keyMoney = parsePrice(text);
    }
  });

  return { deposit, keyMoney };
}

export function extractLayoutAndSize($: CheerioAPI): { layout: string; size: string } {
  const layout = labelledText($, '間取り') || 'N/A';

  let size = 'N/A';
  const rawSize = labelledText($, '専有面積');
  if (rawSize) {
    // Every non-digit goes, so the "2" of "m2" stays: "40.5m2" -> 40.52 -> 41
    const num = parseFloat(asciiDigits(rawSize).replace(/[^\d.]/g, ''));
    if (Number.isFinite(num)) size = String(roundHalfEven(num));
  }

  return { layout, size };
}

export function extractPropertyCategory($: CheerioAPI): PropertyCategory | null {
  return propertyCategoryFromLabel(labelledText($, '建物種別'));
}

export function extractAddress($: CheerioAPI): string | null {
  for (const tr of $('table.property_view_table tr').toArray()) {
    const th = $(tr).find('th').first();
    if (th.length > 0 && th.text().trim().includes('所在地')) {
      return $(tr).find('td').first().text().trim();
    }
  }
  return null;
}

/**
 * "東京都世田谷区玉堤２" -> ward "世田谷", street = translation of "玉堤２".
 * Without a 区 the whole address is kept, untranslated, as the street.
 */
export async function splitAddress(
  address: string,
  translate: Translator
): Promise<{ ward: string | null; street: string | null }> {
  if (!address) return { ward: null, street: null };

  const withoutPrefecture = address.replace('東京都', '');
  const m = /^(.+?)区(.*)$/.exec(withoutPrefecture);
  if (!m) return { ward: null, street: address };

  const ward = m[1].trim();
  const rest = m[2].trim();
  const street = normalizeSpaces(await translateText(translate, rest));
  return { ward, street };
}

export async function canonicalStationName(stationJa: string, translate: Translator): Promise<string> {
  const alias = lookupAlias(STATION_ALIASES, stationJa);
  if (alias) return alias;
  return normalizeStationEn(await translateText(translate, stationJa));
}

export async function extractStations($: CheerioAPI, translate: Translator): Promise<StationAccess[]> {
  const items: StationAccess[] = [];
  const td = findLabelledCell($, '駅徒歩');
  if (!td) return items;

  for (const div of td.find('div.property_view_table-read').toArray()) {
    const raw = $(div).text().trim();
    if (!raw) continue;

    // "東急田園都市線/駒沢大学駅 歩7分" -> "駒沢大学駅 歩7分"
    const segment = normalizeSpaces(raw.split('/').pop());
    const walkMinutes = parseMinutes(segment);
    const stationJa = segment
      .replace(/(?:歩|徒歩)\s*\d+\s*分.*/, '')
      .replaceAll('駅', '')
      .trim();
    if (!stationJa) continue;

    items.push({ station: await canonicalStationName(stationJa, translate), walkMinutes });
    if (items.length >= MAX_STATIONS) break;
  }

  return items;
}

export function extractImages($: CheerioAPI): {
  cover: ImageAttachment | null;
  plan: ImageAttachment | null;
  gallery: ImageAttachment[];
} {
  const images: ImageAttachment[] = [];
  $('ul#js-view_gallery-list img').each((_, img) => {
    const src = $(img).attr('data-src') || $(img).attr('src');
    if (src && /^https?:\/\//i.test(src)) {
      images.push({ url: src });
    }
  });

  return {
    cover: images[0] ?? null,
    plan: images[1] ?? null,
    gallery: images.slice(2)
  };
}
