import type { RecordStore } from '../providers/airtable.js';
import { translateText, type Translator } from '../providers/translate.js';
import type { ReferenceTables } from '../types.js';
import { AREA_ALIASES, lookupAlias } from './aliases.js';
import { titleCase } from './normalize.js';

export interface ResolverContext {
  store: RecordStore;
  tables: ReferenceTables;
  translate: Translator;
}

const STUDIO_LAYOUT_JA = 'ワンルーム';

export async function findIdByName(
  ctx: ResolverContext,
  tableId: string,
  name: string | null | undefined
): Promise<string | null> {
  if (!name) return null;
  return ctx.store.findIdByName(tableId, name);
}

/**
 * Looks the name up and creates `{ Name }` when it is missing. The lookup is
 * awaited before the create; two concurrent runs can still both create.
 */
export async function getOrCreateIdByName(
  ctx: ResolverContext,
  tableId: string,
  name: string | null | undefined
): Promise<string | null> {
  if (!name) return null;

  const existing = await findIdByName(ctx, tableId, name);
  if (existing) return existing;

  const created = await ctx.store.create(tableId, { Name: name });
  return created.id;
}

/** ワンルーム links to "Studio"; other layouts (1LDK, …) link as-is. Never creates. */
export async function resolveLayoutId(ctx: ResolverContext, layout: string | null | undefined): Promise<string | null> {
  const trimmed = (layout ?? '').trim();
  if (!trimmed) return null;
  const name = trimmed === STUDIO_LAYOUT_JA ? 'Studio' : trimmed;
  return findIdByName(ctx, ctx.tables.layouts, name);
}

/** Tries "Minami-Shinjuku", then "Minami Shinjuku", then creates the hyphenated form. */
export async function resolveStationId(ctx: ResolverContext, canonicalName: string | null | undefined): Promise<string | null> {
  if (!canonicalName) return null;

  const exact = await findIdByName(ctx, ctx.tables.stations, canonicalName);
  if (exact) return exact;

  const spaced = canonicalName.replaceAll('-', ' ');
  if (spaced !== canonicalName) {
    const alt = await findIdByName(ctx, ctx.tables.stations, spaced);
    if (alt) return alt;
  }

  return getOrCreateIdByName(ctx, ctx.tables.stations, canonicalName);
}

export async function areaNameForWard(ctx: ResolverContext, wardJa: string): Promise<string> {
  const alias = lookupAlias(AREA_ALIASES, wardJa);
  if (alias) return alias;
  return titleCase(await translateText(ctx.translate, wardJa));
}

export async function resolveAreaId(ctx: ResolverContext, wardJa: string | null | undefined): Promise<string | null> {
  if (!wardJa) return null;
  return getOrCreateIdByName(ctx, ctx.tables.areas, await areaNameForWard(ctx, wardJa));
}

export function resolvePropertyCategoryId(ctx: ResolverContext, category: string | null): Promise<string | null> {
  return findIdByName(ctx, ctx.tables.propertyCategories, category);
}

export function resolvePropertyKindId(ctx: ResolverContext, kind: string | null): Promise<string | null> {
  return findIdByName(ctx, ctx.tables.propertyKinds, kind);
}

export function resolvePriceRangeId(ctx: ResolverContext, label: string | null): Promise<string | null> {
  return findIdByName(ctx, ctx.tables.priceRanges, label);
}
