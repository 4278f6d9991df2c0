export const CREDENTIAL_KEYS = ['AIRTABLE_API_KEY', 'BASE_ID', 'TABLE_ID'] as const;

export const LINKED_TABLE_KEYS = [
  'STATIONS_TABLE_ID',
  'LAYOUTS_TABLE_ID',
  'PROP_TYPES_TABLE_ID',
  'AREAS_TABLE_ID',
  'PRICE_RANGE_TABLE_ID',
  'PROPERTY_KIND_TABLE_ID'
] as const;

export type EnvFileKey = (typeof CREDENTIAL_KEYS)[number] | (typeof LINKED_TABLE_KEYS)[number];

export type EnvFileValues = Record<EnvFileKey, string>;

// Credentials block, blank line, linked tables block.
export function renderEnvFile(values: EnvFileValues): string {
  const line = (key: EnvFileKey) => `${key}=${values[key].trim()}`;
  return [...CREDENTIAL_KEYS.map(line), '', ...LINKED_TABLE_KEYS.map(line), ''].join('\n');
}
