import { afterEach, describe, expect, it, vi } from 'vitest';
import { getEnv, missingTableIds } from '../src/env.js';

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('getEnv', () => {
  it('applies defaults around the required key', () => {
    vi.stubEnv('AIRTABLE_API_KEY', 'test-airtable-key');
    vi.stubEnv('PORT', '5050');

    const env = getEnv();

    expect(env.PORT).toBe(5050);
    expect(env.AIRTABLE_API_BASE_URL).toBe('https://api.airtable.com');
    expect(env.TRANSLATE_API_BASE_URL).toBe('https://translate.googleapis.com');
  });

  it('throws when the Airtable key is missing', () => {
    vi.stubEnv('AIRTABLE_API_KEY', '');
    expect(() => getEnv()).toThrow(/Invalid environment variables/);
  });
});

describe('missingTableIds', () => {
  it('lists blank base and table ids in declaration order', () => {
    vi.stubEnv('AIRTABLE_API_KEY', 'test-airtable-key');
    vi.stubEnv('BASE_ID', 'appTest');
    vi.stubEnv('TABLE_ID', 'tblListings');
    vi.stubEnv('STATIONS_TABLE_ID', 'tblStations');
    vi.stubEnv('LAYOUTS_TABLE_ID', 'tblLayouts');
    vi.stubEnv('PROP_TYPES_TABLE_ID', ' ');
    vi.stubEnv('AREAS_TABLE_ID', 'tblAreas');
    vi.stubEnv('PRICE_RANGE_TABLE_ID', 'tblPriceRanges');
    vi.stubEnv('PROPERTY_KIND_TABLE_ID', '');

    expect(missingTableIds(getEnv())).toEqual(['PROP_TYPES_TABLE_ID', 'PROPERTY_KIND_TABLE_ID']);
  });
});
