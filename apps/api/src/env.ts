import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGIN: z.string().optional(),

  AIRTABLE_API_BASE_URL: z.string().url().default('https://api.airtable.com'),
  AIRTABLE_API_KEY: z.string().min(1),
  BASE_ID: z.string().default(''),
  TABLE_ID: z.string().default(''),

  // Linked tables. Missing ids are not rejected here; Airtable reports them mid-run.
  STATIONS_TABLE_ID: z.string().default(''),
  LAYOUTS_TABLE_ID: z.string().default(''),
  PROP_TYPES_TABLE_ID: z.string().default(''),
  AREAS_TABLE_ID: z.string().default(''),
  PRICE_RANGE_TABLE_ID: z.string().default(''),
  PROPERTY_KIND_TABLE_ID: z.string().default(''),

  TRANSLATE_API_BASE_URL: z.string().url().default('https://translate.googleapis.com')
});

export type Env = z.infer<typeof envSchema>;

export function getEnv(): Env {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    throw new Error(`Invalid environment variables: ${parsed.error.message}`);
  }
  return parsed.data;
}

const TABLE_KEYS = [
  'BASE_ID',
  'TABLE_ID',
  'STATIONS_TABLE_ID',
  'LAYOUTS_TABLE_ID',
  'PROP_TYPES_TABLE_ID',
  'AREAS_TABLE_ID',
  'PRICE_RANGE_TABLE_ID',
  'PROPERTY_KIND_TABLE_ID'
] as const;

export function missingTableIds(env: Env): string[] {
  return TABLE_KEYS.filter((key) => env[key].trim() === '');
}
