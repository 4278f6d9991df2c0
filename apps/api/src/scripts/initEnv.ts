import fs from 'node:fs/promises';
import path from 'node:path';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import {
  CREDENTIAL_KEYS,
  LINKED_TABLE_KEYS,
  renderEnvFile,
  type EnvFileKey,
  type EnvFileValues
} from './envFile.js';

const HINTS: Partial<Record<EnvFileKey, string>> = {
  BASE_ID: 'app…',
  TABLE_ID: 'tbl… main collection'
};

async function main() {
  const rl = readline.createInterface({ input, output });
  const values: Partial<EnvFileValues> = {};

  try {
    console.log('\n--- Airtable credentials ---');
    for (const key of CREDENTIAL_KEYS) {
      const hint = HINTS[key];
      values[key] = (await rl.question(hint ? `${key} (${hint}): ` : `${key}: `)).trim();
    }

    console.log('\n--- Linked table IDs (each starts with tbl…) ---');
    for (const key of LINKED_TABLE_KEYS) {
      values[key] = (await rl.question(`${key}: `)).trim();
    }
  } finally {
    rl.close();
  }

  const complete: EnvFileValues = {
    AIRTABLE_API_KEY: values.AIRTABLE_API_KEY ?? '',
    BASE_ID: values.BASE_ID ?? '',
    TABLE_ID: values.TABLE_ID ?? '',
    STATIONS_TABLE_ID: values.STATIONS_TABLE_ID ?? '',
    LAYOUTS_TABLE_ID: values.LAYOUTS_TABLE_ID ?? '',
    PROP_TYPES_TABLE_ID: values.PROP_TYPES_TABLE_ID ?? '',
    AREAS_TABLE_ID: values.AREAS_TABLE_ID ?? '',
    PRICE_RANGE_TABLE_ID: values.PRICE_RANGE_TABLE_ID ?? '',
    PROPERTY_KIND_TABLE_ID: values.PROPERTY_KIND_TABLE_ID ?? ''
  };

  const target = path.resolve(process.cwd(), '.env');
  await fs.writeFile(target, renderEnvFile(complete), { encoding: 'utf8' });
  console.log(`\nWrote ${target} (keep it out of version control)`);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
