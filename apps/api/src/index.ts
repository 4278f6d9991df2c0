import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { getEnv, missingTableIds } from './env.js';
import { createApp } from './app.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// Repo-root .env first; apps/api/.env (the working directory under npm -w) overrides it.
dotenv.config({ path: path.resolve(__dirname, '../../../.env') });
dotenv.config({ override: true });

const env = getEnv();

const missing = missingTableIds(env);
if (missing.length > 0) {
  console.warn('[config] Airtable ids not set; scrapes touching them will fail', { missing });
}

createApp().listen(env.PORT, () => {
  console.log('[server] listening', { url: `http://localhost:${env.PORT}` });
});
