import type { Env } from '../env.js';

export interface AirtableConfig {
  apiBaseUrl: string;
  apiKey: string;
  baseId: string;
}

export interface AirtableRecord<TFields = Record<string, unknown>> {
  id: string;
  createdTime?: string;
  fields: TFields;
}

/**
 * Narrow view of the Airtable operations the importer needs. The resolver only
 * talks to this interface, so tests can run against an in-memory table set.
 */
export interface RecordStore {
  findIdByName(tableId: string, name: string): Promise<string | null>;
  create(tableId: string, fields: Record<string, unknown>): Promise<AirtableRecord>;
}

export class AirtableRequestError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`Airtable request failed (${status}): ${body}`);
    this.name = 'AirtableRequestError';
    this.status = status;
    this.body = body;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function toAirtableRecord(value: unknown): AirtableRecord {
  if (!isRecord(value) || typeof value.id !== 'string') {
    throw new Error('Airtable response did not contain a record id');
  }
  return {
    id: value.id,
    createdTime: typeof value.createdTime === 'string' ? value.createdTime : undefined,
    fields: isRecord(value.fields) ? value.fields : {}
  };
}

export function airtableConfigFromEnv(env: Env): AirtableConfig {
  return {
    apiBaseUrl: env.AIRTABLE_API_BASE_URL,
    apiKey: env.AIRTABLE_API_KEY,
    baseId: env.BASE_ID
  };
}

// Airtable formula string literal; single quotes are backslash-escaped.
export function nameEqualsFormula(name: string): string {
  return `{Name}='${name.replace(/'/g, "\\'")}'`;
}

async function airtableRequest(
  config: AirtableConfig,
  tableId: string,
  init: { method: 'GET' | 'POST'; query?: Record<string, string>; body?: unknown }
): Promise<unknown> {
  const url = new URL(
    `/v0/${encodeURIComponent(config.baseId)}/${encodeURIComponent(tableId)}`,
    config.apiBaseUrl
  );
  for (const [key, value] of Object.entries(init.query ?? {})) {
    url.searchParams.set(key, value);
  }

  const headers: Record<string, string> = {
    Accept: 'application/json',
    Authorization: `Bearer ${config.apiKey}`
  };
  if (init.body !== undefined) headers['Content-Type'] = 'application/json';

  const res = await fetch(url, {
    method: init.method,
    headers,
    body: init.body === undefined ? undefined : JSON.stringify(init.body)
  });

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    throw new AirtableRequestError(res.status, text);
  }

  return res.json();
}

export async function findRecordIdByName(
  config: AirtableConfig,
  tableId: string,
  name: string
): Promise<string | null> {
  const payload = await airtableRequest(config, tableId, {
    method: 'GET',
    query: { filterByFormula: nameEqualsFormula(name), maxRecords: '1' }
  });

  const records = isRecord(payload) && Array.isArray(payload.records) ? payload.records : [];
  const first: unknown = records[0];
  return isRecord(first) && typeof first.id === 'string' ? first.id : null;
}

export async function createRecord(
  config: AirtableConfig,
  tableId: string,
  fields: Record<string, unknown>
): Promise<AirtableRecord> {
  const payload = await airtableRequest(config, tableId, { method: 'POST', body: { fields } });
  const record = toAirtableRecord(payload);
  console.log('[airtable] created record', { tableId, id: record.id });
  return record;
}

export function createAirtableStore(config: AirtableConfig): RecordStore {
  return {
    findIdByName: (tableId, name) => findRecordIdByName(config, tableId, name),
    create: (tableId, fields) => createRecord(config, tableId, fields)
  };
}
