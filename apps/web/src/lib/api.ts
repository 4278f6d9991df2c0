import type { ScrapeRequest, ScrapeResponse } from './types';

const API_BASE_URL = process.env.NEXT_PUBLIC_API_BASE_URL ?? 'http://localhost:4000';

export class ApiError extends Error {
  readonly status: number;
  readonly payload: unknown;

  constructor(message: string, status: number, payload: unknown) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
    this.payload = payload;
  }
}

async function tryReadJson(res: Response): Promise<unknown> {
  try {
    return await res.json();
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function getErrorMessage(payload: unknown): string | undefined {
  if (!isRecord(payload)) return undefined;
  const message = payload.message;
  const error = payload.error;
  if (typeof message === 'string' && message.trim()) return message;
  if (typeof error === 'string' && error.trim()) return error;
  return undefined;
}

function isScrapeResponse(payload: unknown): payload is ScrapeResponse {
  return isRecord(payload) && isRecord(payload.record) && (payload.upload === null || isRecord(payload.upload));
}

export async function scrapeListing(body: ScrapeRequest): Promise<ScrapeResponse> {
  const res = await fetch(`${API_BASE_URL}/v1/listings/scrape`, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json'
    },
    body: JSON.stringify(body)
  });

  const payload = await tryReadJson(res);

  if (!res.ok) {
    throw new ApiError(getErrorMessage(payload) ?? `Request failed (${res.status})`, res.status, payload);
  }

  if (!isScrapeResponse(payload)) {
    throw new ApiError('Unexpected response from the API', res.status, payload);
  }

  return payload;
}
