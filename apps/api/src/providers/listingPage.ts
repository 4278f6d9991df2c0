const REQUEST_HEADERS = { 'User-Agent': 'Mozilla/5.0' };

const FETCH_TIMEOUT_MS = 30_000;

export class ListingFetchError extends Error {
  readonly status: number;

  constructor(url: string, status: number) {
    super(`Listing page request failed (${status}): ${url}`);
    this.name = 'ListingFetchError';
    this.status = status;
  }
}

export async function fetchListingHtml(url: string): Promise<string> {
  const res = await fetch(url, {
    headers: REQUEST_HEADERS,
    signal: AbortSignal.timeout(FETCH_TIMEOUT_MS)
  });

  if (!res.ok) {
    throw new ListingFetchError(url, res.status);
  }

  return res.text();
}
