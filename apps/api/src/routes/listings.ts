import { Router } from 'express';
import { z } from 'zod';
import { getEnv } from '../env.js';
import { ListingFetchError } from '../providers/listingPage.js';
import { createListingDeps, scrapeListing, uploadListing } from '../services/listingService.js';
import type { UploadOutcome } from '../types.js';

const router = Router();

function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return 'Unknown error';
}

const scrapeBodySchema = z.object({
  url: z
    .string()
    .trim()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), { message: 'URL must use http or https' }),
  upload: z.boolean().optional().default(false)
});

router.post('/v1/listings/scrape', async (req, res) => {
  const parsed = scrapeBodySchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
  }

  const { url, upload } = parsed.data;

  let deps: ReturnType<typeof createListingDeps>;
  let scraped: Awaited<ReturnType<typeof scrapeListing>>;
  try {
    deps = createListingDeps(getEnv());
    scraped = await scrapeListing(url, deps);
  } catch (err) {
    console.error('[scrape] failed', { url, error: errorMessage(err) });
    if (err instanceof ListingFetchError) {
      return res.status(502).json({ error: 'FETCH_FAILED', message: err.message, status: err.status });
    }
    return res.status(500).json({ error: 'SCRAPE_FAILED', message: errorMessage(err) });
  }

  if (!upload) {
    return res.json({ record: scraped.record, upload: null });
  }

  let outcome: UploadOutcome;
  try {
    const created = await uploadListing(scraped.record, deps);
    outcome = { ok: true, recordId: created.id };
  } catch (err) {
    // The preview is still useful when the write fails.
    console.error('[upload] failed', { url, error: errorMessage(err) });
    outcome = { ok: false, message: errorMessage(err) };
  }

  return res.json({ record: scraped.record, upload: outcome });
});

export default router;
