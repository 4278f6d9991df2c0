import { describe, expect, it, vi } from 'vitest';
import { render, screen, waitFor } from '@testing-library/react';
import userEvent from '@testing-library/user-event';

import Home from '../src/app/page';
import type { ListingRecord, ScrapeResponse } from '../src/lib/types';

vi.mock('../src/lib/api', () => {
  return {
    scrapeListing: vi.fn()
  };
});

import { scrapeListing } from '../src/lib/api';

const LISTING_URL = 'https://suumo.jp/chintai/jnc_000012345678/';

const record: ListingRecord = {
  Name: 'Park Heights Tamazutsumi 203',
  'Property Price': '164,000',
  'Property Management Fee': '5,000',
  'Property Layout': ['recLayout1LDK'],
  'Property Size': '40',
  'Property Locations': ['recSetagaya'],
  Location: 'Tamazutsumi 2',
  'Property Deposit': '164,000',
  'Property Key Money': '0',
  'Property Cover Image': [{ url: 'https://img.example.test/listing/cover.jpg' }],
  'Property Plan Image': [],
  'Property Images': [],
  'Access One: Train Station': ['recOyamadai'],
  'Access One: Minutes to Walk': 12,
  'Access Two: Train Station': [],
  'Access Two: Minutes to Walk': null,
  'Property Categories': ['recCatApt'],
  'Property Type': ['recKindRent'],
  'Property Price Range': ['recPr100']
};

describe('Home page', () => {
  it('shows the form and no preview before running', () => {
    render(<Home />);
    expect(screen.getByRole('heading', { name: /listing importer/i })).toBeInTheDocument();
    expect(screen.getByLabelText(/listing url/i)).toBeInTheDocument();
    expect(screen.queryByRole('heading', { name: /^preview$/i })).not.toBeInTheDocument();
  });

  it('asks for a URL when the field is blank', async () => {
    const user = userEvent.setup();
    render(<Home />);

    await user.type(screen.getByLabelText(/listing url/i), '   ');
    await user.click(screen.getByRole('button', { name: /^run$/i }));

    expect(screen.getByRole('alert')).toHaveTextContent('Please paste a URL.');
    expect(vi.mocked(scrapeListing)).not.toHaveBeenCalled();
  });

  it('shows Running… while in flight, then the preview', async () => {
    const user = userEvent.setup();

    let resolve: (value: ScrapeResponse) => void = () => undefined;
    const promise = new Promise<ScrapeResponse>((r) => {
      resolve = r;
    });
    vi.mocked(scrapeListing).mockReturnValueOnce(promise);

    render(<Home />);

    await user.type(screen.getByLabelText(/listing url/i), ` ${LISTING_URL} `);
    await user.click(screen.getByRole('button', { name: /^run$/i }));

    expect(screen.getByRole('button', { name: /running/i })).toBeDisabled();
    expect(screen.getByRole('heading', { name: /scraping/i })).toBeInTheDocument();
    expect(vi.mocked(scrapeListing)).toHaveBeenCalledWith({ url: LISTING_URL, upload: false });

    resolve({ record, upload: null });

    await waitFor(() => {
      expect(screen.getByRole('heading', { name: /^preview$/i })).toBeInTheDocument();
    });

    expect(screen.getByText('Park Heights Tamazutsumi 203')).toBeInTheDocument();
    expect(screen.getByText('Rent: ¥164,000')).toBeInTheDocument();
    expect(screen.getByText('Deposit: ¥164,000')).toBeInTheDocument();
    expect(screen.getByText('Key money: None')).toBeInTheDocument();
    expect(screen.getByText('Access one: 12 min walk')).toBeInTheDocument();
    expect(screen.getByAltText('Listing photo')).toHaveAttribute(
      'src',
      'https://img.example.test/listing/cover.jpg'
    );
    expect(screen.getByTestId('preview').textContent).toBe(JSON.stringify(record, null, 2));
    expect(screen.queryByText(/uploaded to airtable/i)).not.toBeInTheDocument();
  });

  it('reports a successful upload', async () => {
    const user = userEvent.setup();
    vi.mocked(scrapeListing).mockResolvedValueOnce({
      record,
      upload: { ok: true, recordId: 'recMain1' }
    });

    render(<Home />);

    await user.type(screen.getByLabelText(/listing url/i), LISTING_URL);
    await user.click(screen.getByLabelText(/upload to airtable after preview/i));
    await user.click(screen.getByRole('button', { name: /^run$/i }));

    expect(await screen.findByText('Uploaded to Airtable (recMain1)')).toBeInTheDocument();
    expect(vi.mocked(scrapeListing)).toHaveBeenCalledWith({ url: LISTING_URL, upload: true });
  });

  it('keeps the preview when the upload fails', async () => {
    const user = userEvent.setup();
    vi.mocked(scrapeListing).mockResolvedValueOnce({
      record,
      upload: { ok: false, message: 'Airtable request failed (422): INVALID_VALUE' }
    });

    render(<Home />);

    await user.type(screen.getByLabelText(/listing url/i), LISTING_URL);
    await user.click(screen.getByLabelText(/upload to airtable after preview/i));
    await user.click(screen.getByRole('button', { name: /^run$/i }));

    expect(
      await screen.findByText('Upload failed: Airtable request failed (422): INVALID_VALUE')
    ).toBeInTheDocument();
    expect(screen.getByRole('heading', { name: /^preview$/i })).toBeInTheDocument();
  });

  it('shows the API error and no preview when scraping fails', async () => {
    const user = userEvent.setup();
    vi.mocked(scrapeListing).mockRejectedValueOnce(
      new Error(`Listing page request failed (404): ${LISTING_URL}`)
    );

    render(<Home />);

    await user.type(screen.getByLabelText(/listing url/i), LISTING_URL);
    await user.click(screen.getByRole('button', { name: /^run$/i }));

    expect(await screen.findByRole('alert')).toHaveTextContent(
      `Listing page request failed (404): ${LISTING_URL}`
    );
    expect(screen.queryByRole('heading', { name: /^preview$/i })).not.toBeInTheDocument();
  });

  it('clears the form and the preview', async () => {
    const user = userEvent.setup();
    vi.mocked(scrapeListing).mockResolvedValueOnce({ record, upload: null });

    render(<Home />);

    await user.type(screen.getByLabelText(/listing url/i), LISTING_URL);
    await user.click(screen.getByRole('button', { name: /^run$/i }));
    await screen.findByRole('heading', { name: /^preview$/i });

    await user.click(screen.getByRole('button', { name: /^clear$/i }));

    expect(screen.getByLabelText(/listing url/i)).toHaveValue('');
    expect(screen.queryByRole('heading', { name: /^preview$/i })).not.toBeInTheDocument();
  });
});
