"use client";

import { useState, type FormEvent } from "react";
import styles from "./page.module.css";
import { scrapeListing } from "../lib/api";
import type { ImageAttachment, ListingRecord, UploadOutcome } from "../lib/types";

const ENV_KEYS = [
  "AIRTABLE_API_KEY",
  "BASE_ID",
  "TABLE_ID",
  "STATIONS_TABLE_ID",
  "LAYOUTS_TABLE_ID",
  "PROP_TYPES_TABLE_ID",
  "AREAS_TABLE_ID",
  "PRICE_RANGE_TABLE_ID",
  "PROPERTY_KIND_TABLE_ID",
];

function formatYen(value: string) {
  return `¥${value}`;
}

// SUUMO lists a waived charge as "-", which parses to "0".
function formatCharge(value: string) {
  return value === "0" ? "None" : formatYen(value);
}

function formatMinutes(value: number | null) {
  return value === null ? "Data not available" : `${value} min walk`;
}

function photosOf(record: ListingRecord): ImageAttachment[] {
  return [
    ...record["Property Cover Image"],
    ...record["Property Plan Image"],
    ...record["Property Images"],
  ];
}

export default function Home() {
  const [url, setUrl] = useState("");
  const [upload, setUpload] = useState(false);

  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [record, setRecord] = useState<ListingRecord | null>(null);
  const [uploadOutcome, setUploadOutcome] = useState<UploadOutcome | null>(null);

  function clearForm() {
    setUrl("");
    setUpload(false);
    setError(null);
    setRecord(null);
    setUploadOutcome(null);
  }

  async function onSubmit(e: FormEvent) {
    e.preventDefault();
    setError(null);

    const value = url.trim();
    if (!value) {
      setError("Please paste a URL.");
      return;
    }

    setLoading(true);
    setRecord(null);
    setUploadOutcome(null);

    try {
      const response = await scrapeListing({ url: value, upload });
      setRecord(response.record);
      setUploadOutcome(response.upload);
    } catch (err) {
      setError(err instanceof Error ? err.message : "Unknown error");
    } finally {
      setLoading(false);
    }
  }

  const photos = record ? photosOf(record) : [];

  return (
    <div className={styles.page}>
      <main className={styles.main}>
        <div className={styles.content}>
          <div className={styles.header}>
            <h1 className={styles.title}>Listing Importer</h1>
            <p className={styles.subtitle}>
              Paste a SUUMO listing URL to preview the Airtable row, and optionally upload it.
            </p>
          </div>

          <section className={styles.sidebar}>
            <form className={styles.form} onSubmit={onSubmit}>
              <fieldset className={styles.fieldset} disabled={loading}>
                <label className={styles.label}>
                  Listing URL
                  <input
                    className={styles.input}
                    value={url}
                    onChange={(e) => setUrl(e.target.value)}
                    placeholder='e.g. "https://suumo.jp/chintai/jnc_000012345678/"'
                  />
                </label>

                <label className={styles.checkboxLabel}>
                  <input
                    type="checkbox"
                    checked={upload}
                    onChange={(e) => setUpload(e.target.checked)}
                  />
                  Upload to Airtable after preview
                </label>

                <button className={styles.button} type="submit">
                  {loading ? "Running…" : "Run"}
                </button>

                <button
                  className={`${styles.secondaryButton} ${styles.clearButton}`}
                  type="button"
                  onClick={clearForm}
                >
                  Clear
                </button>
              </fieldset>
            </form>

            {error ? (
              <div className={styles.error} role="alert">
                {error}
              </div>
            ) : null}

            <p className={styles.envKeys}>Env keys used: {ENV_KEYS.join(", ")}</p>
          </section>

          {loading ? (
            <section className={styles.resultsHeaderPanel} role="status" aria-live="polite">
              <h2>Scraping…</h2>
            </section>
          ) : null}

          {record ? (
            <section className={styles.resultsPanel}>
              {uploadOutcome ? (
                uploadOutcome.ok ? (
                  <div className={styles.success} role="status">
                    Uploaded to Airtable ({uploadOutcome.recordId})
                  </div>
                ) : (
                  <div className={styles.error} role="status">
                    Upload failed: {uploadOutcome.message}
                  </div>
                )
              ) : null}

              <article className={styles.card}>
                <div className={styles.cardBody}>
                  <div className={styles.cardTitle}>{record.Name}</div>
                  <div className={styles.cardSubTitle}>{record.Location || "Data not available"}</div>
                  <div className={styles.cardGrid}>
                    <div>Rent: {formatYen(record["Property Price"])}</div>
                    <div>Management fee: {formatCharge(record["Property Management Fee"])}</div>
                    <div>Deposit: {formatCharge(record["Property Deposit"])}</div>
                    <div>Key money: {formatCharge(record["Property Key Money"])}</div>
                    <div>Size: {record["Property Size"]} m²</div>
                    <div>Access one: {formatMinutes(record["Access One: Minutes to Walk"])}</div>
                    <div>Access two: {formatMinutes(record["Access Two: Minutes to Walk"])}</div>
                  </div>
                </div>

                {photos.length ? (
                  <div className={styles.photos}>
                    {photos.slice(0, 8).map((photo) => (
                      <img
                        key={photo.url}
                        className={styles.photo}
                        src={photo.url}
                        alt="Listing photo"
                        loading="lazy"
                      />
                    ))}
                  </div>
                ) : (
                  <div className={styles.noPhotos}>No photos available</div>
                )}
              </article>

              <h2>Preview</h2>
              <pre className={styles.preview} data-testid="preview">
                {JSON.stringify(record, null, 2)}
              </pre>
            </section>
          ) : null}
        </div>
      </main>
    </div>
  );
}
