/**
 * Catalog Provider
 * 
 * Purpose:
 * Read-only access to the sermon catalog for the search pipeline.
 * 
 * - Rows are read from the catalog sheet and mapped by header name
 * - A successful load is reused for CACHE_TTL_MS
 * - Any connectivity, auth or format failure is logged and yields an
 *   empty catalog; failures are not cached, so the next query reads again
 * 
 * Layer: Catalog (provider)
 */

import type { CatalogRecord } from "@shared/schema";
import { CATALOG_CONSTANTS } from "../config/constants";
import { logError } from "../utils/errorHandler";
import { parseCatalogDate } from "../utils/dates";
import { fetchSheetRows, type SheetRows } from "./sheetsClient";

type CatalogCache = {
  records: CatalogRecord[];
  loadedAt: number;
};

let cache: CatalogCache | null = null;

const { COLUMNS } = CATALOG_CONSTANTS;

/**
 * Map sheet rows (header row first) to catalog records.
 * Rows with neither a title nor a speaker are skipped.
 */
export function parseCatalogRows(rows: SheetRows): CatalogRecord[] {
  if (rows.length === 0) return [];

  const header = rows[0].map(cell => cell.trim());
  const columnIndex = (name: string) => header.indexOf(name);
  const titleIdx = columnIndex(COLUMNS.TITLE);
  const speakerIdx = columnIndex(COLUMNS.SPEAKER);
  const dateIdx = columnIndex(COLUMNS.DATE);
  const linkIdx = columnIndex(COLUMNS.DOWNLOAD_LINK);

  if (titleIdx === -1) {
    console.warn(`[Catalog] Header row has no "${COLUMNS.TITLE}" column; found: ${header.join(", ")}`);
  }

  const cell = (row: string[], idx: number) => (idx >= 0 ? (row[idx] ?? "").trim() : "");

  const records: CatalogRecord[] = [];
  rows.slice(1).forEach((row, offset) => {
    const title = cell(row, titleIdx);
    const speaker = cell(row, speakerIdx);
    if (!title && !speaker) return;

    records.push({
      // Sheet rows are 1-based and row 1 is the header
      id: `row-${offset + 2}`,
      title,
      speaker,
      date: parseCatalogDate(cell(row, dateIdx)),
      downloadLink: cell(row, linkIdx) || CATALOG_CONSTANTS.MISSING_LINK,
    });
  });
  return records;
}

export async function loadCatalog(): Promise<CatalogRecord[]> {
  const now = Date.now();
  if (cache && now - cache.loadedAt < CATALOG_CONSTANTS.CACHE_TTL_MS) {
    return cache.records;
  }

  try {
    const start = Date.now();
    const records = parseCatalogRows(await fetchSheetRows());
    cache = { records, loadedAt: now };
    console.log(`[Catalog] Loaded ${records.length} records in ${Date.now() - start}ms`);
    return records;
  } catch (error) {
    logError("Catalog", error);
    return [];
  }
}

/**
 * Drop the cached catalog so the next load reads the sheet.
 */
export function clearCatalogCache(): void {
  cache = null;
}
