/**
 * Unit Tests: Catalog Provider
 *
 * The Sheets client is mocked. Covers header mapping, row skipping,
 * the load cache and the empty-catalog failure path.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../catalog/sheetsClient", () => ({
  fetchSheetRows: vi.fn(),
}));

import { fetchSheetRows } from "../catalog/sheetsClient";
import { clearCatalogCache, loadCatalog, parseCatalogRows } from "../catalog/catalogProvider";
import { day } from "./helpers";

const mockFetchSheetRows = vi.mocked(fetchSheetRows);

const HEADER = [" Title ", "Preacher", "Date", "DownloadLink"];

describe("parseCatalogRows", () => {
  it("maps columns by header name", () => {
    const records = parseCatalogRows([
      ["Date", "DownloadLink", "Title", "Preacher"],
      ["2024-01-10", "https://example.com/faith.mp3", "Faith in Trials", "Pastor Seun"],
    ]);

    expect(records).toEqual([{
      id: "row-2",
      title: "Faith in Trials",
      speaker: "Pastor Seun",
      date: day(2024, 1, 10),
      downloadLink: "https://example.com/faith.mp3",
    }]);
  });

  it("skips rows without title or speaker but keeps sheet row numbers", () => {
    const records = parseCatalogRows([
      HEADER,
      ["Faith in Trials", "Pastor Seun", "2024-01-10", "https://example.com/1.mp3"],
      ["", "  ", "2024-01-11", "https://example.com/2.mp3"],
      ["Walking in Love", "Apostle Segun", "2/1/2024", ""],
    ]);

    expect(records.map(r => r.id)).toEqual(["row-2", "row-4"]);
    expect(records[1]).toMatchObject({ date: day(2024, 2, 1), downloadLink: "#" });
  });

  it("tolerates short rows and unparsable dates", () => {
    const records = parseCatalogRows([
      HEADER,
      ["Untitled Talk"],
      ["Kingdom Mindset", "Seun Akinloye", "sometime in spring", ""],
      ["Grace Abounds", "Seun Akinloye", "March 3, 2024", ""],
    ]);

    expect(records).toEqual([
      { id: "row-2", title: "Untitled Talk", speaker: "", date: null, downloadLink: "#" },
      { id: "row-3", title: "Kingdom Mindset", speaker: "Seun Akinloye", date: null, downloadLink: "#" },
      { id: "row-4", title: "Grace Abounds", speaker: "Seun Akinloye", date: day(2024, 3, 3), downloadLink: "#" },
    ]);
  });

  it("returns nothing for an empty sheet", () => {
    expect(parseCatalogRows([])).toEqual([]);
    expect(parseCatalogRows([HEADER])).toEqual([]);
  });

  it("warns when the title column is missing", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const records = parseCatalogRows([["Name", "Preacher"], ["Faith", "Seun"]]);

    expect(records).toEqual([{ id: "row-2", title: "", speaker: "Seun", date: null, downloadLink: "#" }]);
    expect(warn).toHaveBeenCalledWith('[Catalog] Header row has no "Title" column; found: Name, Preacher');
    warn.mockRestore();
  });
});

describe("loadCatalog", () => {
  const rows = [HEADER, ["Faith in Trials", "Pastor Seun", "2024-01-10", "https://example.com/1.mp3"]];

  beforeEach(() => {
    vi.clearAllMocks();
    clearCatalogCache();
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2026, 0, 1, 9, 0, 0));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("reuses a successful load until the cache expires", async () => {
    mockFetchSheetRows.mockResolvedValue(rows);

    const first = await loadCatalog();
    vi.setSystemTime(new Date(2026, 0, 1, 9, 9, 59));
    const second = await loadCatalog();

    expect(first).toHaveLength(1);
    expect(second).toBe(first);
    expect(mockFetchSheetRows).toHaveBeenCalledTimes(1);

    vi.setSystemTime(new Date(2026, 0, 1, 9, 10, 0));
    await loadCatalog();

    expect(mockFetchSheetRows).toHaveBeenCalledTimes(2);
  });

  it("returns an empty catalog on failure and retries on the next load", async () => {
    mockFetchSheetRows.mockRejectedValueOnce(new Error("[Sheets] SHEET_ID environment variable is not set"));
    mockFetchSheetRows.mockResolvedValueOnce(rows);

    expect(await loadCatalog()).toEqual([]);
    expect(console.error).toHaveBeenCalledTimes(1);

    const records = await loadCatalog();

    expect(records.map(r => r.title)).toEqual(["Faith in Trials"]);
    expect(mockFetchSheetRows).toHaveBeenCalledTimes(2);
  });

  it("reads again after the cache is cleared", async () => {
    mockFetchSheetRows.mockResolvedValue(rows);

    await loadCatalog();
    clearCatalogCache();
    await loadCatalog();

    expect(mockFetchSheetRows).toHaveBeenCalledTimes(2);
  });
});
