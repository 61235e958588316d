import type { CatalogRecord, ScoredRecord, SearchIntent } from "@shared/schema";

/** Local-midnight date, the same way catalog cells and intent bounds are parsed. */
export function day(year: number, month: number, date: number): Date {
  return new Date(year, month - 1, date);
}

let counter = 0;

export function makeRecord(overrides: Partial<CatalogRecord> = {}): CatalogRecord {
  counter++;
  return {
    id: `rec-${counter}`,
    title: "Untitled",
    speaker: "Guest Speaker",
    date: day(2024, 1, 1),
    downloadLink: "https://example.com/audio.mp3",
    ...overrides,
  };
}

export function makeScored(overrides: Partial<ScoredRecord> = {}): ScoredRecord {
  return {
    ...makeRecord(),
    matchScore: 100,
    matchCount: 1,
    matchType: "Exact",
    ...overrides,
  };
}

export function makeIntent(overrides: Partial<SearchIntent> = {}): SearchIntent {
  return {
    keywords: null,
    synonyms: "",
    speaker: null,
    startDate: null,
    endDate: null,
    limit: 10,
    sort: "relevance",
    ...overrides,
  };
}
