/**
 * Ranking Pipeline
 * 
 * Applies a SearchIntent to the catalog:
 * 
 *   date filter -> speaker filter -> exact pass (keywords)
 *   -> suggested pass (synonyms, only when exact matches are sparse)
 *   -> filter-only fallback -> sort
 * 
 * Exact always wins over Suggested: a record matched by the keywords is
 * never repeated in the suggested set. The returned set is fresh, with
 * its cursor at 0; the chat session owns it from there.
 */

import type { CatalogRecord, RankedResultSet, ScoredRecord, SearchIntent, SortOrder, MatchType } from "@shared/schema";
import { SEARCH_CONSTANTS } from "../config/constants";
import { matchesSpeaker } from "./nameMatcher";
import { isBlankPhrase, scoreRecords } from "./scoring";

const MATCH_TYPE_RANK: Record<MatchType, number> = {
  Exact: 1,
  Suggested: 2,
};

function isUsableBound(bound: Date | null, label: string): bound is Date {
  if (!bound) return false;
  if (Number.isNaN(bound.getTime())) {
    console.warn(`[Ranking] Ignoring unparsable ${label} bound`);
    return false;
  }
  return true;
}

/**
 * Keep records inside [startDate, endDate]. Either bound may be absent.
 * Records without a date cannot satisfy a bound that is applied.
 */
export function filterByDate<T extends CatalogRecord>(records: readonly T[], startDate: Date | null, endDate: Date | null): T[] {
  const hasStart = isUsableBound(startDate, "start date");
  const hasEnd = isUsableBound(endDate, "end date");
  if (!hasStart && !hasEnd) return [...records];

  const start = hasStart && startDate ? startDate.getTime() : Number.NEGATIVE_INFINITY;
  const end = hasEnd && endDate ? endDate.getTime() : Number.POSITIVE_INFINITY;

  return records.filter(record => {
    if (!record.date) return false;
    const time = record.date.getTime();
    return time >= start && time <= end;
  });
}

export function filterBySpeaker<T extends CatalogRecord>(records: readonly T[], speaker: string | null): T[] {
  if (!speaker || speaker.trim().toLowerCase() === "none") return [...records];
  return records.filter(record => matchesSpeaker(speaker, record.speaker));
}

function dateValue(record: CatalogRecord): number {
  return record.date ? record.date.getTime() : Number.NEGATIVE_INFINITY;
}

function compareDatesDescending(a: CatalogRecord, b: CatalogRecord): number {
  const left = dateValue(a);
  const right = dateValue(b);
  if (left === right) return 0;
  return left > right ? -1 : 1;
}

/**
 * "newest": date descending only.
 * "relevance": Exact before Suggested, then score descending, then date descending.
 * Undated records sort last. The sort is stable.
 */
export function sortRecords(records: readonly ScoredRecord[], sort: SortOrder): ScoredRecord[] {
  const sorted = [...records];
  if (sort === "newest") {
    return sorted.sort(compareDatesDescending);
  }
  return sorted.sort((a, b) =>
    MATCH_TYPE_RANK[a.matchType] - MATCH_TYPE_RANK[b.matchType]
    || b.matchScore - a.matchScore
    || compareDatesDescending(a, b),
  );
}

export function rankCatalog(catalog: readonly CatalogRecord[], intent: SearchIntent): RankedResultSet {
  if (catalog.length === 0) {
    return { records: [], nextIndex: 0 };
  }

  const dated = filterByDate(catalog, intent.startDate, intent.endDate);
  const filtered = filterBySpeaker(dated, intent.speaker);

  const exact = scoreRecords(filtered, intent.keywords, "Exact");

  let suggested: ScoredRecord[] = [];
  if (exact.length < SEARCH_CONSTANTS.SUGGESTED_PASS_TRIGGER && !isBlankPhrase(intent.synonyms)) {
    const exactIds = new Set(exact.map(record => record.id));
    suggested = scoreRecords(filtered, intent.synonyms, "Suggested")
      .filter(record => !exactIds.has(record.id));
  }

  let combined: ScoredRecord[];
  if (exact.length === 0 && suggested.length === 0 && isBlankPhrase(intent.keywords)) {
    // Filter-only query ("messages by Seun"): every filtered record is a hit
    combined = filtered.map(record => ({
      ...record,
      matchScore: SEARCH_CONSTANTS.FILTER_ONLY_SCORE,
      matchCount: 0,
      matchType: "Exact" as const,
    }));
  } else {
    combined = [...exact, ...suggested];
  }

  console.log(
    `[Ranking] ${filtered.length}/${catalog.length} records after filters, ${exact.length} exact, ${suggested.length} suggested`,
  );

  return { records: sortRecords(combined, intent.sort), nextIndex: 0 };
}

/**
 * Bound what the chat renders once suggestions are involved: past the cap,
 * keep every Exact record and only as many Suggested ones as still fit.
 */
export function limitSuggestions(records: readonly ScoredRecord[], cap: number = SEARCH_CONSTANTS.DISPLAY_CAP): ScoredRecord[] {
  const hasSuggested = records.some(record => record.matchType === "Suggested");
  if (records.length <= cap || !hasSuggested) return [...records];

  const exact = records.filter(record => record.matchType === "Exact");
  const suggested = records
    .filter(record => record.matchType === "Suggested")
    .slice(0, Math.max(0, cap - exact.length));
  return [...exact, ...suggested];
}
