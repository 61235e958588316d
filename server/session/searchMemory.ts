/**
 * Search Memory
 * 
 * Holds the last ranked result set of a chat session and the cursor that
 * "load more" drains. A new query replaces the set wholesale; loading more
 * only moves the cursor forward, by exactly the number of records returned.
 */

import type { RankedResultSet, ScoredRecord } from "@shared/schema";
import { PAGINATION_CONSTANTS } from "../config/constants";

export class SearchMemory {
  private resultSet: RankedResultSet = { records: [], nextIndex: 0 };
  private query = "";

  /**
   * Store a fresh result set. `shownCount` records were already rendered
   * with the query's reply, so the cursor starts there.
   */
  newQuery(query: string, records: readonly ScoredRecord[], shownCount: number): void {
    this.query = query;
    this.resultSet = {
      records: [...records],
      nextIndex: Math.max(0, Math.floor(shownCount)),
    };
  }

  nextBatch(pageSize: number = PAGINATION_CONSTANTS.PAGE_SIZE): ScoredRecord[] {
    const size = Math.max(1, Math.floor(pageSize));
    const { records, nextIndex } = this.resultSet;
    if (nextIndex >= records.length) return [];

    const batch = records.slice(nextIndex, nextIndex + size);
    this.resultSet.nextIndex = nextIndex + batch.length;
    return batch;
  }

  clear(): void {
    this.query = "";
    this.resultSet = { records: [], nextIndex: 0 };
  }

  get lastQuery(): string {
    return this.query;
  }

  get cursor(): number {
    return this.resultSet.nextIndex;
  }

  get total(): number {
    return this.resultSet.records.length;
  }

  get remaining(): number {
    return Math.max(0, this.resultSet.records.length - this.resultSet.nextIndex);
  }
}
