/**
 * Title Scoring
 * 
 * Scores catalog titles against a comma/"and" separated topic phrase.
 * Every topic whose partial similarity with the title clears the
 * threshold adds its similarity to the record's score, so a title that
 * matches two topics outranks one that matches a single topic.
 */

import type { CatalogRecord, MatchType, ScoredRecord } from "@shared/schema";
import { SEARCH_CONSTANTS } from "../config/constants";
import { partialRatio } from "./similarity";

const STOP_WORDS = new Set<string>(SEARCH_CONSTANTS.STOP_WORDS);

/**
 * True for phrases that carry no topic (null, blank, or the model's literal "none").
 */
export function isBlankPhrase(phrase: string | null | undefined): boolean {
  if (!phrase) return true;
  const trimmed = phrase.trim().toLowerCase();
  return trimmed === "" || trimmed === "none";
}

export function splitTopics(phrase: string | null | undefined): string[] {
  if (!phrase || isBlankPhrase(phrase)) return [];

  return phrase
    .toLowerCase()
    .split(/,|\band\b/)
    .map(topic => topic.trim())
    .filter(topic => topic.length > 0 && !STOP_WORDS.has(topic));
}

export function scoreRecords(
  records: readonly CatalogRecord[],
  topicPhrase: string | null | undefined,
  label: MatchType,
): ScoredRecord[] {
  const topics = splitTopics(topicPhrase);
  if (topics.length === 0) return [];

  const scored: ScoredRecord[] = [];
  for (const record of records) {
    const title = record.title.toLowerCase();
    let matchScore = 0;
    let matchCount = 0;

    for (const topic of topics) {
      const similarity = partialRatio(topic, title);
      if (similarity > SEARCH_CONSTANTS.TOPIC_MATCH_THRESHOLD) {
        matchScore += similarity;
        matchCount++;
      }
    }

    if (matchScore > 0) {
      scored.push({ ...record, matchScore, matchCount, matchType: label });
    }
  }
  return scored;
}
