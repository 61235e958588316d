/**
 * Speaker Name Matcher
 * 
 * Decides whether a free-text speaker query ("Seun", "Dami", "Pastor Ibk")
 * refers to a catalog speaker field. Checks run in order, first hit wins:
 * 
 * 1. Query contained in the title-stripped candidate (partial >= 95)
 * 2. Known alias expanded, then partial >= 80
 * 3. Query is one of the candidate's words
 * 4. Short queries (<= 5 chars) need full ratio >= 95, longer ones partial >= 75
 * 
 * Titles are only stripped from the candidate; the extractor already
 * removes them from the query.
 */

import { NAME_MATCH_CONSTANTS } from "../config/constants";
import { partialRatio, ratio } from "./similarity";

const TITLES = new Set<string>(NAME_MATCH_CONSTANTS.TITLES);
const ALIASES: ReadonlyMap<string, string> = new Map(Object.entries(NAME_MATCH_CONSTANTS.ALIASES));

/**
 * Lowercase and drop leading honorifics ("Pastor Dr. Seun Akinloye" -> "seun akinloye").
 */
export function stripTitles(name: string): string {
  const words = name.toLowerCase().trim().split(/\s+/).filter(Boolean);

  let start = 0;
  while (start < words.length - 1 && TITLES.has(words[start].replace(/\.$/, ""))) {
    start++;
  }
  return words.slice(start).join(" ");
}

export function expandAlias(name: string): string | null {
  return ALIASES.get(name) ?? null;
}

export function matchesSpeaker(queryName: string | null | undefined, candidateName: string | null | undefined): boolean {
  if (!queryName || !candidateName) return false;

  const query = queryName.toLowerCase().trim();
  const candidate = stripTitles(candidateName);
  if (!query || !candidate) return false;

  if (partialRatio(query, candidate) >= NAME_MATCH_CONSTANTS.CONTAINED_THRESHOLD) return true;

  const expanded = expandAlias(query);
  if (expanded && partialRatio(expanded, candidate) >= NAME_MATCH_CONSTANTS.ALIAS_THRESHOLD) return true;

  if (candidate.split(" ").includes(query)) return true;

  if (query.length <= NAME_MATCH_CONSTANTS.SHORT_NAME_MAX_LENGTH) {
    return ratio(query, candidate) >= NAME_MATCH_CONSTANTS.SHORT_NAME_THRESHOLD;
  }
  return partialRatio(query, candidate) >= NAME_MATCH_CONSTANTS.LONG_NAME_THRESHOLD;
}
