import { z } from "zod";

export const MATCH_TYPES = ["Exact", "Suggested"] as const;
export type MatchType = typeof MATCH_TYPES[number];

export const SORT_ORDERS = ["relevance", "newest"] as const;
export type SortOrder = typeof SORT_ORDERS[number];

/**
 * One recorded talk from the catalog sheet.
 * `date` is null when the sheet cell could not be parsed.
 */
export type CatalogRecord = {
  id: string;
  title: string;
  speaker: string;
  date: Date | null;
  downloadLink: string;
};

/**
 * Structured search intent. Every field is always present;
 * the Intent Extractor fills defaults for anything the model omitted.
 */
export type SearchIntent = {
  keywords: string | null;
  synonyms: string;
  speaker: string | null;
  startDate: Date | null;
  endDate: Date | null;
  limit: number;
  sort: SortOrder;
};

export type ScoredRecord = CatalogRecord & {
  matchScore: number;
  matchCount: number;
  matchType: MatchType;
};

export type RankedResultSet = {
  records: ScoredRecord[];
  nextIndex: number;
};

export type ChatRole = "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

/** A record as the presentation layer receives it (dates already formatted). */
export type RenderedRecord = {
  id: string;
  title: string;
  speaker: string;
  date: string;
  downloadLink: string;
  matchType: MatchType;
};

// Request bodies
export const chatQuerySchema = z.object({
  message: z.string().trim().min(1, "Message is required").max(500, "Message is too long"),
});

export type ChatQuery = z.infer<typeof chatQuerySchema>;
