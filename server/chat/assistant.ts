/**
 * Sermon Chat Assistant
 * 
 * Orchestrates one chat interaction end to end:
 * 
 *   query:     catalog -> intent -> rank -> display cap -> search memory -> reply
 *   load more: search memory -> next page -> reply
 *   clear:     transcript and search memory reset together
 * 
 * Provider failures never reach the user as raw errors: the catalog comes
 * back empty ("not connected") and the intent falls back to a literal
 * keyword search.
 */

import type { RenderedRecord, SearchIntent } from "@shared/schema";
import { PAGINATION_CONSTANTS } from "../config/constants";
import { loadCatalog } from "../catalog/catalogProvider";
import { extractSearchIntent, type IntentExtraction } from "../search/intentExtractor";
import { limitSuggestions, rankCatalog } from "../search/ranking";
import type { ChatSession } from "../session/chatSession";
import { escapeHtml, renderCards, renderIntentCaption, toRenderedRecord } from "./presenter";

export const NOT_CONNECTED_MESSAGE = "⚠️ Database not connected. Check logs.";
export const LOAD_MORE_PROMPT = "Show more results";

export type ChatReply = {
  html: string;
  batch: RenderedRecord[];
  /** Records still available to "load more". */
  remaining: number;
  intent: SearchIntent | null;
  intentSource: IntentExtraction["source"] | null;
};

function reply(session: ChatSession, html: string, batch: RenderedRecord[], extraction: IntentExtraction | null): ChatReply {
  session.addMessage("assistant", html);
  return {
    html,
    batch,
    remaining: session.memory.remaining,
    intent: extraction?.intent ?? null,
    intentSource: extraction?.source ?? null,
  };
}

export async function handleQuery(session: ChatSession, text: string, today: Date = new Date()): Promise<ChatReply> {
  session.addMessage("user", text);

  const catalog = await loadCatalog();
  if (catalog.length === 0) {
    session.memory.newQuery(text, [], 0);
    console.warn(`[Chat] Catalog unavailable for session ${session.id}`);
    return reply(session, NOT_CONNECTED_MESSAGE, [], null);
  }

  const extraction = await extractSearchIntent(text, today);
  const { intent } = extraction;
  const results = limitSuggestions(rankCatalog(catalog, intent).records);
  session.memory.newQuery(text, results, intent.limit);

  const parts: string[] = [];
  const caption = renderIntentCaption(intent);
  if (caption) parts.push(caption);

  if (results.length === 0) {
    parts.push(`<p>I couldn't find any exact matches for '<b>${escapeHtml(text)}</b>', and no related topics were found.</p>`);
    return reply(session, parts.join("\n"), [], extraction);
  }

  const exactCount = results.filter(record => record.matchType === "Exact").length;
  const suggestedCount = results.length - exactCount;

  if (exactCount === 0) {
    parts.push(`<p>I did not find any sermon with an exact match, here are <b>${suggestedCount}</b> related/suggested results:</p>`);
  } else {
    parts.push(`<p>Found <b>${results.length}</b> sermons. Here are the results:</p>`);
  }

  const batch = results.slice(0, intent.limit).map(toRenderedRecord);
  parts.push(renderCards(batch, exactCount));

  console.log(`[Chat] ${results.length} results (${exactCount} exact) for session ${session.id}, showing ${batch.length}`);
  return reply(session, parts.join("\n"), batch, extraction);
}

/**
 * Append the next page of the last search. A no-op (empty batch, no
 * transcript entries) once everything has been shown.
 */
export function loadMore(session: ChatSession, pageSize: number = PAGINATION_CONSTANTS.PAGE_SIZE): ChatReply {
  if (session.memory.remaining === 0) {
    return { html: "", batch: [], remaining: 0, intent: null, intentSource: null };
  }

  session.addMessage("user", LOAD_MORE_PROMPT);
  const batch = session.memory.nextBatch(pageSize).map(toRenderedRecord);
  return reply(session, renderCards(batch), batch, null);
}

export function clearConversation(session: ChatSession): void {
  session.clear();
  console.log(`[Chat] Cleared session ${session.id}`);
}
