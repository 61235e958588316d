/**
 * Chat Presenter
 * 
 * Renders search results as the HTML fragments shown in the chat
 * transcript. Every interpolated value is escaped; download links that
 * are not http(s) are replaced with the "#" placeholder.
 */

import type { MatchType, RenderedRecord, ScoredRecord, SearchIntent } from "@shared/schema";
import { CATALOG_CONSTANTS } from "../config/constants";
import { formatDisplayDate } from "../utils/dates";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, char => HTML_ESCAPES[char]);
}

function safeLink(link: string): string {
  return /^https?:\/\//i.test(link) ? link : CATALOG_CONSTANTS.MISSING_LINK;
}

export function toRenderedRecord(record: ScoredRecord): RenderedRecord {
  return {
    id: record.id,
    title: record.title,
    speaker: record.speaker,
    date: formatDisplayDate(record.date),
    downloadLink: safeLink(record.downloadLink),
    matchType: record.matchType,
  };
}

export function renderCard(record: RenderedRecord): string {
  return [
    `<div class="sermon-card">`,
    `<div class="sermon-title">${escapeHtml(record.title)}</div>`,
    `<div class="sermon-details"><span>👤 ${escapeHtml(record.speaker)}</span><span>📅 ${escapeHtml(record.date)}</span></div>`,
    `<a href="${escapeHtml(record.downloadLink)}" target="_blank" rel="noopener noreferrer" class="download-link">🔗 Download Sermon</a>`,
    `</div>`,
  ].join("");
}

export function renderSectionHeader(matchType: MatchType, exactCount: number): string {
  if (matchType === "Exact") {
    return `<div class="chat-header">✅ ${exactCount === 1 ? "Exact Match" : "Exact Matches"}</div>`;
  }
  return `<div class="chat-header">💡 Related / Suggested Results</div>`;
}

/**
 * Cards for a batch. With `exactCount` set, a section header opens each
 * run of records sharing a match type.
 */
export function renderCards(records: readonly RenderedRecord[], exactCount?: number): string {
  const parts: string[] = [];
  let currentSection: MatchType | null = null;

  for (const record of records) {
    if (exactCount !== undefined && record.matchType !== currentSection) {
      currentSection = record.matchType;
      parts.push(renderSectionHeader(record.matchType, exactCount));
    }
    parts.push(renderCard(record));
  }
  return parts.join("\n");
}

/**
 * One-line summary of what the intent model understood. Empty when nothing was detected.
 */
export function renderIntentCaption(intent: SearchIntent): string {
  const detected: string[] = [];
  if (intent.speaker) detected.push(`Preacher: ${intent.speaker}`);
  if (intent.keywords) detected.push(`Keywords: ${intent.keywords}`);
  if (intent.synonyms) detected.push(`Related: ${intent.synonyms}`);

  if (detected.length === 0) return "";
  return `<div class="ai-caption">🤖 <b>AI Detected Themes:</b> ${escapeHtml(detected.join(" | "))}</div>`;
}
