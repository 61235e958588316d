/**
 * Search Intent Extraction
 * 
 * Turns a chat message into a complete SearchIntent. The semantic parsing
 * is delegated to the intent model; everything after the model call is
 * deterministic:
 * 
 * 1. No credential for the model's provider -> fallback, no call made
 * 2. Call with a bounded timeout (timeout / provider error -> fallback)
 * 3. Strip code fences, parse JSON, coerce field by field with defaults
 *    (not a JSON object -> fallback)
 * 
 * The fallback searches the raw message as keywords with default paging.
 * This function never throws; the result says which path produced the intent.
 */

import { z } from "zod";
import { SORT_ORDERS, type SearchIntent } from "@shared/schema";
import { generateText, isProviderConfigured } from "../llm/client";
import { getIntentModel } from "../config/models";
import { LLM_CONSTANTS, SEARCH_CONSTANTS } from "../config/constants";
import { buildSearchIntentUserPrompt, getPromptVersion, getSearchIntentSystemPrompt } from "../config/prompts";
import { ProviderTimeoutError, logError } from "../utils/errorHandler";
import { formatIsoDay, parseIsoDate } from "../utils/dates";

export type FallbackReason = "no_credentials" | "provider_error" | "timeout" | "malformed_response";

export type IntentExtraction =
  | { source: "llm"; intent: SearchIntent; model: string; promptVersion: string }
  | { source: "fallback"; intent: SearchIntent; reason: FallbackReason };

function cleanText(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  if (!trimmed || trimmed.toLowerCase() === "none" || trimmed.toLowerCase() === "null") return null;
  return trimmed;
}

const optionalText = z.string().nullable().optional().catch(null).transform(cleanText);

/**
 * Model output as received. Unknown or mistyped fields fall back to null here;
 * defaults are applied when building the SearchIntent.
 */
const rawIntentSchema = z.object({
  keywords: optionalText,
  synonyms: optionalText,
  speaker: optionalText,
  preacher: optionalText,
  start_date: z.unknown(),
  end_date: z.unknown(),
  startDate: z.unknown(),
  endDate: z.unknown(),
  limit: z.unknown(),
  sort: z.enum(SORT_ORDERS).catch("relevance"),
});

type RawIntent = z.infer<typeof rawIntentSchema>;

export function coerceLimit(value: unknown): number {
  const numeric = typeof value === "number"
    ? value
    : typeof value === "string" && value.trim() !== ""
      ? Number(value.trim())
      : Number.NaN;
  if (!Number.isFinite(numeric) || numeric < 1) return SEARCH_CONSTANTS.DEFAULT_LIMIT;
  return Math.floor(numeric);
}

function coerceDate(value: unknown, field: string): Date | null {
  if (value === null || value === undefined || value === "") return null;
  const date = parseIsoDate(value);
  if (!date) {
    console.warn(`[IntentExtractor] Ignoring unparsable ${field}: ${JSON.stringify(value)}`);
  }
  return date;
}

function toSearchIntent(raw: RawIntent): SearchIntent {
  return {
    keywords: raw.keywords,
    synonyms: raw.synonyms ?? "",
    speaker: raw.speaker ?? raw.preacher,
    startDate: coerceDate(raw.start_date ?? raw.startDate, "start_date"),
    endDate: coerceDate(raw.end_date ?? raw.endDate, "end_date"),
    limit: coerceLimit(raw.limit),
    sort: raw.sort,
  };
}

export function fallbackIntent(userQuery: string): SearchIntent {
  return {
    keywords: userQuery.trim() || null,
    synonyms: "",
    speaker: null,
    startDate: null,
    endDate: null,
    limit: SEARCH_CONSTANTS.DEFAULT_LIMIT,
    sort: "relevance",
  };
}

export function stripCodeFences(text: string): string {
  return text
    .trim()
    .replace(/^```(?:json)?\s*\n?/i, "")
    .replace(/\n?```\s*$/i, "")
    .trim();
}

/**
 * Parse the model's text into a SearchIntent. Null when the text is not a JSON object.
 */
export function parseIntentResponse(text: string): SearchIntent | null {
  let payload: unknown;
  try {
    payload = JSON.parse(stripCodeFences(text));
  } catch {
    return null;
  }

  const result = rawIntentSchema.safeParse(payload);
  if (!result.success) return null;
  return toSearchIntent(result.data);
}

function fallback(userQuery: string, reason: FallbackReason): IntentExtraction {
  console.warn(`[IntentExtractor] Using literal keyword search (${reason})`);
  return { source: "fallback", intent: fallbackIntent(userQuery), reason };
}

export async function extractSearchIntent(userQuery: string, today: Date = new Date()): Promise<IntentExtraction> {
  const model = getIntentModel();

  let configured = false;
  try {
    configured = isProviderConfigured(model);
  } catch (error) {
    logError("IntentExtractor", error);
    return fallback(userQuery, "provider_error");
  }
  if (!configured) {
    return fallback(userQuery, "no_credentials");
  }

  try {
    const response = await generateText({
      model,
      messages: [
        { role: "system", content: getSearchIntentSystemPrompt(formatIsoDay(today)) },
        { role: "user", content: buildSearchIntentUserPrompt(userQuery) },
      ],
      temperature: 0,
      maxTokens: LLM_CONSTANTS.INTENT_MAX_TOKENS,
      timeoutMs: LLM_CONSTANTS.INTENT_TIMEOUT_MS,
    });

    const intent = parseIntentResponse(response.text);
    if (!intent) {
      return fallback(userQuery, "malformed_response");
    }

    const promptVersion = getPromptVersion("SEARCH_INTENT_PROMPT");
    console.log(
      `[IntentExtractor] ${response.provider}/${response.model} prompt=${promptVersion} keywords=${JSON.stringify(intent.keywords)} speaker=${JSON.stringify(intent.speaker)} limit=${intent.limit} sort=${intent.sort}`,
    );
    return { source: "llm", intent, model: response.model, promptVersion };
  } catch (error) {
    if (error instanceof ProviderTimeoutError) {
      return fallback(userQuery, "timeout");
    }
    logError("IntentExtractor", error);
    return fallback(userQuery, "provider_error");
  }
}
