/**
 * Centralized LLM Model Registry
 * 
 * Single source of truth for model selection. Changing a model here
 * updates every call site.
 * 
 * The only model call in the search path is intent extraction, which
 * turns one short chat message into a JSON filter object. It needs to be
 * fast and cheap far more than it needs deep reasoning, so it defaults to
 * Gemini Flash. OpenAI and Claude models are registered so the extractor
 * can be pointed at them through INTENT_MODEL.
 */

export const LLM_MODELS = {
  /**
   * Fast, cheap OpenAI model for structured extraction.
   */
  FAST_CLASSIFICATION: "gpt-4o-mini",

  STANDARD_REASONING: "gpt-4o",
} as const;

export const GEMINI_MODELS = {
  /**
   * Fast Gemini model. Default for intent extraction.
   */
  FLASH: "gemini-2.5-flash",

  PRO: "gemini-2.5-pro",
} as const;

export const CLAUDE_MODELS = {
  HAIKU: "claude-3-5-haiku-latest",
} as const;

/**
 * Specific model assignments by task type.
 */
export const MODEL_ASSIGNMENTS = {
  INTENT_EXTRACTION: GEMINI_MODELS.FLASH,
} as const;

/**
 * Model used for intent extraction, honoring the INTENT_MODEL override.
 */
export function getIntentModel(): string {
  const override = process.env.INTENT_MODEL?.trim();
  return override || MODEL_ASSIGNMENTS.INTENT_EXTRACTION;
}
