/**
 * Prompt Version Management
 * 
 * Centralized version tracking for all prompts.
 * Uses date-based versioning: YYYY-MM-DD-NNN (e.g., 2026-02-17-001)
 * 
 * When updating a prompt:
 * 1. Increment the version number
 * 2. Update the PROMPT_CHANGE_LOG with the reason
 * 
 * The version is logged alongside every extraction so a change in
 * parsing behavior can be traced to the prompt revision that caused it.
 */

export type PromptVersions = {
    SEARCH_INTENT_PROMPT: string;
};

/**
 * Current versions for all prompts.
 * Update these when you modify a prompt.
 */
export const PROMPT_VERSIONS: PromptVersions = {
    SEARCH_INTENT_PROMPT: "2026-10-12-003",
};

export const PROMPT_CHANGE_LOG: Record<keyof PromptVersions, Array<{ version: string; reason: string; date: string }>> = {
    SEARCH_INTENT_PROMPT: [
        { version: "2026-10-12-003", reason: "Strip filler words and honorific titles before returning keywords and speaker", date: "2026-10-12" },
        { version: "2026-10-12-002", reason: "Resolve relative dates (yesterday, last week) against today's date", date: "2026-10-12" },
        { version: "2026-10-12-001", reason: "Initial search intent parser with preacher aliases and synonyms", date: "2026-10-12" }
    ],
};

/**
 * Get version for a specific prompt.
 */
export function getPromptVersion(promptName: keyof PromptVersions): string {
    return PROMPT_VERSIONS[promptName];
}
