/**
 * Centralized Prompt Configuration
 * 
 * All LLM prompts are maintained in this single location for:
 * - Easy maintenance and updates
 * - Version tracking via git and versions.ts
 * 
 * Structure:
 * - search.ts: Search intent extraction (query -> JSON filters)
 * - versions.ts: Prompt version registry and change log
 */

export * from "./search";
export * from "./versions";
