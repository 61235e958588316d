/**
 * Application Constants
 * 
 * Centralized configuration values used across the application.
 * Consolidates magic numbers and hardcoded values for easier maintenance.
 */

/**
 * Catalog sheet configuration
 */
export const CATALOG_CONSTANTS = {
  /**
   * How long a successful catalog load is reused before the sheet is read again.
   * Staleness up to this window is acceptable.
   */
  CACHE_TTL_MS: 600_000,

  /** Header names of the catalog sheet (matched after trimming). */
  COLUMNS: {
    TITLE: "Title",
    SPEAKER: "Preacher",
    DATE: "Date",
    DOWNLOAD_LINK: "DownloadLink",
  },

  DEFAULT_SHEET_RANGE: "A:Z",

  /** Placeholder used when a row has no download link. */
  MISSING_LINK: "#",
} as const;

/**
 * Search and ranking tuning.
 *
 * The fuzzy thresholds were tuned against the live catalog. Keep them
 * exact unless the similarity metric changes.
 */
export const SEARCH_CONSTANTS = {
  DEFAULT_LIMIT: 10,

  /** Synonyms are only searched when the exact pass returns fewer records than this. */
  SUGGESTED_PASS_TRIGGER: 10,

  /** Upper bound on rendered results once suggestions are mixed in. */
  DISPLAY_CAP: 20,

  /** Score given to every record of a filter-only query (no keywords). */
  FILTER_ONLY_SCORE: 100,

  /** Per-topic partial similarity must be strictly above this to count. */
  TOPIC_MATCH_THRESHOLD: 80,

  STOP_WORDS: [
    "message",
    "messages",
    "sermon",
    "sermons",
    "preaching",
    "preached",
    "series",
    "audio",
    "mp3",
    "living",
    "walking",
  ],
} as const;

export const NAME_MATCH_CONSTANTS = {
  /** Query literally contained in the candidate. */
  CONTAINED_THRESHOLD: 95,
  /** Alias-expanded query against the candidate. */
  ALIAS_THRESHOLD: 80,
  /** Names this short must match the whole candidate closely ("Seun" is not "Segun"). */
  SHORT_NAME_MAX_LENGTH: 5,
  SHORT_NAME_THRESHOLD: 95,
  LONG_NAME_THRESHOLD: 75,

  TITLES: [
    "pastor",
    "apostle",
    "rev",
    "reverend",
    "prophet",
    "evangelist",
    "min",
    "minister",
    "dr",
    "mr",
    "mrs",
    "pst",
  ],

  ALIASES: {
    dami: "damilola",
    temi: "temitope",
    ibk: "ibukun",
  },
} as const;

/**
 * Pagination of the chat transcript
 */
export const PAGINATION_CONSTANTS = {
  /** Records appended by each "load more" action. */
  PAGE_SIZE: 10,
} as const;

/**
 * LLM call configuration
 */
export const LLM_CONSTANTS = {
  /** Upper bound on the intent extraction call before falling back. */
  INTENT_TIMEOUT_MS: 15_000,
  INTENT_MAX_TOKENS: 1000,
} as const;

export const SESSION_CONSTANTS = {
  SESSION_TTL_MS: 7 * 24 * 60 * 60 * 1000,
  DEV_SESSION_SECRET: "dev-session-secret",
} as const;
