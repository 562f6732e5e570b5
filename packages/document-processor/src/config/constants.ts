/**
 * Configuration constants for HeadingClassifier
 */
export const HEADING_CLASSIFIER = {
  /**
   * A line is a heading only when its score is strictly above this value
   */
  THRESHOLD: 4.5,

  /**
   * Body lines scoring above this value are counted as ambiguous
   */
  AMBIGUITY_THRESHOLD: 3.5,

  /**
   * A line is short when it is at most this fraction of the page median
   */
  SHORT_LINE_RATIO: 0.6,

  /**
   * Short line limit in characters when the page has no median
   */
  SHORT_LINE_FALLBACK: 60,

  WEIGHTS: {
    SHORT: 1,
    ALL_UPPER: 1.5,
    NO_TRAILING_PUNCTUATION: 0.5,
    PRECEDED_BY_BREAK: 1,
    FOLLOWED_BY_PROSE: 1,
    SECTION_VOCABULARY: 2.5,
    NUMBERED: 2,
    TERMINAL_PUNCTUATION: -3,
    NO_VERB: 0.5,
  },
} as const;

/**
 * Configuration constants for GlossaryTranslator
 */
export const GLOSSARY_TRANSLATOR = {
  /**
   * Maximum characters per translation unit
   */
  MAX_UNIT_LENGTH: 1800,

  /**
   * Maximum number of in-flight backend requests
   */
  CONCURRENCY: 4,

  /**
   * Retries after a BackendError
   */
  BACKEND_RETRIES: 2,

  /**
   * First backoff delay; doubled per retry
   */
  BACKOFF_BASE_MS: 500,

  BACKOFF_MAX_MS: 4000,

  /**
   * Time a single backend request may take before it counts as failed
   */
  UNIT_TIMEOUT_MS: 120000,

  /**
   * Extra attempts after an answer lost its math placeholders
   */
  INTEGRITY_RETRIES: 1,
} as const;

/**
 * Configuration constants for LLMTranslationBackend
 */
export const LLM_TRANSLATION = {
  MAX_RETRIES: 3,
  TEMPERATURE: 0,
} as const;
