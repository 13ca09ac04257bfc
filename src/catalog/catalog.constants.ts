/**
 * Menu search thresholds and confidences.
 */
export const SEARCH_CONFIDENCE = {
  EXACT: 1.0,
  KEYWORD: 0.8,

  /** Similarity hits below this are discarded */
  MIN_SCORE: 0.4,

  /** Best similarity below this reports not-found */
  NOT_FOUND: 0.55,

  /** Best similarity at or above this needs no confirmation */
  HIGH: 0.75,
} as const;

export const SEARCH_DEFAULTS = {
  TOP_K: 5,
  /** Query tokens shorter than this are ignored by keyword matching */
  MIN_KEYWORD_LENGTH: 3,
} as const;
