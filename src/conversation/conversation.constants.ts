/**
 * Turn orchestration limits.
 */
export const TURN_LIMITS = {
  /** Inference ↔ tool rounds per inbound message */
  MAX_TOOL_ROUNDS: 8,
} as const;

/**
 * Token estimation and truncation settings for the Context Budgeter.
 */
export const BUDGET_DEFAULTS = {
  CHARS_PER_TOKEN: 4,
  /** Role and framing overhead per message */
  MESSAGE_OVERHEAD_TOKENS: 4,
  /** Most recent messages kept verbatim after truncation */
  KEEP_RECENT_MESSAGES: 6,
  CEILINGS: {
    greeting: 4000,
    location: 6000,
    ordering: 12000,
    checkout: 8000,
  },
} as const;

/**
 * Model per stage when none is configured.
 */
export const STAGE_MODEL_DEFAULTS = {
  greeting: 'gpt-4o-mini',
  location: 'gpt-4o-mini',
  ordering: 'gpt-4o',
  checkout: 'gpt-4o',
} as const;
