export const WORKOUT_CONSTANTS = {
  // Heuristic time under tension per set, used for template estimates only
  ASSUMED_SET_DURATION_SECONDS: 45,
  DEFAULT_TARGET_SETS: 3,
  DEFAULT_REST_SECONDS: 60,
  COPY_SUFFIX: " (Copy)",
} as const;

export const LOG_CONSTANTS = {
  MAX_BULK_ITEMS: 100,
  MIN_PERCEIVED_EXERTION: 1,
  MAX_PERCEIVED_EXERTION: 10,
} as const;

export const SESSION_CONSTANTS = {
  MIN_RATING: 1,
  MAX_RATING: 5,
} as const;

export const PAGINATION = {
  DEFAULT_PAGE_SIZE: 20,
  DEFAULT_LOG_PAGE_SIZE: 50,
  MAX_PAGE_SIZE: 100,
} as const;

export const STORE_NAMES = {
  IDENTITY: "identity",
  PROFILE: "profile",
  DOCUMENT: "document",
} as const;
