export const RATE_LIMITS = {
  API: {
    windowMs: 15 * 60 * 1000,
    max: 1000
  }
} as const;

export const AUTH = {
  SCHEME: 'Bearer',
  DEFAULT_INTERNAL_TOKEN_LENGTH: 64,
  DEFAULT_CACHE_TTL_SECONDS: 300, // 5 minutes
  DEFAULT_CACHE_MAX_ENTRIES: 10_000
} as const;

export const PAGINATION = {
  DEFAULT_TAKE: 50,
  MAX_TAKE: 1000
} as const;

export const DOWNSTREAM = {
  DEFAULT_TIMEOUT_MS: 5000
} as const;

// ERC20 tokens carry no integration layer id of their own
export const ERC20_BLOCKCHAIN_TYPE = 'Ethereum';
