// seconds
export const CacheTTL = {
  // writes invalidate dashboard keys, so this only bounds drift from direct store edits
  DASHBOARD: 300,
  DEFAULT: 900,
} as const;
