/**
 * Polling budgets for the unlock lifecycle
 * Manifest reads are fast and bounded; caching content before links appear is slow
 */
export const METADATA_POLL = {
  ATTEMPTS: 8,
  INTERVAL_MS: 1200
} as const;

export const READY_LINKS_POLL = {
  ATTEMPTS: 30,
  INTERVAL_MS: 1500
} as const;

/**
 * Unlock service REST routes
 */
export const UNLOCK_ROUTES = {
  ADD_MAGNET: '/torrents/addMagnet',
  TORRENT_INFO: (id: string) => `/torrents/info/${encodeURIComponent(id)}`,
  SELECT_FILES: (id: string) => `/torrents/selectFiles/${encodeURIComponent(id)}`,
  UNRESTRICT_LINK: '/unrestrict/link'
} as const;
