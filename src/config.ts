/**
 * Configuration for magnet-relay
 */

import path from 'path';
import dotenv from 'dotenv';
import type { LogLevel } from './domain/interfaces/ILogger';

dotenv.config();

export interface Config {
  PORT: number;
  // Premium unlock service access token; blank disables unlocking
  UNLOCK_TOKEN: string;
  UNLOCK_API_BASE: string;
  UNLOCK_HTTP_TIMEOUT: number;
  CATALOG_API_BASE: string;
  CATALOG_HTTP_TIMEOUT: number;
  STREAM_SOURCE_API_BASE: string;
  STREAM_SOURCE_HTTP_TIMEOUT: number;
  // Umbrella deadline for one full resolve call
  RESOLVE_TIMEOUT_MS: number;
  SEARCH_RESULT_LIMIT: number;
  USER_AGENT: string;
  VIDEO_EXTENSIONS: readonly string[];
  // Runtime directory for log files
  RUNTIME_DIR: string;
  LOG_LEVEL: LogLevel;
  LOG_TO_FILE: boolean;
}

function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'warn':
      return 'warn';
    case 'error':
      return 'error';
    default:
      return 'info';
  }
}

const config: Config = {
  // Server configuration
  PORT: Number(process.env.PORT) || 3000,

  // Unlock service
  UNLOCK_TOKEN: (process.env.REALDEBRID || '').trim(),
  UNLOCK_API_BASE: process.env.UNLOCK_API_BASE || 'https://api.real-debrid.com/rest/1.0',
  UNLOCK_HTTP_TIMEOUT: 45000, // 45 seconds per request

  // Catalog and stream sources
  CATALOG_API_BASE: process.env.CATALOG_API_BASE || 'https://v3-cinemeta.strem.io',
  CATALOG_HTTP_TIMEOUT: 20000, // 20 seconds
  STREAM_SOURCE_API_BASE: process.env.STREAM_SOURCE_API_BASE || 'https://torrentio.strem.fun',
  STREAM_SOURCE_HTTP_TIMEOUT: 30000, // 30 seconds

  // register + metadata wait (~10s) + link wait (~45s) + unrestrict, with margin
  RESOLVE_TIMEOUT_MS: Number(process.env.RESOLVE_TIMEOUT_MS) || 120000,

  SEARCH_RESULT_LIMIT: 60,
  USER_AGENT: 'magnet-relay/1.0',

  // Video file extensions, matched against the end of a torrent path
  VIDEO_EXTENSIONS: ['.mkv', '.mp4', '.avi', '.mov', '.m4v', '.wmv', '.webm', '.ts'] as const,

  // Runtime directory for logs
  RUNTIME_DIR: process.env.RUNTIME_DIR || path.join(process.cwd(), '.runtime'),
  LOG_LEVEL: parseLogLevel(process.env.LOG_LEVEL),
  LOG_TO_FILE: process.env.LOG_TO_FILE === 'true'
};

/**
 * Unlocking is enabled iff a non-blank access token is configured
 */
export function isUnlockEnabled(token: string): boolean {
  return token.trim() !== '';
}

export default config;
