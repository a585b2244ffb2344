/**
 * Domain entities for stream candidates and the unlock service's torrent view
 * These are domain models, independent of infrastructure
 */

/**
 * A candidate playback source discovered by a stream indexer, prior to resolution
 */
export interface StreamDescriptor {
  readonly name: string;
  readonly title: string;
  readonly url: string;
  readonly infoHash?: string;
  // 0-based position in the torrent's file manifest
  readonly fileIndex?: number;
  // Some entries are prefixed `tracker:`
  readonly sources: readonly string[];
}

/**
 * Remote torrent registered with the unlock service for one resolution attempt
 */
export interface TorrentHandle {
  readonly remoteId: string;
}

export interface TorrentFile {
  localIndex: number;
  // Service-assigned, >= 1; 0 means "no file"
  remoteFileId: number;
  path: string;
  bytes: number;
}

export const NO_FILE_ID = 0;
