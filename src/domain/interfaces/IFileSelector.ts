/**
 * Interface for choosing which file of a multi-file torrent to unlock
 */

import type { TorrentFile } from '../entities';

export interface IFileSelector {
  /**
   * Picks the file to unlock
   * @param explicitIndex - 0-based manifest position requested by the stream source
   * @returns Remote file id, or 0 when the manifest is empty
   */
  select(files: readonly TorrentFile[], explicitIndex?: number): number;
}
