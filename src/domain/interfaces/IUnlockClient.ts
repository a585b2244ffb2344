/**
 * Unlock service port
 * Drives a remote torrent through register -> metadata -> select -> links -> unrestrict
 */

import type { TorrentFile, TorrentHandle } from '../entities';

export interface IUnlockClient {
  /**
   * Registers a magnet with the service
   * @throws RemoteError, or EMPTY_HANDLE when the service returns no id
   */
  register(magnet: string, signal?: AbortSignal): Promise<TorrentHandle>;

  /**
   * Polls until the torrent's file manifest is known
   * @throws METADATA_TIMEOUT once the attempt budget is spent, CANCELLED on abort
   */
  awaitMetadata(handle: TorrentHandle, signal?: AbortSignal): Promise<TorrentFile[]>;

  /**
   * Selects exactly one file for download
   * @throws INVALID_SELECTION for the "no file" id 0
   */
  selectFile(handle: TorrentHandle, fileId: number, signal?: AbortSignal): Promise<void>;

  /**
   * Polls until the selected content is cached and at least one link is exposed
   * @throws LINKS_TIMEOUT once the attempt budget is spent, CANCELLED on abort
   */
  awaitReadyLinks(handle: TorrentHandle, signal?: AbortSignal): Promise<string[]>;

  /**
   * Exchanges a hoster or ready link for a direct download URL
   * @throws RemoteError, or EMPTY_DOWNLOAD_URL when the response omits it
   */
  unrestrict(link: string, signal?: AbortSignal): Promise<string>;
}
