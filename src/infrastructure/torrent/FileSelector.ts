import config from '../../config';
import type { IFileSelector } from '../../domain/interfaces/IFileSelector';
import { NO_FILE_ID, type TorrentFile } from '../../domain/entities';

/**
 * Picks the file to unlock from a torrent manifest
 * An explicit index always wins; otherwise the largest video-like file, then the first file
 */
export class FileSelector implements IFileSelector {
    constructor(private videoExtensions: readonly string[] = config.VIDEO_EXTENSIONS) { }

    select(files: readonly TorrentFile[], explicitIndex?: number): number {
        if (files.length === 0) {
            return NO_FILE_ID;
        }

        if (explicitIndex !== undefined && Number.isInteger(explicitIndex) && explicitIndex >= 0 && explicitIndex < files.length) {
            return files[explicitIndex].remoteFileId;
        }

        let bestId = NO_FILE_ID;
        let bestBytes = -1;
        for (const file of files) {
            if (!this.isLikelyVideo(file.path)) {
                continue;
            }
            // Strict comparison: on a tie the earlier file keeps its place
            if (file.bytes > bestBytes) {
                bestId = file.remoteFileId;
                bestBytes = file.bytes;
            }
        }

        if (bestId !== NO_FILE_ID) {
            return bestId;
        }

        return files[0].remoteFileId;
    }

    isLikelyVideo(filePath: string): boolean {
        const lower = filePath.toLowerCase();
        return this.videoExtensions.some(ext => lower.endsWith(ext));
    }
}
