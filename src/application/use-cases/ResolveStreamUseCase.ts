/**
 * Use case for resolving a stream descriptor into one playable URL
 * Owns the fallback policy: an unlock failure never blocks playback
 */

import type { IUnlockClient, IFileSelector, ILogger } from '../../domain/interfaces';
import { NO_FILE_ID, type StreamDescriptor } from '../../domain/entities';
import { ResolutionError, ResolutionErrorCode, isResolutionError } from '../../domain/errors';
import { classifyDescriptor, type PlayableSourceKind } from '../../domain/value-objects/PlayableSource';
import {
    INITIAL_UNLOCK_STATE,
    advance,
    fail,
    type FailedUnlockState,
    type UnlockPhase,
    type UnlockState
} from '../../domain/value-objects/UnlockState';

export interface ResolveStreamRequest {
    descriptor: StreamDescriptor;
    unlockEnabled: boolean;
    signal?: AbortSignal;
}

export type ResolveStreamResponse =
    | {
        success: true;
        url: string;
        source: PlayableSourceKind;
        unlocked: boolean;
        // Set when unlocking was attempted and the url is the degraded fallback
        fallbackReason?: ResolutionErrorCode;
    }
    | {
        success: false;
        code: ResolutionErrorCode.NO_PLAYABLE_SOURCE;
        error: string;
    };

type UnlockOutcome =
    | { ok: true; url: string }
    | { ok: false; state: FailedUnlockState; error: unknown };

export class ResolveStreamUseCase {
    constructor(
        private unlockClient: IUnlockClient,
        private fileSelector: IFileSelector,
        private logger: ILogger
    ) { }

    async execute(request: ResolveStreamRequest): Promise<ResolveStreamResponse> {
        const { descriptor, unlockEnabled, signal } = request;
        const source = classifyDescriptor(descriptor);
        const label = labelOf(descriptor);

        switch (source.kind) {
            case 'direct-url': {
                if (!unlockEnabled) {
                    return { success: true, url: source.url, source: source.kind, unlocked: false };
                }

                try {
                    const url = await this.unlockClient.unrestrict(source.url, signal);
                    this.logger.info(`Unrestricted direct link for ${label}`);
                    return { success: true, url, source: source.kind, unlocked: true };
                } catch (error) {
                    return this.fallback(source.url, source.kind, error, label);
                }
            }

            case 'magnet-uri':
            case 'hash-synthesized': {
                if (source.magnet === '') {
                    this.logger.warn(`No playable source for ${label}`);
                    return {
                        success: false,
                        code: ResolutionErrorCode.NO_PLAYABLE_SOURCE,
                        error: 'Stream does not include a playable URL'
                    };
                }

                if (!unlockEnabled) {
                    return { success: true, url: source.magnet, source: source.kind, unlocked: false };
                }

                const outcome = await this.unlockMagnet(source.magnet, descriptor.fileIndex, signal);
                if (!outcome.ok) {
                    return this.fallback(source.magnet, source.kind, outcome.error, label, outcome.state.from);
                }

                this.logger.info(`Unlocked ${label}`);
                return { success: true, url: outcome.url, source: source.kind, unlocked: true };
            }

            default: {
                const unreachable: never = source;
                throw new Error(`Unhandled playable source: ${JSON.stringify(unreachable)}`);
            }
        }
    }

    /**
     * register -> awaitMetadata -> pick -> select -> awaitReadyLinks -> unrestrict
     */
    private async unlockMagnet(magnet: string, fileIndex: number | undefined, signal?: AbortSignal): Promise<UnlockOutcome> {
        let state: UnlockState = INITIAL_UNLOCK_STATE;

        try {
            const handle = await this.unlockClient.register(magnet, signal);
            state = advance(state, 'registered');

            const files = await this.unlockClient.awaitMetadata(handle, signal);
            state = advance(state, 'metadata-ready');

            const fileId = this.fileSelector.select(files, fileIndex);
            if (fileId === NO_FILE_ID) {
                throw new ResolutionError(ResolutionErrorCode.INVALID_SELECTION, 'Torrent manifest has no selectable file');
            }

            await this.unlockClient.selectFile(handle, fileId, signal);
            state = advance(state, 'file-selected');
            this.logger.debug(`[unlock] ${handle.remoteId} selected file ${fileId} of ${files.length}`);

            const links = await this.unlockClient.awaitReadyLinks(handle, signal);
            state = advance(state, 'links-ready');

            const url = await this.unlockClient.unrestrict(links[0], signal);
            state = advance(state, 'unrestricted');
            return { ok: true, url };
        } catch (error) {
            return { ok: false, state: fail(state, reasonOf(error)), error };
        }
    }

    private fallback(
        url: string,
        source: PlayableSourceKind,
        error: unknown,
        label: string,
        // Last lifecycle phase reached, for magnet unlocks
        reachedPhase?: UnlockPhase
    ): ResolveStreamResponse {
        const reason = reasonOf(error);
        const message = error instanceof Error ? error.message : String(error);
        const where = reachedPhase ? ` in phase ${reachedPhase}` : '';

        if (reason === ResolutionErrorCode.CANCELLED) {
            this.logger.warn(`Unlock cancelled for ${label}${where}, falling back to ${source}`);
        } else {
            this.logger.warn(`Unlock failed for ${label}${where} (${reason}: ${message}), falling back to ${source}`);
        }

        return { success: true, url, source, unlocked: false, fallbackReason: reason };
    }
}

function reasonOf(error: unknown): ResolutionErrorCode {
    return isResolutionError(error) ? error.code : ResolutionErrorCode.REMOTE_ERROR;
}

// Indexers pack extra lines (seeders, size) into name and title
function labelOf(descriptor: StreamDescriptor): string {
    return [descriptor.name, descriptor.title]
        .map(text => text.split('\n')[0].trim())
        .filter(Boolean)
        .join(' / ') || 'stream';
}
