import type { AxiosInstance, AxiosResponse } from 'axios';
import type { IUnlockClient, ILogger } from '../../domain/interfaces';
import { NO_FILE_ID, type TorrentFile, type TorrentHandle } from '../../domain/entities';
import { RemoteError, ResolutionError, ResolutionErrorCode } from '../../domain/errors';
import { describeBody, isSuccessStatus, toTransportError } from '../http/HttpErrorMapper';
import { pollUntil } from '../polling/pollUntil';
import { sleep as defaultSleep, type Sleeper } from '../polling/sleep';
import { METADATA_POLL, READY_LINKS_POLL, UNLOCK_ROUTES } from './constants/UnlockConstants';
import {
    zAddMagnetResponse,
    zTorrentInfoResponse,
    zUnrestrictResponse,
    type TorrentInfoResponse
} from './schemas';

export interface RealDebridClientOptions {
    // Wait between polls; replaced in tests
    sleep?: Sleeper;
}

/**
 * Real-Debrid style implementation of IUnlockClient
 * Requests are form-encoded, responses JSON; the transport carries the bearer token
 */
export class RealDebridClient implements IUnlockClient {
    private readonly sleep: Sleeper;

    constructor(
        private http: AxiosInstance,
        private logger: ILogger,
        options: RealDebridClientOptions = {}
    ) {
        this.sleep = options.sleep ?? defaultSleep;
    }

    async register(magnet: string, signal?: AbortSignal): Promise<TorrentHandle> {
        const response = await this.post(UNLOCK_ROUTES.ADD_MAGNET, { magnet }, signal);
        const parsed = zAddMagnetResponse.safeParse(response.data);
        const remoteId = parsed.success ? (parsed.data.id ?? '').trim() : '';

        if (remoteId === '') {
            throw new ResolutionError(ResolutionErrorCode.EMPTY_HANDLE, 'Unlock service returned an empty torrent id');
        }

        this.logger.debug(`[unlock] Registered torrent ${remoteId}`);
        return { remoteId };
    }

    async awaitMetadata(handle: TorrentHandle, signal?: AbortSignal): Promise<TorrentFile[]> {
        return pollUntil({
            attempts: METADATA_POLL.ATTEMPTS,
            intervalMs: METADATA_POLL.INTERVAL_MS,
            sleep: this.sleep,
            signal,
            probe: async (attempt) => {
                const info = await this.fetchInfo(handle, signal);
                const files = info.files ?? [];
                this.logger.debug(`[unlock] ${handle.remoteId} metadata poll ${attempt}/${METADATA_POLL.ATTEMPTS}: ${files.length} files (${info.status ?? 'unknown'})`);

                if (files.length === 0) {
                    return null;
                }

                return files.map((file, localIndex) => ({
                    localIndex,
                    remoteFileId: file.id,
                    path: file.path,
                    bytes: file.bytes
                }));
            },
            onExhausted: () => new ResolutionError(
                ResolutionErrorCode.METADATA_TIMEOUT,
                `Torrent metadata did not become available after ${METADATA_POLL.ATTEMPTS} attempts`
            )
        });
    }

    async selectFile(handle: TorrentHandle, fileId: number, signal?: AbortSignal): Promise<void> {
        if (!Number.isInteger(fileId) || fileId <= NO_FILE_ID) {
            throw new ResolutionError(ResolutionErrorCode.INVALID_SELECTION, `Invalid file id for selection: ${fileId}`);
        }

        await this.post(UNLOCK_ROUTES.SELECT_FILES(handle.remoteId), { files: String(fileId) }, signal);
        this.logger.debug(`[unlock] ${handle.remoteId} selected file ${fileId}`);
    }

    async awaitReadyLinks(handle: TorrentHandle, signal?: AbortSignal): Promise<string[]> {
        return pollUntil({
            attempts: READY_LINKS_POLL.ATTEMPTS,
            intervalMs: READY_LINKS_POLL.INTERVAL_MS,
            sleep: this.sleep,
            signal,
            probe: async (attempt) => {
                const info = await this.fetchInfo(handle, signal);
                const links = info.links ?? [];
                this.logger.debug(`[unlock] ${handle.remoteId} link poll ${attempt}/${READY_LINKS_POLL.ATTEMPTS}: ${links.length} links (${info.status ?? 'unknown'})`);
                return links.length > 0 ? links : null;
            },
            onExhausted: () => new ResolutionError(
                ResolutionErrorCode.LINKS_TIMEOUT,
                `Timed out waiting for ready links after ${READY_LINKS_POLL.ATTEMPTS} attempts`
            )
        });
    }

    async unrestrict(link: string, signal?: AbortSignal): Promise<string> {
        const response = await this.post(UNLOCK_ROUTES.UNRESTRICT_LINK, { link }, signal);
        const parsed = zUnrestrictResponse.safeParse(response.data);
        const download = parsed.success ? (parsed.data.download ?? '') : '';

        if (download === '') {
            throw new ResolutionError(ResolutionErrorCode.EMPTY_DOWNLOAD_URL, 'Unlock service returned an empty download link');
        }

        return download;
    }

    private async fetchInfo(handle: TorrentHandle, signal?: AbortSignal): Promise<TorrentInfoResponse> {
        const response = await this.send({ method: 'get', url: UNLOCK_ROUTES.TORRENT_INFO(handle.remoteId), signal });
        const parsed = zTorrentInfoResponse.safeParse(response.data);

        if (!parsed.success) {
            throw new RemoteError(response.status, `Unexpected torrent info payload: ${describeBody(response.data)}`);
        }

        return parsed.data;
    }

    private post(route: string, form: Record<string, string>, signal?: AbortSignal): Promise<AxiosResponse<unknown>> {
        return this.send({
            method: 'post',
            url: route,
            data: new URLSearchParams(form),
            headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
            signal
        });
    }

    private async send(request: {
        method: 'get' | 'post';
        url: string;
        data?: URLSearchParams;
        headers?: Record<string, string>;
        signal?: AbortSignal;
    }): Promise<AxiosResponse<unknown>> {
        let response: AxiosResponse<unknown>;
        try {
            response = await this.http.request<unknown>(request);
        } catch (error) {
            throw toTransportError(error, request.signal);
        }

        if (!isSuccessStatus(response.status)) {
            throw new RemoteError(response.status, describeBody(response.data));
        }

        return response;
    }
}
