/**
 * Unit tests for ResolveStreamUseCase
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ResolveStreamUseCase } from './ResolveStreamUseCase';
import type { IUnlockClient, ILogger } from '../../domain/interfaces';
import type { StreamDescriptor, TorrentFile } from '../../domain/entities';
import { CancelledError, RemoteError, ResolutionError, ResolutionErrorCode } from '../../domain/errors';
import { FileSelector } from '../../infrastructure/torrent/FileSelector';
import { RealDebridClient } from '../../infrastructure/unlock/RealDebridClient';
import { FakeUnlockService } from '../../__mocks__/unlockService';

const hashOnly: StreamDescriptor = {
    name: 'Indexer\n1080p',
    title: 'Movie.2019.1080p.WEB\n👤 12',
    url: '',
    infoHash: 'ABCDEF',
    sources: ['tracker:udp://tracker.test:80', 'dht:abcdef', 'tracker:udp://tracker.test:80']
};
const synthesized = 'magnet:?xt=urn:btih:abcdef&tr=udp%3A%2F%2Ftracker.test%3A80';

const manifest: TorrentFile[] = [
    { localIndex: 0, remoteFileId: 1, path: '/Movie/readme.txt', bytes: 999999 },
    { localIndex: 1, remoteFileId: 2, path: '/Movie/Movie.mkv', bytes: 500 },
    { localIndex: 2, remoteFileId: 3, path: '/Movie/Movie.Extended.mp4', bytes: 700 }
];

describe('ResolveStreamUseCase', () => {
    let useCase: ResolveStreamUseCase;
    let mockUnlockClient: IUnlockClient;
    let mockLogger: ILogger;

    beforeEach(() => {
        mockUnlockClient = {
            register: vi.fn().mockResolvedValue({ remoteId: 'T1' }),
            awaitMetadata: vi.fn().mockResolvedValue(manifest),
            selectFile: vi.fn().mockResolvedValue(undefined),
            awaitReadyLinks: vi.fn().mockResolvedValue(['https://unlock.test/d/L1', 'https://unlock.test/d/L2']),
            unrestrict: vi.fn().mockResolvedValue('https://cdn.unlock.test/movie.mp4')
        };

        mockLogger = {
            log: vi.fn(),
            error: vi.fn(),
            warn: vi.fn(),
            info: vi.fn(),
            debug: vi.fn()
        };

        useCase = new ResolveStreamUseCase(mockUnlockClient, new FileSelector(), mockLogger);
    });

    describe('no playable source', () => {
        it('should fail with NO_PLAYABLE_SOURCE when url and info-hash are empty', async () => {
            const result = await useCase.execute({
                descriptor: { name: 'x', title: 'y', url: '', infoHash: '', sources: ['tracker:t'] },
                unlockEnabled: true
            });

            expect(result).toEqual({
                success: false,
                code: ResolutionErrorCode.NO_PLAYABLE_SOURCE,
                error: 'Stream does not include a playable URL'
            });
            expect(mockUnlockClient.register).not.toHaveBeenCalled();
        });

        it('should fail the same way with unlocking disabled', async () => {
            const result = await useCase.execute({
                descriptor: { name: '', title: '', url: 'ftp://nowhere', sources: [] },
                unlockEnabled: false
            });

            expect(result.success).toBe(false);
        });
    });

    describe('direct urls', () => {
        const direct: StreamDescriptor = { ...hashOnly, url: 'https://cdn.test/movie.mkv' };

        it('should return the url unchanged when unlocking is disabled', async () => {
            const result = await useCase.execute({ descriptor: direct, unlockEnabled: false });

            expect(result).toEqual({ success: true, url: 'https://cdn.test/movie.mkv', source: 'direct-url', unlocked: false });
            expect(mockUnlockClient.unrestrict).not.toHaveBeenCalled();
        });

        it('should unrestrict the url when unlocking is enabled', async () => {
            const result = await useCase.execute({ descriptor: direct, unlockEnabled: true });

            expect(result).toEqual({ success: true, url: 'https://cdn.unlock.test/movie.mp4', source: 'direct-url', unlocked: true });
            expect(mockUnlockClient.unrestrict).toHaveBeenCalledWith('https://cdn.test/movie.mkv', undefined);
            expect(mockUnlockClient.register).not.toHaveBeenCalled();
        });

        it('should fall back to the raw url when unrestricting fails', async () => {
            vi.mocked(mockUnlockClient.unrestrict).mockRejectedValue(new RemoteError(401, '{"error":"bad_token"}'));

            const result = await useCase.execute({ descriptor: direct, unlockEnabled: true });

            expect(result).toEqual({
                success: true,
                url: 'https://cdn.test/movie.mkv',
                source: 'direct-url',
                unlocked: false,
                fallbackReason: ResolutionErrorCode.REMOTE_ERROR
            });
            expect(mockLogger.warn).toHaveBeenCalledWith(expect.stringContaining('Unlock failed for Indexer / Movie.2019.1080p.WEB'));
        });

        it('should fall back on unexpected non-domain errors too', async () => {
            vi.mocked(mockUnlockClient.unrestrict).mockRejectedValue(new TypeError('boom'));

            const result = await useCase.execute({ descriptor: direct, unlockEnabled: true });

            expect(result).toMatchObject({ success: true, url: 'https://cdn.test/movie.mkv', fallbackReason: ResolutionErrorCode.REMOTE_ERROR });
        });
    });

    describe('magnets', () => {
        it('should return the synthesized magnet without any unlock call when disabled', async () => {
            const result = await useCase.execute({ descriptor: hashOnly, unlockEnabled: false });

            expect(result).toEqual({ success: true, url: synthesized, source: 'hash-synthesized', unlocked: false });
            expect(mockUnlockClient.register).not.toHaveBeenCalled();
            expect(mockUnlockClient.unrestrict).not.toHaveBeenCalled();
        });

        it('should use a magnet url verbatim', async () => {
            const magnet = 'magnet:?xt=urn:btih:FFFF&dn=Movie';

            const result = await useCase.execute({ descriptor: { ...hashOnly, url: magnet }, unlockEnabled: false });

            expect(result).toEqual({ success: true, url: magnet, source: 'magnet-uri', unlocked: false });
        });

        it('should drive the whole unlock lifecycle in order', async () => {
            const result = await useCase.execute({ descriptor: hashOnly, unlockEnabled: true });

            expect(result).toEqual({ success: true, url: 'https://cdn.unlock.test/movie.mp4', source: 'hash-synthesized', unlocked: true });
            expect(mockUnlockClient.register).toHaveBeenCalledTimes(1);
            expect(mockUnlockClient.register).toHaveBeenCalledWith(synthesized, undefined);
            expect(mockUnlockClient.selectFile).toHaveBeenCalledTimes(1);
            expect(mockUnlockClient.selectFile).toHaveBeenCalledWith({ remoteId: 'T1' }, 3, undefined);
            expect(mockUnlockClient.unrestrict).toHaveBeenCalledWith('https://unlock.test/d/L1', undefined);
        });

        it('should pass the explicit file index to the selector', async () => {
            await useCase.execute({ descriptor: { ...hashOnly, fileIndex: 0 }, unlockEnabled: true });

            expect(mockUnlockClient.selectFile).toHaveBeenCalledWith({ remoteId: 'T1' }, 1, undefined);
        });

        it('should forward the cancellation signal to every step', async () => {
            const controller = new AbortController();

            await useCase.execute({ descriptor: hashOnly, unlockEnabled: true, signal: controller.signal });

            expect(mockUnlockClient.register).toHaveBeenCalledWith(synthesized, controller.signal);
            expect(mockUnlockClient.awaitMetadata).toHaveBeenCalledWith({ remoteId: 'T1' }, controller.signal);
            expect(mockUnlockClient.awaitReadyLinks).toHaveBeenCalledWith({ remoteId: 'T1' }, controller.signal);
        });

        it('should fall back to the magnet when waiting for links fails', async () => {
            vi.mocked(mockUnlockClient.awaitReadyLinks).mockRejectedValue(
                new ResolutionError(ResolutionErrorCode.LINKS_TIMEOUT, 'Timed out waiting for ready links after 30 attempts')
            );

            const result = await useCase.execute({ descriptor: hashOnly, unlockEnabled: true });

            expect(result).toEqual({
                success: true,
                url: synthesized,
                source: 'hash-synthesized',
                unlocked: false,
                fallbackReason: ResolutionErrorCode.LINKS_TIMEOUT
            });
            expect(mockUnlockClient.unrestrict).not.toHaveBeenCalled();
            expect(mockLogger.warn).toHaveBeenCalledWith(
                'Unlock failed for Indexer / Movie.2019.1080p.WEB in phase file-selected ' +
                '(LINKS_TIMEOUT: Timed out waiting for ready links after 30 attempts), falling back to hash-synthesized'
            );
        });

        it('should report the phase reached when registration fails', async () => {
            vi.mocked(mockUnlockClient.register).mockRejectedValue(new RemoteError(401, 'bad_token'));

            await useCase.execute({ descriptor: hashOnly, unlockEnabled: true });

            expect(mockLogger.warn).toHaveBeenCalledWith(expect.stringContaining('Unlock failed for Indexer / Movie.2019.1080p.WEB in phase idle (REMOTE_ERROR'));
        });

        it('should resolve a tracker with an unpaired surrogate instead of failing', async () => {
            const descriptor: StreamDescriptor = JSON.parse('{"name":"","title":"","url":"","infoHash":"ABC","sources":["tracker:udp://x\\ud800"]}');

            const result = await useCase.execute({ descriptor, unlockEnabled: false });

            expect(result).toEqual({
                success: true,
                url: 'magnet:?xt=urn:btih:abc&tr=udp%3A%2F%2Fx%EF%BF%BD',
                source: 'hash-synthesized',
                unlocked: false
            });
        });

        it('should stop without selecting when the manifest yields no file', async () => {
            vi.mocked(mockUnlockClient.awaitMetadata).mockResolvedValue([]);

            const result = await useCase.execute({ descriptor: hashOnly, unlockEnabled: true });

            expect(result).toMatchObject({ url: synthesized, fallbackReason: ResolutionErrorCode.INVALID_SELECTION });
            expect(mockUnlockClient.selectFile).not.toHaveBeenCalled();
        });

        it('should report cancellation distinctly while still falling back', async () => {
            vi.mocked(mockUnlockClient.awaitMetadata).mockRejectedValue(new CancelledError());

            const result = await useCase.execute({ descriptor: hashOnly, unlockEnabled: true });

            expect(result).toMatchObject({ success: true, url: synthesized, fallbackReason: ResolutionErrorCode.CANCELLED });
            expect(mockLogger.warn).toHaveBeenCalledWith('Unlock cancelled for Indexer / Movie.2019.1080p.WEB in phase registered, falling back to hash-synthesized');
        });
    });

    describe('against the unlock service stand-in', () => {
        it('should return the synthesized magnet when the service fails while waiting for links', async () => {
            const service = new FakeUnlockService({
                files: [{ id: 1, path: '/Movie/Movie.mkv', bytes: 100 }],
                failures: { info: { status: 503, body: 'maintenance', onCall: 2 } }
            });
            const client = new RealDebridClient(service.createTransport(), mockLogger, { sleep: async () => {} });
            const resolver = new ResolveStreamUseCase(client, new FileSelector(), mockLogger);

            const result = await resolver.execute({ descriptor: hashOnly, unlockEnabled: true });

            expect(result).toEqual({
                success: true,
                url: synthesized,
                source: 'hash-synthesized',
                unlocked: false,
                fallbackReason: ResolutionErrorCode.REMOTE_ERROR
            });
            expect(service.callsTo('addMagnet')).toHaveLength(1);
            expect(service.callsTo('selectFiles')).toHaveLength(1);
            expect(service.callsTo('unrestrict')).toHaveLength(0);
        });

        it('should unlock end to end when the service cooperates', async () => {
            const service = new FakeUnlockService({
                files: [
                    { id: 1, path: '/Show/sample.mkv', bytes: 10 },
                    { id: 2, path: '/Show/S01E01.mkv', bytes: 900 }
                ],
                metadataReadyAfter: 1,
                linksReadyAfter: 2,
                download: 'https://cdn.unlock.test/S01E01.mkv'
            });
            const client = new RealDebridClient(service.createTransport(), mockLogger, { sleep: async () => {} });
            const resolver = new ResolveStreamUseCase(client, new FileSelector(), mockLogger);

            const result = await resolver.execute({ descriptor: hashOnly, unlockEnabled: true });

            expect(result).toEqual({ success: true, url: 'https://cdn.unlock.test/S01E01.mkv', source: 'hash-synthesized', unlocked: true });
            expect(service.callsTo('selectFiles')[0].form).toEqual({ files: '2' });
            expect(service.callsTo('info')).toHaveLength(5);
        });

        it('should make no unlock-service request when unlocking is disabled', async () => {
            const service = new FakeUnlockService();
            const client = new RealDebridClient(service.createTransport(), mockLogger);
            const resolver = new ResolveStreamUseCase(client, new FileSelector(), mockLogger);

            const result = await resolver.execute({ descriptor: hashOnly, unlockEnabled: false });

            expect(result).toMatchObject({ url: synthesized });
            expect(service.calls).toHaveLength(0);
        });
    });
});
