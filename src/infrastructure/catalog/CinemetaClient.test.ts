import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CinemetaClient } from './CinemetaClient';
import { FakeAddonService } from '../../__mocks__/addonService';
import type { ILogger } from '../../domain/interfaces';
import { RemoteError } from '../../domain/errors';

const metas = (prefix: string, count: number) =>
    Array.from({ length: count }, (_, i) => ({ id: `${prefix}${i}`, name: `${prefix} ${i}`, type: prefix, year: 2000 + i }));

describe('CinemetaClient', () => {
    let mockLogger: ILogger;

    beforeEach(() => {
        mockLogger = { log: vi.fn(), error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
    });

    function setup(service: FakeAddonService, limit?: number) {
        return new CinemetaClient(service.createTransport({ 'Accept-Language': 'en-US,en;q=0.9' }), mockLogger, limit);
    }

    describe('fetchPopular', () => {
        it('should normalize entries and drop those without id or name', async () => {
            const service = new FakeAddonService({
                '/catalog/movie/top.json': {
                    data: {
                        metas: [
                            { id: 'tt1', name: 'First', year: '1999', poster: 'https://img.test/1.jpg' },
                            { id: '', name: 'No id' },
                            { id: 'tt2', name: '' },
                            { id: 'tt3', name: 'Third', type: 'movie', year: 2004.0 }
                        ]
                    }
                },
                '/catalog/series/top.json': { data: { metas: [{ id: 'tt9', name: 'Show', year: '2011–2019' }] } }
            });

            const result = await setup(service).fetchPopular();

            expect(result).toEqual({
                movies: [
                    { id: 'tt1', name: 'First', type: 'movie', year: 1999, poster: 'https://img.test/1.jpg' },
                    { id: 'tt3', name: 'Third', type: 'movie', year: 2004, poster: '' }
                ],
                shows: [{ id: 'tt9', name: 'Show', type: 'series', year: 0, poster: '' }]
            });
            expect(service.calls.map(call => call.url)).toEqual(['/catalog/movie/top.json', '/catalog/series/top.json']);
        });

        it('should treat a missing metas array as empty', async () => {
            const service = new FakeAddonService({
                '/catalog/movie/top.json': { data: {} },
                '/catalog/series/top.json': { data: { metas: null } }
            });

            await expect(setup(service).fetchPopular()).resolves.toEqual({ movies: [], shows: [] });
        });

        it('should fail with the status and body of a non-2xx response', async () => {
            const service = new FakeAddonService({ '/catalog/movie/top.json': { status: 500, data: ' upstream down ' } });

            const error = await setup(service).fetchPopular().catch((e: unknown) => e);

            expect(error).toBeInstanceOf(RemoteError);
            expect(error).toMatchObject({ status: 500, body: 'upstream down' });
            expect(service.calls).toHaveLength(1);
        });
    });

    describe('search', () => {
        it('should return nothing without a request for a blank query', async () => {
            const service = new FakeAddonService();

            await expect(setup(service).search('   ')).resolves.toEqual([]);
            expect(service.calls).toHaveLength(0);
        });

        it('should list movies before series and cap the result', async () => {
            const service = new FakeAddonService({
                '/catalog/movie/top/search=the%20matrix.json': { data: { metas: metas('movie', 40) } },
                '/catalog/series/top/search=the%20matrix.json': { data: { metas: metas('series', 40) } }
            });

            const results = await setup(service).search('  the matrix ');

            expect(results).toHaveLength(60);
            expect(results[0].id).toBe('movie0');
            expect(results[39].id).toBe('movie39');
            expect(results[40].id).toBe('series0');
            expect(results[59].id).toBe('series19');
        });

        it('should honour a custom limit', async () => {
            const service = new FakeAddonService({
                '/catalog/movie/top/search=x.json': { data: { metas: metas('movie', 3) } },
                '/catalog/series/top/search=x.json': { data: { metas: metas('series', 3) } }
            });

            const results = await setup(service, 4).search('x');

            expect(results.map(item => item.id)).toEqual(['movie0', 'movie1', 'movie2', 'series0']);
        });

        it('should report the movie failure when both lookups fail', async () => {
            const service = new FakeAddonService({
                '/catalog/movie/top/search=x.json': { status: 503, data: 'movies down' },
                '/catalog/series/top/search=x.json': { status: 500, data: 'series down' }
            });

            await expect(setup(service).search('x')).rejects.toMatchObject({ status: 503, body: 'movies down' });
            expect(service.calls).toHaveLength(2);
        });

        it('should fail when only the series lookup fails', async () => {
            const service = new FakeAddonService({
                '/catalog/movie/top/search=x.json': { data: { metas: metas('movie', 1) } }
            }).failWithNetworkError('/catalog/series/top/search=x.json');

            await expect(setup(service).search('x'))
                .rejects.toMatchObject({ status: 0, body: 'ECONNREFUSED: connect ECONNREFUSED' });
        });

        it('should send the catalog headers', async () => {
            const service = new FakeAddonService({
                '/catalog/movie/top/search=x.json': { data: { metas: [] } },
                '/catalog/series/top/search=x.json': { data: { metas: [] } }
            });

            await setup(service).search('x');

            expect(service.calls[0].headers['accept-language']).toBe('en-US,en;q=0.9');
        });
    });

    describe('fetchSeriesEpisodes', () => {
        it('should group, sort and deduplicate episodes, skipping specials', async () => {
            const service = new FakeAddonService({
                '/meta/series/tt42.json': {
                    data: {
                        meta: {
                            videos: [
                                { season: 2, episode: 3 },
                                { season: 1, episode: 2 },
                                { season: 2, episode: 1 },
                                { season: 1, episode: 2 },
                                { season: 0, episode: 1 },
                                { season: 1, episode: 1 },
                                { season: 3 }
                            ]
                        }
                    }
                }
            });

            const result = await setup(service).fetchSeriesEpisodes('tt42');

            expect(result).toEqual(new Map([[2, [1, 3]], [1, [1, 2]]]));
        });

        it('should default to a single first episode when nothing is listed', async () => {
            const service = new FakeAddonService({ '/meta/series/tt7.json': { data: { meta: { videos: [] } } } });

            const result = await setup(service).fetchSeriesEpisodes('tt7');

            expect(result).toEqual(new Map([[1, [1]]]));
        });

        it('should reject a payload of the wrong shape', async () => {
            const service = new FakeAddonService({ '/meta/series/tt7.json': { data: { meta: { videos: 'none' } } } });

            await expect(setup(service).fetchSeriesEpisodes('tt7')).rejects.toBeInstanceOf(RemoteError);
        });

        it('should escape the id in the path', async () => {
            const service = new FakeAddonService({ '/meta/series/a%2Fb.json': { data: { meta: {} } } });

            await expect(setup(service).fetchSeriesEpisodes('a/b')).resolves.toEqual(new Map([[1, [1]]]));
        });
    });
});
