/**
 * In-process stand-in for the unlock service, plugged in as an axios adapter
 */

import axios, {
    AxiosError,
    type AxiosAdapter,
    type AxiosInstance,
    type AxiosResponse,
    type InternalAxiosRequestConfig
} from 'axios';

export type UnlockRoute = 'addMagnet' | 'info' | 'selectFiles' | 'unrestrict';

export interface FakeRemoteFile {
    id: number;
    path: string;
    bytes: number;
}

export interface FakeFailure {
    status: number;
    body?: unknown;
    // Fail only on the nth call to the route (1-based); every call when omitted
    onCall?: number;
}

export interface FakeUnlockScript {
    torrentId?: string;
    files?: FakeRemoteFile[];
    // Info polls answered with an empty manifest before it appears
    metadataReadyAfter?: number;
    // Info polls after selection answered without links
    linksReadyAfter?: number;
    links?: string[];
    download?: string;
    failures?: Partial<Record<UnlockRoute, FakeFailure>>;
    // Lets a response be replaced, or reach back into the test (e.g. to abort)
    respond?: (call: RecordedCall) => { status: number; data: unknown } | undefined;
    networkErrorOn?: UnlockRoute;
}

export interface RecordedCall {
    route: UnlockRoute;
    method: string;
    url: string;
    form: Record<string, string>;
    headers: Record<string, string>;
    callNumber: number;
}

function routeOf(method: string, url: string): UnlockRoute {
    if (method === 'post' && url === '/torrents/addMagnet') return 'addMagnet';
    if (method === 'get' && url.startsWith('/torrents/info/')) return 'info';
    if (method === 'post' && url.startsWith('/torrents/selectFiles/')) return 'selectFiles';
    if (method === 'post' && url === '/unrestrict/link') return 'unrestrict';
    throw new Error(`Unexpected unlock request: ${method.toUpperCase()} ${url}`);
}

function headersOf(config: InternalAxiosRequestConfig): Record<string, string> {
    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(config.headers.toJSON())) {
        if (typeof value === 'string') {
            headers[key.toLowerCase()] = value;
        }
    }
    return headers;
}

export class FakeUnlockService {
    readonly calls: RecordedCall[] = [];
    private selected = false;
    private infoCalls = 0;
    private infoCallsSinceSelection = 0;

    constructor(private script: FakeUnlockScript = {}) { }

    callsTo(route: UnlockRoute): RecordedCall[] {
        return this.calls.filter(call => call.route === route);
    }

    createTransport(headers: Record<string, string> = {}): AxiosInstance {
        return axios.create({ adapter: this.adapter, validateStatus: () => true, headers });
    }

    readonly adapter: AxiosAdapter = async (config) => {
        const method = (config.method ?? 'get').toLowerCase();
        const url = config.url ?? '';
        const route = routeOf(method, url);
        const call: RecordedCall = {
            route,
            method,
            url,
            form: typeof config.data === 'string' ? Object.fromEntries(new URLSearchParams(config.data)) : {},
            headers: headersOf(config),
            callNumber: this.calls.filter(c => c.route === route).length + 1
        };
        this.calls.push(call);

        if (this.script.networkErrorOn === route) {
            throw new AxiosError('socket hang up', 'ECONNRESET', config);
        }

        const override = this.script.respond?.(call);
        if (override) {
            return this.reply(config, override.status, override.data);
        }

        const failure = this.script.failures?.[route];
        if (failure && (failure.onCall === undefined || failure.onCall === call.callNumber)) {
            return this.reply(config, failure.status, failure.body ?? '');
        }

        switch (route) {
            case 'addMagnet':
                return this.reply(config, 201, { id: this.script.torrentId ?? 'TORRENT1', uri: 'https://unlock.test/torrents/TORRENT1' });
            case 'info':
                return this.reply(config, 200, this.info());
            case 'selectFiles':
                this.selected = true;
                return this.reply(config, 204, '');
            case 'unrestrict':
                return this.reply(config, 200, {
                    id: 'DL1',
                    download: this.script.download ?? 'https://download.unlock.test/d/DL1/movie.mkv'
                });
        }
    };

    private info(): Record<string, unknown> {
        this.infoCalls++;
        if (this.selected) {
            this.infoCallsSinceSelection++;
        }

        const manifestVisible = this.infoCalls > (this.script.metadataReadyAfter ?? 0);
        const linksVisible = this.selected && this.infoCallsSinceSelection > (this.script.linksReadyAfter ?? 0);

        return {
            id: this.script.torrentId ?? 'TORRENT1',
            status: linksVisible ? 'downloaded' : manifestVisible ? 'waiting_files_selection' : 'magnet_conversion',
            files: manifestVisible ? (this.script.files ?? []) : [],
            links: linksVisible ? (this.script.links ?? ['https://unlock.test/d/LINK1']) : []
        };
    }

    private reply(config: InternalAxiosRequestConfig, status: number, data: unknown): AxiosResponse<unknown> {
        return { data, status, statusText: String(status), headers: {}, config };
    }
}
