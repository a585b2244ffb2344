/**
 * In-process stand-in for the public catalog and stream add-ons
 */

import axios, { AxiosError, type AxiosAdapter, type AxiosInstance } from 'axios';

export interface FakeAddonReply {
    status?: number;
    data: unknown;
}

export interface RecordedAddonCall {
    url: string;
    headers: Record<string, string>;
}

export class FakeAddonService {
    readonly calls: RecordedAddonCall[] = [];
    private networkErrors = new Set<string>();

    // Unknown paths answer 404
    constructor(private routes: Record<string, FakeAddonReply> = {}) { }

    on(url: string, reply: FakeAddonReply): this {
        this.routes[url] = reply;
        return this;
    }

    failWithNetworkError(url: string): this {
        this.networkErrors.add(url);
        return this;
    }

    createTransport(headers: Record<string, string> = {}): AxiosInstance {
        return axios.create({ adapter: this.adapter, validateStatus: () => true, headers });
    }

    readonly adapter: AxiosAdapter = async (config) => {
        const url = config.url ?? '';
        const headers: Record<string, string> = {};
        for (const [key, value] of Object.entries(config.headers.toJSON())) {
            if (typeof value === 'string') {
                headers[key.toLowerCase()] = value;
            }
        }
        this.calls.push({ url, headers });

        if (this.networkErrors.has(url)) {
            throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
        }

        const reply = this.routes[url] ?? { status: 404, data: 'not found' };
        const status = reply.status ?? 200;
        return { data: reply.data, status, statusText: String(status), headers: {}, config };
    };
}
