import { FetchError } from "./errors";

const USER_AGENT = "Mozilla/5.0";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type QueryParams = Record<string, string | number>;

export interface PageCache {
    getPage(url: string): string | undefined;
    setPage(url: string, body: string): void;
}

export interface PageFetcher {
    fetch(endpoint: string, params?: QueryParams): Promise<string>;
}

export interface CachingFetcherOptions {
    baseUrl: string;
    cache: PageCache;
    /** Abort a request after this many milliseconds. Default: 30000 */
    timeoutMs?: number;
    fetchImpl?: FetchLike;
}

/**
 * Assemble the canonical URL used both for the request and as the cache key.
 * Query parameters are sorted by key so the same lookup always maps to the same key.
 * Example: ("https://host", "/list", { b: 2, a: 1 }) -> "https://host/list?a=1&b=2"
 */
export function buildUrl(baseUrl: string, endpoint: string, params: QueryParams = {}): string {
    let url: string;
    if (/^https?:\/\//i.test(endpoint)) {
        url = endpoint;
    } else {
        const base = baseUrl.replace(/\/+$/, "");
        url = endpoint.startsWith("/") ? `${base}${endpoint}` : `${base}/${endpoint}`;
    }

    const keys = Object.keys(params).sort();
    if (keys.length === 0) {
        return url;
    }

    const query = new URLSearchParams(keys.map((key): [string, string] => [key, String(params[key])]));
    return `${url}${url.includes("?") ? "&" : "?"}${query.toString()}`;
}

/**
 * GETs pages and remembers every body under its canonical URL.
 * A cached body is returned as-is for as long as the cache lives.
 */
export class CachingFetcher implements PageFetcher {
    private readonly baseUrl: string;
    private readonly cache: PageCache;
    private readonly timeoutMs: number;
    private readonly fetchImpl: FetchLike;

    constructor(options: CachingFetcherOptions) {
        this.baseUrl = options.baseUrl;
        this.cache = options.cache;
        this.timeoutMs = options.timeoutMs ?? 30000;
        this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    }

    async fetch(endpoint: string, params: QueryParams = {}): Promise<string> {
        const url = buildUrl(this.baseUrl, endpoint, params);

        const cached = this.cache.getPage(url);
        if (cached !== undefined) {
            return cached;
        }

        let body: string;
        try {
            const response = await this.fetchImpl(url, {
                headers: { "User-Agent": USER_AGENT },
                redirect: "follow",
                signal: AbortSignal.timeout(this.timeoutMs),
            });

            if (!response.ok) {
                throw new Error(`Status ${response.status}`);
            }

            // Invalid UTF-8 throws here instead of being replaced with U+FFFD
            body = new TextDecoder("utf-8", { fatal: true }).decode(await response.arrayBuffer());
        } catch (error) {
            throw new FetchError(url, error);
        }

        this.cache.setPage(url, body);
        return body;
    }
}
