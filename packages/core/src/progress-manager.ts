import { createCountingBody, type ProgressSink } from './counting-body';
import { getBodyInitLength, isAbortError, parseContentLength } from './http-utils';
import { ListenerRegistry } from './listener-registry';
import { logError, logInfo } from './logger';
import { UNKNOWN_LENGTH } from './progress-info';
import type { ListenerOptions, ProgressListener, Scheduler, TransferDirection, Unsubscribe } from './types';

export const DEFAULT_REFRESH_INTERVAL_MS = 150;

export type ProgressManagerOptions = {
    /** Transport that performs the exchange. Defaults to the global `fetch`. */
    fetcher?: typeof fetch;
    refreshIntervalMs?: number;
    /** Context listener callbacks run on. Ignored when `registry` is given. */
    scheduler?: Scheduler;
    registry?: ListenerRegistry;
    now?: () => number;
};

export type InterceptRequestOptions = {
    /** Body size when the request carries no `content-length` header. */
    contentLength?: number;
};

export type ProgressFetch = (input: RequestInfo | URL, init?: RequestInit) => Promise<Response>;

type StreamingRequestInit = RequestInit & { duplex: 'half' };

const assertRefreshInterval = (value: number): number => {
    if (!Number.isFinite(value) || value < 0) {
        throw new Error(`Refresh interval must be a non-negative number of milliseconds, got ${value}`);
    }
    return value;
};

const isEncodedBody = (headers: Headers): boolean => {
    const encoding = headers.get('content-encoding')?.trim().toLowerCase();
    return !!encoding && encoding !== 'identity';
};

/**
 * Reports upload and download progress of fetch exchanges to the listeners
 * registered for their URL.
 *
 * Use {@link ProgressManager.fetch} (or {@link createProgressFetch}) in place of the
 * global `fetch`, or call {@link ProgressManager.interceptRequest} and
 * {@link ProgressManager.interceptResponse} from an existing interceptor chain.
 */
export class ProgressManager {
    readonly registry: ListenerRegistry;
    private readonly fetcher: typeof fetch;
    private readonly now: () => number;
    private readonly sink: ProgressSink;
    private readonly failedUploads = new WeakSet<Request>();
    private refreshIntervalMs: number;
    private nextId = 1;

    constructor(options: ProgressManagerOptions = {}) {
        const fetcher = options.fetcher ?? (typeof fetch === 'function' ? fetch : undefined);
        if (typeof fetcher !== 'function') {
            throw new Error('ProgressManager requires a fetch implementation');
        }
        this.fetcher = fetcher;
        this.now = options.now ?? Date.now;
        this.refreshIntervalMs = assertRefreshInterval(options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS);
        this.registry = options.registry ?? new ListenerRegistry({ scheduler: options.scheduler });
        this.sink = {
            progress: (listeners, info) => this.registry.deliverProgress(listeners, info),
            error: (listeners, id, cause) => this.registry.deliverError(listeners, id, cause),
        };
    }

    /**
     * Minimum time between two progress callbacks of one transfer.
     * Applies to transfers that start after the call.
     */
    setRefreshInterval(milliseconds: number): void {
        this.refreshIntervalMs = assertRefreshInterval(milliseconds);
    }

    getRefreshInterval(): number {
        return this.refreshIntervalMs;
    }

    addRequestListener(url: string, listener: ProgressListener, options?: ListenerOptions): Unsubscribe {
        return this.registry.addRequestListener(url, listener, options);
    }

    addResponseListener(url: string, listener: ProgressListener, options?: ListenerOptions): Unsubscribe {
        return this.registry.addResponseListener(url, listener, options);
    }

    removeRequestListener(url: string, listener: ProgressListener): boolean {
        return this.registry.removeRequestListener(url, listener);
    }

    removeResponseListener(url: string, listener: ProgressListener): boolean {
        return this.registry.removeResponseListener(url, listener);
    }

    notifyError(url: string, cause: unknown): void {
        this.registry.notifyError(url, cause);
    }

    /**
     * Returns a copy of `request` whose body counts the bytes sent, or `request`
     * itself when it has no body or nobody listens to its URL.
     */
    interceptRequest(request: Request, options: InterceptRequestOptions = {}): Request {
        if (!request.body) return request;
        const listeners = this.registry.lookupRequest(request.url);
        if (!listeners) return request;

        const contentLength = options.contentLength ?? parseContentLength(request.headers);
        let wrapped: Request | null = null;
        const body = this.wrapBody(request.body, request.url, 'upload', contentLength, listeners, () => {
            if (wrapped) this.failedUploads.add(wrapped);
        });
        const init: StreamingRequestInit = { body, duplex: 'half' };
        wrapped = new Request(request, init);
        return wrapped;
    }

    /**
     * Remaps listeners when `response` redirects, otherwise returns a copy whose body
     * counts the bytes received. `response` comes back unchanged when there is
     * nothing to track.
     *
     * Listeners are looked up on `response.url` first, which is the last hop when
     * the transport followed redirects itself, then on the request URL.
     */
    interceptResponse(response: Response, request: Request | string): Response {
        const requestUrl = typeof request === 'string' ? request : request.url;
        if (this.registry.resolveRedirect(requestUrl, response)) return response;
        if (!response.body) return response;
        const url = response.url && this.registry.lookupResponse(response.url) ? response.url : requestUrl;
        const listeners = this.registry.lookupResponse(url);
        if (!listeners) return response;

        const contentLength = isEncodedBody(response.headers) ? UNKNOWN_LENGTH : parseContentLength(response.headers);
        const body = this.wrapBody(response.body, url, 'download', contentLength, listeners);
        const wrapped = new Response(body, {
            status: response.status,
            statusText: response.statusText,
            headers: response.headers,
        });
        // Not settable through ResponseInit.
        for (const property of ['url', 'redirected', 'type'] as const) {
            Object.defineProperty(wrapped, property, { value: response[property], enumerable: true });
        }
        return wrapped;
    }

    /**
     * `fetch` with progress reporting. A failure of the transport itself is reported
     * to the URL's listeners and rethrown.
     */
    async fetch(input: RequestInfo | URL, init?: RequestInit): Promise<Response> {
        const request = new Request(input, init);
        const declaredLength = getBodyInitLength(init?.body);
        const outgoing = this.interceptRequest(
            request,
            declaredLength >= 0 ? { contentLength: declaredLength } : undefined
        );

        const fetcher = this.fetcher;
        let response: Response;
        try {
            response = await fetcher(outgoing);
        } catch (error) {
            if (isAbortError(error)) {
                logInfo('Request aborted', { scope: 'transport', url: request.url });
            } else {
                logError(error, { scope: 'transport', url: request.url });
            }
            const uploadReported = outgoing !== request && this.failedUploads.has(outgoing);
            this.registry.notifyError(request.url, error, uploadReported ? ['download'] : ['upload', 'download']);
            throw error;
        }
        return this.interceptResponse(response, request);
    }

    private wrapBody(
        source: ReadableStream<Uint8Array>,
        url: string,
        direction: TransferDirection,
        contentLength: number,
        listeners: ProgressListener[],
        onFailure?: (cause: unknown) => void
    ): ReadableStream<Uint8Array> {
        return createCountingBody(source, {
            id: this.nextId++,
            url,
            direction,
            contentLength,
            listeners,
            refreshIntervalMs: this.refreshIntervalMs,
            sink: this.sink,
            now: this.now,
            onFailure,
        });
    }
}

export function createProgressFetch(manager: ProgressManager): ProgressFetch {
    return (input, init) => manager.fetch(input, init);
}
