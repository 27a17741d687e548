import { getRedirectTarget, normalizeUrl } from './http-utils';
import { logInfo, logWarn } from './logger';
import { OUT_OF_BAND_ID } from './progress-info';
import { createSerialScheduler } from './scheduler';
import type {
    ListenerList,
    ListenerOptions,
    ProgressInfo,
    ProgressListener,
    Scheduler,
    TransferDirection,
    Unsubscribe,
} from './types';

export type ListenerRegistryOptions = {
    scheduler?: Scheduler;
};

type ListenerMap = Map<string, ListenerList>;

type Registration = {
    /** Detaches the registration from its abort signal, if it has one. */
    release: () => void;
};

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * URL to listener-list maps for uploads and downloads.
 *
 * Lists are appended to and never deduplicated: registering the same listener twice
 * delivers every event to it twice. After a redirect the target URL shares the
 * original's list by reference, so later registrations on either key reach both.
 */
export class ListenerRegistry {
    private readonly requestListeners: ListenerMap = new Map();
    private readonly responseListeners: ListenerMap = new Map();
    // Parallel to each listener list, index for index.
    private readonly registrations = new WeakMap<ListenerList, Registration[]>();
    private readonly scheduler: Scheduler;

    constructor(options: ListenerRegistryOptions = {}) {
        this.scheduler = options.scheduler ?? createSerialScheduler();
    }

    addRequestListener(url: string, listener: ProgressListener, options?: ListenerOptions): Unsubscribe {
        return this.add(this.requestListeners, url, listener, options);
    }

    addResponseListener(url: string, listener: ProgressListener, options?: ListenerOptions): Unsubscribe {
        return this.add(this.responseListeners, url, listener, options);
    }

    removeRequestListener(url: string, listener: ProgressListener): boolean {
        return this.remove(this.requestListeners, url, listener);
    }

    removeResponseListener(url: string, listener: ProgressListener): boolean {
        return this.remove(this.responseListeners, url, listener);
    }

    lookupRequest(url: string): ListenerList | undefined {
        return this.requestListeners.get(normalizeUrl(url));
    }

    lookupResponse(url: string): ListenerList | undefined {
        return this.responseListeners.get(normalizeUrl(url));
    }

    lookup(direction: TransferDirection, url: string): ListenerList | undefined {
        return direction === 'upload' ? this.lookupRequest(url) : this.lookupResponse(url);
    }

    /**
     * Carries listener associations over to the redirect target in both maps.
     * A target that already has its own list keeps it.
     *
     * @returns whether the response is a redirect with a usable `Location`
     */
    resolveRedirect(requestUrl: string, response: Response): boolean {
        const origin = normalizeUrl(requestUrl);
        const target = getRedirectTarget(response, origin);
        if (!target) return false;
        for (const map of [this.requestListeners, this.responseListeners]) {
            const listeners = map.get(origin);
            if (listeners && !map.has(target)) {
                map.set(target, listeners);
            }
        }
        logInfo('Followed redirect for progress listeners', {
            scope: 'registry',
            url: origin,
            extra: { status: String(response.status), target },
        });
        return true;
    }

    /**
     * Reports a failure that happened outside the counting bodies, such as a
     * connection error before any byte was sent, to both the upload and the
     * download listeners of `url`.
     */
    notifyError(
        url: string,
        cause: unknown,
        directions: readonly TransferDirection[] = ['upload', 'download']
    ): void {
        const key = normalizeUrl(url);
        for (const direction of directions) {
            const map = direction === 'upload' ? this.requestListeners : this.responseListeners;
            const listeners = map.get(key);
            if (listeners) {
                this.deliverError(listeners, OUT_OF_BAND_ID, cause);
            }
        }
    }

    deliverProgress(listeners: ListenerList, info: ProgressInfo): void {
        const snapshot = listeners.slice();
        this.scheduler.schedule(() => {
            for (const listener of snapshot) {
                try {
                    listener.onProgress(info);
                } catch (error) {
                    logWarn('Progress listener threw', {
                        scope: 'registry',
                        extra: { id: String(info.id), error: describeError(error) },
                    });
                }
            }
        });
    }

    deliverError(listeners: ListenerList, id: number, cause: unknown): void {
        const snapshot = listeners.slice();
        this.scheduler.schedule(() => {
            for (const listener of snapshot) {
                try {
                    listener.onError(id, cause);
                } catch (error) {
                    logWarn('Error listener threw', {
                        scope: 'registry',
                        extra: { id: String(id), error: describeError(error) },
                    });
                }
            }
        });
    }

    size(): { request: number; response: number } {
        return { request: this.requestListeners.size, response: this.responseListeners.size };
    }

    clear(): void {
        for (const map of [this.requestListeners, this.responseListeners]) {
            for (const listeners of new Set(map.values())) {
                for (const registration of this.registrations.get(listeners) ?? []) {
                    registration.release();
                }
                this.registrations.delete(listeners);
            }
            map.clear();
        }
    }

    private add(map: ListenerMap, url: string, listener: ProgressListener, options?: ListenerOptions): Unsubscribe {
        const key = normalizeUrl(url);
        const signal = options?.signal;
        if (signal?.aborted) {
            return () => undefined;
        }
        let listeners = map.get(key);
        if (!listeners) {
            listeners = [];
            map.set(key, listeners);
        }
        let registrations = this.registrations.get(listeners);
        if (!registrations) {
            registrations = [];
            this.registrations.set(listeners, registrations);
        }
        listeners.push(listener);
        const registration: Registration = { release: () => undefined };
        registrations.push(registration);

        const registered = listeners;
        const unsubscribe = () => {
            this.detachRegistration(map, registered, registration);
        };
        if (signal) {
            signal.addEventListener('abort', unsubscribe, { once: true });
            registration.release = () => signal.removeEventListener('abort', unsubscribe);
        }
        return unsubscribe;
    }

    private remove(map: ListenerMap, url: string, listener: ProgressListener): boolean {
        const listeners = map.get(normalizeUrl(url));
        if (!listeners) return false;
        const index = listeners.lastIndexOf(listener);
        if (index === -1) return false;
        this.detachAt(map, listeners, index);
        return true;
    }

    private detachRegistration(map: ListenerMap, listeners: ListenerList, registration: Registration): void {
        const index = this.registrations.get(listeners)?.indexOf(registration) ?? -1;
        if (index === -1) return;
        this.detachAt(map, listeners, index);
    }

    private detachAt(map: ListenerMap, listeners: ListenerList, index: number): void {
        listeners.splice(index, 1);
        const registrations = this.registrations.get(listeners);
        const [registration] = registrations?.splice(index, 1) ?? [];
        registration?.release();
        if (listeners.length === 0) {
            for (const [key, value] of map) {
                if (value === listeners) {
                    map.delete(key);
                }
            }
        }
    }
}
