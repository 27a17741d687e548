import { createStore, type StoreApi } from 'zustand/vanilla';
import { normalizeUrl } from './http-utils';
import type { ProgressManager } from './progress-manager';
import type { ListenerOptions, ProgressInfo, TransferDirection, Unsubscribe } from './types';

export type TransferStatus = 'active' | 'completed' | 'failed';

export interface TransferState {
    url: string;
    direction: TransferDirection;
    status: TransferStatus;
    info: ProgressInfo | null;
    error?: string;
}

export interface ProgressStoreState {
    transfers: Record<string, TransferState>;
    record: (key: string, state: TransferState) => void;
    forget: (key: string) => void;
}

export type ProgressStore = StoreApi<ProgressStoreState>;

export const transferKey = (direction: TransferDirection, url: string): string => `${direction}:${normalizeUrl(url)}`;

/**
 * Latest snapshot per URL and direction, for UI code that renders from state
 * instead of registering its own listeners.
 */
export function createProgressStore(): ProgressStore {
    return createStore<ProgressStoreState>()((set) => ({
        transfers: {},
        record: (key, state) => set((current) => ({ transfers: { ...current.transfers, [key]: state } })),
        forget: (key) =>
            set((current) => {
                if (!(key in current.transfers)) return current;
                const { [key]: _removed, ...rest } = current.transfers;
                return { transfers: rest };
            }),
    }));
}

/**
 * Registers a listener that mirrors the transfers of `url` into `store`.
 * The returned function removes the listener and the stored entry.
 */
export function bindProgressStore(
    manager: ProgressManager,
    store: ProgressStore,
    url: string,
    direction: TransferDirection,
    options?: ListenerOptions
): Unsubscribe {
    const key = transferKey(direction, url);
    const listener = {
        onProgress(info: ProgressInfo) {
            store.getState().record(key, {
                url,
                direction,
                status: info.finished ? 'completed' : 'active',
                info,
            });
        },
        onError(_id: number, cause: unknown) {
            const previous = store.getState().transfers[key];
            store.getState().record(key, {
                url,
                direction,
                status: 'failed',
                info: previous?.info ?? null,
                error: cause instanceof Error ? cause.message : String(cause),
            });
        },
    };
    const unsubscribe =
        direction === 'upload'
            ? manager.addRequestListener(url, listener, options)
            : manager.addResponseListener(url, listener, options);
    return () => {
        unsubscribe();
        store.getState().forget(key);
    };
}
