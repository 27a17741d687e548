export type TransferDirection = 'upload' | 'download';

/**
 * Immutable snapshot of one body's transfer state.
 * A fresh object is created for every emission.
 */
export interface ProgressInfo {
    readonly id: number;
    /** Declared total size in bytes, `-1` when unknown. */
    readonly contentLength: number;
    readonly currentBytes: number;
    /** Bytes counted since the previous emission. */
    readonly eachBytes: number;
    /** Milliseconds since the previous emission (or since the transfer started). */
    readonly intervalMs: number;
    readonly finished: boolean;
}

/**
 * Receives progress for every transfer whose URL it was registered under.
 * `onError` gets the transfer id, or `-1` when the failure was reported out of band.
 */
export interface ProgressListener {
    onProgress(info: ProgressInfo): void;
    onError(id: number, cause: unknown): void;
}

export type ListenerList = ProgressListener[];

export type ListenerOptions = {
    /** Removes the registration when aborted. */
    signal?: AbortSignal;
};

export type Unsubscribe = () => void;

export interface Scheduler {
    schedule(task: () => void): void;
}
