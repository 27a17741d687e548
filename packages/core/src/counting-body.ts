import { logWarn } from './logger';
import { createProgressInfo, UNKNOWN_LENGTH } from './progress-info';
import type { ListenerList, ProgressInfo, TransferDirection } from './types';

export type ProgressSink = {
    progress(listeners: ListenerList, info: ProgressInfo): void;
    error(listeners: ListenerList, id: number, cause: unknown): void;
};

export type CountingBodyOptions = {
    id: number;
    url: string;
    direction: TransferDirection;
    /** Declared size in bytes, negative when unknown. */
    contentLength: number;
    listeners: ListenerList;
    refreshIntervalMs: number;
    sink: ProgressSink;
    now?: () => number;
    /** Called once when the transfer fails or is cancelled, after listeners were notified. */
    onFailure?: (cause: unknown) => void;
};

/**
 * Wraps `source` in a stream that counts the bytes pulled through it and reports
 * throttled progress to `listeners`.
 *
 * An emission happens on the first chunk, whenever `refreshIntervalMs` has elapsed
 * since the previous one, and once more when the transfer finishes. A read failure
 * is reported to the listeners and then rethrown to the consumer unchanged.
 */
export function createCountingBody(
    source: ReadableStream<Uint8Array>,
    options: CountingBodyOptions
): ReadableStream<Uint8Array> {
    const now = options.now ?? Date.now;
    const { id, listeners, sink, refreshIntervalMs } = options;
    const contentLength = options.contentLength >= 0 ? options.contentLength : UNKNOWN_LENGTH;
    const reader = source.getReader();

    const startedAt = now();
    let lastEmitMillis: number | null = null;
    let lastEmittedBytes = 0;
    let currentBytes = 0;
    let settled = false;
    let cancelled = false;

    const emit = (timestamp: number, finished: boolean) => {
        const info = createProgressInfo({
            id,
            contentLength,
            currentBytes,
            eachBytes: currentBytes - lastEmittedBytes,
            intervalMs: timestamp - (lastEmitMillis ?? startedAt),
            finished,
        });
        lastEmitMillis = timestamp;
        lastEmittedBytes = currentBytes;
        if (finished) {
            settled = true;
        }
        sink.progress(listeners, info);
    };

    const fail = (cause: unknown) => {
        if (settled) return;
        settled = true;
        logWarn(`${options.direction === 'upload' ? 'Upload' : 'Download'} body failed`, {
            scope: 'progress',
            url: options.url,
            extra: { id: String(id), bytes: String(currentBytes) },
        });
        sink.error(listeners, id, cause);
        options.onFailure?.(cause);
    };

    return new ReadableStream<Uint8Array>({
        async pull(controller) {
            let result: ReadableStreamReadResult<Uint8Array>;
            try {
                result = await reader.read();
            } catch (error) {
                fail(error);
                controller.error(error);
                return;
            }
            if (cancelled) return;

            if (result.done) {
                if (!settled) {
                    emit(now(), true);
                }
                controller.close();
                return;
            }

            const chunk = result.value;
            currentBytes += chunk.byteLength;
            if (!settled) {
                const timestamp = now();
                const finished = contentLength !== UNKNOWN_LENGTH && currentBytes === contentLength;
                if (finished || lastEmitMillis === null || timestamp - lastEmitMillis >= refreshIntervalMs) {
                    emit(timestamp, finished);
                }
            }
            controller.enqueue(chunk);
        },
        async cancel(reason) {
            cancelled = true;
            fail(reason ?? new Error('Transfer cancelled'));
            await reader.cancel(reason);
        },
    });
}
