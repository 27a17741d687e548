import { logError } from './logger';
import type { Scheduler } from './types';

type Enqueue = (drain: () => void) => void;

/**
 * Serial task queue: tasks run one at a time, in the order they were scheduled,
 * on whatever context `enqueue` hands the drain to (a microtask by default).
 */
export function createSerialScheduler(enqueue: Enqueue = queueMicrotask): Scheduler {
    const queue: Array<() => void> = [];
    let draining = false;

    const drain = () => {
        try {
            while (queue.length > 0) {
                const task = queue.shift();
                if (!task) continue;
                try {
                    task();
                } catch (error) {
                    logError(error, { scope: 'scheduler' });
                }
            }
        } finally {
            draining = false;
        }
    };

    return {
        schedule(task) {
            queue.push(task);
            if (draining) return;
            draining = true;
            enqueue(drain);
        },
    };
}

export const immediateScheduler: Scheduler = {
    schedule(task) {
        try {
            task();
        } catch (error) {
            logError(error, { scope: 'scheduler' });
        }
    },
};
