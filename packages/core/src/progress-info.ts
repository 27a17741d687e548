import { formatDuration } from 'date-fns';
import type { ProgressInfo } from './types';

export const UNKNOWN_LENGTH = -1;
export const OUT_OF_BAND_ID = -1;

export function createProgressInfo(fields: ProgressInfo): ProgressInfo {
    return Object.freeze({ ...fields });
}

/**
 * Whole-number percentage, `-1` while the length is unknown.
 */
export function getPercent(info: ProgressInfo): number {
    if (info.finished) return 100;
    if (info.contentLength <= 0) return -1;
    return Math.min(100, Math.floor((info.currentBytes * 100) / info.contentLength));
}

/** Bytes per second over the last emission interval. */
export function getSpeed(info: ProgressInfo): number {
    if (info.intervalMs <= 0) return 0;
    return Math.round((info.eachBytes * 1000) / info.intervalMs);
}

export function estimateRemainingMs(info: ProgressInfo): number | null {
    if (info.finished) return 0;
    if (info.contentLength <= 0) return null;
    const speed = getSpeed(info);
    if (speed <= 0) return null;
    const remaining = Math.max(0, info.contentLength - info.currentBytes);
    return Math.ceil((remaining * 1000) / speed);
}

export function formatRemaining(info: ProgressInfo): string | null {
    const remainingMs = estimateRemainingMs(info);
    if (remainingMs === null) return null;
    if (remainingMs < 1000) return 'less than a second';
    const totalSeconds = Math.floor(remainingMs / 1000);
    return formatDuration({
        days: Math.floor(totalSeconds / 86_400),
        hours: Math.floor((totalSeconds % 86_400) / 3_600),
        minutes: Math.floor((totalSeconds % 3_600) / 60),
        seconds: totalSeconds % 60,
    });
}
