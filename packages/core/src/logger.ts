export type LogLevel = 'info' | 'warn' | 'error';

export type LogEntry = {
    ts: string;
    level: LogLevel;
    scope: string;
    message: string;
    stack?: string;
    context?: Record<string, string>;
};

export type LogSink = (entry: LogEntry) => void;

type LogContext = {
    scope?: string;
    url?: string;
    extra?: Record<string, string>;
};

const SENSITIVE_KEYS = [
    'token',
    'access_token',
    'password',
    'pass',
    'apikey',
    'api_key',
    'key',
    'secret',
    'auth',
    'authorization',
    'signature',
    'session',
    'cookie',
];

const consoleSink: LogSink = (entry) => {
    if (entry.level === 'info') return;
    const line = `[${entry.scope}] ${entry.message}`;
    if (entry.level === 'warn') {
        console.warn(line, entry.context ?? '');
    } else {
        console.error(line, entry.context ?? '', entry.stack ?? '');
    }
};

let sink: LogSink = consoleSink;

/**
 * Replace the destination of log entries. Pass `null` to restore the console sink.
 */
export const setLogSink = (next: LogSink | null): void => {
    sink = next ?? consoleSink;
};

const isSensitiveKey = (key: string): boolean => {
    const keyLower = key.toLowerCase();
    return SENSITIVE_KEYS.some((s) => keyLower.includes(s));
};

export function sanitizeUrl(raw: string): string {
    try {
        const parsed = new URL(raw);
        parsed.username = '';
        parsed.password = '';
        for (const key of Array.from(parsed.searchParams.keys())) {
            if (isSensitiveKey(key)) {
                parsed.searchParams.set(key, 'redacted');
            }
        }
        return parsed.toString();
    } catch {
        return raw;
    }
}

export function sanitizeLogMessage(value: string): string {
    let result = value.replace(/(Authorization:\s*)(Basic|Bearer)\s+[A-Za-z0-9+/=._-]+/gi, '$1$2 [redacted]');
    result = result.replace(
        /(password|pass|token|access_token|api_key|apikey|authorization|secret|session|cookie)=([^\s&]+)/gi,
        '$1=[redacted]'
    );
    return result;
}

function sanitizeContext(context: LogContext | undefined): Record<string, string> | undefined {
    const extra: Record<string, string> = { ...(context?.extra ?? {}) };
    if (context?.url) {
        extra.url = context.url;
    }
    if (Object.keys(extra).length === 0) return undefined;
    const sanitized: Record<string, string> = {};
    for (const [key, value] of Object.entries(extra)) {
        if (key === 'url') {
            sanitized[key] = sanitizeUrl(value);
        } else if (isSensitiveKey(key)) {
            sanitized[key] = '[redacted]';
        } else {
            sanitized[key] = sanitizeLogMessage(String(value));
        }
    }
    return sanitized;
}

function write(level: LogLevel, message: string, context: LogContext | undefined, stack?: string): void {
    const entry: LogEntry = {
        ts: new Date().toISOString(),
        level,
        scope: context?.scope ?? level,
        message: sanitizeLogMessage(message),
        stack: stack ? sanitizeLogMessage(stack) : undefined,
        context: sanitizeContext(context),
    };
    try {
        sink(entry);
    } catch (error) {
        if (sink !== consoleSink) {
            consoleSink({ ...entry, level: 'error', message: `Log sink failed: ${String(error)}` });
        }
    }
}

export function logInfo(message: string, context?: LogContext): void {
    write('info', message, context);
}

export function logWarn(message: string, context?: LogContext): void {
    write('warn', message, context);
}

export function logError(error: unknown, context: LogContext): void {
    const message = error instanceof Error ? error.message : String(error);
    const stack = error instanceof Error ? error.stack : undefined;
    write('error', message, context, stack);
}
