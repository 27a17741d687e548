export const REDIRECT_STATUSES: ReadonlySet<number> = new Set([301, 302, 303, 307]);

const TAG_PREFIX = 'progress=';

export const isAbortError = (error: unknown): boolean => {
    if (typeof error !== 'object' || error === null || !('name' in error)) return false;
    return error.name === 'AbortError';
};

/**
 * Canonical form used as a registry key, so `http://a` and `http://a/` match.
 */
export const normalizeUrl = (rawUrl: string): string => {
    try {
        return new URL(rawUrl).href;
    } catch {
        return rawUrl;
    }
};

/**
 * Appends a fragment that tells transfers to the same endpoint apart.
 * Fetch never sends the fragment to the server.
 */
export const tagUrl = (rawUrl: string, tag: string | number): string => {
    const hashIndex = rawUrl.indexOf('#');
    const base = hashIndex === -1 ? rawUrl : rawUrl.slice(0, hashIndex);
    return normalizeUrl(`${base}#${TAG_PREFIX}${encodeURIComponent(String(tag))}`);
};

export const parseContentLength = (headers: Headers): number => {
    const raw = headers.get('content-length');
    if (!raw || !/^\d+$/.test(raw.trim())) return -1;
    const value = Number(raw.trim());
    return Number.isSafeInteger(value) ? value : -1;
};

/**
 * Size of a request body known before it is turned into a stream, or `-1`.
 */
export const getBodyInitLength = (body: BodyInit | null | undefined): number => {
    if (body === null || body === undefined) return -1;
    if (typeof body === 'string') return new TextEncoder().encode(body).byteLength;
    if (body instanceof ArrayBuffer) return body.byteLength;
    if (ArrayBuffer.isView(body)) return body.byteLength;
    if (typeof Blob === 'function' && body instanceof Blob) return body.size;
    if (body instanceof URLSearchParams) return new TextEncoder().encode(body.toString()).byteLength;
    return -1;
};

export const isRedirectStatus = (status: number): boolean => REDIRECT_STATUSES.has(status);

/**
 * Redirect target of a response, resolved against the request URL, or `null`
 * when the response is not a redirect or carries no usable `Location`.
 */
export const getRedirectTarget = (response: Response, requestUrl: string): string | null => {
    if (!isRedirectStatus(response.status)) return null;
    const location = response.headers.get('location')?.trim();
    if (!location) return null;
    try {
        return new URL(location, requestUrl).href;
    } catch {
        return location;
    }
};
