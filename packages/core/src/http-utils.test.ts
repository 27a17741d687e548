import { describe, expect, it } from 'vitest';
import {
    getBodyInitLength,
    getRedirectTarget,
    isAbortError,
    isRedirectStatus,
    normalizeUrl,
    parseContentLength,
    tagUrl,
} from './http-utils';

describe('normalizeUrl', () => {
    it('canonicalizes parseable URLs', () => {
        expect(normalizeUrl('HTTP://Files.Test')).toBe('http://files.test/');
        expect(normalizeUrl('http://files.test/a b')).toBe('http://files.test/a%20b');
    });

    it('keeps strings that are not absolute URLs', () => {
        expect(normalizeUrl('/relative/path')).toBe('/relative/path');
    });
});

describe('tagUrl', () => {
    it('appends a progress fragment', () => {
        expect(tagUrl('http://files.test/upload', 'avatar')).toBe('http://files.test/upload#progress=avatar');
    });

    it('replaces an existing fragment', () => {
        expect(tagUrl('http://files.test/upload#section', 2)).toBe('http://files.test/upload#progress=2');
    });

    it('does not change the URL a request is sent to', () => {
        const request = new Request(tagUrl('http://files.test/upload', 'first'));
        expect(new URL(request.url).hash).toBe('#progress=first');
        expect(request.url.split('#')[0]).toBe('http://files.test/upload');
    });
});

describe('parseContentLength', () => {
    it('reads a numeric header', () => {
        expect(parseContentLength(new Headers({ 'content-length': '2048' }))).toBe(2048);
    });

    it('returns -1 when missing or malformed', () => {
        expect(parseContentLength(new Headers())).toBe(-1);
        expect(parseContentLength(new Headers({ 'content-length': 'abc' }))).toBe(-1);
        expect(parseContentLength(new Headers({ 'content-length': '-5' }))).toBe(-1);
    });
});

describe('getBodyInitLength', () => {
    it('measures bodies with a known size', () => {
        expect(getBodyInitLength('héllo')).toBe(6);
        expect(getBodyInitLength(new Uint8Array(12))).toBe(12);
        expect(getBodyInitLength(new ArrayBuffer(7))).toBe(7);
        expect(getBodyInitLength(new Blob(['abcd']))).toBe(4);
        expect(getBodyInitLength(new URLSearchParams({ q: 'x y' }))).toBe(5);
    });

    it('returns -1 for streams and missing bodies', () => {
        expect(getBodyInitLength(undefined)).toBe(-1);
        expect(getBodyInitLength(null)).toBe(-1);
        expect(getBodyInitLength(new ReadableStream<Uint8Array>())).toBe(-1);
    });
});

describe('redirects', () => {
    it('recognizes the redirect statuses', () => {
        expect([301, 302, 303, 307].every(isRedirectStatus)).toBe(true);
        expect(isRedirectStatus(200)).toBe(false);
        expect(isRedirectStatus(308)).toBe(false);
    });

    it('resolves the Location header', () => {
        const response = new Response(null, { status: 302, headers: { location: '../b' } });
        expect(getRedirectTarget(response, 'http://files.test/dir/a')).toBe('http://files.test/b');
    });

    it('returns null for non-redirects', () => {
        const response = new Response(null, { status: 204, headers: { location: 'http://files.test/b' } });
        expect(getRedirectTarget(response, 'http://files.test/a')).toBeNull();
    });
});

describe('isAbortError', () => {
    it('detects abort errors by name', () => {
        expect(isAbortError(new DOMException('aborted', 'AbortError'))).toBe(true);
        expect(isAbortError(new Error('aborted'))).toBe(false);
        expect(isAbortError(null)).toBe(false);
    });
});
