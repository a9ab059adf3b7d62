// src/text.ts
import type { Input, Source } from './types.js';

const sourceDecoder = new TextDecoder('utf-8');
// program output keeps a leading U+FEFF; source text drops it
const outputDecoder = new TextDecoder('utf-8', { ignoreBOM: true });
const encoder = new TextEncoder();

export const toText = (source: Source): string =>
    typeof source === 'string' ? source : sourceDecoder.decode(source);

export const toBytes = (input: Input | undefined): Uint8Array => {
    if (input === undefined) return new Uint8Array(0);
    return typeof input === 'string' ? encoder.encode(input) : input;
};

const decodes = (bytes: Uint8Array, stream: boolean): boolean => {
    try {
        new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes, { stream });
        return true;
    } catch (e) {
        if (e instanceof TypeError) return false;
        throw e;
    }
};

// longest prefix that some continuation could still turn into valid UTF-8
const validPrefix = (bytes: Uint8Array): number => {
    let lo = 0;
    let hi = bytes.length;
    while (lo < hi) {
        const mid = (lo + hi + 1) >> 1;
        if (decodes(bytes.subarray(0, mid), true)) {
            lo = mid;
        } else {
            hi = mid - 1;
        }
    }
    return lo;
};

/**
 * Index of the first byte that starts an undecodable sequence, or -1 when
 * `bytes` is valid UTF-8. A truncated or broken multi-byte sequence is
 * reported at its lead byte.
 */
export const firstInvalidByte = (bytes: Uint8Array): number => {
    if (decodes(bytes, false)) return -1;

    const end = validPrefix(bytes);
    if (end < bytes.length && decodes(bytes.subarray(0, end), false)) return end;

    let i = end - 1;
    while (i > 0 && (bytes[i] & 0xC0) === 0x80) i--;
    return i;
};

export const decodeOutput = (bytes: Uint8Array): string => outputDecoder.decode(bytes);
