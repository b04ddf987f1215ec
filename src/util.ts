
import type ArrayBufferSlice from './ArrayBufferSlice.js';

export function assert(b: boolean, message: string = ""): asserts b {
    if (!b)
        throw new Error(`Assert fail: ${message}`);
}

export function readString(buffer: ArrayBufferSlice, offs: number, length: number = -1, nulTerminated: boolean = true): string {
    const buf = buffer.createTypedArray(Uint8Array, offs);
    if (length < 0)
        length = buf.byteLength;
    let S = '';
    for (let i = 0; i < length; i++) {
        if (nulTerminated && buf[i] === 0)
            break;
        S += String.fromCharCode(buf[i]);
    }
    return S;
}

// Requires that multiple is a power of two.
export function align(n: number, multiple: number): number {
    const mask = (multiple - 1);
    return (n + mask) & ~mask;
}

export function leftPad(S: string, spaces: number, ch: string = '0'): string {
    return S.padStart(spaces, ch);
}

export function hexzero(n: number, spaces: number): string {
    let S = (n >>> 0).toString(16);
    return leftPad(S, spaces);
}

export function hexzero0x(n: number, spaces: number = 8): string {
    if (n < 0)
        return `-0x${hexzero(-n, spaces)}`;
    else
        return `0x${hexzero(n, spaces)}`;
}

export function clamp(v: number, min: number, max: number): number {
    return Math.max(min, Math.min(v, max));
}
