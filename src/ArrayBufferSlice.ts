// A read-only window onto an ArrayBuffer.
//
// ArrayBuffer.prototype.slice copies, and the typed arrays and DataView have mismatched APIs for
// sub-ranges. ArrayBufferSlice gives container parsers one type to pass around: cheap sub-views
// that share storage, explicit copies when the caller asks for them.

import { assert } from "./util.js";

interface _TypedArrayConstructor<T extends ArrayBufferView> {
    readonly BYTES_PER_ELEMENT: number;
    new(buffer: ArrayBuffer, byteOffset: number, length?: number): T;
}

function isAligned(n: number, m: number) {
    return (n & (m - 1)) === 0;
}

export default class ArrayBufferSlice {
    constructor(
        // Not named "buffer" so that an ArrayBufferSlice is never mistaken for an ArrayBufferView.
        public readonly arrayBuffer: ArrayBuffer,
        public readonly byteOffset: number = 0,
        public readonly byteLength: number = arrayBuffer.byteLength - byteOffset
    ) {
        assert(byteOffset >= 0 && byteLength >= 0 && (byteOffset + byteLength) <= this.arrayBuffer.byteLength, `slice out of range`);
    }

    /**
     * Wrap the bytes of {@param a}. The slice aliases the array's storage; pass {@param copyData}
     * to detach it.
     */
    public static fromUint8Array(a: Uint8Array, copyData: boolean = false): ArrayBufferSlice {
        if (copyData || !(a.buffer instanceof ArrayBuffer)) {
            const copy = new Uint8Array(a.byteLength);
            copy.set(a);
            return new ArrayBufferSlice(copy.buffer);
        }
        return new ArrayBufferSlice(a.buffer, a.byteOffset, a.byteLength);
    }

    /**
     * Return a sub-section of the buffer starting at byte offset {@param begin} and ending at byte
     * offset {@param end}. If no value is provided for end, or it is {@constant 0}, then the end is
     * the same as this {@see ArrayBufferSlice}.
     *
     * If you want a sub-section from a begin and *length* pair, see {@see subarray}.
     */
    public slice(begin: number, end: number = 0, copyData: boolean = false): ArrayBufferSlice {
        const absBegin = this.byteOffset + begin;
        const absEnd = this.byteOffset + (end !== 0 ? end : this.byteLength);
        const byteLength = absEnd - absBegin;
        assert(byteLength >= 0 && byteLength <= this.byteLength);
        if (copyData)
            return new ArrayBufferSlice(this.arrayBuffer.slice(absBegin, absEnd));
        else
            return new ArrayBufferSlice(this.arrayBuffer, absBegin, byteLength);
    }

    /**
     * Return a sub-section of the buffer starting at byte offset {@param begin} that is
     * {@param byteLength} bytes long, or runs to the end of this slice when no length is given.
     */
    public subarray(begin: number, byteLength?: number, copyData: boolean = false): ArrayBufferSlice {
        const absBegin = this.byteOffset + begin;
        if (byteLength === undefined)
            byteLength = this.byteLength - begin;
        assert(begin >= 0 && byteLength >= 0 && begin + byteLength <= this.byteLength, `subarray out of range`);
        if (copyData)
            return new ArrayBufferSlice(this.arrayBuffer.slice(absBegin, absBegin + byteLength));
        else
            return new ArrayBufferSlice(this.arrayBuffer, absBegin, byteLength);
    }

    /**
     * Copy out {@param byteLength} bytes starting at {@param begin}. A length of zero means
     * "to the end". This allocates; prefer {@see subarray} unless the data has to outlive
     * the parent buffer.
     */
    public copyToBuffer(begin: number = 0, byteLength: number = 0): ArrayBuffer {
        const start = this.byteOffset + begin;
        const end = byteLength !== 0 ? start + byteLength : this.byteOffset + this.byteLength;
        return this.arrayBuffer.slice(start, end);
    }

    public createDataView(offs: number = 0, length?: number): DataView {
        if (offs === 0 && length === undefined) {
            return new DataView(this.arrayBuffer, this.byteOffset, this.byteLength);
        } else {
            return this.subarray(offs, length).createDataView();
        }
    }

    public createTypedArray<T extends ArrayBufferView>(clazz: _TypedArrayConstructor<T>, offs: number = 0, count?: number): T {
        const begin = this.byteOffset + offs;

        let byteLength;
        if (count !== undefined) {
            byteLength = clazz.BYTES_PER_ELEMENT * count;
        } else {
            byteLength = this.byteLength - offs;
            count = byteLength / clazz.BYTES_PER_ELEMENT;
            assert((count | 0) === count);
        }

        // Typed arrays require alignment.
        if (isAligned(begin, clazz.BYTES_PER_ELEMENT))
            return new clazz(this.arrayBuffer, begin, count);
        else
            return new clazz(this.copyToBuffer(offs, byteLength), 0);
    }
}
