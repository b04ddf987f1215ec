import type ArrayBufferSlice from './ArrayBufferSlice.js';
import { Endianness, isLittleEndian } from './endian.js';

export class DataStream {
    public offset: number = 0;
    public readonly view: DataView;
    private readonly littleEndian: boolean;

    constructor(public readonly buffer: ArrayBufferSlice, endianness: Endianness) {
        this.view = buffer.createDataView();
        this.littleEndian = isLittleEndian(endianness);
    }

    public get byteLength(): number {
        return this.buffer.byteLength;
    }

    public get remaining(): number {
        return this.buffer.byteLength - this.offset;
    }

    public seekTo(offset: number): void {
        this.offset = offset;
    }

    public readUint8(): number {
        const x = this.view.getUint8(this.offset);
        this.offset += 1;
        return x;
    }

    public readUint16(): number {
        const x = this.view.getUint16(this.offset, this.littleEndian);
        this.offset += 2;
        return x;
    }

    public readUint32(): number {
        const x = this.view.getUint32(this.offset, this.littleEndian);
        this.offset += 4;
        return x;
    }

    public readInt32(): number {
        const x = this.view.getInt32(this.offset, this.littleEndian);
        this.offset += 4;
        return x;
    }

    /**
     * Read {@param byteLength} bytes as a slice. The slice shares the stream's storage unless
     * {@param copyData} is set.
     */
    public readSlice(byteLength: number, copyData: boolean = false): ArrayBufferSlice {
        const x = this.buffer.subarray(this.offset, byteLength, copyData);
        this.offset += byteLength;
        return x;
    }

    public readString(length: number): string {
        let S = '';
        for (let i = 0; i < length; i++)
            S += String.fromCharCode(this.readUint8());
        return S;
    }
}
