import type ArrayBufferSlice from './ArrayBufferSlice.js';
import { Endianness, isLittleEndian } from './endian.js';
import { align } from './util.js';

class GrowableBuffer {
    public buffer: ArrayBuffer;
    public view: DataView;
    public userSize: number = 0;
    public bufferSize: number = 0;

    constructor(initialSize: number = 0x10000, public growAmount: number = 0x1000) {
        this.buffer = new ArrayBuffer(0);
        this.view = new DataView(this.buffer);
        this.maybeGrow(0, initialSize);
    }

    public maybeGrow(newUserSize: number, newBufferSize: number = newUserSize): void {
        if (newUserSize > this.userSize)
            this.userSize = newUserSize;

        if (newBufferSize > this.bufferSize) {
            this.bufferSize = align(newBufferSize, this.growAmount);
            const newBuffer = new ArrayBuffer(this.bufferSize);
            // memcpy
            new Uint8Array(newBuffer).set(new Uint8Array(this.buffer));
            this.buffer = newBuffer;
            this.view = new DataView(this.buffer);
        }
    }

    public finalize(): ArrayBuffer {
        return this.buffer.slice(0x00, this.userSize);
    }
}

export class WritableStream {
    public offs: number = 0;
    private buffer: GrowableBuffer;
    private readonly littleEndian: boolean;

    constructor(public readonly endianness: Endianness, initialSize: number = 0x1000) {
        this.buffer = new GrowableBuffer(initialSize);
        this.littleEndian = isLittleEndian(endianness);
    }

    public get byteLength(): number {
        return this.buffer.userSize;
    }

    public writeBytes(src: Uint8Array): void {
        this.buffer.maybeGrow(this.offs + src.byteLength);
        new Uint8Array(this.buffer.buffer, this.offs, src.byteLength).set(src);
        this.offs += src.byteLength;
    }

    public writeBufferSlice(src: ArrayBufferSlice): void {
        this.writeBytes(src.createTypedArray(Uint8Array));
    }

    public writeString(v: string): void {
        for (let i = 0; i < v.length; i++)
            this.writeUint8(v.charCodeAt(i) & 0xFF);
    }

    public writeUint8(v: number): void {
        this.buffer.maybeGrow(this.offs + 0x01);
        this.buffer.view.setUint8(this.offs, v);
        this.offs += 0x01;
    }

    public writeUint16(v: number): void {
        this.buffer.maybeGrow(this.offs + 0x02);
        this.buffer.view.setUint16(this.offs, v, this.littleEndian);
        this.offs += 0x02;
    }

    public writeUint32(v: number): void {
        this.buffer.maybeGrow(this.offs + 0x04);
        this.buffer.view.setUint32(this.offs, v, this.littleEndian);
        this.offs += 0x04;
    }

    public writeInt32(v: number): void {
        this.buffer.maybeGrow(this.offs + 0x04);
        this.buffer.view.setInt32(this.offs, v, this.littleEndian);
        this.offs += 0x04;
    }

    public finalize(): ArrayBuffer {
        return this.buffer.finalize();
    }
}
