import { describe, expect, it } from 'vitest';
import ArrayBufferSlice from '../ArrayBufferSlice.js';
import { InvalidHeaderError } from '../errors.js';
import { GxGame } from './GxGame.js';
import { AVGma } from './AVGma.js';

function blob(length: number, v: number): ArrayBufferSlice {
    return new ArrayBufferSlice(new Uint8Array(length).fill(v).buffer);
}

function bytesOf(buffer: ArrayBuffer): number[] {
    return Array.from(new Uint8Array(buffer));
}

function makeGma(): AVGma {
    return new AVGma([
        { name: 'ball', data: blob(0x20, 1) },
        null,
        { name: 'goal', data: blob(0x40, 2) },
    ]);
}

describe('AVGma', () => {
    it('writes the table of contents', () => {
        const gma = makeGma();
        const buffer = gma.save(GxGame.SuperMonkeyBall);
        const view = new DataView(buffer);

        expect(buffer.byteLength).toBe(0x40 + 0x20 + 0x40);
        expect(gma.sizeOf(GxGame.SuperMonkeyBall)).toBe(buffer.byteLength);

        expect(view.getInt32(0x00)).toBe(3);
        expect(view.getUint32(0x04)).toBe(0x40);
        expect([view.getInt32(0x08), view.getInt32(0x0C)]).toEqual([0, 0]);
        expect([view.getInt32(0x10), view.getInt32(0x14)]).toEqual([-1, 0]);
        expect([view.getInt32(0x18), view.getInt32(0x1C)]).toEqual([0x20, 5]);

        const bytes = bytesOf(buffer);
        expect(String.fromCharCode(...bytes.slice(0x20, 0x2A))).toBe('ball\0goal\0');
        expect(bytes.slice(0x2A, 0x40)).toEqual(Array.from({ length: 0x16 }, (_, i) => i));
        expect(bytes[0x40]).toBe(1);
        expect(bytes[0x60]).toBe(2);
    });

    it('round-trips names, undefined slots and blobs', () => {
        const first = makeGma().save(GxGame.SuperMonkeyBall);
        const gma = AVGma.load(new ArrayBufferSlice(first), GxGame.SuperMonkeyBall);

        expect(gma.length).toBe(3);
        expect(gma.get(0)?.name).toBe('ball');
        expect(gma.get(0)?.data.byteLength).toBe(0x20);
        expect(gma.get(1)).toBeNull();
        expect(gma.get(2)?.name).toBe('goal');
        expect(gma.get(2)?.data.byteLength).toBe(0x40);
        expect(bytesOf(gma.save(GxGame.SuperMonkeyBall))).toEqual(bytesOf(first));
    });

    it('follows the DX byte order', () => {
        const buffer = makeGma().save(GxGame.SuperMonkeyBallDX);
        const view = new DataView(buffer);
        expect(view.getInt32(0x00, true)).toBe(3);
        expect(view.getUint32(0x04, true)).toBe(0x40);
        expect(AVGma.load(new ArrayBufferSlice(buffer), GxGame.SuperMonkeyBallDX).get(2)?.name).toBe('goal');
    });

    it('pads blobs to 0x20', () => {
        const gma = new AVGma([{ name: 'x', data: blob(3, 7) }]);
        const buffer = gma.save(GxGame.SuperMonkeyBall);
        expect(buffer.byteLength).toBe(0x20 + 0x20);
        const loaded = AVGma.load(new ArrayBufferSlice(buffer), GxGame.SuperMonkeyBall);
        const data = Array.from(loaded.get(0)?.data.createTypedArray(Uint8Array) ?? []);
        expect(data.length).toBe(0x20);
        expect(data.slice(0, 4)).toEqual([7, 7, 7, 0]);
    });

    it('rejects broken headers', () => {
        const negative = new ArrayBuffer(0x20);
        new DataView(negative).setInt32(0x00, -1);
        expect(() => AVGma.load(new ArrayBufferSlice(negative), GxGame.SuperMonkeyBall)).toThrow(InvalidHeaderError);

        const badBase = makeGma().save(GxGame.SuperMonkeyBall);
        new DataView(badBase).setUint32(0x04, 0x1000);
        expect(() => AVGma.load(new ArrayBufferSlice(badBase), GxGame.SuperMonkeyBall)).toThrow(InvalidHeaderError);

        const badModel = makeGma().save(GxGame.SuperMonkeyBall);
        new DataView(badModel).setInt32(0x18, 0x1000);
        expect(() => AVGma.load(new ArrayBufferSlice(badModel), GxGame.SuperMonkeyBall)).toThrow(InvalidHeaderError);

        expect(() => AVGma.load(new ArrayBufferSlice(new ArrayBuffer(4)), GxGame.SuperMonkeyBall)).toThrow(InvalidHeaderError);
    });

    it('checks every model offset before sizing earlier blobs', () => {
        const buffer = makeGma().save(GxGame.SuperMonkeyBall);
        new DataView(buffer).setInt32(0x18, 0x1000);
        expect(() => AVGma.load(new ArrayBufferSlice(buffer), GxGame.SuperMonkeyBall))
            .toThrow(new InvalidHeaderError('GMA model 2: offset 0x00001000 is outside the file'));
    });
});
