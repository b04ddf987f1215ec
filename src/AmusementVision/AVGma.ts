
// AmusementVision's model archive. Only the table of contents is understood here; each model
// is carried as an opaque blob.

import type ArrayBufferSlice from '../ArrayBufferSlice.js';
import { DataStream } from '../DataStream.js';
import { WritableStream } from '../WritableStream.js';
import { getEndiannessName } from '../endian.js';
import { Logger } from '../Logger.js';
import { getDefaultConfig } from '../config.js';
import { ArgumentError, InvalidHeaderError } from '../errors.js';
import { align, hexzero0x, readString } from '../util.js';
import { GxGame, getGamePolicy } from './GxGame.js';

export interface GmaModelEntry {
    name: string;
    data: ArrayBufferSlice;
}

export interface GmaLoadOptions {
    logger?: Logger;
}

type ModelEntryOffset = {
    modelOffs: number;
    nameOffs: number;
};

const GMA_ALIGNMENT = 0x20;

const defaultLogger = new Logger(getDefaultConfig());

function encodeName(name: string): Uint8Array {
    const bytes = new Uint8Array(name.length + 1);
    for (let i = 0; i < name.length; i++)
        bytes[i] = name.charCodeAt(i) & 0xFF;
    return bytes;
}

export class AVGma {
    private models: (GmaModelEntry | null)[];

    constructor(models: (GmaModelEntry | null)[] = []) {
        this.models = models.slice();
    }

    public static load(buffer: ArrayBufferSlice, game: GxGame, options: GmaLoadOptions = {}): AVGma {
        const policy = getGamePolicy(game);
        const logger = options.logger ?? defaultLogger;
        const stream = new DataStream(buffer, policy.endianness);

        if (buffer.byteLength < 0x08)
            throw new InvalidHeaderError(`GMA too small for its header (${buffer.byteLength} bytes)`);
        const count = stream.readInt32();
        const modelBaseOffs = stream.readUint32();
        if (count < 0)
            throw new InvalidHeaderError(`GMA has negative model count ${count}`);

        const nameTableOffs = 0x08 + 0x08 * count;
        if (nameTableOffs > buffer.byteLength)
            throw new InvalidHeaderError(`GMA model count ${count} does not fit in ${buffer.byteLength} bytes`);
        if (modelBaseOffs < nameTableOffs || modelBaseOffs > buffer.byteLength)
            throw new InvalidHeaderError(`GMA model base ${hexzero0x(modelBaseOffs)} is outside the file`);

        const nameBuf = buffer.slice(nameTableOffs, modelBaseOffs);
        const modelBuf = buffer.subarray(modelBaseOffs);

        const entryOffs: ModelEntryOffset[] = [];
        for (let i = 0; i < count; i++) {
            const modelOffs = stream.readInt32();
            const nameOffs = stream.readInt32();
            if (modelOffs > modelBuf.byteLength)
                throw new InvalidHeaderError(`GMA model ${i}: offset ${hexzero0x(modelOffs)} is outside the file`);
            entryOffs.push({ modelOffs, nameOffs });
        }

        // A model runs up to the next model, or to the end of the file.
        const starts = [...new Set(entryOffs.filter((e) => e.modelOffs >= 0).map((e) => e.modelOffs))].sort((a, b) => a - b);
        const findEnd = (modelOffs: number) => starts.find((v) => v > modelOffs) ?? modelBuf.byteLength;

        const models: (GmaModelEntry | null)[] = [];
        for (let i = 0; i < entryOffs.length; i++) {
            const { modelOffs, nameOffs } = entryOffs[i];
            if (modelOffs < 0 && nameOffs <= 0) {
                models.push(null);
                continue;
            }

            if (modelOffs < 0)
                throw new InvalidHeaderError(`GMA model ${i}: offset ${hexzero0x(modelOffs)} is outside the file`);
            if (nameOffs < 0 || nameOffs >= nameBuf.byteLength)
                throw new InvalidHeaderError(`GMA model ${i}: name offset ${hexzero0x(nameOffs)} is outside the name table`);

            const name = readString(nameBuf, nameOffs);
            const data = modelBuf.slice(modelOffs, findEnd(modelOffs), true);
            models.push({ name, data });
        }

        logger.debug(`Loaded ${models.length} model slots from ${policy.game} GMA`);
        return new AVGma(models);
    }

    public get length(): number {
        return this.models.length;
    }

    public get(idx: number): GmaModelEntry | null {
        if (!Number.isInteger(idx) || idx < 0 || idx >= this.models.length)
            throw new ArgumentError(`Model index ${idx} out of range 0..${this.models.length - 1}`);
        return this.models[idx];
    }

    public set(idx: number, model: GmaModelEntry | null): void {
        if (!Number.isInteger(idx) || idx < 0)
            throw new ArgumentError(`Model index ${idx} out of range`);
        while (this.models.length <= idx)
            this.models.push(null);
        this.models[idx] = model;
    }

    public push(model: GmaModelEntry | null): number {
        this.models.push(model);
        return this.models.length - 1;
    }

    private getNameTableSize(): number {
        let size = 0;
        for (const model of this.models)
            if (model !== null)
                size += model.name.length + 1;
        return size;
    }

    private getModelBaseOffs(): number {
        return align(0x08 + 0x08 * this.models.length + this.getNameTableSize(), GMA_ALIGNMENT);
    }

    public sizeOf(game: GxGame): number {
        // The layout is the same for every game; only the byte order differs.
        getGamePolicy(game);
        let size = this.getModelBaseOffs();
        for (const model of this.models)
            if (model !== null)
                size += align(model.data.byteLength, GMA_ALIGNMENT);
        return size;
    }

    public write(stream: WritableStream, game: GxGame): void {
        const policy = getGamePolicy(game);
        if (stream.endianness !== policy.endianness)
            throw new ArgumentError(`Stream is ${getEndiannessName(stream.endianness)}, ${policy.game} is ${getEndiannessName(policy.endianness)}`);

        const start = stream.offs;
        const modelBaseOffs = this.getModelBaseOffs();
        stream.writeInt32(this.models.length);
        stream.writeUint32(modelBaseOffs);

        let modelOffs = 0, nameOffs = 0;
        for (const model of this.models) {
            if (model === null) {
                stream.writeInt32(-1);
                stream.writeInt32(0);
                continue;
            }
            stream.writeInt32(modelOffs);
            stream.writeInt32(nameOffs);
            modelOffs += align(model.data.byteLength, GMA_ALIGNMENT);
            nameOffs += model.name.length + 1;
        }

        for (const model of this.models)
            if (model !== null)
                stream.writeBytes(encodeName(model.name));

        const padding = modelBaseOffs - (stream.offs - start);
        for (let i = 0; i < padding; i++)
            stream.writeUint8(i & 0xFF);

        for (const model of this.models) {
            if (model === null)
                continue;
            stream.writeBufferSlice(model.data);
            const dataPadding = align(model.data.byteLength, GMA_ALIGNMENT) - model.data.byteLength;
            stream.writeBytes(new Uint8Array(dataPadding));
        }
    }

    public save(game: GxGame): ArrayBuffer {
        const policy = getGamePolicy(game);
        const stream = new WritableStream(policy.endianness, this.sizeOf(game));
        this.write(stream, game);
        return stream.finalize();
    }
}
