
// AmusementVision's Texture format

import type ArrayBufferSlice from '../ArrayBufferSlice.js';
import { DataStream } from '../DataStream.js';
import { WritableStream } from '../WritableStream.js';
import { getEndiannessName } from '../endian.js';
import { Logger } from '../Logger.js';
import { getDefaultConfig } from '../config.js';
import { getFormatName } from '../gx/gx_texture.js';
import { ArgumentError, InvalidHeaderError } from '../errors.js';
import { hexzero0x } from '../util.js';
import { GxGame, type GxGamePolicy, getGamePolicy, getHeaderSize, getMagicSize } from './GxGame.js';
import { AVTplTexture } from './AVTplTexture.js';
import { type GeneratedTextureHeader, calcHeaderlessTextureSize } from './AVTplHeaderless.js';

export type MergeCollisionPolicy = 'overwrite' | 'skip';

export interface TplLoadOptions {
    logger?: Logger;
}

interface AVTextureHeader {
    formatRaw: number;
    offs: number;
    width: number;
    height: number;
    mipCount: number;
    // Where the texture's data (or DX descriptor) starts in the file.
    dataOffs: number;
}

const defaultLogger = new Logger(getDefaultConfig());

function readTextureHeader(stream: DataStream, policy: GxGamePolicy, idx: number): AVTextureHeader {
    const formatRaw = stream.readUint32();
    const offs = stream.readUint32();
    const width = stream.readUint16();
    const height = stream.readUint16();
    const mipCount = stream.readUint16();
    const check = stream.readUint16();
    if (check !== policy.checkValue)
        throw new InvalidHeaderError(`Texture header ${idx}: check value ${hexzero0x(check, 4)}, expected ${hexzero0x(policy.checkValue, 4)}`);
    return { formatRaw, offs, width, height, mipCount, dataOffs: offs };
}

function synthesizeTextureHeaders(generated: GeneratedTextureHeader, policy: GxGamePolicy): AVTextureHeader[] {
    const { textureCount, textureWidth, textureHeight, textureFormat, textureMipmapCount } = generated;
    const textureSize = calcHeaderlessTextureSize(textureFormat, textureWidth, textureHeight);
    const initialOffs = textureCount * policy.headerEntryStride;

    const headers: AVTextureHeader[] = [];
    for (let i = 0; i < textureCount; i++) {
        const offs = initialOffs + i * textureSize;
        // The file starts straight at the data, so the offsets above point past it.
        const dataOffs = getMagicSize(policy) + offs - initialOffs;
        headers.push({ formatRaw: textureFormat, offs, width: textureWidth, height: textureHeight, mipCount: textureMipmapCount, dataOffs });
    }
    return headers;
}

function checkGeneratedHeader(generated: GeneratedTextureHeader): void {
    const { textureCount, textureWidth, textureHeight, textureMipmapCount } = generated;
    if (!Number.isInteger(textureCount) || textureCount < 1)
        throw new InvalidHeaderError(`Generated header has invalid texture count ${textureCount}`);
    if (textureWidth < 1 || textureHeight < 1 || textureWidth > 0xFFFF || textureHeight > 0xFFFF)
        throw new InvalidHeaderError(`Generated header has invalid dimensions ${textureWidth}x${textureHeight}`);
    if (textureMipmapCount < 1)
        throw new InvalidHeaderError(`Generated header has invalid mipmap count ${textureMipmapCount}`);
}

function checkU16(v: number, what: string, idx: number): void {
    if (v > 0xFFFF)
        throw new ArgumentError(`Texture ${idx}: ${what} ${v} does not fit the header`);
}

export class AVTpl {
    private textures: (AVTplTexture | null)[] = [];

    constructor(textures: (AVTplTexture | null)[] = []) {
        this.textures = textures.slice();
    }

    /**
     * Parse a TPL for {@param game}. With {@param generatedHeader} the file is taken to be
     * headerless and the per-texture headers are made up from it instead of read.
     */
    public static load(buffer: ArrayBufferSlice, game: GxGame, generatedHeader: GeneratedTextureHeader | null = null, options: TplLoadOptions = {}): AVTpl {
        const policy = getGamePolicy(game);
        const logger = options.logger ?? defaultLogger;
        const stream = new DataStream(buffer, policy.endianness);

        if (policy.magic !== null) {
            if (stream.remaining < policy.magic.length)
                throw new InvalidHeaderError(`File too small for the ${policy.game} tag`);
            const magic = stream.readString(policy.magic.length);
            if (generatedHeader === null && magic !== policy.magic)
                throw new InvalidHeaderError(`Bad tag ${JSON.stringify(magic)}, expected ${JSON.stringify(policy.magic)}`);
        }

        let headers: AVTextureHeader[];
        if (generatedHeader !== null) {
            checkGeneratedHeader(generatedHeader);
            headers = synthesizeTextureHeaders(generatedHeader, policy);
        } else {
            if (stream.remaining < 4)
                throw new InvalidHeaderError(`File too small for the texture count`);
            const count = stream.readUint32();
            if (count * policy.headerEntryStride > stream.remaining)
                throw new InvalidHeaderError(`Texture count ${count} does not fit in ${buffer.byteLength} bytes`);
            headers = [];
            for (let i = 0; i < count; i++)
                headers.push(readTextureHeader(stream, policy, i));
        }

        const textures: (AVTplTexture | null)[] = [];
        for (let i = 0; i < headers.length; i++)
            textures.push(AVTpl.loadTexture(stream, policy, headers[i], i, generatedHeader !== null, logger));

        logger.debug(`Loaded ${textures.length} texture slots from ${policy.game} TPL (${buffer.byteLength} bytes)`);
        return new AVTpl(textures);
    }

    private static loadTexture(stream: DataStream, policy: GxGamePolicy, header: AVTextureHeader, idx: number, headerless: boolean, logger: Logger): AVTplTexture | null {
        const { formatRaw, offs, width, height, mipCount } = header;

        const fields = [offs, width, height, mipCount];
        if (fields.every((v) => v === 0))
            return formatRaw === 0 ? null : AVTplTexture.empty(formatRaw);
        if (fields.some((v) => v === 0))
            throw new InvalidHeaderError(`Texture header ${idx}: inconsistent fields (offset ${hexzero0x(offs)}, ${width}x${height}, ${mipCount} levels)`);

        if (header.dataOffs > stream.byteLength)
            throw new InvalidHeaderError(`Texture header ${idx}: offset ${hexzero0x(header.dataOffs)} is outside the file`);
        stream.seekTo(header.dataOffs);

        const texture = new AVTplTexture();
        if (policy.headerSchema === 'dx' && !headerless) {
            if (stream.remaining < policy.dxDescriptorSize)
                throw new InvalidHeaderError(`Texture ${idx}: DX descriptor truncated`);
            const code = stream.readUint32();
            const dxWidth = stream.readUint32();
            const dxHeight = stream.readUint32();
            const dxMipCount = stream.readUint32();
            const compressed = stream.readUint32();
            const dataLength = stream.readUint32();
            const compressedLength = stream.readUint32();
            stream.readUint32();

            if (dxWidth === 0 || dxHeight === 0 || dxMipCount === 0 || dxWidth > 0xFFFF || dxHeight > 0xFFFF)
                throw new InvalidHeaderError(`Texture ${idx}: DX descriptor has invalid size ${dxWidth}x${dxHeight}, ${dxMipCount} levels`);

            const mapped = policy.dxFormatCodes.get(code);
            if (mapped === undefined)
                logger.debug(`Texture ${idx}: DX format code ${hexzero0x(code, 2)} unmapped, using header format ${getFormatName(formatRaw)}`);
            const dxFormatRaw: number = mapped ?? formatRaw;
            texture.loadTextureData(stream, policy.game, dxFormatRaw, dxWidth, dxHeight, dxMipCount, { dataLength, descriptor: { code, compressed, compressedLength }, logger });
        } else {
            texture.loadTextureData(stream, policy.game, formatRaw, width, height, mipCount, { logger });
        }
        return texture;
    }

    public get length(): number {
        return this.textures.length;
    }

    public get(idx: number): AVTplTexture | null {
        if (!Number.isInteger(idx) || idx < 0 || idx >= this.textures.length)
            throw new ArgumentError(`Texture index ${idx} out of range 0..${this.textures.length - 1}`);
        return this.textures[idx];
    }

    /**
     * Put {@param texture} at {@param idx}, padding with undefined slots if the TPL is shorter.
     */
    public set(idx: number, texture: AVTplTexture | null): void {
        if (!Number.isInteger(idx) || idx < 0)
            throw new ArgumentError(`Texture index ${idx} out of range`);
        while (this.textures.length <= idx)
            this.textures.push(null);
        this.textures[idx] = texture;
    }

    public push(texture: AVTplTexture | null): number {
        this.textures.push(texture);
        return this.textures.length - 1;
    }

    public definedIndices(): number[] {
        const indices: number[] = [];
        for (let i = 0; i < this.textures.length; i++)
            if (this.textures[i] !== null)
                indices.push(i);
        return indices;
    }

    private findFreeSlot(): number {
        const idx = this.textures.indexOf(null);
        return idx >= 0 ? idx : this.textures.length;
    }

    /**
     * Copy the defined textures of {@param other} into this TPL. Textures named in
     * {@param indexMapping} are placed first, at their mapped index; the rest then fill
     * undefined slots, or are appended. Returns where each copied texture ended up.
     */
    public merge(other: AVTpl, indexMapping: ReadonlyMap<number, number>, collisionPolicy: MergeCollisionPolicy): Map<number, number> {
        if (collisionPolicy !== 'overwrite' && collisionPolicy !== 'skip')
            throw new ArgumentError(`Unknown collision policy ${JSON.stringify(collisionPolicy)}`);

        const sources = other.definedIndices();
        for (const srcIdx of sources) {
            const dstIdx = indexMapping.get(srcIdx);
            if (dstIdx !== undefined && (!Number.isInteger(dstIdx) || dstIdx < 0))
                throw new ArgumentError(`Texture ${srcIdx} mapped to invalid index ${dstIdx}`);
        }

        const placed = new Map<number, number>();
        const place = (srcIdx: number, dstIdx: number) => {
            const src = other.textures[srcIdx];
            if (src === null)
                return;
            const existing = dstIdx < this.textures.length ? this.textures[dstIdx] : null;
            if (existing !== null && collisionPolicy === 'skip')
                return;
            this.set(dstIdx, src.clone());
            placed.set(srcIdx, dstIdx);
        };

        for (const srcIdx of sources) {
            const dstIdx = indexMapping.get(srcIdx);
            if (dstIdx !== undefined)
                place(srcIdx, dstIdx);
        }
        for (const srcIdx of sources)
            if (!indexMapping.has(srcIdx))
                place(srcIdx, this.findFreeSlot());
        return placed;
    }

    private getDataSize(game: GxGame, noHeader: boolean): number {
        let size = 0;
        for (const texture of this.textures)
            if (texture !== null)
                size += texture.sizeOfTextureData(game, noHeader);
        return size;
    }

    public sizeOf(game: GxGame, noHeader: boolean = false): number {
        const policy = getGamePolicy(game);
        const headerSize = noHeader ? getMagicSize(policy) : getHeaderSize(policy, this.textures.length);
        return headerSize + this.getDataSize(game, noHeader);
    }

    public write(stream: WritableStream, game: GxGame, noHeader: boolean = false): void {
        const policy = getGamePolicy(game);
        if (stream.endianness !== policy.endianness)
            throw new ArgumentError(`Stream is ${getEndiannessName(stream.endianness)}, ${policy.game} is ${getEndiannessName(policy.endianness)}`);

        const start = stream.offs;
        if (policy.magic !== null)
            stream.writeString(policy.magic);

        if (!noHeader) {
            const headerSize = getHeaderSize(policy, this.textures.length);
            stream.writeUint32(this.textures.length);

            let offs = headerSize;
            for (let i = 0; i < this.textures.length; i++) {
                const texture = this.textures[i];
                if (texture === null || texture.isEmpty) {
                    stream.writeUint32(texture !== null ? texture.formatRaw : 0);
                    stream.writeUint32(0);
                    stream.writeUint16(0);
                    stream.writeUint16(0);
                    stream.writeUint16(0);
                } else {
                    const width = texture.widthOfLevel(0), height = texture.heightOfLevel(0);
                    checkU16(width, 'width', i);
                    checkU16(height, 'height', i);
                    checkU16(texture.levelCount, 'level count', i);
                    stream.writeUint32(texture.formatRaw);
                    stream.writeUint32(offs);
                    stream.writeUint16(width);
                    stream.writeUint16(height);
                    stream.writeUint16(texture.levelCount);
                    offs += texture.sizeOfTextureData(game);
                }
                stream.writeUint16(policy.checkValue);
            }

            // Pad the header out with 00 01 02 ...
            const padding = headerSize - (stream.offs - start);
            for (let i = 0; i < padding; i++)
                stream.writeUint8(i & 0xFF);
        }

        for (const texture of this.textures)
            if (texture !== null)
                texture.saveTextureData(stream, game, noHeader);
    }

    public save(game: GxGame, noHeader: boolean = false, options: TplLoadOptions = {}): ArrayBuffer {
        const policy = getGamePolicy(game);
        const size = this.sizeOf(game, noHeader);
        const stream = new WritableStream(policy.endianness, size);
        this.write(stream, game, noHeader);
        const logger = options.logger ?? defaultLogger;
        logger.debug(`Saved ${this.textures.length} texture slots as ${policy.game} TPL (${stream.byteLength} bytes${noHeader ? ', no header' : ''})`);
        return stream.finalize();
    }
}
