// One texture slot of an AmusementVision TPL.

import ArrayBufferSlice from '../ArrayBufferSlice.js';
import type { DataStream } from '../DataStream.js';
import type { WritableStream } from '../WritableStream.js';
import type { Logger } from '../Logger.js';
import type { TplConfig } from '../config.js';
import { TexFormat } from '../gx/gx_enum.js';
import { calcTextureSize, decodeTexture, encodeTexture, getFormatName, isSupportedFormat } from '../gx/gx_texture.js';
import { type RGBAImage, type MipmapInterpolation, calcMipLevelSize, generateMipChain } from '../gx/gx_mipmap.js';
import { ArgumentError, InvalidFormatError, InvalidHeaderError } from '../errors.js';
import { align, assert, hexzero0x } from '../util.js';
import { GxGame, type GxGamePolicy, getDxFormatCode, getGamePolicy } from './GxGame.js';

// Packed bytes are kept as read; pixels appear the first time someone asks for them.
export type TplLevelData =
    | { state: 'raw'; packed: ArrayBufferSlice; }
    | { state: 'decoded'; packed: ArrayBufferSlice; pixels: Uint8Array; };

export interface TplLevel {
    width: number;
    height: number;
    data: TplLevelData;
}

export type AVTplTextureContents =
    | { kind: 'empty'; formatRaw: number; }
    | { kind: 'defined'; format: TexFormat; levels: TplLevel[]; }
    // Bytes of a format we have no codec for, carried as-is (DX only).
    | { kind: 'passthrough'; formatRaw: number; width: number; height: number; levelCount: number; descriptor: DxDescriptorFields; data: ArrayBufferSlice; };

// The DX descriptor fields that a passthrough texture writes back unchanged.
export interface DxDescriptorFields {
    code: number;
    compressed: number;
    compressedLength: number;
}

export interface TextureFromImageOptions {
    mipCount?: number;
    // Overrides config.defaultInterpolation.
    interpolation?: MipmapInterpolation;
    levels?: RGBAImage[];
    config?: Pick<TplConfig, 'defaultInterpolation'>;
}

export interface LoadTextureDataOptions {
    // Byte length declared by a DX descriptor; needed to keep an unknown format verbatim.
    dataLength?: number;
    descriptor?: DxDescriptorFields;
    logger?: Logger;
}

/**
 * Bytes the reader consumes for one level.
 *
 * F-Zero GX's packer sized the smallest level of a multi-level I8 texture with an 8-row tile
 * (the 4-bit formats' tile) instead of I8's 4 rows. The reader consumes that many bytes, which
 * runs into the next texture for small levels. Only F-Zero GX I8 does this; writing always
 * uses {@see calcTextureSize}.
 */
export function calcLevelReadSize(policy: GxGamePolicy, format: TexFormat, width: number, height: number, level: number, levelCount: number): number {
    if (policy.inheritedI8Overread && format === TexFormat.I8 && levelCount > 1 && level === levelCount - 1)
        return align(width, 8) * align(height, 8);
    return calcTextureSize(format, width, height);
}

function copyLevel(level: TplLevel): TplLevel {
    const packed = level.data.packed.subarray(0, undefined, true);
    return { width: level.width, height: level.height, data: { state: 'raw', packed } };
}

export class AVTplTexture {
    private contents: AVTplTextureContents = { kind: 'empty', formatRaw: 0 };

    public static empty(formatRaw: number): AVTplTexture {
        const texture = new AVTplTexture();
        texture.defineEmptyTexture(formatRaw);
        return texture;
    }

    /**
     * Encode {@param image} as level 0 of a new texture, generating (or taking) the lower levels.
     */
    public static fromImage(format: TexFormat, image: RGBAImage, options: TextureFromImageOptions = {}): AVTplTexture {
        if (!isSupportedFormat(format))
            throw new InvalidFormatError(`Cannot build a texture in format ${getFormatName(format)}`, format);

        const mipCount = options.mipCount ?? (options.levels !== undefined ? options.levels.length + 1 : 1);
        const interpolation = options.interpolation ?? options.config?.defaultInterpolation;
        const chain = generateMipChain(image, { mipCount, interpolation, levels: options.levels });
        const levels = chain.map((level): TplLevel => {
            const packed = ArrayBufferSlice.fromUint8Array(encodeTexture(level.pixels, format, level.width, level.height));
            return { width: level.width, height: level.height, data: { state: 'raw', packed } };
        });

        const texture = new AVTplTexture();
        texture.contents = { kind: 'defined', format, levels };
        return texture;
    }

    public get kind(): AVTplTextureContents['kind'] {
        return this.contents.kind;
    }

    public get isEmpty(): boolean {
        return this.contents.kind === 'empty';
    }

    /**
     * The GX format of a defined texture, or null for empty and passthrough textures.
     */
    public get format(): TexFormat | null {
        return this.contents.kind === 'defined' ? this.contents.format : null;
    }

    // The format code as it appears in the header.
    public get formatRaw(): number {
        return this.contents.kind === 'defined' ? this.contents.format : this.contents.formatRaw;
    }

    public get levelCount(): number {
        switch (this.contents.kind) {
        case 'empty':
            return 0;
        case 'defined':
            return this.contents.levels.length;
        case 'passthrough':
            return this.contents.levelCount;
        }
    }

    public widthOfLevel(level: number): number {
        if (this.contents.kind === 'passthrough') {
            this.checkLevel(level);
            return calcMipLevelSize(this.contents.width, this.contents.height, level)[0];
        }
        return this.getLevel(level).width;
    }

    public heightOfLevel(level: number): number {
        if (this.contents.kind === 'passthrough') {
            this.checkLevel(level);
            return calcMipLevelSize(this.contents.width, this.contents.height, level)[1];
        }
        return this.getLevel(level).height;
    }

    private checkLevel(level: number): void {
        if (!Number.isInteger(level) || level < 0 || level >= this.levelCount)
            throw new ArgumentError(`Level ${level} out of range, texture has ${this.levelCount} levels`);
    }

    private getDefinedLevel(level: number): [TexFormat, TplLevel] {
        this.checkLevel(level);
        if (this.contents.kind !== 'defined')
            throw new ArgumentError(`Texture has no decodable levels`);
        return [this.contents.format, this.contents.levels[level]];
    }

    private getLevel(level: number): TplLevel {
        return this.getDefinedLevel(level)[1];
    }

    public defineEmptyTexture(formatRaw: number): void {
        this.contents = { kind: 'empty', formatRaw };
    }

    /**
     * Read {@param levelCount} packed levels starting at the reader's position. Nothing is
     * decoded here.
     */
    public loadTextureData(reader: DataStream, game: GxGame, formatRaw: number, width: number, height: number, levelCount: number, options: LoadTextureDataOptions = {}): void {
        const policy = getGamePolicy(game);

        if (!isSupportedFormat(formatRaw)) {
            if (policy.rawFormatPassthrough && options.dataLength !== undefined) {
                const data = this.readBytes(reader, options.dataLength);
                const descriptor = options.descriptor ?? { code: formatRaw, compressed: 0, compressedLength: 0 };
                this.contents = { kind: 'passthrough', formatRaw, width, height, levelCount, descriptor: { ...descriptor }, data };
                return;
            }
            throw new InvalidFormatError(`Invalid texture header (invalid format ${getFormatName(formatRaw)})`, formatRaw);
        }

        const format = formatRaw;
        const levels: TplLevel[] = [];
        for (let i = 0; i < levelCount; i++) {
            const [levelWidth, levelHeight] = calcMipLevelSize(width, height, i);
            const size = calcTextureSize(format, levelWidth, levelHeight);
            const readSize = calcLevelReadSize(policy, format, levelWidth, levelHeight, i, levelCount);

            let packed: ArrayBufferSlice;
            if (readSize > size && reader.remaining < readSize && reader.remaining >= size) {
                // The over-read runs off the end of the file; what is missing reads as zero.
                options.logger?.debug(`${getFormatName(format)} level ${i} over-read truncated at end of file (${reader.remaining} of ${readSize} bytes)`);
                const bytes = new Uint8Array(readSize);
                bytes.set(this.readBytes(reader, reader.remaining).createTypedArray(Uint8Array));
                packed = new ArrayBufferSlice(bytes.buffer);
            } else {
                packed = this.readBytes(reader, readSize);
            }

            levels.push({ width: levelWidth, height: levelHeight, data: { state: 'raw', packed } });
        }

        this.contents = { kind: 'defined', format, levels };
    }

    private readBytes(reader: DataStream, byteLength: number): ArrayBufferSlice {
        if (byteLength > reader.remaining)
            throw new InvalidHeaderError(`Texture data truncated: need ${byteLength} bytes at ${hexzero0x(reader.offset)}, ${reader.remaining} left`);
        return reader.readSlice(byteLength, true);
    }

    public getLevelPackedData(level: number): ArrayBufferSlice {
        return this.getLevel(level).data.packed;
    }

    public isDecoded(level: number): boolean {
        return this.getLevel(level).data.state === 'decoded';
    }

    /**
     * RGBA8 pixels of one level, decoded on first use and kept afterwards.
     */
    public getLevelPixels(level: number): Uint8Array {
        const [format, tplLevel] = this.getDefinedLevel(level);
        const data = tplLevel.data;
        if (data.state === 'decoded')
            return data.pixels;

        const pixels = decodeTexture(data.packed.createTypedArray(Uint8Array), format, tplLevel.width, tplLevel.height);
        tplLevel.data = { state: 'decoded', packed: data.packed, pixels };
        return pixels;
    }

    /**
     * Replace one level's contents with {@param rgba}, re-encoded in the texture's format.
     */
    public setLevelPixels(level: number, rgba: Uint8Array): void {
        const [format, tplLevel] = this.getDefinedLevel(level);
        const packed = ArrayBufferSlice.fromUint8Array(encodeTexture(rgba, format, tplLevel.width, tplLevel.height));
        tplLevel.data = { state: 'raw', packed };
    }

    private checkWritable(policy: GxGamePolicy): void {
        if (this.contents.kind === 'passthrough' && !policy.rawFormatPassthrough)
            throw new InvalidFormatError(`${policy.game} cannot store texture format ${getFormatName(this.contents.formatRaw)}`, this.contents.formatRaw);
    }

    private sizeOfLevels(): number {
        switch (this.contents.kind) {
        case 'empty':
            return 0;
        case 'passthrough':
            return this.contents.data.byteLength;
        case 'defined': {
            const format = this.contents.format;
            let size = 0;
            for (const level of this.contents.levels)
                size += calcTextureSize(format, level.width, level.height);
            return size;
        }
        }
    }

    /**
     * Bytes {@see saveTextureData} writes. Headerless files carry no DX descriptors.
     */
    public sizeOfTextureData(game: GxGame, noHeader: boolean = false): number {
        if (this.contents.kind === 'empty')
            return 0;
        const policy = getGamePolicy(game);
        this.checkWritable(policy);
        return (noHeader ? 0 : policy.dxDescriptorSize) + this.sizeOfLevels();
    }

    public saveTextureData(writer: WritableStream, game: GxGame, noHeader: boolean = false): void {
        const contents = this.contents;
        if (contents.kind === 'empty')
            return;

        const policy = getGamePolicy(game);
        this.checkWritable(policy);

        if (policy.dxDescriptorSize !== 0 && !noHeader)
            this.writeDxDescriptor(writer, policy);

        if (contents.kind === 'passthrough') {
            writer.writeBufferSlice(contents.data);
            return;
        }

        for (const level of contents.levels) {
            const size = calcTextureSize(contents.format, level.width, level.height);
            const packed = level.data.packed;
            if (packed.byteLength >= size) {
                writer.writeBufferSlice(packed.subarray(0, size));
            } else {
                const bytes = new Uint8Array(size);
                bytes.set(packed.createTypedArray(Uint8Array));
                writer.writeBytes(bytes);
            }
        }
    }

    private writeDxDescriptor(writer: WritableStream, policy: GxGamePolicy): void {
        const contents = this.contents;
        const dataLength = this.sizeOfLevels();
        let code: number, compressed: number, compressedLength: number;
        if (contents.kind === 'passthrough') {
            ({ code, compressed, compressedLength } = contents.descriptor);
        } else {
            const isCompressed = contents.kind === 'defined' && contents.format === TexFormat.CMPR;
            code = contents.kind === 'defined' ? getDxFormatCode(policy, contents.format) : contents.formatRaw;
            compressed = isCompressed ? 1 : 0;
            compressedLength = isCompressed ? dataLength : 0;
        }
        const start = writer.offs;
        writer.writeUint32(code);
        writer.writeUint32(this.widthOfLevel(0));
        writer.writeUint32(this.heightOfLevel(0));
        writer.writeUint32(this.levelCount);
        writer.writeUint32(compressed);
        writer.writeUint32(dataLength);
        writer.writeUint32(compressedLength);
        writer.writeUint32(0);
        assert(writer.offs - start === policy.dxDescriptorSize, `DX descriptor size`);
    }

    public clone(): AVTplTexture {
        const texture = new AVTplTexture();
        const contents = this.contents;
        switch (contents.kind) {
        case 'empty':
            texture.contents = { kind: 'empty', formatRaw: contents.formatRaw };
            break;
        case 'defined':
            texture.contents = { kind: 'defined', format: contents.format, levels: contents.levels.map(copyLevel) };
            break;
        case 'passthrough':
            texture.contents = { ...contents, descriptor: { ...contents.descriptor }, data: contents.data.subarray(0, undefined, true) };
            break;
        }
        return texture;
    }
}
