// GX texture encoding and decoding

import { TexFormat } from './gx_enum.js';
import { align } from '../util.js';
import { ArgumentError, UnsupportedFormatError } from '../errors.js';
import * as Decode from './gx_texture_decode.js';
import * as Encode from './gx_texture_encode.js';

type TextureCodecFunc = (dst: Uint8Array, src: Uint8Array, w: number, h: number) => void;

export interface TexBlockInfo {
    blockWidth: number;
    blockHeight: number;
    bitsPerPixel: number;
}

interface TexCodec extends TexBlockInfo {
    decode: TextureCodecFunc;
    encode: TextureCodecFunc;
}

const texCodecs = new Map<number, TexCodec>([
    [TexFormat.I4,     { blockWidth: 8, blockHeight: 8, bitsPerPixel: 4,  decode: Decode.decode_I4,     encode: Encode.encode_I4, }],
    [TexFormat.I8,     { blockWidth: 8, blockHeight: 4, bitsPerPixel: 8,  decode: Decode.decode_I8,     encode: Encode.encode_I8, }],
    [TexFormat.IA4,    { blockWidth: 8, blockHeight: 4, bitsPerPixel: 8,  decode: Decode.decode_IA4,    encode: Encode.encode_IA4, }],
    [TexFormat.IA8,    { blockWidth: 4, blockHeight: 4, bitsPerPixel: 16, decode: Decode.decode_IA8,    encode: Encode.encode_IA8, }],
    [TexFormat.RGB565, { blockWidth: 4, blockHeight: 4, bitsPerPixel: 16, decode: Decode.decode_RGB565, encode: Encode.encode_RGB565, }],
    [TexFormat.RGB5A3, { blockWidth: 4, blockHeight: 4, bitsPerPixel: 16, decode: Decode.decode_RGB5A3, encode: Encode.encode_RGB5A3, }],
    [TexFormat.RGBA8,  { blockWidth: 4, blockHeight: 4, bitsPerPixel: 32, decode: Decode.decode_RGBA8,  encode: Encode.encode_RGBA8, }],
    [TexFormat.CMPR,   { blockWidth: 8, blockHeight: 8, bitsPerPixel: 4,  decode: Decode.decode_CMPR,   encode: Encode.encode_CMPR, }],
]);

export function isSupportedFormat(formatRaw: number): formatRaw is TexFormat {
    return texCodecs.has(formatRaw);
}

function getCodec(formatRaw: number): TexCodec {
    const codec = texCodecs.get(formatRaw);
    if (codec === undefined)
        throw new UnsupportedFormatError(`No codec for texture format ${getFormatName(formatRaw)}`, formatRaw);
    return codec;
}

export function getTexBlockInfo(format: TexFormat): TexBlockInfo {
    const { blockWidth, blockHeight, bitsPerPixel } = getCodec(format);
    return { blockWidth, blockHeight, bitsPerPixel };
}

export function getBitsPerPixel(format: TexFormat): number {
    return getCodec(format).bitsPerPixel;
}

/**
 * Size in bytes of one image of {@param width}x{@param height} once padded out to whole tiles.
 */
export function calcTextureSize(format: TexFormat, width: number, height: number): number {
    const codec = getCodec(format);
    const numPixels = align(width, codec.blockWidth) * align(height, codec.blockHeight);
    return (numPixels * codec.bitsPerPixel) >>> 3;
}

export function getFormatName(formatRaw: number): string {
    switch (formatRaw) {
    case TexFormat.I4:
        return "I4";
    case TexFormat.I8:
        return "I8";
    case TexFormat.IA4:
        return "IA4";
    case TexFormat.IA8:
        return "IA8";
    case TexFormat.RGB565:
        return "RGB565";
    case TexFormat.RGB5A3:
        return "RGB5A3";
    case TexFormat.RGBA8:
        return "RGBA8";
    case TexFormat.CMPR:
        return "CMPR";
    case TexFormat.C4:
        return "C4";
    case TexFormat.C8:
        return "C8";
    case TexFormat.C14X2:
        return "C14X2";
    default:
        return `unknown (0x${(formatRaw >>> 0).toString(16)})`;
    }
}

function checkDimensions(width: number, height: number): void {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0)
        throw new ArgumentError(`Invalid texture dimensions ${width}x${height}`);
}

/**
 * Decode one image to row-major RGBA8 of the logical (unpadded) size.
 */
export function decodeTexture(packed: Uint8Array, format: TexFormat, width: number, height: number): Uint8Array {
    const codec = getCodec(format);
    checkDimensions(width, height);
    const size = calcTextureSize(format, width, height);
    if (packed.byteLength < size)
        throw new ArgumentError(`${getFormatName(format)} ${width}x${height} needs ${size} bytes, got ${packed.byteLength}`);
    const pixels = new Uint8Array(width * height * 4);
    codec.decode(pixels, packed, width, height);
    return pixels;
}

/**
 * Encode row-major RGBA8 into the tiled layout of {@param format}, padded to whole tiles.
 */
export function encodeTexture(rgba: Uint8Array, format: TexFormat, width: number, height: number): Uint8Array {
    const codec = getCodec(format);
    checkDimensions(width, height);
    if (rgba.byteLength !== width * height * 4)
        throw new ArgumentError(`Expected ${width * height * 4} bytes of RGBA for ${width}x${height}, got ${rgba.byteLength}`);
    const packed = new Uint8Array(calcTextureSize(format, width, height));
    codec.encode(packed, rgba, width, height);
    return packed;
}
