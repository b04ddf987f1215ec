
// Some TPLs ship with their header stripped: nothing but texture data (after the DX tag), one
// base level per texture, all the same size. The size comes from the file name
// ("..._160x112.tpl") and the count from the file size.

import * as path from 'path';
import { Logger } from '../Logger.js';
import { type TplConfig, resolveConfig } from '../config.js';
import { TexFormat } from '../gx/gx_enum.js';
import { getBitsPerPixel, getFormatName } from '../gx/gx_texture.js';
import { InvalidHeaderError } from '../errors.js';
import { GxGame, getGamePolicy, getMagicSize } from './GxGame.js';

export interface GeneratedTextureHeader {
    textureCount: number;
    textureWidth: number;
    textureHeight: number;
    textureFormat: TexFormat;
    textureMipmapCount: number;
}

export interface InferHeaderOptions {
    format?: TexFormat;
    config?: Partial<TplConfig>;
    logger?: Logger;
}

/**
 * The last "<width>x<height>" pair in the base name of {@param fileName}.
 */
export function parseDimensionsFromFilename(fileName: string): [number, number] | null {
    const baseName = path.basename(fileName.replace(/\\/g, '/'));
    let dims: [number, number] | null = null;
    for (const m of baseName.matchAll(/(\d+)[xX](\d+)/g))
        dims = [parseInt(m[1], 10), parseInt(m[2], 10)];
    return dims;
}

// Stride between headerless textures. Unlike calcTextureSize this ignores tile padding.
export function calcHeaderlessTextureSize(format: TexFormat, width: number, height: number): number {
    return Math.floor(width * height * getBitsPerPixel(format) / 8);
}

export function inferGeneratedHeader(fileName: string, fileSize: number, game: GxGame, options: InferHeaderOptions = {}): GeneratedTextureHeader {
    const magicSize = getMagicSize(getGamePolicy(game));
    const config = resolveConfig(options.config);
    const logger = options.logger ?? new Logger(config);
    const textureFormat = options.format ?? config.defaultHeaderlessFormat;

    const dims = parseDimensionsFromFilename(fileName);
    if (dims === null)
        throw new InvalidHeaderError(`Cannot find texture dimensions in file name ${JSON.stringify(fileName)}`);

    const [textureWidth, textureHeight] = dims;
    if (textureWidth < 1 || textureHeight < 1 || textureWidth > 0xFFFF || textureHeight > 0xFFFF)
        throw new InvalidHeaderError(`Texture dimensions ${textureWidth}x${textureHeight} out of range`);

    const textureSize = calcHeaderlessTextureSize(textureFormat, textureWidth, textureHeight);
    if (textureSize === 0)
        throw new InvalidHeaderError(`Texture dimensions ${textureWidth}x${textureHeight} hold no data`);

    const dataSize = fileSize - magicSize;
    const textureCount = dataSize > 0 ? Math.floor(dataSize / textureSize) : 0;
    if (textureCount === 0)
        throw new InvalidHeaderError(`File of ${fileSize} bytes is smaller than one ${textureWidth}x${textureHeight} ${getFormatName(textureFormat)} texture`);
    if (dataSize % textureSize !== 0)
        logger.warn(`${fileName}: ${dataSize % textureSize} trailing bytes after ${textureCount} textures`);

    logger.debug(`${fileName}: assuming ${textureCount} x ${textureWidth}x${textureHeight} ${getFormatName(textureFormat)}`);
    return { textureCount, textureWidth, textureHeight, textureFormat, textureMipmapCount: config.headerlessMipCount };
}
