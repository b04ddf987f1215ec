
import { type ReadonlyVec4, vec4 } from 'gl-matrix';
import { ArgumentError } from '../errors.js';
import { clamp } from '../util.js';

export const enum MipmapInterpolation {
    NearestNeighbor = 'nearest',
    Bicubic = 'bicubic',
}

// Row-major RGBA8.
export interface RGBAImage {
    width: number;
    height: number;
    pixels: Uint8Array;
}

export interface MipChainOptions {
    mipCount: number;
    interpolation?: MipmapInterpolation;
    // Pre-made images for levels 1 .. mipCount-1. When present nothing is resampled.
    levels?: RGBAImage[];
}

export function calcMipLevelSize(width: number, height: number, level: number): [number, number] {
    return [Math.max(1, width >>> level), Math.max(1, height >>> level)];
}

export function calcMaxMipCount(width: number, height: number): number {
    let count = 1;
    while ((width >>> count) > 0 || (height >>> count) > 0)
        count++;
    return count;
}

export function checkImage(image: RGBAImage, what: string = 'image'): void {
    const { width, height } = image;
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1)
        throw new ArgumentError(`${what} has invalid dimensions ${width}x${height}`);
    if (image.pixels.byteLength !== width * height * 4)
        throw new ArgumentError(`${what} is ${width}x${height} but has ${image.pixels.byteLength} bytes of RGBA`);
}

function getPointCubic(cf: ReadonlyVec4, t: number): number {
    return (((cf[0] * t + cf[1]) * t + cf[2]) * t + cf[3]);
}

/**
 * Coefficients of the Catmull-Rom segment between {@param p1} and {@param p2}.
 */
function getCoeffCatmullRom(dst: vec4, p0: number, p1: number, p2: number, p3: number): void {
    dst[0] = (p0 * -0.5) + (p1 *  1.5) + (p2 * -1.5) + (p3 *  0.5); // Cubic
    dst[1] = (p0 *  1.0) + (p1 * -2.5) + (p2 *  2.0) + (p3 * -0.5); // Square
    dst[2] = (p0 * -0.5) + (p1 *  0.0) + (p2 *  0.5) + (p3 *  0.0); // Linear
    dst[3] = (p0 *  0.0) + (p1 *  1.0) + (p2 *  0.0) + (p3 *  0.0); // Constant
}

function getPointCatmullRom(cf: vec4, p0: number, p1: number, p2: number, p3: number, t: number): number {
    getCoeffCatmullRom(cf, p0, p1, p2, p3);
    return getPointCubic(cf, t);
}

function resampleNearest(src: RGBAImage, width: number, height: number): Uint8Array {
    const dst = new Uint8Array(width * height * 4);
    for (let y = 0; y < height; y++) {
        const sy = Math.floor(y * src.height / height);
        for (let x = 0; x < width; x++) {
            const sx = Math.floor(x * src.width / width);
            const srcOffs = (sy * src.width + sx) * 4;
            dst.set(src.pixels.subarray(srcOffs, srcOffs + 4), (y * width + x) * 4);
        }
    }
    return dst;
}

const scratchCoeff = vec4.create();
const scratchRow = vec4.create();

function resampleBicubic(src: RGBAImage, width: number, height: number): Uint8Array {
    const dst = new Uint8Array(width * height * 4);
    const sw = src.width, sh = src.height, pixels = src.pixels;

    const texel = (x: number, y: number, c: number) =>
        pixels[(clamp(y, 0, sh - 1) * sw + clamp(x, 0, sw - 1)) * 4 + c];

    for (let y = 0; y < height; y++) {
        const sy = (y + 0.5) * sh / height - 0.5;
        const iy = Math.floor(sy), ty = sy - iy;
        for (let x = 0; x < width; x++) {
            const sx = (x + 0.5) * sw / width - 0.5;
            const ix = Math.floor(sx), tx = sx - ix;
            for (let c = 0; c < 4; c++) {
                for (let r = 0; r < 4; r++) {
                    const yr = iy - 1 + r;
                    scratchRow[r] = getPointCatmullRom(scratchCoeff,
                        texel(ix - 1, yr, c), texel(ix, yr, c), texel(ix + 1, yr, c), texel(ix + 2, yr, c), tx);
                }
                const v = getPointCatmullRom(scratchCoeff, scratchRow[0], scratchRow[1], scratchRow[2], scratchRow[3], ty);
                dst[(y * width + x) * 4 + c] = clamp(Math.round(v), 0, 255);
            }
        }
    }
    return dst;
}

export function resampleImage(src: RGBAImage, width: number, height: number, interpolation: MipmapInterpolation = MipmapInterpolation.Bicubic): RGBAImage {
    checkImage(src, 'source image');
    let pixels: Uint8Array;
    if (width === src.width && height === src.height)
        pixels = src.pixels.slice();
    else if (interpolation === MipmapInterpolation.NearestNeighbor)
        pixels = resampleNearest(src, width, height);
    else
        pixels = resampleBicubic(src, width, height);
    return { width, height, pixels };
}

/**
 * Build the full chain, level 0 first. Level i is max(1, size >> i) in each dimension and is
 * resampled straight from level 0, unless the caller supplies the lower levels.
 */
export function generateMipChain(source: RGBAImage, options: MipChainOptions): RGBAImage[] {
    checkImage(source, 'level 0');

    const { mipCount } = options;
    const maxMipCount = calcMaxMipCount(source.width, source.height);
    if (!Number.isInteger(mipCount) || mipCount < 1 || mipCount > maxMipCount)
        throw new ArgumentError(`Mipmap count ${mipCount} out of range 1..${maxMipCount} for ${source.width}x${source.height}`);

    const chain: RGBAImage[] = [source];

    if (options.levels !== undefined) {
        if (options.levels.length !== mipCount - 1)
            throw new ArgumentError(`Expected ${mipCount - 1} supplied mipmap levels, got ${options.levels.length}`);
        for (let i = 1; i < mipCount; i++) {
            const level = options.levels[i - 1];
            const [width, height] = calcMipLevelSize(source.width, source.height, i);
            checkImage(level, `mipmap level ${i}`);
            if (level.width !== width || level.height !== height)
                throw new ArgumentError(`Mipmap level ${i} should be ${width}x${height}, got ${level.width}x${level.height}`);
            chain.push(level);
        }
        return chain;
    }

    const interpolation = options.interpolation ?? MipmapInterpolation.Bicubic;
    for (let i = 1; i < mipCount; i++) {
        const [width, height] = calcMipLevelSize(source.width, source.height, i);
        chain.push(resampleImage(source, width, height, interpolation));
    }
    return chain;
}
