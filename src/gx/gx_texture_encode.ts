
// GX texture encoders. The inverse of gx_texture_decode: row-major RGBA8 in, tiled bytes out,
// sized to whole tiles. Texels in the tile padding repeat the nearest edge pixel.

import { cmprColorTable } from './gx_texture_decode.js';

// Reduce an 8-bit value to {@param bits} bits, rounding to the nearest step.
export function quantize(v: number, bits: number): number {
    const max = (1 << bits) - 1;
    return ((v * max + 127) / 255) | 0;
}

// BT.601 luma.
export function luma(r: number, g: number, b: number): number {
    return (r * 77 + g * 150 + b * 29 + 128) >>> 8;
}

function srcOffs(w: number, h: number, x: number, y: number): number {
    return (Math.min(y, h - 1) * w + Math.min(x, w - 1)) * 4;
}

function set16be(dst: Uint8Array, offs: number, v: number): void {
    dst[offs + 0] = (v >>> 8) & 0xFF;
    dst[offs + 1] = v & 0xFF;
}

export function encode_I4(dst: Uint8Array, src: Uint8Array, w: number, h: number): void {
    let dstOffs = 0;
    for (let yy = 0; yy < h; yy += 8) {
        for (let xx = 0; xx < w; xx += 8) {
            for (let y = 0; y < 8; y++) {
                for (let x = 0; x < 8; x++) {
                    const p = srcOffs(w, h, xx + x, yy + y);
                    const i4 = quantize(luma(src[p], src[p + 1], src[p + 2]), 4);
                    if (dstOffs & 1)
                        dst[dstOffs >>> 1] |= i4;
                    else
                        dst[dstOffs >>> 1] = i4 << 4;
                    dstOffs++;
                }
            }
        }
    }
}

export function encode_I8(dst: Uint8Array, src: Uint8Array, w: number, h: number): void {
    let dstOffs = 0;
    for (let yy = 0; yy < h; yy += 4) {
        for (let xx = 0; xx < w; xx += 8) {
            for (let y = 0; y < 4; y++) {
                for (let x = 0; x < 8; x++) {
                    const p = srcOffs(w, h, xx + x, yy + y);
                    dst[dstOffs++] = luma(src[p], src[p + 1], src[p + 2]);
                }
            }
        }
    }
}

export function encode_IA4(dst: Uint8Array, src: Uint8Array, w: number, h: number): void {
    let dstOffs = 0;
    for (let yy = 0; yy < h; yy += 4) {
        for (let xx = 0; xx < w; xx += 8) {
            for (let y = 0; y < 4; y++) {
                for (let x = 0; x < 8; x++) {
                    const p = srcOffs(w, h, xx + x, yy + y);
                    const i4 = quantize(luma(src[p], src[p + 1], src[p + 2]), 4);
                    const a4 = quantize(src[p + 3], 4);
                    dst[dstOffs++] = (a4 << 4) | i4;
                }
            }
        }
    }
}

export function encode_IA8(dst: Uint8Array, src: Uint8Array, w: number, h: number): void {
    let dstOffs = 0;
    for (let yy = 0; yy < h; yy += 4) {
        for (let xx = 0; xx < w; xx += 4) {
            for (let y = 0; y < 4; y++) {
                for (let x = 0; x < 4; x++) {
                    const p = srcOffs(w, h, xx + x, yy + y);
                    dst[dstOffs + 0] = src[p + 3];
                    dst[dstOffs + 1] = luma(src[p], src[p + 1], src[p + 2]);
                    dstOffs += 2;
                }
            }
        }
    }
}

export function packRGB565(r: number, g: number, b: number): number {
    return (quantize(r, 5) << 11) | (quantize(g, 6) << 5) | quantize(b, 5);
}

export function encode_RGB565(dst: Uint8Array, src: Uint8Array, w: number, h: number): void {
    let dstOffs = 0;
    for (let yy = 0; yy < h; yy += 4) {
        for (let xx = 0; xx < w; xx += 4) {
            for (let y = 0; y < 4; y++) {
                for (let x = 0; x < 4; x++) {
                    const p = srcOffs(w, h, xx + x, yy + y);
                    set16be(dst, dstOffs, packRGB565(src[p], src[p + 1], src[p + 2]));
                    dstOffs += 2;
                }
            }
        }
    }
}

export function packRGB5A3(r: number, g: number, b: number, a: number): number {
    if (a === 0xFF) {
        // RGB5
        return 0x8000 | (quantize(r, 5) << 10) | (quantize(g, 5) << 5) | quantize(b, 5);
    } else {
        // A3RGB4
        return (quantize(a, 3) << 12) | (quantize(r, 4) << 8) | (quantize(g, 4) << 4) | quantize(b, 4);
    }
}

export function encode_RGB5A3(dst: Uint8Array, src: Uint8Array, w: number, h: number): void {
    let dstOffs = 0;
    for (let yy = 0; yy < h; yy += 4) {
        for (let xx = 0; xx < w; xx += 4) {
            for (let y = 0; y < 4; y++) {
                for (let x = 0; x < 4; x++) {
                    const p = srcOffs(w, h, xx + x, yy + y);
                    set16be(dst, dstOffs, packRGB5A3(src[p], src[p + 1], src[p + 2], src[p + 3]));
                    dstOffs += 2;
                }
            }
        }
    }
}

export function encode_RGBA8(dst: Uint8Array, src: Uint8Array, w: number, h: number): void {
    let dstOffs = 0;
    for (let yy = 0; yy < h; yy += 4) {
        for (let xx = 0; xx < w; xx += 4) {
            for (let y = 0; y < 4; y++) {
                for (let x = 0; x < 4; x++) {
                    const p = srcOffs(w, h, xx + x, yy + y);
                    const ar = dstOffs + (y * 4 + x) * 2;
                    const gb = ar + 0x20;
                    dst[ar + 0] = src[p + 3];
                    dst[ar + 1] = src[p + 0];
                    dst[gb + 0] = src[p + 1];
                    dst[gb + 1] = src[p + 2];
                }
            }
            dstOffs += 0x40;
        }
    }
}

function squaredDist(block: Uint8Array, i: number, colorTable: Uint8Array, ci: number): number {
    const dr = block[i * 4 + 0] - colorTable[ci * 4 + 0];
    const dg = block[i * 4 + 1] - colorTable[ci * 4 + 1];
    const db = block[i * 4 + 2] - colorTable[ci * 4 + 2];
    return dr * dr + dg * dg + db * db;
}

// Bounding box of the block's colours, inset by 1/16 of its extent on each side.
// Returns the two RGB565 endpoints with color1 > color2 (four-colour mode).
function findColorEndpoints(block: Uint8Array): [number, number] {
    let minR = 255, minG = 255, minB = 255;
    let maxR = 0, maxG = 0, maxB = 0;

    for (let i = 0; i < 16; i++) {
        const r = block[i * 4 + 0], g = block[i * 4 + 1], b = block[i * 4 + 2];
        minR = Math.min(minR, r); maxR = Math.max(maxR, r);
        minG = Math.min(minG, g); maxG = Math.max(maxG, g);
        minB = Math.min(minB, b); maxB = Math.max(maxB, b);
    }

    const insetR = Math.round((maxR - minR) / 16);
    const insetG = Math.round((maxG - minG) / 16);
    const insetB = Math.round((maxB - minB) / 16);

    let c1 = packRGB565(maxR - insetR, maxG - insetG, maxB - insetB);
    let c2 = packRGB565(minR + insetR, minG + insetG, minB + insetB);

    if (c1 < c2) {
        const tmp = c1; c1 = c2; c2 = tmp;
    }
    if (c1 === c2) {
        if (c1 < 0xFFFF)
            c1++;
        else
            c2--;
    }

    return [c1, c2];
}

function encodeCMPRBlock(dst: Uint8Array, dstOffs: number, block: Uint8Array, colorTable: Uint8Array): void {
    let hasAlpha = false;
    for (let i = 0; i < 16; i++) {
        if (block[i * 4 + 3] < 0x80) {
            hasAlpha = true;
            break;
        }
    }

    let [color1, color2] = findColorEndpoints(block);
    if (hasAlpha) {
        // Three-colour mode: index 3 is transparent.
        const tmp = color1; color1 = color2; color2 = tmp;
    }

    cmprColorTable(colorTable, color1, color2);

    set16be(dst, dstOffs + 0x00, color1);
    set16be(dst, dstOffs + 0x02, color2);

    for (let y = 0; y < 4; y++) {
        let bits = 0;
        for (let x = 0; x < 4; x++) {
            const i = y * 4 + x;
            let bestIdx = 0;
            if (hasAlpha && block[i * 4 + 3] < 0x80) {
                bestIdx = 3;
            } else {
                let bestDist = Infinity;
                const limit = hasAlpha ? 3 : 4;
                for (let ci = 0; ci < limit; ci++) {
                    const d = squaredDist(block, i, colorTable, ci);
                    if (d < bestDist) {
                        bestDist = d;
                        bestIdx = ci;
                    }
                }
            }
            bits = (bits << 2) | bestIdx;
        }
        dst[dstOffs + 0x04 + y] = bits;
    }
}

export function encode_CMPR(dst: Uint8Array, src: Uint8Array, w: number, h: number): void {
    const block = new Uint8Array(16 * 4);
    const colorTable = new Uint8Array(16);

    let dstOffs = 0;
    for (let yy = 0; yy < h; yy += 8) {
        for (let xx = 0; xx < w; xx += 8) {
            for (let yb = 0; yb < 8; yb += 4) {
                for (let xb = 0; xb < 8; xb += 4) {
                    for (let y = 0; y < 4; y++) {
                        for (let x = 0; x < 4; x++) {
                            const p = srcOffs(w, h, xx + xb + x, yy + yb + y);
                            block.set(src.subarray(p, p + 4), (y * 4 + x) * 4);
                        }
                    }
                    encodeCMPRBlock(dst, dstOffs, block, colorTable);
                    dstOffs += 8;
                }
            }
        }
    }
}
