
// GX texture decoders. Each takes the tiled on-disk bytes and writes row-major RGBA8 of the
// logical size; texels that fall in the tile padding are read past and dropped.

// http://www.mindcontrol.org/~hplus/graphics/expand-bits.html
export function expand3to8(n: number): number {
    return (n << (8 - 3)) | (n << (8 - 6)) | (n >>> (9 - 8));
}

export function expand4to8(n: number): number {
    return (n << 4) | n;
}

export function expand5to8(n: number): number {
    return (n << (8 - 5)) | (n >>> (10 - 8));
}

export function expand6to8(n: number): number {
    return (n << (8 - 6)) | (n >>> (12 - 8));
}

function get16be(src: Uint8Array, offs: number): number {
    return (src[offs] << 8) | src[offs + 1];
}

function set(dst: Uint8Array, w: number, h: number, x: number, y: number, r: number, g: number, b: number, a: number): void {
    if (x >= w || y >= h)
        return;
    const dstOffs = (w * y + x) * 4;
    dst[dstOffs + 0] = r;
    dst[dstOffs + 1] = g;
    dst[dstOffs + 2] = b;
    dst[dstOffs + 3] = a;
}

export function decode_I4(dst: Uint8Array, src: Uint8Array, w: number, h: number): void {
    let srcOffs = 0;
    for (let yy = 0; yy < h; yy += 8) {
        for (let xx = 0; xx < w; xx += 8) {
            for (let y = 0; y < 8; y++) {
                for (let x = 0; x < 8; x++) {
                    const ii = src[srcOffs >>> 1];
                    const i = expand4to8((ii >>> ((srcOffs & 1) ? 0 : 4)) & 0x0F);
                    set(dst, w, h, xx + x, yy + y, i, i, i, i);
                    srcOffs++;
                }
            }
        }
    }
}

export function decode_I8(dst: Uint8Array, src: Uint8Array, w: number, h: number): void {
    let srcOffs = 0;
    for (let yy = 0; yy < h; yy += 4) {
        for (let xx = 0; xx < w; xx += 8) {
            for (let y = 0; y < 4; y++) {
                for (let x = 0; x < 8; x++) {
                    const i = src[srcOffs];
                    set(dst, w, h, xx + x, yy + y, i, i, i, i);
                    srcOffs++;
                }
            }
        }
    }
}

export function decode_IA4(dst: Uint8Array, src: Uint8Array, w: number, h: number): void {
    let srcOffs = 0;
    for (let yy = 0; yy < h; yy += 4) {
        for (let xx = 0; xx < w; xx += 8) {
            for (let y = 0; y < 4; y++) {
                for (let x = 0; x < 8; x++) {
                    const ia = src[srcOffs];
                    const a = expand4to8(ia >>> 4);
                    const i = expand4to8(ia & 0x0F);
                    set(dst, w, h, xx + x, yy + y, i, i, i, a);
                    srcOffs++;
                }
            }
        }
    }
}

export function decode_IA8(dst: Uint8Array, src: Uint8Array, w: number, h: number): void {
    let srcOffs = 0;
    for (let yy = 0; yy < h; yy += 4) {
        for (let xx = 0; xx < w; xx += 4) {
            for (let y = 0; y < 4; y++) {
                for (let x = 0; x < 4; x++) {
                    const a = src[srcOffs + 0];
                    const i = src[srcOffs + 1];
                    set(dst, w, h, xx + x, yy + y, i, i, i, a);
                    srcOffs += 2;
                }
            }
        }
    }
}

export function decode_RGB565(dst: Uint8Array, src: Uint8Array, w: number, h: number): void {
    let srcOffs = 0;
    for (let yy = 0; yy < h; yy += 4) {
        for (let xx = 0; xx < w; xx += 4) {
            for (let y = 0; y < 4; y++) {
                for (let x = 0; x < 4; x++) {
                    const p = get16be(src, srcOffs);
                    set(dst, w, h, xx + x, yy + y,
                        expand5to8((p >>> 11) & 0x1F),
                        expand6to8((p >>> 5) & 0x3F),
                        expand5to8(p & 0x1F),
                        0xFF);
                    srcOffs += 2;
                }
            }
        }
    }
}

export function decode_RGB5A3(dst: Uint8Array, src: Uint8Array, w: number, h: number): void {
    let srcOffs = 0;
    for (let yy = 0; yy < h; yy += 4) {
        for (let xx = 0; xx < w; xx += 4) {
            for (let y = 0; y < 4; y++) {
                for (let x = 0; x < 4; x++) {
                    const p = get16be(src, srcOffs);
                    if (p & 0x8000) {
                        // RGB5
                        set(dst, w, h, xx + x, yy + y,
                            expand5to8((p >>> 10) & 0x1F),
                            expand5to8((p >>> 5) & 0x1F),
                            expand5to8(p & 0x1F),
                            0xFF);
                    } else {
                        // A3RGB4
                        set(dst, w, h, xx + x, yy + y,
                            expand4to8((p >>> 8) & 0x0F),
                            expand4to8((p >>> 4) & 0x0F),
                            expand4to8(p & 0x0F),
                            expand3to8((p >>> 12) & 0x07));
                    }
                    srcOffs += 2;
                }
            }
        }
    }
}

export function decode_RGBA8(dst: Uint8Array, src: Uint8Array, w: number, h: number): void {
    // Each 4x4 tile is stored as 16 AR pairs followed by 16 GB pairs.
    let srcOffs = 0;
    for (let yy = 0; yy < h; yy += 4) {
        for (let xx = 0; xx < w; xx += 4) {
            for (let y = 0; y < 4; y++) {
                for (let x = 0; x < 4; x++) {
                    const ar = srcOffs + (y * 4 + x) * 2;
                    const gb = ar + 0x20;
                    set(dst, w, h, xx + x, yy + y, src[ar + 1], src[gb + 0], src[gb + 1], src[ar + 0]);
                }
            }
            srcOffs += 0x40;
        }
    }
}

// GX uses a HW approximation of 3/8 + 5/8 instead of 1/3 + 2/3.
export function s3tcblend(a: number, b: number): number {
    // return (a*3 + b*5) / 8;
    return (((a << 1) + a) + ((b << 2) + b)) >>> 3;
}

function halfblend(a: number, b: number): number {
    return (a + b) >>> 1;
}

/**
 * Fill {@param colorTable} (4 RGBA entries) for one CMPR sub-block.
 */
export function cmprColorTable(colorTable: Uint8Array, color1: number, color2: number): void {
    colorTable[0] = expand5to8((color1 >>> 11) & 0x1F);
    colorTable[1] = expand6to8((color1 >>> 5) & 0x3F);
    colorTable[2] = expand5to8(color1 & 0x1F);
    colorTable[3] = 0xFF;

    colorTable[4] = expand5to8((color2 >>> 11) & 0x1F);
    colorTable[5] = expand6to8((color2 >>> 5) & 0x3F);
    colorTable[6] = expand5to8(color2 & 0x1F);
    colorTable[7] = 0xFF;

    if (color1 > color2) {
        // Predict gradients.
        colorTable[8]  = s3tcblend(colorTable[4], colorTable[0]);
        colorTable[9]  = s3tcblend(colorTable[5], colorTable[1]);
        colorTable[10] = s3tcblend(colorTable[6], colorTable[2]);
        colorTable[11] = 0xFF;

        colorTable[12] = s3tcblend(colorTable[0], colorTable[4]);
        colorTable[13] = s3tcblend(colorTable[1], colorTable[5]);
        colorTable[14] = s3tcblend(colorTable[2], colorTable[6]);
        colorTable[15] = 0xFF;
    } else {
        colorTable[8]  = halfblend(colorTable[0], colorTable[4]);
        colorTable[9]  = halfblend(colorTable[1], colorTable[5]);
        colorTable[10] = halfblend(colorTable[2], colorTable[6]);
        colorTable[11] = 0xFF;

        // CMPR difference: GX fills with an alpha 0 midway point here.
        colorTable[12] = colorTable[8];
        colorTable[13] = colorTable[9];
        colorTable[14] = colorTable[10];
        colorTable[15] = 0x00;
    }
}

export function decode_CMPR(dst: Uint8Array, src: Uint8Array, w: number, h: number): void {
    // CMPR swizzles macroblocks to be in a 2x2 grid of UL, UR, BL, BR.
    const colorTable = new Uint8Array(16);

    let srcOffs = 0;
    for (let yy = 0; yy < h; yy += 8) {
        for (let xx = 0; xx < w; xx += 8) {
            for (let yb = 0; yb < 8; yb += 4) {
                for (let xb = 0; xb < 8; xb += 4) {
                    if (xx + xb >= w || yy + yb >= h) {
                        srcOffs += 8;
                        continue;
                    }

                    // CMPR difference: Big-endian color1/2
                    cmprColorTable(colorTable, get16be(src, srcOffs + 0x00), get16be(src, srcOffs + 0x02));

                    for (let y = 0; y < 4; y++) {
                        let bits = src[srcOffs + 0x04 + y];
                        for (let x = 0; x < 4; x++) {
                            const colorIdx = (bits >>> 6) & 0x03;
                            set(dst, w, h, xx + xb + x, yy + yb + y,
                                colorTable[colorIdx * 4 + 0],
                                colorTable[colorIdx * 4 + 1],
                                colorTable[colorIdx * 4 + 2],
                                colorTable[colorIdx * 4 + 3]);
                            bits <<= 2;
                        }
                    }

                    srcOffs += 8;
                }
            }
        }
    }
}
