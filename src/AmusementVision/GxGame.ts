
// Per-game container rules. Everything that differs between the console builds and the
// little-endian DX port is decided here, once, and read back by the parsers and writers.

import { Endianness } from '../endian.js';
import { TexFormat } from '../gx/gx_enum.js';
import { ArgumentError } from '../errors.js';
import { align } from '../util.js';

export const enum GxGame {
    SuperMonkeyBall = 'SuperMonkeyBall',
    FZeroGX = 'FZeroGX',
    SuperMonkeyBallDX = 'SuperMonkeyBallDX',
}

export type TplHeaderSchema = 'standard' | 'dx';

export interface GxGamePolicy {
    readonly game: GxGame;
    readonly endianness: Endianness;
    readonly headerSchema: TplHeaderSchema;
    // Four-character tag at the very start of the file, if any.
    readonly magic: string | null;
    // Last field of every texture header record.
    readonly checkValue: number;
    readonly headerEntryStride: number;
    // Bytes before the first header record: the tag, then the texture count.
    readonly headerPrefixSize: number;
    readonly headerAlignment: number;
    // Per-texture descriptor in front of the texture data; 0 when the game has none.
    readonly dxDescriptorSize: number;
    // Descriptor format codes, DX code -> GX format.
    readonly dxFormatCodes: ReadonlyMap<number, TexFormat>;
    // Unknown formats are kept as opaque bytes instead of failing the load.
    readonly rawFormatPassthrough: boolean;
    // Reproduce the F-Zero GX packer's sizing of the smallest I8 level when reading.
    readonly inheritedI8Overread: boolean;
}

const noFormatCodes: ReadonlyMap<number, TexFormat> = new Map();

const standardPolicy = {
    endianness: Endianness.BIG_ENDIAN,
    headerSchema: 'standard',
    magic: null,
    checkValue: 0x1234,
    headerEntryStride: 0x10,
    headerPrefixSize: 0x04,
    headerAlignment: 0x20,
    dxDescriptorSize: 0x00,
    dxFormatCodes: noFormatCodes,
    rawFormatPassthrough: false,
    inheritedI8Overread: false,
} as const;

const gamePolicies: ReadonlyMap<string, GxGamePolicy> = new Map<string, GxGamePolicy>([
    [GxGame.SuperMonkeyBall, { ...standardPolicy, game: GxGame.SuperMonkeyBall }],
    [GxGame.FZeroGX, { ...standardPolicy, game: GxGame.FZeroGX, inheritedI8Overread: true }],
    [GxGame.SuperMonkeyBallDX, {
        game: GxGame.SuperMonkeyBallDX,
        endianness: Endianness.LITTLE_ENDIAN,
        headerSchema: 'dx',
        magic: 'XTPL',
        checkValue: 0x3412,
        headerEntryStride: 0x10,
        headerPrefixSize: 0x08,
        headerAlignment: 0x20,
        dxDescriptorSize: 0x20,
        dxFormatCodes: new Map<number, TexFormat>([
            [0x0C, TexFormat.CMPR],
            [0x1A, TexFormat.I8],
            [0x0E, TexFormat.RGB5A3],
        ]),
        rawFormatPassthrough: true,
        inheritedI8Overread: false,
    }],
]);

export function isGxGame(game: string): game is GxGame {
    return gamePolicies.has(game);
}

export function getGamePolicy(game: string): GxGamePolicy {
    const policy = gamePolicies.get(game);
    if (policy === undefined)
        throw new ArgumentError(`Unknown game ${JSON.stringify(game)}`);
    return policy;
}

/**
 * The code a DX descriptor stores for {@param format}. Formats without a DX code keep their
 * GX code, which does not collide with any DX code.
 */
export function getDxFormatCode(policy: GxGamePolicy, format: TexFormat): number {
    for (const [dxCode, gxFormat] of policy.dxFormatCodes)
        if (gxFormat === format)
            return dxCode;
    return format;
}

export function getMagicSize(policy: GxGamePolicy): number {
    return policy.magic !== null ? policy.magic.length : 0;
}

export function getHeaderSize(policy: GxGamePolicy, entryCount: number): number {
    return align(policy.headerPrefixSize + policy.headerEntryStride * entryCount, policy.headerAlignment);
}
