export const enum Endianness {
    LITTLE_ENDIAN,
    BIG_ENDIAN,
}

export function isLittleEndian(endianness: Endianness): boolean {
    return endianness === Endianness.LITTLE_ENDIAN;
}

export function getEndiannessName(endianness: Endianness): string {
    return endianness === Endianness.LITTLE_ENDIAN ? "little-endian" : "big-endian";
}
