// Structural problem in a container header: bad check value, inconsistent fields,
// offsets that point outside the file.
export class InvalidHeaderError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidHeaderError';
    }
}

// A defined texture whose format code the game does not allow.
export class InvalidFormatError extends Error {
    constructor(message: string, public readonly formatRaw: number) {
        super(message);
        this.name = 'InvalidFormatError';
    }
}

// A pixel codec was asked for a format it cannot encode or decode.
export class UnsupportedFormatError extends Error {
    constructor(message: string, public readonly formatRaw: number) {
        super(message);
        this.name = 'UnsupportedFormatError';
    }
}

export class ArgumentError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ArgumentError';
    }
}
