export type RepairFileErrorCode =
    | 'INVALID_MAGIC'
    | 'SIZE_MISMATCH'
    | 'FRAMING_OUT_OF_BOUNDS'
    | 'CORRUPT_STREAM'
    | 'LIMIT_EXCEEDED'
    | 'MALFORMED_RECORD'
    | 'BAD_INTEGER'
    | 'BAD_DECIMAL'
    | 'MISSING_HEADER';

export class RepairFileError extends Error {
    constructor(message: string, public readonly code: RepairFileErrorCode, public originalError?: unknown) {
        super(message);
        this.name = 'RepairFileError';
    }
}

/** Byte 4 of a trial buffer is not the zlib header byte. */
export class InvalidMagicError extends RepairFileError {
    constructor(message: string) {
        super(message, 'INVALID_MAGIC');
        this.name = 'InvalidMagicError';
    }
}

export class SizeMismatchError extends RepairFileError {
    constructor(message: string, public readonly expected: number, public readonly actual: number | null) {
        super(message, 'SIZE_MISMATCH');
        this.name = 'SizeMismatchError';
    }
}

export class FramingError extends RepairFileError {
    constructor(message: string) {
        super(message, 'FRAMING_OUT_OF_BOUNDS');
        this.name = 'FramingError';
    }
}

export class CorruptStreamError extends RepairFileError {
    constructor(message: string, originalError?: unknown) {
        super(message, 'CORRUPT_STREAM', originalError);
        this.name = 'CorruptStreamError';
    }
}

export class LimitExceededError extends RepairFileError {
    constructor(message: string) {
        super(message, 'LIMIT_EXCEEDED');
        this.name = 'LimitExceededError';
    }
}

/** Base for errors raised while reading the text documents; `row` is 1-based. */
export class RecordError extends RepairFileError {
    constructor(message: string, code: RepairFileErrorCode, public readonly row: number | null) {
        super(row === null ? message : `Row ${row}: ${message}`, code);
        this.name = 'RecordError';
    }
}

export class MalformedRecordError extends RecordError {
    constructor(message: string, row: number | null) {
        super(message, 'MALFORMED_RECORD', row);
        this.name = 'MalformedRecordError';
    }
}

export class BadIntegerError extends RecordError {
    constructor(public readonly value: string, row: number | null) {
        super(`Invalid integer field "${value}"`, 'BAD_INTEGER', row);
        this.name = 'BadIntegerError';
    }
}

export class BadDecimalError extends RecordError {
    constructor(public readonly value: string, row: number | null) {
        super(`Invalid decimal field "${value}"`, 'BAD_DECIMAL', row);
        this.name = 'BadDecimalError';
    }
}

export class MissingHeaderError extends RecordError {
    constructor(public readonly fieldCount: number) {
        super(`Description header has ${fieldCount} fields, expected at least 5`, 'MISSING_HEADER', 1);
        this.name = 'MissingHeaderError';
    }
}
