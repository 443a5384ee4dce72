
export type ErrorCode =
    | 'INVALID_SCHEMA'
    | 'MALFORMED_RECORD'
    | 'UNKNOWN_RECORD_TYPE'
    | 'UNKNOWN_FIELD'
    | 'AMBIGUOUS_SELECTION'
    | 'RECORD_NOT_FOUND'
    | 'VALUE_TOO_LONG'
    | 'INVALID_VALUE'
    | 'SCHEMA_MISMATCH';

/**
 * Base class for every failure the editor reports on purpose.
 * Anything else reaching a caller is an I/O error from the OS.
 */
export class FixedWidthError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string) {
        super(message);
        this.code = code;
        this.name = 'FixedWidthError';
    }
}

export class InvalidSchemaError extends FixedWidthError {
    constructor(message: string) {
        super('INVALID_SCHEMA', `Invalid schema: ${message}`);
        this.name = 'InvalidSchemaError';
    }
}

export class MalformedRecordError extends FixedWidthError {
    readonly lineNumber: number;
    readonly reason: string;

    constructor(lineNumber: number, reason: string) {
        super('MALFORMED_RECORD', `Malformed record on line ${lineNumber}: ${reason}`);
        this.name = 'MalformedRecordError';
        this.lineNumber = lineNumber;
        this.reason = reason;
    }
}

export class UnknownRecordTypeError extends FixedWidthError {
    readonly recordType: string;

    constructor(recordType: string) {
        super('UNKNOWN_RECORD_TYPE', `Unknown record type '${recordType}'`);
        this.name = 'UnknownRecordTypeError';
        this.recordType = recordType;
    }
}

export class UnknownFieldError extends FixedWidthError {
    readonly recordType: string;
    readonly field: string;

    constructor(recordType: string, field: string) {
        super('UNKNOWN_FIELD', `Record type '${recordType}' has no field '${field}'`);
        this.name = 'UnknownFieldError';
        this.recordType = recordType;
        this.field = field;
    }
}

export class AmbiguousSelectionError extends FixedWidthError {
    readonly recordType: string;
    readonly candidates: number;

    constructor(recordType: string, candidates: number, hint = 'a selector is required') {
        super('AMBIGUOUS_SELECTION', `${candidates} '${recordType}' records match; ${hint}`);
        this.name = 'AmbiguousSelectionError';
        this.recordType = recordType;
        this.candidates = candidates;
    }
}

export class RecordNotFoundError extends FixedWidthError {
    readonly recordType: string;

    constructor(recordType: string, detail?: string) {
        super('RECORD_NOT_FOUND', detail
            ? `No '${recordType}' record with ${detail}`
            : `No '${recordType}' record in file`);
        this.name = 'RecordNotFoundError';
        this.recordType = recordType;
    }
}

export class ValueTooLongError extends FixedWidthError {
    readonly field: string;
    readonly width: number;
    readonly actual: number;

    constructor(field: string, width: number, actual: number) {
        super('VALUE_TOO_LONG', `Value for '${field}' needs ${actual} bytes but the field is ${width} wide`);
        this.name = 'ValueTooLongError';
        this.field = field;
        this.width = width;
        this.actual = actual;
    }
}

export class InvalidValueError extends FixedWidthError {
    readonly field: string;

    constructor(field: string, message: string) {
        super('INVALID_VALUE', `Invalid value for '${field}': ${message}`);
        this.name = 'InvalidValueError';
        this.field = field;
    }
}

export class SchemaMismatchError extends FixedWidthError {
    constructor(message: string) {
        super('SCHEMA_MISMATCH', message);
        this.name = 'SchemaMismatchError';
    }
}
