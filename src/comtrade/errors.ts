export class ComtradeError extends Error {
    constructor(message: string, public originalError?: unknown) {
        super(message);
        this.name = 'ComtradeError';
    }
}

export class MissingFileError extends ComtradeError {
    constructor(public readonly path: string) {
        super(`File not found: ${path}`);
        this.name = 'MissingFileError';
    }
}

export class NotComtradeError extends ComtradeError {
    constructor(public readonly path: string) {
        super(`Not a comtrade file: ${path}`);
        this.name = 'NotComtradeError';
    }
}

/** The configuration has fewer lines or fields than its own declarations require. */
export class StructuralMismatchError extends ComtradeError {
    constructor(message: string) {
        super(message);
        this.name = 'StructuralMismatchError';
    }
}

export class FieldCountError extends StructuralMismatchError {
    constructor(
        public readonly record: string,
        public readonly expected: number,
        public readonly actual: number,
    ) {
        super(`${record}: expected at least ${expected} fields, got ${actual}`);
        this.name = 'FieldCountError';
    }
}

export class FieldFormatError extends ComtradeError {
    constructor(
        public readonly record: string,
        public readonly field: string,
        public readonly value: string,
    ) {
        super(`${record}: field '${field}' has invalid value '${value}'`);
        this.name = 'FieldFormatError';
    }
}

export class UnsupportedEncodingError extends ComtradeError {
    constructor(public readonly encoding: string) {
        super(`Unsupported data encoding '${encoding}' (only 16-bit binary sample bodies are decoded)`);
        this.name = 'UnsupportedEncodingError';
    }
}

export class IncompleteDataError extends ComtradeError {
    constructor(message: string) {
        super(message);
        this.name = 'IncompleteDataError';
    }
}

export class SampleRateError extends ComtradeError {
    constructor(message: string) {
        super(message);
        this.name = 'SampleRateError';
    }
}

export class LimitExceededError extends ComtradeError {
    constructor(message: string) {
        super(message);
        this.name = 'LimitExceededError';
    }
}

export class ChannelCollisionError extends ComtradeError {
    constructor(public readonly channel: string) {
        super(`Channel name collision between analog and digital channels: '${channel}'`);
        this.name = 'ChannelCollisionError';
    }
}
