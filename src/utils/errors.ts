/**
 * Calculator Errors
 * Error types shared by the tax engine, the front ends and the store
 */

export type ErrorCode = 'VALIDATION_ERROR' | 'PARSE_ERROR' | 'NOT_FOUND' | 'STORE_ERROR';

export class TaxCalculatorError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'TaxCalculatorError';
        this.code = code;

        Error.captureStackTrace(this, this.constructor);
    }
}

/**
 * Thrown when an input is missing, out of range or breaks a partnership rule.
 * `field` uses dotted/indexed paths, e.g. `partners[1].sharePercent`.
 */
export class ValidationError extends TaxCalculatorError {
    readonly field: string;
    readonly constraint: string;

    constructor(field: string, constraint: string) {
        super('VALIDATION_ERROR', `Invalid ${field}: ${constraint}`);
        this.name = 'ValidationError';
        this.field = field;
        this.constraint = constraint;
    }
}

/**
 * Thrown when a command-line value or a `name:share:role` partner flag
 * cannot be read
 */
export class ParseError extends TaxCalculatorError {
    readonly input: string;

    constructor(input: string, reason: string) {
        super('PARSE_ERROR', `Cannot parse "${input}": ${reason}`);
        this.name = 'ParseError';
        this.input = input;
    }
}

export class NotFoundError extends TaxCalculatorError {
    readonly entity: 'company' | 'calculation';
    readonly key: string | number;

    constructor(entity: 'company' | 'calculation', key: string | number) {
        super('NOT_FOUND', `No ${entity} found for ${JSON.stringify(key)}`);
        this.name = 'NotFoundError';
        this.entity = entity;
        this.key = key;
    }
}

export class StoreError extends TaxCalculatorError {
    constructor(message: string, cause?: unknown) {
        super('STORE_ERROR', message, { cause });
        this.name = 'StoreError';
    }
}

/**
 * Errors a front end reports to the user instead of treating as a crash
 */
export function isUserFacingError(error: unknown): error is ValidationError | ParseError | NotFoundError {
    return error instanceof ValidationError
        || error instanceof ParseError
        || error instanceof NotFoundError;
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
