export type ErrorKind =
    | 'Unauthorized'
    | 'InvalidState'
    | 'NotFound'
    | 'MalformedAnswer'
    | 'PersistenceFailure'
    | 'InvalidInput'
    | 'Conflict';

export class ReedzError extends Error {
    readonly kind: ErrorKind;
    readonly details?: Record<string, unknown>;

    constructor(kind: ErrorKind, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ReedzError';
        this.kind = kind;
        this.details = details;
    }
}

export function isReedzError(error: unknown): error is ReedzError {
    return error instanceof ReedzError;
}

export const unauthorized = (message: string) => new ReedzError('Unauthorized', message);
export const invalidState = (message: string, details?: Record<string, unknown>) => new ReedzError('InvalidState', message, details);
export const notFound = (message: string, details?: Record<string, unknown>) => new ReedzError('NotFound', message, details);
export const malformedAnswer = (message: string, details?: Record<string, unknown>) => new ReedzError('MalformedAnswer', message, details);
export const invalidInput = (message: string, details?: Record<string, unknown>) => new ReedzError('InvalidInput', message, details);
export const conflict = (message: string, details?: Record<string, unknown>) => new ReedzError('Conflict', message, details);
