/**
 * Domain errors raised by the core services.
 *
 * Not-found conditions are never thrown; stores return null/false instead.
 */

export class DetectionFailureError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'DetectionFailureError';
    }
}

export class InvalidNameError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidNameError';
    }
}

export class StorageWriteError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StorageWriteError';
    }
}

export function errorMessage(error: unknown): string {
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return error.message;
    }
    return String(error);
}
