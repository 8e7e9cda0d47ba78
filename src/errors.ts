export enum AvailabilityErrorCode {
    FILE_READ_ERROR = 'FILE_READ_ERROR',
    FILE_INVALID_FORMAT = 'FILE_INVALID_FORMAT',
}

export interface AvailabilityLoadErrorOptions {
    code: AvailabilityErrorCode;
    source?: string;
    cause?: unknown;
}

/**
 * Raised when the availability file cannot be read or is not a
 * date -> time -> non-negative integer mapping.
 *
 * Fatal at startup: no partially loaded store is ever returned.
 */
export class AvailabilityLoadError extends Error {
    readonly code: AvailabilityErrorCode;
    readonly source?: string;

    constructor(message: string, options: AvailabilityLoadErrorOptions) {
        super(message, { cause: options.cause });
        this.name = 'AvailabilityLoadError';
        this.code = options.code;
        this.source = options.source;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, AvailabilityLoadError);
        }
    }
}
