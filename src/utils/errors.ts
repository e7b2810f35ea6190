/**
 * Error taxonomy for caller-facing operations.
 *
 * Caller-facing functions return `T | CacheError` instead of throwing, so a
 * lookup failure is an ordinary value the caller narrows with `isCacheError`.
 */
export type CacheErrorKind =
    | 'InvalidIdKind'
    | 'UnsupportedDirectFetch'
    | 'ParseFailure'
    | 'NotCached'
    | 'NetworkTimeout'
    | 'NetworkError'
    | 'StorageCorrupt'
    | 'InvalidFilter';

export class CacheError extends Error {
    constructor(
        public readonly kind: CacheErrorKind,
        message: string,
        /** The raw offending payload, where one is available */
        public readonly payload?: unknown
    ) {
        super(message);
        this.name = 'CacheError';
    }

    toJSON(): { kind: CacheErrorKind; message: string; payload?: unknown } {
        return this.payload === undefined
            ? { kind: this.kind, message: this.message }
            : { kind: this.kind, message: this.message, payload: this.payload };
    }
}

export function isCacheError(value: unknown): value is CacheError {
    return value instanceof CacheError;
}
