/**
 * Loader failure classification.
 */
export type LoaderErrorCode = 'SOURCE_NOT_FOUND' | 'MALFORMED_DATA' | 'DECODE_FAILURE';

/**
 * Raised when an external lemma or suffix source cannot be read.
 */
export class LoaderError extends Error {
    constructor(
        message: string,
        public readonly code: LoaderErrorCode,
        public readonly path: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'LoaderError';
    }
}

/**
 * Map a filesystem error to a LoaderError.
 */
export function toLoaderError(error: unknown, path: string): LoaderError {
    if (error instanceof LoaderError) return error;

    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT' || code === 'EISDIR') {
        return new LoaderError(`Source not found: ${path}`, 'SOURCE_NOT_FOUND', path, { cause: error });
    }
    return new LoaderError(`Failed to read ${path}`, 'MALFORMED_DATA', path, { cause: error });
}
