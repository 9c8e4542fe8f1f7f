import { readFileSync } from 'node:fs';
import { LoaderError, toLoaderError } from './errors.js';

const decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Read a file as strict UTF-8. A leading BOM is dropped.
 */
export function readUtf8(path: string): string {
    let bytes: Buffer;
    try {
        bytes = readFileSync(path);
    } catch (error) {
        throw toLoaderError(error, path);
    }

    try {
        return decoder.decode(bytes);
    } catch (error) {
        throw new LoaderError(`Invalid UTF-8 in ${path}`, 'DECODE_FAILURE', path, { cause: error });
    }
}
