import { StorageError } from './errors';
import { DOCUMENT_SUFFIX, RecordIdentifier } from './types';

/**
 * Decode an accessor path into a page id
 *
 * The namespace is flat: one level of page ids under the root.
 * e.g. "abc123.md" → "abc123", "abc123" → "abc123"
 */
export function parsePagePath(path: string): RecordIdentifier {
    if (path.includes('..') || path.includes('/')) {
        throw new StorageError('NotFound', 'nested paths are not supported', { context: { path } });
    }

    const id = path.endsWith(DOCUMENT_SUFFIX) ? path.slice(0, -DOCUMENT_SUFFIX.length) : path;
    if (id.length === 0) {
        throw new StorageError('NotFound', 'page id is required in path', { context: { path } });
    }

    return id;
}

export function isRoot(path: string): boolean {
    return path === '' || path === '/';
}

/**
 * Root spellings accepted when listing
 */
export function isRootDir(path: string): boolean {
    return isRoot(path) || path === './' || path === '/.';
}

export function pagePath(id: RecordIdentifier): string {
    return `${id}${DOCUMENT_SUFFIX}`;
}
