/**
 * Database Pagination
 *
 * Drives Notion's cursor-based database query to completion.
 *
 * Modes:
 * - 'all'    - Return every page id in the database
 * - 'window' - Skip `offset` ids, collect up to `limit`, stop paging once full
 *              (or keep paging to the end with `untilExhausted` to count every item)
 *
 * Pages are requested one at a time; each request needs the previous cursor.
 * A failed request fails the whole listing. Nothing partial is returned.
 */

import debug from 'debug';
import { z } from 'zod';
import { StorageError, remoteCall, throwIfCancelled } from './errors';
import { ListingWindow, PaginationCursor, RecordIdentifier, RemoteCallOptions, RemoteContentSource } from './types';

const log = debug('notion-storage:paginator');

/** Largest page size the Notion API accepts */
export const MAX_PAGE_SIZE = 100;

export type ListingMode =
    | { kind: 'all' }
    | ({ kind: 'window'; untilExhausted?: boolean } & ListingWindow);

export interface ListingResult {
    ids: RecordIdentifier[];

    /** Items seen on every page fetched, before windowing */
    visited: number;
}

export const listingWindowSchema = z.object({
    offset: z.number().int().min(0),
    limit: z.number().int().positive(),
});

export function validateWindow(window: ListingWindow): ListingWindow {
    const parsed = listingWindowSchema.safeParse(window);
    if (!parsed.success) {
        const fields = parsed.error.issues.map((issue) => issue.path.join('.') || 'window').join(', ');
        throw new StorageError('InvalidInput', `invalid listing window: ${fields}`, {
            context: { offset: String(window.offset), limit: String(window.limit) },
        });
    }
    return parsed.data;
}

function ensureNotAborted(signal: AbortSignal | undefined, collectionId: string): void {
    throwIfCancelled(signal, 'database listing was cancelled', { database_id: collectionId });
}

/**
 * Lazily walk a database, yielding one page id at a time
 *
 * The next page is requested only once the previous one has been consumed,
 * so a consumer that stops early stops the requests too.
 */
export async function* iterateCollection(
    source: RemoteContentSource,
    collectionId: string,
    options: RemoteCallOptions = {},
): AsyncGenerator<RecordIdentifier, void, undefined> {
    let cursor: PaginationCursor | undefined;
    let pageCount = 0;

    do {
        ensureNotAborted(options.signal, collectionId);

        const page = await remoteCall('query_database', () =>
            source.queryCollection(collectionId, cursor, MAX_PAGE_SIZE, options),
        );
        ensureNotAborted(options.signal, collectionId);

        pageCount++;
        log('Fetched database page', {
            database: collectionId,
            page: pageCount,
            items: page.items.length,
            hasMore: page.nextCursor !== undefined,
        });

        for (const item of page.items) {
            yield item.id;
        }

        cursor = page.nextCursor;
    } while (cursor !== undefined);
}

/**
 * List page ids of a database
 *
 * @param source - Remote source to query
 * @param collectionId - Notion database id
 * @param mode - Accumulate everything, or a window over the full ordering
 */
export async function paginateCollection(
    source: RemoteContentSource,
    collectionId: string,
    mode: ListingMode = { kind: 'all' },
    options: RemoteCallOptions = {},
): Promise<ListingResult> {
    const window = mode.kind === 'window' ? validateWindow(mode) : undefined;
    const stopWhenFull = mode.kind === 'window' && !mode.untilExhausted;

    let cursor: PaginationCursor | undefined;
    let visited = 0;
    let skipped = 0;
    const ids: RecordIdentifier[] = [];

    do {
        ensureNotAborted(options.signal, collectionId);

        const page = await remoteCall('query_database', () =>
            source.queryCollection(collectionId, cursor, MAX_PAGE_SIZE, options),
        );
        ensureNotAborted(options.signal, collectionId);

        visited += page.items.length;

        for (const item of page.items) {
            if (!window) {
                ids.push(item.id);
                continue;
            }

            if (skipped < window.offset) {
                skipped++;
                continue;
            }

            if (ids.length < window.limit) {
                ids.push(item.id);
            }
        }

        if (stopWhenFull && window && ids.length >= window.limit) {
            break;
        }

        cursor = page.nextCursor;
    } while (cursor !== undefined);

    log('Listed database', { database: collectionId, mode: mode.kind, visited, returned: ids.length });

    return { ids, visited };
}
