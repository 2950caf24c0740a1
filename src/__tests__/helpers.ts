/**
 * Shared test utilities: in-memory stand-ins for the Notion collaborators
 */

import { vi } from 'vitest';
import { CollectionPage, ContentRenderer, RemoteCallOptions, RemoteContentSource, RemoteRecord } from '../types';

/**
 * Error shaped like the SDK's APIResponseError
 */
export function apiError(status: number, message: string, code = 'test_error'): Error {
    return Object.assign(new Error(message), { status, code });
}

export function richText(...runs: string[]): Array<{ plain_text: string }> {
    return runs.map((plain_text) => ({ plain_text }));
}

export function makeIds(count: number, prefix = 'page-'): string[] {
    return Array.from({ length: count }, (_, index) => `${prefix}${index}`);
}

export function createTestRecord(overrides?: Partial<RemoteRecord>): RemoteRecord {
    return {
        id: 'p1',
        lastEditedTime: new Date('2024-05-01T12:00:00.000Z'),
        properties: {
            Name: { id: 'title', type: 'title', title: richText('Hello') },
            Done: { id: 'a%3Ab', type: 'checkbox', checkbox: false },
        },
        ...overrides,
    };
}

export interface TestSourceOptions {
    records?: RemoteRecord[];
    /** Ids of the database, served in pages of `pageSize` */
    collection?: string[];
    pageSize?: number;
}

/**
 * Create an in-memory source
 *
 * Cursors are the index of the next item, as strings.
 */
export function createTestSource(options: TestSourceOptions = {}) {
    const records = new Map((options.records ?? [createTestRecord()]).map((record) => [record.id, record]));
    const collection = options.collection ?? [];
    const servedPageSize = options.pageSize ?? 100;

    const fetchRecord = vi.fn(async (id: string, _options?: RemoteCallOptions): Promise<RemoteRecord> => {
        const record = records.get(id);
        if (!record) {
            throw apiError(404, `Could not find page with ID: ${id}.`, 'object_not_found');
        }
        return record;
    });

    const queryCollection = vi.fn(
        async (
            _collectionId: string,
            cursor: string | undefined,
            pageSize: number,
            _options?: RemoteCallOptions,
        ): Promise<CollectionPage> => {
            const start = cursor === undefined ? 0 : Number(cursor);
            const end = start + Math.min(servedPageSize, pageSize);
            return {
                items: collection.slice(start, end).map((id) => ({ id })),
                nextCursor: end < collection.length ? String(end) : undefined,
            };
        },
    );

    const source: RemoteContentSource = { name: 'test-source', fetchRecord, queryCollection };
    return { source, fetchRecord, queryCollection };
}

export function createTestRenderer(bodies: Record<string, string> = { p1: '# Hello\n' }) {
    const render = vi.fn(async (id: string, _options?: RemoteCallOptions): Promise<string> => {
        const body = bodies[id];
        if (body === undefined) {
            throw new Error(`no blocks for ${id}`);
        }
        return body;
    });

    const renderer: ContentRenderer = { name: 'test-renderer', render };
    return { renderer, render };
}
