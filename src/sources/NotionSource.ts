/**
 * Notion Source Adapter
 *
 * Default collaborators backed by the official Notion SDK:
 * - NotionSource reads pages and queries databases
 * - NotionMarkdownRenderer converts page blocks to markdown via notion-to-md
 *
 * Neither translates errors. SDK failures (APIResponseError, RequestTimeoutError, ...)
 * propagate as-is and are translated once by the accessor.
 *
 * Example:
 * ```typescript
 * const { source, renderer } = createNotionConnection(process.env.NOTION_API_TOKEN);
 * const page = await source.fetchRecord('0f3c...');
 * ```
 */

import { Client, isFullPage } from '@notionhq/client';
import { NotionToMarkdown } from 'notion-to-md';
import debug from 'debug';
import {
    CollectionPage,
    ContentRenderer,
    PaginationCursor,
    RecordIdentifier,
    RemoteCallOptions,
    RemoteContentSource,
    RemoteRecord,
} from '../types';

const log = debug('notion-storage:source');

export interface NotionConnectionConfig {
    /** Request timeout passed to the SDK client */
    timeoutMs?: number;
}

export interface NotionConnection {
    source: RemoteContentSource;
    renderer: ContentRenderer;
}

export function createNotionClient(token: string, config: NotionConnectionConfig = {}): Client {
    return new Client({ auth: token, timeoutMs: config.timeoutMs });
}

export class NotionSource implements RemoteContentSource {
    readonly name = 'notion';

    constructor(private readonly client: Client) {}

    async fetchRecord(id: RecordIdentifier, options: RemoteCallOptions = {}): Promise<RemoteRecord> {
        options.signal?.throwIfAborted();

        const page = await this.client.pages.retrieve({ page_id: id });
        if (!isFullPage(page)) {
            throw new Error(`Notion returned a partial page for ${id}`);
        }

        log('Retrieved page', { id: page.id, properties: Object.keys(page.properties).length });

        return {
            id: page.id,
            lastEditedTime: new Date(page.last_edited_time),
            properties: page.properties,
        };
    }

    async queryCollection(
        collectionId: string,
        cursor: PaginationCursor | undefined,
        pageSize: number,
        options: RemoteCallOptions = {},
    ): Promise<CollectionPage> {
        options.signal?.throwIfAborted();

        const response = await this.client.databases.query({
            database_id: collectionId,
            start_cursor: cursor,
            page_size: pageSize,
        });

        return {
            items: response.results.map((result) => ({ id: result.id })),
            nextCursor: response.next_cursor ?? undefined,
        };
    }
}

export class NotionMarkdownRenderer implements ContentRenderer {
    readonly name = 'notion-to-md';
    private readonly converter: NotionToMarkdown;

    constructor(client: Client) {
        this.converter = new NotionToMarkdown({ notionClient: client });
    }

    async render(id: RecordIdentifier, options: RemoteCallOptions = {}): Promise<string> {
        options.signal?.throwIfAborted();

        const blocks = await this.converter.pageToMarkdown(id);
        const rendered = this.converter.toMarkdownString(blocks);
        return rendered.parent ?? '';
    }
}

/**
 * Build the default source and renderer sharing one SDK client
 */
export function createNotionConnection(token: string, config: NotionConnectionConfig = {}): NotionConnection {
    const client = createNotionClient(token, config);
    return {
        source: new NotionSource(client),
        renderer: new NotionMarkdownRenderer(client),
    };
}
