/**
 * Notion Accessor
 *
 * Read-only storage interface over a Notion workspace.
 *
 * - stat(path)  - Metadata of the root directory or of one page
 * - read(path)  - Markdown of one page, optionally with frontmatter
 * - list(path)  - Pages of the configured database, as "<id>.md" entries
 *
 * Paths are flat: "" or "/" is the root, everything else is "<page-id>[.md]".
 */

import debug from 'debug';
import { StorageError, remoteCall, throwIfCancelled } from './errors';
import { applyFrontmatter } from './frontmatter';
import { paginateCollection } from './paginator';
import { isRoot, isRootDir, pagePath, parsePagePath } from './paths';
import { PropertyMapOptions, pageToProperties } from './properties';
import {
    AccessorInfo,
    ContentRenderer,
    Entry,
    MARKDOWN_CONTENT_TYPE,
    Metadata,
    PropertyMap,
    ReadRange,
    RecordIdentifier,
    RemoteCallOptions,
    RemoteContentSource,
} from './types';

const log = debug('notion-storage:accessor');

export interface NotionAccessorOptions {
    source: RemoteContentSource;
    renderer: ContentRenderer;

    /** Database listed by list(). Without it, list() is unsupported. */
    databaseId?: string;

    /** Prepend properties as frontmatter on stat/read (default: false) */
    frontmatter?: boolean;
}

export interface DocumentOptions extends RemoteCallOptions, PropertyMapOptions {
    /** Overrides the accessor's frontmatter setting */
    frontmatter?: boolean;
}

/**
 * A rendered page with everything stat, read and the HTTP layer need
 */
export interface PageDocument {
    id: RecordIdentifier;
    properties: PropertyMap;

    /** Rendered markdown without frontmatter */
    body: string;

    /** What read() returns: the body, with frontmatter when enabled */
    content: string;

    lastModified: Date;
}

export interface ReadOptions extends RemoteCallOptions {
    range?: ReadRange;
}

export interface ReadResult {
    size: number;
    content: Buffer;
}

function isFullRange(range: ReadRange | undefined): boolean {
    if (!range) return true;
    return (range.offset ?? 0) === 0 && range.size === undefined;
}

/**
 * Forward-only listing of database pages
 *
 * Produced once per list() call and not restartable: once drained,
 * next() keeps returning null.
 */
export class PageLister implements AsyncIterable<Entry> {
    private index = 0;

    constructor(private readonly pages: readonly RecordIdentifier[]) {}

    async next(): Promise<Entry | null> {
        if (this.index >= this.pages.length) {
            return null;
        }

        const id = this.pages[this.index];
        this.index++;

        return {
            path: pagePath(id),
            metadata: { mode: 'file', contentType: MARKDOWN_CONTENT_TYPE },
        };
    }

    async *[Symbol.asyncIterator](): AsyncIterator<Entry> {
        let entry = await this.next();
        while (entry) {
            yield entry;
            entry = await this.next();
        }
    }
}

export class NotionAccessor {
    private readonly source: RemoteContentSource;
    private readonly renderer: ContentRenderer;
    private readonly databaseId?: string;
    private readonly frontmatter: boolean;

    constructor(options: NotionAccessorOptions) {
        this.source = options.source;
        this.renderer = options.renderer;
        this.databaseId = options.databaseId;
        this.frontmatter = options.frontmatter ?? false;
    }

    info(): AccessorInfo {
        return {
            scheme: 'notion',
            root: '/',
            capability: {
                stat: true,
                read: true,
                list: this.databaseId !== undefined,
            },
        };
    }

    async stat(path: string, options: RemoteCallOptions = {}): Promise<Metadata> {
        if (isRoot(path)) {
            return { mode: 'dir' };
        }

        const doc = await this.document(path, options);

        return {
            mode: 'file',
            contentLength: Buffer.byteLength(doc.content, 'utf8'),
            contentType: MARKDOWN_CONTENT_TYPE,
            lastModified: doc.lastModified,
        };
    }

    async read(path: string, options: ReadOptions = {}): Promise<ReadResult> {
        if (!isFullRange(options.range)) {
            throw new StorageError('Unsupported', 'range reads are not supported for notion', {
                context: { path },
            });
        }

        const doc = await this.document(path, options);
        const content = Buffer.from(doc.content, 'utf8');

        return { size: content.length, content };
    }

    async list(path: string, options: RemoteCallOptions = {}): Promise<PageLister> {
        if (this.databaseId === undefined) {
            throw new StorageError('Unsupported', 'list requires a database_id');
        }

        if (!isRootDir(path)) {
            throw new StorageError('NotADirectory', 'only root directory is listable', { context: { path } });
        }

        const { ids } = await paginateCollection(this.source, this.databaseId, { kind: 'all' }, options);
        log('Listed pages', { database: this.databaseId, count: ids.length });

        return new PageLister(ids);
    }

    /**
     * Fetch, render and normalize one page
     */
    async document(path: string, options: DocumentOptions = {}): Promise<PageDocument> {
        const id = parsePagePath(path);
        const callOptions: RemoteCallOptions = { signal: options.signal };

        const record = await remoteCall('retrieve_page', () => this.source.fetchRecord(id, callOptions));
        const properties = pageToProperties(record.properties, { keyBy: options.keyBy });
        const body = await this.render(id, callOptions);

        const withFrontmatter = options.frontmatter ?? this.frontmatter;
        const content = withFrontmatter ? applyFrontmatter(properties, body) : body;

        return {
            id: record.id,
            properties,
            body,
            content,
            lastModified: record.lastEditedTime,
        };
    }

    private async render(id: RecordIdentifier, options: RemoteCallOptions): Promise<string> {
        let body: string;
        try {
            body = await this.renderer.render(id, options);
        } catch (error) {
            throwIfCancelled(options.signal, 'page render was cancelled', { page_id: id });
            log('Failed to render page', { id, renderer: this.renderer.name, error });
            throw new StorageError('Unexpected', 'failed to render notion page', {
                context: { source: error instanceof Error ? error.message : String(error) },
                cause: error,
            });
        }

        throwIfCancelled(options.signal, 'page render was cancelled', { page_id: id });
        return body;
    }
}
