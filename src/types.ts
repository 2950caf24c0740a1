/**
 * Core Types
 *
 * The accessor sits between two worlds:
 * - Collaborators (WHERE content comes from): a remote source that fetches pages
 *   and queries databases, and a renderer that turns a page into markdown
 * - Callers (HOW content is consumed): a storage interface with stat, read and list
 *
 * Everything here is request scoped. Nothing survives past the call that made it.
 */

/**
 * Opaque identifier of one Notion page
 */
export type RecordIdentifier = string;

/**
 * Opaque continuation token issued by Notion. `undefined` means both
 * "not started" and "exhausted"; the pagination loop tracks which.
 */
export type PaginationCursor = string;

/**
 * A normalized property value
 *
 * Fields without representable content have no PropertyValue at all;
 * there is never an empty text or an empty list.
 */
export type PropertyValue =
    | { type: 'text'; value: string }
    | { type: 'number'; value: number }
    | { type: 'boolean'; value: boolean }
    | { type: 'text_list'; value: string[] }
    | { type: 'timestamp'; value: Date };

export type PropertyValueType = PropertyValue['type'];

/**
 * Field name (or id) → value. Order is not significant.
 */
export type PropertyMap = Record<string, PropertyValue>;

/**
 * Which slice of the full ordered listing the caller wants
 */
export interface ListingWindow {
    offset: number;
    limit: number;
}

/**
 * A page as returned by the remote source
 */
export interface RemoteRecord {
    readonly id: RecordIdentifier;

    /** When the page was last edited */
    readonly lastEditedTime: Date;

    /**
     * Raw properties keyed by display name.
     * Left unvalidated here - the property normalizer decides what it understands.
     */
    readonly properties: Readonly<Record<string, unknown>>;
}

/**
 * One page of a database query
 */
export interface CollectionPage {
    readonly items: ReadonlyArray<{ readonly id: RecordIdentifier }>;

    /** Absent when the collection is exhausted */
    readonly nextCursor?: PaginationCursor;
}

export interface RemoteCallOptions {
    signal?: AbortSignal;
}

/**
 * Source collaborator: fetches pages and queries databases
 *
 * Implementations throw whatever their transport throws; the accessor
 * translates those failures at the boundary.
 */
export interface RemoteContentSource {
    /** Source name for logging and debugging */
    readonly name: string;

    fetchRecord(id: RecordIdentifier, options?: RemoteCallOptions): Promise<RemoteRecord>;

    queryCollection(
        collectionId: string,
        cursor: PaginationCursor | undefined,
        pageSize: number,
        options?: RemoteCallOptions,
    ): Promise<CollectionPage>;
}

/**
 * Renderer collaborator: produces the markdown body of a page
 */
export interface ContentRenderer {
    readonly name: string;

    render(id: RecordIdentifier, options?: RemoteCallOptions): Promise<string>;
}

export type EntryMode = 'file' | 'dir';

export interface Metadata {
    mode: EntryMode;
    /** Byte length of the content that read() returns */
    contentLength?: number;
    contentType?: string;
    lastModified?: Date;
}

/**
 * One listing entry
 */
export interface Entry {
    /** Page id with the document suffix, e.g. "abc123.md" */
    path: string;
    metadata: Metadata;
}

export interface Capability {
    stat: boolean;
    read: boolean;
    list: boolean;
}

export interface AccessorInfo {
    scheme: string;
    root: string;
    capability: Capability;
}

/**
 * Byte range of a read. Only the full range is supported.
 */
export interface ReadRange {
    offset?: number;
    size?: number;
}

export const MARKDOWN_CONTENT_TYPE = 'text/markdown';

export const DOCUMENT_SUFFIX = '.md';
