// Library entry point

// ─── Accessor ────────────────────────────────────────────────────────────
export { NotionAccessor, PageLister } from './accessor';
export type { NotionAccessorOptions, DocumentOptions, PageDocument, ReadOptions, ReadResult } from './accessor';
export { NotionServiceBuilder, fromConfig, notionConfigSchema } from './builder';
export type { NotionConfig } from './builder';

// ─── Normalization ───────────────────────────────────────────────────────
export { propertyToValue, pageToProperties, richTextToString, parseNotionDate, remotePropertySchema } from './properties';
export type { RemoteProperty, RemotePropertyKind, PropertyMapOptions } from './properties';
export { applyFrontmatter, escapeFrontmatterValue, propertyValueToString, propertyValueToJson, propertiesToJson } from './frontmatter';

// ─── Paths & Pagination ──────────────────────────────────────────────────
export { parsePagePath, isRoot, isRootDir, pagePath } from './paths';
export { paginateCollection, iterateCollection, validateWindow, MAX_PAGE_SIZE } from './paginator';
export type { ListingMode, ListingResult } from './paginator';

// ─── Errors ──────────────────────────────────────────────────────────────
export { StorageError, isStorageError, translateRemoteError, errorKindForStatus, remoteCall, throwIfCancelled } from './errors';
export type { ErrorKind, StorageErrorOptions } from './errors';

// ─── Notion collaborators ────────────────────────────────────────────────
export { NotionSource, NotionMarkdownRenderer, createNotionClient, createNotionConnection } from './sources/NotionSource';
export type { NotionConnection, NotionConnectionConfig } from './sources/NotionSource';

// ─── HTTP ────────────────────────────────────────────────────────────────
export { createApp, httpStatusForKind } from './server/app';
export type { AppOptions } from './server/app';
export { extractToken, bearerStrategy, authHeaderStrategy, DEFAULT_CREDENTIAL_STRATEGIES } from './server/credentials';
export type { CredentialStrategy } from './server/credentials';
export { pageResponseFormat } from './server/negotiation';
export type { PageResponseFormat } from './server/negotiation';
export { loadServerConfig, serverConfigSchema } from './config';
export type { ServerConfig } from './config';

// ─── Types ───────────────────────────────────────────────────────────────
export { MARKDOWN_CONTENT_TYPE, DOCUMENT_SUFFIX } from './types';
export type {
    RecordIdentifier, PaginationCursor, PropertyValue, PropertyValueType, PropertyMap, ListingWindow,
    RemoteRecord, CollectionPage, RemoteCallOptions, RemoteContentSource, ContentRenderer,
    EntryMode, Metadata, Entry, Capability, AccessorInfo, ReadRange,
} from './types';
