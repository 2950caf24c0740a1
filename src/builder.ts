/**
 * Notion Service Builder
 *
 * Fluent configuration for a NotionAccessor.
 *
 * Example:
 * ```typescript
 * const accessor = new NotionServiceBuilder()
 *     .token(process.env.NOTION_API_TOKEN ?? '')
 *     .databaseId(process.env.NOTION_DATABASE_ID ?? '')
 *     .frontmatter(true)
 *     .build();
 * ```
 */

import { z } from 'zod';
import { NotionAccessor } from './accessor';
import { StorageError } from './errors';
import { createNotionConnection } from './sources/NotionSource';
import { ContentRenderer, RemoteContentSource } from './types';

export const notionConfigSchema = z.object({
    /** Notion integration token */
    token: z.string().min(1).optional(),
    /** Default database id to list pages from */
    databaseId: z.string().min(1).optional(),
    /** Prepend properties as frontmatter when reading */
    frontmatter: z.boolean().default(false),
    /** SDK request timeout */
    timeoutMs: z.number().int().positive().optional(),
});

export type NotionConfig = z.infer<typeof notionConfigSchema>;

export class NotionServiceBuilder {
    private config: NotionConfig = { frontmatter: false };
    private customSource?: RemoteContentSource;
    private customRenderer?: ContentRenderer;

    /** Set the token used to talk to Notion. Empty tokens are ignored. */
    token(token: string): this {
        if (token) this.config.token = token;
        return this;
    }

    /** Set the default database id used by list. Empty ids are ignored. */
    databaseId(databaseId: string): this {
        if (databaseId) this.config.databaseId = databaseId;
        return this;
    }

    frontmatter(enabled: boolean): this {
        this.config.frontmatter = enabled;
        return this;
    }

    timeoutMs(timeoutMs: number): this {
        this.config.timeoutMs = timeoutMs;
        return this;
    }

    /** Use a custom source instead of the Notion SDK */
    source(source: RemoteContentSource): this {
        this.customSource = source;
        return this;
    }

    /** Use a custom renderer instead of notion-to-md */
    renderer(renderer: ContentRenderer): this {
        this.customRenderer = renderer;
        return this;
    }

    build(): NotionAccessor {
        const { token, databaseId, frontmatter, timeoutMs } = this.config;

        if (this.customSource && this.customRenderer) {
            return new NotionAccessor({
                source: this.customSource,
                renderer: this.customRenderer,
                databaseId,
                frontmatter,
            });
        }

        if (!token) {
            throw new StorageError('ConfigInvalid', 'notion token is required');
        }

        const connection = createNotionConnection(token, { timeoutMs });
        return new NotionAccessor({
            source: this.customSource ?? connection.source,
            renderer: this.customRenderer ?? connection.renderer,
            databaseId,
            frontmatter,
        });
    }
}

/**
 * Create a builder from a plain config object
 *
 * @throws StorageError ConfigInvalid when the object does not match the schema
 */
export function fromConfig(config: unknown): NotionServiceBuilder {
    const parsed = notionConfigSchema.safeParse(config);
    if (!parsed.success) {
        const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
        throw new StorageError('ConfigInvalid', `invalid notion config: ${fields}`);
    }

    const builder = new NotionServiceBuilder().frontmatter(parsed.data.frontmatter);
    if (parsed.data.token) builder.token(parsed.data.token);
    if (parsed.data.databaseId) builder.databaseId(parsed.data.databaseId);
    if (parsed.data.timeoutMs) builder.timeoutMs(parsed.data.timeoutMs);
    return builder;
}
