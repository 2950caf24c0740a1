/**
 * Server configuration from environment variables
 *
 * - PORT                 - Listen port (default: 3000)
 * - HOST                 - Listen address (default: 0.0.0.0)
 * - NOTION_API_TOKEN     - Fallback token when a request carries none
 * - NOTION_DATABASE_ID   - Default database for the storage accessor
 * - NOTION_FRONTMATTER   - "true", "1" or "yes" to prepend frontmatter by default
 * - NOTION_TIMEOUT_MS    - SDK request timeout
 *
 * Logging is controlled by DEBUG (e.g. DEBUG=notion-storage:*).
 */

import { z } from 'zod';
import { StorageError } from './errors';

const flag = z
    .string()
    .optional()
    .transform((value) => (value ? ['true', '1', 'yes'].includes(value.trim().toLowerCase()) : false));

const optionalText = z
    .string()
    .optional()
    .transform((value) => (value && value.trim() ? value.trim() : undefined));

export const serverConfigSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    HOST: z.string().min(1).default('0.0.0.0'),
    NOTION_API_TOKEN: optionalText,
    NOTION_DATABASE_ID: optionalText,
    NOTION_FRONTMATTER: flag,
    NOTION_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

export interface ServerConfig {
    port: number;
    host: string;
    token?: string;
    databaseId?: string;
    frontmatter: boolean;
    timeoutMs?: number;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    const parsed = serverConfigSchema.safeParse(env);
    if (!parsed.success) {
        const keys = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))].join(', ');
        throw new StorageError('ConfigInvalid', `invalid environment: ${keys}`);
    }

    return {
        port: parsed.data.PORT,
        host: parsed.data.HOST,
        token: parsed.data.NOTION_API_TOKEN,
        databaseId: parsed.data.NOTION_DATABASE_ID,
        frontmatter: parsed.data.NOTION_FRONTMATTER,
        timeoutMs: parsed.data.NOTION_TIMEOUT_MS,
    };
}
