/**
 * Credential extraction
 *
 * Tokens are looked up by an ordered list of strategies; the first one
 * that finds a token wins. Add a strategy to support another header.
 */

import type { IncomingHttpHeaders } from 'http';
import debug from 'debug';

const log = debug('notion-storage:http');

export interface CredentialStrategy {
    readonly name: string;
    extract(headers: IncomingHttpHeaders): string | undefined;
}

function headerValue(headers: IncomingHttpHeaders, name: string): string | undefined {
    const value = headers[name.toLowerCase()];
    return Array.isArray(value) ? value[0] : value;
}

/**
 * `Authorization: Bearer <token>`
 */
export const bearerStrategy: CredentialStrategy = {
    name: 'bearer',
    extract(headers) {
        const value = headerValue(headers, 'authorization');
        const match = value?.match(/^Bearer\s+(\S+)\s*$/i);
        return match ? match[1] : undefined;
    },
};

/**
 * Custom `Auth: <token>` header
 */
export const authHeaderStrategy: CredentialStrategy = {
    name: 'auth-header',
    extract(headers) {
        const trimmed = headerValue(headers, 'auth')?.trim();
        return trimmed ? trimmed : undefined;
    },
};

export const DEFAULT_CREDENTIAL_STRATEGIES: readonly CredentialStrategy[] = [bearerStrategy, authHeaderStrategy];

export function extractToken(
    headers: IncomingHttpHeaders,
    strategies: readonly CredentialStrategy[] = DEFAULT_CREDENTIAL_STRATEGIES,
): string | undefined {
    for (const strategy of strategies) {
        const token = strategy.extract(headers);
        if (token) {
            log('Token found', { strategy: strategy.name });
            return token;
        }
    }
    return undefined;
}
