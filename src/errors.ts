/**
 * Storage Error Taxonomy
 *
 * Every failure that leaves the accessor is a StorageError with one of a
 * small, closed set of kinds. Remote failures are translated exactly once,
 * at the point they come back from a collaborator (transport or renderer).
 *
 * Kinds:
 * - InvalidInput     - Notion rejected the request as malformed (400) or a local window is invalid
 * - PermissionDenied - Authentication or authorization failure (401/403)
 * - NotFound         - Page or database does not exist, or the path cannot name one
 * - NotADirectory    - A listing was requested for something that is not the root
 * - Unsupported      - The operation is not available (ranged reads, listing without a database)
 * - Unexpected       - Anything else Notion or the transport reported
 * - ConfigInvalid    - The accessor was configured incorrectly
 * - Cancelled        - The caller aborted the operation
 */

import { z } from 'zod';
import debug from 'debug';

const log = debug('notion-storage:errors');

export type ErrorKind =
    | 'InvalidInput'
    | 'PermissionDenied'
    | 'NotFound'
    | 'NotADirectory'
    | 'Unsupported'
    | 'Unexpected'
    | 'ConfigInvalid'
    | 'Cancelled';

export interface StorageErrorOptions {
    /** Extra key/value detail kept alongside the message */
    context?: Record<string, string>;
    cause?: unknown;
}

export class StorageError extends Error {
    readonly kind: ErrorKind;
    readonly context: Record<string, string>;

    constructor(kind: ErrorKind, message: string, options: StorageErrorOptions = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = 'StorageError';
        this.kind = kind;
        this.context = { ...options.context };
    }

    toString(): string {
        const details = Object.entries(this.context)
            .map(([key, value]) => `${key}: ${value}`)
            .join(', ');
        return details ? `${this.kind} (${details}) => ${this.message}` : `${this.kind} => ${this.message}`;
    }
}

export function isStorageError(error: unknown): error is StorageError {
    return error instanceof StorageError;
}

/**
 * Status code → error kind. Anything not listed is Unexpected.
 */
const STATUS_KINDS: Readonly<Record<number, ErrorKind>> = {
    400: 'InvalidInput',
    401: 'PermissionDenied',
    403: 'PermissionDenied',
    404: 'NotFound',
};

export function errorKindForStatus(status: number): ErrorKind {
    return STATUS_KINDS[status] ?? 'Unexpected';
}

/**
 * Shape shared by APIResponseError and UnknownHTTPResponseError from @notionhq/client
 */
const statusFailureSchema = z.object({
    status: z.number().int(),
    message: z.string(),
    code: z.string().optional(),
});

function messageOf(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    return String(error);
}

function isAbort(error: unknown): boolean {
    return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * Translate a collaborator failure into a StorageError
 *
 * @param error - Whatever the transport or renderer threw
 * @param operation - Name of the remote call, kept as context (e.g. "retrieve_page")
 */
export function translateRemoteError(error: unknown, operation: string): StorageError {
    if (error instanceof StorageError) {
        return error;
    }

    if (isAbort(error)) {
        return new StorageError('Cancelled', `${operation} was cancelled`, {
            context: { operation },
            cause: error,
        });
    }

    const status = statusFailureSchema.safeParse(error);
    if (status.success) {
        const kind = errorKindForStatus(status.data.status);
        const context: Record<string, string> = { operation, status: String(status.data.status) };
        if (status.data.code) context.code = status.data.code;

        const translated = new StorageError(kind, status.data.message, { context, cause: error });
        if (kind === 'Unexpected') {
            log('Unexpected Notion response', { operation, status: status.data.status, error });
        }
        return translated;
    }

    log('Unexpected Notion failure', { operation, error });
    return new StorageError('Unexpected', messageOf(error), {
        context: { operation },
        cause: error,
    });
}

/**
 * Throw Cancelled once the caller's signal has fired
 */
export function throwIfCancelled(signal: AbortSignal | undefined, message: string, context: Record<string, string>): void {
    if (signal?.aborted) {
        throw new StorageError('Cancelled', message, { context, cause: signal.reason });
    }
}

/**
 * Await a collaborator call and translate whatever it rejects with
 */
export async function remoteCall<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
        return await call();
    } catch (error) {
        throw translateRemoteError(error, operation);
    }
}
