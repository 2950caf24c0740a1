/**
 * HTTP front end
 *
 * Routes:
 * - GET /page/:id                         - Page as JSON ({ id, properties, content }) or markdown
 * - GET /database/:id?offset=&limit=      - Window of page ids in a database
 * - GET /database?offset=&limit=          - Same, for the configured default database
 *
 * Every request carries its own Notion token (Authorization: Bearer, or Auth).
 * A connection is built per request; nothing is shared between requests.
 */

import express, { NextFunction, Request, Response } from 'express';
import debug from 'debug';
import { z } from 'zod';
import { NotionAccessor } from '../accessor';
import { ErrorKind, isStorageError } from '../errors';
import { propertiesToJson } from '../frontmatter';
import { paginateCollection } from '../paginator';
import { NotionConnection, createNotionConnection } from '../sources/NotionSource';
import { CredentialStrategy, DEFAULT_CREDENTIAL_STRATEGIES, extractToken } from './credentials';
import { pageResponseFormat } from './negotiation';

const log = debug('notion-storage:http');

export const DEFAULT_LIST_LIMIT = 20;

export interface AppOptions {
    /** Build the collaborators for one request's token */
    connect?: (token: string) => NotionConnection;

    /** Used when a request carries no token */
    fallbackToken?: string;

    /** Database listed by GET /database when no id is given */
    databaseId?: string;

    /** Frontmatter on markdown responses when ?frontmatter is absent (default: false) */
    frontmatter?: boolean;

    strategies?: readonly CredentialStrategy[];
}

const HTTP_STATUS: Readonly<Record<ErrorKind, number>> = {
    InvalidInput: 400,
    PermissionDenied: 401,
    NotFound: 404,
    NotADirectory: 500,
    Unsupported: 500,
    Unexpected: 500,
    ConfigInvalid: 500,
    Cancelled: 500,
};

export function httpStatusForKind(kind: ErrorKind): number {
    return HTTP_STATUS[kind];
}

const booleanParam = z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => (value === undefined ? undefined : value === 'true' || value === '1'));

const pageQuerySchema = z.object({
    frontmatter: booleanParam,
    keys: z.enum(['name', 'id']).optional(),
});

const countParam = (fallback: number) =>
    z
        .string()
        .regex(/^\d+$/)
        .optional()
        .transform((value) => (value === undefined ? fallback : Number(value)));

const listQuerySchema = z.object({
    offset: countParam(0),
    limit: countParam(DEFAULT_LIST_LIMIT),
});

function isUnsafeId(id: string): boolean {
    return id.includes('/') || id.includes('..');
}

function sendError(res: Response, status: number, kind: ErrorKind | 'BadRequest' | 'Unauthorized', message: string): void {
    res.status(status).json({ error: { kind, message } });
}

export function createApp(options: AppOptions = {}): express.Express {
    const connect = options.connect ?? ((token: string) => createNotionConnection(token));
    const strategies = options.strategies ?? DEFAULT_CREDENTIAL_STRATEGIES;
    const defaultFrontmatter = options.frontmatter ?? false;

    const app = express();

    app.use((req: Request, res: Response, next: NextFunction) => {
        const start = Date.now();
        res.on('finish', () => {
            log(`handled ${req.method} ${req.originalUrl} -> ${res.statusCode} in ${Date.now() - start}ms`);
        });
        next();
    });

    const requireToken = (req: Request, res: Response): string | undefined => {
        const token = extractToken(req.headers, strategies) ?? options.fallbackToken;
        if (!token) {
            log('Missing Notion token in request headers');
            sendError(res, 401, 'Unauthorized', 'missing Notion token');
        }
        return token;
    };

    app.get('/page/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const id = req.params.id;
            if (isUnsafeId(id)) {
                log('Invalid page id', { id });
                sendError(res, 400, 'BadRequest', 'invalid page id');
                return;
            }

            const token = requireToken(req, res);
            if (!token) return;

            const query = pageQuerySchema.safeParse(req.query);
            if (!query.success) {
                sendError(res, 400, 'BadRequest', 'invalid query parameters');
                return;
            }

            const format = pageResponseFormat(req.get('content-type'), req.get('accept'));
            const accessor = new NotionAccessor({ ...connect(token), frontmatter: defaultFrontmatter });
            const doc = await accessor.document(id, {
                frontmatter: query.data.frontmatter,
                keyBy: query.data.keys,
            });

            if (format === 'json') {
                res.json({ id: doc.id, properties: propertiesToJson(doc.properties), content: doc.body });
                return;
            }

            res.type('text/markdown; charset=utf-8').send(doc.content);
        } catch (error) {
            next(error);
        }
    });

    const listDatabase = async (id: string | undefined, req: Request, res: Response, next: NextFunction) => {
        try {
            if (id === undefined) {
                sendError(res, 404, 'NotFound', 'no default database is configured');
                return;
            }

            if (isUnsafeId(id)) {
                log('Invalid database id', { id });
                sendError(res, 400, 'BadRequest', 'invalid database id');
                return;
            }

            const token = requireToken(req, res);
            if (!token) return;

            const query = listQuerySchema.safeParse(req.query);
            if (!query.success) {
                sendError(res, 400, 'BadRequest', 'offset and limit must be non-negative integers');
                return;
            }

            const { offset, limit } = query.data;
            if (limit === 0) {
                log('Limit of zero requested', { database: id });
                sendError(res, 400, 'BadRequest', 'limit must be greater than zero');
                return;
            }

            const { source } = connect(token);
            // total is the size of the whole database, so keep paging past the window
            const result = await paginateCollection(source, id, { kind: 'window', offset, limit, untilExhausted: true });

            res.json({ total: result.visited, offset, limit, pages: result.ids });
        } catch (error) {
            next(error);
        }
    };

    app.get('/database', (req: Request, res: Response, next: NextFunction) => listDatabase(options.databaseId, req, res, next));
    app.get('/database/:id', (req: Request, res: Response, next: NextFunction) => listDatabase(req.params.id, req, res, next));

    app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (isStorageError(error)) {
            if (error.kind === 'Unexpected') {
                log('Request failed', { path: req.originalUrl, error: error.toString() });
            }
            sendError(res, httpStatusForKind(error.kind), error.kind, error.message);
            return;
        }

        log('Unhandled error', { path: req.originalUrl, error });
        sendError(res, 500, 'Unexpected', 'internal error');
    });

    return app;
}
