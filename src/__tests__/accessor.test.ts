import { NotionAccessor } from '../accessor';
import { StorageError } from '../errors';
import { Entry } from '../types';
import { apiError, createTestRecord, createTestRenderer, createTestSource, makeIds, richText } from './helpers';

async function rejection(promise: Promise<unknown>): Promise<StorageError> {
    try {
        await promise;
    } catch (error) {
        if (error instanceof StorageError) return error;
        throw error;
    }
    throw new Error('expected a rejection');
}

function createAccessor(options: { databaseId?: string; frontmatter?: boolean; collection?: string[] } = {}) {
    const source = createTestSource({ collection: options.collection });
    const renderer = createTestRenderer();
    const accessor = new NotionAccessor({
        source: source.source,
        renderer: renderer.renderer,
        databaseId: options.databaseId,
        frontmatter: options.frontmatter,
    });
    return { accessor, ...source, ...renderer };
}

const WITH_FRONTMATTER = '---\nDone: "false"\nName: "Hello"\n---\n\n# Hello\n';

describe('NotionAccessor', () => {
    describe('info', () => {
        it('declares list only when a database is configured', () => {
            expect(createAccessor().accessor.info()).toEqual({
                scheme: 'notion',
                root: '/',
                capability: { stat: true, read: true, list: false },
            });
            expect(createAccessor({ databaseId: 'db1' }).accessor.info().capability.list).toBe(true);
        });
    });

    describe('stat', () => {
        it('returns directory metadata for the root without remote calls', async () => {
            const { accessor, fetchRecord } = createAccessor();

            expect(await accessor.stat('')).toEqual({ mode: 'dir' });
            expect(await accessor.stat('/')).toEqual({ mode: 'dir' });
            expect(fetchRecord).not.toHaveBeenCalled();
        });

        it('returns file metadata for a page', async () => {
            const { accessor, fetchRecord, render } = createAccessor();

            const meta = await accessor.stat('p1.md');

            expect(meta).toEqual({
                mode: 'file',
                contentLength: 8,
                contentType: 'text/markdown',
                lastModified: new Date('2024-05-01T12:00:00.000Z'),
            });
            expect(fetchRecord).toHaveBeenCalledWith('p1', { signal: undefined });
            expect(render).toHaveBeenCalledWith('p1', { signal: undefined });
        });

        it('counts frontmatter in the content length', async () => {
            const { accessor } = createAccessor({ frontmatter: true });

            const meta = await accessor.stat('p1');

            expect(meta.contentLength).toBe(WITH_FRONTMATTER.length);
        });

        it('reports bytes, not characters', async () => {
            const source = createTestSource({ records: [createTestRecord({ id: 'p2', properties: {} })] });
            const renderer = createTestRenderer({ p2: 'héllo' });
            const accessor = new NotionAccessor({ source: source.source, renderer: renderer.renderer });

            expect((await accessor.stat('p2.md')).contentLength).toBe(6);
        });

        it('fails with NotFound for a missing page', async () => {
            const { accessor } = createAccessor();

            const error = await rejection(accessor.stat('missing.md'));

            expect(error.kind).toBe('NotFound');
            expect(error.message).toBe('Could not find page with ID: missing.');
        });

        it('fails with NotFound for nested paths without remote calls', async () => {
            const { accessor, fetchRecord } = createAccessor();

            expect((await rejection(accessor.stat('a/b.md'))).kind).toBe('NotFound');
            expect(fetchRecord).not.toHaveBeenCalled();
        });

        it('fails with Cancelled when aborted while rendering', async () => {
            const { accessor, render } = createAccessor();
            const controller = new AbortController();
            render.mockImplementationOnce(async () => {
                controller.abort();
                return '# Hello\n';
            });

            const error = await rejection(accessor.stat('p1.md', { signal: controller.signal }));

            expect(error.kind).toBe('Cancelled');
            expect(error.context).toEqual({ page_id: 'p1' });
            expect(render).toHaveBeenCalledWith('p1', { signal: controller.signal });
        });

        it('reports a renderer aborted by the signal as Cancelled', async () => {
            const { accessor, render } = createAccessor();
            const controller = new AbortController();
            render.mockImplementationOnce(async () => {
                controller.abort();
                throw new Error('This operation was aborted');
            });

            const error = await rejection(accessor.read('p1.md', { signal: controller.signal }));

            expect(error.kind).toBe('Cancelled');
            expect(error.message).toBe('page render was cancelled');
        });

        it('fails with Unexpected when rendering fails', async () => {
            const { accessor, render } = createAccessor();
            render.mockRejectedValueOnce(new Error('block fetch timed out'));

            const error = await rejection(accessor.stat('p1.md'));

            expect(error.kind).toBe('Unexpected');
            expect(error.message).toBe('failed to render notion page');
            expect(error.context).toEqual({ source: 'block fetch timed out' });
        });
    });

    describe('read', () => {
        it('returns the markdown body', async () => {
            const { accessor } = createAccessor();

            const result = await accessor.read('p1.md');

            expect(result.size).toBe(8);
            expect(result.content.toString('utf8')).toBe('# Hello\n');
        });

        it('prepends frontmatter when enabled', async () => {
            const { accessor } = createAccessor({ frontmatter: true });

            const result = await accessor.read('p1.md');

            expect(result.content.toString('utf8')).toBe(WITH_FRONTMATTER);
        });

        it('returns as many bytes as stat declares', async () => {
            const { accessor } = createAccessor({ frontmatter: true });

            const meta = await accessor.stat('p1.md');
            const result = await accessor.read('p1.md', { range: {} });

            expect(result.size).toBe(meta.contentLength);
            expect(result.content.length).toBe(meta.contentLength);
        });

        it('accepts an explicit full range', async () => {
            const { accessor } = createAccessor();

            await expect(accessor.read('p1.md', { range: { offset: 0 } })).resolves.toMatchObject({ size: 8 });
        });

        it('rejects partial ranges before any remote call', async () => {
            const { accessor, fetchRecord } = createAccessor();

            expect((await rejection(accessor.read('p1.md', { range: { offset: 10 } }))).kind).toBe('Unsupported');
            expect((await rejection(accessor.read('p1.md', { range: { offset: 0, size: 4 } }))).kind).toBe('Unsupported');
            expect(fetchRecord).not.toHaveBeenCalled();
        });

        it('maps permission failures', async () => {
            const { accessor, fetchRecord } = createAccessor();
            fetchRecord.mockRejectedValueOnce(apiError(401, 'API token is invalid.', 'unauthorized'));

            const error = await rejection(accessor.read('p1.md'));

            expect(error.kind).toBe('PermissionDenied');
            expect(error.context.code).toBe('unauthorized');
        });
    });

    describe('list', () => {
        it('fails with Unsupported without a database', async () => {
            const { accessor } = createAccessor();

            expect((await rejection(accessor.list('/'))).kind).toBe('Unsupported');
        });

        it('fails with NotADirectory for anything but the root', async () => {
            const { accessor, queryCollection } = createAccessor({ databaseId: 'db1' });

            expect((await rejection(accessor.list('sub/'))).kind).toBe('NotADirectory');
            expect((await rejection(accessor.list('p1.md'))).kind).toBe('NotADirectory');
            expect(queryCollection).not.toHaveBeenCalled();
        });

        it('yields one markdown entry per page', async () => {
            const { accessor } = createAccessor({ databaseId: 'db1', collection: ['a', 'b'] });

            const lister = await accessor.list('/');

            expect(await lister.next()).toEqual({ path: 'a.md', metadata: { mode: 'file', contentType: 'text/markdown' } });
            expect(await lister.next()).toEqual({ path: 'b.md', metadata: { mode: 'file', contentType: 'text/markdown' } });
            expect(await lister.next()).toBeNull();
            expect(await lister.next()).toBeNull();
        });

        it('lists every page of a large database', async () => {
            const ids = makeIds(250);
            const { accessor, queryCollection } = createAccessor({ databaseId: 'db1', collection: ids });

            const entries: Entry[] = [];
            for await (const entry of await accessor.list('')) {
                entries.push(entry);
            }

            expect(entries.map((entry) => entry.path)).toEqual(ids.map((id) => `${id}.md`));
            expect(queryCollection).toHaveBeenCalledTimes(3);
        });

        it('is single pass', async () => {
            const { accessor } = createAccessor({ databaseId: 'db1', collection: ['a'] });
            const lister = await accessor.list('./');

            const first: string[] = [];
            for await (const entry of lister) first.push(entry.path);
            const second: string[] = [];
            for await (const entry of lister) second.push(entry.path);

            expect(first).toEqual(['a.md']);
            expect(second).toEqual([]);
        });

        it('fails when a page request fails', async () => {
            const { accessor, queryCollection } = createAccessor({ databaseId: 'db1', collection: makeIds(150) });
            queryCollection.mockRejectedValueOnce(apiError(403, 'Forbidden'));

            expect((await rejection(accessor.list('/'))).kind).toBe('PermissionDenied');
        });
    });

    describe('document', () => {
        it('returns properties, body and content', async () => {
            const { accessor } = createAccessor();

            const doc = await accessor.document('p1', { frontmatter: true });

            expect(doc).toEqual({
                id: 'p1',
                properties: {
                    Name: { type: 'text', value: 'Hello' },
                    Done: { type: 'boolean', value: false },
                },
                body: '# Hello\n',
                content: WITH_FRONTMATTER,
                lastModified: new Date('2024-05-01T12:00:00.000Z'),
            });
        });

        it('keys properties by id when asked', async () => {
            const source = createTestSource({
                records: [
                    createTestRecord({
                        properties: { Summary: { id: 'sm', type: 'rich_text', rich_text: richText('Short') } },
                    }),
                ],
            });
            const accessor = new NotionAccessor({ source: source.source, renderer: createTestRenderer().renderer });

            const doc = await accessor.document('p1', { keyBy: 'id' });

            expect(doc.properties).toEqual({ sm: { type: 'text', value: 'Short' } });
        });
    });
});
