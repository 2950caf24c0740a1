#!/usr/bin/env node
import debug from 'debug';
import { loadServerConfig } from '../config';
import { createApp } from '../server/app';
import { createNotionConnection } from '../sources/NotionSource';

const log = debug('notion-storage:server');

function main(): void {
    const config = loadServerConfig();

    const app = createApp({
        connect: (token) => createNotionConnection(token, { timeoutMs: config.timeoutMs }),
        fallbackToken: config.token,
        databaseId: config.databaseId,
        frontmatter: config.frontmatter,
    });

    const server = app.listen(config.port, config.host, () => {
        log(`listening on ${config.host}:${config.port}`);
    });

    server.on('error', (error) => {
        log('Server error', { error });
        process.exitCode = 1;
    });
}

main();
