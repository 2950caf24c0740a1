import { NotionServiceBuilder } from '../src/builder';

async function main(): Promise<void> {
    const token = process.env.NOTION_API_TOKEN;
    if (!token) {
        throw new Error('set NOTION_API_TOKEN to your Notion integration token');
    }
    const databaseId = process.env.NOTION_DATABASE_ID;
    const pageId = process.env.NOTION_PAGE_ID;

    const builder = new NotionServiceBuilder().token(token).frontmatter(true);
    if (databaseId) {
        builder.databaseId(databaseId);
    }
    const accessor = builder.build();

    if (databaseId) {
        console.log(`Listing pages in database: ${databaseId}`);
        const lister = await accessor.list('/');
        for await (const entry of lister) {
            console.log(` - ${entry.path}`);
        }
    } else {
        console.log('NOTION_DATABASE_ID not set; skipping list');
    }

    if (pageId) {
        const path = `${pageId}.md`;
        const { content } = await accessor.read(path);
        console.log(`\n--- Page ${path} ---\n${content.toString('utf8')}`);
    } else {
        console.log('NOTION_PAGE_ID not set; skipping read');
    }
}

main().catch((error) => {
    console.error(error);
    process.exitCode = 1;
});
