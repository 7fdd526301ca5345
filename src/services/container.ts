import path from 'path';
import type { AppConfig } from '../config/config';
import type { BotServices } from './botService';
import { CatalogService, loadCatalog } from './catalogService';
import { FeedService, loadFeedCatalog } from './feedService';
import { GitHubSearchService } from './githubSearchService';
import { SearchSessionStore } from './searchSessionStore';
import { loadSnippets, SnippetService } from './snippetService';

/**
 * Feed list and snippets ship with the code, beside `src/` and `dist/`, so a
 * volume mounted over the data directory cannot hide them.
 */
export const CONTENT_DIR = path.resolve(__dirname, '..', '..', 'content');

export function createServices(config: AppConfig, contentDir = CONTENT_DIR): BotServices {
    const { dbPath, timeZone, newsLimit } = config.content;
    return {
        feeds: new FeedService(loadFeedCatalog(path.join(contentDir, 'feeds.json')), { timeZone, limit: newsLimit }),
        snippets: new SnippetService(loadSnippets(path.join(contentDir, 'snippets.json'))),
        catalog: new CatalogService(loadCatalog(dbPath)),
        github: new GitHubSearchService({ token: config.github.token }),
        sessions: new SearchSessionStore(),
    };
}
