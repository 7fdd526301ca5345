import { readFileSync } from 'fs';
import axios from 'axios';
import Parser from 'rss-parser';
import { z } from 'zod';
import { escapeHtml, formatDate } from '../lib/format';
import { logger as rootLogger } from '../lib/logger';
import { stringifyError } from '../lib/errors';
import type { FeedCatalog, FeedItem, NewsCategory } from '../types/content';

const logger = rootLogger.child('feeds');

const ENTRIES_PER_FEED = 12;
const FETCH_TIMEOUT_MS = 15_000;

export const NEWS_TITLES: Record<NewsCategory, string> = {
    general: 'Tech News',
    ai: 'AI News',
    iot: 'IoT & Robotics News',
};

export type FeedFetcher = (url: string) => Promise<string>;

export interface FeedServiceOptions {
    timeZone: string;
    limit: number;
    fetchFeed?: FeedFetcher;
}

const feedCatalogSchema = z.object({
    general: z.array(z.string().url()),
    ai: z.array(z.string().url()),
    iot: z.array(z.string().url()),
});

export function loadFeedCatalog(path: string): FeedCatalog {
    const raw = JSON.parse(readFileSync(path, 'utf8'));
    return feedCatalogSchema.parse(raw);
}

export async function fetchFeedXml(url: string): Promise<string> {
    const response = await axios.get<string>(url, {
        timeout: FETCH_TIMEOUT_MS,
        responseType: 'text',
        headers: { 'User-Agent': 'tech-digest-bot/1.0' },
    });
    return response.data;
}

export class FeedService {
    private readonly parser = new Parser();
    private readonly fetchFeed: FeedFetcher;

    constructor(
        private readonly feeds: FeedCatalog,
        private readonly options: FeedServiceOptions,
    ) {
        this.fetchFeed = options.fetchFeed ?? fetchFeedXml;
    }

    async fetchCategory(category: NewsCategory): Promise<FeedItem[]> {
        return this.fetchFeeds(this.feeds[category], this.options.limit);
    }

    /**
     * Collects entries from the given feeds in feed order, keeping at most
     * ENTRIES_PER_FEED per feed and dropping entries whose link was already seen.
     */
    async fetchFeeds(urls: string[], limit: number): Promise<FeedItem[]> {
        const results = await Promise.allSettled(urls.map((url) => this.readFeed(url)));

        const items: FeedItem[] = [];
        const seen = new Set<string>();
        results.forEach((result, index) => {
            if (result.status === 'rejected') {
                logger.warn(`Feed ${urls[index]} skipped: ${stringifyError(result.reason)}`);
                return;
            }
            for (const entry of result.value.slice(0, ENTRIES_PER_FEED)) {
                const link = entry.link?.trim();
                if (!link || seen.has(link)) {
                    continue;
                }
                seen.add(link);
                items.push({
                    title: entry.title?.trim() || 'Untitled',
                    link,
                    date: formatDate(entry.isoDate ?? entry.pubDate, this.options.timeZone),
                });
            }
        });

        return items.slice(0, limit);
    }

    private async readFeed(url: string): Promise<Parser.Item[]> {
        const xml = await this.fetchFeed(url);
        const feed = await this.parser.parseString(xml);
        return feed.items;
    }
}

export function formatNews(items: FeedItem[], title: string): string {
    if (items.length === 0) {
        return 'No results found.';
    }
    const lines = [`📰 <b>${escapeHtml(title)}</b>`, ''];
    items.forEach((item, index) => {
        const suffix = item.date ? ` — ${item.date}` : '';
        lines.push(`${index + 1}. <a href="${escapeHtml(item.link)}">${escapeHtml(item.title)}</a>${suffix}`);
    });
    return lines.join('\n');
}
