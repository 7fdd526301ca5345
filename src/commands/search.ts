import { Markup, type Context, type Telegraf } from 'telegraf';
import type { InlineKeyboardButton } from 'telegraf/types';
import { ContentSourceError, stringifyError } from '../lib/errors';
import { escapeHtml, INLINE_CODE_LIMIT, trimText } from '../lib/format';
import { logger as rootLogger } from '../lib/logger';
import type { CatalogService } from '../services/catalogService';
import {
    isLanguageFilter,
    LANGUAGE_FILTERS,
    type GitHubSearchService,
    type LanguageFilter,
} from '../services/githubSearchService';
import {
    isSearchMode,
    type SearchMode,
    type SearchSession,
    type SearchSessionStore,
} from '../services/searchSessionStore';
import type { ExternalResult, SchematicResult, SearchHit } from '../types/content';
import { helpReply, hintReply, resolveTextIntent } from './menu';
import { deliverContent, editOrReply, sendReply, type BotReply, type ContentReply } from './replies';

const logger = rootLogger.child('search');

export interface SearchDeps {
    catalog: CatalogService;
    github: GitHubSearchService;
    sessions: SearchSessionStore;
}

const FILTER_LABELS: Record<LanguageFilter, string> = {
    any: 'Any',
    arduino: 'Arduino',
    cpp: 'C++',
    micropython: 'MicroPython',
};

export const MODE_PROMPTS: Record<SearchMode, string> = {
    code: '🔎 Send a code topic (e.g. esp32 mqtt).',
    schematic: '🔎 Send a schematic or diagram topic (e.g. line follower schematic).',
    parts: '🔎 Send a part name or model (e.g. L298N or HC-SR04).',
    howto: '🔎 Send a how-to topic (e.g. servo sweep arduino).',
};

const backButton = () => Markup.button.callback('🔙 Main menu', 'back_main');

export function searchModeReply(): BotReply {
    return {
        text: 'What are you looking for?',
        keyboard: Markup.inlineKeyboard([
            [Markup.button.callback('💻 Code', 'mode:code'), Markup.button.callback('🧩 Schematics', 'mode:schematic')],
            [Markup.button.callback('🛒 Parts (BOM)', 'mode:parts'), Markup.button.callback('📘 How-to guides', 'mode:howto')],
            [Markup.button.callback('🎛️ Web language filter', 'ext_filter_menu')],
            [backButton()],
        ]).reply_markup,
    };
}

export function filterMenuReply(current: LanguageFilter): BotReply {
    const buttons: InlineKeyboardButton[] = LANGUAGE_FILTERS.map((key) =>
        Markup.button.callback(`${key === current ? '✅ ' : ''}${FILTER_LABELS[key]}`, `set_filter:${key}`),
    );
    buttons.push(Markup.button.callback('🔙 Done', 'ext_filter_close'));
    return {
        text: `🎛️ Current filter: <b>${current}</b>\nPick one:`,
        keyboard: Markup.inlineKeyboard(buttons, { columns: 2 }).reply_markup,
    };
}

export function searchHitsKeyboard(hits: SearchHit[]) {
    const buttons: InlineKeyboardButton[] = hits.map((hit) =>
        hit.kind === 'project'
            ? Markup.button.callback(`📁 ${hit.title}`, `proj:${hit.category}:${hit.id}`)
            : Markup.button.callback(`🐍 ${hit.title}`, `lib:${hit.name}`),
    );
    buttons.push(backButton());
    return Markup.inlineKeyboard(buttons, { columns: 1 }).reply_markup;
}

export function externalResultsKeyboard(results: ExternalResult[], action: 'ext_open' | 'ext_readme') {
    const icon = action === 'ext_open' ? '📄' : '📘';
    const buttons: InlineKeyboardButton[] = results.map((result, index) =>
        Markup.button.callback(`${icon} ${trimText(result.title, 60)}`, `${action}:${index}`),
    );
    buttons.push(backButton());
    return Markup.inlineKeyboard(buttons, { columns: 1 }).reply_markup;
}

const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.gif', '.bmp', '.webp'];
const MAX_SCHEMATICS = 10;
const MAX_PHOTOS = 10;
const MAX_DOCUMENTS = 6;

export interface MediaItem {
    url: string;
    caption?: string;
}

/** Files Telegram fetches by URL: images as one album, everything else as documents. */
export interface SchematicMedia {
    photos: MediaItem[];
    documents: MediaItem[];
}

export interface SearchReply extends BotReply {
    media?: SchematicMedia;
}

/**
 * Splits schematic hits into an album of images, captioned on the first one,
 * and separate documents.
 */
export function schematicMedia(results: SchematicResult[]): SchematicMedia {
    const photos: MediaItem[] = [];
    const documents: MediaItem[] = [];
    for (const result of results.slice(0, MAX_SCHEMATICS)) {
        const caption = trimText(`${result.title}\nSource: ${result.htmlUrl}`, 1024);
        if (IMAGE_EXTENSIONS.includes(result.extension)) {
            photos.push(photos.length === 0 ? { url: result.rawUrl, caption } : { url: result.rawUrl });
        } else {
            documents.push({ url: result.rawUrl, caption });
        }
    }
    return { photos: photos.slice(0, MAX_PHOTOS), documents: documents.slice(0, MAX_DOCUMENTS) };
}

/**
 * Runs one query in the session's mode. Catalog matches win; code and how-to
 * queries fall back to GitHub, whose results are kept on the session so the
 * result buttons can open them later. `notify` reports a slow remote lookup.
 */
export async function performSearch(
    deps: Pick<SearchDeps, 'catalog' | 'github'>,
    session: SearchSession,
    query: string,
    notify: (text: string) => Promise<void>,
): Promise<SearchReply> {
    try {
        switch (session.mode) {
            case 'code': {
                const local = deps.catalog.searchAny(query);
                if (local.length > 0) {
                    return { text: '✅ Catalog matches (projects/libraries):', keyboard: searchHitsKeyboard(local) };
                }
                await notify('Searching GitHub for code… ⏳');
                const results = await deps.github.searchCode(query, session.filter);
                if (results.length === 0) {
                    return {
                        text: '❌ No code found on GitHub. Try a more specific query or change the language filter (🎛️).',
                    };
                }
                session.codeResults = results;
                return { text: 'GitHub results (code):', keyboard: externalResultsKeyboard(results, 'ext_open') };
            }
            case 'schematic': {
                await notify('Fetching schematics from GitHub… ⏳');
                const results = await deps.github.searchSchematics(query);
                if (results.length === 0) {
                    return { text: '❌ No schematic found.' };
                }
                session.schematicResults = results;
                return { text: "✅ Schematics sent. Mind the source's license.", media: schematicMedia(results) };
            }
            case 'parts': {
                const hits = deps.catalog.searchByPart(query);
                if (hits.length > 0) {
                    return { text: '✅ Projects that use this part:', keyboard: searchHitsKeyboard(hits) };
                }
                return {
                    text: '❌ No catalog project uses this part. Switch to code search from 🔎 Search.',
                };
            }
            case 'howto': {
                const local = deps.catalog.searchByDescription(query);
                if (local.length > 0) {
                    return { text: '✅ Guides in catalog projects:', keyboard: searchHitsKeyboard(local) };
                }
                await notify('Searching GitHub READMEs… ⏳');
                const results = await deps.github.searchReadme(query);
                if (results.length === 0) {
                    return { text: '❌ No guide found on GitHub.' };
                }
                session.readmeResults = results;
                return { text: 'Related guides:', keyboard: externalResultsKeyboard(results, 'ext_readme') };
            }
        }
    } catch (error) {
        if (error instanceof ContentSourceError) {
            return { text: '⚠️ Could not reach the code source. Try again later or change the query.' };
        }
        logger.error(`Search failed for "${query}": ${stringifyError(error)}`);
        return { text: '❌ Unexpected search error. Try again or change the query.' };
    }
}

/** Inline `<pre>` view for short downloads, a text document otherwise. */
export function externalContentReply(
    result: ExternalResult,
    content: string,
    options: { filename: string; licenseNote: boolean },
): ContentReply {
    const caption = options.licenseNote
        ? `Source: ${result.htmlUrl}\n⚠️ Mind the source's license`
        : `Source: ${result.htmlUrl}`;
    const safe = escapeHtml(content);
    if (caption.length + safe.length < INLINE_CODE_LIMIT) {
        return {
            kind: 'inline',
            reply: { text: `<pre><code>${safe}</code></pre>\n\n${escapeHtml(caption)}` },
        };
    }
    return {
        kind: 'document',
        document: { content: Buffer.from(content, 'utf8'), filename: options.filename, caption },
    };
}

async function openExternal(
    ctx: Context & { match: RegExpExecArray },
    deps: SearchDeps,
    kind: 'code' | 'readme',
) {
    const userId = ctx.from?.id;
    const session = userId === undefined ? undefined : deps.sessions.peek(userId);
    const results = kind === 'code' ? session?.codeResults : session?.readmeResults;
    const result = results?.[Number(ctx.match[1])];
    if (!result) {
        await ctx.answerCbQuery('Invalid selection', { show_alert: true });
        return;
    }

    try {
        const content = await deps.github.fetchText(result.rawUrl);
        const reply =
            kind === 'code'
                ? externalContentReply(result, content, { filename: 'snippet.txt', licenseNote: true })
                : externalContentReply(result, content, { filename: 'README.txt', licenseNote: false });
        await deliverContent(ctx, reply, true);
    } catch (error) {
        logger.warn(`Opening ${result.rawUrl} failed: ${stringifyError(error)}`);
        await ctx.reply(kind === 'code' ? 'Downloading the code failed.' : 'Downloading the README failed.');
    }
    await ctx.answerCbQuery();
}

async function sendSchematicMedia(ctx: Context, media: SchematicMedia) {
    if (media.photos.length > 0) {
        try {
            await ctx.replyWithMediaGroup(
                media.photos.map((photo) => ({ type: 'photo' as const, media: photo.url, caption: photo.caption })),
            );
        } catch (error) {
            logger.warn(`Sending the schematic album failed: ${stringifyError(error)}`);
        }
    }
    for (const document of media.documents) {
        try {
            await ctx.replyWithDocument(document.url, { caption: document.caption });
        } catch (error) {
            logger.warn(`Sending ${document.url} failed: ${stringifyError(error)}`);
        }
    }
}

export function setupSearchCommands(bot: Telegraf, deps: SearchDeps) {
    const startSearch = async (ctx: Context, edit: boolean) => {
        const userId = ctx.from?.id;
        if (userId !== undefined) {
            deps.sessions.reset(userId);
        }
        if (edit) {
            await editOrReply(ctx, searchModeReply());
        } else {
            await sendReply(ctx, searchModeReply());
        }
    };

    bot.command('search', async (ctx) => {
        await startSearch(ctx, false);
    });

    bot.action('search_start', async (ctx) => {
        await startSearch(ctx, true);
        await ctx.answerCbQuery();
    });

    bot.action(/^mode:(.+)$/, async (ctx) => {
        const mode = ctx.match[1];
        if (!isSearchMode(mode)) {
            await ctx.answerCbQuery('Invalid mode.', { show_alert: true });
            return;
        }
        const userId = ctx.from?.id;
        if (userId === undefined) {
            await ctx.answerCbQuery();
            return;
        }
        deps.sessions.beginQuery(userId, mode);
        await editOrReply(ctx, { text: MODE_PROMPTS[mode] });
        await ctx.answerCbQuery();
    });

    bot.action(/^ext_open:(\d+)$/, async (ctx) => {
        await openExternal(ctx, deps, 'code');
    });

    bot.action(/^ext_readme:(\d+)$/, async (ctx) => {
        await openExternal(ctx, deps, 'readme');
    });

    bot.action('ext_filter_menu', async (ctx) => {
        const userId = ctx.from?.id;
        const current = (userId === undefined ? undefined : deps.sessions.peek(userId))?.filter ?? 'any';
        await editOrReply(ctx, filterMenuReply(current));
        await ctx.answerCbQuery();
    });

    bot.action(/^set_filter:(.+)$/, async (ctx) => {
        const key = ctx.match[1];
        if (!isLanguageFilter(key)) {
            await ctx.answerCbQuery('Invalid filter', { show_alert: true });
            return;
        }
        const userId = ctx.from?.id;
        if (userId !== undefined) {
            deps.sessions.setFilter(userId, key);
        }
        await editOrReply(ctx, {
            text: `✅ Language filter set to <b>${key}</b>.\nPick a search mode to search again.`,
            keyboard: searchModeReply().keyboard,
        });
        await ctx.answerCbQuery('Filter set');
    });

    bot.action('ext_filter_close', async (ctx) => {
        await editOrReply(ctx, { text: 'OK.', keyboard: searchModeReply().keyboard });
        await ctx.answerCbQuery();
    });
}

/**
 * Catches every text message no command handler took, so it must be
 * registered after all commands.
 */
export function setupTextHandler(bot: Telegraf, deps: SearchDeps) {
    bot.on('text', async (ctx) => {
        const userId = ctx.from?.id;
        const session = userId === undefined ? undefined : deps.sessions.peek(userId);
        const intent = resolveTextIntent(ctx.message.text, session?.awaitingQuery ?? false);

        switch (intent.kind) {
            case 'help':
                await sendReply(ctx, helpReply());
                return;
            case 'hint':
                await sendReply(ctx, hintReply());
                return;
            case 'query': {
                if (!session) {
                    await sendReply(ctx, hintReply());
                    return;
                }
                const reply = await performSearch(deps, session, intent.query, async (text) => {
                    await ctx.reply(text);
                });
                if (reply.media) {
                    await sendSchematicMedia(ctx, reply.media);
                }
                await sendReply(ctx, { text: reply.text, keyboard: reply.keyboard });
                return;
            }
        }
    });
}
