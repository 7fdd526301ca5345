import { Markup, type Telegraf } from 'telegraf';
import type { SearchSessionStore } from '../services/searchSessionStore';
import { editOrReply, sendReply, type BotReply } from './replies';

export interface BotCommandInfo {
    command: string;
    description: string;
}

export const BOT_COMMANDS: readonly BotCommandInfo[] = [
    { command: 'start', description: 'Show the main menu' },
    { command: 'help', description: 'List the available commands' },
    { command: 'news', description: 'Latest tech headlines' },
    { command: 'ai_news', description: 'Latest AI headlines' },
    { command: 'iot_news', description: 'Latest IoT and robotics headlines' },
    { command: 'code', description: 'Random code snippet, optionally by tag: /code python' },
    { command: 'projects', description: 'Browse robotics, IoT and Python projects' },
    { command: 'search', description: 'Search projects, parts and code' },
];

export const WELCOME_TEXT = 'Hi 👋\nPick a section from the menu below:';

export const HINT_TEXT = 'Use the menu below to get started:';

export function helpText(): string {
    const lines = ['<b>Available commands</b>', ''];
    for (const { command, description } of BOT_COMMANDS) {
        lines.push(`/${command} - ${description}`);
    }
    return lines.join('\n');
}

export function mainMenuKeyboard() {
    return Markup.inlineKeyboard(
        [
            Markup.button.callback('📰 Tech news', 'news:general'),
            Markup.button.callback('🤖 AI news', 'news:ai'),
            Markup.button.callback('🌐 IoT news', 'news:iot'),
            Markup.button.callback('💡 Code snippet', 'code_next:'),
            Markup.button.callback('📁 Projects', 'catalog'),
            Markup.button.callback('🔎 Search', 'search_start'),
        ],
        { columns: 2 },
    ).reply_markup;
}

export function welcomeReply(): BotReply {
    return { text: WELCOME_TEXT, keyboard: mainMenuKeyboard() };
}

export function helpReply(): BotReply {
    return { text: helpText(), keyboard: mainMenuKeyboard() };
}

export function hintReply(): BotReply {
    return { text: HINT_TEXT, keyboard: mainMenuKeyboard() };
}

export type TextIntent = { kind: 'help' } | { kind: 'query'; query: string } | { kind: 'hint' };

/**
 * Decides what a plain text message means once no command handler took it:
 * any leftover /command is unknown and gets the help text, otherwise the text
 * is a search query when the user is in the search flow.
 */
export function resolveTextIntent(text: string, awaitingQuery: boolean): TextIntent {
    const trimmed = text.trim();
    if (trimmed.startsWith('/')) {
        return { kind: 'help' };
    }
    if (awaitingQuery && trimmed) {
        return { kind: 'query', query: trimmed };
    }
    return { kind: 'hint' };
}

export function setupMenuCommands(bot: Telegraf, sessions: SearchSessionStore) {
    bot.start(async (ctx) => {
        resetSession(sessions, ctx.from?.id);
        await sendReply(ctx, welcomeReply());
    });

    bot.help(async (ctx) => {
        await sendReply(ctx, helpReply());
    });

    bot.action('back_main', async (ctx) => {
        resetSession(sessions, ctx.from?.id);
        await editOrReply(ctx, { text: '🔙 Main menu:', keyboard: mainMenuKeyboard() });
        await ctx.answerCbQuery();
    });
}

function resetSession(sessions: SearchSessionStore, userId: number | undefined): void {
    if (userId !== undefined) {
        sessions.reset(userId);
    }
}
