import { Markup, type Context, type Telegraf } from 'telegraf';
import { escapeHtml } from '../lib/format';
import { formatSnippet, type SnippetService } from '../services/snippetService';
import { sendReply, type BotReply } from './replies';

export function snippetKeyboard(tag: string) {
    return Markup.inlineKeyboard([
        [Markup.button.callback('🎲 Another one', `code_next:${tag}`)],
        [Markup.button.callback('🔙 Main menu', 'back_main')],
    ]).reply_markup;
}

export function snippetReply(snippets: SnippetService, tag?: string): BotReply {
    const normalizedTag = tag?.trim().toLowerCase() ?? '';
    const snippet = snippets.pick(normalizedTag || undefined);
    if (!snippet) {
        const known = snippets.tags();
        const available = known.length > 0 ? known.join(', ') : 'none';
        return {
            text: `No snippets tagged "${escapeHtml(normalizedTag)}". Available tags: ${escapeHtml(available)}`,
        };
    }
    return { text: formatSnippet(snippet), keyboard: snippetKeyboard(normalizedTag) };
}

async function replyWithSnippet(ctx: Context, snippets: SnippetService, tag?: string) {
    await sendReply(ctx, snippetReply(snippets, tag));
}

export function setupCodeCommands(bot: Telegraf, snippets: SnippetService) {
    bot.command('code', async (ctx) => {
        const tag = ctx.payload.split(/\s+/)[0];
        await replyWithSnippet(ctx, snippets, tag);
    });

    bot.action(/^code_next:(.*)$/, async (ctx) => {
        await ctx.answerCbQuery();
        await replyWithSnippet(ctx, snippets, ctx.match[1]);
    });
}
