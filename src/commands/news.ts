import { Markup, type Context, type Telegraf } from 'telegraf';
import { formatNews, NEWS_TITLES, type FeedService } from '../services/feedService';
import type { FeedItem, NewsCategory } from '../types/content';
import { sendReply, type BotReply } from './replies';

const NEWS_COMMANDS: Record<string, NewsCategory> = {
    news: 'general',
    ai_news: 'ai',
    iot_news: 'iot',
};

export function newsKeyboard(category: NewsCategory) {
    return Markup.inlineKeyboard([
        [Markup.button.callback('🔄 Refresh', `news:${category}`)],
        [Markup.button.callback('🔙 Main menu', 'back_main')],
    ]).reply_markup;
}

export function newsReply(category: NewsCategory, items: FeedItem[]): BotReply {
    return {
        text: formatNews(items, NEWS_TITLES[category]),
        keyboard: newsKeyboard(category),
    };
}

async function replyWithNews(ctx: Context, feedService: FeedService, category: NewsCategory) {
    await ctx.sendChatAction('typing');
    const items = await feedService.fetchCategory(category);
    await sendReply(ctx, newsReply(category, items));
}

export function setupNewsCommands(bot: Telegraf, feedService: FeedService) {
    for (const [command, category] of Object.entries(NEWS_COMMANDS)) {
        bot.command(command, async (ctx) => {
            await replyWithNews(ctx, feedService, category);
        });
    }

    bot.action(/^news:(general|ai|iot)$/, async (ctx) => {
        const category = ctx.match[1];
        if (category !== 'general' && category !== 'ai' && category !== 'iot') {
            await ctx.answerCbQuery('Unknown section.', { show_alert: true });
            return;
        }
        await ctx.answerCbQuery();
        await replyWithNews(ctx, feedService, category);
    });
}
