import { Telegraf } from 'telegraf';
import { logger as rootLogger } from './logger';

const logger = rootLogger.child('telegram');

export function createBot(botToken: string): Telegraf {
    if (!botToken) {
        throw new Error('BOT_TOKEN must be provided!');
    }

    const bot = new Telegraf(botToken);

    // Error handling
    bot.catch((err, ctx) => {
        logger.error(`Error for ${ctx.updateType}`, err);
    });

    return bot;
}
