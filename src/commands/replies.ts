import type { Context } from 'telegraf';
import type { InlineKeyboardMarkup } from 'telegraf/types';
import { logger as rootLogger } from '../lib/logger';
import { stringifyError } from '../lib/errors';

const logger = rootLogger.child('replies');

export interface BotReply {
    text: string;
    keyboard?: InlineKeyboardMarkup;
}

export interface DocumentReply {
    content: Buffer;
    filename: string;
    caption?: string;
    keyboard?: InlineKeyboardMarkup;
}

/** Either a message shown inline or a file sent when the text is too long for one message. */
export type ContentReply = { kind: 'inline'; reply: BotReply } | { kind: 'document'; document: DocumentReply };

function extraFor(reply: BotReply) {
    return {
        parse_mode: 'HTML' as const,
        link_preview_options: { is_disabled: true },
        reply_markup: reply.keyboard,
    };
}

export async function sendReply(ctx: Context, reply: BotReply): Promise<void> {
    await ctx.reply(reply.text, extraFor(reply));
}

/**
 * Edits the message behind a callback query; Telegram refuses edits of old or
 * unchanged messages, in which case a new message is sent instead.
 */
export async function editOrReply(ctx: Context, reply: BotReply): Promise<void> {
    try {
        await ctx.editMessageText(reply.text, extraFor(reply));
    } catch (error) {
        logger.debug(`Edit failed, sending a new message: ${stringifyError(error)}`);
        await sendReply(ctx, reply);
    }
}

export async function sendDocument(ctx: Context, document: DocumentReply): Promise<void> {
    await ctx.replyWithDocument(
        { source: document.content, filename: document.filename },
        { caption: document.caption, reply_markup: document.keyboard },
    );
}

export async function deliverContent(ctx: Context, content: ContentReply, edit: boolean): Promise<void> {
    if (content.kind === 'document') {
        await sendDocument(ctx, content.document);
        return;
    }
    if (edit) {
        await editOrReply(ctx, content.reply);
        return;
    }
    await sendReply(ctx, content.reply);
}
