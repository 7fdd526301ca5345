import type { InlineKeyboardMarkup } from 'telegraf/types';

/** Callback data of every button, row by row. */
export function callbackRows(keyboard: InlineKeyboardMarkup | undefined): string[][] {
    return (keyboard?.inline_keyboard ?? []).map((row) =>
        row.map((button) => ('callback_data' in button ? button.callback_data : button.text)),
    );
}

export function buttonTexts(keyboard: InlineKeyboardMarkup | undefined): string[] {
    return (keyboard?.inline_keyboard ?? []).flat().map((button) => button.text);
}
