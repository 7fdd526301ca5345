/**
 * Helpers for Telegram's HTML parse mode.
 *
 * Telegram accepts a subset of HTML (<b>, <i>, <code>, <pre>, <a href>);
 * <, > and & in user content must be escaped, and quotes too inside attributes.
 */

/** Inline code blocks above this size are sent as a document instead. */
export const INLINE_CODE_LIMIT = 3500;

export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

export function codeBlock(code: string): string {
    return `<pre><code>${escapeHtml(code)}</code></pre>`;
}

export function trimText(text: string, max = 200): string {
    const value = (text || '').trim();
    return value.length > max ? `${value.slice(0, max - 1)}…` : value;
}

/**
 * Formats an instant as YYYY-MM-DD in the given IANA time zone.
 * Returns an empty string for missing or unparseable input.
 */
export function formatDate(value: string | undefined, timeZone: string): string {
    if (!value) {
        return '';
    }
    const date = new Date(value);
    if (Number.isNaN(date.getTime())) {
        return '';
    }
    const parts = new Intl.DateTimeFormat('en-US', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
    }).formatToParts(date);
    const pick = (type: Intl.DateTimeFormatPartTypes) => parts.find((part) => part.type === type)?.value ?? '';
    return `${pick('year')}-${pick('month')}-${pick('day')}`;
}

export function toFileStem(title: string, fallback = 'project'): string {
    return (title || fallback).replace(/ /g, '_');
}
