import { readFileSync } from 'fs';
import { z } from 'zod';
import { codeBlock, escapeHtml } from '../lib/format';
import type { Snippet } from '../types/content';

const snippetSchema = z.object({
    title: z.string().min(1),
    tags: z.array(z.string()).default([]),
    description: z.string().default(''),
    code: z.string().min(1),
});

export function loadSnippets(path: string): Snippet[] {
    const raw = JSON.parse(readFileSync(path, 'utf8'));
    return z.array(snippetSchema).parse(raw);
}

export class SnippetService {
    constructor(
        private readonly snippets: Snippet[],
        private readonly random: () => number = Math.random,
    ) {}

    /** Random snippet, restricted to `tag` when given. Undefined when nothing matches. */
    pick(tag?: string): Snippet | undefined {
        const wanted = tag?.trim().toLowerCase();
        const pool = wanted
            ? this.snippets.filter((snippet) => snippet.tags.some((t) => t.toLowerCase() === wanted))
            : this.snippets;
        if (pool.length === 0) {
            return undefined;
        }
        const index = Math.min(Math.floor(this.random() * pool.length), pool.length - 1);
        return pool[index];
    }

    tags(): string[] {
        const all = new Set<string>();
        for (const snippet of this.snippets) {
            for (const tag of snippet.tags) {
                all.add(tag.toLowerCase());
            }
        }
        return [...all].sort();
    }
}

export function formatSnippet(snippet: Snippet): string {
    return `💡 <b>${escapeHtml(snippet.title)}</b>\n${escapeHtml(snippet.description)}\n\n${codeBlock(snippet.code)}`;
}
