import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { formatSnippet, loadSnippets, SnippetService } from '../snippetService';
import type { Snippet } from '../../types/content';

const snippets: Snippet[] = [
    { title: 'Profile', tags: ['Python', 'perf'], description: 'cProfile', code: 'import cProfile' },
    { title: 'Blink', tags: ['arduino'], description: 'millis()', code: 'if (now - last >= 500) {}' },
    { title: 'Retry', tags: ['python', 'network'], description: 'retry loop', code: 'for i in range(3): pass' },
];

describe('SnippetService', () => {
    it('picks by a case-insensitive tag', () => {
        const service = new SnippetService(snippets, () => 0.99);

        expect(service.pick('PYTHON')?.title).toBe('Retry');
        expect(service.pick('arduino')?.title).toBe('Blink');
    });

    it('picks from every snippet without a tag', () => {
        expect(new SnippetService(snippets, () => 0).pick()?.title).toBe('Profile');
        expect(new SnippetService(snippets, () => 0.5).pick()?.title).toBe('Blink');
    });

    it('returns undefined for an unknown tag', () => {
        expect(new SnippetService(snippets).pick('cobol')).toBeUndefined();
    });

    it('lists lowercased unique tags', () => {
        expect(new SnippetService(snippets).tags()).toEqual(['arduino', 'network', 'perf', 'python']);
    });
});

describe('formatSnippet', () => {
    it('escapes the code', () => {
        expect(formatSnippet(snippets[1])).toBe(
            '💡 <b>Blink</b>\nmillis()\n\n<pre><code>if (now - last &gt;= 500) {}</code></pre>',
        );
    });
});

describe('loadSnippets', () => {
    it('fills defaults from the JSON file', () => {
        const dir = mkdtempSync(path.join(tmpdir(), 'snippets-'));
        const file = path.join(dir, 'snippets.json');
        writeFileSync(file, JSON.stringify([{ title: 'Hello', code: 'print(1)' }]));

        expect(loadSnippets(file)).toEqual([{ title: 'Hello', tags: [], description: '', code: 'print(1)' }]);
    });

    it('rejects snippets without code', () => {
        const dir = mkdtempSync(path.join(tmpdir(), 'snippets-'));
        const file = path.join(dir, 'snippets.json');
        writeFileSync(file, JSON.stringify([{ title: 'Empty', code: '' }]));

        expect(() => loadSnippets(file)).toThrow();
    });

    it('loads the bundled snippets', () => {
        const bundled = loadSnippets(path.join(__dirname, '../../../content/snippets.json'));

        expect(bundled.length).toBeGreaterThan(0);
    });
});
