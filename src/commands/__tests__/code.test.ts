import { describe, expect, it } from 'vitest';
import { SnippetService } from '../../services/snippetService';
import { snippetReply } from '../code';
import { callbackRows } from './helpers';

const service = new SnippetService(
    [
        { title: 'Blink', tags: ['Arduino'], description: 'LED', code: 'digitalWrite(13, HIGH);' },
        { title: 'Sum', tags: ['python'], description: 'Add', code: 'a + b' },
    ],
    () => 0,
);

describe('snippetReply', () => {
    it('keeps the tag on the next button', () => {
        const reply = snippetReply(service, ' ARDUINO ');

        expect(reply.text).toBe('💡 <b>Blink</b>\nLED\n\n<pre><code>digitalWrite(13, HIGH);</code></pre>');
        expect(callbackRows(reply.keyboard)).toEqual([['code_next:arduino'], ['back_main']]);
    });

    it('picks from all snippets without a tag', () => {
        const reply = snippetReply(service);

        expect(reply.text.startsWith('💡 <b>Blink</b>')).toBe(true);
        expect(callbackRows(reply.keyboard)).toEqual([['code_next:'], ['back_main']]);
    });

    it('lists the known tags when nothing matches', () => {
        expect(snippetReply(service, '<rust>')).toEqual({
            text: 'No snippets tagged "&lt;rust&gt;". Available tags: arduino, python',
        });
    });

    it('says none when there are no snippets at all', () => {
        expect(snippetReply(new SnippetService([]), 'go').text).toBe('No snippets tagged "go". Available tags: none');
    });
});
