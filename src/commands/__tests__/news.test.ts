import { describe, expect, it } from 'vitest';
import { newsReply } from '../news';
import { callbackRows } from './helpers';

describe('newsReply', () => {
    it('titles the list by category with refresh and back buttons', () => {
        const reply = newsReply('iot', [{ title: 'Sensors', link: 'https://n.test/1', date: '2024-05-01' }]);

        expect(reply.text).toBe(
            '📰 <b>IoT &amp; Robotics News</b>\n\n1. <a href="https://n.test/1">Sensors</a> — 2024-05-01',
        );
        expect(callbackRows(reply.keyboard)).toEqual([['news:iot'], ['back_main']]);
    });

    it('keeps the buttons when nothing was found', () => {
        const reply = newsReply('ai', []);

        expect(reply.text).toBe('No results found.');
        expect(callbackRows(reply.keyboard)).toEqual([['news:ai'], ['back_main']]);
    });
});
