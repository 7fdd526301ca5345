import { describe, expect, it } from 'vitest';
import type { Project } from '../../types/content';
import {
    catalogMenuReply,
    libDetailReply,
    libListReply,
    projectCodeReply,
    projectDetailReply,
    projectKeyboard,
    projectListReply,
} from '../catalog';
import { callbackRows } from './helpers';

const project: Project = {
    id: 'rover',
    title: 'Line Rover',
    description: 'Follows <black> tape',
    boards: ['Arduino Uno'],
    parts: ['TCRT5000', 'L298N'],
    code: { cpp: 'if (a < b) {}' },
};

describe('catalog replies', () => {
    it('offers the three sections', () => {
        expect(callbackRows(catalogMenuReply().keyboard)).toEqual([['cat:robotics'], ['cat:iot'], ['cat:libs'], ['back_main']]);
    });

    it('lists projects with a back button', () => {
        const reply = projectListReply('robotics', [project]);

        expect(reply.text).toBe('🤖 Robotics projects:');
        expect(callbackRows(reply.keyboard)).toEqual([['proj:robotics:rover'], ['catalog']]);
        expect(projectListReply('iot', []).text).toBe('🌐 IoT projects: nothing here yet.');
    });

    it('lists libraries two per row', () => {
        const reply = libListReply([
            { name: 'pyserial', category: 'hardware', description: '' },
            { name: 'paho-mqtt', category: 'iot', description: '' },
        ]);

        expect(callbackRows(reply.keyboard)).toEqual([['lib:pyserial', 'lib:paho-mqtt'], ['catalog']]);
    });

    it('shows project details escaped', () => {
        const reply = projectDetailReply('robotics', project);

        expect(reply.text).toBe(
            '📌 <b>Line Rover</b>\n\nFollows &lt;black&gt; tape\n\n⚡️ Boards: Arduino Uno\n🧩 Parts: TCRT5000, L298N',
        );
        expect(callbackRows(reply.keyboard)).toEqual([
            ['code:robotics:rover:c', 'code:robotics:rover:cpp', 'code:robotics:rover:micropython'],
            ['zip:robotics:rover'],
            ['cat:robotics'],
        ]);
    });

    it('uses a dash for missing boards and parts', () => {
        const reply = projectDetailReply('iot', { ...project, boards: [], parts: [] });

        expect(reply.text.endsWith('⚡️ Boards: —\n🧩 Parts: —')).toBe(true);
    });

    it('adds a single-file download for the language on screen', () => {
        expect(callbackRows(projectKeyboard('robotics', project, 'cpp'))[1]).toEqual([
            'dls:robotics:rover:cpp',
            'zip:robotics:rover',
        ]);
        expect(callbackRows(projectKeyboard('robotics', project, 'c'))[1]).toEqual(['zip:robotics:rover']);
    });

    it('shows short code inline', () => {
        const content = projectCodeReply('robotics', project, 'cpp');

        expect(content).toEqual({
            kind: 'inline',
            reply: {
                text: '📌 <b>Line Rover</b> - CPP\n\n<pre><code>if (a &lt; b) {}</code></pre>',
                keyboard: projectKeyboard('robotics', project, 'cpp'),
            },
        });
        expect(projectCodeReply('robotics', project, 'micropython')).toBeUndefined();
    });

    it('sends long code as a document', () => {
        const code = 'x'.repeat(4000);
        const content = projectCodeReply('robotics', { ...project, code: { c: code } }, 'c');

        if (content?.kind !== 'document') {
            throw new Error(`expected a document, got ${content?.kind}`);
        }
        expect(content.document.filename).toBe('Line_Rover_c.txt');
        expect(content.document.caption).toBe('📌 Line Rover - C');
        expect(content.document.content.toString('utf8')).toBe(code);
    });

    it('shows a library with its example', () => {
        const reply = libDetailReply({
            name: 'pyserial',
            category: 'hardware',
            description: 'Serial ports',
            example: 'import serial',
        });

        expect(reply.text).toBe(
            '🐍 <b>pyserial</b>\nCategory: hardware\n\nSerial ports\n\n<pre><code>import serial</code></pre>',
        );
        expect(callbackRows(reply.keyboard)).toEqual([
            ['dllib:example:pyserial', 'dllib:json:pyserial'],
            ['cat:libs'],
        ]);
    });

    it('keeps a long example behind the download button', () => {
        const reply = libDetailReply({
            name: 'pyserial',
            category: 'hardware',
            description: 'Serial ports',
            example: 'x'.repeat(5000),
        });

        expect(reply.text).toBe(
            '🐍 <b>pyserial</b>\nCategory: hardware\n\nSerial ports\n\n' +
                'The example is too long to show here. Use ⬇️ Example to download it.',
        );
        expect(callbackRows(reply.keyboard)[0]).toEqual(['dllib:example:pyserial', 'dllib:json:pyserial']);
    });

    it('omits the example button when there is none', () => {
        const reply = libDetailReply({ name: 'numpy', category: '', description: 'Arrays' });

        expect(reply.text).toBe('🐍 <b>numpy</b>\n\nArrays');
        expect(callbackRows(reply.keyboard)).toEqual([['dllib:json:numpy', 'cat:libs']]);
    });
});
