import JSZip from 'jszip';
import { toFileStem } from '../lib/format';
import type { CodeLanguage, Project } from '../types/content';

export const CODE_LANGUAGES: readonly CodeLanguage[] = ['c', 'cpp', 'micropython'];

const EXTENSIONS: Record<CodeLanguage, string> = {
    c: '.c',
    cpp: '.cpp',
    micropython: '.py',
};

export function isCodeLanguage(value: string): value is CodeLanguage {
    return value === 'c' || value === 'cpp' || value === 'micropython';
}

export function codeFileName(title: string, language: string): string {
    const extension = isCodeLanguage(language) ? EXTENSIONS[language] : '.txt';
    return `${toFileStem(title)}${extension}`;
}

export function archiveFileName(title: string): string {
    return `${toFileStem(title)}.zip`;
}

/** Zips every non-empty code variant of a project; undefined when it has none. */
export async function buildCodeArchive(project: Project): Promise<Buffer | undefined> {
    const zip = new JSZip();
    let files = 0;
    for (const language of CODE_LANGUAGES) {
        const content = project.code[language];
        if (!content) {
            continue;
        }
        zip.file(codeFileName(project.title, language), content);
        files += 1;
    }
    if (files === 0) {
        return undefined;
    }
    return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}
