import type { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it, vi } from 'vitest';
import { ContentSourceError } from '../../lib/errors';
import {
    clampPerPage,
    composeQuery,
    GitHubSearchService,
    isLanguageFilter,
    languageBias,
    sanitizeQuery,
    toRawUrl,
} from '../githubSearchService';

interface StubResponse {
    status: number;
    data: unknown;
}

/** Transport that answers requests in process, in order. */
function stubHttp(responses: StubResponse[]) {
    const requests: InternalAxiosRequestConfig[] = [];
    const adapter: AxiosAdapter = async (config) => {
        requests.push(config);
        const next = responses.shift() ?? { status: 500, data: 'no stub left' };
        return { ...next, statusText: String(next.status), headers: {}, config };
    };
    return { adapter, requests };
}

const codeItem = {
    name: 'main.ino',
    path: 'src/main.ino',
    html_url: 'https://github.com/maker/rover/blob/main/src/main.ino',
    repository: { full_name: 'maker/rover', html_url: 'https://github.com/maker/rover' },
};

describe('query helpers', () => {
    it('sanitizes queries', () => {
        expect(sanitizeQuery('  esp32\n  mqtt ')).toBe('esp32 mqtt');
        expect(sanitizeQuery('x')).toBe('x arduino');
    });

    it('clamps the page size', () => {
        expect(clampPerPage(50)).toBe(10);
        expect(clampPerPage(7.9)).toBe(7);
        expect(clampPerPage(0)).toBe(1);
        expect(clampPerPage(Number.NaN, 8)).toBe(8);
    });

    it('composes the query with the domain clause', () => {
        expect(composeQuery('servo', languageBias('any'), 'in:readme')).toBe(
            'servo (arduino OR "esp32" OR micropython OR robotics OR iot) in:readme',
        );
        expect(composeQuery('servo', languageBias('arduino'))).toBe(
            'servo (arduino OR "esp32" OR micropython OR robotics OR iot) (language:Arduino OR extension:ino)',
        );
    });

    it('maps repository URLs to raw URLs', () => {
        expect(toRawUrl('https://github.com/maker/rover/', '/docs/README.md')).toBe(
            'https://raw.githubusercontent.com/maker/rover/HEAD/docs/README.md',
        );
    });

    it('validates language filters', () => {
        expect(isLanguageFilter('cpp')).toBe(true);
        expect(isLanguageFilter('rust')).toBe(false);
    });
});

describe('GitHubSearchService', () => {
    it('searches code and builds results', async () => {
        const { adapter, requests } = stubHttp([{ status: 200, data: { total_count: 1, items: [codeItem] } }]);
        const service = new GitHubSearchService({ adapter });

        const results = await service.searchCode('rover', 'cpp');

        expect(results).toEqual([
            {
                title: 'main.ino — maker/rover/src/main.ino',
                htmlUrl: 'https://github.com/maker/rover/blob/main/src/main.ino',
                rawUrl: 'https://raw.githubusercontent.com/maker/rover/HEAD/src/main.ino',
            },
        ]);
        expect(requests[0].url).toBe('/search/code');
        expect(requests[0].params).toEqual({
            q: 'rover (arduino OR "esp32" OR micropython OR robotics OR iot) (language:C++ OR extension:cpp OR extension:h) in:file,readme',
            per_page: '8',
            sort: 'best-match',
            order: 'desc',
        });
    });

    it('skips blank queries without a request', async () => {
        const { adapter, requests } = stubHttp([]);
        const service = new GitHubSearchService({ adapter });

        expect(await service.searchCode('  ', 'any')).toEqual([]);
        expect(await service.searchReadme('')).toEqual([]);
        expect(requests).toHaveLength(0);
    });

    it('falls back to the html URL when the repository is unknown', async () => {
        const { adapter } = stubHttp([{ status: 200, data: { items: [{ html_url: 'https://github.com/x' }] } }]);
        const service = new GitHubSearchService({ adapter });

        expect(await service.searchCode('servo', 'any')).toEqual([
            { title: 'code — /', htmlUrl: 'https://github.com/x', rawUrl: 'https://github.com/x' },
        ]);
    });

    it('raises ContentSourceError for API errors', async () => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const { adapter } = stubHttp([{ status: 403, data: { message: 'rate limited' } }]);
        const service = new GitHubSearchService({ adapter });

        const error = await service.searchCode('servo', 'any').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ContentSourceError);
        expect(error).toMatchObject({ source: 'github', status: 403, message: 'GitHub request failed (status 403).' });
    });

    it('tries README query variants until one succeeds', async () => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const { adapter, requests } = stubHttp([
            { status: 422, data: { message: 'validation failed' } },
            { status: 200, data: { items: [{ ...codeItem, name: '', path: 'README.md' }] } },
        ]);
        const service = new GitHubSearchService({ adapter });

        const results = await service.searchReadme('servo sweep');

        expect(requests).toHaveLength(2);
        expect(requests[1].params.q).toBe('servo sweep (arduino OR "esp32" OR micropython OR robotics OR iot) in:readme');
        expect(results[0].title).toBe('README.md — maker/rover/README.md');
        expect(results[0].rawUrl).toBe('https://raw.githubusercontent.com/maker/rover/HEAD/README.md');
    });

    it('rethrows the last error when every README variant fails', async () => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const { adapter, requests } = stubHttp([
            { status: 422, data: {} },
            { status: 422, data: {} },
            { status: 422, data: {} },
            { status: 503, data: {} },
        ]);
        const service = new GitHubSearchService({ adapter });

        await expect(service.searchReadme('servo')).rejects.toMatchObject({ status: 503 });
        expect(requests).toHaveLength(4);
    });

    it('downloads raw text', async () => {
        const { adapter } = stubHttp([{ status: 200, data: 'void setup() {}' }]);
        const service = new GitHubSearchService({ adapter });

        expect(await service.fetchText('https://raw.githubusercontent.com/maker/rover/HEAD/a.ino')).toBe(
            'void setup() {}',
        );
    });

    it('sends the token to the API but not with raw downloads', async () => {
        const { adapter, requests } = stubHttp([
            { status: 200, data: { items: [] } },
            { status: 200, data: 'int x;' },
        ]);
        const service = new GitHubSearchService({ token: 'test-secret', adapter });

        await service.searchCode('servo', 'any');
        await service.fetchText('https://files.example.com/a.c');

        expect(requests[0].headers.get('Authorization')).toBe('Bearer test-secret');
        expect(requests[1].url).toBe('https://files.example.com/a.c');
        expect(requests[1].baseURL).toBeUndefined();
        expect(requests[1].headers.get('Authorization')).toBeUndefined();
        expect(requests[1].headers.get('User-Agent')).toBe('tech-digest-bot/1.0');
    });

    it('searches schematic files by path and keeps their extension', async () => {
        const { adapter, requests } = stubHttp([
            {
                status: 200,
                data: {
                    items: [
                        { ...codeItem, name: 'board.KiCad_PCB', path: 'hw/board.KiCad_PCB' },
                        { ...codeItem, name: 'wiring.png', path: 'docs/wiring.png' },
                    ],
                },
            },
        ]);
        const service = new GitHubSearchService({ adapter });

        const results = await service.searchSchematics('rover');

        expect(requests[0].params.q).toBe(
            'rover (arduino OR "esp32" OR micropython OR robotics OR iot) ' +
                '(extension:png OR extension:jpg OR extension:jpeg OR extension:webp OR ' +
                'extension:svg OR extension:fzz OR extension:sch OR extension:kicad_sch OR ' +
                'extension:kicad_pcb OR extension:pdf) in:path',
        );
        expect(requests[0].params.per_page).toBe('10');
        expect(results.map((result) => result.extension)).toEqual(['.kicad_pcb', '.png']);
        expect(results[1].rawUrl).toBe('https://raw.githubusercontent.com/maker/rover/HEAD/docs/wiring.png');
    });

    it('raises ContentSourceError for failed downloads', async () => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const { adapter } = stubHttp([{ status: 404, data: 'Not Found' }]);
        const service = new GitHubSearchService({ adapter });

        await expect(service.fetchText('https://raw.githubusercontent.com/x/y/HEAD/z')).rejects.toMatchObject({
            source: 'raw',
            status: 404,
        });
    });
});
