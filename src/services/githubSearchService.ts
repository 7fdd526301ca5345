import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import { ContentSourceError, stringifyError } from '../lib/errors';
import { logger as rootLogger } from '../lib/logger';
import type { ExternalResult, SchematicResult } from '../types/content';

const logger = rootLogger.child('github');

const USER_AGENT = 'tech-digest-bot/1.0';
const DOMAIN_CLAUSE = '(arduino OR "esp32" OR micropython OR robotics OR iot)';
const SCHEMATIC_CLAUSE =
    '(extension:png OR extension:jpg OR extension:jpeg OR extension:webp OR ' +
    'extension:svg OR extension:fzz OR extension:sch OR extension:kicad_sch OR ' +
    'extension:kicad_pcb OR extension:pdf) in:path';

export type LanguageFilter = 'any' | 'arduino' | 'cpp' | 'micropython';

export const LANGUAGE_FILTERS: readonly LanguageFilter[] = ['any', 'arduino', 'cpp', 'micropython'];

export function isLanguageFilter(value: string): value is LanguageFilter {
    return LANGUAGE_FILTERS.some((filter) => filter === value);
}

interface SearchCodeItem {
    name?: string;
    path?: string;
    html_url?: string;
    repository?: {
        full_name?: string;
        html_url?: string;
    };
}

interface SearchCodeResponse {
    total_count?: number;
    items?: SearchCodeItem[];
}

export function sanitizeQuery(query: string): string {
    const collapsed = (query || '').replace(/[\r\n]/g, ' ').replace(/\s+/g, ' ').trim();
    return collapsed.length >= 2 ? collapsed : `${collapsed} arduino`;
}

export function clampPerPage(value: number, fallback = 10, min = 1, max = 10): number {
    const n = Number.isFinite(value) ? Math.trunc(value) : fallback;
    return Math.max(min, Math.min(max, n));
}

export function languageBias(filter: LanguageFilter): string {
    switch (filter) {
        case 'arduino':
            return '(language:Arduino OR extension:ino)';
        case 'cpp':
            return '(language:C++ OR extension:cpp OR extension:h)';
        case 'micropython':
            return '((micropython OR "MicroPython") OR (language:Python extension:py))';
        default:
            return '';
    }
}

export function composeQuery(query: string, bias = '', extra = ''): string {
    return [sanitizeQuery(query), DOMAIN_CLAUSE, bias, extra].filter(Boolean).join(' ');
}

export function toRawUrl(repoHtmlUrl: string, path: string): string {
    const base = `${repoHtmlUrl.replace(/\/+$/, '')}/`.replace(/^https:\/\/github\.com\//, 'https://raw.githubusercontent.com/');
    return `${base}HEAD/${path.replace(/^\/+/, '')}`;
}

export interface GitHubSearchOptions {
    token?: string;
    /** Transport for both clients; the default is axios' own. */
    adapter?: AxiosAdapter;
}

export class GitHubSearchService {
    private readonly api: AxiosInstance;
    private readonly raw: AxiosInstance;

    constructor(options: GitHubSearchOptions = {}) {
        const headers: Record<string, string> = {
            Accept: 'application/vnd.github.text-match+json',
            'User-Agent': USER_AGENT,
            'X-GitHub-Api-Version': '2022-11-28',
        };
        if (options.token) {
            headers.Authorization = `Bearer ${options.token}`;
        }
        this.api = axios.create({
            baseURL: 'https://api.github.com',
            timeout: 25_000,
            headers,
            adapter: options.adapter,
        });
        // Raw files may live on any host, so downloads carry no API credentials
        this.raw = axios.create({
            timeout: 25_000,
            headers: { 'User-Agent': USER_AGENT },
            adapter: options.adapter,
        });
    }

    async searchCode(query: string, filter: LanguageFilter, perPage = 8): Promise<ExternalResult[]> {
        if (!query.trim()) {
            return [];
        }
        const q = composeQuery(query, languageBias(filter), 'in:file,readme');
        const data = await this.search(q, clampPerPage(perPage, 8));
        return toResults(data, 'code');
    }

    /**
     * GitHub's code search rejects some qualifier combinations depending on the
     * parser version, so README lookups walk a list of query variants and keep
     * the first one that succeeds.
     */
    async searchReadme(query: string, perPage = 8): Promise<ExternalResult[]> {
        if (!query.trim()) {
            return [];
        }
        const variants = [
            composeQuery(query, '', 'filename:README in:file (extension:md OR extension:markdown OR extension:rst)'),
            composeQuery(query, '', 'in:readme'),
            composeQuery(query, '', 'filename:README.md in:path'),
            composeQuery(query, '', 'filename:README in:file extension:md'),
        ];

        let lastError: unknown;
        for (const q of variants) {
            try {
                const data = await this.search(q, clampPerPage(perPage, 8));
                return toResults(data, 'README.md');
            } catch (error) {
                lastError = error;
            }
        }
        throw lastError;
    }

    /** Images, diagrams and board files whose path matches the query. */
    async searchSchematics(query: string, perPage = 10): Promise<SchematicResult[]> {
        if (!query.trim()) {
            return [];
        }
        const data = await this.search(composeQuery(query, '', SCHEMATIC_CLAUSE), clampPerPage(perPage, 10));
        return toResults(data, 'file').map((result, index) => ({
            ...result,
            extension: fileExtension(data.items?.[index]?.name || ''),
        }));
    }

    async fetchText(url: string): Promise<string> {
        let response: AxiosResponse<string>;
        try {
            response = await this.raw.get<string>(url, {
                responseType: 'text',
                validateStatus: () => true,
            });
        } catch (error) {
            logger.error(`Download of ${url} failed: ${stringifyError(error)}`);
            throw new ContentSourceError('raw', 'Download failed.', { cause: error });
        }
        if (response.status >= 400) {
            logger.error(`Download of ${url} failed with status ${response.status}`);
            throw new ContentSourceError('raw', `Download failed (status ${response.status}).`, {
                status: response.status,
            });
        }
        return String(response.data);
    }

    private async search(q: string, perPage: number): Promise<SearchCodeResponse> {
        let response: AxiosResponse<SearchCodeResponse | string>;
        try {
            response = await this.api.get<SearchCodeResponse | string>('/search/code', {
                params: { q, per_page: String(perPage), sort: 'best-match', order: 'desc' },
                validateStatus: () => true,
            });
        } catch (error) {
            logger.error(`GitHub request failed: ${stringifyError(error)} | q=${q}`);
            throw new ContentSourceError('github', 'GitHub request failed.', { cause: error });
        }
        if (response.status >= 400) {
            const body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
            logger.error(`GitHub API error ${response.status}: ${body.slice(0, 400)} | q=${q}`);
            throw new ContentSourceError('github', `GitHub request failed (status ${response.status}).`, {
                status: response.status,
            });
        }
        if (typeof response.data === 'string') {
            throw new ContentSourceError('github', 'GitHub returned an unexpected response.', {
                status: response.status,
            });
        }
        return response.data;
    }
}

function toResults(data: SearchCodeResponse, fallbackName: string): ExternalResult[] {
    return (data.items ?? []).map((item) => {
        const name = item.name || fallbackName;
        const path = item.path || '';
        const repo = item.repository?.full_name || '';
        const repoUrl = item.repository?.html_url || '';
        const htmlUrl = item.html_url || '';
        return {
            title: `${name} — ${repo}/${path}`,
            htmlUrl,
            rawUrl: repoUrl && path ? toRawUrl(repoUrl, path) : htmlUrl,
        };
    });
}

export function fileExtension(name: string): string {
    const dot = name.lastIndexOf('.');
    return dot >= 0 ? name.slice(dot).toLowerCase() : '';
}
