import type { LanguageFilter } from './githubSearchService';
import type { ExternalResult, SchematicResult } from '../types/content';

export type SearchMode = 'code' | 'schematic' | 'parts' | 'howto';

export const SEARCH_MODES: readonly SearchMode[] = ['code', 'schematic', 'parts', 'howto'];

export function isSearchMode(value: string): value is SearchMode {
    return SEARCH_MODES.some((mode) => mode === value);
}

export interface SearchSession {
    /** True once the user picked a mode and the next plain text is a query. */
    awaitingQuery: boolean;
    mode: SearchMode;
    filter: LanguageFilter;
    codeResults: ExternalResult[];
    schematicResults: SchematicResult[];
    readmeResults: ExternalResult[];
}

function createSession(): SearchSession {
    return {
        awaitingQuery: false,
        mode: 'code',
        filter: 'any',
        codeResults: [],
        schematicResults: [],
        readmeResults: [],
    };
}

/**
 * Per-user search state. Lives in process memory only and is lost on restart.
 */
export class SearchSessionStore {
    private sessions = new Map<number, SearchSession>();

    get(userId: number): SearchSession {
        let session = this.sessions.get(userId);
        if (!session) {
            session = createSession();
            this.sessions.set(userId, session);
        }
        return session;
    }

    peek(userId: number): SearchSession | undefined {
        return this.sessions.get(userId);
    }

    /** Leaves the query prompt but keeps the language filter and stored results. */
    reset(userId: number): void {
        const session = this.sessions.get(userId);
        if (session) {
            session.awaitingQuery = false;
            session.mode = 'code';
        }
    }

    beginQuery(userId: number, mode: SearchMode): void {
        const session = this.get(userId);
        session.mode = mode;
        session.awaitingQuery = true;
    }

    setFilter(userId: number, filter: LanguageFilter): void {
        this.get(userId).filter = filter;
    }

    clear(): void {
        this.sessions.clear();
    }
}
