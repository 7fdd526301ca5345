export type NewsCategory = 'general' | 'ai' | 'iot';

export type FeedCatalog = Record<NewsCategory, string[]>;

export interface FeedItem {
    title: string;
    link: string;
    /** YYYY-MM-DD in the configured time zone, empty when the entry carries no date. */
    date: string;
}

export interface Snippet {
    title: string;
    tags: string[];
    description: string;
    code: string;
}

export type CodeLanguage = 'c' | 'cpp' | 'micropython';

export type ProjectCategory = 'robotics' | 'iot';

export interface Project {
    id: string;
    title: string;
    description: string;
    boards: string[];
    parts: string[];
    code: Partial<Record<CodeLanguage, string>>;
}

export interface PythonLib {
    name: string;
    category: string;
    description: string;
    example?: string;
}

export interface Catalog {
    robotics: Project[];
    iot: Project[];
    py_libs: PythonLib[];
}

export type SearchHit =
    | { kind: 'project'; category: ProjectCategory; id: string; title: string }
    | { kind: 'lib'; name: string; title: string };

export interface ExternalResult {
    title: string;
    htmlUrl: string;
    rawUrl: string;
}

export interface SchematicResult extends ExternalResult {
    /** Lowercased file extension with its dot, empty when the name has none. */
    extension: string;
}
