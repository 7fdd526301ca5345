import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import { logger as rootLogger } from '../lib/logger';
import { stringifyError } from '../lib/errors';
import type { Catalog, Project, ProjectCategory, PythonLib, SearchHit } from '../types/content';

const logger = rootLogger.child('catalog');

const MAX_HITS = 50;

export const PROJECT_CATEGORIES: readonly ProjectCategory[] = ['robotics', 'iot'];

const projectSchema = z.object({
    id: z.union([z.string(), z.number()]).transform(String),
    title: z.string().default('—'),
    description: z.string().default(''),
    boards: z.array(z.string()).default([]),
    parts: z.array(z.string()).default([]),
    code: z
        .object({
            c: z.string().optional(),
            cpp: z.string().optional(),
            micropython: z.string().optional(),
        })
        .default({}),
});

const libSchema = z.object({
    name: z.string().min(1),
    category: z.string().default(''),
    description: z.string().default(''),
    example: z.string().optional(),
});

const catalogSchema = z.object({
    robotics: z.array(projectSchema).default([]),
    iot: z.array(projectSchema).default([]),
    py_libs: z.array(libSchema).default([]),
});

export function emptyCatalog(): Catalog {
    return { robotics: [], iot: [], py_libs: [] };
}

/**
 * Reads the project catalog. A missing or broken file yields an empty catalog
 * so the rest of the bot keeps working.
 */
export function loadCatalog(path: string): Catalog {
    if (!existsSync(path)) {
        logger.warn(`Catalog file ${path} not found; using an empty catalog`);
        return emptyCatalog();
    }
    try {
        const catalog = catalogSchema.parse(JSON.parse(readFileSync(path, 'utf8')));
        logger.info(
            `Loaded ${path}: ${catalog.robotics.length} robotics, ${catalog.iot.length} iot, ` +
                `${catalog.py_libs.length} libraries`,
        );
        return catalog;
    } catch (error) {
        logger.error(`Failed to load catalog ${path}: ${stringifyError(error)}`);
        return emptyCatalog();
    }
}

export function isProjectCategory(value: string): value is ProjectCategory {
    return value === 'robotics' || value === 'iot';
}

export class CatalogService {
    constructor(private readonly catalog: Catalog) {}

    projects(category: ProjectCategory): Project[] {
        return this.catalog[category];
    }

    libs(): PythonLib[] {
        return this.catalog.py_libs;
    }

    findProject(category: ProjectCategory, id: string): Project | undefined {
        return this.catalog[category].find((project) => project.id === id);
    }

    findLib(name: string): PythonLib | undefined {
        return this.catalog.py_libs.find((lib) => lib.name === name);
    }

    /** Substring match over project title, description, boards and parts, then library fields. */
    searchAny(query: string): SearchHit[] {
        const q = normalize(query);
        if (!q) {
            return [];
        }
        const hits = this.matchProjects((project) =>
            [project.title, project.description, project.boards.join(','), project.parts.join(',')]
                .join(' ')
                .toLowerCase()
                .includes(q),
        );
        for (const lib of this.catalog.py_libs) {
            const haystack = [lib.name, lib.category, lib.description].join(' ').toLowerCase();
            if (haystack.includes(q)) {
                hits.push({ kind: 'lib', name: lib.name, title: lib.name });
            }
        }
        return hits.slice(0, MAX_HITS);
    }

    searchByPart(query: string): SearchHit[] {
        const q = normalize(query);
        if (!q) {
            return [];
        }
        return this.matchProjects((project) => project.parts.some((part) => part.toLowerCase().includes(q))).slice(
            0,
            MAX_HITS,
        );
    }

    searchByDescription(query: string): SearchHit[] {
        const q = normalize(query);
        if (!q) {
            return [];
        }
        return this.matchProjects((project) => project.description.toLowerCase().includes(q)).slice(0, MAX_HITS);
    }

    private matchProjects(predicate: (project: Project) => boolean): SearchHit[] {
        const hits: SearchHit[] = [];
        for (const category of PROJECT_CATEGORIES) {
            for (const project of this.catalog[category]) {
                if (predicate(project)) {
                    hits.push({ kind: 'project', category, id: project.id, title: project.title || '(untitled)' });
                }
            }
        }
        return hits;
    }
}

function normalize(value: string): string {
    return (value || '').trim().toLowerCase();
}
