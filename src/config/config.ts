import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../lib/errors';
import type { LogLevel } from '../lib/logger';

dotenv.config();

export interface AppConfig {
    telegram: {
        botToken: string;
        publicUrl?: string;
        webhookPath: string;
        webhookSecret?: string;
    };
    server: {
        port: number;
    };
    content: {
        timeZone: string;
        dbPath: string;
        newsLimit: number;
    };
    github: {
        token?: string;
    };
    logLevel: LogLevel;
}

const TOKEN_VARIABLES = ['BOT_TOKEN', 'TELEGRAM_BOT_TOKEN'] as const;

const optionalString = z
    .string()
    .optional()
    .transform((value) => {
        const trimmed = value?.trim();
        return trimmed ? trimmed : undefined;
    });

const schema = z
    .object({
        TZ: z
            .string()
            .default('Europe/Berlin')
            .refine(isValidTimeZone, { message: 'TZ must be an IANA time zone such as Europe/Berlin' }),
        PORT: z.coerce.number().int().min(1).max(65535).default(10000),
        PUBLIC_URL: optionalString.transform((value) => value?.replace(/\/+$/, '')),
        WEBHOOK_PATH: z
            .string()
            .default('/webhook')
            .transform((value) => (value.startsWith('/') ? value : `/${value}`)),
        WEBHOOK_SECRET: optionalString,
        DB_PATH: z.string().default('data/projects.json'),
        GITHUB_TOKEN: optionalString,
        LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
        NEWS_LIMIT: z.coerce.number().int().min(1).max(20).default(8),
    })
    .superRefine((value, ctx) => {
        if (value.PUBLIC_URL && !value.WEBHOOK_SECRET) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['WEBHOOK_SECRET'],
                message: 'WEBHOOK_SECRET is required when PUBLIC_URL is set',
            });
        }
        if (value.WEBHOOK_SECRET && !/^[A-Za-z0-9_-]{1,256}$/.test(value.WEBHOOK_SECRET)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['WEBHOOK_SECRET'],
                message: 'WEBHOOK_SECRET may only contain A-Z, a-z, 0-9, _ and -',
            });
        }
    });

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const botToken = firstPresent(env, TOKEN_VARIABLES);
    if (!botToken) {
        throw new ConfigError(`One of these variables must be set: ${TOKEN_VARIABLES.join(', ')}`);
    }

    const parsed = schema.safeParse(env);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration: ${details}`);
    }

    const values = parsed.data;
    return {
        telegram: {
            botToken,
            publicUrl: values.PUBLIC_URL,
            webhookPath: values.WEBHOOK_PATH,
            webhookSecret: values.WEBHOOK_SECRET,
        },
        server: {
            port: values.PORT,
        },
        content: {
            timeZone: values.TZ,
            dbPath: values.DB_PATH,
            newsLimit: values.NEWS_LIMIT,
        },
        github: {
            token: values.GITHUB_TOKEN,
        },
        logLevel: values.LOG_LEVEL,
    };
}

function firstPresent(env: NodeJS.ProcessEnv, names: readonly string[]): string | undefined {
    for (const name of names) {
        const value = env[name]?.trim();
        if (value) {
            return value;
        }
    }
    return undefined;
}

function isValidTimeZone(value: string): boolean {
    try {
        new Intl.DateTimeFormat('en-US', { timeZone: value });
        return true;
    } catch {
        return false;
    }
}
