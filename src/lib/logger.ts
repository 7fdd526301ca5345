export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

export class Logger {
    constructor(private readonly scope: string) {}

    child(scope: string): Logger {
        return new Logger(`${this.scope}:${scope}`);
    }

    debug(message: string, ...details: unknown[]): void {
        this.print('debug', message, details);
    }

    info(message: string, ...details: unknown[]): void {
        this.print('info', message, details);
    }

    warn(message: string, ...details: unknown[]): void {
        this.print('warn', message, details);
    }

    error(message: string, ...details: unknown[]): void {
        this.print('error', message, details);
    }

    private print(level: LogLevel, message: string, details: unknown[]): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) {
            return;
        }
        const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${this.scope}] ${message}`;
        const write = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
        write(line, ...details);
    }
}

export const logger = new Logger('tech-digest-bot');
