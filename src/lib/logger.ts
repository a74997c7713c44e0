type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

const WRITERS: Record<LogLevel, (...args: unknown[]) => void> = {
    debug: (...args) => console.debug(...args),
    info: (...args) => console.info(...args),
    warn: (...args) => console.warn(...args),
    error: (...args) => console.error(...args),
};

function resolveLevel(): LogLevel {
    const raw = process.env.CMS_LOG_LEVEL?.toLowerCase();
    if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error') {
        return raw;
    }
    return 'info';
}

function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[resolveLevel()]) {
        return;
    }

    const prefix = `[cms:${level}]`;
    if (meta && Object.keys(meta).length > 0) {
        WRITERS[level](prefix, message, meta);
        return;
    }
    WRITERS[level](prefix, message);
}

/** Message of an unknown thrown value, for log metadata and wrapped errors. */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export const logger = {
    debug: (message: string, meta?: Record<string, unknown>): void => log('debug', message, meta),
    info: (message: string, meta?: Record<string, unknown>): void => log('info', message, meta),
    warn: (message: string, meta?: Record<string, unknown>): void => log('warn', message, meta),
    error: (message: string, meta?: Record<string, unknown>): void => log('error', message, meta),
};
