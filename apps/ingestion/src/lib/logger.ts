import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

const REDACT_PATHS = [
    'accessToken',
    'refreshToken',
    'access_token',
    'refresh_token',
    '*.accessToken',
    '*.refreshToken',
    '*.access_token',
    '*.refresh_token',
    'headers.authorization',
    'headers.Authorization',
];

// Unknown levels make pino throw at construction, before config is validated
export function resolveLogLevel(value: string | undefined): string {
    if (value === undefined || value === '') return 'info';
    return value === 'silent' || value in pino.levels.values ? value : 'info';
}

export function makeLogger(bindings: Record<string, unknown> = {}): Logger {
    const nodeEnv = process.env.NODE_ENV ?? 'development';

    return pino({
        level: resolveLogLevel(process.env.LOG_LEVEL),
        // Silent under jest
        enabled: nodeEnv !== 'test',
        base: { ...bindings, service: 'listening-ingest' },
        timestamp: pino.stdTimeFunctions.isoTime,
        redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
    });
}

export function makeNoopLogger(): Logger {
    return pino({ enabled: false });
}

export const logger = makeLogger();

export const ingestionLoggers = {
    auth: logger.child({ component: 'auth' }),
    fetcher: logger.child({ component: 'fetcher' }),
    writer: logger.child({ component: 'writer' }),
    cursor: logger.child({ component: 'cursor' }),
    orchestrator: logger.child({ component: 'orchestrator' }),
};
