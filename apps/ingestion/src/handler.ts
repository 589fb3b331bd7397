import { loadEnv, type Env } from './env';
import { createContainer, type ContainerOverrides } from './services/container';
import type { IngestionOutcome } from './types/ingestion';
import { ConfigError } from './lib/ingestion-errors';
import { logger } from './lib/logger';

export interface InvocationResult {
    statusCode: number;
    body: IngestionOutcome | { status: 'config_error'; issues: string[] };
}

export function statusCodeFor(outcome: IngestionOutcome): number {
    switch (outcome.status) {
        case 'success':
        case 'noop':
        case 'skipped':
            return 200;
        case 'auth_failure':
            return 401;
        case 'transient_failure':
            return 503;
        case 'permanent_failure':
            return 500;
    }
}

export async function invokeIngestion(env: Env, overrides: ContainerOverrides = {}): Promise<InvocationResult> {
    const { orchestrator } = createContainer(env, overrides);
    const outcome = await orchestrator.run();
    return { statusCode: statusCodeFor(outcome), body: outcome };
}

// Entry point for an external scheduler (cron, serverless timer)
export async function runScheduledIngestion(
    source: NodeJS.ProcessEnv = process.env,
    overrides: ContainerOverrides = {}
): Promise<InvocationResult> {
    let env: Env;
    try {
        env = loadEnv(source);
    } catch (error) {
        if (error instanceof ConfigError) {
            logger.error({ event: 'config_invalid', issues: error.issues }, 'Invalid environment variables');
            return { statusCode: 500, body: { status: 'config_error', issues: error.issues } };
        }
        throw error;
    }

    logger.info({ event: 'ingestion_started', storage: env.STORAGE_DRIVER }, 'Starting Spotify data ingestion');
    const result = await invokeIngestion(env, overrides);

    if (result.body.status === 'success') {
        logger.info({ event: 'ingestion_finished', ...result.body }, `${result.body.ingested} events ingested`);
    } else if (result.body.status === 'noop') {
        logger.info({ event: 'ingestion_finished', status: 'noop' }, '0 new events');
    } else if (result.body.status === 'skipped') {
        logger.warn(
            { event: 'ingestion_finished', ...result.body },
            `0 events ingested; ${result.body.quarantined} malformed records quarantined`
        );
    }
    return result;
}
