import type { FastifyInstance } from 'fastify';
import type { IngestionOutcome } from '../types/ingestion';
import { statusCodeFor } from '../handler';

export interface CronRouteOptions {
    cronSecret?: string;
    // Builds and runs one execution; a fresh set of collaborators per call
    runIngestion: () => Promise<IngestionOutcome>;
}

export async function cronRoutes(fastify: FastifyInstance, options: CronRouteOptions): Promise<void> {
    let running = false;

    // POST /cron/ingest: one incremental ingestion run
    fastify.post('/cron/ingest', async (request, reply) => {
        // Verify cron secret (prevent unauthorized calls)
        if (options.cronSecret && request.headers['x-cron-secret'] !== options.cronSecret) {
            return reply.status(401).send({ error: 'Unauthorized' });
        }

        // Runs are assumed not to overlap; refuse rather than race on the watermark
        if (running) {
            return reply.status(409).send({ error: 'Ingestion already running' });
        }

        running = true;
        try {
            const outcome = await options.runIngestion();
            return reply.status(statusCodeFor(outcome)).send(outcome);
        } finally {
            running = false;
        }
    });
}
