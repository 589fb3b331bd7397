import 'dotenv/config';

import Fastify from 'fastify';
import { loadEnv } from './env';
import { cronRoutes } from './routes/cron';
import { createContainer } from './services/container';
import { logger } from './lib/logger';

export function buildServer(env = loadEnv()) {
    const server = Fastify({ logger: { level: env.LOG_LEVEL } });

    server.register(cronRoutes, {
        cronSecret: env.CRON_SECRET,
        runIngestion: () => createContainer(env).orchestrator.run(),
    });

    // Health check
    server.get('/health', async () => ({ status: 'ok' }));

    return server;
}

const start = async () => {
    const env = loadEnv();
    const server = buildServer(env);

    const shutdown = async () => {
        server.log.info('Shutting down...');
        await server.close();
    };

    const onSignal = () => {
        shutdown().catch((err: unknown) => {
            logger.error({ event: 'shutdown_failed', err }, 'Shutdown failed');
            process.exitCode = 1;
        });
    };
    process.on('SIGTERM', onSignal);
    process.on('SIGINT', onSignal);

    await server.listen({ port: env.PORT, host: '0.0.0.0' });
};

if (require.main === module) {
    start().catch((err: unknown) => {
        logger.fatal({ event: 'server_start_failed', err }, 'Server failed to start');
        process.exitCode = 1;
    });
}
