import 'dotenv/config';

import { runScheduledIngestion } from './handler';
import { logger } from './lib/logger';

runScheduledIngestion()
    .then((result) => {
        process.exitCode = result.statusCode === 200 ? 0 : 1;
    })
    .catch((error: unknown) => {
        logger.fatal({ event: 'ingestion_crashed', err: error }, 'Ingestion crashed');
        process.exitCode = 1;
    });
