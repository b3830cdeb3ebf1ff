// workerEntry.ts
import config from './utils/config';
import logger from './utils/logger';
import { buildServices } from './utils/serviceContainer';
import { registerShutdownHandler } from './utils/shutdownHandler';
import { JobScheduler, startScheduler } from './jobs/scheduler';
import { registerJobHandlers } from './jobs/jobHandlers';
import { createQueueManager } from './jobs/queueManager';
import { startWorker, shutdownWorker } from './jobs/worker';

const initWorkerService = async () => {
    logger.info('🛠️ Starting Background Worker...');

    const connection = config.bullMQConnection;
    if (!connection) {
        logger.error('❌ Cannot start worker: Redis not configured (set REDIS_URL or REDIS_QUEUE_URL).');
        process.exit(1);
    }

    if (config.jobs.runner === 'inline') {
        logger.warn('⚠️ JOB_RUNNER is inline: the API process also runs these jobs on its own timers.');
    }

    try {
        // 1. Database & Redis Connection
        const services = buildServices(config);
        await services.dbLoader.connect();

        // 2. Job registry
        const scheduler = registerJobHandlers(new JobScheduler(), {
            historyService: services.historyService,
            store: services.store,
            history: config.history,
        });

        // 3. Repeatable jobs (stale ones from earlier deployments are removed)
        const queueManager = createQueueManager(connection);
        await startScheduler(scheduler, queueManager);

        // 4. Queue Consumer
        const worker = startWorker(scheduler, connection, config.worker.concurrency);

        logger.info('🚀 Background Worker Fully Operational & Listening for Jobs');

        registerShutdownHandler('Worker', [
            () => shutdownWorker(worker),
            () => queueManager.shutdown(),
            () => services.dbLoader.disconnect(),
        ]);
    } catch (err) {
        logger.error(`❌ Worker Startup Failed: ${err instanceof Error ? err.message : 'Unknown'}`);
        process.exit(1);
    }
};

initWorkerService();
