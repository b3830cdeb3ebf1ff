// jobs/worker.ts
import { Worker, Job, ConnectionOptions } from 'bullmq';
import logger from '../utils/logger';
import { errorMessage } from '../utils/helpers';
import { CONSTANTS } from '../utils/constants';
import { JobScheduler } from './scheduler';

/**
 * Consumes the maintenance queue. Every job name maps onto a registered scheduler task.
 */
export const startWorker = (
    scheduler: JobScheduler,
    connection: ConnectionOptions,
    concurrency: number = 1,
    queueName: string = CONSTANTS.QUEUE.NAME
): Worker => {
    const worker = new Worker(queueName, async (job: Job) => {
        if (!scheduler.has(job.name)) {
            logger.warn(`⚠️ Unknown Job Type: ${job.name}`);
            return null;
        }
        return scheduler.run(job.name);
    }, {
        connection,
        concurrency: Math.max(1, concurrency),
        // Limit how many times a "stalled" job is retried to prevent infinite loops
        maxStalledCount: 1,
    });

    // --- Event Listeners ---
    worker.on('completed', (job: Job) => {
        logger.debug(`✅ Job ${job.id} (${job.name}) completed.`);
    });

    worker.on('failed', (job: Job | undefined, err: Error) => {
        logger.error(`🔥 Job ${job?.id ?? 'unknown'} (${job?.name ?? 'unknown'}) failed: ${err.message}`);
    });

    worker.on('error', (err: Error) => {
        logger.error(`⚠️ Worker Connection Error: ${err.message}`);
    });

    logger.info(`✅ Background Worker Started (Queue: ${queueName}, Concurrency: ${Math.max(1, concurrency)})`);
    return worker;
};

export const shutdownWorker = async (worker: Worker): Promise<void> => {
    logger.info('🛑 Shutting down Worker...');
    try {
        await worker.close();
        logger.info('✅ Worker shutdown complete.');
    } catch (err) {
        logger.error(`⚠️ Error shutting down worker: ${errorMessage(err)}`);
    }
};
