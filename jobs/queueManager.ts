// jobs/queueManager.ts
import { Queue, ConnectionOptions } from 'bullmq';
import logger from '../utils/logger';
import { errorMessage } from '../utils/helpers';
import { CONSTANTS } from '../utils/constants';

export interface QueueManager {
    scheduleRepeatableJob(name: string, everyMs: number): Promise<void>;
    removeRepeatableJobs(shouldRemove: (name: string) => boolean): Promise<number>;
    shutdown(): Promise<void>;
}

/**
 * Wraps the maintenance queue. The caller owns the returned handle and must shutdown() it.
 */
export const createQueueManager = (connection: ConnectionOptions, queueName: string = CONSTANTS.QUEUE.NAME): QueueManager => {
    const queue = new Queue(queueName, {
        connection,
        defaultJobOptions: {
            removeOnComplete: 20,
            removeOnFail: 50,
            // Maintenance jobs are idempotent and repeat anyway; no retries
            attempts: 1,
        },
    });

    queue.on('error', (err: Error) => {
        // Suppress simple connection refused errors to avoid log spam
        if (!err.message.includes('ECONNREFUSED')) {
            logger.error(`❌ Queue [${queueName}] Connection Error: ${err.message}`);
        }
    });

    logger.info(`✅ Job Queue Initialized: [${queueName}]`);

    return {
        scheduleRepeatableJob: async (name: string, everyMs: number) => {
            const repeatableJobs = await queue.getRepeatableJobs();
            const existing = repeatableJobs.filter((job) => job.name === name);

            // Re-register so a changed interval takes effect
            for (const job of existing) {
                await queue.removeRepeatableByKey(job.key);
            }

            await queue.add(name, {}, { repeat: { every: everyMs } });
            logger.info(`⏰ Job Scheduled: ${name} (every ${everyMs / 1000}s)`);
        },

        removeRepeatableJobs: async (shouldRemove: (name: string) => boolean) => {
            const repeatableJobs = await queue.getRepeatableJobs();
            let removed = 0;
            for (const job of repeatableJobs) {
                if (shouldRemove(job.name)) {
                    logger.info(`🧹 Removing stale repeatable job: ${job.name} (${job.key})`);
                    await queue.removeRepeatableByKey(job.key);
                    removed++;
                }
            }
            return removed;
        },

        shutdown: async () => {
            logger.info('🛑 Shutting down Job Queue...');
            try {
                await queue.close();
                logger.info('✅ Job Queue closed.');
            } catch (err) {
                logger.warn(`⚠️ Error closing queue: ${errorMessage(err)}`);
            }
        },
    };
};

export default createQueueManager;
