// jobs/scheduler.ts
import logger from '../utils/logger';
import { errorMessage } from '../utils/helpers';
import { QueueManager } from './queueManager';

export type JobTask = () => Promise<unknown>;

export interface ScheduledJob {
    name: string;
    intervalMs: number;
    task: JobTask;
}

/**
 * Registry of (name, interval, task) decoupled from request handling.
 * Drivers: in-process timers (start) or BullMQ repeatable jobs (startScheduler + worker),
 * both of which end up in run(name).
 */
export class JobScheduler {
    private readonly jobs = new Map<string, ScheduledJob>();
    private readonly active = new Set<string>();
    private timers: NodeJS.Timeout[] = [];

    register(name: string, intervalMs: number, task: JobTask): this {
        if (intervalMs <= 0) {
            throw new Error(`Job ${name} needs a positive interval (got ${intervalMs})`);
        }
        if (this.jobs.has(name)) {
            logger.warn(`⚠️ Job ${name} re-registered, replacing previous task.`);
        }
        this.jobs.set(name, { name, intervalMs, task });
        return this;
    }

    list(): ScheduledJob[] {
        return Array.from(this.jobs.values());
    }

    has(name: string): boolean {
        return this.jobs.has(name);
    }

    isRunning(name: string): boolean {
        return this.active.has(name);
    }

    /**
     * Runs one job now. Failures are logged and rethrown so the caller
     * (timer or BullMQ) can record them.
     */
    async run(name: string): Promise<unknown> {
        const job = this.jobs.get(name);
        if (!job) {
            throw new Error(`Unknown job: ${name}`);
        }

        this.active.add(name);
        const startedAt = Date.now();
        try {
            logger.info(`👷 Job ${name} started`);
            const result = await job.task();
            logger.info(`✅ Job ${name} completed in ${Date.now() - startedAt}ms`);
            return result;
        } catch (error) {
            logger.error(`🔥 Job ${name} failed: ${errorMessage(error)}`);
            throw error;
        } finally {
            this.active.delete(name);
        }
    }

    // --- In-process driver ---
    start(): void {
        if (this.timers.length > 0) {
            logger.warn('⚠️ Scheduler already running.');
            return;
        }

        for (const job of this.jobs.values()) {
            const timer = setInterval(() => {
                if (this.active.has(job.name)) {
                    logger.warn(`⏭️ Skipping ${job.name}: previous run still in progress`);
                    return;
                }
                // Failure already logged by run(); the next tick retries
                this.run(job.name).catch(() => undefined);
            }, job.intervalMs);
            timer.unref();
            this.timers.push(timer);
            logger.info(`⏰ Job Scheduled (in-process): ${job.name} every ${job.intervalMs / 1000}s`);
        }
    }

    stop(): void {
        this.timers.forEach((timer) => clearInterval(timer));
        if (this.timers.length > 0) logger.info('🛑 In-process scheduler stopped.');
        this.timers = [];
    }
}

/**
 * Queue driver: registers every job as a BullMQ repeatable job and removes
 * repeatables that are no longer in the registry. A worker (jobs/worker.ts)
 * consumes them and calls scheduler.run(job.name).
 */
export const startScheduler = async (scheduler: JobScheduler, queueManager: QueueManager): Promise<void> => {
    logger.info('⏰ Initializing Distributed Scheduler...');

    // --- 0. CLEANUP: Remove stale repeatables from previous deployments ---
    await queueManager.removeRepeatableJobs((name) => !scheduler.has(name));

    // --- 1. Register every job ---
    for (const job of scheduler.list()) {
        await queueManager.scheduleRepeatableJob(job.name, job.intervalMs);
    }
};
