// utils/shutdownHandler.ts
import logger from './logger';
import { errorMessage } from './helpers';

export type CleanupTask = () => Promise<void> | void;

/**
 * Registers process signal handlers for graceful shutdown.
 * Tasks run in order, so list the HTTP server and workers before the connections they use.
 * @param serverName Name of the process ('API Server', 'Worker') for logging.
 */
export const registerShutdownHandler = (serverName: string, cleanupTasks: CleanupTask[], timeoutMs: number = 10000) => {
    let shuttingDown = false;

    const gracefulShutdown = async (signal: NodeJS.Signals) => {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info(`🛑 ${serverName} received ${signal}, shutting down gracefully...`);

        const forceExit = setTimeout(() => {
            logger.error('🛑 Force Shutdown (Timeout)');
            process.exit(1);
        }, timeoutMs);

        let failed = false;
        for (const task of cleanupTasks) {
            try {
                await task();
            } catch (err) {
                failed = true;
                logger.error(`⚠️ Error during shutdown: ${errorMessage(err)}`);
            }
        }

        clearTimeout(forceExit);
        logger.info(`✅ ${serverName} resources released. Exiting.`);
        process.exit(failed ? 1 : 0);
    };

    process.on('SIGTERM', (signal) => { void gracefulShutdown(signal); });
    process.on('SIGINT', (signal) => { void gracefulShutdown(signal); });
};
