// server.ts
import config from './utils/config';
import logger from './utils/logger';
import { buildServices } from './utils/serviceContainer';
import { registerShutdownHandler } from './utils/shutdownHandler';
import { createApp } from './app';
import { JobScheduler } from './jobs/scheduler';
import { registerJobHandlers } from './jobs/jobHandlers';

const startServer = async () => {
    try {
        logger.info('🚀 Starting Server Initialization...');

        // 1. Build services and connect infrastructure (DB & Redis)
        const services = buildServices(config);
        await services.dbLoader.connect();

        const app = createApp(services, {
            trustProxy: config.trustProxyLevel,
            corsOrigins: config.corsOrigins,
            exemptPaths: config.rateLimit.exemptPaths,
        });

        // 2. Start HTTP Server
        const HOST = '0.0.0.0';
        const server = app.listen(config.port, HOST, () => {
            logger.info(`✅ Server running on http://${HOST}:${config.port}`);
        });

        // 3. Maintenance jobs: in-process timers unless the worker owns scheduling
        const scheduler = registerJobHandlers(new JobScheduler(), {
            historyService: services.historyService,
            store: services.store,
            history: config.history,
        });

        if (config.jobs.runner === 'queue') {
            logger.warn(`⚠️ ${scheduler.list().length} maintenance jobs delegated to the worker process. Start it with npm run start:worker.`);
        } else {
            scheduler.start();
        }

        // 4. Register Graceful Shutdown
        registerShutdownHandler('API Server', [
            () => new Promise<void>((resolve, reject) => {
                server.close((err) => {
                    if (err) reject(err);
                    else {
                        logger.info('Http server closed.');
                        resolve();
                    }
                });
            }),
            () => scheduler.stop(),
            () => services.dbLoader.disconnect(),
        ]);
    } catch (err) {
        logger.error(`❌ Critical Startup Error: ${err instanceof Error ? err.message : 'Unknown'}`);
        process.exit(1);
    }
};

startServer();
