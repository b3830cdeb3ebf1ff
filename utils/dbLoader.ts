// utils/dbLoader.ts
import mongoose from 'mongoose';
import logger from './logger';
import { errorMessage, sleep } from './helpers';
import { RedisConnection } from './redisClient';

export interface DbLoaderOptions {
    mongoUri: string;
    mongoPoolSize: number;
    redis: RedisConnection | null;
    maxRetries?: number;
}

/**
 * Opens and closes the process's MongoDB and Redis handles.
 * MongoDB uses exponential backoff; Redis reconnects through its own strategy.
 */
export class DbLoader {
    private isConnected = false;
    private readonly maxRetries: number;
    private readonly BASE_DELAY_MS = 1000;

    constructor(private readonly options: DbLoaderOptions) {
        this.maxRetries = options.maxRetries ?? 10;
    }

    public async connect(): Promise<void> {
        if (this.isConnected) {
            logger.info('ℹ️ Database connections already active.');
            return;
        }

        logger.info('🚀 Initializing Infrastructure...');

        // Both connections start at the same time
        await Promise.all([this.connectMongo(), this.connectRedis()]);

        this.isConnected = true;
        logger.info('✨ Infrastructure Ready');
    }

    private async connectMongo(): Promise<void> {
        mongoose.connection.removeAllListeners('error');
        mongoose.connection.removeAllListeners('disconnected');
        mongoose.connection.on('error', (err: Error) => logger.error(`🔥 MongoDB Error: ${err.message}`));
        mongoose.connection.on('disconnected', () => logger.warn('⚠️ MongoDB Disconnected'));

        for (let attempt = 1; ; attempt++) {
            try {
                await mongoose.connect(this.options.mongoUri, {
                    maxPoolSize: this.options.mongoPoolSize,
                    serverSelectionTimeoutMS: 5000,
                    socketTimeoutMS: 45000,
                });
                logger.info('✅ MongoDB Connected');
                return;
            } catch (err) {
                if (attempt >= this.maxRetries) {
                    logger.error(`❌ Critical Infrastructure Failure: Could not connect to MongoDB after ${this.maxRetries} attempts.`);
                    throw err;
                }

                // Exponential Backoff: 2s, 4s, 8s, 16s... max 30s
                const delay = Math.min(this.BASE_DELAY_MS * Math.pow(2, attempt), 30000);
                logger.error(`⚠️ MongoDB Connection Failed (Attempt ${attempt}/${this.maxRetries}). Retrying in ${delay / 1000}s... Error: ${errorMessage(err)}`);
                await sleep(delay);
            }
        }
    }

    private async connectRedis(): Promise<void> {
        const { redis } = this.options;
        if (!redis || redis.isOpen) return;
        await redis.connect();
    }

    public async disconnect(): Promise<void> {
        if (!this.isConnected) return;

        logger.info('🛑 Closing Infrastructure connections...');
        const { redis } = this.options;
        const results = await Promise.allSettled([
            redis && redis.isOpen ? redis.quit() : Promise.resolve(),
            mongoose.disconnect(),
        ]);

        results.forEach((result) => {
            if (result.status === 'rejected') {
                logger.error(`⚠️ Error during disconnect: ${errorMessage(result.reason)}`);
            }
        });

        this.isConnected = false;
        logger.info('✅ Infrastructure closed.');
    }
}

export default DbLoader;
