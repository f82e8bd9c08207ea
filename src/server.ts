// src/server.ts
import app from './app';
import { db, env } from '@/config';
import logger from '@/utils/logger';

const SHUTDOWN_TIMEOUT_MS = 30000;

async function startServer(): Promise<void> {
    logger.info('Starting inventory API server', { port: env.PORT, environment: env.NODE_ENV });

    await db.verifyConnection();

    const server = app.listen(env.PORT, () => {
        logger.info(`Server listening on port ${env.PORT}`);
    });

    const gracefulShutdown = (signal: string): void => {
        logger.info(`Received ${signal}, starting graceful shutdown`);

        server.close(() => {
            logger.info('HTTP server closed');
            db.close()
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    logger.error('Error closing the database pool', {
                        error: error instanceof Error ? error.message : String(error),
                    });
                    process.exit(1);
                });
        });

        setTimeout(() => {
            logger.error('Forced shutdown due to timeout');
            process.exit(1);
        }, SHUTDOWN_TIMEOUT_MS).unref();
    };

    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => gracefulShutdown('SIGINT'));

    process.on('unhandledRejection', (reason) => {
        logger.error('Unhandled promise rejection', { reason });
        process.exit(1);
    });
}

startServer().catch((error: unknown) => {
    logger.error('Failed to start server', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
});
