import type { Server } from 'http';
import logger from '@/lib/logger';

export type CleanupTask = () => void | Promise<void>;

export const setupGracefulShutdown = (server: Server, cleanup: CleanupTask[] = []): void => {
    let shuttingDown = false;

    const shutdown = (signal: string): void => {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info(`Received ${signal}, shutting down...`);

        server.close(async () => {
            logger.info('✓ HTTP server closed');

            for (const task of cleanup) {
                try {
                    await task();
                } catch (error) {
                    logger.error('Error during cleanup', { error });
                }
            }

            logger.info('✓ Shutdown complete');
            process.exit(0);
        });

        // Force shutdown after 30s
        setTimeout(() => {
            logger.error('✗ Forced shutdown after timeout');
            process.exit(1);
        }, 30_000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
};
