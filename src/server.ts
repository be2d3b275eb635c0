import logger from '@/lib/logger';
import { loadConfig } from '@/lib/env';
import { setupGracefulShutdown } from '@/lib/shutdown';
import { createContainer } from '@/container';
import { createApp } from '@/app';

const startServer = (): void => {
    try {
        const config = loadConfig();
        const container = createContainer(config);
        const app = createApp(container);

        const server = app.listen(config.port, () => {
            logger.info(`✓ API Gateway listening on :${config.port}`);
        });

        setupGracefulShutdown(server, [() => container.introspectionCache.clear()]);
    } catch (error) {
        logger.error('✗ Failed to start server', { error });
        process.exit(1);
    }
};

startServer();
