// Enrollment Assistant Backend - Entry Point
//
// Architecture: Modular Monolith
// - One deployable backend service
// - Voice, browser, email and workflow modules run in the same process
// - Every external backend sits behind an interface (speech, LLM, browser)

import 'dotenv/config';
import type { Server } from 'node:http';
import { loadConfig } from './config/index.js';
import { createApp } from './app.js';
import { createServices } from './services/index.js';
import { seedKnowledge } from './modules/knowledge/index.js';
import { errorMessage } from './utils/errors.js';
import { createLogger, setLogLevel } from './utils/logger.js';

const logger = createLogger('index');

async function main(): Promise<void> {
    const config = loadConfig();
    setLogLevel(config.logLevel);

    const services = createServices(config);

    if (config.knowledgeSeedPath) {
        await seedKnowledge(services.knowledge, config.knowledgeSeedPath);
    }

    const app = createApp(services);
    const server: Server = await new Promise((resolve, reject) => {
        const listening = app.listen(config.server.port, config.server.host, () => resolve(listening));
        listening.once('error', reject);
    });
    logger.info(`Backend ready on http://${config.server.host}:${config.server.port}`);

    const stopMonitor = services.monitor.startMonitorTask(config.monitorIntervalMs);

    try {
        const result = await services.workflow.initialize();
        logger.info(`Workflow controller ready (voice: ${result.voice ? 'on' : 'off'})`);
    } catch (error) {
        logger.error('Workflow controller failed to initialize, continuing without it', undefined, error);
    }

    let shuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info(`${signal} received, shutting down...`);

        stopMonitor();
        try {
            await services.workflow.shutdown();
            await services.browser.closeAll();
        } catch (error) {
            logger.error('Error during shutdown', undefined, error);
        }
        services.sse.closeAll();

        server.close(() => {
            logger.info('Server closed');
            process.exit(0);
        });
    };

    process.on('SIGTERM', () => {
        void shutdown('SIGTERM');
    });
    process.on('SIGINT', () => {
        void shutdown('SIGINT');
    });
}

main().catch((error: unknown) => {
    logger.error(`Failed to start: ${errorMessage(error)}`);
    process.exit(1);
});
