import { loadConfig } from './config/config';
import { stringifyError } from './lib/errors';
import { logger, setLogLevel } from './lib/logger';
import { BotService } from './services/botService';
import { createServices } from './services/container';

let botService: BotService | undefined;
let shuttingDown = false;

async function startBotSystem() {
    const config = loadConfig();
    setLogLevel(config.logLevel);

    botService = new BotService(config, createServices(config), {
        onFatal: () => {
            void gracefulShutdown('polling failure', 1);
        },
    });

    try {
        await botService.start();
        logger.info('Bot system initialized successfully');
    } catch (error) {
        logger.error(`Error starting bot system: ${stringifyError(error)}`);
        await gracefulShutdown('startup failure', 1);
        return;
    }

    process.once('SIGINT', () => void gracefulShutdown('SIGINT'));
    process.once('SIGTERM', () => void gracefulShutdown('SIGTERM'));
}

async function gracefulShutdown(reason: string, exitCode = 0) {
    if (shuttingDown) {
        return;
    }
    shuttingDown = true;
    logger.info(`Shutdown (${reason}). Cleaning up...`);
    if (botService) {
        await botService.stop(reason);
    }
    process.exit(exitCode);
}

startBotSystem().catch((error: unknown) => {
    logger.error(`Failed to start system: ${stringifyError(error)}`);
    process.exit(1);
});
