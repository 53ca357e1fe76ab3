import { loadAppConfig } from "./config";
import { runFlowCycle } from "./services/flow/flowCycle";
import { PlexLibrary } from "./services/plex";
import { isConfigurationError } from "./utils/errors";
import { logger } from "./utils/logger";
import { FlowScheduler } from "./workers/flowScheduler";

let scheduler: FlowScheduler | null = null;
let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
    if (isShuttingDown) {
        logger.info("Shutdown already in progress...");
        return;
    }

    isShuttingDown = true;
    logger.info(`Received ${signal}. Waiting for running flow cycles...`);

    try {
        await scheduler?.stop();
        logger.info("Graceful shutdown complete");
        process.exit(0);
    } catch (error) {
        logger.error("Error during shutdown:", error);
        process.exit(1);
    }
}

export async function main(): Promise<void> {
    const config = loadAppConfig();
    const library = new PlexLibrary(config.plex);

    scheduler = new FlowScheduler({ intervalMinutes: config.runIntervalMinutes });
    scheduler.register(config.flow.playlistName, (now) =>
        runFlowCycle(
            { settings: config.flow, catalog: library, sync: library },
            now
        )
    );

    process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
    process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

    await scheduler.start();

    if (!scheduler.isRecurring) {
        logger.info("Single run finished");
    }
}

if (require.main === module) {
    main().catch((error: unknown) => {
        if (isConfigurationError(error)) {
            logger.error(`Configuration error: ${error.message}`);
        } else {
            logger.error("Flow worker failed to start:", error);
        }
        process.exit(1);
    });
}
