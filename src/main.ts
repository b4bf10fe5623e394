import 'reflect-metadata';

import type { Server } from 'node:http';
import { DatabaseModule } from './infrastructure/database/database.module';
import { closeLogging, configureLogging, Logger } from './shared/logger';
import { loadConfigFromEnvironment } from './shared/config';
import { registerDependencies, resolveHttpDependencies } from './app.container';
import { closeHttpServer, createHttpApp, startHttpServer } from './presentation/http/http.server';
import { MacroRegimeMonitorApp } from './app';

const logger = new Logger('Main');

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection:', reason);
  process.exit(1);
});

async function bootstrap(): Promise<void> {
  let server: Server | null = null;

  try {
    const config = loadConfigFromEnvironment();
    configureLogging({ level: config.logLevel, directory: config.logDir, toFile: config.logToFile });
    logger.info('Starting Macro Regime Monitor...');

    const dataSource = await DatabaseModule.initialize(config.databasePath);
    const container = registerDependencies(config, dataSource);

    server = await startHttpServer(createHttpApp(resolveHttpDependencies(container)), config.port);

    const app = container.get<MacroRegimeMonitorApp>(MacroRegimeMonitorApp);
    await app.start();

    let isShuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
      if (isShuttingDown) return;
      isShuttingDown = true;
      logger.info(`Received ${signal}, shutting down gracefully...`);
      try {
        await app.stop();
        if (server) await closeHttpServer(server);
      } catch (error) {
        logger.error('Error during shutdown:', error);
      } finally {
        await DatabaseModule.close();
        await closeLogging();
        process.exit(0);
      }
    };

    process.once('SIGINT', () => void shutdown('SIGINT'));
    process.once('SIGTERM', () => void shutdown('SIGTERM'));
  } catch (error) {
    logger.error('Failed to start application:', error);
    if (server) await closeHttpServer(server);
    await DatabaseModule.close();
    await closeLogging();
    process.exit(1);
  }
}

void bootstrap();
