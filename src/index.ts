import { createApp } from './app';
import { loadConfig } from './config';
import { errorMessage, logger, setLogFile } from './helpers/logger';
import { DatabaseService } from './services/database';
import { ArchiveExtractor } from './services/extractor';
import { JobService } from './services/jobs';
import { OperationControls } from './services/progress';
import { TransferCoordinator } from './services/transfer';

function main(): void {
  const config = loadConfig();
  setLogFile(config.logFile);

  const db = new DatabaseService(config.dbPath);
  const controls = new OperationControls();
  const transfers = new TransferCoordinator({
    userAgent: config.userAgent,
    receiveBufferBytes: config.receiveBufferBytes,
    sessionInitAttempts: config.sessionInitAttempts,
    context: controls.context('download'),
  });
  const extractor = new ArchiveExtractor({ context: controls.context('extract') });
  const jobs = new JobService(db, transfers, extractor, { storageRoot: config.storageRoot, controls });

  const app = createApp(jobs, { requestBodyMaxBytes: config.requestBodyMaxBytes });

  const server = app.listen(config.port, () => {
    logger.info('payload-bridge listening', {
      port: config.port,
      storageRoot: config.storageRoot,
      dbPath: config.dbPath,
      logFile: config.logFile,
    });

    jobs.resumeJobs();
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal });

    const forceExit = setTimeout(() => {
      logger.error('Shutdown timed out, forcing exit', { timeoutMs: config.shutdownTimeoutMs });
      process.exit(1);
    }, config.shutdownTimeoutMs);
    forceExit.unref();

    server.close();
    jobs.shutdown()
      .then(() => {
        db.close();
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error('Error during shutdown', { error: errorMessage(err) });
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

try {
  main();
} catch (err) {
  logger.error('Failed to start', { error: errorMessage(err) });
  process.exit(1);
}
