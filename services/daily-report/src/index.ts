import { Config, SERVICE_NAMES, createServiceLogger, errorLogger } from '@funnelreport/shared';
import { createApp } from './app';
import { buildAggregatorConfig } from './config/taxonomy';

const logger = createServiceLogger(SERVICE_NAMES.DAILY_REPORT);

const aggregatorConfig = buildAggregatorConfig(Config);
const app = createApp(Config, aggregatorConfig);

const server = app.listen(Config.DAILY_REPORT_PORT, Config.DAILY_REPORT_HOST, () => {
  logger.info('Daily Report Service started', {
    url: `http://${Config.DAILY_REPORT_HOST}:${Config.DAILY_REPORT_PORT}`,
    environment: Config.NODE_ENV,
    pid: process.pid,
    taxonomyEventTypes: Object.values(aggregatorConfig.taxonomy).flat().length,
  });
});

server.on('error', (error: NodeJS.ErrnoException) => {
  if (error.syscall !== 'listen') {
    throw error;
  }

  switch (error.code) {
    case 'EACCES':
      logger.error(`Port ${Config.DAILY_REPORT_PORT} requires elevated privileges`);
      process.exit(1);
      break;
    case 'EADDRINUSE':
      logger.error(`Port ${Config.DAILY_REPORT_PORT} is already in use`);
      process.exit(1);
      break;
    default:
      throw error;
  }
});

// Graceful shutdown
const gracefulShutdown = (signal: string) => {
  logger.info(`Received ${signal}, shutting down gracefully`);

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force close after 30 seconds
  setTimeout(() => {
    logger.error('Could not close connections in time, forcefully shutting down');
    process.exit(1);
  }, 30000).unref();
};

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

process.on('unhandledRejection', errorLogger.logUnhandledRejection);
process.on('uncaughtException', (error) => {
  errorLogger.logUncaughtException(error);
  process.exit(1);
});

export default app;
