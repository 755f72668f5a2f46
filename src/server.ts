import { Server } from 'http';
import { loadConfig, AppConfig } from '@/config';
import { APPLICATION_NAME } from '@/config/constants';
import { connectDB, disconnectDB } from '@/database/connection';
import { reportRequestRepository } from '@/database/report-request.repository';
import { createApp } from '@/app';
import { createRequestLedger } from '@/services/request-ledger.service';
import { createInfluxSampleSource } from '@/services/counter-sample-source.service';
import { createReportRequester } from '@/services/report-requester.service';
import { createReportScheduler, startReportSchedulerJob } from '@/jobs/report-scheduler.job';
import { errorMessage } from '@/utils/errors';
import { logger } from '@/utils/logger';

async function startServer(config: AppConfig): Promise<void> {
  logger.info(`Starting application "${APPLICATION_NAME}"...`);

  await connectDB({ uri: config.MONGODB_URI });
  logger.info('✓ MongoDB connected');

  const source = createInfluxSampleSource({
    protocol: config.INFLUXDB.PROTOCOL,
    host: config.INFLUXDB.HOST,
    port: config.INFLUXDB.PORT,
    database: config.INFLUXDB.DATABASE,
    username: config.INFLUXDB.USERNAME,
    password: config.INFLUXDB.PASSWORD,
    field: config.PULSE_FIELD,
    timeoutMs: config.REQUEST_TIMEOUT,
  });

  try {
    await source.ensureDatabase();
    logger.info(`✓ InfluxDB database "${config.INFLUXDB.DATABASE}" available`);
  } catch (error) {
    // The scheduler defers intervals while the store is down, so startup goes on
    logger.warn(`⚠ Could not verify InfluxDB database: ${errorMessage(error)}`);
  }

  const ledger = createRequestLedger(reportRequestRepository, {
    intervalMs: config.REPORTING_INTERVAL_MS,
    reportingStart: config.REPORTING_START,
  });
  await ledger.verifyIntervalLength();

  const scheduler = createReportScheduler(
    {
      ledger,
      source,
      requester: createReportRequester({
        url: config.WEB_SERVER_URL,
        timeoutMs: config.REQUEST_TIMEOUT,
        verifyTls: config.VERIFY_TLS,
      }),
    },
    {
      measurement: config.MEASUREMENT_TS,
      emailAddress: config.EMAIL_ADDRESS,
      gpsLocation: config.GPS_LOCATION,
      maxBacklogPerTick: config.MAX_BACKLOG_PER_TICK,
      energy: {
        pulsesPerKwh: config.PULSES_PER_KWH,
        maxPowerWatts: config.MAX_POWER_WATTS,
      },
    }
  );

  const task = startReportSchedulerJob(scheduler, config.SCHEDULER_CRON);
  logger.info('✓ Report scheduler started');

  const app = createApp({ ledger, allowedOrigins: config.ALLOWED_ORIGINS });
  const server: Server = app.listen(config.PORT, () => {
    logger.info(`✓ Status API running on port ${config.PORT}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully...`);
    task.stop();
    server.close(() => {
      disconnectDB()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Failed to disconnect from MongoDB', { error: errorMessage(error) });
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  logger.error(`Configuration Error: ${errorMessage(error)}`);
  process.exit(1);
}

startServer(config).catch((error: unknown) => {
  logger.error('Failed to start server', { error: errorMessage(error) });
  process.exit(1);
});
