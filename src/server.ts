import { Server } from 'http';
import { connectDatabase, disconnectDatabase } from './config/database';
import { env } from './config/env';
import { createApp } from './app';
import { MongoJobStore } from './services/jobStore';
import { MongoFileUploadRepository } from './services/fileUploadRepository';
import { MongoPortfolioStore } from './services/portfolioStore';
import { EventLoggerService } from './services/eventLogger.service';
import { WebhookNotifier } from './services/webhookNotifier.service';
import { JobService } from './services/job.service';
import { FileUploadService } from './services/fileUpload.service';
import { SheetProcessingService } from './services/sheetProcessing.service';
import { ParserAdapterFactory } from './parserAdapters/adapter.factory';
import { ExcelProcessingHandler } from './jobs/handlers/excelProcessingHandler';
import { JobScheduler } from './jobs/jobScheduler';
import { logger } from './utils/logger';

// Start server
async function startServer(): Promise<void> {
  // Connect to database
  await connectDatabase(env.MONGODB_URI);

  // Compose services
  const events = new EventLoggerService();
  const notifier = new WebhookNotifier(events, { timeoutMs: env.WEBHOOK_TIMEOUT_MS });
  const jobService = new JobService(new MongoJobStore(), events, notifier);
  const fileRepository = new MongoFileUploadRepository();
  const portfolios = new MongoPortfolioStore();
  const uploads = new FileUploadService(fileRepository, events, {
    uploadDir: env.UPLOAD_DIR,
    sheetsDir: env.SHEETS_DIR,
  });
  const sheetProcessor = new SheetProcessingService({
    files: fileRepository,
    portfolios,
    parsers: new ParserAdapterFactory({
      together: {
        apiKey: env.TOGETHER_API_KEY,
        baseURL: env.TOGETHER_BASE_URL,
        model: env.TOGETHER_MODEL,
        timeoutMs: env.LLM_TIMEOUT_MS,
      },
    }),
    events,
  });
  const scheduler = new JobScheduler(
    jobService,
    { excelProcessing: new ExcelProcessingHandler({ files: uploads, sheetProcessor, events }) },
    {
      maxConcurrentJobs: env.JOB_MAX_CONCURRENT,
      pollIntervalMs: env.JOB_POLL_INTERVAL_MS,
      errorBackoffMs: env.JOB_ERROR_BACKOFF_MS,
    },
  );

  // Jobs left running by a previous process
  if (env.JOB_RECOVER_ON_STARTUP !== 'off') {
    await jobService.recoverStuckJobs({ action: env.JOB_RECOVER_ON_STARTUP });
  }
  scheduler.start();

  const app = createApp({
    jobService,
    uploads,
    portfolios,
    defaultParseMethod: env.DEFAULT_PARSE_METHOD,
    maxUploadMb: env.MAX_UPLOAD_MB,
  });

  // Start listening
  const server: Server = app.listen(env.PORT, () => {
    logger.info('Server running', { port: env.PORT, environment: env.NODE_ENV });
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info('Shutting down', { signal });
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
    await scheduler.stop();
    await disconnectDatabase();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Shutdown failed', { error });
          process.exit(1);
        });
    });
  }
}

startServer().catch((error: unknown) => {
  logger.error('Failed to start server', { error });
  process.exit(1);
});
