import { loadConfig, WorkerConfigSchema, createLogger, startHealthBeat, errorMessage } from '@murmur/shared';
import {
  initPool,
  closePool,
  withTransaction,
  deletePublishedBefore,
  deleteExhaustedBefore,
  createNotificationService,
  PgRefreshTokenRepository,
  PgPasswordResetTokenRepository,
  PgUserSessionRepository,
} from '@murmur/db';
import { startOutboxDispatcher } from './outbox-dispatcher';
import { runRetentionJob } from './jobs/retention';

const logger = createLogger({ name: 'worker' });

async function main() {
  const config = loadConfig(WorkerConfigSchema);

  initPool({ connectionString: config.DATABASE_URL });

  const healthBeat = startHealthBeat(5000, config.WORKER_HEALTHCHECK_PATH);
  const notifications = createNotificationService(logger.child({ component: 'notifications' }));

  const dispatcher = startOutboxDispatcher(notifications, {
    pollIntervalMs: config.OUTBOX_POLL_INTERVAL_MS,
    batchSize: config.OUTBOX_BATCH_SIZE,
    maxAttempts: config.OUTBOX_MAX_ATTEMPTS,
  });

  const retentionLogger = logger.child({ job: 'retention' });
  const retention = () =>
    runRetentionJob(
      {
        tokenRetentionDays: config.TOKEN_RETENTION_DAYS,
        notificationArchiveRetentionDays: config.NOTIFICATION_ARCHIVE_RETENTION_DAYS,
        outboxRetentionDays: config.OUTBOX_RETENTION_DAYS,
        outboxMaxAttempts: config.OUTBOX_MAX_ATTEMPTS,
      },
      {
        refreshTokenRepo: new PgRefreshTokenRepository(),
        passwordResetTokenRepo: new PgPasswordResetTokenRepository(),
        sessionRepo: new PgUserSessionRepository(),
        notifications,
        deletePublishedOutboxBefore: deletePublishedBefore,
        deleteExhaustedOutboxBefore: deleteExhaustedBefore,
        withTransaction,
        logger: retentionLogger,
      },
    ).catch(logJobError('retention'));

  const jobIntervals = [setInterval(retention, config.RETENTION_INTERVAL_MS)];

  logger.info({}, 'Worker started');

  const shutdown = async () => {
    logger.info({}, 'Shutting down worker');
    healthBeat.stop();
    dispatcher.stop();
    for (const interval of jobIntervals) clearInterval(interval);
    await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.fatal({ err: errorMessage(err) }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

function logJobError(jobName: string) {
  return (err: unknown) => {
    logger.error({ err: errorMessage(err), job: jobName }, 'Job failed');
  };
}

main().catch((err: unknown) => {
  logger.fatal({ err: errorMessage(err) }, 'Failed to start worker');
  process.exit(1);
});
