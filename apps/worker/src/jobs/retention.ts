import {
  addDays,
  type NotificationService,
  type RefreshTokenRepository,
  type PasswordResetTokenRepository,
  type UserSessionRepository,
  type TransactionRunner,
  type DomainLogger,
} from '@murmur/domain';

export interface RetentionSettings {
  tokenRetentionDays: number;
  notificationArchiveRetentionDays: number;
  outboxRetentionDays: number;
  outboxMaxAttempts: number;
}

export interface RetentionDeps<Tx> {
  refreshTokenRepo: Pick<RefreshTokenRepository<Tx>, 'deleteExpired'>;
  passwordResetTokenRepo: Pick<PasswordResetTokenRepository<Tx>, 'deleteExpired'>;
  sessionRepo: Pick<UserSessionRepository<Tx>, 'deleteExpired'>;
  notifications: Pick<NotificationService, 'cleanupExpired' | 'cleanupArchived'>;
  deletePublishedOutboxBefore: (tx: Tx, cutoff: Date) => Promise<number>;
  deleteExhaustedOutboxBefore: (tx: Tx, maxAttempts: number, cutoff: Date) => Promise<number>;
  withTransaction: TransactionRunner<Tx>;
  logger: DomainLogger;
  now?: () => Date;
}

export interface RetentionReport {
  refreshTokens: number;
  resetTokens: number;
  sessions: number;
  expiredNotifications: number;
  archivedNotifications: number;
  outboxEvents: number;
  deadOutboxEvents: number;
}

/** Each step commits in its own transaction. */
export async function runRetentionJob<Tx>(settings: RetentionSettings, deps: RetentionDeps<Tx>): Promise<RetentionReport> {
  const { logger, withTransaction } = deps;
  const now = deps.now ?? (() => new Date());
  const days = settings.tokenRetentionDays;
  const outboxCutoff = addDays(now(), -settings.outboxRetentionDays);

  logger.info({}, 'Retention sweep started');

  const report: RetentionReport = {
    refreshTokens: await withTransaction((tx) => deps.refreshTokenRepo.deleteExpired(tx, days)),
    resetTokens: await withTransaction((tx) => deps.passwordResetTokenRepo.deleteExpired(tx, days)),
    sessions: await withTransaction((tx) => deps.sessionRepo.deleteExpired(tx, days)),
    expiredNotifications: await deps.notifications.cleanupExpired(),
    archivedNotifications: await deps.notifications.cleanupArchived(settings.notificationArchiveRetentionDays),
    outboxEvents: await withTransaction((tx) => deps.deletePublishedOutboxBefore(tx, outboxCutoff)),
    deadOutboxEvents: await withTransaction((tx) =>
      deps.deleteExhaustedOutboxBefore(tx, settings.outboxMaxAttempts, outboxCutoff),
    ),
  };

  if (report.deadOutboxEvents > 0) {
    logger.warn(
      { count: report.deadOutboxEvents, maxAttempts: settings.outboxMaxAttempts },
      'Dropped outbox events that exhausted their delivery attempts',
    );
  }

  logger.info({ ...report }, 'Retention sweep completed');
  return report;
}
