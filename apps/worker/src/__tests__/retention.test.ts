import { describe, it, expect, vi } from 'vitest';
import { type DomainLogger } from '@murmur/domain';
import { runRetentionJob, type RetentionDeps } from '../jobs/retention';

const runInline = async <T>(fn: (tx: unknown) => Promise<T>): Promise<T> => fn({});

function createLogger(): DomainLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

function createDeps(): RetentionDeps<unknown> {
  return {
    refreshTokenRepo: { deleteExpired: vi.fn(async () => 4) },
    passwordResetTokenRepo: { deleteExpired: vi.fn(async () => 1) },
    sessionRepo: { deleteExpired: vi.fn(async () => 2) },
    notifications: {
      cleanupExpired: vi.fn(async () => 3),
      cleanupArchived: vi.fn(async () => 5),
    },
    deletePublishedOutboxBefore: vi.fn(async () => 6),
    deleteExhaustedOutboxBefore: vi.fn(async () => 0),
    withTransaction: runInline,
    logger: createLogger(),
    now: () => new Date('2026-05-10T00:00:00Z'),
  };
}

const settings = {
  tokenRetentionDays: 30,
  notificationArchiveRetentionDays: 90,
  outboxRetentionDays: 7,
  outboxMaxAttempts: 5,
};

describe('runRetentionJob', () => {
  it('sweeps every table and reports the counts', async () => {
    const deps = createDeps();

    const report = await runRetentionJob(settings, deps);

    expect(report).toEqual({
      refreshTokens: 4,
      resetTokens: 1,
      sessions: 2,
      expiredNotifications: 3,
      archivedNotifications: 5,
      outboxEvents: 6,
      deadOutboxEvents: 0,
    });
    expect(deps.logger.warn).not.toHaveBeenCalled();
    expect(deps.logger.info).toHaveBeenLastCalledWith(report, 'Retention sweep completed');
  });

  it('applies the configured retention windows', async () => {
    const deps = createDeps();

    await runRetentionJob(settings, deps);

    expect(deps.refreshTokenRepo.deleteExpired).toHaveBeenCalledWith({}, 30);
    expect(deps.passwordResetTokenRepo.deleteExpired).toHaveBeenCalledWith({}, 30);
    expect(deps.sessionRepo.deleteExpired).toHaveBeenCalledWith({}, 30);
    expect(deps.notifications.cleanupArchived).toHaveBeenCalledWith(90);
    expect(deps.deletePublishedOutboxBefore).toHaveBeenCalledWith({}, new Date('2026-05-03T00:00:00Z'));
  });

  it('drops outbox events that used up their attempts and warns about them', async () => {
    const deps = createDeps();
    vi.mocked(deps.deleteExhaustedOutboxBefore).mockResolvedValue(2);

    const report = await runRetentionJob(settings, deps);

    expect(report.deadOutboxEvents).toBe(2);
    expect(deps.deleteExhaustedOutboxBefore).toHaveBeenCalledWith({}, 5, new Date('2026-05-03T00:00:00Z'));
    expect(deps.logger.warn).toHaveBeenCalledWith(
      { count: 2, maxAttempts: 5 },
      'Dropped outbox events that exhausted their delivery attempts',
    );
  });

  it('stops at the first failing step', async () => {
    const deps = createDeps();
    vi.mocked(deps.sessionRepo.deleteExpired).mockRejectedValueOnce(new Error('lock timeout'));

    await expect(runRetentionJob(settings, deps)).rejects.toThrow('lock timeout');
    expect(deps.notifications.cleanupExpired).not.toHaveBeenCalled();
  });
});
