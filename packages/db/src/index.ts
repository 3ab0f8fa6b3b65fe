export { initPool, closePool, getPool, withTransaction } from './client';
export {
  appendOutboxEvent,
  fetchUnpublishedEvents,
  markPublished,
  markFailed,
  deletePublishedBefore,
  deleteExhaustedBefore,
  PgOutbox,
  type OutboxEvent,
} from './outbox';
export { PgUserRepository } from './repositories/user-repository';
export { PgRefreshTokenRepository } from './repositories/refresh-token-repository';
export { PgPasswordResetTokenRepository } from './repositories/password-reset-token-repository';
export { PgUserSessionRepository } from './repositories/user-session-repository';
export { PgNotificationRepository } from './repositories/notification-repository';
export {
  PgPostRepository,
  PgCommentRepository,
  PgLikeRepository,
  PgFollowRepository,
} from './repositories/social-repositories';
export { createAuthService, createNotificationService, createSocialService } from './services';
