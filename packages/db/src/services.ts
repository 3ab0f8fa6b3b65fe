import { randomUUID } from 'node:crypto';
import { type PoolClient } from 'pg';
import { AuthService, NotificationService, SocialService } from '@murmur/domain';
import {
  createLogger,
  Argon2PasswordHasher,
  JoseTokenService,
  LoggingEmailSender,
  type AuthServiceConfig,
  type SafeLogger,
} from '@murmur/shared';
import { withTransaction } from './client';
import { PgOutbox } from './outbox';
import { PgUserRepository } from './repositories/user-repository';
import { PgRefreshTokenRepository } from './repositories/refresh-token-repository';
import { PgPasswordResetTokenRepository } from './repositories/password-reset-token-repository';
import { PgUserSessionRepository } from './repositories/user-session-repository';
import { PgNotificationRepository } from './repositories/notification-repository';
import { PgPostRepository, PgCommentRepository, PgLikeRepository, PgFollowRepository } from './repositories/social-repositories';

/** Wires the pg repositories into the domain services; the pool must already be initialized. */
export function createAuthService(
  config: AuthServiceConfig,
  logger: SafeLogger = createLogger({ name: 'auth' }),
): AuthService<PoolClient> {
  return new AuthService<PoolClient>({
    userRepo: new PgUserRepository(),
    refreshTokenRepo: new PgRefreshTokenRepository(),
    passwordResetTokenRepo: new PgPasswordResetTokenRepository(),
    sessionRepo: new PgUserSessionRepository(),
    passwordHasher: new Argon2PasswordHasher(),
    tokenService: new JoseTokenService({
      activeKid: config.JWT_ACTIVE_KID,
      keys: config.JWT_KEYS,
      accessTokenTtlSeconds: config.JWT_ACCESS_TOKEN_TTL,
      issuer: config.JWT_ISSUER,
      audience: config.JWT_AUDIENCE,
    }),
    emailSender: new LoggingEmailSender(logger.child({ component: 'email' })),
    outbox: new PgOutbox(),
    logger,
    generateId: randomUUID,
    generateSessionId: randomUUID,
    withTransaction,
    policy: {
      refreshTokenTtlDays: config.JWT_REFRESH_TOKEN_TTL_DAYS,
      resetTokenTtlHours: config.AUTH_RESET_TOKEN_TTL_HOURS,
      lockout: {
        maxFailedAttempts: config.AUTH_MAX_FAILED_LOGINS,
        lockoutMinutes: config.AUTH_LOCKOUT_MINUTES,
      },
      appBaseUrl: config.APP_BASE_URL,
    },
  });
}

export function createNotificationService(
  logger: SafeLogger = createLogger({ name: 'notifications' }),
): NotificationService<PoolClient> {
  return new NotificationService<PoolClient>({
    notificationRepo: new PgNotificationRepository(),
    userRepo: new PgUserRepository(),
    logger,
    generateId: randomUUID,
    withTransaction,
  });
}

export function createSocialService(
  logger: SafeLogger = createLogger({ name: 'social' }),
): SocialService<PoolClient> {
  return new SocialService<PoolClient>({
    userRepo: new PgUserRepository(),
    postRepo: new PgPostRepository(),
    commentRepo: new PgCommentRepository(),
    likeRepo: new PgLikeRepository(),
    followRepo: new PgFollowRepository(),
    outbox: new PgOutbox(),
    logger,
    generateId: randomUUID,
    withTransaction,
  });
}
