export { createLogger, sanitize, errorMessage, type SafeLogger } from './logger';
export { AppError, ErrorCode, toAppError, type DomainErrorLike } from './errors';
export {
  loadConfig,
  BaseConfigSchema,
  DatabaseConfigSchema,
  JwtConfigSchema,
  AuthPolicyConfigSchema,
  WorkerConfigSchema,
  AuthServiceConfigSchema,
  type BaseConfig,
  type JwtConfig,
  type AuthPolicyConfig,
  type WorkerConfig,
  type AuthServiceConfig,
} from './config';
export { touchHealthFile, startHealthBeat } from './healthcheck';
export {
  Argon2PasswordHasher,
  DEFAULT_ARGON2_OPTIONS,
  UNUSABLE_PASSWORD_HASH,
} from './auth/password-hasher';
export { JoseTokenService, type TokenServiceConfig } from './auth/token-service';
export { LoggingEmailSender } from './email/logging-email-sender';
