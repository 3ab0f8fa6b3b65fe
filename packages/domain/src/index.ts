export type { User, UserProfile, RefreshToken, PasswordResetToken, UserSession } from './user';
export {
  RESERVED_USERNAMES,
  REGISTRATION_SESSION_DAYS,
  REMEMBER_ME_SESSION_DAYS,
  DEFAULT_SESSION_DAYS,
  DEFAULT_LOCKOUT_POLICY,
  isUsernameReserved,
  isTokenExpired,
  isRefreshTokenActive,
  isPasswordResetTokenValid,
  isSessionValid,
  isLockedOut,
  loginFailureUpdate,
  resolveLoginLookup,
  toUserProfile,
  addMinutes,
  addHours,
  addDays,
  type LockoutPolicy,
  type LoginFailureState,
  type LoginFailureUpdate,
} from './auth';
export type {
  TransactionRunner,
  DomainLogger,
  OutboxPort,
  OutboxEventInput,
  NewUser,
  UserRepository,
  NewRefreshToken,
  Revocation,
  RefreshTokenRepository,
  NewPasswordResetToken,
  PasswordResetTokenRepository,
  NewUserSession,
  UserSessionRepository,
  PasswordHasher,
  AccessTokenClaims,
  VerifiedAccessToken,
  SignedAccessToken,
  TokenService,
  EmailRecipient,
  EmailSender,
} from './ports';
export { parseRequest, type ValidationIssue } from './validation';
export {
  AuthService,
  AuthError,
  type AuthErrorKind,
  type AuthServiceDeps,
  type AuthPolicy,
  type AuthResult,
  type RequestContext,
  type TokenValidationResult,
} from './auth-service';
export {
  markRead,
  markUnread,
  archive,
  unarchive,
  isNotificationExpired,
  type Notification,
  type NotificationStats,
  type NotificationType,
  type NotificationStatus,
} from './notification';
export type {
  NewNotification,
  NotificationListOptions,
  NotificationBulkFilter,
  NotificationRepository,
} from './notification-ports';
export {
  NotificationService,
  NotificationError,
  ARCHIVED_RETENTION_DAYS,
  type NotificationServiceDeps,
} from './notification-service';
export { extractMentions, type Post, type Comment, type Like, type Follow } from './social';
export type { PostRepository, CommentRepository, LikeRepository, FollowRepository } from './social-ports';
export { SocialService, SocialError, type SocialServiceDeps } from './social-service';
export {
  createProcessingJob,
  queueJob,
  startJob,
  updateProgress,
  completeJob,
  failJob,
  cancelJob,
  retryJob,
  canRetry,
  isFinished,
  processingDurationMs,
  ProcessingJobError,
  DEFAULT_PRIORITY,
  DEFAULT_MAX_RETRIES,
  type ProcessingJob,
  type NewProcessingJob,
  type ProcessingType,
  type ProcessingStatus,
} from './processing-job';
