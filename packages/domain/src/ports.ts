import {
  type User,
  type RefreshToken,
  type PasswordResetToken,
  type UserSession,
} from './user';
import { type LoginFailureState, type LoginFailureUpdate } from './auth';

/**
 * Repositories take the transaction handle of whatever runs them; the pg
 * implementations bind `Tx` to a `PoolClient`, the tests leave it `unknown`.
 */
export type TransactionRunner<Tx> = <T>(fn: (tx: Tx) => Promise<T>) => Promise<T>;

export interface DomainLogger {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
}

export interface OutboxEventInput {
  aggregateType: string;
  aggregateId: string;
  eventType: string;
  payload: Record<string, unknown>;
}

export interface OutboxPort<Tx = unknown> {
  append(tx: Tx, event: OutboxEventInput): Promise<string>;
}

export interface NewUser {
  id: string;
  email: string;
  username: string;
  displayName: string;
  passwordHash: string;
  bio: string;
  website: string;
  location: string;
  birthDate: Date | null;
  emailConfirmationTokenHash: string | null;
}

export interface UserRepository<Tx = unknown> {
  /** Null when the email or username is already taken. */
  create(tx: Tx, user: NewUser): Promise<User | null>;
  findById(tx: Tx, id: string): Promise<User | null>;
  findByEmail(tx: Tx, email: string): Promise<User | null>;
  findByUsername(tx: Tx, username: string): Promise<User | null>;
  findByUsernames(tx: Tx, usernames: string[]): Promise<User[]>;
  /** Increments the stored counter in place and returns the state it left behind. */
  recordLoginFailure(tx: Tx, id: string, update: LoginFailureUpdate): Promise<LoginFailureState>;
  recordLoginSuccess(tx: Tx, id: string): Promise<void>;
  /** Also clears the failure counter and any lockout. */
  updatePassword(tx: Tx, id: string, passwordHash: string): Promise<void>;
  setEmailConfirmationToken(tx: Tx, id: string, tokenHash: string): Promise<void>;
  confirmEmail(tx: Tx, id: string): Promise<void>;
}

export interface NewRefreshToken {
  id: string;
  userId: string;
  sessionId: string;
  familyId: string;
  tokenHash: string;
  expiresAt: Date;
  ipAddress: string | null;
  userAgent: string | null;
}

export interface Revocation {
  reason: string;
  ipAddress: string | null;
}

export interface RefreshTokenRepository<Tx = unknown> {
  create(tx: Tx, token: NewRefreshToken): Promise<RefreshToken>;
  findByTokenHash(tx: Tx, hash: string): Promise<RefreshToken | null>;
  /** Marks the token used and revoked, pointing at the token that replaced it. */
  markReplaced(tx: Tx, id: string, replacedByTokenId: string, ipAddress: string | null): Promise<void>;
  revoke(tx: Tx, id: string, revocation: Revocation): Promise<void>;
  revokeFamily(tx: Tx, familyId: string, revocation: Revocation): Promise<number>;
  revokeAllForUser(tx: Tx, userId: string, revocation: Revocation): Promise<number>;
  revokeAllForSession(tx: Tx, sessionId: string, revocation: Revocation): Promise<number>;
  deleteExpired(tx: Tx, olderThanDays: number): Promise<number>;
}

export interface NewPasswordResetToken {
  id: string;
  userId: string;
  tokenHash: string;
  expiresAt: Date;
  ipAddress: string | null;
}

export interface PasswordResetTokenRepository<Tx = unknown> {
  create(tx: Tx, token: NewPasswordResetToken): Promise<PasswordResetToken>;
  findByTokenHash(tx: Tx, hash: string): Promise<PasswordResetToken | null>;
  markUsed(tx: Tx, id: string): Promise<void>;
  invalidateAllForUser(tx: Tx, userId: string): Promise<number>;
  deleteExpired(tx: Tx, olderThanDays: number): Promise<number>;
}

export interface NewUserSession {
  id: string;
  userId: string;
  sessionId: string;
  expiresAt: Date;
  ipAddress: string | null;
  userAgent: string | null;
  deviceInfo: string | null;
  location: string | null;
}

export interface UserSessionRepository<Tx = unknown> {
  create(tx: Tx, session: NewUserSession): Promise<UserSession>;
  findBySessionId(tx: Tx, sessionId: string): Promise<UserSession | null>;
  listActiveForUser(tx: Tx, userId: string): Promise<UserSession[]>;
  touch(tx: Tx, sessionId: string): Promise<void>;
  deactivate(tx: Tx, sessionId: string): Promise<void>;
  deactivateAllForUser(tx: Tx, userId: string): Promise<number>;
  deleteExpired(tx: Tx, olderThanDays: number): Promise<number>;
}

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  verify(password: string, hash: string): Promise<boolean>;
}

export interface AccessTokenClaims {
  userId: string;
  username: string;
  email: string;
  displayName: string;
  isVerified: boolean;
  sessionId: string;
}

export interface VerifiedAccessToken extends AccessTokenClaims {
  tokenId: string;
  issuedAt: Date;
  expiresAt: Date;
}

export interface SignedAccessToken {
  token: string;
  expiresAt: Date;
}

export interface TokenService {
  signAccessToken(claims: AccessTokenClaims): Promise<SignedAccessToken>;
  verifyAccessToken(token: string): Promise<VerifiedAccessToken>;
  /** Random credential handed to the client; only its hash is stored. */
  generateOpaqueToken(): string;
  hashOpaqueToken(token: string): string;
}

export interface EmailRecipient {
  userId: string;
  email: string;
  displayName: string;
}

export interface EmailSender {
  sendEmailConfirmation(to: EmailRecipient, confirmationLink: string): Promise<void>;
  sendWelcome(to: EmailRecipient): Promise<void>;
  sendPasswordReset(to: EmailRecipient, resetLink: string): Promise<void>;
  sendPasswordChanged(to: EmailRecipient): Promise<void>;
}
