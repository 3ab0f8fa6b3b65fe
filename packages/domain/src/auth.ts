import {
  type User,
  type UserProfile,
  type RefreshToken,
  type PasswordResetToken,
  type UserSession,
} from './user';

export const RESERVED_USERNAMES = new Set([
  'admin',
  'administrator',
  'system',
  'support',
  'moderator',
  'mod',
  'bot',
  'root',
  'murmur',
  'help',
  'info',
  'me',
  'settings',
  'null',
  'undefined',
]);

export const REGISTRATION_SESSION_DAYS = 7;
export const REMEMBER_ME_SESSION_DAYS = 30;
export const DEFAULT_SESSION_DAYS = 1;

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

export interface LockoutPolicy {
  maxFailedAttempts: number;
  lockoutMinutes: number;
}

export const DEFAULT_LOCKOUT_POLICY: LockoutPolicy = {
  maxFailedAttempts: 5,
  lockoutMinutes: 30,
};

export function isUsernameReserved(username: string): boolean {
  return RESERVED_USERNAMES.has(username.toLowerCase());
}

export function isTokenExpired(expiresAt: Date, now: Date = new Date()): boolean {
  return expiresAt.getTime() <= now.getTime();
}

/** A refresh token is usable only while unused, unrevoked and unexpired. */
export function isRefreshTokenActive(token: RefreshToken, now: Date = new Date()): boolean {
  return token.usedAt === null && token.revokedAt === null && !isTokenExpired(token.expiresAt, now);
}

export function isPasswordResetTokenValid(token: PasswordResetToken, now: Date = new Date()): boolean {
  return token.usedAt === null && !isTokenExpired(token.expiresAt, now);
}

export function isSessionValid(session: UserSession, now: Date = new Date()): boolean {
  return session.isActive && !isTokenExpired(session.expiresAt, now);
}

export function isLockedOut(user: User, now: Date = new Date()): boolean {
  return user.lockoutEndAt !== null && user.lockoutEndAt.getTime() > now.getTime();
}

export interface LoginFailureState {
  failedLoginAttempts: number;
  lockoutEndAt: Date | null;
}

/**
 * How a wrong password changes the account: the stored counter goes up by
 * one and, if it then reaches `maxFailedAttempts`, the account is locked
 * until `lockoutEndAt`. The counter is only reset by a successful login or
 * a password change, so a user who keeps failing after a lockout expires is
 * locked again on the next failure.
 */
export interface LoginFailureUpdate {
  maxFailedAttempts: number;
  lockoutEndAt: Date;
}

export function loginFailureUpdate(policy: LockoutPolicy, now: Date = new Date()): LoginFailureUpdate {
  return {
    maxFailedAttempts: policy.maxFailedAttempts,
    lockoutEndAt: addMinutes(now, policy.lockoutMinutes),
  };
}

export function resolveLoginLookup(identifier: string): 'email' | 'username' {
  return identifier.includes('@') ? 'email' : 'username';
}

export function toUserProfile(user: User): UserProfile {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    displayName: user.displayName,
    bio: user.bio,
    website: user.website,
    location: user.location,
    birthDate: user.birthDate,
    isPrivate: user.isPrivate,
    isVerified: user.isVerified,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * MINUTE_MS);
}

export function addHours(date: Date, hours: number): Date {
  return new Date(date.getTime() + hours * HOUR_MS);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}
