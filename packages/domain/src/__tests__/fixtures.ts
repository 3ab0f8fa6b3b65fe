import { vi } from 'vitest';
import { type User, type RefreshToken, type PasswordResetToken, type UserSession } from '../user';
import { type DomainLogger } from '../ports';
import { type Notification } from '../notification';

const HOUR = 3_600_000;

export function makeUser(overrides: Partial<User> = {}): User {
  return {
    id: 'user-1',
    email: 'alice@example.com',
    username: 'alice',
    displayName: 'Alice',
    bio: '',
    website: '',
    location: '',
    birthDate: null,
    isPrivate: false,
    isVerified: false,
    passwordHash: 'hashed:Str0ng!pass',
    lastLoginAt: null,
    passwordChangedAt: null,
    failedLoginAttempts: 0,
    lockoutEndAt: null,
    isEmailConfirmed: true,
    emailConfirmationTokenHash: null,
    createdAt: new Date('2026-01-01'),
    updatedAt: new Date('2026-01-01'),
    ...overrides,
  };
}

export function makeRefreshToken(overrides: Partial<RefreshToken> = {}): RefreshToken {
  return {
    id: 'rt-1',
    userId: 'user-1',
    sessionId: 'session-1',
    familyId: 'family-1',
    tokenHash: 'sha256:raw-refresh-token',
    expiresAt: new Date(Date.now() + 24 * HOUR),
    usedAt: null,
    revokedAt: null,
    revokedReason: null,
    revokedByIp: null,
    replacedByTokenId: null,
    ipAddress: null,
    userAgent: null,
    createdAt: new Date(),
    ...overrides,
  };
}

export function makeResetToken(overrides: Partial<PasswordResetToken> = {}): PasswordResetToken {
  return {
    id: 'prt-1',
    userId: 'user-1',
    tokenHash: 'sha256:reset-token',
    expiresAt: new Date(Date.now() + HOUR),
    usedAt: null,
    ipAddress: null,
    createdAt: new Date(),
    ...overrides,
  };
}

export function makeSession(overrides: Partial<UserSession> = {}): UserSession {
  return {
    id: 'us-1',
    userId: 'user-1',
    sessionId: 'session-1',
    createdAt: new Date(),
    lastActivityAt: new Date(),
    expiresAt: new Date(Date.now() + 24 * HOUR),
    isActive: true,
    ipAddress: null,
    userAgent: null,
    deviceInfo: null,
    location: null,
    ...overrides,
  };
}

export function makeNotification(overrides: Partial<Notification> = {}): Notification {
  return {
    id: 'n-1',
    userId: 'user-1',
    type: 'LIKE',
    status: 'UNREAD',
    title: 'New Like',
    message: 'Bob liked your post',
    entityId: 'post-1',
    entityType: 'Post',
    triggerUserId: 'user-2',
    actionUrl: '/posts/post-1',
    metadata: {},
    createdAt: new Date('2026-06-01T08:00:00Z'),
    readAt: null,
    archivedAt: null,
    expiresAt: null,
    ...overrides,
  };
}

export function createMockLogger(): DomainLogger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

export const runInline = async <T>(fn: (tx: unknown) => Promise<T>): Promise<T> => fn({});
