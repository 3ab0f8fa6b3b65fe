import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AuthService, AuthError, type AuthServiceDeps } from '../auth-service';
import { type NewUser, type NewRefreshToken, type NewUserSession, type NewPasswordResetToken } from '../ports';
import {
  makeUser,
  makeRefreshToken,
  makeResetToken,
  makeSession,
  createMockLogger,
  runInline,
} from './fixtures';

const DAY = 86_400_000;

function createMockDeps(overrides: Partial<AuthServiceDeps> = {}): AuthServiceDeps {
  let idCounter = 1000;
  return {
    userRepo: {
      create: vi.fn(async (_tx: unknown, user: NewUser) =>
        makeUser({
          id: user.id,
          email: user.email,
          username: user.username,
          displayName: user.displayName,
          passwordHash: user.passwordHash,
          isEmailConfirmed: false,
          emailConfirmationTokenHash: user.emailConfirmationTokenHash,
        }),
      ),
      findById: vi.fn(async () => null),
      findByEmail: vi.fn(async () => null),
      findByUsername: vi.fn(async () => null),
      findByUsernames: vi.fn(async () => []),
      recordLoginFailure: vi.fn(async () => ({ failedLoginAttempts: 1, lockoutEndAt: null })),
      recordLoginSuccess: vi.fn(async () => {}),
      updatePassword: vi.fn(async () => {}),
      setEmailConfirmationToken: vi.fn(async () => {}),
      confirmEmail: vi.fn(async () => {}),
    },
    refreshTokenRepo: {
      create: vi.fn(async (_tx: unknown, token: NewRefreshToken) => makeRefreshToken({ ...token })),
      findByTokenHash: vi.fn(async () => null),
      markReplaced: vi.fn(async () => {}),
      revoke: vi.fn(async () => {}),
      revokeFamily: vi.fn(async () => 1),
      revokeAllForUser: vi.fn(async () => 2),
      revokeAllForSession: vi.fn(async () => 1),
      deleteExpired: vi.fn(async () => 0),
    },
    passwordResetTokenRepo: {
      create: vi.fn(async (_tx: unknown, token: NewPasswordResetToken) => makeResetToken({ ...token })),
      findByTokenHash: vi.fn(async () => null),
      markUsed: vi.fn(async () => {}),
      invalidateAllForUser: vi.fn(async () => 0),
      deleteExpired: vi.fn(async () => 0),
    },
    sessionRepo: {
      create: vi.fn(async (_tx: unknown, session: NewUserSession) => makeSession({ ...session })),
      findBySessionId: vi.fn(async () => null),
      listActiveForUser: vi.fn(async () => []),
      touch: vi.fn(async () => {}),
      deactivate: vi.fn(async () => {}),
      deactivateAllForUser: vi.fn(async () => 1),
      deleteExpired: vi.fn(async () => 0),
    },
    passwordHasher: {
      hash: vi.fn(async (p: string) => `hashed:${p}`),
      verify: vi.fn(async (p: string, h: string) => h === `hashed:${p}`),
    },
    tokenService: {
      signAccessToken: vi.fn(async () => ({
        token: 'access-token-jwt',
        expiresAt: new Date(Date.now() + 900_000),
      })),
      verifyAccessToken: vi.fn(async () => {
        throw new Error('invalid signature');
      }),
      generateOpaqueToken: vi.fn(() => 'raw-refresh-token'),
      hashOpaqueToken: vi.fn((t: string) => `sha256:${t}`),
    },
    emailSender: {
      sendEmailConfirmation: vi.fn(async () => {}),
      sendWelcome: vi.fn(async () => {}),
      sendPasswordReset: vi.fn(async () => {}),
      sendPasswordChanged: vi.fn(async () => {}),
    },
    outbox: {
      append: vi.fn(async () => 'evt-1'),
    },
    logger: createMockLogger(),
    generateId: vi.fn(() => `id-${idCounter++}`),
    generateSessionId: vi.fn(() => 'session-new'),
    withTransaction: runInline,
    policy: {
      refreshTokenTtlDays: 7,
      resetTokenTtlHours: 24,
      lockout: { maxFailedAttempts: 5, lockoutMinutes: 30 },
      appBaseUrl: 'http://localhost:3000',
    },
    ...overrides,
  };
}

async function rejectionOf(promise: Promise<unknown>): Promise<AuthError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof AuthError) return err;
    throw err;
  }
  throw new Error('expected the call to reject');
}

const validRegistration = {
  email: 'Bob@Example.com',
  username: 'bob',
  displayName: 'Bob',
  password: 'Str0ng!pass',
  confirmPassword: 'Str0ng!pass',
};

describe('AuthService', () => {
  let deps: AuthServiceDeps;
  let service: AuthService;

  beforeEach(() => {
    deps = createMockDeps();
    service = new AuthService(deps);
  });

  describe('register', () => {
    it('creates user and returns tokens', async () => {
      const result = await service.register(validRegistration, { ipAddress: '10.0.0.1' });

      expect(result.accessToken).toBe('access-token-jwt');
      expect(result.refreshToken).toBe('raw-refresh-token');
      expect(result.tokenType).toBe('Bearer');
      expect(result.sessionId).toBe('session-new');
      expect(result.user.email).toBe('bob@example.com');
      expect(result.user).not.toHaveProperty('passwordHash');
      expect(deps.userRepo.create).toHaveBeenCalledWith(
        {},
        expect.objectContaining({
          id: 'id-1000',
          email: 'bob@example.com',
          passwordHash: 'hashed:Str0ng!pass',
          emailConfirmationTokenHash: 'sha256:raw-refresh-token',
        }),
      );
      expect(deps.refreshTokenRepo.create).toHaveBeenCalledWith(
        {},
        expect.objectContaining({
          id: 'id-1003',
          familyId: 'id-1002',
          sessionId: 'session-new',
          tokenHash: 'sha256:raw-refresh-token',
          ipAddress: '10.0.0.1',
        }),
      );
    });

    it('opens a seven-day session', async () => {
      await service.register(validRegistration);

      const session = vi.mocked(deps.sessionRepo.create).mock.calls[0]?.[1];
      const days = ((session?.expiresAt.getTime() ?? 0) - Date.now()) / DAY;
      expect(days).toBeGreaterThan(6.99);
      expect(days).toBeLessThanOrEqual(7);
    });

    it('emits USER_REGISTERED', async () => {
      await service.register(validRegistration);

      expect(deps.outbox.append).toHaveBeenCalledWith({}, {
        aggregateType: 'user',
        aggregateId: 'id-1000',
        eventType: 'USER_REGISTERED',
        payload: { userId: 'id-1000' },
      });
    });

    it('emails the confirmation link and a welcome', async () => {
      await service.register(validRegistration);

      const to = { userId: 'id-1000', email: 'bob@example.com', displayName: 'Bob' };
      expect(deps.emailSender.sendEmailConfirmation).toHaveBeenCalledWith(
        to,
        'http://localhost:3000/confirm-email?userId=id-1000&token=raw-refresh-token',
      );
      expect(deps.emailSender.sendWelcome).toHaveBeenCalledWith(to);
    });

    it('still succeeds when an email cannot be sent', async () => {
      vi.mocked(deps.emailSender.sendWelcome).mockRejectedValue(new Error('smtp down'));

      const result = await service.register(validRegistration);

      expect(result.accessToken).toBe('access-token-jwt');
      expect(deps.logger.error).toHaveBeenCalledWith(
        { userId: 'id-1000', template: 'welcome', err: 'smtp down' },
        'Email delivery failed',
      );
    });

    it('rejects reserved username', async () => {
      const err = await rejectionOf(service.register({ ...validRegistration, username: 'admin' }));

      expect(err.kind).toBe('CONFLICT');
      expect(deps.userRepo.create).not.toHaveBeenCalled();
    });

    it('rejects a registered email', async () => {
      vi.mocked(deps.userRepo.findByEmail).mockResolvedValue(makeUser({ email: 'bob@example.com' }));

      const err = await rejectionOf(service.register(validRegistration));

      expect(err.kind).toBe('CONFLICT');
      expect(err.message).toBe('Email address is already registered');
    });

    it('rejects a taken username', async () => {
      vi.mocked(deps.userRepo.findByUsername).mockResolvedValue(makeUser({ username: 'bob' }));

      const err = await rejectionOf(service.register(validRegistration));

      expect(err.kind).toBe('CONFLICT');
      expect(err.message).toBe('Username is not available');
    });

    it('reports a registration that loses an email race as a conflict', async () => {
      vi.mocked(deps.userRepo.create).mockResolvedValue(null);
      vi.mocked(deps.userRepo.findByEmail)
        .mockResolvedValueOnce(null)
        .mockResolvedValueOnce(makeUser({ email: 'bob@example.com' }));

      const err = await rejectionOf(service.register(validRegistration));

      expect(err.kind).toBe('CONFLICT');
      expect(err.message).toBe('Email address is already registered');
      expect(deps.outbox.append).not.toHaveBeenCalled();
      expect(deps.sessionRepo.create).not.toHaveBeenCalled();
    });

    it('reports a registration that loses a username race as a conflict', async () => {
      vi.mocked(deps.userRepo.create).mockResolvedValue(null);

      const err = await rejectionOf(service.register(validRegistration));

      expect(err.kind).toBe('CONFLICT');
      expect(err.message).toBe('Username is not available');
    });

    it('rejects an invalid request with its issues', async () => {
      const err = await rejectionOf(service.register({ ...validRegistration, confirmPassword: 'nope' }));

      expect(err.kind).toBe('VALIDATION');
      expect(err.details).toEqual({ issues: [{ path: 'confirmPassword', message: 'Passwords do not match' }] });
      expect(deps.userRepo.findByEmail).not.toHaveBeenCalled();
    });
  });

  describe('login', () => {
    it('looks up by email when the identifier has an @', async () => {
      vi.mocked(deps.userRepo.findByEmail).mockResolvedValue(makeUser());

      const result = await service.login({ identifier: 'Alice@Example.com', password: 'Str0ng!pass' });

      expect(deps.userRepo.findByEmail).toHaveBeenCalledWith({}, 'alice@example.com');
      expect(deps.userRepo.findByUsername).not.toHaveBeenCalled();
      expect(deps.userRepo.recordLoginSuccess).toHaveBeenCalledWith({}, 'user-1');
      expect(result.user.id).toBe('user-1');
    });

    it('looks up by username otherwise', async () => {
      vi.mocked(deps.userRepo.findByUsername).mockResolvedValue(makeUser());

      await service.login({ identifier: 'alice', password: 'Str0ng!pass' });

      expect(deps.userRepo.findByUsername).toHaveBeenCalledWith({}, 'alice');
    });

    it('opens a one-day session, or thirty days with rememberMe', async () => {
      vi.mocked(deps.userRepo.findByUsername).mockResolvedValue(makeUser());

      await service.login({ identifier: 'alice', password: 'Str0ng!pass' });
      await service.login({ identifier: 'alice', password: 'Str0ng!pass', rememberMe: true });

      const calls = vi.mocked(deps.sessionRepo.create).mock.calls;
      const shortDays = ((calls[0]?.[1].expiresAt.getTime() ?? 0) - Date.now()) / DAY;
      const longDays = ((calls[1]?.[1].expiresAt.getTime() ?? 0) - Date.now()) / DAY;
      expect(shortDays).toBeGreaterThan(0.99);
      expect(shortDays).toBeLessThanOrEqual(1);
      expect(longDays).toBeGreaterThan(29.99);
      expect(longDays).toBeLessThanOrEqual(30);
    });

    it('rejects an unknown user', async () => {
      const err = await rejectionOf(service.login({ identifier: 'ghost', password: 'x' }));

      expect(err.kind).toBe('UNAUTHORIZED');
      expect(err.message).toBe('Invalid credentials');
    });

    it('rejects a locked account before checking the password', async () => {
      vi.mocked(deps.userRepo.findByUsername).mockResolvedValue(
        makeUser({ lockoutEndAt: new Date(Date.now() + 60_000) }),
      );

      const err = await rejectionOf(service.login({ identifier: 'alice', password: 'Str0ng!pass' }));

      expect(err.kind).toBe('LOCKED');
      expect(deps.passwordHasher.verify).not.toHaveBeenCalled();
    });

    it('records a wrong password and reports invalid credentials', async () => {
      vi.mocked(deps.userRepo.findByUsername).mockResolvedValue(makeUser({ failedLoginAttempts: 1 }));

      const err = await rejectionOf(service.login({ identifier: 'alice', password: 'wrong' }));

      expect(err.kind).toBe('UNAUTHORIZED');
      expect(err.message).toBe('Invalid credentials');
      expect(deps.userRepo.recordLoginFailure).toHaveBeenCalledOnce();
      expect(deps.sessionRepo.create).not.toHaveBeenCalled();
    });

    it('leaves the counting to the repository instead of writing a count read earlier', async () => {
      vi.mocked(deps.userRepo.findByUsername).mockResolvedValue(makeUser({ failedLoginAttempts: 4 }));

      await rejectionOf(service.login({ identifier: 'alice', password: 'wrong' }));

      const update = vi.mocked(deps.userRepo.recordLoginFailure).mock.calls[0]?.[2];
      expect(update).not.toHaveProperty('failedLoginAttempts');
      expect(update?.maxFailedAttempts).toBe(5);
      const minutes = ((update?.lockoutEndAt.getTime() ?? 0) - Date.now()) / 60_000;
      expect(minutes).toBeGreaterThan(29.9);
      expect(minutes).toBeLessThanOrEqual(30);
    });

    it('logs the attempt count the repository reports', async () => {
      vi.mocked(deps.userRepo.findByUsername).mockResolvedValue(makeUser({ failedLoginAttempts: 0 }));
      vi.mocked(deps.userRepo.recordLoginFailure).mockResolvedValue({
        failedLoginAttempts: 7,
        lockoutEndAt: new Date(Date.now() + 60_000),
      });

      await rejectionOf(service.login({ identifier: 'alice', password: 'wrong' }));

      expect(deps.logger.warn).toHaveBeenCalledWith({ userId: 'user-1', attempts: 7 }, 'Login failed: wrong password');
    });

    it('rejects an unconfirmed email', async () => {
      vi.mocked(deps.userRepo.findByUsername).mockResolvedValue(makeUser({ isEmailConfirmed: false }));

      const err = await rejectionOf(service.login({ identifier: 'alice', password: 'Str0ng!pass' }));

      expect(err.kind).toBe('UNAUTHORIZED');
      expect(err.message).toBe('Please confirm your email address before logging in');
      expect(deps.userRepo.recordLoginSuccess).not.toHaveBeenCalled();
    });
  });

  describe('refresh', () => {
    beforeEach(() => {
      vi.mocked(deps.refreshTokenRepo.findByTokenHash).mockResolvedValue(makeRefreshToken());
      vi.mocked(deps.sessionRepo.findBySessionId).mockResolvedValue(makeSession());
      vi.mocked(deps.userRepo.findById).mockResolvedValue(makeUser());
    });

    it('rotates within the same session and family', async () => {
      const result = await service.refresh('raw-refresh-token', { ipAddress: '10.0.0.1' });

      expect(deps.refreshTokenRepo.findByTokenHash).toHaveBeenCalledWith({}, 'sha256:raw-refresh-token');
      expect(result.sessionId).toBe('session-1');
      expect(deps.refreshTokenRepo.create).toHaveBeenCalledWith(
        {},
        expect.objectContaining({ id: 'id-1000', familyId: 'family-1', sessionId: 'session-1' }),
      );
      expect(deps.refreshTokenRepo.markReplaced).toHaveBeenCalledWith({}, 'rt-1', 'id-1000', '10.0.0.1');
      expect(deps.sessionRepo.touch).toHaveBeenCalledWith({}, 'session-1');
    });

    it('rejects an unknown token', async () => {
      vi.mocked(deps.refreshTokenRepo.findByTokenHash).mockResolvedValue(null);

      const err = await rejectionOf(service.refresh('raw-refresh-token'));

      expect(err.message).toBe('Invalid refresh token');
    });

    it('revokes the whole family when a used token comes back', async () => {
      vi.mocked(deps.refreshTokenRepo.findByTokenHash).mockResolvedValue(
        makeRefreshToken({ usedAt: new Date(), revokedAt: new Date() }),
      );

      const err = await rejectionOf(service.refresh('raw-refresh-token', { ipAddress: '10.0.0.9' }));

      expect(err.kind).toBe('UNAUTHORIZED');
      expect(err.message).toBe('Refresh token reuse detected');
      expect(deps.refreshTokenRepo.revokeFamily).toHaveBeenCalledWith({}, 'family-1', {
        reason: 'Refresh token reuse detected',
        ipAddress: '10.0.0.9',
      });
      expect(deps.sessionRepo.deactivate).toHaveBeenCalledWith({}, 'session-1');
      expect(deps.refreshTokenRepo.create).not.toHaveBeenCalled();
    });

    it('treats a revoked token as reuse', async () => {
      vi.mocked(deps.refreshTokenRepo.findByTokenHash).mockResolvedValue(
        makeRefreshToken({ revokedAt: new Date() }),
      );

      await rejectionOf(service.refresh('raw-refresh-token'));

      expect(deps.refreshTokenRepo.revokeFamily).toHaveBeenCalledOnce();
    });

    it('rejects an expired token', async () => {
      vi.mocked(deps.refreshTokenRepo.findByTokenHash).mockResolvedValue(
        makeRefreshToken({ expiresAt: new Date(Date.now() - 1000) }),
      );

      const err = await rejectionOf(service.refresh('raw-refresh-token'));

      expect(err.message).toBe('Refresh token expired');
      expect(deps.refreshTokenRepo.revokeFamily).not.toHaveBeenCalled();
    });

    it('rejects a token whose session has ended', async () => {
      vi.mocked(deps.sessionRepo.findBySessionId).mockResolvedValue(makeSession({ isActive: false }));

      const err = await rejectionOf(service.refresh('raw-refresh-token'));

      expect(err.message).toBe('Session is no longer active');
    });
  });

  describe('logout', () => {
    it('revokes the token and ends its session', async () => {
      vi.mocked(deps.refreshTokenRepo.findByTokenHash).mockResolvedValue(makeRefreshToken());

      await service.logout('user-1', 'raw-refresh-token', { ipAddress: '10.0.0.1' });

      expect(deps.refreshTokenRepo.revoke).toHaveBeenCalledWith({}, 'rt-1', {
        reason: 'User logout',
        ipAddress: '10.0.0.1',
      });
      expect(deps.sessionRepo.deactivate).toHaveBeenCalledWith({}, 'session-1');
    });

    it("ignores another user's token", async () => {
      vi.mocked(deps.refreshTokenRepo.findByTokenHash).mockResolvedValue(makeRefreshToken({ userId: 'user-2' }));

      await service.logout('user-1', 'raw-refresh-token');

      expect(deps.refreshTokenRepo.revoke).not.toHaveBeenCalled();
    });

    it('does nothing without a token', async () => {
      await service.logout('user-1');

      expect(deps.refreshTokenRepo.findByTokenHash).not.toHaveBeenCalled();
    });
  });

  describe('logoutAllDevices', () => {
    it('revokes every token and session of the user', async () => {
      await service.logoutAllDevices('user-1');

      expect(deps.refreshTokenRepo.revokeAllForUser).toHaveBeenCalledWith({}, 'user-1', {
        reason: 'Logout all devices',
        ipAddress: null,
      });
      expect(deps.sessionRepo.deactivateAllForUser).toHaveBeenCalledWith({}, 'user-1');
      expect(deps.logger.info).toHaveBeenCalledWith(
        { userId: 'user-1', tokens: 2, sessions: 1 },
        'User logged out from all devices',
      );
    });
  });

  describe('changePassword', () => {
    const input = { currentPassword: 'Str0ng!pass', newPassword: 'N3w!passwd', confirmPassword: 'N3w!passwd' };

    beforeEach(() => {
      vi.mocked(deps.userRepo.findById).mockResolvedValue(makeUser());
    });

    it('stores the new hash and revokes all refresh tokens', async () => {
      await service.changePassword('user-1', input);

      expect(deps.userRepo.updatePassword).toHaveBeenCalledWith({}, 'user-1', 'hashed:N3w!passwd');
      expect(deps.refreshTokenRepo.revokeAllForUser).toHaveBeenCalledWith({}, 'user-1', {
        reason: 'Password changed',
        ipAddress: null,
      });
      expect(deps.outbox.append).toHaveBeenCalledWith({}, {
        aggregateType: 'user',
        aggregateId: 'user-1',
        eventType: 'PASSWORD_CHANGED',
        payload: { userId: 'user-1', via: 'change' },
      });
      expect(deps.emailSender.sendPasswordChanged).toHaveBeenCalledOnce();
    });

    it('rejects a wrong current password', async () => {
      const err = await rejectionOf(service.changePassword('user-1', { ...input, currentPassword: 'wrong' }));

      expect(err.kind).toBe('UNAUTHORIZED');
      expect(deps.userRepo.updatePassword).not.toHaveBeenCalled();
    });

    it('rejects an unknown user', async () => {
      vi.mocked(deps.userRepo.findById).mockResolvedValue(null);

      const err = await rejectionOf(service.changePassword('user-9', input));

      expect(err.kind).toBe('NOT_FOUND');
    });

    it('validates the new password', async () => {
      const err = await rejectionOf(
        service.changePassword('user-1', { ...input, newPassword: 'weak', confirmPassword: 'weak' }),
      );

      expect(err.kind).toBe('VALIDATION');
    });
  });

  describe('forgotPassword', () => {
    it('returns silently for an unknown email', async () => {
      await service.forgotPassword({ email: 'ghost@example.com' });

      expect(deps.passwordResetTokenRepo.create).not.toHaveBeenCalled();
      expect(deps.emailSender.sendPasswordReset).not.toHaveBeenCalled();
    });

    it('replaces outstanding tokens and emails the reset link', async () => {
      vi.mocked(deps.userRepo.findByEmail).mockResolvedValue(makeUser());

      await service.forgotPassword({ email: 'alice@example.com' }, { ipAddress: '10.0.0.1' });

      expect(deps.passwordResetTokenRepo.invalidateAllForUser).toHaveBeenCalledWith({}, 'user-1');
      expect(deps.passwordResetTokenRepo.create).toHaveBeenCalledWith(
        {},
        expect.objectContaining({ userId: 'user-1', tokenHash: 'sha256:raw-refresh-token', ipAddress: '10.0.0.1' }),
      );
      expect(deps.emailSender.sendPasswordReset).toHaveBeenCalledWith(
        { userId: 'user-1', email: 'alice@example.com', displayName: 'Alice' },
        'http://localhost:3000/reset-password?token=raw-refresh-token&email=alice%40example.com',
      );
    });

    it('makes the token valid for 24 hours', async () => {
      vi.mocked(deps.userRepo.findByEmail).mockResolvedValue(makeUser());

      await service.forgotPassword({ email: 'alice@example.com' });

      const token = vi.mocked(deps.passwordResetTokenRepo.create).mock.calls[0]?.[1];
      const hours = ((token?.expiresAt.getTime() ?? 0) - Date.now()) / 3_600_000;
      expect(hours).toBeGreaterThan(23.99);
      expect(hours).toBeLessThanOrEqual(24);
    });
  });

  describe('resetPassword', () => {
    const input = {
      email: 'alice@example.com',
      token: 'reset-token',
      newPassword: 'N3w!passwd',
      confirmPassword: 'N3w!passwd',
    };

    beforeEach(() => {
      vi.mocked(deps.userRepo.findByEmail).mockResolvedValue(makeUser({ lockoutEndAt: new Date(Date.now() + 60_000) }));
      vi.mocked(deps.passwordResetTokenRepo.findByTokenHash).mockResolvedValue(makeResetToken());
    });

    it('sets the password and ends every session', async () => {
      await service.resetPassword(input);

      expect(deps.passwordResetTokenRepo.findByTokenHash).toHaveBeenCalledWith({}, 'sha256:reset-token');
      expect(deps.userRepo.updatePassword).toHaveBeenCalledWith({}, 'user-1', 'hashed:N3w!passwd');
      expect(deps.passwordResetTokenRepo.markUsed).toHaveBeenCalledWith({}, 'prt-1');
      expect(deps.refreshTokenRepo.revokeAllForUser).toHaveBeenCalledWith({}, 'user-1', {
        reason: 'Password reset',
        ipAddress: null,
      });
      expect(deps.sessionRepo.deactivateAllForUser).toHaveBeenCalledWith({}, 'user-1');
      expect(deps.outbox.append).toHaveBeenCalledWith(
        {},
        expect.objectContaining({ payload: { userId: 'user-1', via: 'reset' } }),
      );
    });

    it('rejects a used token', async () => {
      vi.mocked(deps.passwordResetTokenRepo.findByTokenHash).mockResolvedValue(makeResetToken({ usedAt: new Date() }));

      const err = await rejectionOf(service.resetPassword(input));

      expect(err.kind).toBe('VALIDATION');
      expect(err.message).toBe('Invalid or expired reset token');
    });

    it('rejects an expired token', async () => {
      vi.mocked(deps.passwordResetTokenRepo.findByTokenHash).mockResolvedValue(
        makeResetToken({ expiresAt: new Date(Date.now() - 1000) }),
      );

      const err = await rejectionOf(service.resetPassword(input));

      expect(err.message).toBe('Invalid or expired reset token');
    });

    it("rejects another user's token", async () => {
      vi.mocked(deps.passwordResetTokenRepo.findByTokenHash).mockResolvedValue(makeResetToken({ userId: 'user-2' }));

      const err = await rejectionOf(service.resetPassword(input));

      expect(err.kind).toBe('VALIDATION');
      expect(deps.userRepo.updatePassword).not.toHaveBeenCalled();
    });

    it('rejects an unknown email', async () => {
      vi.mocked(deps.userRepo.findByEmail).mockResolvedValue(null);

      const err = await rejectionOf(service.resetPassword(input));

      expect(err.message).toBe('Invalid or expired reset token');
      expect(deps.passwordResetTokenRepo.findByTokenHash).not.toHaveBeenCalled();
    });
  });

  describe('validateToken', () => {
    const verified = {
      userId: 'user-1',
      username: 'alice',
      email: 'alice@example.com',
      displayName: 'Alice',
      isVerified: false,
      sessionId: 'session-1',
      tokenId: 'jti-1',
      issuedAt: new Date('2026-06-01T12:00:00Z'),
      expiresAt: new Date('2026-06-01T12:15:00Z'),
    };

    it('reports a bad JWT without throwing', async () => {
      await expect(service.validateToken('garbage')).resolves.toEqual({ valid: false, error: 'Invalid token' });
    });

    it('reports an ended session', async () => {
      vi.mocked(deps.tokenService.verifyAccessToken).mockResolvedValue(verified);
      vi.mocked(deps.sessionRepo.findBySessionId).mockResolvedValue(makeSession({ isActive: false }));

      await expect(service.validateToken('jwt')).resolves.toEqual({
        valid: false,
        error: 'Session is no longer active',
      });
    });

    it('returns the claims of a valid token', async () => {
      vi.mocked(deps.tokenService.verifyAccessToken).mockResolvedValue(verified);
      vi.mocked(deps.sessionRepo.findBySessionId).mockResolvedValue(makeSession());

      await expect(service.validateToken('jwt')).resolves.toEqual({
        valid: true,
        userId: 'user-1',
        username: 'alice',
        email: 'alice@example.com',
        sessionId: 'session-1',
        expiresAt: new Date('2026-06-01T12:15:00Z'),
      });
    });
  });

  describe('confirmEmail', () => {
    it('confirms when the token matches', async () => {
      vi.mocked(deps.userRepo.findById).mockResolvedValue(
        makeUser({ isEmailConfirmed: false, emailConfirmationTokenHash: 'sha256:confirm-token' }),
      );

      await service.confirmEmail('user-1', 'confirm-token');

      expect(deps.userRepo.confirmEmail).toHaveBeenCalledWith({}, 'user-1');
    });

    it('rejects a mismatched token', async () => {
      vi.mocked(deps.userRepo.findById).mockResolvedValue(
        makeUser({ isEmailConfirmed: false, emailConfirmationTokenHash: 'sha256:confirm-token' }),
      );

      const err = await rejectionOf(service.confirmEmail('user-1', 'other-token'));

      expect(err.kind).toBe('VALIDATION');
      expect(deps.userRepo.confirmEmail).not.toHaveBeenCalled();
    });

    it('rejects an unknown user', async () => {
      const err = await rejectionOf(service.confirmEmail('user-9', 'confirm-token'));

      expect(err.kind).toBe('VALIDATION');
    });

    it('is a no-op for a confirmed address', async () => {
      vi.mocked(deps.userRepo.findById).mockResolvedValue(makeUser());

      await service.confirmEmail('user-1', 'anything');

      expect(deps.userRepo.confirmEmail).not.toHaveBeenCalled();
    });
  });

  describe('resendEmailConfirmation', () => {
    it('issues a fresh token to an unconfirmed user', async () => {
      vi.mocked(deps.userRepo.findByEmail).mockResolvedValue(makeUser({ isEmailConfirmed: false }));

      await service.resendEmailConfirmation('alice@example.com');

      expect(deps.userRepo.setEmailConfirmationToken).toHaveBeenCalledWith({}, 'user-1', 'sha256:raw-refresh-token');
      expect(deps.emailSender.sendEmailConfirmation).toHaveBeenCalledWith(
        { userId: 'user-1', email: 'alice@example.com', displayName: 'Alice' },
        'http://localhost:3000/confirm-email?userId=user-1&token=raw-refresh-token',
      );
    });

    it('stays silent for confirmed users', async () => {
      vi.mocked(deps.userRepo.findByEmail).mockResolvedValue(makeUser());

      await service.resendEmailConfirmation('alice@example.com');

      expect(deps.emailSender.sendEmailConfirmation).not.toHaveBeenCalled();
    });
  });

  describe('sessions', () => {
    it('lists active sessions', async () => {
      vi.mocked(deps.sessionRepo.listActiveForUser).mockResolvedValue([makeSession()]);

      const sessions = await service.getActiveSessions('user-1');

      expect(sessions.map((s) => s.sessionId)).toEqual(['session-1']);
    });

    it('revokes an own session and its tokens', async () => {
      vi.mocked(deps.sessionRepo.findBySessionId).mockResolvedValue(makeSession());

      await service.revokeSession('user-1', 'session-1');

      expect(deps.sessionRepo.deactivate).toHaveBeenCalledWith({}, 'session-1');
      expect(deps.refreshTokenRepo.revokeAllForSession).toHaveBeenCalledWith({}, 'session-1', {
        reason: 'Session revoked',
        ipAddress: null,
      });
    });

    it("refuses to revoke another user's session", async () => {
      vi.mocked(deps.sessionRepo.findBySessionId).mockResolvedValue(makeSession({ userId: 'user-2' }));

      const err = await rejectionOf(service.revokeSession('user-1', 'session-1'));

      expect(err.kind).toBe('NOT_FOUND');
      expect(deps.sessionRepo.deactivate).not.toHaveBeenCalled();
    });

    it('touches a valid session', async () => {
      vi.mocked(deps.sessionRepo.findBySessionId).mockResolvedValue(makeSession());

      await service.recordSessionActivity('session-1');

      expect(deps.sessionRepo.touch).toHaveBeenCalledWith({}, 'session-1');
    });

    it('refuses to touch an expired session', async () => {
      vi.mocked(deps.sessionRepo.findBySessionId).mockResolvedValue(
        makeSession({ expiresAt: new Date(Date.now() - 1000) }),
      );

      const err = await rejectionOf(service.recordSessionActivity('session-1'));

      expect(err.kind).toBe('UNAUTHORIZED');
    });
  });

  describe('getMe', () => {
    it('returns the public profile', async () => {
      vi.mocked(deps.userRepo.findById).mockResolvedValue(makeUser());

      const me = await service.getMe('user-1');

      expect(me?.username).toBe('alice');
      expect(me).not.toHaveProperty('passwordHash');
    });

    it('returns null for an unknown user', async () => {
      await expect(service.getMe('user-9')).resolves.toBeNull();
    });
  });
});
