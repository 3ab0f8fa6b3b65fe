import {
  RegisterRequestSchema,
  LoginRequestSchema,
  RefreshRequestSchema,
  ChangePasswordRequestSchema,
  EmailRequestSchema,
  ResetPasswordRequestSchema,
  ConfirmEmailRequestSchema,
  USER_REGISTERED,
  PASSWORD_CHANGED,
  type RegisterRequestInput,
  type LoginRequestInput,
  type ChangePasswordRequest,
  type ResetPasswordRequest,
  type PasswordChanged,
} from '@murmur/proto';
import { type User, type UserProfile, type UserSession } from './user';
import {
  isUsernameReserved,
  isTokenExpired,
  isPasswordResetTokenValid,
  isSessionValid,
  isLockedOut,
  loginFailureUpdate,
  resolveLoginLookup,
  toUserProfile,
  addDays,
  addHours,
  REGISTRATION_SESSION_DAYS,
  REMEMBER_ME_SESSION_DAYS,
  DEFAULT_SESSION_DAYS,
  type LockoutPolicy,
} from './auth';
import {
  type UserRepository,
  type RefreshTokenRepository,
  type PasswordResetTokenRepository,
  type UserSessionRepository,
  type PasswordHasher,
  type TokenService,
  type EmailSender,
  type EmailRecipient,
  type OutboxPort,
  type DomainLogger,
  type TransactionRunner,
  type AccessTokenClaims,
  type VerifiedAccessToken,
} from './ports';
import { parseRequest, type ValidationIssue } from './validation';

export interface AuthPolicy {
  refreshTokenTtlDays: number;
  resetTokenTtlHours: number;
  lockout: LockoutPolicy;
  /** Base of the links put in confirmation and reset emails. */
  appBaseUrl: string;
}

export interface AuthServiceDeps<Tx = unknown> {
  userRepo: UserRepository<Tx>;
  refreshTokenRepo: RefreshTokenRepository<Tx>;
  passwordResetTokenRepo: PasswordResetTokenRepository<Tx>;
  sessionRepo: UserSessionRepository<Tx>;
  passwordHasher: PasswordHasher;
  tokenService: TokenService;
  emailSender: EmailSender;
  outbox: OutboxPort<Tx>;
  logger: DomainLogger;
  generateId: () => string;
  generateSessionId: () => string;
  withTransaction: TransactionRunner<Tx>;
  policy: AuthPolicy;
}

/** Where a request came from; stored on sessions and token revocations. */
export interface RequestContext {
  ipAddress?: string;
  userAgent?: string;
  deviceInfo?: string;
  location?: string;
}

export interface AuthResult {
  accessToken: string;
  refreshToken: string;
  tokenType: 'Bearer';
  expiresIn: number;
  expiresAt: Date;
  sessionId: string;
  user: UserProfile;
}

export type TokenValidationResult =
  | {
      valid: true;
      userId: string;
      username: string;
      email: string;
      sessionId: string;
      expiresAt: Date;
    }
  | { valid: false; error: string };

interface IssuedTokens {
  result: AuthResult;
  refreshTokenId: string;
}

export class AuthService<Tx = unknown> {
  constructor(private readonly deps: AuthServiceDeps<Tx>) {}

  async register(input: RegisterRequestInput, ctx: RequestContext = {}): Promise<AuthResult> {
    const request = parseRequest(RegisterRequestSchema, input, invalidRequest);
    const { userRepo, passwordHasher, tokenService, outbox, generateId, logger } = this.deps;

    const { user, result, confirmationToken } = await this.deps.withTransaction(async (tx) => {
      if (isUsernameReserved(request.username)) {
        throw new AuthError('CONFLICT', 'Username is not available');
      }
      if (await userRepo.findByEmail(tx, request.email)) {
        throw new AuthError('CONFLICT', 'Email address is already registered');
      }
      if (await userRepo.findByUsername(tx, request.username)) {
        throw new AuthError('CONFLICT', 'Username is not available');
      }

      const passwordHash = await passwordHasher.hash(request.password);
      const confirmationToken = tokenService.generateOpaqueToken();

      const user = await userRepo.create(tx, {
        id: generateId(),
        email: request.email,
        username: request.username,
        displayName: request.displayName,
        passwordHash,
        bio: request.bio ?? '',
        website: request.website ?? '',
        location: request.location ?? '',
        birthDate: request.birthDate ?? null,
        emailConfirmationTokenHash: tokenService.hashOpaqueToken(confirmationToken),
      });
      if (!user) {
        // Lost a race with a concurrent registration; report whichever key it took.
        const emailTaken = (await userRepo.findByEmail(tx, request.email)) !== null;
        throw new AuthError(
          'CONFLICT',
          emailTaken ? 'Email address is already registered' : 'Username is not available',
        );
      }

      await outbox.append(tx, {
        aggregateType: 'user',
        aggregateId: user.id,
        eventType: USER_REGISTERED,
        payload: { userId: user.id },
      });

      const { result } = await this.openSession(tx, user, ctx, REGISTRATION_SESSION_DAYS);
      return { user, result, confirmationToken };
    });

    logger.info({ userId: user.id }, 'User registered');

    await this.deliver('email-confirmation', user, (sender, to) =>
      sender.sendEmailConfirmation(to, this.confirmationLink(user.id, confirmationToken)),
    );
    await this.deliver('welcome', user, (sender, to) => sender.sendWelcome(to));

    return result;
  }

  async login(input: LoginRequestInput, ctx: RequestContext = {}): Promise<AuthResult> {
    const request = parseRequest(LoginRequestSchema, input, invalidRequest);
    const { userRepo, passwordHasher, policy, logger } = this.deps;

    // A wrong password is recorded and committed before the error is raised.
    const outcome = await this.deps.withTransaction(async (tx) => {
      const user =
        resolveLoginLookup(request.identifier) === 'email'
          ? await userRepo.findByEmail(tx, request.identifier)
          : await userRepo.findByUsername(tx, request.identifier);

      if (!user) {
        throw new AuthError('UNAUTHORIZED', 'Invalid credentials');
      }
      if (isLockedOut(user)) {
        throw new AuthError('LOCKED', 'Account is temporarily locked due to multiple failed attempts');
      }

      const valid = await passwordHasher.verify(request.password, user.passwordHash);
      if (!valid) {
        const state = await userRepo.recordLoginFailure(tx, user.id, loginFailureUpdate(policy.lockout));
        return { kind: 'rejected' as const, userId: user.id, attempts: state.failedLoginAttempts };
      }

      if (!user.isEmailConfirmed) {
        throw new AuthError('UNAUTHORIZED', 'Please confirm your email address before logging in');
      }

      await userRepo.recordLoginSuccess(tx, user.id);
      const sessionDays = request.rememberMe ? REMEMBER_ME_SESSION_DAYS : DEFAULT_SESSION_DAYS;
      const { result } = await this.openSession(tx, user, ctx, sessionDays);
      return { kind: 'authenticated' as const, result };
    });

    if (outcome.kind === 'rejected') {
      logger.warn({ userId: outcome.userId, attempts: outcome.attempts }, 'Login failed: wrong password');
      throw new AuthError('UNAUTHORIZED', 'Invalid credentials');
    }

    logger.info({ userId: outcome.result.user.id }, 'User logged in');
    return outcome.result;
  }

  async refresh(rawRefreshToken: string, ctx: RequestContext = {}): Promise<AuthResult> {
    const request = parseRequest(RefreshRequestSchema, { refreshToken: rawRefreshToken }, invalidRequest);
    const { refreshTokenRepo, sessionRepo, userRepo, tokenService, logger } = this.deps;

    const outcome = await this.deps.withTransaction(async (tx) => {
      const stored = await refreshTokenRepo.findByTokenHash(
        tx,
        tokenService.hashOpaqueToken(request.refreshToken),
      );
      if (!stored) {
        throw new AuthError('UNAUTHORIZED', 'Invalid refresh token');
      }

      if (stored.usedAt !== null || stored.revokedAt !== null) {
        await refreshTokenRepo.revokeFamily(tx, stored.familyId, {
          reason: 'Refresh token reuse detected',
          ipAddress: ctx.ipAddress ?? null,
        });
        await sessionRepo.deactivate(tx, stored.sessionId);
        return { kind: 'reused' as const, userId: stored.userId, familyId: stored.familyId };
      }

      if (isTokenExpired(stored.expiresAt)) {
        throw new AuthError('UNAUTHORIZED', 'Refresh token expired');
      }

      const session = await sessionRepo.findBySessionId(tx, stored.sessionId);
      if (!session || !isSessionValid(session)) {
        throw new AuthError('UNAUTHORIZED', 'Session is no longer active');
      }

      const user = await userRepo.findById(tx, stored.userId);
      if (!user) {
        throw new AuthError('UNAUTHORIZED', 'Invalid refresh token');
      }

      const issued = await this.issueTokens(tx, user, stored.sessionId, stored.familyId, ctx);
      await refreshTokenRepo.markReplaced(tx, stored.id, issued.refreshTokenId, ctx.ipAddress ?? null);
      await sessionRepo.touch(tx, stored.sessionId);
      return { kind: 'rotated' as const, result: issued.result };
    });

    if (outcome.kind === 'reused') {
      logger.warn(
        { userId: outcome.userId, familyId: outcome.familyId },
        'Refresh token reuse detected, token family revoked',
      );
      throw new AuthError('UNAUTHORIZED', 'Refresh token reuse detected');
    }

    logger.debug({ userId: outcome.result.user.id }, 'Token refreshed');
    return outcome.result;
  }

  /** Revokes the given refresh token and ends its session; foreign or unknown tokens are ignored. */
  async logout(userId: string, rawRefreshToken?: string, ctx: RequestContext = {}): Promise<void> {
    const { refreshTokenRepo, sessionRepo, tokenService, logger } = this.deps;

    await this.deps.withTransaction(async (tx) => {
      if (!rawRefreshToken) return;
      const stored = await refreshTokenRepo.findByTokenHash(tx, tokenService.hashOpaqueToken(rawRefreshToken));
      if (!stored || stored.userId !== userId) return;

      await refreshTokenRepo.revoke(tx, stored.id, { reason: 'User logout', ipAddress: ctx.ipAddress ?? null });
      await sessionRepo.deactivate(tx, stored.sessionId);
    });

    logger.info({ userId }, 'User logged out');
  }

  async logoutAllDevices(userId: string, ctx: RequestContext = {}): Promise<void> {
    const { refreshTokenRepo, sessionRepo, logger } = this.deps;

    const { tokens, sessions } = await this.deps.withTransaction(async (tx) => {
      const tokens = await refreshTokenRepo.revokeAllForUser(tx, userId, {
        reason: 'Logout all devices',
        ipAddress: ctx.ipAddress ?? null,
      });
      const sessions = await sessionRepo.deactivateAllForUser(tx, userId);
      return { tokens, sessions };
    });

    logger.info({ userId, tokens, sessions }, 'User logged out from all devices');
  }

  async changePassword(userId: string, input: ChangePasswordRequest, ctx: RequestContext = {}): Promise<void> {
    const request = parseRequest(ChangePasswordRequestSchema, input, invalidRequest);
    const { userRepo, refreshTokenRepo, passwordHasher, logger } = this.deps;

    const user = await this.deps.withTransaction(async (tx) => {
      const user = await userRepo.findById(tx, userId);
      if (!user) {
        throw new AuthError('NOT_FOUND', 'User not found');
      }

      const valid = await passwordHasher.verify(request.currentPassword, user.passwordHash);
      if (!valid) {
        throw new AuthError('UNAUTHORIZED', 'Current password is incorrect');
      }

      await userRepo.updatePassword(tx, user.id, await passwordHasher.hash(request.newPassword));
      await refreshTokenRepo.revokeAllForUser(tx, user.id, {
        reason: 'Password changed',
        ipAddress: ctx.ipAddress ?? null,
      });
      await this.appendPasswordChanged(tx, { userId: user.id, via: 'change' });
      return user;
    });

    logger.info({ userId }, 'Password changed');
    await this.deliver('password-changed', user, (sender, to) => sender.sendPasswordChanged(to));
  }

  /** Silent for unknown addresses so the response does not reveal who is registered. */
  async forgotPassword(input: { email: string }, ctx: RequestContext = {}): Promise<void> {
    const request = parseRequest(EmailRequestSchema, input, invalidRequest);
    const { userRepo, passwordResetTokenRepo, tokenService, generateId, policy, logger } = this.deps;

    const issued = await this.deps.withTransaction(async (tx) => {
      const user = await userRepo.findByEmail(tx, request.email);
      if (!user) return null;

      await passwordResetTokenRepo.invalidateAllForUser(tx, user.id);

      const rawToken = tokenService.generateOpaqueToken();
      await passwordResetTokenRepo.create(tx, {
        id: generateId(),
        userId: user.id,
        tokenHash: tokenService.hashOpaqueToken(rawToken),
        expiresAt: addHours(new Date(), policy.resetTokenTtlHours),
        ipAddress: ctx.ipAddress ?? null,
      });
      return { user, rawToken };
    });

    if (!issued) {
      logger.warn({}, 'Password reset requested for unknown email');
      return;
    }

    logger.info({ userId: issued.user.id }, 'Password reset token issued');
    await this.deliver('password-reset', issued.user, (sender, to) =>
      sender.sendPasswordReset(to, this.resetLink(issued.rawToken, issued.user.email)),
    );
  }

  async resetPassword(input: ResetPasswordRequest, ctx: RequestContext = {}): Promise<void> {
    const request = parseRequest(ResetPasswordRequestSchema, input, invalidRequest);
    const {
      userRepo,
      passwordResetTokenRepo,
      refreshTokenRepo,
      sessionRepo,
      passwordHasher,
      tokenService,
      logger,
    } = this.deps;

    const user = await this.deps.withTransaction(async (tx) => {
      const user = await userRepo.findByEmail(tx, request.email);
      const token = user
        ? await passwordResetTokenRepo.findByTokenHash(tx, tokenService.hashOpaqueToken(request.token))
        : null;

      if (!user || !token || token.userId !== user.id || !isPasswordResetTokenValid(token)) {
        throw new AuthError('VALIDATION', 'Invalid or expired reset token');
      }

      await userRepo.updatePassword(tx, user.id, await passwordHasher.hash(request.newPassword));
      await passwordResetTokenRepo.markUsed(tx, token.id);
      await refreshTokenRepo.revokeAllForUser(tx, user.id, {
        reason: 'Password reset',
        ipAddress: ctx.ipAddress ?? null,
      });
      await sessionRepo.deactivateAllForUser(tx, user.id);
      await this.appendPasswordChanged(tx, { userId: user.id, via: 'reset' });
      return user;
    });

    logger.info({ userId: user.id }, 'Password reset');
    await this.deliver('password-changed', user, (sender, to) => sender.sendPasswordChanged(to));
  }

  /** Never throws for a bad token: callers get `{ valid: false }` instead. */
  async validateToken(token: string): Promise<TokenValidationResult> {
    const { tokenService, sessionRepo, logger } = this.deps;

    let claims: VerifiedAccessToken;
    try {
      claims = await tokenService.verifyAccessToken(token);
    } catch (err) {
      logger.debug({ err: err instanceof Error ? err.message : String(err) }, 'Access token rejected');
      return { valid: false, error: 'Invalid token' };
    }

    const session = await this.deps.withTransaction((tx) => sessionRepo.findBySessionId(tx, claims.sessionId));
    if (!session || session.userId !== claims.userId || !isSessionValid(session)) {
      return { valid: false, error: 'Session is no longer active' };
    }

    return {
      valid: true,
      userId: claims.userId,
      username: claims.username,
      email: claims.email,
      sessionId: claims.sessionId,
      expiresAt: claims.expiresAt,
    };
  }

  async confirmEmail(userId: string, token: string): Promise<void> {
    const request = parseRequest(ConfirmEmailRequestSchema, { userId, token }, invalidRequest);
    const { userRepo, tokenService, logger } = this.deps;

    const confirmed = await this.deps.withTransaction(async (tx) => {
      const user = await userRepo.findById(tx, request.userId);
      if (!user) {
        throw new AuthError('VALIDATION', 'Invalid confirmation token');
      }
      if (user.isEmailConfirmed) return false;

      if (
        user.emailConfirmationTokenHash === null ||
        user.emailConfirmationTokenHash !== tokenService.hashOpaqueToken(request.token)
      ) {
        throw new AuthError('VALIDATION', 'Invalid confirmation token');
      }

      await userRepo.confirmEmail(tx, user.id);
      return true;
    });

    if (confirmed) {
      logger.info({ userId }, 'Email confirmed');
    }
  }

  async resendEmailConfirmation(email: string): Promise<void> {
    const request = parseRequest(EmailRequestSchema, { email }, invalidRequest);
    const { userRepo, tokenService, logger } = this.deps;

    const issued = await this.deps.withTransaction(async (tx) => {
      const user = await userRepo.findByEmail(tx, request.email);
      if (!user || user.isEmailConfirmed) return null;

      const rawToken = tokenService.generateOpaqueToken();
      await userRepo.setEmailConfirmationToken(tx, user.id, tokenService.hashOpaqueToken(rawToken));
      return { user, rawToken };
    });

    if (!issued) return;

    logger.info({ userId: issued.user.id }, 'Email confirmation re-sent');
    await this.deliver('email-confirmation', issued.user, (sender, to) =>
      sender.sendEmailConfirmation(to, this.confirmationLink(issued.user.id, issued.rawToken)),
    );
  }

  async getActiveSessions(userId: string): Promise<UserSession[]> {
    return this.deps.withTransaction((tx) => this.deps.sessionRepo.listActiveForUser(tx, userId));
  }

  async revokeSession(userId: string, sessionId: string, ctx: RequestContext = {}): Promise<void> {
    const { sessionRepo, refreshTokenRepo, logger } = this.deps;

    await this.deps.withTransaction(async (tx) => {
      const session = await sessionRepo.findBySessionId(tx, sessionId);
      if (!session || session.userId !== userId) {
        throw new AuthError('NOT_FOUND', 'Session not found');
      }

      await sessionRepo.deactivate(tx, sessionId);
      await refreshTokenRepo.revokeAllForSession(tx, sessionId, {
        reason: 'Session revoked',
        ipAddress: ctx.ipAddress ?? null,
      });
    });

    logger.info({ userId }, 'Session revoked');
  }

  async recordSessionActivity(sessionId: string): Promise<void> {
    const { sessionRepo } = this.deps;

    await this.deps.withTransaction(async (tx) => {
      const session = await sessionRepo.findBySessionId(tx, sessionId);
      if (!session || !isSessionValid(session)) {
        throw new AuthError('UNAUTHORIZED', 'Session is no longer active');
      }
      await sessionRepo.touch(tx, sessionId);
    });
  }

  async getMe(userId: string): Promise<UserProfile | null> {
    const user = await this.deps.withTransaction((tx) => this.deps.userRepo.findById(tx, userId));
    return user ? toUserProfile(user) : null;
  }

  private async openSession(tx: Tx, user: User, ctx: RequestContext, days: number): Promise<IssuedTokens> {
    const { sessionRepo, generateId, generateSessionId } = this.deps;
    const sessionId = generateSessionId();

    await sessionRepo.create(tx, {
      id: generateId(),
      userId: user.id,
      sessionId,
      expiresAt: addDays(new Date(), days),
      ipAddress: ctx.ipAddress ?? null,
      userAgent: ctx.userAgent ?? null,
      deviceInfo: ctx.deviceInfo ?? null,
      location: ctx.location ?? null,
    });

    return this.issueTokens(tx, user, sessionId, generateId(), ctx);
  }

  private async issueTokens(
    tx: Tx,
    user: User,
    sessionId: string,
    familyId: string,
    ctx: RequestContext,
  ): Promise<IssuedTokens> {
    const { tokenService, refreshTokenRepo, generateId, policy } = this.deps;

    const access = await tokenService.signAccessToken(accessClaimsFor(user, sessionId));
    const rawRefresh = tokenService.generateOpaqueToken();
    const refreshTokenId = generateId();

    await refreshTokenRepo.create(tx, {
      id: refreshTokenId,
      userId: user.id,
      sessionId,
      familyId,
      tokenHash: tokenService.hashOpaqueToken(rawRefresh),
      expiresAt: addDays(new Date(), policy.refreshTokenTtlDays),
      ipAddress: ctx.ipAddress ?? null,
      userAgent: ctx.userAgent ?? null,
    });

    return {
      refreshTokenId,
      result: {
        accessToken: access.token,
        refreshToken: rawRefresh,
        tokenType: 'Bearer',
        expiresIn: Math.max(0, Math.round((access.expiresAt.getTime() - Date.now()) / 1000)),
        expiresAt: access.expiresAt,
        sessionId,
        user: toUserProfile(user),
      },
    };
  }

  private async appendPasswordChanged(tx: Tx, payload: PasswordChanged): Promise<void> {
    await this.deps.outbox.append(tx, {
      aggregateType: 'user',
      aggregateId: payload.userId,
      eventType: PASSWORD_CHANGED,
      payload,
    });
  }

  /** Mail goes out after commit; a failed send is logged and does not undo the operation. */
  private async deliver(
    template: string,
    user: User,
    send: (sender: EmailSender, to: EmailRecipient) => Promise<void>,
  ): Promise<void> {
    const to = { userId: user.id, email: user.email, displayName: user.displayName };
    try {
      await send(this.deps.emailSender, to);
    } catch (err) {
      this.deps.logger.error(
        { userId: user.id, template, err: err instanceof Error ? err.message : String(err) },
        'Email delivery failed',
      );
    }
  }

  private confirmationLink(userId: string, rawToken: string): string {
    const url = new URL('/confirm-email', this.deps.policy.appBaseUrl);
    url.searchParams.set('userId', userId);
    url.searchParams.set('token', rawToken);
    return url.toString();
  }

  private resetLink(rawToken: string, email: string): string {
    const url = new URL('/reset-password', this.deps.policy.appBaseUrl);
    url.searchParams.set('token', rawToken);
    url.searchParams.set('email', email);
    return url.toString();
  }
}

function accessClaimsFor(user: User, sessionId: string): AccessTokenClaims {
  return {
    userId: user.id,
    username: user.username,
    email: user.email,
    displayName: user.displayName,
    isVerified: user.isVerified,
    sessionId,
  };
}

function invalidRequest(issues: ValidationIssue[]): AuthError {
  return new AuthError('VALIDATION', 'Invalid request', { issues });
}

export type AuthErrorKind = 'UNAUTHORIZED' | 'CONFLICT' | 'VALIDATION' | 'NOT_FOUND' | 'LOCKED';

export class AuthError extends Error {
  constructor(
    public readonly kind: AuthErrorKind,
    message: string,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'AuthError';
  }
}
