export interface User {
  id: string;
  email: string;
  username: string;
  displayName: string;
  bio: string;
  website: string;
  location: string;
  birthDate: Date | null;
  isPrivate: boolean;
  isVerified: boolean;
  passwordHash: string;
  lastLoginAt: Date | null;
  passwordChangedAt: Date | null;
  failedLoginAttempts: number;
  lockoutEndAt: Date | null;
  isEmailConfirmed: boolean;
  emailConfirmationTokenHash: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/** What callers outside the auth boundary may see of a user. */
export interface UserProfile {
  id: string;
  email: string;
  username: string;
  displayName: string;
  bio: string;
  website: string;
  location: string;
  birthDate: Date | null;
  isPrivate: boolean;
  isVerified: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface RefreshToken {
  id: string;
  userId: string;
  sessionId: string;
  familyId: string;
  tokenHash: string;
  expiresAt: Date;
  usedAt: Date | null;
  revokedAt: Date | null;
  revokedReason: string | null;
  revokedByIp: string | null;
  replacedByTokenId: string | null;
  ipAddress: string | null;
  userAgent: string | null;
  createdAt: Date;
}

export interface PasswordResetToken {
  id: string;
  userId: string;
  tokenHash: string;
  expiresAt: Date;
  usedAt: Date | null;
  ipAddress: string | null;
  createdAt: Date;
}

export interface UserSession {
  id: string;
  userId: string;
  sessionId: string;
  createdAt: Date;
  lastActivityAt: Date;
  expiresAt: Date;
  isActive: boolean;
  ipAddress: string | null;
  userAgent: string | null;
  deviceInfo: string | null;
  location: string | null;
}
