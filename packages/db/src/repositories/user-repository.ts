import { type PoolClient } from 'pg';
import {
  type User,
  type NewUser,
  type UserRepository,
  type LoginFailureState,
  type LoginFailureUpdate,
} from '@murmur/domain';
import { firstRow } from './rows';

const USER_COLUMNS = `id, email, username, display_name, bio, website, location, birth_date,
  is_private, is_verified, password_hash, last_login_at, password_changed_at,
  failed_login_attempts, lockout_end_at, is_email_confirmed, email_confirmation_token_hash,
  created_at, updated_at`;

interface UserRow {
  id: string;
  email: string;
  username: string;
  display_name: string;
  bio: string;
  website: string;
  location: string;
  birth_date: Date | null;
  is_private: boolean;
  is_verified: boolean;
  password_hash: string;
  last_login_at: Date | null;
  password_changed_at: Date | null;
  failed_login_attempts: number;
  lockout_end_at: Date | null;
  is_email_confirmed: boolean;
  email_confirmation_token_hash: string | null;
  created_at: Date;
  updated_at: Date;
}

export class PgUserRepository implements UserRepository<PoolClient> {
  async create(client: PoolClient, user: NewUser): Promise<User | null> {
    const result = await client.query<UserRow>(
      `INSERT INTO users (id, email, username, display_name, password_hash, bio, website, location,
                          birth_date, email_confirmation_token_hash)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       ON CONFLICT DO NOTHING
       RETURNING ${USER_COLUMNS}`,
      [
        user.id,
        user.email,
        user.username,
        user.displayName,
        user.passwordHash,
        user.bio,
        user.website,
        user.location,
        user.birthDate,
        user.emailConfirmationTokenHash,
      ],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async findById(client: PoolClient, id: string): Promise<User | null> {
    const result = await client.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async findByEmail(client: PoolClient, email: string): Promise<User | null> {
    const result = await client.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE email = lower($1)`, [
      email,
    ]);
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async findByUsername(client: PoolClient, username: string): Promise<User | null> {
    const result = await client.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE username = lower($1)`, [
      username,
    ]);
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async findByUsernames(client: PoolClient, usernames: string[]): Promise<User[]> {
    if (usernames.length === 0) return [];
    const result = await client.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE username = ANY($1::text[])`,
      [usernames],
    );
    return result.rows.map(mapUserRow);
  }

  async recordLoginFailure(client: PoolClient, id: string, update: LoginFailureUpdate): Promise<LoginFailureState> {
    // SET expressions see the pre-update row, so concurrent failures each count.
    const result = await client.query<{ failed_login_attempts: number; lockout_end_at: Date | null }>(
      `UPDATE users
       SET failed_login_attempts = failed_login_attempts + 1,
           lockout_end_at = CASE
             WHEN failed_login_attempts + 1 >= $2 THEN $3
             ELSE lockout_end_at
           END,
           updated_at = NOW()
       WHERE id = $1
       RETURNING failed_login_attempts, lockout_end_at`,
      [id, update.maxFailedAttempts, update.lockoutEndAt],
    );
    const row = firstRow(result.rows);
    return { failedLoginAttempts: row.failed_login_attempts, lockoutEndAt: row.lockout_end_at };
  }

  async recordLoginSuccess(client: PoolClient, id: string): Promise<void> {
    await client.query(
      `UPDATE users
       SET last_login_at = NOW(), failed_login_attempts = 0, lockout_end_at = NULL, updated_at = NOW()
       WHERE id = $1`,
      [id],
    );
  }

  async updatePassword(client: PoolClient, id: string, passwordHash: string): Promise<void> {
    await client.query(
      `UPDATE users
       SET password_hash = $2,
           password_changed_at = NOW(),
           failed_login_attempts = 0,
           lockout_end_at = NULL,
           updated_at = NOW()
       WHERE id = $1`,
      [id, passwordHash],
    );
  }

  async setEmailConfirmationToken(client: PoolClient, id: string, tokenHash: string): Promise<void> {
    await client.query(
      `UPDATE users SET email_confirmation_token_hash = $2, updated_at = NOW() WHERE id = $1`,
      [id, tokenHash],
    );
  }

  async confirmEmail(client: PoolClient, id: string): Promise<void> {
    await client.query(
      `UPDATE users
       SET is_email_confirmed = TRUE, email_confirmation_token_hash = NULL, updated_at = NOW()
       WHERE id = $1`,
      [id],
    );
  }
}

function mapUserRow(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    username: row.username,
    displayName: row.display_name,
    bio: row.bio,
    website: row.website,
    location: row.location,
    birthDate: row.birth_date,
    isPrivate: row.is_private,
    isVerified: row.is_verified,
    passwordHash: row.password_hash,
    lastLoginAt: row.last_login_at,
    passwordChangedAt: row.password_changed_at,
    failedLoginAttempts: row.failed_login_attempts,
    lockoutEndAt: row.lockout_end_at,
    isEmailConfirmed: row.is_email_confirmed,
    emailConfirmationTokenHash: row.email_confirmation_token_hash,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
