import { type PoolClient } from 'pg';
import {
  type PasswordResetToken,
  type NewPasswordResetToken,
  type PasswordResetTokenRepository,
} from '@murmur/domain';
import { firstRow } from './rows';

interface ResetTokenRow {
  id: string;
  user_id: string;
  token_hash: string;
  expires_at: Date;
  used_at: Date | null;
  ip_address: string | null;
  created_at: Date;
}

const RESET_COLUMNS = 'id, user_id, token_hash, expires_at, used_at, ip_address, created_at';

export class PgPasswordResetTokenRepository implements PasswordResetTokenRepository<PoolClient> {
  async create(client: PoolClient, token: NewPasswordResetToken): Promise<PasswordResetToken> {
    const result = await client.query<ResetTokenRow>(
      `INSERT INTO password_reset_tokens (id, user_id, token_hash, expires_at, ip_address)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${RESET_COLUMNS}`,
      [token.id, token.userId, token.tokenHash, token.expiresAt, token.ipAddress],
    );
    return mapResetRow(firstRow(result.rows));
  }

  async findByTokenHash(client: PoolClient, hash: string): Promise<PasswordResetToken | null> {
    const result = await client.query<ResetTokenRow>(
      `SELECT ${RESET_COLUMNS} FROM password_reset_tokens WHERE token_hash = $1 FOR UPDATE`,
      [hash],
    );
    return result.rows[0] ? mapResetRow(result.rows[0]) : null;
  }

  async markUsed(client: PoolClient, id: string): Promise<void> {
    await client.query(`UPDATE password_reset_tokens SET used_at = NOW() WHERE id = $1`, [id]);
  }

  async invalidateAllForUser(client: PoolClient, userId: string): Promise<number> {
    const result = await client.query(
      `UPDATE password_reset_tokens SET used_at = NOW() WHERE user_id = $1 AND used_at IS NULL`,
      [userId],
    );
    return result.rowCount ?? 0;
  }

  async deleteExpired(client: PoolClient, olderThanDays: number): Promise<number> {
    const result = await client.query(
      `DELETE FROM password_reset_tokens
       WHERE (expires_at < NOW() - make_interval(days => $1))
          OR (used_at IS NOT NULL AND used_at < NOW() - make_interval(days => $1))`,
      [olderThanDays],
    );
    return result.rowCount ?? 0;
  }
}

function mapResetRow(row: ResetTokenRow): PasswordResetToken {
  return {
    id: row.id,
    userId: row.user_id,
    tokenHash: row.token_hash,
    expiresAt: row.expires_at,
    usedAt: row.used_at,
    ipAddress: row.ip_address,
    createdAt: row.created_at,
  };
}
