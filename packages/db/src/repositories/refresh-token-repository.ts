import { type PoolClient } from 'pg';
import {
  type RefreshToken,
  type NewRefreshToken,
  type RefreshTokenRepository,
  type Revocation,
} from '@murmur/domain';
import { firstRow } from './rows';

const TOKEN_COLUMNS = `id, user_id, session_id, family_id, token_hash, expires_at, used_at,
  revoked_at, revoked_reason, revoked_by_ip, replaced_by_token_id, ip_address, user_agent, created_at`;

interface RefreshTokenRow {
  id: string;
  user_id: string;
  session_id: string;
  family_id: string;
  token_hash: string;
  expires_at: Date;
  used_at: Date | null;
  revoked_at: Date | null;
  revoked_reason: string | null;
  revoked_by_ip: string | null;
  replaced_by_token_id: string | null;
  ip_address: string | null;
  user_agent: string | null;
  created_at: Date;
}

export class PgRefreshTokenRepository implements RefreshTokenRepository<PoolClient> {
  async create(client: PoolClient, token: NewRefreshToken): Promise<RefreshToken> {
    const result = await client.query<RefreshTokenRow>(
      `INSERT INTO refresh_tokens (id, user_id, session_id, family_id, token_hash, expires_at, ip_address, user_agent)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING ${TOKEN_COLUMNS}`,
      [
        token.id,
        token.userId,
        token.sessionId,
        token.familyId,
        token.tokenHash,
        token.expiresAt,
        token.ipAddress,
        token.userAgent,
      ],
    );
    return mapRefreshRow(firstRow(result.rows));
  }

  async findByTokenHash(client: PoolClient, hash: string): Promise<RefreshToken | null> {
    const result = await client.query<RefreshTokenRow>(
      `SELECT ${TOKEN_COLUMNS} FROM refresh_tokens WHERE token_hash = $1 FOR UPDATE`,
      [hash],
    );
    return result.rows[0] ? mapRefreshRow(result.rows[0]) : null;
  }

  async markReplaced(
    client: PoolClient,
    id: string,
    replacedByTokenId: string,
    ipAddress: string | null,
  ): Promise<void> {
    await client.query(
      `UPDATE refresh_tokens
       SET used_at = NOW(),
           revoked_at = NOW(),
           revoked_reason = 'Replaced by new token',
           revoked_by_ip = $3,
           replaced_by_token_id = $2
       WHERE id = $1`,
      [id, replacedByTokenId, ipAddress],
    );
  }

  async revoke(client: PoolClient, id: string, revocation: Revocation): Promise<void> {
    await client.query(
      `UPDATE refresh_tokens
       SET revoked_at = NOW(), revoked_reason = $2, revoked_by_ip = $3
       WHERE id = $1 AND revoked_at IS NULL`,
      [id, revocation.reason, revocation.ipAddress],
    );
  }

  async revokeFamily(client: PoolClient, familyId: string, revocation: Revocation): Promise<number> {
    return this.revokeWhere(client, 'family_id', familyId, revocation);
  }

  async revokeAllForUser(client: PoolClient, userId: string, revocation: Revocation): Promise<number> {
    return this.revokeWhere(client, 'user_id', userId, revocation);
  }

  async revokeAllForSession(client: PoolClient, sessionId: string, revocation: Revocation): Promise<number> {
    return this.revokeWhere(client, 'session_id', sessionId, revocation);
  }

  async deleteExpired(client: PoolClient, olderThanDays: number): Promise<number> {
    const result = await client.query(
      `DELETE FROM refresh_tokens
       WHERE (expires_at < NOW() - make_interval(days => $1))
          OR (revoked_at IS NOT NULL AND revoked_at < NOW() - make_interval(days => $1))`,
      [olderThanDays],
    );
    return result.rowCount ?? 0;
  }

  private async revokeWhere(
    client: PoolClient,
    column: 'family_id' | 'user_id' | 'session_id',
    value: string,
    revocation: Revocation,
  ): Promise<number> {
    const result = await client.query(
      `UPDATE refresh_tokens
       SET revoked_at = NOW(), revoked_reason = $2, revoked_by_ip = $3
       WHERE ${column} = $1 AND revoked_at IS NULL`,
      [value, revocation.reason, revocation.ipAddress],
    );
    return result.rowCount ?? 0;
  }
}

function mapRefreshRow(row: RefreshTokenRow): RefreshToken {
  return {
    id: row.id,
    userId: row.user_id,
    sessionId: row.session_id,
    familyId: row.family_id,
    tokenHash: row.token_hash,
    expiresAt: row.expires_at,
    usedAt: row.used_at,
    revokedAt: row.revoked_at,
    revokedReason: row.revoked_reason,
    revokedByIp: row.revoked_by_ip,
    replacedByTokenId: row.replaced_by_token_id,
    ipAddress: row.ip_address,
    userAgent: row.user_agent,
    createdAt: row.created_at,
  };
}
