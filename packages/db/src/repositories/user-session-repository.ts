import { type PoolClient } from 'pg';
import { type UserSession, type NewUserSession, type UserSessionRepository } from '@murmur/domain';
import { firstRow } from './rows';

interface SessionRow {
  id: string;
  user_id: string;
  session_id: string;
  created_at: Date;
  last_activity_at: Date;
  expires_at: Date;
  is_active: boolean;
  ip_address: string | null;
  user_agent: string | null;
  device_info: string | null;
  location: string | null;
}

const SESSION_COLUMNS = `id, user_id, session_id, created_at, last_activity_at, expires_at, is_active,
  ip_address, user_agent, device_info, location`;

export class PgUserSessionRepository implements UserSessionRepository<PoolClient> {
  async create(client: PoolClient, session: NewUserSession): Promise<UserSession> {
    const result = await client.query<SessionRow>(
      `INSERT INTO user_sessions (id, user_id, session_id, expires_at, ip_address, user_agent, device_info, location)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING ${SESSION_COLUMNS}`,
      [
        session.id,
        session.userId,
        session.sessionId,
        session.expiresAt,
        session.ipAddress,
        session.userAgent,
        session.deviceInfo,
        session.location,
      ],
    );
    return mapSessionRow(firstRow(result.rows));
  }

  async findBySessionId(client: PoolClient, sessionId: string): Promise<UserSession | null> {
    const result = await client.query<SessionRow>(
      `SELECT ${SESSION_COLUMNS} FROM user_sessions WHERE session_id = $1`,
      [sessionId],
    );
    return result.rows[0] ? mapSessionRow(result.rows[0]) : null;
  }

  async listActiveForUser(client: PoolClient, userId: string): Promise<UserSession[]> {
    const result = await client.query<SessionRow>(
      `SELECT ${SESSION_COLUMNS}
       FROM user_sessions
       WHERE user_id = $1 AND is_active AND expires_at > NOW()
       ORDER BY last_activity_at DESC`,
      [userId],
    );
    return result.rows.map(mapSessionRow);
  }

  async touch(client: PoolClient, sessionId: string): Promise<void> {
    await client.query(`UPDATE user_sessions SET last_activity_at = NOW() WHERE session_id = $1`, [sessionId]);
  }

  async deactivate(client: PoolClient, sessionId: string): Promise<void> {
    await client.query(`UPDATE user_sessions SET is_active = FALSE WHERE session_id = $1`, [sessionId]);
  }

  async deactivateAllForUser(client: PoolClient, userId: string): Promise<number> {
    const result = await client.query(
      `UPDATE user_sessions SET is_active = FALSE WHERE user_id = $1 AND is_active`,
      [userId],
    );
    return result.rowCount ?? 0;
  }

  async deleteExpired(client: PoolClient, olderThanDays: number): Promise<number> {
    const result = await client.query(
      `DELETE FROM user_sessions
       WHERE expires_at < NOW() - make_interval(days => $1)
          OR (NOT is_active AND last_activity_at < NOW() - make_interval(days => $1))`,
      [olderThanDays],
    );
    return result.rowCount ?? 0;
  }
}

function mapSessionRow(row: SessionRow): UserSession {
  return {
    id: row.id,
    userId: row.user_id,
    sessionId: row.session_id,
    createdAt: row.created_at,
    lastActivityAt: row.last_activity_at,
    expiresAt: row.expires_at,
    isActive: row.is_active,
    ipAddress: row.ip_address,
    userAgent: row.user_agent,
    deviceInfo: row.device_info,
    location: row.location,
  };
}
