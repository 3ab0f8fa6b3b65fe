import { type PoolClient } from 'pg';
import {
  type Notification,
  type NotificationStats,
  type NotificationType,
  type NotificationStatus,
  type NewNotification,
  type NotificationListOptions,
  type NotificationBulkFilter,
  type NotificationRepository,
} from '@murmur/domain';
import { firstRow } from './rows';

interface NotificationRow {
  id: string;
  user_id: string;
  type: NotificationType;
  status: NotificationStatus;
  title: string;
  message: string;
  entity_id: string | null;
  entity_type: string;
  trigger_user_id: string | null;
  action_url: string;
  metadata: Record<string, unknown>;
  created_at: Date;
  read_at: Date | null;
  archived_at: Date | null;
  expires_at: Date | null;
}

const NOTIFICATION_COLUMNS = `id, user_id, type, status, title, message, entity_id, entity_type,
  trigger_user_id, action_url, metadata, created_at, read_at, archived_at, expires_at`;

export class PgNotificationRepository implements NotificationRepository<PoolClient> {
  async create(client: PoolClient, n: NewNotification): Promise<Notification> {
    const result = await client.query<NotificationRow>(
      `INSERT INTO notifications (id, user_id, type, title, message, entity_id, entity_type,
                                  trigger_user_id, action_url, metadata, expires_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
       RETURNING ${NOTIFICATION_COLUMNS}`,
      [
        n.id,
        n.userId,
        n.type,
        n.title,
        n.message,
        n.entityId,
        n.entityType,
        n.triggerUserId,
        n.actionUrl,
        JSON.stringify(n.metadata),
        n.expiresAt,
      ],
    );
    return mapNotificationRow(firstRow(result.rows));
  }

  async createMany(client: PoolClient, notifications: NewNotification[]): Promise<Notification[]> {
    const created: Notification[] = [];
    for (const n of notifications) {
      created.push(await this.create(client, n));
    }
    return created;
  }

  async findById(client: PoolClient, id: string): Promise<Notification | null> {
    const result = await client.query<NotificationRow>(
      `SELECT ${NOTIFICATION_COLUMNS} FROM notifications WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? mapNotificationRow(result.rows[0]) : null;
  }

  async saveState(client: PoolClient, n: Notification): Promise<void> {
    await client.query(
      `UPDATE notifications SET status = $2, read_at = $3, archived_at = $4 WHERE id = $1`,
      [n.id, n.status, n.readAt, n.archivedAt],
    );
  }

  async delete(client: PoolClient, id: string): Promise<boolean> {
    const result = await client.query(`DELETE FROM notifications WHERE id = $1`, [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async listForUser(client: PoolClient, userId: string, opts: NotificationListOptions): Promise<Notification[]> {
    const result = await client.query<NotificationRow>(
      `SELECT ${NOTIFICATION_COLUMNS}
       FROM notifications
       WHERE user_id = $1
         AND ($2::text IS NULL OR status = $2)
         AND ($3::text IS NULL OR type = $3)
       ORDER BY created_at DESC, id DESC
       LIMIT $4 OFFSET $5`,
      [userId, opts.status ?? null, opts.type ?? null, opts.limit, opts.offset],
    );
    return result.rows.map(mapNotificationRow);
  }

  async countUnread(client: PoolClient, userId: string): Promise<number> {
    const result = await client.query<{ count: number }>(
      `SELECT COUNT(*)::int AS count FROM notifications WHERE user_id = $1 AND status = 'UNREAD'`,
      [userId],
    );
    return result.rows[0]?.count ?? 0;
  }

  async stats(client: PoolClient, userId: string): Promise<NotificationStats> {
    const totals = await client.query<{ total: number; unread: number; read: number; archived: number }>(
      `SELECT COUNT(*)::int AS total,
              COUNT(*) FILTER (WHERE status = 'UNREAD')::int AS unread,
              COUNT(*) FILTER (WHERE status = 'READ')::int AS read,
              COUNT(*) FILTER (WHERE status = 'ARCHIVED')::int AS archived
       FROM notifications
       WHERE user_id = $1`,
      [userId],
    );
    const byTypeRows = await client.query<{ type: NotificationType; count: number }>(
      `SELECT type, COUNT(*)::int AS count FROM notifications WHERE user_id = $1 GROUP BY type`,
      [userId],
    );

    const byType: Partial<Record<NotificationType, number>> = {};
    for (const row of byTypeRows.rows) {
      byType[row.type] = row.count;
    }
    const t = totals.rows[0];
    return {
      total: t?.total ?? 0,
      unread: t?.unread ?? 0,
      read: t?.read ?? 0,
      archived: t?.archived ?? 0,
      byType,
    };
  }

  async markAllAsRead(client: PoolClient, userId: string, filter: NotificationBulkFilter): Promise<number> {
    const result = await client.query(
      `UPDATE notifications
       SET status = 'READ', read_at = NOW()
       WHERE user_id = $1
         AND status = 'UNREAD'
         AND ($2::text IS NULL OR type = $2)
         AND ($3::timestamptz IS NULL OR created_at < $3)`,
      [userId, filter.type ?? null, filter.olderThan ?? null],
    );
    return result.rowCount ?? 0;
  }

  async archiveAll(client: PoolClient, userId: string, filter: NotificationBulkFilter): Promise<number> {
    const result = await client.query(
      `UPDATE notifications
       SET status = 'ARCHIVED', archived_at = NOW(), read_at = COALESCE(read_at, NOW())
       WHERE user_id = $1
         AND status <> 'ARCHIVED'
         AND ($2::text IS NULL OR type = $2)
         AND ($3::timestamptz IS NULL OR created_at < $3)`,
      [userId, filter.type ?? null, filter.olderThan ?? null],
    );
    return result.rowCount ?? 0;
  }

  async deleteExpired(client: PoolClient): Promise<number> {
    const result = await client.query(
      `DELETE FROM notifications WHERE expires_at IS NOT NULL AND expires_at < NOW()`,
    );
    return result.rowCount ?? 0;
  }

  async deleteArchivedBefore(client: PoolClient, cutoff: Date): Promise<number> {
    const result = await client.query(
      `DELETE FROM notifications WHERE status = 'ARCHIVED' AND archived_at < $1`,
      [cutoff],
    );
    return result.rowCount ?? 0;
  }
}

function mapNotificationRow(row: NotificationRow): Notification {
  return {
    id: row.id,
    userId: row.user_id,
    type: row.type,
    status: row.status,
    title: row.title,
    message: row.message,
    entityId: row.entity_id,
    entityType: row.entity_type,
    triggerUserId: row.trigger_user_id,
    actionUrl: row.action_url,
    metadata: row.metadata,
    createdAt: row.created_at,
    readAt: row.read_at,
    archivedAt: row.archived_at,
    expiresAt: row.expires_at,
  };
}
