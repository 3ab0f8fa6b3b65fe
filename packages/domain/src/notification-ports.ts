import { type Notification, type NotificationStats, type NotificationType, type NotificationStatus } from './notification';

export interface NewNotification {
  id: string;
  userId: string;
  type: NotificationType;
  title: string;
  message: string;
  entityId: string | null;
  entityType: string;
  triggerUserId: string | null;
  actionUrl: string;
  metadata: Record<string, unknown>;
  expiresAt: Date | null;
}

export interface NotificationListOptions {
  status?: NotificationStatus;
  type?: NotificationType;
  limit: number;
  offset: number;
}

export interface NotificationBulkFilter {
  type?: NotificationType;
  olderThan?: Date;
}

export interface NotificationRepository<Tx = unknown> {
  create(tx: Tx, notification: NewNotification): Promise<Notification>;
  createMany(tx: Tx, notifications: NewNotification[]): Promise<Notification[]>;
  findById(tx: Tx, id: string): Promise<Notification | null>;
  /** Persists `status`, `readAt` and `archivedAt`. */
  saveState(tx: Tx, notification: Notification): Promise<void>;
  delete(tx: Tx, id: string): Promise<boolean>;
  /** Newest first. */
  listForUser(tx: Tx, userId: string, opts: NotificationListOptions): Promise<Notification[]>;
  countUnread(tx: Tx, userId: string): Promise<number>;
  stats(tx: Tx, userId: string): Promise<NotificationStats>;
  markAllAsRead(tx: Tx, userId: string, filter: NotificationBulkFilter): Promise<number>;
  archiveAll(tx: Tx, userId: string, filter: NotificationBulkFilter): Promise<number>;
  deleteExpired(tx: Tx): Promise<number>;
  deleteArchivedBefore(tx: Tx, cutoff: Date): Promise<number>;
}
