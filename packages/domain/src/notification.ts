import { type NotificationType, type NotificationStatus } from '@murmur/proto';

export type { NotificationType, NotificationStatus };

export interface Notification {
  id: string;
  userId: string;
  type: NotificationType;
  status: NotificationStatus;
  title: string;
  message: string;
  entityId: string | null;
  entityType: string;
  triggerUserId: string | null;
  actionUrl: string;
  metadata: Record<string, unknown>;
  createdAt: Date;
  readAt: Date | null;
  archivedAt: Date | null;
  expiresAt: Date | null;
}

export interface NotificationStats {
  total: number;
  unread: number;
  read: number;
  archived: number;
  byType: Partial<Record<NotificationType, number>>;
}

/** Only an unread notification changes; reading twice keeps the first `readAt`. */
export function markRead(n: Notification, now: Date = new Date()): Notification {
  if (n.status !== 'UNREAD') return n;
  return { ...n, status: 'READ', readAt: now };
}

export function markUnread(n: Notification): Notification {
  return { ...n, status: 'UNREAD', readAt: null, archivedAt: null };
}

export function archive(n: Notification, now: Date = new Date()): Notification {
  return { ...n, status: 'ARCHIVED', archivedAt: now, readAt: n.readAt ?? now };
}

export function unarchive(n: Notification): Notification {
  return { ...n, status: 'READ', archivedAt: null };
}

export function isNotificationExpired(n: Notification, now: Date = new Date()): boolean {
  return n.expiresAt !== null && n.expiresAt.getTime() < now.getTime();
}
