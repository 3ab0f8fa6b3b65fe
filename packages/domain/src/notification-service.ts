import {
  CreateNotificationRequestSchema,
  ListNotificationsQuerySchema,
  BulkNotificationFilterSchema,
  type CreateNotificationRequestInput,
  type CreateNotificationRequest,
  type ListNotificationsQueryInput,
  type BulkNotificationFilter,
} from '@murmur/proto';
import {
  markRead,
  markUnread,
  archive,
  unarchive,
  type Notification,
  type NotificationStats,
} from './notification';
import { type NotificationRepository, type NewNotification } from './notification-ports';
import { type UserRepository, type DomainLogger, type TransactionRunner } from './ports';
import { addDays } from './auth';
import { parseRequest, type ValidationIssue } from './validation';

export const ARCHIVED_RETENTION_DAYS = 90;

export interface NotificationServiceDeps<Tx = unknown> {
  notificationRepo: NotificationRepository<Tx>;
  userRepo: Pick<UserRepository<Tx>, 'findById'>;
  logger: DomainLogger;
  generateId: () => string;
  withTransaction: TransactionRunner<Tx>;
}

export class NotificationService<Tx = unknown> {
  constructor(private readonly deps: NotificationServiceDeps<Tx>) {}

  async create(input: CreateNotificationRequestInput): Promise<Notification> {
    const request = parseRequest(CreateNotificationRequestSchema, input, invalidRequest);
    const notification = await this.deps.withTransaction((tx) =>
      this.deps.notificationRepo.create(tx, this.toNew(request)),
    );
    this.deps.logger.debug({ notificationId: notification.id, type: notification.type }, 'Notification created');
    return notification;
  }

  async createBulk(inputs: CreateNotificationRequestInput[]): Promise<Notification[]> {
    const requests = inputs.map((input) => parseRequest(CreateNotificationRequestSchema, input, invalidRequest));
    if (requests.length === 0) return [];
    return this.deps.withTransaction((tx) =>
      this.deps.notificationRepo.createMany(
        tx,
        requests.map((r) => this.toNew(r)),
      ),
    );
  }

  async notifyLike(recipientId: string, postId: string, triggerUserId: string): Promise<Notification | null> {
    if (recipientId === triggerUserId) return null;
    const name = await this.triggerName(triggerUserId);
    return this.create({
      userId: recipientId,
      type: 'LIKE',
      title: 'New Like',
      message: `${name} liked your post`,
      entityId: postId,
      entityType: 'Post',
      triggerUserId,
      actionUrl: `/posts/${postId}`,
    });
  }

  async notifyComment(
    recipientId: string,
    postId: string,
    commentId: string,
    triggerUserId: string,
  ): Promise<Notification | null> {
    if (recipientId === triggerUserId) return null;
    const name = await this.triggerName(triggerUserId);
    return this.create({
      userId: recipientId,
      type: 'COMMENT',
      title: 'New Comment',
      message: `${name} commented on your post`,
      entityId: commentId,
      entityType: 'Comment',
      triggerUserId,
      actionUrl: `/posts/${postId}#comment-${commentId}`,
      metadata: { postId },
    });
  }

  async notifyFollow(recipientId: string, triggerUserId: string): Promise<Notification | null> {
    if (recipientId === triggerUserId) return null;
    const name = await this.triggerName(triggerUserId);
    return this.create({
      userId: recipientId,
      type: 'FOLLOW',
      title: 'New Follower',
      message: `${name} started following you`,
      entityId: triggerUserId,
      entityType: 'User',
      triggerUserId,
      actionUrl: `/users/${triggerUserId}`,
    });
  }

  async notifyMention(
    recipientId: string,
    postId: string,
    triggerUserId: string,
    commentId?: string,
  ): Promise<Notification | null> {
    if (recipientId === triggerUserId) return null;
    const name = await this.triggerName(triggerUserId);
    return this.create({
      userId: recipientId,
      type: 'MENTION',
      title: 'You were mentioned',
      message: commentId ? `${name} mentioned you in a comment` : `${name} mentioned you in a post`,
      entityId: postId,
      entityType: 'Post',
      triggerUserId,
      actionUrl: commentId ? `/posts/${postId}#comment-${commentId}` : `/posts/${postId}`,
      metadata: commentId ? { commentId } : {},
    });
  }

  async get(userId: string, id: string): Promise<Notification> {
    return this.deps.withTransaction((tx) => this.findOwned(tx, userId, id));
  }

  async list(userId: string, query: ListNotificationsQueryInput = {}): Promise<Notification[]> {
    const opts = parseRequest(ListNotificationsQuerySchema, query, invalidRequest);
    return this.deps.withTransaction((tx) => this.deps.notificationRepo.listForUser(tx, userId, opts));
  }

  async getUnreadCount(userId: string): Promise<number> {
    return this.deps.withTransaction((tx) => this.deps.notificationRepo.countUnread(tx, userId));
  }

  async getStats(userId: string): Promise<NotificationStats> {
    return this.deps.withTransaction((tx) => this.deps.notificationRepo.stats(tx, userId));
  }

  async markAsRead(userId: string, id: string): Promise<Notification> {
    return this.transition(userId, id, (n) => markRead(n));
  }

  async markAsUnread(userId: string, id: string): Promise<Notification> {
    return this.transition(userId, id, markUnread);
  }

  async archive(userId: string, id: string): Promise<Notification> {
    return this.transition(userId, id, (n) => archive(n));
  }

  async unarchive(userId: string, id: string): Promise<Notification> {
    return this.transition(userId, id, unarchive);
  }

  async markAllAsRead(userId: string, filter: BulkNotificationFilter = {}): Promise<number> {
    const parsed = parseRequest(BulkNotificationFilterSchema, filter, invalidRequest);
    const count = await this.deps.withTransaction((tx) =>
      this.deps.notificationRepo.markAllAsRead(tx, userId, parsed),
    );
    this.deps.logger.info({ userId, count }, 'Notifications marked as read');
    return count;
  }

  async archiveAll(userId: string, filter: BulkNotificationFilter = {}): Promise<number> {
    const parsed = parseRequest(BulkNotificationFilterSchema, filter, invalidRequest);
    const count = await this.deps.withTransaction((tx) => this.deps.notificationRepo.archiveAll(tx, userId, parsed));
    this.deps.logger.info({ userId, count }, 'Notifications archived');
    return count;
  }

  async delete(userId: string, id: string): Promise<boolean> {
    return this.deps.withTransaction(async (tx) => {
      const existing = await this.deps.notificationRepo.findById(tx, id);
      if (!existing || existing.userId !== userId) return false;
      return this.deps.notificationRepo.delete(tx, id);
    });
  }

  async cleanupExpired(): Promise<number> {
    const count = await this.deps.withTransaction((tx) => this.deps.notificationRepo.deleteExpired(tx));
    this.deps.logger.info({ count }, 'Expired notifications deleted');
    return count;
  }

  async cleanupArchived(olderThanDays: number = ARCHIVED_RETENTION_DAYS): Promise<number> {
    const cutoff = addDays(new Date(), -olderThanDays);
    const count = await this.deps.withTransaction((tx) =>
      this.deps.notificationRepo.deleteArchivedBefore(tx, cutoff),
    );
    this.deps.logger.info({ count, olderThanDays }, 'Archived notifications deleted');
    return count;
  }

  private async transition(
    userId: string,
    id: string,
    apply: (n: Notification) => Notification,
  ): Promise<Notification> {
    return this.deps.withTransaction(async (tx) => {
      const current = await this.findOwned(tx, userId, id);
      const next = apply(current);
      if (next !== current) {
        await this.deps.notificationRepo.saveState(tx, next);
      }
      return next;
    });
  }

  private async findOwned(tx: Tx, userId: string, id: string): Promise<Notification> {
    const notification = await this.deps.notificationRepo.findById(tx, id);
    // Someone else's notification looks the same as a missing one.
    if (!notification || notification.userId !== userId) {
      throw new NotificationError('NOT_FOUND', 'Notification not found');
    }
    return notification;
  }

  private async triggerName(triggerUserId: string): Promise<string> {
    const user = await this.deps.withTransaction((tx) => this.deps.userRepo.findById(tx, triggerUserId));
    return user?.displayName ?? 'Someone';
  }

  private toNew(request: CreateNotificationRequest): NewNotification {
    return {
      id: this.deps.generateId(),
      userId: request.userId,
      type: request.type,
      title: request.title,
      message: request.message,
      entityId: request.entityId ?? null,
      entityType: request.entityType ?? '',
      triggerUserId: request.triggerUserId ?? null,
      actionUrl: request.actionUrl ?? '',
      metadata: request.metadata,
      expiresAt: request.expiresAt ?? null,
    };
  }
}

function invalidRequest(issues: ValidationIssue[]): NotificationError {
  return new NotificationError('VALIDATION', 'Invalid notification request', { issues });
}

export class NotificationError extends Error {
  constructor(
    public readonly kind: 'VALIDATION' | 'NOT_FOUND',
    message: string,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'NotificationError';
  }
}
