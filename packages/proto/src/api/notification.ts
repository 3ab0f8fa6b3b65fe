import { z } from 'zod';

export const NotificationTypeSchema = z.enum(['LIKE', 'COMMENT', 'FOLLOW', 'MENTION', 'POST', 'SYSTEM']);
export const NotificationStatusSchema = z.enum(['UNREAD', 'READ', 'ARCHIVED']);

export const CreateNotificationRequestSchema = z.object({
  userId: z.string().min(1),
  type: NotificationTypeSchema,
  title: z.string().trim().min(1, 'Title is required').max(200),
  message: z.string().trim().min(1, 'Message is required').max(1000),
  entityId: z.string().min(1).optional(),
  entityType: z.string().max(50).optional(),
  triggerUserId: z.string().min(1).optional(),
  actionUrl: z.string().max(500).optional(),
  metadata: z.record(z.unknown()).default({}),
  expiresAt: z.coerce.date().optional(),
});

export const ListNotificationsQuerySchema = z.object({
  status: NotificationStatusSchema.optional(),
  type: NotificationTypeSchema.optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

export const BulkNotificationFilterSchema = z.object({
  type: NotificationTypeSchema.optional(),
  olderThan: z.coerce.date().optional(),
});

export type NotificationType = z.infer<typeof NotificationTypeSchema>;
export type NotificationStatus = z.infer<typeof NotificationStatusSchema>;
export type CreateNotificationRequestInput = z.input<typeof CreateNotificationRequestSchema>;
export type CreateNotificationRequest = z.infer<typeof CreateNotificationRequestSchema>;
export type ListNotificationsQueryInput = z.input<typeof ListNotificationsQuerySchema>;
export type ListNotificationsQuery = z.infer<typeof ListNotificationsQuerySchema>;
export type BulkNotificationFilter = z.infer<typeof BulkNotificationFilterSchema>;
