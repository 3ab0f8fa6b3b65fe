import {
  POST_LIKED,
  POST_COMMENTED,
  USER_FOLLOWED,
  USER_MENTIONED,
  PostLikedPayload,
  PostCommentedPayload,
  UserFollowedPayload,
  UserMentionedPayload,
} from '@murmur/proto';
import { type NotificationService, type DomainLogger } from '@murmur/domain';
import { withTransaction, fetchUnpublishedEvents, markPublished, markFailed, type OutboxEvent } from '@murmur/db';
import { createLogger, errorMessage } from '@murmur/shared';

export type EventNotifier = Pick<NotificationService, 'notifyLike' | 'notifyComment' | 'notifyFollow' | 'notifyMention'>;

export type DispatchOutcome = 'handled' | 'ignored' | 'malformed';

/**
 * Turns one social event into the notification it implies. Event types
 * without a handler are ignored; a payload that fails its schema comes back
 * as `malformed` instead of throwing.
 */
export async function handleOutboxEvent(
  event: Pick<OutboxEvent, 'eventType' | 'payload'>,
  notifier: EventNotifier,
): Promise<DispatchOutcome> {
  switch (event.eventType) {
    case POST_LIKED: {
      const parsed = PostLikedPayload.safeParse(event.payload);
      if (!parsed.success) return 'malformed';
      const { postAuthorId, postId, userId } = parsed.data;
      await notifier.notifyLike(postAuthorId, postId, userId);
      return 'handled';
    }
    case POST_COMMENTED: {
      const parsed = PostCommentedPayload.safeParse(event.payload);
      if (!parsed.success) return 'malformed';
      const { postAuthorId, postId, commentId, userId } = parsed.data;
      await notifier.notifyComment(postAuthorId, postId, commentId, userId);
      return 'handled';
    }
    case USER_FOLLOWED: {
      const parsed = UserFollowedPayload.safeParse(event.payload);
      if (!parsed.success) return 'malformed';
      await notifier.notifyFollow(parsed.data.followeeId, parsed.data.followerId);
      return 'handled';
    }
    case USER_MENTIONED: {
      const parsed = UserMentionedPayload.safeParse(event.payload);
      if (!parsed.success) return 'malformed';
      const { mentionedUserId, postId, userId, commentId } = parsed.data;
      await notifier.notifyMention(mentionedUserId, postId, userId, commentId);
      return 'handled';
    }
    default:
      return 'ignored';
  }
}

export interface BatchResult {
  /** Handled, ignored and malformed events alike; none of them should be seen again. */
  done: string[];
  failed: Array<{ id: string; error: string }>;
}

export async function dispatchBatch(
  events: OutboxEvent[],
  notifier: EventNotifier,
  logger: DomainLogger,
): Promise<BatchResult> {
  const result: BatchResult = { done: [], failed: [] };
  for (const event of events) {
    try {
      const outcome = await handleOutboxEvent(event, notifier);
      if (outcome === 'malformed') {
        logger.warn({ eventId: event.id, eventType: event.eventType }, 'Malformed outbox payload skipped');
      }
      result.done.push(event.id);
    } catch (err) {
      const error = errorMessage(err);
      logger.error(
        { eventId: event.id, eventType: event.eventType, attempt: event.retryCount + 1, err: error },
        'Outbox event handler failed',
      );
      result.failed.push({ id: event.id, error });
    }
  }
  return result;
}

export interface OutboxDispatcherOptions {
  pollIntervalMs: number;
  batchSize: number;
  maxAttempts: number;
}

const logger = createLogger({ name: 'worker:outbox' });

export function startOutboxDispatcher(notifier: EventNotifier, opts: OutboxDispatcherOptions): { stop: () => void } {
  let running = true;

  const loop = async () => {
    while (running) {
      try {
        const result = await withTransaction(async (client) => {
          const events = await fetchUnpublishedEvents(client, opts.batchSize, opts.maxAttempts);
          const batch = await dispatchBatch(events, notifier, logger);
          await markPublished(client, batch.done);
          for (const failure of batch.failed) {
            await markFailed(client, failure.id, failure.error);
          }
          return batch;
        });
        if (result.done.length > 0 || result.failed.length > 0) {
          logger.info({ done: result.done.length, failed: result.failed.length }, 'Dispatched outbox events');
        }
      } catch (err) {
        logger.error({ err: errorMessage(err) }, 'Outbox dispatcher error');
      }

      await sleep(opts.pollIntervalMs);
    }
  };

  loop().catch((err: unknown) => {
    logger.fatal({ err: errorMessage(err) }, 'Outbox dispatcher crashed');
  });

  return {
    stop: () => {
      running = false;
    },
  };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
