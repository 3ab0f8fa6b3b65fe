import {
  CommentContentSchema,
  POST_LIKED,
  POST_COMMENTED,
  USER_FOLLOWED,
  USER_MENTIONED,
  type UserMentioned,
} from '@murmur/proto';
import { extractMentions, type Comment, type Follow, type Like } from './social';
import { type PostRepository, type CommentRepository, type LikeRepository, type FollowRepository } from './social-ports';
import { type UserRepository, type OutboxPort, type DomainLogger, type TransactionRunner } from './ports';
import { parseRequest, type ValidationIssue } from './validation';

export interface SocialServiceDeps<Tx = unknown> {
  userRepo: Pick<UserRepository<Tx>, 'findById' | 'findByUsernames'>;
  postRepo: PostRepository<Tx>;
  commentRepo: CommentRepository<Tx>;
  likeRepo: LikeRepository<Tx>;
  followRepo: FollowRepository<Tx>;
  outbox: OutboxPort<Tx>;
  logger: DomainLogger;
  generateId: () => string;
  withTransaction: TransactionRunner<Tx>;
}

export class SocialService<Tx = unknown> {
  constructor(private readonly deps: SocialServiceDeps<Tx>) {}

  async follow(followerId: string, followeeId: string): Promise<Follow> {
    if (followerId === followeeId) {
      throw new SocialError('VALIDATION', 'You cannot follow yourself');
    }
    const { userRepo, followRepo, outbox, generateId } = this.deps;

    const follow = await this.deps.withTransaction(async (tx) => {
      const followee = await userRepo.findById(tx, followeeId);
      if (!followee) {
        throw new SocialError('NOT_FOUND', 'User not found');
      }
      if (await followRepo.exists(tx, followerId, followeeId)) {
        throw new SocialError('CONFLICT', 'Already following this user');
      }

      const follow = await followRepo.create(tx, { id: generateId(), followerId, followeeId });
      if (!follow) {
        throw new SocialError('CONFLICT', 'Already following this user');
      }
      await outbox.append(tx, {
        aggregateType: 'user',
        aggregateId: followeeId,
        eventType: USER_FOLLOWED,
        payload: { followerId, followeeId },
      });
      return follow;
    });

    this.deps.logger.info({ followerId, followeeId }, 'User followed');
    return follow;
  }

  async unfollow(followerId: string, followeeId: string): Promise<boolean> {
    return this.deps.withTransaction((tx) => this.deps.followRepo.delete(tx, followerId, followeeId));
  }

  async isFollowing(followerId: string, followeeId: string): Promise<boolean> {
    return this.deps.withTransaction((tx) => this.deps.followRepo.exists(tx, followerId, followeeId));
  }

  async likePost(userId: string, postId: string): Promise<Like> {
    const { postRepo, likeRepo, outbox, generateId } = this.deps;

    const like = await this.deps.withTransaction(async (tx) => {
      const post = await postRepo.findById(tx, postId);
      if (!post) {
        throw new SocialError('NOT_FOUND', 'Post not found');
      }
      if (post.authorId === userId) {
        throw new SocialError('VALIDATION', 'You cannot like your own post');
      }
      if (await likeRepo.exists(tx, userId, postId)) {
        throw new SocialError('CONFLICT', 'Post already liked');
      }

      const like = await likeRepo.create(tx, { id: generateId(), userId, postId });
      if (!like) {
        throw new SocialError('CONFLICT', 'Post already liked');
      }
      await outbox.append(tx, {
        aggregateType: 'post',
        aggregateId: postId,
        eventType: POST_LIKED,
        payload: { postId, postAuthorId: post.authorId, userId },
      });
      return like;
    });

    this.deps.logger.info({ userId, postId }, 'Post liked');
    return like;
  }

  async unlikePost(userId: string, postId: string): Promise<boolean> {
    return this.deps.withTransaction((tx) => this.deps.likeRepo.delete(tx, userId, postId));
  }

  async hasLiked(userId: string, postId: string): Promise<boolean> {
    return this.deps.withTransaction((tx) => this.deps.likeRepo.exists(tx, userId, postId));
  }

  async commentOnPost(userId: string, postId: string, content: string): Promise<Comment> {
    const text = parseRequest(CommentContentSchema, content, invalidRequest);
    const { userRepo, postRepo, commentRepo, outbox, generateId } = this.deps;

    const { comment, mentioned } = await this.deps.withTransaction(async (tx) => {
      const post = await postRepo.findById(tx, postId);
      if (!post) {
        throw new SocialError('NOT_FOUND', 'Post not found');
      }

      const comment = await commentRepo.create(tx, { id: generateId(), postId, authorId: userId, content: text });
      await outbox.append(tx, {
        aggregateType: 'post',
        aggregateId: postId,
        eventType: POST_COMMENTED,
        payload: { postId, postAuthorId: post.authorId, commentId: comment.id, userId },
      });

      const usernames = extractMentions(text);
      const users = usernames.length > 0 ? await userRepo.findByUsernames(tx, usernames) : [];
      const mentioned = users.filter((u) => u.id !== userId);
      for (const user of mentioned) {
        const payload: UserMentioned = { postId, commentId: comment.id, mentionedUserId: user.id, userId };
        await outbox.append(tx, {
          aggregateType: 'post',
          aggregateId: postId,
          eventType: USER_MENTIONED,
          payload,
        });
      }
      return { comment, mentioned: mentioned.length };
    });

    this.deps.logger.info({ userId, postId, commentId: comment.id, mentioned }, 'Comment created');
    return comment;
  }
}

function invalidRequest(issues: ValidationIssue[]): SocialError {
  return new SocialError('VALIDATION', issues[0]?.message ?? 'Invalid request', { issues });
}

export class SocialError extends Error {
  constructor(
    public readonly kind: 'VALIDATION' | 'NOT_FOUND' | 'CONFLICT',
    message: string,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'SocialError';
  }
}
