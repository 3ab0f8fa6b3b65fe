import { type PoolClient } from 'pg';
import {
  type Post,
  type Comment,
  type Like,
  type Follow,
  type PostRepository,
  type CommentRepository,
  type LikeRepository,
  type FollowRepository,
} from '@murmur/domain';
import { firstRow } from './rows';

interface PostRow {
  id: string;
  author_id: string;
  content: string;
  created_at: Date;
  updated_at: Date;
}

interface CommentRow extends PostRow {
  post_id: string;
}

export class PgPostRepository implements PostRepository<PoolClient> {
  async findById(client: PoolClient, id: string): Promise<Post | null> {
    const result = await client.query<PostRow>(
      `SELECT id, author_id, content, created_at, updated_at FROM posts WHERE id = $1`,
      [id],
    );
    const row = result.rows[0];
    if (!row) return null;
    return {
      id: row.id,
      authorId: row.author_id,
      content: row.content,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}

export class PgCommentRepository implements CommentRepository<PoolClient> {
  async create(
    client: PoolClient,
    comment: { id: string; postId: string; authorId: string; content: string },
  ): Promise<Comment> {
    const result = await client.query<CommentRow>(
      `INSERT INTO comments (id, post_id, author_id, content)
       VALUES ($1, $2, $3, $4)
       RETURNING id, post_id, author_id, content, created_at, updated_at`,
      [comment.id, comment.postId, comment.authorId, comment.content],
    );
    const row = firstRow(result.rows);
    return {
      id: row.id,
      postId: row.post_id,
      authorId: row.author_id,
      content: row.content,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}

export class PgLikeRepository implements LikeRepository<PoolClient> {
  async create(client: PoolClient, like: { id: string; userId: string; postId: string }): Promise<Like | null> {
    const result = await client.query<{ id: string; user_id: string; post_id: string; created_at: Date }>(
      `INSERT INTO likes (id, user_id, post_id)
       VALUES ($1, $2, $3)
       ON CONFLICT (user_id, post_id) DO NOTHING
       RETURNING id, user_id, post_id, created_at`,
      [like.id, like.userId, like.postId],
    );
    const row = result.rows[0];
    if (!row) return null;
    return { id: row.id, userId: row.user_id, postId: row.post_id, createdAt: row.created_at };
  }

  async exists(client: PoolClient, userId: string, postId: string): Promise<boolean> {
    const result = await client.query(`SELECT 1 FROM likes WHERE user_id = $1 AND post_id = $2`, [userId, postId]);
    return result.rows.length > 0;
  }

  async delete(client: PoolClient, userId: string, postId: string): Promise<boolean> {
    const result = await client.query(`DELETE FROM likes WHERE user_id = $1 AND post_id = $2`, [userId, postId]);
    return (result.rowCount ?? 0) > 0;
  }
}

export class PgFollowRepository implements FollowRepository<PoolClient> {
  async create(
    client: PoolClient,
    follow: { id: string; followerId: string; followeeId: string },
  ): Promise<Follow | null> {
    const result = await client.query<{ id: string; follower_id: string; followee_id: string; created_at: Date }>(
      `INSERT INTO follows (id, follower_id, followee_id)
       VALUES ($1, $2, $3)
       ON CONFLICT (follower_id, followee_id) DO NOTHING
       RETURNING id, follower_id, followee_id, created_at`,
      [follow.id, follow.followerId, follow.followeeId],
    );
    const row = result.rows[0];
    if (!row) return null;
    return { id: row.id, followerId: row.follower_id, followeeId: row.followee_id, createdAt: row.created_at };
  }

  async exists(client: PoolClient, followerId: string, followeeId: string): Promise<boolean> {
    const result = await client.query(`SELECT 1 FROM follows WHERE follower_id = $1 AND followee_id = $2`, [
      followerId,
      followeeId,
    ]);
    return result.rows.length > 0;
  }

  async delete(client: PoolClient, followerId: string, followeeId: string): Promise<boolean> {
    const result = await client.query(`DELETE FROM follows WHERE follower_id = $1 AND followee_id = $2`, [
      followerId,
      followeeId,
    ]);
    return (result.rowCount ?? 0) > 0;
  }
}
