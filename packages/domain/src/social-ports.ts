import { type Post, type Comment, type Like, type Follow } from './social';

export interface PostRepository<Tx = unknown> {
  findById(tx: Tx, id: string): Promise<Post | null>;
}

export interface CommentRepository<Tx = unknown> {
  create(tx: Tx, comment: { id: string; postId: string; authorId: string; content: string }): Promise<Comment>;
}

export interface LikeRepository<Tx = unknown> {
  /** Null when the user already likes the post. */
  create(tx: Tx, like: { id: string; userId: string; postId: string }): Promise<Like | null>;
  exists(tx: Tx, userId: string, postId: string): Promise<boolean>;
  delete(tx: Tx, userId: string, postId: string): Promise<boolean>;
}

export interface FollowRepository<Tx = unknown> {
  /** Null when the follow already exists. */
  create(tx: Tx, follow: { id: string; followerId: string; followeeId: string }): Promise<Follow | null>;
  exists(tx: Tx, followerId: string, followeeId: string): Promise<boolean>;
  delete(tx: Tx, followerId: string, followeeId: string): Promise<boolean>;
}
