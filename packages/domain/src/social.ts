export interface Post {
  id: string;
  authorId: string;
  content: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface Comment {
  id: string;
  postId: string;
  authorId: string;
  content: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface Like {
  id: string;
  userId: string;
  postId: string;
  createdAt: Date;
}

export interface Follow {
  id: string;
  followerId: string;
  followeeId: string;
  createdAt: Date;
}

const MENTION_PATTERN = /(?:^|[^a-z0-9._-])@([a-z0-9._-]{3,50})(?![a-z0-9._-])/gi;

/**
 * Usernames mentioned as `@name` in `content`, lowercased and in order of
 * first appearance. Email addresses do not count as mentions.
 */
export function extractMentions(content: string): string[] {
  const seen = new Set<string>();
  for (const match of content.matchAll(MENTION_PATTERN)) {
    const username = match[1]?.toLowerCase().replace(/\.+$/, '');
    if (username && username.length >= 3) {
      seen.add(username);
    }
  }
  return [...seen];
}
