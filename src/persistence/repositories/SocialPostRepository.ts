import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';

export interface SocialPost {
  id: number;
  platform: string;
  topic: string;
  content: string;
  imageReference?: string;
  platformPostId?: string;
  status: 'posted' | 'failed';
  createdAt: number;
}

export class SocialPostRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db ?? getDatabase();
  }

  append(post: Omit<SocialPost, 'id' | 'createdAt'>, now = Date.now()): SocialPost {
    const result = this.db
      .prepare(
        `INSERT INTO social_posts (platform, topic, content, image_reference, platform_post_id, status, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        post.platform,
        post.topic,
        post.content,
        post.imageReference ?? null,
        post.platformPostId ?? null,
        post.status,
        now
      );

    return { id: Number(result.lastInsertRowid), ...post, createdAt: now };
  }

  recent(limit: number): SocialPost[] {
    const rows = this.db
      .prepare('SELECT * FROM social_posts ORDER BY created_at DESC, id DESC LIMIT ?')
      .all(limit) as Array<{
      id: number;
      platform: string;
      topic: string;
      content: string;
      image_reference: string | null;
      platform_post_id: string | null;
      status: 'posted' | 'failed';
      created_at: number;
    }>;

    return rows.map((row) => {
      const post: SocialPost = {
        id: row.id,
        platform: row.platform,
        topic: row.topic,
        content: row.content,
        status: row.status,
        createdAt: row.created_at,
      };
      if (row.image_reference !== null) {
        post.imageReference = row.image_reference;
      }
      if (row.platform_post_id !== null) {
        post.platformPostId = row.platform_post_id;
      }
      return post;
    });
  }

  countBetween(from: number, to: number): number {
    const row = this.db
      .prepare("SELECT COUNT(*) AS count FROM social_posts WHERE status = 'posted' AND created_at >= ? AND created_at < ?")
      .get(from, to) as { count: number };
    return row.count;
  }
}
