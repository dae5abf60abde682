import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';
import type { Channel } from '../../ports/ChannelPort.js';

export type SendStatus = 'sent' | 'failed';

export interface ReplyLog {
  id: number;
  channel: Channel;
  externalId: string;
  sender: string;
  originalBody: string;
  generatedText: string;
  sendStatus: SendStatus;
  attemptCount: number;
  createdAt: number;
}

interface ReplyLogRow {
  id: number;
  channel: Channel;
  external_id: string;
  sender: string;
  original_body: string;
  generated_text: string;
  send_status: SendStatus;
  attempt_count: number;
  created_at: number;
}

export class ReplyLogRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db ?? getDatabase();
  }

  /**
   * Append a reply outcome. A second `sent` row for the same message is ignored
   * by the unique partial index; the return value says whether a row was written.
   */
  append(entry: Omit<ReplyLog, 'id' | 'createdAt'>, now = Date.now()): boolean {
    const result = this.db
      .prepare(
        `INSERT OR IGNORE INTO reply_logs
           (channel, external_id, sender, original_body, generated_text, send_status, attempt_count, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        entry.channel,
        entry.externalId,
        entry.sender,
        entry.originalBody,
        entry.generatedText,
        entry.sendStatus,
        entry.attemptCount,
        now
      );
    return result.changes === 1;
  }

  recent(limit: number): ReplyLog[] {
    const rows = this.db
      .prepare('SELECT * FROM reply_logs ORDER BY created_at DESC, id DESC LIMIT ?')
      .all(limit) as ReplyLogRow[];
    return rows.map((row) => ({
      id: row.id,
      channel: row.channel,
      externalId: row.external_id,
      sender: row.sender,
      originalBody: row.original_body,
      generatedText: row.generated_text,
      sendStatus: row.send_status,
      attemptCount: row.attempt_count,
      createdAt: row.created_at,
    }));
  }

  countBetween(from: number, to: number, status: SendStatus): number {
    const row = this.db
      .prepare(
        'SELECT COUNT(*) AS count FROM reply_logs WHERE send_status = ? AND created_at >= ? AND created_at < ?'
      )
      .get(status, from, to) as { count: number };
    return row.count;
  }
}
