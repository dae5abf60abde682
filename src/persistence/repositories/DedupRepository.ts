import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';
import type { Channel } from '../../ports/ChannelPort.js';

export type DedupState = 'reserved' | 'retry' | 'committed' | 'exhausted';

export interface DedupEntry {
  channel: Channel;
  externalId: string;
  state: DedupState;
  attemptCount: number;
  reservedAt: number;
  updatedAt: number;
}

export type Reservation =
  | { acquired: true; attempt: number }
  | { acquired: false; state: DedupState; attempt: number };

interface DedupRow {
  channel: Channel;
  external_id: string;
  state: DedupState;
  attempt_count: number;
  reserved_at: number;
  updated_at: number;
}

/**
 * Idempotency ledger keyed by (channel, external id).
 *
 * A message is reserved before its reply is generated and committed once the
 * reply has been sent. A reservation whose holder died (crash between send and
 * commit) becomes acquirable again after `leaseMs`, which is where the
 * at-least-once duplicate can happen.
 */
export class DedupRepository {
  private readonly db: Database;
  private readonly reserveTx: (channel: Channel, externalId: string, now: number) => Reservation;

  constructor(
    db?: Database,
    private readonly leaseMs = 10 * 60 * 1000
  ) {
    this.db = db ?? getDatabase();

    const insert = this.db.prepare(
      `INSERT OR IGNORE INTO dedup_entries (channel, external_id, state, attempt_count, reserved_at, updated_at)
       VALUES (?, ?, 'reserved', 1, ?, ?)`
    );
    const reacquire = this.db.prepare(
      `UPDATE dedup_entries
       SET state = 'reserved', attempt_count = attempt_count + 1, reserved_at = ?, updated_at = ?
       WHERE channel = ? AND external_id = ?
         AND (state = 'retry' OR (state = 'reserved' AND reserved_at <= ?))`
    );
    const select = this.db.prepare('SELECT * FROM dedup_entries WHERE channel = ? AND external_id = ?');

    this.reserveTx = this.db.transaction((channel: Channel, externalId: string, now: number): Reservation => {
      if (insert.run(channel, externalId, now, now).changes === 1) {
        return { acquired: true, attempt: 1 };
      }
      const reacquired = reacquire.run(now, now, channel, externalId, now - this.leaseMs).changes === 1;
      const row = select.get(channel, externalId) as DedupRow | undefined;
      const attempt = row?.attempt_count ?? 1;
      if (reacquired) {
        return { acquired: true, attempt };
      }
      return { acquired: false, state: row?.state ?? 'reserved', attempt };
    });
  }

  /** Atomic check-and-insert; `acquired` is true only for the caller that now owns the message. */
  reserve(channel: Channel, externalId: string, now = Date.now()): Reservation {
    return this.reserveTx(channel, externalId, now);
  }

  commit(channel: Channel, externalId: string, now = Date.now()): void {
    this.db
      .prepare(
        "UPDATE dedup_entries SET state = 'committed', updated_at = ? WHERE channel = ? AND external_id = ?"
      )
      .run(now, channel, externalId);
  }

  /** Give a failed reservation back. Returns `exhausted` once the attempt cap is reached. */
  release(channel: Channel, externalId: string, maxAttempts: number, now = Date.now()): DedupState {
    this.db
      .prepare(
        `UPDATE dedup_entries
         SET state = CASE WHEN attempt_count >= ? THEN 'exhausted' ELSE 'retry' END, updated_at = ?
         WHERE channel = ? AND external_id = ? AND state = 'reserved'`
      )
      .run(maxAttempts, now, channel, externalId);
    return this.get(channel, externalId)?.state ?? 'retry';
  }

  get(channel: Channel, externalId: string): DedupEntry | null {
    const row = this.db
      .prepare('SELECT * FROM dedup_entries WHERE channel = ? AND external_id = ?')
      .get(channel, externalId) as DedupRow | undefined;
    if (!row) return null;
    return {
      channel: row.channel,
      externalId: row.external_id,
      state: row.state,
      attemptCount: row.attempt_count,
      reservedAt: row.reserved_at,
      updatedAt: row.updated_at,
    };
  }
}
