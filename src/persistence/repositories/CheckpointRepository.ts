import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';
import type { Channel, Checkpoint } from '../../ports/ChannelPort.js';

export function initialCheckpoint(channel: Channel): Checkpoint {
  return { channel, lastReceivedAt: 0, lastExternalId: null, updatedAt: 0 };
}

/** Order inbound messages by (receivedAt, externalId), comparing numeric ids numerically. */
export function compareMarkers(
  a: { receivedAt: number; externalId: string | null },
  b: { receivedAt: number; externalId: string | null }
): number {
  if (a.receivedAt !== b.receivedAt) return a.receivedAt - b.receivedAt;
  return (a.externalId ?? '').localeCompare(b.externalId ?? '', 'en', { numeric: true });
}

export class CheckpointRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db ?? getDatabase();
  }

  get(channel: Channel): Checkpoint {
    const row = this.db
      .prepare('SELECT last_received_at, last_external_id, updated_at FROM checkpoints WHERE channel = ?')
      .get(channel) as { last_received_at: number; last_external_id: string | null; updated_at: number } | undefined;

    if (!row) return initialCheckpoint(channel);
    return {
      channel,
      lastReceivedAt: row.last_received_at,
      lastExternalId: row.last_external_id,
      updatedAt: row.updated_at,
    };
  }

  /**
   * Move the checkpoint forward to `marker`. A marker at or behind the stored one
   * is ignored, so the checkpoint never goes backwards. Returns the stored value.
   */
  advance(channel: Channel, marker: { receivedAt: number; externalId: string }, now = Date.now()): Checkpoint {
    const current = this.get(channel);
    const isAhead =
      compareMarkers(marker, { receivedAt: current.lastReceivedAt, externalId: current.lastExternalId }) > 0;
    if (!isAhead) {
      return current;
    }

    this.db
      .prepare(
        `INSERT INTO checkpoints (channel, last_received_at, last_external_id, updated_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(channel) DO UPDATE SET
           last_received_at = excluded.last_received_at,
           last_external_id = excluded.last_external_id,
           updated_at = excluded.updated_at`
      )
      .run(channel, marker.receivedAt, marker.externalId, now);

    return { channel, lastReceivedAt: marker.receivedAt, lastExternalId: marker.externalId, updatedAt: now };
  }
}
