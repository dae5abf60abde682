import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';

export type CommandStatus = 'pending' | 'processing' | 'completed' | 'failed';
export type TerminalCommandStatus = Extract<CommandStatus, 'completed' | 'failed'>;

export interface CommandRecord {
  id: number;
  rawText: string;
  intent: string | null;
  parameters: Record<string, string>;
  status: CommandStatus;
  resultText: string | null;
  errorDetail: string | null;
  createdAt: number;
  completedAt: number | null;
}

interface CommandRow {
  id: number;
  raw_text: string;
  intent: string | null;
  parameters: string;
  status: CommandStatus;
  result_text: string | null;
  error_detail: string | null;
  created_at: number;
  completed_at: number | null;
}

export function isTerminal(status: CommandStatus): status is TerminalCommandStatus {
  return status === 'completed' || status === 'failed';
}

function parseParameters(raw: string): Record<string, string> {
  const parsed: unknown = JSON.parse(raw);
  const params: Record<string, string> = {};
  if (typeof parsed === 'object' && parsed !== null) {
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === 'string') params[key] = value;
    }
  }
  return params;
}

function toRecord(row: CommandRow): CommandRecord {
  return {
    id: row.id,
    rawText: row.raw_text,
    intent: row.intent,
    parameters: parseParameters(row.parameters),
    status: row.status,
    resultText: row.result_text,
    errorDetail: row.error_detail,
    createdAt: row.created_at,
    completedAt: row.completed_at,
  };
}

/**
 * Command history. Status updates are compare-and-set against the non-terminal
 * states, so a late writer can never move a finished record.
 */
export class CommandRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db ?? getDatabase();
  }

  create(rawText: string, status: 'pending' | 'processing' = 'processing', now = Date.now()): CommandRecord {
    const result = this.db
      .prepare('INSERT INTO commands (raw_text, status, created_at) VALUES (?, ?, ?)')
      .run(rawText, status, now);

    return {
      id: Number(result.lastInsertRowid),
      rawText,
      intent: null,
      parameters: {},
      status,
      resultText: null,
      errorDetail: null,
      createdAt: now,
      completedAt: null,
    };
  }

  get(id: number): CommandRecord | null {
    const row = this.db.prepare('SELECT * FROM commands WHERE id = ?').get(id) as CommandRow | undefined;
    return row ? toRecord(row) : null;
  }

  setIntent(id: number, intent: string, parameters: Record<string, string>): boolean {
    const result = this.db
      .prepare(
        "UPDATE commands SET intent = ?, parameters = ? WHERE id = ? AND status IN ('pending', 'processing')"
      )
      .run(intent, JSON.stringify(parameters), id);
    return result.changes === 1;
  }

  complete(id: number, resultText: string, now = Date.now()): boolean {
    const result = this.db
      .prepare(
        `UPDATE commands SET status = 'completed', result_text = ?, completed_at = ?
         WHERE id = ? AND status = 'processing'`
      )
      .run(resultText, now, id);
    return result.changes === 1;
  }

  fail(id: number, errorDetail: string, now = Date.now()): boolean {
    const result = this.db
      .prepare(
        `UPDATE commands SET status = 'failed', error_detail = ?, completed_at = ?
         WHERE id = ? AND status IN ('pending', 'processing')`
      )
      .run(errorDetail, now, id);
    return result.changes === 1;
  }

  findStale(olderThan: number): CommandRecord[] {
    const rows = this.db
      .prepare(
        "SELECT * FROM commands WHERE status IN ('pending', 'processing') AND created_at < ? ORDER BY created_at ASC"
      )
      .all(olderThan) as CommandRow[];
    return rows.map(toRecord);
  }

  recent(limit: number): CommandRecord[] {
    const rows = this.db
      .prepare('SELECT * FROM commands ORDER BY created_at DESC, id DESC LIMIT ?')
      .all(limit) as CommandRow[];
    return rows.map(toRecord);
  }

  page(page: number, perPage: number): { items: CommandRecord[]; total: number } {
    const total = (this.db.prepare('SELECT COUNT(*) AS count FROM commands').get() as { count: number }).count;
    const rows = this.db
      .prepare('SELECT * FROM commands ORDER BY created_at DESC, id DESC LIMIT ? OFFSET ?')
      .all(perPage, (page - 1) * perPage) as CommandRow[];
    return { items: rows.map(toRecord), total };
  }

  countBetween(from: number, to: number): number {
    const row = this.db
      .prepare('SELECT COUNT(*) AS count FROM commands WHERE created_at >= ? AND created_at < ?')
      .get(from, to) as { count: number };
    return row.count;
  }
}
