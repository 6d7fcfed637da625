import type Database from 'better-sqlite3';

import { RELAY_STATUSES, type RelayOutcome, type RelayStatus, type StrategyName } from '../relay/types.js';

const STRATEGIES: readonly StrategyName[] = ['direct', 'reemit', 'republish', 'archive'];

export type StatusCounts = Record<RelayStatus, number>;

function emptyCounts(): StatusCounts {
  return {
    success: 0,
    restricted: 0,
    not_found: 0,
    too_large: 0,
    transient_error: 0,
    fatal_error: 0,
  };
}

function toStatus(value: unknown): RelayStatus {
  return RELAY_STATUSES.find((status) => status === value) ?? 'fatal_error';
}

function toStrategy(value: unknown): StrategyName | null {
  return STRATEGIES.find((strategy) => strategy === value) ?? null;
}

function rowToOutcome(row: Record<string, unknown>): RelayOutcome {
  return {
    conversationId: Number(row.conversation_id ?? 0),
    messageId: Number(row.message_id ?? 0),
    targetId: String(row.target_id ?? ''),
    status: toStatus(row.status),
    reason: String(row.reason ?? ''),
    strategy: toStrategy(row.strategy),
    callerId: row.caller_id == null ? null : String(row.caller_id),
    timestamp: String(row.created_at ?? ''),
  };
}

/**
 * Append-only history of processed (conversation, message) pairs.
 * Rows are never updated or deduplicated.
 */
export class OutcomeLog {
  constructor(private readonly db: Database.Database) {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS relay_outcomes (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        conversation_id INTEGER NOT NULL,
        message_id INTEGER NOT NULL,
        target_id TEXT NOT NULL,
        status TEXT NOT NULL,
        reason TEXT NOT NULL DEFAULT '',
        strategy TEXT,
        caller_id TEXT,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_relay_outcomes_created ON relay_outcomes(created_at);
    `);
  }

  append(outcome: RelayOutcome): void {
    this.db
      .prepare(
        `
          INSERT INTO relay_outcomes (
            conversation_id,
            message_id,
            target_id,
            status,
            reason,
            strategy,
            caller_id,
            created_at
          ) VALUES (
            @conversationId,
            @messageId,
            @targetId,
            @status,
            @reason,
            @strategy,
            @callerId,
            @createdAt
          )
        `
      )
      .run({
        conversationId: outcome.conversationId,
        messageId: outcome.messageId,
        targetId: outcome.targetId,
        status: outcome.status,
        reason: outcome.reason,
        strategy: outcome.strategy,
        callerId: outcome.callerId,
        createdAt: outcome.timestamp,
      });
  }

  /**
   * Outcomes recorded at or after `since`, oldest first.
   */
  *query(since: Date): IterableIterator<RelayOutcome> {
    const rows = this.db
      .prepare(
        `
          SELECT conversation_id, message_id, target_id, status, reason, strategy, caller_id, created_at
          FROM relay_outcomes
          WHERE created_at >= ?
          ORDER BY id ASC
        `
      )
      .iterate(since.toISOString()) as IterableIterator<Record<string, unknown>>;
    for (const row of rows) {
      yield rowToOutcome(row);
    }
  }

  countByStatus(since: Date): StatusCounts {
    const rows = this.db
      .prepare(
        `
          SELECT status, COUNT(*) as n
          FROM relay_outcomes
          WHERE created_at >= ?
          GROUP BY status
        `
      )
      .all(since.toISOString()) as Array<{ status?: unknown; n?: unknown }>;

    const counts = emptyCounts();
    for (const row of rows) {
      counts[toStatus(row.status)] += Number(row.n ?? 0);
    }
    return counts;
  }
}
