import type Database from 'better-sqlite3';
import { z } from 'zod';

import { PersistenceError, errorMessage } from '../core/errors.js';
import { openDatabase } from './db.js';
import {
  emptySnapshot,
  type AlertRecord,
  type PersistedState,
  type SeenItem,
  type Snapshot,
} from './types.js';

// Unknown fields are stripped on parse so older builds can read newer state.
const SnapshotSchema = z.object({
  markets: z
    .record(z.object({ price: z.number(), fetchedAt: z.string() }))
    .default({}),
  pairs: z
    .record(z.object({ gapBps: z.number(), observedAt: z.string() }))
    .default({}),
  savedAt: z.string().nullable().default(null),
  cycleCount: z.number().int().nonnegative().default(0),
});

const AlertRecordSchema = z.object({
  signalKey: z.string(),
  kind: z.enum(['gap', 'move', 'correlation', 'news']),
  lastFiredAt: z.string(),
  lastValue: z.number().nullable().default(null),
});

const SeenItemSchema = z.object({
  itemId: z.string(),
  seenAt: z.string(),
});

const DOCUMENTS = {
  snapshot: SnapshotSchema,
  alerts: z.array(AlertRecordSchema),
  seen_items: z.array(SeenItemSchema),
} as const;

type DocumentKey = keyof typeof DOCUMENTS;

const UPSERT_SQL = `
  INSERT INTO kv_state (key, value, updated_at)
  VALUES (@key, @value, datetime('now'))
  ON CONFLICT(key) DO UPDATE SET
    value = excluded.value,
    updated_at = excluded.updated_at
`;

function parseDocument<T extends z.ZodTypeAny>(key: DocumentKey, raw: string, schema: T): z.output<T> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new PersistenceError(`state document "${key}" is not valid JSON`, { cause: error });
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new PersistenceError(
      `state document "${key}" is invalid: ${parsed.error.issues[0]?.message ?? 'unknown'}`
    );
  }
  return parsed.data;
}

function openStateDatabase(dbPath?: string): Database.Database {
  try {
    return openDatabase(dbPath);
  } catch (error) {
    throw new PersistenceError(`cannot open state database: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Keeps the newest `keep` entries once the history grows past `limit`.
 */
export function trimSeenHistory(items: SeenItem[], limit: number, keep: number): SeenItem[] {
  if (items.length <= limit) return items;
  return items.slice(-Math.min(keep, limit));
}

/** What a scan cycle needs from persistence. */
export interface StateRepository {
  load(): PersistedState;
  commit(state: PersistedState): void;
}

/**
 * Durable scanner state. `commit` writes snapshot, alert records and seen
 * items in one SQLite transaction: either all three land or the previously
 * committed state stays as it was.
 */
export class StateStore implements StateRepository {
  private db: Database.Database;

  constructor(params: { dbPath?: string; db?: Database.Database } = {}) {
    this.db = params.db ?? openStateDatabase(params.dbPath);
  }

  load(): PersistedState {
    const raw = this.exportRaw();
    const snapshot: Snapshot = raw.snapshot
      ? parseDocument('snapshot', raw.snapshot, SnapshotSchema)
      : emptySnapshot();
    const alerts: AlertRecord[] = raw.alerts
      ? parseDocument('alerts', raw.alerts, DOCUMENTS.alerts)
      : [];
    const seenItems: SeenItem[] = raw.seen_items
      ? parseDocument('seen_items', raw.seen_items, DOCUMENTS.seen_items)
      : [];
    return { snapshot, alerts, seenItems };
  }

  /** Stored documents exactly as persisted, keyed by document name. */
  exportRaw(): Partial<Record<DocumentKey, string>> {
    let rows: Array<{ key: string; value: string }>;
    try {
      rows = this.db
        .prepare<[], { key: string; value: string }>('SELECT key, value FROM kv_state')
        .all();
    } catch (error) {
      throw new PersistenceError(`cannot read state: ${errorMessage(error)}`, { cause: error });
    }

    const out: Partial<Record<DocumentKey, string>> = {};
    for (const row of rows) {
      if (row.key === 'snapshot' || row.key === 'alerts' || row.key === 'seen_items') {
        out[row.key] = row.value;
      }
    }
    return out;
  }

  commit(state: PersistedState): void {
    const documents: Array<[DocumentKey, unknown]> = [
      ['snapshot', state.snapshot],
      ['alerts', state.alerts],
      ['seen_items', state.seenItems],
    ];

    try {
      const upsert = this.db.prepare<{ key: string; value: string }>(UPSERT_SQL);
      const writeAll = this.db.transaction((entries: Array<[DocumentKey, unknown]>) => {
        for (const [key, value] of entries) {
          upsert.run({ key, value: JSON.stringify(value) });
        }
      });
      writeAll(documents);
    } catch (error) {
      throw new PersistenceError(`state commit failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
