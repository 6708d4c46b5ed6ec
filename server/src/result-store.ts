import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { normalizeArtikul, normalizedArtikulSql } from '../../shared/src/artikul.js';
import {
  UPDATABLE_RESULT_FIELDS,
  type ResultInput,
  type ResultRecord,
  type ResultUpdate,
  type UpsertOutcome
} from '../../shared/src/types.js';

export interface ResultStoreOptions {
  /** How long a writer waits on a locked database before failing. */
  busyTimeoutMs?: number;
  now?: () => number;
}

export class StorageError extends Error {
  readonly statusCode: number;

  constructor(message: string, options: { cause?: unknown; statusCode?: number } = {}) {
    super(message, { cause: options.cause });
    this.name = 'StorageError';
    this.statusCode = options.statusCode ?? 500;
  }
}

interface ExistingRow {
  id: number;
  quantity: number;
  sale_price: number;
}

const DEFAULT_BUSY_TIMEOUT_MS = 30_000;
const NORMALIZED_ARTIKUL = normalizedArtikulSql('artikul');

/**
 * Results ledger on SQLite. The database runs in WAL mode so readers never block the
 * single writer, and a busy timeout makes a writer wait for a competing one instead of
 * failing.
 *
 * A store wraps exactly one connection. Open one store per worker; never hand an open
 * store to another worker thread.
 */
export class ResultStore {
  private readonly now: () => number;

  private constructor(
    private readonly db: Database.Database,
    readonly dbPath: string,
    now: () => number
  ) {
    this.now = now;
  }

  static open(dbPath: string, options: ResultStoreOptions = {}): ResultStore {
    const busyTimeoutMs = options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS;
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });

    let db: Database.Database;
    try {
      db = new Database(dbPath, { timeout: busyTimeoutMs });
    } catch (error) {
      throw new StorageError(`Unable to open results database at ${dbPath}`, { cause: error });
    }

    db.pragma('journal_mode = WAL');
    db.pragma(`busy_timeout = ${busyTimeoutMs}`);
    db.exec(`
      CREATE TABLE IF NOT EXISTS results (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        artikul TEXT NOT NULL,
        client TEXT NOT NULL,
        quantity INTEGER DEFAULT 1,
        weight REAL DEFAULT 0,
        last_updated TEXT,
        brand TEXT DEFAULT '',
        description TEXT DEFAULT '',
        sale_price REAL DEFAULT 0,
        total_price REAL DEFAULT 0,
        created_at TEXT DEFAULT CURRENT_TIMESTAMP,
        UNIQUE(artikul, client)
      );
      CREATE INDEX IF NOT EXISTS idx_artikul_client ON results(artikul, client);
    `);

    return new ResultStore(db, dbPath, options.now ?? (() => Date.now()));
  }

  journalMode(): string {
    return String(this.db.pragma('journal_mode', { simple: true }));
  }

  /**
   * Inserts a row, or merges into the row whose normalized artikul and upper-cased client
   * match. On merge the quantity is incremented, a positive sale price replaces the stored
   * one, blank brand/description never overwrite populated ones, and weight keeps its
   * insert-time value.
   */
  upsertResult(input: ResultInput): UpsertOutcome {
    const quantity = input.quantity ?? 1;
    const weight = input.weight ?? 0;
    const brand = input.brand ?? '';
    const description = input.description ?? '';
    const salePrice = input.sale_price ?? 0;
    const key = normalizeArtikul(input.artikul);
    const timestamp = new Date(this.now()).toISOString();

    const findExisting = this.db.prepare<[string, string], ExistingRow>(
      `SELECT id, quantity, sale_price FROM results
       WHERE ${NORMALIZED_ARTIKUL} = ? AND UPPER(client) = UPPER(?)
       LIMIT 1`
    );

    const apply = this.db.transaction((): UpsertOutcome => {
      const existing = findExisting.get(key, input.client);

      if (existing) {
        const newQuantity = existing.quantity + quantity;
        const finalPrice = salePrice > 0 ? salePrice : existing.sale_price;

        this.db
          .prepare(
            `UPDATE results
             SET quantity = ?,
                 last_updated = ?,
                 sale_price = ?,
                 total_price = ?,
                 brand = COALESCE(NULLIF(?, ''), brand),
                 description = COALESCE(NULLIF(?, ''), description)
             WHERE id = ?`
          )
          .run(newQuantity, timestamp, finalPrice, finalPrice * newQuantity, brand, description, existing.id);

        return { ok: true, action: 'updated', id: existing.id };
      }

      const inserted = this.db
        .prepare(
          `INSERT INTO results
           (artikul, client, quantity, weight, last_updated, brand, description, sale_price, total_price, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          input.artikul,
          input.client,
          quantity,
          weight,
          timestamp,
          brand,
          description,
          salePrice,
          salePrice * quantity,
          timestamp
        );

      return { ok: true, action: 'inserted', id: Number(inserted.lastInsertRowid) };
    });

    return apply.immediate();
  }

  getResultById(id: number): ResultRecord | null {
    const row = this.db.prepare<[number], ResultRecord>('SELECT * FROM results WHERE id = ?').get(id);
    return row ?? null;
  }

  getAllResults(client?: string | null): ResultRecord[] {
    if (client) {
      return this.db
        .prepare<[string], ResultRecord>(
          'SELECT * FROM results WHERE UPPER(client) = UPPER(?) ORDER BY last_updated DESC, id DESC'
        )
        .all(client);
    }

    return this.db
      .prepare<[], ResultRecord>('SELECT * FROM results ORDER BY last_updated DESC, id DESC')
      .all();
  }

  /**
   * Applies only allow-listed fields. Returns false when nothing applicable was given or no row
   * matched. A rename that would make the row share its normalized artikul and client with
   * another row throws a 409 `StorageError`.
   */
  updateResult(id: number, fields: ResultUpdate): boolean {
    const assignments: string[] = [];
    const values: Array<string | number> = [];

    for (const field of UPDATABLE_RESULT_FIELDS) {
      const value = fields[field];
      if (value !== undefined) {
        assignments.push(`${field} = ?`);
        values.push(value);
      }
    }

    if (assignments.length === 0) {
      return false;
    }

    assignments.push('last_updated = ?');
    values.push(new Date(this.now()).toISOString(), id);

    const apply = this.db.transaction((): boolean => {
      if (fields.artikul !== undefined || fields.client !== undefined) {
        const current = this.db
          .prepare<[number], { artikul: string; client: string }>('SELECT artikul, client FROM results WHERE id = ?')
          .get(id);

        if (!current) {
          return false;
        }

        const artikul = fields.artikul !== undefined ? String(fields.artikul) : current.artikul;
        const client = fields.client !== undefined ? String(fields.client) : current.client;
        const conflict = this.db
          .prepare<[string, string, number], { id: number }>(
            `SELECT id FROM results
             WHERE ${NORMALIZED_ARTIKUL} = ? AND UPPER(client) = UPPER(?) AND id <> ?
             LIMIT 1`
          )
          .get(normalizeArtikul(artikul), client, id);

        if (conflict) {
          throw duplicateKeyError();
        }
      }

      return this.db.prepare(`UPDATE results SET ${assignments.join(', ')} WHERE id = ?`).run(...values).changes > 0;
    });

    try {
      return apply.immediate();
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw duplicateKeyError(error);
      }
      throw error;
    }
  }

  deleteResult(id: number): boolean {
    return this.db.prepare('DELETE FROM results WHERE id = ?').run(id).changes > 0;
  }

  clearResults(client?: string | null): number {
    if (client) {
      return this.db.prepare('DELETE FROM results WHERE UPPER(client) = UPPER(?)').run(client).changes;
    }

    return this.db.prepare('DELETE FROM results').run().changes;
  }

  listClients(): string[] {
    return this.db
      .prepare<[], { client: string }>('SELECT DISTINCT client FROM results ORDER BY client')
      .all()
      .map((row) => row.client);
  }

  exportByClient(): Record<string, ResultRecord[]> {
    const grouped: Record<string, ResultRecord[]> = {};

    for (const row of this.getAllResults()) {
      const rows = grouped[row.client] ?? [];
      rows.push(row);
      grouped[row.client] = rows;
    }

    return grouped;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}

function duplicateKeyError(cause?: unknown): StorageError {
  return new StorageError('A result for this artikul and client already exists', {
    cause,
    statusCode: 409
  });
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Database.SqliteError && error.code === 'SQLITE_CONSTRAINT_UNIQUE';
}
