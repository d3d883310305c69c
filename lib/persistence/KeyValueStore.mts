/**
 * Key-Value Store for the Mesh Bridge
 *
 * Namespaced string storage. Every write is durable once the call returns.
 * The SQLite backend keeps all namespaces in one table, so erasing the
 * bridge namespace leaves other subsystems' entries alone.
 */

import Database from 'better-sqlite3';

/**
 * Persistent primitives the device store is built on
 */
export interface KeyValueStore {
  get(key: string): string | undefined;
  set(key: string, value: string): void;
  /** Keys starting with `prefix`, in key order */
  keys(prefix: string): string[];
  /** Remove every entry in this namespace. Returns the number removed. */
  clear(): number;
}

// ============================================================================
// SqliteKeyValueStore Class
// ============================================================================

export class SqliteKeyValueStore implements KeyValueStore {
  private readonly db: Database.Database;
  private readonly namespace: string;
  private readonly ownsDatabase: boolean;

  private readonly selectStmt: Database.Statement<[string, string], { value: string }>;
  private readonly upsertStmt: Database.Statement<[string, string, string]>;
  private readonly keysStmt: Database.Statement<[string], { key: string }>;
  private readonly clearStmt: Database.Statement<[string]>;

  /**
   * @param database - file path, or an open database shared with other namespaces
   */
  constructor(database: string | Database.Database, namespace: string) {
    this.ownsDatabase = typeof database === 'string';
    this.db = typeof database === 'string' ? new Database(database) : database;
    this.namespace = namespace;

    if (this.ownsDatabase) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS kv_entries (
        namespace TEXT NOT NULL,
        key TEXT NOT NULL,
        value TEXT NOT NULL,
        PRIMARY KEY (namespace, key)
      )
    `);

    this.selectStmt = this.db.prepare<[string, string], { value: string }>(
      'SELECT value FROM kv_entries WHERE namespace = ? AND key = ?'
    );
    this.upsertStmt = this.db.prepare<[string, string, string]>(
      `INSERT INTO kv_entries (namespace, key, value) VALUES (?, ?, ?)
       ON CONFLICT (namespace, key) DO UPDATE SET value = excluded.value`
    );
    this.keysStmt = this.db.prepare<[string], { key: string }>(
      'SELECT key FROM kv_entries WHERE namespace = ? ORDER BY key'
    );
    this.clearStmt = this.db.prepare<[string]>('DELETE FROM kv_entries WHERE namespace = ?');
  }

  get(key: string): string | undefined {
    return this.selectStmt.get(this.namespace, key)?.value;
  }

  set(key: string, value: string): void {
    this.upsertStmt.run(this.namespace, key, value);
  }

  keys(prefix: string): string[] {
    return this.keysStmt
      .all(this.namespace)
      .map((row) => row.key)
      .filter((key) => key.startsWith(prefix));
  }

  clear(): number {
    return this.clearStmt.run(this.namespace).changes;
  }

  /**
   * Close the database if this store opened it
   */
  close(): void {
    if (this.ownsDatabase) {
      this.db.close();
    }
  }
}
