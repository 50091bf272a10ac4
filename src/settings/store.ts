import { readFile, writeFile } from 'node:fs/promises';
import sqlJs, { type Database } from 'sql.js';

export interface SettingsStore {
  get(accountId: string, key: string): Promise<string | undefined>;
  set(accountId: string, key: string, value: string): Promise<void>;
  close(): Promise<void>;
}

const MEMORY = ':memory:';

async function readDatabaseFile(filename: string): Promise<Uint8Array | undefined> {
  try {
    return await readFile(filename);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

/**
 * Per-account key/value settings persisted in SQLite. Used as the fallback
 * source for credentials when the environment does not provide them.
 * Runs on sql.js; a file-backed store is written back after every change.
 */
export class SqliteSettingsStore implements SettingsStore {
  private constructor(private db: Database, private filename: string) {}

  static async open(filename: string): Promise<SqliteSettingsStore> {
    const SQL = await sqlJs.default();
    const data = filename === MEMORY ? undefined : await readDatabaseFile(filename);
    const db = new SQL.Database(data);

    db.run(`
      CREATE TABLE IF NOT EXISTS settings (
        account_id TEXT NOT NULL,
        key TEXT NOT NULL,
        value TEXT NOT NULL,
        PRIMARY KEY (account_id, key)
      );
    `);

    return new SqliteSettingsStore(db, filename);
  }

  async get(accountId: string, key: string): Promise<string | undefined> {
    const statement = this.db.prepare('SELECT value FROM settings WHERE account_id = ? AND key = ?');
    try {
      statement.bind([accountId, key]);
      if (!statement.step()) {
        return undefined;
      }
      const { value } = statement.getAsObject();
      return typeof value === 'string' ? value : undefined;
    } finally {
      statement.free();
    }
  }

  async set(accountId: string, key: string, value: string): Promise<void> {
    this.db.run(
      `INSERT INTO settings (account_id, key, value) VALUES (?, ?, ?)
       ON CONFLICT(account_id, key) DO UPDATE SET value = excluded.value`,
      [accountId, key, value]
    );
    await this.persist();
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private async persist(): Promise<void> {
    if (this.filename === MEMORY) return;
    await writeFile(this.filename, this.db.export());
  }
}
