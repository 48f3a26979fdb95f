import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

export type SqlParam = string | number | bigint | null;

export interface DatabaseInterface {
  query(sql: string, params?: SqlParam[]): Promise<unknown[]>;
  run(sql: string, params?: SqlParam[]): Promise<{ lastInsertRowid?: number; changes: number }>;
  exec(sql: string): Promise<void>;
  close(): Promise<void>;
}

const MIGRATIONS_DIR = fileURLToPath(new URL('../../migrations/', import.meta.url));

class SQLiteDatabase implements DatabaseInterface {
  private db: Database.Database;

  constructor(filename: string) {
    this.db = new Database(filename);
    // Enable foreign keys
    this.db.pragma('foreign_keys = ON');
  }

  async query(sql: string, params: SqlParam[] = []): Promise<unknown[]> {
    try {
      const stmt = this.db.prepare(sql);
      return stmt.all(...params);
    } catch (error) {
      console.error('SQLite query error:', error);
      throw error;
    }
  }

  async run(sql: string, params: SqlParam[] = []): Promise<{ lastInsertRowid?: number; changes: number }> {
    try {
      const stmt = this.db.prepare(sql);
      const result = stmt.run(...params);
      return {
        lastInsertRowid: Number(result.lastInsertRowid),
        changes: result.changes
      };
    } catch (error) {
      console.error('SQLite run error:', error);
      throw error;
    }
  }

  async exec(sql: string): Promise<void> {
    this.db.exec(sql);
  }

  async close(): Promise<void> {
    this.db.close();
  }
}

/**
 * Apply every migration in migrations/ in file-name order. Statements use IF NOT EXISTS.
 */
export async function migrate(db: DatabaseInterface): Promise<void> {
  const files = fs.readdirSync(MIGRATIONS_DIR)
    .filter(file => file.endsWith('.sql'))
    .sort();

  for (const file of files) {
    const sql = fs.readFileSync(path.join(MIGRATIONS_DIR, file), 'utf-8');
    await db.exec(sql);
  }
}

// Factory function
export async function createDatabase(filename: string): Promise<DatabaseInterface> {
  if (filename !== ':memory:') {
    // Ensure data directory exists
    const dbDir = path.dirname(filename);
    if (!fs.existsSync(dbDir)) {
      fs.mkdirSync(dbDir, { recursive: true });
    }
  }

  const db = new SQLiteDatabase(filename);
  await migrate(db);
  return db;
}

// Singleton instance
let dbInstance: DatabaseInterface | null = null;

export async function getDatabase(filename: string): Promise<DatabaseInterface> {
  if (!dbInstance) {
    dbInstance = await createDatabase(filename);
  }
  return dbInstance;
}

export async function closeDatabase(): Promise<void> {
  if (dbInstance) {
    await dbInstance.close();
    dbInstance = null;
  }
}
