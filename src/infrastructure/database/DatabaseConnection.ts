import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export const IN_MEMORY = ':memory:';

/**
 * Database connection manager for the prompt cache
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  /**
   * @param dbPath - file name under `<cwd>/data`, an absolute path, or `:memory:`
   */
  constructor(dbPath: string = 'prompt_cache.db') {
    this.dbPath =
      dbPath === IN_MEMORY || path.isAbsolute(dbPath)
        ? dbPath
        : path.resolve(process.cwd(), 'data', dbPath);

    if (this.dbPath !== IN_MEMORY) {
      // Ensure data directory exists
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    if (this.dbPath !== IN_MEMORY) {
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
    }

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS prompt_cache (
        prompt TEXT NOT NULL,
        model TEXT NOT NULL,
        response TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        PRIMARY KEY (prompt, model)
      );

      CREATE INDEX IF NOT EXISTS idx_prompt_cache_created ON prompt_cache(created_at);
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  getDatabaseSize(): number {
    if (this.dbPath === IN_MEMORY) return 0;
    try {
      return fs.statSync(this.dbPath).size;
    } catch (error) {
      console.error(`[Database] Could not stat ${this.dbPath}:`, error);
      return 0;
    }
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
