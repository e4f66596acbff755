/**
 * Study Planner - Database Connection and Migration Manager
 *
 * Provides singleton SQLite connection using better-sqlite3 with:
 * - Migration runner over migrations/NNN_name.sql
 * - Additive column checks for files created by older builds
 * - Profile singleton seeding
 * - WAL mode and graceful shutdown handling
 */

import BetterSqlite3, { Database as SqliteDatabase, Statement } from 'better-sqlite3';
import { readFileSync, readdirSync, existsSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { ensureServerOnly } from '../server-only-guard';
import { cfg } from '../config';
import { REQUIRED_COLUMNS } from './schema';

// Ensure this module is only used server-side
ensureServerOnly('lib/db/Database');

export type DatabaseRow = Record<string, unknown>;

export interface ProfileDefaults {
  heightM: number;
  birthdate: string;
}

interface ColumnInfo {
  name: string;
}

interface ProfileRow {
  height_m: number | null;
  birthdate: string | null;
}

export class Database {
  private static instance: Database | null = null;
  private db: SqliteDatabase;
  private dbPath: string;
  private migrationsPath: string;
  private profileDefaults: ProfileDefaults;

  private constructor(dbPath?: string, migrationsPath?: string, profileDefaults?: ProfileDefaults) {
    const config = cfg();
    this.dbPath = dbPath || config.storage.dbPath;
    this.migrationsPath = migrationsPath || config.storage.migrationsPath;
    this.profileDefaults = profileDefaults || config.profileDefaults;

    if (this.dbPath !== ':memory:') {
      const dataDir = dirname(this.dbPath);
      if (!existsSync(dataDir)) {
        mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new BetterSqlite3(this.dbPath);

    this.db.pragma('journal_mode = WAL'); // crash-tolerant writes, readers never block
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('busy_timeout = 5000'); // 5 second timeout for lock contention

    this.initialize();
  }

  /**
   * Get the singleton Database instance
   */
  public static getInstance(
    dbPath?: string,
    migrationsPath?: string,
    profileDefaults?: ProfileDefaults
  ): Database {
    if (!Database.instance) {
      Database.instance = new Database(dbPath, migrationsPath, profileDefaults);
    }
    return Database.instance;
  }

  /**
   * Bring the schema up to date and seed the profile.
   * Idempotent: a current schema makes this a handful of reads.
   */
  public initialize(): void {
    this.migrate();
    this.ensureColumns();
    this.ensureProfile();
  }

  /**
   * Run all pending migrations from the migrations/ directory
   */
  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS migrations (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        applied_at INTEGER DEFAULT (strftime('%s', 'now'))
      )
    `);

    if (!existsSync(this.migrationsPath)) {
      console.warn(`[Database] Migrations directory not found: ${this.migrationsPath}`);
      return;
    }

    const migrationFiles = readdirSync(this.migrationsPath)
      .filter(file => file.endsWith('.sql'))
      .sort();

    const isApplied = this.db.prepare<[string], { name: string }>(
      'SELECT name FROM migrations WHERE name = ?'
    );
    const record = this.db.prepare<[string]>('INSERT INTO migrations (name) VALUES (?)');

    for (const file of migrationFiles) {
      const migrationName = file.replace(/\.sql$/, '');
      if (isApplied.get(migrationName)) continue;

      const sql = readFileSync(join(this.migrationsPath, file), 'utf8');
      console.log(`[Database] Applying migration: ${migrationName}`);

      try {
        this.db.transaction(() => {
          this.db.exec(sql);
          record.run(migrationName);
        })();
      } catch (error) {
        console.error(`[Database] Migration ${migrationName} failed:`, error);
        throw new Error(
          `Migration failed: ${migrationName}\n` +
          `Error: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }
  }

  /**
   * Add columns introduced after a table was first created
   */
  private ensureColumns(): void {
    for (const { table, column, definition } of REQUIRED_COLUMNS) {
      if (!this.tableExists(table)) continue;
      if (this.columnNames(table).includes(column)) continue;

      console.log(`[Database] Adding column ${table}.${column}`);
      this.db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
    }
  }

  /**
   * Seed the profile row; backfill null fields without touching set ones
   */
  private ensureProfile(): void {
    const { heightM, birthdate } = this.profileDefaults;

    this.db.transaction(() => {
      const profile = this.db
        .prepare<[], ProfileRow>('SELECT height_m, birthdate FROM user_profile WHERE id = 1')
        .get();

      if (!profile) {
        this.db
          .prepare<[number, string]>('INSERT INTO user_profile (id, height_m, birthdate) VALUES (1, ?, ?)')
          .run(heightM, birthdate);
        return;
      }

      if (profile.height_m === null) {
        this.db.prepare<[number]>('UPDATE user_profile SET height_m = ? WHERE id = 1').run(heightM);
      }
      if (profile.birthdate === null) {
        this.db.prepare<[string]>('UPDATE user_profile SET birthdate = ? WHERE id = 1').run(birthdate);
      }
    })();
  }

  private tableExists(table: string): boolean {
    const row = this.db
      .prepare<[string], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
      .get(table);
    return row !== undefined;
  }

  /**
   * Column names of a table, via PRAGMA table_info
   */
  public columnNames(table: string): string[] {
    return this.db
      .prepare<[], ColumnInfo>(`PRAGMA table_info(${table})`)
      .all()
      .map(col => col.name);
  }

  /**
   * Prepare a SQL statement for execution
   */
  public prepare<Result = DatabaseRow>(sql: string): Statement<unknown[], Result> {
    return this.db.prepare<unknown[], Result>(sql);
  }

  /**
   * Run a transaction with automatic rollback on error
   */
  public transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  /**
   * Close the database connection
   * This should be called during graceful shutdown
   */
  public close(): void {
    if (this.db.open) {
      this.db.close();
    }
    if (Database.instance === this) {
      Database.instance = null;
    }
  }

  /**
   * Reset the singleton instance (useful for testing)
   */
  public static resetInstance(): void {
    if (Database.instance) {
      Database.instance.close();
    }
    Database.instance = null;
  }
}

/**
 * Get the Database singleton instance
 */
export function getDatabase(): Database {
  return Database.getInstance();
}

/**
 * Register graceful shutdown handlers
 */
if (typeof process !== 'undefined') {
  const shutdownHandler = () => {
    console.log('[Database] Shutting down database connection...');
    Database.resetInstance();
    process.exit(0);
  };

  process.once('SIGINT', shutdownHandler);
  process.once('SIGTERM', shutdownHandler);
  process.once('exit', () => {
    Database.resetInstance();
  });
}
