/**
 * Study Planner - Database Connection and Migration Tests
 */

import BetterSqlite3 from 'better-sqlite3';
import { Database } from '../../../lib/db/Database';
import { existsSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';

const defaults = { heightM: 1.71, birthdate: '1999-06-19' };

describe('Database Connection and Migrations', () => {
  const dataDir = join(process.cwd(), '.data');
  const testDbPath = join(dataDir, 'test-database.db');
  const realMigrationsPath = join(process.cwd(), 'migrations');
  const testMigrationsPath = join(dataDir, 'test-migrations');

  function removeDbFiles() {
    for (const suffix of ['', '-wal', '-shm']) {
      if (existsSync(testDbPath + suffix)) rmSync(testDbPath + suffix);
    }
  }

  beforeEach(() => {
    Database.resetInstance();
    removeDbFiles();
    if (existsSync(testMigrationsPath)) {
      rmSync(testMigrationsPath, { recursive: true });
    }
    mkdirSync(testMigrationsPath, { recursive: true });
  });

  afterEach(() => {
    Database.resetInstance();
    removeDbFiles();
    if (existsSync(testMigrationsPath)) {
      rmSync(testMigrationsPath, { recursive: true });
    }
  });

  describe('Database Initialization', () => {
    it('should create database file on initialization', () => {
      expect(existsSync(testDbPath)).toBe(false);

      const db = Database.getInstance(testDbPath, realMigrationsPath, defaults);

      expect(existsSync(testDbPath)).toBe(true);
      expect(db).toBeInstanceOf(Database);
    });

    it('should return same instance on subsequent calls (singleton)', () => {
      const db1 = Database.getInstance(testDbPath, realMigrationsPath, defaults);
      const db2 = Database.getInstance(testDbPath, realMigrationsPath, defaults);

      expect(db1).toBe(db2);
    });

    it('should configure WAL mode', () => {
      const db = Database.getInstance(testDbPath, realMigrationsPath, defaults);
      expect(db.prepare('PRAGMA journal_mode').get()).toEqual({ journal_mode: 'wal' });
    });

    it('should create all four tables', () => {
      const db = Database.getInstance(testDbPath, realMigrationsPath, defaults);
      const tables = db
        .prepare<{ name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
        .all()
        .map(t => t.name);

      expect(tables).toEqual(expect.arrayContaining(['calendar', 'simulados', 'taf_summary', 'user_profile']));
      expect(db.columnNames('taf_summary')).toEqual([
        'adate', 'running_km', 'running_minutes', 'pushups', 'situps', 'pullups', 'weight', 'bmi',
      ]);
    });

    it('should reject a calendar status outside none/ok/miss', () => {
      const db = Database.getInstance(testDbPath, realMigrationsPath, defaults);
      expect(() =>
        db.prepare("INSERT INTO calendar (cdate, note, status) VALUES ('2024-06-01', '', 'maybe')").run()
      ).toThrow(/CHECK constraint failed/);
    });
  });

  describe('Profile Seeding', () => {
    it('should seed exactly one profile row with defaults', () => {
      const db = Database.getInstance(testDbPath, realMigrationsPath, defaults);
      db.initialize();
      db.initialize();

      const rows = db.prepare('SELECT id, height_m, birthdate FROM user_profile').all();
      expect(rows).toEqual([{ id: 1, height_m: 1.71, birthdate: '1999-06-19' }]);
    });

    it('should refuse a second profile row', () => {
      const db = Database.getInstance(testDbPath, realMigrationsPath, defaults);
      expect(() =>
        db.prepare("INSERT INTO user_profile (id, height_m, birthdate) VALUES (2, 1.8, '2000-01-01')").run()
      ).toThrow(/CHECK constraint failed/);
    });

    it('should backfill null fields but never overwrite set ones', () => {
      const db1 = Database.getInstance(testDbPath, realMigrationsPath, defaults);
      db1.prepare('UPDATE user_profile SET height_m = 1.85, birthdate = NULL WHERE id = 1').run();
      Database.resetInstance();

      const db2 = Database.getInstance(testDbPath, realMigrationsPath, { heightM: 1.6, birthdate: '1980-01-01' });
      const profile = db2.prepare('SELECT height_m, birthdate FROM user_profile WHERE id = 1').get();

      expect(profile).toEqual({ height_m: 1.85, birthdate: '1980-01-01' });
    });
  });

  describe('Additive Migration', () => {
    it('should add missing columns to a file created by an older build', () => {
      // Older layout: no bmi column, profile without birthdate
      const legacy = new BetterSqlite3(testDbPath);
      legacy.exec(`
        CREATE TABLE taf_summary (
          adate TEXT PRIMARY KEY, running_km REAL, running_minutes INTEGER,
          pushups INTEGER, situps INTEGER, pullups INTEGER, weight REAL
        );
        CREATE TABLE user_profile (id INTEGER PRIMARY KEY CHECK (id = 1), height_m REAL);
        INSERT INTO taf_summary (adate, pushups, weight) VALUES ('2023-05-01', 30, 70.5);
        INSERT INTO user_profile (id, height_m) VALUES (1, 1.75);
      `);
      legacy.close();

      const db = Database.getInstance(testDbPath, realMigrationsPath, defaults);

      expect(db.columnNames('taf_summary')).toContain('bmi');
      expect(db.columnNames('user_profile')).toEqual(['id', 'height_m', 'birthdate']);
      expect(db.prepare('SELECT adate, pushups, weight, bmi FROM taf_summary').all()).toEqual([
        { adate: '2023-05-01', pushups: 30, weight: 70.5, bmi: null },
      ]);
      expect(db.prepare('SELECT height_m, birthdate FROM user_profile').get()).toEqual({
        height_m: 1.75,
        birthdate: '1999-06-19',
      });
    });
  });

  describe('Migration Runner', () => {
    it('should apply migration files in order and record each once', () => {
      writeFileSync(join(testMigrationsPath, '002_extra.sql'), 'ALTER TABLE notes ADD COLUMN tag TEXT;');
      writeFileSync(join(testMigrationsPath, '001_notes.sql'), 'CREATE TABLE notes (id INTEGER PRIMARY KEY, body TEXT);');
      writeFileSync(
        join(testMigrationsPath, '000_profile.sql'),
        'CREATE TABLE user_profile (id INTEGER PRIMARY KEY CHECK (id = 1), height_m REAL, birthdate TEXT);'
      );

      const db1 = Database.getInstance(testDbPath, testMigrationsPath, defaults);
      expect(db1.prepare('SELECT name FROM migrations ORDER BY id').all()).toEqual([
        { name: '000_profile' },
        { name: '001_notes' },
        { name: '002_extra' },
      ]);
      expect(db1.columnNames('notes')).toEqual(['id', 'body', 'tag']);

      Database.resetInstance();
      const db2 = Database.getInstance(testDbPath, testMigrationsPath, defaults);
      expect(db2.prepare('SELECT COUNT(*) AS n FROM migrations').get()).toEqual({ n: 3 });
    });

    it('should roll back and throw on invalid SQL in a migration', () => {
      writeFileSync(join(testMigrationsPath, '001_broken.sql'), 'CREATE TABLE ok_table (id INTEGER); NOT VALID SQL;');
      const consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);

      expect(() => Database.getInstance(testDbPath, testMigrationsPath, defaults)).toThrow(
        /Migration failed: 001_broken/
      );

      consoleError.mockRestore();
    });
  });
});
