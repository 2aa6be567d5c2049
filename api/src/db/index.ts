/**
 * Cosmos News Database Layer
 *
 * SQLite database wrapper using better-sqlite3
 */

import Database from 'better-sqlite3';
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Types
export interface DbNews {
  id: number;
  title: string;
  author: string | null;
  content: string;
  image: string | null;
  audio: string | null;
  created_at: string;
  fake_score: number;
}

export type DbNewsInsert = Omit<DbNews, 'id'>;

export type DbNewsSummary = Pick<DbNews, 'id' | 'title' | 'author' | 'created_at' | 'image' | 'fake_score'>;

export type DbMediaRefs = Pick<DbNews, 'id' | 'image' | 'audio'>;

export type DbScoredMedia = Pick<DbNews, 'id' | 'image' | 'audio' | 'fake_score'>;

export interface DbDuplicateTitle {
  title: string;
  count: number;
}

// Columns added after the first release; older databases get them on open
const LATE_COLUMNS: Array<{ name: string; ddl: string }> = [
  { name: 'author', ddl: 'ALTER TABLE news ADD COLUMN author TEXT' },
  { name: 'audio', ddl: 'ALTER TABLE news ADD COLUMN audio TEXT' },
];

/**
 * Database wrapper class
 */
export class NewsDb {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
  }

  /**
   * Initialize database schema
   */
  init(): void {
    const schemaPath = join(__dirname, 'schema.sql');
    const schema = readFileSync(schemaPath, 'utf-8');
    this.db.exec(schema);
    this.migrate();
  }

  /**
   * Add columns missing from databases created by older releases
   */
  migrate(): string[] {
    const columns = this.db.prepare('PRAGMA table_info(news)').all() as Array<{ name: string }>;
    const present = new Set(columns.map(c => c.name));
    const added: string[] = [];
    for (const column of LATE_COLUMNS) {
      if (!present.has(column.name)) {
        this.db.exec(column.ddl);
        added.push(column.name);
      }
    }
    return added;
  }

  /**
   * Close database connection
   */
  close(): void {
    this.db.close();
  }

  // ============ News ============

  createNews(news: DbNewsInsert): DbNews {
    const stmt = this.db.prepare(`
      INSERT INTO news (title, author, content, image, audio, created_at, fake_score)
      VALUES (@title, @author, @content, @image, @audio, @created_at, @fake_score)
    `);
    const result = stmt.run(news);
    return { id: Number(result.lastInsertRowid), ...news };
  }

  getNews(id: number): DbNews | undefined {
    const stmt = this.db.prepare('SELECT * FROM news WHERE id = ?');
    return stmt.get(id) as DbNews | undefined;
  }

  listNews(): DbNewsSummary[] {
    const stmt = this.db.prepare(`
      SELECT id, title, author, created_at, image, fake_score FROM news ORDER BY id DESC
    `);
    return stmt.all() as DbNewsSummary[];
  }

  getLatestNews(limit = 5): DbNewsSummary[] {
    const stmt = this.db.prepare(`
      SELECT id, title, author, created_at, image, fake_score FROM news ORDER BY id DESC LIMIT ?
    `);
    return stmt.all(limit) as DbNewsSummary[];
  }

  getAllScoredMedia(): DbScoredMedia[] {
    const stmt = this.db.prepare('SELECT id, image, audio, fake_score FROM news ORDER BY id ASC');
    return stmt.all() as DbScoredMedia[];
  }

  getMediaRefs(id: number): DbMediaRefs | undefined {
    const stmt = this.db.prepare('SELECT id, image, audio FROM news WHERE id = ?');
    return stmt.get(id) as DbMediaRefs | undefined;
  }

  getAllMediaRefs(): DbMediaRefs[] {
    const stmt = this.db.prepare(`
      SELECT id, image, audio FROM news WHERE image IS NOT NULL OR audio IS NOT NULL ORDER BY id ASC
    `);
    return stmt.all() as DbMediaRefs[];
  }

  /**
   * Returns false when the row was already gone
   */
  deleteNews(id: number): boolean {
    const stmt = this.db.prepare('DELETE FROM news WHERE id = ?');
    return stmt.run(id).changes > 0;
  }

  getNewsCount(): number {
    const stmt = this.db.prepare('SELECT COUNT(*) as count FROM news');
    const result = stmt.get() as { count: number };
    return result.count;
  }

  getDuplicateTitles(): DbDuplicateTitle[] {
    const stmt = this.db.prepare(`
      SELECT title, COUNT(*) as count FROM news GROUP BY title HAVING count > 1 ORDER BY count DESC, title ASC
    `);
    return stmt.all() as DbDuplicateTitle[];
  }
}

// Singleton instance
let db: NewsDb | null = null;

/**
 * Initialize database singleton
 */
export function initDb(dbPath: string): NewsDb {
  if (db) {
    return db;
  }
  db = new NewsDb(dbPath);
  db.init();
  return db;
}

/**
 * Close database connection
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}
