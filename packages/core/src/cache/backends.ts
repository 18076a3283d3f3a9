// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Storage behind the ResultCache. Values arrive already serialised as JSON text.
 * Data is stored in ~/.tandem/cache.db by default (SQLite via better-sqlite3).
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";

export interface CacheEntry {
  key: string;
  queryType: string;
  /** JSON text. */
  value: string;
  /** Epoch milliseconds. */
  createdAt: number;
}

export interface CacheBackend {
  get(key: string): CacheEntry | undefined;
  /** Insert or replace. */
  set(entry: CacheEntry): void;
  delete(key: string): boolean;
  /** Remove entries created strictly before `cutoff`; returns how many went. */
  deleteCreatedBefore(cutoff: number): number;
  entries(): CacheEntry[];
  /** Remove everything; returns how many went. */
  clear(): number;
  close(): void;
}

export class MemoryCacheBackend implements CacheBackend {
  private readonly store = new Map<string, CacheEntry>();

  get(key: string): CacheEntry | undefined {
    return this.store.get(key);
  }

  set(entry: CacheEntry): void {
    this.store.set(entry.key, { ...entry });
  }

  delete(key: string): boolean {
    return this.store.delete(key);
  }

  deleteCreatedBefore(cutoff: number): number {
    let removed = 0;
    for (const [key, entry] of this.store) {
      if (entry.createdAt < cutoff) {
        this.store.delete(key);
        removed++;
      }
    }
    return removed;
  }

  entries(): CacheEntry[] {
    return [...this.store.values()];
  }

  clear(): number {
    const size = this.store.size;
    this.store.clear();
    return size;
  }

  close(): void {}
}

interface CacheRow {
  key: string;
  query_type: string;
  value: string;
  created_at: number;
}

function fromRow(row: CacheRow): CacheEntry {
  return { key: row.key, queryType: row.query_type, value: row.value, createdAt: row.created_at };
}

export class SqliteCacheBackend implements CacheBackend {
  private readonly db: InstanceType<typeof Database>;

  /** Pass ":memory:" for a throwaway database. */
  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.createSchema();
  }

  private createSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS cache_entries (
        key         TEXT    PRIMARY KEY,
        query_type  TEXT    NOT NULL,
        value       TEXT    NOT NULL,                -- JSON
        created_at  INTEGER NOT NULL                 -- epoch ms
      );

      CREATE INDEX IF NOT EXISTS idx_cache_created
        ON cache_entries(created_at);
    `);
  }

  get(key: string): CacheEntry | undefined {
    const row = this.db
      .prepare<[string], CacheRow>(
        `SELECT key, query_type, value, created_at FROM cache_entries WHERE key = ?`,
      )
      .get(key);
    return row ? fromRow(row) : undefined;
  }

  set(entry: CacheEntry): void {
    this.db
      .prepare(
        `INSERT INTO cache_entries (key, query_type, value, created_at) VALUES (?, ?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET
           query_type = excluded.query_type,
           value      = excluded.value,
           created_at = excluded.created_at`,
      )
      .run(entry.key, entry.queryType, entry.value, entry.createdAt);
  }

  delete(key: string): boolean {
    return this.db.prepare(`DELETE FROM cache_entries WHERE key = ?`).run(key).changes > 0;
  }

  deleteCreatedBefore(cutoff: number): number {
    return this.db.prepare(`DELETE FROM cache_entries WHERE created_at < ?`).run(cutoff).changes;
  }

  entries(): CacheEntry[] {
    return this.db
      .prepare<[], CacheRow>(`SELECT key, query_type, value, created_at FROM cache_entries`)
      .all()
      .map(fromRow);
  }

  clear(): number {
    return this.db.prepare(`DELETE FROM cache_entries`).run().changes;
  }

  close(): void {
    this.db.close();
  }
}
