/**
 * Local state store using better-sqlite3.
 * Keeps the index of configured service names and audit events. Secrets never land here.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { randomUUID } from 'node:crypto';

// ── Schema migrations ────────────────────────────────────────────────

const MIGRATIONS: string[] = [
  // 0: migrations table (always runs first)
  `CREATE TABLE IF NOT EXISTS migrations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    version INTEGER NOT NULL UNIQUE,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  )`,

  // 1: services
  `CREATE TABLE IF NOT EXISTS services (
    name TEXT PRIMARY KEY,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    updated_at TEXT NOT NULL DEFAULT (datetime('now'))
  )`,

  // 2: audit_events
  `CREATE TABLE IF NOT EXISTS audit_events (
    id TEXT PRIMARY KEY,
    at TEXT NOT NULL DEFAULT (datetime('now')),
    type TEXT NOT NULL,
    payload_json TEXT
  )`,
];

// ── Row types ────────────────────────────────────────────────────────

export interface StoredService {
  name: string;
  created_at: string;
  updated_at: string;
}

export type AuditEventType = 'service_added' | 'service_updated' | 'service_removed' | 'code_generated';

export interface AuditEvent {
  id: string;
  at: string;
  type: string;
  payload: Record<string, unknown> | null;
}

// ── LocalStore ───────────────────────────────────────────────────────

export interface LocalStoreOptions {
  /** Newest audit events kept; older rows are pruned on every insert */
  auditRetention?: number;
}

export const DEFAULT_AUDIT_RETENTION = 1000;

export class LocalStore {
  private db: Database.Database;
  private readonly auditRetention: number;

  constructor(dbPath: string, options: LocalStoreOptions = {}) {
    this.auditRetention = options.auditRetention ?? DEFAULT_AUDIT_RETENTION;

    if (dbPath !== ':memory:') {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
  }

  /** Run all pending migrations */
  migrate(): void {
    this.db.exec(MIGRATIONS[0]);

    const applied = this.db
      .prepare('SELECT version FROM migrations ORDER BY version')
      .all() as { version: number }[];
    const appliedSet = new Set(applied.map((r) => r.version));

    const insert = this.db.prepare('INSERT INTO migrations (version) VALUES (?)');

    for (let i = 1; i < MIGRATIONS.length; i++) {
      if (!appliedSet.has(i)) {
        this.db.exec(MIGRATIONS[i]);
        insert.run(i);
      }
    }
  }

  // ── Service index ────────────────────────────────────────────────

  /** Insert the name, or bump updated_at when it is already indexed. */
  recordService(name: string): void {
    this.db
      .prepare(
        `INSERT INTO services (name) VALUES (?)
         ON CONFLICT(name) DO UPDATE SET updated_at = datetime('now')`,
      )
      .run(name);
  }

  getService(name: string): StoredService | undefined {
    return this.db.prepare('SELECT * FROM services WHERE name = ?').get(name) as StoredService | undefined;
  }

  listServices(): StoredService[] {
    return this.db.prepare('SELECT * FROM services ORDER BY name').all() as StoredService[];
  }

  deleteService(name: string): boolean {
    return this.db.prepare('DELETE FROM services WHERE name = ?').run(name).changes > 0;
  }

  // ── Audit events ─────────────────────────────────────────────────

  logAudit(type: AuditEventType, payload?: Record<string, unknown>): void {
    this.db
      .prepare('INSERT INTO audit_events (id, type, payload_json) VALUES (?, ?, ?)')
      .run(randomUUID(), type, payload ? JSON.stringify(payload) : null);
    this.db
      .prepare(
        `DELETE FROM audit_events
         WHERE rowid NOT IN (SELECT rowid FROM audit_events ORDER BY rowid DESC LIMIT ?)`,
      )
      .run(this.auditRetention);
  }

  listAuditEvents(opts?: { type?: AuditEventType; limit?: number }): AuditEvent[] {
    const limit = opts?.limit ?? 50;
    const rows = (
      opts?.type
        ? this.db
            .prepare('SELECT id, at, type, payload_json FROM audit_events WHERE type = ? ORDER BY at DESC, rowid DESC LIMIT ?')
            .all(opts.type, limit)
        : this.db
            .prepare('SELECT id, at, type, payload_json FROM audit_events ORDER BY at DESC, rowid DESC LIMIT ?')
            .all(limit)
    ) as Array<{ id: string; at: string; type: string; payload_json: string | null }>;

    return rows.map((r) => ({
      id: r.id,
      at: r.at,
      type: r.type,
      payload: r.payload_json ? (JSON.parse(r.payload_json) as Record<string, unknown>) : null,
    }));
  }

  // ── Lifecycle ────────────────────────────────────────────────────

  close(): void {
    this.db.close();
  }
}
