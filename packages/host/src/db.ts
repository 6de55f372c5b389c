import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import type { Marker, MarkerRef, Position } from "@claimmark/core";
import type { MarkerStore } from "./store.js";

export type SQLiteDatabase = Database.Database;

interface MarkerRow {
  id: number;
  x: number;
  z: number;
  label: string;
  alias: string;
  color: string;
  visible: number;
}

export function openMarkerDb(dbPath: string): SQLiteDatabase {
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  db.exec("PRAGMA journal_mode = DELETE;");
  db.exec("PRAGMA synchronous = NORMAL;");
  ensureSchema(db);
  return db;
}

export function ensureSchema(db: SQLiteDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS markers (
      id INTEGER PRIMARY KEY,
      x INTEGER NOT NULL,
      z INTEGER NOT NULL,
      label TEXT NOT NULL,
      alias TEXT NOT NULL,
      color TEXT NOT NULL,
      visible INTEGER NOT NULL DEFAULT 1,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_markers_position ON markers(x, z);
  `);
}

function toMarker(row: MarkerRow): Marker {
  return {
    id: row.id,
    x: row.x,
    z: row.z,
    label: row.label,
    alias: row.alias,
    color: row.color,
    visible: row.visible !== 0
  };
}

export class SqliteMarkerStore implements MarkerStore {
  private readonly db: SQLiteDatabase;

  public constructor(db: SQLiteDatabase) {
    this.db = db;
  }

  public listMarkers(): Marker[] {
    const rows = this.db
      .prepare<[], MarkerRow>("SELECT id, x, z, label, alias, color, visible FROM markers ORDER BY id")
      .all();
    return rows.map(toMarker);
  }

  public create(position: Position, label: string, alias: string, color: string): MarkerRef {
    const now = new Date().toISOString();
    const res = this.db
      .prepare(`
        INSERT INTO markers (x, z, label, alias, color, visible, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, 1, ?, ?)
      `)
      .run(position.x, position.z, label, alias, color, now, now);
    return Number(res.lastInsertRowid);
  }

  public delete(ref: MarkerRef): boolean {
    return this.db.prepare("DELETE FROM markers WHERE id = ?").run(ref).changes > 0;
  }

  public relabel(ref: MarkerRef, label: string): boolean {
    return this.update(ref, "label = ?", label);
  }

  public restyle(ref: MarkerRef, alias: string, color: string): boolean {
    return this.update(ref, "alias = ?, color = ?", alias, color);
  }

  public setVisible(ref: MarkerRef, visible: boolean): boolean {
    return this.update(ref, "visible = ?", visible ? 1 : 0);
  }

  public count(): number {
    const row = this.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM markers").get();
    return row?.n ?? 0;
  }

  public transaction<T>(fn: () => T): T {
    this.db.exec("BEGIN");
    try {
      const result = fn();
      this.db.exec("COMMIT");
      return result;
    } catch (error) {
      this.db.exec("ROLLBACK");
      throw error;
    }
  }

  public close(): void {
    this.db.close();
  }

  private update(ref: MarkerRef, assignments: string, ...values: Array<string | number>): boolean {
    const info = this.db
      .prepare(`UPDATE markers SET ${assignments}, updated_at = ? WHERE id = ?`)
      .run(...values, new Date().toISOString(), ref);
    return info.changes > 0;
  }
}
