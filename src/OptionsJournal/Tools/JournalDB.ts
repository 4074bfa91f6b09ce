/**
 * JournalDB.ts — SQLite index of positions for analytics (Postgres-ready schema)
 *
 * The YAML store is the source of truth; this database is a queryable copy
 * of closed (and optionally open) positions used by `stats`. It can always be
 * rebuilt from the archive with `migrate`.
 *
 * Schema notes for a later Postgres move:
 *   - TEXT for JSON → JSONB
 *   - datetime('now') → NOW()
 *
 * Usage:
 *   const db = new JournalDB("Data/journal.db");
 *   db.upsertPosition(position);
 *   db.getStatsByStrategy();
 *   db.close();
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import { z } from "zod";
import type { Position } from "./Types";
import { daysBetween, round2 } from "./Utils";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface DBConfig {
  provider: "sqlite" | "none";
  sqlite_path: string;
}

export interface GroupStats {
  group: string;
  trades: number;
  total_pnl: number;
  avg_pnl: number;
  winners: number;
  losers: number;
  win_rate: number;
  avg_hold_days: number;
}

export interface JournalSummary {
  trades: number;
  winners: number;
  losers: number;
  win_rate: number;
  total_pnl: number;
  avg_pnl: number;
  avg_hold_days: number;
  rolled: number;
}

export interface ClosedPositionRow {
  id: string;
  ticker: string;
  strategy: string;
  opened: string;
  closed: string;
  realized_pnl: number;
  roll_count: number;
  hold_days: number;
  tags: string[];
}

export type StatsGrouping = "strategy" | "ticker" | "tag";

export interface DateRange {
  from: string;
  to: string;
}

// ─── Schema ──────────────────────────────────────────────────────────────────

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS positions (
  id TEXT PRIMARY KEY,
  ticker TEXT NOT NULL,
  strategy TEXT NOT NULL,
  status TEXT NOT NULL,
  opened TEXT NOT NULL,
  closed TEXT,
  initial_credit REAL NOT NULL,
  realized_pnl REAL,
  roll_count INTEGER DEFAULT 0,
  hold_days INTEGER,
  leg_count INTEGER NOT NULL,
  tags TEXT NOT NULL,
  order_ids TEXT NOT NULL,
  created_at TEXT DEFAULT (datetime('now')),
  updated_at TEXT DEFAULT (datetime('now'))
);
CREATE INDEX IF NOT EXISTS idx_positions_status ON positions(status);
CREATE INDEX IF NOT EXISTS idx_positions_closed ON positions(closed);
CREATE INDEX IF NOT EXISTS idx_positions_ticker ON positions(ticker);
CREATE INDEX IF NOT EXISTS idx_positions_strategy ON positions(strategy);

CREATE TABLE IF NOT EXISTS position_tags (
  position_id TEXT NOT NULL REFERENCES positions(id) ON DELETE CASCADE,
  tag TEXT NOT NULL,
  PRIMARY KEY (position_id, tag)
);
CREATE INDEX IF NOT EXISTS idx_position_tags_tag ON position_tags(tag);
`;

const GROUP_COLUMNS: Record<StatsGrouping, string> = {
  strategy: "p.strategy",
  ticker: "p.ticker",
  tag: "t.tag",
};

const GroupRow = z.object({
  grp: z.string(),
  trades: z.number(),
  total_pnl: z.number().nullable(),
  avg_pnl: z.number().nullable(),
  winners: z.number().nullable(),
  losers: z.number().nullable(),
  avg_hold: z.number().nullable(),
});

const SummaryRow = GroupRow.omit({ grp: true }).extend({ rolled: z.number().nullable() });

const ClosedRow = z.object({
  id: z.string(),
  ticker: z.string(),
  strategy: z.string(),
  opened: z.string(),
  closed: z.string(),
  realized_pnl: z.number(),
  roll_count: z.number(),
  hold_days: z.number(),
  tags: z.string(),
});

const CountRow = z.object({ n: z.number() });

// ─── Implementation ──────────────────────────────────────────────────────────

export class JournalDB {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.init();
  }

  init(): void {
    this.db.exec(SCHEMA_SQL);
  }

  close(): void {
    this.db.close();
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  upsertPosition(position: Position): void {
    this.upsertPositions([position]);
  }

  upsertPositions(positions: Position[]): void {
    const upsert = this.db.prepare(`
      INSERT INTO positions
        (id, ticker, strategy, status, opened, closed, initial_credit, realized_pnl,
         roll_count, hold_days, leg_count, tags, order_ids)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        ticker = excluded.ticker,
        strategy = excluded.strategy,
        status = excluded.status,
        opened = excluded.opened,
        closed = excluded.closed,
        initial_credit = excluded.initial_credit,
        realized_pnl = excluded.realized_pnl,
        roll_count = excluded.roll_count,
        hold_days = excluded.hold_days,
        leg_count = excluded.leg_count,
        tags = excluded.tags,
        order_ids = excluded.order_ids,
        updated_at = datetime('now')
    `);
    const clearTags = this.db.prepare("DELETE FROM position_tags WHERE position_id = ?");
    const insertTag = this.db.prepare("INSERT OR IGNORE INTO position_tags (position_id, tag) VALUES (?, ?)");

    const tx = this.db.transaction((items: Position[]) => {
      for (const p of items) {
        upsert.run(
          p.id, p.ticker, p.strategy, p.status, p.opened, p.closed ?? null,
          p.initial_credit, p.realized_pnl ?? null, p.roll_count,
          p.closed ? daysBetween(p.opened, p.closed) : null,
          p.legs.length, JSON.stringify(p.tags), JSON.stringify(p.order_ids),
        );
        clearTags.run(p.id);
        for (const tag of p.tags) insertTag.run(p.id, tag);
      }
    });
    tx(positions);
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  getClosedPositions(range?: DateRange): ClosedPositionRow[] {
    const { where, params } = closedFilter(range);
    const rows = this.db.prepare(`
      SELECT id, ticker, strategy, opened, closed, realized_pnl, roll_count, hold_days, tags
      FROM positions p
      ${where}
      ORDER BY closed, id
    `).all(...params);

    return z.array(ClosedRow).parse(rows).map(r => ({ ...r, tags: parseTags(r.tags) }));
  }

  // ─── Analytics ───────────────────────────────────────────────────────

  getSummary(range?: DateRange): JournalSummary {
    const { where, params } = closedFilter(range);
    const row = SummaryRow.parse(this.db.prepare(`
      SELECT
        COUNT(*) as trades,
        SUM(realized_pnl) as total_pnl,
        AVG(realized_pnl) as avg_pnl,
        SUM(CASE WHEN realized_pnl > 0 THEN 1 ELSE 0 END) as winners,
        SUM(CASE WHEN realized_pnl <= 0 THEN 1 ELSE 0 END) as losers,
        AVG(hold_days) as avg_hold,
        SUM(CASE WHEN roll_count > 0 THEN 1 ELSE 0 END) as rolled
      FROM positions p
      ${where}
    `).get(...params));

    const winners = row.winners ?? 0;
    return {
      trades: row.trades,
      winners,
      losers: row.losers ?? 0,
      win_rate: row.trades > 0 ? round2((winners / row.trades) * 100) : 0,
      total_pnl: round2(row.total_pnl ?? 0),
      avg_pnl: round2(row.avg_pnl ?? 0),
      avg_hold_days: round2(row.avg_hold ?? 0),
      rolled: row.rolled ?? 0,
    };
  }

  getStats(grouping: StatsGrouping, range?: DateRange): GroupStats[] {
    const { where, params } = closedFilter(range);
    const join = grouping === "tag" ? "JOIN position_tags t ON t.position_id = p.id" : "";
    const column = GROUP_COLUMNS[grouping];

    const rows = this.db.prepare(`
      SELECT
        ${column} as grp,
        COUNT(*) as trades,
        SUM(p.realized_pnl) as total_pnl,
        AVG(p.realized_pnl) as avg_pnl,
        SUM(CASE WHEN p.realized_pnl > 0 THEN 1 ELSE 0 END) as winners,
        SUM(CASE WHEN p.realized_pnl <= 0 THEN 1 ELSE 0 END) as losers,
        AVG(p.hold_days) as avg_hold
      FROM positions p
      ${join}
      ${where}
      GROUP BY ${column}
      ORDER BY total_pnl DESC, grp
    `).all(...params);

    return z.array(GroupRow).parse(rows).map(r => {
      const winners = r.winners ?? 0;
      return {
        group: r.grp,
        trades: r.trades,
        total_pnl: round2(r.total_pnl ?? 0),
        avg_pnl: round2(r.avg_pnl ?? 0),
        winners,
        losers: r.losers ?? 0,
        win_rate: r.trades > 0 ? round2((winners / r.trades) * 100) : 0,
        avg_hold_days: round2(r.avg_hold ?? 0),
      };
    });
  }

  getStatsByStrategy(range?: DateRange): GroupStats[] {
    return this.getStats("strategy", range);
  }

  getStatsByTicker(range?: DateRange): GroupStats[] {
    return this.getStats("ticker", range);
  }

  getStatsByTag(range?: DateRange): GroupStats[] {
    return this.getStats("tag", range);
  }

  // ─── Utilities ───────────────────────────────────────────────────────

  /** Row counts for diagnostics */
  getCounts(): { open: number; closed: number; tags: number } {
    const count = (sql: string) => CountRow.parse(this.db.prepare(sql).get()).n;
    return {
      open: count("SELECT COUNT(*) as n FROM positions WHERE status = 'open'"),
      closed: count("SELECT COUNT(*) as n FROM positions WHERE status = 'closed'"),
      tags: count("SELECT COUNT(*) as n FROM position_tags"),
    };
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function closedFilter(range?: DateRange): { where: string; params: string[] } {
  const base = "WHERE p.status = 'closed' AND p.realized_pnl IS NOT NULL";
  if (!range) return { where: base, params: [] };
  return { where: `${base} AND p.closed BETWEEN ? AND ?`, params: [range.from, range.to] };
}

function parseTags(raw: string): string[] {
  const parsed = z.array(z.string()).safeParse(safeJson(raw));
  return parsed.success ? parsed.data : [];
}

function safeJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}
