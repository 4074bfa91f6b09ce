/**
 * TrackingLog.ts — Per-position time series and the closed-trade summary
 *
 * `track` reads the broker's positions export, finds the rows belonging to
 * each open position's active legs and appends one row per run to
 * <logDir>/<id>.csv. When a position is archived its log moves with it.
 */

import { appendFileSync, existsSync, mkdirSync, readFileSync, renameSync } from "fs";
import { dirname, join } from "path";
import { parse as csvParse } from "csv-parse/sync";
import { stringify as csvStringify } from "csv-stringify/sync";
import { z } from "zod";
import { StorageError } from "./Errors";
import { normalizeTicker } from "./TickerNormalizer";
import { parseNumber, toIsoDate } from "./TransactionParser";
import type { OptionType, Position } from "./Types";
import { round2 } from "./Utils";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface BrokerPositionRow {
  symbol: string;
  root: string;
  type: OptionType;
  strike: number;
  expiry: string;
  delta: number;
  betaDelta: number;
  theta: number;
  ivRank: number | null;
  pop: number | null;
  underlying: number | null;
  pnl: number;
}

export const TRACKING_COLUMNS = [
  "Date",
  "Underlying Price",
  "Delta",
  "Beta Delta",
  "Theta",
  "IV Rank",
  "PoP",
  "PnL",
  "% of Max Profit",
] as const;

export type TrackingColumn = (typeof TRACKING_COLUMNS)[number];
export type TrackingRow = Record<TrackingColumn, string | number | null>;

export const SUMMARY_COLUMNS = ["strategy", "ticker", "opened", "closed", "pnl", "tags"] as const;

const CsvRows = z.array(z.record(z.string(), z.string()));

const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];

// ─── Positions Export ────────────────────────────────────────────────────────

/** ISO, M/D/YY, or "Mar 21, 2025" */
function parseExpDate(raw: string | undefined): string | null {
  const direct = toIsoDate(raw);
  if (direct || !raw) return direct;

  const named = /^([A-Za-z]{3})[a-z]*\s+(\d{1,2}),?\s+(\d{4})$/.exec(raw.trim());
  if (!named) return null;
  const [, mon, day, year] = named;
  const month = MONTHS.indexOf((mon ?? "").toLowerCase());
  if (month < 0 || !day || !year) return null;
  return `${year}-${String(month + 1).padStart(2, "0")}-${day.padStart(2, "0")}`;
}

function optional(raw: string | undefined): number | null {
  const n = parseNumber(raw?.replace("%", ""));
  return Number.isFinite(n) ? n : null;
}

function orZero(raw: string | undefined): number {
  return optional(raw) ?? 0;
}

export function parsePositionsCsv(csvContent: string): BrokerPositionRow[] {
  const records = CsvRows.parse(csvParse(csvContent, {
    columns: (header: string[]) => header.map(h => h.trim()),
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  }));

  const rows: BrokerPositionRow[] = [];
  for (const row of records) {
    const symbol = row["Symbol"] ?? "";
    const callPut = (row["Call/Put"] ?? "").toLowerCase();
    const type: OptionType | null = callPut === "put" || callPut === "call" ? callPut : null;
    const strike = parseNumber(row["Strike Price"]);
    const expiry = parseExpDate(row["Exp Date"]);
    if (!symbol || !type || !Number.isFinite(strike) || !expiry) continue;

    rows.push({
      symbol,
      root: normalizeTicker(symbol),
      type,
      strike,
      expiry,
      delta: orZero(row["Delta"]),
      betaDelta: orZero(row["β Delta"]),
      theta: orZero(row["Theta"]),
      ivRank: optional(row["IV Rank"]),
      pop: optional(row["PoP"]),
      underlying: optional(row["Underlying Last Price"] || row["Underlying"]),
      pnl: orZero(row["P/L Open"] || row["Ext"]),
    });
  }
  return rows;
}

/** One broker row per active leg; a row is never used twice */
export function matchTrackedLegs(position: Position, rows: readonly BrokerPositionRow[]): BrokerPositionRow[] {
  const used = new Set<number>();
  const matched: BrokerPositionRow[] = [];

  for (const leg of position.legs) {
    if (leg.status !== "active") continue;
    const idx = rows.findIndex((r, i) =>
      !used.has(i)
      && r.root === leg.ticker
      && r.type === leg.type
      && r.strike === leg.strike
      && r.expiry === leg.expiry,
    );
    const row = rows[idx];
    if (idx < 0 || !row) continue;
    used.add(idx);
    matched.push(row);
  }
  return matched;
}

export function buildTrackingRow(position: Position, matched: readonly BrokerPositionRow[], date: string): TrackingRow {
  const sum = (pick: (r: BrokerPositionRow) => number) => round2(matched.reduce((s, r) => s + pick(r), 0));
  const [first] = matched;
  const pnl = sum(r => r.pnl);
  const multiplier = position.legs.find(l => l.status === "active")?.multiplier ?? 100;
  const maxProfit = position.initial_credit * multiplier;

  return {
    "Date": date,
    "Underlying Price": first?.underlying ?? null,
    "Delta": sum(r => r.delta),
    "Beta Delta": sum(r => r.betaDelta),
    "Theta": sum(r => r.theta),
    "IV Rank": first?.ivRank ?? null,
    "PoP": first?.pop ?? null,
    "PnL": pnl,
    "% of Max Profit": maxProfit !== 0 ? round2((pnl / maxProfit) * 100) : null,
  };
}

// ─── Log Files ───────────────────────────────────────────────────────────────

export function trackingLogPath(logDir: string, id: string): string {
  return join(logDir, `${id}.csv`);
}

function appendCsv(path: string, columns: readonly string[], row: Record<string, string | number | null>): void {
  try {
    mkdirSync(dirname(path), { recursive: true });
    const header = !existsSync(path);
    appendFileSync(path, csvStringify([row], { header, columns: [...columns] }));
  } catch (err) {
    throw new StorageError(path, "append to", err);
  }
}

export function appendTrackingRow(logDir: string, id: string, row: TrackingRow): string {
  const path = trackingLogPath(logDir, id);
  appendCsv(path, TRACKING_COLUMNS, row);
  return path;
}

export function readTrackingLog(logDir: string, id: string): Record<string, string>[] {
  const path = trackingLogPath(logDir, id);
  if (!existsSync(path)) return [];
  try {
    return CsvRows.parse(csvParse(readFileSync(path, "utf-8"), { columns: true, skip_empty_lines: true }));
  } catch (err) {
    throw new StorageError(path, "read", err);
  }
}

/** Move a closed position's log beside its archived record */
export function archiveTrackingLog(logDir: string, archiveDir: string, id: string): string | null {
  const from = trackingLogPath(logDir, id);
  if (!existsSync(from)) return null;
  const to = trackingLogPath(archiveDir, id);
  try {
    mkdirSync(archiveDir, { recursive: true });
    renameSync(from, to);
  } catch (err) {
    throw new StorageError(from, "archive", err);
  }
  return to;
}

export function appendClosedSummary(path: string, position: Position): void {
  appendCsv(path, SUMMARY_COLUMNS, {
    strategy: position.strategy,
    ticker: position.ticker,
    opened: position.opened,
    closed: position.closed ?? null,
    pnl: position.realized_pnl ?? null,
    tags: position.tags.join(","),
  });
}
