/**
 * TransactionParser.ts — Normalize broker transaction exports into LegEvents
 *
 * Reads tastytrade-style transaction CSVs. Only option instruments are kept:
 *   - Type "Trade" rows become trade events (open or close)
 *   - Type "Receive Deliver" / Sub Type "Expiration" rows become expiration events
 *   - everything else (money movements, stock trades, assignments) is ignored
 *
 * Rows whose instrument cannot be fully resolved are returned in `skipped`
 * so nothing half-defined reaches the engine.
 */

import { parse as csvParse } from "csv-parse/sync";
import { z } from "zod";
import { normalizeTicker } from "./TickerNormalizer";
import type { Instrument, Intent, LegEvent, OptionType, Side } from "./Types";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface SkippedRow {
  line: number;
  symbol: string;
  reason: string;
}

export interface ParsedTransactions {
  trades: LegEvent[];
  expirations: LegEvent[];
  skipped: SkippedRow[];
  ignored: number;
}

type CsvRow = Record<string, string>;

const CsvRows = z.array(z.record(z.string(), z.string()));

const OPTION_INSTRUMENTS = new Set(["Equity Option", "Future Option"]);

const ACTIONS: Record<string, { intent: Intent; side: Side }> = {
  SELL_TO_OPEN: { intent: "open", side: "short" },
  BUY_TO_OPEN: { intent: "open", side: "long" },
  // Closing rows carry the side of the leg they take off
  BUY_TO_CLOSE: { intent: "close", side: "short" },
  SELL_TO_CLOSE: { intent: "close", side: "long" },
};

const DEFAULT_MULTIPLIER = 100;

// ─── Field Parsing ───────────────────────────────────────────────────────────

export function parseNumber(raw: string | undefined): number {
  if (raw === undefined) return NaN;
  const cleaned = raw.replace(/[$,\s]/g, "");
  if (cleaned === "" || cleaned === "--") return NaN;
  return Number(cleaned);
}

/** Accepts ISO timestamps (2025-03-14T15:30:00-0400) and M/D/YY or M/D/YYYY */
export function toIsoDate(raw: string | undefined): string | null {
  if (!raw) return null;
  const value = raw.trim();

  const iso = /^(\d{4})-(\d{2})-(\d{2})/.exec(value);
  if (iso) return `${iso[1]}-${iso[2]}-${iso[3]}`;

  const us = /^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})$/.exec(value);
  if (us) {
    const [, m, d, y] = us;
    if (!m || !d || !y) return null;
    const year = y.length === 2 ? `20${y}` : y;
    return `${year}-${m.padStart(2, "0")}-${d.padStart(2, "0")}`;
  }

  return null;
}

function parseOptionType(raw: string | undefined): OptionType | null {
  const value = raw?.trim().toLowerCase();
  return value === "put" || value === "call" ? value : null;
}

function field(row: CsvRow, name: string): string {
  return row[name]?.trim() ?? "";
}

// ─── Row Normalization ───────────────────────────────────────────────────────

function resolveInstrument(row: CsvRow): Instrument | string {
  const rawRoot = field(row, "Underlying Symbol") || field(row, "Root Symbol") || field(row, "Symbol");
  if (!rawRoot) return "missing underlying symbol";

  const type = parseOptionType(row["Call or Put"]);
  if (!type) return `unknown option type "${field(row, "Call or Put")}"`;

  const strike = parseNumber(row["Strike Price"]);
  if (!Number.isFinite(strike) || strike <= 0) return `bad strike "${field(row, "Strike Price")}"`;

  const expiry = toIsoDate(row["Expiration Date"]);
  if (!expiry) return `bad expiration date "${field(row, "Expiration Date")}"`;

  return { root: normalizeTicker(rawRoot), type, strike, expiry };
}

function parseMultiplier(row: CsvRow): number {
  const multiplier = parseNumber(row["Multiplier"]);
  return Number.isFinite(multiplier) && multiplier > 0 ? multiplier : DEFAULT_MULTIPLIER;
}

function parseQuantity(row: CsvRow): number | null {
  const quantity = Math.abs(parseNumber(row["Quantity"]));
  return Number.isInteger(quantity) && quantity > 0 ? quantity : null;
}

function absOrZero(raw: string | undefined): number {
  const n = parseNumber(raw);
  return Number.isFinite(n) ? Math.abs(n) : 0;
}

function buildEvent(row: CsvRow, intent: Intent, side: Side, instrument: Instrument, quantity: number, tradeDate: string): LegEvent {
  const multiplier = parseMultiplier(row);
  const value = parseNumber(row["Value"]);

  return {
    instrument,
    intent,
    side,
    quantity,
    price: absOrZero(row["Average Price"]) / multiplier,
    fees: (absOrZero(row["Commissions"]) + absOrZero(row["Fees"])) / multiplier,
    grossValue: Number.isFinite(value) ? value / multiplier : 0,
    multiplier,
    orderId: field(row, "Order #") || null,
    tradeDate,
    symbol: field(row, "Symbol"),
  };
}

// ─── CSV Parsing ─────────────────────────────────────────────────────────────

export function parseTransactionsCsv(csvContent: string): ParsedTransactions {
  const records = CsvRows.parse(csvParse(csvContent, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  }));

  const result: ParsedTransactions = { trades: [], expirations: [], skipped: [], ignored: 0 };

  records.forEach((row, i) => {
    // Header is line 1
    const line = i + 2;
    const symbol = field(row, "Symbol");

    if (!OPTION_INSTRUMENTS.has(field(row, "Instrument Type"))) {
      result.ignored++;
      return;
    }

    const type = field(row, "Type");
    const isExpiration = type === "Receive Deliver" && field(row, "Sub Type") === "Expiration";
    if (type !== "Trade" && !isExpiration) {
      result.ignored++;
      return;
    }

    const instrument = resolveInstrument(row);
    if (typeof instrument === "string") {
      result.skipped.push({ line, symbol, reason: instrument });
      return;
    }

    const quantity = parseQuantity(row);
    if (quantity === null) {
      result.skipped.push({ line, symbol, reason: `bad quantity "${field(row, "Quantity")}"` });
      return;
    }

    const tradeDate = toIsoDate(row["Date"]);
    if (!tradeDate) {
      result.skipped.push({ line, symbol, reason: `bad date "${field(row, "Date")}"` });
      return;
    }

    if (isExpiration) {
      // Worthless expiry: no cash moves, the lapsing leg is always a short one
      result.expirations.push({
        ...buildEvent(row, "close", "short", instrument, quantity, tradeDate),
        price: 0,
        fees: 0,
        grossValue: 0,
      });
      return;
    }

    const action = ACTIONS[field(row, "Action")];
    if (!action) {
      result.skipped.push({ line, symbol, reason: `unknown action "${field(row, "Action")}"` });
      return;
    }

    result.trades.push(buildEvent(row, action.intent, action.side, instrument, quantity, tradeDate));
  });

  return result;
}
