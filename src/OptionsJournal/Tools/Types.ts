/**
 * Types.ts — Shared shapes for the options journal
 *
 * LegEvent is the normalized form of one broker transaction row. Position and
 * Leg are the persisted records (snake_case, written as YAML).
 *
 * Money on events and positions is in premium points (per-share option price
 * units): broker dollar amounts are divided by the contract multiplier.
 */

// ─── Events ──────────────────────────────────────────────────────────────────

export type OptionType = "put" | "call";
export type Side = "long" | "short";
export type Intent = "open" | "close";

export interface Instrument {
  root: string;
  type: OptionType;
  strike: number;
  /** YYYY-MM-DD */
  expiry: string;
}

export interface LegEvent {
  instrument: Instrument;
  intent: Intent;
  /** Side of the position this row opens or closes, not the trade direction */
  side: Side;
  quantity: number;
  price: number;
  fees: number;
  /** Signed cash effect, credit positive */
  grossValue: number;
  multiplier: number;
  orderId: string | null;
  tradeDate: string;
  symbol: string;
}

// ─── Records ─────────────────────────────────────────────────────────────────

export type LegStatus = "active" | "closed" | "expired";
export type PositionStatus = "open" | "closed";

export interface Leg {
  ticker: string;
  type: OptionType;
  strike: number;
  expiry: string;
  side: Side;
  contracts: number;
  entry_price: number;
  multiplier: number;
  status: LegStatus;
}

export interface Position {
  id: string;
  ticker: string;
  strategy: string;
  status: PositionStatus;
  opened: string;
  closed?: string;
  initial_credit: number;
  realized_pnl?: number;
  roll_count: number;
  order_ids: string[];
  tags: string[];
  notes: string[];
  legs: Leg[];
}

// ─── Warnings ────────────────────────────────────────────────────────────────

export type WarningKind = "no-match" | "ambiguous-match";

export interface EngineWarning {
  kind: WarningKind;
  message: string;
  event: LegEvent;
}
