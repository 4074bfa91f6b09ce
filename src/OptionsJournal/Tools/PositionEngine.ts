/**
 * PositionEngine.ts — Reconcile leg events against positions
 *
 * Four operations, all pure with respect to their inputs: each returns a staged
 * copy of the position (same id) and never touches the one passed in, so a
 * failure midway leaves stored records alone.
 *
 *   openPosition      fresh leg group → new Position
 *   mergeRoll         close some legs, append new ones, bump roll_count
 *   applyExpirations  mark lapsed short legs expired, close when nothing is left
 *   closeExplicit     a closing batch that takes off the whole position
 *
 * Leg-level replays are harmless (closed legs never match again), but
 * position-level counters are not: callers dedupe batches by order id.
 */

import { ValidationError } from "./Errors";
import { classifyStrategy } from "./StrategyClassifier";
import type { EngineWarning, Leg, LegEvent, Position } from "./Types";
import { round2, unique } from "./Utils";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface OpenOptions {
  /** Surrogate id; defaults to the base key <ticker>_<opened> */
  id?: string;
}

export interface RollOptions {
  /** Date written to the roll note; defaults to the latest event date */
  date?: string;
}

export interface RollResult {
  position: Position;
  warnings: EngineWarning[];
}

export interface ExpirationResult {
  position: Position;
  /** True when every leg is now closed or expired and the position is closed */
  terminal: boolean;
  matched: LegEvent[];
  unmatched: LegEvent[];
  warnings: EngineWarning[];
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function positionKey(ticker: string, opened: string): string {
  return `${ticker.toLowerCase()}_${opened}`;
}

export function describeEvent(e: LegEvent): string {
  const { instrument: i } = e;
  return `${e.intent} ${e.side} ${i.root} ${i.type.toUpperCase()} ${i.strike} ${i.expiry} x${e.quantity}`;
}

export function describeLeg(leg: Leg): string {
  return `${leg.side} ${leg.type.toUpperCase()} ${leg.strike} (${leg.expiry}) x${leg.contracts}`;
}

function validateEvent(e: LegEvent): void {
  const { instrument: i } = e;
  if (!i.root) throw new ValidationError("instrument.root", `empty root (${e.symbol || "unknown symbol"})`);
  if (i.type !== "put" && i.type !== "call") throw new ValidationError("instrument.type", `unknown option type for ${i.root}`);
  if (!Number.isFinite(i.strike) || i.strike <= 0) throw new ValidationError("instrument.strike", `bad strike ${i.strike} for ${i.root}`);
  if (!/^\d{4}-\d{2}-\d{2}$/.test(i.expiry)) throw new ValidationError("instrument.expiry", `bad expiry "${i.expiry}" for ${i.root}`);
  if (!Number.isInteger(e.quantity) || e.quantity <= 0) throw new ValidationError("quantity", `expected a positive integer, got ${e.quantity}`);
  if (!Number.isFinite(e.price) || e.price < 0) throw new ValidationError("price", `expected a non-negative number, got ${e.price}`);
  if (!Number.isFinite(e.fees) || e.fees < 0) throw new ValidationError("fees", `expected a non-negative number, got ${e.fees}`);
}

function requireEvents(events: readonly LegEvent[]): void {
  if (events.length === 0) throw new ValidationError("events", "empty batch");
  events.forEach(validateEvent);
}

function requireOpen(position: Position): void {
  if (position.status !== "open") {
    throw new ValidationError("position.status", `${position.id} is already closed`);
  }
}

function requireSameRoot(position: Position, events: readonly LegEvent[]): void {
  for (const e of events) {
    if (e.instrument.root !== position.ticker) {
      throw new ValidationError("instrument.root", `${e.instrument.root} event cannot touch ${position.ticker} position ${position.id}`);
    }
  }
}

export function legFromEvent(e: LegEvent): Leg {
  return {
    ticker: e.instrument.root,
    type: e.instrument.type,
    strike: e.instrument.strike,
    expiry: e.instrument.expiry,
    side: e.side,
    contracts: e.quantity,
    entry_price: e.price,
    multiplier: e.multiplier,
    status: "active",
  };
}

export function orderIdsOf(events: readonly LegEvent[]): string[] {
  return unique(events.flatMap(e => (e.orderId ? [e.orderId] : [])));
}

/** Net credit of the legs still on: short legs add premium, long legs pay it */
export function creditFromActiveLegs(legs: readonly Leg[]): number {
  const credit = legs
    .filter(l => l.status === "active")
    .reduce((sum, l) => sum + (l.side === "short" ? 1 : -1) * l.entry_price * l.contracts, 0);
  return round2(credit);
}

function isTerminal(leg: Leg): boolean {
  return leg.status === "closed" || leg.status === "expired";
}

// ─── Matching ────────────────────────────────────────────────────────────────

/** Same contract, same side, still active */
function matchesActiveLeg(leg: Leg, e: LegEvent): boolean {
  return leg.status === "active"
    && leg.ticker === e.instrument.root
    && leg.type === e.instrument.type
    && leg.strike === e.instrument.strike
    && leg.expiry === e.instrument.expiry
    && leg.side === e.side;
}

/** Indices of every active leg the closing event could offset, in list order */
export function findActiveLegs(legs: readonly Leg[], e: LegEvent): number[] {
  const hits: number[] = [];
  legs.forEach((leg, i) => {
    if (matchesActiveLeg(leg, e)) hits.push(i);
  });
  return hits;
}

function matchesExpiringLeg(leg: Leg, e: LegEvent): boolean {
  return leg.status === "active"
    && leg.side === "short"
    && leg.ticker === e.instrument.root
    && leg.type === e.instrument.type
    && leg.strike === e.instrument.strike
    && leg.expiry === e.instrument.expiry
    && leg.contracts === e.quantity;
}

/** First hit, with a warning when the event could have offset more than one leg */
function firstHit(hits: readonly number[], e: LegEvent, warnings: EngineWarning[], what: string): number | undefined {
  if (hits.length > 1) {
    warnings.push({
      kind: "ambiguous-match",
      message: `${hits.length} active legs match ${what}: ${describeEvent(e)}; using the first`,
      event: e,
    });
  }
  return hits[0];
}

// ─── Operations ──────────────────────────────────────────────────────────────

export function openPosition(events: readonly LegEvent[], options: OpenOptions = {}): Position {
  requireEvents(events);
  const [first] = events;
  if (!first) throw new ValidationError("events", "empty batch");

  for (const e of events) {
    if (e.intent !== "open") {
      throw new ValidationError("intent", `cannot open a position with a closing trade (${describeEvent(e)})`);
    }
    if (e.tradeDate !== first.tradeDate) {
      throw new ValidationError("tradeDate", `batch spans ${first.tradeDate} and ${e.tradeDate}`);
    }
    if (e.instrument.root !== first.instrument.root) {
      throw new ValidationError("instrument.root", `batch mixes ${first.instrument.root} and ${e.instrument.root}`);
    }
  }

  const legs = events.map(legFromEvent);
  const gross = events.reduce((s, e) => s + e.grossValue, 0);
  const fees = events.reduce((s, e) => s + e.fees, 0);
  const ticker = first.instrument.root;

  return {
    id: options.id ?? positionKey(ticker, first.tradeDate),
    ticker,
    strategy: classifyStrategy(legs),
    status: "open",
    opened: first.tradeDate,
    initial_credit: round2(gross - fees),
    roll_count: 0,
    order_ids: orderIdsOf(events),
    tags: [],
    notes: [],
    legs,
  };
}

export function mergeRoll(position: Position, events: readonly LegEvent[], options: RollOptions = {}): RollResult {
  requireEvents(events);
  requireOpen(position);
  requireSameRoot(position, events);

  const next = structuredClone(position);
  const warnings: EngineWarning[] = [];
  let closed = 0;
  let opened = 0;

  for (const e of events) {
    if (e.intent === "open") {
      next.legs.push(legFromEvent(e));
      opened++;
      continue;
    }

    const idx = firstHit(findActiveLegs(next.legs, e), e, warnings, "close");
    const leg = idx === undefined ? undefined : next.legs[idx];
    if (!leg) {
      warnings.push({ kind: "no-match", message: `No active leg for close: ${describeEvent(e)}`, event: e });
      continue;
    }
    leg.status = "closed";
    closed++;
  }

  const date = options.date ?? events.map(e => e.tradeDate).sort().at(-1);
  const orders = orderIdsOf(events);
  const orderNote = orders.length > 0 ? ` (orders ${orders.join(", ")})` : "";

  next.roll_count += 1;
  next.tags = unique([...next.tags, "rolled"]);
  next.notes.push(`${date}: Rolled, closed ${closed} leg(s), opened ${opened} leg(s)${orderNote}`);
  next.initial_credit = creditFromActiveLegs(next.legs);
  next.order_ids = unique([...next.order_ids, ...orders]);

  return { position: next, warnings };
}

export function applyExpirations(position: Position, events: readonly LegEvent[]): ExpirationResult {
  const unchanged: ExpirationResult = {
    position,
    terminal: false,
    matched: [],
    unmatched: [...events],
    warnings: [],
  };
  if (events.length === 0 || position.status !== "open") return unchanged;
  events.forEach(validateEvent);

  const next = structuredClone(position);
  const warnings: EngineWarning[] = [];
  const matched: LegEvent[] = [];
  const unmatched: LegEvent[] = [];
  const notes: string[] = [];

  for (const e of events) {
    const hits: number[] = [];
    next.legs.forEach((leg, i) => {
      if (matchesExpiringLeg(leg, e)) hits.push(i);
    });

    const idx = firstHit(hits, e, warnings, "expiration");
    const leg = idx === undefined ? undefined : next.legs[idx];
    if (!leg) {
      unmatched.push(e);
      continue;
    }
    leg.status = "expired";
    matched.push(e);
    notes.push(`${e.tradeDate}: Expired worthless: ${leg.type.toUpperCase()} ${leg.strike} (${leg.expiry})`);
  }

  if (matched.length === 0) return { ...unchanged, warnings };

  next.notes.push(...notes);

  const terminal = next.legs.every(isTerminal);
  if (terminal) {
    const closedOn = matched.map(e => e.instrument.expiry).sort().at(-1) ?? matched[0]?.tradeDate;
    next.status = "closed";
    next.closed = closedOn;
    // Expired legs keep their whole premium; what is left of the credit is realized
    next.realized_pnl = next.initial_credit;
    next.notes.push(`${closedOn}: Closed via expiration`);
  }

  return { position: next, terminal, matched, unmatched, warnings };
}

export function closeExplicit(position: Position, events: readonly LegEvent[], closeDate: string): Position {
  requireEvents(events);
  requireOpen(position);
  requireSameRoot(position, events);

  for (const e of events) {
    if (e.intent !== "close") {
      throw new ValidationError("intent", `opening trade in a closing batch (${describeEvent(e)})`);
    }
  }

  const next = structuredClone(position);
  const orders = orderIdsOf(events);
  const orderNote = orders.length > 0 ? ` (orders ${orders.join(", ")})` : "";

  next.realized_pnl = round2(events.reduce((s, e) => s + (e.grossValue - e.fees), 0));
  next.status = "closed";
  next.closed = closeDate;
  next.order_ids = unique([...next.order_ids, ...orders]);
  next.notes.push(`${closeDate}: Closed, ${events.length} closing leg(s)${orderNote}`);

  return next;
}
