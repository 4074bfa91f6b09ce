/**
 * StrategyClassifier.ts — Name a set of option legs
 *
 * Legs are reduced to a fingerprint (partitioned by type and side, strikes
 * sorted, expiry set) and run through an ordered rule table. First rule that
 * matches wins; some leg sets satisfy several loose shapes, so order matters.
 * Unknown shapes come back as "Unnamed".
 */

import type { Leg } from "./Types";

// ─── Types ───────────────────────────────────────────────────────────────────

export type ClassifiableLeg = Pick<Leg, "type" | "side" | "strike" | "expiry">;

export interface LegFingerprint {
  count: number;
  puts: ClassifiableLeg[];
  calls: ClassifiableLeg[];
  shortPuts: ClassifiableLeg[];
  longPuts: ClassifiableLeg[];
  shortCalls: ClassifiableLeg[];
  longCalls: ClassifiableLeg[];
  /** All legs, ascending strike (long before short on equal strikes) */
  byStrike: ClassifiableLeg[];
  expiries: Set<string>;
}

export interface StrategyRule {
  name: string;
  /** Returns the label when the rule applies, null otherwise */
  match: (fp: LegFingerprint) => string | null;
}

export const UNNAMED = "Unnamed";

const WING_TOLERANCE = 0.01;

// ─── Fingerprint ─────────────────────────────────────────────────────────────

function compareLegs(a: ClassifiableLeg, b: ClassifiableLeg): number {
  if (a.strike !== b.strike) return a.strike - b.strike;
  if (a.side !== b.side) return a.side === "long" ? -1 : 1;
  if (a.type !== b.type) return a.type === "put" ? -1 : 1;
  return a.expiry.localeCompare(b.expiry);
}

export function fingerprint(legs: readonly ClassifiableLeg[]): LegFingerprint {
  const byStrike = [...legs].sort(compareLegs);
  const puts = byStrike.filter(l => l.type === "put");
  const calls = byStrike.filter(l => l.type === "call");

  return {
    count: byStrike.length,
    puts,
    calls,
    shortPuts: puts.filter(l => l.side === "short"),
    longPuts: puts.filter(l => l.side === "long"),
    shortCalls: calls.filter(l => l.side === "short"),
    longCalls: calls.filter(l => l.side === "long"),
    byStrike,
    expiries: new Set(byStrike.map(l => l.expiry)),
  };
}

// ─── Rules ───────────────────────────────────────────────────────────────────

function calendar112(fp: LegFingerprint): string | null {
  if (fp.count !== 3 || fp.puts.length !== 3) return null;
  if (fp.shortPuts.length !== 2 || fp.longPuts.length !== 1) return null;

  const [near, far] = [...fp.shortPuts].sort((a, b) => a.expiry.localeCompare(b.expiry));
  const long = fp.longPuts[0];
  if (!near || !far || !long) return null;

  // Debit spread at the far expiry, extra short put at a nearer one
  return near.expiry < far.expiry && long.expiry === far.expiry ? "Calendar 1-1-2" : null;
}

function putCondor(fp: LegFingerprint): string | null {
  if (fp.count !== 4 || fp.puts.length !== 4 || fp.expiries.size !== 1) return null;

  const [w1, b1, b2, w2] = fp.puts;
  if (!w1 || !b1 || !b2 || !w2) return null;
  const shape = [w1.side, b1.side, b2.side, w2.side].join("-");
  if (shape !== "long-short-short-long") return null;

  const lowerWing = b1.strike - w1.strike;
  const upperWing = w2.strike - b2.strike;
  return Math.abs(lowerWing - upperWing) < WING_TOLERANCE ? "Put Condor" : "Broken Wing Put Condor";
}

function ironCondor(fp: LegFingerprint): string | null {
  if (fp.count !== 4 || fp.expiries.size !== 1) return null;
  const [longPut] = fp.longPuts;
  const [shortPut] = fp.shortPuts;
  const [shortCall] = fp.shortCalls;
  const [longCall] = fp.longCalls;
  if (fp.longPuts.length !== 1 || fp.shortPuts.length !== 1) return null;
  if (fp.shortCalls.length !== 1 || fp.longCalls.length !== 1) return null;
  if (!longPut || !shortPut || !shortCall || !longCall) return null;

  const ordered = longPut.strike < shortPut.strike
    && shortPut.strike <= shortCall.strike
    && shortCall.strike < longCall.strike;
  return ordered ? "Iron Condor" : null;
}

function vertical(fp: LegFingerprint): string | null {
  if (fp.count !== 2) return null;
  const shorts = fp.shortPuts.length + fp.shortCalls.length;

  if (fp.puts.length === 2) return shorts === 1 ? "Put Vertical" : "Put Spread";
  if (fp.calls.length === 2) return shorts === 1 ? "Call Vertical" : "Call Spread";
  return null;
}

function strangle(fp: LegFingerprint): string | null {
  return fp.count === 2 && fp.shortPuts.length === 1 && fp.shortCalls.length === 1 ? "Strangle" : null;
}

function shortSingle(fp: LegFingerprint): string | null {
  if (fp.count !== 1) return null;
  if (fp.shortPuts.length === 1) return "Short Put";
  if (fp.shortCalls.length === 1) return "Short Call";
  return null;
}

/** Evaluated top to bottom. Insert new shapes where their priority belongs. */
export const STRATEGY_RULES: readonly StrategyRule[] = [
  { name: "calendar-1-1-2", match: calendar112 },
  { name: "put-condor", match: putCondor },
  { name: "iron-condor", match: ironCondor },
  { name: "vertical", match: vertical },
  { name: "strangle", match: strangle },
  { name: "short-single", match: shortSingle },
];

// ─── Classification ──────────────────────────────────────────────────────────

export function classifyStrategy(legs: readonly ClassifiableLeg[], rules: readonly StrategyRule[] = STRATEGY_RULES): string {
  const fp = fingerprint(legs);
  for (const rule of rules) {
    const label = rule.match(fp);
    if (label) return label;
  }
  return UNNAMED;
}
