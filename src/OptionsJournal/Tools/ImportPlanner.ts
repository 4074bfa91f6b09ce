/**
 * ImportPlanner.ts — Turn a transaction file into proposals, commit approved ones
 *
 * Trade rows are batched by (trade date, root ticker): everything done on one
 * underlying in one day is one strategy action, whatever the broker's order
 * boundaries (a calendar's legs often post as separate orders). Two unrelated
 * same-day trades on one ticker therefore land in one batch.
 *
 * Planning never writes. Each proposal carries the staged position so the
 * caller can show it, ask for approval and only then `commitProposal`.
 * Proposals see the staged results of earlier ones; `dependsOn` points at the
 * proposal whose output a later one builds on, so declining one lets the
 * caller drop its dependents.
 */

import { ValidationError, describeError } from "./Errors";
import {
  applyExpirations,
  closeExplicit,
  describeEvent,
  findActiveLegs,
  mergeRoll,
  openPosition,
  orderIdsOf,
  positionKey,
} from "./PositionEngine";
import type { PositionStore } from "./PositionStore";
import type { EngineWarning, LegEvent, Position } from "./Types";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface OrderBatch {
  key: string;
  tradeDate: string;
  root: string;
  events: LegEvent[];
}

interface ProposalBase {
  /** Index of the proposal whose staged position this one builds on */
  dependsOn: number | null;
  warnings: EngineWarning[];
}

export type Proposal =
  | (ProposalBase & { kind: "open"; batch: OrderBatch; position: Position })
  | (ProposalBase & { kind: "roll"; batch: OrderBatch; before: Position; position: Position })
  | (ProposalBase & { kind: "close"; batch: OrderBatch; before: Position; position: Position })
  | (ProposalBase & { kind: "expire"; events: LegEvent[]; before: Position; position: Position; terminal: boolean })
  | (ProposalBase & { kind: "skip"; batch: OrderBatch; reason: string })
  | (ProposalBase & { kind: "reject"; batch: OrderBatch; reason: string });

export interface ImportPlan {
  proposals: Proposal[];
  /** Expiration events no open position could absorb */
  warnings: EngineWarning[];
}

export type IdAllocator = (ticker: string, opened: string, reserved: ReadonlySet<string>) => string;

export interface PlanOptions {
  knownOrderIds?: ReadonlySet<string>;
  allocateId?: IdAllocator;
}

export interface PlanInput {
  trades: readonly LegEvent[];
  expirations: readonly LegEvent[];
}

interface Staged {
  position: Position;
  source: number | null;
}

type Step =
  | { date: string; root: string; kind: "trades"; batch: OrderBatch }
  | { date: string; root: string; kind: "expirations"; events: LegEvent[] };

// ─── Batching ────────────────────────────────────────────────────────────────

function byDateThenRoot(a: { date: string; root: string }, b: { date: string; root: string }): number {
  return a.date.localeCompare(b.date) || a.root.localeCompare(b.root);
}

export function groupIntoBatches(events: readonly LegEvent[]): OrderBatch[] {
  const groups = new Map<string, OrderBatch>();
  for (const e of events) {
    const key = `${e.tradeDate}|${e.instrument.root}`;
    let batch = groups.get(key);
    if (!batch) {
      batch = { key, tradeDate: e.tradeDate, root: e.instrument.root, events: [] };
      groups.set(key, batch);
    }
    batch.events.push(e);
  }
  return [...groups.values()].sort((a, b) => byDateThenRoot(
    { date: a.tradeDate, root: a.root },
    { date: b.tradeDate, root: b.root },
  ));
}

function buildSteps(input: PlanInput): Step[] {
  const steps: Step[] = groupIntoBatches(input.trades).map(batch => ({
    date: batch.tradeDate,
    root: batch.root,
    kind: "trades" as const,
    batch,
  }));

  for (const batch of groupIntoBatches(input.expirations)) {
    steps.push({ date: batch.tradeDate, root: batch.root, kind: "expirations", events: batch.events });
  }

  // Same day: trades first, then whatever expired
  return steps.sort((a, b) => byDateThenRoot(a, b) || (a.kind === b.kind ? 0 : a.kind === "trades" ? -1 : 1));
}

// ─── Matching ────────────────────────────────────────────────────────────────

interface CloseSimulation {
  matched: LegEvent[];
  unmatched: LegEvent[];
  remainingActive: number;
}

/** Dry-run the closing events against a copy of the legs */
function simulateCloses(position: Position, closes: readonly LegEvent[]): CloseSimulation {
  const legs = position.legs.map(l => ({ ...l }));
  const matched: LegEvent[] = [];
  const unmatched: LegEvent[] = [];
  for (const e of closes) {
    const [idx] = findActiveLegs(legs, e);
    const leg = idx === undefined ? undefined : legs[idx];
    if (!leg) {
      unmatched.push(e);
      continue;
    }
    leg.status = "closed";
    matched.push(e);
  }
  return { matched, unmatched, remainingActive: legs.filter(l => l.status === "active").length };
}

/** Open position on the batch's root with the most matching legs; earliest wins ties */
function pickTarget(staged: Staged[], root: string, closes: readonly LegEvent[]): { target: Staged; sim: CloseSimulation } | null {
  let best: { target: Staged; sim: CloseSimulation } | null = null;
  for (const entry of staged) {
    if (entry.position.ticker !== root || entry.position.status !== "open") continue;
    const sim = simulateCloses(entry.position, closes);
    if (sim.matched.length === 0) continue;
    if (!best || sim.matched.length > best.sim.matched.length) best = { target: entry, sim };
  }
  return best;
}

function noMatchWarnings(events: readonly LegEvent[], what: string): EngineWarning[] {
  return events.map(e => ({ kind: "no-match" as const, message: `No open position for ${what}: ${describeEvent(e)}`, event: e }));
}

function defaultAllocator(staged: () => Iterable<Staged>): IdAllocator {
  return (ticker, opened, reserved) => {
    const taken = new Set([...reserved, ...[...staged()].map(s => s.position.id)]);
    const base = positionKey(ticker, opened);
    if (!taken.has(base)) return base;
    let n = 2;
    while (taken.has(`${base}_${n}`)) n++;
    return `${base}_${n}`;
  };
}

function compareStaged(a: Staged, b: Staged): number {
  return a.position.opened.localeCompare(b.position.opened) || a.position.id.localeCompare(b.position.id);
}

// ─── Planning ────────────────────────────────────────────────────────────────

export function planImport(input: PlanInput, openPositions: readonly Position[], options: PlanOptions = {}): ImportPlan {
  const working = new Map<string, Staged>();
  for (const position of openPositions) {
    if (position.status === "open") working.set(position.id, { position, source: null });
  }

  const stagedList = () => [...working.values()].sort(compareStaged);
  const allocate = options.allocateId ?? defaultAllocator(() => working.values());
  const reserved = new Set<string>();
  const known = new Set(options.knownOrderIds ?? []);

  const proposals: Proposal[] = [];
  const warnings: EngineWarning[] = [];

  const push = (proposal: Proposal): number => proposals.push(proposal) - 1;

  for (const step of buildSteps(input)) {
    if (step.kind === "expirations") {
      let remaining: LegEvent[] = step.events;
      for (const entry of stagedList()) {
        if (remaining.length === 0) break;
        if (entry.position.ticker !== step.root) continue;

        const result = applyExpirations(entry.position, remaining);
        if (result.matched.length === 0) continue;
        remaining = result.unmatched;

        const index = push({
          kind: "expire",
          events: result.matched,
          before: entry.position,
          position: result.position,
          terminal: result.terminal,
          dependsOn: entry.source,
          warnings: result.warnings,
        });
        if (result.terminal) working.delete(entry.position.id);
        else working.set(entry.position.id, { position: result.position, source: index });
      }
      warnings.push(...noMatchWarnings(remaining, "expiration"));
      continue;
    }

    // Orders recorded by an earlier import drop out; the rest of the batch is new
    const fresh = step.batch.events.filter(e => !e.orderId || !known.has(e.orderId));
    if (fresh.length === 0) {
      const orderIds = orderIdsOf(step.batch.events);
      push({ kind: "skip", batch: step.batch, reason: `already imported (orders ${orderIds.join(", ")})`, dependsOn: null, warnings: [] });
      continue;
    }
    const batch = fresh.length === step.batch.events.length ? step.batch : { ...step.batch, events: fresh };
    const orderIds = orderIdsOf(batch.events);

    const closes = batch.events.filter(e => e.intent === "close");
    const opens = batch.events.filter(e => e.intent === "open");

    try {
      const match = closes.length > 0 ? pickTarget(stagedList(), batch.root, closes) : null;

      if (!match) {
        const dropped = noMatchWarnings(closes, "close");
        if (opens.length === 0) {
          push({ kind: "reject", batch, reason: "closing trades match no open position", dependsOn: null, warnings: dropped });
          continue;
        }
        const id = allocate(batch.root, batch.tradeDate, reserved);
        const position = openPosition(opens, { id });
        reserved.add(id);
        const index = push({ kind: "open", batch, position, dependsOn: null, warnings: dropped });
        working.set(id, { position, source: index });
      } else {
        const { target, sim } = match;
        if (opens.length === 0 && sim.remainingActive === 0) {
          // Repeated or stray close rows do not count toward the realized P&L
          const position = closeExplicit(target.position, sim.matched, batch.tradeDate);
          const stray = noMatchWarnings(sim.unmatched, "close");
          push({ kind: "close", batch, before: target.position, position, dependsOn: target.source, warnings: stray });
          working.delete(target.position.id);
        } else {
          const result = mergeRoll(target.position, batch.events, { date: batch.tradeDate });
          const index = push({
            kind: "roll",
            batch,
            before: target.position,
            position: result.position,
            dependsOn: target.source,
            warnings: result.warnings,
          });
          working.set(target.position.id, { position: result.position, source: index });
        }
      }
      for (const id of orderIds) known.add(id);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      push({ kind: "reject", batch, reason: err.message, dependsOn: null, warnings: [] });
    }
  }

  return { proposals, warnings };
}

// ─── Commit ──────────────────────────────────────────────────────────────────

export interface CommitResult {
  path: string;
  archived: boolean;
}

/** Persist one approved proposal. Skips and rejects write nothing. */
export function commitProposal(store: PositionStore, proposal: Proposal): CommitResult | null {
  switch (proposal.kind) {
    case "open":
    case "roll":
      return { path: store.save(proposal.position), archived: false };
    case "close":
      return { path: store.archive(proposal.position), archived: true };
    case "expire":
      return proposal.terminal
        ? { path: store.archive(proposal.position), archived: true }
        : { path: store.save(proposal.position), archived: false };
    case "skip":
    case "reject":
      return null;
  }
}

export interface ApplyResult extends CommitResult {
  /** Set when the archive follow-up failed after the commit landed */
  followUpError: string | null;
}

/**
 * Commit a proposal, then run `afterArchive` for positions that moved to the
 * archive. Commit failures throw; a follow-up failure is reported in the
 * result, since the position is already closed on disk.
 */
export function applyProposal(
  store: PositionStore,
  proposal: Proposal,
  afterArchive: (position: Position) => void,
): ApplyResult | null {
  const result = commitProposal(store, proposal);
  if (!result) return null;
  if (!result.archived || proposal.kind === "skip" || proposal.kind === "reject") {
    return { ...result, followUpError: null };
  }

  try {
    afterArchive(proposal.position);
  } catch (err) {
    return { ...result, followUpError: describeError(err) };
  }
  return { ...result, followUpError: null };
}

/** Indices that must be dropped because something they build on was declined */
export function dependentsOf(proposals: readonly Proposal[], declined: ReadonlySet<number>): Set<number> {
  const dropped = new Set(declined);
  proposals.forEach((p, i) => {
    if (p.dependsOn !== null && dropped.has(p.dependsOn)) dropped.add(i);
  });
  return dropped;
}
