#!/usr/bin/env tsx
/**
 * OptionsJournal.ts — Import broker transactions, track open positions, review results
 *
 * Primary workflow: drop the broker's transaction export into
 * Data/Transactions, run `import`, approve each proposed change, then run
 * `track` daily against the positions export.
 *
 * Usage:
 *   tsx OptionsJournal.ts import
 *   tsx OptionsJournal.ts import -f Data/Transactions/2025-03.csv --dry-run
 *   tsx OptionsJournal.ts track -d 2025-03-20
 *   tsx OptionsJournal.ts close spx_2025-03-14 --pnl 1.25
 *   tsx OptionsJournal.ts list --status all
 *   tsx OptionsJournal.ts show spx_2025-03-14
 *   tsx OptionsJournal.ts stats --by tag --range 2025-01-01 2025-03-31
 *   tsx OptionsJournal.ts migrate
 *   tsx OptionsJournal.ts recover
 */

import { parseArgs } from "util";
import { existsSync, readFileSync, readdirSync } from "fs";
import { basename, join, resolve } from "path";
import { createInterface } from "readline/promises";
import { loadConfig, type JournalConfig } from "./Config";
import { JournalError, describeError } from "./Errors";
import {
  applyProposal,
  dependentsOf,
  planImport,
  type Proposal,
} from "./ImportPlanner";
import { JournalDB, type DateRange, type GroupStats, type StatsGrouping } from "./JournalDB";
import { describeLeg } from "./PositionEngine";
import { PositionStore, type PositionList } from "./PositionStore";
import {
  appendClosedSummary,
  appendTrackingRow,
  archiveTrackingLog,
  buildTrackingRow,
  matchTrackedLegs,
  parsePositionsCsv,
  readTrackingLog,
} from "./TrackingLog";
import { parseTransactionsCsv } from "./TransactionParser";
import type { Position } from "./Types";
import { formatDate } from "./Utils";

// ─── Setup ───────────────────────────────────────────────────────────────────

interface Journal {
  config: JournalConfig;
  store: PositionStore;
}

function openJournal(dir: string | undefined): Journal {
  const config = loadConfig(dir ? resolve(dir) : undefined);
  return { config, store: new PositionStore(config.paths.strategies, config.paths.archive) };
}

function initDB(config: JournalConfig): JournalDB | null {
  if (config.dbConfig.provider !== "sqlite") return null;
  return new JournalDB(config.dbConfig.sqlite_path);
}

function readText(path: string): string {
  if (!existsSync(path)) {
    console.error(`File not found: ${path}`);
    process.exit(1);
  }
  return readFileSync(path, "utf-8");
}

/** Bookkeeping once a position lands in the archive */
function afterArchive(journal: Journal, position: Position): void {
  const { config } = journal;
  appendClosedSummary(config.paths.closed_summary, position);
  const movedLog = archiveTrackingLog(config.paths.logs, config.paths.archive, position.id);
  if (movedLog) console.log(`  Tracking log: ${movedLog}`);

  const db = initDB(config);
  if (db) {
    db.upsertPosition(position);
    db.close();
  }
}

/** Report records that failed to load; the rest carry on */
function loaded(list: PositionList): Position[] {
  for (const err of list.errors) console.error(`[ERROR] ${err.message}`);
  return list.positions;
}

// ─── Commands ────────────────────────────────────────────────────────────────

async function cmdImport(dir: string | undefined, file: string | undefined, yes: boolean, dryRun: boolean) {
  const journal = openJournal(dir);
  const { config, store } = journal;

  let files: string[];
  if (file) {
    files = [resolve(file)];
  } else {
    if (!existsSync(config.paths.transactions)) {
      console.error(`Transactions folder not found: ${config.paths.transactions}`);
      process.exit(1);
    }
    files = readdirSync(config.paths.transactions)
      .filter(f => f.toLowerCase().endsWith(".csv"))
      .sort()
      .map(f => join(config.paths.transactions, f));
  }

  if (files.length === 0) {
    console.log(`No transaction CSVs in ${config.paths.transactions}`);
    return;
  }

  const autoApprove = yes || config.autoApprove;
  const rl = autoApprove || dryRun ? null : createInterface({ input: process.stdin, output: process.stdout });
  const totals = { applied: 0, declined: 0, failed: 0 };

  try {
    for (const path of files) {
      const parsed = parseTransactionsCsv(readText(path));
      console.log(`\n=== ${basename(path)}: ${parsed.trades.length} trades, ${parsed.expirations.length} expirations ===\n`);
      for (const s of parsed.skipped) {
        console.log(`[WARN] line ${s.line} (${s.symbol || "no symbol"}): ${s.reason}`);
      }

      // Re-read the store per file so each plan sees what the last one committed
      const plan = planImport(parsed, loaded(store.listOpen()), {
        knownOrderIds: store.knownOrderIds(),
        allocateId: (ticker, opened, reserved) => store.allocateId(ticker, opened, reserved),
      });

      const declined = new Set<number>();
      for (const [i, proposal] of plan.proposals.entries()) {
        printProposal(proposal, i);
        if (proposal.kind === "skip" || proposal.kind === "reject") continue;
        if (dryRun) continue;

        if (dependentsOf(plan.proposals, declined).has(i)) {
          console.log(`  Dropped: builds on declined #${(proposal.dependsOn ?? i) + 1}`);
          declined.add(i);
          continue;
        }

        const approved = rl ? /^y(es)?$/i.test((await rl.question("  Apply? [y/N] ")).trim()) : true;
        if (!approved) {
          declined.add(i);
          totals.declined++;
          continue;
        }

        try {
          const result = applyProposal(store, proposal, position => afterArchive(journal, position));
          if (!result) continue;
          console.log(`  Written to: ${result.path}`);
          if (result.followUpError) {
            console.log(`  [WARN] #${i + 1} is closed, but its summary, log or database row was not updated (${result.followUpError}); run migrate`);
          }
          totals.applied++;
        } catch (err) {
          console.error(`  [ERROR] #${i + 1}: ${describeError(err)}`);
          declined.add(i);
          totals.failed++;
        }
      }

      for (const w of plan.warnings) console.log(`[WARN] ${w.message}`);
    }
  } finally {
    rl?.close();
  }

  if (dryRun) {
    console.log("\nDry run: nothing written.");
  } else {
    console.log(`\n  Applied: ${totals.applied}  Declined: ${totals.declined}  Failed: ${totals.failed}`);
  }
}

async function cmdTrack(dir: string | undefined, positionsFile: string | undefined, date: string) {
  const { config, store } = openJournal(dir);
  const path = positionsFile ? resolve(positionsFile) : config.paths.positions_csv;
  const rows = parsePositionsCsv(readText(path));

  const open = loaded(store.listOpen());
  if (open.length === 0) {
    console.log("No open positions.");
    return;
  }

  console.log(`\n=== Tracking ${open.length} open position(s): ${date} ===\n`);
  for (const position of open) {
    const matched = matchTrackedLegs(position, rows);
    if (matched.length === 0) {
      console.log(`[WARN] ${position.id}: no rows in ${basename(path)}`);
      continue;
    }
    const active = position.legs.filter(l => l.status === "active").length;
    if (matched.length < active) {
      console.log(`[WARN] ${position.id}: matched ${matched.length} of ${active} active legs`);
    }

    const row = buildTrackingRow(position, matched, date);
    appendTrackingRow(config.paths.logs, position.id, row);
    const pct = row["% of Max Profit"];
    console.log(`  ${position.id.padEnd(24)} PnL ${String(row["PnL"]).padStart(10)}  ${pct === null ? "-" : `${pct}%`} of max`);
  }
}

async function cmdClose(dir: string | undefined, id: string, pnl: number, date: string) {
  const journal = openJournal(dir);
  const stored = journal.store.get(id);
  if (!stored) {
    console.error(`Position not found: ${id}`);
    process.exit(1);
  }
  if (stored.location === "archive" || stored.position.status === "closed") {
    console.error(`Position already closed: ${id}`);
    process.exit(1);
  }

  const position = structuredClone(stored.position);
  for (const leg of position.legs) {
    if (leg.status === "active") leg.status = "closed";
  }
  position.status = "closed";
  position.closed = date;
  position.realized_pnl = pnl;
  position.notes.push(`${date}: Closed manually, realized ${pnl}`);

  const path = journal.store.archive(position);
  console.log(`Closed ${id}: realized ${pnl}`);
  console.log(`Written to: ${path}`);
  try {
    afterArchive(journal, position);
  } catch (err) {
    console.log(`[WARN] Summary, log or database row not updated (${describeError(err)}); run migrate`);
  }
}

async function cmdList(dir: string | undefined, status: string) {
  const { store } = openJournal(dir);
  const positions = [
    ...(status === "open" || status === "all" ? loaded(store.listOpen()) : []),
    ...(status === "closed" || status === "all" ? loaded(store.listArchived()) : []),
  ];

  if (positions.length === 0) {
    console.log(`No ${status === "all" ? "" : status + " "}positions.`);
    return;
  }
  printPositions(positions);
}

async function cmdShow(dir: string | undefined, id: string) {
  const { config, store } = openJournal(dir);
  const stored = store.get(id);
  if (!stored) {
    console.error(`Position not found: ${id}`);
    process.exit(1);
  }

  const { position } = stored;
  console.log(`\n=== ${position.id} (${stored.location}) ===\n`);
  console.log(`  Strategy:   ${position.strategy}`);
  console.log(`  Opened:     ${position.opened}${position.closed ? `  Closed: ${position.closed}` : ""}`);
  console.log(`  Credit:     ${position.initial_credit.toFixed(2)}`);
  if (position.realized_pnl !== undefined) console.log(`  Realized:   ${position.realized_pnl.toFixed(2)}`);
  console.log(`  Rolls:      ${position.roll_count}`);
  if (position.tags.length > 0) console.log(`  Tags:       ${position.tags.join(", ")}`);
  console.log("\n  Legs:");
  for (const leg of position.legs) {
    console.log(`    [${leg.status.padEnd(7)}] ${describeLeg(leg)} @ ${leg.entry_price.toFixed(2)}`);
  }
  if (position.notes.length > 0) {
    console.log("\n  Notes:");
    for (const note of position.notes) console.log(`    ${note}`);
  }

  const logDir = stored.location === "open" ? config.paths.logs : config.paths.archive;
  const log = readTrackingLog(logDir, id);
  const last = log.at(-1);
  if (last) {
    console.log(`\n  Tracking: ${log.length} row(s), last ${last["Date"]}: PnL ${last["PnL"]} (${last["% of Max Profit"] || "-"}% of max)`);
  }
}

async function cmdStats(dir: string | undefined, grouping: StatsGrouping, range: DateRange | undefined) {
  const { config, store } = openJournal(dir);

  // Without a configured database, index the archive in memory
  let db = initDB(config);
  if (!db) {
    db = new JournalDB(":memory:");
    db.upsertPositions(loaded(store.listArchived()));
  }

  const summary = db.getSummary(range);
  const stats = db.getStats(grouping, range);
  db.close();

  const period = range ? `${range.from} to ${range.to}` : "all time";
  console.log(`\n=== Closed positions: ${period} ===\n`);
  if (summary.trades === 0) {
    console.log("  No closed positions.");
    return;
  }
  console.log(`  Trades:       ${summary.trades} (${summary.rolled} rolled)`);
  console.log(`  Total P&L:    ${summary.total_pnl.toFixed(2)}`);
  console.log(`  Avg P&L:      ${summary.avg_pnl.toFixed(2)}`);
  console.log(`  Win rate:     ${summary.win_rate.toFixed(1)}% (${summary.winners}W / ${summary.losers}L)`);
  console.log(`  Avg hold:     ${summary.avg_hold_days.toFixed(1)} days`);
  printGroupStats(stats, grouping);
}

async function cmdMigrate(dir: string | undefined) {
  const { config, store } = openJournal(dir);
  const db = initDB(config);
  if (!db) {
    console.error("Database not configured. Check JournalConfig.yaml database section.");
    process.exit(1);
  }

  const archived = loaded(store.listArchived());
  const open = loaded(store.listOpen());
  console.log(`\n=== Migrating ${archived.length} archived and ${open.length} open positions ===\n`);
  db.upsertPositions([...archived, ...open]);
  const counts = db.getCounts();
  db.close();

  console.log(`  Closed: ${counts.closed}  Open: ${counts.open}  Tags: ${counts.tags}`);
  console.log(`  Database: ${config.dbConfig.sqlite_path}`);
}

async function cmdRecover(dir: string | undefined) {
  const { store } = openJournal(dir);
  const repaired = store.recover();
  if (repaired.length === 0) {
    console.log("Nothing to recover.");
    return;
  }
  for (const id of repaired) console.log(`  Removed stale open copy: ${id}`);
}

// ─── Display Helpers ─────────────────────────────────────────────────────────

function printProposal(p: Proposal, index: number) {
  const head = `#${index + 1} ${p.kind.toUpperCase().padEnd(6)}`;
  const after = p.dependsOn !== null ? `  (after #${p.dependsOn + 1})` : "";

  switch (p.kind) {
    case "open":
      console.log(`${head} ${p.position.id}  ${p.position.strategy}  credit ${p.position.initial_credit.toFixed(2)}`);
      for (const leg of p.position.legs) console.log(`         ${describeLeg(leg)} @ ${leg.entry_price.toFixed(2)}`);
      break;
    case "roll":
      console.log(`${head} ${p.position.id}  ${p.position.strategy}  credit ${p.before.initial_credit.toFixed(2)} → ${p.position.initial_credit.toFixed(2)}${after}`);
      console.log(`         ${p.position.notes.at(-1) ?? ""}`);
      break;
    case "close":
      console.log(`${head} ${p.position.id}  ${p.position.strategy}  realized ${(p.position.realized_pnl ?? 0).toFixed(2)}${after}`);
      break;
    case "expire":
      console.log(`${head} ${p.position.id}  ${p.events.length} leg(s) expired${p.terminal ? ", position closes" : ""}${after}`);
      break;
    case "skip":
    case "reject":
      console.log(`${head} ${p.batch.root} ${p.batch.tradeDate}: ${p.reason}`);
      break;
  }
  for (const w of p.warnings) console.log(`         [WARN] ${w.message}`);
}

function printPositions(positions: Position[]) {
  console.log("  " + "-".repeat(100));
  console.log("  " + [
    "ID".padEnd(24),
    "Strategy".padEnd(24),
    "Opened".padEnd(12),
    "Closed".padEnd(12),
    "Credit".padEnd(10),
    "P&L".padEnd(10),
    "Rolls",
  ].join(""));
  console.log("  " + "-".repeat(100));

  for (const p of positions) {
    const pnl = p.realized_pnl === undefined ? "" : (p.realized_pnl >= 0 ? "+" : "") + p.realized_pnl.toFixed(2);
    console.log("  " + [
      p.id.padEnd(24),
      p.strategy.padEnd(24),
      p.opened.padEnd(12),
      (p.closed ?? "").padEnd(12),
      p.initial_credit.toFixed(2).padEnd(10),
      pnl.padEnd(10),
      String(p.roll_count),
    ].join(""));
  }
  console.log("  " + "-".repeat(100));
}

function printGroupStats(stats: GroupStats[], grouping: StatsGrouping) {
  const label = grouping.charAt(0).toUpperCase() + grouping.slice(1);
  console.log(`\n  By ${grouping}:`);
  console.log("  " + "-".repeat(80));
  console.log("  " + [
    label.padEnd(26),
    "Trades".padEnd(8),
    "Win%".padEnd(8),
    "Total".padEnd(12),
    "Avg".padEnd(10),
    "Hold",
  ].join(""));
  console.log("  " + "-".repeat(80));
  for (const s of stats) {
    console.log("  " + [
      s.group.padEnd(26),
      String(s.trades).padEnd(8),
      s.win_rate.toFixed(0).padEnd(8),
      s.total_pnl.toFixed(2).padEnd(12),
      s.avg_pnl.toFixed(2).padEnd(10),
      s.avg_hold_days.toFixed(1),
    ].join(""));
  }
  console.log("  " + "-".repeat(80));
}

// ─── CLI Entry Point ─────────────────────────────────────────────────────────

function printUsage() {
  console.log(`
OptionsJournal — Import broker transactions, track open positions, review results

Usage:
  tsx OptionsJournal.ts <command> [options]

Commands:
  import    Plan position changes from transaction CSVs and apply approved ones
  track     Append today's Greeks and P&L to each open position's tracking log
  close     Close a position by hand with a realized P&L
  list      List open and/or closed positions
  show      Show one position with its legs, notes and latest tracking row
  stats     Closed-position statistics (win rate, P&L, hold time)
  migrate   Load every stored position into the database
  recover   Finish archive moves interrupted by a failure

Options for every command:
  --dir <path>                Journal directory holding Data/ (defaults to the install)

Options for 'import':
  -f, --file <path>           One transaction CSV (defaults to every CSV in Data/Transactions)
  --yes                       Apply every proposal without asking
  --dry-run                   Show proposals without writing

Options for 'track':
  --positions <path>          Positions export CSV (defaults to paths.positions_csv)
  -d, --date <YYYY-MM-DD>     Row date (defaults to today)

Options for 'close':
  <id>                        Position id
  --pnl <n>                   Realized P&L in premium points (required)
  -d, --date <YYYY-MM-DD>     Close date (defaults to today)

Options for 'list':
  --status <open|closed|all>  Which positions (default: open)

Options for 'stats':
  --by <strategy|ticker|tag>  Grouping (default: strategy)
  --range <from> <to>         Only positions closed in this range

Examples:
  tsx OptionsJournal.ts import --dry-run
  tsx OptionsJournal.ts import -f ~/Downloads/transactions.csv --yes
  tsx OptionsJournal.ts track --positions ~/Downloads/positions.csv
  tsx OptionsJournal.ts close spx_2025-03-14 --pnl 1.25 -d 2025-03-20
  tsx OptionsJournal.ts list --status closed
  tsx OptionsJournal.ts stats --by ticker --range 2025-01-01 2025-03-31
`);
}

const DIR_OPTION = { dir: { type: "string" } } as const;

function parseGrouping(raw: string | undefined): StatsGrouping {
  if (raw === undefined || raw === "strategy") return "strategy";
  if (raw === "ticker" || raw === "tag") return raw;
  console.error(`Unknown grouping: ${raw} (expected strategy, ticker or tag)`);
  process.exit(1);
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === "--help" || command === "-h") {
    printUsage();
    process.exit(0);
  }

  // Remove command from args for parseArgs
  const restArgs = args.slice(1);

  switch (command) {
    case "import": {
      const { values } = parseArgs({
        args: restArgs,
        options: {
          ...DIR_OPTION,
          file: { type: "string", short: "f" },
          yes: { type: "boolean", default: false },
          "dry-run": { type: "boolean", default: false },
        },
        allowPositionals: false,
      });
      await cmdImport(values.dir, values.file, values.yes || false, values["dry-run"] || false);
      break;
    }

    case "track": {
      const { values } = parseArgs({
        args: restArgs,
        options: {
          ...DIR_OPTION,
          positions: { type: "string" },
          date: { type: "string", short: "d" },
        },
        allowPositionals: false,
      });
      await cmdTrack(values.dir, values.positions, values.date || formatDate(new Date()));
      break;
    }

    case "close": {
      const { values, positionals } = parseArgs({
        args: restArgs,
        options: {
          ...DIR_OPTION,
          pnl: { type: "string" },
          date: { type: "string", short: "d" },
        },
        allowPositionals: true,
      });

      const [id] = positionals;
      const pnl = values.pnl === undefined ? NaN : Number(values.pnl);
      if (!id || !Number.isFinite(pnl)) {
        console.error("Usage: close <id> --pnl <number> [-d YYYY-MM-DD]");
        process.exit(1);
      }
      await cmdClose(values.dir, id, pnl, values.date || formatDate(new Date()));
      break;
    }

    case "list": {
      const { values } = parseArgs({
        args: restArgs,
        options: {
          ...DIR_OPTION,
          status: { type: "string", default: "open" },
        },
        allowPositionals: false,
      });
      const status = values.status || "open";
      if (!["open", "closed", "all"].includes(status)) {
        console.error(`Unknown status: ${status} (expected open, closed or all)`);
        process.exit(1);
      }
      await cmdList(values.dir, status);
      break;
    }

    case "show": {
      const { values, positionals } = parseArgs({
        args: restArgs,
        options: { ...DIR_OPTION },
        allowPositionals: true,
      });
      const [id] = positionals;
      if (!id) {
        console.error("Usage: show <id>");
        process.exit(1);
      }
      await cmdShow(values.dir, id);
      break;
    }

    case "stats": {
      const { values, positionals } = parseArgs({
        args: restArgs,
        options: {
          ...DIR_OPTION,
          by: { type: "string" },
          range: { type: "string", multiple: true },
        },
        allowPositionals: true,
      });

      // Parse --range: accepts either --range FROM TO or --range FROM --range TO
      let range: DateRange | undefined;
      const [first, second] = values.range ?? [];
      const to = second ?? positionals[0];
      if (first && to) {
        range = { from: first, to };
      } else if (first) {
        console.error("--range needs two dates: --range <from> <to>");
        process.exit(1);
      }

      await cmdStats(values.dir, parseGrouping(values.by), range);
      break;
    }

    case "migrate": {
      const { values } = parseArgs({ args: restArgs, options: { ...DIR_OPTION }, allowPositionals: false });
      await cmdMigrate(values.dir);
      break;
    }

    case "recover": {
      const { values } = parseArgs({ args: restArgs, options: { ...DIR_OPTION }, allowPositionals: false });
      await cmdRecover(values.dir);
      break;
    }

    default:
      console.error(`Unknown command: ${command}`);
      printUsage();
      process.exit(1);
  }
}

try {
  await main();
} catch (err) {
  if (!(err instanceof JournalError)) throw err;
  console.error(`[ERROR] ${err.message}`);
  process.exit(1);
}
