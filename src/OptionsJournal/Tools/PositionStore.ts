/**
 * PositionStore.ts — One YAML document per position, split into open and archive
 *
 * Layout:
 *   <openDir>/<id>.yaml      status: open
 *   <archiveDir>/<id>.yaml   status: closed, immutable history
 *
 * Every write goes to a temp file and is renamed into place. Closing a
 * position commits when the archive rename lands; the open copy is removed
 * afterwards. If that removal fails the record exists in both places and
 * `recover()` finishes the move (the archive copy wins).
 *
 * Usage:
 *   const store = new PositionStore("Data/Strategies", "Data/Archive");
 *   const id = store.allocateId("SPX", "2025-03-14");
 *   store.save({ ...position, id });
 */

import { existsSync, mkdirSync, readFileSync, readdirSync, renameSync, unlinkSync, writeFileSync } from "fs";
import { join } from "path";
import { stringify as yamlStringify, parse as yamlParse } from "yaml";
import { z } from "zod";
import { StorageError, describeError } from "./Errors";
import { positionKey } from "./PositionEngine";
import type { Position } from "./Types";

// ─── Schema ──────────────────────────────────────────────────────────────────

const LegSchema = z.object({
  ticker: z.string().min(1),
  type: z.enum(["put", "call"]),
  strike: z.number().positive(),
  expiry: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  side: z.enum(["long", "short"]),
  contracts: z.number().int().positive(),
  entry_price: z.number().nonnegative(),
  multiplier: z.number().positive().default(100),
  // Records written before leg statuses existed have no status on open legs
  status: z.enum(["active", "closed", "expired"]).default("active"),
});

const NotesSchema = z
  .union([z.array(z.string()), z.string()])
  .default([])
  .transform(notes => (typeof notes === "string" ? notes.split("\n").map(n => n.trim()).filter(Boolean) : notes));

const IdList = z.array(z.union([z.string(), z.number()]).transform(String)).default([]);

export const PositionSchema = z.object({
  id: z.string().min(1),
  ticker: z.string().min(1),
  strategy: z.string().default("Unnamed"),
  status: z.enum(["open", "closed"]),
  opened: z.string(),
  closed: z.string().optional(),
  initial_credit: z.number(),
  realized_pnl: z.number().optional(),
  roll_count: z.number().int().nonnegative().default(0),
  order_ids: IdList,
  tags: z.array(z.string()).default([]),
  notes: NotesSchema,
  legs: z.array(LegSchema),
});

export type StoreLocation = "open" | "archive";

/** Records that loaded, plus one error per file that did not */
export interface PositionList {
  positions: Position[];
  errors: StorageError[];
}

export interface StoredPosition {
  position: Position;
  location: StoreLocation;
  path: string;
}

// ─── Implementation ──────────────────────────────────────────────────────────

export class PositionStore {
  constructor(readonly openDir: string, readonly archiveDir: string) {
    for (const dir of [openDir, archiveDir]) {
      try {
        mkdirSync(dir, { recursive: true });
      } catch (err) {
        throw new StorageError(dir, "create directory", err);
      }
    }
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  listOpen(): PositionList {
    const { positions, errors } = this.listDir(this.openDir);
    return { positions: positions.filter(p => p.status === "open"), errors };
  }

  listArchived(): PositionList {
    return this.listDir(this.archiveDir);
  }

  get(id: string): StoredPosition | null {
    for (const location of ["open", "archive"] as const) {
      const path = this.pathFor(id, location);
      if (existsSync(path)) return { position: this.read(path), location, path };
    }
    return null;
  }

  /** Order ids already recorded in any readable open or archived position */
  knownOrderIds(): Set<string> {
    const ids = new Set<string>();
    for (const p of [...this.listOpen().positions, ...this.listArchived().positions]) {
      for (const id of p.order_ids) ids.add(id);
    }
    return ids;
  }

  /** <ticker>_<opened>, then _2, _3 … for further positions opened that day */
  allocateId(ticker: string, opened: string, reserved: ReadonlySet<string> = new Set()): string {
    const base = positionKey(ticker, opened);
    const taken = (id: string) =>
      reserved.has(id) || existsSync(this.pathFor(id, "open")) || existsSync(this.pathFor(id, "archive"));

    if (!taken(base)) return base;
    let n = 2;
    while (taken(`${base}_${n}`)) n++;
    return `${base}_${n}`;
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  /** Write an open position to the open location */
  save(position: Position): string {
    const path = this.pathFor(position.id, "open");
    this.writeAtomic(path, position);
    return path;
  }

  /**
   * Move a closed position to the archive. The position stays open until the
   * archive rename succeeds.
   */
  archive(position: Position): string {
    const archivePath = this.pathFor(position.id, "archive");
    this.writeAtomic(archivePath, position);

    const openPath = this.pathFor(position.id, "open");
    if (existsSync(openPath)) {
      try {
        unlinkSync(openPath);
      } catch (err) {
        throw new StorageError(openPath, "remove archived position (run recover)", err);
      }
    }
    return archivePath;
  }

  /** Finish interrupted archive moves. Returns the ids that were repaired. */
  recover(): string[] {
    const repaired: string[] = [];
    for (const file of this.yamlFiles(this.openDir)) {
      const id = file.replace(/\.yaml$/, "");
      if (!existsSync(this.pathFor(id, "archive"))) continue;
      const openPath = join(this.openDir, file);
      try {
        unlinkSync(openPath);
      } catch (err) {
        throw new StorageError(openPath, "remove", err);
      }
      repaired.push(id);
    }
    return repaired;
  }

  // ─── Internals ───────────────────────────────────────────────────────

  pathFor(id: string, location: StoreLocation): string {
    return join(location === "open" ? this.openDir : this.archiveDir, `${id}.yaml`);
  }

  private yamlFiles(dir: string): string[] {
    try {
      return readdirSync(dir).filter(f => f.endsWith(".yaml")).sort();
    } catch (err) {
      throw new StorageError(dir, "list", err);
    }
  }

  private listDir(dir: string): PositionList {
    const list: PositionList = { positions: [], errors: [] };
    for (const file of this.yamlFiles(dir)) {
      try {
        list.positions.push(this.read(join(dir, file)));
      } catch (err) {
        if (!(err instanceof StorageError)) throw err;
        list.errors.push(err);
      }
    }
    return list;
  }

  private read(path: string): Position {
    let content: string;
    try {
      content = readFileSync(path, "utf-8");
    } catch (err) {
      throw new StorageError(path, "read", err);
    }

    let raw: unknown;
    try {
      raw = yamlParse(content);
    } catch (err) {
      throw new StorageError(path, "parse", err);
    }

    const result = PositionSchema.safeParse(raw);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? `${issue.path.join(".") || "record"}: ${issue.message}` : "invalid record";
      throw new StorageError(path, "load", new Error(where));
    }
    return result.data;
  }

  private writeAtomic(path: string, position: Position): void {
    const tmp = `${path}.tmp`;
    try {
      writeFileSync(tmp, yamlStringify(position));
      renameSync(tmp, path);
    } catch (err) {
      if (existsSync(tmp)) {
        try {
          unlinkSync(tmp);
        } catch (cleanupErr) {
          throw new StorageError(path, `write (temp file left behind: ${describeError(cleanupErr)})`, err);
        }
      }
      throw new StorageError(path, "write", err);
    }
  }
}
