import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { existsSync, readFileSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { StorageError } from "../Errors";
import { mergeRoll, openPosition } from "../PositionEngine";
import { PositionStore } from "../PositionStore";
import type { Position } from "../Types";
import { legEvent, tempDir } from "./fixtures";

let root: string;
let store: PositionStore;

beforeEach(() => {
  root = tempDir("journal-store");
  store = new PositionStore(join(root, "Strategies"), join(root, "Archive"));
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

function closedCopy(position: Position): Position {
  return { ...structuredClone(position), status: "closed", closed: "2025-04-17", realized_pnl: 1.5 };
}

describe("PositionStore", () => {
  it("round-trips a position field for field", () => {
    const opened = openPosition([
      legEvent({ side: "short", strike: 100 }),
      legEvent({ side: "long", strike: 95, price: 0.5 }),
    ]);
    const { position } = mergeRoll(opened, [
      legEvent({ intent: "close", side: "short", strike: 100, orderId: "2", tradeDate: "2025-03-20" }),
    ]);

    const path = store.save(position);
    expect(path).toBe(join(root, "Strategies", "spx_2025-03-14.yaml"));
    expect(store.get(position.id)).toEqual({ position, location: "open", path });
    expect(store.listOpen()).toEqual({ positions: [position], errors: [] });
  });

  it("moves a closed position to the archive", () => {
    const position = openPosition([legEvent()]);
    store.save(position);

    const path = store.archive(closedCopy(position));
    expect(path).toBe(join(root, "Archive", "spx_2025-03-14.yaml"));
    expect(existsSync(join(root, "Strategies", "spx_2025-03-14.yaml"))).toBe(false);
    expect(store.listOpen().positions).toEqual([]);
    expect(store.get(position.id)?.location).toBe("archive");
    expect(store.listArchived().positions).toEqual([closedCopy(position)]);
  });

  it("recovers an interrupted archive move", () => {
    const position = openPosition([legEvent()]);
    store.archive(closedCopy(position));
    // Open copy left behind by a failed removal
    store.save(position);

    expect(store.recover()).toEqual(["spx_2025-03-14"]);
    expect(existsSync(store.pathFor(position.id, "open"))).toBe(false);
    expect(store.recover()).toEqual([]);
  });

  it("allocates surrogate ids for same-day positions", () => {
    expect(store.allocateId("SPX", "2025-03-14")).toBe("spx_2025-03-14");
    store.save(openPosition([legEvent()]));
    expect(store.allocateId("SPX", "2025-03-14")).toBe("spx_2025-03-14_2");
    expect(store.allocateId("SPX", "2025-03-14", new Set(["spx_2025-03-14_2"]))).toBe("spx_2025-03-14_3");
    expect(store.allocateId("QQQ", "2025-03-14")).toBe("qqq_2025-03-14");
  });

  it("collects order ids from open and archived records", () => {
    const a = openPosition([legEvent({ orderId: "11" })]);
    const b = openPosition([legEvent({ orderId: "12" })], { id: "spx_2025-03-14_2" });
    store.save(a);
    store.archive(closedCopy(b));
    expect([...store.knownOrderIds()].sort()).toEqual(["11", "12"]);
  });

  it("loads hand-written records with defaults", () => {
    writeFileSync(join(root, "Strategies", "spx_2025-03-01.yaml"), [
      "id: spx_2025-03-01",
      "ticker: SPX",
      "status: open",
      "opened: 2025-03-01",
      "initial_credit: 2.5",
      "order_ids: [1001, 1002]",
      "notes: |",
      "  first line",
      "  second line",
      "legs:",
      "  - ticker: SPX",
      "    type: put",
      "    strike: 5600",
      "    expiry: \"2025-04-17\"",
      "    side: short",
      "    contracts: 1",
      "    entry_price: 2.5",
      "",
    ].join("\n"));

    const [position] = store.listOpen().positions;
    expect(position?.strategy).toBe("Unnamed");
    expect(position?.roll_count).toBe(0);
    expect(position?.order_ids).toEqual(["1001", "1002"]);
    expect(position?.notes).toEqual(["first line", "second line"]);
    expect(position?.legs[0]?.multiplier).toBe(100);
    expect(position?.legs[0]?.status).toBe("active");
  });

  it("reports invalid records without hiding the readable ones", () => {
    const position = openPosition([legEvent()]);
    store.save(position);
    const brokenPath = join(root, "Strategies", "zzz.yaml");
    writeFileSync(brokenPath, "id: zzz\nlegs: nope\n");

    const { positions, errors } = store.listOpen();
    expect(positions).toEqual([position]);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(StorageError);
    expect(errors[0]?.path).toBe(brokenPath);
    expect(errors[0]?.message).toBe(`Failed to load ${brokenPath}: ticker: Required`);
    expect(() => store.get("zzz")).toThrow(StorageError);
  });

  it("leaves no temp files behind", () => {
    const position = openPosition([legEvent()]);
    const path = store.save(position);
    expect(existsSync(`${path}.tmp`)).toBe(false);
    expect(readFileSync(path, "utf-8")).toContain("id: spx_2025-03-14");
  });
});
