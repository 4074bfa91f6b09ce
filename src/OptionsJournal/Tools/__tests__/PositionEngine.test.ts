import { describe, it, expect } from "vitest";
import { ValidationError } from "../Errors";
import {
  applyExpirations,
  closeExplicit,
  creditFromActiveLegs,
  mergeRoll,
  openPosition,
  positionKey,
} from "../PositionEngine";
import { expiryEvent, legEvent } from "./fixtures";

const NEAR = "2025-04-17";
const FAR = "2025-05-16";

describe("openPosition", () => {
  it("opens a short put with its net credit", () => {
    const position = openPosition([legEvent({ strike: 100, price: 1.5 })]);

    expect(position).toEqual({
      id: "spx_2025-03-14",
      ticker: "SPX",
      strategy: "Short Put",
      status: "open",
      opened: "2025-03-14",
      initial_credit: 1.5,
      roll_count: 0,
      order_ids: ["1"],
      tags: [],
      notes: [],
      legs: [{
        ticker: "SPX",
        type: "put",
        strike: 100,
        expiry: NEAR,
        side: "short",
        contracts: 1,
        entry_price: 1.5,
        multiplier: 100,
        status: "active",
      }],
    });
  });

  it("subtracts fees from the credit", () => {
    const position = openPosition([legEvent({ price: 1.5, fees: 0.0112 })]);
    expect(position.initial_credit).toBe(1.49);
  });

  it("nets debits against credits and dedupes order ids", () => {
    const position = openPosition([
      legEvent({ side: "short", strike: 100, price: 2, orderId: "7" }),
      legEvent({ side: "long", strike: 95, price: 0.75, orderId: "7" }),
    ]);
    expect(position.initial_credit).toBe(1.25);
    expect(position.strategy).toBe("Put Vertical");
    expect(position.order_ids).toEqual(["7"]);
  });

  it("takes an explicit id", () => {
    expect(openPosition([legEvent()], { id: "spx_2025-03-14_2" }).id).toBe("spx_2025-03-14_2");
    expect(positionKey("SPX", "2025-03-14")).toBe("spx_2025-03-14");
  });

  it("rejects closing trades, empty batches and mixed batches", () => {
    expect(() => openPosition([legEvent({ intent: "close" })])).toThrow(ValidationError);
    expect(() => openPosition([])).toThrow(ValidationError);
    expect(() => openPosition([legEvent(), legEvent({ tradeDate: "2025-03-15" })])).toThrow(/batch spans/);
    expect(() => openPosition([legEvent(), legEvent({ root: "QQQ" })])).toThrow(/batch mixes/);
    expect(() => openPosition([legEvent({ strike: 0 })])).toThrow("Invalid instrument.strike: bad strike 0 for SPX");
  });
});

describe("mergeRoll", () => {
  const base = () => openPosition([legEvent({ strike: 100, expiry: NEAR, price: 1.5 })]);
  const rollEvents = () => [
    legEvent({ intent: "close", side: "short", strike: 100, expiry: NEAR, price: 0.5, orderId: "2", tradeDate: "2025-03-20" }),
    legEvent({ intent: "open", side: "short", strike: 100, expiry: FAR, price: 2, orderId: "2", tradeDate: "2025-03-20" }),
  ];

  it("closes the matched leg and appends the new one", () => {
    const position = base();
    const { position: rolled, warnings } = mergeRoll(position, rollEvents());

    expect(warnings).toEqual([]);
    expect(rolled.legs.map(l => [l.expiry, l.status])).toEqual([[NEAR, "closed"], [FAR, "active"]]);
    expect(rolled.roll_count).toBe(1);
    expect(rolled.tags).toEqual(["rolled"]);
    expect(rolled.notes).toEqual(["2025-03-20: Rolled, closed 1 leg(s), opened 1 leg(s) (orders 2)"]);
    expect(rolled.initial_credit).toBe(2);
    expect(rolled.order_ids).toEqual(["1", "2"]);
    expect(rolled.id).toBe(position.id);
    // Input untouched
    expect(position.legs).toHaveLength(1);
    expect(position.legs[0]?.status).toBe("active");
  });

  it("is a no-op at the leg level when the same close is replayed", () => {
    const { position: rolled } = mergeRoll(base(), rollEvents());
    const [close] = rollEvents();
    if (!close) throw new Error("fixture");

    const { position: replayed, warnings } = mergeRoll(rolled, [close]);
    expect(replayed.legs.map(l => l.status)).toEqual(["closed", "active"]);
    expect(warnings.map(w => w.kind)).toEqual(["no-match"]);
    // Position-level counters still move; callers dedupe by order id
    expect(replayed.roll_count).toBe(2);
    expect(replayed.tags).toEqual(["rolled"]);
  });

  it("matches the closing side on duplicate strikes", () => {
    const position = openPosition([
      legEvent({ side: "long", strike: 95 }),
      legEvent({ side: "short", strike: 100 }),
      legEvent({ side: "long", strike: 100 }),
      legEvent({ side: "short", strike: 105 }),
    ]);

    const btc = mergeRoll(position, [legEvent({ intent: "close", side: "short", strike: 100, orderId: "2" })]).position;
    expect(btc.legs.map(l => l.status)).toEqual(["active", "closed", "active", "active"]);

    const stc = mergeRoll(position, [legEvent({ intent: "close", side: "long", strike: 100, orderId: "2" })]).position;
    expect(stc.legs.map(l => l.status)).toEqual(["active", "active", "closed", "active"]);
  });

  it("warns when several active legs match", () => {
    const position = openPosition([legEvent({ strike: 100 }), legEvent({ strike: 100 })]);
    const { position: rolled, warnings } = mergeRoll(position, [legEvent({ intent: "close", side: "short", strike: 100 })]);
    expect(rolled.legs.map(l => l.status)).toEqual(["closed", "active"]);
    expect(warnings.map(w => w.kind)).toEqual(["ambiguous-match"]);
  });

  it("refuses closed positions and other roots", () => {
    const closed = { ...base(), status: "closed" as const };
    expect(() => mergeRoll(closed, rollEvents())).toThrow(ValidationError);
    expect(() => mergeRoll(base(), [legEvent({ root: "QQQ" })])).toThrow(/cannot touch SPX/);
  });
});

describe("creditFromActiveLegs", () => {
  it("counts only active legs", () => {
    const position = openPosition([
      legEvent({ side: "short", strike: 100, price: 2, quantity: 2 }),
      legEvent({ side: "long", strike: 95, price: 0.5, quantity: 2 }),
    ]);
    expect(creditFromActiveLegs(position.legs)).toBe(3);
    const [, long] = position.legs;
    if (!long) throw new Error("fixture");
    long.status = "closed";
    expect(creditFromActiveLegs(position.legs)).toBe(4);
  });
});

describe("applyExpirations", () => {
  it("closes the position when every leg has lapsed", () => {
    const position = openPosition([legEvent({ strike: 100, price: 1.5 })]);
    const result = applyExpirations(position, [expiryEvent({ strike: 100 })]);

    expect(result.terminal).toBe(true);
    expect(result.position.status).toBe("closed");
    expect(result.position.closed).toBe(NEAR);
    expect(result.position.realized_pnl).toBe(1.5);
    expect(result.position.legs[0]?.status).toBe("expired");
    expect(result.position.notes).toEqual([
      "2025-04-17: Expired worthless: PUT 100 (2025-04-17)",
      "2025-04-17: Closed via expiration",
    ]);
    expect(result.unmatched).toEqual([]);
  });

  it("keeps the position open while a leg is still active", () => {
    const position = openPosition([
      legEvent({ side: "short", strike: 100 }),
      legEvent({ side: "long", strike: 95, price: 0.5 }),
    ]);
    const result = applyExpirations(position, [expiryEvent({ strike: 100 })]);

    expect(result.terminal).toBe(false);
    expect(result.position.status).toBe("open");
    expect(result.position.closed).toBeUndefined();
    expect(result.position.legs.map(l => l.status)).toEqual(["expired", "active"]);
  });

  it("returns the position unchanged when nothing matches", () => {
    const position = openPosition([legEvent({ strike: 100 })]);
    const stray = expiryEvent({ strike: 105 });
    const wrongSize = expiryEvent({ strike: 100, quantity: 2 });

    const result = applyExpirations(position, [stray, wrongSize]);
    expect(result.position).toBe(position);
    expect(result.terminal).toBe(false);
    expect(result.matched).toEqual([]);
    expect(result.unmatched).toEqual([stray, wrongSize]);
    expect(result.warnings).toEqual([]);
  });

  it("expires the first of several matching legs and warns", () => {
    const position = openPosition([legEvent({ strike: 100 }), legEvent({ strike: 100 })]);
    const result = applyExpirations(position, [expiryEvent({ strike: 100 })]);

    expect(result.position.legs.map(l => l.status)).toEqual(["expired", "active"]);
    expect(result.terminal).toBe(false);
    expect(result.unmatched).toEqual([]);
    expect(result.warnings.map(w => w.message)).toEqual([
      "2 active legs match expiration: close short SPX PUT 100 2025-04-17 x1; using the first",
    ]);
  });
});

describe("closeExplicit", () => {
  it("realizes the closing cash and leaves leg statuses alone", () => {
    const position = openPosition([legEvent({ strike: 100, price: 1.5 })]);
    const closed = closeExplicit(
      position,
      [legEvent({ intent: "close", side: "short", strike: 100, price: 0.5, fees: 0.01, orderId: "3", tradeDate: "2025-03-25" })],
      "2025-03-25",
    );

    expect(closed.status).toBe("closed");
    expect(closed.closed).toBe("2025-03-25");
    expect(closed.realized_pnl).toBe(-0.51);
    expect(closed.order_ids).toEqual(["1", "3"]);
    expect(closed.notes).toEqual(["2025-03-25: Closed, 1 closing leg(s) (orders 3)"]);
    expect(closed.legs[0]?.status).toBe("active");
    expect(position.status).toBe("open");
  });

  it("rejects opening trades", () => {
    const position = openPosition([legEvent()]);
    expect(() => closeExplicit(position, [legEvent({ intent: "open" })], "2025-03-25")).toThrow(ValidationError);
  });
});
