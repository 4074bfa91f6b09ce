import { describe, it, expect } from "vitest";
import { classifyStrategy, fingerprint, UNNAMED, type ClassifiableLeg, type StrategyRule } from "../StrategyClassifier";

const E = "2025-04-17";
const FAR = "2025-05-16";

function put(side: "long" | "short", strike: number, expiry = E): ClassifiableLeg {
  return { type: "put", side, strike, expiry };
}

function call(side: "long" | "short", strike: number, expiry = E): ClassifiableLeg {
  return { type: "call", side, strike, expiry };
}

describe("classifyStrategy", () => {
  it("names single short legs", () => {
    expect(classifyStrategy([put("short", 100)])).toBe("Short Put");
    expect(classifyStrategy([call("short", 110)])).toBe("Short Call");
    expect(classifyStrategy([put("long", 100)])).toBe(UNNAMED);
  });

  it("separates symmetric from broken-wing put condors", () => {
    expect(classifyStrategy([put("long", 95), put("short", 100), put("short", 105), put("long", 110)])).toBe("Put Condor");
    expect(classifyStrategy([put("long", 95), put("short", 100), put("short", 105), put("long", 112)])).toBe("Broken Wing Put Condor");
  });

  it("does not depend on leg order", () => {
    const legs = [put("short", 105), put("long", 110), put("long", 95), put("short", 100)];
    expect(classifyStrategy(legs)).toBe("Put Condor");
    expect(classifyStrategy([...legs].reverse())).toBe("Put Condor");
  });

  it("requires one expiry for a condor", () => {
    expect(classifyStrategy([put("long", 95), put("short", 100), put("short", 105), put("long", 110, FAR)])).toBe(UNNAMED);
  });

  it("recognizes the 1-1-2 calendar", () => {
    expect(classifyStrategy([put("short", 90), put("long", 100, FAR), put("short", 95, FAR)])).toBe("Calendar 1-1-2");
    // Long put at the near expiry is not the same structure
    expect(classifyStrategy([put("short", 90), put("long", 100), put("short", 95, FAR)])).toBe(UNNAMED);
  });

  it("names verticals and spreads", () => {
    expect(classifyStrategy([put("long", 95), put("short", 100)])).toBe("Put Vertical");
    expect(classifyStrategy([call("short", 110), call("long", 115)])).toBe("Call Vertical");
    expect(classifyStrategy([put("short", 95), put("short", 100)])).toBe("Put Spread");
    expect(classifyStrategy([call("long", 110), call("long", 115)])).toBe("Call Spread");
  });

  it("names iron condors and strangles", () => {
    expect(classifyStrategy([put("long", 90), put("short", 95), call("short", 105), call("long", 110)])).toBe("Iron Condor");
    expect(classifyStrategy([put("short", 90), call("short", 110)])).toBe("Strangle");
  });

  it("runs a custom rule table in order", () => {
    const rules: StrategyRule[] = [
      { name: "anything-short", match: fp => (fp.shortPuts.length + fp.shortCalls.length > 0 ? "Has Short" : null) },
    ];
    expect(classifyStrategy([put("short", 100)], rules)).toBe("Has Short");
    expect(classifyStrategy([put("long", 100)], rules)).toBe(UNNAMED);
    expect(classifyStrategy([put("short", 100)], [])).toBe(UNNAMED);
  });
});

describe("fingerprint", () => {
  it("sorts by strike with long before short on ties", () => {
    const fp = fingerprint([put("short", 100), put("long", 100), put("long", 95)]);
    expect(fp.byStrike.map(l => `${l.side}:${l.strike}`)).toEqual(["long:95", "long:100", "short:100"]);
    expect(fp.count).toBe(3);
    expect([...fp.expiries]).toEqual([E]);
  });
});
