import { describe, expect, it } from "vitest";
import type { PriceResolution, TimestampEntry } from "./domain.ts";
import { ConfigurationError, StoreUnavailable } from "./errors.ts";
import {
  formatError,
  formatInstant,
  formatOverrideRemoved,
  formatOverrideSet,
  formatOverrides,
  formatPriceLine,
  formatResolution,
  formatSession,
  formatTimestamps,
} from "./format.ts";

// --- Helpers ---

const stripAnsi = (s: string) => s.replace(/\x1b\[\d+m/g, "");

const T0 = Date.UTC(2024, 2, 15, 20, 5); // 2024-03-15T20:05:00Z

const manualAapl: PriceResolution = {
  _tag: "Resolved",
  symbol: "AAPL",
  price: 195.42,
  source: "manual",
  timestamp: T0,
};

const missingZzzz: PriceResolution = {
  _tag: "Unresolved",
  symbol: "ZZZZ",
  reason: "no quote upstream",
};

// --- formatInstant ---

describe("formatInstant", () => {
  it("prints UTC date and time to the second", () => {
    expect(formatInstant(T0 + 7_250)).toBe("2024-03-15 20:05:07");
  });
});

// --- Resolution ---

describe("formatPriceLine", () => {
  it("resolved: symbol, price, source and time", () => {
    expect(stripAnsi(formatPriceLine(manualAapl))).toBe(
      "  AAPL        195.42  manual 2024-03-15 20:05:00 UTC",
    );
  });

  it("always shows two decimals", () => {
    const line = formatPriceLine({ ...manualAapl, price: 430.1, source: "batch" });
    expect(stripAnsi(line)).toBe("  AAPL        430.10  batch  2024-03-15 20:05:00 UTC");
  });

  it("unresolved: no data with the reason", () => {
    expect(stripAnsi(formatPriceLine(missingZzzz))).toBe("  ZZZZ    no data (no quote upstream)");
  });
});

describe("formatResolution", () => {
  it("lists every symbol and counts the resolved ones", () => {
    const output = formatResolution(
      new Map<string, PriceResolution>([
        ["AAPL", manualAapl],
        ["ZZZZ", missingZzzz],
      ]),
    );
    expect(stripAnsi(output).split("\n")).toEqual([
      "",
      "  AAPL        195.42  manual 2024-03-15 20:05:00 UTC",
      "  ZZZZ    no data (no quote upstream)",
      "",
      "  1/2 resolved",
      "",
    ]);
  });
});

// --- Session ---

describe("formatSession", () => {
  const info = {
    session: "POST",
    localDate: "2024-03-15",
    localTime: "17:00:00",
    tradingDate: "2024-03-15",
  } as const;

  it("shows the next open outside regular hours", () => {
    const nextOpen = Date.UTC(2024, 2, 18, 13, 30);
    expect(stripAnsi(formatSession(info, nextOpen)).split("\n")).toEqual([
      "",
      "  POST",
      "  exchange time 2024-03-15 17:00:00",
      "  trading date  2024-03-15",
      "  next open     2024-03-18 13:30:00 UTC",
      "",
    ]);
  });

  it("omits the next open during regular hours", () => {
    const output = stripAnsi(formatSession({ ...info, session: "REGULAR" }, Date.UTC(2024, 2, 18, 13, 30)));
    expect(output.split("\n")).toEqual([
      "",
      "  REGULAR",
      "  exchange time 2024-03-15 17:00:00",
      "  trading date  2024-03-15",
      "",
    ]);
  });
});

// --- Stores ---

describe("formatOverrides", () => {
  it("sorted by symbol", () => {
    const output = formatOverrides(new Map([["MSFT", 430.1], ["AAPL", 195.42]]));
    expect(stripAnsi(output).split("\n")).toEqual([
      "",
      "  AAPL        195.42",
      "  MSFT        430.10",
      "",
    ]);
  });

  it("says so when there are none", () => {
    expect(stripAnsi(formatOverrides(new Map()))).toBe("\n  No manual prices set.\n");
  });
});

describe("override confirmations", () => {
  it("name the symbol the way it is stored", () => {
    expect(stripAnsi(formatOverrideSet("  aapl ", 195.42))).toBe("  AAPL → 195.42");
    expect(stripAnsi(formatOverrideRemoved(" msft", true))).toBe("  MSFT removed");
    expect(stripAnsi(formatOverrideRemoved("nvda  ", false))).toBe("  NVDA had no manual price");
  });
});

describe("formatTimestamps", () => {
  it("newest first, with the last update", () => {
    const entries = new Map<string, TimestampEntry>([
      ["AAPL", { price: 195.42, source: "manual", at: T0 }],
      ["MSFT", { price: 430.1, source: "cache", at: T0 + 60_000 }],
    ]);
    expect(stripAnsi(formatTimestamps(entries, T0 + 60_000)).split("\n")).toEqual([
      "",
      "  MSFT        430.10  cache  2024-03-15 20:06:00 UTC",
      "  AAPL        195.42  manual 2024-03-15 20:05:00 UTC",
      "",
      "  last update 2024-03-15 20:06:00 UTC",
      "",
    ]);
  });

  it("says so when nothing was resolved yet", () => {
    expect(stripAnsi(formatTimestamps(new Map(), undefined))).toBe("\n  No prices resolved yet.\n");
  });
});

// --- formatError ---

describe("formatError", () => {
  it("configuration errors carry their message as the hint", () => {
    const output = formatError(new ConfigurationError({ message: 'Unknown time zone "Nowhere/Atlantis"' }));
    expect(stripAnsi(output)).toBe('\n  ✗ Configuration error\n  Unknown time zone "Nowhere/Atlantis"\n');
  });

  it("names the store that failed", () => {
    const overrides = formatError(new StoreUnavailable({ store: "overrides", message: "EACCES" }));
    const ledger = formatError(new StoreUnavailable({ store: "timestamps", message: "EACCES" }));
    expect(stripAnsi(overrides).split("\n")[1]).toBe("  ✗ Manual prices unavailable");
    expect(stripAnsi(ledger).split("\n")[1]).toBe("  ✗ Timestamps unavailable");
  });
});
