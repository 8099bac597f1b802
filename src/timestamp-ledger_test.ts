import { FileSystem, Path } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Effect, Option } from "effect";
import { describe, expect, it } from "vitest";
import type { TimestampEntry } from "./domain.ts";
import { decodeLedger, encodeLedger, makeFileLedger, makeMemoryLedger } from "./timestamp-ledger.ts";

// --- Helpers ---

const T0 = Date.UTC(2024, 2, 15, 20, 5); // 2024-03-15T20:05:00Z

const entry = (price: number, at: number, source: TimestampEntry["source"] = "batch"): TimestampEntry => ({
  price,
  source,
  at,
});

function withTempDir<A, E>(
  f: (dir: string) => Effect.Effect<A, E, FileSystem.FileSystem | Path.Path>,
): Promise<A> {
  return Effect.runPromise(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      return yield* f(yield* fs.makeTempDirectoryScoped());
    }).pipe(Effect.scoped, Effect.provide(NodeContext.layer)),
  );
}

// --- Memory ledger ---

describe("timestamp ledger", () => {
  it("records entries and reports them back", async () => {
    const result = await Effect.runPromise(
      Effect.gen(function* () {
        const ledger = yield* makeMemoryLedger();
        const accepted = yield* ledger.record(
          new Map([
            ["AAPL", entry(195.42, T0, "manual")],
            ["MSFT", entry(430.1, T0)],
          ]),
        );
        return { accepted, aapl: yield* ledger.get("AAPL"), all: yield* ledger.all };
      }),
    );

    expect([...result.accepted]).toEqual(["AAPL", "MSFT"]);
    expect(Option.getOrUndefined(result.aapl)).toEqual({ price: 195.42, source: "manual", at: T0 });
    expect(result.all.size).toBe(2);
  });

  it("ignores an entry older than the stored one", async () => {
    const result = await Effect.runPromise(
      Effect.gen(function* () {
        const ledger = yield* makeMemoryLedger(new Map([["AAPL", entry(196, T0 + 60_000)]]));
        const accepted = yield* ledger.record(new Map([["AAPL", entry(195, T0)]]));
        return { accepted, aapl: yield* ledger.get("AAPL") };
      }),
    );

    expect(result.accepted.size).toBe(0);
    expect(Option.getOrUndefined(result.aapl)).toEqual(entry(196, T0 + 60_000));
  });

  it("accepts an entry with the same instant", async () => {
    const accepted = await Effect.runPromise(
      Effect.gen(function* () {
        const ledger = yield* makeMemoryLedger(new Map([["AAPL", entry(196, T0)]]));
        return yield* ledger.record(new Map([["AAPL", entry(197, T0)]]));
      }),
    );
    expect(accepted.has("AAPL")).toBe(true);
  });

  it("lastUpdate is the latest instant across symbols", async () => {
    const result = await Effect.runPromise(
      Effect.gen(function* () {
        const ledger = yield* makeMemoryLedger();
        const empty = yield* ledger.lastUpdate;
        yield* ledger.record(new Map([["AAPL", entry(195.42, T0 + 5_000)]]));
        yield* ledger.record(new Map([["MSFT", entry(430.1, T0)]]));
        return { empty, last: yield* ledger.lastUpdate };
      }),
    );

    expect(Option.isNone(result.empty)).toBe(true);
    expect(Option.getOrUndefined(result.last)).toBe(T0 + 5_000);
  });

  it("concurrent writers never move an entry backwards", async () => {
    const aapl = await Effect.runPromise(
      Effect.gen(function* () {
        const ledger = yield* makeMemoryLedger();
        yield* Effect.forEach(
          [3, 1, 4, 0, 2],
          (i) => ledger.record(new Map([["AAPL", entry(100 + i, T0 + i * 1_000)]])),
          { concurrency: "unbounded" },
        );
        return yield* ledger.get("AAPL");
      }),
    );
    expect(Option.getOrUndefined(aapl)).toEqual(entry(104, T0 + 4_000));
  });
});

// --- File format ---

describe("encodeLedger / decodeLedger", () => {
  it("writes ISO instants, sorted by symbol", () => {
    const text = encodeLedger(
      new Map([
        ["MSFT", entry(430.1, T0)],
        ["AAPL", entry(195.42, T0, "manual")],
      ]),
    );
    expect(text).toBe(
      [
        "{",
        '  "AAPL": {',
        '    "price": 195.42,',
        '    "source": "manual",',
        '    "at": "2024-03-15T20:05:00.000Z"',
        "  },",
        '  "MSFT": {',
        '    "price": 430.1,',
        '    "source": "batch",',
        '    "at": "2024-03-15T20:05:00.000Z"',
        "  }",
        "}",
        "",
      ].join("\n"),
    );
  });

  it("reads what it writes", async () => {
    const entries = new Map([["AAPL", entry(195.42, T0, "cache")]]);
    const decoded = await Effect.runPromise(decodeLedger(encodeLedger(entries)));
    expect(decoded.get("AAPL")).toEqual(entry(195.42, T0, "cache"));
  });

  it("rejects an unknown source", async () => {
    const error = await Effect.runPromise(
      Effect.flip(decodeLedger('{ "AAPL": { "price": 1, "source": "guess", "at": "2024-03-15T20:05:00Z" } }')),
    );
    expect(error._tag).toBe("StoreUnavailable");
  });
});

// --- File ledger ---

describe("file ledger", () => {
  it("persists records and loads them in a new ledger", async () => {
    const aapl = await withTempDir((dir) =>
      Effect.gen(function* () {
        const file = `${dir}/state/price_timestamps.json`;
        const first = yield* makeFileLedger(file);
        yield* first.record(new Map([["AAPL", entry(195.42, T0, "manual")]]));
        const second = yield* makeFileLedger(file);
        return yield* second.get("AAPL");
      }),
    );
    expect(Option.getOrUndefined(aapl)).toEqual(entry(195.42, T0, "manual"));
  });

  it("starts empty over a malformed file", async () => {
    const all = await withTempDir((dir) =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const file = `${dir}/price_timestamps.json`;
        yield* fs.writeFileString(file, "{ broken");
        const ledger = yield* makeFileLedger(file);
        return yield* ledger.all;
      }),
    );
    expect(all.size).toBe(0);
  });

  it("keeps the entry in memory when the file cannot be written", async () => {
    const result = await withTempDir((dir) =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        // A directory where the file should be makes every write fail.
        const file = `${dir}/price_timestamps.json`;
        yield* fs.makeDirectory(file);
        const ledger = yield* makeFileLedger(file);
        const error = yield* Effect.flip(ledger.record(new Map([["AAPL", entry(195.42, T0)]])));
        return { error, aapl: yield* ledger.get("AAPL") };
      }),
    );
    expect(result.error._tag).toBe("StoreUnavailable");
    expect(Option.getOrUndefined(result.aapl)).toEqual(entry(195.42, T0));
  });
});
