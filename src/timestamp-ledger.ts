// Timestamp ledger — when each symbol's price was last resolved, and how.
//
// Entries only move forward in time: a write carrying an older instant than
// the stored one is ignored, so a slow resolution that started earlier can
// never overwrite a newer one. The file is rewritten inside the same lock
// that updates the map.

import { FileSystem, Path } from "@effect/platform";
import { Console, Context, Effect, Either, Layer, Option, Schema, SynchronizedRef } from "effect";
import type { TimestampEntry } from "./domain.ts";
import { StoreUnavailable } from "./errors.ts";

export class TimestampLedger extends Context.Tag("TimestampLedger")<
  TimestampLedger,
  {
    /** Commit entries and return the symbols that were accepted. Entries
     *  stay committed in memory even when persisting fails. */
    readonly record: (
      entries: ReadonlyMap<string, TimestampEntry>,
    ) => Effect.Effect<ReadonlySet<string>, StoreUnavailable>;
    readonly get: (symbol: string) => Effect.Effect<Option.Option<TimestampEntry>>;
    readonly all: Effect.Effect<ReadonlyMap<string, TimestampEntry>>;
    /** Latest instant across all symbols. */
    readonly lastUpdate: Effect.Effect<Option.Option<number>>;
  }
>() {}

// --- File format ---

const LedgerFile = Schema.parseJson(
  Schema.Record({
    key: Schema.String,
    value: Schema.Struct({
      price: Schema.Number,
      source: Schema.Literal("manual", "cache", "batch", "single"),
      at: Schema.Date,
    }),
  }),
);

export function decodeLedger(
  text: string,
): Effect.Effect<ReadonlyMap<string, TimestampEntry>, StoreUnavailable> {
  if (text.trim().length === 0) return Effect.succeed(new Map());

  return Schema.decodeUnknown(LedgerFile)(text).pipe(
    Effect.mapError(
      (e) => new StoreUnavailable({ store: "timestamps", message: `Malformed ledger: ${e.message}` }),
    ),
    Effect.map(
      (record) =>
        new Map(
          Object.entries(record).map(([symbol, { price, source, at }]): [string, TimestampEntry] => [
            symbol,
            { price, source, at: at.getTime() },
          ]),
        ),
    ),
  );
}

export function encodeLedger(entries: ReadonlyMap<string, TimestampEntry>): string {
  const sorted = [...entries.entries()].sort(([a], [b]) => a.localeCompare(b));
  const json = Object.fromEntries(
    sorted.map(([symbol, e]) => [
      symbol,
      { price: e.price, source: e.source, at: new Date(e.at).toISOString() },
    ]),
  );
  return JSON.stringify(json, null, 2) + "\n";
}

// --- Ledger ---

type Persist = (
  entries: ReadonlyMap<string, TimestampEntry>,
) => Effect.Effect<void, StoreUnavailable>;

function makeLedger(initial: ReadonlyMap<string, TimestampEntry>, persist: Persist) {
  return Effect.gen(function* () {
    const ref = yield* SynchronizedRef.make(initial);

    const record = (updates: ReadonlyMap<string, TimestampEntry>) =>
      SynchronizedRef.modifyEffect(ref, (entries): Effect.Effect<
        readonly [Either.Either<ReadonlySet<string>, StoreUnavailable>, ReadonlyMap<string, TimestampEntry>]
      > => {
        const next = new Map(entries);
        const accepted = new Set<string>();
        for (const [symbol, entry] of updates) {
          const existing = entries.get(symbol);
          if (existing !== undefined && existing.at > entry.at) continue;
          next.set(symbol, entry);
          accepted.add(symbol);
        }
        if (accepted.size === 0) {
          return Effect.succeed([Either.right(accepted), entries] as const);
        }
        return persist(next).pipe(
          Effect.either,
          Effect.map((written) => [Either.map(written, () => accepted), next] as const),
        );
      }).pipe(
        Effect.flatMap((result) =>
          Either.isLeft(result) ? Effect.fail(result.left) : Effect.succeed(result.right),
        ),
      );

    return TimestampLedger.of({
      record,
      get: (symbol) =>
        SynchronizedRef.get(ref).pipe(Effect.map((entries) => Option.fromNullable(entries.get(symbol)))),
      all: SynchronizedRef.get(ref),
      lastUpdate: SynchronizedRef.get(ref).pipe(
        Effect.map((entries) =>
          entries.size === 0
            ? Option.none()
            : Option.some(Math.max(...[...entries.values()].map((e) => e.at))),
        ),
      ),
    });
  });
}

// --- File layer ---

export const makeFileLedger = (file: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;

    const unavailable = (e: { readonly message: string }) =>
      new StoreUnavailable({ store: "timestamps", message: `${file}: ${e.message}` });

    const initial = yield* fs.exists(file).pipe(
      Effect.flatMap((exists) => (exists ? fs.readFileString(file) : Effect.succeed(""))),
      Effect.mapError(unavailable),
      Effect.flatMap(decodeLedger),
      Effect.catchTag("StoreUnavailable", (e) =>
        Console.warn(`[ledger] starting empty: ${e.message}`).pipe(
          Effect.as(new Map<string, TimestampEntry>()),
        ),
      ),
    );

    yield* Console.debug(`[ledger] loaded ${initial.size} entries from ${file}`);

    return yield* makeLedger(initial, (entries) =>
      fs.makeDirectory(path.dirname(file), { recursive: true }).pipe(
        Effect.zipRight(fs.writeFileString(file, encodeLedger(entries))),
        Effect.mapError(unavailable),
      ),
    );
  });

export const FileLedgerLive = (file: string) =>
  Layer.effect(TimestampLedger, makeFileLedger(file));

// --- In-memory layer ---

export const makeMemoryLedger = (
  initial: ReadonlyMap<string, TimestampEntry> = new Map(),
) => makeLedger(initial, () => Effect.void);

export const MemoryLedgerLive = (initial?: ReadonlyMap<string, TimestampEntry>) =>
  Layer.effect(TimestampLedger, makeMemoryLedger(initial));
