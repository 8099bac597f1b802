// Manual override store — user-set prices that beat every fetched price.
//
// The file layer keeps the whole file in memory and re-reads it when the
// file changes on disk (hand edits) or after its own writes. A missing
// file means no overrides.

import { FileSystem, Path } from "@effect/platform";
import { Console, Context, Effect, Layer, Option, Schema, SynchronizedRef } from "effect";
import { normalizeSymbol, toPrice } from "./domain.ts";
import { ConfigurationError, StoreUnavailable } from "./errors.ts";

export type OverrideStoreError = ConfigurationError | StoreUnavailable;

export class ManualOverrideStore extends Context.Tag("ManualOverrideStore")<
  ManualOverrideStore,
  {
    readonly lookup: (symbol: string) => Effect.Effect<Option.Option<number>, OverrideStoreError>;
    readonly list: Effect.Effect<ReadonlyMap<string, number>, OverrideStoreError>;
    /** Stores the price rounded to cents and returns it. */
    readonly set: (symbol: string, price: number) => Effect.Effect<number, OverrideStoreError>;
    /** Returns false when there was no override to remove. */
    readonly remove: (symbol: string) => Effect.Effect<boolean, OverrideStoreError>;
    readonly clear: Effect.Effect<void, OverrideStoreError>;
  }
>() {}

// --- File format ---

const OverrideFile = Schema.parseJson(
  Schema.Record({ key: Schema.String, value: Schema.Number }),
);

export function decodeOverrides(
  text: string,
): Effect.Effect<ReadonlyMap<string, number>, ConfigurationError> {
  if (text.trim().length === 0) return Effect.succeed(new Map());

  return Schema.decodeUnknown(OverrideFile)(text).pipe(
    Effect.mapError(
      (e) => new ConfigurationError({ message: `Malformed override file: ${e.message}` }),
    ),
    Effect.flatMap((record): Effect.Effect<ReadonlyMap<string, number>, ConfigurationError> => {
      const entries = new Map<string, number>();
      for (const [raw, value] of Object.entries(record)) {
        const price = toPrice(value);
        if (price === undefined) {
          return Effect.fail(
            new ConfigurationError({ message: `Override for ${raw} is not a positive price: ${value}` }),
          );
        }
        entries.set(normalizeSymbol(raw), price);
      }
      return Effect.succeed(entries);
    }),
  );
}

export function encodeOverrides(entries: ReadonlyMap<string, number>): string {
  const sorted = [...entries.entries()].sort(([a], [b]) => a.localeCompare(b));
  return JSON.stringify(Object.fromEntries(sorted), null, 2) + "\n";
}

function validPrice(symbol: string, price: number): Effect.Effect<number, ConfigurationError> {
  const rounded = toPrice(price);
  return rounded === undefined
    ? Effect.fail(new ConfigurationError({ message: `Override for ${symbol} must be a positive price, got ${price}` }))
    : Effect.succeed(rounded);
}

// --- File layer ---

interface Snapshot {
  readonly fingerprint: string;
  readonly entries: ReadonlyMap<string, number>;
}

export const makeFileOverrideStore = (file: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;
    const ref = yield* SynchronizedRef.make<Option.Option<Snapshot>>(Option.none());

    const unavailable = (e: { readonly message: string }) =>
      new StoreUnavailable({ store: "overrides", message: `${file}: ${e.message}` });

    const fingerprint = Effect.gen(function* () {
      if (!(yield* fs.exists(file))) return "absent";
      const info = yield* fs.stat(file);
      const mtime = Option.match(info.mtime, { onNone: () => 0, onSome: (d) => d.getTime() });
      return `${mtime}:${String(info.size)}`;
    }).pipe(Effect.mapError(unavailable));

    const load = (print: string): Effect.Effect<Snapshot, OverrideStoreError> =>
      print === "absent"
        ? Effect.succeed({ fingerprint: print, entries: new Map() })
        : fs.readFileString(file).pipe(
            Effect.mapError(unavailable),
            Effect.flatMap(decodeOverrides),
            Effect.map((entries) => ({ fingerprint: print, entries })),
            Effect.tap((s) => Console.debug(`[overrides] loaded ${s.entries.size} from ${file}`)),
          );

    const current = SynchronizedRef.modifyEffect(ref, (cached) =>
      Effect.gen(function* () {
        const print = yield* fingerprint;
        if (Option.isSome(cached) && cached.value.fingerprint === print) {
          return [cached.value.entries, cached] as const;
        }
        const snapshot = yield* load(print);
        return [snapshot.entries, Option.some(snapshot)] as const;
      }),
    );

    const persist = (entries: ReadonlyMap<string, number>) =>
      fs.makeDirectory(path.dirname(file), { recursive: true }).pipe(
        Effect.zipRight(fs.writeFileString(file, encodeOverrides(entries))),
        Effect.mapError(unavailable),
      );

    /** Read-modify-write under the ref's lock; the cached copy is dropped
     *  so the next read picks up the written file. */
    const update = <A>(
      f: (entries: ReadonlyMap<string, number>) => readonly [A, ReadonlyMap<string, number> | undefined],
    ) =>
      SynchronizedRef.modifyEffect(ref, (cached) =>
        Effect.gen(function* () {
          const print = yield* fingerprint;
          const entries =
            Option.isSome(cached) && cached.value.fingerprint === print
              ? cached.value.entries
              : (yield* load(print)).entries;
          const [result, next] = f(entries);
          if (next === undefined) return [result, cached] as const;
          yield* persist(next);
          return [result, Option.none<Snapshot>()] as const;
        }),
      );

    return ManualOverrideStore.of({
      lookup: (symbol) =>
        current.pipe(Effect.map((entries) => Option.fromNullable(entries.get(normalizeSymbol(symbol))))),

      list: current,

      set: (raw, price) => {
        const symbol = normalizeSymbol(raw);
        return validPrice(symbol, price).pipe(
          Effect.flatMap((rounded) =>
            update((entries) => [rounded, new Map(entries).set(symbol, rounded)] as const),
          ),
          Effect.tap((rounded) => Console.debug(`[overrides] set ${symbol} = ${rounded}`)),
        );
      },

      remove: (raw) => {
        const symbol = normalizeSymbol(raw);
        return update((entries) => {
          if (!entries.has(symbol)) return [false, undefined] as const;
          const next = new Map(entries);
          next.delete(symbol);
          return [true, next] as const;
        });
      },

      clear: update((entries) => [undefined, entries.size === 0 ? undefined : new Map<string, number>()] as const),
    });
  });

export const FileOverrideStoreLive = (file: string) =>
  Layer.effect(ManualOverrideStore, makeFileOverrideStore(file));

// --- In-memory layer ---

export const makeMemoryOverrideStore = (initial: Readonly<Record<string, number>> = {}) =>
  Effect.gen(function* () {
    const ref = yield* SynchronizedRef.make<ReadonlyMap<string, number>>(
      new Map(Object.entries(initial).map(([k, v]): [string, number] => [normalizeSymbol(k), v])),
    );

    return ManualOverrideStore.of({
      lookup: (symbol) =>
        SynchronizedRef.get(ref).pipe(
          Effect.map((entries) => Option.fromNullable(entries.get(normalizeSymbol(symbol)))),
        ),
      list: SynchronizedRef.get(ref),
      set: (raw, price) => {
        const symbol = normalizeSymbol(raw);
        return validPrice(symbol, price).pipe(
          Effect.tap((rounded) =>
            SynchronizedRef.update(ref, (entries) => new Map(entries).set(symbol, rounded)),
          ),
        );
      },
      remove: (raw) =>
        SynchronizedRef.modify(ref, (entries) => {
          const symbol = normalizeSymbol(raw);
          if (!entries.has(symbol)) return [false, entries] as const;
          const next = new Map(entries);
          next.delete(symbol);
          return [true, next] as const;
        }),
      clear: SynchronizedRef.set(ref, new Map()),
    });
  });

export const MemoryOverrideStoreLive = (initial: Readonly<Record<string, number>> = {}) =>
  Layer.effect(ManualOverrideStore, makeMemoryOverrideStore(initial));
