// Post-close cache — the regular-session close per symbol per trading day.
//
// First writer wins for a (symbol, date) key. Entries from older trading
// days are dropped the first time a newer day is written.

import { Console, Context, Effect, Layer, Option, Ref } from "effect";

interface CachedClose {
  readonly tradingDate: string;
  readonly price: number;
}

export class PostCloseCache extends Context.Tag("PostCloseCache")<
  PostCloseCache,
  {
    readonly get: (symbol: string, tradingDate: string) => Effect.Effect<Option.Option<number>>;
    /** Returns false when the key, or a later day, was already written. */
    readonly put: (symbol: string, tradingDate: string, price: number) => Effect.Effect<boolean>;
    readonly clear: Effect.Effect<void>;
  }
>() {}

export const makePostCloseCache = Effect.gen(function* () {
  const ref = yield* Ref.make<ReadonlyMap<string, CachedClose>>(new Map());

  return PostCloseCache.of({
    get: (symbol, tradingDate) =>
      Ref.get(ref).pipe(
        Effect.map((entries) =>
          Option.fromNullable(entries.get(symbol)).pipe(
            Option.filter((entry) => entry.tradingDate === tradingDate),
            Option.map((entry) => entry.price),
          ),
        ),
      ),

    put: (symbol, tradingDate, price) =>
      Ref.modify(ref, (entries) => {
        const existing = entries.get(symbol);
        if (existing !== undefined && existing.tradingDate >= tradingDate) {
          return [false, entries] as const;
        }
        const next = new Map<string, CachedClose>();
        for (const [key, entry] of entries) {
          // ISO dates compare lexically.
          if (entry.tradingDate >= tradingDate) next.set(key, entry);
        }
        next.set(symbol, { tradingDate, price });
        return [true, next] as const;
      }).pipe(
        Effect.tap((written) =>
          written
            ? Console.debug(`[close-cache] ${symbol} ${tradingDate} = ${price}`)
            : Effect.void,
        ),
      ),

    clear: Ref.set(ref, new Map()),
  });
});

export const PostCloseCacheLive = Layer.effect(PostCloseCache, makePostCloseCache);
