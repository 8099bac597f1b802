// Resolver strategies — one per price source, tried in priority order.
//
// A strategy looks at the symbols nobody has settled yet and answers, per
// symbol, with a Hit, a Miss, or nothing at all. A final Miss settles the
// symbol as unresolved; anything else passes it down the chain.

import { Console, type Context, Duration, Effect, Either, Option } from "effect";
import type { PriceSource, QuoteRecord } from "./domain.ts";
import { runAttempts } from "./fetch-attempt.ts";
import { type SessionInfo, selectPrice } from "./market-session.ts";
import type { ManualOverrideStore } from "./override-store.ts";
import type { PostCloseCache } from "./close-cache.ts";
import { type QuoteApi, type QuoteApiError, isRetryable } from "./quote-api.ts";

// --- Types ---

export type StrategyOutcome =
  | { readonly _tag: "Hit"; readonly price: number }
  | { readonly _tag: "Miss"; readonly reason: string; readonly final: boolean };

export const Hit = (price: number): StrategyOutcome => ({ _tag: "Hit", price });

export const Miss = (reason: string, final = false): StrategyOutcome => ({
  _tag: "Miss",
  reason,
  final,
});

export interface ResolutionContext {
  /** None when the calendar could not classify the current time. */
  readonly session: Option.Option<SessionInfo>;
  readonly forceRefresh: boolean;
  readonly startedAt: number; // epoch ms
}

export interface ResolverStrategy {
  readonly source: PriceSource;
  readonly tryResolve: (
    symbols: ReadonlyArray<string>,
    context: ResolutionContext,
  ) => Effect.Effect<ReadonlyMap<string, StrategyOutcome>>;
}

const isAfterClose = (info: SessionInfo) =>
  info.session === "POST" || info.session === "CLOSED";

// --- Manual ---

export const manualStrategy = (store: Context.Tag.Service<ManualOverrideStore>): ResolverStrategy => ({
  source: "manual",
  tryResolve: (symbols) =>
    Effect.forEach(symbols, (symbol) =>
      store.lookup(symbol).pipe(
        Effect.map((price) => [symbol, Option.map(price, Hit)] as const),
      ),
    ).pipe(
      Effect.map(
        (found) =>
          new Map(
            found.flatMap(([symbol, outcome]) =>
              Option.isSome(outcome) ? [[symbol, outcome.value] as const] : [],
            ),
          ),
      ),
      Effect.catchAll((e) =>
        Console.warn(`[resolver] overrides unavailable, ignoring them: ${e.message}`).pipe(
          Effect.as(new Map<string, StrategyOutcome>()),
        ),
      ),
    ),
});

// --- Post-close cache ---

export const cacheStrategy = (cache: Context.Tag.Service<PostCloseCache>): ResolverStrategy => ({
  source: "cache",
  tryResolve: (symbols, context) =>
    Option.match(context.session, {
      onNone: () => Effect.succeed(new Map<string, StrategyOutcome>()),
      onSome: (info) =>
        context.forceRefresh || !isAfterClose(info)
          ? Effect.succeed(new Map<string, StrategyOutcome>())
          : Effect.forEach(symbols, (symbol) =>
              cache.get(symbol, info.tradingDate).pipe(
                Effect.map((price) => [symbol, Option.map(price, Hit)] as const),
              ),
            ).pipe(
              Effect.map(
                (found) =>
                  new Map(
                    found.flatMap(([symbol, outcome]) =>
                      Option.isSome(outcome) ? [[symbol, outcome.value] as const] : [],
                    ),
                  ),
              ),
            ),
    }),
});

// --- Fetched records ---

/** Pick the session's field from a record. After the close, the record's
 *  regular price is the day's close and is written to the cache. */
export const priceFromRecord = (
  cache: Context.Tag.Service<PostCloseCache>,
  record: QuoteRecord,
  context: ResolutionContext,
): Effect.Effect<StrategyOutcome> => {
  const info = Option.getOrUndefined(context.session);
  const session = info?.session ?? record.session;

  if (session === undefined) {
    return Effect.succeed(Miss("market session unknown", true));
  }

  const remember: Effect.Effect<unknown> =
    info !== undefined && isAfterClose(info) && record.regularPrice !== undefined
      ? cache.put(record.symbol, info.tradingDate, record.regularPrice)
      : Effect.void;

  const price = selectPrice(record, session);
  return remember.pipe(
    Effect.as(
      price === undefined
        ? Miss(`no ${session.toLowerCase()} price`, true)
        : Hit(price),
    ),
  );
};

// --- Batch ---

export interface BatchStrategyConfig {
  readonly retries: number;
  readonly retryBackoff: Duration.DurationInput;
}

export const batchStrategy = (
  api: Context.Tag.Service<QuoteApi>,
  cache: Context.Tag.Service<PostCloseCache>,
  config: BatchStrategyConfig,
): ResolverStrategy => ({
  source: "batch",
  tryResolve: (symbols, context) =>
    runAttempts(api.fetchBatch(symbols), {
      name: "attempt:batch",
      retries: config.retries,
      backoff: config.retryBackoff,
      canDegrade: true,
      isRetryable,
    }).pipe(
      Effect.flatMap((outcome): Effect.Effect<ReadonlyMap<string, StrategyOutcome>> => {
        if (outcome._tag !== "Succeeded") {
          const reason = `batch unavailable: ${outcome.error.message}`;
          return Effect.succeed(new Map(symbols.map((s) => [s, Miss(reason)] as const)));
        }
        return Effect.forEach(symbols, (symbol) => {
          const entry = outcome.value.get(symbol);
          if (entry === undefined || Either.isLeft(entry)) {
            return Effect.succeed([symbol, Miss("missing from batch response")] as const);
          }
          return priceFromRecord(cache, entry.right, context).pipe(
            Effect.map((result) => [symbol, result] as const),
          );
        }).pipe(Effect.map((entries) => new Map(entries)));
      }),
    ),
});

// --- Single ---

export interface SingleStrategyConfig extends BatchStrategyConfig {
  /** Pause between one symbol's fetch and the next. */
  readonly singleSpacing: Duration.DurationInput;
}

/** A symbol the upstream does not know stays unknown on the next attempt. */
const isRetryableSingle = (e: QuoteApiError): boolean =>
  e._tag === "UpstreamUnavailable" && isRetryable(e);

export const singleStrategy = (
  api: Context.Tag.Service<QuoteApi>,
  cache: Context.Tag.Service<PostCloseCache>,
  config: SingleStrategyConfig,
): ResolverStrategy => ({
  source: "single",
  tryResolve: (symbols, context) =>
    Effect.forEach(symbols, (symbol, i) =>
      (i === 0 ? Effect.void : Effect.sleep(config.singleSpacing)).pipe(
        Effect.zipRight(
          runAttempts(api.fetchOne(symbol), {
            name: `attempt:single:${symbol}`,
            retries: config.retries,
            backoff: config.retryBackoff,
            canDegrade: false,
            isRetryable: isRetryableSingle,
          }),
        ),
        Effect.flatMap((outcome): Effect.Effect<StrategyOutcome> => {
          if (outcome._tag === "Succeeded") {
            return priceFromRecord(cache, outcome.value, context);
          }
          const e = outcome.error;
          return Effect.succeed(
            Miss(
              e._tag === "PerSymbolMissing"
                ? "no quote upstream"
                : `upstream unavailable: ${e.message}`,
              true,
            ),
          );
        }),
        Effect.map((result) => [symbol, result] as const),
      ),
    ).pipe(Effect.map((entries) => new Map(entries))),
});
