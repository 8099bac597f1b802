// Price resolver — runs the strategy chain over a symbol set.
//
//   manual → cache (POST/CLOSED only) → batch (with retries) → single
//
// Each strategy only sees the symbols still unsettled. Resolved symbols are
// stamped in the timestamp ledger with the instant the resolution started.

import { Clock, Console, Context, Effect, Either, Layer, Option } from "effect";
import {
  type PriceResolution,
  type Resolution,
  type TimestampEntry,
  normalizeSymbols,
} from "./domain.ts";
import type { ResolverConfig } from "./config.ts";
import { classifySession } from "./market-session.ts";
import { ManualOverrideStore } from "./override-store.ts";
import { PostCloseCache } from "./close-cache.ts";
import { QuoteApi } from "./quote-api.ts";
import {
  type ResolutionContext,
  type ResolverStrategy,
  batchStrategy,
  cacheStrategy,
  manualStrategy,
  singleStrategy,
} from "./strategies.ts";
import { TimestampLedger } from "./timestamp-ledger.ts";

export interface ResolveOptions {
  /** Skip the post-close cache read. Fresh closes are still cached. */
  readonly forceRefresh?: boolean;
}

export class PriceResolver extends Context.Tag("PriceResolver")<
  PriceResolver,
  {
    /** Never fails: symbols without a price come back Unresolved. */
    readonly resolve: (
      symbols: Iterable<string>,
      options?: ResolveOptions,
    ) => Effect.Effect<Resolution>;
  }
>() {}

// --- Chain ---

/** Walk the chain until every symbol is settled or the chain runs out. */
export function runChain(
  chain: ReadonlyArray<ResolverStrategy>,
  symbols: ReadonlyArray<string>,
  context: ResolutionContext,
): Effect.Effect<Resolution> {
  return Effect.gen(function* () {
    const settled = new Map<string, PriceResolution>();
    const reasons = new Map<string, string>();
    let remaining = symbols;

    for (const strategy of chain) {
      if (remaining.length === 0) break;
      const outcomes = yield* strategy.tryResolve(remaining, context);

      for (const symbol of remaining) {
        const outcome = outcomes.get(symbol);
        if (outcome === undefined) continue;
        if (outcome._tag === "Hit") {
          settled.set(symbol, {
            _tag: "Resolved",
            symbol,
            price: outcome.price,
            source: strategy.source,
            timestamp: context.startedAt,
          });
        } else if (outcome.final) {
          settled.set(symbol, { _tag: "Unresolved", symbol, reason: outcome.reason });
        } else {
          reasons.set(symbol, outcome.reason);
        }
      }

      remaining = remaining.filter((s) => !settled.has(s));
      yield* Console.debug(
        `[resolver] ${strategy.source}: ${outcomes.size} answered, ${remaining.length} left`,
      );
    }

    // Request order, every symbol present.
    return new Map(
      symbols.map((symbol): [string, PriceResolution] => [
        symbol,
        settled.get(symbol) ?? {
          _tag: "Unresolved",
          symbol,
          reason: reasons.get(symbol) ?? "no source had a price",
        },
      ]),
    );
  });
}

// --- Resolver ---

export const makePriceResolver = (config: ResolverConfig) =>
  Effect.gen(function* () {
    const api = yield* QuoteApi;
    const overrides = yield* ManualOverrideStore;
    const cache = yield* PostCloseCache;
    const ledger = yield* TimestampLedger;

    const chain: ReadonlyArray<ResolverStrategy> = [
      manualStrategy(overrides),
      cacheStrategy(cache),
      batchStrategy(api, cache, config),
      singleStrategy(api, cache, config),
    ];

    const stamp = (resolution: Resolution): Effect.Effect<void> => {
      const entries = new Map<string, TimestampEntry>();
      for (const r of resolution.values()) {
        if (r._tag === "Resolved") {
          entries.set(r.symbol, { price: r.price, source: r.source, at: r.timestamp });
        }
      }
      if (entries.size === 0) return Effect.void;
      return ledger.record(entries).pipe(
        Effect.tap((accepted) =>
          accepted.size < entries.size
            ? Console.debug(
                `[resolver] ledger kept newer entries for ${entries.size - accepted.size} symbol(s)`,
              )
            : Effect.void,
        ),
        Effect.asVoid,
        Effect.catchAll((e) =>
          Console.warn(`[resolver] timestamps not persisted: ${e.message}`),
        ),
      );
    };

    return PriceResolver.of({
      resolve: (raw, options = {}) =>
        Effect.gen(function* () {
          const symbols = normalizeSymbols(raw);
          if (symbols.length === 0) return new Map();

          const startedAt = yield* Clock.currentTimeMillis;
          const classified = classifySession(startedAt, config.calendar);
          if (Either.isLeft(classified)) {
            yield* Console.warn(
              `[resolver] session unknown, using upstream indicator: ${classified.left.message}`,
            );
          }

          const context: ResolutionContext = {
            session: Either.getRight(classified),
            forceRefresh: options.forceRefresh ?? false,
            startedAt,
          };
          yield* Console.debug(
            `[resolver] ${symbols.length} symbol(s), session ${Option.match(context.session, {
              onNone: () => "unknown",
              onSome: (info) => `${info.session} (${info.tradingDate})`,
            })}`,
          );

          const resolution = yield* runChain(chain, symbols, context);
          yield* stamp(resolution);
          return resolution;
        }),
    });
  });

export const PriceResolverLive = (config: ResolverConfig) =>
  Layer.effect(PriceResolver, makePriceResolver(config));
