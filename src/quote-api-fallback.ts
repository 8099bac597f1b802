// Fallback QuoteApi — Yahoo for batches, and for single symbols Yahoo first,
// then Alpha Vantage when an API key is configured.

import { Console, type Context, Effect, Layer, Option } from "effect";
import type { QuoteRecord } from "./domain.ts";
import { makeAlphaVantageQuote } from "./providers/alpha-vantage.ts";
import { makeYahooFinanceApi } from "./providers/yahoo-finance.ts";
import { QuoteApi, type QuoteApiError, UpstreamUnavailable } from "./quote-api.ts";

// --- Types ---

export interface NamedSource {
  readonly name: string;
  readonly fetchOne: Context.Tag.Service<QuoteApi>["fetchOne"];
}

// --- Fallback logic ---

/** Transport trouble at one provider says nothing about the next one. A
 *  provider that answered "no such symbol" is believed. */
export const shouldFallBack = (e: QuoteApiError): boolean => e._tag === "UpstreamUnavailable";

export function trySources(
  sources: ReadonlyArray<NamedSource>,
  symbol: string,
): Effect.Effect<QuoteRecord, QuoteApiError> {
  const loop = (index: number, lastError: QuoteApiError): Effect.Effect<QuoteRecord, QuoteApiError> => {
    if (index >= sources.length) return Effect.fail(lastError);

    const { name, fetchOne } = sources[index];
    return Console.debug(`[fallback] ${symbol}: trying ${name}`).pipe(
      Effect.zipRight(fetchOne(symbol)),
      Effect.tapError((e) => Console.debug(`[fallback] ${name} failed: ${e._tag}`)),
      Effect.catchIf(shouldFallBack, (e) => loop(index + 1, e)),
    );
  };

  return loop(0, new UpstreamUnavailable({ message: "No quote sources configured" }));
}

// --- Layer ---

export const FallbackQuoteApiLive = Layer.effect(
  QuoteApi,
  Effect.gen(function* () {
    const yahoo = yield* makeYahooFinanceApi;
    // Alpha Vantage needs an API key; without one it is left out.
    const alphaVantage = yield* Effect.option(makeAlphaVantageQuote);

    const sources: ReadonlyArray<NamedSource> = [
      { name: "yahoo", fetchOne: yahoo.fetchOne },
      ...Option.match(alphaVantage, {
        onNone: () => [],
        onSome: (av) => [{ name: "alphavantage", fetchOne: av.fetchOne }],
      }),
    ];

    yield* Console.debug(`[fallback] single-symbol sources: ${sources.map((s) => s.name).join(", ")}`);

    return QuoteApi.of({
      fetchBatch: yahoo.fetchBatch,
      fetchOne: (symbol) => trySources(sources, symbol),
    });
  }),
);
