// QuoteApiTest — sample-data implementation of QuoteApi for development.
// Select it with QUOTE_PROVIDER=test.

import { Clock, Effect, Either, Layer } from "effect";
import type { QuoteRecord } from "../domain.ts";
import { PerSymbolMissing, QuoteApi } from "../quote-api.ts";

// --- Sample data ---

const quotes: Record<string, Omit<QuoteRecord, "fetchedAt">> = {
  AAPL: {
    symbol: "AAPL",
    regularPrice: 225.3,
    preMarketPrice: 224.9,
    postMarketPrice: 225.75,
  },
  MSFT: {
    symbol: "MSFT",
    regularPrice: 430.1,
    preMarketPrice: 428.6,
    postMarketPrice: 431.2,
  },
  GOOGL: {
    symbol: "GOOGL",
    regularPrice: 190.5,
    preMarketPrice: 189.95,
  },
  TSLA: {
    symbol: "TSLA",
    regularPrice: 385.2,
    postMarketPrice: 383.4,
  },
};

const lookup = (symbol: string, fetchedAt: number): Either.Either<QuoteRecord, PerSymbolMissing> => {
  const quote = quotes[symbol];
  return quote !== undefined
    ? Either.right({ ...quote, fetchedAt })
    : Either.left(new PerSymbolMissing({ symbol }));
};

// --- Mock layer ---

export const QuoteApiTestLive = Layer.succeed(
  QuoteApi,
  QuoteApi.of({
    fetchBatch: (symbols) =>
      Clock.currentTimeMillis.pipe(
        Effect.map((now) => new Map(symbols.map((s) => [s, lookup(s, now)] as const))),
      ),
    fetchOne: (symbol) =>
      Clock.currentTimeMillis.pipe(
        Effect.flatMap((now): Effect.Effect<QuoteRecord, PerSymbolMissing> =>
          Either.match(lookup(symbol, now), {
            onLeft: (e) => Effect.fail(e),
            onRight: (q) => Effect.succeed(q),
          }),
        ),
      ),
  }),
);
