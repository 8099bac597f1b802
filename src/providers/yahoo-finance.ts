// Yahoo Finance — implementation of QuoteApi.
//
// Batch:  GET {YAHOO_QUOTE_URL}?symbols=A,B,C         (v7 quote)
// Single: GET {YAHOO_SUMMARY_URL}/A?modules=price     (v10 quoteSummary)

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Clock, Config, Duration, Effect, Either, Layer, Schema } from "effect";
import { type MarketSession, type QuoteRecord, normalizeSymbol, toPrice } from "../domain.ts";
import {
  type BatchResult,
  PerSymbolMissing,
  QuoteApi,
  UpstreamUnavailable,
} from "../quote-api.ts";

// --- Shared ---

const Price = Schema.optional(Schema.NullOr(Schema.Number));

/** Yahoo's marketState → our session. PREPRE/POSTPOST are overnight. */
export function toSession(marketState: string | undefined): MarketSession | undefined {
  switch (marketState) {
    case "PRE":
      return "PRE";
    case "REGULAR":
      return "REGULAR";
    case "POST":
      return "POST";
    case "PREPRE":
    case "POSTPOST":
    case "CLOSED":
      return "CLOSED";
    default:
      return undefined;
  }
}

function toRecord(
  symbol: string,
  fields: {
    readonly regular: number | null | undefined;
    readonly pre: number | null | undefined;
    readonly post: number | null | undefined;
    readonly marketState: string | undefined;
  },
  fetchedAt: number,
): Either.Either<QuoteRecord, PerSymbolMissing> {
  const regularPrice = toPrice(fields.regular);
  const preMarketPrice = toPrice(fields.pre);
  const postMarketPrice = toPrice(fields.post);

  if (regularPrice === undefined && preMarketPrice === undefined && postMarketPrice === undefined) {
    return Either.left(new PerSymbolMissing({ symbol }));
  }

  return Either.right({
    symbol,
    regularPrice,
    preMarketPrice,
    postMarketPrice,
    session: toSession(fields.marketState),
    fetchedAt,
  });
}

// --- v7 quote (batch) ---

const QuoteResult = Schema.Struct({
  symbol: Schema.String,
  regularMarketPrice: Price,
  preMarketPrice: Price,
  postMarketPrice: Price,
  marketState: Schema.optional(Schema.String),
});

const QuoteResponse = Schema.Struct({
  quoteResponse: Schema.Struct({
    result: Schema.NullOr(Schema.Array(QuoteResult)),
    error: Schema.NullOr(Schema.Struct({ description: Schema.optional(Schema.String) })),
  }),
});

/** Every requested symbol gets an entry; symbols Yahoo left out are
 *  PerSymbolMissing. */
export function decodeBatchResponse(
  json: unknown,
  symbols: ReadonlyArray<string>,
  fetchedAt: number,
): Effect.Effect<BatchResult, UpstreamUnavailable> {
  return Schema.decodeUnknown(QuoteResponse)(json).pipe(
    Effect.mapError(
      (e) => new UpstreamUnavailable({ message: `Invalid quote response: ${e.message}` }),
    ),
    Effect.flatMap(({ quoteResponse }): Effect.Effect<BatchResult, UpstreamUnavailable> => {
      if (quoteResponse.error !== null) {
        return Effect.fail(
          new UpstreamUnavailable({
            message: quoteResponse.error.description ?? "Quote API reported an error",
          }),
        );
      }

      const bySymbol = new Map((quoteResponse.result ?? []).map((q) => [normalizeSymbol(q.symbol), q] as const));
      const out = new Map<string, Either.Either<QuoteRecord, PerSymbolMissing>>();
      for (const symbol of symbols) {
        const q = bySymbol.get(symbol);
        out.set(
          symbol,
          q === undefined
            ? Either.left(new PerSymbolMissing({ symbol }))
            : toRecord(
                symbol,
                {
                  regular: q.regularMarketPrice,
                  pre: q.preMarketPrice,
                  post: q.postMarketPrice,
                  marketState: q.marketState,
                },
                fetchedAt,
              ),
        );
      }
      return Effect.succeed(out);
    }),
  );
}

// --- v10 quoteSummary (single) ---

const RawValue = Schema.optional(Schema.Struct({ raw: Price }));

const SummaryResponse = Schema.Struct({
  quoteSummary: Schema.Struct({
    result: Schema.NullOr(
      Schema.Array(
        Schema.Struct({
          price: Schema.Struct({
            regularMarketPrice: RawValue,
            preMarketPrice: RawValue,
            postMarketPrice: RawValue,
            marketState: Schema.optional(Schema.String),
          }),
        }),
      ),
    ),
    error: Schema.NullOr(Schema.Struct({ description: Schema.optional(Schema.String) })),
  }),
});

export function decodeSummaryResponse(
  json: unknown,
  symbol: string,
  fetchedAt: number,
): Effect.Effect<QuoteRecord, UpstreamUnavailable | PerSymbolMissing> {
  return Schema.decodeUnknown(SummaryResponse)(json).pipe(
    Effect.mapError(
      (e) => new UpstreamUnavailable({ message: `Invalid quoteSummary response: ${e.message}` }),
    ),
    Effect.flatMap(({ quoteSummary }): Effect.Effect<QuoteRecord, UpstreamUnavailable | PerSymbolMissing> => {
      const first = quoteSummary.result?.[0];
      if (quoteSummary.error !== null || first === undefined) {
        return Effect.fail(new PerSymbolMissing({ symbol }));
      }
      const { price } = first;
      return toRecord(
        symbol,
        {
          regular: price.regularMarketPrice?.raw,
          pre: price.preMarketPrice?.raw,
          post: price.postMarketPrice?.raw,
          marketState: price.marketState,
        },
        fetchedAt,
      ).pipe(
        Either.match({
          onLeft: (e) => Effect.fail(e),
          onRight: (record) => Effect.succeed(record),
        }),
      );
    }),
  );
}

// --- Yahoo Finance layer ---

export const makeYahooFinanceApi = Effect.gen(function* () {
  const client = (yield* HttpClient.HttpClient).pipe(
    HttpClient.filterStatusOk,
    HttpClient.mapRequest(
      HttpClientRequest.setHeader("User-Agent", "Mozilla/5.0"),
    ),
  );
  const quoteUrl = yield* Config.string("YAHOO_QUOTE_URL").pipe(
    Config.withDefault("https://query1.finance.yahoo.com/v7/finance/quote"),
  );
  const summaryUrl = yield* Config.string("YAHOO_SUMMARY_URL").pipe(
    Config.withDefault("https://query2.finance.yahoo.com/v10/finance/quoteSummary"),
  );
  const timeout = yield* Config.duration("PRICE_REQUEST_TIMEOUT").pipe(
    Config.withDefault(Duration.seconds(10)),
  );

  const getJson = (url: string) =>
    client.get(url).pipe(
      Effect.flatMap((response) => response.json),
      Effect.scoped,
      Effect.catchTags({
        RequestError: (e) =>
          Effect.fail(new UpstreamUnavailable({ message: e.message })),
        ResponseError: (e) =>
          e.reason === "StatusCode"
            ? Effect.fail(
                new UpstreamUnavailable({
                  message: `HTTP ${e.response.status}`,
                  status: e.response.status,
                }),
              )
            : Effect.fail(
                new UpstreamUnavailable({
                  message: `JSON parse failed: ${e.message}`,
                }),
              ),
      }),
      Effect.timeoutFail({
        duration: timeout,
        onTimeout: () =>
          new UpstreamUnavailable({ message: `Request timed out after ${Duration.format(timeout)}` }),
      }),
    );

  return QuoteApi.of({
    fetchBatch: (symbols) =>
      Effect.gen(function* () {
        const fetchedAt = yield* Clock.currentTimeMillis;
        const json = yield* getJson(
          `${quoteUrl}?symbols=${symbols.map(encodeURIComponent).join(",")}`,
        );
        return yield* decodeBatchResponse(json, symbols, fetchedAt);
      }),

    fetchOne: (symbol) =>
      Effect.gen(function* () {
        const fetchedAt = yield* Clock.currentTimeMillis;
        const json = yield* getJson(
          `${summaryUrl}/${encodeURIComponent(symbol)}?modules=price`,
        ).pipe(
          // quoteSummary answers an unknown ticker with 404.
          Effect.catchIf(
            (e) => e.status === 404,
            () => Effect.fail(new PerSymbolMissing({ symbol })),
          ),
        );
        return yield* decodeSummaryResponse(json, symbol, fetchedAt);
      }),
  });
});

export const YahooFinanceLive = Layer.effect(QuoteApi, makeYahooFinanceApi);
