// Alpha Vantage — single-symbol quotes only.
//
// GLOBAL_QUOTE has no batch form and no extended-hours fields: the record it
// yields carries the latest regular-session price and nothing else.

import { HttpClient } from "@effect/platform";
import { Clock, Config, type Context, Duration, Effect, Schema } from "effect";
import { type QuoteRecord, toPrice } from "../domain.ts";
import { type QuoteApi, type QuoteApiError, PerSymbolMissing, UpstreamUnavailable } from "../quote-api.ts";

// --- Alpha Vantage response schema ---

const GlobalQuoteResponse = Schema.Struct({
  "Error Message": Schema.optional(Schema.String),
  Note: Schema.optional(Schema.String),
  Information: Schema.optional(Schema.String),
  "Global Quote": Schema.optional(Schema.Record({ key: Schema.String, value: Schema.String })),
});

const GlobalQuote = Schema.Struct({
  "01. symbol": Schema.String,
  "05. price": Schema.NumberFromString,
});

// --- Decode ---

export function decodeGlobalQuoteResponse(
  json: unknown,
  symbol: string,
  fetchedAt: number,
): Effect.Effect<QuoteRecord, QuoteApiError> {
  return Schema.decodeUnknown(GlobalQuoteResponse)(json).pipe(
    Effect.mapError(
      (e) => new UpstreamUnavailable({ message: `Invalid GLOBAL_QUOTE response: ${e.message}` }),
    ),
    Effect.flatMap((body): Effect.Effect<QuoteRecord, QuoteApiError> => {
      // Service-level problems (bad key, rate limit) arrive as a 200 with a
      // message in place of the quote.
      const notice = body["Error Message"] ?? body.Note ?? body.Information;
      if (notice !== undefined) {
        return Effect.fail(new UpstreamUnavailable({ message: notice }));
      }

      const quote = body["Global Quote"];
      if (quote === undefined || Object.keys(quote).length === 0) {
        return Effect.fail(new PerSymbolMissing({ symbol }));
      }

      return Schema.decodeUnknown(GlobalQuote)(quote).pipe(
        Effect.mapError(
          (e) => new UpstreamUnavailable({ message: `Invalid GLOBAL_QUOTE response: ${e.message}` }),
        ),
        Effect.flatMap((q): Effect.Effect<QuoteRecord, QuoteApiError> => {
          const regularPrice = toPrice(q["05. price"]);
          return regularPrice === undefined
            ? Effect.fail(new PerSymbolMissing({ symbol }))
            : Effect.succeed({ symbol, regularPrice, fetchedAt });
        }),
      );
    }),
  );
}

// --- Alpha Vantage source ---

/** Fails with a ConfigError when ALPHA_VANTAGE_API_KEY is not set. */
export const makeAlphaVantageQuote = Effect.gen(function* () {
  const client = (yield* HttpClient.HttpClient).pipe(HttpClient.filterStatusOk);
  const apiKey = yield* Config.string("ALPHA_VANTAGE_API_KEY");
  const baseUrl = yield* Config.string("ALPHA_VANTAGE_BASE_URL").pipe(
    Config.withDefault("https://www.alphavantage.co/query"),
  );
  const timeout = yield* Config.duration("PRICE_REQUEST_TIMEOUT").pipe(
    Config.withDefault(Duration.seconds(10)),
  );

  const fetchOne: Context.Tag.Service<QuoteApi>["fetchOne"] = (symbol) =>
    Effect.gen(function* () {
      const fetchedAt = yield* Clock.currentTimeMillis;
      const url =
        `${baseUrl}?function=GLOBAL_QUOTE&symbol=${encodeURIComponent(symbol)}&apikey=${encodeURIComponent(apiKey)}`;
      const json = yield* client.get(url).pipe(
        Effect.flatMap((response) => response.json),
        Effect.scoped,
        Effect.catchTags({
          RequestError: (e) => Effect.fail(new UpstreamUnavailable({ message: e.message })),
          ResponseError: (e) =>
            e.reason === "StatusCode"
              ? Effect.fail(
                  new UpstreamUnavailable({
                    message: `HTTP ${e.response.status}`,
                    status: e.response.status,
                  }),
                )
              : Effect.fail(new UpstreamUnavailable({ message: `JSON parse failed: ${e.message}` })),
        }),
        Effect.timeoutFail({
          duration: timeout,
          onTimeout: () =>
            new UpstreamUnavailable({ message: `Request timed out after ${Duration.format(timeout)}` }),
        }),
      );
      return yield* decodeGlobalQuoteResponse(json, symbol, fetchedAt);
    });

  return { fetchOne };
});
