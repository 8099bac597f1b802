// Tests for the single-symbol fallback:
// - shouldFallBack: which errors move on to the next source
// - trySources: ordering and which error is reported

import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";
import type { QuoteRecord } from "./domain.ts";
import { type NamedSource, shouldFallBack, trySources } from "./quote-api-fallback.ts";
import { PerSymbolMissing, type QuoteApiError, UpstreamUnavailable } from "./quote-api.ts";

// --- Helpers ---

const record = (regularPrice: number): QuoteRecord => ({ symbol: "AAPL", regularPrice, fetchedAt: 0 });

function source(name: string, answer: Either.Either<QuoteRecord, QuoteApiError>) {
  const calls = new Array<string>();
  const named: NamedSource = {
    name,
    fetchOne: (symbol) =>
      Effect.suspend((): Effect.Effect<QuoteRecord, QuoteApiError> => {
        calls.push(symbol);
        return Either.isRight(answer) ? Effect.succeed(answer.right) : Effect.fail(answer.left);
      }),
  };
  return { named, calls };
}

const unavailable = new UpstreamUnavailable({ message: "HTTP 503", status: 503 });

const run = (sources: ReadonlyArray<NamedSource>) =>
  Effect.runPromise(Effect.either(trySources(sources, "AAPL")));

// --- shouldFallBack ---

describe("shouldFallBack", () => {
  it("moves on after any transport failure, client errors included", () => {
    expect(shouldFallBack(unavailable)).toBe(true);
    expect(shouldFallBack(new UpstreamUnavailable({ message: "HTTP 401", status: 401 }))).toBe(true);
    expect(shouldFallBack(new UpstreamUnavailable({ message: "timed out" }))).toBe(true);
  });

  it("believes a provider that does not know the symbol", () => {
    expect(shouldFallBack(new PerSymbolMissing({ symbol: "ZZZZ" }))).toBe(false);
  });
});

// --- trySources ---

describe("trySources", () => {
  it("the first source answers and the second is never asked", async () => {
    const yahoo = source("yahoo", Either.right(record(172.62)));
    const alpha = source("alphavantage", Either.right(record(172.6)));

    const result = await run([yahoo.named, alpha.named]);

    expect(Either.isRight(result) && result.right.regularPrice).toBe(172.62);
    expect(alpha.calls).toEqual([]);
  });

  it("an unavailable first source hands over to the second", async () => {
    const yahoo = source("yahoo", Either.left(unavailable));
    const alpha = source("alphavantage", Either.right(record(172.6)));

    const result = await run([yahoo.named, alpha.named]);

    expect(Either.isRight(result) && result.right.regularPrice).toBe(172.6);
    expect(yahoo.calls).toEqual(["AAPL"]);
    expect(alpha.calls).toEqual(["AAPL"]);
  });

  it("a missing symbol is reported without asking the next source", async () => {
    const yahoo = source("yahoo", Either.left(new PerSymbolMissing({ symbol: "AAPL" })));
    const alpha = source("alphavantage", Either.right(record(172.6)));

    const result = await run([yahoo.named, alpha.named]);

    expect(Either.isLeft(result) && result.left._tag).toBe("PerSymbolMissing");
    expect(alpha.calls).toEqual([]);
  });

  it("when every source is unavailable, the last error is reported", async () => {
    const yahoo = source("yahoo", Either.left(unavailable));
    const alpha = source("alphavantage", Either.left(new UpstreamUnavailable({ message: "rate limited" })));

    const result = await run([yahoo.named, alpha.named]);

    expect(Either.isLeft(result) && result.left.message).toBe("rate limited");
  });

  it("no sources at all is UpstreamUnavailable", async () => {
    const result = await run([]);
    expect(Either.isLeft(result) && result.left._tag).toBe("UpstreamUnavailable");
  });
});
