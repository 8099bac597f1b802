// Quote API — service definition and upstream errors.

import { Context, Data, Effect, Either } from "effect";
import type { QuoteRecord } from "./domain.ts";

// --- Errors ---

/** Transport-level failure: connection, timeout, non-2xx or unreadable body. */
export class UpstreamUnavailable extends Data.TaggedError("UpstreamUnavailable")<{
  readonly message: string;
  readonly status?: number;
}> {}

/** The upstream answered, but had nothing for this symbol. */
export class PerSymbolMissing extends Data.TaggedError("PerSymbolMissing")<{
  readonly symbol: string;
}> {}

export type QuoteApiError = UpstreamUnavailable | PerSymbolMissing;

// --- Service ---

export type BatchResult = ReadonlyMap<string, Either.Either<QuoteRecord, PerSymbolMissing>>;

export class QuoteApi extends Context.Tag("QuoteApi")<
  QuoteApi,
  {
    /** One outbound request for the whole set. Every requested symbol
     *  has an entry in the result. */
    readonly fetchBatch: (
      symbols: ReadonlyArray<string>,
    ) => Effect.Effect<BatchResult, UpstreamUnavailable>;

    /** One outbound request for one symbol. */
    readonly fetchOne: (
      symbol: string,
    ) => Effect.Effect<QuoteRecord, QuoteApiError>;
  }
>() {}

// --- Retry policy ---

/** Transport failures are worth another attempt, except client errors
 *  that will answer the same way every time. */
export function isRetryable(e: UpstreamUnavailable): boolean {
  if (e.status === undefined) return true;
  if (e.status === 408 || e.status === 429) return true;
  return e.status >= 500;
}
