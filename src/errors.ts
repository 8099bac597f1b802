// Errors raised by the local stores and the exchange calendar.
// Upstream errors live with the QuoteApi service in quote-api.ts.

import { Data } from "effect";

/** Malformed calendar or override file. Fatal to that component only. */
export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  readonly message: string;
}> {}

/** A persisted store could not be read or written. */
export class StoreUnavailable extends Data.TaggedError("StoreUnavailable")<{
  readonly store: string;
  readonly message: string;
}> {}
