// Resolver configuration — an explicit value handed to each resolver, read
// from the environment by the CLI.

import { Config, type ConfigError, Console, Duration, Effect } from "effect";
import type { ConfigurationError } from "./errors.ts";
import { type ExchangeCalendar, NYSE_CALENDAR, decodeCalendar } from "./market-session.ts";

export interface ResolverConfig {
  /** Attempts after the first one, for a batch or a single fetch. */
  readonly retries: number;
  /** Fixed spacing between attempts. */
  readonly retryBackoff: Duration.DurationInput;
  /** Pause between sequential single-symbol fetches. */
  readonly singleSpacing: Duration.DurationInput;
  /** Unchecked: the classifier reports a malformed calendar per call. */
  readonly calendar: ExchangeCalendar;
}

export const defaultResolverConfig: ResolverConfig = {
  retries: 2,
  retryBackoff: "1 second",
  singleSpacing: "500 millis",
  calendar: NYSE_CALENDAR,
};

export interface StorePaths {
  readonly overridesFile: string;
  readonly timestampsFile: string;
}

// --- Environment ---

const retries = Config.integer("PRICE_RETRY_COUNT").pipe(
  Config.withDefault(defaultResolverConfig.retries),
  Config.validate({
    message: "PRICE_RETRY_COUNT must be zero or more",
    validation: (n) => n >= 0,
  }),
);

const calendarInput = Config.all({
  timeZone: Config.string("EXCHANGE_TIMEZONE").pipe(Config.withDefault(NYSE_CALENDAR.timeZone)),
  preMarketOpen: Config.string("EXCHANGE_PRE_OPEN").pipe(Config.withDefault(NYSE_CALENDAR.preMarketOpen)),
  regularOpen: Config.string("EXCHANGE_OPEN").pipe(Config.withDefault(NYSE_CALENDAR.regularOpen)),
  regularClose: Config.string("EXCHANGE_CLOSE").pipe(Config.withDefault(NYSE_CALENDAR.regularClose)),
  postMarketClose: Config.string("EXCHANGE_POST_CLOSE").pipe(Config.withDefault(NYSE_CALENDAR.postMarketClose)),
  holidays: Config.array(Config.string(), "EXCHANGE_HOLIDAYS").pipe(Config.withDefault([])),
});

const rawCalendar = calendarInput.pipe(
  Config.map((input): ExchangeCalendar => ({
    ...input,
    recurringHolidays: NYSE_CALENDAR.recurringHolidays,
  })),
);

/** The exchange calendar, checked. For commands that need the classifier. */
export const CalendarFromEnv: Effect.Effect<ExchangeCalendar, ConfigError.ConfigError | ConfigurationError> =
  rawCalendar.pipe(Effect.flatMap(decodeCalendar));

/** A bad calendar only costs the resolver its session classification, so it
 *  is kept as read and reported once here. */
export const ResolverConfigFromEnv = Effect.gen(function* () {
  const raw = yield* rawCalendar;
  const calendar = yield* decodeCalendar(raw).pipe(
    Effect.catchTag("ConfigurationError", (e) =>
      Console.warn(`[config] ${e.message}; sessions will follow the quote data`).pipe(
        Effect.as(raw),
      ),
    ),
  );

  return {
    retries: yield* retries,
    retryBackoff: yield* Config.duration("PRICE_RETRY_BACKOFF").pipe(
      Config.withDefault(Duration.decode(defaultResolverConfig.retryBackoff)),
    ),
    singleSpacing: yield* Config.duration("PRICE_SINGLE_SPACING").pipe(
      Config.withDefault(Duration.decode(defaultResolverConfig.singleSpacing)),
    ),
    calendar,
  } satisfies ResolverConfig;
});

export const StorePathsFromEnv: Config.Config<StorePaths> = Config.all({
  overridesFile: Config.string("MANUAL_PRICES_FILE").pipe(
    Config.withDefault("data/manual_prices.json"),
  ),
  timestampsFile: Config.string("PRICE_TIMESTAMPS_FILE").pipe(
    Config.withDefault("data/price_timestamps.json"),
  ),
});
