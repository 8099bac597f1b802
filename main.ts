import { Args, Command, Options } from "@effect/cli";
import { FetchHttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import { Clock, Config, Console, Effect, Either, Layer, Option } from "effect";
import { CalendarFromEnv, ResolverConfigFromEnv, StorePathsFromEnv } from "./src/config.ts";
import { PostCloseCacheLive } from "./src/close-cache.ts";
import {
  type CliError,
  formatError,
  formatOverrideRemoved,
  formatOverrideSet,
  formatOverrides,
  formatResolution,
  formatSession,
  formatTimestamps,
} from "./src/format.ts";
import { classifySession, nextOpen } from "./src/market-session.ts";
import { FileOverrideStoreLive, ManualOverrideStore } from "./src/override-store.ts";
import { PriceResolver, PriceResolverLive } from "./src/price-resolver.ts";
import { QuoteApiTestLive } from "./src/providers/quote-api-mock.ts";
import { FallbackQuoteApiLive } from "./src/quote-api-fallback.ts";
import { YahooFinanceLive } from "./src/providers/yahoo-finance.ts";
import { FileLedgerLive, TimestampLedger } from "./src/timestamp-ledger.ts";

// --- Layers ---
// Set QUOTE_PROVIDER to "fallback" (default: Yahoo, then Alpha Vantage for
// single symbols when ALPHA_VANTAGE_API_KEY is set), "yahoo", or "test".

const QuoteApiLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const provider = yield* Config.string("QUOTE_PROVIDER").pipe(
      Config.withDefault("fallback"),
    );
    switch (provider) {
      case "test":
        return QuoteApiTestLive;
      case "yahoo":
        return YahooFinanceLive;
      default:
        return FallbackQuoteApiLive;
    }
  }),
).pipe(Layer.provide(FetchHttpClient.layer));

const OverridesLive = Layer.unwrapEffect(
  StorePathsFromEnv.pipe(Effect.map((paths) => FileOverrideStoreLive(paths.overridesFile))),
);

const LedgerLive = Layer.unwrapEffect(
  StorePathsFromEnv.pipe(Effect.map((paths) => FileLedgerLive(paths.timestampsFile))),
);

const ResolverLive = Layer.unwrapEffect(
  ResolverConfigFromEnv.pipe(Effect.map(PriceResolverLive)),
).pipe(
  Layer.provide(Layer.mergeAll(QuoteApiLive, OverridesLive, LedgerLive, PostCloseCacheLive)),
);

// --- Commands ---

const symbols = Args.text({ name: "symbol" }).pipe(
  Args.withDescription("Ticker symbols (e.g. AAPL MSFT)"),
  Args.atLeast(1),
);

const forceRefresh = Options.boolean("force-refresh").pipe(
  Options.withAlias("f"),
  Options.withDescription("Ignore cached closing prices"),
);

const resolve = Command.make("resolve", { symbols, forceRefresh }, ({ symbols, forceRefresh }) =>
  Effect.gen(function* () {
    const resolver = yield* PriceResolver;
    const resolution = yield* resolver.resolve(symbols, { forceRefresh });
    yield* Console.log(formatResolution(resolution));
  }).pipe(Effect.provide(ResolverLive)),
).pipe(Command.withDescription("Resolve current prices for the given symbols"));

const session = Command.make("session", {}, () =>
  Effect.gen(function* () {
    const calendar = yield* CalendarFromEnv;
    const now = yield* Clock.currentTimeMillis;
    const info = yield* classifySession(now, calendar);
    const next = Either.getOrUndefined(nextOpen(now, calendar));
    yield* Console.log(formatSession(info, next));
  }),
).pipe(Command.withDescription("Show the current market session"));

const timestamps = Command.make("timestamps", {}, () =>
  Effect.gen(function* () {
    const ledger = yield* TimestampLedger;
    const entries = yield* ledger.all;
    const last = yield* ledger.lastUpdate;
    yield* Console.log(formatTimestamps(entries, Option.getOrUndefined(last)));
  }).pipe(Effect.provide(LedgerLive)),
).pipe(Command.withDescription("Show when each price was last resolved"));

// --- Manual prices ---

const overrideList = Command.make("list", {}, () =>
  Effect.gen(function* () {
    const store = yield* ManualOverrideStore;
    yield* Console.log(formatOverrides(yield* store.list));
  }).pipe(Effect.provide(OverridesLive)),
);

const overrideSet = Command.make(
  "set",
  { symbol: Args.text({ name: "symbol" }), price: Args.float({ name: "price" }) },
  ({ symbol, price }) =>
    Effect.gen(function* () {
      const store = yield* ManualOverrideStore;
      const stored = yield* store.set(symbol, price);
      yield* Console.log(formatOverrideSet(symbol, stored));
    }).pipe(Effect.provide(OverridesLive)),
);

const overrideRemove = Command.make(
  "remove",
  { symbol: Args.text({ name: "symbol" }) },
  ({ symbol }) =>
    Effect.gen(function* () {
      const store = yield* ManualOverrideStore;
      const removed = yield* store.remove(symbol);
      yield* Console.log(formatOverrideRemoved(symbol, removed));
    }).pipe(Effect.provide(OverridesLive)),
);

const overrideClear = Command.make("clear", {}, () =>
  Effect.gen(function* () {
    const store = yield* ManualOverrideStore;
    yield* store.clear;
    yield* Console.log("  All manual prices cleared");
  }).pipe(Effect.provide(OverridesLive)),
);

const override = Command.make("override").pipe(
  Command.withDescription("Manage manual prices, which beat any fetched price"),
  Command.withSubcommands([overrideList, overrideSet, overrideRemove, overrideClear]),
);

const command = Command.make("portfolio-prices").pipe(
  Command.withSubcommands([resolve, session, timestamps, override]),
);

// --- Run ---

const cli = Command.run(command, {
  name: "portfolio-prices",
  version: "0.1.0",
});

const logCliError = (e: CliError) => Console.error(formatError(e));

cli(process.argv).pipe(
  Effect.catchTags({
    ConfigurationError: logCliError,
    StoreUnavailable: logCliError,
  }),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
