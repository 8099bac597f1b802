// Market session classifier — pure functions over wall-clock time and an
// exchange calendar. No Effect services, no I/O.
//
//   CLOSED  weekend, holiday, or outside pre-open..post-close
//   PRE     pre-open  ≤ t < open
//   REGULAR open      ≤ t < close
//   POST    close     ≤ t < post-close

import { Effect, Either, Schema } from "effect";
import type { MarketSession, QuoteRecord } from "./domain.ts";
import { ConfigurationError } from "./errors.ts";

// --- Calendar ---

const WallTime = Schema.String.pipe(Schema.pattern(/^([01]\d|2[0-3]):[0-5]\d$/));
const IsoDate = Schema.String.pipe(Schema.pattern(/^\d{4}-(0[1-9]|1[0-2])-(0[1-9]|[12]\d|3[01])$/));
const MonthDay = Schema.String.pipe(Schema.pattern(/^(0[1-9]|1[0-2])-(0[1-9]|[12]\d|3[01])$/));

export const ExchangeCalendar = Schema.Struct({
  timeZone: Schema.String,
  preMarketOpen: WallTime,
  regularOpen: WallTime,
  regularClose: WallTime,
  postMarketClose: WallTime,
  /** One-off closures, `YYYY-MM-DD` in exchange time. */
  holidays: Schema.Array(IsoDate),
  /** Closures every year, `MM-DD`. */
  recurringHolidays: Schema.Array(MonthDay),
});

export type ExchangeCalendar = typeof ExchangeCalendar.Type;

export const NYSE_CALENDAR: ExchangeCalendar = {
  timeZone: "America/New_York",
  preMarketOpen: "04:00",
  regularOpen: "09:30",
  regularClose: "16:00",
  postMarketClose: "20:00",
  holidays: [],
  recurringHolidays: ["01-01", "07-04", "12-25"],
};

export function decodeCalendar(
  input: unknown,
): Effect.Effect<ExchangeCalendar, ConfigurationError> {
  return Schema.decodeUnknown(ExchangeCalendar)(input).pipe(
    Effect.mapError(
      (e) => new ConfigurationError({ message: `Invalid calendar: ${e.message}` }),
    ),
    Effect.flatMap((calendar) => {
      const prepared = prepare(calendar);
      return Either.isLeft(prepared)
        ? Effect.fail(prepared.left)
        : Effect.succeed(calendar);
    }),
  );
}

// --- Preparation ---

interface Prepared {
  readonly calendar: ExchangeCalendar;
  readonly formatter: Intl.DateTimeFormat;
  readonly preOpen: number; // minutes after local midnight
  readonly open: number;
  readonly close: number;
  readonly postClose: number;
}

function minutesOf(wall: string): number {
  const [h, m] = wall.split(":").map(Number);
  return h * 60 + m;
}

function prepare(calendar: ExchangeCalendar): Either.Either<Prepared, ConfigurationError> {
  // Calendars read leniently from the environment arrive here unchecked.
  const valid = Schema.validateEither(ExchangeCalendar)(calendar);
  if (Either.isLeft(valid)) {
    return Either.left(new ConfigurationError({ message: `Invalid calendar: ${valid.left.message}` }));
  }

  const preOpen = minutesOf(calendar.preMarketOpen);
  const open = minutesOf(calendar.regularOpen);
  const close = minutesOf(calendar.regularClose);
  const postClose = minutesOf(calendar.postMarketClose);

  if (!(preOpen <= open && open < close && close <= postClose)) {
    return Either.left(
      new ConfigurationError({
        message: `Session times out of order: ${calendar.preMarketOpen} ≤ ${calendar.regularOpen} < ${calendar.regularClose} ≤ ${calendar.postMarketClose}`,
      }),
    );
  }

  return Either.try({
    try: () =>
      new Intl.DateTimeFormat("en-US", {
        timeZone: calendar.timeZone,
        year: "numeric",
        month: "2-digit",
        day: "2-digit",
        hour: "2-digit",
        minute: "2-digit",
        second: "2-digit",
        hourCycle: "h23",
      }),
    catch: () =>
      new ConfigurationError({ message: `Unknown time zone "${calendar.timeZone}"` }),
  }).pipe(
    Either.map((formatter) => ({ calendar, formatter, preOpen, open, close, postClose })),
  );
}

// --- Local time ---

interface LocalParts {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

function localParts(formatter: Intl.DateTimeFormat, instant: number): LocalParts {
  const parts: Record<string, number> = {};
  for (const part of formatter.formatToParts(new Date(instant))) {
    if (part.type !== "literal") parts[part.type] = Number(part.value);
  }
  return {
    year: parts.year,
    month: parts.month,
    day: parts.day,
    hour: parts.hour,
    minute: parts.minute,
    second: parts.second,
  };
}

const pad = (n: number) => String(n).padStart(2, "0");

function isoDate(year: number, month: number, day: number): string {
  return `${year}-${pad(month)}-${pad(day)}`;
}

function shiftDate(date: string, days: number): string {
  const [y, m, d] = date.split("-").map(Number);
  const shifted = new Date(Date.UTC(y, m - 1, d + days));
  return isoDate(shifted.getUTCFullYear(), shifted.getUTCMonth() + 1, shifted.getUTCDate());
}

function weekday(date: string): number {
  const [y, m, d] = date.split("-").map(Number);
  return new Date(Date.UTC(y, m - 1, d)).getUTCDay();
}

export function isTradingDay(date: string, calendar: ExchangeCalendar): boolean {
  const dow = weekday(date);
  if (dow === 0 || dow === 6) return false;
  if (calendar.holidays.includes(date)) return false;
  return !calendar.recurringHolidays.includes(date.slice(5));
}

// Two weeks covers any run of weekends and holidays a real calendar has.
const MAX_SEARCH_DAYS = 14;

function findTradingDay(
  from: string,
  step: 1 | -1,
  calendar: ExchangeCalendar,
): Either.Either<string, ConfigurationError> {
  let date = from;
  for (let i = 0; i < MAX_SEARCH_DAYS; i++) {
    date = shiftDate(date, step);
    if (isTradingDay(date, calendar)) return Either.right(date);
  }
  return Either.left(
    new ConfigurationError({
      message: `No trading day within ${MAX_SEARCH_DAYS} days of ${from}`,
    }),
  );
}

// --- Classification ---

export interface SessionInfo {
  readonly session: MarketSession;
  /** Exchange-local calendar date of `now`. */
  readonly localDate: string;
  /** Exchange-local `HH:MM:SS` of `now`. */
  readonly localTime: string;
  /** Most recent trading day whose regular session has started. Keys the
   *  post-close cache. */
  readonly tradingDate: string;
}

export function classifySession(
  now: number,
  calendar: ExchangeCalendar,
): Either.Either<SessionInfo, ConfigurationError> {
  const prepared = prepare(calendar);
  if (Either.isLeft(prepared)) return Either.left(prepared.left);
  const { formatter, preOpen, open, close, postClose } = prepared.right;

  const p = localParts(formatter, now);
  const localDate = isoDate(p.year, p.month, p.day);
  const localTime = `${pad(p.hour)}:${pad(p.minute)}:${pad(p.second)}`;
  const minute = p.hour * 60 + p.minute;
  const tradingToday = isTradingDay(localDate, calendar);

  const session: MarketSession = !tradingToday
    ? "CLOSED"
    : minute < preOpen
      ? "CLOSED"
      : minute < open
        ? "PRE"
        : minute < close
          ? "REGULAR"
          : minute < postClose
            ? "POST"
            : "CLOSED";

  const tradingDate: Either.Either<string, ConfigurationError> =
    tradingToday && minute >= open
      ? Either.right(localDate)
      : findTradingDay(localDate, -1, calendar);

  return Either.map(tradingDate, (date) => ({
    session,
    localDate,
    localTime,
    tradingDate: date,
  }));
}

/** Instant of the next regular-session open strictly after `now`. */
export function nextOpen(
  now: number,
  calendar: ExchangeCalendar,
): Either.Either<number, ConfigurationError> {
  const prepared = prepare(calendar);
  if (Either.isLeft(prepared)) return Either.left(prepared.left);
  const { formatter, open } = prepared.right;

  const p = localParts(formatter, now);
  const localDate = isoDate(p.year, p.month, p.day);
  const beforeOpenToday =
    isTradingDay(localDate, calendar) && p.hour * 60 + p.minute < open;

  const date: Either.Either<string, ConfigurationError> = beforeOpenToday
    ? Either.right(localDate)
    : findTradingDay(localDate, 1, calendar);

  return Either.map(date, (d) =>
    zonedInstant(formatter, d, Math.floor(open / 60), open % 60),
  );
}

/** Wall-clock time in the calendar's zone → epoch ms. */
function zonedInstant(
  formatter: Intl.DateTimeFormat,
  date: string,
  hour: number,
  minute: number,
): number {
  const [y, m, d] = date.split("-").map(Number);
  const wall = Date.UTC(y, m - 1, d, hour, minute);
  const offsetAt = (instant: number) => {
    const p = localParts(formatter, instant);
    return Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second) - instant;
  };
  const first = wall - offsetAt(wall);
  const offset = offsetAt(first);
  return wall - offset;
}

// --- Field selection ---

/** The price a record carries for the given session, if any. CLOSED reads
 *  the regular field: after the close it holds the day's closing price. */
export function selectPrice(record: QuoteRecord, session: MarketSession): number | undefined {
  switch (session) {
    case "PRE":
      return record.preMarketPrice;
    case "REGULAR":
      return record.regularPrice;
    case "POST":
      return record.postMarketPrice;
    case "CLOSED":
      return record.regularPrice;
  }
}
