// Pure formatting functions — no I/O.

import {
  type PriceResolution,
  type PriceSource,
  type Resolution,
  type TimestampEntry,
  normalizeSymbol,
} from "./domain.ts";
import type { ConfigurationError, StoreUnavailable } from "./errors.ts";
import type { SessionInfo } from "./market-session.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const CYAN = "\x1b[36m";
const RED = "\x1b[31m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

const SOURCE_COLOR: Record<PriceSource, string> = {
  manual: YELLOW,
  cache: CYAN,
  batch: GREEN,
  single: GREEN,
};

/** `YYYY-MM-DD HH:MM:SS` in UTC. */
export function formatInstant(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 19).replace("T", " ");
}

// --- Resolution ---

export function formatPriceLine(r: PriceResolution): string {
  const symbol = r.symbol.padEnd(8);
  if (r._tag === "Unresolved") {
    return `  ${BOLD}${symbol}${RESET}${RED}no data${RESET} ${DIM}(${r.reason})${RESET}`;
  }
  const price = r.price.toFixed(2).padStart(10);
  const source = `${SOURCE_COLOR[r.source]}${r.source.padEnd(7)}${RESET}`;
  return `  ${BOLD}${symbol}${RESET}${price}  ${source}${DIM}${formatInstant(r.timestamp)} UTC${RESET}`;
}

export function formatResolution(resolution: Resolution): string {
  const lines = [...resolution.values()].map(formatPriceLine);
  const resolved = [...resolution.values()].filter((r) => r._tag === "Resolved").length;
  return [
    "",
    ...lines,
    "",
    `  ${DIM}${resolved}/${resolution.size} resolved${RESET}`,
    "",
  ].join("\n");
}

// --- Session ---

export function formatSession(info: SessionInfo, nextOpen: number | undefined): string {
  const lines = [
    "",
    `${BOLD}  ${info.session}${RESET}`,
    `  ${DIM}exchange time ${info.localDate} ${info.localTime}${RESET}`,
    `  ${DIM}trading date  ${info.tradingDate}${RESET}`,
  ];
  if (nextOpen !== undefined && info.session !== "REGULAR") {
    lines.push(`  ${DIM}next open     ${formatInstant(nextOpen)} UTC${RESET}`);
  }
  lines.push("");
  return lines.join("\n");
}

// --- Stores ---

export function formatOverrides(entries: ReadonlyMap<string, number>): string {
  if (entries.size === 0) return `\n  ${DIM}No manual prices set.${RESET}\n`;
  const lines = [...entries.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([symbol, price]) => `  ${BOLD}${symbol.padEnd(8)}${RESET}${price.toFixed(2).padStart(10)}`);
  return ["", ...lines, ""].join("\n");
}

/** Confirmation for `override set`, naming the symbol as it was stored. */
export function formatOverrideSet(symbol: string, price: number): string {
  return `  ${BOLD}${normalizeSymbol(symbol)}${RESET} → ${price.toFixed(2)}`;
}

export function formatOverrideRemoved(symbol: string, removed: boolean): string {
  const normalized = normalizeSymbol(symbol);
  return removed ? `  ${normalized} removed` : `  ${DIM}${normalized} had no manual price${RESET}`;
}

export function formatTimestamps(
  entries: ReadonlyMap<string, TimestampEntry>,
  lastUpdate: number | undefined,
): string {
  if (entries.size === 0) return `\n  ${DIM}No prices resolved yet.${RESET}\n`;
  const lines = [...entries.entries()]
    .sort(([, a], [, b]) => b.at - a.at)
    .map(
      ([symbol, e]) =>
        `  ${BOLD}${symbol.padEnd(8)}${RESET}${e.price.toFixed(2).padStart(10)}  ${SOURCE_COLOR[e.source]}${e.source.padEnd(7)}${RESET}${DIM}${formatInstant(e.at)} UTC${RESET}`,
    );
  const footer =
    lastUpdate === undefined ? [] : [`  ${DIM}last update ${formatInstant(lastUpdate)} UTC${RESET}`];
  return ["", ...lines, "", ...footer, ""].join("\n");
}

// --- Error formatting ---

export type CliError = ConfigurationError | StoreUnavailable;

export function formatError(error: CliError): string {
  const friendly = classifyError(error);
  return [
    "",
    `${RED}${BOLD}  ✗ ${friendly.title}${RESET}`,
    `  ${DIM}${friendly.hint}${RESET}`,
    "",
  ].join("\n");
}

interface ClassifiedError {
  readonly title: string;
  readonly hint: string;
}

function classifyError(error: CliError): ClassifiedError {
  switch (error._tag) {
    case "ConfigurationError":
      return {
        title: "Configuration error",
        hint: error.message,
      };
    case "StoreUnavailable":
      return {
        title: error.store === "overrides" ? "Manual prices unavailable" : "Timestamps unavailable",
        hint: error.message,
      };
  }
}
