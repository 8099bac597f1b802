// Pure domain types — no framework dependency, no I/O.

export type MarketSession = "PRE" | "REGULAR" | "POST" | "CLOSED";

/** Where a resolved price came from, in priority order. */
export type PriceSource = "manual" | "cache" | "batch" | "single";

export interface QuoteRecord {
  readonly symbol: string;
  readonly regularPrice?: number;
  readonly preMarketPrice?: number;
  readonly postMarketPrice?: number;
  /** Session reported by the upstream, when it reports one. */
  readonly session?: MarketSession;
  readonly fetchedAt: number; // epoch ms
}

export interface Resolved {
  readonly _tag: "Resolved";
  readonly symbol: string;
  readonly price: number;
  readonly source: PriceSource;
  readonly timestamp: number; // epoch ms
}

export interface Unresolved {
  readonly _tag: "Unresolved";
  readonly symbol: string;
  readonly reason: string;
}

export type PriceResolution = Resolved | Unresolved;

/** Keyed by normalized symbol, in request order. */
export type Resolution = ReadonlyMap<string, PriceResolution>;

export interface TimestampEntry {
  readonly price: number;
  readonly source: PriceSource;
  readonly at: number; // epoch ms
}

// --- Helpers ---

export function normalizeSymbol(raw: string): string {
  return raw.trim().toUpperCase();
}

/** Normalize, drop blanks and duplicates, keep first-seen order. */
export function normalizeSymbols(raw: Iterable<string>): ReadonlyArray<string> {
  const seen = new Set<string>();
  for (const s of raw) {
    const symbol = normalizeSymbol(s);
    if (symbol.length > 0) seen.add(symbol);
  }
  return [...seen];
}

/** Round to cents; non-finite or non-positive prices are no price at all. */
export function toPrice(value: number | null | undefined): number | undefined {
  if (value === null || value === undefined) return undefined;
  if (!Number.isFinite(value) || value <= 0) return undefined;
  return Math.round(value * 100) / 100;
}
