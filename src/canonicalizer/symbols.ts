/**
 * Symbol normalization
 *
 * Every venue spelling of a pair maps to one canonical `BASE-QUOTE` form:
 *   binance  btcusdt            -> BTC-USDT
 *   coinbase btc-usd / btc_usd  -> BTC-USD
 *   deribit  BTC-PERPETUAL      -> BTC-USD
 *            ETH_USDC-PERPETUAL -> ETH-USDC
 *            BTC-30JUN23-30000-C -> BTC-USD
 *
 * Separator-less symbols are split on the venue's quote suffix table, longest
 * suffix first so that BTCUSDT never splits as BTCUS-DT or BTCUSD-T.
 */

import { NormalizationError } from '../shared/errors';
import { Venue } from '../shared/types';

export type CanonicalSymbol = string & { readonly __canonicalSymbol: true };

export type QuoteTables = Readonly<Record<Venue, readonly string[]>>;

const CANONICAL_SYMBOL = /^[A-Z0-9]+-[A-Z0-9]+$/;
const ALPHANUMERIC = /^[A-Z0-9]+$/;
const SEPARATORS = /[-_/:]/;

// base[_quote]-PERPETUAL | base[_quote]-DDMMMYY[-strike-C|P]
const DERIBIT_INSTRUMENT = /^([A-Z0-9]+)(?:_([A-Z0-9]+))?-(?:PERPETUAL|\d{1,2}[A-Z]{3}\d{2}(?:-[0-9D]+-[CP])?)$/;

export const DEFAULT_QUOTES: Readonly<Record<Venue, readonly string[]>> = {
  binance: ['USDT', 'USDC', 'BUSD', 'FDUSD', 'TUSD', 'USD', 'EUR', 'BTC', 'ETH', 'BNB'],
  coinbase: ['USDT', 'USDC', 'USD', 'EUR', 'GBP', 'BTC', 'ETH'],
  deribit: ['USDC', 'USDT', 'USD', 'BTC', 'ETH'],
  onchain: ['USDT', 'USDC', 'WETH', 'DAI', 'USD', 'ETH'],
};

export function isCanonicalSymbol(value: string): value is CanonicalSymbol {
  return CANONICAL_SYMBOL.test(value);
}

function sortLongestFirst(quotes: readonly string[]): string[] {
  const unique = [...new Set(quotes.map((quote) => quote.trim().toUpperCase()).filter(Boolean))];
  return unique.sort((a, b) => b.length - a.length);
}

/** Quote tables with per-venue replacements, each ordered longest suffix first. */
export function buildQuoteTables(overrides: Partial<Record<Venue, readonly string[]>> = {}): QuoteTables {
  const table = (venue: Venue): readonly string[] =>
    Object.freeze(sortLongestFirst(overrides[venue] ?? DEFAULT_QUOTES[venue]));

  return Object.freeze({
    binance: table('binance'),
    coinbase: table('coinbase'),
    deribit: table('deribit'),
    onchain: table('onchain'),
  });
}

const DEFAULT_TABLES = buildQuoteTables();

function join(base: string, quote: string): CanonicalSymbol | undefined {
  const joined = `${base}-${quote}`;
  return isCanonicalSymbol(joined) ? joined : undefined;
}

function fromDeribitInstrument(upper: string): CanonicalSymbol | undefined {
  const match = DERIBIT_INSTRUMENT.exec(upper);
  if (!match) return undefined;
  return join(match[1], match[2] ?? 'USD');
}

function fromSeparatedPair(upper: string): CanonicalSymbol | undefined {
  const parts = upper.split(SEPARATORS);
  if (parts.length !== 2 || !parts.every((part) => ALPHANUMERIC.test(part))) return undefined;
  return join(parts[0], parts[1]);
}

function fromQuoteSuffix(upper: string, quotes: readonly string[]): CanonicalSymbol | undefined {
  const compact = upper.replace(/[^A-Z0-9]/g, '');
  for (const quote of quotes) {
    if (compact.length > quote.length && compact.endsWith(quote)) {
      return join(compact.slice(0, -quote.length), quote);
    }
  }
  return undefined;
}

/**
 * Normalize a venue symbol to `BASE-QUOTE`.
 * Throws NormalizationError(unknownSymbolFormat) when no rule applies.
 */
export function normalizeSymbol(venue: Venue, raw: string, tables: QuoteTables = DEFAULT_TABLES): CanonicalSymbol {
  const upper = raw.trim().toUpperCase();

  const symbol =
    (venue === 'deribit' ? fromDeribitInstrument(upper) : undefined) ??
    fromSeparatedPair(upper) ??
    fromQuoteSuffix(upper, tables[venue]);

  if (!symbol) {
    throw NormalizationError.unknownSymbolFormat(venue, raw);
  }
  return symbol;
}

/** Venue-native spelling of a canonical pair for subscription requests. */
export function toVenueSymbol(venue: Venue, symbol: CanonicalSymbol): string {
  const [base, quote] = symbol.split('-');
  switch (venue) {
    case 'binance':
      return `${base}${quote}`.toLowerCase();
    case 'deribit':
      return quote === 'USD' ? `${base}-PERPETUAL` : `${base}_${quote}-PERPETUAL`;
    case 'coinbase':
    case 'onchain':
      return symbol;
  }
}
