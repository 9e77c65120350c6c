/**
 * Venue symbol discovery
 * Public REST lookups used to expand `all` selectors and to learn Binance's
 * quote assets. Any failure surfaces as a ConnectionError so the supervisor
 * retries it like a failed handshake.
 */

import axios from 'axios';
import { z } from 'zod';
import logger from '../shared/logger';
import { ConnectionError, describeError } from '../shared/errors';
import { JsonObject } from '../shared/types';

const REQUEST_TIMEOUT_MS = 10_000;

// Quote assets a Binance `all` feed keeps; the full listing runs past the
// combined-stream subscription limit.
const BINANCE_ALL_QUOTES = new Set(['USDT', 'USD']);

const BinanceExchangeInfo = z.object({
  symbols: z.array(
    z.object({
      symbol: z.string(),
      status: z.string(),
      quoteAsset: z.string(),
    })
  ),
});

const CoinbaseProducts = z.array(
  z.object({
    id: z.string(),
    status: z.string().optional(),
    trading_disabled: z.boolean().optional(),
  })
);

const BinanceDepth = z.object({
  lastUpdateId: z.number(),
  bids: z.array(z.tuple([z.string(), z.string()])),
  asks: z.array(z.tuple([z.string(), z.string()])),
});

async function getJson<T>(
  agent: string,
  url: string,
  schema: z.ZodType<T>,
  signal?: AbortSignal,
  params?: Record<string, string | number>
): Promise<T> {
  try {
    const response = await axios.get(url, { timeout: REQUEST_TIMEOUT_MS, signal, params });
    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error(`unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  } catch (error) {
    throw new ConnectionError(`GET ${url} failed: ${describeError(error)}`, agent, { cause: error });
  }
}

async function fetchBinanceExchangeInfo(agent: string, restUrl: string, signal?: AbortSignal) {
  return getJson(agent, `${restUrl}/api/v3/exchangeInfo`, BinanceExchangeInfo, signal);
}

/** Trading Binance symbols quoted in USDT or USD, lowercase as streams name them. */
export async function discoverBinanceSymbols(agent: string, restUrl: string, signal?: AbortSignal): Promise<string[]> {
  const info = await fetchBinanceExchangeInfo(agent, restUrl, signal);
  const symbols = info.symbols
    .filter((entry) => entry.status === 'TRADING' && BINANCE_ALL_QUOTES.has(entry.quoteAsset.toUpperCase()))
    .map((entry) => entry.symbol.toLowerCase());

  logger.info(`[${agent}] Discovered ${symbols.length} Binance symbols`);
  return symbols;
}

/** Distinct quote assets of every listed Binance symbol. */
export async function discoverBinanceQuotes(restUrl: string, signal?: AbortSignal): Promise<string[]> {
  const info = await fetchBinanceExchangeInfo('binance', restUrl, signal);
  return [...new Set(info.symbols.map((entry) => entry.quoteAsset.toUpperCase()))];
}

/** Online, tradable Coinbase product ids (already BASE-QUOTE). */
export async function discoverCoinbaseProducts(agent: string, restUrl: string, signal?: AbortSignal): Promise<string[]> {
  const products = await getJson(agent, `${restUrl}/products`, CoinbaseProducts, signal);
  const ids = products
    .filter((product) => (product.status ?? 'online') === 'online' && !product.trading_disabled)
    .map((product) => product.id);

  logger.info(`[${agent}] Discovered ${ids.length} Coinbase products`);
  return ids;
}

/** Order book snapshot payload for one Binance symbol. */
export async function fetchBinanceDepth(
  agent: string,
  restUrl: string,
  symbol: string,
  signal?: AbortSignal
): Promise<JsonObject> {
  const upper = symbol.toUpperCase();
  const depth = await getJson(agent, `${restUrl}/api/v3/depth`, BinanceDepth, signal, { symbol: upper, limit: 100 });
  return {
    s: upper,
    lastUpdateId: depth.lastUpdateId,
    bids: depth.bids,
    asks: depth.asks,
  };
}
