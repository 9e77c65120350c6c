/**
 * Binance spot agent
 * Combined-stream session: trades, depth diffs, book ticker, 24h ticker and
 * 1m klines per symbol, plus a REST depth snapshot at the start of each
 * session when l2 snapshots are enabled.
 *
 * A session carries at most 1024 streams, so an `all` selector is split into
 * shards, one agent each, every shard taking a fixed slice of the sorted
 * symbol list. SUBSCRIBE frames are paced under the venue's limit of five
 * inbound messages per second.
 */

import logger from '../shared/logger';
import { ProtocolError, describeError } from '../shared/errors';
import { EventKind, FeatureToggles, JsonObject, JsonValue, RawEvent, SymbolSelector, isJsonObject } from '../shared/types';
import { WebSocketAgent } from './agent';
import { discoverBinanceSymbols, fetchBinanceDepth } from './symbol-discovery';

export interface BinanceShard {
  index: number;
  count: number;
}

export interface BinanceAgentOptions {
  selector: SymbolSelector;
  wsUrl: string;
  restUrl: string;
  features: FeatureToggles;
  /** Slice of the discovered symbol list this agent serves; `all` selectors only */
  shard?: BinanceShard;
  /** Re-resolve an `all` selector this often; 0 disables */
  refreshIntervalMs?: number;
  subscribeIntervalMs?: number;
  now?: () => number;
}

// Binance rejects SUBSCRIBE requests carrying more params than this
const MAX_PARAMS_PER_REQUEST = 200;
export const MAX_STREAMS_PER_SESSION = 1024;
const DEFAULT_SUBSCRIBE_INTERVAL_MS = 250;

const STREAM_SUFFIX: ReadonlyArray<[EventKind, string]> = [
  ['trade', 'trade'],
  ['l2Diff', 'depth@100ms'],
  ['bookTicker', 'bookTicker'],
  ['ticker24h', 'ticker'],
  ['ohlcv', 'kline_1m'],
];

const EVENT_TYPE_KIND: Readonly<Record<string, EventKind>> = {
  trade: 'trade',
  depthUpdate: 'l2Diff',
  '24hrTicker': 'ticker24h',
  kline: 'ohlcv',
};

/** Kinds served by the spot session */
export const BINANCE_SPOT_KINDS: readonly EventKind[] = ['trade', 'l2Diff', 'l2Snapshot', 'bookTicker', 'ticker24h', 'ohlcv'];

/** Symbols one session can carry with the enabled stream kinds. */
export function symbolsPerSession(features: FeatureToggles): number {
  const streams = STREAM_SUFFIX.filter(([kind]) => features[kind]).length;
  return Math.max(1, Math.floor(MAX_STREAMS_PER_SESSION / Math.max(1, streams)));
}

function agentName(selector: SymbolSelector, shard: BinanceShard | undefined): string {
  const base = `binance:${selector === 'all' ? 'all' : selector.join(',')}`;
  return shard && shard.count > 1 ? `${base}#${shard.index + 1}/${shard.count}` : base;
}

/**
 * Throws ProtocolError for a subscription error acknowledgement.
 * Returns true when the frame was a control frame.
 */
export function checkControlFrame(agent: string, frame: JsonObject): boolean {
  if ('error' in frame && frame.error !== null) {
    const detail = isJsonObject(frame.error) ? String(frame.error.msg ?? JSON.stringify(frame.error)) : String(frame.error);
    throw new ProtocolError(`subscription rejected: ${detail}`, agent);
  }
  return 'result' in frame && 'id' in frame;
}

export class BinanceAgent extends WebSocketAgent {
  private readonly selector: SymbolSelector;
  private readonly restUrl: string;
  private readonly shard: BinanceShard;
  private symbols: string[] = [];
  private requestId = 0;

  constructor(options: BinanceAgentOptions) {
    super({
      name: agentName(options.selector, options.shard),
      venue: 'binance',
      url: options.wsUrl,
      features: options.features,
      frameIntervalMs: options.subscribeIntervalMs ?? DEFAULT_SUBSCRIBE_INTERVAL_MS,
      refreshIntervalMs: options.selector === 'all' ? options.refreshIntervalMs : 0,
      now: options.now,
    });
    this.selector = options.selector;
    this.restUrl = options.restUrl;
    this.shard = options.shard ?? { index: 0, count: 1 };
  }

  protected async prepare(signal: AbortSignal): Promise<void> {
    const symbols =
      this.selector === 'all'
        ? this.shardSymbols(await discoverBinanceSymbols(this.name, this.restUrl, signal))
        : this.capped(this.selector.map((symbol) => symbol.toLowerCase()));
    if (signal.aborted) return;
    this.symbols = symbols;
    this.requestId = 0;
  }

  protected subscriptionFrames(): JsonObject[] {
    return this.frames('SUBSCRIBE', this.symbols);
  }

  protected async refreshFrames(signal: AbortSignal): Promise<JsonObject[]> {
    const next = this.shardSymbols(await discoverBinanceSymbols(this.name, this.restUrl, signal));
    if (signal.aborted) return [];
    const current = new Set(this.symbols);
    const wanted = new Set(next);
    const removed = this.symbols.filter((symbol) => !wanted.has(symbol));
    const added = next.filter((symbol) => !current.has(symbol));

    if (removed.length === 0 && added.length === 0) {
      logger.debug(`[${this.name}] Symbol refresh: no changes`);
      return [];
    }
    logger.info(`[${this.name}] Symbol refresh: +${added.length} -${removed.length} (${next.length} total)`);
    this.symbols = next;
    return [...this.frames('UNSUBSCRIBE', removed), ...this.frames('SUBSCRIBE', added)];
  }

  protected async afterSubscribe(signal: AbortSignal): Promise<RawEvent[]> {
    if (!this.enabled('l2Snapshot')) return [];
    if (this.selector === 'all') {
      logger.warn(`[${this.name}] Book snapshots are only fetched for explicit symbol lists`);
      return [];
    }

    const snapshots: RawEvent[] = [];
    for (const symbol of this.symbols) {
      try {
        const payload = await fetchBinanceDepth(this.name, this.restUrl, symbol, signal);
        snapshots.push(this.rawEvent('l2Snapshot', payload, this.now()));
      } catch (error) {
        logger.warn(`[${this.name}] Snapshot for ${symbol} failed: ${describeError(error)}`);
      }
    }
    return snapshots;
  }

  private frames(method: 'SUBSCRIBE' | 'UNSUBSCRIBE', symbols: readonly string[]): JsonObject[] {
    const params: string[] = [];
    for (const symbol of symbols) {
      for (const [kind, suffix] of STREAM_SUFFIX) {
        if (this.enabled(kind)) params.push(`${symbol}@${suffix}`);
      }
    }

    const frames: JsonObject[] = [];
    for (let offset = 0; offset < params.length; offset += MAX_PARAMS_PER_REQUEST) {
      frames.push({ method, params: params.slice(offset, offset + MAX_PARAMS_PER_REQUEST), id: ++this.requestId });
    }
    return frames;
  }

  private shardSymbols(discovered: readonly string[]): string[] {
    const perSession = symbolsPerSession(this.features);
    const sorted = [...discovered].sort();
    const start = this.shard.index * perSession;
    const uncovered = sorted.length - this.shard.count * perSession;
    if (this.shard.index === this.shard.count - 1 && uncovered > 0) {
      logger.warn(`[${this.name}] ${uncovered} listed symbol(s) exceed the shard capacity and are not streamed`);
    }
    return sorted.slice(start, start + perSession);
  }

  private capped(symbols: string[]): string[] {
    const perSession = symbolsPerSession(this.features);
    if (symbols.length <= perSession) return symbols;
    logger.warn(`[${this.name}] Only the first ${perSession} of ${symbols.length} symbols fit one session`);
    return symbols.slice(0, perSession);
  }

  protected decodeFrame(frame: JsonValue, receivedAt: number): RawEvent[] {
    if (!isJsonObject(frame)) {
      throw new ProtocolError('expected a JSON object frame', this.name);
    }
    if (checkControlFrame(this.name, frame)) return [];

    const data = frame.data;
    const stream = typeof frame.stream === 'string' ? frame.stream : '';
    if (!isJsonObject(data)) return [];

    const kind = stream.endsWith('@bookTicker')
      ? 'bookTicker'
      : typeof data.e === 'string'
        ? EVENT_TYPE_KIND[data.e]
        : undefined;
    return kind ? [this.rawEvent(kind, data, receivedAt)] : [];
  }
}
