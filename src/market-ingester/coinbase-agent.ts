/**
 * Coinbase Exchange agent
 * matches -> trade, ticker -> book ticker / 24h ticker,
 * level2_batch -> book snapshot and diffs.
 */

import logger from '../shared/logger';
import { ProtocolError } from '../shared/errors';
import { EventKind, FeatureToggles, JsonObject, JsonValue, RawEvent, SymbolSelector, isJsonObject } from '../shared/types';
import { WebSocketAgent } from './agent';
import { discoverCoinbaseProducts } from './symbol-discovery';

export interface CoinbaseAgentOptions {
  selector: SymbolSelector;
  wsUrl: string;
  restUrl: string;
  features: FeatureToggles;
  /** Re-resolve an `all` selector this often; 0 disables */
  refreshIntervalMs?: number;
  now?: () => number;
}

const CHANNEL_KINDS: ReadonlyArray<[string, readonly EventKind[]]> = [
  ['matches', ['trade']],
  ['ticker', ['bookTicker', 'ticker24h']],
  ['level2_batch', ['l2Snapshot', 'l2Diff']],
];

export const COINBASE_KINDS: readonly EventKind[] = CHANNEL_KINDS.flatMap(([, kinds]) => kinds);

/** Split l2update `changes` ([side, price, size]) into bid and ask levels. */
export function splitChanges(changes: JsonValue): { bids: JsonValue[]; asks: JsonValue[] } | undefined {
  if (!Array.isArray(changes)) return undefined;

  const bids: JsonValue[] = [];
  const asks: JsonValue[] = [];
  for (const change of changes) {
    if (!Array.isArray(change) || change.length < 3) return undefined;
    const [side, price, size] = change;
    if (side === 'buy') bids.push([price, size]);
    else if (side === 'sell') asks.push([price, size]);
    else return undefined;
  }
  return { bids, asks };
}

export class CoinbaseAgent extends WebSocketAgent {
  private readonly selector: SymbolSelector;
  private readonly restUrl: string;
  private products: string[] = [];

  constructor(options: CoinbaseAgentOptions) {
    super({
      name: `coinbase:${options.selector === 'all' ? 'all' : options.selector.join(',')}`,
      venue: 'coinbase',
      url: options.wsUrl,
      features: options.features,
      refreshIntervalMs: options.selector === 'all' ? options.refreshIntervalMs : 0,
      now: options.now,
    });
    this.selector = options.selector;
    this.restUrl = options.restUrl;
  }

  protected async prepare(signal: AbortSignal): Promise<void> {
    const products =
      this.selector === 'all'
        ? await discoverCoinbaseProducts(this.name, this.restUrl, signal)
        : this.selector.map((symbol) => symbol.toUpperCase());
    if (!signal.aborted) this.products = products;
  }

  protected subscriptionFrames(): JsonObject[] {
    return [{ type: 'subscribe', product_ids: this.products, channels: this.channels() }];
  }

  protected async refreshFrames(signal: AbortSignal): Promise<JsonObject[]> {
    const next = await discoverCoinbaseProducts(this.name, this.restUrl, signal);
    if (signal.aborted) return [];
    const current = new Set(this.products);
    const wanted = new Set(next);
    const removed = this.products.filter((product) => !wanted.has(product));
    const added = next.filter((product) => !current.has(product));

    if (removed.length === 0 && added.length === 0) {
      logger.debug(`[${this.name}] Product refresh: no changes`);
      return [];
    }
    logger.info(`[${this.name}] Product refresh: +${added.length} -${removed.length} (${next.length} total)`);
    this.products = next;

    const channels = this.channels();
    const frames: JsonObject[] = [];
    if (removed.length > 0) frames.push({ type: 'unsubscribe', product_ids: removed, channels });
    if (added.length > 0) frames.push({ type: 'subscribe', product_ids: added, channels });
    return frames;
  }

  private channels(): string[] {
    return CHANNEL_KINDS.filter(([, kinds]) => kinds.some((kind) => this.enabled(kind))).map(([channel]) => channel);
  }

  protected decodeFrame(frame: JsonValue, receivedAt: number): RawEvent[] {
    if (!isJsonObject(frame)) {
      throw new ProtocolError('expected a JSON object frame', this.name);
    }

    switch (frame.type) {
      case 'error': {
        const reason = typeof frame.reason === 'string' ? frame.reason : '';
        throw new ProtocolError(`${String(frame.message ?? 'error')}${reason ? `: ${reason}` : ''}`, this.name);
      }
      case 'match':
      case 'last_match':
        return this.emit(['trade'], frame, receivedAt);
      case 'ticker':
        return this.emit(['bookTicker', 'ticker24h'], frame, receivedAt);
      case 'snapshot':
        return this.emit(['l2Snapshot'], frame, receivedAt);
      case 'l2update': {
        const levels = splitChanges(frame.changes);
        if (!levels) {
          throw new ProtocolError('malformed l2update changes', this.name);
        }
        return this.emit(['l2Diff'], { ...frame, ...levels }, receivedAt);
      }
      default:
        // subscriptions, heartbeat
        return [];
    }
  }

  private emit(kinds: readonly EventKind[], payload: JsonObject, receivedAt: number): RawEvent[] {
    return kinds.filter((kind) => this.enabled(kind)).map((kind) => this.rawEvent(kind, payload, receivedAt));
  }
}
