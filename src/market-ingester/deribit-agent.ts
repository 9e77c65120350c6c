/**
 * Deribit agent
 * JSON-RPC subscriptions over one socket:
 *   ticker.<instrument>.100ms    -> mark/index price, funding, open interest
 *   markprice.options.<index>    -> options chain marks (experimental)
 */

import { ProtocolError } from '../shared/errors';
import { EventKind, FeatureToggles, JsonObject, JsonValue, RawEvent, SymbolSelector, isJsonObject } from '../shared/types';
import { WebSocketAgent } from './agent';

export interface DeribitAgentOptions {
  selector: SymbolSelector;
  wsUrl: string;
  features: FeatureToggles;
  now?: () => number;
}

export const DERIBIT_TICKER_KINDS: readonly EventKind[] = ['markPrice', 'indexPrice', 'fundingRate', 'openInterest'];
export const DERIBIT_KINDS: readonly EventKind[] = [...DERIBIT_TICKER_KINDS, 'optionsChain'];

const DEFAULT_INSTRUMENTS = ['BTC-PERPETUAL', 'ETH-PERPETUAL'];

// BTC-30JUN23-30000-C, XRP_USDC-30JUN23-0d625-P
const OPTION_INSTRUMENT = /^[A-Z0-9]+(?:_[A-Z0-9]+)?-(\d{1,2}[A-Z]{3}\d{2})-([0-9d]+)-([CP])$/;

export interface OptionContract {
  expiry: string;
  strike: string;
  option_type: 'C' | 'P';
}

export function parseOptionInstrument(name: string): OptionContract | undefined {
  const match = OPTION_INSTRUMENT.exec(name);
  if (!match) return undefined;
  return {
    expiry: match[1],
    strike: match[2].replace('d', '.'),
    option_type: match[3] === 'C' ? 'C' : 'P',
  };
}

/** `BTC-PERPETUAL` -> `btc_usd`, `ETH_USDC-PERPETUAL` -> `eth_usdc` */
export function indexName(instrument: string): string {
  const [underlying] = instrument.split('-');
  const [base, quote = 'usd'] = underlying.toLowerCase().split('_');
  return `${base}_${quote}`;
}

export class DeribitAgent extends WebSocketAgent {
  private readonly instruments: string[];

  constructor(options: DeribitAgentOptions) {
    super({
      name: `deribit:${options.selector === 'all' ? 'all' : options.selector.join(',')}`,
      venue: 'deribit',
      url: options.wsUrl,
      features: options.features,
      now: options.now,
    });
    this.instruments =
      options.selector === 'all' ? DEFAULT_INSTRUMENTS : options.selector.map((symbol) => symbol.toUpperCase());
  }

  protected subscriptionFrames(): JsonObject[] {
    const channels: string[] = [];
    if (DERIBIT_TICKER_KINDS.some((kind) => this.enabled(kind))) {
      channels.push(...this.instruments.map((instrument) => `ticker.${instrument}.100ms`));
    }
    if (this.enabled('optionsChain')) {
      const indexes = new Set(this.instruments.map(indexName));
      channels.push(...[...indexes].map((index) => `markprice.options.${index}`));
    }
    return [{ jsonrpc: '2.0', id: 1, method: 'public/subscribe', params: { channels } }];
  }

  protected decodeFrame(frame: JsonValue, receivedAt: number): RawEvent[] {
    if (!isJsonObject(frame)) {
      throw new ProtocolError('expected a JSON object frame', this.name);
    }
    if (isJsonObject(frame.error)) {
      throw new ProtocolError(`rpc error ${String(frame.error.code)}: ${String(frame.error.message)}`, this.name);
    }
    if (frame.method !== 'subscription' || !isJsonObject(frame.params)) return [];

    const { channel, data } = frame.params;
    if (typeof channel !== 'string') return [];

    if (channel.startsWith('ticker.') && isJsonObject(data)) {
      return DERIBIT_TICKER_KINDS.filter((kind) => this.enabled(kind)).map((kind) =>
        this.rawEvent(kind, data, receivedAt)
      );
    }

    if (channel.startsWith('markprice.options.') && Array.isArray(data) && this.enabled('optionsChain')) {
      const events: RawEvent[] = [];
      for (const mark of data) {
        if (!isJsonObject(mark) || typeof mark.instrument_name !== 'string') continue;
        const contract = parseOptionInstrument(mark.instrument_name);
        if (!contract) continue;
        events.push(this.rawEvent('optionsChain', { ...mark, ...contract }, receivedAt));
      }
      return events;
    }

    return [];
  }
}
