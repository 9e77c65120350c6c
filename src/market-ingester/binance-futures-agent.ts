/**
 * Binance futures mark-price agent
 * One markPriceUpdate frame carries mark price, index price and funding rate,
 * so each frame fans out to one raw event per enabled kind.
 */

import { ProtocolError } from '../shared/errors';
import { EventKind, FeatureToggles, JsonObject, JsonValue, RawEvent, SymbolSelector, isJsonObject } from '../shared/types';
import { WebSocketAgent } from './agent';
import { checkControlFrame } from './binance-agent';

export interface BinanceFuturesAgentOptions {
  selector: SymbolSelector;
  wsUrl: string;
  features: FeatureToggles;
  now?: () => number;
}

export const BINANCE_FUTURES_KINDS: readonly EventKind[] = ['markPrice', 'indexPrice', 'fundingRate'];

// All-market stream: data is an array of markPriceUpdate objects
const ALL_MARKETS_STREAM = '!markPrice@arr@1s';

export class BinanceFuturesAgent extends WebSocketAgent {
  private readonly selector: SymbolSelector;

  constructor(options: BinanceFuturesAgentOptions) {
    super({
      name: `binance-futures:${options.selector === 'all' ? 'all' : options.selector.join(',')}`,
      venue: 'binance',
      url: options.wsUrl,
      features: options.features,
      now: options.now,
    });
    this.selector = options.selector;
  }

  protected subscriptionFrames(): JsonObject[] {
    const params =
      this.selector === 'all'
        ? [ALL_MARKETS_STREAM]
        : this.selector.map((symbol) => `${symbol.toLowerCase()}@markPrice@1s`);
    return [{ method: 'SUBSCRIBE', params, id: 1 }];
  }

  protected decodeFrame(frame: JsonValue, receivedAt: number): RawEvent[] {
    if (!isJsonObject(frame)) {
      throw new ProtocolError('expected a JSON object frame', this.name);
    }
    if (checkControlFrame(this.name, frame)) return [];

    const updates = Array.isArray(frame.data) ? frame.data : [frame.data];
    const events: RawEvent[] = [];
    for (const update of updates) {
      if (!isJsonObject(update) || update.e !== 'markPriceUpdate') continue;
      for (const kind of BINANCE_FUTURES_KINDS) {
        if (this.enabled(kind)) events.push(this.rawEvent(kind, update, receivedAt));
      }
    }
    return events;
  }
}
