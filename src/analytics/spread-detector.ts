/**
 * Cross-venue spread detector
 *
 * Tracks the latest trade price per (symbol, venue) and emits a SpreadEvent
 * when the relative spread (max - min) / min across venues with fresh quotes
 * exceeds the threshold. Sole owner of the price state: only onTrade writes it.
 *
 * - out-of-order and duplicate trades (ts <= stored ts) are rejected
 * - quotes received longer ago than the staleness window are left out
 * - one emission per symbol per debounce interval
 */

import { Decimal } from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import logger from '../shared/logger';
import { AsyncQueue } from '../shared/async-queue';
import { spreadEvents } from '../shared/metrics';
import { Venue } from '../shared/types';
import { DecimalString, SpreadEvent, TradeEvent } from '../canonicalizer/canonical-event';
import { CanonicalSymbol } from '../canonicalizer/symbols';

export interface SpreadDetectorOptions {
  /** Relative spread as a fraction, e.g. 0.005 for 0.5% */
  threshold: number | string;
  stalenessWindowMs: number;
  debounceMs: number;
  /** Per-subscriber buffer; the oldest spread is dropped when a subscriber lags */
  subscriberCapacity?: number;
  now?: () => number;
}

export interface VenueQuote {
  price: DecimalString;
  ts: number;
  receivedAt: number;
}

export type TradeOutcome =
  | { status: 'stale' }
  | { status: 'updated' }
  | { status: 'debounced'; spread: DecimalString }
  | { status: 'emitted'; event: SpreadEvent };

interface StoredQuote extends VenueQuote {
  value: Decimal;
}

const DEFAULT_SUBSCRIBER_CAPACITY = 1_000;

export class SpreadDetector {
  private readonly threshold: Decimal;
  private readonly stalenessWindowMs: number;
  private readonly debounceMs: number;
  private readonly subscriberCapacity: number;
  private readonly now: () => number;

  private readonly prices = new Map<CanonicalSymbol, Map<Venue, StoredQuote>>();
  private readonly lastEmittedAt = new Map<CanonicalSymbol, number>();
  private readonly subscribers = new Set<AsyncQueue<SpreadEvent>>();
  private closed = false;

  constructor(options: SpreadDetectorOptions) {
    this.threshold = new Decimal(options.threshold);
    if (!this.threshold.isFinite() || this.threshold.lte(0)) {
      throw new RangeError(`spread threshold must be positive, got ${options.threshold}`);
    }
    this.stalenessWindowMs = options.stalenessWindowMs;
    this.debounceMs = options.debounceMs;
    this.subscriberCapacity = options.subscriberCapacity ?? DEFAULT_SUBSCRIBER_CAPACITY;
    this.now = options.now ?? Date.now;
  }

  onTrade(event: TradeEvent): TradeOutcome {
    let venues = this.prices.get(event.s);
    if (!venues) {
      venues = new Map();
      this.prices.set(event.s, venues);
    }

    const stored = venues.get(event.agent);
    if (stored && stored.ts >= event.ts) {
      return { status: 'stale' };
    }
    venues.set(event.agent, {
      price: event.p,
      value: new Decimal(event.p),
      ts: event.ts,
      receivedAt: event.receivedAt,
    });

    const now = this.now();
    const fresh = [...venues.entries()].filter(([, quote]) => now - quote.receivedAt <= this.stalenessWindowMs);
    if (fresh.length < 2) {
      return { status: 'updated' };
    }

    let [low, high] = [fresh[0], fresh[0]];
    for (const entry of fresh) {
      if (entry[1].value.lt(low[1].value)) low = entry;
      if (entry[1].value.gt(high[1].value)) high = entry;
    }
    if (low[1].value.lte(0)) {
      return { status: 'updated' };
    }

    const spread = high[1].value.minus(low[1].value).div(low[1].value);
    if (!spread.gt(this.threshold)) {
      return { status: 'updated' };
    }

    const lastEmitted = this.lastEmittedAt.get(event.s);
    if (lastEmitted !== undefined && now - lastEmitted < this.debounceMs) {
      return { status: 'debounced', spread: spread.toFixed() };
    }
    this.lastEmittedAt.set(event.s, now);

    const spreadEvent: SpreadEvent = Object.freeze({
      kind: 'spread',
      id: uuidv4(),
      s: event.s,
      venues: Object.freeze(fresh.map(([venue]) => venue)),
      buyVenue: low[0],
      sellVenue: high[0],
      minPrice: low[1].price,
      maxPrice: high[1].price,
      spread: spread.toFixed(),
      ts: event.ts,
    });

    spreadEvents.inc({ symbol: event.s });
    logger.info(
      `[SpreadDetector] ${event.s} spread ${spreadEvent.spread}: buy ${low[0]} @ ${low[1].price}, sell ${high[0]} @ ${high[1].price}`
    );
    this.broadcast(spreadEvent);
    return { status: 'emitted', event: spreadEvent };
  }

  /** Latest quote per venue for a symbol. */
  snapshot(symbol: CanonicalSymbol): Partial<Record<Venue, VenueQuote>> {
    const quotes: Partial<Record<Venue, VenueQuote>> = {};
    for (const [venue, { price, ts, receivedAt }] of this.prices.get(symbol) ?? []) {
      quotes[venue] = { price, ts, receivedAt };
    }
    return quotes;
  }

  /**
   * Spread events emitted from now on. Each subscriber has its own buffer;
   * the sequence ends after close().
   */
  subscribe(): AsyncIterable<SpreadEvent> {
    const queue = new AsyncQueue<SpreadEvent>(this.subscriberCapacity);
    if (this.closed) {
      queue.close();
    } else {
      this.subscribers.add(queue);
    }
    return this.drain(queue);
  }

  close(): void {
    this.closed = true;
    for (const queue of this.subscribers) {
      queue.close();
    }
    this.subscribers.clear();
  }

  private broadcast(event: SpreadEvent): void {
    for (const queue of this.subscribers) {
      const { dropped } = queue.pushDropOldest(event);
      if (dropped) {
        logger.warn(`[SpreadDetector] Subscriber lagging; dropped spread ${dropped.id}`);
      }
    }
  }

  private async *drain(queue: AsyncQueue<SpreadEvent>): AsyncGenerator<SpreadEvent> {
    try {
      for await (const event of queue) {
        yield event;
      }
    } finally {
      this.subscribers.delete(queue);
      queue.close();
    }
  }
}
