// Vendor field names per (venue, kind).
// Keys are canonical field names, values are payload paths (dotted for nested
// objects). A field without an entry is read under its canonical name.

import { EventKind, Venue } from '../shared/types';

/** Path marker: take the agent's receipt time (frames that carry no event time). */
export const RECEIPT_TIME = '@receivedAt';

export type FieldAliases = Readonly<Record<string, string>>;

export type FieldMappingTable = Readonly<Partial<Record<Venue, Partial<Record<EventKind, FieldAliases>>>>>;

const NO_ALIASES: FieldAliases = {};

export const FIELD_MAPPINGS: FieldMappingTable = {
  binance: {
    trade: { s: 's', t: 't', p: 'p', q: 'q', ts: 'T' },
    l2Diff: { s: 's', bids: 'b', asks: 'a', ts: 'E' },
    l2Snapshot: { s: 's', bids: 'bids', asks: 'asks', ts: RECEIPT_TIME },
    // spot bookTicker frames have no event time
    bookTicker: { s: 's', bp: 'b', bq: 'B', ap: 'a', aq: 'A', ts: RECEIPT_TIME },
    ticker24h: { s: 's', o: 'o', h: 'h', l: 'l', c: 'c', v: 'v', ts: 'E' },
    ohlcv: { s: 's', i: 'k.i', o: 'k.o', h: 'k.h', l: 'k.l', c: 'k.c', v: 'k.v', ts: 'k.t' },
    markPrice: { s: 's', p: 'p', ts: 'E' },
    indexPrice: { s: 's', p: 'i', ts: 'E' },
    fundingRate: { s: 's', r: 'r', ts: 'E' },
  },
  coinbase: {
    trade: { s: 'product_id', t: 'trade_id', p: 'price', q: 'size', ts: 'time' },
    bookTicker: {
      s: 'product_id',
      bp: 'best_bid',
      bq: 'best_bid_size',
      ap: 'best_ask',
      aq: 'best_ask_size',
      ts: 'time',
    },
    ticker24h: {
      s: 'product_id',
      o: 'open_24h',
      h: 'high_24h',
      l: 'low_24h',
      c: 'price',
      v: 'volume_24h',
      ts: 'time',
    },
    l2Snapshot: { s: 'product_id', ts: RECEIPT_TIME },
    l2Diff: { s: 'product_id', ts: 'time' },
  },
  deribit: {
    markPrice: { s: 'instrument_name', p: 'mark_price', ts: 'timestamp' },
    indexPrice: { s: 'instrument_name', p: 'index_price', ts: 'timestamp' },
    fundingRate: { s: 'instrument_name', r: 'funding_8h', ts: 'timestamp' },
    openInterest: { s: 'instrument_name', oi: 'open_interest', ts: 'timestamp' },
    optionsChain: { s: 'instrument_name', p: 'mark_price', ts: 'timestamp' },
  },
  onchain: {
    onchainTransfer: { hash: 'transactionHash', ts: RECEIPT_TIME },
    mempool: { ts: RECEIPT_TIME },
  },
};

export function fieldAliases(venue: Venue, kind: EventKind, table: FieldMappingTable = FIELD_MAPPINGS): FieldAliases {
  return table[venue]?.[kind] ?? NO_ALIASES;
}
