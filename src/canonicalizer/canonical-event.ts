// Canonical event schema and its JSON-lines wire encoding

import { EventKind, Venue } from '../shared/types';
import { CanonicalSymbol } from './symbols';

/** Exact decimal kept as the source wrote it, e.g. "27123.45000000" */
export type DecimalString = string;

/** [price, quantity] */
export type PriceLevel = readonly [DecimalString, DecimalString];

interface Envelope {
  readonly agent: Venue;
  /** Event time at the venue, ms since epoch */
  readonly ts: number;
  /** Receipt time at the agent, ms since epoch. Not part of the wire format. */
  readonly receivedAt: number;
}

interface SymbolEnvelope extends Envelope {
  readonly s: CanonicalSymbol;
}

export interface TradeEvent extends SymbolEnvelope {
  readonly kind: 'trade';
  readonly t: string;
  readonly p: DecimalString;
  readonly q: DecimalString;
}

export interface L2DiffEvent extends SymbolEnvelope {
  readonly kind: 'l2Diff';
  readonly bids: readonly PriceLevel[];
  readonly asks: readonly PriceLevel[];
}

export interface L2SnapshotEvent extends SymbolEnvelope {
  readonly kind: 'l2Snapshot';
  readonly bids: readonly PriceLevel[];
  readonly asks: readonly PriceLevel[];
}

export interface BookTickerEvent extends SymbolEnvelope {
  readonly kind: 'bookTicker';
  readonly bp: DecimalString;
  readonly bq: DecimalString;
  readonly ap: DecimalString;
  readonly aq: DecimalString;
}

export interface Ticker24hEvent extends SymbolEnvelope {
  readonly kind: 'ticker24h';
  readonly o: DecimalString;
  readonly h: DecimalString;
  readonly l: DecimalString;
  readonly c: DecimalString;
  readonly v: DecimalString;
}

export interface OhlcvEvent extends SymbolEnvelope {
  readonly kind: 'ohlcv';
  /** Candle interval as the venue names it, e.g. "1m" */
  readonly i: string;
  readonly o: DecimalString;
  readonly h: DecimalString;
  readonly l: DecimalString;
  readonly c: DecimalString;
  readonly v: DecimalString;
}

export interface IndexPriceEvent extends SymbolEnvelope {
  readonly kind: 'indexPrice';
  readonly p: DecimalString;
}

export interface MarkPriceEvent extends SymbolEnvelope {
  readonly kind: 'markPrice';
  readonly p: DecimalString;
}

export interface FundingRateEvent extends SymbolEnvelope {
  readonly kind: 'fundingRate';
  readonly r: DecimalString;
}

export interface OpenInterestEvent extends SymbolEnvelope {
  readonly kind: 'openInterest';
  readonly oi: DecimalString;
}

export interface OnchainTransferEvent extends SymbolEnvelope {
  readonly kind: 'onchainTransfer';
  readonly hash: string;
  readonly from: string;
  readonly to: string;
  readonly amount: DecimalString;
}

export interface OnchainBalanceEvent extends SymbolEnvelope {
  readonly kind: 'onchainBalance';
  readonly address: string;
  readonly balance: DecimalString;
}

export interface TopDexPoolEvent extends SymbolEnvelope {
  readonly kind: 'topDexPool';
  readonly pool: string;
  readonly liquidity: DecimalString;
  readonly volume: DecimalString;
}

export interface NewsHeadlineEvent extends Envelope {
  readonly kind: 'newsHeadline';
  readonly s?: CanonicalSymbol;
  readonly headline: string;
  readonly source: string;
}

export interface TelemetryEvent extends Envelope {
  readonly kind: 'telemetry';
  readonly s?: CanonicalSymbol;
  readonly metric: string;
  readonly value: DecimalString;
}

export interface OptionsChainEvent extends SymbolEnvelope {
  readonly kind: 'optionsChain';
  readonly strike: DecimalString;
  /** Expiry date code as listed, e.g. "30JUN23" */
  readonly expiry: string;
  readonly option_type: 'call' | 'put';
  readonly p: DecimalString;
  readonly iv?: DecimalString;
}

export interface MempoolEvent extends SymbolEnvelope {
  readonly kind: 'mempool';
  readonly hash: string;
  readonly value?: DecimalString;
}

export interface BridgeFlowEvent extends SymbolEnvelope {
  readonly kind: 'bridgeFlow';
  readonly amount: DecimalString;
  readonly from_chain: string;
  readonly to_chain: string;
}

export interface MevSignalEvent extends SymbolEnvelope {
  readonly kind: 'mevSignal';
  readonly strategy: string;
  readonly profit: DecimalString;
}

export type CanonicalEvent =
  | TradeEvent
  | L2DiffEvent
  | L2SnapshotEvent
  | BookTickerEvent
  | Ticker24hEvent
  | OhlcvEvent
  | IndexPriceEvent
  | MarkPriceEvent
  | FundingRateEvent
  | OpenInterestEvent
  | OnchainTransferEvent
  | OnchainBalanceEvent
  | TopDexPoolEvent
  | NewsHeadlineEvent
  | TelemetryEvent
  | OptionsChainEvent
  | MempoolEvent
  | BridgeFlowEvent
  | MevSignalEvent;

export type EventOf<K extends EventKind> = Extract<CanonicalEvent, { kind: K }>;

/** Cross-venue price discrepancy emitted by the spread detector */
export interface SpreadEvent {
  readonly kind: 'spread';
  readonly id: string;
  readonly s: CanonicalSymbol;
  readonly venues: readonly Venue[];
  /** Venue quoting the lowest price */
  readonly buyVenue: Venue;
  /** Venue quoting the highest price */
  readonly sellVenue: Venue;
  readonly minPrice: DecimalString;
  readonly maxPrice: DecimalString;
  /** (max - min) / min */
  readonly spread: DecimalString;
  readonly ts: number;
}

export type DispatchRecord = CanonicalEvent | SpreadEvent;

/** `type` tag of each kind on the wire */
export const WIRE_TYPE: { readonly [K in EventKind]: string } = {
  trade: 'trade',
  l2Diff: 'l2_diff',
  l2Snapshot: 'l2_snapshot',
  bookTicker: 'book_ticker',
  ticker24h: 'ticker_24h',
  ohlcv: 'ohlcv',
  indexPrice: 'index_price',
  markPrice: 'mark_price',
  fundingRate: 'funding_rate',
  openInterest: 'open_interest',
  onchainTransfer: 'onchain_transfer',
  onchainBalance: 'onchain_balance',
  topDexPool: 'top_dex_pool',
  newsHeadline: 'news_headline',
  telemetry: 'telemetry',
  optionsChain: 'options_chain',
  mempool: 'mempool',
  bridgeFlow: 'bridge_flow',
  mevSignal: 'mev_signal',
};

export function isSpreadEvent(record: DispatchRecord): record is SpreadEvent {
  return record.kind === 'spread';
}

/** One JSON line: agent, type, s, kind fields, ts. Receipt time stays in-process. */
export function encodeEvent(event: CanonicalEvent): string {
  const { kind, agent, s, ts, receivedAt: _receivedAt, ...fields } = event;
  return JSON.stringify({ agent, type: WIRE_TYPE[kind], s, ...fields, ts });
}

export function encodeSpread(event: SpreadEvent): string {
  return JSON.stringify({
    agent: 'analytics',
    type: 'spread',
    id: event.id,
    s: event.s,
    venues: event.venues,
    buy_venue: event.buyVenue,
    sell_venue: event.sellVenue,
    min_price: event.minPrice,
    max_price: event.maxPrice,
    spread: event.spread,
    ts: event.ts,
  });
}

export function encodeRecord(record: DispatchRecord): string {
  return isSpreadEvent(record) ? encodeSpread(record) : encodeEvent(record);
}
