// Shared ingestion types

export const VENUES = ['binance', 'coinbase', 'deribit', 'onchain'] as const;
export type Venue = (typeof VENUES)[number];

export function isVenue(value: string): value is Venue {
  return VENUES.some((venue) => venue === value);
}

export const EVENT_KINDS = [
  'trade',
  'l2Diff',
  'l2Snapshot',
  'bookTicker',
  'ticker24h',
  'ohlcv',
  'indexPrice',
  'markPrice',
  'fundingRate',
  'openInterest',
  'onchainTransfer',
  'onchainBalance',
  'topDexPool',
  'newsHeadline',
  'telemetry',
  'optionsChain',
  'mempool',
  'bridgeFlow',
  'mevSignal',
] as const;
export type EventKind = (typeof EVENT_KINDS)[number];

/** Kinds switched on by environment toggles only. */
export const EXPERIMENTAL_KINDS: readonly EventKind[] = ['optionsChain', 'mempool', 'bridgeFlow', 'mevSignal'];

/** Best-effort kinds: dispatched drop-oldest unless a consumer says otherwise. */
export const AUXILIARY_KINDS: readonly EventKind[] = [
  'telemetry',
  'newsHeadline',
  'topDexPool',
  'mempool',
  'mevSignal',
  'bridgeFlow',
];

export type FeatureToggles = Readonly<Record<EventKind, boolean>>;

export type SymbolSelector = 'all' | readonly string[];

export interface FeedSpec {
  readonly venue: Venue;
  readonly selector: SymbolSelector;
}

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * Venue-native event as decoded from a wire frame. Produced by an agent and
 * consumed once by the canonicalizer.
 */
export interface RawEvent {
  readonly venue: Venue;
  readonly kind: EventKind;
  readonly payload: JsonObject;
  /** Receipt time, ms since epoch */
  readonly receivedAt: number;
}

export function formatFeedSpec(spec: FeedSpec): string {
  const selector = spec.selector === 'all' ? 'all' : spec.selector.join(',');
  return `${spec.venue}:${selector}`;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
