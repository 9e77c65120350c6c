/**
 * Canonicalizer
 *
 * Pure transform from a venue RawEvent to a CanonicalEvent:
 * - feature gate first (disabled kinds are rejected, never passed through)
 * - symbol next, through the venue quote tables
 * - then the kind's required fields, located via the field mapping table
 *
 * A failure drops exactly that event. Nothing here keeps state between calls.
 */

import { Decimal } from 'decimal.js';
import { NormalizationError } from '../shared/errors';
import { EventKind, FeatureToggles, JsonObject, JsonValue, RawEvent, Venue, isJsonObject } from '../shared/types';
import { CanonicalEvent, DecimalString, EventOf, PriceLevel } from './canonical-event';
import { FieldAliases, FieldMappingTable, FIELD_MAPPINGS, RECEIPT_TIME, fieldAliases } from './field-mappings';
import { CanonicalSymbol, QuoteTables, buildQuoteTables, normalizeSymbol } from './symbols';

export type NormalizationResult = { ok: true; event: CanonicalEvent } | { ok: false; error: NormalizationError };

export type ValidationVerdict = { valid: true } | { valid: false; reason: string };

/** Post-normalization check. A rejected event goes to the dead-letter path. */
export type EventValidator = (event: CanonicalEvent) => ValidationVerdict;

export interface CanonicalizerOptions {
  features: FeatureToggles;
  quotes?: QuoteTables;
  mappings?: FieldMappingTable;
  validator?: EventValidator;
}

const DECIMAL_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INTEGER_LITERAL = /^\d+$/;

/** Reads canonical fields out of a vendor payload. */
export class FieldReader {
  constructor(
    private readonly venue: Venue,
    private readonly payload: JsonObject,
    private readonly aliases: FieldAliases,
    private readonly receivedAt: number,
    private readonly quotes: QuoteTables
  ) {}

  symbol(): CanonicalSymbol {
    const raw = this.require('s');
    if (typeof raw !== 'string') throw NormalizationError.invalidField('s', raw);
    return normalizeSymbol(this.venue, raw, this.quotes);
  }

  optionalSymbol(): CanonicalSymbol | undefined {
    return this.lookup('s') === undefined ? undefined : this.symbol();
  }

  decimal(field: string): DecimalString {
    return toDecimal(field, this.require(field));
  }

  optionalDecimal(field: string): DecimalString | undefined {
    const value = this.lookup(field);
    return value === undefined ? undefined : toDecimal(field, value);
  }

  /** Identifier that venues send either as a number or a string. */
  id(field: string): string {
    const value = this.require(field);
    if (typeof value === 'number' && Number.isSafeInteger(value)) return String(value);
    if (typeof value === 'string' && value.trim() !== '') return value.trim();
    throw NormalizationError.invalidField(field, value);
  }

  text(field: string): string {
    const value = this.require(field);
    if (typeof value !== 'string' || value.trim() === '') throw NormalizationError.invalidField(field, value);
    return value.trim();
  }

  /** Milliseconds since epoch, from an integer or an ISO-8601 string. */
  timestamp(field: string): number {
    const value = this.require(field);
    if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) return value;
    if (typeof value === 'string') {
      const trimmed = value.trim();
      const parsed = INTEGER_LITERAL.test(trimmed) ? Number(trimmed) : Date.parse(trimmed);
      if (Number.isSafeInteger(parsed) && parsed >= 0) return parsed;
    }
    throw NormalizationError.invalidField(field, value);
  }

  levels(field: string): readonly PriceLevel[] {
    const value = this.require(field);
    if (!Array.isArray(value)) throw NormalizationError.invalidField(field, value);

    return Object.freeze(
      value.map((level): PriceLevel => {
        if (!Array.isArray(level) || level.length < 2) throw NormalizationError.invalidField(field, level);
        return Object.freeze([toDecimal(field, level[0]), toDecimal(field, level[1])] as const);
      })
    );
  }

  private require(field: string): JsonValue {
    const value = this.lookup(field);
    if (value === undefined) throw NormalizationError.missingField(field);
    return value;
  }

  private lookup(field: string): JsonValue | undefined {
    const path = this.aliases[field] ?? field;
    if (path === RECEIPT_TIME) return this.receivedAt;

    let node: JsonValue | undefined = this.payload;
    for (const key of path.split('.')) {
      if (!isJsonObject(node)) return undefined;
      node = node[key];
    }
    return node === null ? undefined : node;
  }
}

/**
 * Decimal strings are kept as sent, after trimming. A JSON number reaches us
 * already parsed to a double, so digits past about 17 significant figures are
 * gone before this runs; its shortest round-trip form is rendered without an
 * exponent. Venues that quote prices as strings keep full precision.
 */
function toDecimal(field: string, value: JsonValue): DecimalString {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (DECIMAL_LITERAL.test(trimmed)) return trimmed;
  } else if (typeof value === 'number' && Number.isFinite(value)) {
    return new Decimal(value).toFixed();
  }
  throw NormalizationError.invalidField(field, value);
}

function parseOptionType(field: string, value: string): 'call' | 'put' {
  const lowered = value.toLowerCase();
  if (lowered === 'c' || lowered === 'call') return 'call';
  if (lowered === 'p' || lowered === 'put') return 'put';
  throw NormalizationError.invalidField(field, value);
}

interface BuildContext {
  readonly agent: Venue;
  readonly receivedAt: number;
}

type Builder<K extends EventKind> = (read: FieldReader, ctx: BuildContext) => EventOf<K>;

const BUILDERS: { readonly [K in EventKind]: Builder<K> } = {
  trade: (read, ctx) => ({
    kind: 'trade',
    ...ctx,
    s: read.symbol(),
    t: read.id('t'),
    p: read.decimal('p'),
    q: read.decimal('q'),
    ts: read.timestamp('ts'),
  }),
  l2Diff: (read, ctx) => ({
    kind: 'l2Diff',
    ...ctx,
    s: read.symbol(),
    bids: read.levels('bids'),
    asks: read.levels('asks'),
    ts: read.timestamp('ts'),
  }),
  l2Snapshot: (read, ctx) => ({
    kind: 'l2Snapshot',
    ...ctx,
    s: read.symbol(),
    bids: read.levels('bids'),
    asks: read.levels('asks'),
    ts: read.timestamp('ts'),
  }),
  bookTicker: (read, ctx) => ({
    kind: 'bookTicker',
    ...ctx,
    s: read.symbol(),
    bp: read.decimal('bp'),
    bq: read.decimal('bq'),
    ap: read.decimal('ap'),
    aq: read.decimal('aq'),
    ts: read.timestamp('ts'),
  }),
  ticker24h: (read, ctx) => ({
    kind: 'ticker24h',
    ...ctx,
    s: read.symbol(),
    o: read.decimal('o'),
    h: read.decimal('h'),
    l: read.decimal('l'),
    c: read.decimal('c'),
    v: read.decimal('v'),
    ts: read.timestamp('ts'),
  }),
  ohlcv: (read, ctx) => ({
    kind: 'ohlcv',
    ...ctx,
    s: read.symbol(),
    i: read.text('i'),
    o: read.decimal('o'),
    h: read.decimal('h'),
    l: read.decimal('l'),
    c: read.decimal('c'),
    v: read.decimal('v'),
    ts: read.timestamp('ts'),
  }),
  indexPrice: (read, ctx) => ({
    kind: 'indexPrice',
    ...ctx,
    s: read.symbol(),
    p: read.decimal('p'),
    ts: read.timestamp('ts'),
  }),
  markPrice: (read, ctx) => ({
    kind: 'markPrice',
    ...ctx,
    s: read.symbol(),
    p: read.decimal('p'),
    ts: read.timestamp('ts'),
  }),
  fundingRate: (read, ctx) => ({
    kind: 'fundingRate',
    ...ctx,
    s: read.symbol(),
    r: read.decimal('r'),
    ts: read.timestamp('ts'),
  }),
  openInterest: (read, ctx) => ({
    kind: 'openInterest',
    ...ctx,
    s: read.symbol(),
    oi: read.decimal('oi'),
    ts: read.timestamp('ts'),
  }),
  onchainTransfer: (read, ctx) => ({
    kind: 'onchainTransfer',
    ...ctx,
    s: read.symbol(),
    hash: read.text('hash'),
    from: read.text('from'),
    to: read.text('to'),
    amount: read.decimal('amount'),
    ts: read.timestamp('ts'),
  }),
  onchainBalance: (read, ctx) => ({
    kind: 'onchainBalance',
    ...ctx,
    s: read.symbol(),
    address: read.text('address'),
    balance: read.decimal('balance'),
    ts: read.timestamp('ts'),
  }),
  topDexPool: (read, ctx) => ({
    kind: 'topDexPool',
    ...ctx,
    s: read.symbol(),
    pool: read.text('pool'),
    liquidity: read.decimal('liquidity'),
    volume: read.decimal('volume'),
    ts: read.timestamp('ts'),
  }),
  newsHeadline: (read, ctx) => ({
    kind: 'newsHeadline',
    ...ctx,
    s: read.optionalSymbol(),
    headline: read.text('headline'),
    source: read.text('source'),
    ts: read.timestamp('ts'),
  }),
  telemetry: (read, ctx) => ({
    kind: 'telemetry',
    ...ctx,
    s: read.optionalSymbol(),
    metric: read.text('metric'),
    value: read.decimal('value'),
    ts: read.timestamp('ts'),
  }),
  optionsChain: (read, ctx) => ({
    kind: 'optionsChain',
    ...ctx,
    s: read.symbol(),
    strike: read.decimal('strike'),
    expiry: read.text('expiry'),
    option_type: parseOptionType('option_type', read.text('option_type')),
    p: read.decimal('p'),
    iv: read.optionalDecimal('iv'),
    ts: read.timestamp('ts'),
  }),
  mempool: (read, ctx) => ({
    kind: 'mempool',
    ...ctx,
    s: read.symbol(),
    hash: read.text('hash'),
    value: read.optionalDecimal('value'),
    ts: read.timestamp('ts'),
  }),
  bridgeFlow: (read, ctx) => ({
    kind: 'bridgeFlow',
    ...ctx,
    s: read.symbol(),
    amount: read.decimal('amount'),
    from_chain: read.text('from_chain'),
    to_chain: read.text('to_chain'),
    ts: read.timestamp('ts'),
  }),
  mevSignal: (read, ctx) => ({
    kind: 'mevSignal',
    ...ctx,
    s: read.symbol(),
    strategy: read.text('strategy'),
    profit: read.decimal('profit'),
    ts: read.timestamp('ts'),
  }),
};

/** Drop keys whose value is undefined so optional fields stay off the wire and out of equality checks. */
function compact<T extends object>(event: T): T {
  for (const [key, value] of Object.entries(event)) {
    if (value === undefined) Reflect.deleteProperty(event, key);
  }
  return event;
}

export class Canonicalizer {
  private readonly features: FeatureToggles;
  private readonly quotes: QuoteTables;
  private readonly mappings: FieldMappingTable;
  private readonly validator?: EventValidator;

  constructor(options: CanonicalizerOptions) {
    this.features = options.features;
    this.quotes = options.quotes ?? buildQuoteTables();
    this.mappings = options.mappings ?? FIELD_MAPPINGS;
    this.validator = options.validator;
  }

  canonicalize(raw: RawEvent): NormalizationResult {
    if (!this.features[raw.kind]) {
      return { ok: false, error: NormalizationError.featureDisabled(raw.kind) };
    }

    const reader = new FieldReader(
      raw.venue,
      raw.payload,
      fieldAliases(raw.venue, raw.kind, this.mappings),
      raw.receivedAt,
      this.quotes
    );

    try {
      const event: CanonicalEvent = BUILDERS[raw.kind](reader, { agent: raw.venue, receivedAt: raw.receivedAt });
      return { ok: true, event: Object.freeze(compact(event)) };
    } catch (error) {
      if (error instanceof NormalizationError) return { ok: false, error };
      throw error;
    }
  }

  /** Run the attached validator. Without one every event is accepted. */
  validate(event: CanonicalEvent): ValidationVerdict {
    return this.validator ? this.validator(event) : { valid: true };
  }
}
