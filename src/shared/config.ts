import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import {
  EVENT_KINDS,
  EXPERIMENTAL_KINDS,
  EventKind,
  FeatureToggles,
  FeedSpec,
  formatFeedSpec,
  isVenue,
} from './types';

export interface VenueEndpoints {
  binanceWsUrl: string;
  binanceFuturesWsUrl: string;
  binanceRestUrl: string;
  coinbaseWsUrl: string;
  coinbaseRestUrl: string;
  deribitWsUrl: string;
  onchainWsUrl: string;
}

export interface SupervisorSettings {
  initialBackoffMs: number;
  maxBackoffMs: number;
  stabilityWindowMs: number;
  maxConsecutiveFailures: number;
  connectTimeoutMs: number;
  staleFeedTimeoutMs: number;
}

export interface DispatcherSettings {
  queueCapacity: number;
  blockTimeoutMs: number;
  /** How long stop() waits for each consumer to drain, and then to close */
  drainTimeoutMs: number;
}

export interface AnalyticsSettings {
  enabled: boolean;
  /** Relative spread, as a fraction (0.005 = 0.5%) */
  spreadThreshold: number;
  stalenessWindowMs: number;
  debounceMs: number;
}

export interface SinkSettings {
  stdout: boolean;
  filePath?: string;
  redis?: { url: string; channel: string };
}

export interface IngestorConfig {
  feeds: readonly FeedSpec[];
  features: FeatureToggles;
  venues: VenueEndpoints;
  supervisor: SupervisorSettings;
  dispatcher: DispatcherSettings;
  analytics: AnalyticsSettings;
  sinks: SinkSettings;
  ingestQueueCapacity: number;
  /** How often `all` selectors are re-resolved against the venue; 0 disables */
  symbolRefreshIntervalMs: number;
  /** Replacement Binance quote-asset table; discovered at startup when absent */
  binanceQuotes?: readonly string[];
  logLevel: string;
}

/** Options collected from the command line. Anything unset falls back to file, env, then defaults. */
export interface ConfigInput {
  feeds: string[];
  kinds?: Partial<Record<EventKind, boolean>>;
  spreadThreshold?: string;
  stalenessMs?: string;
  debounceMs?: string;
  analytics?: boolean;
  stdout?: boolean;
  outputFile?: string;
  redisUrl?: string;
  redisChannel?: string;
  configFile?: string;
  logLevel?: string;
}

export const DEFAULT_VENUES: VenueEndpoints = {
  binanceWsUrl: 'wss://stream.binance.us:9443/stream',
  binanceFuturesWsUrl: 'wss://fstream.binance.com/stream',
  binanceRestUrl: 'https://api.binance.us',
  coinbaseWsUrl: 'wss://ws-feed.exchange.coinbase.com',
  coinbaseRestUrl: 'https://api.exchange.coinbase.com',
  deribitWsUrl: 'wss://www.deribit.com/ws/api/v2',
  onchainWsUrl: 'ws://localhost:8546',
};

export const DEFAULT_SUPERVISOR: SupervisorSettings = {
  initialBackoffMs: 1_000,
  maxBackoffMs: 60_000,
  stabilityWindowMs: 30_000,
  maxConsecutiveFailures: 10,
  connectTimeoutMs: 10_000,
  staleFeedTimeoutMs: 30_000,
};

export const DEFAULT_DISPATCHER: DispatcherSettings = {
  queueCapacity: 1_024,
  blockTimeoutMs: 2_000,
  drainTimeoutMs: 5_000,
};

export const DEFAULT_SYMBOL_REFRESH_INTERVAL_MS = 60 * 60 * 1_000;

export const DEFAULT_ANALYTICS: AnalyticsSettings = {
  enabled: true,
  spreadThreshold: 0.005,
  stalenessWindowMs: 10_000,
  debounceMs: 30_000,
};

// Trades on, everything else opt-in
export const DEFAULT_FEATURES: FeatureToggles = {
  trade: true,
  l2Diff: false,
  l2Snapshot: false,
  bookTicker: false,
  ticker24h: false,
  ohlcv: false,
  indexPrice: false,
  markPrice: false,
  fundingRate: false,
  openInterest: false,
  onchainTransfer: false,
  onchainBalance: false,
  topDexPool: false,
  newsHeadline: false,
  telemetry: false,
  optionsChain: false,
  mempool: false,
  bridgeFlow: false,
  mevSignal: false,
};

const DEFAULT_REDIS_CHANNEL = 'market:canonical';

const EXPERIMENTAL_ENV: Record<string, EventKind> = {
  ENABLE_OPTIONS_CHAIN: 'optionsChain',
  ENABLE_MEMPOOL: 'mempool',
  ENABLE_BRIDGE_FLOWS: 'bridgeFlow',
  ENABLE_MEV_SIGNALS: 'mevSignal',
};

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

const FileSchema = z
  .object({
    venues: z.record(z.string()).optional(),
    supervisor: z
      .object({
        initialBackoffMs: positiveInt,
        maxBackoffMs: positiveInt,
        stabilityWindowMs: nonNegativeInt,
        maxConsecutiveFailures: positiveInt,
        connectTimeoutMs: positiveInt,
        staleFeedTimeoutMs: positiveInt,
      })
      .partial()
      .optional(),
    dispatcher: z
      .object({
        queueCapacity: positiveInt,
        blockTimeoutMs: nonNegativeInt,
        drainTimeoutMs: positiveInt,
      })
      .partial()
      .optional(),
    analytics: z
      .object({
        enabled: z.boolean(),
        spreadThreshold: z.union([z.string(), z.number()]),
        stalenessWindowMs: positiveInt,
        debounceMs: nonNegativeInt,
      })
      .partial()
      .optional(),
    ingestQueueCapacity: positiveInt.optional(),
    symbolRefreshIntervalMs: nonNegativeInt.optional(),
  })
  .strict();

type FileConfig = z.infer<typeof FileSchema>;

export function isTruthy(value: string | undefined): boolean {
  return ['1', 'true', 'yes', 'on'].includes((value || '').trim().toLowerCase());
}

/**
 * Parse `venue:symbolOrAll`. A bare venue, or the selector `all`, subscribes to
 * every symbol the venue lists; otherwise the selector is a comma-separated list.
 */
export function parseFeedSpec(raw: string): FeedSpec {
  const trimmed = raw.trim();
  const separator = trimmed.indexOf(':');
  const venue = (separator === -1 ? trimmed : trimmed.slice(0, separator)).toLowerCase();
  const rest = separator === -1 ? '' : trimmed.slice(separator + 1).trim();

  if (!isVenue(venue)) {
    throw new ConfigurationError(`unknown venue in feed spec "${raw}"`);
  }

  if (rest === '' || rest.toLowerCase() === 'all') {
    return { venue, selector: 'all' };
  }

  const symbols = rest
    .split(',')
    .map((symbol) => symbol.trim())
    .filter(Boolean);
  if (symbols.length === 0) {
    throw new ConfigurationError(`no symbols in feed spec "${raw}"`);
  }
  return { venue, selector: symbols };
}

/**
 * Parse a spread threshold. A trailing `%` marks a percentage (`0.5%`);
 * a bare number is a fraction (`0.005`).
 */
export function parseSpreadThreshold(raw: string | number): number {
  const text = String(raw).trim();
  const isPercent = text.endsWith('%');
  const numeric = Number(isPercent ? text.slice(0, -1).trim() : text);

  if (text === '' || text === '%' || !Number.isFinite(numeric) || numeric <= 0) {
    throw new ConfigurationError(`invalid spread threshold "${raw}": expected a positive fraction or percentage`);
  }
  return isPercent ? numeric / 100 : numeric;
}

function parseDuration(name: string, raw: string | number | undefined, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`invalid ${name} "${raw}": expected a non-negative integer of milliseconds`);
  }
  return value;
}

function parseQuoteList(raw: string | undefined): string[] | undefined {
  if (!raw) return undefined;
  const quotes = raw
    .split(',')
    .map((quote) => quote.trim().toUpperCase())
    .filter(Boolean);
  return quotes.length > 0 ? quotes : undefined;
}

function readConfigFile(configFile: string | undefined): FileConfig {
  if (!configFile) return {};

  const resolved = path.resolve(configFile);
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(resolved, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`cannot read config file ${resolved}`, { cause: error });
  }

  const result = FileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new ConfigurationError(`invalid config file ${resolved}: ${issues.join('; ')}`);
  }
  return result.data;
}

function resolveFeatures(input: ConfigInput, env: NodeJS.ProcessEnv): FeatureToggles {
  const features: Record<EventKind, boolean> = { ...DEFAULT_FEATURES };

  for (const kind of EVENT_KINDS) {
    const enabled = input.kinds?.[kind];
    if (enabled !== undefined && !EXPERIMENTAL_KINDS.includes(kind)) {
      features[kind] = enabled;
    }
  }

  for (const [variable, kind] of Object.entries(EXPERIMENTAL_ENV)) {
    features[kind] = isTruthy(env[variable]);
  }

  return features;
}

function resolveVenues(file: FileConfig, env: NodeJS.ProcessEnv): VenueEndpoints {
  const fromFile = file.venues ?? {};
  const pick = (key: keyof VenueEndpoints, envName: string): string =>
    env[envName] || fromFile[key] || DEFAULT_VENUES[key];

  return {
    binanceWsUrl: pick('binanceWsUrl', 'BINANCE_WS_URL'),
    binanceFuturesWsUrl: pick('binanceFuturesWsUrl', 'BINANCE_FUTURES_WS_URL'),
    binanceRestUrl: pick('binanceRestUrl', 'BINANCE_REST_URL'),
    coinbaseWsUrl: pick('coinbaseWsUrl', 'COINBASE_WS_URL'),
    coinbaseRestUrl: pick('coinbaseRestUrl', 'COINBASE_REST_URL'),
    deribitWsUrl: pick('deribitWsUrl', 'DERIBIT_WS_URL'),
    onchainWsUrl: pick('onchainWsUrl', 'ONCHAIN_WS_URL'),
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Resolve the immutable ingestor configuration.
 * Precedence: command line > environment > config file > defaults.
 */
export function loadConfig(input: ConfigInput, env: NodeJS.ProcessEnv = process.env): IngestorConfig {
  if (input.feeds.length === 0) {
    throw new ConfigurationError('no feeds configured: pass at least one venue:symbolOrAll');
  }

  const feeds = input.feeds.map(parseFeedSpec);
  const seen = new Set<string>();
  for (const feed of feeds) {
    const key = formatFeedSpec(feed);
    if (seen.has(key)) {
      throw new ConfigurationError(`duplicate feed spec ${key}`);
    }
    seen.add(key);
  }

  const file = readConfigFile(input.configFile);
  const features = resolveFeatures(input, env);
  if (!EVENT_KINDS.some((kind) => features[kind])) {
    throw new ConfigurationError('every event kind is disabled');
  }

  const thresholdSource = input.spreadThreshold ?? env.SPREAD_THRESHOLD ?? file.analytics?.spreadThreshold;
  const analytics: AnalyticsSettings = {
    enabled: input.analytics ?? file.analytics?.enabled ?? DEFAULT_ANALYTICS.enabled,
    spreadThreshold:
      thresholdSource === undefined ? DEFAULT_ANALYTICS.spreadThreshold : parseSpreadThreshold(thresholdSource),
    stalenessWindowMs: parseDuration(
      'staleness window',
      input.stalenessMs ?? env.SPREAD_STALENESS_MS ?? file.analytics?.stalenessWindowMs,
      DEFAULT_ANALYTICS.stalenessWindowMs
    ),
    debounceMs: parseDuration(
      'debounce interval',
      input.debounceMs ?? env.SPREAD_DEBOUNCE_MS ?? file.analytics?.debounceMs,
      DEFAULT_ANALYTICS.debounceMs
    ),
  };
  if (analytics.stalenessWindowMs === 0) {
    throw new ConfigurationError('staleness window must be greater than zero');
  }

  const supervisor: SupervisorSettings = { ...DEFAULT_SUPERVISOR, ...file.supervisor };
  if (supervisor.maxBackoffMs < supervisor.initialBackoffMs) {
    throw new ConfigurationError('maxBackoffMs must not be below initialBackoffMs');
  }

  const redisUrl = input.redisUrl ?? env.REDIS_URL;
  const sinks: SinkSettings = {
    stdout: input.stdout ?? true,
    filePath: input.outputFile ?? env.OUTPUT_FILE ?? undefined,
    redis: redisUrl
      ? { url: redisUrl, channel: input.redisChannel ?? env.REDIS_CHANNEL ?? DEFAULT_REDIS_CHANNEL }
      : undefined,
  };
  if (!sinks.stdout && !sinks.filePath && !sinks.redis) {
    throw new ConfigurationError('no output sink configured');
  }

  return deepFreeze({
    feeds,
    features,
    venues: resolveVenues(file, env),
    supervisor,
    dispatcher: { ...DEFAULT_DISPATCHER, ...file.dispatcher },
    analytics,
    sinks,
    ingestQueueCapacity: file.ingestQueueCapacity ?? 4_096,
    symbolRefreshIntervalMs: parseDuration(
      'symbol refresh interval',
      env.SYMBOL_REFRESH_INTERVAL_MS ?? file.symbolRefreshIntervalMs,
      DEFAULT_SYMBOL_REFRESH_INTERVAL_MS
    ),
    binanceQuotes: parseQuoteList(env.BINANCE_QUOTES),
    logLevel: input.logLevel ?? env.LOG_LEVEL ?? 'info',
  });
}
