// Closed registry: feed venue -> agent sessions serving it

import logger from '../shared/logger';
import { IngestorConfig } from '../shared/config';
import { describeError } from '../shared/errors';
import { EventKind, FeatureToggles, FeedSpec, SymbolSelector, formatFeedSpec } from '../shared/types';
import { Agent } from './agent';
import { BINANCE_SPOT_KINDS, BinanceAgent, symbolsPerSession } from './binance-agent';
import { BINANCE_FUTURES_KINDS, BinanceFuturesAgent } from './binance-futures-agent';
import { COINBASE_KINDS, CoinbaseAgent } from './coinbase-agent';
import { DERIBIT_KINDS, DeribitAgent } from './deribit-agent';
import { OnchainAgent } from './onchain-agent';
import { discoverBinanceSymbols } from './symbol-discovery';

const ONCHAIN_KINDS: readonly EventKind[] = ['onchainTransfer', 'mempool'];

function anyEnabled(features: FeatureToggles, kinds: readonly EventKind[]): boolean {
  return kinds.some((kind) => features[kind]);
}

/** Number of spot sessions the current Binance listing needs; 1 when it cannot be fetched. */
async function binanceShardCount(config: IngestorConfig): Promise<number> {
  try {
    const symbols = await discoverBinanceSymbols('binance:all', config.venues.binanceRestUrl);
    return Math.max(1, Math.ceil(symbols.length / symbolsPerSession(config.features)));
  } catch (error) {
    logger.warn(`[AgentRegistry] Cannot size Binance shards, starting one session: ${describeError(error)}`);
    return 1;
  }
}

async function createBinanceSpotAgents(selector: SymbolSelector, config: IngestorConfig): Promise<BinanceAgent[]> {
  const { features, venues } = config;
  const common = {
    wsUrl: venues.binanceWsUrl,
    restUrl: venues.binanceRestUrl,
    features,
    refreshIntervalMs: config.symbolRefreshIntervalMs,
  };

  if (selector === 'all') {
    const count = await binanceShardCount(config);
    return Array.from({ length: count }, (_, index) => new BinanceAgent({ ...common, selector, shard: { index, count } }));
  }

  const perSession = symbolsPerSession(features);
  const agents: BinanceAgent[] = [];
  for (let offset = 0; offset < selector.length; offset += perSession) {
    agents.push(new BinanceAgent({ ...common, selector: selector.slice(offset, offset + perSession) }));
  }
  return agents;
}

/** Agents for one feed; empty when no kind the venue serves is enabled. */
export async function createAgentsForFeed(feed: FeedSpec, config: IngestorConfig): Promise<Agent[]> {
  const { features, venues } = config;
  const selector = feed.selector;

  switch (feed.venue) {
    case 'binance': {
      const agents: Agent[] = [];
      if (anyEnabled(features, BINANCE_SPOT_KINDS)) {
        agents.push(...(await createBinanceSpotAgents(selector, config)));
      }
      if (anyEnabled(features, BINANCE_FUTURES_KINDS)) {
        agents.push(new BinanceFuturesAgent({ selector, wsUrl: venues.binanceFuturesWsUrl, features }));
      }
      return agents;
    }
    case 'coinbase':
      return anyEnabled(features, COINBASE_KINDS)
        ? [
            new CoinbaseAgent({
              selector,
              wsUrl: venues.coinbaseWsUrl,
              restUrl: venues.coinbaseRestUrl,
              features,
              refreshIntervalMs: config.symbolRefreshIntervalMs,
            }),
          ]
        : [];
    case 'deribit':
      return anyEnabled(features, DERIBIT_KINDS)
        ? [new DeribitAgent({ selector, wsUrl: venues.deribitWsUrl, features })]
        : [];
    case 'onchain':
      return anyEnabled(features, ONCHAIN_KINDS)
        ? [new OnchainAgent({ selector, wsUrl: venues.onchainWsUrl, features })]
        : [];
  }
}

export async function createAgents(config: IngestorConfig): Promise<Agent[]> {
  const agents: Agent[] = [];
  for (const feed of config.feeds) {
    const created = await createAgentsForFeed(feed, config);
    if (created.length === 0) {
      logger.warn(`[AgentRegistry] ${formatFeedSpec(feed)} serves none of the enabled event kinds; skipped`);
    }
    agents.push(...created);
  }
  return agents;
}
