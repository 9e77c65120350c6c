/**
 * Agent registry tests
 */

import { createAgents, createAgentsForFeed } from '../../src/market-ingester/agent-registry';
import { BinanceAgent } from '../../src/market-ingester/binance-agent';
import { BinanceFuturesAgent } from '../../src/market-ingester/binance-futures-agent';
import { CoinbaseAgent } from '../../src/market-ingester/coinbase-agent';
import { DeribitAgent } from '../../src/market-ingester/deribit-agent';
import { OnchainAgent } from '../../src/market-ingester/onchain-agent';
import { ConfigInput, loadConfig } from '../../src/shared/config';
import logger from '../../src/shared/logger';
import { discoverBinanceSymbols } from '../../src/market-ingester/symbol-discovery';

jest.mock('../../src/shared/logger', () => ({
    __esModule: true,
    default: { info: jest.fn(), debug: jest.fn(), warn: jest.fn(), error: jest.fn() },
    setLogLevel: jest.fn(),
}));
jest.mock('../../src/market-ingester/symbol-discovery');

function listing(count: number): string[] {
    return Array.from({ length: count }, (_, i) => `sym${String(i).padStart(4, '0')}usdt`);
}

function config(input: Omit<ConfigInput, 'stdout'>, env: NodeJS.ProcessEnv = {}) {
    return loadConfig({ ...input, stdout: true }, env);
}

describe('agent registry', () => {
    beforeEach(() => {
        jest.mocked(discoverBinanceSymbols).mockResolvedValue(listing(3));
    });

    it('should create a spot agent for Binance trades', async () => {
        const cfg = config({ feeds: ['binance:btcusdt'] });
        const agents = await createAgentsForFeed(cfg.feeds[0], cfg);

        expect(agents).toHaveLength(1);
        expect(agents[0]).toBeInstanceOf(BinanceAgent);
        expect(agents[0].name).toBe('binance:btcusdt');
        expect(agents[0].venue).toBe('binance');
    });

    it('should add a futures agent when mark prices are enabled', async () => {
        const cfg = config({ feeds: ['binance:all'], kinds: { markPrice: true } });
        const agents = await createAgentsForFeed(cfg.feeds[0], cfg);

        expect(agents.map((agent) => agent.name)).toEqual(['binance:all', 'binance-futures:all']);
        expect(agents[1]).toBeInstanceOf(BinanceFuturesAgent);
    });

    it('should shard `all` so no session exceeds the stream cap', async () => {
        jest.mocked(discoverBinanceSymbols).mockResolvedValue(listing(2100));
        const cfg = config({ feeds: ['binance:all'] });
        const agents = await createAgentsForFeed(cfg.feeds[0], cfg);

        expect(agents.map((agent) => agent.name)).toEqual(['binance:all#1/3', 'binance:all#2/3', 'binance:all#3/3']);
        expect(discoverBinanceSymbols).toHaveBeenCalledWith('binance:all', 'https://api.binance.us');
    });

    it('should start a single `all` session when the listing cannot be fetched', async () => {
        jest.mocked(discoverBinanceSymbols).mockRejectedValue(new Error('offline'));
        const cfg = config({ feeds: ['binance:all'] });
        const agents = await createAgentsForFeed(cfg.feeds[0], cfg);

        expect(agents.map((agent) => agent.name)).toEqual(['binance:all']);
        expect(logger.warn).toHaveBeenCalledWith(
            '[AgentRegistry] Cannot size Binance shards, starting one session: Error: offline'
        );
    });

    it('should split a long symbol list across sessions', async () => {
        const symbols = listing(205);
        const cfg = config({
            feeds: [`binance:${symbols.join(',')}`],
            kinds: { l2Diff: true, bookTicker: true, ticker24h: true, ohlcv: true },
        });
        const agents = await createAgentsForFeed(cfg.feeds[0], cfg);

        expect(agents).toHaveLength(2);
        expect(agents[0].name).toBe(`binance:${symbols.slice(0, 204).join(',')}`);
        expect(agents[1].name).toBe('binance:sym0204usdt');
    });

    it('should skip the spot session when only futures kinds are enabled', async () => {
        const cfg = config({ feeds: ['binance:btcusdt'], kinds: { trade: false, fundingRate: true } });
        const agents = await createAgentsForFeed(cfg.feeds[0], cfg);

        expect(agents).toHaveLength(1);
        expect(agents[0]).toBeInstanceOf(BinanceFuturesAgent);
    });

    it('should build one agent per other venue', async () => {
        const cfg = config(
            {
                feeds: ['coinbase:BTC-USD', 'deribit:all', 'onchain:USDC-USD'],
                kinds: { markPrice: true, onchainTransfer: true },
            },
            {}
        );
        const agents = await createAgents(cfg);

        expect(agents.map((agent) => agent.constructor)).toEqual([CoinbaseAgent, DeribitAgent, OnchainAgent]);
        expect(agents.map((agent) => agent.name)).toEqual(['coinbase:BTC-USD', 'deribit:all', 'onchain:USDC-USD']);
    });

    it('should warn about feeds that serve no enabled kind', async () => {
        const cfg = config({ feeds: ['binance:btcusdt', 'deribit:all'] });
        const agents = await createAgents(cfg);

        expect(agents.map((agent) => agent.name)).toEqual(['binance:btcusdt']);
        expect(logger.warn).toHaveBeenCalledWith(
            '[AgentRegistry] deribit:all serves none of the enabled event kinds; skipped'
        );
    });
});
