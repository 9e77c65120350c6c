/**
 * Spread detector tests
 * Covers threshold crossing, ordering, staleness, debounce and subscriptions.
 */

import { SpreadDetector, SpreadDetectorOptions } from '../../src/analytics/spread-detector';
import { SpreadEvent } from '../../src/canonicalizer/canonical-event';
import { symbol, trade, tradeAt } from '../helpers/fixtures';

jest.mock('../../src/shared/logger', () => ({
    __esModule: true,
    default: { info: jest.fn(), debug: jest.fn(), warn: jest.fn(), error: jest.fn() },
    setLogLevel: jest.fn(),
}));

describe('SpreadDetector', () => {
    let clock: number;

    function detector(overrides: Partial<SpreadDetectorOptions> = {}): SpreadDetector {
        return new SpreadDetector({
            threshold: 0.05,
            stalenessWindowMs: 10_000,
            debounceMs: 30_000,
            now: () => clock,
            ...overrides,
        });
    }

    beforeEach(() => {
        clock = 11;
    });

    it('should emit when the relative spread exceeds the threshold', () => {
        const spreads = detector();

        expect(spreads.onTrade(tradeAt('binance', '100', 10))).toEqual({ status: 'updated' });
        const outcome = spreads.onTrade(tradeAt('coinbase', '106', 11));

        expect(outcome.status).toBe('emitted');
        if (outcome.status !== 'emitted') return;
        expect(outcome.event).toMatchObject({
            kind: 'spread',
            s: 'BTC-USDT',
            venues: ['binance', 'coinbase'],
            buyVenue: 'binance',
            sellVenue: 'coinbase',
            minPrice: '100',
            maxPrice: '106',
            spread: '0.06',
            ts: 11,
        });
        expect(typeof outcome.event.id).toBe('string');
    });

    it('should not emit below or exactly at the threshold', () => {
        const above = detector({ threshold: 0.07 });
        above.onTrade(tradeAt('binance', '100', 10));
        expect(above.onTrade(tradeAt('coinbase', '106', 11))).toEqual({ status: 'updated' });

        const equal = detector({ threshold: '0.06' });
        equal.onTrade(tradeAt('binance', '100', 10));
        expect(equal.onTrade(tradeAt('coinbase', '106', 11))).toEqual({ status: 'updated' });
    });

    it('should reject out-of-order and duplicate trades per venue', () => {
        const spreads = detector();

        spreads.onTrade(tradeAt('binance', '100', 100));
        expect(spreads.onTrade(tradeAt('binance', '90', 50))).toEqual({ status: 'stale' });
        expect(spreads.onTrade(tradeAt('binance', '95', 100))).toEqual({ status: 'stale' });

        expect(spreads.snapshot(symbol('BTC-USDT'))).toEqual({
            binance: { price: '100', ts: 100, receivedAt: 100 },
        });
    });

    it('should leave out venues whose quote was received outside the staleness window', () => {
        const spreads = detector({ stalenessWindowMs: 1_000 });
        spreads.onTrade(tradeAt('binance', '100', 1));

        clock = 2_000;
        expect(spreads.onTrade(tradeAt('coinbase', '106', 2_000))).toEqual({ status: 'updated' });

        clock = 2_500;
        expect(spreads.onTrade(tradeAt('binance', '100', 2_500)).status).toBe('emitted');
    });

    it('should emit at most once per symbol per debounce interval', () => {
        const spreads = detector({ stalenessWindowMs: 60_000 });
        spreads.onTrade(tradeAt('binance', '100', 10));
        expect(spreads.onTrade(tradeAt('coinbase', '106', 11)).status).toBe('emitted');

        clock = 20;
        expect(spreads.onTrade(tradeAt('binance', '99', 12)).status).toBe('debounced');

        clock = 30_011;
        const outcome = spreads.onTrade(tradeAt('binance', '98', 13));
        expect(outcome.status).toBe('emitted');
        if (outcome.status !== 'emitted') return;
        expect(outcome.event).toMatchObject({ buyVenue: 'binance', minPrice: '98', maxPrice: '106', ts: 13 });
    });

    it('should track symbols independently', () => {
        const spreads = detector();
        spreads.onTrade(tradeAt('binance', '100', 10));

        expect(spreads.onTrade(trade({ agent: 'coinbase', s: 'ETH-USDT', p: '200', ts: 11, receivedAt: 11 }))).toEqual({
            status: 'updated',
        });
        expect(spreads.snapshot(symbol('ETH-USDT'))).toEqual({
            coinbase: { price: '200', ts: 11, receivedAt: 11 },
        });
    });

    it('should deliver emitted spreads to subscribers until closed', async () => {
        const spreads = detector();
        const seen: SpreadEvent[] = [];
        const subscription = spreads.subscribe();
        const reading = (async () => {
            for await (const event of subscription) {
                seen.push(event);
            }
        })();

        spreads.onTrade(tradeAt('binance', '100', 10));
        const outcome = spreads.onTrade(tradeAt('coinbase', '106', 11));
        spreads.close();
        await reading;

        expect(outcome.status).toBe('emitted');
        if (outcome.status !== 'emitted') return;
        expect(seen).toEqual([outcome.event]);
    });

    it('should end a subscription taken after close immediately', async () => {
        const spreads = detector();
        spreads.close();

        const seen: SpreadEvent[] = [];
        for await (const event of spreads.subscribe()) {
            seen.push(event);
        }
        expect(seen).toEqual([]);
    });

    it('should refuse a threshold that is not positive', () => {
        expect(() => detector({ threshold: 0 })).toThrow(RangeError);
        expect(() => detector({ threshold: '-0.01' })).toThrow('spread threshold must be positive, got -0.01');
    });
});
