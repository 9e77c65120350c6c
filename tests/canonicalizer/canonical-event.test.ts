/**
 * Wire encoding tests
 */

import { encodeEvent, encodeRecord, encodeSpread, SpreadEvent } from '../../src/canonicalizer/canonical-event';
import { symbol, trade } from '../helpers/fixtures';

describe('encodeEvent', () => {
    it('should write agent, type, symbol, fields and ts without receipt time', () => {
        const line = encodeEvent(
            trade({ t: '12345', p: '27000.10', q: '0.00100000', ts: 1_700_000_000_000, receivedAt: 1_700_000_000_005 })
        );
        expect(line).toBe(
            '{"agent":"binance","type":"trade","s":"BTC-USDT","t":"12345","p":"27000.10","q":"0.00100000","ts":1700000000000}'
        );
    });

    it('should use snake_case wire types', () => {
        const line = encodeEvent({
            kind: 'fundingRate',
            agent: 'deribit',
            s: symbol('BTC-USD'),
            r: '0.0001',
            ts: 7,
            receivedAt: 8,
        });
        expect(line).toBe('{"agent":"deribit","type":"funding_rate","s":"BTC-USD","r":"0.0001","ts":7}');
    });

    it('should omit the symbol of unscoped events', () => {
        const line = encodeEvent({
            kind: 'newsHeadline',
            agent: 'onchain',
            headline: 'ETF approved',
            source: 'wire',
            ts: 5,
            receivedAt: 6,
        });
        expect(line).toBe('{"agent":"onchain","type":"news_headline","headline":"ETF approved","source":"wire","ts":5}');
    });
});

describe('encodeSpread', () => {
    const spread: SpreadEvent = {
        kind: 'spread',
        id: 'spread-1',
        s: symbol('BTC-USDT'),
        venues: ['binance', 'coinbase'],
        buyVenue: 'binance',
        sellVenue: 'coinbase',
        minPrice: '100',
        maxPrice: '106',
        spread: '0.06',
        ts: 11,
    };

    it('should write the analytics line', () => {
        expect(encodeSpread(spread)).toBe(
            '{"agent":"analytics","type":"spread","id":"spread-1","s":"BTC-USDT","venues":["binance","coinbase"],' +
                '"buy_venue":"binance","sell_venue":"coinbase","min_price":"100","max_price":"106","spread":"0.06","ts":11}'
        );
    });

    it('should pick the encoder by record type', () => {
        expect(encodeRecord(spread)).toBe(encodeSpread(spread));
        const event = trade();
        expect(encodeRecord(event)).toBe(encodeEvent(event));
    });
});
