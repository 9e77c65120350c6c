/**
 * Redis sink tests
 * A fake publisher stands in for the ioredis client.
 */

import { RedisPublisher, RedisSink } from '../../src/sinks/redis-sink';
import { SinkError } from '../../src/shared/errors';
import logger from '../../src/shared/logger';
import { trade } from '../helpers/fixtures';

jest.mock('../../src/shared/logger', () => ({
    __esModule: true,
    default: { info: jest.fn(), debug: jest.fn(), warn: jest.fn(), error: jest.fn() },
    setLogLevel: jest.fn(),
}));

function fakePublisher(): jest.Mocked<RedisPublisher> {
    return {
        publish: jest.fn().mockResolvedValue(1),
        quit: jest.fn().mockResolvedValue('OK'),
    };
}

describe('RedisSink', () => {
    it('should publish each record as a JSON line on its channel', async () => {
        const client = fakePublisher();
        const sink = new RedisSink({ url: 'redis://localhost:6379', channel: 'market-data', client });

        await sink.write(trade());

        expect(sink.name).toBe('redis:market-data');
        expect(client.publish).toHaveBeenCalledWith(
            'market-data',
            '{"agent":"binance","type":"trade","s":"BTC-USDT","t":"1","p":"100","q":"1","ts":1000}'
        );
    });

    it('should wrap publish failures in a SinkError', async () => {
        const client = fakePublisher();
        client.publish.mockRejectedValue(new Error('connection lost'));
        const sink = new RedisSink({ url: 'redis://localhost:6379', channel: 'market-data', client });

        const failure = await sink.write(trade()).catch((error: unknown) => error);

        expect(failure).toBeInstanceOf(SinkError);
        expect(failure).toMatchObject({ sink: 'redis:market-data', message: 'publish failed: Error: connection lost' });
    });

    it('should quit once and refuse writes after close', async () => {
        const client = fakePublisher();
        const sink = new RedisSink({ url: 'redis://localhost:6379', channel: 'market-data', client });

        await sink.close();
        await sink.close();

        expect(client.quit).toHaveBeenCalledTimes(1);
        await expect(sink.write(trade())).rejects.toThrow('sink is closed');
        expect(client.publish).not.toHaveBeenCalled();
    });

    it('should log a failed quit instead of throwing', async () => {
        const client = fakePublisher();
        client.quit.mockRejectedValue(new Error('socket closed'));
        const sink = new RedisSink({ url: 'redis://localhost:6379', channel: 'market-data', client });

        await expect(sink.close()).resolves.toBeUndefined();
        expect(logger.warn).toHaveBeenCalledWith('[RedisSink] Quit failed: Error: socket closed');
    });
});
