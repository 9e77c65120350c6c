/**
 * WebSocketAgent session tests against an in-process venue
 */

import { WebSocketAgent } from '../../src/market-ingester/agent';
import { DEFAULT_FEATURES } from '../../src/shared/config';
import { ConnectionError, DisconnectedError, ProtocolError } from '../../src/shared/errors';
import { JsonObject, JsonValue, RawEvent, isJsonObject } from '../../src/shared/types';
import { FakeVenue, readUntilError, take, unusedPort } from '../helpers/fake-venue';
import { waitFor } from '../helpers/fixtures';

jest.mock('../../src/shared/logger', () => ({
    __esModule: true,
    default: { info: jest.fn(), debug: jest.fn(), warn: jest.fn(), error: jest.fn() },
    setLogLevel: jest.fn(),
}));

class EchoAgent extends WebSocketAgent {
    constructor(url: string, maxBufferedEvents?: number) {
        super({ name: 'echo', venue: 'binance', url, features: DEFAULT_FEATURES, maxBufferedEvents, now: () => 42 });
    }

    protected subscriptionFrames(): JsonObject[] {
        return [{ op: 'subscribe', channel: 'trades' }];
    }

    protected decodeFrame(frame: JsonValue, receivedAt: number): RawEvent[] {
        if (!isJsonObject(frame)) throw new ProtocolError('expected an object', this.name);
        return frame.op === 'ack' ? [] : [this.rawEvent('trade', frame, receivedAt)];
    }
}

class GatedAgent extends EchoAgent {
    private readonly gates: Promise<void>[] = [];

    /** Hold the next connect() in prepare until the returned function is called. */
    hold(): () => void {
        let release: () => void = () => undefined;
        this.gates.push(
            new Promise<void>((resolve) => {
                release = resolve;
            })
        );
        return () => release();
    }

    protected async prepare(_signal: AbortSignal): Promise<void> {
        await this.gates.shift();
    }
}

describe('WebSocketAgent', () => {
    let venue: FakeVenue;
    let agent: EchoAgent;
    let controller: AbortController;

    beforeEach(async () => {
        venue = await FakeVenue.start();
        agent = new EchoAgent(venue.url);
        controller = new AbortController();
    });

    afterEach(async () => {
        controller.abort();
        await agent.close();
        await venue.stop();
    });

    it('should send subscription frames once connected', async () => {
        await agent.connect(controller.signal);
        await expect(venue.waitForFrames(1)).resolves.toEqual([{ op: 'subscribe', channel: 'trades' }]);
    });

    it('should stream decoded events in arrival order', async () => {
        await agent.connect(controller.signal);
        await venue.send({ op: 'ack' }, { n: 1 }, { n: 2 });

        const events = await take(agent, 2, controller.signal);
        expect(events).toEqual([
            { venue: 'binance', kind: 'trade', payload: { n: 1 }, receivedAt: 42 },
            { venue: 'binance', kind: 'trade', payload: { n: 2 }, receivedAt: 42 },
        ]);
    });

    it('should end the stream with DisconnectedError when the venue closes', async () => {
        await agent.connect(controller.signal);
        await venue.send({ n: 1 });
        await venue.disconnect(4000, 'maintenance');

        const { events, error } = await readUntilError(agent, controller.signal);
        expect(events).toHaveLength(1);
        expect(error).toBeInstanceOf(DisconnectedError);
        expect(error instanceof DisconnectedError && [error.code, error.message]).toEqual([
            4000,
            'connection closed (4000: maintenance)',
        ]);
    });

    it('should fail the session on a frame the decoder rejects', async () => {
        await agent.connect(controller.signal);
        await venue.send([1, 2, 3]);

        const { error } = await readUntilError(agent, controller.signal);
        expect(error).toBeInstanceOf(ProtocolError);
        expect(error instanceof ProtocolError && error.message).toBe('expected an object');
    });

    it('should fail the session on invalid JSON', async () => {
        await agent.connect(controller.signal);
        await venue.sendRaw('not json');

        const { error } = await readUntilError(agent, controller.signal);
        expect(error).toBeInstanceOf(ProtocolError);
        expect(error instanceof ProtocolError && error.message).toMatch(/^undecodable frame: SyntaxError/);
    });

    it('should fail the session when the receive buffer overflows', async () => {
        agent = new EchoAgent(venue.url, 2);
        await agent.connect(controller.signal);
        await venue.send({ n: 1 }, { n: 2 }, { n: 3 });
        await venue.closed();

        const { events, error } = await readUntilError(agent, controller.signal);
        expect(events.map((event) => event.payload)).toEqual([{ n: 1 }, { n: 2 }]);
        expect(error instanceof ProtocolError && error.message).toBe('receive buffer full (2 events)');
    });

    it('should reject connect with ConnectionError when the handshake fails', async () => {
        const port = await unusedPort();
        const unreachable = new EchoAgent(`ws://127.0.0.1:${port}`);

        const failure = unreachable.connect(controller.signal);
        await expect(failure).rejects.toBeInstanceOf(ConnectionError);
        await expect(failure).rejects.toThrow(/^handshake failed/);
        await unreachable.close();
    });

    it('should reject connect when already aborted', async () => {
        controller.abort();
        await expect(agent.connect(controller.signal)).rejects.toThrow('connect aborted');
    });

    it('should not open a socket for a connect aborted during prepare', async () => {
        const gated = new GatedAgent(venue.url);
        agent = gated;
        const release = gated.hold();

        const connecting = gated.connect(controller.signal);
        controller.abort();
        release();

        await expect(connecting).rejects.toThrow('connect aborted');
        expect(venue.connections).toBe(0);
    });

    it('should not let an abandoned connect replace a newer session', async () => {
        const gated = new GatedAgent(venue.url);
        agent = gated;
        const release = gated.hold();
        const abandoned = new AbortController();

        const stale = gated.connect(abandoned.signal);
        abandoned.abort();
        await gated.connect(controller.signal);
        release();

        await expect(stale).rejects.toThrow('connect aborted');
        expect(venue.connections).toBe(1);
        await venue.send({ n: 1 });
        const [event] = await take(gated, 1, controller.signal);
        expect(event.payload).toEqual({ n: 1 });
    });

    it('should refuse to stream before connect', async () => {
        const iterator = agent.stream(controller.signal)[Symbol.asyncIterator]();
        await expect(iterator.next()).rejects.toThrow('stream requested before connect');
    });

    it('should end the stream on close()', async () => {
        await agent.connect(controller.signal);
        const reading = readUntilError(agent, controller.signal);
        await agent.close();

        await expect(reading).resolves.toEqual({ events: [], error: undefined });
    });

    it('should end the stream on abort', async () => {
        await agent.connect(controller.signal);
        const reading = readUntilError(agent, controller.signal);
        controller.abort();

        await expect(reading).resolves.toEqual({ events: [], error: undefined });
    });

    it('should open a fresh session on reconnect', async () => {
        await agent.connect(controller.signal);
        await agent.connect(controller.signal);

        await waitFor(() => venue.connections === 2);
        await venue.send({ n: 7 });
        const [event] = await take(agent, 1, controller.signal);
        expect(event.payload).toEqual({ n: 7 });
    });
});
