// Shared builders for tests

import { Venue } from '../../src/shared/types';
import { DispatchRecord, TradeEvent } from '../../src/canonicalizer/canonical-event';
import { CanonicalSymbol, isCanonicalSymbol } from '../../src/canonicalizer/symbols';
import { Sink } from '../../src/sinks/sink';

export function symbol(value: string): CanonicalSymbol {
    if (!isCanonicalSymbol(value)) throw new Error(`not a canonical symbol: ${value}`);
    return value;
}

export function trade(overrides: Partial<Omit<TradeEvent, 's'>> & { s?: string } = {}): TradeEvent {
    const { s = 'BTC-USDT', ...rest } = overrides;
    return {
        kind: 'trade',
        agent: 'binance',
        s: symbol(s),
        t: '1',
        p: '100',
        q: '1',
        ts: 1_000,
        receivedAt: 1_000,
        ...rest,
    };
}

export function tradeAt(agent: Venue, price: string, ts: number, receivedAt: number = ts): TradeEvent {
    return trade({ agent, p: price, ts, receivedAt });
}

/** Records every written line; optionally holds writes until released. */
export class MemorySink implements Sink {
    readonly records: DispatchRecord[] = [];
    closed = false;
    private gate: Promise<void> = Promise.resolve();
    private release: () => void = () => undefined;

    constructor(readonly name: string = 'memory') {}

    hold(): void {
        this.gate = new Promise<void>((resolve) => {
            this.release = resolve;
        });
    }

    open(): void {
        this.release();
    }

    async write(record: DispatchRecord): Promise<void> {
        await this.gate;
        this.records.push(record);
    }

    async close(): Promise<void> {
        this.closed = true;
    }
}

/** Resolve once `predicate` holds, polling on the event loop. */
export async function waitFor(predicate: () => boolean, timeoutMs = 2_000): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (!predicate()) {
        if (Date.now() > deadline) throw new Error('condition not met in time');
        await new Promise((resolve) => setTimeout(resolve, 5));
    }
}
