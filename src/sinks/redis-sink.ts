// Redis pub/sub sink - one JSON line per PUBLISH on a single channel

import Redis from 'ioredis';
import logger from '../shared/logger';
import { SinkError, describeError } from '../shared/errors';
import { DispatchRecord, encodeRecord } from '../canonicalizer/canonical-event';
import { Sink } from './sink';

/** The slice of the ioredis client this sink uses */
export interface RedisPublisher {
  publish(channel: string, message: string): Promise<number>;
  quit(): Promise<string>;
}

export interface RedisSinkOptions {
  url: string;
  channel: string;
  /** Pre-built client; a lazily connecting ioredis client is created otherwise */
  client?: RedisPublisher;
}

export function createRedisPublisher(url: string): RedisPublisher {
  return new Redis(url, {
    retryStrategy: (times) => {
      const delay = Math.min(times * 50, 2000);
      logger.warn(`[RedisSink] Reconnect attempt ${times}, delay ${delay}ms`);
      return delay;
    },
    maxRetriesPerRequest: 3,
    lazyConnect: true,
  });
}

export class RedisSink implements Sink {
  public readonly name: string;
  private readonly client: RedisPublisher;
  private readonly channel: string;
  private closed = false;

  constructor(options: RedisSinkOptions) {
    this.channel = options.channel;
    this.name = `redis:${options.channel}`;
    this.client = options.client ?? createRedisPublisher(options.url);
  }

  async write(record: DispatchRecord): Promise<void> {
    if (this.closed) {
      throw new SinkError(this.name, 'sink is closed');
    }
    try {
      await this.client.publish(this.channel, encodeRecord(record));
    } catch (error) {
      throw new SinkError(this.name, `publish failed: ${describeError(error)}`, { cause: error });
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.client.quit();
      logger.info(`[RedisSink] Disconnected from channel ${this.channel}`);
    } catch (error) {
      logger.warn(`[RedisSink] Quit failed: ${describeError(error)}`);
    }
  }
}
