/**
 * Agent contract and WebSocket session base
 *
 * An agent owns one streaming session to one venue feed. The supervisor drives
 * it: connect(), then stream() until the stream ends or throws, then close(),
 * then connect() again for a fresh session.
 */

import WebSocket from 'ws';
import logger from '../shared/logger';
import { AsyncQueue } from '../shared/async-queue';
import { ConnectionError, DisconnectedError, ProtocolError, describeError } from '../shared/errors';
import { sleep } from '../shared/timing';
import { EventKind, FeatureToggles, JsonObject, JsonValue, RawEvent, Venue } from '../shared/types';

export interface Agent {
  readonly name: string;
  readonly venue: Venue;
  /** Open a session. Rejects with ConnectionError on handshake or upgrade failure. */
  connect(signal: AbortSignal): Promise<void>;
  /**
   * Events of the current session. Throws DisconnectedError when the socket
   * closes and ProtocolError on an undecodable frame; returns on abort.
   */
  stream(signal: AbortSignal): AsyncIterable<RawEvent>;
  /** Release the session. Safe to call repeatedly and before connect(). */
  close(): Promise<void>;
}

export interface WebSocketAgentOptions {
  name: string;
  venue: Venue;
  url: string;
  features: FeatureToggles;
  /** Decoded events held while the pipeline is busy before the session is failed */
  maxBufferedEvents?: number;
  /** Pause between consecutive outbound frames; venues cap inbound message rates */
  frameIntervalMs?: number;
  /** How often refreshFrames() runs during a session; 0 disables */
  refreshIntervalMs?: number;
  now?: () => number;
}

const DEFAULT_MAX_BUFFERED_EVENTS = 10_000;

export abstract class WebSocketAgent implements Agent {
  public readonly name: string;
  public readonly venue: Venue;
  protected readonly url: string;
  protected readonly features: FeatureToggles;
  protected readonly now: () => number;
  private readonly maxBufferedEvents: number;
  private readonly frameIntervalMs: number;
  private readonly refreshIntervalMs: number;

  private ws: WebSocket | null = null;
  private events: AsyncQueue<RawEvent> | null = null;
  /** Aborted by close(); scopes work that outlives connect() */
  private session: AbortController | null = null;
  private refreshTimer: NodeJS.Timeout | null = null;
  private refreshing = false;

  protected constructor(options: WebSocketAgentOptions) {
    this.name = options.name;
    this.venue = options.venue;
    this.url = options.url;
    this.features = options.features;
    this.now = options.now ?? Date.now;
    this.maxBufferedEvents = options.maxBufferedEvents ?? DEFAULT_MAX_BUFFERED_EVENTS;
    this.frameIntervalMs = options.frameIntervalMs ?? 0;
    this.refreshIntervalMs = options.refreshIntervalMs ?? 0;
  }

  /** Frames sent once the socket is open. */
  protected abstract subscriptionFrames(): JsonObject[];

  /** Decode one parsed frame. Control frames decode to []. Throw ProtocolError on error frames. */
  protected abstract decodeFrame(frame: JsonValue, receivedAt: number): RawEvent[];

  /** Per-session setup before the socket opens, e.g. resolving an `all` selector. */
  protected async prepare(_signal: AbortSignal): Promise<void> {}

  /** Events produced out of band once subscribed, e.g. a REST book snapshot. */
  protected async afterSubscribe(_signal: AbortSignal): Promise<RawEvent[]> {
    return [];
  }

  /**
   * Re-resolve the session's subscriptions and return the frames that move the
   * socket to them. Runs every refreshIntervalMs while a session is up.
   */
  protected async refreshFrames(_signal: AbortSignal): Promise<JsonObject[]> {
    return [];
  }

  protected enabled(kind: EventKind): boolean {
    return this.features[kind];
  }

  protected rawEvent(kind: EventKind, payload: JsonObject, receivedAt: number): RawEvent {
    return { venue: this.venue, kind, payload, receivedAt };
  }

  async connect(signal: AbortSignal): Promise<void> {
    await this.close();
    await this.prepare(signal);
    if (signal.aborted) {
      throw new ConnectionError('connect aborted', this.name);
    }

    const events = new AsyncQueue<RawEvent>(this.maxBufferedEvents);
    const ws = new WebSocket(this.url);
    this.ws = ws;
    this.events = events;

    ws.on('message', (data: WebSocket.RawData) => this.handleMessage(data, events, ws));
    ws.on('close', (code: number, reason: Buffer) => {
      events.fail(new DisconnectedError(this.name, code, reason.toString()));
    });

    await new Promise<void>((resolve, reject) => {
      let opened = false;
      const onAbort = (): void => {
        reject(new ConnectionError('connect aborted', this.name));
        ws.terminate();
      };
      ws.once('open', () => {
        opened = true;
        signal.removeEventListener('abort', onAbort);
        resolve();
      });
      ws.on('error', (error: Error) => {
        signal.removeEventListener('abort', onAbort);
        if (!opened) {
          reject(new ConnectionError(`handshake failed: ${error.message}`, this.name, { cause: error }));
        } else {
          logger.warn(`[${this.name}] WebSocket error: ${error.message}`);
        }
      });
      if (signal.aborted) onAbort();
      else signal.addEventListener('abort', onAbort, { once: true });
    });

    logger.info(`[${this.name}] Connected to ${this.url}`);
    await this.sendFrames(ws, this.subscriptionFrames(), signal);
    const snapshots = await this.afterSubscribe(signal);

    // A connect the caller gave up on must not keep a socket or start timers
    if (signal.aborted || ws !== this.ws) {
      if (ws === this.ws) await this.close();
      throw new ConnectionError('connect aborted', this.name);
    }

    for (const event of snapshots) {
      this.enqueue(event, events, ws);
    }
    this.startRefresh(ws);
  }

  async *stream(signal: AbortSignal): AsyncIterable<RawEvent> {
    const events = this.events;
    if (!events) {
      throw new ConnectionError('stream requested before connect', this.name);
    }

    const onAbort = (): void => events.close();
    signal.addEventListener('abort', onAbort, { once: true });
    try {
      for (;;) {
        const next = await events.shift();
        if (next.done || signal.aborted) return;
        yield next.value;
      }
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  async close(): Promise<void> {
    if (this.refreshTimer) {
      clearInterval(this.refreshTimer);
      this.refreshTimer = null;
    }
    this.session?.abort();
    this.session = null;

    const ws = this.ws;
    this.ws = null;
    this.events?.close();
    this.events = null;

    if (ws && ws.readyState !== WebSocket.CLOSED) {
      ws.terminate();
    }
  }

  /** Send frames in order, pausing frameIntervalMs between them. False when cut short. */
  private async sendFrames(ws: WebSocket, frames: readonly JsonObject[], signal: AbortSignal): Promise<boolean> {
    for (const [index, frame] of frames.entries()) {
      if (index > 0 && this.frameIntervalMs > 0 && !(await sleep(this.frameIntervalMs, signal))) return false;
      if (signal.aborted || ws.readyState !== WebSocket.OPEN) return false;
      ws.send(JSON.stringify(frame));
    }
    return true;
  }

  private startRefresh(ws: WebSocket): void {
    const session = new AbortController();
    this.session = session;
    if (this.refreshIntervalMs <= 0) return;

    this.refreshTimer = setInterval(() => {
      this.refresh(ws, session.signal).catch((error: unknown) => {
        if (!session.signal.aborted) {
          logger.warn(`[${this.name}] Symbol refresh failed: ${describeError(error)}`);
        }
      });
    }, this.refreshIntervalMs);
  }

  private async refresh(ws: WebSocket, signal: AbortSignal): Promise<void> {
    if (this.refreshing || ws !== this.ws) return;
    this.refreshing = true;
    try {
      const frames = await this.refreshFrames(signal);
      if (frames.length === 0 || signal.aborted) return;
      await this.sendFrames(ws, frames, signal);
    } finally {
      this.refreshing = false;
    }
  }

  private handleMessage(data: WebSocket.RawData, events: AsyncQueue<RawEvent>, ws: WebSocket): void {
    const receivedAt = this.now();
    let decoded: RawEvent[];
    try {
      const frame: JsonValue = JSON.parse(data.toString());
      decoded = this.decodeFrame(frame, receivedAt);
    } catch (error) {
      const failure =
        error instanceof ProtocolError
          ? error
          : new ProtocolError(`undecodable frame: ${describeError(error)}`, this.name, { cause: error });
      events.fail(failure);
      ws.terminate();
      return;
    }

    for (const event of decoded) {
      this.enqueue(event, events, ws);
    }
  }

  private enqueue(event: RawEvent, events: AsyncQueue<RawEvent>, ws: WebSocket): void {
    if (events.isClosed || events.push(event)) return;
    events.fail(new ProtocolError(`receive buffer full (${this.maxBufferedEvents} events)`, this.name));
    ws.terminate();
  }
}
