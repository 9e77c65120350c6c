/**
 * Agent supervisor
 *
 * One run loop per agent:
 *   connecting -> streaming -> disconnected -> (backoff) connecting ...
 * An agent whose consecutive failures exceed the limit ends in `failed`; every
 * other agent keeps running. `stopped` is reached only through stop().
 *
 * A single AbortController is the shutdown signal for connects, stream reads,
 * forwarding into the pipeline and backoff sleeps. Each connect attempt also
 * gets its own signal, aborted when the attempt times out, so an abandoned
 * connect cannot open a socket after a newer session has started.
 */

import { EventEmitter } from 'events';
import logger from '../shared/logger';
import { SupervisorSettings } from '../shared/config';
import { ConnectionError, DisconnectedError, StaleFeedError, describeError } from '../shared/errors';
import { agentErrors, agentState, messagesIngested, reconnects } from '../shared/metrics';
import { ExponentialBackoff, linkedController, sleep, withTimeout } from '../shared/timing';
import { RawEvent, Venue } from '../shared/types';
import { Agent } from './agent';

export type AgentState = 'connecting' | 'streaming' | 'disconnected' | 'failed' | 'stopped';

const AGENT_STATES: readonly AgentState[] = ['connecting', 'streaming', 'disconnected', 'failed', 'stopped'];

export interface AgentStatus {
  name: string;
  venue: Venue;
  state: AgentState;
  consecutiveFailures: number;
  restarts: number;
  lastError?: string;
  lastMessageAt?: number;
}

export interface StateChange {
  agent: string;
  from: AgentState;
  to: AgentState;
}

/** Hands a raw event to the pipeline; may wait for room and must honor the signal. */
export type ForwardFn = (event: RawEvent, signal: AbortSignal) => Promise<void>;

export interface SupervisorOptions {
  settings: SupervisorSettings;
  forward: ForwardFn;
  now?: () => number;
}

export class Supervisor extends EventEmitter {
  private readonly controller = new AbortController();
  private readonly statuses = new Map<string, AgentStatus>();
  private readonly settings: SupervisorSettings;
  private readonly forward: ForwardFn;
  private readonly now: () => number;
  private runs: Promise<void>[] = [];
  private started = false;

  constructor(
    private readonly agents: readonly Agent[],
    options: SupervisorOptions
  ) {
    super();
    this.settings = options.settings;
    this.forward = options.forward;
    this.now = options.now ?? Date.now;

    for (const agent of agents) {
      if (this.statuses.has(agent.name)) {
        throw new Error(`duplicate agent name ${agent.name}`);
      }
      this.statuses.set(agent.name, {
        name: agent.name,
        venue: agent.venue,
        state: 'disconnected',
        consecutiveFailures: 0,
        restarts: 0,
      });
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    logger.info(`[Supervisor] Starting ${this.agents.length} agent(s)`);
    this.runs = this.agents.map((agent) => this.run(agent));
  }

  /** Signal every agent to stop and wait for all run loops to exit. */
  async stop(): Promise<void> {
    if (!this.controller.signal.aborted) {
      logger.info('[Supervisor] Stopping agents');
      this.controller.abort();
    }
    await this.done();
  }

  /** Resolves once every run loop has exited (stopped or failed). */
  async done(): Promise<void> {
    await Promise.allSettled(this.runs);
  }

  getStatus(): AgentStatus[] {
    return [...this.statuses.values()].map((status) => ({ ...status }));
  }

  private async run(agent: Agent): Promise<void> {
    const signal = this.controller.signal;
    const status = this.status(agent);
    const backoff = new ExponentialBackoff(this.settings.initialBackoffMs, this.settings.maxBackoffMs);

    while (!signal.aborted) {
      this.transition(status, 'connecting');
      let streamingSince: number | undefined;
      let failure: unknown;
      const attempt = linkedController(signal);

      try {
        await withTimeout(agent.connect(attempt.controller.signal), this.settings.connectTimeoutMs, () => {
          attempt.controller.abort();
          return new ConnectionError(`connect timed out after ${this.settings.connectTimeoutMs}ms`, agent.name);
        });
        if (signal.aborted) break;

        this.transition(status, 'streaming');
        streamingSince = this.now();
        await this.pump(agent, status, signal);
        if (signal.aborted) break;
        failure = new DisconnectedError(agent.name, 1000, 'stream ended');
      } catch (error) {
        if (signal.aborted) break;
        failure = error;
      } finally {
        await this.release(agent);
        attempt.dispose();
      }

      // A session that stayed up for the stability window clears the failure streak
      if (streamingSince !== undefined && this.now() - streamingSince >= this.settings.stabilityWindowMs) {
        status.consecutiveFailures = 0;
        backoff.reset();
      }

      status.consecutiveFailures++;
      status.lastError = describeError(failure);
      agentErrors.inc({ agent: agent.name, error: failure instanceof Error ? failure.name : 'unknown' });

      if (status.consecutiveFailures > this.settings.maxConsecutiveFailures) {
        logger.error(
          `[Supervisor] ${agent.name} failed ${status.consecutiveFailures} times in a row; giving up: ${status.lastError}`
        );
        this.transition(status, 'failed');
        return;
      }

      this.transition(status, 'disconnected');
      const delay = backoff.next();
      logger.warn(`[Supervisor] ${agent.name} disconnected (${status.lastError}); reconnecting in ${delay}ms`);

      if (!(await sleep(delay, signal))) break;
      status.restarts++;
      reconnects.inc({ agent: agent.name });
    }

    this.transition(status, 'stopped');
  }

  private async pump(agent: Agent, status: AgentStatus, signal: AbortSignal): Promise<void> {
    const iterator = agent.stream(signal)[Symbol.asyncIterator]();
    const staleMs = this.settings.staleFeedTimeoutMs;

    try {
      for (;;) {
        const next = await withTimeout(iterator.next(), staleMs, () => new StaleFeedError(agent.name, staleMs));
        if (next.done) return;

        status.lastMessageAt = this.now();
        messagesIngested.inc({ agent: agent.name, kind: next.value.kind });
        await this.forward(next.value, signal);
        if (signal.aborted) return;
      }
    } finally {
      // Closing first unblocks a read still pending inside the iterator
      await this.release(agent);
      if (iterator.return) {
        await iterator.return();
      }
    }
  }

  private async release(agent: Agent): Promise<void> {
    try {
      await agent.close();
    } catch (error) {
      logger.warn(`[Supervisor] ${agent.name} close failed: ${describeError(error)}`);
    }
  }

  private status(agent: Agent): AgentStatus {
    const status = this.statuses.get(agent.name);
    if (!status) {
      throw new Error(`unknown agent ${agent.name}`);
    }
    return status;
  }

  private transition(status: AgentStatus, to: AgentState): void {
    const from = status.state;
    if (from === to) return;
    status.state = to;

    for (const state of AGENT_STATES) {
      agentState.set({ agent: status.name, state }, state === to ? 1 : 0);
    }
    logger.info(`[Supervisor] ${status.name}: ${from} -> ${to}`);
    const change: StateChange = { agent: status.name, from, to };
    this.emit('state', change);
  }
}
