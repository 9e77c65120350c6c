/**
 * Ingestor metrics
 *
 * Counters are collected in a dedicated prom-client registry. Serving them over
 * HTTP is left to the embedding process (`registry.metrics()` renders the
 * text exposition format).
 */

import promClient from 'prom-client';

export const registry = new promClient.Registry();

export const messagesIngested = new promClient.Counter({
  name: 'ingestor_messages_ingested_total',
  help: 'Raw events received from agents',
  labelNames: ['agent', 'kind'] as const,
  registers: [registry],
});

export const normalizationErrors = new promClient.Counter({
  name: 'ingestor_normalization_errors_total',
  help: 'Raw events dropped by the canonicalizer',
  labelNames: ['agent', 'reason'] as const,
  registers: [registry],
});

export const validationRejects = new promClient.Counter({
  name: 'ingestor_validation_rejects_total',
  help: 'Canonical events rejected by the post-normalization validator',
  labelNames: ['agent', 'kind'] as const,
  registers: [registry],
});

export const reconnects = new promClient.Counter({
  name: 'ingestor_reconnects_total',
  help: 'Agent reconnection attempts',
  labelNames: ['agent'] as const,
  registers: [registry],
});

export const agentErrors = new promClient.Counter({
  name: 'ingestor_agent_errors_total',
  help: 'Agent session failures by error class',
  labelNames: ['agent', 'error'] as const,
  registers: [registry],
});

export const agentState = new promClient.Gauge({
  name: 'ingestor_agent_state',
  help: 'Current agent state (1 for the active state label)',
  labelNames: ['agent', 'state'] as const,
  registers: [registry],
});

export const dispatcherDropped = new promClient.Counter({
  name: 'ingestor_dispatcher_dropped_total',
  help: 'Records evicted from a drop-oldest consumer queue',
  labelNames: ['consumer'] as const,
  registers: [registry],
});

export const dispatcherTimeouts = new promClient.Counter({
  name: 'ingestor_dispatcher_timeouts_total',
  help: 'Deliveries failed because a bounded-block queue stayed full past its timeout',
  labelNames: ['consumer'] as const,
  registers: [registry],
});

export const sinkErrors = new promClient.Counter({
  name: 'ingestor_sink_errors_total',
  help: 'Records a consumer failed to accept',
  labelNames: ['consumer'] as const,
  registers: [registry],
});

export const spreadEvents = new promClient.Counter({
  name: 'ingestor_spread_events_total',
  help: 'Spread events emitted by the analytics engine',
  labelNames: ['symbol'] as const,
  registers: [registry],
});
