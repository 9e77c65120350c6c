// Error taxonomy for the ingestor
// Each class marks the scope a failure is contained in: one event, one agent, one sink, or startup.

export class IngestorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Transient session failure (handshake, upgrade rejection, connect timeout,
 * symbol discovery). Retried by the supervisor with backoff.
 */
export class ConnectionError extends IngestorError {
  constructor(
    message: string,
    public readonly agent: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** No frame arrived within the stale-feed window; the session is recycled. */
export class StaleFeedError extends ConnectionError {
  constructor(agent: string, public readonly idleMs: number) {
    super(`no message for ${idleMs}ms`, agent);
  }
}

/** Malformed or unexpected wire frame. Treated as a disconnect. */
export class ProtocolError extends IngestorError {
  constructor(
    message: string,
    public readonly agent: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Terminal error of an agent stream when the remote end closes the socket. */
export class DisconnectedError extends IngestorError {
  constructor(
    public readonly agent: string,
    public readonly code: number,
    public readonly reason: string
  ) {
    super(`connection closed (${code}${reason ? `: ${reason}` : ''})`);
  }
}

export type NormalizationFailure =
  | 'unknownSymbolFormat'
  | 'missingField'
  | 'invalidField'
  | 'featureDisabled';

/** Drops exactly one event. Never aborts the stream it came from. */
export class NormalizationError extends IngestorError {
  constructor(
    public readonly reason: NormalizationFailure,
    message: string,
    public readonly field?: string
  ) {
    super(message);
  }

  static unknownSymbolFormat(venue: string, symbol: string): NormalizationError {
    return new NormalizationError('unknownSymbolFormat', `unknown ${venue} symbol format: ${symbol}`);
  }

  static missingField(field: string): NormalizationError {
    return new NormalizationError('missingField', `missing required field: ${field}`, field);
  }

  static invalidField(field: string, value: unknown): NormalizationError {
    return new NormalizationError('invalidField', `invalid value for ${field}: ${JSON.stringify(value)}`, field);
  }

  static featureDisabled(kind: string): NormalizationError {
    return new NormalizationError('featureDisabled', `event kind disabled: ${kind}`);
  }
}

/** A sink rejected a record. Logged and counted per sink. */
export class SinkError extends IngestorError {
  constructor(
    public readonly sink: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Startup-only failure; the process exits non-zero before any agent starts. */
export class ConfigurationError extends IngestorError {}

export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
