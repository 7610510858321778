export class MonitorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Remote endpoint unreachable, timed out, or answered with a server error. */
export class TransportError extends MonitorError {}

/** The endpoint answered, but the block, contract or identifier does not exist. */
export class NotFoundError extends MonitorError {}

/** Malformed input from the front end; rejected before it reaches the core. */
export class ValidationError extends MonitorError {}

/** Provider-assisted token discovery failed and the curated fallback should run. */
export class DiscoveryError extends MonitorError {}

export function errorMessage(e: unknown): string { return e instanceof Error ? e.message : String(e) }

// NotFoundError is an answer, not an endpoint failure
export function isTransient(e: unknown): boolean { return !(e instanceof NotFoundError) && !(e instanceof ValidationError) }
