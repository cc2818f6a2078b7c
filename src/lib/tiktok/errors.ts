export class MonitorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid or unreadable account file. Fatal only on the first load. */
export class ConfigError extends MonitorError {}

/** Connecting to an account's live room failed; retried on a later cycle. */
export class ConnectError extends MonitorError {
  constructor(public readonly account: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class StreamError extends MonitorError {}

/** A CSV or video write failed; the owning session is finalized. */
export class SinkError extends MonitorError {
  constructor(public readonly file: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ProbeTimeout extends MonitorError {
  constructor(public readonly account: string, public readonly timeoutMs: number) {
    super(`liveness probe for ${account} timed out after ${timeoutMs}ms`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
