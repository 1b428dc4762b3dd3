import type { Platform } from '../markets/types.js';

/** Network, timeout or non-2xx failure from one upstream source. */
export class FetchError extends Error {
  constructor(
    public readonly source: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${source}: ${message}`, options);
    this.name = 'FetchError';
  }
}

/** A single malformed record; the record is skipped, the cycle continues. */
export class ParseError extends Error {
  constructor(
    public readonly platform: Platform,
    message: string,
    public readonly externalId?: string
  ) {
    super(externalId ? `${platform} ${externalId}: ${message}` : `${platform}: ${message}`);
    this.name = 'ParseError';
  }
}

export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

export class DeliveryError extends Error {
  constructor(
    public readonly target: string,
    public readonly language: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`delivery to ${target} (${language}) failed: ${message}`, options);
    this.name = 'DeliveryError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
