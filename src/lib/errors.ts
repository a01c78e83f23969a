export class CheckerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A feed page could not be fetched or read. Ends the whole run.
 */
export class TransportError extends CheckerError {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, url: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.url = url;
    this.status = options.status;
  }
}

/**
 * A single feed item has unreadable timestamps. Callers drop the item.
 */
export class MalformedRecordError extends CheckerError {
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown) {
    super(`Malformed ${field}: ${JSON.stringify(value)}`);
    this.field = field;
    this.value = value;
  }
}

/**
 * Caller-supplied date, time or offset could not be parsed.
 */
export class InputFormatError extends CheckerError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
