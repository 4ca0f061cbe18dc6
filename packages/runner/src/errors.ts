export class HarnessError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The service did not answer at all (refused, DNS, reset). */
export class ConnectionError extends HarnessError {
  constructor(
    readonly url: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Cannot reach ${url}: ${reason}`, options);
  }
}

export class RequestTimeoutError extends HarnessError {
  constructor(
    readonly url: string,
    readonly timeoutMs: number
  ) {
    super(`No response from ${url} within ${timeoutMs}ms`);
  }
}

/** A check needed a JSON body and got something else. */
export class ResponseFormatError extends HarnessError {
  constructor(
    readonly url: string,
    readonly status: number,
    readonly preview: string
  ) {
    super(`Response from ${url} (status ${status}) is not valid JSON`);
  }
}

export class ConfigError extends HarnessError {}

export class ContractError extends HarnessError {}

export function errorText(e: unknown): string {
  if (e instanceof Error) {
    const cause = e.cause instanceof Error ? ` (${e.cause.message})` : "";
    return `${e.message}${cause}`;
  }
  return String(e);
}
