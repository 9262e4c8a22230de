export type Provider = "etherscan" | "alchemy" | "honeypot" | "moralis";

/**
 * Transport, status or payload failure from one of the data providers.
 * Always recoverable: callers skip the unit of work and retry on the next tick.
 */
export class UpstreamError extends Error {
  readonly provider: Provider;
  readonly operation: string;
  readonly status?: number;

  constructor(provider: Provider, operation: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(`${provider} ${operation}: ${message}`, { cause: options.cause });
    this.name = "UpstreamError";
    this.provider = provider;
    this.operation = operation;
    this.status = options.status;
  }
}

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));
