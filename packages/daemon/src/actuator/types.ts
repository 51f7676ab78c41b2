import type { ActuatorStatus } from "@gatewarden/shared";

/**
 * Remote controller that moves the gate. `open`, `close` and `notify` report
 * failure through their result and never throw; `queryState` throws
 * ActuatorUnavailableError when the controller cannot be reached.
 */
export interface ActuatorGateway {
  readonly name: string;

  // Lifecycle
  connect(): Promise<void>;
  disconnect(): Promise<void>;

  // Commands
  open(): Promise<boolean>;
  close(): Promise<boolean>;
  notify(title: string, message: string): Promise<boolean>;

  // Status
  queryState(): Promise<ActuatorStatus>;
}

export class ActuatorUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ActuatorUnavailableError";
  }
}

export interface RetryOptions {
  attempts: number;
  delayMs: number;
  /** Called after each failed attempt that will be retried */
  onRetry?: (attempt: number, error: unknown) => void;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Runs `fn` up to `attempts` times, doubling the delay after each failure.
 * Rethrows the last error.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const attempts = Math.max(1, options.attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt === attempts) break;
      options.onRetry?.(attempt, err);
      await sleep(options.delayMs * 2 ** (attempt - 1));
    }
  }
  throw lastError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
