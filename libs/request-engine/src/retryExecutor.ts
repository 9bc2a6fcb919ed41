import { setTimeout as sleep } from 'timers/promises';
import { toTransportError } from './errors';
import type { ReplayableBody } from './replayableBody';
import { classifyAttempt, type Classification } from './responseClassifier';
import type { AttemptOutcome, HttpTransport, Logger, RetryPredicate, TransportRequest } from './types';

export const DEFAULT_MAX_RETRIES = 5;

export interface RetryExecutorOptions {
  shouldRetry?: RetryPredicate;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface ExecutionResult {
  outcome: AttemptOutcome;
  classification: Classification;
  attempts: number;
}

/**
 * Delay before the attempt with 0-based index `retry` (> 0):
 * 2^(retry-1) seconds plus up to one second of jitter.
 */
export function computeBackoffMs(retry: number, random: () => number = Math.random): number {
  const baseMs = 2 ** (retry - 1) * 1000;
  return baseMs + Math.floor(random() * 1000);
}

/**
 * Sends a built request until it succeeds, fails terminally or the retry budget
 * runs out. The last attempt's outcome is always returned, whatever its verdict.
 */
export class RetryExecutor {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly shouldRetry?: RetryPredicate;

  constructor(
    private readonly transport: HttpTransport | undefined,
    private readonly options: RetryExecutorOptions = {},
  ) {
    this.sleep = options.sleep ?? ((ms) => sleep(ms));
    this.random = options.random ?? Math.random;
    const predicate = options.shouldRetry;
    if (predicate) {
      this.shouldRetry = (status) => this.consultPredicate(predicate, status);
    }
  }

  /**
   * Resolves `undefined` without sending anything when there is no request or no
   * transport to send it with.
   */
  async execute(
    request: Omit<TransportRequest, 'body' | 'attempt'> | undefined,
    body: ReplayableBody,
    maxRetries: number = DEFAULT_MAX_RETRIES,
  ): Promise<ExecutionResult | undefined> {
    const transport = this.transport;
    if (!request || !transport) {
      return undefined;
    }

    for (let retry = 0; ; retry += 1) {
      if (retry > 0) {
        const delayMs = computeBackoffMs(retry, this.random);
        this.options.logger?.warn('http.request.retry', {
          method: request.method,
          url: request.url,
          retry,
          maxRetries,
          delayMs,
        });
        await this.sleep(delayMs);
      }

      const attemptRequest: TransportRequest = { ...request, body: body.rearm(), attempt: retry + 1 };
      const outcome = await this.send(transport, attemptRequest);
      const classification = classifyAttempt(outcome, this.shouldRetry);

      if (classification.verdict === 'retryable' && retry < maxRetries) {
        continue;
      }
      return { outcome, classification, attempts: retry + 1 };
    }
  }

  /** A predicate that throws counts as "do not retry". */
  private consultPredicate(predicate: RetryPredicate, status: number): boolean {
    try {
      return predicate(status);
    } catch (error) {
      this.options.logger?.warn('http.request.retry_predicate_error', {
        status,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  private async send(transport: HttpTransport, request: TransportRequest): Promise<AttemptOutcome> {
    try {
      const response = await transport(request);
      return { attempt: request.attempt, request, status: response.status, response };
    } catch (error) {
      return { attempt: request.attempt, request, status: 0, error: toTransportError(error) };
    }
  }
}
