import { describe, expect, it } from 'vitest';
import { TransportError } from '../errors';
import { ReplayableBody } from '../replayableBody';
import { RetryExecutor, computeBackoffMs } from '../retryExecutor';
import { bodyText, createLogger, noSleep, rawResponse, scriptedTransport, singleUseStream } from './fakes';

const request = {
  method: 'POST',
  url: 'https://api.example.com/items',
  headers: { 'content-type': 'application/json' },
} as const;

const fixedRandom = () => 0;

describe('computeBackoffMs', () => {
  it('doubles from one second and adds up to a second of jitter', () => {
    expect(computeBackoffMs(1, () => 0)).toBe(1000);
    expect(computeBackoffMs(2, () => 0.5)).toBe(2500);
    expect(computeBackoffMs(3, () => 0.9999)).toBe(4999);
    expect(computeBackoffMs(5, () => 0)).toBe(16000);
  });
});

describe('RetryExecutor', () => {
  it('resolves undefined without sending when there is no transport', async () => {
    const executor = new RetryExecutor(undefined);

    await expect(executor.execute(request, ReplayableBody.empty())).resolves.toBeUndefined();
  });

  it('resolves undefined without sending when there is no request', async () => {
    const transport = scriptedTransport(rawResponse(200));
    const executor = new RetryExecutor(transport);

    await expect(executor.execute(undefined, ReplayableBody.empty())).resolves.toBeUndefined();
    expect(transport).not.toHaveBeenCalled();
  });

  it('returns the first success without sleeping', async () => {
    const transport = scriptedTransport(rawResponse(200, 'ok'));
    const sleep = noSleep();
    const executor = new RetryExecutor(transport, { sleep, random: fixedRandom });

    const result = await executor.execute(request, ReplayableBody.empty());

    expect(result?.attempts).toBe(1);
    expect(result?.classification.verdict).toBe('success');
    expect(result?.outcome.status).toBe(200);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('backs off between retryable attempts', async () => {
    const transport = scriptedTransport(rawResponse(503), rawResponse(500), rawResponse(200));
    const sleep = noSleep();
    const executor = new RetryExecutor(transport, { sleep, random: fixedRandom });

    const result = await executor.execute(request, ReplayableBody.empty());

    expect(result?.attempts).toBe(3);
    expect(result?.classification.verdict).toBe('success');
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it('sends at most maxRetries + 1 times and returns the last outcome', async () => {
    const transport = scriptedTransport(rawResponse(500, 'down'));
    const sleep = noSleep();
    const executor = new RetryExecutor(transport, { sleep, random: fixedRandom });

    const result = await executor.execute(request, ReplayableBody.empty(), 2);

    expect(transport).toHaveBeenCalledTimes(3);
    expect(result?.attempts).toBe(3);
    expect(result?.classification).toEqual({ verdict: 'retryable', message: 'Server returned statuscode 500' });
    expect(result?.outcome.response?.status).toBe(500);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it('sends once with a zero budget', async () => {
    const transport = scriptedTransport(rawResponse(500));
    const sleep = noSleep();
    const executor = new RetryExecutor(transport, { sleep });

    const result = await executor.execute(request, ReplayableBody.empty(), 0);

    expect(transport).toHaveBeenCalledTimes(1);
    expect(result?.attempts).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('stops at the first terminal status', async () => {
    const transport = scriptedTransport(rawResponse(404), rawResponse(200));
    const executor = new RetryExecutor(transport, { sleep: noSleep() });

    const result = await executor.execute(request, ReplayableBody.empty());

    expect(transport).toHaveBeenCalledTimes(1);
    expect(result?.classification.verdict).toBe('terminal');
  });

  it('retries an attempt whose connection timed out', async () => {
    const connectTimeout = new TypeError('fetch failed', {
      cause: Object.assign(new Error('Connect Timeout Error'), { code: 'UND_ERR_CONNECT_TIMEOUT' }),
    });
    const transport = scriptedTransport(connectTimeout, rawResponse(200));
    const executor = new RetryExecutor(transport, { sleep: noSleep(), random: fixedRandom });

    const result = await executor.execute(request, ReplayableBody.empty());

    expect(transport).toHaveBeenCalledTimes(2);
    expect(result?.classification.verdict).toBe('success');
  });

  it('sends once when the response headers time out', async () => {
    const headersTimeout = new TypeError('fetch failed', {
      cause: Object.assign(new Error('Headers Timeout Error'), { code: 'UND_ERR_HEADERS_TIMEOUT' }),
    });
    const transport = scriptedTransport(headersTimeout, rawResponse(200));
    const sleep = noSleep();
    const executor = new RetryExecutor(transport, { sleep });

    const result = await executor.execute(request, ReplayableBody.empty());

    expect(transport).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(result?.outcome.error?.transportKind).toBe('timeout');
    expect(result?.classification.verdict).toBe('terminal');
  });

  it('does not retry when its own attempt deadline fires', async () => {
    const deadline = new Error('The operation was aborted due to timeout');
    deadline.name = 'TimeoutError';
    const transport = scriptedTransport(deadline, rawResponse(200));
    const executor = new RetryExecutor(transport, { sleep: noSleep() });

    const result = await executor.execute(request, ReplayableBody.empty());

    expect(transport).toHaveBeenCalledTimes(1);
    expect(result?.classification.verdict).toBe('terminal');
  });

  it('treats a throwing predicate as do-not-retry', async () => {
    const logger = createLogger();
    const transport = scriptedTransport(rawResponse(429), rawResponse(200));
    const executor = new RetryExecutor(transport, {
      sleep: noSleep(),
      logger,
      shouldRetry: () => {
        throw new Error('predicate broke');
      },
    });

    const result = await executor.execute(request, ReplayableBody.empty());

    expect(transport).toHaveBeenCalledTimes(1);
    expect(result?.classification).toEqual({ verdict: 'terminal', message: 'Server returned statuscode 429' });
    expect(logger.warn).toHaveBeenCalledWith('http.request.retry_predicate_error', {
      status: 429,
      error: 'predicate broke',
    });
  });

  it('does not retry a refused connection', async () => {
    const refused = new TypeError('fetch failed', {
      cause: Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:443'), { code: 'ECONNREFUSED' }),
    });
    const transport = scriptedTransport(refused);
    const executor = new RetryExecutor(transport, { sleep: noSleep() });

    const result = await executor.execute(request, ReplayableBody.empty());

    expect(transport).toHaveBeenCalledTimes(1);
    expect(result?.outcome.status).toBe(0);
    expect(result?.outcome.response).toBeUndefined();
    expect(result?.outcome.error).toBeInstanceOf(TransportError);
    expect(result?.outcome.error?.transportKind).toBe('connection');
    expect(result?.classification).toEqual({ verdict: 'terminal', message: 'fetch failed' });
  });

  it('re-sends identical bytes on every attempt', async () => {
    const seen: Array<{ attempt: number; body?: string }> = [];
    const transport = scriptedTransport(rawResponse(503), rawResponse(200));
    transport.mockImplementationOnce(async (req) => {
      seen.push({ attempt: req.attempt, body: bodyText(req) });
      req.body?.fill(0);
      return rawResponse(503);
    });
    transport.mockImplementationOnce(async (req) => {
      seen.push({ attempt: req.attempt, body: bodyText(req) });
      return rawResponse(200);
    });
    const body = await ReplayableBody.capture(singleUseStream('{"id":', '1}'));
    const executor = new RetryExecutor(transport, { sleep: noSleep() });

    await executor.execute(request, body);

    expect(seen).toEqual([
      { attempt: 1, body: '{"id":1}' },
      { attempt: 2, body: '{"id":1}' },
    ]);
    expect(body.attempts).toBe(2);
  });

  it('logs each retry', async () => {
    const logger = createLogger();
    const transport = scriptedTransport(rawResponse(503), rawResponse(200));
    const executor = new RetryExecutor(transport, { sleep: noSleep(), random: () => 0.25, logger });

    await executor.execute(request, ReplayableBody.empty(), 3);

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith('http.request.retry', {
      method: 'POST',
      url: 'https://api.example.com/items',
      retry: 1,
      maxRetries: 3,
      delayMs: 1250,
    });
  });
});
