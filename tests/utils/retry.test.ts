import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ExchangeError } from '../../src/errors/index.js';
import { backoffDelay, withRetry, withTimeout } from '../../src/utils/retry.js';
import { ManualClock } from '../helpers/manualClock.js';
import { flush } from '../helpers/async.js';

const noDelay = { attempts: 3, baseDelayMs: 0, maxDelayMs: 0, timeoutMs: 0 };

describe('backoffDelay', () => {
  it('doubles from the base and caps at the max', () => {
    assert.equal(backoffDelay(1, 500, 8000), 500);
    assert.equal(backoffDelay(2, 500, 8000), 1000);
    assert.equal(backoffDelay(4, 500, 8000), 4000);
    assert.equal(backoffDelay(6, 500, 8000), 8000);
  });
});

describe('withRetry', () => {
  it('retries transient failures until success', async () => {
    let calls = 0;
    const result = await withRetry(async () => {
      calls += 1;
      if (calls < 3) throw new ExchangeError('NETWORK', 'socket hang up');
      return 'ok';
    }, noDelay);

    assert.equal(result, 'ok');
    assert.equal(calls, 3);
  });

  it('gives up after the last attempt with the last error', async () => {
    let calls = 0;
    await assert.rejects(
      withRetry(async () => {
        calls += 1;
        throw new ExchangeError('RATE_LIMITED', `limited ${calls}`);
      }, noDelay),
      { message: 'limited 3' },
    );
    assert.equal(calls, 3);
  });

  it('does not retry rejections', async () => {
    let calls = 0;
    await assert.rejects(
      withRetry(async () => {
        calls += 1;
        throw new ExchangeError('REJECTED', 'qty too small');
      }, noDelay),
      (err: unknown) => err instanceof ExchangeError && err.kind === 'REJECTED',
    );
    assert.equal(calls, 1);
  });

  it('waits the backoff delay between attempts', async () => {
    const clock = new ManualClock();
    let calls = 0;
    const pending = withRetry(
      async () => {
        calls += 1;
        if (calls === 1) throw new ExchangeError('TIMEOUT', 'slow');
        return calls;
      },
      { attempts: 2, baseDelayMs: 1000, maxDelayMs: 8000, timeoutMs: 0 },
      clock,
    );

    await flush();
    assert.equal(calls, 1);
    clock.advance(999);
    await flush();
    assert.equal(calls, 1);
    clock.advance(1);
    assert.equal(await pending, 2);
  });
});

describe('withTimeout', () => {
  it('rejects with a TIMEOUT error when the call does not settle', async () => {
    const clock = new ManualClock();
    const pending = withTimeout(() => new Promise<never>(() => undefined), 250, clock, 'getPrice');
    clock.advance(250);
    await assert.rejects(pending, (err: unknown) => {
      return err instanceof ExchangeError && err.kind === 'TIMEOUT' && err.message === 'getPrice timed out after 250ms';
    });
  });

  it('cancels its timer when the call settles first', async () => {
    const clock = new ManualClock();
    assert.equal(await withTimeout(async () => 7, 250, clock, 'x'), 7);
    assert.equal(clock.pending(), 0);
  });
});
