import { runWithTimeout } from '../../src/shared/utils/timeout';

describe('runWithTimeout', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('returns the value and duration of an operation that finishes in time', async () => {
    const times = [100, 130];
    const now = () => times.shift() ?? 130;

    const result = await runWithTimeout(async () => 'done', { timeoutMs: 1000, now });

    expect(result).toEqual({ kind: 'ok', durationMs: 30, value: 'done' });
  });

  it('reports a timeout when the operation takes too long', async () => {
    jest.useFakeTimers();
    const pending = runWithTimeout(() => new Promise<string>(() => undefined), { timeoutMs: 50 });

    await jest.advanceTimersByTimeAsync(50);

    const result = await pending;
    expect(result.kind).toBe('timeout');
  });

  it('rethrows errors raised before the deadline', async () => {
    await expect(
      runWithTimeout(
        async () => {
          throw new Error('delegate failed');
        },
        { timeoutMs: 1000 }
      )
    ).rejects.toThrow('delegate failed');
  });

  it('clears its timer once settled', async () => {
    jest.useFakeTimers();
    await runWithTimeout(async () => 1, { timeoutMs: 1000 });
    expect(jest.getTimerCount()).toBe(0);
  });
});
