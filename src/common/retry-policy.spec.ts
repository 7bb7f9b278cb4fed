import { RetryPolicy } from './retry-policy';

describe('RetryPolicy', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('returns the first successful result without waiting', async () => {
    const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 100 });
    const operation = jest.fn().mockResolvedValue('done');

    await expect(policy.execute(operation)).resolves.toBe('done');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(operation).toHaveBeenCalledWith(1);
  });

  it('backs off exponentially between attempts', async () => {
    const onRetry = jest.fn();
    const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 100, onRetry });
    const operation = jest
      .fn()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('third time lucky');

    const result = policy.execute(operation);

    await jest.advanceTimersByTimeAsync(99);
    expect(operation).toHaveBeenCalledTimes(1);
    await jest.advanceTimersByTimeAsync(1);
    expect(operation).toHaveBeenCalledTimes(2);
    await jest.advanceTimersByTimeAsync(199);
    expect(operation).toHaveBeenCalledTimes(2);
    await jest.advanceTimersByTimeAsync(1);

    await expect(result).resolves.toBe('third time lucky');
    expect(onRetry.mock.calls.map(([, attempt, wait]) => [attempt, wait])).toEqual([
      [1, 100],
      [2, 200],
    ]);
  });

  it('rethrows the last error once attempts run out', async () => {
    const policy = new RetryPolicy({ maxAttempts: 2, baseDelayMs: 10 });
    const operation = jest
      .fn()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('last'));

    const result = policy.execute(operation);
    const assertion = expect(result).rejects.toThrow('last');
    await jest.advanceTimersByTimeAsync(10);

    await assertion;
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('fails fast when shouldRetry rejects the error', async () => {
    const policy = new RetryPolicy({
      maxAttempts: 5,
      baseDelayMs: 10,
      shouldRetry: (error) => !(error instanceof TypeError),
    });
    const operation = jest.fn().mockRejectedValue(new TypeError('bad input'));

    await expect(policy.execute(operation)).rejects.toThrow('bad input');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('rejects a non-positive attempt count', () => {
    expect(() => new RetryPolicy({ maxAttempts: 0, baseDelayMs: 10 })).toThrow(RangeError);
  });
});
