/**
 * Tests for auto-refresh polling
 */

import { startPolling } from '../polling';

describe('startPolling', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should run on every interval until stopped', () => {
    const run = jest.fn(async () => {});
    const stop = startPolling(30, () => true, run);

    jest.advanceTimersByTime(90000);
    expect(run).toHaveBeenCalledTimes(3);

    stop();
    jest.advanceTimersByTime(60000);
    expect(run).toHaveBeenCalledTimes(3);
  });

  it('should read the latest state at each tick without restarting the timer', () => {
    let request: { amount: number } | null = null;
    const run = jest.fn(async () => {});
    const stop = startPolling(15, () => request !== null, run);

    jest.advanceTimersByTime(15000);
    expect(run).not.toHaveBeenCalled();

    request = { amount: 10000 };
    jest.advanceTimersByTime(15000);
    expect(run).toHaveBeenCalledTimes(1);

    request = { amount: 20000 };
    jest.advanceTimersByTime(15000);
    expect(run).toHaveBeenCalledTimes(2);

    stop();
  });
});
