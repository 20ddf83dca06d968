/**
 * Tests for NodeTimerScheduler.
 */

import { NodeTimerScheduler } from '../../bridge/timer-scheduler.js';

describe('NodeTimerScheduler', () => {
  let scheduler: NodeTimerScheduler;

  beforeEach(() => {
    jest.useFakeTimers();
    scheduler = new NodeTimerScheduler();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('runs the callback once after the delay', () => {
    const callback = jest.fn();
    scheduler.schedule(100, callback);

    jest.advanceTimersByTime(99);
    expect(callback).not.toHaveBeenCalled();

    jest.advanceTimersByTime(1);
    expect(callback).toHaveBeenCalledTimes(1);

    jest.advanceTimersByTime(1000);
    expect(callback).toHaveBeenCalledTimes(1);
    expect(jest.getTimerCount()).toBe(0);
  });

  it('does not run a cancelled callback', () => {
    const callback = jest.fn();
    const handle = scheduler.schedule(100, callback);

    scheduler.cancel(handle);
    jest.advanceTimersByTime(100);

    expect(callback).not.toHaveBeenCalled();
    expect(jest.getTimerCount()).toBe(0);
  });

  it('ignores cancelling a handle that already ran', () => {
    const callback = jest.fn();
    const handle = scheduler.schedule(10, callback);
    jest.advanceTimersByTime(10);

    expect(() => scheduler.cancel(handle)).not.toThrow();
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('keeps independent handles apart', () => {
    const first = jest.fn();
    const second = jest.fn();
    const firstHandle = scheduler.schedule(50, first);
    scheduler.schedule(50, second);

    scheduler.cancel(firstHandle);
    jest.advanceTimersByTime(50);

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
  });
});
