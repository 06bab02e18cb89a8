import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SessionTimer, formatElapsed } from '../SessionTimer.js';

describe('formatElapsed', () => {
  it('1時間未満は mm:ss', () => {
    expect(formatElapsed(0)).toBe('00:00');
    expect(formatElapsed(65_000)).toBe('01:05');
    expect(formatElapsed(3_599_999)).toBe('59:59');
  });

  it('1時間以上は hh:mm:ss', () => {
    expect(formatElapsed(3_600_000)).toBe('01:00:00');
    expect(formatElapsed(3_725_000)).toBe('01:02:05');
  });
});

describe('SessionTimer', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('1秒ごとに経過時間を通知する', () => {
    const onTick = vi.fn();
    const timer = new SessionTimer({ onTick });

    timer.start(null);
    vi.advanceTimersByTime(3000);

    expect(onTick.mock.calls).toEqual([
      [1000, '00:01'],
      [2000, '00:02'],
      [3000, '00:03'],
    ]);
    expect(timer.getElapsedLabel()).toBe('00:03');
  });

  it('最大時間に達したら自動停止を1回だけ呼ぶ', () => {
    const onAutoStop = vi.fn();
    const timer = new SessionTimer({ onAutoStop });

    timer.start(5000);
    vi.advanceTimersByTime(4000);
    expect(onAutoStop).not.toHaveBeenCalled();
    expect(timer.isArmed()).toBe(true);

    vi.advanceTimersByTime(1000);
    expect(onAutoStop).toHaveBeenCalledTimes(1);
    expect(timer.isArmed()).toBe(false);

    vi.advanceTimersByTime(5000);
    expect(onAutoStop).toHaveBeenCalledTimes(1);
  });

  it('解除すると自動停止しない', () => {
    const onAutoStop = vi.fn();
    const timer = new SessionTimer({ onAutoStop });

    timer.start(2000);
    timer.disarm();
    vi.advanceTimersByTime(5000);

    expect(onAutoStop).not.toHaveBeenCalled();
  });

  it('stop は経過時間を保持し、reset は0に戻して通知する', () => {
    const onTick = vi.fn();
    const timer = new SessionTimer({ onTick });

    timer.start(null);
    vi.advanceTimersByTime(2500);
    timer.stop();
    vi.advanceTimersByTime(2000);
    expect(timer.getElapsedMs()).toBe(2500);
    expect(timer.isRunning()).toBe(false);

    timer.reset();
    expect(timer.getElapsedMs()).toBe(0);
    expect(onTick).toHaveBeenLastCalledWith(0, '00:00');
  });
});
