import { describe, it, expect, vi, afterEach } from 'vitest';
import { debounce } from './debounce';

describe('debounce', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('calls once with the last arguments after the wait', () => {
    vi.useFakeTimers();
    const calls: string[] = [];
    const debounced = debounce((path: string) => calls.push(path), 200);

    debounced('a.wjson');
    vi.advanceTimersByTime(100);
    debounced('b.wjson');
    vi.advanceTimersByTime(199);
    expect(calls).toEqual([]);

    vi.advanceTimersByTime(1);
    expect(calls).toEqual(['b.wjson']);
  });

  it('drops a pending call on cancel', () => {
    vi.useFakeTimers();
    const calls: string[] = [];
    const debounced = debounce((path: string) => calls.push(path), 50);

    debounced('a.wjson');
    debounced.cancel();
    vi.advanceTimersByTime(100);

    expect(calls).toEqual([]);
  });
});
