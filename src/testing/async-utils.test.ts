import { AbortedError, TimeoutError, linkSignals, raceAbort, sleep, withTimeout } from '../utils/async';
import { deepFreeze, frozenCopy } from '../utils/immutable';
import { delayed } from './support/fakes';

describe('withTimeout', () => {
  it('resolves when the task wins', async () => {
    await expect(withTimeout(delayed(5, 'done'), 200)).resolves.toBe('done');
  });

  it('rejects with TimeoutError and runs the timeout hook', async () => {
    const onTimeout = jest.fn();

    await expect(withTimeout(delayed(200, 'late'), 10, onTimeout)).rejects.toEqual(new TimeoutError(10));
    expect(onTimeout).toHaveBeenCalledTimes(1);
  });

  it('passes task errors through', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 100)).rejects.toThrow('boom');
  });
});

describe('raceAbort', () => {
  it('rejects once the signal aborts', async () => {
    const controller = new AbortController();
    const raced = raceAbort(delayed(200, 'late'), controller.signal);
    controller.abort();

    await expect(raced).rejects.toBeInstanceOf(AbortedError);
  });

  it('rejects immediately for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(raceAbort(Promise.resolve('x'), controller.signal)).rejects.toBeInstanceOf(AbortedError);
  });
});

describe('sleep', () => {
  it('stops early when aborted', async () => {
    const controller = new AbortController();
    const pending = sleep(5000, controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(AbortedError);
  });
});

describe('linkSignals', () => {
  it('aborts the controller when any source aborts', () => {
    const source = new AbortController();
    const target = new AbortController();

    linkSignals(target, [undefined, source.signal]);
    source.abort();

    expect(target.signal.aborted).toBe(true);
  });

  it('stops following sources once unlinked', () => {
    const source = new AbortController();
    const target = new AbortController();

    const unlink = linkSignals(target, [source.signal]);
    unlink();
    source.abort();

    expect(target.signal.aborted).toBe(false);
  });
});

describe('immutability helpers', () => {
  it('freezes nested values', () => {
    const value = deepFreeze({ a: { b: [1, 2] } });

    expect(Object.isFrozen(value.a)).toBe(true);
    expect(Object.isFrozen(value.a.b)).toBe(true);
  });

  it('copies before freezing', () => {
    const original = { symbol: 'BTCUSDT', indicators: { rsi: 50 } };
    const copy = frozenCopy(original);

    expect(copy).toEqual(original);
    expect(Object.isFrozen(original)).toBe(false);
    expect(Object.isFrozen(copy.indicators)).toBe(true);
  });
});
