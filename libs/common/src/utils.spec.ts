import { BrokerTimeoutError } from './errors';
import { errorMessage, sleep, splitCommaList, withTimeout } from './utils';

describe('utils', () => {
  describe('sleep', () => {
    it('should resolve true once the interval elapsed', async () => {
      await expect(sleep(5)).resolves.toBe(true);
    });

    it('should resolve false as soon as a signal aborts', async () => {
      const controller = new AbortController();
      const started = Date.now();

      const waiting = sleep(10000, controller.signal);
      controller.abort();

      await expect(waiting).resolves.toBe(false);
      expect(Date.now() - started).toBeLessThan(1000);
    });

    it('should resolve false immediately for an already aborted signal', async () => {
      const idle = new AbortController();
      const stop = new AbortController();
      stop.abort();

      await expect(sleep(10000, idle.signal, stop.signal)).resolves.toBe(
        false,
      );
    });
  });

  describe('withTimeout', () => {
    it('should pass through a result that arrives in time', async () => {
      await expect(withTimeout(Promise.resolve(42), 100, 'op')).resolves.toBe(
        42,
      );
    });

    it('should reject with BrokerTimeoutError when the deadline passes', async () => {
      const never = new Promise<number>(() => undefined);

      const result = withTimeout(never, 10, 'fetch metadata');

      await expect(result).rejects.toBeInstanceOf(BrokerTimeoutError);
      await expect(result).rejects.toThrow(
        'fetch metadata timed out after 10ms',
      );
    });
  });

  describe('splitCommaList', () => {
    it('should trim entries and keep empty ones', () => {
      expect(splitCommaList(' a, b ,,c')).toEqual(['a', 'b', '', 'c']);
      expect(splitCommaList('')).toEqual(['']);
    });
  });

  it('should describe errors and other thrown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
