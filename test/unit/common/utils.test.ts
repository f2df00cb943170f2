import { chunk, delay, isValidAddress, raceAbort, sampleWithoutReplacement, splitEvenly } from '../../../src/common/utils';
import { CancelledError } from '../../../src/common/errors';

describe('utils', () => {
  describe('isValidAddress', () => {
    it('accepts IPv4 addresses and hostnames', () => {
      expect(isValidAddress('10.0.0.1')).toBe(true);
      expect(isValidAddress('db-primary.internal')).toBe(true);
    });

    it('rejects out-of-range octets and malformed hosts', () => {
      expect(isValidAddress('300.1.1.1')).toBe(false);
      expect(isValidAddress('bad host')).toBe(false);
      expect(isValidAddress('')).toBe(false);
    });
  });

  describe('splitEvenly', () => {
    it('gives the remainder to the first shares', () => {
      expect(splitEvenly(10, 3)).toEqual([4, 3, 3]);
      expect(splitEvenly(1000, 2)).toEqual([500, 500]);
    });

    it('handles zero totals and zero parts', () => {
      expect(splitEvenly(0, 2)).toEqual([0, 0]);
      expect(splitEvenly(5, 0)).toEqual([]);
    });
  });

  describe('chunk', () => {
    it('splits into fixed-size pieces with a short tail', () => {
      expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
      expect(chunk([], 3)).toEqual([]);
    });
  });

  describe('sampleWithoutReplacement', () => {
    it('draws distinct elements using the supplied random source', () => {
      expect(sampleWithoutReplacement([1, 2, 3, 4], 2, () => 0)).toEqual([1, 2]);
      expect(sampleWithoutReplacement([1, 2, 3, 4], 2, () => 0.99)).toEqual([4, 1]);
    });

    it('never returns more than the population', () => {
      expect(sampleWithoutReplacement(['a', 'b'], 5, () => 0)).toEqual(['a', 'b']);
    });
  });

  describe('delay', () => {
    it('resolves after the interval', async () => {
      await expect(delay(5)).resolves.toBeUndefined();
    });

    it('rejects with CancelledError when the signal aborts', async () => {
      const controller = new AbortController();
      const pending = delay(10000, controller.signal, 'settle');
      controller.abort('stop');

      const error = await pending.catch((reason: unknown) => reason);
      expect(error).toBeInstanceOf(CancelledError);
      expect(error).toMatchObject({ stage: 'settle', message: 'run cancelled: stop' });
    });
  });

  describe('raceAbort', () => {
    it('returns the operation result when no abort happens', async () => {
      const controller = new AbortController();
      await expect(raceAbort(Promise.resolve(7), controller.signal, 'read')).resolves.toBe(7);
    });

    it('abandons a stuck operation when the signal aborts', async () => {
      const controller = new AbortController();
      const pending = raceAbort(new Promise<number>(() => undefined), controller.signal, 'read');
      controller.abort('deadline');

      await expect(pending).rejects.toMatchObject({ name: 'CancelledError', stage: 'read' });
    });

    it('rejects immediately on an already aborted signal', async () => {
      const controller = new AbortController();
      controller.abort('early');
      await expect(raceAbort(Promise.resolve(1), controller.signal, 'write')).rejects.toBeInstanceOf(CancelledError);
    });
  });
});
