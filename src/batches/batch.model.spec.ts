import { BadRequestException } from '@nestjs/common';
import { compareFefo, decreaseBatch, increaseBatch } from './batch.model';
import { batch } from '../../test/fixtures';

describe('batch model', () => {
  describe('decreaseBatch', () => {
    it('returns a copy with less stock', () => {
      const source = batch('b1', 'milk', 10, '2024-05-01');

      const result = decreaseBatch(source, 4);

      expect(result.quantity).toBe(6);
      expect(source.quantity).toBe(10);
    });

    it('allows draining the batch to zero', () => {
      expect(decreaseBatch(batch('b1', 'milk', 3, '2024-05-01'), 3).quantity).toBe(0);
    });

    it('refuses to go below zero', () => {
      expect(() => decreaseBatch(batch('b1', 'milk', 3, '2024-05-01'), 4)).toThrow(BadRequestException);
    });

    it.each([0, -1, 1.5, Number.MAX_SAFE_INTEGER + 1])('rejects amount %p', (amount) => {
      expect(() => decreaseBatch(batch('b1', 'milk', 3, '2024-05-01'), amount)).toThrow(BadRequestException);
    });
  });

  describe('increaseBatch', () => {
    it('puts stock back up to the received quantity', () => {
      const drained = batch('b1', 'milk', 10, '2024-05-01', { quantity: 2 });

      expect(increaseBatch(drained, 8).quantity).toBe(10);
    });

    it('refuses to exceed the received quantity', () => {
      const drained = batch('b1', 'milk', 10, '2024-05-01', { quantity: 2 });

      expect(() => increaseBatch(drained, 9)).toThrow(BadRequestException);
    });

    it('rejects a non-positive amount', () => {
      expect(() => increaseBatch(batch('b1', 'milk', 10, '2024-05-01'), 0)).toThrow(BadRequestException);
    });
  });

  describe('compareFefo', () => {
    it('orders by expiry, then by creation', () => {
      const a = batch('a', 'milk', 1, '2024-05-02');
      const b = batch('b', 'milk', 1, '2024-05-01');
      const c = batch('c', 'milk', 1, '2024-05-01');

      expect([a, c, b].sort(compareFefo).map((x) => x.batchId)).toEqual(['b', 'c', 'a']);
    });
  });
});
