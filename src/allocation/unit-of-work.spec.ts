import { InternalServerErrorException, Logger } from '@nestjs/common';
import { UnitOfWork } from './unit-of-work';
import type { BatchWriter, MovementWriter } from './allocation.types';
import type { BatchDoc } from '../batches/batches.types';
import type { MovementDoc } from '../movements/movements.types';
import { MovementReason } from '../movements/movements.types';
import { decreaseBatch } from '../batches/batch.model';
import { CouchError } from '../../test/in-memory-couch';
import { TENANT, batch } from '../../test/fixtures';

describe('UnitOfWork', () => {
  const logger = new Logger('UnitOfWorkSpec');

  const movementDoc = (quantity: number): MovementDoc => ({
    _id: `${TENANT}:movement:m${quantity}`,
    _rev: '1-a',
    type: 'movement',
    tenantId: TENANT,
    movementId: `m${quantity}`,
    productId: `${TENANT}:product:milk`,
    batchId: `${TENANT}:batch:b1`,
    reason: MovementReason.LOSS,
    quantity,
    note: null,
    occurredAt: '2024-03-01T00:00:00.000Z',
  });

  let batches: { findOne: jest.Mock<Promise<BatchDoc>, [string, string]>; save: jest.Mock<Promise<BatchDoc>, [BatchDoc]> };
  let movements: { append: jest.Mock; revoke: jest.Mock };

  beforeEach(() => {
    batches = { findOne: jest.fn(), save: jest.fn((doc: BatchDoc) => Promise.resolve(doc)) };
    movements = {
      append: jest.fn((_tenant: string, entry: { quantity: number }) => Promise.resolve(movementDoc(entry.quantity))),
      revoke: jest.fn(() => Promise.resolve()),
    };
    jest.spyOn(logger, 'error').mockImplementation(() => undefined);
  });

  const unitOfWork = () => {
    const batchWriter: BatchWriter = batches;
    const movementWriter: MovementWriter = movements;
    return new UnitOfWork(TENANT, batchWriter, movementWriter, logger);
  };

  const stageTake = (uow: UnitOfWork, before: BatchDoc, taken: number) =>
    uow.updateBatch(before, decreaseBatch(before, taken)).appendMovement({
      productId: before.productId,
      batchId: before._id,
      reason: MovementReason.LOSS,
      quantity: taken,
    });

  it('writes batches before movements and returns what was saved', async () => {
    const uow = unitOfWork();
    stageTake(uow, batch('b1', 'milk', 5, '2024-03-10'), 2);

    const result = await uow.commit();

    expect(result.batches.map((b) => b.quantity)).toEqual([3]);
    expect(result.movements.map((m) => m.quantity)).toEqual([2]);
    expect(batches.save.mock.invocationCallOrder[0]).toBeLessThan(movements.append.mock.invocationCallOrder[0]);
  });

  it('reapplies a compensation on top of a concurrent write', async () => {
    const before = batch('b1', 'milk', 10, '2024-03-10');
    const uow = unitOfWork();
    stageTake(uow, before, 4);

    movements.append.mockRejectedValueOnce(new CouchError(500, 'internal_server_error'));
    batches.save
      .mockImplementationOnce((doc) => Promise.resolve(doc))
      .mockRejectedValueOnce(new CouchError(409, 'conflict'));
    // someone sold 1 more after our write
    batches.findOne.mockResolvedValue({ ...before, quantity: 5 });

    await expect(uow.commit()).rejects.toMatchObject({ statusCode: 500 });

    expect(batches.findOne).toHaveBeenCalledWith(TENANT, 'b1');
    expect(batches.save).toHaveBeenCalledTimes(3);
    expect(batches.save.mock.calls[2][0].quantity).toBe(9);
  });

  it('revokes appended movements when a later one fails', async () => {
    const uow = unitOfWork();
    stageTake(uow, batch('b1', 'milk', 5, '2024-03-10'), 2);
    stageTake(uow, batch('b2', 'milk', 5, '2024-03-11'), 1);

    movements.append
      .mockImplementationOnce((_tenant: string, entry: { quantity: number }) => Promise.resolve(movementDoc(entry.quantity)))
      .mockRejectedValueOnce(new CouchError(500, 'internal_server_error'));

    await expect(uow.commit()).rejects.toMatchObject({ statusCode: 500 });

    expect(movements.revoke).toHaveBeenCalledWith(movementDoc(2));
    expect(batches.save.mock.calls.slice(2).map(([doc]) => [doc.batchId, doc.quantity])).toEqual([
      ['b2', 5],
      ['b1', 5],
    ]);
  });

  it('reports a rollback that cannot complete', async () => {
    const uow = unitOfWork();
    stageTake(uow, batch('b1', 'milk', 5, '2024-03-10'), 2);

    movements.append.mockRejectedValueOnce(new CouchError(500, 'internal_server_error'));
    batches.save
      .mockImplementationOnce((doc) => Promise.resolve(doc))
      .mockRejectedValue(new CouchError(503, 'unavailable'));

    await expect(uow.commit()).rejects.toThrow(InternalServerErrorException);
    expect(logger.error).toHaveBeenCalled();
  });
});
