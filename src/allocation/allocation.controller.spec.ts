import { Test, TestingModule } from '@nestjs/testing';
import { AllocationController } from './allocation.controller';
import { AllocationService } from './allocation.service';
import { MovementReason } from '../movements/movements.types';

describe('AllocationController', () => {
  let controller: AllocationController;

  const mockAllocationService = {
    withdraw: jest.fn(),
    consumeForSale: jest.fn(),
    disposeExpired: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [AllocationController],
      providers: [{ provide: AllocationService, useValue: mockAllocationService }],
    }).compile();

    controller = module.get<AllocationController>(AllocationController);
  });

  it('should withdraw with the given reason', async () => {
    mockAllocationService.withdraw.mockResolvedValue({ productId: 'milk', requested: 2, allocations: [] });

    await controller.withdraw('tenant1', { productId: 'milk', quantity: 2, reason: MovementReason.DAMAGE, note: 'dropped' });

    expect(mockAllocationService.withdraw).toHaveBeenCalledWith('tenant1', 'milk', 2, MovementReason.DAMAGE, 'dropped');
  });

  it('should consume for a sale', async () => {
    await controller.consumeForSale('tenant1', { productId: 'milk', quantity: 1, saleDate: '2024-03-05' });

    expect(mockAllocationService.consumeForSale).toHaveBeenCalledWith('tenant1', 'milk', 1, '2024-03-05');
  });

  it('should dispose expired stock', async () => {
    await controller.disposeExpired('tenant1', {});

    expect(mockAllocationService.disposeExpired).toHaveBeenCalledWith('tenant1', undefined, undefined);
  });
});
