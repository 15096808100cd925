// apps/dispatch-service/test/unit/order/repositories/order.repository.spec.ts
import { OrderStatus } from '@app/common/enums/order-status.enum';
import { OrderType } from '@app/common/enums/order-type.enum';
import { PostgresService } from '@app/database';
import { OrderRepository } from '@app/dispatch/order/repositories/order.repository';
import { Test, TestingModule } from '@nestjs/testing';
import { createMockPostgresService, createQueryResult, ORDER_ID } from '../../../mocks';

describe('OrderRepository', () => {
  let repository: OrderRepository;
  let postgres: ReturnType<typeof createMockPostgresService>;

  const orderRow = {
    id: ORDER_ID,
    type: 'DELIVERY',
    status: 'ACCEPTED',
    customer_id: 'customer-123',
    driver_id: 'driver-123',
    pickup_latitude: 33.5138,
    pickup_longitude: 36.2765,
    pickup_address: 'Pickup Street 1',
    dropoff_latitude: 33.5,
    dropoff_longitude: 36.3,
    dropoff_address: null,
    estimated_price_minor: '5500000',
    final_price_minor: null,
    commission_minor: '500000',
    recipient_name: 'Recipient Name',
    recipient_phone: '+963900000001',
    item_description: 'Small parcel',
    item_price_minor: '1250',
    recipient_location_token: 'test-location-token',
    recipient_location_submitted_at: null,
    created_at: new Date('2024-01-01T00:00:00.000Z'),
    accepted_at: new Date('2024-01-01T01:00:00.000Z'),
    picked_up_at: null,
    in_transit_at: null,
    delivered_at: null,
    completed_at: null,
    cancelled_at: null,
    cancellation_reason: null,
    cancelled_by: null,
  };

  beforeEach(async () => {
    postgres = createMockPostgresService();

    const module: TestingModule = await Test.createTestingModule({
      providers: [OrderRepository, { provide: PostgresService, useValue: postgres }],
    }).compile();

    repository = module.get<OrderRepository>(OrderRepository);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('findById', () => {
    it('should map the row and convert BIGINT strings to numbers', async () => {
      // Arrange
      postgres.query.mockResolvedValue(createQueryResult([orderRow]));

      // Act
      const result = await repository.findById(ORDER_ID);

      // Assert
      expect(postgres.query).toHaveBeenCalledWith('SELECT * FROM orders WHERE id = $1', [ORDER_ID]);
      expect(result).toMatchObject({
        id: ORDER_ID,
        type: OrderType.DELIVERY,
        status: OrderStatus.ACCEPTED,
        driverId: 'driver-123',
        estimatedPriceMinor: 5_500_000,
        finalPriceMinor: null,
        commissionMinor: 500_000,
        itemPriceMinor: 1250,
        recipientLocationToken: 'test-location-token',
      });
    });

    it('should return null when no row matches', async () => {
      // Arrange
      postgres.query.mockResolvedValue(createQueryResult([]));

      // Act
      const result = await repository.findById(ORDER_ID);

      // Assert
      expect(result).toBeNull();
    });

    it('should reject a row with an unknown status', async () => {
      // Arrange
      postgres.query.mockResolvedValue(createQueryResult([{ ...orderRow, status: 'LOST' }]));

      // Act & Assert
      await expect(repository.findById(ORDER_ID)).rejects.toThrow('Unknown order status: LOST');
    });
  });

  describe('create', () => {
    it('should insert a PENDING order through the given executor', async () => {
      // Arrange
      postgres.query.mockResolvedValue(createQueryResult([{ ...orderRow, status: 'PENDING', driver_id: null }]));

      // Act
      const result = await repository.create(
        {
          type: OrderType.TAXI,
          customerId: 'customer-123',
          pickupLatitude: 33.5138,
          pickupLongitude: 36.2765,
          pickupAddress: null,
          dropoffLatitude: 33.5,
          dropoffLongitude: 36.3,
          dropoffAddress: null,
          estimatedPriceMinor: 5_500_000,
          commissionMinor: 500_000,
          recipientName: null,
          recipientPhone: null,
          itemDescription: null,
          itemPriceMinor: null,
          recipientLocationToken: null,
        },
        postgres.executor,
      );

      // Assert
      expect(result.status).toBe(OrderStatus.PENDING);
      const [sql, params] = postgres.query.mock.calls[0];
      expect(sql).toContain('INSERT INTO orders');
      expect(params).toEqual([
        OrderType.TAXI,
        OrderStatus.PENDING,
        'customer-123',
        33.5138,
        36.2765,
        null,
        33.5,
        36.3,
        null,
        5_500_000,
        500_000,
        null,
        null,
        null,
        null,
        null,
      ]);
    });
  });

  describe('updateWithCondition', () => {
    it('should build a guarded UPDATE from the given changes', async () => {
      // Arrange
      const acceptedAt = new Date('2024-01-01T01:00:00.000Z');
      postgres.query.mockResolvedValue(createQueryResult([orderRow]));

      // Act
      await repository.updateWithCondition(
        ORDER_ID,
        { status: OrderStatus.ACCEPTED, driverId: 'driver-123', acceptedAt },
        { status: OrderStatus.PENDING },
      );

      // Assert
      expect(postgres.query).toHaveBeenCalledWith(
        'UPDATE orders SET status = $3, driver_id = $4, accepted_at = $5 WHERE id = $1 AND status = $2 RETURNING *',
        [ORDER_ID, OrderStatus.PENDING, OrderStatus.ACCEPTED, 'driver-123', acceptedAt],
      );
    });

    it('should add the driver and pending-location guards when asked', async () => {
      // Arrange
      const submittedAt = new Date('2024-01-01T01:30:00.000Z');
      postgres.query.mockResolvedValue(createQueryResult([orderRow]));

      // Act
      await repository.updateWithCondition(
        ORDER_ID,
        { recipientLocationSubmittedAt: submittedAt },
        { status: OrderStatus.ACCEPTED, driverId: 'driver-123', recipientLocationPending: true },
      );

      // Assert
      expect(postgres.query).toHaveBeenCalledWith(
        'UPDATE orders SET recipient_location_submitted_at = $3 WHERE id = $1 AND status = $2 AND driver_id = $4 AND recipient_location_submitted_at IS NULL RETURNING *',
        [ORDER_ID, OrderStatus.ACCEPTED, submittedAt, 'driver-123'],
      );
    });

    it('should return null when the guard no longer holds', async () => {
      // Arrange
      postgres.query.mockResolvedValue(createQueryResult([]));

      // Act
      const result = await repository.updateWithCondition(
        ORDER_ID,
        { status: OrderStatus.CANCELLED },
        { status: OrderStatus.PENDING },
      );

      // Assert
      expect(result).toBeNull();
    });

    it('should refuse an empty change set', async () => {
      // Act & Assert
      await expect(repository.updateWithCondition(ORDER_ID, {}, { status: OrderStatus.PENDING })).rejects.toThrow(
        `No changes given for order ${ORDER_ID}`,
      );
      expect(postgres.query).not.toHaveBeenCalled();
    });
  });

  describe('findLogs', () => {
    it('should filter by status when one is given', async () => {
      // Arrange
      const since = new Date('2024-01-01T00:00:00.000Z');
      postgres.query.mockResolvedValue(createQueryResult([]));

      // Act
      await repository.findLogs({ since, status: OrderStatus.CANCELLED });

      // Assert
      expect(postgres.query).toHaveBeenCalledWith(
        'SELECT * FROM orders WHERE created_at >= $1 AND status = $2 ORDER BY created_at DESC',
        [since, OrderStatus.CANCELLED],
      );
    });
  });

  describe('countByDriver', () => {
    it('should convert COUNT strings to numbers', async () => {
      // Arrange
      postgres.query.mockResolvedValue(createQueryResult([{ total: '7', completed: '5', cancelled: '1' }]));

      // Act
      const result = await repository.countByDriver('driver-123');

      // Assert
      expect(result).toEqual({ total: 7, completed: 5, cancelled: 1 });
    });
  });
});
