// libs/messaging/test/unit/messaging.service.spec.ts
import { OrderStatus } from '@app/common/enums/order-status.enum';
import { REDIS_CLIENT } from '@app/database/redis/redis.module';
import { DriverEvents, EventPayloadMap, MESSAGING_OPTIONS, MessagingService, OrderEvents } from '@app/messaging';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { Test, TestingModule } from '@nestjs/testing';

type MessageListener = (channel: string, message: string) => void;

const createMockRedisConnection = () => ({
  connect: jest.fn<Promise<void>, []>().mockResolvedValue(undefined),
  subscribe: jest.fn<Promise<number>, string[]>().mockResolvedValue(4),
  publish: jest.fn<Promise<number>, [string, string]>().mockResolvedValue(1),
  on: jest.fn<unknown, [string, MessageListener]>(),
  quit: jest.fn<Promise<string>, []>().mockResolvedValue('OK'),
});

const statusChanged: EventPayloadMap[OrderEvents.STATUS_CHANGED] = {
  orderId: 'order-1',
  customerId: 'customer-123',
  driverId: 'driver-123',
  oldStatus: OrderStatus.PENDING,
  status: OrderStatus.ACCEPTED,
  actorId: 'driver-123',
  occurredAt: '2024-03-01T10:00:00.000Z',
};

describe('MessagingService', () => {
  let module: TestingModule;
  let service: MessagingService;

  const compile = async (redis: unknown) => {
    module = await Test.createTestingModule({
      imports: [EventEmitterModule.forRoot()],
      providers: [
        MessagingService,
        { provide: MESSAGING_OPTIONS, useValue: { serviceName: 'dispatch-service-test' } },
        { provide: REDIS_CLIENT, useValue: redis },
      ],
    }).compile();
    service = module.get<MessagingService>(MessagingService);
  };

  afterEach(async () => {
    await module.close();
    jest.clearAllMocks();
  });

  describe('local mode', () => {
    beforeEach(async () => {
      await compile(null);
      await module.init();
    });

    it('should deliver published events to local listeners', async () => {
      // Arrange
      const listener = jest.fn();
      service.onLocal(OrderEvents.STATUS_CHANGED, listener);

      // Act
      await service.publish(OrderEvents.STATUS_CHANGED, statusChanged);

      // Assert
      expect(listener).toHaveBeenCalledWith(statusChanged);
      expect(service.isRelayReady()).toBe(false);
    });

    it('should only notify listeners of the emitted event', () => {
      // Arrange
      const orderListener = jest.fn();
      const driverListener = jest.fn();
      service.onLocal(OrderEvents.CREATED, orderListener);
      service.onLocal(DriverEvents.LOCATION_UPDATED, driverListener);

      // Act
      service.emitLocal(DriverEvents.LOCATION_UPDATED, {
        driverId: 'driver-123',
        latitude: 33.51,
        longitude: 36.29,
        timestamp: '2024-03-01T10:00:00.000Z',
      });

      // Assert
      expect(driverListener).toHaveBeenCalledTimes(1);
      expect(orderListener).not.toHaveBeenCalled();
    });
  });

  describe('redis relay', () => {
    let publisher: ReturnType<typeof createMockRedisConnection>;
    let subscriber: ReturnType<typeof createMockRedisConnection>;

    const relayedListener = (): MessageListener => {
      const registration = subscriber.on.mock.calls.find(([name]) => name === 'message');
      if (!registration) {
        throw new Error('No message listener registered');
      }
      return registration[1];
    };

    beforeEach(async () => {
      publisher = createMockRedisConnection();
      subscriber = createMockRedisConnection();
      await compile({ ...publisher, duplicate: jest.fn().mockReturnValue(subscriber) });
      await module.init();
    });

    it('should subscribe to every event channel on init', () => {
      // Assert
      expect(publisher.connect).toHaveBeenCalled();
      expect(subscriber.connect).toHaveBeenCalled();
      expect(subscriber.subscribe).toHaveBeenCalledWith(
        'dispatch:order.created',
        'dispatch:order.status_changed',
        'dispatch:order.recipient_location_submitted',
        'dispatch:driver.location_updated',
      );
      expect(service.isRelayReady()).toBe(true);
    });

    it('should relay published events after delivering them locally', async () => {
      // Arrange
      const listener = jest.fn();
      service.onLocal(OrderEvents.STATUS_CHANGED, listener);

      // Act
      await service.publish(OrderEvents.STATUS_CHANGED, statusChanged);

      // Assert
      expect(listener).toHaveBeenCalledWith(statusChanged);
      expect(publisher.publish).toHaveBeenCalledWith('dispatch:order.status_changed', expect.any(String));
      const [, raw] = publisher.publish.mock.calls[0];
      expect(JSON.parse(raw)).toEqual({
        event: OrderEvents.STATUS_CHANGED,
        payload: statusChanged,
        source: expect.any(String),
      });
    });

    it('should re-emit events relayed by other instances', () => {
      // Arrange
      const listener = jest.fn();
      service.onLocal(OrderEvents.STATUS_CHANGED, listener);
      const message = JSON.stringify({ event: OrderEvents.STATUS_CHANGED, payload: statusChanged, source: 'instance-b' });

      // Act
      relayedListener()('dispatch:order.status_changed', message);

      // Assert
      expect(listener).toHaveBeenCalledWith(statusChanged);
    });

    it('should ignore its own relayed events', async () => {
      // Arrange
      const listener = jest.fn();
      await service.publish(OrderEvents.STATUS_CHANGED, statusChanged);
      const [channel, raw] = publisher.publish.mock.calls[0];
      service.onLocal(OrderEvents.STATUS_CHANGED, listener);

      // Act
      relayedListener()(channel, raw);

      // Assert
      expect(listener).not.toHaveBeenCalled();
    });

    it('should discard malformed or misrouted messages', () => {
      // Arrange
      const listener = jest.fn();
      service.onLocal(OrderEvents.STATUS_CHANGED, listener);
      const misrouted = JSON.stringify({ event: OrderEvents.STATUS_CHANGED, payload: statusChanged, source: 'instance-b' });

      // Act
      relayedListener()('dispatch:order.status_changed', 'not-json');
      relayedListener()('dispatch:order.status_changed', JSON.stringify({ event: 'order.unknown', payload: {}, source: 'b' }));
      relayedListener()('dispatch:order.created', misrouted);

      // Assert
      expect(listener).not.toHaveBeenCalled();
    });

    it('should rethrow relay failures', async () => {
      // Arrange
      publisher.publish.mockRejectedValue(new Error('READONLY'));

      // Act & Assert
      await expect(service.publish(OrderEvents.STATUS_CHANGED, statusChanged)).rejects.toThrow('READONLY');
    });

    it('should quit both connections on shutdown', async () => {
      // Act
      await service.onModuleDestroy();

      // Assert
      expect(publisher.quit).toHaveBeenCalled();
      expect(subscriber.quit).toHaveBeenCalled();
    });
  });

  describe('relay connection failure', () => {
    it('should fall back to local delivery', async () => {
      // Arrange
      const publisher = createMockRedisConnection();
      publisher.connect.mockRejectedValue(new Error('ECONNREFUSED'));
      await compile({ ...publisher, duplicate: jest.fn().mockReturnValue(createMockRedisConnection()) });
      await module.init();
      const listener = jest.fn();
      service.onLocal(OrderEvents.STATUS_CHANGED, listener);

      // Act
      await service.publish(OrderEvents.STATUS_CHANGED, statusChanged);

      // Assert
      expect(service.isRelayReady()).toBe(false);
      expect(listener).toHaveBeenCalledWith(statusChanged);
      expect(publisher.publish).not.toHaveBeenCalled();
    });
  });
});
