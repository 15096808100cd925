// apps/dispatch-service/test/unit/realtime/realtime.gateway.spec.ts
import { DispatchConfigService } from '@app/common/config/config.service';
import { GatewayIdentityVerifier } from '@app/common/guards/gateway-identity.verifier';
import { ConnectionRegistry } from '@app/dispatch/realtime/connection-registry.service';
import { RealtimeGateway } from '@app/dispatch/realtime/realtime.gateway';
import { DriverEvents, MessagingService } from '@app/messaging';
import { UnauthorizedException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import {
  createGatewayHeaders,
  createMockDispatchConfig,
  createMockMessagingService,
  createMockSocket,
  mockAdmin,
  mockCustomer,
  mockDriver,
} from '../../mocks';

describe('RealtimeGateway', () => {
  let gateway: RealtimeGateway;
  let registry: ConnectionRegistry;
  let identityVerifier: jest.Mocked<GatewayIdentityVerifier>;
  let messagingService: jest.Mocked<MessagingService>;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RealtimeGateway,
        ConnectionRegistry,
        { provide: DispatchConfigService, useValue: createMockDispatchConfig() },
        { provide: GatewayIdentityVerifier, useValue: { resolve: jest.fn() } },
        { provide: MessagingService, useValue: createMockMessagingService() },
      ],
    }).compile();

    gateway = module.get<RealtimeGateway>(RealtimeGateway);
    registry = module.get<ConnectionRegistry>(ConnectionRegistry);
    identityVerifier = module.get(GatewayIdentityVerifier);
    messagingService = module.get(MessagingService);
  });

  afterEach(() => {
    jest.useRealTimers();
    jest.clearAllMocks();
  });

  describe('handleConnection', () => {
    it('should register the caller and confirm the connection', () => {
      // Arrange
      const client = createMockSocket('socket-1', createGatewayHeaders(mockCustomer));
      identityVerifier.resolve.mockReturnValue(mockCustomer);

      // Act
      gateway.handleConnection(client);

      // Assert
      expect(identityVerifier.resolve).toHaveBeenCalledWith(client.handshake.headers);
      expect(registry.getIdentity('socket-1')).toEqual(mockCustomer);
      expect(client.emit).toHaveBeenCalledWith('connected', {
        type: 'connected',
        data: { user_id: 'customer-123', role: 'customer' },
      });
    });

    it('should keep a listening client alive while its transport exchanges heartbeats', () => {
      // Arrange
      jest.useFakeTimers({ now: new Date('2024-01-01T00:00:00.000Z') });
      const client = createMockSocket('socket-1', createGatewayHeaders(mockCustomer));
      identityVerifier.resolve.mockReturnValue(mockCustomer);
      gateway.handleConnection(client);
      jest.setSystemTime(new Date('2024-01-01T00:09:35.000Z'));
      client.conn.emit('packet', { type: 'pong' });

      // Act
      const result = registry.evictStale(new Date('2024-01-01T00:10:00.001Z').getTime());

      // Assert
      expect(result).toEqual({ connections: 0, locations: 0 });
      expect(client.disconnect).not.toHaveBeenCalled();
      expect(registry.sendToIdentity(mockCustomer.userId, { type: 'pong', data: { timestamp: '2024-01-01T00:10:00.001Z' } })).toBe(1);
    });

    it('should evict a client whose transport has gone quiet', () => {
      // Arrange
      jest.useFakeTimers({ now: new Date('2024-01-01T00:00:00.000Z') });
      const client = createMockSocket('socket-1', createGatewayHeaders(mockCustomer));
      identityVerifier.resolve.mockReturnValue(mockCustomer);
      gateway.handleConnection(client);

      // Act
      const result = registry.evictStale(new Date('2024-01-01T00:10:00.001Z').getTime());

      // Assert
      expect(result).toEqual({ connections: 1, locations: 0 });
      expect(client.disconnect).toHaveBeenCalledWith(true);
    });

    it('should reject a handshake without a trusted identity', () => {
      // Arrange
      const client = createMockSocket('socket-1', {});
      identityVerifier.resolve.mockImplementation(() => {
        throw new UnauthorizedException('Request not authenticated by API Gateway');
      });

      // Act
      gateway.handleConnection(client);

      // Assert
      expect(client.emit).toHaveBeenCalledWith('error', { type: 'error', data: { message: 'Unauthorized' } });
      expect(client.disconnect).toHaveBeenCalledWith(true);
      expect(registry.getStats().totalConnections).toBe(0);
    });
  });

  describe('handleDisconnect', () => {
    it('should remove the connection from the registry', () => {
      // Arrange
      const client = createMockSocket('socket-1', {});
      identityVerifier.resolve.mockReturnValue(mockDriver);
      gateway.handleConnection(client);

      // Act
      gateway.handleDisconnect(client);

      // Assert
      expect(registry.getIdentity('socket-1')).toBeNull();
    });
  });

  describe('handleDriverLocation', () => {
    it('should publish a valid location reported by a driver', async () => {
      // Arrange
      const client = createMockSocket('socket-1', {});
      identityVerifier.resolve.mockReturnValue(mockDriver);
      gateway.handleConnection(client);

      // Act
      await gateway.handleDriverLocation(client, { type: 'driver_location', data: { latitude: 33.51, longitude: 36.27 } });

      // Assert
      expect(messagingService.publish).toHaveBeenCalledWith(DriverEvents.LOCATION_UPDATED, {
        driverId: 'driver-123',
        latitude: 33.51,
        longitude: 36.27,
        timestamp: expect.any(String),
      });
    });

    it('should answer with an error for coordinates out of range', async () => {
      // Arrange
      const client = createMockSocket('socket-1', {});
      identityVerifier.resolve.mockReturnValue(mockDriver);
      gateway.handleConnection(client);

      // Act
      await gateway.handleDriverLocation(client, { latitude: 123, longitude: 36.27 });

      // Assert
      expect(messagingService.publish).not.toHaveBeenCalled();
      expect(client.emit).toHaveBeenLastCalledWith('error', {
        type: 'error',
        data: { message: 'Invalid latitude or longitude' },
      });
    });

    it('should refuse locations from a customer', async () => {
      // Arrange
      const client = createMockSocket('socket-1', {});
      identityVerifier.resolve.mockReturnValue(mockCustomer);
      gateway.handleConnection(client);

      // Act
      await gateway.handleDriverLocation(client, { latitude: 33.51, longitude: 36.27 });

      // Assert
      expect(messagingService.publish).not.toHaveBeenCalled();
      expect(client.emit).toHaveBeenLastCalledWith('error', {
        type: 'error',
        data: { message: 'Only drivers can report a location' },
      });
    });
  });

  describe('handleGetDriverLocations', () => {
    it('should return the tracked positions to an admin', () => {
      // Arrange
      const client = createMockSocket('socket-1', {});
      identityVerifier.resolve.mockReturnValue(mockAdmin);
      gateway.handleConnection(client);
      registry.updateDriverLocation('driver-123', 33.51, 36.27, new Date('2024-01-01T00:00:00.000Z'));

      // Act
      gateway.handleGetDriverLocations(client);

      // Assert
      expect(client.emit).toHaveBeenLastCalledWith('driver_locations', {
        type: 'driver_locations',
        data: { 'driver-123': { latitude: 33.51, longitude: 36.27, timestamp: '2024-01-01T00:00:00.000Z' } },
      });
    });

    it('should refuse a driver', () => {
      // Arrange
      const client = createMockSocket('socket-1', {});
      identityVerifier.resolve.mockReturnValue(mockDriver);
      gateway.handleConnection(client);

      // Act
      gateway.handleGetDriverLocations(client);

      // Assert
      expect(client.emit).toHaveBeenLastCalledWith('error', {
        type: 'error',
        data: { message: 'Only admins can list driver locations' },
      });
    });
  });

  describe('handlePing', () => {
    it('should answer with pong', () => {
      // Arrange
      const client = createMockSocket('socket-1', {});

      // Act
      gateway.handlePing(client);

      // Assert
      expect(client.emit).toHaveBeenCalledWith('pong', { type: 'pong', data: { timestamp: expect.any(String) } });
    });
  });
});
