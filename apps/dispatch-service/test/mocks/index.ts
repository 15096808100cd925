import { PlatformSettingKey } from '@app/common/constants/platform-setting.constant';
import { Order } from '@app/common/entities/order.entity';
import { OrderStatusLog } from '@app/common/entities/order-status-log.entity';
import { PlatformSetting } from '@app/common/entities/platform-setting.entity';
import { Rating } from '@app/common/entities/rating.entity';
import { Wallet, WalletTransaction } from '@app/common/entities/wallet.entity';
import { OrderStatus } from '@app/common/enums/order-status.enum';
import { OrderType } from '@app/common/enums/order-type.enum';
import { TransactionType } from '@app/common/enums/transaction-type.enum';
import { UserRole } from '@app/common/enums/user-role.enum';
import { AuthenticatedUser } from '@app/common/interfaces/authenticated-user.interface';
import { SqlExecutor } from '@app/database';
import { RealtimeMessage } from '@app/dispatch/realtime/realtime.types';
import { AxiosHeaders, AxiosResponse } from 'axios';
import { EventEmitter } from 'events';
import { IncomingHttpHeaders } from 'http';
import { QueryResult, QueryResultRow } from 'pg';

export const ORDER_ID = '7b0c1f8e-2d1a-4c59-9f3e-1a2b3c4d5e6f';
export const OTHER_ORDER_ID = '0f9e8d7c-6b5a-4e3d-8c2b-1a0f9e8d7c6b';
export const WALLET_ID = '3c8e2a10-5b7d-4f6e-9a1c-2b3d4e5f6a7b';

// Mock identities
export const mockCustomer: AuthenticatedUser = { userId: 'customer-123', role: UserRole.CUSTOMER };
export const mockOtherCustomer: AuthenticatedUser = { userId: 'customer-456', role: UserRole.CUSTOMER };
export const mockDriver: AuthenticatedUser = { userId: 'driver-123', role: UserRole.DRIVER };
export const mockOtherDriver: AuthenticatedUser = { userId: 'driver-456', role: UserRole.DRIVER };
export const mockAdmin: AuthenticatedUser = { userId: 'admin-1', role: UserRole.ADMIN };

// Factory for creating order objects
export class OrderFactory {
  static create(overrides: Partial<Order> = {}): Order {
    return {
      id: ORDER_ID,
      type: OrderType.TAXI,
      status: OrderStatus.PENDING,
      customerId: mockCustomer.userId,
      driverId: null,
      pickupLatitude: 33.5138,
      pickupLongitude: 36.2765,
      pickupAddress: 'Pickup Street 1',
      dropoffLatitude: 33.5,
      dropoffLongitude: 36.3,
      dropoffAddress: 'Dropoff Street 2',
      estimatedPriceMinor: 5_500_000,
      finalPriceMinor: null,
      commissionMinor: 500_000,
      recipientName: null,
      recipientPhone: null,
      itemDescription: null,
      itemPriceMinor: null,
      recipientLocationToken: null,
      recipientLocationSubmittedAt: null,
      createdAt: new Date('2024-01-01T00:00:00.000Z'),
      acceptedAt: null,
      pickedUpAt: null,
      inTransitAt: null,
      deliveredAt: null,
      completedAt: null,
      cancelledAt: null,
      cancellationReason: null,
      cancelledBy: null,
      ...overrides,
    };
  }

  static createDelivery(overrides: Partial<Order> = {}): Order {
    return this.create({
      type: OrderType.DELIVERY,
      recipientName: 'Recipient Name',
      recipientPhone: '+963900000001',
      itemDescription: 'Small parcel',
      recipientLocationToken: 'test-location-token',
      ...overrides,
    });
  }

  static createAccepted(overrides: Partial<Order> = {}): Order {
    return this.create({
      status: OrderStatus.ACCEPTED,
      driverId: mockDriver.userId,
      acceptedAt: new Date('2024-01-01T01:00:00.000Z'),
      ...overrides,
    });
  }

  static createDelivered(overrides: Partial<Order> = {}): Order {
    return this.createAccepted({
      status: OrderStatus.DELIVERED,
      pickedUpAt: new Date('2024-01-01T02:00:00.000Z'),
      deliveredAt: new Date('2024-01-01T03:00:00.000Z'),
      ...overrides,
    });
  }

  static createCompleted(overrides: Partial<Order> = {}): Order {
    return this.createDelivered({
      status: OrderStatus.COMPLETED,
      finalPriceMinor: 5_500_000,
      completedAt: new Date('2024-01-01T04:00:00.000Z'),
      ...overrides,
    });
  }

  static createCancelled(overrides: Partial<Order> = {}): Order {
    return this.create({
      status: OrderStatus.CANCELLED,
      cancelledAt: new Date('2024-01-01T01:00:00.000Z'),
      cancelledBy: mockCustomer.userId,
      ...overrides,
    });
  }
}

export class WalletFactory {
  static create(overrides: Partial<Wallet> = {}): Wallet {
    return {
      id: WALLET_ID,
      userId: mockDriver.userId,
      balanceMinor: 0,
      createdAt: new Date('2024-01-01T00:00:00.000Z'),
      updatedAt: new Date('2024-01-01T00:00:00.000Z'),
      ...overrides,
    };
  }

  static createTransaction(overrides: Partial<WalletTransaction> = {}): WalletTransaction {
    return {
      id: 'transaction-1',
      walletId: WALLET_ID,
      type: TransactionType.TOP_UP,
      amountMinor: 500_000,
      description: `Wallet top-up by admin #${mockAdmin.userId}`,
      orderId: null,
      adminId: mockAdmin.userId,
      createdAt: new Date('2024-01-01T00:00:00.000Z'),
      ...overrides,
    };
  }
}

export class AuditEntryFactory {
  static create(overrides: Partial<OrderStatusLog> = {}): OrderStatusLog {
    return {
      id: 'log-1',
      orderId: ORDER_ID,
      sequence: 1,
      oldStatus: null,
      newStatus: OrderStatus.PENDING,
      actorId: mockCustomer.userId,
      notes: null,
      createdAt: new Date('2024-01-01T00:00:00.000Z'),
      previousHash: null,
      hash: 'hash-1',
      ...overrides,
    };
  }
}

export class RatingFactory {
  static create(overrides: Partial<Rating> = {}): Rating {
    return {
      id: 'rating-1',
      orderId: ORDER_ID,
      customerId: mockCustomer.userId,
      driverId: mockDriver.userId,
      score: 5,
      comment: null,
      createdAt: new Date('2024-01-01T05:00:00.000Z'),
      ...overrides,
    };
  }
}

export class SettingFactory {
  static create(overrides: Partial<PlatformSetting> = {}): PlatformSetting {
    return {
      key: PlatformSettingKey.DEFAULT_COMMISSION,
      value: 500_000,
      updatedAt: new Date('2024-01-01T00:00:00.000Z'),
      updatedBy: mockAdmin.userId,
      ...overrides,
    };
  }
}

// Values DispatchConfigService reports in tests
export const mockDispatchConfig = {
  isProduction: false,
  port: 3000,
  logLevel: 'silent',
  mapsApiKey: 'test-maps-key',
  mapsBaseUrl: 'https://maps.example.test/api',
  pricingTimeoutMs: 5000,
  smsProviderUrl: undefined as string | undefined,
  smsApiKey: 'test-sms-key',
  smsSenderId: 'DISPATCH',
  locationLinkBaseUrl: 'https://app.example.test',
  defaultCommissionMinor: 500_000,
  taxiBasePriceMinor: 500_000,
  taxiPricePerKmMinor: 500_000,
  deliveryBasePriceMinor: 300_000,
  deliveryPricePerKmMinor: 250_000,
  realtimeStaleAfterMs: 600_000,
  messagingRedisEnabled: false,
};

export const createMockDispatchConfig = (overrides: Partial<typeof mockDispatchConfig> = {}) => ({
  ...mockDispatchConfig,
  ...overrides,
});

export const createQueryResult = <R extends QueryResultRow>(rows: R[]): QueryResult<R> => ({
  rows,
  rowCount: rows.length,
  command: 'SELECT',
  oid: 0,
  fields: [],
});

// PostgresService stand-in whose transaction() hands the callback the mock itself
export const createMockPostgresService = () => {
  const query = jest.fn();
  const executor: SqlExecutor = { query };
  return {
    query,
    transaction: jest.fn(async <T>(callback: (tx: SqlExecutor) => Promise<T>): Promise<T> => callback(executor)),
    healthCheck: jest.fn().mockResolvedValue(true),
    executor,
  };
};

export const createMockMessagingService = () => ({
  publish: jest.fn().mockResolvedValue(undefined),
  emitLocal: jest.fn(),
  onLocal: jest.fn(),
  isRelayReady: jest.fn().mockReturnValue(false),
});

export const createMockHttpService = () => ({
  get: jest.fn(),
  post: jest.fn(),
});

export const createAxiosResponse = <T>(data: T, status = 200): AxiosResponse<T> => ({
  data,
  status,
  statusText: 'OK',
  headers: {},
  config: { headers: new AxiosHeaders() },
});

export const createGatewayHeaders = (user: AuthenticatedUser): Record<string, string> => ({
  'x-auth-verified': 'true',
  'x-auth-verified-by': 'api-gateway',
  'x-user-id': user.userId,
  'x-user-roles': JSON.stringify([user.role]),
});

export const createMockConnection = (id: string) => ({
  id,
  send: jest.fn<void, [RealtimeMessage]>(),
  close: jest.fn<void, []>(),
});

// Socket stand-in exposing what RealtimeGateway touches
export const createMockSocket = (id: string, headers: IncomingHttpHeaders) => ({
  id,
  connected: true,
  handshake: { headers, address: '127.0.0.1' },
  conn: new EventEmitter(),
  emit: jest.fn(),
  disconnect: jest.fn(),
});
