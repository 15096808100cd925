import { Order } from '@app/common/entities/order.entity';
import { OrderStatus, isTerminalStatus } from '@app/common/enums/order-status.enum';
import { OrderType } from '@app/common/enums/order-type.enum';
import { UserRole } from '@app/common/enums/user-role.enum';
import {
  DomainValidationException,
  InsufficientBalanceException,
  InvalidTransitionException,
  NotAuthorizedException,
  OrderNotAvailableException,
  OrderNotFoundException,
} from '@app/common/exceptions/dispatch.exception';
import { AuthenticatedUser } from '@app/common/interfaces/authenticated-user.interface';
import { formatMinorUnits } from '@app/common/utils/money.util';
import { PostgresService } from '@app/database';
import { EventPayloadMap, MessagingEvent, MessagingService, OrderEvents } from '@app/messaging';
import { Injectable, Logger } from '@nestjs/common';
import { randomBytes } from 'crypto';
import { AuditLogService } from '../audit/audit-log.service';
import { MapsService } from '../pricing/maps.service';
import { Coordinates } from '../pricing/maps.types';
import { SettingsService } from '../settings/settings.service';
import { SmsService } from '../sms/sms.service';
import { WalletService } from '../wallet/wallet.service';
import { canTransition, DriverAdvanceStatus } from './order-state-machine';
import { CreateOrderInput, LocationInput, StatusHistoryEntry, toStatusHistoryEntry } from './order.types';
import { OrderChanges, OrderRepository } from './repositories/order.repository';

const RECIPIENT_TOKEN_BYTES = 32;

@Injectable()
export class OrderService {
  private readonly logger = new Logger(OrderService.name);

  constructor(
    private readonly postgres: PostgresService,
    private readonly orderRepository: OrderRepository,
    private readonly auditLogService: AuditLogService,
    private readonly walletService: WalletService,
    private readonly settingsService: SettingsService,
    private readonly mapsService: MapsService,
    private readonly smsService: SmsService,
    private readonly messagingService: MessagingService,
  ) {}

  async createOrder(customer: AuthenticatedUser, type: OrderType, input: CreateOrderInput): Promise<Order> {
    if (customer.role !== UserRole.CUSTOMER) {
      throw new NotAuthorizedException('Only customers can create orders');
    }
    const delivery = type === OrderType.DELIVERY ? this.requireDeliveryDetails(input) : null;

    // Provider calls happen before the transaction so no row is locked while waiting on them
    const pricing = await this.settingsService.getPricing(type);
    const estimatedPriceMinor = await this.mapsService.estimatePrice(
      this.toPoint(input.pickup),
      this.toPoint(input.dropoff),
      pricing.basePriceMinor,
      pricing.pricePerKmMinor,
    );
    const [pickupAddress, dropoffAddress] = await Promise.all([
      this.resolveAddress(input.pickup),
      this.resolveAddress(input.dropoff),
    ]);
    const commissionMinor = await this.settingsService.getDefaultCommission();
    const recipientLocationToken = delivery ? randomBytes(RECIPIENT_TOKEN_BYTES).toString('base64url') : null;

    try {
      const order = await this.postgres.transaction(async tx => {
        const created = await this.orderRepository.create(
          {
            type,
            customerId: customer.userId,
            pickupLatitude: input.pickup.latitude,
            pickupLongitude: input.pickup.longitude,
            pickupAddress,
            dropoffLatitude: input.dropoff.latitude,
            dropoffLongitude: input.dropoff.longitude,
            dropoffAddress,
            estimatedPriceMinor,
            commissionMinor,
            recipientName: delivery ? delivery.recipientName : null,
            recipientPhone: delivery ? delivery.recipientPhone : null,
            itemDescription: delivery ? delivery.itemDescription : null,
            itemPriceMinor: input.itemPriceMinor ?? null,
            recipientLocationToken,
          },
          tx,
        );
        await this.auditLogService.append(
          { orderId: created.id, oldStatus: null, newStatus: OrderStatus.PENDING, actorId: customer.userId },
          tx,
        );
        return created;
      });

      this.logger.log(
        `${type} order ${order.id} created by customer ${customer.userId}, estimated ${formatMinorUnits(estimatedPriceMinor)}`,
      );

      if (delivery && recipientLocationToken) {
        await this.smsService.sendLocationLink(delivery.recipientPhone, recipientLocationToken, order.id);
      }

      await this.publishSafely(OrderEvents.CREATED, {
        orderId: order.id,
        orderType: order.type,
        customerId: order.customerId,
        createdAt: order.createdAt.toISOString(),
      });
      return order;
    } catch (error) {
      this.logger.error(`Error creating ${type} order for customer ${customer.userId}:`, error);
      throw error;
    }
  }

  async listPending(driverId: string): Promise<Order[]> {
    await this.assertCanAccept(driverId);
    return this.orderRepository.findPending();
  }

  async acceptOrder(orderId: string, driverId: string): Promise<Order> {
    await this.assertCanAccept(driverId);

    const order = await this.postgres.transaction(async tx => {
      const updated = await this.orderRepository.updateWithCondition(
        orderId,
        { status: OrderStatus.ACCEPTED, driverId, acceptedAt: new Date() },
        { status: OrderStatus.PENDING },
        tx,
      );
      if (!updated) {
        const current = await this.orderRepository.findById(orderId, tx);
        if (!current) {
          throw new OrderNotFoundException(orderId);
        }
        throw new OrderNotAvailableException(orderId);
      }

      await this.auditLogService.append(
        { orderId, oldStatus: OrderStatus.PENDING, newStatus: OrderStatus.ACCEPTED, actorId: driverId },
        tx,
      );
      return updated;
    });

    this.logger.log(`Order ${orderId} accepted by driver ${driverId}`);
    await this.publishStatusChange(order, OrderStatus.PENDING, driverId);
    return order;
  }

  /**
   * Moves an order forward on behalf of its driver. Completion takes the
   * commission in the same transaction; a declined deduction leaves the
   * order where it was.
   */
  async advanceStatus(
    orderId: string,
    driverId: string,
    newStatus: DriverAdvanceStatus,
    notes?: string,
    finalPriceMinor?: number,
  ): Promise<Order> {
    const current = await this.orderRepository.findById(orderId);
    if (!current) {
      throw new OrderNotFoundException(orderId);
    }
    if (current.driverId !== driverId) {
      throw new NotAuthorizedException('Only the assigned driver can update this order');
    }
    if (!canTransition(current.status, newStatus)) {
      throw new InvalidTransitionException(`Cannot change order status from ${current.status} to ${newStatus}`);
    }

    const changes: OrderChanges = { status: newStatus, ...this.stampFor(newStatus, new Date()) };
    if (newStatus === OrderStatus.COMPLETED) {
      changes.finalPriceMinor = finalPriceMinor ?? current.estimatedPriceMinor;
    }

    const order = await this.postgres.transaction(async tx => {
      const updated = await this.orderRepository.updateWithCondition(
        orderId,
        changes,
        { status: current.status, driverId },
        tx,
      );
      if (!updated) {
        throw new InvalidTransitionException(`Order ${orderId} is no longer ${current.status}`);
      }

      if (newStatus === OrderStatus.COMPLETED && current.commissionMinor > 0) {
        const deduction = await this.walletService.deductCommission(driverId, current.commissionMinor, orderId, tx);
        if (deduction.status === 'declined') {
          throw new InsufficientBalanceException(
            `Wallet balance ${formatMinorUnits(deduction.balanceMinor)} does not cover the commission of ${formatMinorUnits(current.commissionMinor)}`,
          );
        }
      }

      await this.auditLogService.append(
        { orderId, oldStatus: current.status, newStatus, actorId: driverId, notes: notes ?? null },
        tx,
      );
      return updated;
    });

    this.logger.log(`Order ${orderId} moved ${current.status} -> ${newStatus} by driver ${driverId}`);
    await this.publishStatusChange(order, current.status, driverId, notes);
    return order;
  }

  async cancelOrder(orderId: string, actor: AuthenticatedUser, reason?: string): Promise<Order> {
    const current = await this.orderRepository.findById(orderId);
    if (!current) {
      throw new OrderNotFoundException(orderId);
    }
    if (actor.userId !== current.customerId && actor.userId !== current.driverId) {
      throw new NotAuthorizedException('Only the customer or the assigned driver can cancel this order');
    }
    if (isTerminalStatus(current.status)) {
      throw new InvalidTransitionException(`Order ${orderId} is already ${current.status}`);
    }

    const order = await this.postgres.transaction(async tx => {
      const updated = await this.orderRepository.updateWithCondition(
        orderId,
        {
          status: OrderStatus.CANCELLED,
          cancelledAt: new Date(),
          cancelledBy: actor.userId,
          cancellationReason: reason ?? null,
        },
        { status: current.status },
        tx,
      );
      if (!updated) {
        throw new InvalidTransitionException(`Order ${orderId} is no longer ${current.status}`);
      }

      await this.auditLogService.append(
        {
          orderId,
          oldStatus: current.status,
          newStatus: OrderStatus.CANCELLED,
          actorId: actor.userId,
          notes: reason ?? null,
        },
        tx,
      );
      return updated;
    });

    this.logger.log(`Order ${orderId} cancelled by ${actor.role} ${actor.userId}`);
    await this.publishStatusChange(order, current.status, actor.userId, reason);
    return order;
  }

  async getOrder(orderId: string, viewer: AuthenticatedUser): Promise<Order> {
    const order = await this.orderRepository.findById(orderId);
    if (!order) {
      throw new OrderNotFoundException(orderId);
    }
    const involved = viewer.userId === order.customerId || viewer.userId === order.driverId;
    if (!involved && viewer.role !== UserRole.ADMIN) {
      throw new NotAuthorizedException('You are not allowed to view this order');
    }
    return order;
  }

  async getHistory(orderId: string, viewer: AuthenticatedUser): Promise<StatusHistoryEntry[]> {
    await this.getOrder(orderId, viewer);
    const entries = await this.auditLogService.getHistory(orderId);
    return entries.map(toStatusHistoryEntry);
  }

  async listMyOrders(user: AuthenticatedUser): Promise<Order[]> {
    return user.role === UserRole.DRIVER
      ? this.orderRepository.findByDriver(user.userId)
      : this.orderRepository.findByCustomer(user.userId);
  }

  /** Single-use: the link stops working once a location was stored. */
  async submitRecipientLocation(token: string, latitude: number, longitude: number): Promise<Order> {
    const current = await this.orderRepository.findByRecipientToken(token);
    if (!current) {
      throw new OrderNotFoundException(token, 'No order matches this location link');
    }
    if (isTerminalStatus(current.status) || current.recipientLocationSubmittedAt) {
      throw new InvalidTransitionException(`Location for order ${current.id} can no longer be set`);
    }

    const dropoffAddress = await this.mapsService.reverseGeocode({ latitude, longitude });
    const order = await this.orderRepository.updateWithCondition(
      current.id,
      {
        dropoffLatitude: latitude,
        dropoffLongitude: longitude,
        dropoffAddress: dropoffAddress ?? current.dropoffAddress,
        recipientLocationSubmittedAt: new Date(),
      },
      { status: current.status, recipientLocationPending: true },
    );
    if (!order) {
      throw new InvalidTransitionException(`Location for order ${current.id} can no longer be set`);
    }

    this.logger.log(`Recipient location stored for order ${order.id}`);
    await this.publishSafely(OrderEvents.RECIPIENT_LOCATION_SUBMITTED, {
      orderId: order.id,
      customerId: order.customerId,
      driverId: order.driverId,
      status: order.status,
      latitude,
      longitude,
      occurredAt: new Date().toISOString(),
    });
    return order;
  }

  private async assertCanAccept(driverId: string): Promise<void> {
    const eligibility = await this.walletService.canAcceptOrders(driverId);
    if (!eligibility.canAccept) {
      throw new InsufficientBalanceException(
        `Wallet balance ${formatMinorUnits(eligibility.balanceMinor)} is below the required ${formatMinorUnits(eligibility.requiredMinor)}`,
      );
    }
  }

  private requireDeliveryDetails(input: CreateOrderInput) {
    const { recipientName, recipientPhone, itemDescription } = input;
    if (!recipientName || !recipientPhone || !itemDescription) {
      throw new DomainValidationException('Delivery orders need a recipient name, recipient phone and item description');
    }
    return { recipientName, recipientPhone, itemDescription };
  }

  private stampFor(status: DriverAdvanceStatus, now: Date): OrderChanges {
    switch (status) {
      case OrderStatus.PICKED_UP:
        return { pickedUpAt: now };
      case OrderStatus.IN_TRANSIT:
        return { inTransitAt: now };
      case OrderStatus.DELIVERED:
        return { deliveredAt: now };
      case OrderStatus.COMPLETED:
        return { completedAt: now };
    }
  }

  private async resolveAddress(location: LocationInput): Promise<string | null> {
    return location.address ?? this.mapsService.reverseGeocode(this.toPoint(location));
  }

  private toPoint(location: LocationInput): Coordinates {
    return { latitude: location.latitude, longitude: location.longitude };
  }

  private async publishStatusChange(order: Order, oldStatus: OrderStatus, actorId: string, notes?: string): Promise<void> {
    await this.publishSafely(OrderEvents.STATUS_CHANGED, {
      orderId: order.id,
      customerId: order.customerId,
      driverId: order.driverId,
      oldStatus,
      status: order.status,
      actorId,
      notes: notes ?? null,
      occurredAt: new Date().toISOString(),
    });
  }

  // Runs after commit; failures are only logged
  private async publishSafely<T extends MessagingEvent>(event: T, payload: EventPayloadMap[T]): Promise<void> {
    try {
      await this.messagingService.publish(event, payload);
    } catch (error) {
      this.logger.error(`Failed to publish ${event}:`, error);
    }
  }
}
