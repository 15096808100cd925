import { UserRole } from '@app/common/enums/user-role.enum';
import { DriverEvents, EventPayloadMap, MessagingService, OrderEvents } from '@app/messaging';
import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConnectionRegistry } from './connection-registry.service';
import { RealtimeMessage } from './realtime.types';

@Injectable()
export class RealtimeEventHandler implements OnModuleInit {
  private readonly logger = new Logger(RealtimeEventHandler.name);

  constructor(
    private readonly messagingService: MessagingService,
    private readonly registry: ConnectionRegistry,
  ) {}

  onModuleInit(): void {
    this.messagingService.onLocal(OrderEvents.CREATED, payload =>
      this.guard(OrderEvents.CREATED, () => this.handleOrderCreated(payload)),
    );
    this.messagingService.onLocal(OrderEvents.STATUS_CHANGED, payload =>
      this.guard(OrderEvents.STATUS_CHANGED, () => this.handleStatusChanged(payload)),
    );
    this.messagingService.onLocal(OrderEvents.RECIPIENT_LOCATION_SUBMITTED, payload =>
      this.guard(OrderEvents.RECIPIENT_LOCATION_SUBMITTED, () => this.handleRecipientLocation(payload)),
    );
    this.messagingService.onLocal(DriverEvents.LOCATION_UPDATED, payload =>
      this.guard(DriverEvents.LOCATION_UPDATED, () => this.handleDriverLocation(payload)),
    );
    this.logger.log('Realtime event listeners registered');
  }

  handleOrderCreated(payload: EventPayloadMap[OrderEvents.CREATED]): void {
    const message: RealtimeMessage = {
      type: 'new_order',
      data: { order_id: payload.orderId, order_type: payload.orderType, timestamp: payload.createdAt },
    };
    const drivers = this.registry.broadcastToRole(UserRole.DRIVER, message);
    this.registry.broadcastToRole(UserRole.ADMIN, message);
    this.logger.debug(`new_order ${payload.orderId} delivered to ${drivers} driver connections`);
  }

  handleStatusChanged(payload: EventPayloadMap[OrderEvents.STATUS_CHANGED]): void {
    this.notifyParties(payload.customerId, payload.driverId, {
      type: 'order_update',
      data: {
        order_id: payload.orderId,
        status: payload.status,
        old_status: payload.oldStatus,
        notes: payload.notes ?? null,
        timestamp: payload.occurredAt,
      },
    });
  }

  handleRecipientLocation(payload: EventPayloadMap[OrderEvents.RECIPIENT_LOCATION_SUBMITTED]): void {
    this.notifyParties(payload.customerId, payload.driverId, {
      type: 'order_update',
      data: {
        order_id: payload.orderId,
        status: payload.status,
        recipient_latitude: payload.latitude,
        recipient_longitude: payload.longitude,
        timestamp: payload.occurredAt,
      },
    });
  }

  handleDriverLocation(payload: EventPayloadMap[DriverEvents.LOCATION_UPDATED]): void {
    this.registry.updateDriverLocation(payload.driverId, payload.latitude, payload.longitude, new Date(payload.timestamp));
  }

  private notifyParties(customerId: string, driverId: string | null, message: RealtimeMessage): void {
    this.registry.sendToIdentity(customerId, message);
    if (driverId) {
      this.registry.sendToIdentity(driverId, message);
    }
    this.registry.broadcastToRole(UserRole.ADMIN, message);
  }

  private guard(event: string, handler: () => void): void {
    try {
      handler();
    } catch (error) {
      this.logger.error(`Error handling ${event}:`, error);
    }
  }
}
