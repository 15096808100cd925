import { UserRole } from '@app/common/enums/user-role.enum';
import { GatewayIdentityVerifier } from '@app/common/guards/gateway-identity.verifier';
import { AuthenticatedUser } from '@app/common/interfaces/authenticated-user.interface';
import { DriverEvents, MessagingService } from '@app/messaging';
import { Logger } from '@nestjs/common';
import {
  ConnectedSocket,
  MessageBody,
  OnGatewayConnection,
  OnGatewayDisconnect,
  SubscribeMessage,
  WebSocketGateway,
  WebSocketServer,
} from '@nestjs/websockets';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { Server, Socket } from 'socket.io';
import { DriverLocationDto } from '../wallet/dto/driver-location.dto';
import { ConnectionRegistry } from './connection-registry.service';
import { RealtimeConnection, RealtimeMessage } from './realtime.types';

// The parts of a socket.io socket the gateway relies on
export type RealtimeClient = Pick<Socket, 'id' | 'connected' | 'emit' | 'disconnect'> & {
  handshake: Pick<Socket['handshake'], 'headers' | 'address'>;
  // Underlying engine.io transport; emits 'packet' for every inbound packet, heartbeat pongs included
  conn: { on(event: 'packet', listener: () => void): unknown };
};

@WebSocketGateway({
  cors: {
    origin: '*',
  },
  pingTimeout: 60000,
  pingInterval: 25000,
})
export class RealtimeGateway implements OnGatewayConnection, OnGatewayDisconnect {
  private readonly logger = new Logger(RealtimeGateway.name);

  @WebSocketServer()
  server!: Server;

  constructor(
    private readonly registry: ConnectionRegistry,
    private readonly identityVerifier: GatewayIdentityVerifier,
    private readonly messagingService: MessagingService,
  ) {}

  handleConnection(client: RealtimeClient): void {
    let identity: AuthenticatedUser;
    try {
      identity = this.identityVerifier.resolve(client.handshake.headers);
    } catch (error) {
      this.logger.warn(
        `Rejected connection ${client.id} from ${client.handshake.address}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      this.emit(client, { type: 'error', data: { message: 'Unauthorized' } });
      client.disconnect(true);
      return;
    }

    this.registry.register(this.toConnection(client), identity);
    client.conn.on('packet', () => this.registry.touch(client.id));
    this.emit(client, { type: 'connected', data: { user_id: identity.userId, role: identity.role } });
  }

  handleDisconnect(client: RealtimeClient): void {
    this.registry.unregister(client.id);
  }

  @SubscribeMessage('driver_location')
  async handleDriverLocation(@ConnectedSocket() client: RealtimeClient, @MessageBody() body: unknown): Promise<void> {
    const identity = this.registry.getIdentity(client.id);
    if (!identity || identity.role !== UserRole.DRIVER) {
      this.emit(client, { type: 'error', data: { message: 'Only drivers can report a location' } });
      return;
    }
    this.registry.touch(client.id);

    const location = plainToInstance(DriverLocationDto, this.unwrap(body));
    if (validateSync(location).length > 0) {
      this.emit(client, { type: 'error', data: { message: 'Invalid latitude or longitude' } });
      return;
    }

    try {
      await this.messagingService.publish(DriverEvents.LOCATION_UPDATED, {
        driverId: identity.userId,
        latitude: location.latitude,
        longitude: location.longitude,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      this.logger.error(`Failed to publish location of driver ${identity.userId}:`, error);
    }
  }

  @SubscribeMessage('get_driver_locations')
  handleGetDriverLocations(@ConnectedSocket() client: RealtimeClient): void {
    const identity = this.registry.getIdentity(client.id);
    if (!identity || identity.role !== UserRole.ADMIN) {
      this.emit(client, { type: 'error', data: { message: 'Only admins can list driver locations' } });
      return;
    }
    this.registry.touch(client.id);
    this.emit(client, { type: 'driver_locations', data: this.registry.getDriverLocations() });
  }

  @SubscribeMessage('ping')
  handlePing(@ConnectedSocket() client: RealtimeClient): void {
    this.registry.touch(client.id);
    this.emit(client, { type: 'pong', data: { timestamp: new Date().toISOString() } });
  }

  private toConnection(client: RealtimeClient): RealtimeConnection {
    return {
      id: client.id,
      send: message => {
        if (!client.connected) {
          throw new Error('socket is disconnected');
        }
        this.emit(client, message);
      },
      close: () => {
        client.disconnect(true);
      },
    };
  }

  private emit(client: RealtimeClient, message: RealtimeMessage): void {
    client.emit(message.type, message);
  }

  // Accepts both the bare payload and the {type, data} envelope
  private unwrap(body: unknown): unknown {
    if (typeof body === 'object' && body !== null && Reflect.has(body, 'data')) {
      return Reflect.get(body, 'data');
    }
    return body;
  }
}
