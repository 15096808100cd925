import { DispatchConfigService } from '@app/common/config/config.service';
import { UserRole } from '@app/common/enums/user-role.enum';
import { AuthenticatedUser } from '@app/common/interfaces/authenticated-user.interface';
import { Injectable, Logger } from '@nestjs/common';
import {
  DriverLocationRecord,
  EvictionResult,
  RealtimeConnection,
  RealtimeMessage,
  RealtimeStats,
} from './realtime.types';

interface RegisteredConnection {
  connection: RealtimeConnection;
  identity: AuthenticatedUser;
  connectedAt: number;
  lastSeen: number;
}

/**
 * Owns every live connection and the last known driver positions. All
 * mutations are synchronous, so concurrent handlers never see a half-applied
 * change.
 */
@Injectable()
export class ConnectionRegistry {
  private readonly logger = new Logger(ConnectionRegistry.name);
  private readonly connections = new Map<string, RegisteredConnection>();
  private readonly connectionsByUser = new Map<string, Set<string>>();
  private readonly driverLocations = new Map<string, DriverLocationRecord>();

  constructor(private readonly config: DispatchConfigService) {}

  register(connection: RealtimeConnection, identity: AuthenticatedUser, now: number = Date.now()): void {
    this.connections.set(connection.id, { connection, identity, connectedAt: now, lastSeen: now });

    const userConnections = this.connectionsByUser.get(identity.userId) ?? new Set<string>();
    userConnections.add(connection.id);
    this.connectionsByUser.set(identity.userId, userConnections);

    this.logger.log(`Registered ${identity.role} ${identity.userId} on connection ${connection.id}`);
  }

  unregister(connectionId: string): boolean {
    const entry = this.connections.get(connectionId);
    if (!entry) {
      return false;
    }

    this.connections.delete(connectionId);
    const userConnections = this.connectionsByUser.get(entry.identity.userId);
    if (userConnections) {
      userConnections.delete(connectionId);
      if (userConnections.size === 0) {
        this.connectionsByUser.delete(entry.identity.userId);
      }
    }

    this.logger.log(`Unregistered connection ${connectionId} of ${entry.identity.userId}`);
    return true;
  }

  getIdentity(connectionId: string): AuthenticatedUser | null {
    return this.connections.get(connectionId)?.identity ?? null;
  }

  sendToIdentity(userId: string, message: RealtimeMessage): number {
    const connectionIds = [...(this.connectionsByUser.get(userId) ?? [])];
    return connectionIds.filter(connectionId => this.deliver(connectionId, message)).length;
  }

  broadcastToRole(role: UserRole, message: RealtimeMessage): number {
    const targets = [...this.connections.values()]
      .filter(entry => entry.identity.role === role)
      .map(entry => entry.connection.id);
    return targets.filter(connectionId => this.deliver(connectionId, message)).length;
  }

  updateDriverLocation(driverId: string, latitude: number, longitude: number, at: Date = new Date()): DriverLocationRecord {
    const record: DriverLocationRecord = { latitude, longitude, timestamp: at.toISOString() };
    this.driverLocations.set(driverId, record);
    this.broadcastToRole(UserRole.ADMIN, { type: 'driver_location', data: { driver_id: driverId, ...record } });
    return record;
  }

  getDriverLocations(): Record<string, DriverLocationRecord> {
    return Object.fromEntries(this.driverLocations);
  }

  touch(connectionId: string, now: number = Date.now()): void {
    const entry = this.connections.get(connectionId);
    if (entry) {
      entry.lastSeen = now;
    }
  }

  evictStale(now: number = Date.now()): EvictionResult {
    const cutoff = now - this.config.realtimeStaleAfterMs;

    const staleConnections = [...this.connections.values()].filter(entry => entry.lastSeen < cutoff);
    for (const entry of staleConnections) {
      this.evict(entry.connection.id, 'stale');
    }

    const staleDrivers = [...this.driverLocations.entries()]
      .filter(([, record]) => Date.parse(record.timestamp) < cutoff)
      .map(([driverId]) => driverId);
    for (const driverId of staleDrivers) {
      this.driverLocations.delete(driverId);
    }

    return { connections: staleConnections.length, locations: staleDrivers.length };
  }

  getStats(): RealtimeStats {
    const byRole: Record<UserRole, number> = {
      [UserRole.CUSTOMER]: 0,
      [UserRole.DRIVER]: 0,
      [UserRole.ADMIN]: 0,
    };
    for (const entry of this.connections.values()) {
      byRole[entry.identity.role] += 1;
    }

    return {
      totalConnections: this.connections.size,
      uniqueUsers: this.connectionsByUser.size,
      byRole,
      trackedDrivers: this.driverLocations.size,
    };
  }

  private deliver(connectionId: string, message: RealtimeMessage): boolean {
    const entry = this.connections.get(connectionId);
    if (!entry) {
      return false;
    }

    try {
      entry.connection.send(message);
      return true;
    } catch (error) {
      this.logger.warn(
        `Send of ${message.type} to connection ${connectionId} failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      this.evict(connectionId, 'send failure');
      return false;
    }
  }

  private evict(connectionId: string, reason: string): void {
    const entry = this.connections.get(connectionId);
    if (!entry) {
      return;
    }

    this.unregister(connectionId);
    try {
      entry.connection.close();
    } catch (error) {
      this.logger.debug(`Closing connection ${connectionId} failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
    this.logger.warn(`Evicted connection ${connectionId} (${reason})`);
  }
}
