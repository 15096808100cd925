import { UserRole } from '@app/common/enums/user-role.enum';

export interface DriverLocationRecord {
  latitude: number;
  longitude: number;
  timestamp: string;
}

export type RealtimeMessage =
  | { type: 'connected'; data: { user_id: string; role: UserRole } }
  | { type: 'new_order'; data: { order_id: string; order_type: string; timestamp: string } }
  | {
      type: 'order_update';
      data: {
        order_id: string;
        status: string;
        timestamp: string;
        old_status?: string | null;
        notes?: string | null;
        recipient_latitude?: number;
        recipient_longitude?: number;
      };
    }
  | { type: 'driver_location'; data: { driver_id: string } & DriverLocationRecord }
  | { type: 'driver_locations'; data: Record<string, DriverLocationRecord> }
  | { type: 'pong'; data: { timestamp: string } }
  | { type: 'error'; data: { message: string } };

export type RealtimeMessageType = RealtimeMessage['type'];

/** Transport-neutral handle on one client connection. */
export interface RealtimeConnection {
  readonly id: string;
  send(message: RealtimeMessage): void;
  close(): void;
}

export interface RealtimeStats {
  totalConnections: number;
  uniqueUsers: number;
  byRole: Record<UserRole, number>;
  trackedDrivers: number;
}

export interface EvictionResult {
  connections: number;
  locations: number;
}
