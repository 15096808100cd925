import { Order } from '@app/common/entities/order.entity';
import { OrderStatus } from '@app/common/enums/order-status.enum';
import { OrderType } from '@app/common/enums/order-type.enum';
import { parseEnumValue } from '@app/common/utils/enum.util';
import { PostgresService, SqlExecutor } from '@app/database';
import { Injectable } from '@nestjs/common';

interface OrderRow {
  id: string;
  type: string;
  status: string;
  customer_id: string;
  driver_id: string | null;
  pickup_latitude: number;
  pickup_longitude: number;
  pickup_address: string | null;
  dropoff_latitude: number;
  dropoff_longitude: number;
  dropoff_address: string | null;
  estimated_price_minor: string;
  final_price_minor: string | null;
  commission_minor: string;
  recipient_name: string | null;
  recipient_phone: string | null;
  item_description: string | null;
  item_price_minor: string | null;
  recipient_location_token: string | null;
  recipient_location_submitted_at: Date | null;
  created_at: Date;
  accepted_at: Date | null;
  picked_up_at: Date | null;
  in_transit_at: Date | null;
  delivered_at: Date | null;
  completed_at: Date | null;
  cancelled_at: Date | null;
  cancellation_reason: string | null;
  cancelled_by: string | null;
}

interface CountRow {
  total: string;
  completed: string;
  cancelled: string;
}

interface DailyCountRow {
  created: string;
  completed: string;
  active: string;
}

export interface NewOrder {
  type: OrderType;
  customerId: string;
  pickupLatitude: number;
  pickupLongitude: number;
  pickupAddress: string | null;
  dropoffLatitude: number;
  dropoffLongitude: number;
  dropoffAddress: string | null;
  estimatedPriceMinor: number;
  commissionMinor: number;
  recipientName: string | null;
  recipientPhone: string | null;
  itemDescription: string | null;
  itemPriceMinor: number | null;
  recipientLocationToken: string | null;
}

export type OrderChanges = Partial<
  Pick<
    Order,
    | 'status'
    | 'driverId'
    | 'dropoffLatitude'
    | 'dropoffLongitude'
    | 'dropoffAddress'
    | 'finalPriceMinor'
    | 'recipientLocationSubmittedAt'
    | 'acceptedAt'
    | 'pickedUpAt'
    | 'inTransitAt'
    | 'deliveredAt'
    | 'completedAt'
    | 'cancelledAt'
    | 'cancellationReason'
    | 'cancelledBy'
  >
>;

export interface OrderCondition {
  status: OrderStatus;
  driverId?: string;
  recipientLocationPending?: boolean;
}

export interface OrderLogFilter {
  since: Date;
  status?: OrderStatus;
}

export interface DriverOrderCounts {
  total: number;
  completed: number;
  cancelled: number;
}

export interface DailyOrderCounts {
  created: number;
  completed: number;
  active: number;
}

const CHANGE_COLUMNS: ReadonlyArray<readonly [keyof OrderChanges, string]> = [
  ['status', 'status'],
  ['driverId', 'driver_id'],
  ['dropoffLatitude', 'dropoff_latitude'],
  ['dropoffLongitude', 'dropoff_longitude'],
  ['dropoffAddress', 'dropoff_address'],
  ['finalPriceMinor', 'final_price_minor'],
  ['recipientLocationSubmittedAt', 'recipient_location_submitted_at'],
  ['acceptedAt', 'accepted_at'],
  ['pickedUpAt', 'picked_up_at'],
  ['inTransitAt', 'in_transit_at'],
  ['deliveredAt', 'delivered_at'],
  ['completedAt', 'completed_at'],
  ['cancelledAt', 'cancelled_at'],
  ['cancellationReason', 'cancellation_reason'],
  ['cancelledBy', 'cancelled_by'],
];

const ORDER_STATUSES = Object.values(OrderStatus);
const ORDER_TYPES = Object.values(OrderType);
const ACTIVE_STATUSES = [OrderStatus.ACCEPTED, OrderStatus.PICKED_UP, OrderStatus.IN_TRANSIT, OrderStatus.DELIVERED];

@Injectable()
export class OrderRepository {
  constructor(private readonly postgres: PostgresService) {}

  async create(data: NewOrder, db: SqlExecutor = this.postgres): Promise<Order> {
    const result = await db.query<OrderRow>(
      `INSERT INTO orders (
         type, status, customer_id,
         pickup_latitude, pickup_longitude, pickup_address,
         dropoff_latitude, dropoff_longitude, dropoff_address,
         estimated_price_minor, commission_minor,
         recipient_name, recipient_phone, item_description, item_price_minor, recipient_location_token
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16)
       RETURNING *`,
      [
        data.type,
        OrderStatus.PENDING,
        data.customerId,
        data.pickupLatitude,
        data.pickupLongitude,
        data.pickupAddress,
        data.dropoffLatitude,
        data.dropoffLongitude,
        data.dropoffAddress,
        data.estimatedPriceMinor,
        data.commissionMinor,
        data.recipientName,
        data.recipientPhone,
        data.itemDescription,
        data.itemPriceMinor,
        data.recipientLocationToken,
      ],
    );
    return this.toEntity(result.rows[0]);
  }

  async findById(id: string, db: SqlExecutor = this.postgres): Promise<Order | null> {
    const result = await db.query<OrderRow>('SELECT * FROM orders WHERE id = $1', [id]);
    return result.rows.length > 0 ? this.toEntity(result.rows[0]) : null;
  }

  async findByRecipientToken(token: string, db: SqlExecutor = this.postgres): Promise<Order | null> {
    const result = await db.query<OrderRow>('SELECT * FROM orders WHERE recipient_location_token = $1', [token]);
    return result.rows.length > 0 ? this.toEntity(result.rows[0]) : null;
  }

  async findPending(db: SqlExecutor = this.postgres): Promise<Order[]> {
    const result = await db.query<OrderRow>('SELECT * FROM orders WHERE status = $1 ORDER BY created_at DESC', [
      OrderStatus.PENDING,
    ]);
    return result.rows.map(row => this.toEntity(row));
  }

  async findByCustomer(customerId: string, db: SqlExecutor = this.postgres): Promise<Order[]> {
    const result = await db.query<OrderRow>('SELECT * FROM orders WHERE customer_id = $1 ORDER BY created_at DESC', [
      customerId,
    ]);
    return result.rows.map(row => this.toEntity(row));
  }

  async findByDriver(driverId: string, db: SqlExecutor = this.postgres): Promise<Order[]> {
    const result = await db.query<OrderRow>('SELECT * FROM orders WHERE driver_id = $1 ORDER BY created_at DESC', [
      driverId,
    ]);
    return result.rows.map(row => this.toEntity(row));
  }

  async findLogs(filter: OrderLogFilter, db: SqlExecutor = this.postgres): Promise<Order[]> {
    const params: unknown[] = [filter.since];
    let sql = 'SELECT * FROM orders WHERE created_at >= $1';
    if (filter.status) {
      params.push(filter.status);
      sql += ` AND status = $${params.length}`;
    }
    const result = await db.query<OrderRow>(`${sql} ORDER BY created_at DESC`, params);
    return result.rows.map(row => this.toEntity(row));
  }

  /**
   * Compare-and-set on the order row. Returns null when the row no longer
   * matches `expected`; the caller re-reads to tell why. The row stays
   * locked until the surrounding transaction ends.
   */
  async updateWithCondition(
    id: string,
    changes: OrderChanges,
    expected: OrderCondition,
    db: SqlExecutor = this.postgres,
  ): Promise<Order | null> {
    const params: unknown[] = [id, expected.status];
    const assignments: string[] = [];

    for (const [key, column] of CHANGE_COLUMNS) {
      const value = changes[key];
      if (value !== undefined) {
        params.push(value);
        assignments.push(`${column} = $${params.length}`);
      }
    }
    if (assignments.length === 0) {
      throw new Error(`No changes given for order ${id}`);
    }

    let where = 'id = $1 AND status = $2';
    if (expected.driverId !== undefined) {
      params.push(expected.driverId);
      where += ` AND driver_id = $${params.length}`;
    }
    if (expected.recipientLocationPending) {
      where += ' AND recipient_location_submitted_at IS NULL';
    }

    const result = await db.query<OrderRow>(
      `UPDATE orders SET ${assignments.join(', ')} WHERE ${where} RETURNING *`,
      params,
    );
    return result.rows.length > 0 ? this.toEntity(result.rows[0]) : null;
  }

  async countByDriver(driverId: string, db: SqlExecutor = this.postgres): Promise<DriverOrderCounts> {
    const result = await db.query<CountRow>(
      `SELECT COUNT(*) AS total,
              COUNT(*) FILTER (WHERE status = $2) AS completed,
              COUNT(*) FILTER (WHERE status = $3) AS cancelled
       FROM orders WHERE driver_id = $1`,
      [driverId, OrderStatus.COMPLETED, OrderStatus.CANCELLED],
    );
    const row = result.rows[0];
    return { total: Number(row.total), completed: Number(row.completed), cancelled: Number(row.cancelled) };
  }

  async countSince(since: Date, db: SqlExecutor = this.postgres): Promise<DailyOrderCounts> {
    const result = await db.query<DailyCountRow>(
      `SELECT COUNT(*) FILTER (WHERE created_at >= $1) AS created,
              COUNT(*) FILTER (WHERE completed_at >= $1) AS completed,
              COUNT(*) FILTER (WHERE status = ANY($2)) AS active
       FROM orders`,
      [since, ACTIVE_STATUSES],
    );
    const row = result.rows[0];
    return { created: Number(row.created), completed: Number(row.completed), active: Number(row.active) };
  }

  private toEntity(row: OrderRow): Order {
    return {
      id: row.id,
      type: parseEnumValue(ORDER_TYPES, row.type, 'order type'),
      status: parseEnumValue(ORDER_STATUSES, row.status, 'order status'),
      customerId: row.customer_id,
      driverId: row.driver_id,
      pickupLatitude: row.pickup_latitude,
      pickupLongitude: row.pickup_longitude,
      pickupAddress: row.pickup_address,
      dropoffLatitude: row.dropoff_latitude,
      dropoffLongitude: row.dropoff_longitude,
      dropoffAddress: row.dropoff_address,
      estimatedPriceMinor: Number(row.estimated_price_minor),
      finalPriceMinor: row.final_price_minor === null ? null : Number(row.final_price_minor),
      commissionMinor: Number(row.commission_minor),
      recipientName: row.recipient_name,
      recipientPhone: row.recipient_phone,
      itemDescription: row.item_description,
      itemPriceMinor: row.item_price_minor === null ? null : Number(row.item_price_minor),
      recipientLocationToken: row.recipient_location_token,
      recipientLocationSubmittedAt: row.recipient_location_submitted_at,
      createdAt: row.created_at,
      acceptedAt: row.accepted_at,
      pickedUpAt: row.picked_up_at,
      inTransitAt: row.in_transit_at,
      deliveredAt: row.delivered_at,
      completedAt: row.completed_at,
      cancelledAt: row.cancelled_at,
      cancellationReason: row.cancellation_reason,
      cancelledBy: row.cancelled_by,
    };
  }
}
