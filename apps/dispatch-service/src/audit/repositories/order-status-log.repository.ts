import { OrderStatusLog } from '@app/common/entities/order-status-log.entity';
import { OrderStatus } from '@app/common/enums/order-status.enum';
import { parseEnumValue } from '@app/common/utils/enum.util';
import { PostgresService, SqlExecutor } from '@app/database';
import { Injectable } from '@nestjs/common';

interface OrderStatusLogRow {
  id: string;
  order_id: string;
  sequence: number;
  old_status: string | null;
  new_status: string;
  actor_id: string;
  notes: string | null;
  created_at: Date;
  previous_hash: string | null;
  hash: string;
}

export type NewOrderStatusLog = Omit<OrderStatusLog, 'id'>;

const ORDER_STATUSES = Object.values(OrderStatus);

@Injectable()
export class OrderStatusLogRepository {
  constructor(private readonly postgres: PostgresService) {}

  async findLatest(orderId: string, db: SqlExecutor = this.postgres): Promise<OrderStatusLog | null> {
    const result = await db.query<OrderStatusLogRow>(
      'SELECT * FROM order_status_logs WHERE order_id = $1 ORDER BY sequence DESC LIMIT 1',
      [orderId],
    );
    return result.rows.length > 0 ? this.toEntity(result.rows[0]) : null;
  }

  async insert(entry: NewOrderStatusLog, db: SqlExecutor = this.postgres): Promise<OrderStatusLog> {
    const result = await db.query<OrderStatusLogRow>(
      `INSERT INTO order_status_logs
         (order_id, sequence, old_status, new_status, actor_id, notes, created_at, previous_hash, hash)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING *`,
      [
        entry.orderId,
        entry.sequence,
        entry.oldStatus,
        entry.newStatus,
        entry.actorId,
        entry.notes,
        entry.createdAt,
        entry.previousHash,
        entry.hash,
      ],
    );
    return this.toEntity(result.rows[0]);
  }

  async findByOrder(orderId: string, db: SqlExecutor = this.postgres): Promise<OrderStatusLog[]> {
    const result = await db.query<OrderStatusLogRow>(
      'SELECT * FROM order_status_logs WHERE order_id = $1 ORDER BY sequence ASC',
      [orderId],
    );
    return result.rows.map(row => this.toEntity(row));
  }

  private toEntity(row: OrderStatusLogRow): OrderStatusLog {
    return {
      id: row.id,
      orderId: row.order_id,
      sequence: row.sequence,
      oldStatus: row.old_status === null ? null : parseEnumValue(ORDER_STATUSES, row.old_status, 'order status'),
      newStatus: parseEnumValue(ORDER_STATUSES, row.new_status, 'order status'),
      actorId: row.actor_id,
      notes: row.notes,
      createdAt: row.created_at,
      previousHash: row.previous_hash,
      hash: row.hash,
    };
  }
}
