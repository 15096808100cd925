import { Rating } from '@app/common/entities/rating.entity';
import { PostgresService, SqlExecutor } from '@app/database';
import { Injectable } from '@nestjs/common';

interface RatingRow {
  id: string;
  order_id: string;
  customer_id: string;
  driver_id: string;
  score: number;
  comment: string | null;
  created_at: Date;
}

interface AverageRow {
  average: string | null;
  count: string;
}

export type NewRating = Omit<Rating, 'id' | 'createdAt'>;

export interface RatingSummary {
  average: number;
  count: number;
}

@Injectable()
export class RatingRepository {
  constructor(private readonly postgres: PostgresService) {}

  // null when the order already carries a rating
  async createIfAbsent(data: NewRating, db: SqlExecutor = this.postgres): Promise<Rating | null> {
    const result = await db.query<RatingRow>(
      `INSERT INTO ratings (order_id, customer_id, driver_id, score, comment)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (order_id) DO NOTHING
       RETURNING *`,
      [data.orderId, data.customerId, data.driverId, data.score, data.comment],
    );
    return result.rows.length > 0 ? this.toEntity(result.rows[0]) : null;
  }

  async findByOrder(orderId: string, db: SqlExecutor = this.postgres): Promise<Rating | null> {
    const result = await db.query<RatingRow>('SELECT * FROM ratings WHERE order_id = $1', [orderId]);
    return result.rows.length > 0 ? this.toEntity(result.rows[0]) : null;
  }

  async findByDriver(driverId: string, db: SqlExecutor = this.postgres): Promise<Rating[]> {
    const result = await db.query<RatingRow>('SELECT * FROM ratings WHERE driver_id = $1 ORDER BY created_at DESC', [
      driverId,
    ]);
    return result.rows.map(row => this.toEntity(row));
  }

  async findByCustomer(customerId: string, db: SqlExecutor = this.postgres): Promise<Rating[]> {
    const result = await db.query<RatingRow>('SELECT * FROM ratings WHERE customer_id = $1 ORDER BY created_at DESC', [
      customerId,
    ]);
    return result.rows.map(row => this.toEntity(row));
  }

  async summarizeDriver(driverId: string, db: SqlExecutor = this.postgres): Promise<RatingSummary> {
    const result = await db.query<AverageRow>(
      'SELECT AVG(score) AS average, COUNT(*) AS count FROM ratings WHERE driver_id = $1',
      [driverId],
    );
    const row = result.rows[0];
    return { average: row.average === null ? 0 : Number(row.average), count: Number(row.count) };
  }

  private toEntity(row: RatingRow): Rating {
    return {
      id: row.id,
      orderId: row.order_id,
      customerId: row.customer_id,
      driverId: row.driver_id,
      score: row.score,
      comment: row.comment,
      createdAt: row.created_at,
    };
  }
}
