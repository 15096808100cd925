import { Wallet, WalletTransaction } from '@app/common/entities/wallet.entity';
import { TransactionType } from '@app/common/enums/transaction-type.enum';
import { parseEnumValue } from '@app/common/utils/enum.util';
import { PostgresService, SqlExecutor } from '@app/database';
import { Injectable } from '@nestjs/common';

interface WalletRow {
  id: string;
  user_id: string;
  // BIGINT columns arrive as strings
  balance_minor: string;
  created_at: Date;
  updated_at: Date;
}

interface WalletTransactionRow {
  id: string;
  wallet_id: string;
  type: string;
  amount_minor: string;
  description: string;
  order_id: string | null;
  admin_id: string | null;
  created_at: Date;
}

export type NewWalletTransaction = Omit<WalletTransaction, 'id' | 'createdAt'>;

const TRANSACTION_TYPES = Object.values(TransactionType);

@Injectable()
export class WalletRepository {
  constructor(private readonly postgres: PostgresService) {}

  async getOrCreate(userId: string, db: SqlExecutor = this.postgres): Promise<Wallet> {
    await db.query('INSERT INTO wallets (user_id) VALUES ($1) ON CONFLICT (user_id) DO NOTHING', [userId]);
    const result = await db.query<WalletRow>('SELECT * FROM wallets WHERE user_id = $1', [userId]);
    return this.toWallet(result.rows[0]);
  }

  async findByUserId(userId: string, db: SqlExecutor = this.postgres): Promise<Wallet | null> {
    const result = await db.query<WalletRow>('SELECT * FROM wallets WHERE user_id = $1', [userId]);
    return result.rows.length > 0 ? this.toWallet(result.rows[0]) : null;
  }

  async credit(userId: string, amountMinor: number, db: SqlExecutor = this.postgres): Promise<Wallet | null> {
    const result = await db.query<WalletRow>(
      `UPDATE wallets SET balance_minor = balance_minor + $2, updated_at = NOW()
       WHERE user_id = $1
       RETURNING *`,
      [userId, amountMinor],
    );
    return result.rows.length > 0 ? this.toWallet(result.rows[0]) : null;
  }

  async creditWallet(walletId: string, amountMinor: number, db: SqlExecutor = this.postgres): Promise<Wallet | null> {
    const result = await db.query<WalletRow>(
      `UPDATE wallets SET balance_minor = balance_minor + $2, updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      [walletId, amountMinor],
    );
    return result.rows.length > 0 ? this.toWallet(result.rows[0]) : null;
  }

  /**
   * Single-statement compare-and-decrement: returns null, leaving the row
   * untouched, when the balance does not cover the amount.
   */
  async debitIfSufficient(userId: string, amountMinor: number, db: SqlExecutor = this.postgres): Promise<Wallet | null> {
    const result = await db.query<WalletRow>(
      `UPDATE wallets SET balance_minor = balance_minor - $2, updated_at = NOW()
       WHERE user_id = $1 AND balance_minor >= $2
       RETURNING *`,
      [userId, amountMinor],
    );
    return result.rows.length > 0 ? this.toWallet(result.rows[0]) : null;
  }

  async insertTransaction(data: NewWalletTransaction, db: SqlExecutor = this.postgres): Promise<WalletTransaction> {
    const result = await db.query<WalletTransactionRow>(
      `INSERT INTO wallet_transactions (wallet_id, type, amount_minor, description, order_id, admin_id)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING *`,
      [data.walletId, data.type, data.amountMinor, data.description, data.orderId, data.adminId],
    );
    return this.toTransaction(result.rows[0]);
  }

  async findTransactions(walletId: string, limit: number, db: SqlExecutor = this.postgres): Promise<WalletTransaction[]> {
    const result = await db.query<WalletTransactionRow>(
      'SELECT * FROM wallet_transactions WHERE wallet_id = $1 ORDER BY created_at DESC, id DESC LIMIT $2',
      [walletId, limit],
    );
    return result.rows.map(row => this.toTransaction(row));
  }

  async findTransactionByOrder(
    orderId: string,
    type: TransactionType,
    db: SqlExecutor = this.postgres,
  ): Promise<WalletTransaction | null> {
    const result = await db.query<WalletTransactionRow>(
      'SELECT * FROM wallet_transactions WHERE order_id = $1 AND type = $2',
      [orderId, type],
    );
    return result.rows.length > 0 ? this.toTransaction(result.rows[0]) : null;
  }

  async sumTransactionsSince(
    type: TransactionType,
    since: Date,
    db: SqlExecutor = this.postgres,
  ): Promise<number> {
    const result = await db.query<{ total: string | null }>(
      'SELECT SUM(amount_minor) AS total FROM wallet_transactions WHERE type = $1 AND created_at >= $2',
      [type, since],
    );
    const total = result.rows[0]?.total;
    return total ? Number(total) : 0;
  }

  async countWithBalanceAtLeast(minimumMinor: number, db: SqlExecutor = this.postgres): Promise<number> {
    const result = await db.query<{ count: string }>('SELECT COUNT(*) AS count FROM wallets WHERE balance_minor >= $1', [
      minimumMinor,
    ]);
    return Number(result.rows[0].count);
  }

  private toWallet(row: WalletRow): Wallet {
    return {
      id: row.id,
      userId: row.user_id,
      balanceMinor: Number(row.balance_minor),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  private toTransaction(row: WalletTransactionRow): WalletTransaction {
    return {
      id: row.id,
      walletId: row.wallet_id,
      type: parseEnumValue(TRANSACTION_TYPES, row.type, 'transaction type'),
      amountMinor: Number(row.amount_minor),
      description: row.description,
      orderId: row.order_id,
      adminId: row.admin_id,
      createdAt: row.created_at,
    };
  }
}
