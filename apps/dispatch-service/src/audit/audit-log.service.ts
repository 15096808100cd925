import { OrderStatusLog } from '@app/common/entities/order-status-log.entity';
import { OrderStatus } from '@app/common/enums/order-status.enum';
import { PostgresService, SqlExecutor } from '@app/database';
import { Injectable, Logger } from '@nestjs/common';
import * as crypto from 'crypto';
import { OrderStatusLogRepository } from './repositories/order-status-log.repository';

export interface AppendAuditEntry {
  orderId: string;
  oldStatus: OrderStatus | null;
  newStatus: OrderStatus;
  actorId: string;
  notes?: string | null;
}

export interface ChainVerification {
  valid: boolean;
  entries: number;
  brokenAt?: number;
}

type HashInput = Omit<OrderStatusLog, 'id' | 'hash'>;

export function computeEntryHash(entry: HashInput): string {
  const material = JSON.stringify([
    entry.previousHash,
    entry.orderId,
    entry.sequence,
    entry.oldStatus,
    entry.newStatus,
    entry.actorId,
    entry.notes,
    entry.createdAt.toISOString(),
  ]);
  return crypto.createHash('sha256').update(material).digest('hex');
}

/**
 * Append-only transition log. Entries are chained by hash and their
 * timestamps are strictly increasing per order. Appends for one order are
 * serialized by the order row lock its caller holds.
 */
@Injectable()
export class AuditLogService {
  private readonly logger = new Logger(AuditLogService.name);

  constructor(
    private readonly postgres: PostgresService,
    private readonly logRepository: OrderStatusLogRepository,
  ) {}

  async append(entry: AppendAuditEntry, tx?: SqlExecutor): Promise<OrderStatusLog> {
    if (!tx) {
      return this.postgres.transaction(innerTx => this.append(entry, innerTx));
    }

    const latest = await this.logRepository.findLatest(entry.orderId, tx);
    const now = Date.now();
    const createdAt = new Date(latest ? Math.max(now, latest.createdAt.getTime() + 1) : now);

    const unsigned: HashInput = {
      orderId: entry.orderId,
      sequence: latest ? latest.sequence + 1 : 1,
      oldStatus: entry.oldStatus,
      newStatus: entry.newStatus,
      actorId: entry.actorId,
      notes: entry.notes ?? null,
      createdAt,
      previousHash: latest ? latest.hash : null,
    };

    const saved = await this.logRepository.insert({ ...unsigned, hash: computeEntryHash(unsigned) }, tx);
    this.logger.debug(
      `Order ${entry.orderId}: ${entry.oldStatus ?? '-'} -> ${entry.newStatus} by ${entry.actorId} (#${saved.sequence})`,
    );
    return saved;
  }

  async getHistory(orderId: string): Promise<OrderStatusLog[]> {
    return this.logRepository.findByOrder(orderId);
  }

  async verifyChain(orderId: string): Promise<ChainVerification> {
    const entries = await this.logRepository.findByOrder(orderId);

    for (let index = 0; index < entries.length; index++) {
      const entry = entries[index];
      const previous = index > 0 ? entries[index - 1] : null;

      const linked = entry.previousHash === (previous ? previous.hash : null) && entry.sequence === index + 1;
      const ordered = !previous || entry.createdAt.getTime() > previous.createdAt.getTime();
      if (!linked || !ordered || entry.hash !== computeEntryHash(entry)) {
        this.logger.warn(`Audit chain for order ${orderId} broken at entry #${entry.sequence}`);
        return { valid: false, entries: entries.length, brokenAt: entry.sequence };
      }
    }

    return { valid: true, entries: entries.length };
  }
}
