import { Order } from '@app/common/entities/order.entity';
import { OrderStatus } from '@app/common/enums/order-status.enum';
import { OrderNotFoundException } from '@app/common/exceptions/dispatch.exception';
import { Injectable } from '@nestjs/common';
import { AuditLogService, ChainVerification } from '../audit/audit-log.service';
import { StatusHistoryEntry, toStatusHistoryEntry } from '../order/order.types';
import { OrderRepository } from '../order/repositories/order.repository';
import { RatingService } from '../rating/rating.service';
import { LedgerSummary, WalletService } from '../wallet/wallet.service';

const DEFAULT_LOG_DAYS = 7;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface DriverStats {
  driverId: string;
  totalOrders: number;
  completedOrders: number;
  cancelledOrders: number;
  averageRating: number;
  ratingCount: number;
  walletBalanceMinor: number;
}

export interface DashboardStats extends LedgerSummary {
  since: Date;
  ordersCreated: number;
  ordersCompleted: number;
  activeOrders: number;
}

@Injectable()
export class AdminService {
  constructor(
    private readonly orderRepository: OrderRepository,
    private readonly auditLogService: AuditLogService,
    private readonly walletService: WalletService,
    private readonly ratingService: RatingService,
  ) {}

  async getOrderLogs(days: number = DEFAULT_LOG_DAYS, status?: OrderStatus, now: Date = new Date()): Promise<Order[]> {
    const since = new Date(now.getTime() - days * DAY_MS);
    return this.orderRepository.findLogs({ since, status });
  }

  async getStatusHistory(orderId: string): Promise<StatusHistoryEntry[]> {
    await this.requireOrder(orderId);
    const entries = await this.auditLogService.getHistory(orderId);
    return entries.map(toStatusHistoryEntry);
  }

  async verifyAuditChain(orderId: string): Promise<ChainVerification> {
    await this.requireOrder(orderId);
    return this.auditLogService.verifyChain(orderId);
  }

  async getDriverStats(driverId: string): Promise<DriverStats> {
    const [counts, rating, wallet] = await Promise.all([
      this.orderRepository.countByDriver(driverId),
      this.ratingService.summarizeDriver(driverId),
      this.walletService.getBalance(driverId),
    ]);
    return {
      driverId,
      totalOrders: counts.total,
      completedOrders: counts.completed,
      cancelledOrders: counts.cancelled,
      averageRating: rating.average,
      ratingCount: rating.count,
      walletBalanceMinor: wallet.balanceMinor,
    };
  }

  // Figures since midnight UTC
  async getDashboardStats(now: Date = new Date()): Promise<DashboardStats> {
    const since = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
    const [orders, ledger] = await Promise.all([
      this.orderRepository.countSince(since),
      this.walletService.getLedgerSummary(since),
    ]);
    return {
      since,
      ordersCreated: orders.created,
      ordersCompleted: orders.completed,
      activeOrders: orders.active,
      ...ledger,
    };
  }

  private async requireOrder(orderId: string): Promise<Order> {
    const order = await this.orderRepository.findById(orderId);
    if (!order) {
      throw new OrderNotFoundException(orderId);
    }
    return order;
  }
}
