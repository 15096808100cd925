import { WALLET_CONSTANTS } from '@app/common/constants/price.constant';
import { Wallet, WalletTransaction } from '@app/common/entities/wallet.entity';
import { TransactionType } from '@app/common/enums/transaction-type.enum';
import {
  DomainValidationException,
  InvalidTransitionException,
  ResourceNotFoundException,
} from '@app/common/exceptions/dispatch.exception';
import { formatMinorUnits, isPositiveMinorAmount } from '@app/common/utils/money.util';
import { PostgresService, SqlExecutor } from '@app/database';
import { Injectable, Logger } from '@nestjs/common';
import { SettingsService } from '../settings/settings.service';
import { WalletRepository } from './repositories/wallet.repository';

export type DeductionResult =
  | { status: 'declined'; balanceMinor: number }
  | { status: 'deducted'; wallet: Wallet; transaction: WalletTransaction };

export interface LedgerEntryResult {
  wallet: Wallet;
  transaction: WalletTransaction;
}

export interface LedgerSummary {
  commissionCollectedMinor: number;
  commissionRefundedMinor: number;
  topUpsMinor: number;
  eligibleDrivers: number;
}

export interface AcceptEligibility {
  canAccept: boolean;
  balanceMinor: number;
  requiredMinor: number;
}

@Injectable()
export class WalletService {
  private readonly logger = new Logger(WalletService.name);

  constructor(
    private readonly postgres: PostgresService,
    private readonly walletRepository: WalletRepository,
    private readonly settingsService: SettingsService,
  ) {}

  async getOrCreateWallet(userId: string, db?: SqlExecutor): Promise<Wallet> {
    return this.walletRepository.getOrCreate(userId, db);
  }

  async topUp(driverId: string, amountMinor: number, adminId: string): Promise<LedgerEntryResult> {
    if (!isPositiveMinorAmount(amountMinor)) {
      throw new DomainValidationException('Top-up amount must be a positive whole number of minor units');
    }

    try {
      const result = await this.postgres.transaction(async tx => {
        await this.walletRepository.getOrCreate(driverId, tx);
        const wallet = await this.walletRepository.credit(driverId, amountMinor, tx);
        if (!wallet) {
          throw new ResourceNotFoundException(`Wallet for driver ${driverId} not found`);
        }

        const transaction = await this.walletRepository.insertTransaction(
          {
            walletId: wallet.id,
            type: TransactionType.TOP_UP,
            amountMinor,
            description: `Wallet top-up by admin #${adminId}`,
            orderId: null,
            adminId,
          },
          tx,
        );
        return { wallet, transaction };
      });

      this.logger.log(
        `Driver ${driverId} topped up ${formatMinorUnits(amountMinor)} by admin ${adminId}, balance ${formatMinorUnits(result.wallet.balanceMinor)}`,
      );
      return result;
    } catch (error) {
      this.logger.error(`Error topping up wallet for driver ${driverId}:`, error);
      throw error;
    }
  }

  /**
   * Takes the commission for a completed order. An uncovered balance is a
   * `declined` result, not an error; callers decide what to do with it.
   * Pass `tx` to make the deduction part of the caller's transaction.
   */
  async deductCommission(
    driverId: string,
    amountMinor: number,
    orderId: string,
    tx?: SqlExecutor,
  ): Promise<DeductionResult> {
    if (!isPositiveMinorAmount(amountMinor)) {
      throw new DomainValidationException('Commission amount must be a positive whole number of minor units');
    }
    if (!tx) {
      return this.postgres.transaction(innerTx => this.deductCommission(driverId, amountMinor, orderId, innerTx));
    }

    const existing = await this.walletRepository.getOrCreate(driverId, tx);
    const wallet = await this.walletRepository.debitIfSufficient(driverId, amountMinor, tx);
    if (!wallet) {
      this.logger.warn(
        `Commission ${formatMinorUnits(amountMinor)} for order ${orderId} declined, driver ${driverId} balance ${formatMinorUnits(existing.balanceMinor)}`,
      );
      return { status: 'declined', balanceMinor: existing.balanceMinor };
    }

    const transaction = await this.walletRepository.insertTransaction(
      {
        walletId: wallet.id,
        type: TransactionType.DEDUCTION,
        amountMinor,
        description: `Commission for order #${orderId}`,
        orderId,
        adminId: null,
      },
      tx,
    );
    this.logger.log(`Deducted commission ${formatMinorUnits(amountMinor)} for order ${orderId} from driver ${driverId}`);
    return { status: 'deducted', wallet, transaction };
  }

  async refundCommission(orderId: string, adminId: string, reason?: string): Promise<LedgerEntryResult> {
    try {
      return await this.postgres.transaction(async tx => {
        const deduction = await this.walletRepository.findTransactionByOrder(orderId, TransactionType.DEDUCTION, tx);
        if (!deduction) {
          throw new ResourceNotFoundException(`No commission deduction found for order ${orderId}`);
        }

        const refunded = await this.walletRepository.findTransactionByOrder(orderId, TransactionType.REFUND, tx);
        if (refunded) {
          throw new InvalidTransitionException(`Commission for order ${orderId} was already refunded`);
        }

        const wallet = await this.walletRepository.creditWallet(deduction.walletId, deduction.amountMinor, tx);
        if (!wallet) {
          throw new ResourceNotFoundException(`Wallet ${deduction.walletId} not found`);
        }

        const suffix = reason ? `: ${reason}` : '';
        const transaction = await this.walletRepository.insertTransaction(
          {
            walletId: wallet.id,
            type: TransactionType.REFUND,
            amountMinor: deduction.amountMinor,
            description: `Commission refund for order #${orderId}${suffix}`,
            orderId,
            adminId,
          },
          tx,
        );

        this.logger.log(`Refunded commission for order ${orderId} by admin ${adminId}`);
        return { wallet, transaction };
      });
    } catch (error) {
      this.logger.error(`Error refunding commission for order ${orderId}:`, error);
      throw error;
    }
  }

  async canAcceptOrders(driverId: string): Promise<AcceptEligibility> {
    const [wallet, requiredMinor] = await Promise.all([
      this.walletRepository.getOrCreate(driverId),
      this.settingsService.getDefaultCommission(),
    ]);
    return { canAccept: wallet.balanceMinor >= requiredMinor, balanceMinor: wallet.balanceMinor, requiredMinor };
  }

  async getBalance(driverId: string): Promise<Wallet> {
    return this.walletRepository.getOrCreate(driverId);
  }

  async getTransactions(driverId: string, limit: number = WALLET_CONSTANTS.DEFAULT_TRANSACTION_LIMIT): Promise<WalletTransaction[]> {
    const boundedLimit = Math.min(Math.max(Math.trunc(limit), 1), WALLET_CONSTANTS.MAX_TRANSACTION_LIMIT);
    const wallet = await this.walletRepository.getOrCreate(driverId);
    return this.walletRepository.findTransactions(wallet.id, boundedLimit);
  }

  async getLedgerSummary(since: Date): Promise<LedgerSummary> {
    const requiredMinor = await this.settingsService.getDefaultCommission();
    const [commissionCollectedMinor, commissionRefundedMinor, topUpsMinor, eligibleDrivers] = await Promise.all([
      this.walletRepository.sumTransactionsSince(TransactionType.DEDUCTION, since),
      this.walletRepository.sumTransactionsSince(TransactionType.REFUND, since),
      this.walletRepository.sumTransactionsSince(TransactionType.TOP_UP, since),
      this.walletRepository.countWithBalanceAtLeast(requiredMinor),
    ]);
    return { commissionCollectedMinor, commissionRefundedMinor, topUpsMinor, eligibleDrivers };
  }
}
