import { TransactionType } from '../enums/transaction-type.enum';

export interface Wallet {
  id: string;
  userId: string;
  balanceMinor: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface WalletTransaction {
  id: string;
  walletId: string;
  type: TransactionType;
  // Always positive, the sign follows from the type
  amountMinor: number;
  description: string;
  orderId: string | null;
  adminId: string | null;
  createdAt: Date;
}
