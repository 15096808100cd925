export enum TransactionType {
  TOP_UP = 'TOP_UP',
  DEDUCTION = 'DEDUCTION',
  REFUND = 'REFUND',
}
