import { WALLET_CONSTANTS } from '@app/common/constants/price.constant';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';

export class TransactionQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(WALLET_CONSTANTS.MAX_TRANSACTION_LIMIT)
  limit?: number;
}
