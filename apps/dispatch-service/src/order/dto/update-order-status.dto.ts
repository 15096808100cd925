import { WALLET_CONSTANTS } from '@app/common/constants/price.constant';
import { IsIn, IsInt, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';
import { DRIVER_ADVANCE_STATUSES, DriverAdvanceStatus } from '../order-state-machine';

export class UpdateOrderStatusDto {
  @IsIn(DRIVER_ADVANCE_STATUSES)
  status!: DriverAdvanceStatus;

  @IsOptional()
  @IsString()
  @MaxLength(1000)
  notes?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(WALLET_CONSTANTS.MAX_AMOUNT_MINOR)
  finalPriceMinor?: number;
}
