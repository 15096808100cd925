import { WALLET_CONSTANTS } from '@app/common/constants/price.constant';
import { IsInt, IsNotEmpty, IsString, Max, Min } from 'class-validator';

export class TopUpDto {
  @IsString()
  @IsNotEmpty()
  driverId!: string;

  // Minor units
  @IsInt()
  @Min(1)
  @Max(WALLET_CONSTANTS.MAX_AMOUNT_MINOR)
  amountMinor!: number;
}
