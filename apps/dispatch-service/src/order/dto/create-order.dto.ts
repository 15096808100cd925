import { WALLET_CONSTANTS } from '@app/common/constants/price.constant';
import { Type } from 'class-transformer';
import { IsInt, IsNotEmpty, IsOptional, IsString, Max, MaxLength, Min, ValidateNested } from 'class-validator';
import { LocationPointDto } from './location-point.dto';

export class CreateTaxiOrderDto {
  @ValidateNested()
  @Type(() => LocationPointDto)
  pickup!: LocationPointDto;

  @ValidateNested()
  @Type(() => LocationPointDto)
  dropoff!: LocationPointDto;
}

export class CreateDeliveryOrderDto extends CreateTaxiOrderDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  recipientName!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(32)
  recipientPhone!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(1000)
  itemDescription!: string;

  // Minor units
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(WALLET_CONSTANTS.MAX_AMOUNT_MINOR)
  itemPriceMinor?: number;
}
