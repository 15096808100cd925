import { IsOptional, IsString, MaxLength } from 'class-validator';

export class RefundCommissionDto {
  @IsOptional()
  @IsString()
  @MaxLength(500)
  reason?: string;
}
