import { IsLatitude, IsLongitude } from 'class-validator';

export class RecipientLocationDto {
  @IsLatitude()
  latitude!: number;

  @IsLongitude()
  longitude!: number;
}
