import { IsLatitude, IsLongitude } from 'class-validator';

export class DriverLocationDto {
  @IsLatitude()
  latitude!: number;

  @IsLongitude()
  longitude!: number;
}
