import { HttpModule } from '@nestjs/axios';
import { Module } from '@nestjs/common';
import { MapsService } from './maps.service';

@Module({
  imports: [HttpModule],
  providers: [MapsService],
  exports: [MapsService],
})
export class PricingModule {}
