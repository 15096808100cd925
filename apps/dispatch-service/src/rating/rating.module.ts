import { Module } from '@nestjs/common';
import { OrderModule } from '../order/order.module';
import { RatingController } from './rating.controller';
import { RatingService } from './rating.service';
import { RatingRepository } from './repositories/rating.repository';

@Module({
  imports: [OrderModule],
  controllers: [RatingController],
  providers: [RatingService, RatingRepository],
  exports: [RatingService],
})
export class RatingModule {}
