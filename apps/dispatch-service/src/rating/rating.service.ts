import { Rating } from '@app/common/entities/rating.entity';
import { OrderStatus } from '@app/common/enums/order-status.enum';
import { UserRole } from '@app/common/enums/user-role.enum';
import {
  DomainValidationException,
  NotAuthorizedException,
  OrderNotFoundException,
} from '@app/common/exceptions/dispatch.exception';
import { AuthenticatedUser } from '@app/common/interfaces/authenticated-user.interface';
import { Injectable, Logger } from '@nestjs/common';
import { OrderRepository } from '../order/repositories/order.repository';
import { RatingRepository, RatingSummary } from './repositories/rating.repository';

const MIN_SCORE = 1;
const MAX_SCORE = 5;

export interface CreateRatingInput {
  orderId: string;
  score: number;
  comment?: string;
}

@Injectable()
export class RatingService {
  private readonly logger = new Logger(RatingService.name);

  constructor(
    private readonly ratingRepository: RatingRepository,
    private readonly orderRepository: OrderRepository,
  ) {}

  async createRating(customer: AuthenticatedUser, input: CreateRatingInput): Promise<Rating> {
    if (!Number.isInteger(input.score) || input.score < MIN_SCORE || input.score > MAX_SCORE) {
      throw new DomainValidationException(`Score must be a whole number between ${MIN_SCORE} and ${MAX_SCORE}`);
    }

    const order = await this.orderRepository.findById(input.orderId);
    if (!order) {
      throw new OrderNotFoundException(input.orderId);
    }
    if (customer.role !== UserRole.CUSTOMER || order.customerId !== customer.userId) {
      throw new NotAuthorizedException('Only the customer who placed the order can rate it');
    }
    if (order.status !== OrderStatus.COMPLETED || !order.driverId) {
      throw new DomainValidationException('Can only rate completed orders');
    }

    const rating = await this.ratingRepository.createIfAbsent({
      orderId: order.id,
      customerId: customer.userId,
      driverId: order.driverId,
      score: input.score,
      comment: input.comment ?? null,
    });
    if (!rating) {
      throw new DomainValidationException('Order already rated');
    }

    this.logger.log(`Order ${order.id} rated ${input.score} by customer ${customer.userId}`);
    return rating;
  }

  async getDriverRatings(driverId: string): Promise<Rating[]> {
    return this.ratingRepository.findByDriver(driverId);
  }

  async getMyRatings(user: AuthenticatedUser): Promise<Rating[]> {
    return user.role === UserRole.DRIVER
      ? this.ratingRepository.findByDriver(user.userId)
      : this.ratingRepository.findByCustomer(user.userId);
  }

  async summarizeDriver(driverId: string): Promise<RatingSummary> {
    const summary = await this.ratingRepository.summarizeDriver(driverId);
    return { average: Math.round(summary.average * 100) / 100, count: summary.count };
  }
}
