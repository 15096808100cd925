import { CurrentUser } from '@app/common/decorators/current-user.decorator';
import { Roles } from '@app/common/decorators/roles.decorator';
import { UserRole } from '@app/common/enums/user-role.enum';
import { AuthenticatedUser } from '@app/common/interfaces/authenticated-user.interface';
import { Body, Controller, Get, Param, Post } from '@nestjs/common';
import { CreateRatingDto } from './dto/create-rating.dto';
import { RatingService } from './rating.service';

@Controller('ratings')
export class RatingController {
  constructor(private readonly ratingService: RatingService) {}

  @Post()
  @Roles(UserRole.CUSTOMER)
  async createRating(@CurrentUser() user: AuthenticatedUser, @Body() dto: CreateRatingDto) {
    return this.ratingService.createRating(user, dto);
  }

  @Get('mine')
  async getMyRatings(@CurrentUser() user: AuthenticatedUser) {
    return this.ratingService.getMyRatings(user);
  }

  @Get('driver/:driverId')
  async getDriverRatings(@Param('driverId') driverId: string) {
    return this.ratingService.getDriverRatings(driverId);
  }
}
