import { CurrentUser } from '@app/common/decorators/current-user.decorator';
import { Roles } from '@app/common/decorators/roles.decorator';
import { UserRole } from '@app/common/enums/user-role.enum';
import { AuthenticatedUser } from '@app/common/interfaces/authenticated-user.interface';
import { DriverEvents, MessagingService } from '@app/messaging';
import { Body, Controller, Get, HttpCode, HttpStatus, Logger, Post, Query } from '@nestjs/common';
import { DriverLocationDto } from './dto/driver-location.dto';
import { TransactionQueryDto } from './dto/transaction-query.dto';
import { WalletService } from './wallet.service';

@Controller('driver')
@Roles(UserRole.DRIVER)
export class WalletController {
  private readonly logger = new Logger(WalletController.name);

  constructor(
    private readonly walletService: WalletService,
    private readonly messagingService: MessagingService,
  ) {}

  @Get('wallet')
  async getWallet(@CurrentUser() user: AuthenticatedUser) {
    return this.walletService.getBalance(user.userId);
  }

  @Get('transactions')
  async getTransactions(@CurrentUser() user: AuthenticatedUser, @Query() query: TransactionQueryDto) {
    return this.walletService.getTransactions(user.userId, query.limit);
  }

  @Get('can-accept-orders')
  async canAcceptOrders(@CurrentUser() user: AuthenticatedUser) {
    return this.walletService.canAcceptOrders(user.userId);
  }

  @Post('location')
  @HttpCode(HttpStatus.ACCEPTED)
  async updateLocation(@CurrentUser() user: AuthenticatedUser, @Body() dto: DriverLocationDto) {
    this.logger.debug(`Location update from driver ${user.userId}`);
    const timestamp = new Date().toISOString();
    await this.messagingService.publish(DriverEvents.LOCATION_UPDATED, {
      driverId: user.userId,
      latitude: dto.latitude,
      longitude: dto.longitude,
      timestamp,
    });
    return { driverId: user.userId, latitude: dto.latitude, longitude: dto.longitude, timestamp };
  }
}
