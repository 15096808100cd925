import { CurrentUser } from '@app/common/decorators/current-user.decorator';
import { Public } from '@app/common/decorators/public.decorator';
import { Roles } from '@app/common/decorators/roles.decorator';
import { OrderType } from '@app/common/enums/order-type.enum';
import { UserRole } from '@app/common/enums/user-role.enum';
import { AuthenticatedUser } from '@app/common/interfaces/authenticated-user.interface';
import { Body, Controller, Get, HttpCode, HttpStatus, Logger, Param, ParseUUIDPipe, Post } from '@nestjs/common';
import { CancelOrderDto } from './dto/cancel-order.dto';
import { CreateDeliveryOrderDto, CreateTaxiOrderDto } from './dto/create-order.dto';
import { RecipientLocationDto } from './dto/recipient-location.dto';
import { UpdateOrderStatusDto } from './dto/update-order-status.dto';
import { OrderService } from './order.service';

@Controller('orders')
export class OrderController {
  private readonly logger = new Logger(OrderController.name);

  constructor(private readonly orderService: OrderService) {}

  @Post('taxi')
  @Roles(UserRole.CUSTOMER)
  async createTaxiOrder(@CurrentUser() user: AuthenticatedUser, @Body() dto: CreateTaxiOrderDto) {
    this.logger.log(`Creating taxi order for customer ${user.userId}`);
    return this.orderService.createOrder(user, OrderType.TAXI, dto);
  }

  @Post('delivery')
  @Roles(UserRole.CUSTOMER)
  async createDeliveryOrder(@CurrentUser() user: AuthenticatedUser, @Body() dto: CreateDeliveryOrderDto) {
    this.logger.log(`Creating delivery order for customer ${user.userId}`);
    return this.orderService.createOrder(user, OrderType.DELIVERY, dto);
  }

  @Get('pending')
  @Roles(UserRole.DRIVER)
  async listPending(@CurrentUser() user: AuthenticatedUser) {
    return this.orderService.listPending(user.userId);
  }

  @Get('mine')
  async listMyOrders(@CurrentUser() user: AuthenticatedUser) {
    return this.orderService.listMyOrders(user);
  }

  @Public()
  @Post('recipient-location/:token')
  @HttpCode(HttpStatus.OK)
  async submitRecipientLocation(@Param('token') token: string, @Body() dto: RecipientLocationDto) {
    return this.orderService.submitRecipientLocation(token, dto.latitude, dto.longitude);
  }

  @Get(':id')
  async getOrder(@CurrentUser() user: AuthenticatedUser, @Param('id', ParseUUIDPipe) id: string) {
    return this.orderService.getOrder(id, user);
  }

  @Get(':id/history')
  async getHistory(@CurrentUser() user: AuthenticatedUser, @Param('id', ParseUUIDPipe) id: string) {
    return this.orderService.getHistory(id, user);
  }

  @Post(':id/accept')
  @Roles(UserRole.DRIVER)
  @HttpCode(HttpStatus.OK)
  async acceptOrder(@CurrentUser() user: AuthenticatedUser, @Param('id', ParseUUIDPipe) id: string) {
    this.logger.log(`Driver ${user.userId} accepting order ${id}`);
    return this.orderService.acceptOrder(id, user.userId);
  }

  @Post(':id/status')
  @Roles(UserRole.DRIVER)
  @HttpCode(HttpStatus.OK)
  async updateStatus(
    @CurrentUser() user: AuthenticatedUser,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateOrderStatusDto,
  ) {
    this.logger.log(`Driver ${user.userId} moving order ${id} to ${dto.status}`);
    return this.orderService.advanceStatus(id, user.userId, dto.status, dto.notes, dto.finalPriceMinor);
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  async cancelOrder(
    @CurrentUser() user: AuthenticatedUser,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: CancelOrderDto,
  ) {
    this.logger.log(`User ${user.userId} cancelling order ${id}`);
    return this.orderService.cancelOrder(id, user, dto.reason);
  }
}
