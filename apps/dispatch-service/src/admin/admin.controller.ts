import { CurrentUser } from '@app/common/decorators/current-user.decorator';
import { Roles } from '@app/common/decorators/roles.decorator';
import { UserRole } from '@app/common/enums/user-role.enum';
import { AuthenticatedUser } from '@app/common/interfaces/authenticated-user.interface';
import { Body, Controller, Get, HttpCode, HttpStatus, Logger, Param, ParseUUIDPipe, Post, Put, Query } from '@nestjs/common';
import { ConnectionRegistry } from '../realtime/connection-registry.service';
import { SettingsService } from '../settings/settings.service';
import { WalletService } from '../wallet/wallet.service';
import { AdminService } from './admin.service';
import { OrderLogsQueryDto } from './dto/order-logs-query.dto';
import { RefundCommissionDto } from './dto/refund-commission.dto';
import { TopUpDto } from './dto/top-up.dto';
import { UpdateSettingDto } from './dto/update-setting.dto';

@Controller('admin')
@Roles(UserRole.ADMIN)
export class AdminController {
  private readonly logger = new Logger(AdminController.name);

  constructor(
    private readonly adminService: AdminService,
    private readonly walletService: WalletService,
    private readonly settingsService: SettingsService,
    private readonly registry: ConnectionRegistry,
  ) {}

  @Post('wallet/top-up')
  @HttpCode(HttpStatus.OK)
  async topUp(@CurrentUser() admin: AuthenticatedUser, @Body() dto: TopUpDto) {
    this.logger.log(`Admin ${admin.userId} topping up driver ${dto.driverId}`);
    return this.walletService.topUp(dto.driverId, dto.amountMinor, admin.userId);
  }

  @Post('orders/:id/refund-commission')
  @HttpCode(HttpStatus.OK)
  async refundCommission(
    @CurrentUser() admin: AuthenticatedUser,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: RefundCommissionDto,
  ) {
    this.logger.log(`Admin ${admin.userId} refunding commission for order ${id}`);
    return this.walletService.refundCommission(id, admin.userId, dto.reason);
  }

  @Get('orders/logs')
  async getOrderLogs(@Query() query: OrderLogsQueryDto) {
    return this.adminService.getOrderLogs(query.days, query.status);
  }

  @Get('orders/:id/status-history')
  async getStatusHistory(@Param('id', ParseUUIDPipe) id: string) {
    return this.adminService.getStatusHistory(id);
  }

  @Get('orders/:id/audit-verification')
  async verifyAuditChain(@Param('id', ParseUUIDPipe) id: string) {
    return this.adminService.verifyAuditChain(id);
  }

  @Get('drivers/:driverId/stats')
  async getDriverStats(@Param('driverId') driverId: string) {
    return this.adminService.getDriverStats(driverId);
  }

  @Get('stats')
  async getDashboardStats() {
    return this.adminService.getDashboardStats();
  }

  @Get('settings')
  async getSettings() {
    return this.settingsService.listSettings();
  }

  @Put('settings')
  async updateSetting(@CurrentUser() admin: AuthenticatedUser, @Body() dto: UpdateSettingDto) {
    return this.settingsService.updateSetting(dto.key, dto.value, admin.userId);
  }

  @Get('realtime/stats')
  getRealtimeStats() {
    return this.registry.getStats();
  }
}
