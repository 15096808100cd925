import { Module } from '@nestjs/common';
import { AuditLogService } from './audit-log.service';
import { OrderStatusLogRepository } from './repositories/order-status-log.repository';

@Module({
  providers: [AuditLogService, OrderStatusLogRepository],
  exports: [AuditLogService],
})
export class AuditModule {}
