import { GatewayIdentityVerifier } from '@app/common/guards/gateway-identity.verifier';
import { Module } from '@nestjs/common';
import { ConnectionRegistry } from './connection-registry.service';
import { StaleConnectionJob } from './jobs/stale-connection.job';
import { RealtimeEventHandler } from './realtime-event.handler';
import { RealtimeGateway } from './realtime.gateway';

@Module({
  providers: [ConnectionRegistry, RealtimeGateway, RealtimeEventHandler, StaleConnectionJob, GatewayIdentityVerifier],
  exports: [ConnectionRegistry],
})
export class RealtimeModule {}
