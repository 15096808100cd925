import { Injectable, Logger } from '@nestjs/common';
import { Interval } from '@nestjs/schedule';
import { ConnectionRegistry } from '../connection-registry.service';

const SWEEP_INTERVAL_MS = 60_000;

@Injectable()
export class StaleConnectionJob {
  private readonly logger = new Logger(StaleConnectionJob.name);

  constructor(private readonly registry: ConnectionRegistry) {}

  @Interval(SWEEP_INTERVAL_MS)
  sweep(): void {
    try {
      const evicted = this.registry.evictStale();
      if (evicted.connections > 0 || evicted.locations > 0) {
        this.logger.log(`Evicted ${evicted.connections} stale connections and ${evicted.locations} stale driver locations`);
      }
    } catch (error) {
      this.logger.error('Error in stale connection sweep:', error);
    }
  }
}
