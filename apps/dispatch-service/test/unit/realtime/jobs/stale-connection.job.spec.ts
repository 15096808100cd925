// apps/dispatch-service/test/unit/realtime/jobs/stale-connection.job.spec.ts
import { ConnectionRegistry } from '@app/dispatch/realtime/connection-registry.service';
import { StaleConnectionJob } from '@app/dispatch/realtime/jobs/stale-connection.job';
import { Test, TestingModule } from '@nestjs/testing';

describe('StaleConnectionJob', () => {
  let job: StaleConnectionJob;
  let registry: jest.Mocked<ConnectionRegistry>;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [StaleConnectionJob, { provide: ConnectionRegistry, useValue: { evictStale: jest.fn() } }],
    }).compile();

    job = module.get<StaleConnectionJob>(StaleConnectionJob);
    registry = module.get(ConnectionRegistry);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('sweep', () => {
    it('should evict stale entries through the registry', () => {
      // Arrange
      registry.evictStale.mockReturnValue({ connections: 2, locations: 1 });

      // Act
      job.sweep();

      // Assert
      expect(registry.evictStale).toHaveBeenCalledTimes(1);
    });

    it('should not throw when the sweep fails', () => {
      // Arrange
      registry.evictStale.mockImplementation(() => {
        throw new Error('sweep failure');
      });

      // Act & Assert
      expect(() => job.sweep()).not.toThrow();
    });
  });
});
