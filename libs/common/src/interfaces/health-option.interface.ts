export interface DatabaseHealthProbe {
  healthCheck(): Promise<boolean>;
}

export interface RedisHealthProbe {
  ping(): Promise<string>;
}

export interface HealthOptions {
  serviceName: string;
  database: DatabaseHealthProbe;
  // Absent when the deployment runs without Redis
  redis?: RedisHealthProbe;
  additionalChecks: Record<string, () => Promise<boolean>>;
}
