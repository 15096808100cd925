export interface HealthCheckResult {
  status: 'up' | 'down' | 'disabled';
  error?: string;
}
