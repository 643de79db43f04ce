export { healthService, HealthService } from './health.service';
export * from './attendance.service';
