import type { HealthStatus } from '@tfguard/shared-types';
import { SERVICE_NAME } from '../errors';

export const SERVICE_VERSION = '0.1.0';

export function healthHandler(): HealthStatus {
  return {
    status: 'healthy',
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
  };
}
