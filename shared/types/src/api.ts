/**
 * Wire envelope shared by the HTTP surface and its clients
 */
export interface ServiceError {
  code: string;
  message: string;
  service: string;
  timestamp: string;
  details?: unknown;
  stack?: string;
}

export type APIResponse<T> =
  | { success: true; data: T; output?: string }
  | { success: false; error: ServiceError };

export interface HealthStatus {
  status: 'healthy' | 'degraded';
  service: string;
  version: string;
  timestamp: string;
  uptime: number;
}
