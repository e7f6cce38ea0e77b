/**
 * tfguard Configuration
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ToolkitConfig {
  port: number;
  logLevel: LogLevel;
  registryUrl: string;
  fetch: FetchConfig;
  scan: ScanConfig;
  terraform: TerraformConfig;
  cache: CacheConfig;
  remediation: RemediationConfig;
}

export interface FetchConfig {
  /** Ceiling for downloaded and for decompressed bytes */
  maxBytes: number;
  timeoutMs: number;
}

export interface ScanConfig {
  checkovPath: string;
  timeoutMs: number;
}

export interface TerraformConfig {
  binaryPath: string;
  timeoutMs: number;
}

export interface CacheConfig {
  /** 0 disables the module cache */
  maxEntries: number;
}

export interface RemediationConfig {
  disabledChecks: string[];
}
