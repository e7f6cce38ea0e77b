/** Checkov's severity taxonomy, most severe first; a missing engine severity is UNKNOWN */
export const SEVERITIES = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW', 'INFO', 'UNKNOWN'] as const;

export type Severity = (typeof SEVERITIES)[number];

export const SEVERITY_ORDER: Record<Severity, number> = {
  CRITICAL: 0,
  HIGH: 1,
  MEDIUM: 2,
  LOW: 3,
  INFO: 4,
  UNKNOWN: 5,
};

export interface ResourceRef {
  /** Path relative to the scanned directory */
  file: string;
  /** Resource address as reported by the engine, e.g. `google_storage_bucket.logs` */
  address: string;
  lineRange?: readonly [number, number];
}

export interface Finding {
  /** `checkId:file:address` */
  id: string;
  checkId: string;
  checkName: string;
  severity: Severity;
  resourceRef: ResourceRef;
  message: string;
  guideline?: string;
  /** The engine failed the check and the check id is on the remediation allow-list */
  fixable: boolean;
}

export interface ScanSummary {
  passed: number;
  failed: number;
  skipped: number;
  parsingErrors: number;
}

export interface ScanResult {
  findings: Finding[];
  summary: ScanSummary;
  /** Files the engine could not parse */
  parsingErrors: string[];
  engineVersion?: string;
  durationMs: number;
}

export interface ScanOptions {
  /** Restrict the run to these check ids */
  checks?: readonly string[];
  signal?: AbortSignal;
}

export interface PolicyScanner {
  scan(dir: string, options?: ScanOptions): Promise<ScanResult>;
}

export function toSeverity(value: string | null | undefined): Severity {
  const upper = value?.toUpperCase();
  return SEVERITIES.find(severity => severity === upper) ?? 'UNKNOWN';
}

export function compareFindings(a: Finding, b: Finding): number {
  const fileOrder = a.resourceRef.file.localeCompare(b.resourceRef.file);
  if (fileOrder !== 0) return fileOrder;
  const lineOrder = (a.resourceRef.lineRange?.[0] ?? 0) - (b.resourceRef.lineRange?.[0] ?? 0);
  if (lineOrder !== 0) return lineOrder;
  return a.checkId.localeCompare(b.checkId);
}
