import { SEVERITY_ORDER, type Finding, type ScanResult, type Severity } from './types';

/**
 * Findings at `minimum` severity or above. UNKNOWN ranks below INFO and
 * only survives a filter of UNKNOWN itself.
 */
export function filterBySeverity(findings: readonly Finding[], minimum?: Severity): Finding[] {
  if (!minimum) return [...findings];
  return findings.filter(finding => SEVERITY_ORDER[finding.severity] <= SEVERITY_ORDER[minimum]);
}

export function formatFinding(finding: Finding): string[] {
  const { resourceRef } = finding;
  const lines = resourceRef.lineRange ? ` (lines ${resourceRef.lineRange[0]}-${resourceRef.lineRange[1]})` : '';
  const out = [
    `### ${finding.checkId}: ${finding.checkName}`,
    `- Severity: ${finding.severity}`,
    `- File: ${resourceRef.file}${lines}`,
    `- Resource: ${resourceRef.address}`,
  ];
  if (finding.guideline) out.push(`- Guideline: ${finding.guideline}`);
  out.push(`- Auto-fixable: ${finding.fixable ? 'yes' : 'no'}`);
  return out;
}

export function formatScanResult(result: ScanResult, findings: readonly Finding[] = result.findings): string {
  const { summary } = result;
  const out = [
    '# Checkov Security Scan Results',
    '',
    '## Summary',
    '',
    `- Passed: ${summary.passed}`,
    `- Failed: ${summary.failed}`,
    `- Skipped: ${summary.skipped}`,
    `- Parsing Errors: ${summary.parsingErrors}`,
  ];
  if (result.engineVersion) out.push(`- Checkov version: ${result.engineVersion}`);

  if (result.parsingErrors.length > 0) {
    out.push('', '## Files Checkov Could Not Parse', '', ...result.parsingErrors.map(file => `- ${file}`));
  }

  out.push('', '## Failed Checks', '');
  if (findings.length === 0) {
    out.push('No failed checks.');
  } else {
    for (const finding of findings) {
      out.push(...formatFinding(finding), '');
    }
    out.pop();
  }

  return out.join('\n');
}
