// Presentation-only figures derived from a ValidationReport. Consumers may recompute freely.
import type { FieldFinding, ValidationReport } from './types';

export type DashboardStatus = 'passed' | 'warning' | 'failed';
export type SummaryVerdict = 'passed' | 'passed_with_warnings' | 'failed';
export type ErrorGroup = 'Date Format Issues' | 'Time Format Issues' | 'Invalid Dropdown Values' | 'Other Validation Issues';

export function subjectIssueCount(report: ValidationReport): number {
  const s = report.subjectIds;
  return s.unknownCount + s.fullNameCount + s.invalidFormatCount;
}

/** Percentage of rows without errors, floored at 0. */
export function qualityScore(report: ValidationReport): number {
  return Math.max(0, 100 - (report.errors.length / Math.max(report.totalRows, 1)) * 100);
}

export function dashboardStatus(report: ValidationReport): DashboardStatus {
  if (!report.headers.isValid || report.errors.length > 0) return 'failed';
  if (report.warnings.length > 0 || subjectIssueCount(report) > 0) return 'warning';
  return 'passed';
}

export function summaryVerdict(report: ValidationReport): SummaryVerdict {
  if (report.headers.isValid && report.errors.length === 0 && subjectIssueCount(report) === 0) return 'passed';
  if (report.headers.missing.length > 0 || report.errors.length > 10) return 'failed';
  return 'passed_with_warnings';
}

/** Headers complete and no errors. */
export function isPassing(report: ValidationReport): boolean {
  return report.headers.isValid && report.errors.length === 0;
}

export function isReadyForSubmission(report: ValidationReport): boolean {
  return isPassing(report) && subjectIssueCount(report) === 0;
}

export function errorGroupOf(finding: FieldFinding): ErrorGroup {
  const msg = finding.message;
  if (msg.toLowerCase().includes('date format')) return 'Date Format Issues';
  if (msg.toLowerCase().includes('time format')) return 'Time Format Issues';
  if (msg.includes('Must be one of')) return 'Invalid Dropdown Values';
  return 'Other Validation Issues';
}

export function groupErrorsByType(errors: readonly FieldFinding[]): Map<ErrorGroup, FieldFinding[]> {
  const groups = new Map<ErrorGroup, FieldFinding[]>();
  for (const e of errors) {
    const key = errorGroupOf(e);
    const arr = groups.get(key) ?? [];
    arr.push(e);
    groups.set(key, arr);
  }
  return groups;
}

export function recommendations(report: ValidationReport): string[] {
  const out: string[] = [];
  const subjectIssues = subjectIssueCount(report);
  if (!report.headers.isValid) out.push('Fix missing headers before resubmission');
  if (report.errors.length > 0) out.push(`Address ${report.errors.length} critical validation errors`);
  if (report.warnings.length > 0) out.push(`Review ${report.warnings.length} warnings for data quality`);
  if (subjectIssues > 0) out.push(`Fix ${subjectIssues} subject ID format issues`);
  if (isReadyForSubmission(report)) out.push('File is ready for submission!');
  return out;
}
