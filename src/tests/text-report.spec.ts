import { describe, it, expect } from 'vitest';
import {
  dashboardStatus,
  groupErrorsByType,
  qualityScore,
  recommendations,
  subjectIssueCount,
  summaryVerdict,
} from '../lib/metrics';
import { createSchema } from '../lib/schema';
import { renderDetailedResults, renderErrorReport, renderRunSummary, renderSummary } from '../lib/text-report';
import { validate } from '../lib/validator';
import { cleanReport, fixedNow, visitReport } from './fixtures';

describe('metrics', () => {
  it('derives figures from a failing report', () => {
    const report = visitReport();
    expect(subjectIssueCount(report)).toBe(2);
    expect(qualityScore(report)).toBe(0);
    expect(dashboardStatus(report)).toBe('failed');
    expect(summaryVerdict(report)).toBe('passed_with_warnings');
    expect([...groupErrorsByType(report.errors)].map(([g, e]) => [g, e.length])).toEqual([
      ['Date Format Issues', 1],
      ['Time Format Issues', 1],
      ['Invalid Dropdown Values', 1],
    ]);
    expect(recommendations(report)).toEqual(['Address 3 critical validation errors', 'Fix 2 subject ID format issues']);
  });

  it('passes a clean report', () => {
    const report = cleanReport();
    expect(qualityScore(report)).toBe(100);
    expect(dashboardStatus(report)).toBe('passed');
    expect(summaryVerdict(report)).toBe('passed');
    expect(recommendations(report)).toEqual(['File is ready for submission!']);
  });

  it('fails the summary verdict on missing headers', () => {
    const report = validate(createSchema(['a', 'b']), ['a'], []);
    expect(summaryVerdict(report)).toBe('failed');
    expect(dashboardStatus(report)).toBe('failed');
    expect(qualityScore(report)).toBe(100);
  });
});

describe('renderErrorReport', () => {
  it('groups issues by column and kind', () => {
    expect(renderErrorReport(visitReport(), 'visits.csv', fixedNow)).toBe(
      [
        'VALIDATION ERROR REPORT',
        '='.repeat(60),
        'File: visits.csv',
        'Date: 2026-10-19T08:05:03',
        '',
        'EXTRA/MALFORMED HEADERS:',
        '  - notes',
        '',
        'DATA VALIDATION ISSUES:',
        '    1 × event_date: Date format issue',
        '       Example: "13/01/2024"',
        '       Fix: Use format MM/DD/YYYY (e.g., 09/23/2025)',
        '    1 × event_time: Time format issue',
        '       Example: "8:21"',
        '       Fix: Use format HH:MM (e.g., 08:21)',
        '    1 × sex: Invalid dropdown value',
        '       Example: "male"',
        '       Fix: Use exact value from dropdown list',
        '',
        'VALIDATION STATUS:',
        '  FAILED - Issues must be fixed before submission',
      ].join('\n')
    );
  });

  it('sorts groups by count and flags line-broken headers', () => {
    const schema = createSchema(['n'], { n: { type: 'number', min: 1 } });
    const report = validate(schema, ['n', 'bad\nheader'], [{ n: 'x' }, { n: '0' }, { n: '-1' }]);
    const lines = renderErrorReport(report, 'n.csv', fixedNow).split('\n');
    expect(lines).toContain('  - Header has line break: "bad\\nheader"');
    expect(lines).toContain('  FIX: Remove line breaks from header row');
    const counts = lines.filter((l) => l.includes(' × '));
    expect(counts).toEqual(['    2 × n: Value must be >= 1', '    1 × n: Must be a number']);
  });

  it('reports a pass', () => {
    expect(renderErrorReport(cleanReport(), 'ok.csv', fixedNow).split('\n').slice(-2)).toEqual([
      'VALIDATION STATUS:',
      '  PASSED - No critical issues',
    ]);
  });
});

describe('renderDetailedResults', () => {
  it('lists headers, errors, subject ids and recommendations', () => {
    const lines = renderDetailedResults(visitReport(), 'visits.csv').split('\n');
    expect(lines).toContain('DETAILED VALIDATION RESULTS: visits.csv');
    expect(lines).toContain('  Extra headers (1):');
    expect(lines).toContain('    + notes');
    expect(lines).toContain('DATA VALIDATION ERRORS (3):');
    expect(lines).toContain('  Row 3, sex: Must be one of: Male, Female');
    expect(lines).toContain('    Value: "male"');
    expect(lines).toContain('SUBJECT ID ISSUES (2):');
    expect(lines).toContain('  Full names: 1');
    expect(lines).toContain('    Row 3: "John Doe" - Subject ID appears to be a full name. Use initials instead');
    expect(lines).toContain('  - Address 3 critical validation errors');
  });

  it('caps long lists', () => {
    const schema = createSchema(Array.from({ length: 12 }, (_, i) => `c${i}`), { d: { type: 'date' } });
    const rows = Array.from({ length: 25 }, () => ({ d: 'x' }));
    const lines = renderDetailedResults(validate(schema, ['d'], rows), 'big.csv').split('\n');
    expect(lines).toContain('  Missing headers (12):');
    expect(lines).toContain('    ... and 2 more');
    expect(lines).toContain('  ... and 5 more errors');
    expect(lines).toContain('  - Fix missing headers before resubmission');
  });
});

describe('renderSummary', () => {
  it('summarises a file', () => {
    expect(renderSummary(visitReport(), 'visits.csv')).toBe(
      ['', '  Summary for visits.csv:', '    3 data errors found', '    2 subject ID issues', '    PASSED WITH WARNINGS'].join('\n')
    );
    expect(renderSummary(cleanReport(), 'ok.csv').split('\n').pop()).toBe('    PASSED - File meets all requirements');
  });
});

describe('renderRunSummary', () => {
  it('reports totals', () => {
    const text = renderRunSummary(
      {
        validationRun: '2026-10-19T08:05:03',
        totalFiles: 2,
        passed: 1,
        failed: 1,
        filesProcessed: ['a.csv', 'b.csv'],
        templateInfo: { headers: 4, validationRules: 3 },
      },
      'output'
    );
    expect(text.split('\n').slice(3)).toEqual([
      'Processed 2 file(s)',
      '1 file(s) passed validation',
      '1 file(s) failed validation',
      '',
      "Results saved in 'output' folder",
    ]);
  });
});
