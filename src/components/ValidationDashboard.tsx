import React from 'react';
import { dashboardStatus, groupErrorsByType, qualityScore, recommendations, subjectIssueCount, isReadyForSubmission } from '../lib/metrics';
import type { DashboardStatus } from '../lib/metrics';
import type { FieldFinding, ValidationReport } from '../lib/types';

const GREEN = '#48bb78';
const RED = '#e53e3e';
const ORANGE = '#dd6b20';

const STATUS: Record<DashboardStatus, { color: string; text: string }> = {
  failed: { color: RED, text: 'Validation Failed' },
  warning: { color: ORANGE, text: 'Warnings Found' },
  passed: { color: GREEN, text: 'Validation Passed' },
};

export const DASHBOARD_CSS = `
body { font-family: Arial, sans-serif; margin: 0; padding: 20px; background: #f5f5f5; }
.container { max-width: 1000px; margin: 0 auto; }
.header, .panel { background: white; border: 1px solid #ddd; padding: 20px; margin-bottom: 20px; }
.header h1, .panel h2 { margin: 0 0 10px 0; color: #333; }
.status-badge { display: inline-block; padding: 5px 10px; color: white; font-weight: bold; }
.stats { display: table; width: 100%; margin-bottom: 20px; }
.stat-row { display: table-row; }
.stat-card { display: table-cell; background: white; border: 1px solid #ddd; padding: 15px; text-align: center; }
.stat-card h3 { margin: 0 0 10px 0; color: #666; font-size: 12px; text-transform: uppercase; }
.stat-card .value { font-size: 1.5em; font-weight: bold; color: #333; margin: 0; }
.error-item { padding: 10px; border-left: 3px solid #e53e3e; background: #fef5f5; margin-bottom: 10px; }
.warning-item { padding: 10px; border-left: 3px solid #dd6b20; background: #fffaf0; margin-bottom: 10px; }
.error-item h4, .warning-item h4 { margin: 0 0 5px 0; color: #333; }
.error-item p, .warning-item p { margin: 0; color: #666; }
.meta { font-size: 11px; color: #999; margin-top: 5px; }
.recommendations { background: #ebf8ff; padding: 15px; border: 1px solid #bee3f8; }
.recommendations h3 { margin: 0 0 10px 0; color: #2b6cb0; }
`;

const MAX_HEADERS = 15;
const MAX_DETAILED_FINDINGS = 20;

export function truncateHeader(header: string, max = 60) {
  return header.length <= max ? header : `${header.slice(0, max - 3)}...`;
}

function StatCard({ title, value, color }: { title: string; value: React.ReactNode; color?: string }) {
  return (
    <div className="stat-card">
      <h3>{title}</h3>
      <div className="value" style={color ? { color } : undefined}>{value}</div>
    </div>
  );
}

function HeaderList({ title, headers }: { title: string; headers: readonly string[] }) {
  if (headers.length === 0) return null;
  return (
    <div>
      <h3>{title} ({headers.length})</h3>
      <ul>
        {headers.slice(0, MAX_HEADERS).map((h) => (
          <li key={h} style={{ marginBottom: 2, wordBreak: 'break-all' }}>{truncateHeader(h)}</li>
        ))}
        {headers.length > MAX_HEADERS && (
          <li style={{ color: '#666', fontStyle: 'italic' }}>... and {headers.length - MAX_HEADERS} more headers</li>
        )}
      </ul>
    </div>
  );
}

function FindingItem({ finding, kind }: { finding: FieldFinding; kind: 'error' | 'warning' }) {
  return (
    <div className={`${kind}-item`}>
      <h4>Row {finding.rowNumber}: {finding.column}</h4>
      <p>{finding.message}</p>
      {finding.value && <div className="meta">Value: &quot;{finding.value}&quot;</div>}
      {finding.suggestion !== undefined && <div className="meta">Did you mean: &quot;{finding.suggestion}&quot;?</div>}
    </div>
  );
}

export interface ValidationDashboardProps {
  report: ValidationReport;
  fileName: string;
  generatedAt: string;
}

export function ValidationDashboard({ report, fileName, generatedAt }: ValidationDashboardProps) {
  const status = STATUS[dashboardStatus(report)];
  const hv = report.headers;
  const totalErrors = report.errors.length;
  const subjectIssues = subjectIssueCount(report);
  const s = report.subjectIds;

  return (
    <html lang="en">
      <head>
        <meta charSet="UTF-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1.0" />
        <title>{`Validation Results - ${fileName}`}</title>
        <style dangerouslySetInnerHTML={{ __html: DASHBOARD_CSS }} />
      </head>
      <body>
        <div className="container">
          <div className="header">
            <h1>Validation Results</h1>
            <p>File: {fileName} | Generated: {generatedAt}</p>
            <span className="status-badge" style={{ background: status.color }}>{status.text}</span>
          </div>

          <div className="stats">
            <div className="stat-row">
              <StatCard title="Total Rows" value={report.totalRows} />
              <StatCard title="Headers Match" value={hv.isValid ? 'Yes' : 'No'} color={hv.isValid ? GREEN : RED} />
              <StatCard title="Data Errors" value={totalErrors} color={totalErrors === 0 ? GREEN : RED} />
              <StatCard title="Subject ID Issues" value={subjectIssues} color={subjectIssues === 0 ? GREEN : RED} />
              <StatCard title="Quality Score" value={`${qualityScore(report).toFixed(1)}%`} />
            </div>
          </div>

          <div className="panel" id="headers">
            <h2>Header Validation</h2>
            <p>Column headers are compared against the template. Headers must match exactly (including spelling, spacing, and capitalization).</p>
            <p>{hv.matching.length} matching, {hv.missing.length} missing, {hv.extra.length} extra</p>
            <HeaderList title="Missing Headers" headers={hv.missing} />
            <HeaderList title="Extra Headers" headers={hv.extra} />
          </div>

          {totalErrors > 0 && (
            <div className="panel" id="errors">
              <h2>Data Validation Errors ({totalErrors})</h2>
              <div>
                {[...groupErrorsByType(report.errors)].map(([group, errors]) => (
                  <div key={group} style={{ marginBottom: 5 }}><strong>{group}:</strong> {errors.length} errors</div>
                ))}
              </div>
              {report.errors.slice(0, MAX_DETAILED_FINDINGS).map((e, i) => (
                <FindingItem key={i} finding={e} kind="error" />
              ))}
              {totalErrors > MAX_DETAILED_FINDINGS && (
                <p style={{ color: '#666', fontStyle: 'italic' }}>
                  ... and {totalErrors - MAX_DETAILED_FINDINGS} more errors (see JSON file for complete list)
                </p>
              )}
            </div>
          )}

          {report.warnings.length > 0 && (
            <div className="panel" id="warnings">
              <h2>Warnings ({report.warnings.length})</h2>
              {report.warnings.slice(0, MAX_DETAILED_FINDINGS).map((w, i) => (
                <FindingItem key={i} finding={w} kind="warning" />
              ))}
            </div>
          )}

          {subjectIssues > 0 && (
            <div className="panel" id="subject-ids">
              <h2>Subject ID Issues ({subjectIssues})</h2>
              <ul>
                <li>Unknown values: {s.unknownCount}</li>
                <li>Full names: {s.fullNameCount}</li>
                <li>Invalid format: {s.invalidFormatCount}</li>
              </ul>
              {s.examples.map((ex) => (
                <div key={ex.rowNumber} className="warning-item">
                  <h4>Row {ex.rowNumber}: &quot;{ex.value}&quot;</h4>
                  <p>{ex.message}</p>
                </div>
              ))}
            </div>
          )}

          {isReadyForSubmission(report) && (
            <div className="panel" id="success">
              <h2>All Checks Passed</h2>
              <p>Headers match the template and no data errors were found.</p>
            </div>
          )}

          <div className="recommendations">
            <h3>Recommendations</h3>
            <ul>
              {recommendations(report).map((r) => <li key={r}>{r}</li>)}
            </ul>
          </div>
        </div>
      </body>
    </html>
  );
}
