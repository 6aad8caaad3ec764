import * as fs from 'fs';
import * as path from 'path';
import { createElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import dayjs from 'dayjs';
import { ValidationDashboard } from '../components/ValidationDashboard';
import type { ValidationReport } from './types';

/** Standalone HTML page for one validated file. */
export function renderDashboard(report: ValidationReport, fileName: string, now: Date): string {
  const generatedAt = dayjs(now).format('YYYY-MM-DD HH:mm:ss');
  return `<!DOCTYPE html>${renderToStaticMarkup(createElement(ValidationDashboard, { report, fileName, generatedAt }))}`;
}

export function saveDashboard(html: string, outputDir: string, fileName: string): string {
  const dashboardPath = path.join(outputDir, `${path.parse(fileName).name}_dashboard.html`);
  fs.mkdirSync(outputDir, { recursive: true });
  fs.writeFileSync(dashboardPath, html, 'utf-8');
  return dashboardPath;
}
