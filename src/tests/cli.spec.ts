import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { buildProgram, EXIT_CONFIG_ERROR, EXIT_VALIDATION_FAILED } from '../cli';
import type { TemplateSnapshot } from '../lib/template';

vi.mock('firebase-functions/logger', () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn() }));

describe('cli', () => {
  let dir: string;
  let templatePath: string;

  const exec = (...args: string[]) => {
    buildProgram().parse(args, { from: 'user' });
    return process.exitCode;
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-'));
    templatePath = path.join(dir, 'template.json');
    fs.writeFileSync(
      templatePath,
      JSON.stringify({ headers: ['subject_id', 'age'], validations: { age: { type: 'number', min: 0 } } })
    );
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('extracts the template snapshot', () => {
    const out = path.join(dir, 'out');
    expect(exec('--extract-only', '-t', templatePath, '-o', out)).toBe(0);
    const snapshot: TemplateSnapshot = JSON.parse(fs.readFileSync(path.join(out, 'template_data.json'), 'utf-8'));
    expect(snapshot.totalHeaders).toBe(2);
    expect(snapshot.validations.age).toEqual({ type: 'number', min: 0 });
  });

  it('validates a single file', () => {
    const data = path.join(dir, 'visits.csv');
    const results = path.join(dir, 'visits.json');
    fs.writeFileSync(data, 'subject_id,age\nAB,-3\n');
    expect(exec(data, '-t', templatePath, '-o', dir, '-r', results, '--no-dashboard')).toBe(EXIT_VALIDATION_FAILED);
    expect(fs.existsSync(results)).toBe(true);
    expect(fs.existsSync(path.join(dir, 'visits_dashboard.html'))).toBe(false);
  });

  it('exits with the config code on a missing template', () => {
    expect(exec('--extract-only', '-t', path.join(dir, 'missing.json'), '-o', dir)).toBe(EXIT_CONFIG_ERROR);
  });
});
