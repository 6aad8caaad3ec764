import { DEFAULT_FUZZY_MAX_DISTANCE } from './rules-engine';

export interface AppConfig {
  templatePath: string;
  inputDir: string;
  outputDir: string;
  fuzzyMaxDistance: number;
}

function intFromEnv(value: string | undefined, fallback: number) {
  if (value === undefined || value.trim() === '') return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new Error(`Expected a non-negative integer, got "${value}"`);
  return n;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    templatePath: env.TEMPLATE_PATH || 'templates/template.json',
    inputDir: env.INPUT_DIR || 'input_source',
    outputDir: env.OUTPUT_DIR || 'output',
    fuzzyMaxDistance: intFromEnv(env.FUZZY_MAX_DISTANCE, DEFAULT_FUZZY_MAX_DISTANCE),
  };
}
