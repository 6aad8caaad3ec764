import type { SubjectIdClassification, SubjectIdFinding } from './types';

export const SUBJECT_ID_COLUMN = 'subject_id';

export const SUBJECT_ID_MESSAGES: Record<SubjectIdClassification, string> = {
  unknown: 'Subject ID should not be "unknown"',
  full_name: 'Subject ID appears to be a full name. Use initials instead',
  invalid_format: 'Subject ID must be initials (e.g., "JD", "J.D.", "J.D.S")',
};

const PLACEHOLDERS = new Set(['unknown', 'unk']);
const BARE_INITIALS = /^[A-Za-z]{1,4}$/;
const DOTTED_INITIALS = /^[A-Za-z](\.[A-Za-z])*\.?$/;

// Real initials are short; several words with a long one reads as a name.
function looksLikeFullName(value: string) {
  if (!/\s/.test(value)) return false;
  const parts = value.split(/\s+/).filter(Boolean);
  return parts.length >= 2 && parts.some((p) => [...p].length > 3);
}

export function classify(value: string): SubjectIdClassification | undefined {
  if (PLACEHOLDERS.has(value.toLowerCase())) return 'unknown';
  if (looksLikeFullName(value)) return 'full_name';
  if (!BARE_INITIALS.test(value) && !DOTTED_INITIALS.test(value)) return 'invalid_format';
  return undefined;
}

/**
 * Checks a subject identifier holds initials only. Blank values and valid initials give undefined.
 */
export function classifySubjectId(rawValue: string, rowNumber: number): SubjectIdFinding | undefined {
  const value = rawValue.trim();
  if (value === '') return undefined;

  const classification = classify(value);
  if (!classification) return undefined;
  return { rowNumber, value, classification, message: SUBJECT_ID_MESSAGES[classification] };
}
