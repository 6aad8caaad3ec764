import { createSchema } from '../lib/schema';
import { validate } from '../lib/validator';

export const visitSchema = createSchema(['subject_id', 'event_date', 'event_time', 'sex'], {
  event_date: { type: 'date' },
  event_time: { type: 'time' },
  sex: { type: 'list', allowed: ['Male', 'Female'] },
});

export const visitHeader = ['subject_id', 'event_date', 'event_time', 'sex', 'notes'];

/** Three rows: a bad date, a bad time + list value, and a clean row with an "unk" subject. */
export function visitReport() {
  return validate(visitSchema, visitHeader, [
    { subject_id: 'JD', event_date: '13/01/2024', event_time: '08:21', sex: 'Male', notes: '' },
    { subject_id: 'John Doe', event_date: '01/01/2024', event_time: '8:21', sex: 'male', notes: 'follow up' },
    { subject_id: 'unk', event_date: '02/30/2024', event_time: '09:00', sex: 'Female', notes: '' },
  ]);
}

export function cleanReport() {
  return validate(visitSchema, visitSchema.columns, [
    { subject_id: 'J.D.', event_date: '01/31/2024', event_time: '23:59', sex: 'Female' },
  ]);
}

export const fixedNow = new Date(2026, 9, 19, 8, 5, 3);
