import { EVENT_COLUMNS, MalformedRowError } from '../domain/index.js';
import type { EventRecord } from '../domain/index.js';

/**
 * Outcome of decoding one CSV line.
 *
 * Returned as a discriminated result so the caller decides what to
 * count; the parser itself never throws for bad input.
 */
export type ParsedRow =
  | { readonly kind: 'record'; readonly record: EventRecord }
  | { readonly kind: 'header' }
  | { readonly kind: 'blank' }
  | { readonly kind: 'malformed'; readonly error: MalformedRowError };

export interface ParseRowOptions {
  /**
   * Whether this line may be a header. A header is recognised by a
   * non-numeric `value` column and is skipped. Default false.
   */
  allowHeader?: boolean;
}

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Decodes one line (without its terminator) of
 * `patient_id,event_time,event_type,value`.
 *
 * Pure: no I/O, no shared state.
 */
export function parseRow(line: string, options: ParseRowOptions = {}): ParsedRow {
  const text = line.endsWith('\r') ? line.slice(0, -1) : line;
  if (text.trim() === '') return { kind: 'blank' };

  const fields = text.split(',');
  if (fields.length !== EVENT_COLUMNS.length) {
    return malformed(line, `expected ${EVENT_COLUMNS.length} fields, got ${fields.length}`);
  }

  const [patientId = '', eventTime = '', eventType = '', rawValue = ''] = fields.map((f) => f.trim());

  if (!NUMERIC.test(rawValue)) {
    if (options.allowHeader) return { kind: 'header' };
    return malformed(line, `non-numeric value "${rawValue}"`);
  }
  if (patientId === '') return malformed(line, 'empty patient_id');
  if (eventType === '') return malformed(line, 'empty event_type');

  return {
    kind: 'record',
    record: {
      patient_id: patientId,
      event_time: eventTime,
      event_type: eventType,
      value: Number(rawValue),
    },
  };
}

function malformed(line: string, reason: string): ParsedRow {
  return { kind: 'malformed', error: new MalformedRowError(line, reason) };
}
