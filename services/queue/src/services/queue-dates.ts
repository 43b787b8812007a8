import { format, isValid, parse, parseISO } from 'date-fns';
import type { RawDate } from './work-order.types.js';

export type ParsedDate =
  | { status: 'ok'; date: Date }
  | { status: 'missing'; date: null }
  | { status: 'invalid'; date: null; raw: string };

// Two-digit years resolve to the century closest to this date.
const REFERENCE_DATE = new Date(2000, 0, 1);

const LEGACY_FORMATS: Array<{ pattern: RegExp; formats: string[] }> = [
  {
    pattern: /^\d{1,2}\/\d{1,2}\/\d{2}(\s|$)/,
    formats: ['M/d/yy H:mm:ss', 'M/d/yy H:mm', 'M/d/yy'],
  },
  {
    pattern: /^\d{1,2}\/\d{1,2}\/\d{4}(\s|$)/,
    formats: ['M/d/yyyy H:mm:ss', 'M/d/yyyy H:mm', 'M/d/yyyy'],
  },
];

/**
 * Parse a stored work order date. Accepts Date values, ISO dates and
 * timestamps, and the legacy `MM/DD/YY HH:MM:SS` / `MM/DD/YYYY` text forms.
 * Never throws.
 */
export function parseQueueDate(raw: RawDate | undefined): ParsedDate {
  if (raw === null || raw === undefined) return { status: 'missing', date: null };

  if (raw instanceof Date) {
    return isValid(raw)
      ? { status: 'ok', date: raw }
      : { status: 'invalid', date: null, raw: String(raw) };
  }

  const value = raw.trim();
  if (value.length === 0) return { status: 'missing', date: null };

  const iso = parseISO(value);
  if (isValid(iso)) return { status: 'ok', date: iso };

  for (const candidate of LEGACY_FORMATS) {
    if (!candidate.pattern.test(value)) continue;
    for (const fmt of candidate.formats) {
      const parsed = parse(value, fmt, REFERENCE_DATE);
      if (isValid(parsed)) return { status: 'ok', date: parsed };
    }
  }

  return { status: 'invalid', date: null, raw: value };
}

/** Empty strings count as "not completed": the legacy import wrote them for open orders. */
export function isOpenOrder(order: { dateCompleted: RawDate }): boolean {
  const completed = order.dateCompleted;
  if (completed === null) return true;
  return typeof completed === 'string' && completed.trim().length === 0;
}

export function formatQueueDate(raw: RawDate): string | null {
  const parsed = parseQueueDate(raw);
  return parsed.status === 'ok' ? format(parsed.date, 'yyyy-MM-dd') : null;
}
