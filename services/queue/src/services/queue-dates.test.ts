import { describe, expect, it } from 'vitest';
import { formatQueueDate, isOpenOrder, parseQueueDate } from './queue-dates.js';

describe('parseQueueDate', () => {
  it('treats null, undefined and blank text as missing', () => {
    expect(parseQueueDate(null)).toEqual({ status: 'missing', date: null });
    expect(parseQueueDate(undefined)).toEqual({ status: 'missing', date: null });
    expect(parseQueueDate('   ')).toEqual({ status: 'missing', date: null });
  });

  it('parses ISO dates', () => {
    const parsed = parseQueueDate('2024-01-05');
    expect(parsed.status).toBe('ok');
    expect(parsed.date?.getFullYear()).toBe(2024);
    expect(parsed.date?.getMonth()).toBe(0);
    expect(parsed.date?.getDate()).toBe(5);
  });

  it('parses the legacy two-digit-year timestamp form', () => {
    const parsed = parseQueueDate('01/05/24 13:45:00');
    expect(parsed.status).toBe('ok');
    expect(parsed.date?.getFullYear()).toBe(2024);
    expect(parsed.date?.getMonth()).toBe(0);
    expect(parsed.date?.getDate()).toBe(5);
    expect(parsed.date?.getHours()).toBe(13);
    expect(parsed.date?.getMinutes()).toBe(45);
  });

  it('parses four-digit-year slash dates', () => {
    const parsed = parseQueueDate('3/9/2023');
    expect(parsed.status).toBe('ok');
    expect(parsed.date?.getFullYear()).toBe(2023);
    expect(parsed.date?.getMonth()).toBe(2);
    expect(parsed.date?.getDate()).toBe(9);
  });

  it('accepts Date values', () => {
    const date = new Date(2024, 5, 1);
    expect(parseQueueDate(date)).toEqual({ status: 'ok', date });
  });

  it('reports unparseable text with the trimmed raw value', () => {
    expect(parseQueueDate(' next tuesday ')).toEqual({
      status: 'invalid',
      date: null,
      raw: 'next tuesday',
    });
  });

  it('reports slash dates that do not exist', () => {
    expect(parseQueueDate('13/45/24')).toEqual({ status: 'invalid', date: null, raw: '13/45/24' });
  });
});

describe('isOpenOrder', () => {
  it('treats null and blank completion dates as open', () => {
    expect(isOpenOrder({ dateCompleted: null })).toBe(true);
    expect(isOpenOrder({ dateCompleted: '' })).toBe(true);
    expect(isOpenOrder({ dateCompleted: '  ' })).toBe(true);
  });

  it('treats any completion value as closed', () => {
    expect(isOpenOrder({ dateCompleted: '2024-01-10' })).toBe(false);
    expect(isOpenOrder({ dateCompleted: new Date(2024, 0, 10) })).toBe(false);
  });
});

describe('formatQueueDate', () => {
  it('formats parseable dates as yyyy-MM-dd', () => {
    expect(formatQueueDate('2024-03-09T10:00:00')).toBe('2024-03-09');
    expect(formatQueueDate('3/9/24')).toBe('2024-03-09');
  });

  it('returns null for missing or invalid dates', () => {
    expect(formatQueueDate(null)).toBeNull();
    expect(formatQueueDate('garbage')).toBeNull();
  });
});
