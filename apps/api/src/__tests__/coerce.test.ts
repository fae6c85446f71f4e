import { describe, it, expect } from 'vitest';
import { dayKey, toDate } from '../utils/dates';
import {
  coerceBoolean,
  coerceDates,
  coerceNumeric,
  parseBoolean,
  parseDateAuto,
  parseDateWith,
  parseNumber,
  rankCandidates
} from '../validate/coerce';

describe('parseNumber', () => {
  it('accepts plain, signed and currency-marked numbers', () => {
    expect(parseNumber('42')).toBe(42);
    expect(parseNumber('-5.5')).toBe(-5.5);
    expect(parseNumber('$1,234.50')).toBe(1234.5);
    expect(parseNumber('€ 10')).toBe(10);
    expect(parseNumber(7)).toBe(7);
  });

  it('rejects text, malformed separators and non-finite numbers', () => {
    expect(parseNumber('12abc')).toBeNull();
    expect(parseNumber('1,2')).toBeNull();
    expect(parseNumber('')).toBeNull();
    expect(parseNumber(Number.NaN)).toBeNull();
    expect(parseNumber(true)).toBeNull();
  });
});

describe('parseBoolean', () => {
  it('reads common true and false spellings', () => {
    expect(parseBoolean('Yes')).toBe(true);
    expect(parseBoolean(' t ')).toBe(true);
    expect(parseBoolean('f')).toBe(false);
    expect(parseBoolean(0)).toBe(false);
    expect(parseBoolean(1)).toBe(true);
  });

  it('returns null for anything else', () => {
    expect(parseBoolean('maybe')).toBeNull();
    expect(parseBoolean(2)).toBeNull();
  });
});

describe('date parsing', () => {
  it('parses ISO text and written-out dates automatically', () => {
    const iso = parseDateAuto('2024-01-05');
    expect(iso?.getFullYear()).toBe(2024);
    expect(iso?.getMonth()).toBe(0);
    expect(iso?.getDate()).toBe(5);
    expect(parseDateAuto('Jan 5, 2024')?.getDate()).toBe(5);
    expect(parseDateAuto('05/01/2024')).toBeNull();
  });

  it('applies explicit day-first and month-first patterns', () => {
    expect(parseDateWith('05/01/2024', 'd/M/yyyy')?.getMonth()).toBe(0);
    expect(parseDateWith('05/01/2024', 'M/d/yyyy')?.getMonth()).toBe(4);
    expect(parseDateWith('31/12/2024', 'M/d/yyyy')).toBeNull();
  });

  it('passes Date cells through', () => {
    const cell = new Date(2024, 2, 5);
    expect(parseDateWith(cell, 'd/M/yyyy')).toBe(cell);
    expect(parseDateWith(new Date(Number.NaN), 'auto')).toBeNull();
  });

  it('reduces values to a calendar day key', () => {
    expect(toDate('05/03/2024')?.getMonth()).toBe(2);
    expect(dayKey('2024-03-05 14:30:00')).toBe('2024-03-05');
    expect(dayKey('05/03/2024')).toBe('2024-03-05');
    expect(dayKey('2024-03-05', 'yyyyMMdd')).toBe('20240305');
    expect(dayKey('not a date')).toBe('not a date');
    expect(dayKey('   ')).toBeNull();
    expect(dayKey(null)).toBeNull();
  });
});

describe('rankCandidates', () => {
  it('keeps the earlier candidate on ties', () => {
    const outcome = rankCandidates('float', ['1', 'x'], ['first', 'second'], value => parseNumber(value));
    expect(outcome.best?.candidate).toBe('first');
    expect(outcome.tried).toEqual([
      { candidate: 'first', successRate: 0.5 },
      { candidate: 'second', successRate: 0.5 }
    ]);
    expect(outcome.severity).toBe('warning');
  });

  it('stops once a candidate converts more than 95%', () => {
    const outcome = coerceDates(['2024-01-05', '2024-02-10']);
    expect(outcome.tried).toEqual([{ candidate: 'auto', successRate: 1 }]);
    expect(outcome.severity).toBe('ok');
  });

  it('finds the day-first pattern for slash dates', () => {
    const outcome = coerceDates(['05/01/2024', '13/02/2024', null, '20/03/2024']);
    expect(outcome.best?.candidate).toBe('d/M/yyyy');
    expect(outcome.tried.map(t => t.candidate)).toEqual(['auto', 'yyyy-M-d', 'yyyy-M-d H:mm:ss', 'd/M/yyyy']);
    expect(outcome.nonNull).toBe(3);
    expect(outcome.best?.values[2]).toBeNull();
    expect(outcome.best?.values[1]?.getMonth()).toBe(1);
  });

  it('grades severity by success rate', () => {
    expect(coerceNumeric(['1', '2', 'x', '4']).severity).toBe('warning');
    expect(coerceNumeric(['a', 'b', '1']).severity).toBe('error');
    expect(coerceBoolean(['yes', 'no']).severity).toBe('ok');
  });

  it('reports empty input separately', () => {
    const outcome = coerceNumeric([null, '']);
    expect(outcome.severity).toBe('empty');
    expect(outcome.best).toBeNull();
  });
});
