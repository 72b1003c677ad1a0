import { describe, it, expect } from 'vitest';
import { Period } from '../src/fields/period';

describe('Period', () => {
  it('parses every unit', () => {
    expect(Period.parse('14d')).toEqual(new Period(14, 'd'));
    expect(Period.parse('12h')).toEqual(new Period(12, 'h'));
    expect(Period.parse(' 30m ')).toEqual(new Period(30, 'm'));
    expect(Period.parse('10s')).toEqual(new Period(10, 's'));
    expect(Period.parse('500ms')).toEqual(new Period(500, 'ms'));
  });

  it('rejects malformed periods', () => {
    for (const text of ['', '14', 'd', '-1d', '1.5h', '10x', '3 d']) {
      expect(() => Period.parse(text)).toThrow('expected a period such as 14d, 12h, 30m, 10s or 500ms');
    }
  });

  it('compares by length of time', () => {
    expect(new Period(1, 'd').isLongerThan(new Period(23, 'h'))).toBe(true);
    expect(new Period(24, 'h').isLongerThan(new Period(1, 'd'))).toBe(false);
    expect(new Period(2, 's').toMilliseconds()).toBe(2000);
  });

  it('converts to whole units only', () => {
    expect(new Period(2, 'h').to('m')).toEqual(new Period(120, 'm'));
    expect(new Period(2, 'd').to('d')).toEqual(new Period(2, 'd'));
    expect(() => new Period(90, 's').to('m')).toThrow('90s is not a whole number of m');
  });

  it('serialises as its written form', () => {
    expect(new Period(7, 'd').toString()).toBe('7d');
    expect(JSON.stringify({ ttl: new Period(7, 'd') })).toBe('{"ttl":"7d"}');
  });
});
