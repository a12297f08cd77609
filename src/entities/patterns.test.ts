import { describe, it, expect } from 'vitest';
import { extractDates, extractMoney, parseAmount, parseDate } from './patterns.js';

describe('parseDate', () => {
  it('should normalise the supported formats', () => {
    expect(parseDate('Jan 22 2013')).toBe('2013-01-22');
    expect(parseDate('January 22, 2013')).toBe('2013-01-22');
    expect(parseDate('March 3rd, 2021')).toBe('2021-03-03');
    expect(parseDate('01/22/2013')).toBe('2013-01-22');
    expect(parseDate('22-01-2013')).toBe('2013-01-22');
    expect(parseDate('2013-01-22')).toBe('2013-01-22');
  });

  it('should give null for dates it cannot read', () => {
    expect(parseDate('01/22/13')).toBeNull();
    expect(parseDate('02/30/2020')).toBeNull();
    expect(parseDate('Foo 12 2020')).toBeNull();
  });
});

describe('parseAmount', () => {
  it('should strip currency symbols, separators and percent signs', () => {
    expect(parseAmount('$1,234.56')).toBe(1234.56);
    expect(parseAmount('$ 50')).toBe(50);
    expect(parseAmount('1.5%')).toBe(1.5);
  });
});

describe('extractDates', () => {
  it('should find each distinct date once', () => {
    const text = 'Signed on Jan 22, 2013 and renewed 2014-02-01. Again: Jan 22, 2013.';
    expect(extractDates(text)).toEqual([
      { type: 'date', text: 'Jan 22, 2013', value: '2013-01-22', confidence: 0.9 },
      { type: 'date', text: '2014-02-01', value: '2014-02-01', confidence: 0.9 },
    ]);
  });
});

describe('extractMoney', () => {
  it('should find amounts and percentages', () => {
    const text = 'Revenue grew to $1,200.50 (up 4.5%) from $980.';
    expect(extractMoney(text)).toEqual([
      { type: 'money', text: '$1,200.50', value: 1200.5, confidence: 0.95 },
      { type: 'money', text: '$980', value: 980, confidence: 0.95 },
      { type: 'money', text: '4.5%', value: 4.5, confidence: 0.95 },
    ]);
  });
});
