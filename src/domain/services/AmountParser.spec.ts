import { describe, expect, it } from 'vitest';
import { normalizeWhitespace, parseLocaleAmount } from './AmountParser.js';

describe('parseLocaleAmount', () => {
  it('reads space-grouped figures with a comma decimal', () => {
    expect(parseLocaleAmount('11 007,05 kr')).toBe(11007.05);
    expect(parseLocaleAmount('1 234,00 kr')).toBe(1234);
  });

  it('treats non-breaking and narrow no-break spaces as grouping', () => {
    expect(parseLocaleAmount('11\u00a0007,05\u00a0kr')).toBe(11007.05);
    expect(parseLocaleAmount('2\u202f500,50 kr')).toBe(2500.5);
  });

  it('keeps a leading minus sign', () => {
    expect(parseLocaleAmount('-45,90 kr')).toBe(-45.9);
    expect(parseLocaleAmount('\u22121 200,00 kr')).toBe(-1200);
  });

  it('accepts whole kroner and the upper-case suffix', () => {
    expect(parseLocaleAmount('500 KR')).toBe(500);
  });

  it('finds the figure inside surrounding text', () => {
    expect(parseLocaleAmount('Saldo: 12,50 kr i dag')).toBe(12.5);
  });

  it('returns null without a kr suffix', () => {
    expect(parseLocaleAmount('11 007,05')).toBeNull();
    expect(parseLocaleAmount('')).toBeNull();
    expect(parseLocaleAmount('kr')).toBeNull();
  });
});

describe('normalizeWhitespace', () => {
  it('collapses every whitespace run to one space and trims', () => {
    expect(normalizeWhitespace('  Fre.\n\t 17.  ')).toBe('Fre. 17.');
  });
});
