import { describe, it, expect } from 'vitest';
import { formatXmr, parseXmr } from '../src/index.js';

describe('XMR amounts', () => {
  it('formats atomic units as trimmed decimals', () => {
    expect(formatXmr(1500120000000n)).toBe('1.50012');
    expect(formatXmr(120000000n)).toBe('0.00012');
    expect(formatXmr(2000000000000n)).toBe('2');
    expect(formatXmr(0n)).toBe('0');
    expect(formatXmr(1n)).toBe('0.000000000001');
  });

  it('parses decimal strings to atomic units', () => {
    expect(parseXmr('1.5')).toBe(1500000000000n);
    expect(parseXmr('0.00012')).toBe(120000000n);
    expect(parseXmr('0.000000000001')).toBe(1n);
  });

  it('rejects amounts with too many decimals or signs', () => {
    expect(() => parseXmr('0.0000000000001')).toThrow('Invalid XMR amount: 0.0000000000001');
    expect(() => parseXmr('-1')).toThrow('Invalid XMR amount');
    expect(() => parseXmr('1e3')).toThrow('Invalid XMR amount');
  });

  it('refuses negative atomic amounts', () => {
    expect(() => formatXmr(-1n)).toThrow('must not be negative');
  });
});
