import { describe, it, expect } from 'vitest';
import { validateFee, formatFee } from '@dentdesk/shared';

describe('validateFee', () => {
  it('parses a decimal amount', () => {
    expect(validateFee('25.5')).toBe(25.5);
  });

  it('parses integers and zero', () => {
    expect(validateFee('100')).toBe(100);
    expect(validateFee('0')).toBe(0);
  });

  it('accepts leading/trailing whitespace, exponent and bare fractions', () => {
    expect(validateFee(' 12.75 ')).toBe(12.75);
    expect(validateFee('1e2')).toBe(100);
    expect(validateFee('.5')).toBe(0.5);
    expect(validateFee('5.')).toBe(5);
  });

  it('rejects negative amounts', () => {
    expect(validateFee('-1')).toBeNull();
    expect(validateFee('-0.01')).toBeNull();
  });

  it('normalizes negative zero to 0', () => {
    expect(Object.is(validateFee('-0'), 0)).toBe(true);
  });

  it('rejects non-numeric input', () => {
    expect(validateFee('abc')).toBeNull();
    expect(validateFee('12abc')).toBeNull();
    expect(validateFee('0x10')).toBeNull();
    expect(validateFee('')).toBeNull();
  });

  it('rejects non-finite values', () => {
    expect(validateFee('Infinity')).toBeNull();
    expect(validateFee('NaN')).toBeNull();
    expect(validateFee('1e400')).toBeNull();
  });
});

describe('formatFee', () => {
  it('renders two decimals', () => {
    expect(formatFee(25.5)).toBe('25.50');
    expect(formatFee(0)).toBe('0.00');
  });

  it('renders an unspecified fee as empty', () => {
    expect(formatFee(null)).toBe('');
    expect(formatFee(undefined)).toBe('');
  });
});
