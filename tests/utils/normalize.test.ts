import { describe, it, expect } from 'vitest';
import {
  normalizePhone,
  normalizeEmail,
  normalizeAddress,
  cleanName,
  nameIdentity,
  normalizeWebsite,
  splitMultiValue,
} from '../../src/utils/normalize.js';

describe('normalizePhone', () => {
  it('should format local numbers', () => {
    expect(normalizePhone('0712 345 678')).toBe('+255 71 234 5678');
    expect(normalizePhone('0712-345-678')).toBe('+255 71 234 5678');
  });

  it('should format international numbers with or without the plus sign', () => {
    expect(normalizePhone('+255 712 345 678')).toBe('+255 71 234 5678');
    expect(normalizePhone('255712345678')).toBe('+255 71 234 5678');
    expect(normalizePhone('(+255) 22 277 1234')).toBe('+255 22 277 1234');
  });

  it('should leave an already normalized number unchanged', () => {
    const numbers = ['0754 111 222', '+255 22 266 0000', '255 688 123 456'];
    for (const number of numbers) {
      const once = normalizePhone(number);
      expect(once).not.toBeNull();
      expect(normalizePhone(once ?? '')).toBe(once);
    }
  });

  it('should reject numbers of the wrong length or country', () => {
    expect(normalizePhone('12345')).toBeNull();
    expect(normalizePhone('+254 712 345 678')).toBeNull();
    expect(normalizePhone('0712 345 67')).toBeNull();
    expect(normalizePhone('phone')).toBeNull();
  });
});

describe('normalizeEmail', () => {
  it('should lowercase and trim', () => {
    expect(normalizeEmail('  Info@Example.CO.TZ ')).toBe('info@example.co.tz');
  });

  it('should strip a mailto prefix', () => {
    expect(normalizeEmail('mailto:office@school.ac.tz')).toBe('office@school.ac.tz');
  });

  it('should reject malformed addresses', () => {
    expect(normalizeEmail('foo@@bar')).toBeNull();
    expect(normalizeEmail('no-at-sign')).toBeNull();
    expect(normalizeEmail('@example.com')).toBeNull();
    expect(normalizeEmail('user@')).toBeNull();
    expect(normalizeEmail('a b@example.com')).toBeNull();
  });
});

describe('normalizeAddress', () => {
  it('should collapse whitespace', () => {
    expect(normalizeAddress('  Plot 12,\n  Mikocheni ')).toBe('Plot 12, Mikocheni');
  });

  it('should treat blank addresses as absent', () => {
    expect(normalizeAddress('   ')).toBeUndefined();
    expect(normalizeAddress(undefined)).toBeUndefined();
  });
});

describe('cleanName and nameIdentity', () => {
  it('should keep the display form readable', () => {
    expect(cleanName('  St. John   Bosco ')).toBe('St. John Bosco');
  });

  it('should fold case, punctuation and whitespace into one identity', () => {
    expect(nameIdentity('St. John Bosco')).toBe('st john bosco');
    expect(nameIdentity('st john bosco ')).toBe('st john bosco');
  });

  it('should strip diacritics', () => {
    expect(nameIdentity('École Française')).toBe('ecole francaise');
  });
});

describe('normalizeWebsite', () => {
  it('should accept absolute http(s) URLs', () => {
    expect(normalizeWebsite(' https://school.ac.tz ')).toBe('https://school.ac.tz');
  });

  it('should reject other schemes and bare hosts', () => {
    expect(normalizeWebsite('ftp://files.example.com')).toBeUndefined();
    expect(normalizeWebsite('example.com')).toBeUndefined();
  });
});

describe('splitMultiValue', () => {
  it('should split on semicolons, commas and slashes', () => {
    expect(splitMultiValue('0712 345 678; 0754 111 222 / 0688 123 456, 0622 000 111')).toEqual([
      '0712 345 678',
      '0754 111 222',
      '0688 123 456',
      '0622 000 111',
    ]);
  });

  it('should return nothing for empty input', () => {
    expect(splitMultiValue(undefined)).toEqual([]);
    expect(splitMultiValue(' ; ')).toEqual([]);
  });
});
