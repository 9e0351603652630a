import { describe, it, expect } from 'vitest';
import { classifyTier, contactStatus, withTier, tierLabel } from '../../src/utils/tier.js';

const PHONE = ['+255 71 234 5678'];
const EMAIL = ['info@example.co.tz'];

describe('classifyTier', () => {
  it('should put complete records in Tier A', () => {
    expect(classifyTier({ phones: PHONE, emails: EMAIL, address: 'Sinza' })).toBe('A');
  });

  it('should put records with a phone but missing email or address in Tier B', () => {
    expect(classifyTier({ phones: PHONE, emails: [], address: 'Sinza' })).toBe('B');
    expect(classifyTier({ phones: PHONE, emails: EMAIL, address: undefined })).toBe('B');
    expect(classifyTier({ phones: PHONE, emails: [], address: undefined })).toBe('B');
  });

  it('should put records without a phone in Tier C', () => {
    expect(classifyTier({ phones: [], emails: EMAIL, address: 'Sinza' })).toBe('C');
    expect(classifyTier({ phones: [], emails: [], address: undefined })).toBe('C');
  });

  it('should not count a blank address', () => {
    expect(classifyTier({ phones: PHONE, emails: EMAIL, address: '  ' })).toBe('B');
  });
});

describe('contactStatus', () => {
  it('should describe each combination', () => {
    expect(contactStatus({ phones: PHONE, emails: EMAIL, address: 'Sinza' })).toBe('Complete');
    expect(contactStatus({ phones: PHONE, emails: [], address: 'Sinza' })).toBe('Phone Only');
    expect(contactStatus({ phones: PHONE, emails: EMAIL, address: undefined })).toBe('Partial');
    expect(contactStatus({ phones: [], emails: EMAIL, address: undefined })).toBe('Partial');
    expect(contactStatus({ phones: [], emails: [], address: 'Sinza' })).toBe('No Contact');
  });
});

describe('withTier', () => {
  it('should attach tier and status without touching other fields', () => {
    const org = withTier({ name: 'Mwenge Traders', phones: PHONE, emails: [], address: undefined });

    expect(org).toEqual({
      name: 'Mwenge Traders',
      phones: PHONE,
      emails: [],
      address: undefined,
      tier: 'B',
      contact_status: 'Phone Only',
    });
  });
});

describe('tierLabel', () => {
  it('should render the export label', () => {
    expect(tierLabel('C')).toBe('Tier C');
  });
});
