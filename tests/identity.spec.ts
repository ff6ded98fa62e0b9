// tests/identity.spec.ts

import { test, expect } from '@playwright/test';
import { ValidationError } from '../src/services/errors';
import { normalizeIdentity } from '../src/services/identity';

test.describe('normalizeIdentity', () => {
  test('bare numbers belong to the whatsapp channel', () => {
    expect(normalizeIdentity('+628123456789')).toBe('whatsapp:+628123456789');
    expect(normalizeIdentity('628123456789')).toBe('whatsapp:628123456789');
  });

  test('prefixed identities are kept as they are', () => {
    expect(normalizeIdentity('whatsapp:+628123456789')).toBe('whatsapp:+628123456789');
    expect(normalizeIdentity('p:user-42')).toBe('p:user-42');
  });

  test('surrounding whitespace is trimmed', () => {
    expect(normalizeIdentity('  p:user-42 ')).toBe('p:user-42');
  });

  test('rejects malformed identities', () => {
    for (const raw of ['', 'hello', 'whatsapp:12ab', 'p:', 'p:has space', '+12']) {
      expect(() => normalizeIdentity(raw)).toThrow(ValidationError);
    }
  });
});
