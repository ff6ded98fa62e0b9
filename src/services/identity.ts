// src/services/identity.ts
// Identity normalization: bare numbers belong to the whatsapp channel

import { z } from 'zod';
import { ValidationError } from './errors';

const WHATSAPP = /^whatsapp:\+?\d{6,15}$/;
const PLATFORM = /^p:[A-Za-z0-9_.-]{1,64}$/;

export const identitySchema = z
  .string()
  .trim()
  .min(1, 'identity is required')
  .max(80, 'identity is too long')
  .transform((value) =>
    value.startsWith('whatsapp:') || value.startsWith('p:') ? value : `whatsapp:${value}`
  )
  .refine((value) => WHATSAPP.test(value) || PLATFORM.test(value), {
    message: 'identity must be a phone number, "whatsapp:<number>" or "p:<token>"',
  });

export type Identity = z.infer<typeof identitySchema>;

/**
 * "+62812..." -> "whatsapp:+62812...". Throws ValidationError on anything
 * that is neither a phone number nor a platform token.
 */
export function normalizeIdentity(raw: string): string {
  const result = identitySchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      'Invalid identity',
      result.error.errors.map((e) => e.message)
    );
  }
  return result.data;
}
