// ============================================================================
// Patient Records: Phone Number Utilities
// ============================================================================

import { PHONE_NUMBER_PATTERN } from '../constants/patient.constants.js';

/**
 * Validates a patient phone number: an optional leading '+' followed by
 * 8 to 15 digits. No trimming is done here; callers trim form input first.
 *
 * @returns The phone number unchanged when valid, otherwise null.
 */
export function validatePhone(phone: string): string | null {
  if (typeof phone !== 'string') {
    return null;
  }
  return PHONE_NUMBER_PATTERN.test(phone) ? phone : null;
}

/**
 * Masks a phone number for log lines, keeping the last 3 characters.
 * Example: "+201234567890" → "**********890"
 */
export function maskPhone(phone: string): string {
  if (typeof phone !== 'string' || phone.length <= 3) {
    return '***';
  }
  return '*'.repeat(phone.length - 3) + phone.slice(-3);
}
