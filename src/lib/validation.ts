/**
 * Input Validation Utilities
 */

/**
 * Equipment code printed in the QR label: uppercase letters, digits and
 * hyphens, at least 5 characters
 */
export function isValidEquipmentCode(code: string): boolean {
  return /^[A-Z0-9-]{5,}$/.test(code);
}

/**
 * Validate email format
 */
export function isValidEmail(email: string): boolean {
  return /^[^@\s]+@[^@\s]+\.[^@\s]+$/.test(email);
}

/**
 * Validate phone number format
 */
export function isValidPhone(phone: string): boolean {
  return /^\+?[0-9 ]{7,20}$/.test(phone);
}

/**
 * Validate username: letters, digits, dot, hyphen, underscore
 */
export function isValidUsername(username: string): boolean {
  return /^[A-Za-z0-9._-]{3,32}$/.test(username);
}

/**
 * Validate positive integer
 */
export function isPositiveInt(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Validate non-empty string
 */
export function isNonEmptyString(value: unknown, minLength = 1): value is string {
  return typeof value === 'string' && value.trim().length >= minLength;
}

/**
 * Trim an optional text field, mapping blank to null
 */
export function optionalText(value: string | null | undefined): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}
