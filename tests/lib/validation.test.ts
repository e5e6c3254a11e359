import { describe, it, expect } from 'vitest';
import {
  isValidEquipmentCode,
  isValidPhone,
  isValidUsername,
  optionalText,
} from '../../src/lib/validation';

describe('validation', () => {
  it('should accept uppercase codes of five or more characters', () => {
    expect(isValidEquipmentCode('EQ-01')).toBe(true);
    expect(isValidEquipmentCode('LAB2-SCOPE-0042')).toBe(true);
    expect(isValidEquipmentCode('EQ-1')).toBe(false);
    expect(isValidEquipmentCode('eq-0001')).toBe(false);
    expect(isValidEquipmentCode('EQ 0001')).toBe(false);
  });

  it('should check usernames and phone numbers', () => {
    expect(isValidUsername('j.doe-2')).toBe(true);
    expect(isValidUsername('ab')).toBe(false);
    expect(isValidPhone('+44 20 7946 0000')).toBe(true);
    expect(isValidPhone('call me')).toBe(false);
  });

  it('should map blank optional text to null', () => {
    expect(optionalText('  ')).toBeNull();
    expect(optionalText(undefined)).toBeNull();
    expect(optionalText(' Lab 3 ')).toBe('Lab 3');
  });
});
