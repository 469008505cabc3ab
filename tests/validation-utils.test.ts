/**
 * Validation Utils Tests
 */

import { describe, it, expect } from '@jest/globals';
import { ValidationUtils, VALIDATION_BOUNDS } from '../src/utils/validation-utils';
import { ErrorCategory, TflError } from '../src/core/error-handler';

function captureError(fn: () => unknown): TflError {
  try {
    fn();
  } catch (error) {
    if (error instanceof TflError) return error;
    throw error;
  }
  throw new Error('Expected a TflError to be thrown');
}

describe('ValidationUtils', () => {
  describe('validateApiInput', () => {
    it('should return the trimmed value', () => {
      expect(ValidationUtils.validateApiInput('  Oxford Circus ', 'Station')).toBe('Oxford Circus');
    });

    it('should strip control characters', () => {
      expect(ValidationUtils.validateApiInput('Bank\u0000\u0007', 'Station')).toBe('Bank');
    });

    it('should raise validation errors with the field name', () => {
      const missing = captureError(() => ValidationUtils.validateApiInput(undefined, 'Station'));
      expect(missing.message).toBe('Station parameter is required');
      expect(missing.category).toBe(ErrorCategory.VALIDATION);

      expect(() => ValidationUtils.validateApiInput(['Bank'], 'Station')).toThrow('Station parameter must be a string');
      expect(() => ValidationUtils.validateApiInput(' \t ', 'Station')).toThrow('Station parameter must not be empty');
    });

    it('should enforce the maximum length', () => {
      const long = 'a'.repeat(VALIDATION_BOUNDS.MAX_QUERY_LENGTH + 1);

      expect(() => ValidationUtils.validateApiInput(long, 'Location')).toThrow(
        'Location parameter exceeds maximum length of 500 characters'
      );
      expect(ValidationUtils.validateApiInput('abc', 'Location', 3)).toBe('abc');
    });
  });

  describe('parseLineIds', () => {
    it('should split, trim and drop empty entries', () => {
      expect(ValidationUtils.parseLineIds('victoria, central,,  jubilee ,')).toEqual(['victoria', 'central', 'jubilee']);
    });

    it('should reject a list with no line names', () => {
      expect(() => ValidationUtils.parseLineIds(',,')).toThrow('Lines parameter must name at least one line');
    });
  });

  describe('validateCoordinate', () => {
    it('should accept numbers and numeric strings within bounds', () => {
      expect(ValidationUtils.validateCoordinate(51.5074, 'Latitude', 90)).toBe(51.5074);
      expect(ValidationUtils.validateCoordinate(' -0.1278 ', 'Longitude', 180)).toBe(-0.1278);
      expect(ValidationUtils.validateCoordinate(-90, 'Latitude', 90)).toBe(-90);
    });

    it('should reject out-of-range and non-numeric values', () => {
      expect(() => ValidationUtils.validateCoordinate(90.5, 'Latitude', 90)).toThrow(
        'Latitude must be a number between -90 and 90'
      );
      expect(() => ValidationUtils.validateCoordinate(Number.NaN, 'Longitude', 180)).toThrow(
        'Longitude must be a number between -180 and 180'
      );
      expect(() => ValidationUtils.validateCoordinate('', 'Longitude', 180)).toThrow(
        'Longitude must be a number between -180 and 180'
      );
      expect(() => ValidationUtils.validateCoordinate(null, 'Latitude', 90)).toThrow('Latitude parameter is required');
    });
  });

  describe('resolveRadius', () => {
    it.each([
      [undefined, 1000],
      [null, 1000],
      [0, 1000],
      [250, 250],
      ['750', 750],
      [1000, 1000],
      [1001, 1000],
      [5000, 1000]
    ])('should resolve %p to %p metres', (input, expected) => {
      expect(ValidationUtils.resolveRadius(input)).toBe(expected);
    });

    it('should reject negative and non-numeric radii', () => {
      expect(() => ValidationUtils.resolveRadius(-1)).toThrow('Radius must be a positive number of metres');
      expect(() => ValidationUtils.resolveRadius('wide')).toThrow('Radius must be a positive number of metres');
    });
  });

  describe('validateArguments', () => {
    it('should return a copy of an object argument', () => {
      const args = { station: 'Bank' };
      const validated = ValidationUtils.validateArguments(args);

      expect(validated).toEqual(args);
      expect(validated).not.toBe(args);
    });

    it('should reject missing and non-object arguments', () => {
      expect(() => ValidationUtils.validateArguments(undefined)).toThrow('Missing arguments');
      expect(() => ValidationUtils.validateArguments(null)).toThrow('Missing arguments');
      expect(() => ValidationUtils.validateArguments('Bank')).toThrow('Invalid arguments: expected object');
      expect(() => ValidationUtils.validateArguments(['Bank'])).toThrow('Invalid arguments: expected object');
    });
  });
});
