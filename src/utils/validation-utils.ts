/**
 * Validation Utilities
 * Tool argument validation and sanitization. Every failure is a validation
 * TflError, raised before any upstream call is made.
 */

import { validationError } from '../core/error-handler.js';
import { ToolArguments } from '../types/mcp.types.js';

export const VALIDATION_BOUNDS = {
  MAX_QUERY_LENGTH: 500,
  LATITUDE_MAX: 90,
  LONGITUDE_MAX: 180,
  MAX_RADIUS: 1000,                  // metres; larger radii are clamped
  DEFAULT_RADIUS: 1000
} as const;

export class ValidationUtils {
  /**
   * Validate a required string argument and return it trimmed
   */
  static validateApiInput(
    value: unknown,
    fieldName: string,
    maxLength: number = VALIDATION_BOUNDS.MAX_QUERY_LENGTH
  ): string {
    if (value === undefined || value === null) {
      throw validationError(`${fieldName} parameter is required`, { field: fieldName });
    }

    if (typeof value !== 'string') {
      throw validationError(`${fieldName} parameter must be a string`, {
        field: fieldName,
        providedType: typeof value
      });
    }

    const sanitized = this.sanitizeInput(value);

    if (!sanitized) {
      throw validationError(`${fieldName} parameter must not be empty`, { field: fieldName });
    }

    if (sanitized.length > maxLength) {
      throw validationError(`${fieldName} parameter exceeds maximum length of ${maxLength} characters`, {
        field: fieldName,
        length: sanitized.length
      });
    }

    return sanitized;
  }

  /**
   * Remove control characters and surrounding whitespace
   */
  static sanitizeInput(input: string): string {
    return input
      .replace(/[\u0000-\u001F\u007F]/g, '')
      .trim();
  }

  /**
   * Split a comma-separated line list, trimming entries and dropping empty ones
   */
  static parseLineIds(value: unknown): string[] {
    const lines = this.validateApiInput(value, 'Lines');
    const ids = lines.split(',').map(line => line.trim()).filter(line => line.length > 0);

    if (ids.length === 0) {
      throw validationError('Lines parameter must name at least one line', { lines });
    }

    return ids;
  }

  /**
   * Accept a finite number, or a numeric string, within ±bound
   */
  static validateCoordinate(value: unknown, fieldName: string, bound: number): number {
    const coordinate = this.toNumber(value);

    if (coordinate === undefined) {
      throw validationError(`${fieldName} parameter is required`, { field: fieldName });
    }

    if (coordinate === null || coordinate < -bound || coordinate > bound) {
      throw validationError(`${fieldName} must be a number between -${bound} and ${bound}`, {
        field: fieldName,
        providedValue: value
      });
    }

    return coordinate;
  }

  /**
   * Absent or zero radius falls back to the default; larger radii are clamped to the maximum
   */
  static resolveRadius(value: unknown): number {
    const radius = this.toNumber(value);

    if (radius === undefined || radius === 0) {
      return VALIDATION_BOUNDS.DEFAULT_RADIUS;
    }

    if (radius === null || radius < 0) {
      throw validationError('Radius must be a positive number of metres', { providedValue: value });
    }

    return Math.min(radius, VALIDATION_BOUNDS.MAX_RADIUS);
  }

  /**
   * Ensure tool arguments arrived as a plain object
   */
  static validateArguments(args: unknown): ToolArguments {
    if (args === undefined || args === null) {
      throw validationError('Missing arguments');
    }

    if (typeof args !== 'object' || Array.isArray(args)) {
      throw validationError('Invalid arguments: expected object', {
        providedType: Array.isArray(args) ? 'array' : typeof args
      });
    }

    return Object.fromEntries(Object.entries(args));
  }

  /**
   * undefined when absent, null when present but not a finite number
   */
  private static toNumber(value: unknown): number | null | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }

    if (typeof value === 'number') {
      return Number.isFinite(value) ? value : null;
    }

    if (typeof value === 'string' && value.trim() !== '') {
      const parsed = Number(value.trim());
      return Number.isFinite(parsed) ? parsed : null;
    }

    return null;
  }
}
