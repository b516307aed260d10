import { REPAIR_STATUSES, type RepairStatus } from './types.js';
import { Validators } from './utils.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;
// YYYY-MM-DDTHH:MM:SS, no fractional seconds, no zone designator
const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/;

/**
 * Strict text-to-primitive coercions for event document values. Each returns
 * null when the text does not hold a value of the expected kind.
 */
export class DataTransforms {
  static parseInteger(value: string): number | null {
    if (!Validators.isValidString(value)) return null;
    const trimmed = value.trim();
    if (!INTEGER_PATTERN.test(trimmed)) return null;

    const num = Number(trimmed);
    return Number.isSafeInteger(num) ? num : null;
  }

  static parseDecimal(value: string): number | null {
    if (!Validators.isValidString(value)) return null;
    const trimmed = value.trim();
    if (!DECIMAL_PATTERN.test(trimmed)) return null;

    const num = parseFloat(trimmed);
    return Number.isFinite(num) ? num : null;
  }

  static parseQuantity(value: string): number | null {
    const num = DataTransforms.parseInteger(value);
    return Validators.isPositiveInteger(num) ? num : null;
  }

  static parseCost(value: string): number | null {
    const num = DataTransforms.parseDecimal(value);
    return num !== null && num >= 0 ? num : null;
  }

  /**
   * Reads a timestamp with no zone as the same wall-clock instant in UTC.
   * Out-of-range components (month 13, February 30th, hour 24) are rejected
   * rather than rolled over.
   */
  static parseTimestamp(value: string): Date | null {
    if (!Validators.isValidString(value)) return null;

    const match = value.trim().match(TIMESTAMP_PATTERN);
    if (!match) return null;

    const [, year, month, day, hour, minute, second] = match;
    const yearNum = parseInt(year, 10);
    const monthNum = parseInt(month, 10);
    const dayNum = parseInt(day, 10);
    const hourNum = parseInt(hour, 10);
    const minuteNum = parseInt(minute, 10);
    const secondNum = parseInt(second, 10);

    // Date.UTC maps years 0-99 onto 1900-1999, setUTCFullYear does not
    const date = new Date(0);
    date.setUTCFullYear(yearNum, monthNum - 1, dayNum);
    date.setUTCHours(hourNum, minuteNum, secondNum, 0);

    if (!Validators.isValidDate(date) ||
        date.getUTCFullYear() !== yearNum ||
        date.getUTCMonth() !== monthNum - 1 ||
        date.getUTCDate() !== dayNum ||
        date.getUTCHours() !== hourNum ||
        date.getUTCMinutes() !== minuteNum ||
        date.getUTCSeconds() !== secondNum) {
      return null;
    }
    return date;
  }

  static formatTimestamp(date: Date): string {
    return date.toISOString().slice(0, 19);
  }

  static repairStatus(value: string): RepairStatus | null {
    if (!Validators.isValidString(value)) return null;

    const trimmed = value.trim();
    const match = REPAIR_STATUSES.find(status => status === trimmed);
    return match || null;
  }
}
