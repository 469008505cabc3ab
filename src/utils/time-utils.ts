/**
 * Time Utilities
 * Functions for arrival time calculations and formatting
 */

const MILLISECONDS_PER_MINUTE = 60 * 1000;

// Date and time, optional seconds and fraction, optional Z or ±HH:MM offset
const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?$/;

export class TimeUtils {
  /**
   * Parse an ISO-8601 date-time. Values without an offset are read in the
   * process's local time zone. Anything else, date-only strings included, is null.
   */
  static parseTimestamp(timestamp: string): Date | null {
    if (!ISO_DATE_TIME.test(timestamp.trim())) {
      return null;
    }

    const parsed = new Date(timestamp.trim());
    return isNaN(parsed.getTime()) ? null : parsed;
  }

  /**
   * Whole minutes from `now` until `target`, floored
   */
  static minutesUntil(target: Date, now: Date): number {
    return Math.floor((target.getTime() - now.getTime()) / MILLISECONDS_PER_MINUTE);
  }

  /**
   * Human description of an expected arrival: "N minutes", "Due" or "Time unknown"
   */
  static describeArrival(expectedArrival: string, now: Date = new Date()): string {
    const target = this.parseTimestamp(expectedArrival);
    if (!target) {
      return 'Time unknown';
    }

    const minutes = this.minutesUntil(target, now);
    return minutes > 0 ? `${minutes} minutes` : 'Due';
  }

  /**
   * Ascending order by instant. Unparsable values sort first; ties fall back to string order.
   */
  static compareTimestamps(a: string, b: string): number {
    const timeA = this.parseTimestamp(a)?.getTime();
    const timeB = this.parseTimestamp(b)?.getTime();

    if (timeA !== undefined && timeB !== undefined && timeA !== timeB) {
      return timeA - timeB;
    }
    if (timeA === undefined && timeB !== undefined) return -1;
    if (timeA !== undefined && timeB === undefined) return 1;

    if (a === b) return 0;
    return a < b ? -1 : 1;
  }
}
