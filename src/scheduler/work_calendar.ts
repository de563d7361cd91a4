import { DateTime } from 'luxon';
import { SchedulingSettings } from '../config/environment';
import { MS_PER_HOUR } from '../utils/time';

export type WorkCalendarConfig = Pick<SchedulingSettings, 'workStartHour' | 'workEndHour' | 'timezone'>;

const SATURDAY = 6;

/**
 * Working-hour arithmetic over a fixed daily window, Monday to Friday.
 *
 * All inputs and outputs are plain `Date`s; wall-clock fields (hour, weekday) are
 * read in the configured IANA zone, so a window of 08:00-17:00 means local time
 * at the plant.
 */
export class WorkCalendar {
  constructor(private readonly config: WorkCalendarConfig) {}

  /**
   * Moves `date` to the start of the hour it falls in, or to the next work start when it
   * lies before the window, after it, or on a weekend. Minutes are truncated, so a time
   * inside the window can move backwards by up to an hour.
   */
  alignToWorkStart(date: Date): Date {
    let result = this.zoned(date).startOf('hour');
    if (result.hour < this.config.workStartHour) {
      result = result.set({ hour: this.config.workStartHour });
    } else if (result.hour >= this.config.workEndHour) {
      result = this.nextWorkdayStart(result);
    }
    result = this.skipWeekend(result);
    return result.toJSDate();
  }

  /** `date` itself when work could happen at that instant, otherwise the next work start. */
  nextWorkMoment(date: Date): Date {
    return this.isWithinWorkHours(date) ? date : this.alignToWorkStart(date);
  }

  isWithinWorkHours(date: Date): boolean {
    const zoned = this.zoned(date);
    return (
      zoned.weekday < SATURDAY &&
      zoned.hour >= this.config.workStartHour &&
      zoned.hour < this.config.workEndHour
    );
  }

  /** Consumes `hours` of working time from `date`, skipping nights and weekends. */
  advanceWorkHours(date: Date, hours: number): Date {
    let remainingMs = Math.round(hours * MS_PER_HOUR);
    if (remainingMs <= 0) return date;

    let current = this.zoned(date);
    while (remainingMs > 0) {
      if (current.hour >= this.config.workEndHour) {
        current = this.nextWorkdayStart(current);
      }
      if (current.hour < this.config.workStartHour) {
        current = current.set({ hour: this.config.workStartHour, minute: 0, second: 0, millisecond: 0 });
      }
      current = this.skipWeekend(current);

      const dayEnd = current.set({ hour: this.config.workEndHour, minute: 0, second: 0, millisecond: 0 });
      const availableMs = dayEnd.toMillis() - current.toMillis();
      if (availableMs <= 0) {
        current = this.nextWorkdayStart(current);
        continue;
      }

      if (remainingMs <= availableMs) {
        current = current.plus({ milliseconds: remainingMs });
        remainingMs = 0;
      } else {
        remainingMs -= availableMs;
        current = this.nextWorkdayStart(current);
      }
    }
    return current.toJSDate();
  }

  /**
   * Hours of `[start, end)` spent outside the work window once a day's window has
   * closed: from the end hour through the night (and any weekend) up to the next work
   * start. Time before the window opens on the day the job starts is not counted.
   */
  calculateOvertime(start: Date, end: Date): number {
    const endMs = end.getTime();
    let overtimeMs = 0;
    let current = this.zoned(start);
    while (current.toMillis() < endMs) {
      const dayEnd = current.set({ hour: this.config.workEndHour, minute: 0, second: 0, millisecond: 0 });
      if (current.toMillis() >= dayEnd.toMillis()) {
        const next = this.nextWorkdayStart(current);
        overtimeMs += Math.min(endMs, next.toMillis()) - current.toMillis();
        current = next;
      } else {
        current = dayEnd.toMillis() < endMs ? dayEnd : this.zoned(end);
      }
    }
    return overtimeMs / MS_PER_HOUR;
  }

  private zoned(date: Date): DateTime {
    return DateTime.fromJSDate(date, { zone: this.config.timezone });
  }

  private nextWorkdayStart(dt: DateTime): DateTime {
    const next = dt
      .plus({ days: 1 })
      .set({ hour: this.config.workStartHour, minute: 0, second: 0, millisecond: 0 });
    return this.skipWeekend(next);
  }

  private skipWeekend(dt: DateTime): DateTime {
    let result = dt;
    while (result.weekday >= SATURDAY) {
      result = result.plus({ days: 1 });
    }
    return result;
  }
}
