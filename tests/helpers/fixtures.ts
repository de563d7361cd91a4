import { DEFAULT_SCHEDULING_SETTINGS, SchedulingSettings } from '../../src/config/environment';
import { InMemoryScheduleRepository } from '../../src/repository/in_memory_repository';
import { WorkCalendar } from '../../src/scheduler/work_calendar';

/** Monday 2026-02-23, 09:00 UTC. */
export const MONDAY_9AM = new Date('2026-02-23T09:00:00.000Z');

export const settings: SchedulingSettings = { ...DEFAULT_SCHEDULING_SETTINGS, timezone: 'UTC' };

export function utc(iso: string): Date {
  return new Date(`${iso}Z`);
}

export function fixedClock(at: Date = MONDAY_9AM): () => Date {
  return () => at;
}

export function createRepository(clock: () => Date = fixedClock()): InMemoryScheduleRepository {
  let seq = 0;
  return new InMemoryScheduleRepository({
    generateId: () => {
      seq += 1;
      return `gen-${seq}`;
    },
    clock,
  });
}

export function createCalendar(overrides: Partial<SchedulingSettings> = {}): WorkCalendar {
  return new WorkCalendar({ ...settings, ...overrides });
}
