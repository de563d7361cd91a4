import { ScheduledJob, ScheduleMetrics, Task } from '../domain/types';
import { hoursBetween, roundTo } from '../utils/time';
import { WorkCalendar } from './work_calendar';

type TimedJob = Pick<ScheduledJob, 'orderItemId' | 'plannedStart' | 'plannedEnd'>;

const CONFIDENCE_WEIGHTS = { dataQuality: 0.2, onTime: 0.5, coverage: 0.3 };

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export function countOnTime(jobs: readonly TimedJob[], tasks: readonly Task[]): number {
  const dueByItem = new Map(tasks.map(task => [task.orderItemId, task.dueDate]));
  return jobs.filter(job => {
    const due = dueByItem.get(job.orderItemId);
    return due !== undefined && job.plannedEnd.getTime() <= due.getTime();
  }).length;
}

export function calculateMetrics(
  jobs: readonly TimedJob[],
  tasks: readonly Task[],
  lineCount: number,
  start: Date,
  horizonEnd: Date,
  calendar: WorkCalendar
): ScheduleMetrics {
  if (jobs.length === 0) {
    return { onTimeDeliveryRate: 0, utilizationPct: 0, overtimeHours: 0 };
  }

  const onTimeRate = (countOnTime(jobs, tasks) / jobs.length) * 100;

  const availableHours = hoursBetween(start, horizonEnd) * lineCount;
  const busyHours = jobs.reduce((sum, job) => sum + hoursBetween(job.plannedStart, job.plannedEnd), 0);
  const utilization = availableHours > 0 ? (busyHours / availableHours) * 100 : 0;

  const overtime = jobs.reduce((sum, job) => sum + calendar.calculateOvertime(job.plannedStart, job.plannedEnd), 0);

  return {
    onTimeDeliveryRate: roundTo(onTimeRate, 1),
    utilizationPct: roundTo(clamp(utilization, 0, 100), 1),
    overtimeHours: roundTo(overtime, 1),
  };
}

/**
 * 0-100 blend of data quality (share of tasks on learned cycle times), on-time share
 * of the placed jobs, and coverage (placed jobs over tasks).
 */
export function calculateConfidence(jobs: readonly TimedJob[], tasks: readonly Task[]): number {
  if (jobs.length === 0 || tasks.length === 0) return 0;

  const learned = tasks.filter(task => task.hasLearnedCycleTime).length;
  const dataScore = Math.min((learned / tasks.length) * 100, 100);
  const onTimeScore = (countOnTime(jobs, tasks) / jobs.length) * 100;
  const coverageScore = (jobs.length / tasks.length) * 100;

  const confidence =
    dataScore * CONFIDENCE_WEIGHTS.dataQuality +
    onTimeScore * CONFIDENCE_WEIGHTS.onTime +
    coverageScore * CONFIDENCE_WEIGHTS.coverage;
  return roundTo(clamp(confidence, 0, 100), 1);
}
