import { IANAZone } from 'luxon';
import { ValidationError } from '../utils/errors';

export interface ScoringWeights {
  changeoverWeight: number; // score per changeover minute
  latenessWeight: number; // score per hour past due date
  loadWeight: number; // score per busy hour already on the line
  rushChangeoverCredit: number;
  efficiencyChangeoverWeight: number;
}

export interface SchedulingSettings {
  workStartHour: number;
  workEndHour: number;
  maxOvertimeHours: number;
  timezone: string;
  overtimeCostPerHour: number;
  defaultHorizonDays: number;
  maxConcurrentJobs: number;
  scoring: ScoringWeights;
}

export interface AppConfig {
  redis: {
    host: string;
    port: number;
  };
  server: {
    port: number;
    nodeEnv: string;
  };
  data: {
    seedFile?: string;
  };
  scheduling: SchedulingSettings;
}

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  changeoverWeight: 0.1,
  latenessWeight: 100,
  loadWeight: 0.5,
  rushChangeoverCredit: 0.05,
  efficiencyChangeoverWeight: 2,
};

export const DEFAULT_SCHEDULING_SETTINGS: SchedulingSettings = {
  workStartHour: 8,
  workEndHour: 17,
  maxOvertimeHours: 3,
  timezone: 'UTC',
  overtimeCostPerHour: 450,
  defaultHorizonDays: 7,
  maxConcurrentJobs: 3,
  scoring: DEFAULT_SCORING_WEIGHTS,
};

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new ValidationError(`${name} must be an integer`, name, raw);
  }
  return value;
}

function floatFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = parseFloat(raw);
  if (Number.isNaN(value)) {
    throw new ValidationError(`${name} must be a number`, name, raw);
  }
  return value;
}

export function assertWorkWindow(
  settings: Pick<SchedulingSettings, 'workStartHour' | 'workEndHour' | 'maxOvertimeHours' | 'timezone'>
): void {
  const { workStartHour, workEndHour, maxOvertimeHours, timezone } = settings;
  if (workStartHour < 0 || workEndHour > 23 || workStartHour >= workEndHour) {
    throw new ValidationError(
      `Invalid work window ${workStartHour}:00-${workEndHour}:00`,
      'workStartHour',
      { workStartHour, workEndHour }
    );
  }
  if (maxOvertimeHours < 0) {
    throw new ValidationError('maxOvertimeHours must not be negative', 'maxOvertimeHours', maxOvertimeHours);
  }
  if (!IANAZone.isValidZone(timezone)) {
    throw new ValidationError(`Unknown time zone ${timezone}`, 'timezone', timezone);
  }
}

export function loadConfig(): AppConfig {
  const defaults = DEFAULT_SCHEDULING_SETTINGS;
  const scheduling: SchedulingSettings = {
    workStartHour: intFromEnv('WORK_START_HOUR', defaults.workStartHour),
    workEndHour: intFromEnv('WORK_END_HOUR', defaults.workEndHour),
    maxOvertimeHours: intFromEnv('MAX_OVERTIME_HOURS', defaults.maxOvertimeHours),
    timezone: process.env.WORK_TIMEZONE || defaults.timezone,
    overtimeCostPerHour: floatFromEnv('OVERTIME_COST_PER_HOUR', defaults.overtimeCostPerHour),
    defaultHorizonDays: intFromEnv('DEFAULT_HORIZON_DAYS', defaults.defaultHorizonDays),
    maxConcurrentJobs: intFromEnv('MAX_CONCURRENT_JOBS', defaults.maxConcurrentJobs),
    scoring: {
      changeoverWeight: floatFromEnv('SCORE_CHANGEOVER_WEIGHT', DEFAULT_SCORING_WEIGHTS.changeoverWeight),
      latenessWeight: floatFromEnv('SCORE_LATENESS_WEIGHT', DEFAULT_SCORING_WEIGHTS.latenessWeight),
      loadWeight: floatFromEnv('SCORE_LOAD_WEIGHT', DEFAULT_SCORING_WEIGHTS.loadWeight),
      rushChangeoverCredit: floatFromEnv('SCORE_RUSH_CHANGEOVER_CREDIT', DEFAULT_SCORING_WEIGHTS.rushChangeoverCredit),
      efficiencyChangeoverWeight: floatFromEnv(
        'SCORE_EFFICIENCY_CHANGEOVER_WEIGHT',
        DEFAULT_SCORING_WEIGHTS.efficiencyChangeoverWeight
      ),
    },
  };
  assertWorkWindow(scheduling);

  return {
    redis: {
      host: process.env.REDIS_HOST || 'localhost',
      port: intFromEnv('REDIS_PORT', 6379),
    },
    server: {
      port: intFromEnv('PORT', 4000),
      nodeEnv: process.env.NODE_ENV || 'development',
    },
    data: {
      seedFile: process.env.SEED_FILE || undefined,
    },
    scheduling,
  };
}
