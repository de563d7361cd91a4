import { AppConfig, SchedulingSettings } from './config/environment';
import { SchedulingQueue, SchedulingRunQueue } from './jobs/job_queue';
import { ScheduleRepository } from './repository/schedule_repository';
import { DeliveryEstimator } from './scheduler/delivery_estimator';
import { ProductionScheduler, ScheduleOptimizer } from './scheduler/production_scheduler';
import { RushOrderSimulator } from './scheduler/rush_order_simulator';
import { WorkCalendar } from './scheduler/work_calendar';

export interface AppContext {
  settings: SchedulingSettings;
  repository: ScheduleRepository;
  calendar: WorkCalendar;
  scheduler: ProductionScheduler;
  simulator: RushOrderSimulator;
  estimator: DeliveryEstimator;
  queue: SchedulingRunQueue;
}

export interface AppContextOptions {
  clock?: () => Date;
  optimizer?: ScheduleOptimizer;
  createQueue?: (scheduler: ProductionScheduler) => SchedulingRunQueue;
}

/** Wires the engine's services around one repository and one set of settings. */
export function createAppContext(
  config: Pick<AppConfig, 'redis' | 'scheduling'>,
  repository: ScheduleRepository,
  options: AppContextOptions = {}
): AppContext {
  const settings = config.scheduling;
  const calendar = new WorkCalendar(settings);
  const { clock, optimizer } = options;

  const scheduler = new ProductionScheduler({ repository, calendar, settings, optimizer, clock });
  const simulator = new RushOrderSimulator({ repository, calendar, settings, clock });
  const estimator = new DeliveryEstimator({ repository, calendar, clock });

  const createQueue =
    options.createQueue ??
    ((s: ProductionScheduler) =>
      new SchedulingQueue({ redis: config.redis, concurrency: settings.maxConcurrentJobs }, s));

  return {
    settings,
    repository,
    calendar,
    scheduler,
    simulator,
    estimator,
    queue: createQueue(scheduler),
  };
}
