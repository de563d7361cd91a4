import {
  Identifier,
  JobAssignment,
  NewScheduledJob,
  OptimizationMeta,
  OrderWithItems,
  ProductionLine,
  ScheduledJobWithProduct,
  ScheduleRequest,
  ScheduleResult,
  STRATEGIES,
  Strategy,
  Task,
} from '../domain/types';
import { ScoringWeights, SchedulingSettings } from '../config/environment';
import { PersistedSchedule, ScheduleRepository } from '../repository/schedule_repository';
import { errorMessage, SchedulingError } from '../utils/errors';
import { logger } from '../utils/logger';
import { addDays, addHours, addMinutes, hoursBetween } from '../utils/time';
import { changeoverMinutes, isProductAllowed } from './changeover';
import { calculateConfidence, calculateMetrics } from './metrics';
import { buildTasks, sortTasks } from './task';
import { WorkCalendar } from './work_calendar';

export const MIN_HORIZON_DAYS = 1;
export const MAX_HORIZON_DAYS = 90;

/** Per-line cursor during Phase 2. */
export interface LineSlot {
  line: ProductionLine;
  currentTime: Date;
  lastProductSku: string | null;
  totalBusyHours: number;
  overtimeHours: number;
}

/** Time a line stays busy with jobs this run leaves in place. */
export interface LineOccupancy {
  until: Date;
  productSku: string | null;
}

export interface AssignmentOutcome {
  assignments: JobAssignment[];
  warnings: string[];
  unscheduled: Task[];
}

/** Phase 3 extension point. */
export interface ScheduleOptimizer {
  optimize(
    assignments: JobAssignment[],
    tasks: readonly Task[],
    lines: readonly ProductionLine[]
  ): Promise<{ assignments: JobAssignment[]; meta: OptimizationMeta }>;
}

export const passThroughOptimizer: ScheduleOptimizer = {
  async optimize(assignments) {
    return { assignments, meta: { applied: false, reason: 'not yet integrated' } };
  },
};

export interface SchedulerDependencies {
  repository: ScheduleRepository;
  calendar: WorkCalendar;
  settings: Pick<SchedulingSettings, 'maxOvertimeHours' | 'scoring'>;
  optimizer?: ScheduleOptimizer;
  clock?: () => Date;
}

const HOUR_MS = 3_600_000;

/**
 * Lower is better: projected finish, plus changeover and lateness penalties, a
 * strategy adjustment on changeover, and the load already on the line.
 */
export function scoreAssignment(
  task: Task,
  slot: LineSlot,
  changeover: number,
  jobEnd: Date,
  strategy: Strategy,
  weights: ScoringWeights
): number {
  let score = jobEnd.getTime() / HOUR_MS;
  score += changeover * weights.changeoverWeight;

  if (jobEnd.getTime() > task.dueDate.getTime()) {
    score += hoursBetween(task.dueDate, jobEnd) * weights.latenessWeight;
  }

  if (strategy === 'rush') {
    score -= changeover * weights.rushChangeoverCredit;
  } else if (strategy === 'efficiency') {
    score += changeover * weights.efficiencyChangeoverWeight;
  }

  score += slot.totalBusyHours * weights.loadWeight;
  return score;
}

function emptyResult(request: ScheduleRequest, warning: string): ScheduleResult {
  return {
    jobs: [],
    totalJobs: 0,
    totalChangeoverMinutes: 0,
    utilizationPct: 0,
    warnings: [warning],
    metadata: {
      onTimeDeliveryRate: 0,
      overtimeHours: 0,
      confidenceScore: 0,
      strategy: request.strategy,
      horizonDays: request.horizonDays,
      supersededJobs: 0,
      optimization: { applied: false, reason: 'nothing to schedule' },
    },
  };
}

/**
 * Re-planned items lose their old `planned` job even when this run could not place them
 * again, since new work may already occupy that time.
 */
function droppedPlanWarnings(
  openJobs: readonly ScheduledJobWithProduct[],
  tasks: readonly Task[],
  assignments: readonly JobAssignment[]
): string[] {
  const replanned = new Set(tasks.map(task => task.orderItemId));
  const placed = new Set(assignments.map(assignment => assignment.orderItemId));
  const dropped = new Set(
    openJobs
      .filter(job => job.status === 'planned' && replanned.has(job.orderItemId) && !placed.has(job.orderItemId))
      .map(job => job.orderItemId)
  );
  return Array.from(dropped, id => `Order item ${id} lost its previous planned slot and is now unscheduled.`);
}

export class ProductionScheduler {
  private readonly repository: ScheduleRepository;
  private readonly calendar: WorkCalendar;
  private readonly settings: Pick<SchedulingSettings, 'maxOvertimeHours' | 'scoring'>;
  private readonly optimizer: ScheduleOptimizer;
  private readonly clock: () => Date;

  constructor(deps: SchedulerDependencies) {
    this.repository = deps.repository;
    this.calendar = deps.calendar;
    this.settings = deps.settings;
    this.optimizer = deps.optimizer ?? passThroughOptimizer;
    this.clock = deps.clock ?? (() => new Date());
  }

  async generateSchedule(request: ScheduleRequest): Promise<ScheduleResult> {
    this.assertRequest(request);
    logger.info('Generating schedule', {
      strategy: request.strategy,
      horizonDays: request.horizonDays,
      orderCount: request.orderIds?.length ?? 'all pending',
    });

    const { orders, lines, openJobs } = await this.fetchInputs(request.orderIds);

    if (lines.length === 0) {
      return emptyResult(request, 'No active production lines configured. Please set up lines before scheduling.');
    }
    if (orders.length === 0) {
      return emptyResult(request, 'No pending orders found to schedule.');
    }

    const tasks = buildTasks(orders);
    if (tasks.length === 0) {
      return emptyResult(request, 'No schedulable order items found.');
    }

    // Phase 1
    const sorted = sortTasks(tasks);

    // Phase 2
    const now = this.clock();
    const horizonEnd = addDays(now, request.horizonDays);
    const occupancy = this.occupancyByLine(openJobs, new Set(tasks.map(task => task.orderItemId)));
    const { assignments, warnings } = this.assignTasks(sorted, lines, now, horizonEnd, request.strategy, occupancy);

    // Phase 3
    const optimized = await this.optimizer.optimize(assignments, sorted, lines);

    warnings.push(...droppedPlanWarnings(openJobs, tasks, optimized.assignments));

    const persisted = await this.persist(tasks, optimized.assignments);

    const metrics = calculateMetrics(persisted.jobs, tasks, lines.length, now, horizonEnd, this.calendar);
    const confidence = calculateConfidence(persisted.jobs, tasks);
    const totalChangeoverMinutes = persisted.jobs.reduce((sum, job) => sum + job.changeoverMinutes, 0);

    logger.info('Schedule generated', {
      totalJobs: persisted.jobs.length,
      tasks: tasks.length,
      superseded: persisted.supersededCount,
      warnings: warnings.length,
    });

    return {
      jobs: persisted.jobs,
      totalJobs: persisted.jobs.length,
      totalChangeoverMinutes,
      utilizationPct: metrics.utilizationPct,
      warnings,
      metadata: {
        onTimeDeliveryRate: metrics.onTimeDeliveryRate,
        overtimeHours: metrics.overtimeHours,
        confidenceScore: confidence,
        strategy: request.strategy,
        horizonDays: request.horizonDays,
        supersededJobs: persisted.supersededCount,
        optimization: optimized.meta,
      },
    };
  }

  /**
   * Phase 2: walks the sorted tasks once and commits each to the lowest-scoring line.
   * Tasks with no eligible line are reported, never dropped silently.
   */
  assignTasks(
    tasks: readonly Task[],
    lines: readonly ProductionLine[],
    startTime: Date,
    horizonEnd: Date,
    strategy: Strategy,
    occupancy: ReadonlyMap<Identifier, LineOccupancy> = new Map()
  ): AssignmentOutcome {
    const warnings: string[] = [];
    const assignments: JobAssignment[] = [];
    const unscheduled: Task[] = [];
    const workStart = this.calendar.alignToWorkStart(startTime);

    const slots: LineSlot[] = lines.map(line => {
      const busy = occupancy.get(line.id);
      const freeAt = busy && busy.until.getTime() > workStart.getTime() ? this.calendar.nextWorkMoment(busy.until) : workStart;
      return {
        line,
        currentTime: freeAt,
        lastProductSku: busy ? busy.productSku : null,
        totalBusyHours: 0,
        overtimeHours: 0,
      };
    });

    for (const task of tasks) {
      const best = this.findBestSlot(task, slots, strategy, horizonEnd);
      if (!best) {
        unscheduled.push(task);
        const compatible = slots.some(slot => isProductAllowed(task.productSku, slot.line));
        warnings.push(
          compatible
            ? `Order item ${task.orderItemId} does not fit before the planning horizon on any compatible line.`
            : `Order item ${task.orderItemId} cannot run on any active line (product ${task.productSku} not allowed).`
        );
        continue;
      }

      const { slot, changeover } = best;
      const jobStart = addMinutes(slot.currentTime, changeover);
      const jobEnd = addHours(jobStart, task.estimatedHours);

      if (jobEnd.getTime() > horizonEnd.getTime()) {
        warnings.push(`Order item ${task.orderItemId} extends beyond planning horizon.`);
      }

      const overtime = this.calendar.calculateOvertime(jobStart, jobEnd);
      if (overtime > this.settings.maxOvertimeHours) {
        warnings.push(
          `Order item ${task.orderItemId} requires ${overtime.toFixed(1)}h overtime (max ${this.settings.maxOvertimeHours}h).`
        );
      }

      if (jobEnd.getTime() > task.dueDate.getTime()) {
        warnings.push(`Order item ${task.orderItemId} is projected to finish after due date.`);
      }

      assignments.push({
        orderItemId: task.orderItemId,
        productionLineId: slot.line.id,
        productId: task.productId,
        productSku: task.productSku,
        plannedStart: jobStart,
        plannedEnd: jobEnd,
        quantity: task.quantity,
        changeoverMinutes: changeover,
        status: 'planned',
        notes: null,
        overtimeHours: overtime,
      });
      logger.debug('Assigned order item', {
        orderItemId: task.orderItemId,
        line: slot.line.name,
        start: jobStart.toISOString(),
        end: jobEnd.toISOString(),
        changeover,
      });

      slot.currentTime = jobEnd;
      slot.lastProductSku = task.productSku;
      slot.totalBusyHours += task.estimatedHours + changeover / 60;
      slot.overtimeHours += overtime;
    }

    if (unscheduled.length > 0) {
      warnings.push(
        `${unscheduled.length} order item(s) could not be scheduled within the planning horizon due to capacity constraints.`
      );
    }

    return { assignments, warnings, unscheduled };
  }

  private findBestSlot(
    task: Task,
    slots: LineSlot[],
    strategy: Strategy,
    horizonEnd: Date
  ): { slot: LineSlot; changeover: number } | undefined {
    const latestEnd = addHours(horizonEnd, this.settings.maxOvertimeHours);
    let best: { slot: LineSlot; changeover: number; score: number } | undefined;

    for (const slot of slots) {
      if (!isProductAllowed(task.productSku, slot.line)) continue;

      const changeover = changeoverMinutes(slot.lastProductSku, task.productSku, slot.line);
      const jobEnd = addHours(addMinutes(slot.currentTime, changeover), task.estimatedHours);
      if (jobEnd.getTime() > latestEnd.getTime()) continue;

      const score = scoreAssignment(task, slot, changeover, jobEnd, strategy, this.settings.scoring);
      // strict comparison keeps the earlier line on ties
      if (!best || score < best.score) {
        best = { slot, changeover, score };
      }
    }
    return best;
  }

  /**
   * Open jobs this run keeps: everything `in_progress`, and `planned` jobs of order
   * items that are not being re-planned. New work on a line starts after the last of them.
   */
  private occupancyByLine(
    openJobs: readonly ScheduledJobWithProduct[],
    replannedItems: ReadonlySet<Identifier>
  ): Map<Identifier, LineOccupancy> {
    const occupancy = new Map<Identifier, LineOccupancy>();
    for (const job of openJobs) {
      const kept = job.status === 'in_progress' || !replannedItems.has(job.orderItemId);
      if (!kept) continue;
      const current = occupancy.get(job.productionLineId);
      if (!current || job.plannedEnd.getTime() > current.until.getTime()) {
        occupancy.set(job.productionLineId, { until: job.plannedEnd, productSku: job.productSku });
      }
    }
    return occupancy;
  }

  private assertRequest(request: ScheduleRequest): void {
    if (!STRATEGIES.includes(request.strategy)) {
      throw new SchedulingError(
        `Unknown scheduling strategy "${String(request.strategy)}". Expected one of: ${STRATEGIES.join(', ')}.`,
        'INVALID_STRATEGY',
        { strategy: request.strategy }
      );
    }
    if (
      !Number.isInteger(request.horizonDays) ||
      request.horizonDays < MIN_HORIZON_DAYS ||
      request.horizonDays > MAX_HORIZON_DAYS
    ) {
      throw new SchedulingError(
        `horizonDays must be an integer between ${MIN_HORIZON_DAYS} and ${MAX_HORIZON_DAYS}.`,
        'INVALID_REQUEST',
        { horizonDays: request.horizonDays }
      );
    }
  }

  private async fetchInputs(orderIds?: Identifier[]): Promise<{
    orders: OrderWithItems[];
    lines: ProductionLine[];
    openJobs: ScheduledJobWithProduct[];
  }> {
    try {
      const lines = await this.repository.findActiveLines();
      const orders = await this.repository.findPendingOrders(orderIds);
      const openJobs = await this.repository.findOpenJobs();
      return { orders, lines, openJobs };
    } catch (error) {
      logger.error('Failed to load scheduling inputs', { error: errorMessage(error) });
      throw new SchedulingError(`Failed to load scheduling inputs: ${errorMessage(error)}`, 'DATA_FETCH_FAILED', error);
    }
  }

  private async persist(tasks: readonly Task[], assignments: JobAssignment[]): Promise<PersistedSchedule> {
    const jobs: NewScheduledJob[] = assignments.map(({ productSku: _sku, overtimeHours: _overtime, ...job }) => job);
    return this.repository.replacePlannedJobs(tasks.map(task => task.orderItemId), jobs);
  }
}
