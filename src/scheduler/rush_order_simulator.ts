import {
  AffectedOrder,
  Product,
  ProductionLine,
  RushOrderInput,
  Scenario,
  ScheduledJobWithProduct,
  SimulationResult,
} from '../domain/types';
import { SchedulingSettings } from '../config/environment';
import { ScheduleRepository } from '../repository/schedule_repository';
import { errorMessage, SimulationError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { addMinutes, hoursBetween, maxDate, minutesBetween, roundTo } from '../utils/time';
import { changeoverMinutes, isProductAllowed } from './changeover';
import { estimateHoursForProduct } from './task';
import { WorkCalendar } from './work_calendar';

export const RUSH_PRIORITY = 1;
export const MAX_SCENARIOS = 3;

// Scenario selection weights, lower total is better.
const LATE_HOUR_PENALTY = 10;
const AFFECTED_ORDER_PENALTY = 5;
const DELAY_HOUR_PENALTY = 1;
const COST_PENALTY_PER_THOUSAND = 1;

export interface SimulatorDependencies {
  repository: ScheduleRepository;
  calendar: WorkCalendar;
  settings: Pick<SchedulingSettings, 'maxOvertimeHours' | 'overtimeCostPerHour'>;
  clock?: () => Date;
}

export interface RushPlan {
  product: Product;
  quantity: number;
  targetDate: Date;
  productionHours: number;
  now: Date;
}

export function scoreScenario(scenario: Scenario, targetDate: Date): number {
  let score = 0;
  if (!scenario.meetsTarget) {
    score += hoursBetween(targetDate, scenario.completionTime) * LATE_HOUR_PENALTY;
  }
  score += scenario.affectedOrders.length * AFFECTED_ORDER_PENALTY;
  score += (scenario.affectedOrders.reduce((sum, order) => sum + order.delayMinutes, 0) / 60) * DELAY_HOUR_PENALTY;
  score += (scenario.additionalCost / 1000) * COST_PENALTY_PER_THOUSAND;
  return score;
}

/** Keeps every scenario when there are at most three, else the three best by score with unique names. */
export function selectScenarios(scenarios: Scenario[], targetDate: Date): Scenario[] {
  if (scenarios.length <= MAX_SCENARIOS) return scenarios;

  const scored = scenarios
    .map(scenario => ({ scenario, score: scoreScenario(scenario, targetDate) }))
    .sort((a, b) => a.score - b.score);

  const selected: Scenario[] = [];
  const seen = new Set<string>();
  for (const { scenario } of scored) {
    if (selected.length >= MAX_SCENARIOS) break;
    if (seen.has(scenario.name)) continue;
    seen.add(scenario.name);
    selected.push(scenario);
  }
  return selected;
}

/**
 * Flags exactly one scenario: the first meeting the target with no displaced orders,
 * else the target-meeting one with fewest displaced orders then lowest cost, else the
 * earliest completion.
 */
export function pickRecommendation(scenarios: Scenario[]): { scenarios: Scenario[]; recommended: string | null } {
  if (scenarios.length === 0) return { scenarios, recommended: null };

  let chosen = scenarios.find(s => s.meetsTarget && s.affectedOrders.length === 0);
  if (!chosen) {
    const meeting = scenarios.filter(s => s.meetsTarget);
    if (meeting.length > 0) {
      chosen = meeting.reduce((best, s) =>
        s.affectedOrders.length < best.affectedOrders.length ||
        (s.affectedOrders.length === best.affectedOrders.length && s.additionalCost < best.additionalCost)
          ? s
          : best
      );
    } else {
      chosen = scenarios.reduce((best, s) =>
        s.completionTime.getTime() < best.completionTime.getTime() ? s : best
      );
    }
  }

  const flagged = scenarios.map(s => ({ ...s, recommendation: s === chosen }));
  return { scenarios: flagged, recommended: chosen.name };
}

export class RushOrderSimulator {
  private readonly repository: ScheduleRepository;
  private readonly calendar: WorkCalendar;
  private readonly settings: Pick<SchedulingSettings, 'maxOvertimeHours' | 'overtimeCostPerHour'>;
  private readonly clock: () => Date;

  constructor(deps: SimulatorDependencies) {
    this.repository = deps.repository;
    this.calendar = deps.calendar;
    this.settings = deps.settings;
    this.clock = deps.clock ?? (() => new Date());
  }

  /** Builds append and insert scenarios on every eligible line. Nothing is persisted. */
  async simulateRushOrder(input: RushOrderInput): Promise<SimulationResult> {
    if (!Number.isInteger(input.quantity) || input.quantity < 1) {
      throw new ValidationError('Quantity must be a positive integer', 'quantity', input.quantity);
    }
    const priority = input.priority ?? RUSH_PRIORITY;

    const { product, lines, openJobs } = await this.fetchSnapshot(input.productId);

    const eligible = lines.filter(line => isProductAllowed(product.sku, line));
    if (eligible.length === 0) {
      throw new SimulationError(
        `No active production line accepts product ${product.sku}.`,
        'NO_ELIGIBLE_LINES',
        { productId: product.id }
      );
    }

    const plan: RushPlan = {
      product,
      quantity: input.quantity,
      targetDate: input.targetDate,
      productionHours: estimateHoursForProduct(product, input.quantity),
      now: this.clock(),
    };

    const candidates: Scenario[] = [];
    for (const line of eligible) {
      const lineJobs = openJobs.filter(job => job.productionLineId === line.id);
      candidates.push(this.simulateAppend(plan, line, lineJobs));
      candidates.push(this.simulateInsert(plan, line, lineJobs));
    }

    if (candidates.length === 0) {
      throw new SimulationError(
        'No feasible scenarios found. All production lines are either at capacity or incompatible with the requested product.',
        'NO_FEASIBLE_SCENARIO'
      );
    }

    const { scenarios, recommended } = pickRecommendation(selectScenarios(candidates, input.targetDate));

    logger.info('Rush order simulated', {
      productSku: product.sku,
      quantity: input.quantity,
      candidates: candidates.length,
      recommended,
    });

    return {
      scenarios,
      rushOrder: {
        productId: product.id,
        productSku: product.sku,
        productName: product.name,
        quantity: input.quantity,
        priority,
        targetDate: input.targetDate,
        estimatedProductionHours: roundTo(plan.productionHours, 2),
      },
      recommendedScenario: recommended,
      totalScenarios: scenarios.length,
    };
  }

  /** Rush job after the line's last open job; existing orders are untouched. */
  private simulateAppend(plan: RushPlan, line: ProductionLine, lineJobs: readonly ScheduledJobWithProduct[]): Scenario {
    const byEnd = [...lineJobs].sort((a, b) => a.plannedEnd.getTime() - b.plannedEnd.getTime());
    const last: ScheduledJobWithProduct | undefined = byEnd[byEnd.length - 1];

    const startAfter = last ? maxDate(last.plannedEnd, plan.now) : plan.now;
    const changeover = changeoverMinutes(last ? last.productSku : null, plan.product.sku, line);
    const jobStart = addMinutes(this.calendar.nextWorkMoment(startAfter), changeover);
    const jobEnd = this.calendar.advanceWorkHours(jobStart, plan.productionHours);
    const overtime = this.calendar.calculateOvertime(jobStart, jobEnd);

    const warnings: string[] = [];
    this.warnOnOvertime(overtime, warnings);

    return this.finalize({
      name: `Append to ${line.name}`,
      kind: 'append',
      description: `Add rush order after all existing jobs on ${line.name}. No existing orders are affected.`,
      productionLineId: line.id,
      productionLineName: line.name,
      completionTime: jobEnd,
      changeoverMinutes: changeover,
      productionHours: plan.productionHours,
      affectedOrders: [],
      overtimeHours: overtime,
      additionalCost: overtime * this.settings.overtimeCostPerHour,
      meetsTarget: jobEnd.getTime() <= plan.targetDate.getTime(),
      recommendation: false,
      warnings,
    });
  }

  /**
   * Rush job ahead of the first job that has not started, then every later job on the
   * line cascades: it starts no earlier than its original start, and no earlier than its
   * predecessor's end plus changeover.
   */
  private simulateInsert(plan: RushPlan, line: ProductionLine, lineJobs: readonly ScheduledJobWithProduct[]): Scenario {
    const byStart = [...lineJobs].sort((a, b) => a.plannedStart.getTime() - b.plannedStart.getTime());

    let insertIndex = byStart.findIndex(job => job.plannedStart.getTime() > plan.now.getTime());
    if (insertIndex === -1) insertIndex = byStart.length;

    const previous = insertIndex > 0 ? byStart[insertIndex - 1] : undefined;
    const insertAt = this.calendar.nextWorkMoment(previous ? maxDate(previous.plannedEnd, plan.now) : plan.now);
    const changeoverIn = changeoverMinutes(previous ? previous.productSku : null, plan.product.sku, line);
    const rushStart = addMinutes(insertAt, changeoverIn);
    const rushEnd = this.calendar.advanceWorkHours(rushStart, plan.productionHours);

    let overtime = this.calendar.calculateOvertime(rushStart, rushEnd);
    const affectedOrders: AffectedOrder[] = [];
    let cursor = rushEnd;
    let previousSku: string | null = plan.product.sku;

    for (const job of byStart.slice(insertIndex)) {
      const changeover = changeoverMinutes(previousSku, job.productSku ?? plan.product.sku, line);
      const earliest = this.calendar.nextWorkMoment(addMinutes(cursor, changeover));
      const newStart = maxDate(earliest, job.plannedStart);
      const newEnd = this.calendar.advanceWorkHours(newStart, hoursBetween(job.plannedStart, job.plannedEnd));

      const delayMinutes = Math.max(minutesBetween(job.plannedEnd, newEnd), 0);
      if (delayMinutes > 0) {
        affectedOrders.push({
          orderItemId: job.orderItemId,
          originalEnd: job.plannedEnd,
          newEnd,
          delayMinutes: roundTo(delayMinutes, 1),
        });
        const extra =
          this.calendar.calculateOvertime(newStart, newEnd) -
          this.calendar.calculateOvertime(job.plannedStart, job.plannedEnd);
        overtime += Math.max(extra, 0);
      }

      cursor = newEnd;
      previousSku = job.productSku;
    }

    const warnings: string[] = [];
    if (affectedOrders.length > 0) {
      const maxDelay = Math.max(...affectedOrders.map(order => order.delayMinutes));
      warnings.push(`Maximum delay to existing orders: ${maxDelay.toFixed(0)} minutes.`);
    }
    this.warnOnOvertime(overtime, warnings);

    return this.finalize({
      name: `Insert into ${line.name}`,
      kind: 'insert',
      description: `Insert rush order at earliest slot on ${line.name}, pushing back ${affectedOrders.length} existing job(s).`,
      productionLineId: line.id,
      productionLineName: line.name,
      completionTime: rushEnd,
      changeoverMinutes: changeoverIn,
      productionHours: plan.productionHours,
      affectedOrders,
      overtimeHours: overtime,
      additionalCost: overtime * this.settings.overtimeCostPerHour,
      meetsTarget: rushEnd.getTime() <= plan.targetDate.getTime(),
      recommendation: false,
      warnings,
    });
  }

  private warnOnOvertime(overtime: number, warnings: string[]): void {
    if (overtime > this.settings.maxOvertimeHours) {
      warnings.push(`Requires ${overtime.toFixed(1)}h overtime (max ${this.settings.maxOvertimeHours}h).`);
    }
  }

  private finalize(scenario: Scenario): Scenario {
    return {
      ...scenario,
      productionHours: roundTo(scenario.productionHours, 2),
      overtimeHours: roundTo(scenario.overtimeHours, 2),
      additionalCost: roundTo(scenario.additionalCost, 2),
    };
  }

  private async fetchSnapshot(productId: string): Promise<{
    product: Product;
    lines: ProductionLine[];
    openJobs: ScheduledJobWithProduct[];
  }> {
    const product = await this.load(() => this.repository.findProduct(productId));
    if (!product) {
      throw new SimulationError(`Product ${productId} not found.`, 'PRODUCT_NOT_FOUND', { productId });
    }
    const lines = await this.load(() => this.repository.findActiveLines());
    if (lines.length === 0) {
      throw new SimulationError('No active production lines available.', 'NO_ACTIVE_LINES');
    }
    const openJobs = await this.load(() => this.repository.findOpenJobs());
    return { product, lines, openJobs };
  }

  private async load<T>(query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      logger.error('Failed to load simulation snapshot', { error: errorMessage(error) });
      throw new SimulationError(`Failed to load simulation snapshot: ${errorMessage(error)}`, 'DATA_FETCH_FAILED', error);
    }
  }
}
