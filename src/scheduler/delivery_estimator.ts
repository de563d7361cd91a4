import { DeliveryEstimate, DeliveryEstimateInput } from '../domain/types';
import { ScheduleRepository } from '../repository/schedule_repository';
import { SimulationError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { maxDate, roundTo } from '../utils/time';
import { isProductAllowed } from './changeover';
import { estimateHoursForProduct, hasLearnedCycleTime } from './task';
import { WorkCalendar } from './work_calendar';

const LEARNED_CONFIDENCE = 90;
const STANDARD_CONFIDENCE = 75;
const OPTIMISTIC_FACTOR = 0.9;
const PESSIMISTIC_FACTOR = 1.3;

export interface DeliveryEstimatorDependencies {
  repository: ScheduleRepository;
  calendar: WorkCalendar;
  clock?: () => Date;
}

/** Quotes a completion date for a hypothetical order on the first line to free up. */
export class DeliveryEstimator {
  private readonly clock: () => Date;

  constructor(private readonly deps: DeliveryEstimatorDependencies) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async estimateDelivery(input: DeliveryEstimateInput): Promise<DeliveryEstimate> {
    if (!Number.isInteger(input.quantity) || input.quantity < 1) {
      throw new ValidationError('Quantity must be a positive integer', 'quantity', input.quantity);
    }
    const { repository, calendar } = this.deps;

    const product = await repository.findProduct(input.productId);
    if (!product) {
      throw new SimulationError(`Product ${input.productId} not found.`, 'PRODUCT_NOT_FOUND', { productId: input.productId });
    }

    const lines = (await repository.findActiveLines()).filter(line => isProductAllowed(product.sku, line));
    if (lines.length === 0) {
      throw new SimulationError(`No active production line accepts product ${product.sku}.`, 'NO_ELIGIBLE_LINES', {
        productId: product.id,
      });
    }

    const now = this.clock();
    const openJobs = await repository.findOpenJobs();
    const freeAt = lines.map(line =>
      openJobs
        .filter(job => job.productionLineId === line.id)
        .reduce((latest, job) => maxDate(latest, job.plannedEnd), now)
    );
    const earliestFree = freeAt.reduce((earliest, date) => (date.getTime() < earliest.getTime() ? date : earliest));

    const hours = estimateHoursForProduct(product, input.quantity);
    const start = calendar.nextWorkMoment(earliestFree);
    const learned = hasLearnedCycleTime(product);

    const estimate: DeliveryEstimate = {
      productId: product.id,
      quantity: input.quantity,
      estimatedCompletion: calendar.advanceWorkHours(start, hours),
      earliest: calendar.advanceWorkHours(calendar.nextWorkMoment(now), hours * OPTIMISTIC_FACTOR),
      latest: calendar.advanceWorkHours(start, hours * PESSIMISTIC_FACTOR),
      confidence: learned ? LEARNED_CONFIDENCE : STANDARD_CONFIDENCE,
      notes: [
        learned
          ? 'Using learned cycle time from historical data'
          : 'Using standard cycle time (no historical data yet)',
      ],
    };

    logger.debug('Delivery estimated', {
      productSku: product.sku,
      quantity: input.quantity,
      productionHours: roundTo(hours, 2),
      estimatedCompletion: estimate.estimatedCompletion.toISOString(),
    });
    return estimate;
  }
}
