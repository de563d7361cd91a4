import { OrderWithItems, Product, Task } from '../domain/types';

export const MIN_YIELD_RATE = 0.01;

/** Hours to produce `quantity` good units, including scrap and one setup. */
export function estimateProductionHours(
  quantity: number,
  cycleTimeMinutes: number,
  setupTimeMinutes: number,
  yieldRate: number
): number {
  const effectiveQuantity = quantity / Math.max(yieldRate, MIN_YIELD_RATE);
  return (effectiveQuantity * cycleTimeMinutes) / 60 + setupTimeMinutes / 60;
}

/** A learned cycle time of zero means no usable history yet. */
export function hasLearnedCycleTime(product: Product): boolean {
  return (product.learnedCycleTime ?? 0) > 0;
}

export function effectiveCycleTime(product: Product): number {
  const learned = product.learnedCycleTime;
  return learned !== null && learned !== undefined && learned > 0 ? learned : product.standardCycleTime;
}

export function estimateHoursForProduct(product: Product, quantity: number): number {
  return estimateProductionHours(quantity, effectiveCycleTime(product), product.setupTime, product.yieldRate);
}

export function buildTasks(orders: OrderWithItems[]): Task[] {
  const tasks: Task[] = [];
  for (const order of orders) {
    for (const item of order.items) {
      const { product } = item;
      const cycleTimeMinutes = effectiveCycleTime(product);
      tasks.push(
        Object.freeze({
          orderItemId: item.id,
          orderId: order.id,
          productId: product.id,
          productSku: product.sku,
          quantity: item.quantity,
          dueDate: order.dueDate,
          priority: order.priority,
          cycleTimeMinutes,
          setupTimeMinutes: product.setupTime,
          yieldRate: product.yieldRate,
          hasLearnedCycleTime: hasLearnedCycleTime(product),
          estimatedHours: estimateProductionHours(item.quantity, cycleTimeMinutes, product.setupTime, product.yieldRate),
        })
      );
    }
  }
  return tasks;
}

/** Phase 1: ascending `(priority, dueDate)`. `Array.prototype.sort` is stable. */
export function sortTasks(tasks: readonly Task[]): Task[] {
  return [...tasks].sort((a, b) => a.priority - b.priority || a.dueDate.getTime() - b.dueDate.getTime());
}
