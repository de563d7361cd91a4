import { OrderWithItems, Product, Task } from '../../src/domain/types';
import { buildTasks, estimateProductionHours, sortTasks } from '../../src/scheduler/task';

const widget: Product = {
  id: 'prod-w',
  sku: 'WIDGET',
  name: 'Widget',
  standardCycleTime: 2,
  setupTime: 30,
  yieldRate: 0.95,
};

function order(id: string, priority: number, due: string, product: Product = widget, quantity = 10): OrderWithItems {
  return {
    id,
    orderNo: `SO-${id}`,
    customerName: 'Test Customer',
    dueDate: new Date(due),
    priority,
    status: 'pending',
    items: [{ id: `${id}-item`, orderId: id, productId: product.id, quantity, product }],
  };
}

describe('estimateProductionHours', () => {
  test('inflates quantity by yield and adds setup', () => {
    // 100 / 0.95 * 2 min = 210.53 min, plus 30 min setup
    expect(estimateProductionHours(100, 2, 30, 0.95)).toBeCloseTo(4.0088, 4);
  });

  test('clamps a zero yield', () => {
    expect(estimateProductionHours(1, 60, 0, 0)).toBe(100);
  });
});

describe('buildTasks', () => {
  test('prefers the learned cycle time', () => {
    const learned: Product = { ...widget, learnedCycleTime: 1, yieldRate: 1, setupTime: 0 };
    const [task] = buildTasks([order('o1', 1, '2026-03-06T17:00:00Z', learned, 120)]);

    expect(task.cycleTimeMinutes).toBe(1);
    expect(task.hasLearnedCycleTime).toBe(true);
    expect(task.estimatedHours).toBe(2);
    expect(Object.isFrozen(task)).toBe(true);
  });

  test('falls back to the standard cycle time when the learned one is zero', () => {
    const untrained: Product = { ...widget, learnedCycleTime: 0, yieldRate: 1, setupTime: 0 };
    const [task] = buildTasks([order('o1', 1, '2026-03-06T17:00:00Z', untrained, 120)]);

    expect(task.cycleTimeMinutes).toBe(2);
    expect(task.hasLearnedCycleTime).toBe(false);
    expect(task.estimatedHours).toBe(4);
  });

  test('creates one task per order item', () => {
    const tasks = buildTasks([order('o1', 1, '2026-03-06T17:00:00Z'), order('o2', 3, '2026-03-05T17:00:00Z')]);
    expect(tasks.map(t => t.orderItemId)).toEqual(['o1-item', 'o2-item']);
    expect(tasks[0].hasLearnedCycleTime).toBe(false);
  });
});

describe('sortTasks', () => {
  test('orders by priority then due date', () => {
    const tasks = buildTasks([
      order('late-low', 3, '2026-03-09T17:00:00Z'),
      order('early-low', 3, '2026-03-02T17:00:00Z'),
      order('urgent', 1, '2026-03-20T17:00:00Z'),
    ]);
    expect(sortTasks(tasks).map(t => t.orderId)).toEqual(['urgent', 'early-low', 'late-low']);
  });

  test('keeps input order for equal keys', () => {
    const tasks = buildTasks([
      order('first', 2, '2026-03-02T17:00:00Z'),
      order('second', 2, '2026-03-02T17:00:00Z'),
      order('third', 2, '2026-03-02T17:00:00Z'),
    ]);
    expect(sortTasks(tasks).map(t => t.orderId)).toEqual(['first', 'second', 'third']);
  });

  test('output is non-decreasing in priority and due date', () => {
    const priorities = [5, 1, 3, 1, 2, 5, 4, 2];
    const tasks = buildTasks(
      priorities.map((priority, i) => order(`o${i}`, priority, `2026-03-${String(10 - i).padStart(2, '0')}T12:00:00Z`))
    );
    const sorted: Task[] = sortTasks(tasks);
    for (let i = 1; i < sorted.length; i++) {
      const prev = sorted[i - 1];
      const next = sorted[i];
      expect(prev.priority <= next.priority).toBe(true);
      if (prev.priority === next.priority) {
        expect(prev.dueDate.getTime()).toBeLessThanOrEqual(next.dueDate.getTime());
      }
    }
    expect(sortTasks(tasks)).not.toBe(tasks);
  });
});
