import {
  currentScheduleQuerySchema,
  masterDataSchema,
  rushOrderSchema,
  scheduleRequestSchema,
  validateInput,
} from '../../src/middleware/validation';
import { ValidationError } from '../../src/utils/errors';

function validationErrorOf(run: () => unknown): ValidationError {
  try {
    run();
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('validateInput', () => {
  test('fills schedule request defaults', () => {
    expect(validateInput(scheduleRequestSchema, {})).toEqual({ strategy: 'balanced' });
    expect(validateInput(scheduleRequestSchema, { horizonDays: null, strategy: null, orderIds: null })).toEqual({
      strategy: 'balanced',
    });
  });

  test('reports the first failing field and its value', () => {
    const error = validationErrorOf(() => validateInput(scheduleRequestSchema, { horizonDays: 91 }));

    expect(error.field).toBe('horizonDays');
    expect(error.value).toBe(91);
    expect(error.message).toBe('Validation failed: horizonDays: Horizon must be at most 90 days');
  });

  test('rejects an unknown strategy', () => {
    const error = validationErrorOf(() => validateInput(scheduleRequestSchema, { strategy: 'fastest' }));
    expect(error.field).toBe('strategy');
    expect(error.value).toBe('fastest');
  });

  test('walks nested paths for the failing value', () => {
    const error = validationErrorOf(() =>
      validateInput(masterDataSchema, {
        products: [{ sku: 'A', name: 'Alpha', standardCycleTime: -1 }],
        lines: [],
      })
    );

    expect(error.field).toBe('products.0.standardCycleTime');
    expect(error.value).toBe(-1);
  });
});

describe('rushOrderSchema', () => {
  test('defaults priority to 1 and coerces the target date', () => {
    expect(rushOrderSchema.parse({ productId: 'p', quantity: 5, targetDate: '2026-02-24T12:00:00Z' })).toEqual({
      productId: 'p',
      quantity: 5,
      targetDate: new Date('2026-02-24T12:00:00Z'),
      priority: 1,
    });
  });

  test('bounds priority between 1 and 5', () => {
    const base = { productId: 'p', quantity: 5, targetDate: '2026-02-24T12:00:00Z' };
    expect(rushOrderSchema.safeParse({ ...base, priority: 6 }).success).toBe(false);
    expect(rushOrderSchema.safeParse({ ...base, priority: 0 }).success).toBe(false);
    expect(rushOrderSchema.safeParse({ ...base, quantity: 0 }).success).toBe(false);
  });
});

describe('currentScheduleQuerySchema', () => {
  test('defaults paging', () => {
    expect(currentScheduleQuerySchema.parse({})).toEqual({ skip: 0, limit: 100 });
  });

  test('caps the page size', () => {
    expect(currentScheduleQuerySchema.safeParse({ limit: 501 }).success).toBe(false);
  });
});

describe('masterDataSchema', () => {
  test('applies record defaults', () => {
    const parsed = masterDataSchema.parse({
      products: [{ sku: 'A', name: 'Alpha', standardCycleTime: 2 }],
      lines: [{ name: 'Line 1', allowedProducts: ['A'] }],
      orders: [
        {
          orderNo: 'SO-1',
          customerName: 'Test Customer',
          dueDate: '2026-03-06T17:00:00Z',
          items: [{ productSku: 'A', quantity: 3 }],
        },
      ],
    });

    expect(parsed.products[0]).toEqual({ sku: 'A', name: 'Alpha', standardCycleTime: 2, setupTime: 30, yieldRate: 0.95 });
    expect(parsed.lines[0].status).toBe('active');
    expect(parsed.orders[0]).toMatchObject({ priority: 5, status: 'pending', dueDate: new Date('2026-03-06T17:00:00Z') });
  });

  test('treats orders as optional', () => {
    expect(masterDataSchema.parse({ products: [], lines: [] }).orders).toEqual([]);
  });

  test('rejects a yield rate above one', () => {
    expect(
      masterDataSchema.safeParse({ products: [{ sku: 'A', name: 'Alpha', standardCycleTime: 2, yieldRate: 1.5 }], lines: [] })
        .success
    ).toBe(false);
  });
});
