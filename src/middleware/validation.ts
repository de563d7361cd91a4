import { z } from 'zod';
import { MAX_HORIZON_DAYS, MIN_HORIZON_DAYS } from '../scheduler/production_scheduler';
import { ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

function valueAt(input: unknown, path: (string | number)[]): unknown {
  let current = input;
  for (const key of path) {
    if (current === null || typeof current !== 'object') return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const fieldErrors = result.error.issues.map(issue => ({
    field: issue.path.join('.'),
    message: issue.message,
    value: valueAt(input, issue.path),
  }));

  logger.warn('Input validation failed', {
    errors: fieldErrors,
    input: typeof input === 'object' ? JSON.stringify(input) : input,
  });

  const first = fieldErrors[0];
  throw new ValidationError(
    `Validation failed: ${fieldErrors.map(e => `${e.field}: ${e.message}`).join(', ')}`,
    first?.field || 'unknown',
    first?.value
  );
}

export const strategySchema = z.enum(['balanced', 'rush', 'efficiency']);

/** Horizon is optional here; the resolver falls back to the configured default. */
export const scheduleRequestSchema = z.object({
  orderIds: z.array(z.string().min(1)).nullish().transform(ids => ids ?? undefined),
  horizonDays: z
    .number()
    .int('Horizon must be a whole number of days')
    .min(MIN_HORIZON_DAYS, `Horizon must be at least ${MIN_HORIZON_DAYS} day`)
    .max(MAX_HORIZON_DAYS, `Horizon must be at most ${MAX_HORIZON_DAYS} days`)
    .nullish()
    .transform(days => days ?? undefined),
  strategy: strategySchema.nullish().transform(strategy => strategy ?? 'balanced'),
});

export const rushOrderSchema = z.object({
  productId: z.string().min(1, 'Product ID is required'),
  quantity: z.number().int().min(1, 'Quantity must be at least 1'),
  targetDate: z.coerce.date({ invalid_type_error: 'Target date must be a valid date' }),
  priority: z
    .number()
    .int()
    .min(1, 'Priority must be between 1 and 5')
    .max(5, 'Priority must be between 1 and 5')
    .nullish()
    .transform(priority => priority ?? 1),
});

export const deliveryEstimateSchema = z.object({
  productId: z.string().min(1, 'Product ID is required'),
  quantity: z.number().int().min(1, 'Quantity must be at least 1'),
});

export const currentScheduleQuerySchema = z.object({
  status: z.enum(['planned', 'in_progress', 'completed', 'superseded']).nullish().transform(s => s ?? undefined),
  productionLineId: z.string().min(1).nullish().transform(id => id ?? undefined),
  skip: z.number().int().min(0).nullish().transform(skip => skip ?? 0),
  limit: z.number().int().min(1).max(500).nullish().transform(limit => limit ?? 100),
});

const skuListSchema = z.array(z.string().min(1));

export const masterDataSchema = z.object({
  products: z.array(
    z.object({
      sku: z.string().min(1, 'Product SKU is required'),
      name: z.string().min(1, 'Product name is required'),
      standardCycleTime: z.number().positive('Cycle time must be positive'),
      setupTime: z.number().min(0).default(30),
      yieldRate: z.number().gt(0).max(1).default(0.95),
      learnedCycleTime: z.number().positive().nullish(),
    })
  ),
  lines: z.array(
    z.object({
      name: z.string().min(1, 'Line name is required'),
      status: z.enum(['active', 'inactive']).default('active'),
      allowedProducts: z.union([skuListSchema, z.object({ skus: skuListSchema })]).nullish(),
      changeoverMatrix: z.record(z.number().min(0)).nullish(),
    })
  ),
  orders: z
    .array(
      z.object({
        orderNo: z.string().min(1, 'Order number is required'),
        customerName: z.string().min(1, 'Customer name is required'),
        dueDate: z.coerce.date(),
        priority: z.number().int().min(1).default(5),
        status: z.enum(['pending', 'confirmed', 'in_production', 'completed', 'cancelled']).default('pending'),
        items: z.array(
          z.object({
            productSku: z.string().min(1, 'Product SKU is required'),
            quantity: z.number().int().positive('Quantity must be positive'),
          })
        ),
      })
    )
    .default([]),
});

export type MasterDataInput = z.infer<typeof masterDataSchema>;
