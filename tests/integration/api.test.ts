import { graphql, GraphQLSchema } from 'graphql';
import { createAppContext } from '../../src/app_context';
import { SchedulingRunStatus } from '../../src/domain/types';
import { buildSchema } from '../../src/graphql/schema';
import { SchedulingJobData } from '../../src/jobs/scheduling_job';
import { SchedulingRunQueue } from '../../src/jobs/job_queue';
import { createRepository, fixedClock, settings } from '../helpers/fixtures';

class FakeQueue implements SchedulingRunQueue {
  readonly enqueued: SchedulingJobData[] = [];
  private readonly statuses = new Map<string, SchedulingRunStatus>();

  async enqueue(data: SchedulingJobData): Promise<string> {
    this.enqueued.push(data);
    const runId = `run-${this.enqueued.length}`;
    this.statuses.set(runId, { runId, status: 'QUEUED', progress: 0 });
    return runId;
  }

  getStatus(runId: string): SchedulingRunStatus | undefined {
    return this.statuses.get(runId);
  }

  getAllStatuses(): SchedulingRunStatus[] {
    return Array.from(this.statuses.values());
  }

  async cancel(runId: string): Promise<boolean> {
    return this.statuses.delete(runId);
  }

  async close(): Promise<void> {}
}

const UPSERT = /* GraphQL */ `
  mutation Upsert($input: MasterDataInput!) {
    upsertMasterData(input: $input) { products lines orders orderItems }
  }
`;

const GENERATE = /* GraphQL */ `
  mutation Generate($input: ScheduleRequestInput) {
    generateSchedule(input: $input) {
      totalJobs
      warnings
      jobs { productId plannedStart plannedEnd changeoverMinutes status }
      metadata { strategy horizonDays confidenceScore supersededJobs optimization { applied reason } }
    }
  }
`;

const CURRENT = /* GraphQL */ `
  query Current($status: ScheduledJobStatus) {
    currentSchedule(status: $status) { id productId status }
  }
`;

interface Harness {
  schema: GraphQLSchema;
  queue: FakeQueue;
}

function createHarness(): Harness {
  const clock = fixedClock();
  const queue = new FakeQueue();
  const context = createAppContext(
    { redis: { host: 'localhost', port: 6379 }, scheduling: settings },
    createRepository(clock),
    { clock, createQueue: () => queue }
  );
  return { schema: buildSchema(context), queue };
}

async function execute(schema: GraphQLSchema, source: string, variableValues?: Record<string, unknown>) {
  return graphql({ schema, source, variableValues });
}

/** Reads a nested field off a GraphQL response without trusting its shape. */
function field(value: unknown, ...path: (string | number)[]): unknown {
  let current = value;
  for (const key of path) {
    if (current === null || typeof current !== 'object') return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

async function seedMasterData(schema: GraphQLSchema) {
  return execute(schema, UPSERT, {
    input: {
      products: [{ sku: 'A', name: 'Alpha', standardCycleTime: 60, setupTime: 0, yieldRate: 1 }],
      lines: [{ name: 'Line 1', allowedProducts: ['A'] }],
      orders: [
        {
          orderNo: 'SO-1',
          customerName: 'Test Customer',
          dueDate: '2026-03-06T17:00:00.000Z',
          priority: 1,
          items: [{ productSku: 'A', quantity: 2 }],
        },
      ],
    },
  });
}

describe('GraphQL API', () => {
  test('upserts master data, schedules and re-schedules', async () => {
    const { schema } = createHarness();

    const upsert = await seedMasterData(schema);
    expect(upsert.errors).toBeUndefined();
    expect(field(upsert.data, 'upsertMasterData')).toEqual({ products: 1, lines: 1, orders: 1, orderItems: 1 });

    const first = await execute(schema, GENERATE, { input: { horizonDays: 7, strategy: 'BALANCED' } });
    expect(first.errors).toBeUndefined();
    expect(field(first.data, 'generateSchedule', 'totalJobs')).toBe(1);
    expect(field(first.data, 'generateSchedule', 'warnings')).toEqual([]);
    expect(field(first.data, 'generateSchedule', 'jobs', 0)).toMatchObject({
      plannedStart: '2026-02-23T09:00:00.000Z',
      plannedEnd: '2026-02-23T11:00:00.000Z',
      changeoverMinutes: 0,
      status: 'PLANNED',
    });
    expect(field(first.data, 'generateSchedule', 'metadata')).toEqual({
      strategy: 'BALANCED',
      horizonDays: 7,
      confidenceScore: 80,
      supersededJobs: 0,
      optimization: { applied: false, reason: 'not yet integrated' },
    });

    const second = await execute(schema, GENERATE);
    expect(second.errors).toBeUndefined();
    expect(field(second.data, 'generateSchedule', 'metadata', 'supersededJobs')).toBe(1);

    const open = await execute(schema, CURRENT);
    expect(field(open.data, 'currentSchedule')).toHaveLength(1);
    const superseded = await execute(schema, CURRENT, { status: 'SUPERSEDED' });
    expect(field(superseded.data, 'currentSchedule', 0, 'status')).toBe('SUPERSEDED');
  });

  test('simulates a rush order and estimates delivery', async () => {
    const { schema } = createHarness();
    await seedMasterData(schema);
    const scheduled = await execute(schema, GENERATE, { input: {} });
    const productId = field(scheduled.data, 'generateSchedule', 'jobs', 0, 'productId');

    const simulation = await execute(
      schema,
      /* GraphQL */ `
        mutation Rush($input: RushOrderInput!) {
          simulateRushOrder(input: $input) {
            totalScenarios
            recommendedScenario
            scenarios { kind meetsTarget }
          }
        }
      `,
      { input: { productId, quantity: 1, targetDate: '2026-02-20T00:00:00.000Z' } }
    );
    expect(simulation.errors).toBeUndefined();
    expect(field(simulation.data, 'simulateRushOrder', 'totalScenarios')).toBe(2);
    expect(field(simulation.data, 'simulateRushOrder', 'scenarios')).toEqual([
      { kind: 'APPEND', meetsTarget: false },
      { kind: 'INSERT', meetsTarget: false },
    ]);

    const estimate = await execute(
      schema,
      /* GraphQL */ `
        mutation Estimate($input: DeliveryEstimateInput!) {
          estimateDelivery(input: $input) { estimatedCompletion confidence notes }
        }
      `,
      { input: { productId, quantity: 1 } }
    );
    expect(estimate.errors).toBeUndefined();
    // the line is busy until 11:00 with the scheduled job
    expect(field(estimate.data, 'estimateDelivery')).toEqual({
      estimatedCompletion: '2026-02-23T12:00:00.000Z',
      confidence: 75,
      notes: ['Using standard cycle time (no historical data yet)'],
    });
  });

  test('reports invalid input as BAD_USER_INPUT', async () => {
    const { schema } = createHarness();
    await seedMasterData(schema);

    const tooLong = await execute(schema, GENERATE, { input: { horizonDays: 120 } });
    expect(tooLong.errors?.[0].extensions).toMatchObject({
      code: 'BAD_USER_INPUT',
      field: 'horizonDays',
      http: { status: 422 },
    });

    const unknownProduct = await execute(
      schema,
      /* GraphQL */ `
        mutation Rush($input: RushOrderInput!) { simulateRushOrder(input: $input) { totalScenarios } }
      `,
      { input: { productId: 'missing', quantity: 1, targetDate: '2026-02-24T12:00:00.000Z' } }
    );
    expect(unknownProduct.errors?.[0].message).toBe('Product missing not found.');
    expect(unknownProduct.errors?.[0].extensions).toMatchObject({ code: 'BAD_USER_INPUT', reason: 'PRODUCT_NOT_FOUND' });
  });

  test('queues async runs and reports their status', async () => {
    const { schema, queue } = createHarness();

    const queued = await execute(
      schema,
      /* GraphQL */ `
        mutation Async($input: ScheduleRequestInput) { generateScheduleAsync(input: $input) }
      `,
      { input: { strategy: 'RUSH', orderIds: ['o-1'] } }
    );
    expect(queued.errors).toBeUndefined();
    expect(field(queued.data, 'generateScheduleAsync')).toBe('run-1');
    expect(queue.enqueued).toEqual([{ orderIds: ['o-1'], horizonDays: 7, strategy: 'rush' }]);

    const run = await execute(schema, `query { schedulingRun(runId: "run-1") { runId status progress } }`);
    expect(field(run.data, 'schedulingRun')).toEqual({ runId: 'run-1', status: 'QUEUED', progress: 0 });

    const missing = await execute(schema, `query { schedulingRun(runId: "run-9") { status } }`);
    expect(field(missing.data, 'schedulingRun')).toBeNull();

    const cancelled = await execute(schema, `mutation { cancelSchedulingRun(runId: "run-1") }`);
    expect(field(cancelled.data, 'cancelSchedulingRun')).toBe(true);
    const runs = await execute(schema, `query { schedulingRuns { runId } }`);
    expect(field(runs.data, 'schedulingRuns')).toEqual([]);
  });
});
