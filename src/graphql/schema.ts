import { makeExecutableSchema } from '@graphql-tools/schema';
import { GraphQLError, GraphQLScalarType, Kind, valueFromASTUntyped } from 'graphql';
import { AppContext } from '../app_context';
import {
  currentScheduleQuerySchema,
  deliveryEstimateSchema,
  masterDataSchema,
  rushOrderSchema,
  scheduleRequestSchema,
  validateInput,
} from '../middleware/validation';
import { ValidationError, isClientError } from '../utils/errors';
import { logger } from '../utils/logger';

const typeDefs = /* GraphQL */ `
  scalar DateTime
  scalar JSON

  enum Strategy { BALANCED RUSH EFFICIENCY }
  enum ScheduledJobStatus { PLANNED IN_PROGRESS COMPLETED SUPERSEDED }
  enum ScenarioKind { APPEND INSERT }
  enum RunStatus { QUEUED PROCESSING COMPLETED FAILED }

  type ScheduledJob {
    id: ID!
    orderItemId: ID!
    productionLineId: ID!
    productId: ID!
    plannedStart: DateTime!
    plannedEnd: DateTime!
    quantity: Int!
    changeoverMinutes: Float!
    status: ScheduledJobStatus!
    notes: String
    createdAt: DateTime!
    updatedAt: DateTime!
  }

  type Optimization { applied: Boolean!, reason: String! }

  type ScheduleMetadata {
    onTimeDeliveryRate: Float!
    overtimeHours: Float!
    confidenceScore: Float!
    strategy: Strategy!
    horizonDays: Int!
    supersededJobs: Int!
    optimization: Optimization!
  }

  type ScheduleResult {
    jobs: [ScheduledJob!]!
    totalJobs: Int!
    totalChangeoverMinutes: Float!
    utilizationPct: Float!
    warnings: [String!]!
    metadata: ScheduleMetadata!
  }

  type AffectedOrder {
    orderItemId: ID!
    originalEnd: DateTime!
    newEnd: DateTime!
    delayMinutes: Float!
  }

  type Scenario {
    name: String!
    kind: ScenarioKind!
    description: String!
    productionLineId: ID!
    productionLineName: String!
    completionTime: DateTime!
    changeoverMinutes: Float!
    productionHours: Float!
    affectedOrders: [AffectedOrder!]!
    overtimeHours: Float!
    additionalCost: Float!
    meetsTarget: Boolean!
    recommendation: Boolean!
    warnings: [String!]!
  }

  type RushOrderSummary {
    productId: ID!
    productSku: String!
    productName: String!
    quantity: Int!
    priority: Int!
    targetDate: DateTime!
    estimatedProductionHours: Float!
  }

  type SimulationResult {
    scenarios: [Scenario!]!
    rushOrder: RushOrderSummary!
    recommendedScenario: String
    totalScenarios: Int!
  }

  type DeliveryEstimate {
    productId: ID!
    quantity: Int!
    estimatedCompletion: DateTime!
    earliest: DateTime!
    latest: DateTime!
    confidence: Int!
    notes: [String!]!
  }

  type SchedulingRun {
    runId: ID!
    status: RunStatus!
    progress: Int!
    startedAt: DateTime
    completedAt: DateTime
    totalJobs: Int
    error: String
  }

  type MasterDataSummary { products: Int!, lines: Int!, orders: Int!, orderItems: Int! }

  type Query {
    currentSchedule(status: ScheduledJobStatus, productionLineId: ID, skip: Int, limit: Int): [ScheduledJob!]!
    schedulingRun(runId: ID!): SchedulingRun
    schedulingRuns: [SchedulingRun!]!
  }

  input MasterProductInput {
    sku: String!
    name: String!
    standardCycleTime: Float!
    setupTime: Float
    yieldRate: Float
    learnedCycleTime: Float
  }

  input MasterLineInput {
    name: String!
    status: String
    allowedProducts: JSON
    changeoverMatrix: JSON
  }

  input MasterOrderItemInput { productSku: String!, quantity: Int! }

  input MasterOrderInput {
    orderNo: String!
    customerName: String!
    dueDate: DateTime!
    priority: Int
    status: String
    items: [MasterOrderItemInput!]!
  }

  input MasterDataInput {
    products: [MasterProductInput!]!
    lines: [MasterLineInput!]!
    orders: [MasterOrderInput!]
  }

  input ScheduleRequestInput {
    orderIds: [ID!]
    horizonDays: Int
    strategy: Strategy
  }

  input RushOrderInput {
    productId: ID!
    quantity: Int!
    targetDate: DateTime!
    priority: Int
  }

  input DeliveryEstimateInput { productId: ID!, quantity: Int! }

  type Mutation {
    upsertMasterData(input: MasterDataInput!): MasterDataSummary!
    generateSchedule(input: ScheduleRequestInput): ScheduleResult!
    generateScheduleAsync(input: ScheduleRequestInput): ID!
    cancelSchedulingRun(runId: ID!): Boolean!
    simulateRushOrder(input: RushOrderInput!): SimulationResult!
    estimateDelivery(input: DeliveryEstimateInput!): DeliveryEstimate!
  }
`;

function toDate(value: string | number): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new GraphQLError(`DateTime cannot represent value: ${String(value)}`);
  }
  return date;
}

const DateTime = new GraphQLScalarType<Date, string>({
  name: 'DateTime',
  serialize: value => {
    if (value instanceof Date) return toDate(value.getTime()).toISOString();
    if (typeof value === 'string' || typeof value === 'number') return toDate(value).toISOString();
    throw new GraphQLError('DateTime cannot represent a non-date value');
  },
  parseValue: value => {
    if (typeof value === 'string' || typeof value === 'number') return toDate(value);
    throw new GraphQLError('DateTime must be an ISO-8601 string or epoch milliseconds');
  },
  parseLiteral: ast => {
    if (ast.kind === Kind.STRING) return toDate(ast.value);
    throw new GraphQLError('DateTime must be an ISO-8601 string');
  },
});

const JSONScalar = new GraphQLScalarType<unknown, unknown>({
  name: 'JSON',
  serialize: value => value,
  parseValue: value => value,
  parseLiteral: (ast, variables) => valueFromASTUntyped(ast, variables),
});

/** Client errors leave the API as 422 BAD_USER_INPUT; anything else propagates untouched. */
function guarded<TArgs, TResult>(
  operation: string,
  resolve: (args: TArgs) => Promise<TResult>
): (parent: unknown, args: TArgs) => Promise<TResult> {
  return async (_parent, args) => {
    try {
      return await resolve(args);
    } catch (error) {
      if (isClientError(error)) {
        logger.warn(`${operation} rejected`, { error: error.message });
        throw new GraphQLError(error.message, {
          originalError: error,
          extensions: {
            code: 'BAD_USER_INPUT',
            ...(error instanceof ValidationError ? { field: error.field } : { reason: error.code }),
            http: { status: 422 },
          },
        });
      }
      throw error;
    }
  };
}

type Nullable<T> = T | null | undefined;

export function buildSchema(context: AppContext) {
  const { settings, repository, scheduler, simulator, estimator, queue } = context;

  const resolvers = {
    DateTime,
    JSON: JSONScalar,
    Strategy: { BALANCED: 'balanced', RUSH: 'rush', EFFICIENCY: 'efficiency' },
    ScheduledJobStatus: {
      PLANNED: 'planned',
      IN_PROGRESS: 'in_progress',
      COMPLETED: 'completed',
      SUPERSEDED: 'superseded',
    },
    ScenarioKind: { APPEND: 'append', INSERT: 'insert' },
    Query: {
      currentSchedule: guarded('currentSchedule', async (args: Record<string, unknown>) => {
        const filter = validateInput(currentScheduleQuerySchema, args);
        logger.debug('Listing scheduled jobs', filter);
        return repository.listJobs(filter);
      }),
      schedulingRun: (_: unknown, args: { runId: string }) => {
        logger.debug('Fetching scheduling run', { runId: args.runId });
        return queue.getStatus(args.runId) ?? null;
      },
      schedulingRuns: () => queue.getAllStatuses(),
    },
    Mutation: {
      upsertMasterData: guarded('upsertMasterData', async (args: { input: unknown }) => {
        logger.info('Upserting master data');
        const data = validateInput(masterDataSchema, args.input);
        const summary = await repository.upsertMasterData(data);
        logger.info('Master data upserted', { ...summary });
        return summary;
      }),
      generateSchedule: guarded('generateSchedule', async (args: { input?: Nullable<object> }) => {
        const validated = validateInput(scheduleRequestSchema, args.input ?? {});
        return scheduler.generateSchedule({
          orderIds: validated.orderIds,
          horizonDays: validated.horizonDays ?? settings.defaultHorizonDays,
          strategy: validated.strategy,
        });
      }),
      generateScheduleAsync: guarded('generateScheduleAsync', async (args: { input?: Nullable<object> }) => {
        const validated = validateInput(scheduleRequestSchema, args.input ?? {});
        const runId = await queue.enqueue({
          orderIds: validated.orderIds,
          horizonDays: validated.horizonDays ?? settings.defaultHorizonDays,
          strategy: validated.strategy,
        });
        logger.info('Async scheduling run queued', { runId });
        return runId;
      }),
      cancelSchedulingRun: async (_: unknown, args: { runId: string }) => {
        const cancelled = await queue.cancel(args.runId);
        logger.info('Scheduling run cancellation result', { runId: args.runId, cancelled });
        return cancelled;
      },
      simulateRushOrder: guarded('simulateRushOrder', async (args: { input: unknown }) => {
        const input = validateInput(rushOrderSchema, args.input);
        logger.info('Simulating rush order', { productId: input.productId, quantity: input.quantity });
        return simulator.simulateRushOrder(input);
      }),
      estimateDelivery: guarded('estimateDelivery', async (args: { input: unknown }) => {
        const input = validateInput(deliveryEstimateSchema, args.input);
        return estimator.estimateDelivery(input);
      }),
    },
  };

  return makeExecutableSchema({ typeDefs, resolvers });
}
