export type Identifier = string;

export type Strategy = 'balanced' | 'rush' | 'efficiency';
export const STRATEGIES: readonly Strategy[] = ['balanced', 'rush', 'efficiency'];

export interface Product {
  id: Identifier;
  sku: string;
  name: string;
  standardCycleTime: number; // minutes per unit
  setupTime: number; // minutes
  yieldRate: number; // (0, 1]
  learnedCycleTime?: number | null; // observed minutes per unit
}

/** Decided once when a line is loaded; `isProductAllowed` never inspects raw JSON. */
export type AllowedProducts =
  | { kind: 'unrestricted' }
  | { kind: 'explicit'; skus: readonly string[] };

/** Directed changeover minutes keyed `"FROM->TO"`, with an optional `"default"`. */
export type ChangeoverMatrix = Readonly<Record<string, number>>;

export interface ProductionLine {
  id: Identifier;
  name: string;
  status: 'active' | 'inactive';
  allowedProducts: AllowedProducts;
  changeoverMatrix: ChangeoverMatrix | null;
}

export type OrderStatus = 'pending' | 'confirmed' | 'in_production' | 'completed' | 'cancelled';

export interface OrderItem {
  id: Identifier;
  orderId: Identifier;
  productId: Identifier;
  quantity: number;
}

export interface Order {
  id: Identifier;
  orderNo: string;
  customerName: string;
  dueDate: Date;
  priority: number; // lower = more urgent
  status: OrderStatus;
}

export interface OrderWithItems extends Order {
  items: (OrderItem & { product: Product })[];
}

export type ScheduledJobStatus = 'planned' | 'in_progress' | 'completed' | 'superseded';
export const OPEN_JOB_STATUSES: readonly ScheduledJobStatus[] = ['planned', 'in_progress'];

export interface ScheduledJob {
  id: Identifier;
  orderItemId: Identifier;
  productionLineId: Identifier;
  productId: Identifier;
  plannedStart: Date;
  plannedEnd: Date;
  quantity: number;
  changeoverMinutes: number;
  status: ScheduledJobStatus;
  notes: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewScheduledJob = Omit<ScheduledJob, 'id' | 'createdAt' | 'updatedAt'>;

export interface ScheduledJobWithProduct extends ScheduledJob {
  productSku: string | null;
}

/** In-memory unit of work for one order item during a scheduling run. */
export interface Task {
  readonly orderItemId: Identifier;
  readonly orderId: Identifier;
  readonly productId: Identifier;
  readonly productSku: string;
  readonly quantity: number;
  readonly dueDate: Date;
  readonly priority: number;
  readonly cycleTimeMinutes: number;
  readonly setupTimeMinutes: number;
  readonly yieldRate: number;
  readonly hasLearnedCycleTime: boolean;
  readonly estimatedHours: number;
}

/** A Phase 2 placement before it is persisted. */
export interface JobAssignment extends NewScheduledJob {
  status: 'planned';
  productSku: string;
  overtimeHours: number;
}

export interface ScheduleRequest {
  orderIds?: Identifier[];
  horizonDays: number;
  strategy: Strategy;
}

export interface OptimizationMeta {
  applied: boolean;
  reason: string;
}

export interface ScheduleMetrics {
  onTimeDeliveryRate: number;
  utilizationPct: number;
  overtimeHours: number;
}

export interface ScheduleResult {
  jobs: ScheduledJob[];
  totalJobs: number;
  totalChangeoverMinutes: number;
  utilizationPct: number;
  warnings: string[];
  metadata: {
    onTimeDeliveryRate: number;
    overtimeHours: number;
    confidenceScore: number;
    strategy: Strategy;
    horizonDays: number;
    supersededJobs: number;
    optimization: OptimizationMeta;
  };
}

export interface RushOrderInput {
  productId: Identifier;
  quantity: number;
  targetDate: Date;
  priority?: number;
}

export interface AffectedOrder {
  orderItemId: Identifier;
  originalEnd: Date;
  newEnd: Date;
  delayMinutes: number;
}

export type ScenarioKind = 'append' | 'insert';

export interface Scenario {
  name: string;
  kind: ScenarioKind;
  description: string;
  productionLineId: Identifier;
  productionLineName: string;
  completionTime: Date;
  changeoverMinutes: number;
  productionHours: number;
  affectedOrders: AffectedOrder[];
  overtimeHours: number;
  additionalCost: number;
  meetsTarget: boolean;
  recommendation: boolean;
  warnings: string[];
}

export interface SimulationResult {
  scenarios: Scenario[];
  rushOrder: {
    productId: Identifier;
    productSku: string;
    productName: string;
    quantity: number;
    priority: number;
    targetDate: Date;
    estimatedProductionHours: number;
  };
  recommendedScenario: string | null;
  totalScenarios: number;
}

export interface DeliveryEstimateInput {
  productId: Identifier;
  quantity: number;
}

export interface DeliveryEstimate {
  productId: Identifier;
  quantity: number;
  estimatedCompletion: Date;
  earliest: Date;
  latest: Date;
  confidence: number;
  notes: string[];
}

export type SchedulingRunState = 'QUEUED' | 'PROCESSING' | 'COMPLETED' | 'FAILED';

export interface SchedulingRunStatus {
  runId: string;
  status: SchedulingRunState;
  progress: number; // 0-100
  startedAt?: Date;
  completedAt?: Date;
  totalJobs?: number;
  error?: string;
}
