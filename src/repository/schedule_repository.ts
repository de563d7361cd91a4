import {
  Identifier,
  NewScheduledJob,
  OrderStatus,
  OrderWithItems,
  Product,
  ProductionLine,
  ScheduledJob,
  ScheduledJobStatus,
  ScheduledJobWithProduct,
} from '../domain/types';

export interface ProductRecord {
  sku: string;
  name: string;
  standardCycleTime: number;
  setupTime: number;
  yieldRate: number;
  learnedCycleTime?: number | null;
}

/** Line as stored: allow-list and changeover matrix are still raw JSON here. */
export interface LineRecord {
  name: string;
  status: 'active' | 'inactive';
  allowedProducts?: unknown;
  changeoverMatrix?: unknown;
}

export interface OrderRecord {
  orderNo: string;
  customerName: string;
  dueDate: Date;
  priority: number;
  status: OrderStatus;
  items: { productSku: string; quantity: number }[];
}

export interface MasterData {
  products: ProductRecord[];
  lines: LineRecord[];
  orders: OrderRecord[];
}

export interface MasterDataSummary {
  products: number;
  lines: number;
  orders: number;
  orderItems: number;
}

export interface JobFilter {
  status?: ScheduledJobStatus;
  productionLineId?: Identifier;
  skip?: number;
  limit?: number;
}

export interface PersistedSchedule {
  jobs: ScheduledJob[];
  supersededCount: number;
}

/**
 * Store behind the scheduling engine. Every call returns a snapshot the caller may
 * keep for the rest of a run.
 */
export interface ScheduleRepository {
  /** Orders in `pending` or `confirmed`, earliest due date first, items joined with products. */
  findPendingOrders(orderIds?: Identifier[]): Promise<OrderWithItems[]>;
  findActiveLines(): Promise<ProductionLine[]>;
  findProduct(productId: Identifier): Promise<Product | undefined>;
  /** `planned` and `in_progress` jobs ordered by planned start. */
  findOpenJobs(): Promise<ScheduledJobWithProduct[]>;
  /** Without a status filter only open jobs are listed. */
  listJobs(filter?: JobFilter): Promise<ScheduledJob[]>;
  /**
   * Marks every `planned` job of `orderItemIds` as `superseded` and inserts the new jobs,
   * as one atomic step. Items in `orderItemIds` without a new job are left unplanned.
   */
  replacePlannedJobs(orderItemIds: readonly Identifier[], jobs: NewScheduledJob[]): Promise<PersistedSchedule>;
  upsertMasterData(data: MasterData): Promise<MasterDataSummary>;
}
