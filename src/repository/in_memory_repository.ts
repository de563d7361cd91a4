import { randomUUID } from 'crypto';
import {
  Identifier,
  NewScheduledJob,
  OPEN_JOB_STATUSES,
  Order,
  OrderItem,
  OrderWithItems,
  Product,
  ProductionLine,
  ScheduledJob,
  ScheduledJobWithProduct,
} from '../domain/types';
import { DatabaseError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { toProductionLine } from './line_mapper';
import {
  JobFilter,
  LineRecord,
  MasterData,
  MasterDataSummary,
  PersistedSchedule,
  ScheduleRepository,
} from './schedule_repository';

const PENDING_ORDER_STATUSES = new Set(['pending', 'confirmed']);

export interface InMemoryRepositoryOptions {
  generateId?: () => string;
  clock?: () => Date;
}

/**
 * Process-local store. Each method runs to completion without awaiting, so the
 * supersede-and-insert in `replacePlannedJobs` can never interleave with another call.
 */
export class InMemoryScheduleRepository implements ScheduleRepository {
  private readonly products = new Map<Identifier, Product>();
  private readonly lines = new Map<Identifier, ProductionLine>();
  private readonly orders = new Map<Identifier, Order>();
  private readonly items = new Map<Identifier, OrderItem>();
  private readonly jobs = new Map<Identifier, ScheduledJob>();
  private readonly generateId: () => string;
  private readonly clock: () => Date;

  constructor(options: InMemoryRepositoryOptions = {}) {
    this.generateId = options.generateId ?? randomUUID;
    this.clock = options.clock ?? (() => new Date());
  }

  addProduct(product: Omit<Product, 'id'> & { id?: Identifier }): Product {
    const stored: Product = { ...product, id: product.id ?? this.generateId() };
    this.products.set(stored.id, stored);
    return { ...stored };
  }

  addLine(record: LineRecord & { id?: Identifier }): ProductionLine {
    const line = toProductionLine(record.id ?? this.generateId(), record);
    this.lines.set(line.id, line);
    return { ...line };
  }

  addOrder(
    order: Omit<Order, 'id'> & { id?: Identifier },
    items: { id?: Identifier; productId: Identifier; quantity: number }[]
  ): OrderWithItems {
    const stored: Order = { ...order, id: order.id ?? this.generateId() };
    this.orders.set(stored.id, stored);
    for (const item of items) {
      const id = item.id ?? this.generateId();
      this.items.set(id, { id, orderId: stored.id, productId: item.productId, quantity: item.quantity });
    }
    return this.withItems(stored);
  }

  addJob(job: NewScheduledJob & { id?: Identifier }): ScheduledJob {
    const now = this.clock();
    const stored: ScheduledJob = { ...job, id: job.id ?? this.generateId(), createdAt: now, updatedAt: now };
    this.jobs.set(stored.id, stored);
    return { ...stored };
  }

  getJob(jobId: Identifier): ScheduledJob | undefined {
    const job = this.jobs.get(jobId);
    return job ? { ...job } : undefined;
  }

  allJobs(): ScheduledJob[] {
    return Array.from(this.jobs.values(), job => ({ ...job }));
  }

  async findPendingOrders(orderIds: Identifier[] = []): Promise<OrderWithItems[]> {
    const wanted = new Set(orderIds);
    return Array.from(this.orders.values())
      .filter(order => PENDING_ORDER_STATUSES.has(order.status))
      .filter(order => wanted.size === 0 || wanted.has(order.id))
      .sort((a, b) => a.dueDate.getTime() - b.dueDate.getTime())
      .map(order => this.withItems(order));
  }

  async findActiveLines(): Promise<ProductionLine[]> {
    return Array.from(this.lines.values())
      .filter(line => line.status === 'active')
      .map(line => ({ ...line }));
  }

  async findProduct(productId: Identifier): Promise<Product | undefined> {
    const product = this.products.get(productId);
    return product ? { ...product } : undefined;
  }

  async findOpenJobs(): Promise<ScheduledJobWithProduct[]> {
    return Array.from(this.jobs.values())
      .filter(job => OPEN_JOB_STATUSES.includes(job.status))
      .sort((a, b) => a.plannedStart.getTime() - b.plannedStart.getTime())
      .map(job => ({ ...job, productSku: this.products.get(job.productId)?.sku ?? null }));
  }

  async listJobs(filter: JobFilter = {}): Promise<ScheduledJob[]> {
    const { status, productionLineId, skip = 0, limit = 100 } = filter;
    return Array.from(this.jobs.values())
      .filter(job => (status ? job.status === status : OPEN_JOB_STATUSES.includes(job.status)))
      .filter(job => !productionLineId || job.productionLineId === productionLineId)
      .sort((a, b) => a.plannedStart.getTime() - b.plannedStart.getTime())
      .slice(skip, skip + limit)
      .map(job => ({ ...job }));
  }

  async replacePlannedJobs(replannedItemIds: readonly Identifier[], newJobs: NewScheduledJob[]): Promise<PersistedSchedule> {
    const now = this.clock();
    const orderItemIds = new Set([...replannedItemIds, ...newJobs.map(job => job.orderItemId)]);

    let supersededCount = 0;
    for (const job of this.jobs.values()) {
      if (job.status === 'planned' && orderItemIds.has(job.orderItemId)) {
        job.status = 'superseded';
        job.updatedAt = now;
        supersededCount += 1;
      }
    }
    if (supersededCount > 0) {
      logger.info('Superseded planned jobs before re-scheduling', { supersededCount });
    }

    const jobs = newJobs.map(job => {
      const stored: ScheduledJob = { ...job, id: this.generateId(), createdAt: now, updatedAt: now };
      this.jobs.set(stored.id, stored);
      return { ...stored };
    });
    return { jobs, supersededCount };
  }

  // idempotent upserts by sku / line name / order number
  async upsertMasterData(data: MasterData): Promise<MasterDataSummary> {
    const productIdBySku = new Map<string, Identifier>();
    for (const product of this.products.values()) productIdBySku.set(product.sku, product.id);

    const knownSkus = new Set([...productIdBySku.keys(), ...data.products.map(p => p.sku)]);
    for (const order of data.orders) {
      const unknown = order.items.find(item => !knownSkus.has(item.productSku));
      if (unknown) {
        throw new ValidationError(
          `Order ${order.orderNo} references unknown product ${unknown.productSku}`,
          'orders.items.productSku',
          unknown.productSku
        );
      }
    }

    for (const record of data.products) {
      const id = productIdBySku.get(record.sku) ?? this.generateId();
      this.products.set(id, { ...record, id });
      productIdBySku.set(record.sku, id);
    }

    for (const record of data.lines) {
      const existing = Array.from(this.lines.values()).find(line => line.name === record.name);
      const id = existing?.id ?? this.generateId();
      this.lines.set(id, toProductionLine(id, record));
    }

    let orderItems = 0;
    for (const record of data.orders) {
      const existing = Array.from(this.orders.values()).find(order => order.orderNo === record.orderNo);
      const orderId = existing?.id ?? this.generateId();
      const { items, ...order } = record;
      this.orders.set(orderId, { ...order, id: orderId });

      const previousItems = Array.from(this.items.values()).filter(item => item.orderId === orderId);
      for (const item of previousItems) this.items.delete(item.id);

      items.forEach((item, index) => {
        const productId = productIdBySku.get(item.productSku);
        if (!productId) {
          throw new ValidationError(
            `Order ${record.orderNo} references unknown product ${item.productSku}`,
            'orders.items.productSku',
            item.productSku
          );
        }
        // keep item ids stable so earlier jobs can still be superseded
        const reusable = previousItems[index];
        const id = reusable && reusable.productId === productId ? reusable.id : this.generateId();
        this.items.set(id, { id, orderId, productId, quantity: item.quantity });
        orderItems += 1;
      });
    }

    return {
      products: data.products.length,
      lines: data.lines.length,
      orders: data.orders.length,
      orderItems,
    };
  }

  private withItems(order: Order): OrderWithItems {
    const items = Array.from(this.items.values())
      .filter(item => item.orderId === order.id)
      .map(item => {
        const product = this.products.get(item.productId);
        if (!product) {
          throw new DatabaseError(`Order item ${item.id} references missing product ${item.productId}`, 'findPendingOrders');
        }
        return { ...item, product: { ...product } };
      });
    return { ...order, items };
  }
}
