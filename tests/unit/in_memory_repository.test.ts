import path from 'path';
import { seedFromFile } from '../../src/repository/seed';
import { DatabaseError, ValidationError } from '../../src/utils/errors';
import { createRepository, utc } from '../helpers/fixtures';

const master = {
  products: [
    { sku: 'A', name: 'Alpha', standardCycleTime: 2, setupTime: 10, yieldRate: 1 },
    { sku: 'B', name: 'Beta', standardCycleTime: 3, setupTime: 10, yieldRate: 1 },
  ],
  lines: [
    { name: 'Line 1', status: 'active' as const, allowedProducts: ['A'] },
    { name: 'Line 2', status: 'inactive' as const },
  ],
  orders: [
    {
      orderNo: 'SO-1',
      customerName: 'Test Customer',
      dueDate: utc('2026-03-06T17:00:00'),
      priority: 2,
      status: 'pending' as const,
      items: [
        { productSku: 'A', quantity: 5 },
        { productSku: 'B', quantity: 2 },
      ],
    },
  ],
};

describe('InMemoryScheduleRepository', () => {
  test('upserts master data and maps line allow-lists', async () => {
    const repository = createRepository();

    const summary = await repository.upsertMasterData(master);

    expect(summary).toEqual({ products: 2, lines: 2, orders: 1, orderItems: 2 });
    const lines = await repository.findActiveLines();
    expect(lines).toHaveLength(1);
    expect(lines[0].allowedProducts).toEqual({ kind: 'explicit', skus: ['A'] });
    const [order] = await repository.findPendingOrders();
    expect(order.items.map(item => item.product.sku)).toEqual(['A', 'B']);
  });

  test('is idempotent and keeps order item ids stable', async () => {
    const repository = createRepository();
    await repository.upsertMasterData(master);
    const [before] = await repository.findPendingOrders();

    await repository.upsertMasterData(master);
    const orders = await repository.findPendingOrders();

    expect(orders).toHaveLength(1);
    expect(orders[0].id).toBe(before.id);
    expect(orders[0].items.map(item => item.id)).toEqual(before.items.map(item => item.id));
  });

  test('rejects orders for unknown SKUs before changing anything', async () => {
    const repository = createRepository();
    const bad = {
      ...master,
      orders: [{ ...master.orders[0], items: [{ productSku: 'C', quantity: 1 }] }],
    };

    await expect(repository.upsertMasterData(bad)).rejects.toBeInstanceOf(ValidationError);
    expect(await repository.findActiveLines()).toEqual([]);
  });

  test('lists open jobs by default and pages by start time', async () => {
    const repository = createRepository();
    const base = {
      orderItemId: 'item',
      productionLineId: 'line-1',
      productId: 'prod-A',
      quantity: 1,
      changeoverMinutes: 0,
      notes: null,
    };
    repository.addJob({ ...base, id: 'late', status: 'planned', plannedStart: utc('2026-02-23T13:00:00'), plannedEnd: utc('2026-02-23T14:00:00') });
    repository.addJob({ ...base, id: 'early', status: 'in_progress', plannedStart: utc('2026-02-23T09:00:00'), plannedEnd: utc('2026-02-23T10:00:00') });
    repository.addJob({ ...base, id: 'old', status: 'superseded', plannedStart: utc('2026-02-23T08:00:00'), plannedEnd: utc('2026-02-23T09:00:00') });

    expect((await repository.listJobs()).map(job => job.id)).toEqual(['early', 'late']);
    expect((await repository.listJobs({ status: 'superseded' })).map(job => job.id)).toEqual(['old']);
    expect((await repository.listJobs({ skip: 1, limit: 1 })).map(job => job.id)).toEqual(['late']);
    expect(await repository.listJobs({ productionLineId: 'line-2' })).toEqual([]);
  });

  test('supersedes planned jobs of re-planned items even without a replacement', async () => {
    const repository = createRepository();
    const base = {
      productionLineId: 'line-1',
      productId: 'prod-A',
      quantity: 1,
      changeoverMinutes: 0,
      notes: null,
      plannedStart: utc('2026-02-23T09:00:00'),
      plannedEnd: utc('2026-02-23T10:00:00'),
    };
    repository.addJob({ ...base, id: 'kept', orderItemId: 'other-item', status: 'planned' });
    repository.addJob({ ...base, id: 'running', orderItemId: 'item-a', status: 'in_progress' });
    repository.addJob({ ...base, id: 'dropped', orderItemId: 'item-a', status: 'planned' });
    repository.addJob({ ...base, id: 'moved', orderItemId: 'item-b', status: 'planned' });

    const result = await repository.replacePlannedJobs(['item-a', 'item-b'], [{ ...base, orderItemId: 'item-b', status: 'planned' }]);

    expect(result.supersededCount).toBe(2);
    expect(result.jobs.map(job => job.orderItemId)).toEqual(['item-b']);
    expect(repository.getJob('dropped')?.status).toBe('superseded');
    expect(repository.getJob('moved')?.status).toBe('superseded');
    expect(repository.getJob('running')?.status).toBe('in_progress');
    expect(repository.getJob('kept')?.status).toBe('planned');
  });
});

describe('seedFromFile', () => {
  test('loads the bundled seed data', async () => {
    const repository = createRepository();

    const summary = await seedFromFile(repository, path.join(__dirname, '../../data/seed.json'));

    expect(summary).toEqual({ products: 4, lines: 3, orders: 2, orderItems: 3 });
    expect((await repository.findActiveLines()).map(line => line.name)).toEqual(['Line 1', 'Line 2']);
  });

  test('reports an unreadable file', async () => {
    await expect(seedFromFile(createRepository(), path.join(__dirname, 'missing.json'))).rejects.toBeInstanceOf(
      DatabaseError
    );
  });
});
