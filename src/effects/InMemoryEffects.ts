/**
 * IN-MEMORY EFFECTS IMPLEMENTATION
 *
 * Process-local stores for running without PostgreSQL. Every read returns
 * a copy, so callers can never mutate the stored state directly.
 */
import {randomUUID} from 'crypto';
import {CatalogEntry, Customer, OrderRecord, Store, VipMembership} from '../domain';
import {
  AppEffects,
  CatalogRepository,
  Clock,
  CustomerRepository,
  OrderIdGenerator,
  OrderRepository,
  StoreDirectory,
} from '../pure/effects';
import {formatOrderId} from '../pure/orderRecords';
import {promotionRegistry} from '../pure/promotions';
import {EMPTY_SEED, SeedData} from './seed';

type StoredEntry = {
  entry: CatalogEntry;
  active: boolean;
};

function emailKey(email: string): string {
  return email.trim().toLowerCase();
}

export class InMemoryCatalogRepository implements CatalogRepository {
  private readonly entries = new Map<string, StoredEntry>();

  constructor(entries: readonly CatalogEntry[] = []) {
    for (const entry of entries) {
      this.entries.set(entry.sku, { entry: { ...entry }, active: true });
    }
  }

  async findBySku(sku: string): Promise<CatalogEntry | null> {
    const stored = this.entries.get(sku);
    return stored && stored.active ? { ...stored.entry } : null;
  }

  async findBySkus(skus: string[]): Promise<Record<string, CatalogEntry>> {
    const found: Record<string, CatalogEntry> = {};
    for (const sku of skus) {
      const entry = await this.findBySku(sku);
      if (entry) {
        found[sku] = entry;
      }
    }
    return found;
  }

  async findAll(): Promise<CatalogEntry[]> {
    return [...this.entries.values()]
      .filter(stored => stored.active)
      .map(stored => ({ ...stored.entry }));
  }

  async currentStock(sku: string): Promise<number> {
    const entry = await this.findBySku(sku);
    return entry ? entry.stockQuantity : 0;
  }

  async decrementStock(sku: string, quantity: number): Promise<boolean> {
    const stored = this.entries.get(sku);
    if (!stored || !stored.active || stored.entry.stockQuantity < quantity) {
      return false;
    }
    stored.entry = { ...stored.entry, stockQuantity: stored.entry.stockQuantity - quantity };
    return true;
  }

  async restoreStock(sku: string, quantity: number): Promise<boolean> {
    const stored = this.entries.get(sku);
    if (!stored) {
      return false;
    }
    stored.entry = { ...stored.entry, stockQuantity: stored.entry.stockQuantity + quantity };
    return true;
  }

  async save(entry: CatalogEntry): Promise<void> {
    this.entries.set(entry.sku, { entry: { ...entry }, active: true });
  }

  async remove(sku: string): Promise<boolean> {
    const stored = this.entries.get(sku);
    if (!stored || !stored.active) {
      return false;
    }
    stored.active = false;
    return true;
  }
}

export class InMemoryCustomerRepository implements CustomerRepository {
  private readonly customers = new Map<string, Customer>();

  constructor(customers: readonly Customer[] = []) {
    for (const customer of customers) {
      this.customers.set(emailKey(customer.email), customer);
    }
  }

  async findByEmail(email: string): Promise<Customer | null> {
    return this.customers.get(emailKey(email)) ?? null;
  }

  async getFunds(email: string): Promise<number | null> {
    const customer = await this.findByEmail(email);
    return customer ? customer.funds : null;
  }

  async setFunds(email: string, funds: number): Promise<boolean> {
    return this.update(email, customer => ({ ...customer, funds }));
  }

  async setMembership(email: string, membership: VipMembership | null): Promise<boolean> {
    return this.update(email, customer => ({ ...customer, vipMembership: membership }));
  }

  private update(email: string, change: (customer: Customer) => Customer): boolean {
    const key = emailKey(email);
    const customer = this.customers.get(key);
    if (!customer) {
      return false;
    }
    this.customers.set(key, change(customer));
    return true;
  }
}

export class InMemoryOrderRepository implements OrderRepository {
  private readonly records: OrderRecord[];

  constructor(records: readonly OrderRecord[] = []) {
    this.records = [...records];
  }

  async customerHasPickupOrder(email: string): Promise<boolean> {
    const key = emailKey(email);
    return this.records.some(record => emailKey(record.email) === key && record.fulfilment === 'PICKUP');
  }

  async append(record: OrderRecord): Promise<boolean> {
    this.records.push(record);
    return true;
  }

  async findByEmail(email: string): Promise<OrderRecord[]> {
    const key = emailKey(email);
    return this.records.filter(record => emailKey(record.email) === key);
  }

  async findById(orderId: string): Promise<OrderRecord | null> {
    return this.records.find(record => record.orderId === orderId) ?? null;
  }
}

export class InMemoryStoreDirectory implements StoreDirectory {
  constructor(private readonly stores: readonly Store[] = []) {}

  async findAll(): Promise<Store[]> {
    return [...this.stores];
  }

  async findById(storeId: string): Promise<Store | null> {
    return this.stores.find(store => store.storeId === storeId) ?? null;
  }
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export const randomOrderIds: OrderIdGenerator = {
  next: () => formatOrderId(randomUUID()),
};

export function makeInMemoryEffects(
  seed: SeedData = EMPTY_SEED,
  overrides: Partial<AppEffects> = {}
): AppEffects {
  return {
    catalog: new InMemoryCatalogRepository(seed.catalog),
    customers: new InMemoryCustomerRepository(seed.customers),
    orders: new InMemoryOrderRepository(seed.orders),
    stores: new InMemoryStoreDirectory(seed.stores),
    promotions: promotionRegistry,
    clock: systemClock,
    orderIds: randomOrderIds,
    ...overrides,
  };
}
