/**
 * PRODUCTION EFFECTS IMPLEMENTATION
 *
 * Real implementations of the effect interfaces:
 * - PostgreSQL for the catalog, customers, orders and pickup stores
 * - The in-memory stores, seeded from a JSON file, when STORAGE=memory
 */
import {Pool, PoolClient} from 'pg';
import {z} from 'zod';
import {CatalogEntry, Customer, FulfilmentType, OrderRecord, Store, VipMembership} from '../domain';
import {
  AppEffects,
  CatalogRepository,
  Clock,
  CustomerRepository,
  OrderIdGenerator,
  OrderRepository,
  StoreDirectory,
} from '../pure/effects';
import {PromotionRegistry, promotionRegistry} from '../pure/promotions';
import {makeInMemoryEffects, randomOrderIds, systemClock} from './InMemoryEffects';
import {loadSeedFile, OrderRecordLineSchema} from './seed';
import {AppConfig, StorageKind} from './types';

/**
 * Effects that hold connections and must be closed on shutdown.
 */
export type ManagedEffects = AppEffects & {
  close(): Promise<void>;
};

// ============================================================================
// Configuration
// ============================================================================

function parseStorage(value: string | undefined): StorageKind {
  return value === 'postgres' ? 'postgres' : 'memory';
}

// Load configuration from environment variables
export function loadConfigFromEnv(): AppConfig {
  return {
    storage: parseStorage(process.env.STORAGE),
    seedFile: process.env.SEED_FILE || 'data/seed.json',
    database: {
      host: process.env.DATABASE_HOST || 'localhost',
      port: parseInt(process.env.DATABASE_PORT || '5432', 10),
      user: process.env.DATABASE_USER || 'appuser',
      password: process.env.DATABASE_PASSWORD || 'apppassword',
      database: process.env.DATABASE_NAME || 'retaildb',
    },
    apiPort: parseInt(process.env.API_PORT || '3000', 10),
  };
}

async function withClient<T>(pool: Pool, work: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    return await work(client);
  } finally {
    client.release();
  }
}

function updatedOne(rowCount: number | null): boolean {
  return (rowCount ?? 0) > 0;
}

// ============================================================================
// PostgreSQL Catalog Repository
// ============================================================================

type ProductRow = {
  sku: string;
  name: string;
  category: string;
  regular_price: string;
  member_price: string;
  stock_quantity: number;
};

function toCatalogEntry(row: ProductRow): CatalogEntry {
  return {
    sku: row.sku,
    name: row.name,
    category: row.category,
    regularPrice: parseFloat(row.regular_price),
    memberPrice: parseFloat(row.member_price),
    stockQuantity: row.stock_quantity,
  };
}

const PRODUCT_COLUMNS = 'sku, name, category, regular_price, member_price, stock_quantity';

class PostgresCatalogRepository implements CatalogRepository {
  constructor(private pool: Pool) {}

  async findBySku(sku: string): Promise<CatalogEntry | null> {
    const result = await this.pool.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE sku = $1 AND active`,
      [sku]
    );
    const row = result.rows[0];
    return row ? toCatalogEntry(row) : null;
  }

  async findBySkus(skus: string[]): Promise<Record<string, CatalogEntry>> {
    if (skus.length === 0) {
      return {};
    }

    const result = await this.pool.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE sku = ANY($1) AND active`,
      [skus]
    );

    const products: Record<string, CatalogEntry> = {};
    for (const row of result.rows) {
      products[row.sku] = toCatalogEntry(row);
    }
    return products;
  }

  async findAll(): Promise<CatalogEntry[]> {
    const result = await this.pool.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE active ORDER BY sku`
    );
    return result.rows.map(toCatalogEntry);
  }

  async currentStock(sku: string): Promise<number> {
    const entry = await this.findBySku(sku);
    return entry ? entry.stockQuantity : 0;
  }

  async decrementStock(sku: string, quantity: number): Promise<boolean> {
    const result = await this.pool.query(
      'UPDATE products SET stock_quantity = stock_quantity - $1 WHERE sku = $2 AND active AND stock_quantity >= $1',
      [quantity, sku]
    );
    return updatedOne(result.rowCount);
  }

  async restoreStock(sku: string, quantity: number): Promise<boolean> {
    const result = await this.pool.query(
      'UPDATE products SET stock_quantity = stock_quantity + $1 WHERE sku = $2',
      [quantity, sku]
    );
    return updatedOne(result.rowCount);
  }

  async save(entry: CatalogEntry): Promise<void> {
    await this.pool.query(
      `INSERT INTO products (${PRODUCT_COLUMNS}, active)
       VALUES ($1, $2, $3, $4, $5, $6, TRUE)
       ON CONFLICT (sku) DO UPDATE SET
         name = EXCLUDED.name,
         category = EXCLUDED.category,
         regular_price = EXCLUDED.regular_price,
         member_price = EXCLUDED.member_price,
         stock_quantity = EXCLUDED.stock_quantity,
         active = TRUE`,
      [entry.sku, entry.name, entry.category, entry.regularPrice, entry.memberPrice, entry.stockQuantity]
    );
  }

  async remove(sku: string): Promise<boolean> {
    const result = await this.pool.query('UPDATE products SET active = FALSE WHERE sku = $1 AND active', [sku]);
    return updatedOne(result.rowCount);
  }
}

// ============================================================================
// PostgreSQL Customer Repository
// ============================================================================

type CustomerRow = {
  email: string;
  first_name: string;
  last_name: string;
  funds: string;
  is_student: boolean;
  address: string;
  vip_years: number | null;
  vip_purchased_at: Date | null;
  vip_expires_at: Date | null;
  vip_cancelled: boolean;
};

function toMembership(row: CustomerRow): VipMembership | null {
  if (row.vip_years === null || row.vip_purchased_at === null || row.vip_expires_at === null) {
    return null;
  }
  return {
    years: row.vip_years,
    purchasedAt: row.vip_purchased_at,
    expiresAt: row.vip_expires_at,
    cancelled: row.vip_cancelled,
  };
}

class PostgresCustomerRepository implements CustomerRepository {
  constructor(private pool: Pool) {}

  async findByEmail(email: string): Promise<Customer | null> {
    const result = await this.pool.query<CustomerRow>(
      `SELECT email, first_name, last_name, funds, is_student, address,
              vip_years, vip_purchased_at, vip_expires_at, vip_cancelled
       FROM customers WHERE lower(email) = lower($1)`,
      [email.trim()]
    );

    const row = result.rows[0];
    if (!row) {
      return null;
    }
    return {
      email: row.email,
      firstName: row.first_name,
      lastName: row.last_name,
      funds: parseFloat(row.funds),
      isStudent: row.is_student,
      address: row.address,
      vipMembership: toMembership(row),
    };
  }

  async getFunds(email: string): Promise<number | null> {
    const result = await this.pool.query<{ funds: string }>(
      'SELECT funds FROM customers WHERE lower(email) = lower($1)',
      [email.trim()]
    );
    const row = result.rows[0];
    return row ? parseFloat(row.funds) : null;
  }

  async setFunds(email: string, funds: number): Promise<boolean> {
    const result = await this.pool.query(
      'UPDATE customers SET funds = $1 WHERE lower(email) = lower($2)',
      [funds, email.trim()]
    );
    return updatedOne(result.rowCount);
  }

  async setMembership(email: string, membership: VipMembership | null): Promise<boolean> {
    const result = await this.pool.query(
      `UPDATE customers
       SET vip_years = $1, vip_purchased_at = $2, vip_expires_at = $3, vip_cancelled = $4
       WHERE lower(email) = lower($5)`,
      [
        membership?.years ?? null,
        membership?.purchasedAt ?? null,
        membership?.expiresAt ?? null,
        membership?.cancelled ?? false,
        email.trim(),
      ]
    );
    return updatedOne(result.rowCount);
  }
}

// ============================================================================
// PostgreSQL Order Repository
// ============================================================================

type OrderRow = {
  order_id: string;
  email: string;
  created_at: Date;
  fulfilment: FulfilmentType;
  delivery_address: string;
  store_id: string;
  promo_code: string | null;
  subtotal: string;
  student_discount: string;
  promo_discount: string;
  delivery_fee: string;
  total: string;
  lines: unknown;
};

const OrderLinesSchema = z.array(OrderRecordLineSchema);

function toOrderRecord(row: OrderRow): OrderRecord {
  const lines = OrderLinesSchema.safeParse(row.lines);
  if (!lines.success) {
    throw new Error(`Order ${row.order_id} has malformed lines: ${lines.error.message}`);
  }
  return {
    orderId: row.order_id,
    email: row.email,
    createdAt: row.created_at.toISOString(),
    fulfilment: row.fulfilment,
    deliveryAddress: row.delivery_address,
    storeId: row.store_id,
    promoCode: row.promo_code,
    subtotal: row.subtotal,
    studentDiscount: row.student_discount,
    promoDiscount: row.promo_discount,
    deliveryFee: row.delivery_fee,
    total: row.total,
    lines: lines.data,
  };
}

const ORDER_COLUMNS = `order_id, email, created_at, fulfilment, delivery_address, store_id, promo_code,
  subtotal, student_discount, promo_discount, delivery_fee, total, lines`;

class PostgresOrderRepository implements OrderRepository {
  constructor(private pool: Pool) {}

  async customerHasPickupOrder(email: string): Promise<boolean> {
    const result = await this.pool.query<{ found: boolean }>(
      `SELECT EXISTS (
         SELECT 1 FROM orders WHERE lower(email) = lower($1) AND fulfilment = 'PICKUP'
       ) AS found`,
      [email.trim()]
    );
    return result.rows[0]?.found ?? false;
  }

  async append(record: OrderRecord): Promise<boolean> {
    return withClient(this.pool, async (client) => {
      try {
        await client.query('BEGIN');
        const result = await client.query(
          `INSERT INTO orders (${ORDER_COLUMNS})
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)`,
          [
            record.orderId,
            record.email,
            record.createdAt,
            record.fulfilment,
            record.deliveryAddress,
            record.storeId,
            record.promoCode,
            record.subtotal,
            record.studentDiscount,
            record.promoDiscount,
            record.deliveryFee,
            record.total,
            JSON.stringify(record.lines),
          ]
        );
        await client.query('COMMIT');
        return updatedOne(result.rowCount);
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      }
    });
  }

  async findByEmail(email: string): Promise<OrderRecord[]> {
    const result = await this.pool.query<OrderRow>(
      `SELECT ${ORDER_COLUMNS} FROM orders WHERE lower(email) = lower($1) ORDER BY created_at`,
      [email.trim()]
    );
    return result.rows.map(toOrderRecord);
  }

  async findById(orderId: string): Promise<OrderRecord | null> {
    const result = await this.pool.query<OrderRow>(
      `SELECT ${ORDER_COLUMNS} FROM orders WHERE order_id = $1`,
      [orderId]
    );
    const row = result.rows[0];
    return row ? toOrderRecord(row) : null;
  }
}

// ============================================================================
// PostgreSQL Store Directory
// ============================================================================

type StoreRow = {
  store_id: string;
  name: string;
  address: string;
  phone: string;
  hours: string;
};

function toStore(row: StoreRow): Store {
  return {
    storeId: row.store_id,
    name: row.name,
    address: row.address,
    phone: row.phone,
    hours: row.hours,
  };
}

class PostgresStoreDirectory implements StoreDirectory {
  constructor(private pool: Pool) {}

  async findAll(): Promise<Store[]> {
    const result = await this.pool.query<StoreRow>(
      'SELECT store_id, name, address, phone, hours FROM stores ORDER BY store_id'
    );
    return result.rows.map(toStore);
  }

  async findById(storeId: string): Promise<Store | null> {
    const result = await this.pool.query<StoreRow>(
      'SELECT store_id, name, address, phone, hours FROM stores WHERE store_id = $1',
      [storeId]
    );
    const row = result.rows[0];
    return row ? toStore(row) : null;
  }
}

// ============================================================================
// Production EffectsFactory
// ============================================================================

class EffectsFactory implements ManagedEffects {
  private _pool?: Pool;
  private _catalog?: CatalogRepository;
  private _customers?: CustomerRepository;
  private _orders?: OrderRepository;
  private _stores?: StoreDirectory;

  readonly promotions: PromotionRegistry = promotionRegistry;
  readonly clock: Clock = systemClock;
  readonly orderIds: OrderIdGenerator = randomOrderIds;

  constructor(private config: AppConfig) {}

  private async getPool(): Promise<Pool> {
    if (!this._pool) {
      this._pool = new Pool({
        host: this.config.database.host,
        port: this.config.database.port,
        user: this.config.database.user,
        password: this.config.database.password,
        database: this.config.database.database,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
      });

      try {
        const client = await this._pool.connect();
        console.log('✅ Connected to PostgreSQL');
        client.release();
      } catch (error) {
        console.error('❌ Failed to connect to PostgreSQL:', error);
        throw error;
      }
    }
    return this._pool;
  }

  private requirePool(): Pool {
    if (!this._pool) {
      throw new Error('Database pool not initialized. Call initialize() first.');
    }
    return this._pool;
  }

  get catalog(): CatalogRepository {
    if (!this._catalog) {
      this._catalog = new PostgresCatalogRepository(this.requirePool());
    }
    return this._catalog;
  }

  get customers(): CustomerRepository {
    if (!this._customers) {
      this._customers = new PostgresCustomerRepository(this.requirePool());
    }
    return this._customers;
  }

  get orders(): OrderRepository {
    if (!this._orders) {
      this._orders = new PostgresOrderRepository(this.requirePool());
    }
    return this._orders;
  }

  get stores(): StoreDirectory {
    if (!this._stores) {
      this._stores = new PostgresStoreDirectory(this.requirePool());
    }
    return this._stores;
  }

  /**
   * Must be called before using the effects
   */
  async initialize(): Promise<void> {
    await this.getPool();
    this.promotions.initialize();
    console.log('✅ All production effects initialized');
  }

  async close(): Promise<void> {
    if (this._pool) {
      await this._pool.end();
      this._pool = undefined;
    }
  }

  static async make(config: AppConfig): Promise<ManagedEffects> {
    const effects = new EffectsFactory(config);
    await effects.initialize();
    return effects;
  }
}

function makeSeededEffects(config: AppConfig): ManagedEffects {
  const effects = makeInMemoryEffects(loadSeedFile(config.seedFile));
  console.log(`✅ Loaded in-memory stores from ${config.seedFile}`);
  return { ...effects, close: async () => undefined };
}

export async function makeAppEffects(config?: AppConfig): Promise<ManagedEffects> {
  const cfg = config || loadConfigFromEnv();
  return cfg.storage === 'postgres' ? EffectsFactory.make(cfg) : makeSeededEffects(cfg);
}
