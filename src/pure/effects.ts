/**
 * EFFECTS LAYER
 *
 * The collaborators the ordering engine talks to. Coordinators only see
 * these narrow interfaces ("decrement this SKU's stock", "append this
 * order record"), never a database handle, so tests can supply a plain
 * object and production can supply PostgreSQL.
 */

import {CatalogEntry, Customer, OrderRecord, Store, VipMembership} from '../domain';
import type {PromotionRegistry} from './promotions';

// ============================================================================
// Effect Interfaces
// ============================================================================

export interface CatalogRepository {
  findBySku(sku: string): Promise<CatalogEntry | null>;
  findBySkus(skus: string[]): Promise<Record<string, CatalogEntry>>;
  findAll(): Promise<CatalogEntry[]>;
  currentStock(sku: string): Promise<number>;
  decrementStock(sku: string, quantity: number): Promise<boolean>;
  restoreStock(sku: string, quantity: number): Promise<boolean>;
  save(entry: CatalogEntry): Promise<void>;
  /** Removes the entry from the active catalog only. */
  remove(sku: string): Promise<boolean>;
}

export interface CustomerRepository {
  findByEmail(email: string): Promise<Customer | null>;
  getFunds(email: string): Promise<number | null>;
  setFunds(email: string, funds: number): Promise<boolean>;
  setMembership(email: string, membership: VipMembership | null): Promise<boolean>;
}

export interface OrderRepository {
  customerHasPickupOrder(email: string): Promise<boolean>;
  append(record: OrderRecord): Promise<boolean>;
  findByEmail(email: string): Promise<OrderRecord[]>;
  findById(orderId: string): Promise<OrderRecord | null>;
}

export interface StoreDirectory {
  findAll(): Promise<Store[]>;
  findById(storeId: string): Promise<Store | null>;
}

export interface Clock {
  now(): Date;
}

export interface OrderIdGenerator {
  next(): string;
}

// ============================================================================
// Combined Dependencies
// ============================================================================

export type AppEffects = {
  readonly catalog: CatalogRepository;
  readonly customers: CustomerRepository;
  readonly orders: OrderRepository;
  readonly stores: StoreDirectory;
  readonly promotions: PromotionRegistry;
  readonly clock: Clock;
  readonly orderIds: OrderIdGenerator;
};
