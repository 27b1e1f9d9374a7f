/**
 * Seed data for the in-memory effects, validated on load.
 */
import {readFileSync} from 'fs';
import {z} from 'zod';
import {CatalogEntry, Customer, OrderRecord, Store} from '../domain';

export const CatalogEntrySchema = z
  .object({
    sku: z.string().min(1),
    name: z.string().min(1),
    category: z.string(),
    regularPrice: z.number().positive(),
    memberPrice: z.number().positive(),
    stockQuantity: z.number().int().nonnegative(),
  })
  .refine(entry => entry.memberPrice <= entry.regularPrice, {
    message: 'Member price must not exceed the regular price',
    path: ['memberPrice'],
  });

const VipMembershipSchema = z.object({
  years: z.number().int(),
  purchasedAt: z.coerce.date(),
  expiresAt: z.coerce.date(),
  cancelled: z.boolean(),
});

const CustomerSchema = z.object({
  email: z.string(),
  firstName: z.string(),
  lastName: z.string(),
  funds: z.number(),
  isStudent: z.boolean(),
  address: z.string(),
  vipMembership: VipMembershipSchema.nullable(),
});

const StoreSchema = z.object({
  storeId: z.string(),
  name: z.string(),
  address: z.string(),
  phone: z.string(),
  hours: z.string(),
});

export const OrderRecordLineSchema = z.object({
  sku: z.string(),
  name: z.string(),
  quantity: z.number().int(),
  unitPrice: z.string(),
  memberPrice: z.string(),
  lineTotal: z.string(),
});

const OrderRecordSchema = z.object({
  orderId: z.string(),
  email: z.string(),
  createdAt: z.string(),
  fulfilment: z.enum(['DELIVERY', 'PICKUP']),
  deliveryAddress: z.string(),
  storeId: z.string(),
  promoCode: z.string().nullable(),
  subtotal: z.string(),
  studentDiscount: z.string(),
  promoDiscount: z.string(),
  deliveryFee: z.string(),
  total: z.string(),
  lines: z.array(OrderRecordLineSchema),
});

const SeedSchema = z.object({
  catalog: z.array(CatalogEntrySchema).default([]),
  customers: z.array(CustomerSchema).default([]),
  stores: z.array(StoreSchema).default([]),
  orders: z.array(OrderRecordSchema).default([]),
});

export type SeedData = {
  readonly catalog: readonly CatalogEntry[];
  readonly customers: readonly Customer[];
  readonly stores: readonly Store[];
  readonly orders: readonly OrderRecord[];
};

export const EMPTY_SEED: SeedData = { catalog: [], customers: [], stores: [], orders: [] };

export function parseSeed(raw: unknown): SeedData {
  const result = SeedSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid seed data: ${result.error.issues.map(issue => `${issue.path.join('.')} ${issue.message}`).join('; ')}`);
  }
  return result.data;
}

export function loadSeedFile(path: string): SeedData {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return parseSeed(parsed);
}
