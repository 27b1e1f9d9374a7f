import {z} from 'zod';

// ============================================================================
// Request bodies
// ============================================================================

export const CatalogEntryBodySchema = z.object({
  sku: z.string(),
  name: z.string(),
  category: z.string().default(''),
  regularPrice: z.number(),
  memberPrice: z.number(),
  stockQuantity: z.number(),
  replace: z.boolean().default(false),
});

/**
 * Either both prices, the stock level, or all three.
 */
export const CatalogPatchBodySchema = z
  .object({
    regularPrice: z.number().optional(),
    memberPrice: z.number().optional(),
    stockQuantity: z.number().optional(),
  })
  .refine(body => (body.regularPrice === undefined) === (body.memberPrice === undefined), {
    message: 'regularPrice and memberPrice must be given together',
  })
  .refine(body => body.regularPrice !== undefined || body.stockQuantity !== undefined, {
    message: 'Nothing to update',
  });

export const PromotionBodySchema = z.object({
  code: z.string(),
  variant: z.enum(['FIRST_PICKUP_ONLY', 'FLAT']),
  description: z.string(),
  requirements: z.string().default(''),
  discountRate: z.number(),
});

export const CartItemBodySchema = z.object({
  sku: z.string().min(1),
  quantity: z.number(),
});

export const QuantityBodySchema = z.object({
  quantity: z.number(),
});

export const FulfilmentChoiceSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('DELIVERY'), deliveryAddress: z.string().optional() }),
  z.object({ type: z.literal('PICKUP'), storeId: z.string() }),
]);

export const CheckoutBodySchema = z.object({
  fulfilment: FulfilmentChoiceSchema,
  promoCode: z.string().nullable().default(null),
});

export const TopUpBodySchema = z.object({
  amount: z.number(),
});

export const VipBodySchema = z.object({
  years: z.number().default(1),
});

// ============================================================================
// Query strings
// ============================================================================

export const FulfilmentQuerySchema = z.object({
  fulfilment: z.enum(['DELIVERY', 'PICKUP']).default('DELIVERY'),
});
