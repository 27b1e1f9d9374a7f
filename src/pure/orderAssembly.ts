/**
 * ORDER ASSEMBLY
 *
 * Builds an immutable, fully priced Order from a customer snapshot, a
 * fulfilment choice, the cart's lines and an optional promotion.
 *
 * The draft moves Created -> FulfilmentSet -> ItemsAdded -> PromotionApplied
 * and build() turns it into an Order. Pricing runs exactly once, in build();
 * nothing on the Order is ever re-derived afterwards.
 */

import {Either, Left, Right} from 'purify-ts';
import {Cart, CatalogEntry, CustomerSnapshot, Fulfilment, FulfilmentType, Order, OrderPricing, PricedLine} from '../domain';
import {priceCartLines, sumLineTotals} from './cart';
import {OrderingError, orderingError} from './errors';
import {roundMoney} from './money';
import {calculatePromotionDiscount, PromotionStrategy} from './promotions';

export const DELIVERY_FEE = 20.0;
export const STUDENT_PICKUP_DISCOUNT_RATE = 0.05;

export type OrderStage = 'Created' | 'FulfilmentSet' | 'ItemsAdded' | 'PromotionApplied';

const stageOrder: readonly OrderStage[] = ['Created', 'FulfilmentSet', 'ItemsAdded', 'PromotionApplied'];

export type OrderDraft = {
  readonly stage: OrderStage;
  readonly customer: CustomerSnapshot;
  readonly fulfilment: Fulfilment | null;
  readonly lines: readonly PricedLine[];
  readonly promotion: PromotionStrategy | null;
};

export type OrderIdentity = {
  readonly orderId: string;
  readonly createdAt: Date;
};

/**
 * Stages move one step at a time: items added before a fulfilment is set
 * leave the draft in Created.
 */
function advance(draft: OrderDraft, stage: OrderStage): OrderStage {
  return stageOrder.indexOf(stage) === stageOrder.indexOf(draft.stage) + 1 ? stage : draft.stage;
}

// ============================================================================
// Draft transitions
// ============================================================================

export function startOrder(customer: CustomerSnapshot): OrderDraft {
  return {
    stage: 'Created',
    customer,
    fulfilment: null,
    lines: [],
    promotion: null,
  };
}

export function setDelivery(draft: OrderDraft, deliveryAddress: string): OrderDraft {
  return {
    ...draft,
    stage: advance(draft, 'FulfilmentSet'),
    fulfilment: { type: 'DELIVERY', deliveryAddress: deliveryAddress.trim() },
  };
}

export function setPickup(draft: OrderDraft, storeId: string): OrderDraft {
  return {
    ...draft,
    stage: advance(draft, 'FulfilmentSet'),
    fulfilment: { type: 'PICKUP', storeId: storeId.trim().toUpperCase() },
  };
}

/**
 * Copies the cart's lines, priced at the customer's VIP flag, into the
 * draft. Later changes to the cart or the catalog do not reach the draft.
 */
export function addItemsFromCart(
  draft: OrderDraft,
  cart: Cart,
  products: Record<string, CatalogEntry>
): OrderDraft {
  return {
    ...draft,
    stage: advance(draft, 'ItemsAdded'),
    lines: priceCartLines(cart, products, draft.customer.isVip).lines,
  };
}

export function applyPromotion(draft: OrderDraft, promotion: PromotionStrategy | null): OrderDraft {
  return {
    ...draft,
    stage: promotion ? advance(draft, 'PromotionApplied') : draft.stage,
    promotion,
  };
}

// ============================================================================
// Pricing
// ============================================================================

export function calculateDeliveryFee(fulfilment: FulfilmentType, isStudent: boolean): number {
  if (fulfilment === 'PICKUP' || isStudent) {
    return 0;
  }
  return DELIVERY_FEE;
}

/**
 * Student pickup discount and promotion discount are mutually exclusive:
 * attaching any promotion forfeits the student discount, even when the
 * promotion is worth nothing on this subtotal.
 */
export function calculateDiscounts(
  subtotal: number,
  customer: CustomerSnapshot,
  fulfilment: FulfilmentType,
  promotion: PromotionStrategy | null
): { studentDiscount: number; promoDiscount: number } {
  if (promotion) {
    const promoDiscount = Math.min(Math.max(calculatePromotionDiscount(promotion, subtotal), 0), subtotal);
    return { studentDiscount: 0, promoDiscount };
  }
  if (fulfilment === 'PICKUP' && customer.isStudent) {
    return { studentDiscount: roundMoney(subtotal * STUDENT_PICKUP_DISCOUNT_RATE), promoDiscount: 0 };
  }
  return { studentDiscount: 0, promoDiscount: 0 };
}

export function calculateOrderPricing(
  lines: readonly PricedLine[],
  customer: CustomerSnapshot,
  fulfilment: FulfilmentType,
  promotion: PromotionStrategy | null
): OrderPricing {
  const subtotal = sumLineTotals(lines);
  const deliveryFee = calculateDeliveryFee(fulfilment, customer.isStudent);
  const {studentDiscount, promoDiscount} = calculateDiscounts(subtotal, customer, fulfilment, promotion);
  const total = Math.max(0, roundMoney(subtotal - studentDiscount - promoDiscount + deliveryFee));

  return { subtotal, studentDiscount, promoDiscount, deliveryFee, total };
}

// ============================================================================
// Build
// ============================================================================

export function buildOrder(draft: OrderDraft, identity: OrderIdentity): Either<OrderingError, Order> {
  if (draft.lines.length === 0) {
    return Left(orderingError('EmptyCart', 'No items in cart to build order.'));
  }
  if (!draft.fulfilment) {
    return Left(orderingError('FulfilmentNotSet', 'Fulfilment must be set to DELIVERY or PICKUP before build.'));
  }
  if (stageOrder.indexOf(draft.stage) < stageOrder.indexOf('ItemsAdded')) {
    return Left(orderingError('FulfilmentNotSet', 'Fulfilment must be set before items are added.'));
  }

  const pricing = calculateOrderPricing(draft.lines, draft.customer, draft.fulfilment.type, draft.promotion);

  return Right({
    orderId: identity.orderId,
    createdAt: identity.createdAt,
    customerEmail: draft.customer.email,
    isVipOrder: draft.customer.isVip,
    lines: draft.lines,
    fulfilment: draft.fulfilment,
    promoCode: draft.promotion?.code ?? null,
    ...pricing,
  });
}
