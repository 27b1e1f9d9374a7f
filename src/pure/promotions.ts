/**
 * PROMOTIONS
 *
 * Promotion strategies are plain values tagged with a variant. Each variant
 * has its own eligibility rule; the discount itself is always a rate on the
 * items subtotal and never touches the delivery fee.
 */

import {Either, Left, Maybe, Right} from 'purify-ts';
import {CustomerSnapshot, FulfilmentType} from '../domain';
import {OrderingError, orderingError} from './errors';
import {roundMoney} from './money';
import type {OrderRepository} from './effects';

export type PromotionVariant = 'FIRST_PICKUP_ONLY' | 'FLAT';

export type PromotionStrategy = {
  readonly variant: PromotionVariant;
  readonly code: string;
  readonly description: string;
  readonly requirements: string;
  readonly discountRate: number;
};

export type Eligibility =
  | { readonly eligible: true }
  | { readonly eligible: false; readonly reason: string };

export type OrderHistoryLookup = Pick<OrderRepository, 'customerHasPickupOrder'>;

const ELIGIBLE: Eligibility = { eligible: true };

function ineligible(reason: string): Eligibility {
  return { eligible: false, reason };
}

// ============================================================================
// Eligibility
// ============================================================================

type EligibilityRule = (
  strategy: PromotionStrategy,
  customer: CustomerSnapshot,
  fulfilment: FulfilmentType,
  history: OrderHistoryLookup
) => Promise<Eligibility>;

const eligibilityRules: Record<PromotionVariant, EligibilityRule> = {
  FIRST_PICKUP_ONLY: async (strategy, customer, fulfilment, history) => {
    if (fulfilment !== 'PICKUP') {
      return ineligible(`${strategy.code} is only valid for PICKUP orders`);
    }
    if (await history.customerHasPickupOrder(customer.email)) {
      return ineligible(`${strategy.code} is only valid for your first PICKUP order`);
    }
    return ELIGIBLE;
  },
  FLAT: async () => ELIGIBLE,
};

export function isEligible(
  strategy: PromotionStrategy,
  customer: CustomerSnapshot,
  fulfilment: FulfilmentType,
  history: OrderHistoryLookup
): Promise<Eligibility> {
  return eligibilityRules[strategy.variant](strategy, customer, fulfilment, history);
}

// ============================================================================
// Discounts
// ============================================================================

export function calculatePromotionDiscount(strategy: PromotionStrategy, subtotal: number): number {
  return roundMoney(subtotal * strategy.discountRate);
}

export function discountPercentage(strategy: PromotionStrategy): number {
  return Math.round(strategy.discountRate * 100);
}

export function describePromotion(strategy: PromotionStrategy): string {
  return `${strategy.code}: ${strategy.description} (${discountPercentage(strategy)}% off)`;
}

export function definePromotion(
  input: Omit<PromotionStrategy, 'code'> & { readonly code: string }
): Either<OrderingError, PromotionStrategy> {
  const code = input.code.trim().toUpperCase();
  if (code.length === 0) {
    return Left(orderingError('MissingField', 'Promotion code is required'));
  }
  if (!(input.discountRate > 0 && input.discountRate < 1)) {
    return Left(orderingError('InvalidAmount', 'Discount rate must be between 0 and 1'));
  }
  return Right({ ...input, code });
}

// ============================================================================
// Built-in strategies
// ============================================================================

export const FIRST_PICKUP_PROMOTION: PromotionStrategy = {
  variant: 'FIRST_PICKUP_ONLY',
  code: 'FIRSTPICKUP20',
  description: '20% off products subtotal - first-time PICKUP order only',
  requirements: 'Must be your first PICKUP order (not available for delivery)',
  discountRate: 0.2,
};

export const STAFF_PROMOTION: PromotionStrategy = {
  variant: 'FLAT',
  code: 'STAFF5',
  description: '5% off products subtotal - available for all orders',
  requirements: 'Available for all customers on all orders (delivery or pickup)',
  discountRate: 0.05,
};

export const BUILT_IN_PROMOTIONS: readonly PromotionStrategy[] = [FIRST_PICKUP_PROMOTION, STAFF_PROMOTION];

// ============================================================================
// Registry
// ============================================================================

/**
 * Append-only map from uppercase code to strategy. Lookups are
 * case-insensitive. Every read initializes the built-ins first.
 */
export class PromotionRegistry {
  private readonly promotions = new Map<string, PromotionStrategy>();
  private initialized = false;

  initialize(): void {
    if (this.initialized) {
      return;
    }
    for (const promotion of BUILT_IN_PROMOTIONS) {
      this.promotions.set(promotion.code, promotion);
    }
    this.initialized = true;
  }

  register(promotion: PromotionStrategy): boolean {
    this.initialize();
    const code = promotion.code.toUpperCase();
    if (this.promotions.has(code)) {
      return false;
    }
    this.promotions.set(code, { ...promotion, code });
    return true;
  }

  find(code: string): Maybe<PromotionStrategy> {
    this.initialize();
    return Maybe.fromNullable(this.promotions.get(code.trim().toUpperCase()));
  }

  all(): PromotionStrategy[] {
    this.initialize();
    return [...this.promotions.values()];
  }
}

export const promotionRegistry = new PromotionRegistry();
