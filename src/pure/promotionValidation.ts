/**
 * PROMOTION VALIDATION - Coordinator
 *
 * Looks codes up in the registry and runs the strategy's eligibility rule
 * against the customer's order history.
 */

import {Either, Left, Maybe, Right} from 'purify-ts';
import {CustomerSnapshot, FulfilmentType} from '../domain';
import {AppEffects} from './effects';
import {OrderingError, orderingError} from './errors';
import {calculatePromotionDiscount, definePromotion, isEligible, PromotionStrategy} from './promotions';

type PromotionEffects = Pick<AppEffects, 'promotions' | 'orders'>;

/**
 * Validate a promotion code for this customer and fulfilment.
 * @return either the reason the code cannot be used or the strategy to
 * attach to the order
 */
export function validatePromotion(
  code: string,
  customer: CustomerSnapshot,
  fulfilment: FulfilmentType
): (effects: PromotionEffects) => Promise<Either<OrderingError, PromotionStrategy>> {
  return async (effects: PromotionEffects) => {
    const strategy = effects.promotions.find(code).extract();
    if (!strategy) {
      return Left(orderingError('UnknownPromoCode', `Invalid promotion code: ${code}`));
    }

    const eligibility = await isEligible(strategy, customer, fulfilment, effects.orders);
    if (!eligibility.eligible) {
      return Left(orderingError('PromotionIneligible', eligibility.reason));
    }
    return Right(strategy);
  };
}

export function eligiblePromotions(
  customer: CustomerSnapshot,
  fulfilment: FulfilmentType
): (effects: PromotionEffects) => Promise<PromotionStrategy[]> {
  return async (effects: PromotionEffects) => {
    const strategies = effects.promotions.all();
    const checks = await Promise.all(
      strategies.map(strategy => isEligible(strategy, customer, fulfilment, effects.orders))
    );
    return strategies.filter((_, index) => checks[index]?.eligible === true);
  };
}

/**
 * Of the given codes, the eligible one with the largest discount on this
 * subtotal. Ties keep the first code given.
 */
export function bestPromotion(
  codes: string[],
  customer: CustomerSnapshot,
  fulfilment: FulfilmentType,
  subtotal: number
): (effects: PromotionEffects) => Promise<Maybe<{ strategy: PromotionStrategy; discount: number }>> {
  return async (effects: PromotionEffects) => {
    const validated = await Promise.all(
      codes.map(code => validatePromotion(code, customer, fulfilment)(effects))
    );

    return Either.rights(validated).reduce<Maybe<{ strategy: PromotionStrategy; discount: number }>>(
      (best, strategy) => {
        const discount = calculatePromotionDiscount(strategy, subtotal);
        const beatsBest = best.map(current => discount > current.discount).orDefault(discount > 0);
        return beatsBest ? Maybe.of({ strategy, discount }) : best;
      },
      Maybe.empty()
    );
  };
}

export function registerPromotion(
  input: PromotionStrategy
): (effects: Pick<AppEffects, 'promotions'>) => Either<OrderingError, PromotionStrategy> {
  return (effects) => definePromotion(input).chain((strategy): Either<OrderingError, PromotionStrategy> =>
    effects.promotions.register(strategy)
      ? Right(strategy)
      : Left(orderingError('DuplicatePromotion', `Promotion code ${strategy.code} already exists`))
  );
}
